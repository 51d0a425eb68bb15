/**
 * Default suppression file written by --create-suppression-file
 */

import * as fs from 'fs';
import * as path from 'path';
import type { SuppressionFile } from './types.js';

/**
 * Template content. Every entry is a comment, so the file suppresses
 * nothing until real keys are added.
 */
export const DEFAULT_SUPPRESSION_FILE: SuppressionFile = {
  suppressions: [
    '# Example suppressions:',
    '# "Source/MyGame/Public/Data/LegacyStruct.h:FLegacyStruct::LegacyId"',
    '# "FTemporaryStruct::TempId"',
    '# "*::DebugId"',
    '# "Source/MyGame/Public/Data/ThirdPartyTypes.h"',
  ],
};

/**
 * Create a default suppression file with examples
 *
 * @param filePath - Destination path; parent directories are created
 */
export async function createDefaultSuppressionFile(filePath: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
  await fs.promises.writeFile(
    filePath,
    JSON.stringify(DEFAULT_SUPPRESSION_FILE, null, 2),
    'utf-8'
  );
}
