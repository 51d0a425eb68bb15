/**
 * Suppression File Loader
 *
 * Loads and validates the JSON suppression file passed with --suppression-file
 */

import * as fs from 'fs';
import chalk from 'chalk';
import { ConfigError, errorMessage } from '../errors.js';
import type { SuppressionFile } from './types.js';

const EMPTY: ReadonlySet<string> = new Set<string>();

/**
 * Load suppression keys from a JSON file
 *
 * No path yields an empty set. A path with no file behind it, or a file that
 * cannot be read or parsed, is reported as a warning and also yields an
 * empty set.
 *
 * @param filePath - Path to the suppression file
 * @returns Keys exactly as written in the file
 */
export function loadSuppressions(filePath?: string): ReadonlySet<string> {
  if (!filePath) {
    return EMPTY;
  }

  if (!fs.existsSync(filePath)) {
    console.warn(
      chalk.yellow(`Warning: Suppression file not found: ${filePath} (continuing without suppressions)`)
    );
    return EMPTY;
  }

  try {
    return new Set(readSuppressionFile(filePath).suppressions);
  } catch (error) {
    const configError =
      error instanceof ConfigError
        ? error
        : new ConfigError(errorMessage(error), filePath);
    console.warn(
      chalk.yellow(
        `Warning: Could not load suppression file ${configError.filePath}: ${configError.message}`
      )
    );
    return EMPTY;
  }
}

/**
 * Read and validate a suppression file
 *
 * @param filePath - Path to the suppression file
 * @throws ConfigError if the file is unreadable or malformed
 */
export function readSuppressionFile(filePath: string): SuppressionFile {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(errorMessage(error), filePath);
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Invalid JSON: ${errorMessage(error)}`, filePath);
  }

  return validateSuppressionFile(data, filePath);
}

/**
 * Validate suppression file structure
 *
 * An object without a "suppressions" key is accepted as empty.
 */
function validateSuppressionFile(data: unknown, filePath: string): SuppressionFile {
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new ConfigError('Suppression file must contain a JSON object', filePath);
  }

  if (!('suppressions' in data)) {
    return { suppressions: [] };
  }

  const entries = data.suppressions;
  if (!Array.isArray(entries)) {
    throw new ConfigError('"suppressions" must be an array', filePath);
  }

  const suppressions: string[] = [];
  entries.forEach((entry: unknown, index: number) => {
    if (typeof entry !== 'string') {
      throw new ConfigError(`suppressions[${index}]: Entry must be a string`, filePath);
    }
    suppressions.push(entry);
  });

  return { suppressions };
}
