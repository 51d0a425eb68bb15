/**
 * Header Analyzer - walks a directory of C++ headers and validates
 * UPROPERTY FGuid initialization in each of them
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import chalk from 'chalk';
import { glob } from 'glob';
import { classifyProperties } from './analyzers/classifier.js';
import { PropertyScanner } from './analyzers/property-scanner.js';
import { resolveStructName } from './analyzers/scope-resolver.js';
import { FileAccessError, errorMessage } from './errors.js';
import { HEADER_EXTENSION } from './rules.js';
import { detectDeadSuppressions } from './suppressions/dead-suppression-detector.js';
import type { DeadSuppression } from './suppressions/types.js';
import type {
  AnalyzerConfig,
  AnalyzerStats,
  FileValidationResult,
  GuidProperty,
} from './types.js';

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Runs scanner, scope resolver and classifier over one file's content
 *
 * @param file - Path reported for the file and used in suppression keys
 * @param content - Full file text
 * @param suppressions - Suppression keys for the run
 */
export function validateContent(
  file: string,
  content: string,
  suppressions: ReadonlySet<string>
): FileValidationResult {
  const scanner = new PropertyScanner(content);

  const properties: GuidProperty[] = scanner.scan().map(detected => ({
    ...detected,
    file,
    structName: resolveStructName(scanner.lines, detected.line - 1),
  }));

  return classifyProperties(file, properties, suppressions);
}

/**
 * Reads a file as strict UTF-8, closing the handle on every path
 *
 * @throws FileAccessError if the file cannot be opened, read or decoded
 */
export async function readHeaderFile(filePath: string): Promise<string> {
  let handle: fs.FileHandle | undefined;
  try {
    handle = await fs.open(filePath, 'r');
    const bytes = await handle.readFile();
    return utf8.decode(bytes);
  } catch (error) {
    throw new FileAccessError(errorMessage(error), filePath);
  } finally {
    await handle?.close();
  }
}

/**
 * Converts a platform path to "/"-separated form
 */
function toPosixPath(filePath: string): string {
  return filePath.split(path.sep).join('/');
}

/**
 * Main analyzer that coordinates the validation process
 */
export class Analyzer {
  private rootDir: string;
  private recursive: boolean;
  private suppressions: ReadonlySet<string>;
  private matchedKeys = new Set<string>();
  private stats: AnalyzerStats = {
    filesScanned: 0,
    filesSkipped: 0,
    filesWithProperties: 0,
  };

  constructor(config: AnalyzerConfig) {
    this.rootDir = config.rootDir;
    this.recursive = config.recursive ?? true;
    this.suppressions = config.suppressions ?? new Set<string>();
  }

  /**
   * Lists header files under the root directory, sorted so that report
   * order does not depend on the file system
   */
  async findHeaderFiles(): Promise<string[]> {
    const pattern = this.recursive ? `**/*${HEADER_EXTENSION}` : `*${HEADER_EXTENSION}`;

    const relativePaths = await glob(pattern, {
      cwd: this.rootDir,
      nodir: true,
      dot: true,
      posix: true,
    });

    const root = toPosixPath(this.rootDir);
    return relativePaths
      .map(relativePath => path.posix.join(root, relativePath))
      .sort();
  }

  /**
   * Analyzes all header files and returns results for files that contain
   * at least one UPROPERTY FGuid member
   */
  async analyze(): Promise<FileValidationResult[]> {
    this.matchedKeys.clear();
    this.stats = { filesScanned: 0, filesSkipped: 0, filesWithProperties: 0 };

    const results: FileValidationResult[] = [];

    for (const file of await this.findHeaderFiles()) {
      const result = await this.analyzeFile(file);
      if (result && result.found.length > 0) {
        results.push(result);
      }
    }

    this.stats.filesWithProperties = results.length;
    return results;
  }

  /**
   * Validates a single header file
   *
   * @returns null if the file could not be read
   */
  async analyzeFile(file: string): Promise<FileValidationResult | null> {
    let content: string;
    try {
      content = await readHeaderFile(file);
    } catch (error) {
      this.stats.filesSkipped++;
      console.warn(chalk.yellow(`Warning: Could not read file ${file}: ${errorMessage(error)}`));
      return null;
    }

    this.stats.filesScanned++;
    const result = validateContent(file, content, this.suppressions);

    for (const { classification } of result.suppressed) {
      this.matchedKeys.add(classification.matchedKey);
    }

    return result;
  }

  /**
   * Suppression keys that matched no property in the last run
   */
  detectDeadSuppressions(): DeadSuppression[] {
    return detectDeadSuppressions(this.suppressions, this.matchedKeys);
  }

  getStats(): AnalyzerStats {
    return { ...this.stats };
  }
}
