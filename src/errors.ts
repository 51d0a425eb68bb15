/**
 * Error types raised while linting
 *
 * ConfigError and FileAccessError are recovered where they occur and only
 * logged. UsageError aborts the run before anything is scanned.
 */

/**
 * Suppression file exists but cannot be read or has the wrong shape
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly filePath: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * A header file cannot be read or is not valid UTF-8
 */
export class FileAccessError extends Error {
  constructor(
    message: string,
    public readonly filePath: string
  ) {
    super(message);
    this.name = 'FileAccessError';
  }
}

/**
 * Bad command line input, such as a missing scan directory
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Extracts a printable message from any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
