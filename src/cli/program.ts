/**
 * Command line interface for uproperty-guid-lint
 */

import * as fs from 'fs';
import chalk from 'chalk';
import { Command, CommanderError, Option } from 'commander';
import { Analyzer } from '../analyzer.js';
import { UsageError, errorMessage } from '../errors.js';
import { TOOL_NAME, TOOL_VERSION, renderReport, writeReport, type ReportFormat } from '../reporter.js';
import { createDefaultSuppressionFile, loadSuppressions } from '../suppressions/index.js';

export interface CliOptions {
  recursive: boolean;
  suppressionFile?: string;
  createSuppressionFile?: string;
  output?: string;
  failOnInvalid: boolean;
  format: ReportFormat;
  checkDeadSuppressions: boolean;
}

/**
 * Build the commander program. Parsing and exit codes are left to the caller.
 */
export function createProgram(): Command {
  return new Command()
    .name(TOOL_NAME)
    .description('Validate UPROPERTY FGuid initialization patterns in C++ headers')
    .version(TOOL_VERSION)
    .argument('[directory]', 'Directory to scan for header files')
    .option('-r, --recursive', 'Scan directory recursively (default: true)', true)
    .option('--no-recursive', 'Only scan header files directly inside the directory')
    .option('-s, --suppression-file <path>', 'Path to suppression file (JSON format)')
    .option('--create-suppression-file <path>', 'Create a default suppression file at the specified path')
    .option('-o, --output <path>', 'Output file for the report (default: stdout)')
    .option('--fail-on-invalid', 'Exit with non-zero code if invalid properties are found', false)
    .addOption(
      new Option('--format <format>', 'Report format')
        .choices(['text', 'json'])
        .default('text')
    )
    .option('--check-dead-suppressions', 'Report suppression keys that matched no property', false);
}

/**
 * Ensure the scan root is an existing directory
 *
 * @throws UsageError otherwise
 */
export function validateDirectory(directory: string | undefined): string {
  if (!directory) {
    throw new UsageError('Missing required argument: directory');
  }

  let stats: fs.Stats;
  try {
    stats = fs.statSync(directory);
  } catch {
    throw new UsageError(`Directory '${directory}' does not exist`);
  }

  if (!stats.isDirectory()) {
    throw new UsageError(`'${directory}' is not a directory`);
  }

  return directory;
}

/**
 * Main execution
 *
 * @returns Process exit code
 */
export async function run(directory: string | undefined, options: CliOptions): Promise<number> {
  // Create suppression file if requested
  if (options.createSuppressionFile) {
    await createDefaultSuppressionFile(options.createSuppressionFile);
    console.log(chalk.green(`Created default suppression file: ${options.createSuppressionFile}`));
    return 0;
  }

  let rootDir: string;
  try {
    rootDir = validateDirectory(directory);
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(chalk.red(`Error: ${error.message}`));
      return 1;
    }
    throw error;
  }

  const suppressions = loadSuppressions(options.suppressionFile);
  const analyzer = new Analyzer({
    rootDir,
    recursive: options.recursive,
    suppressions,
  });

  const results = await analyzer.analyze();

  const { report, allValid } = renderReport(
    results,
    options.format,
    options.checkDeadSuppressions ? { deadSuppressions: analyzer.detectDeadSuppressions() } : {}
  );

  if (options.output) {
    writeReport(options.output, report);
    console.log(chalk.gray(`Report written to: ${options.output}`));
  } else {
    console.log(report);
  }

  if (options.failOnInvalid && !allValid) {
    return 1;
  }

  return 0;
}

/**
 * Parse arguments and run
 *
 * @param argv - Arguments without the node executable and script path
 * @returns Process exit code
 */
export async function runCli(argv: string[]): Promise<number> {
  let exitCode = 0;

  const program = createProgram()
    .exitOverride()
    .action(async (directory: string | undefined, options: CliOptions) => {
      exitCode = await run(directory, options);
    });

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      // --help and --version report exit code 0, parse errors 1
      return error.exitCode === 0 ? 0 : 1;
    }
    console.error(chalk.red(`Error: ${errorMessage(error)}`));
    return 1;
  }

  return exitCode;
}
