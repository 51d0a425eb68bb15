#!/usr/bin/env node

/**
 * CLI Entry Point - UPROPERTY FGuid initialization validator
 */

import chalk from 'chalk';
import { runCli } from './cli/program.js';

runCli(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    console.error(chalk.red('\nUnexpected error:'));
    console.error(error);
    process.exitCode = 1;
  });
