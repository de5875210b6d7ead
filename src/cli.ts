#!/usr/bin/env node
/**
 * ui-parity CLI entry point.
 */

import chalk from 'chalk';
import { createProgram } from './cli/program.js';
import { errorMessage } from './core/logger.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(chalk.red('Error:'), errorMessage(error));
    process.exitCode = 1;
  });
