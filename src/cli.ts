#!/usr/bin/env node

/**
 * cvekit - CLI Entry Point
 */

import chalk from 'chalk';
import { createProgram } from './commands/index.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
    process.exitCode = 1;
  });
