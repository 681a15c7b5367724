#!/usr/bin/env node

import chalk from 'chalk';
import { createProgram } from './program.js';

createProgram()
  .parseAsync()
  .catch((error: unknown) => {
    console.error(chalk.red('Command failed'));
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
