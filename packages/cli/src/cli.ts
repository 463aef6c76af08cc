#!/usr/bin/env node

/**
 * Main CLI entry point for tierq
 */

import { Command } from 'commander';
import { createDemoCommand, createRunCommand } from './commands/index.js';
import { describeError, printError } from './utils/index.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('tierq')
    .description('tierq - strict-priority task dispatcher')
    .version('0.1.0')
    .option('-c, --config <file>', 'Dispatcher configuration file (JSON or YAML)')
    .option('-v, --verbose', 'Debug logging');

  program.addCommand(createDemoCommand());
  program.addCommand(createRunCommand());

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      printError(describeError(error));
      process.exitCode = 1;
    });
}
