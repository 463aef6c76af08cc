/**
 * @fileoverview Walkthrough over tasks read from a JSON or YAML file
 */

import { Command } from 'commander';
import { BaseCommand, addCommonOptions, createContext, errorResult } from './base.js';
import { loadTaskFile } from '../lib/task-source.js';
import type { CommandResult, WalkthroughCommandOptions } from '../types/index.js';

export class RunCommand extends BaseCommand<[string, WalkthroughCommandOptions]> {
  async execute(file: string, options: WalkthroughCommandOptions): Promise<CommandResult> {
    try {
      const inputs = await loadTaskFile(file);
      this.context.logger.debug('Loaded task file', { file, count: inputs.length });
      return this.walkthrough(inputs, options.process);
    } catch (error) {
      return errorResult(error);
    }
  }
}

export function createRunCommand(): Command {
  const command = new Command('run')
    .description('Submit tasks from a JSON or YAML file, dispatch some and report the queues')
    .argument('<file>', 'Task list: an array of { name, description, priority } or { tasks: [...] }');

  return addCommonOptions(command).action(async (file: string, _options: WalkthroughCommandOptions, self: Command) => {
    const options = self.optsWithGlobals<WalkthroughCommandOptions>();
    const run = new RunCommand(createContext(options));
    run.outputResult(await run.execute(file, options));
  });
}
