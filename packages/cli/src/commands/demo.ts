/**
 * @fileoverview Demo walkthrough over the bundled sample tasks
 */

import { Command } from 'commander';
import { BaseCommand, addCommonOptions, createContext, errorResult } from './base.js';
import { SAMPLE_TASKS_PATH, loadTaskFile } from '../lib/task-source.js';
import type { CommandContext, CommandResult, WalkthroughCommandOptions } from '../types/index.js';

export class DemoCommand extends BaseCommand<[WalkthroughCommandOptions]> {
  constructor(context: CommandContext, private readonly samplePath: string = SAMPLE_TASKS_PATH) {
    super(context);
  }

  async execute(options: WalkthroughCommandOptions): Promise<CommandResult> {
    try {
      const inputs = await loadTaskFile(this.samplePath);
      return this.walkthrough(inputs, options.process);
    } catch (error) {
      return errorResult(error);
    }
  }
}

export function createDemoCommand(): Command {
  const command = new Command('demo')
    .description('Submit the bundled sample tasks, dispatch some and report the queues');

  return addCommonOptions(command).action(async (_options: WalkthroughCommandOptions, self: Command) => {
    const options = self.optsWithGlobals<WalkthroughCommandOptions>();
    const demo = new DemoCommand(createContext(options));
    demo.outputResult(await demo.execute(options));
  });
}
