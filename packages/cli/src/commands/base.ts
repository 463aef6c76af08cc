/**
 * @fileoverview Base command class and common functionality
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { LogLevel, PriorityManager } from '@tierq/core';
import type { TaskInput } from '@tierq/core';
import { LoggerFactory, defaultLoggerConfig, loadDispatcherConfig } from '@tierq/shared';
import type { DispatcherConfig, Logger } from '@tierq/shared';
import { attachEventLogging, runWalkthrough } from '../lib/walkthrough.js';
import { OUTPUT_FORMATS } from '../types/index.js';
import type {
  CommandContext,
  CommandResult,
  OutputSink,
  ProcessCount,
  WalkthroughCommandOptions,
  WalkthroughSummary
} from '../types/index.js';
import { createResult, describeError, printError } from '../utils/index.js';

/**
 * Base command class
 */
export abstract class BaseCommand<TArgs extends unknown[]> {
  protected readonly context: CommandContext;

  constructor(context: CommandContext) {
    this.context = context;
  }

  /**
   * Execute the command
   */
  abstract execute(...args: TArgs): Promise<CommandResult>;

  /**
   * Report a failed result; successful output has already been written
   */
  outputResult(result: CommandResult): void {
    if (!result.success) {
      printError(result.error ?? 'Command failed');
      process.exitCode = 1;
      return;
    }

    result.warnings?.forEach(warning => {
      this.context.logger.warn(warning);
    });
  }

  /**
   * Build a manager from the loaded configuration
   */
  protected createManager(): PriorityManager {
    return new PriorityManager({
      classes: this.context.config.priorityClasses,
      previewLength: this.context.config.previewLength
    });
  }

  /**
   * Submit, report, dispatch and report again, logging manager events
   */
  protected walkthrough(inputs: readonly TaskInput[], processCount: ProcessCount | undefined): CommandResult<WalkthroughSummary> {
    const manager = this.createManager();
    const detach = attachEventLogging(manager, this.context.logger);

    try {
      const summary = runWalkthrough(manager, inputs, {
        processCount: processCount ?? this.context.config.processCount,
        format: this.context.outputFormat,
        colors: this.context.colors
      }, this.context.out);

      const warnings = summary.rejected > 0
        ? [`${summary.rejected} task(s) rejected for an unrecognized priority`]
        : undefined;
      return createResult(true, summary, undefined, warnings);
    } finally {
      detach();
    }
  }
}

/**
 * Parse the --process value: a non-negative integer or "all"
 */
export function parseProcessCount(value: string): ProcessCount {
  if (value === 'all') return 'all';

  const count = Number(value);
  if (!Number.isInteger(count) || count < 0 || value.trim() === '') {
    throw new InvalidArgumentError('Expected a non-negative integer or "all".');
  }
  return count;
}

function resolveLogLevel(config: DispatcherConfig, verbose: boolean): LogLevel {
  return verbose ? LogLevel.DEBUG : config.logLevel;
}

/**
 * Create command context from CLI options
 */
export function createContext(
  options: WalkthroughCommandOptions,
  overrides: { out?: OutputSink; logger?: Logger; env?: Record<string, string | undefined> } = {}
): CommandContext {
  const config = loadDispatcherConfig({
    ...(options.config ? { configFile: options.config } : {}),
    ...(overrides.env ? { env: overrides.env } : {})
  });

  const logger = overrides.logger ?? LoggerFactory.createDispatcherLogger({
    ...defaultLoggerConfig,
    level: resolveLogLevel(config, options.verbose ?? false),
    environment: config.environment,
    serviceVersion: config.version
  });

  return {
    config,
    logger,
    outputFormat: options.format ?? 'text',
    colors: (options.color ?? true) && process.stdout.isTTY === true,
    out: overrides.out ?? (text => console.log(text))
  };
}

/**
 * Add walkthrough options to command
 */
export function addCommonOptions(command: Command): Command {
  return command
    .option('-p, --process <count>', 'Number of tasks to dispatch, or "all"', parseProcessCount)
    .addOption(new Option('-f, --format <format>', 'Output format').choices(OUTPUT_FORMATS).default('text'))
    .option('--no-color', 'Disable colored output');
}

export function errorResult(error: unknown): CommandResult {
  return createResult(false, undefined, describeError(error));
}
