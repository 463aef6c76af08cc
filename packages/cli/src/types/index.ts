/**
 * @fileoverview CLI types and interfaces
 */

import type { DispatcherConfig, Logger } from '@tierq/shared';

/**
 * Output format options
 */
export type OutputFormat = 'json' | 'yaml' | 'table' | 'text';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'yaml', 'table', 'text'];

/**
 * How many tasks a walkthrough dispatches
 */
export type ProcessCount = number | 'all';

/**
 * Receives rendered output, one block at a time
 */
export type OutputSink = (text: string) => void;

/**
 * Options shared by every command
 */
export type GlobalOptions = {
  readonly config?: string;
  readonly verbose?: boolean;
};

/**
 * Options of the demo and run commands
 */
export type WalkthroughCommandOptions = GlobalOptions & {
  readonly process?: ProcessCount;
  readonly format?: OutputFormat;
  readonly color?: boolean;
};

/**
 * Command context
 */
export interface CommandContext {
  readonly config: DispatcherConfig;
  readonly logger: Logger;
  readonly outputFormat: OutputFormat;
  readonly colors: boolean;
  readonly out: OutputSink;
}

/**
 * CLI command result
 */
export interface CommandResult<T = unknown> {
  readonly success: boolean;
  readonly data?: T;
  readonly error?: string;
  readonly warnings?: string[];
  readonly metadata?: Record<string, unknown>;
}

export interface WalkthroughOptions {
  readonly processCount: ProcessCount;
  readonly format: OutputFormat;
  readonly colors?: boolean;
}

/**
 * What a walkthrough did
 */
export interface WalkthroughSummary {
  readonly accepted: number;
  readonly rejected: number;
  readonly dispatched: readonly string[];
  readonly remaining: number;
}
