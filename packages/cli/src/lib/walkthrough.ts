/**
 * @fileoverview Submit a batch of tasks, report, dispatch some, report again
 */

import type { PriorityManager, TaskInput } from '@tierq/core';
import type { Logger } from '@tierq/shared';
import type { OutputSink, WalkthroughOptions, WalkthroughSummary } from '../types/index.js';
import { TASK_SEPARATOR, createPalette, renderListing, renderStatistics } from '../utils/index.js';

/**
 * Mirror manager events into the log. Returns a function that detaches them.
 */
export function attachEventLogging(manager: PriorityManager, logger: Logger): () => void {
  const detachers = [
    manager.on('task.submitted', (task, message) => {
      logger.debug(message, { taskId: task.id, taskName: task.name, priority: task.priority });
    }),
    manager.on('task.rejected', (error, task) => {
      logger.warn(error, 'Task rejected', { taskId: task.id, taskName: task.name, priority: task.priority });
    }),
    manager.on('task.dispatched', task => {
      logger.debug('Task dispatched', { taskId: task.id, taskName: task.name, priority: task.priority });
    }),
    manager.on('queue.empty', operation => {
      logger.info('No pending tasks', { operation });
    })
  ];

  return () => {
    detachers.forEach(detach => detach());
  };
}

export function runWalkthrough(
  manager: PriorityManager,
  inputs: readonly TaskInput[],
  options: WalkthroughOptions,
  out: OutputSink
): WalkthroughSummary {
  const palette = createPalette(options.colors ?? false);
  const labelFor = (priority: number): string => manager.labelFor(priority);
  let accepted = 0;
  let rejected = 0;

  out(palette.bold('Submitting tasks...'));
  out('');
  for (const input of inputs) {
    const result = manager.submitTask(input.name, input.description, input.priority);
    if (result.success) {
      accepted++;
      out(result.message);
    } else {
      rejected++;
      out(palette.red(result.message));
    }
  }

  out('');
  out(palette.bold('Statistics:'));
  out(renderStatistics(manager.statistics(), labelFor, options.format));
  out('');
  out(renderListing(manager.listAll(), options.format));

  out('');
  out(palette.bold('Processing tasks by priority:'));
  const dispatched = dispatch(manager, options, out);

  out('');
  out(palette.bold('Updated statistics:'));
  out(renderStatistics(manager.statistics(), labelFor, options.format, 'Total tasks remaining'));
  out('');
  out(renderListing(manager.listAll(), options.format));

  return { accepted, rejected, dispatched, remaining: manager.size() };
}

function dispatch(manager: PriorityManager, options: WalkthroughOptions, out: OutputSink): string[] {
  const dispatched: string[] = [];

  if (options.processCount === 'all') {
    while (!manager.isEmpty()) {
      const task = manager.next();
      if (!task) break;
      printDispatched(task.toString(), out);
      dispatched.push(task.name);
    }
    return dispatched;
  }

  for (let i = 0; i < options.processCount; i++) {
    const task = manager.next();
    if (!task) {
      out('');
      out('No pending tasks');
      break;
    }
    printDispatched(task.toString(), out);
    dispatched.push(task.name);
  }
  return dispatched;
}

function printDispatched(rendering: string, out: OutputSink): void {
  out('');
  out(`Executing: ${rendering}`);
  out(TASK_SEPARATOR);
}
