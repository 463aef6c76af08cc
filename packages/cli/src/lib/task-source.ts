/**
 * @fileoverview Reads task lists from JSON or YAML files
 */

import { readFile } from 'fs/promises';
import { join } from 'path';
import { parse as parseYaml } from 'yaml';
import { ErrorSeverity, TaskError, TaskInputListSchema, ValidationUtils } from '@tierq/core';
import type { TaskInput } from '@tierq/core';
import { formatOf } from '@tierq/shared';
import { describeError } from '../utils/index.js';

/**
 * Bundled demonstration tasks
 */
export const SAMPLE_TASKS_PATH = join(__dirname, '..', '..', 'data', 'sample-tasks.json');

/**
 * Parse a task list already read into memory
 */
export function parseTaskList(content: string, format: 'json' | 'yaml', source: string): TaskInput[] {
  let data: unknown;
  try {
    data = format === 'json' ? JSON.parse(content) : parseYaml(content);
  } catch (error) {
    throw new TaskError(
      'TASK_FILE_INVALID',
      `Cannot parse ${source} as ${format.toUpperCase()}: ${describeError(error)}`,
      ErrorSeverity.MEDIUM,
      false,
      { source }
    );
  }

  return ValidationUtils.parseOrThrow(TaskInputListSchema, data, 'tasks');
}

/**
 * Load a task list; the format follows the file extension
 */
export async function loadTaskFile(filePath: string): Promise<TaskInput[]> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new TaskError(
      'TASK_FILE_UNREADABLE',
      `Cannot read task file ${filePath}: ${describeError(error)}`,
      ErrorSeverity.MEDIUM,
      false,
      { filePath }
    );
  }

  return parseTaskList(content, formatOf(filePath), filePath);
}
