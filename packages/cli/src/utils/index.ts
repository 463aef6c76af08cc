/**
 * @fileoverview CLI utility functions
 */

import chalk from 'chalk';
import boxen from 'boxen';
import { table } from 'table';
import type { TableUserConfig } from 'table';
import { stringify as stringifyYaml } from 'yaml';
import type { ManagerStatistics, TaskListing } from '@tierq/core';
import type { CommandResult, OutputFormat } from '../types/index.js';

const TABLE_CONFIG: TableUserConfig = {
  border: {
    topBody: `─`,
    topJoin: `┬`,
    topLeft: `┌`,
    topRight: `┐`,
    bottomBody: `─`,
    bottomJoin: `┴`,
    bottomLeft: `└`,
    bottomRight: `┘`,
    bodyLeft: `│`,
    bodyRight: `│`,
    bodyJoin: `│`,
    joinBody: `─`,
    joinLeft: `├`,
    joinRight: `┤`,
    joinJoin: `┼`
  }
};

export const LISTING_TITLE = '===== TASK LIST =====';
export const TASK_SEPARATOR = '-'.repeat(40);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function cell(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/**
 * Chalk instance with colours forced on or off
 */
export function createPalette(colors: boolean): chalk.Chalk {
  return new chalk.Instance({ level: colors ? 1 : 0 });
}

/**
 * Format output based on specified format
 */
export function formatOutput(data: unknown, format: OutputFormat): string {
  switch (format) {
    case 'json':
      return JSON.stringify(data, null, 2);

    case 'yaml':
      return stringifyYaml(data).trimEnd();

    case 'table':
      return formatAsTable(data);

    case 'text':
      return formatAsText(data);
  }
}

function formatAsTable(data: unknown): string {
  if (Array.isArray(data)) {
    const [first] = data;
    if (!isRecord(first)) return 'No data available';

    const headers = Object.keys(first);
    const rows = data.map(item => headers.map(header => cell(isRecord(item) ? item[header] : undefined)));
    return table([headers, ...rows], TABLE_CONFIG).trimEnd();
  }

  if (isRecord(data)) {
    const rows = Object.entries(data).map(([key, value]) => [key, cell(value)]);
    return table([['Property', 'Value'], ...rows], TABLE_CONFIG).trimEnd();
  }

  return cell(data);
}

function formatAsText(data: unknown): string {
  if (Array.isArray(data)) {
    return data.map((item, index) => {
      if (isRecord(item)) {
        const lines = Object.entries(item).map(([key, value]) => `  ${key}: ${cell(value)}`);
        return `${index + 1}.\n${lines.join('\n')}`;
      }
      return `${index + 1}. ${cell(item)}`;
    }).join('\n\n');
  }

  if (isRecord(data)) {
    return Object.entries(data)
      .map(([key, value]) => `${key}: ${cell(value)}`)
      .join('\n');
  }

  return cell(data);
}

/**
 * Render dispatcher statistics. Text output lists one line per class.
 */
export function renderStatistics(
  stats: ManagerStatistics,
  labelFor: (priority: number) => string,
  format: OutputFormat,
  totalCaption = 'Total tasks'
): string {
  const classes = Object.entries(stats.perClass)
    .map(([priority, count]) => ({ priority: Number(priority), count }))
    .sort((a, b) => a.priority - b.priority);

  switch (format) {
    case 'text':
      return [
        `${totalCaption}: ${stats.total}`,
        ...classes.map(({ priority, count }) => `Priority ${labelFor(priority)}: ${count} tasks`)
      ].join('\n');

    case 'table':
      return table([
        ['Priority', 'Label', 'Tasks'],
        ...classes.map(({ priority, count }) => [String(priority), labelFor(priority), String(count)]),
        ['', 'Total', String(stats.total)]
      ], TABLE_CONFIG).trimEnd();

    default:
      return formatOutput({
        total: stats.total,
        perClass: classes.map(({ priority, count }) => ({ priority, label: labelFor(priority), count }))
      }, format);
  }
}

/**
 * Render the grouped task listing
 */
export function renderListing(listing: TaskListing, format: OutputFormat): string {
  switch (format) {
    case 'text': {
      const lines = [LISTING_TITLE];

      for (const group of listing.classes) {
        lines.push('', `--- Priority ${group.label.toUpperCase()} (${group.count} tasks) ---`);
        if (group.tasks.length === 0) {
          lines.push('No tasks in this class');
          continue;
        }
        for (const task of group.tasks) {
          lines.push(`${task.index}. ${task.name} - ${task.preview}`);
        }
      }

      lines.push('', `Total: ${listing.total} tasks`, '='.repeat(LISTING_TITLE.length));
      return lines.join('\n');
    }

    case 'table': {
      const rows = listing.classes.flatMap(group =>
        group.tasks.map(task => [group.label, String(task.index), task.name, task.preview])
      );
      return table([['Priority', '#', 'Name', 'Description'], ...rows], TABLE_CONFIG).trimEnd();
    }

    default:
      return formatOutput(listing, format);
  }
}

/**
 * Print error message
 */
export function printError(message: string, details?: string): void {
  const content = details ? `${message}\n\n${details}` : message;
  console.error(boxen(chalk.red(content), {
    padding: 1,
    margin: 1,
    borderColor: 'red'
  }));
}

/**
 * Create a command result
 */
export function createResult<T>(
  success: boolean,
  data?: T,
  error?: string,
  warnings?: string[]
): CommandResult<T> {
  return {
    success,
    ...(data !== undefined ? { data } : {}),
    ...(error !== undefined ? { error } : {}),
    ...(warnings !== undefined ? { warnings } : {}),
    metadata: {
      timestamp: new Date().toISOString(),
      command: process.argv.slice(2).join(' ')
    }
  };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
