/**
 * @fileoverview Tests for the demo and run commands
 */

import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { InvalidArgumentError } from 'commander';
import { LogLevel } from '@tierq/core';
import { Logger } from '@tierq/shared';
import { createProgram } from '../../cli';
import { createContext, parseProcessCount } from '../base';
import { DemoCommand } from '../demo';
import { RunCommand } from '../run';
import type { CommandContext, WalkthroughCommandOptions } from '../../types/index';

function quietLogger(): Logger {
  return new Logger({
    level: LogLevel.ERROR,
    environment: 'test',
    serviceName: 'tierq-test',
    serviceVersion: '0.0.0',
    stream: { write: () => undefined }
  });
}

function testContext(options: WalkthroughCommandOptions, blocks: string[]): CommandContext {
  return createContext({ color: false, ...options }, {
    env: {},
    logger: quietLogger(),
    out: text => blocks.push(text)
  });
}

describe('parseProcessCount', () => {
  it('should accept integers and all', () => {
    expect(parseProcessCount('3')).toBe(3);
    expect(parseProcessCount('0')).toBe(0);
    expect(parseProcessCount('all')).toBe('all');
  });

  it('should reject anything else', () => {
    expect(() => parseProcessCount('-1')).toThrow(InvalidArgumentError);
    expect(() => parseProcessCount('1.5')).toThrow(InvalidArgumentError);
    expect(() => parseProcessCount('many')).toThrow(InvalidArgumentError);
    expect(() => parseProcessCount('')).toThrow(InvalidArgumentError);
  });
});

describe('createContext', () => {
  it('should use configuration defaults', () => {
    const context = testContext({}, []);

    expect(context.outputFormat).toBe('text');
    expect(context.colors).toBe(false);
    expect(context.config.processCount).toBe(5);
    expect(context.config.priorityClasses.map(c => c.level)).toEqual([1, 2, 3]);
  });

  it('should read classes from the environment', () => {
    const context = createContext({}, {
      env: { TIERQ_PRIORITY_CLASSES: '10:Interactive,20:Batch', TIERQ_PROCESS_COUNT: '1' },
      logger: quietLogger(),
      out: () => undefined
    });

    expect(context.config.priorityClasses).toEqual([
      { level: 10, label: 'Interactive' },
      { level: 20, label: 'Batch' }
    ]);
    expect(context.config.processCount).toBe(1);
  });
});

describe('DemoCommand', () => {
  it('should dispatch the five most urgent sample tasks', async () => {
    const blocks: string[] = [];
    const demo = new DemoCommand(testContext({}, blocks));

    const result = await demo.execute({});

    expect(result.success).toBe(true);
    expect(result.data).toEqual({
      accepted: 8,
      rejected: 1,
      dispatched: [
        'Patch session timeout',
        'Speed up nightly report',
        'Audit token storage',
        'Write release notes',
        'Review open merge requests'
      ],
      remaining: 3
    });
    expect(result.warnings).toEqual(['1 task(s) rejected for an unrecognized priority']);
    expect(blocks).toContain("Invalid priority (4) for task 'Plan team offsite'; recognized classes: 1, 2, 3");
    expect(blocks).toContain('Total tasks: 8\nPriority High: 3 tasks\nPriority Medium: 3 tasks\nPriority Low: 2 tasks');
  });

  it('should honour --process', async () => {
    const blocks: string[] = [];
    const demo = new DemoCommand(testContext({}, blocks));

    const result = await demo.execute({ process: 'all' });

    expect(result.data).toMatchObject({ remaining: 0 });
  });

  it('should fail when the sample file is missing', async () => {
    const demo = new DemoCommand(testContext({}, []), join(tmpdir(), 'tierq-no-such-file.json'));

    const result = await demo.execute({});

    expect(result.success).toBe(false);
    expect(result.error).toMatch(/^Cannot read task file /);
  });
});

describe('RunCommand', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'tierq-run-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    process.exitCode = undefined;
  });

  it('should walk through tasks from a YAML file', async () => {
    const file = join(dir, 'tasks.yaml');
    writeFileSync(file, 'tasks:\n  - name: Later\n    priority: 3\n  - name: Now\n    priority: 1\n');
    const blocks: string[] = [];
    const run = new RunCommand(testContext({}, blocks));

    const result = await run.execute(file, { process: 1 });

    expect(result.data).toEqual({ accepted: 2, rejected: 0, dispatched: ['Now'], remaining: 1 });
    expect(result.warnings).toBeUndefined();
    expect(blocks).toContain('Executing: Task: Now (Priority: High)\nDescription: ');
  });

  it('should report invalid files through outputResult', async () => {
    const file = join(dir, 'tasks.json');
    writeFileSync(file, '[{"name": "", "priority": 1}]');
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const run = new RunCommand(testContext({}, []));

    const result = await run.execute(file, {});
    run.outputResult(result);

    expect(result.success).toBe(false);
    expect(result.error).toBe("Validation failed for field 'tasks.0.name': String must contain at least 1 character(s)");
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(process.exitCode).toBe(1);
    errorSpy.mockRestore();
  });
});

describe('createProgram', () => {
  it('should register demo and run with global options', () => {
    const program = createProgram();

    expect(program.name()).toBe('tierq');
    expect(program.commands.map(command => command.name())).toEqual(['demo', 'run']);
    expect(program.options.map(option => option.long)).toEqual(['--version', '--config', '--verbose']);
  });
});
