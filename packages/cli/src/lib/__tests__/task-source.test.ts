/**
 * @fileoverview Tests for task file loading
 */

import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { TaskError, ValidationError } from '@tierq/core';
import { SAMPLE_TASKS_PATH, loadTaskFile, parseTaskList } from '../task-source';

describe('parseTaskList', () => {
  it('should read a JSON array', () => {
    expect(parseTaskList('[{"name":"A","description":"x","priority":1}]', 'json', 'inline')).toEqual([
      { name: 'A', description: 'x', priority: 1 }
    ]);
  });

  it('should read a YAML tasks wrapper and default descriptions', () => {
    const content = 'tasks:\n  - name: A\n    priority: 2\n  - name: B\n    description: later\n    priority: 3\n';

    expect(parseTaskList(content, 'yaml', 'inline')).toEqual([
      { name: 'A', description: '', priority: 2 },
      { name: 'B', description: 'later', priority: 3 }
    ]);
  });

  it('should raise TaskError for malformed JSON', () => {
    expect.assertions(2);
    try {
      parseTaskList('{oops', 'json', 'broken.json');
    } catch (error) {
      expect(error).toBeInstanceOf(TaskError);
      if (error instanceof TaskError) {
        expect(error.code).toBe('TASK_FILE_INVALID');
      }
    }
  });

  it('should raise ValidationError naming the failing entry', () => {
    expect(() => parseTaskList('[{"name":"","priority":1}]', 'json', 'inline')).toThrow(
      new ValidationError('tasks.0.name', null, 'String must contain at least 1 character(s)')
    );
  });
});

describe('loadTaskFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'tierq-tasks-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should pick the format from the extension', async () => {
    const yamlFile = join(dir, 'tasks.yml');
    writeFileSync(yamlFile, '- name: A\n  priority: 1\n');

    await expect(loadTaskFile(yamlFile)).resolves.toEqual([{ name: 'A', description: '', priority: 1 }]);
  });

  it('should report unreadable files', async () => {
    await expect(loadTaskFile(join(dir, 'missing.json'))).rejects.toMatchObject({ code: 'TASK_FILE_UNREADABLE' });
  });

  it('should load the bundled sample tasks', async () => {
    const tasks = await loadTaskFile(SAMPLE_TASKS_PATH);

    expect(tasks).toHaveLength(9);
    expect(tasks[0]).toEqual({
      name: 'Patch session timeout',
      description: 'Sessions expire immediately after login for users on the mobile app',
      priority: 1
    });
  });
});
