/**
 * @fileoverview Tests for task types and validation
 */

import {
  DEFAULT_PRIORITY_CLASSES,
  PriorityClassSetSchema,
  Task,
  TaskInputListSchema,
  TaskInputSchema,
  TaskPriority,
  createTask,
  priorityLabel
} from './task';

describe('Task Types', () => {
  test('TaskPriority maps the reference classes to 1..3', () => {
    expect(TaskPriority.HIGH).toBe(1);
    expect(TaskPriority.MEDIUM).toBe(2);
    expect(TaskPriority.LOW).toBe(3);
  });

  test('priorityLabel resolves known classes and falls back to Unknown', () => {
    expect(priorityLabel(1)).toBe('High');
    expect(priorityLabel(2)).toBe('Medium');
    expect(priorityLabel(3)).toBe('Low');
    expect(priorityLabel(4)).toBe('Unknown');
    expect(priorityLabel(99)).toBe('Unknown');
  });

  test('DEFAULT_PRIORITY_CLASSES lists High, Medium and Low in order', () => {
    expect(DEFAULT_PRIORITY_CLASSES.map(c => c.level)).toEqual([1, 2, 3]);
    expect(DEFAULT_PRIORITY_CLASSES.map(c => c.label)).toEqual(['High', 'Medium', 'Low']);
  });
});

describe('Task', () => {
  test('should keep the given fields and generate an id', () => {
    const task = createTask('Fix login', 'Users cannot sign in', TaskPriority.HIGH);

    expect(task.name).toBe('Fix login');
    expect(task.description).toBe('Users cannot sign in');
    expect(task.priority).toBe(1);
    expect(task.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(task.createdAt).toBeInstanceOf(Date);
  });

  test('should accept an explicit id and creation time', () => {
    const createdAt = new Date('2024-03-01T10:00:00.000Z');
    const task = new Task({ id: 'task-1', name: 'a', description: 'b', priority: 2, createdAt });

    expect(task.id).toBe('task-1');
    expect(task.createdAt).toEqual(createdAt);
  });

  test('should construct with an unrecognised priority', () => {
    const task = createTask('Odd', 'no such class', 99);

    expect(task.priority).toBe(99);
    expect(task.label).toBe('Unknown');
  });

  test('should be frozen', () => {
    const task = createTask('Frozen', 'cannot change', 1);

    expect(Object.isFrozen(task)).toBe(true);
    expect(() => {
      Object.assign(task, { priority: 3 });
    }).toThrow(TypeError);
    expect(task.priority).toBe(1);
  });

  test('createdAt cannot be changed through the returned Date', () => {
    const task = new Task({ name: 'Stamp', description: '', priority: 1, createdAt: new Date('2024-03-01T10:00:00.000Z') });

    task.createdAt.setFullYear(1999);

    expect(task.createdAt.toISOString()).toBe('2024-03-01T10:00:00.000Z');
    expect(task.toJSON().createdAt).toBe('2024-03-01T10:00:00.000Z');
  });

  test('toString renders the label and description', () => {
    const task = createTask('Write docs', 'Document the new endpoints', 2);

    expect(task.toString()).toBe('Task: Write docs (Priority: Medium)\nDescription: Document the new endpoints');
  });

  test('toString uses Unknown for unrecognised priorities', () => {
    expect(createTask('x', 'y', 7).toString()).toBe('Task: x (Priority: Unknown)\nDescription: y');
  });

  test('toJSON serializes the creation time as ISO text', () => {
    const task = new Task({
      id: 'task-2',
      name: 'Serialize',
      description: 'as json',
      priority: 3,
      createdAt: new Date('2024-03-01T10:00:00.000Z')
    });

    expect(JSON.parse(JSON.stringify(task))).toEqual({
      id: 'task-2',
      name: 'Serialize',
      description: 'as json',
      priority: 3,
      createdAt: '2024-03-01T10:00:00.000Z'
    });
  });
});

describe('Task schemas', () => {
  test('TaskInputSchema defaults the description to an empty string', () => {
    const result = TaskInputSchema.safeParse({ name: 'Only name', priority: 1 });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data).toEqual({ name: 'Only name', description: '', priority: 1 });
    }
  });

  test('TaskInputSchema rejects an empty name and fractional priority', () => {
    expect(TaskInputSchema.safeParse({ name: '', priority: 1 }).success).toBe(false);
    expect(TaskInputSchema.safeParse({ name: 'n', priority: 1.5 }).success).toBe(false);
  });

  test('TaskInputListSchema accepts a bare array or a tasks wrapper', () => {
    const bare = TaskInputListSchema.parse([{ name: 'a', description: 'x', priority: 1 }]);
    const wrapped = TaskInputListSchema.parse({ tasks: [{ name: 'b', priority: 3 }] });

    expect(bare).toEqual([{ name: 'a', description: 'x', priority: 1 }]);
    expect(wrapped).toEqual([{ name: 'b', description: '', priority: 3 }]);
  });

  test('PriorityClassSetSchema rejects duplicates, empty sets and non-positive levels', () => {
    expect(PriorityClassSetSchema.safeParse([]).success).toBe(false);
    expect(PriorityClassSetSchema.safeParse([{ level: 0, label: 'Zero' }]).success).toBe(false);

    const duplicate = PriorityClassSetSchema.safeParse([
      { level: 1, label: 'High' },
      { level: 1, label: 'Also high' }
    ]);
    expect(duplicate.success).toBe(false);
    if (!duplicate.success) {
      expect(duplicate.error.errors[0]?.message).toBe('Duplicate priority level 1');
      expect(duplicate.error.errors[0]?.path).toEqual([1, 'level']);
    }
  });
});
