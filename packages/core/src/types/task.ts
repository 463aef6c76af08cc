/**
 * @fileoverview Task system types for tierq
 */

import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';

/**
 * Reference priority classes. Lower values are served first.
 */
export enum TaskPriority {
  HIGH = 1,
  MEDIUM = 2,
  LOW = 3
}

/**
 * Label used when a priority has no configured name
 */
export const UNKNOWN_PRIORITY_LABEL = 'Unknown';

/**
 * Display labels of the reference priority classes
 */
export const PRIORITY_LABELS: Readonly<Record<number, string>> = {
  [TaskPriority.HIGH]: 'High',
  [TaskPriority.MEDIUM]: 'Medium',
  [TaskPriority.LOW]: 'Low'
};

/**
 * Resolve the reference label of a priority class
 */
export function priorityLabel(priority: number): string {
  return PRIORITY_LABELS[priority] ?? UNKNOWN_PRIORITY_LABEL;
}

/**
 * A recognised priority class and its display label
 */
export interface PriorityClassDefinition {
  readonly level: number;
  readonly label: string;
}

export const DEFAULT_PRIORITY_CLASSES: readonly PriorityClassDefinition[] = [
  { level: TaskPriority.HIGH, label: 'High' },
  { level: TaskPriority.MEDIUM, label: 'Medium' },
  { level: TaskPriority.LOW, label: 'Low' }
];

/**
 * Task construction input
 */
export interface TaskInit {
  readonly name: string;
  readonly description: string;
  readonly priority: number;
  readonly id?: string;
  readonly createdAt?: Date;
}

/**
 * Serialized task
 */
export interface TaskJSON {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly priority: number;
  readonly createdAt: string;
}

/**
 * Immutable unit of work. The priority is not checked here; the manager
 * decides whether the class is recognised.
 */
export class Task {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly priority: number;
  private readonly createdAtMs: number;

  constructor(init: TaskInit) {
    this.id = init.id ?? uuidv4();
    this.name = init.name;
    this.description = init.description;
    this.priority = init.priority;
    this.createdAtMs = (init.createdAt ?? new Date()).getTime();
    Object.freeze(this);
  }

  /**
   * Creation time; each read returns a fresh Date
   */
  get createdAt(): Date {
    return new Date(this.createdAtMs);
  }

  get label(): string {
    return priorityLabel(this.priority);
  }

  toString(): string {
    return `Task: ${this.name} (Priority: ${this.label})\nDescription: ${this.description}`;
  }

  toJSON(): TaskJSON {
    return {
      id: this.id,
      name: this.name,
      description: this.description,
      priority: this.priority,
      createdAt: this.createdAt.toISOString()
    };
  }
}

export function createTask(name: string, description: string, priority: number): Task {
  return new Task({ name, description, priority });
}

/**
 * Zod schemas for runtime validation
 */
export const TaskPrioritySchema = z.number().int();

export const PriorityClassSchema = z.object({
  level: z.number().int().positive(),
  label: z.string().min(1)
});

export const PriorityClassSetSchema = z
  .array(PriorityClassSchema)
  .min(1)
  .superRefine((classes, ctx) => {
    const seen = new Set<number>();
    classes.forEach((definition, index) => {
      if (seen.has(definition.level)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate priority level ${definition.level}`,
          path: [index, 'level']
        });
      }
      seen.add(definition.level);
    });
  });

/**
 * Task input as read from task files
 */
export const TaskInputSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  priority: TaskPrioritySchema
});

export type TaskInput = z.infer<typeof TaskInputSchema>;

/**
 * A bare array of tasks, or an object holding one under `tasks`
 */
export const TaskInputListSchema = z.preprocess(
  (value: unknown) =>
    typeof value === 'object' && value !== null && !Array.isArray(value) && 'tasks' in value
      ? value.tasks
      : value,
  z.array(TaskInputSchema)
);
