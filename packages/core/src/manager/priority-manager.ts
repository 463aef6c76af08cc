/**
 * @fileoverview Strict-priority dispatcher over one FIFO queue per priority class
 */

import { EventEmitter2 } from 'eventemitter2';
import { z } from 'zod';
import { ClassQueue } from '../queue/class-queue.js';
import {
  DEFAULT_PRIORITY_CLASSES,
  PriorityClassSetSchema,
  Task,
  priorityLabel
} from '../types/task.js';
import type { PriorityClassDefinition } from '../types/task.js';
import { InvalidPriorityClassError } from '../types/errors.js';
import { ValidationUtils } from '../validation/schemas.js';
import { DEFAULT_PREVIEW_LENGTH, previewText } from '../utils/preview.js';

/**
 * Manager construction options
 */
export interface PriorityManagerOptions {
  readonly classes?: readonly PriorityClassDefinition[];
  readonly previewLength?: number;
}

export const PriorityManagerOptionsSchema = z.object({
  classes: PriorityClassSetSchema.default(() => DEFAULT_PRIORITY_CLASSES.map(definition => ({ ...definition }))),
  previewLength: z.number().int().positive().default(DEFAULT_PREVIEW_LENGTH)
});

/**
 * Outcome of a submission
 */
export type SubmitResult =
  | { readonly success: true; readonly task: Task; readonly message: string }
  | { readonly success: false; readonly error: InvalidPriorityClassError; readonly message: string };

/**
 * Aggregate counts, always computed from the live queues
 */
export interface ManagerStatistics {
  readonly total: number;
  readonly perClass: Readonly<Record<number, number>>;
}

export interface TaskListingEntry {
  readonly index: number;
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly preview: string;
}

export interface ClassListing {
  readonly priority: number;
  readonly label: string;
  readonly count: number;
  readonly tasks: readonly TaskListingEntry[];
}

export interface TaskListing {
  readonly classes: readonly ClassListing[];
  readonly total: number;
}

/**
 * Manager events. Listeners run synchronously after the state change.
 */
export interface PriorityManagerEvents {
  'task.submitted': (task: Task, message: string) => void;
  'task.rejected': (error: InvalidPriorityClassError, task: Task) => void;
  'task.dispatched': (task: Task) => void;
  'queue.empty': (operation: 'next' | 'peekNext') => void;
}

interface ClassSlot {
  readonly definition: PriorityClassDefinition;
  readonly queue: ClassQueue<Task>;
}

/**
 * Routes tasks into per-class FIFO queues and always serves the numerically
 * lowest non-empty class first. No aging, no fairness adjustment.
 */
export class PriorityManager {
  private readonly queues = new Map<number, ClassQueue<Task>>();
  private readonly labels = new Map<number, string>();
  private readonly slots: readonly ClassSlot[];
  private readonly definitions: readonly PriorityClassDefinition[];
  private readonly previewLength: number;
  private readonly events = new EventEmitter2();

  constructor(options: PriorityManagerOptions = {}) {
    const config = ValidationUtils.parseConfig(PriorityManagerOptionsSchema, options, 'priority manager options');

    this.definitions = [...config.classes].sort((a, b) => a.level - b.level);
    this.previewLength = config.previewLength;
    this.slots = this.definitions.map(definition => ({
      definition,
      queue: new ClassQueue<Task>(definition.level)
    }));

    for (const { definition, queue } of this.slots) {
      this.queues.set(definition.level, queue);
      this.labels.set(definition.level, definition.label);
    }
  }

  /**
   * Recognised classes in service order
   */
  get classes(): readonly PriorityClassDefinition[] {
    return this.definitions;
  }

  isRecognized(priority: number): boolean {
    return this.queues.has(priority);
  }

  labelFor(priority: number): string {
    return this.labels.get(priority) ?? priorityLabel(priority);
  }

  /**
   * Queue a task in its class. Unrecognised classes are reported, not stored.
   */
  submit(task: Task): SubmitResult {
    const queue = this.queues.get(task.priority);

    if (!queue) {
      const error = new InvalidPriorityClassError(
        task.name,
        task.priority,
        this.definitions.map(definition => definition.level)
      );
      this.emit('task.rejected', error, task);
      return { success: false, error, message: error.message };
    }

    queue.enqueue(task);
    const message = `Task '${task.name}' added with priority ${task.priority}`;
    this.emit('task.submitted', task, message);
    return { success: true, task, message };
  }

  submitTask(name: string, description: string, priority: number): SubmitResult {
    return this.submit(new Task({ name, description, priority }));
  }

  submitOrThrow(task: Task): Task {
    const result = this.submit(task);
    if (!result.success) {
      throw result.error;
    }
    return result.task;
  }

  /**
   * Remove and return the highest-priority, longest-waiting task
   */
  next(): Task | undefined {
    const queue = this.firstNonEmpty();
    const task = queue?.dequeue();

    if (!task) {
      this.emit('queue.empty', 'next');
      return undefined;
    }

    this.emit('task.dispatched', task);
    return task;
  }

  /**
   * Same selection as next() without removing anything
   */
  peekNext(): Task | undefined {
    const task = this.firstNonEmpty()?.peek();

    if (!task) {
      this.emit('queue.empty', 'peekNext');
    }
    return task;
  }

  statistics(): ManagerStatistics {
    const perClass: Record<number, number> = {};
    let total = 0;

    for (const { definition, queue } of this.slots) {
      const size = queue.size();
      perClass[definition.level] = size;
      total += size;
    }

    return { total, perClass };
  }

  listAll(): TaskListing {
    let total = 0;

    const classes = this.slots.map(({ definition, queue }): ClassListing => {
      const tasks = queue.toArray().map((task, i): TaskListingEntry => ({
        index: i + 1,
        id: task.id,
        name: task.name,
        description: task.description,
        preview: previewText(task.description, this.previewLength)
      }));
      total += tasks.length;

      return {
        priority: definition.level,
        label: definition.label,
        count: tasks.length,
        tasks
      };
    });

    return { classes, total };
  }

  size(): number {
    return this.statistics().total;
  }

  isEmpty(): boolean {
    return this.size() === 0;
  }

  /**
   * Subscribe to a manager event; returns the unsubscribe function
   */
  on<E extends keyof PriorityManagerEvents>(event: E, listener: PriorityManagerEvents[E]): () => void {
    this.events.on(event, listener);
    return () => {
      this.events.off(event, listener);
    };
  }

  private emit<E extends keyof PriorityManagerEvents>(
    event: E,
    ...args: Parameters<PriorityManagerEvents[E]>
  ): void {
    this.events.emit(event, ...args);
  }

  private firstNonEmpty(): ClassQueue<Task> | undefined {
    return this.slots.find(({ queue }) => !queue.isEmpty())?.queue;
  }
}
