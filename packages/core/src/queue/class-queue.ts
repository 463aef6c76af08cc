/**
 * @fileoverview FIFO queue holding the tasks of a single priority class
 */

import type { Task } from '../types/task.js';

/**
 * Consumed slots tolerated before the backing array is compacted
 */
const COMPACTION_THRESHOLD = 32;

/**
 * FIFO container for one priority class.
 *
 * Items live in a plain array. Dequeue clears the head slot and advances a
 * head offset instead of shifting; the consumed prefix is dropped once it
 * makes up at least half of the array.
 */
export class ClassQueue<T = Task> implements Iterable<T> {
  private items: (T | undefined)[] = [];
  private head = 0;

  constructor(public readonly priority: number) {}

  /**
   * Append an item to the tail
   */
  enqueue(item: T): void {
    this.items.push(item);
  }

  /**
   * Remove and return the head, or undefined when empty
   */
  dequeue(): T | undefined {
    if (this.head >= this.items.length) {
      return undefined;
    }

    const item = this.items[this.head];
    this.items[this.head] = undefined;
    this.head++;
    this.compact();
    return item;
  }

  /**
   * Return the head without removing it
   */
  peek(): T | undefined {
    return this.head < this.items.length ? this.items[this.head] : undefined;
  }

  isEmpty(): boolean {
    return this.size() === 0;
  }

  size(): number {
    return this.items.length - this.head;
  }

  /**
   * Snapshot of the pending items in FIFO order
   */
  toArray(): T[] {
    return this.items.slice(this.head).filter((item): item is T => item !== undefined);
  }

  [Symbol.iterator](): Iterator<T> {
    return this.toArray()[Symbol.iterator]();
  }

  private compact(): void {
    if (this.head === this.items.length) {
      this.items = [];
      this.head = 0;
      return;
    }

    if (this.head >= COMPACTION_THRESHOLD && this.head * 2 >= this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
  }
}
