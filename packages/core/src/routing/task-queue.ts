import type { Priority, Task } from "../types.js";
import { PRIORITIES } from "../types.js";
import { OverloadedError } from "../errors.js";

export interface Queued {
  task: Task;
}

/**
 * One FIFO queue per priority class, each bounded by the same ceiling.
 * Iteration visits critical first, then high, medium and low.
 */
export class PriorityQueues<T extends Queued> {
  private readonly queues = new Map<Priority, T[]>(PRIORITIES.map((p) => [p, []]));

  constructor(private readonly ceiling: number) {}

  /** Appends to the entry's priority class. Throws `OverloadedError` when that class is full. */
  enqueue(entry: T): number {
    const queue = this.queue(entry.task.priority);
    if (queue.length >= this.ceiling) {
      throw new OverloadedError(
        `Queue for ${entry.task.priority} tasks is full (${this.ceiling}); task ${entry.task.id} rejected`,
      );
    }
    queue.push(entry);
    return queue.length;
  }

  isFull(priority: Priority): boolean {
    return this.queue(priority).length >= this.ceiling;
  }

  remove(entry: T): boolean {
    const queue = this.queue(entry.task.priority);
    const idx = queue.indexOf(entry);
    if (idx < 0) return false;
    queue.splice(idx, 1);
    return true;
  }

  size(priority?: Priority): number {
    if (priority) return this.queue(priority).length;
    let total = 0;
    for (const queue of this.queues.values()) total += queue.length;
    return total;
  }

  /** Snapshot in dequeue order, so callers may remove entries while iterating */
  entries(): T[] {
    return PRIORITIES.flatMap((p) => [...this.queue(p)]);
  }

  count(predicate: (entry: T) => boolean): number {
    return this.entries().filter(predicate).length;
  }

  private queue(priority: Priority): T[] {
    let queue = this.queues.get(priority);
    if (!queue) {
      queue = [];
      this.queues.set(priority, queue);
    }
    return queue;
  }
}
