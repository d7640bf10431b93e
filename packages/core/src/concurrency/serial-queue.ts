/**
 * Serial execution queue
 *
 * Runs submitted tasks one at a time in arrival order. Each cache tier owns
 * one queue and routes every operation through it, so tier state is never
 * touched by two operations at once.
 */

import pLimit, { type LimitFunction } from 'p-limit';

export class SerialQueue {
  private readonly limit: LimitFunction = pLimit(1);

  /**
   * Run a task after every previously submitted task has settled
   *
   * A task that throws rejects only its own promise; the queue keeps going.
   */
  run<T>(task: () => T | PromiseLike<T>): Promise<T> {
    return this.limit(task);
  }

  /**
   * Number of tasks waiting to start
   */
  get pending(): number {
    return this.limit.pendingCount;
  }

  /**
   * Number of tasks currently running (0 or 1)
   */
  get active(): number {
    return this.limit.activeCount;
  }
}
