/**
 * Persistence Queue
 *
 * Unbounded FIFO between connection handlers (producers) and the
 * persistence worker (single consumer). All operations run synchronously on
 * the event loop, so each one is atomic with respect to the others.
 *
 * The consumer parks on waitForEntry() instead of polling on an interval.
 */

import type { QueueEntry } from '../types';

export class PersistenceQueue<T = QueueEntry> {
  private items: T[] = [];
  private head = 0;
  private waiters: Array<() => void> = [];

  get size(): number {
    return this.items.length - this.head;
  }

  isEmpty(): boolean {
    return this.size === 0;
  }

  /**
   * Append an entry; never blocks and never fails
   */
  enqueue(entry: T): void {
    this.items.push(entry);

    const waiters = this.waiters;
    this.waiters = [];
    for (const wake of waiters) {
      wake();
    }
  }

  /**
   * Remove and return the oldest entry, or undefined when empty
   */
  tryDequeue(): T | undefined {
    if (this.head >= this.items.length) {
      return undefined;
    }

    const entry = this.items[this.head];
    this.head++;

    // Compact once the consumed prefix dominates the backing array
    if (this.head > 1024 && this.head * 2 >= this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }

    return entry;
  }

  /**
   * Resolve once an entry is available or the signal aborts
   */
  waitForEntry(signal?: AbortSignal): Promise<void> {
    if (!this.isEmpty() || signal?.aborted) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      const wake = () => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      };
      const onAbort = () => {
        this.waiters = this.waiters.filter((w) => w !== wake);
        resolve();
      };

      this.waiters.push(wake);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
