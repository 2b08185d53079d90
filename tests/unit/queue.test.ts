import { describe, test, expect, beforeEach } from '@jest/globals';
import { PersistenceQueue } from '../../src/persistence/queue';
import { createEntry } from '../helpers/fixtures';
import type { QueueEntry } from '../../src/types';

describe('PersistenceQueue', () => {
  let queue: PersistenceQueue<QueueEntry>;

  beforeEach(() => {
    queue = new PersistenceQueue<QueueEntry>();
  });

  test('should start empty', () => {
    expect(queue.size).toBe(0);
    expect(queue.isEmpty()).toBe(true);
    expect(queue.tryDequeue()).toBeUndefined();
  });

  test('should dequeue entries in submission order', () => {
    const a = createEntry('press1', { pin: 23 });
    const b = createEntry('press2', { pin: 24 });
    const c = createEntry('press1', { pin: 25 });

    queue.enqueue(a);
    queue.enqueue(b);
    queue.enqueue(c);

    expect(queue.size).toBe(3);
    expect(queue.tryDequeue()).toBe(a);
    expect(queue.tryDequeue()).toBe(b);
    expect(queue.tryDequeue()).toBe(c);
    expect(queue.tryDequeue()).toBeUndefined();
    expect(queue.isEmpty()).toBe(true);
  });

  test('should keep order across internal compaction', () => {
    const numbers = new PersistenceQueue<number>();
    for (let i = 0; i < 3000; i++) {
      numbers.enqueue(i);
    }

    const seen: number[] = [];
    for (let i = 0; i < 2500; i++) {
      const value = numbers.tryDequeue();
      if (value !== undefined) {
        seen.push(value);
      }
    }
    numbers.enqueue(3000);

    let value = numbers.tryDequeue();
    while (value !== undefined) {
      seen.push(value);
      value = numbers.tryDequeue();
    }

    expect(seen).toHaveLength(3001);
    expect(seen.every((v, i) => v === i)).toBe(true);
  });

  describe('waitForEntry', () => {
    test('should resolve immediately when an entry is queued', async () => {
      queue.enqueue(createEntry('press1'));
      await expect(queue.waitForEntry()).resolves.toBeUndefined();
    });

    test('should resolve once an entry is enqueued', async () => {
      let woke = false;
      const waiting = queue.waitForEntry().then(() => {
        woke = true;
      });

      await Promise.resolve();
      expect(woke).toBe(false);

      queue.enqueue(createEntry('press1'));
      await waiting;

      expect(woke).toBe(true);
      expect(queue.size).toBe(1);
    });

    test('should resolve when the signal aborts', async () => {
      const controller = new AbortController();
      const waiting = queue.waitForEntry(controller.signal);

      controller.abort();

      await expect(waiting).resolves.toBeUndefined();
      expect(queue.isEmpty()).toBe(true);
    });

    test('should resolve immediately for an already aborted signal', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(queue.waitForEntry(controller.signal)).resolves.toBeUndefined();
    });
  });
});
