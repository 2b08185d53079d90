/**
 * Persistence Worker
 *
 * Single long-lived consumer of the persistence queue. Entries are written
 * strictly in queue order, one at a time.
 *
 * Shutdown is best-effort: when the signal aborts, the loop exits after the
 * entry in progress and anything still queued is left behind unless
 * `drainOnStop` is set.
 *
 * Events emitted:
 * - 'persisted': QueueEntry - Row appended
 * - 'failed': (QueueEntry, Error) - Append failed, entry dropped
 * - 'stopped': number - Entries left in the queue
 */

import { EventEmitter } from 'events';
import { PersistenceQueue } from './queue';
import { LogComponents } from '../utils/components';
import type { DeviceEvent, Logger, QueueEntry } from '../types';

export interface EventLogWriter {
  append(deviceName: string, event: DeviceEvent): Promise<void>;
}

export interface PersistenceWorkerOptions {
  queue: PersistenceQueue<QueueEntry>;
  store: EventLogWriter;
  logger: Logger;
  drainOnStop?: boolean;
}

export interface PersistenceWorkerStats {
  persisted: number;
  failed: number;
  running: boolean;
}

export class PersistenceWorker extends EventEmitter {
  private readonly queue: PersistenceQueue<QueueEntry>;
  private readonly store: EventLogWriter;
  private readonly logger: Logger;
  private readonly drainOnStop: boolean;
  private running = false;
  private persisted = 0;
  private failed = 0;

  constructor(options: PersistenceWorkerOptions) {
    super();
    this.queue = options.queue;
    this.store = options.store;
    this.logger = options.logger;
    this.drainOnStop = options.drainOnStop ?? false;
  }

  /**
   * Run the consume loop until the signal aborts
   */
  async start(signal: AbortSignal): Promise<void> {
    if (this.running) {
      throw new Error('Persistence worker is already running');
    }

    this.running = true;
    this.logger.info('Persistence worker started', { component: LogComponents.WORKER });

    try {
      while (!signal.aborted) {
        const entry = this.queue.tryDequeue();
        if (!entry) {
          await this.queue.waitForEntry(signal);
          continue;
        }
        await this.persist(entry);
      }

      if (this.drainOnStop) {
        await this.drain();
      }
    } finally {
      this.running = false;
    }

    const remaining = this.queue.size;
    if (remaining > 0) {
      this.logger.warn(`Persistence worker stopped with ${remaining} unwritten entries`, {
        component: LogComponents.WORKER,
      });
    } else {
      this.logger.info('Persistence worker stopped', { component: LogComponents.WORKER });
    }
    this.emit('stopped', remaining);
  }

  getStats(): PersistenceWorkerStats {
    return {
      persisted: this.persisted,
      failed: this.failed,
      running: this.running,
    };
  }

  private async drain(): Promise<void> {
    this.logger.info(`Draining ${this.queue.size} queued entries before shutdown`, {
      component: LogComponents.WORKER,
    });

    let entry = this.queue.tryDequeue();
    while (entry) {
      await this.persist(entry);
      entry = this.queue.tryDequeue();
    }
  }

  private async persist(entry: QueueEntry): Promise<void> {
    try {
      await this.store.append(entry.deviceName, entry.event);
    } catch (error) {
      this.failed++;
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`Dropped event for ${entry.deviceName}: ${err.message}`, {
        component: LogComponents.WORKER,
      });
      this.notify('failed', entry, err);
      return;
    }

    this.persisted++;
    this.logger.info(`Added and saved data for ${entry.deviceName}`, {
      component: LogComponents.WORKER,
    });
    this.notify('persisted', entry);
  }

  /**
   * Emit to listeners; an error thrown by a listener is only logged
   */
  private notify(event: 'persisted' | 'failed', ...args: unknown[]): void {
    try {
      this.emit(event, ...args);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Listener for '${event}' failed: ${message}`, {
        component: LogComponents.WORKER,
      });
    }
  }
}
