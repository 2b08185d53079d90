/**
 * Andon Server
 *
 * Wires the ingestion pipeline together:
 *   Listener -> ConnectionHandler -> PersistenceQueue -> PersistenceWorker -> DeviceLogStore
 *
 * One AbortSignal, owned by the caller, stops the listener and the worker.
 */

import type { AddressInfo } from 'net';
import { PersistenceQueue } from './persistence/queue';
import { DeviceLogStore } from './persistence/device-log-store';
import { PersistenceWorker } from './persistence/worker';
import type { PersistenceWorkerStats } from './persistence/worker';
import { Listener } from './server/listener';
import type { ListenerStats } from './server/listener';
import type { EventSink } from './server/connection-handler';
import { LogComponents } from './utils/components';
import type { DeviceLog, Logger, QueueEntry, ServerConfig } from './types';

export interface AndonServerStats {
  queue: { depth: number };
  worker: PersistenceWorkerStats;
  connections: Omit<ListenerStats, 'listening'>;
  devices: DeviceLog[];
}

export interface AndonServerOptions {
  config: ServerConfig;
  logger: Logger;
  now?: () => Date;
}

export class AndonServer implements EventSink {
  readonly queue = new PersistenceQueue<QueueEntry>();
  readonly store: DeviceLogStore;
  readonly worker: PersistenceWorker;
  private readonly listener: Listener;
  private readonly config: ServerConfig;
  private readonly logger: Logger;
  private workerTask: Promise<void> | null = null;
  private stopping = false;

  constructor(options: AndonServerOptions) {
    this.config = options.config;
    this.logger = options.logger;

    this.store = new DeviceLogStore({
      outputDir: this.config.outputDir,
      filePrefix: this.config.filePrefix,
      logger: this.logger,
    });

    this.worker = new PersistenceWorker({
      queue: this.queue,
      store: this.store,
      logger: this.logger,
      drainOnStop: this.config.drainOnStop,
    });

    this.listener = new Listener({
      host: this.config.host,
      port: this.config.port,
      maxConnections: this.config.maxConnections,
      idleTimeoutMs: this.config.idleTimeoutMs,
      maxMessageBytes: this.config.maxMessageBytes,
      sink: this,
      logger: this.logger,
      now: options.now,
    });
  }

  /**
   * Start the worker and bind the listener
   * @throws BindError if the listener cannot bind; the worker is stopped again
   */
  async start(signal: AbortSignal): Promise<AddressInfo> {
    if (this.workerTask) {
      throw new Error('Andon server is already started');
    }

    // Internal controller so a failed bind can stop the worker on its own
    const controller = new AbortController();
    if (signal.aborted) {
      controller.abort();
    } else {
      signal.addEventListener('abort', () => controller.abort(), { once: true });
    }
    controller.signal.addEventListener('abort', () => this.onAbort(), { once: true });

    this.workerTask = this.worker.start(controller.signal);

    try {
      const address = await this.listener.start(controller.signal);
      this.logger.info(`Saving data to directory: ${this.config.outputDir}`, {
        component: LogComponents.SERVER,
      });
      return address;
    } catch (error) {
      this.logger.warn('Stopping persistence worker after startup failure', {
        component: LogComponents.SERVER,
      });
      controller.abort();
      await this.stopped();
      throw error;
    }
  }

  /**
   * Resolves once the worker loop has exited
   */
  async stopped(): Promise<void> {
    if (this.workerTask) {
      await this.workerTask;
    }
  }

  submit(entry: QueueEntry): boolean {
    if (this.stopping) {
      return false;
    }
    this.queue.enqueue(entry);
    return true;
  }

  isListening(): boolean {
    return this.listener.isListening();
  }

  getStats(): AndonServerStats {
    const { active, accepted, rejected } = this.listener.getStats();

    return {
      queue: { depth: this.queue.size },
      worker: this.worker.getStats(),
      connections: { active, accepted, rejected },
      devices: this.store.getDeviceLogs(),
    };
  }

  private onAbort(): void {
    this.stopping = true;
    this.logger.info('Shutdown requested, cleaning up resources...', {
      component: LogComponents.SERVER,
      queued: this.queue.size,
    });
  }
}
