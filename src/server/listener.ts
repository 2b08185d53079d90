/**
 * Listener
 *
 * Binds the TCP server and hands every accepted socket to its own
 * ConnectionHandler without waiting for it. `maxConnections` is used both
 * as the listen backlog and as the live connection cap; sockets beyond the
 * cap are closed by the server on accept.
 *
 * Aborting the signal stops accepting. Handlers already running finish on
 * their own and are not awaited.
 */

import net from 'net';
import type { AddressInfo } from 'net';
import { ConnectionHandler } from './connection-handler';
import type { ConnectionOutcome, EventSink } from './connection-handler';
import { BindError } from '../errors';
import { LogComponents } from '../utils/components';
import type { Logger } from '../types';

export interface ListenerOptions {
  host: string;
  port: number;
  maxConnections: number;
  idleTimeoutMs: number;
  maxMessageBytes: number;
  sink: EventSink;
  logger: Logger;
  now?: () => Date;
}

export interface ListenerStats {
  active: number;
  accepted: number;
  rejected: number;
  listening: boolean;
}

export class Listener {
  private readonly options: ListenerOptions;
  private readonly logger: Logger;
  private server: net.Server | null = null;
  private active = 0;
  private accepted = 0;
  private rejected = 0;

  constructor(options: ListenerOptions) {
    this.options = options;
    this.logger = options.logger;
  }

  /**
   * Bind and start accepting; resolves with the bound address
   * @throws BindError if the address cannot be bound
   */
  async start(signal: AbortSignal): Promise<AddressInfo> {
    if (this.server) {
      throw new Error('Listener is already started');
    }

    const { host, port, maxConnections } = this.options;

    const server = net.createServer({ allowHalfOpen: true }, (socket) => this.dispatch(socket));
    server.maxConnections = maxConnections;
    server.on('drop', () => {
      this.rejected++;
      this.logger.warn(`Connection refused: ${maxConnections} connections already active`, {
        component: LogComponents.LISTENER,
      });
    });

    const address = await new Promise<AddressInfo>((resolve, reject) => {
      const onError = (error: Error) => {
        reject(new BindError(host, port, error));
      };
      server.once('error', onError);
      server.listen({ host, port, backlog: maxConnections }, () => {
        server.removeListener('error', onError);
        const bound = server.address();
        if (bound === null || typeof bound === 'string') {
          reject(new BindError(host, port, 'server is not bound to a TCP address'));
          return;
        }
        resolve(bound);
      });
    }).catch((error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(message, { component: LogComponents.LISTENER });
      throw error;
    });

    server.on('error', (error: Error) => {
      this.logger.error(`Listener error: ${error.message}`, { component: LogComponents.LISTENER });
    });

    this.server = server;
    this.logger.info(`Server started on ${address.address}:${address.port}`, {
      component: LogComponents.LISTENER,
      maxConnections,
    });

    if (signal.aborted) {
      this.close();
    } else {
      signal.addEventListener('abort', () => this.close(), { once: true });
    }

    return address;
  }

  isListening(): boolean {
    return this.server?.listening ?? false;
  }

  getStats(): ListenerStats {
    return {
      active: this.active,
      accepted: this.accepted,
      rejected: this.rejected,
      listening: this.isListening(),
    };
  }

  private dispatch(socket: net.Socket): void {
    this.accepted++;
    this.active++;

    this.logger.info(`Accepted connection from ${socket.remoteAddress}:${socket.remotePort}`, {
      component: LogComponents.LISTENER,
    });

    const handler = new ConnectionHandler(socket, {
      sink: this.options.sink,
      logger: this.logger,
      idleTimeoutMs: this.options.idleTimeoutMs,
      maxMessageBytes: this.options.maxMessageBytes,
      now: this.options.now,
    });

    handler
      .handle()
      .then((outcome: ConnectionOutcome) => {
        this.logger.debug(`Connection finished: ${outcome}`, { component: LogComponents.LISTENER });
      })
      .catch((error: unknown) => {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.error(`Connection handler failed: ${message}`, { component: LogComponents.LISTENER });
        socket.destroy();
      })
      .finally(() => {
        this.active--;
      });
  }

  private close(): void {
    const server = this.server;
    if (!server || !server.listening) {
      return;
    }

    server.close(() => {
      this.logger.info('Server socket closed', { component: LogComponents.LISTENER });
    });
    this.logger.info('Stopped accepting connections', {
      component: LogComponents.LISTENER,
      inFlight: this.active,
    });
  }
}
