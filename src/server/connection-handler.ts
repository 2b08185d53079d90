/**
 * Connection Handler
 *
 * One instance per accepted socket. Reads until the frame decoder reports a
 * complete (or malformed) document, turns it into a queue entry, replies
 * once and closes.
 *
 *   receiving --complete--> decoded --reply--> closed
 *   receiving --malformed / timeout / end / error--> closed
 *
 * The socket is released exactly once; handle() resolves after 'close'.
 */

import type { Socket } from 'net';
import { JsonFrameDecoder, DEFAULT_MAX_MESSAGE_BYTES } from './frame-decoder';
import { parseEventMessage } from './event-message';
import { LogComponents } from '../utils/components';
import type { Logger, QueueEntry } from '../types';

export const Replies = {
  OK: 'OK',
  INVALID_JSON: 'ERROR: Invalid JSON format',
  INTERNAL_ERROR: 'ERROR: Internal server error',
  PROCESSING_FAILED: 'ERROR: Failed to process data',
} as const;

export type Reply = typeof Replies[keyof typeof Replies];

export const DEFAULT_IDLE_TIMEOUT_MS = 5000;

export type ConnectionState = 'receiving' | 'decoded' | 'closed';

export type ConnectionOutcome =
  | 'accepted'  // event queued, OK sent
  | 'invalid'   // undecodable bytes
  | 'failed'    // decoded but could not be processed
  | 'rejected'  // sink refused the entry
  | 'timeout'   // idle timeout, no reply
  | 'empty'     // peer closed without sending anything
  | 'error';    // socket error

/**
 * Destination for decoded events. Returns false if the entry was refused.
 */
export interface EventSink {
  submit(entry: QueueEntry): boolean;
}

export interface ConnectionHandlerOptions {
  sink: EventSink;
  logger: Logger;
  idleTimeoutMs?: number;
  maxMessageBytes?: number;
  now?: () => Date;
}

export class ConnectionHandler {
  private readonly socket: Socket;
  private readonly sink: EventSink;
  private readonly logger: Logger;
  private readonly idleTimeoutMs: number;
  private readonly now: () => Date;
  private readonly decoder: JsonFrameDecoder;
  private readonly client: string;
  private state: ConnectionState = 'receiving';
  private outcome: ConnectionOutcome = 'error';

  constructor(socket: Socket, options: ConnectionHandlerOptions) {
    this.socket = socket;
    this.sink = options.sink;
    this.logger = options.logger;
    this.idleTimeoutMs = options.idleTimeoutMs ?? DEFAULT_IDLE_TIMEOUT_MS;
    this.now = options.now ?? (() => new Date());
    this.decoder = new JsonFrameDecoder(options.maxMessageBytes ?? DEFAULT_MAX_MESSAGE_BYTES);
    this.client = `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`;
  }

  getState(): ConnectionState {
    return this.state;
  }

  /**
   * Drive the connection to completion
   */
  handle(): Promise<ConnectionOutcome> {
    const socket = this.socket;

    return new Promise<ConnectionOutcome>((resolve) => {
      socket.once('close', () => {
        this.state = 'closed';
        this.logger.info(`Connection from ${this.client} closed`, {
          component: LogComponents.CONNECTION,
          outcome: this.outcome,
        });
        resolve(this.outcome);
      });

      socket.setTimeout(this.idleTimeoutMs);
      socket.on('data', (chunk: Buffer) => this.onData(chunk));
      socket.on('end', () => this.onEnd());
      socket.on('timeout', () => this.onTimeout());
      socket.on('error', (error: Error) => this.onError(error));
    });
  }

  private onData(chunk: Buffer): void {
    if (this.state !== 'receiving') {
      return;
    }

    const result = this.decoder.push(chunk);

    switch (result.status) {
      case 'incomplete':
        return;
      case 'malformed':
        this.logger.warn(`Error parsing JSON from ${this.client}: ${result.error.message}`, {
          component: LogComponents.CONNECTION,
        });
        this.close('invalid', Replies.INVALID_JSON);
        return;
      case 'complete':
        if (result.trailingBytes > 0) {
          this.logger.debug(`Ignoring ${result.trailingBytes} bytes after message from ${this.client}`, {
            component: LogComponents.CONNECTION,
          });
        }
        this.process(result.value);
        return;
    }
  }

  private onEnd(): void {
    if (this.state !== 'receiving') {
      return;
    }

    const result = this.decoder.end();

    switch (result.status) {
      case 'empty':
        this.close('empty');
        return;
      case 'malformed':
        this.logger.warn(`Error parsing JSON from ${this.client}: ${result.error.message}`, {
          component: LogComponents.CONNECTION,
        });
        this.close('invalid', Replies.INVALID_JSON);
        return;
      case 'complete':
        this.process(result.value);
        return;
    }
  }

  private onTimeout(): void {
    if (this.state === 'receiving') {
      this.logger.debug(`Connection from ${this.client} idle for ${this.idleTimeoutMs}ms`, {
        component: LogComponents.CONNECTION,
      });
      this.close('timeout');
      return;
    }

    // Reply already sent but the peer never finished its side
    this.socket.destroy();
  }

  private onError(error: Error): void {
    this.logger.warn(`Error handling client ${this.client}: ${error.message}`, {
      component: LogComponents.CONNECTION,
    });

    if (this.state !== 'closed') {
      this.close('error');
    }
  }

  private process(value: unknown): void {
    this.state = 'decoded';

    try {
      const entry = parseEventMessage(value, this.now);

      this.logger.info(
        `Received data from ${entry.deviceName}: pin ${entry.event.pin} changed to ${entry.event.state}`,
        { component: LogComponents.CONNECTION }
      );

      if (this.sink.submit(entry)) {
        this.logger.debug(`Data for ${entry.deviceName} sent to persistence queue`, {
          component: LogComponents.CONNECTION,
        });
        this.close('accepted', Replies.OK);
      } else {
        this.logger.error(`Failed to process data for ${entry.deviceName}`, {
          component: LogComponents.CONNECTION,
        });
        this.close('rejected', Replies.PROCESSING_FAILED);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Error processing data from ${this.client}: ${message}`, {
        component: LogComponents.CONNECTION,
      });
      this.close('failed', Replies.INTERNAL_ERROR);
    }
  }

  /**
   * Transition to closed; with a reply the write side is ended after it,
   * otherwise the socket is destroyed immediately
   */
  private close(outcome: ConnectionOutcome, reply?: Reply): void {
    if (this.state === 'closed') {
      return;
    }
    this.state = 'closed';
    this.outcome = outcome;

    if (reply === undefined) {
      this.socket.destroy();
      return;
    }

    this.socket.end(reply);
  }
}
