/**
 * Event client
 *
 * Device-side counterpart of the server: opens a connection, writes one JSON
 * document, half-closes and resolves with the server's reply.
 */

import net from 'net';
import type { EventMessage } from '../server/event-message';

export interface SendEventOptions {
  host: string;
  port: number;
  timeoutMs?: number;
}

export function sendEvent(options: SendEventOptions, message: EventMessage | string): Promise<string> {
  const payload = typeof message === 'string' ? message : JSON.stringify(message);
  return sendRaw(options, payload);
}

/**
 * Write raw bytes and collect everything the server sends back
 */
export function sendRaw(options: SendEventOptions, payload: string | Buffer, halfClose = true): Promise<string> {
  const { host, port, timeoutMs = 10000 } = options;

  return new Promise<string>((resolve, reject) => {
    const chunks: Buffer[] = [];
    const socket = net.createConnection({ host, port });

    socket.setTimeout(timeoutMs);

    socket.on('connect', () => {
      if (halfClose) {
        socket.end(payload);
      } else {
        socket.write(payload);
      }
    });
    socket.on('data', (chunk: Buffer) => chunks.push(chunk));
    socket.on('timeout', () => {
      socket.destroy(new Error(`No reply from ${host}:${port} within ${timeoutMs}ms`));
    });
    socket.on('error', reject);
    socket.on('close', (hadError: boolean) => {
      if (!hadError) {
        resolve(Buffer.concat(chunks).toString('utf8'));
      }
    });
  });
}
