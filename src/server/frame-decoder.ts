/**
 * Streaming JSON frame decoder
 *
 * Finds the end of the first top-level JSON value in a byte stream by
 * tracking nesting depth and string state as bytes arrive. Objects, arrays
 * and strings end at their closing character; bare tokens (numbers, true,
 * false, null) end at the first byte that cannot continue them, or at end
 * of stream. Each push reports one of three outcomes:
 *   - incomplete: more bytes are needed
 *   - complete:   a full document was found and parsed
 *   - malformed:  the bytes can never form a valid document
 *
 * Structural characters are all ASCII and UTF-8 continuation bytes are
 * >= 0x80, so scanning raw bytes is safe even when a multi-byte character is
 * split across chunks. Scanning resumes where the previous push stopped.
 */

import { FrameDecodeError } from '../errors';

export const DEFAULT_MAX_MESSAGE_BYTES = 64 * 1024;

const OPEN_BRACE = 0x7b;
const CLOSE_BRACE = 0x7d;
const OPEN_BRACKET = 0x5b;
const CLOSE_BRACKET = 0x5d;
const QUOTE = 0x22;
const BACKSLASH = 0x5c;

export type FrameResult =
  | { status: 'incomplete' }
  | { status: 'complete'; value: unknown; trailingBytes: number }
  | { status: 'malformed'; error: FrameDecodeError };

export type FinalFrameResult = Exclude<FrameResult, { status: 'incomplete' }>;

export type FrameEndResult = FinalFrameResult | { status: 'empty' };

function isWhitespace(byte: number): boolean {
  return byte === 0x20 || byte === 0x09 || byte === 0x0a || byte === 0x0d;
}

// Bytes that may appear in a number or literal: 0-9 a-z A-Z + - .
function isTokenByte(byte: number): boolean {
  return (
    (byte >= 0x30 && byte <= 0x39) ||
    (byte >= 0x61 && byte <= 0x7a) ||
    (byte >= 0x41 && byte <= 0x5a) ||
    byte === 0x2b ||
    byte === 0x2d ||
    byte === 0x2e
  );
}

export class JsonFrameDecoder {
  private readonly maxBytes: number;
  private buffer: Buffer = Buffer.alloc(0);
  private position = 0;
  private start = -1;
  private depth = 0;
  private inString = false;
  private inToken = false;
  private escaped = false;
  private result: FinalFrameResult | null = null;

  constructor(maxBytes: number = DEFAULT_MAX_MESSAGE_BYTES) {
    this.maxBytes = maxBytes;
  }

  get bufferedBytes(): number {
    return this.buffer.length;
  }

  /**
   * Feed the next chunk. Once a complete or malformed result has been
   * produced it is returned for every later call.
   */
  push(chunk: Buffer): FrameResult {
    if (this.result) {
      return this.result;
    }

    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);

    const outcome = this.scan();
    if (outcome.status !== 'incomplete') {
      this.result = outcome;
      return outcome;
    }

    if (this.buffer.length > this.maxBytes) {
      this.result = this.tooLarge();
      return this.result;
    }

    return outcome;
  }

  /**
   * Signal end of stream; an object, array or string still open at this
   * point is malformed
   */
  end(): FrameEndResult {
    if (this.result) {
      return this.result;
    }

    if (this.start < 0) {
      return { status: 'empty' };
    }

    // End of stream terminates a bare token
    if (this.inToken) {
      this.result = this.parse(this.buffer.length);
      return this.result;
    }

    this.result = {
      status: 'malformed',
      error: new FrameDecodeError('connection closed before the message was complete'),
    };
    return this.result;
  }

  private tooLarge(): FinalFrameResult {
    return {
      status: 'malformed',
      error: new FrameDecodeError(`message exceeds ${this.maxBytes} bytes`),
    };
  }

  private scan(): FrameResult {
    const buf = this.buffer;

    for (; this.position < buf.length; this.position++) {
      const byte = buf[this.position];

      if (this.start < 0) {
        if (isWhitespace(byte)) {
          continue;
        }
        this.start = this.position;
        if (byte === OPEN_BRACE || byte === OPEN_BRACKET) {
          this.depth = 1;
        } else if (byte === QUOTE) {
          this.inString = true;
        } else if (isTokenByte(byte)) {
          this.inToken = true;
        } else {
          return {
            status: 'malformed',
            error: new FrameDecodeError('expected a JSON value'),
          };
        }
        continue;
      }

      if (this.inToken) {
        if (!isTokenByte(byte)) {
          return this.parse(this.position);
        }
        continue;
      }

      if (this.inString) {
        if (this.escaped) {
          this.escaped = false;
        } else if (byte === BACKSLASH) {
          this.escaped = true;
        } else if (byte === QUOTE) {
          this.inString = false;
          // Top-level string
          if (this.depth === 0) {
            return this.parse(this.position + 1);
          }
        }
        continue;
      }

      if (byte === QUOTE) {
        this.inString = true;
      } else if (byte === OPEN_BRACE || byte === OPEN_BRACKET) {
        this.depth++;
      } else if (byte === CLOSE_BRACE || byte === CLOSE_BRACKET) {
        this.depth--;
        if (this.depth === 0) {
          return this.parse(this.position + 1);
        }
      }
    }

    return { status: 'incomplete' };
  }

  private parse(end: number): FinalFrameResult {
    if (end - this.start > this.maxBytes) {
      return this.tooLarge();
    }

    const text = this.buffer.subarray(this.start, end).toString('utf8');

    try {
      const value: unknown = JSON.parse(text);
      return { status: 'complete', value, trailingBytes: this.buffer.length - end };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return { status: 'malformed', error: new FrameDecodeError(reason) };
    }
  }
}
