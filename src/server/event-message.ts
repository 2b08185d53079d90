import { z } from 'zod';
import { InvalidEventError } from '../errors';
import { formatTimestamp } from '../utils/time';
import type { QueueEntry } from '../types';

/**
 * Wire message sent by andon devices. Every field is optional.
 */
export const EventMessageSchema = z.object({
  device_name: z.string().default('unknown'),
  pin: z.number().int().default(0),
  state: z.string().default('unknown'),
  time_diff_sec: z.number().default(0),
  timestamp: z.string().optional(),
});

export type EventMessage = z.input<typeof EventMessageSchema>;

/**
 * Build a queue entry from a decoded document, substituting defaults
 * @throws InvalidEventError when the document has the wrong shape
 */
export function parseEventMessage(value: unknown, now: () => Date = () => new Date()): QueueEntry {
  const parsed = EventMessageSchema.safeParse(value);

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'message';
    throw new InvalidEventError(field, issue ? issue.message : 'invalid message');
  }

  const message = parsed.data;

  return {
    deviceName: message.device_name,
    event: Object.freeze({
      pin: message.pin,
      state: message.state,
      timeDiffSeconds: message.time_diff_sec,
      timestamp: message.timestamp ?? formatTimestamp(now()),
    }),
  };
}
