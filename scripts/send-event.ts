/**
 * Send a single device event to a running andon server
 * Usage: npx ts-node scripts/send-event.ts [options]
 *
 * Examples:
 *   npm run send-event -- --device press1 --pin 25 --state on --diff 1.5
 *   npm run send-event -- --host 192.168.1.128 --port 5000 --device press1 --pin 23 --state off
 */

import { parseArgs } from 'util';
import { sendEvent } from '../src/client/send-event';

const { values } = parseArgs({
  options: {
    host: { type: 'string', default: '127.0.0.1' },
    port: { type: 'string', default: '5000' },
    device: { type: 'string', default: 'Andon-1' },
    pin: { type: 'string', default: '23' },
    state: { type: 'string', default: 'on' },
    diff: { type: 'string', default: '0' },
    timestamp: { type: 'string' },
  },
});

async function main(): Promise<void> {
  const reply = await sendEvent(
    { host: values.host ?? '127.0.0.1', port: Number(values.port) },
    {
      device_name: values.device,
      pin: Number(values.pin),
      state: values.state,
      time_diff_sec: Number(values.diff),
      timestamp: values.timestamp,
    }
  );

  console.log(reply);
  if (reply !== 'OK') {
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error('❌ Failed to send event:', error instanceof Error ? error.message : error);
  process.exit(1);
});
