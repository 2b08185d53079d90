/**
 * Test fixtures and helpers shared by unit and integration tests
 */

import { mkdtempSync, rmSync } from 'fs';
import os from 'os';
import path from 'path';
import type { DeviceEvent, QueueEntry, ServerConfig } from '../../src/types';

export function createTempDir(prefix = 'andon-test-'): string {
  return mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

export function createEvent(overrides: Partial<DeviceEvent> = {}): DeviceEvent {
  return {
    pin: 23,
    state: 'on',
    timeDiffSeconds: 1.5,
    timestamp: '2024-03-01 08:00:00.000',
    ...overrides,
  };
}

export function createEntry(deviceName: string, overrides: Partial<DeviceEvent> = {}): QueueEntry {
  return { deviceName, event: createEvent(overrides) };
}

export function createConfig(overrides: Partial<ServerConfig> = {}): ServerConfig {
  return {
    host: '127.0.0.1',
    port: 0,
    maxConnections: 50,
    outputDir: 'data',
    filePrefix: 'data_',
    idleTimeoutMs: 5000,
    maxMessageBytes: 64 * 1024,
    drainOnStop: false,
    healthPort: 0,
    ...overrides,
  };
}

/**
 * Poll until the condition holds or the timeout passes
 */
export async function waitFor(
  condition: () => boolean | Promise<boolean>,
  timeoutMs = 3000,
  intervalMs = 20
): Promise<void> {
  const deadline = Date.now() + timeoutMs;

  while (!(await condition())) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, intervalMs));
  }
}
