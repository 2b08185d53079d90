/**
 * Shared types for the ingestion and persistence pipeline
 */

/**
 * One pin state change reported by a device
 */
export interface DeviceEvent {
  readonly pin: number;
  readonly state: string;
  readonly timeDiffSeconds: number;
  readonly timestamp: string;
}

/**
 * A (device, event) pair travelling from a connection handler to the worker
 */
export interface QueueEntry {
  readonly deviceName: string;
  readonly event: DeviceEvent;
}

/**
 * Per-device append log as tracked by the store
 */
export interface DeviceLog {
  deviceName: string;
  filePath: string;
  headerWritten: boolean;
}

/**
 * Runtime configuration, read-only after startup
 */
export interface ServerConfig {
  readonly host: string;
  readonly port: number;
  readonly maxConnections: number;
  readonly outputDir: string;
  readonly filePrefix: string;
  readonly idleTimeoutMs: number;
  readonly maxMessageBytes: number;
  readonly drainOnStop: boolean;
  readonly healthPort: number;
}

/**
 * Logger interface
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}
