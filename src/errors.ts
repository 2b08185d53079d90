/**
 * Andon server errors
 */

export class ConfigError extends Error {
  constructor(message: string) {
    super(`Invalid configuration: ${message}`);
    this.name = 'ConfigError';
  }
}

export class FrameDecodeError extends Error {
  constructor(reason: string) {
    super(`Could not decode message: ${reason}`);
    this.name = 'FrameDecodeError';
  }
}

export class InvalidEventError extends Error {
  constructor(field: string, reason: string) {
    super(`Invalid event field '${field}': ${reason}`);
    this.name = 'InvalidEventError';
  }
}

export class PersistenceError extends Error {
  readonly deviceName: string;
  readonly filePath: string;

  constructor(deviceName: string, filePath: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to append event for ${deviceName} to ${filePath}: ${reason}`);
    this.name = 'PersistenceError';
    this.deviceName = deviceName;
    this.filePath = filePath;
  }
}

export class BindError extends Error {
  readonly code?: string;

  constructor(host: string, port: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to bind to ${host}:${port}: ${reason}`);
    this.name = 'BindError';
    if (cause instanceof Error && 'code' in cause && typeof cause.code === 'string') {
      this.code = cause.code;
    }
  }
}
