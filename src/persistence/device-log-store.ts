/**
 * Device Log Store
 *
 * Owns one append-only CSV file per device:
 *   <outputDir>/<filePrefix><deviceName>.csv
 *
 * The header row is written in the same write call as the first data row
 * when the file is missing or empty. Once a header is known to be present
 * the file is no longer checked. Appends for one device are chained
 * through a per-device lock.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { resolvePinName } from './pin-names';
import { PersistenceError } from '../errors';
import { LogComponents } from '../utils/components';
import type { DeviceEvent, DeviceLog, Logger } from '../types';

export const CSV_HEADER = 'Timestamp,Pin,State,Time Difference (sec)';

export interface DeviceLogStoreOptions {
  outputDir: string;
  filePrefix: string;
  logger: Logger;
}

interface TrackedLog extends DeviceLog {
  lock: Promise<void>;
}

/**
 * Quote a CSV field when it would otherwise break the column layout
 */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatRow(event: DeviceEvent): string {
  return [
    escapeCsvField(event.timestamp),
    escapeCsvField(resolvePinName(event.pin)),
    escapeCsvField(event.state),
    String(event.timeDiffSeconds),
  ].join(',');
}

/**
 * File-name-safe form of a device name (no path separators or NUL)
 */
export function sanitizeDeviceName(deviceName: string): string {
  return deviceName.replace(/[/\\\0]/g, '_');
}

export class DeviceLogStore {
  private readonly outputDir: string;
  private readonly filePrefix: string;
  private readonly logger: Logger;
  private readonly logs = new Map<string, TrackedLog>();
  private outputDirReady = false;

  constructor(options: DeviceLogStoreOptions) {
    this.outputDir = options.outputDir;
    this.filePrefix = options.filePrefix;
    this.logger = options.logger;
  }

  getFilePath(deviceName: string): string {
    return path.join(this.outputDir, `${this.filePrefix}${sanitizeDeviceName(deviceName)}.csv`);
  }

  /**
   * Append one row for the device, writing the header first if needed
   * @throws PersistenceError when the file cannot be written
   */
  async append(deviceName: string, event: DeviceEvent): Promise<void> {
    const log = this.resolveLog(deviceName);

    const write = log.lock.then(() => this.writeRow(log, event));
    // Keep the chain alive after a failed write
    log.lock = write.catch(() => undefined);

    return write;
  }

  /**
   * Snapshot of every device log seen so far
   */
  getDeviceLogs(): DeviceLog[] {
    return Array.from(this.logs.values()).map(({ deviceName, filePath, headerWritten }) => ({
      deviceName,
      filePath,
      headerWritten,
    }));
  }

  private resolveLog(deviceName: string): TrackedLog {
    let log = this.logs.get(deviceName);
    if (!log) {
      log = {
        deviceName,
        filePath: this.getFilePath(deviceName),
        headerWritten: false,
        lock: Promise.resolve(),
      };
      this.logs.set(deviceName, log);

      this.logger.info(`Tracking log file for ${deviceName}: ${log.filePath}`, {
        component: LogComponents.STORE,
      });
    }
    return log;
  }

  private async writeRow(log: TrackedLog, event: DeviceEvent): Promise<void> {
    try {
      await this.ensureOutputDir();

      const needsHeader = !log.headerWritten && (await this.isMissingOrEmpty(log.filePath));
      if (!needsHeader) {
        // Header already present, possibly from an earlier run
        log.headerWritten = true;
      }

      const row = formatRow(event);
      const chunk = needsHeader ? `${CSV_HEADER}\n${row}\n` : `${row}\n`;

      await fs.appendFile(log.filePath, chunk, 'utf8');

      if (needsHeader) {
        log.headerWritten = true;
        this.logger.info(`Created log file for ${log.deviceName}`, {
          component: LogComponents.STORE,
          filePath: log.filePath,
        });
      }

      this.logger.debug(`Appended row for ${log.deviceName}`, {
        component: LogComponents.STORE,
        pin: event.pin,
        state: event.state,
      });
    } catch (error) {
      // Re-create the directory on the next write in case it was removed
      this.outputDirReady = false;

      const persistenceError = new PersistenceError(log.deviceName, log.filePath, error);
      this.logger.error(persistenceError.message, {
        component: LogComponents.STORE,
        deviceName: log.deviceName,
      });
      throw persistenceError;
    }
  }

  private async ensureOutputDir(): Promise<void> {
    if (this.outputDirReady) {
      return;
    }

    await fs.mkdir(this.outputDir, { recursive: true });
    this.outputDirReady = true;
  }

  private async isMissingOrEmpty(filePath: string): Promise<boolean> {
    try {
      const stats = await fs.stat(filePath);
      return stats.size === 0;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return true;
      }
      throw error;
    }
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
