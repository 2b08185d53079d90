/**
 * Logging Component Names
 *
 * Usage:
 *   logger.info('Event persisted', { component: LogComponents.WORKER });
 */

export const LogComponents = {
  SERVER: 'AndonServer',
  LISTENER: 'Listener',
  CONNECTION: 'Connection',
  WORKER: 'PersistenceWorker',
  STORE: 'DeviceLogStore',
  CONFIG: 'Config',
  HEALTH_API: 'HealthAPI',
} as const;

export type LogComponent = typeof LogComponents[keyof typeof LogComponents];
