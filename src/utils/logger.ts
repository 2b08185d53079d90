/**
 * Logger Configuration
 * Winston-based logging for the andon server
 */

import winston from 'winston';
import path from 'path';
import { mkdirSync } from 'fs';

const logLevel = process.env.LOG_LEVEL || 'info';
const logFormat = process.env.LOG_FORMAT || 'pretty'; // 'json' or 'pretty'
const logDir = process.env.LOG_DIR;

const prettyFormat = winston.format.printf(({ level, message, timestamp, service, component, ...metadata }) => {
  const prefix = component ? `[${component}] ` : '';
  const metaStr = Object.keys(metadata).length > 0
    ? ' ' + JSON.stringify(metadata)
    : '';

  return `${timestamp} [${level}]: ${prefix}${message}${metaStr}`;
});

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: logFormat === 'json'
      ? winston.format.json()
      : winston.format.combine(winston.format.colorize(), prettyFormat),
  }),
];

// File output only when a log directory is configured
if (logDir) {
  mkdirSync(logDir, { recursive: true });

  transports.push(
    new winston.transports.File({
      filename: path.join(logDir, 'error.log'),
      level: 'error',
      maxsize: 10485760, // 10MB
      maxFiles: 5,
    }),
    new winston.transports.File({
      filename: path.join(logDir, 'combined.log'),
      maxsize: 10485760, // 10MB
      maxFiles: 10,
      tailable: true,
    })
  );
}

const logger = winston.createLogger({
  level: logLevel,
  format: winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.json()
  ),
  defaultMeta: { service: 'andon-server' },
  transports,
});

export default logger;
export { logger };
