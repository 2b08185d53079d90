/**
 * Configuration Loader
 *
 * Reads the sectioned key/value file (andon_server.conf by default),
 * applies environment overrides and validates the result. A missing file is
 * replaced by a freshly written default one.
 *
 *   [server]                 [data]
 *   host = 0.0.0.0           output_dir = data
 *   port = 5000              excel_prefix = data_
 *   max_connections = 50
 */

import { existsSync, readFileSync, writeFileSync } from 'fs';
import { z } from 'zod';
import { ConfigError } from '../errors';
import { LogComponents } from '../utils/components';
import type { Logger, ServerConfig } from '../types';

export const DEFAULT_CONFIG_FILE = 'andon_server.conf';

export const DEFAULT_CONFIG_CONTENT = [
  '[server]',
  'host = 0.0.0.0',
  'port = 5000',
  'max_connections = 50',
  '',
  '[data]',
  'output_dir = data',
  'excel_prefix = data_',
  '',
].join('\n');

const booleanSetting = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0', 'yes', 'no'])])
  .transform((value) => value === true || value === 'true' || value === '1' || value === 'yes');

// Empty strings are rejected rather than coerced to 0
const numberSetting = (target: z.ZodNumber) =>
  z.union([z.number(), z.string().trim().min(1, 'Expected a number, received an empty value')]).pipe(target);

const portSetting = () => numberSetting(z.coerce.number().int().min(0).max(65535));
const limitSetting = () => numberSetting(z.coerce.number().int().positive());

export const ServerConfigSchema = z.object({
  host: z.string().min(1).default('0.0.0.0'),
  port: portSetting().default(5000),
  maxConnections: limitSetting().default(50),
  outputDir: z.string().min(1).default('data'),
  filePrefix: z.string().default('data_'),
  idleTimeoutMs: limitSetting().default(5000),
  maxMessageBytes: limitSetting().default(64 * 1024),
  drainOnStop: booleanSetting.default(false),
  healthPort: portSetting().default(0),
});

type ConfigKey = keyof ServerConfig;
type RawConfig = Partial<Record<ConfigKey, string>>;

// [section] key -> config field
const FILE_KEYS: Record<string, Record<string, ConfigKey>> = {
  server: {
    host: 'host',
    port: 'port',
    max_connections: 'maxConnections',
    idle_timeout_ms: 'idleTimeoutMs',
    max_message_bytes: 'maxMessageBytes',
    health_port: 'healthPort',
  },
  data: {
    output_dir: 'outputDir',
    excel_prefix: 'filePrefix',
    drain_on_stop: 'drainOnStop',
  },
};

const ENV_KEYS: Record<string, ConfigKey> = {
  ANDON_HOST: 'host',
  ANDON_PORT: 'port',
  ANDON_MAX_CONNECTIONS: 'maxConnections',
  ANDON_OUTPUT_DIR: 'outputDir',
  ANDON_FILE_PREFIX: 'filePrefix',
  ANDON_IDLE_TIMEOUT_MS: 'idleTimeoutMs',
  ANDON_MAX_MESSAGE_BYTES: 'maxMessageBytes',
  ANDON_DRAIN_ON_STOP: 'drainOnStop',
  HEALTH_PORT: 'healthPort',
};

export type ConfigSections = Map<string, Map<string, string>>;

/**
 * Parse `[section]` / `key=value` text. All whitespace is removed from each
 * line first; blank lines and lines starting with '#' or ';' are skipped.
 */
export function parseConfigFile(text: string): ConfigSections {
  const sections: ConfigSections = new Map();
  let current = '';

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.replace(/\s+/g, '');

    if (line === '' || line.startsWith('#') || line.startsWith(';')) {
      continue;
    }

    if (line.startsWith('[') && line.endsWith(']')) {
      current = line.slice(1, -1);
      continue;
    }

    const eq = line.indexOf('=');
    if (eq === -1) {
      continue;
    }

    let section = sections.get(current);
    if (!section) {
      section = new Map();
      sections.set(current, section);
    }
    section.set(line.slice(0, eq), line.slice(eq + 1));
  }

  return sections;
}

function fromSections(sections: ConfigSections): RawConfig {
  const raw: RawConfig = {};

  for (const [sectionName, keys] of Object.entries(FILE_KEYS)) {
    const section = sections.get(sectionName);
    if (!section) {
      continue;
    }
    for (const [fileKey, configKey] of Object.entries(keys)) {
      const value = section.get(fileKey);
      if (value !== undefined) {
        raw[configKey] = value;
      }
    }
  }

  return raw;
}

function fromEnv(env: NodeJS.ProcessEnv): RawConfig {
  const raw: RawConfig = {};

  for (const [envKey, configKey] of Object.entries(ENV_KEYS)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      raw[configKey] = value;
    }
  }

  return raw;
}

/**
 * Write the default configuration file. Failure is logged, not thrown.
 */
export function createDefaultConfig(filePath: string, logger?: Logger): boolean {
  try {
    writeFileSync(filePath, DEFAULT_CONFIG_CONTENT, 'utf8');
    logger?.info(`Default configuration saved to ${filePath}`, { component: LogComponents.CONFIG });
    return true;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger?.warn(`Could not write default configuration to ${filePath}: ${message}`, {
      component: LogComponents.CONFIG,
    });
    return false;
  }
}

export interface LoadConfigOptions {
  filePath?: string;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

/**
 * Load, merge and validate configuration
 * @throws ConfigError when a value fails validation
 */
export function loadConfig(options: LoadConfigOptions = {}): ServerConfig {
  const filePath = options.filePath ?? DEFAULT_CONFIG_FILE;
  const env = options.env ?? process.env;
  const logger = options.logger;

  let fileConfig: RawConfig = {};

  if (existsSync(filePath)) {
    fileConfig = fromSections(parseConfigFile(readFileSync(filePath, 'utf8')));
    logger?.info(`Configuration loaded from ${filePath}`, { component: LogComponents.CONFIG });
  } else {
    logger?.info('Config file not found, using default configuration', {
      component: LogComponents.CONFIG,
    });
    createDefaultConfig(filePath, logger);
  }

  const parsed = ServerConfigSchema.safeParse({ ...fileConfig, ...fromEnv(env) });

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(details);
  }

  return parsed.data;
}
