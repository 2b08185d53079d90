import { describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import { existsSync, readFileSync, writeFileSync } from 'fs';
import path from 'path';
import {
  DEFAULT_CONFIG_CONTENT,
  createDefaultConfig,
  loadConfig,
  parseConfigFile,
} from '../../src/config';
import { ConfigError } from '../../src/errors';
import { createMockLogger, MockLogger } from '../helpers/mock-logger';
import { createTempDir, removeTempDir } from '../helpers/fixtures';

describe('parseConfigFile', () => {
  test('should group keys by section and strip whitespace', () => {
    const sections = parseConfigFile(
      ['[server]', '  host = 10.0.0.5 ', 'port=6000', '', '[data]', 'output_dir = /var/andon/ logs'].join('\n')
    );

    expect(sections.get('server')).toEqual(
      new Map([
        ['host', '10.0.0.5'],
        ['port', '6000'],
      ])
    );
    expect(sections.get('data')?.get('output_dir')).toBe('/var/andon/logs');
  });

  test('should skip comments and lines without a separator', () => {
    const sections = parseConfigFile(
      ['# comment', '[server]', '; another', 'port = 1', 'garbage', '#port = 2'].join('\r\n')
    );

    expect(sections.get('server')).toEqual(new Map([['port', '1']]));
  });

  test('should keep keys that appear before any section under the empty name', () => {
    const sections = parseConfigFile('port = 7000\n[server]\nhost = a\n');

    expect(sections.get('')?.get('port')).toBe('7000');
    expect(sections.get('server')?.get('host')).toBe('a');
  });

  test('should let a later value win', () => {
    const sections = parseConfigFile('[server]\nport = 1\nport = 2\n');

    expect(sections.get('server')?.get('port')).toBe('2');
  });
});

describe('loadConfig', () => {
  let tempDir: string;
  let configPath: string;
  let logger: MockLogger;

  beforeEach(() => {
    tempDir = createTempDir();
    configPath = path.join(tempDir, 'andon_server.conf');
    logger = createMockLogger();
  });

  afterEach(() => {
    removeTempDir(tempDir);
  });

  test('should write and use the default file when none exists', () => {
    const config = loadConfig({ filePath: configPath, env: {}, logger });

    expect(config).toEqual({
      host: '0.0.0.0',
      port: 5000,
      maxConnections: 50,
      outputDir: 'data',
      filePrefix: 'data_',
      idleTimeoutMs: 5000,
      maxMessageBytes: 65536,
      drainOnStop: false,
      healthPort: 0,
    });
    expect(readFileSync(configPath, 'utf8')).toBe(DEFAULT_CONFIG_CONTENT);
    expect(logger.info).toHaveBeenCalledWith(
      `Default configuration saved to ${configPath}`,
      expect.anything()
    );
  });

  test('should read values from the file', () => {
    writeFileSync(
      configPath,
      [
        '[server]',
        'host = 127.0.0.1',
        'port = 6001',
        'max_connections = 5',
        'idle_timeout_ms = 250',
        '[data]',
        'output_dir = records',
        'excel_prefix = line_',
        'drain_on_stop = yes',
      ].join('\n')
    );

    const config = loadConfig({ filePath: configPath, env: {}, logger });

    expect(config).toMatchObject({
      host: '127.0.0.1',
      port: 6001,
      maxConnections: 5,
      idleTimeoutMs: 250,
      outputDir: 'records',
      filePrefix: 'line_',
      drainOnStop: true,
    });
    expect(existsSync(configPath)).toBe(true);
  });

  test('should ignore keys in the wrong section', () => {
    writeFileSync(configPath, '[data]\nport = 9999\n');

    expect(loadConfig({ filePath: configPath, env: {}, logger }).port).toBe(5000);
  });

  test('should let environment variables override the file', () => {
    writeFileSync(configPath, '[server]\nport = 6001\n[data]\noutput_dir = records\n');

    const config = loadConfig({
      filePath: configPath,
      env: { ANDON_PORT: '7001', ANDON_OUTPUT_DIR: '', ANDON_DRAIN_ON_STOP: 'true', HEALTH_PORT: '8081' },
      logger,
    });

    expect(config.port).toBe(7001);
    expect(config.outputDir).toBe('records');
    expect(config.drainOnStop).toBe(true);
    expect(config.healthPort).toBe(8081);
  });

  test('should throw ConfigError naming the invalid field', () => {
    writeFileSync(configPath, '[server]\nport = 70000\n');

    expect(() => loadConfig({ filePath: configPath, env: {}, logger })).toThrow(ConfigError);
    expect(() => loadConfig({ filePath: configPath, env: {}, logger })).toThrow(/^Invalid configuration: port: /);
  });

  test('should reject an empty port instead of binding a random one', () => {
    writeFileSync(configPath, '[server]\nport =\n');

    expect(() => loadConfig({ filePath: configPath, env: {}, logger })).toThrow(
      'Invalid configuration: port: Expected a number, received an empty value'
    );
  });

  test('should reject a non-numeric connection limit', () => {
    expect(() =>
      loadConfig({ filePath: configPath, env: { ANDON_MAX_CONNECTIONS: 'many' }, logger })
    ).toThrow(ConfigError);
  });
});

describe('createDefaultConfig', () => {
  test('should report failure without throwing', () => {
    const tempDir = createTempDir();
    const logger = createMockLogger();

    try {
      const target = path.join(tempDir, 'missing', 'andon_server.conf');
      expect(createDefaultConfig(target, logger)).toBe(false);
      expect(logger.warn).toHaveBeenCalledTimes(1);
    } finally {
      removeTempDir(tempDir);
    }
  });
});
