/**
 * Andon Server - Device Event Ingestion Service
 *
 * Accepts one JSON event per TCP connection from andon / GPIO monitor
 * devices and appends it to a per-device CSV log.
 *
 * Features:
 * - Sectioned config file with environment overrides
 * - Single-writer persistence queue
 * - Optional health/stats HTTP endpoint
 * - Graceful shutdown on SIGTERM / SIGINT
 */

import dotenv from 'dotenv';
import type { Server } from 'http';
import { loadConfig } from './config';
import { AndonServer } from './andon-server';
import { createHealthApp, startHealthServer } from './api/health';
import logger from './utils/logger';

dotenv.config();

async function main(): Promise<void> {
  const config = loadConfig({ filePath: process.env.ANDON_CONFIG, logger });
  const controller = new AbortController();
  const server = new AndonServer({ config, logger });

  let healthServer: Server | null = null;

  const shutdown = async (signal: string): Promise<void> => {
    if (controller.signal.aborted) {
      return;
    }
    logger.info(`${signal} signal received, starting graceful shutdown...`);
    controller.abort();

    healthServer?.close(() => {
      logger.info('Health API closed');
    });

    await server.stopped();
    logger.info('All resources cleaned up');
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  await server.start(controller.signal);
  logger.info(`Ready to handle up to ${config.maxConnections} concurrent connections`);

  if (config.healthPort > 0) {
    try {
      healthServer = await startHealthServer(createHealthApp(server, logger), config.healthPort, logger);
    } catch (error) {
      controller.abort();
      await server.stopped();
      throw error;
    }
  }
}

main().catch((error: unknown) => {
  logger.error('Failed to start andon server', {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
