/**
 * Health & stats HTTP API
 */

import express, { Request, Response, NextFunction } from 'express';
import type { Server } from 'http';
import { LogComponents } from '../utils/components';
import type { AndonServerStats } from '../andon-server';
import type { Logger } from '../types';

export interface HealthSource {
  isListening(): boolean;
  getStats(): AndonServerStats;
}

export function createHealthApp(source: HealthSource, logger: Logger): express.Application {
  const app = express();

  app.use((req, res, next) => {
    logger.debug(`${req.method} ${req.path}`, {
      component: LogComponents.HEALTH_API,
      ip: req.ip,
    });
    next();
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      service: 'andon-server',
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
    });
  });

  app.get('/ready', (_req: Request, res: Response) => {
    if (source.isListening()) {
      res.json({ status: 'ready', listening: true });
    } else {
      res.status(503).json({ status: 'not ready', listening: false });
    }
  });

  app.get('/api/stats', (_req: Request, res: Response) => {
    res.json(source.getStats());
  });

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Error handler
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    logger.error('Unhandled error', {
      component: LogComponents.HEALTH_API,
      error: err.message,
      path: req.path,
    });

    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

/**
 * Listen on the given port; rejects if the port cannot be bound
 */
export function startHealthServer(app: express.Application, port: number, logger: Logger): Promise<Server> {
  return new Promise<Server>((resolve, reject) => {
    const server = app.listen(port);

    const onError = (error: Error) => {
      logger.error(`Health API failed to listen on port ${port}: ${error.message}`, {
        component: LogComponents.HEALTH_API,
      });
      reject(error);
    };

    server.once('error', onError);
    server.once('listening', () => {
      server.removeListener('error', onError);
      server.on('error', (error: Error) => {
        logger.error(`Health API error: ${error.message}`, { component: LogComponents.HEALTH_API });
      });
      logger.info(`Health API listening on port ${port}`, { component: LogComponents.HEALTH_API });
      resolve(server);
    });
  });
}
