import express from 'express';
import type { Server } from 'node:http';
import { createLogger, generateCorrelationId } from './utils/logger.js';
import { InsightsError } from './utils/errors.js';
import {
  ACTIVITY_ENDPOINTS,
  SLEEP_ENDPOINTS,
  createActivityRouter,
  createSleepRouter,
  type InsightsRouterOptions,
} from './adapters/http/insightsRouter.js';

const logger = createLogger({ component: 'server' });

const API_VERSION = '0.1.0';

export function createApp(options: InsightsRouterOptions): express.Express {
  const app = express();

  // Request logging middleware
  app.use((req, _res, next) => {
    logger.info(
      { method: req.method, path: req.path, requestId: generateCorrelationId() },
      'Incoming request'
    );
    next();
  });

  app.get('/', (_req, res) => {
    res.status(200).json({
      message: 'Garmin Insights API',
      version: API_VERSION,
      endpoints: {
        activity: ACTIVITY_ENDPOINTS.map((name) => `/insights/activity/${name}`),
        sleep: SLEEP_ENDPOINTS.map((name) => `/insights/sleep/${name}`),
        health: ['/health', '/insights/activity/health', '/insights/sleep/health'],
      },
    });
  });

  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'healthy' });
  });

  app.use('/insights/activity', createActivityRouter(options));
  app.use('/insights/sleep', createSleepRouter(options));

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found', code: 'NOT_FOUND' });
  });

  // Error handling
  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (err instanceof InsightsError) {
      if (err.statusCode >= 500) {
        logger.error({ error: err }, 'Request failed');
      }
      res.status(err.statusCode).json({ error: err.message, code: err.code });
      return;
    }
    logger.error({ error: err }, 'Unhandled error in Express');
    res.status(500).json({ error: 'Internal server error', code: 'INTERNAL_ERROR' });
  });

  return app;
}

export async function startServer(
  options: InsightsRouterOptions,
  port: number,
  host: string = '0.0.0.0'
): Promise<Server> {
  const app = createApp(options);

  return new Promise((resolve) => {
    const server = app.listen(port, host, () => {
      logger.info({ host, port }, 'HTTP server started');
      resolve(server);
    });
  });
}
