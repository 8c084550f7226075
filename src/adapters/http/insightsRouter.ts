import type { Request, Router } from 'express';
import express from 'express';
import { z } from 'zod';
import type { DataKind } from '../../core/data/DateCache.js';
import type { HealthDataAccess } from '../../core/data/HealthDataService.js';
import { activityInsights, extractActivityData } from '../../core/insights/activityInsights.js';
import { extractSleepData, sleepInsights } from '../../core/insights/sleepInsights.js';
import type { Metric } from '../../core/insights/metrics.js';
import type { FitnessDocument } from '../../ports/FitnessServicePort.js';
import { getMinutesSinceMidnight, isCalendarDate } from '../../utils/dates.js';
import { InvalidRequestError, errorMessage } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import { loadDocument } from './loadDocument.js';

export type DataServiceFactory = (options: { date?: string }) => HealthDataAccess;

export interface InsightsRouterOptions {
  createDataService: DataServiceFactory;
  timezone: string;
  now?: () => Date;
}

type DocumentInsight = (document: FitnessDocument) => Metric;

const querySchema = z.object({
  date: z
    .string()
    .refine(isCalendarDate, { message: 'date must be a calendar date in YYYY-MM-DD format' })
    .optional(),
});

function parseDateQuery(req: Request): string | undefined {
  const parsed = querySchema.safeParse(req.query);
  if (!parsed.success) {
    throw new InvalidRequestError(parsed.error.issues.map((issue) => issue.message).join('; '));
  }
  return parsed.data.date;
}

function createInsightsRouter(
  kind: DataKind,
  insights: Record<string, DocumentInsight>,
  createDataService: DataServiceFactory
): Router {
  const logger = createLogger({ component: 'insightsRouter', kind });
  const router = express.Router();

  router.get('/health', async (req, res, next) => {
    let date: string | undefined;
    try {
      date = parseDateQuery(req);
    } catch (error) {
      next(error);
      return;
    }

    const data = createDataService({ date });
    try {
      const document = await loadDocument(data, kind);
      res.status(200).json({
        status: 'healthy',
        cache: data.cacheInfo,
        dataKeys: Object.keys(document),
      });
    } catch (error) {
      logger.warn({ error }, 'Health check failed');
      res.status(503).json({
        status: 'unhealthy',
        error: errorMessage(error),
        cache: data.cacheInfo,
      });
    }
  });

  for (const [name, insight] of Object.entries(insights)) {
    router.get(`/${name}`, async (req, res, next) => {
      try {
        const date = parseDateQuery(req);
        const document = await loadDocument(createDataService({ date }), kind);
        res.status(200).json(insight(document));
      } catch (error) {
        next(error);
      }
    });
  }

  return router;
}

export function createActivityRouter(options: InsightsRouterOptions): Router {
  const now = options.now ?? (() => new Date());
  const insights = Object.fromEntries(
    Object.entries(activityInsights).map(([name, insight]): [string, DocumentInsight] => [
      name,
      (document) =>
        insight(extractActivityData(document), {
          minutesSinceMidnight: getMinutesSinceMidnight(options.timezone, now()),
        }),
    ])
  );
  return createInsightsRouter('stats', insights, options.createDataService);
}

export function createSleepRouter(options: InsightsRouterOptions): Router {
  const insights = Object.fromEntries(
    Object.entries(sleepInsights).map(([name, insight]): [string, DocumentInsight] => [
      name,
      (document) => insight(extractSleepData(document)),
    ])
  );
  return createInsightsRouter('sleep', insights, options.createDataService);
}

export const ACTIVITY_ENDPOINTS = Object.keys(activityInsights);
export const SLEEP_ENDPOINTS = Object.keys(sleepInsights);
