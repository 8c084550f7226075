import pino from 'pino';

const SERVICE_NAME = 'garmin-insights';

let processCorrelationId: string | undefined;

export function generateCorrelationId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

function resolveCorrelationId(): string {
  if (!processCorrelationId) {
    processCorrelationId = generateCorrelationId();
  }
  return processCorrelationId;
}

function buildRootLogger(): pino.Logger {
  const level = process.env.LOG_LEVEL || 'info';
  const options: pino.LoggerOptions =
    process.env.NODE_ENV === 'development'
      ? {
          level,
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
            },
          },
        }
      : { level };

  return pino(options).child({ service: SERVICE_NAME });
}

let rootLogger: pino.Logger | undefined;

export function createLogger(context?: Record<string, unknown>): pino.Logger {
  if (!rootLogger) {
    rootLogger = buildRootLogger();
  }

  return rootLogger.child({
    correlationId: resolveCorrelationId(),
    ...context,
  });
}
