// Load environment variables first
import 'dotenv/config';

import { config } from './config/index.js';
import { createLogger } from './utils/logger.js';
import { GarminConnectAdapter } from './adapters/garmin/GarminConnectAdapter.js';
import { SessionManager } from './core/data/SessionManager.js';
import { HealthDataService } from './core/data/HealthDataService.js';
import { startServer } from './server.js';

const logger = createLogger({ component: 'index' });

async function main(): Promise<void> {
  logger.info('Starting Garmin Insights API');

  try {
    const garmin = new GarminConnectAdapter();
    // One session per process; every request gets its own cache.
    const sessionManager = new SessionManager(garmin, {
      email: config.garminEmail,
      password: config.garminPassword,
      tokenDir: config.garthHome,
    });

    if (!config.garminEmail || !config.garminPassword) {
      logger.warn('Garmin credentials not configured; insight endpoints will fail until they are set');
    }

    await startServer(
      {
        createDataService: ({ date }) =>
          new HealthDataService(sessionManager, garmin, { date, timezone: config.timezone }),
        timezone: config.timezone,
      },
      config.port,
      config.host
    );

    logger.info({ host: config.host, port: config.port }, 'Server started successfully');
  } catch (error) {
    logger.error({ error }, 'Failed to start application');
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('Unhandled error:', error);
  process.exit(1);
});
