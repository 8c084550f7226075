/**
 * Live check of the Garmin data layer using real credentials.
 * Run with: npx tsx scripts/check-garmin-live.ts [YYYY-MM-DD]
 */
import 'dotenv/config';
import { config } from '../src/config/index.js';
import { GarminConnectAdapter } from '../src/adapters/garmin/GarminConnectAdapter.js';
import { SessionManager } from '../src/core/data/SessionManager.js';
import { HealthDataService } from '../src/core/data/HealthDataService.js';
import { isCalendarDate } from '../src/utils/dates.js';

async function main() {
  console.log('='.repeat(60));
  console.log('LIVE GARMIN DATA CHECK');
  console.log('='.repeat(60));

  const dateArg = process.argv[2];
  if (dateArg && !isCalendarDate(dateArg)) {
    console.error(`Invalid date: ${dateArg} (expected YYYY-MM-DD)`);
    process.exit(1);
  }

  const garmin = new GarminConnectAdapter();
  const sessions = new SessionManager(garmin, {
    email: config.garminEmail,
    password: config.garminPassword,
    tokenDir: config.garthHome,
  });
  const data = new HealthDataService(sessions, garmin, {
    date: dateArg,
    timezone: config.timezone,
  });

  console.log(`Date: ${data.date}`);
  console.log(`Token directory: ${config.garthHome}`);
  console.log();

  const stats = await data.getStats();
  console.log(`Daily summary keys: ${stats ? Object.keys(stats).length : 0}`);
  console.log(`  totalSteps: ${String(stats?.totalSteps ?? 'n/a')}`);

  const sleep = await data.getSleep();
  console.log(`Sleep data keys: ${sleep ? Object.keys(sleep).join(', ') : 'none'}`);

  // Second read must come from the cache
  await data.getStats();
  console.log();
  console.log('Cache info:', data.cacheInfo);
}

main().catch((error) => {
  console.error('Live check failed:', error);
  process.exit(1);
});
