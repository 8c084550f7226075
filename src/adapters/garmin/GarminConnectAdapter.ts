import garminConnect from 'garmin-connect';
import type { GarminConnect } from 'garmin-connect';
import { mkdir } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import type {
  FitnessCredentials,
  FitnessDocument,
  FitnessServicePort,
} from '../../ports/FitnessServicePort.js';
import { createLogger } from '../../utils/logger.js';
import { RemoteFetchError } from '../../utils/errors.js';

const CONNECT_API = 'https://connectapi.garmin.com';

const documentSchema = z.record(z.unknown()).nullable();

export interface GarminSession {
  client: GarminConnect;
  displayName: string;
}

export type GarminClientFactory = (credentials: FitnessCredentials) => GarminConnect;

const defaultClientFactory: GarminClientFactory = (credentials) =>
  new garminConnect.GarminConnect({
    username: credentials.email,
    password: credentials.password,
  });

export function expandHomePath(location: string): string {
  if (location === '~') return homedir();
  if (location.startsWith('~/')) return join(homedir(), location.slice(2));
  return location;
}

export class GarminConnectAdapter implements FitnessServicePort<GarminSession> {
  private readonly logger = createLogger({ adapter: 'GarminConnectAdapter' });

  constructor(private readonly createClient: GarminClientFactory = defaultClientFactory) {}

  async authenticate(credentials: FitnessCredentials): Promise<GarminSession> {
    const logger = this.logger.child({ method: 'authenticate' });
    logger.info('Logging in to Garmin Connect');

    const client = this.createClient(credentials);
    await client.login();
    const profile = await client.getUserProfile();

    logger.info({ displayName: profile.displayName }, 'Garmin Connect login succeeded');
    return { client, displayName: profile.displayName };
  }

  async persistSession(session: GarminSession, location: string): Promise<void> {
    const directory = expandHomePath(location);
    await mkdir(directory, { recursive: true });
    session.client.exportTokenToFile(directory);
    this.logger.debug({ directory }, 'Saved Garmin session tokens');
  }

  async fetchDailySummary(session: GarminSession, date: string): Promise<FitnessDocument | null> {
    const url = new URL(
      `${CONNECT_API}/usersummary-service/usersummary/daily/${encodeURIComponent(session.displayName)}`
    );
    url.searchParams.set('calendarDate', date);
    return this.fetchDocument(session, url, 'daily summary');
  }

  async fetchSleepData(session: GarminSession, date: string): Promise<FitnessDocument | null> {
    const url = new URL(
      `${CONNECT_API}/wellness-service/wellness/dailySleepData/${encodeURIComponent(session.displayName)}`
    );
    url.searchParams.set('date', date);
    url.searchParams.set('nonSleepBufferMinutes', '60');
    return this.fetchDocument(session, url, 'sleep data');
  }

  private async fetchDocument(
    session: GarminSession,
    url: URL,
    label: string
  ): Promise<FitnessDocument | null> {
    const logger = this.logger.child({ method: 'fetchDocument', label });

    let response: unknown;
    try {
      response = await session.client.get(url.toString());
    } catch (error) {
      logger.error({ error }, `Garmin ${label} request failed`);
      throw new RemoteFetchError(`Failed to fetch Garmin ${label}`, { cause: error });
    }

    const parsed = documentSchema.safeParse(response ?? null);
    if (!parsed.success) {
      logger.error({ issues: parsed.error.issues }, `Unexpected Garmin ${label} response`);
      throw new RemoteFetchError(`Unexpected Garmin ${label} response shape`, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }
}
