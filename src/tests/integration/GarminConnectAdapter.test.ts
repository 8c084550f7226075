import { describe, it, expect, vi, beforeEach } from 'vitest';
import { homedir, tmpdir } from 'node:os';
import { join } from 'node:path';
import { GarminConnectAdapter, expandHomePath } from '../../adapters/garmin/GarminConnectAdapter.js';
import { RemoteFetchError } from '../../utils/errors.js';

const mocks = vi.hoisted(() => {
  const client = {
    login: vi.fn(),
    getUserProfile: vi.fn(),
    exportTokenToFile: vi.fn(),
    get: vi.fn(),
  };
  return {
    client,
    GarminConnect: vi.fn(function () {
      return client;
    }),
  };
});

// Mock garmin-connect
vi.mock('garmin-connect', () => ({
  default: { GarminConnect: mocks.GarminConnect },
}));

const credentials = { email: 'runner@example.com', password: 'test-password' };

describe('GarminConnectAdapter', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mocks.client.login.mockResolvedValue(mocks.client);
    mocks.client.getUserProfile.mockResolvedValue({ displayName: 'runner-1' });
  });

  it('logs in with the configured credentials', async () => {
    const adapter = new GarminConnectAdapter();
    const session = await adapter.authenticate(credentials);

    expect(mocks.GarminConnect).toHaveBeenCalledWith({
      username: 'runner@example.com',
      password: 'test-password',
    });
    expect(mocks.client.login).toHaveBeenCalledTimes(1);
    expect(session.displayName).toBe('runner-1');
  });

  it('propagates login failures', async () => {
    mocks.client.login.mockRejectedValueOnce(new Error('Invalid credentials'));
    const adapter = new GarminConnectAdapter();

    await expect(adapter.authenticate(credentials)).rejects.toThrow('Invalid credentials');
  });

  it('requests the daily summary for the account and date', async () => {
    mocks.client.get.mockResolvedValueOnce({ totalSteps: 5000 });
    const adapter = new GarminConnectAdapter();
    const session = await adapter.authenticate(credentials);

    const document = await adapter.fetchDailySummary(session, '2024-06-01');

    expect(document).toEqual({ totalSteps: 5000 });
    expect(mocks.client.get).toHaveBeenCalledWith(
      'https://connectapi.garmin.com/usersummary-service/usersummary/daily/runner-1?calendarDate=2024-06-01'
    );
  });

  it('requests sleep data for the account and date', async () => {
    mocks.client.get.mockResolvedValueOnce({ dailySleepDTO: { sleepTimeSeconds: 28800 } });
    const adapter = new GarminConnectAdapter();
    const session = await adapter.authenticate(credentials);

    await adapter.fetchSleepData(session, '2024-06-01');

    expect(mocks.client.get).toHaveBeenCalledWith(
      'https://connectapi.garmin.com/wellness-service/wellness/dailySleepData/runner-1?date=2024-06-01&nonSleepBufferMinutes=60'
    );
  });

  it('returns null when the service answers with nothing', async () => {
    mocks.client.get.mockResolvedValueOnce(undefined);
    const adapter = new GarminConnectAdapter();
    const session = await adapter.authenticate(credentials);

    await expect(adapter.fetchSleepData(session, '2024-06-01')).resolves.toBeNull();
  });

  it('wraps request failures in RemoteFetchError', async () => {
    const failure = new Error('socket hang up');
    mocks.client.get.mockRejectedValueOnce(failure);
    const adapter = new GarminConnectAdapter();
    const session = await adapter.authenticate(credentials);

    const error: unknown = await adapter.fetchDailySummary(session, '2024-06-01').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(RemoteFetchError);
    expect(error).toMatchObject({ message: 'Failed to fetch Garmin daily summary', cause: failure });
  });

  it('rejects responses that are not JSON objects', async () => {
    mocks.client.get.mockResolvedValueOnce([1, 2, 3]);
    const adapter = new GarminConnectAdapter();
    const session = await adapter.authenticate(credentials);

    await expect(adapter.fetchDailySummary(session, '2024-06-01')).rejects.toThrow(
      'Unexpected Garmin daily summary response shape'
    );
  });

  it('exports session tokens into the expanded directory', async () => {
    const adapter = new GarminConnectAdapter();
    const session = await adapter.authenticate(credentials);
    const directory = join(tmpdir(), `garmin-insights-test-${process.pid}`);

    await adapter.persistSession(session, directory);

    expect(mocks.client.exportTokenToFile).toHaveBeenCalledWith(directory);
  });
});

describe('expandHomePath', () => {
  it('expands a leading tilde', () => {
    expect(expandHomePath('~/.garth')).toBe(join(homedir(), '.garth'));
    expect(expandHomePath('~')).toBe(homedir());
    expect(expandHomePath('/var/lib/garth')).toBe('/var/lib/garth');
  });
});
