import type { FitnessDocument, FitnessServicePort } from '../../ports/FitnessServicePort.js';
import type { SessionManager } from './SessionManager.js';
import { DateCache, type DataKind } from './DateCache.js';
import { createLogger } from '../../utils/logger.js';
import { getTodayDate } from '../../utils/dates.js';

export interface CacheInfo {
  /** The instance date used when callers omit one. */
  date: string;
  /** Whether a daily summary for `date` is cached. */
  stats: boolean;
  /** Whether sleep data for `date` is cached. */
  sleep: boolean;
  entries: number;
}

export interface RefreshedData {
  date: string;
  stats: FitnessDocument | null;
  sleep: FitnessDocument | null;
}

/** What insight calculators and routes need from the data layer. */
export interface HealthDataAccess {
  readonly date: string;
  readonly cacheInfo: CacheInfo;
  getStats(date?: string): Promise<FitnessDocument | null>;
  getSleep(date?: string): Promise<FitnessDocument | null>;
  clearCache(): void;
  updateDate(date: string): void;
  refreshData(date?: string): Promise<RefreshedData>;
}

export interface HealthDataServiceOptions {
  /** Explicit instance date (YYYY-MM-DD); defaults to today in `timezone`. */
  date?: string;
  timezone?: string;
}

export class HealthDataService<TSession> implements HealthDataAccess {
  private readonly logger = createLogger({ service: 'HealthDataService' });
  private readonly cache = new DateCache<FitnessDocument | null>();
  private instanceDate: string;

  constructor(
    private readonly sessions: SessionManager<TSession>,
    private readonly service: FitnessServicePort<TSession>,
    options: HealthDataServiceOptions = {}
  ) {
    this.instanceDate = options.date ?? getTodayDate(options.timezone ?? 'UTC');
  }

  get date(): string {
    return this.instanceDate;
  }

  get cacheInfo(): CacheInfo {
    return {
      date: this.instanceDate,
      stats: this.cache.has('stats', this.instanceDate),
      sleep: this.cache.has('sleep', this.instanceDate),
      entries: this.cache.size,
    };
  }

  async getStats(date?: string): Promise<FitnessDocument | null> {
    return this.load('stats', date ?? this.instanceDate);
  }

  async getSleep(date?: string): Promise<FitnessDocument | null> {
    return this.load('sleep', date ?? this.instanceDate);
  }

  clearCache(): void {
    this.cache.clear();
    this.logger.debug('Cache cleared');
  }

  updateDate(date: string): void {
    this.logger.debug({ from: this.instanceDate, to: date }, 'Updating instance date');
    this.instanceDate = date;
    this.clearCache();
  }

  async refreshData(date?: string): Promise<RefreshedData> {
    const target = date ?? this.instanceDate;
    this.clearCache();
    const stats = await this.getStats(target);
    const sleep = await this.getSleep(target);
    return { date: target, stats, sleep };
  }

  private async load(kind: DataKind, date: string): Promise<FitnessDocument | null> {
    const logger = this.logger.child({ kind, date });
    if (this.cache.has(kind, date)) {
      logger.debug('Cache hit');
    }

    return this.cache.getOrFetch(kind, date, async () => {
      const session = await this.sessions.getSession();
      try {
        logger.info(kind === 'stats' ? 'Fetching stats' : 'Fetching sleep data');
        return kind === 'stats'
          ? await this.service.fetchDailySummary(session, date)
          : await this.service.fetchSleepData(session, date);
      } catch (error) {
        logger.error({ error }, 'Error fetching Garmin data');
        throw error;
      }
    });
  }
}
