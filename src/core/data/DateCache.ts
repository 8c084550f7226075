export type DataKind = 'stats' | 'sleep';

export interface CacheKey {
  kind: DataKind;
  date: string;
}

interface CacheEntry<T> {
  key: CacheKey;
  value: T;
}

function toKey(kind: DataKind, date: string): string {
  return `${kind}:${date}`;
}

/**
 * Results keyed by (kind, date). Values are stored as returned, empty ones
 * included; rejected fetches leave no entry behind.
 */
export class DateCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly inFlight = new Map<string, Promise<T>>();
  // Bumped on clear so fetches started before it cannot repopulate the cache.
  private generation = 0;

  get size(): number {
    return this.entries.size;
  }

  has(kind: DataKind, date: string): boolean {
    return this.entries.has(toKey(kind, date));
  }

  keys(): CacheKey[] {
    return [...this.entries.values()].map((entry) => ({ ...entry.key }));
  }

  async getOrFetch(kind: DataKind, date: string, load: () => Promise<T>): Promise<T> {
    const key = toKey(kind, date);
    const cached = this.entries.get(key);
    if (cached) {
      return cached.value;
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }

    const generation = this.generation;
    const request = load()
      .then((value) => {
        if (generation === this.generation) {
          this.entries.set(key, { key: { kind, date }, value });
        }
        return value;
      })
      .finally(() => {
        if (this.inFlight.get(key) === request) {
          this.inFlight.delete(key);
        }
      });

    this.inFlight.set(key, request);
    return request;
  }

  clear(): void {
    this.generation += 1;
    this.entries.clear();
    this.inFlight.clear();
  }
}
