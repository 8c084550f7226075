import { describe, it, expect, vi } from 'vitest';
import { DateCache } from '../../core/data/DateCache.js';

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

describe('DateCache', () => {
  it('serves a stored value without calling the loader again', async () => {
    const cache = new DateCache<string>();
    const load = vi.fn().mockResolvedValue('first');

    await expect(cache.getOrFetch('stats', '2024-06-01', load)).resolves.toBe('first');
    await expect(cache.getOrFetch('stats', '2024-06-01', load)).resolves.toBe('first');

    expect(load).toHaveBeenCalledTimes(1);
    expect(cache.has('stats', '2024-06-01')).toBe(true);
  });

  it('keeps kinds and dates in separate entries', async () => {
    const cache = new DateCache<string>();
    await cache.getOrFetch('stats', '2024-06-01', async () => 'stats-1');
    await cache.getOrFetch('sleep', '2024-06-01', async () => 'sleep-1');
    await cache.getOrFetch('stats', '2024-06-02', async () => 'stats-2');

    expect(cache.size).toBe(3);
    expect(cache.has('sleep', '2024-06-02')).toBe(false);
    expect(cache.keys()).toEqual([
      { kind: 'stats', date: '2024-06-01' },
      { kind: 'sleep', date: '2024-06-01' },
      { kind: 'stats', date: '2024-06-02' },
    ]);
  });

  it('stores empty values like any other', async () => {
    const cache = new DateCache<string | null>();
    const load = vi.fn().mockResolvedValue(null);

    await cache.getOrFetch('sleep', '2024-06-01', load);
    await cache.getOrFetch('sleep', '2024-06-01', load);

    expect(load).toHaveBeenCalledTimes(1);
    expect(cache.has('sleep', '2024-06-01')).toBe(true);
  });

  it('does not store a failed load and propagates the same error', async () => {
    const cache = new DateCache<string>();
    const failure = new Error('remote down');
    const load = vi.fn().mockRejectedValueOnce(failure).mockResolvedValueOnce('recovered');

    await expect(cache.getOrFetch('stats', '2024-06-01', load)).rejects.toBe(failure);
    expect(cache.has('stats', '2024-06-01')).toBe(false);

    await expect(cache.getOrFetch('stats', '2024-06-01', load)).resolves.toBe('recovered');
    expect(load).toHaveBeenCalledTimes(2);
  });

  it('shares one in-flight load between concurrent callers', async () => {
    const cache = new DateCache<string>();
    const pending = deferred<string>();
    const load = vi.fn(() => pending.promise);

    const first = cache.getOrFetch('stats', '2024-06-01', load);
    const second = cache.getOrFetch('stats', '2024-06-01', load);
    pending.resolve('shared');

    await expect(Promise.all([first, second])).resolves.toEqual(['shared', 'shared']);
    expect(load).toHaveBeenCalledTimes(1);
  });

  it('does not repopulate after a clear that happened mid-load', async () => {
    const cache = new DateCache<string>();
    const pending = deferred<string>();

    const request = cache.getOrFetch('stats', '2024-06-01', () => pending.promise);
    cache.clear();
    pending.resolve('stale');

    await expect(request).resolves.toBe('stale');
    expect(cache.size).toBe(0);
  });

  it('clear is idempotent', () => {
    const cache = new DateCache<string>();
    cache.clear();
    cache.clear();
    expect(cache.size).toBe(0);
    expect(cache.keys()).toEqual([]);
  });
});
