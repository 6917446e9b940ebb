import { describe, it, expect, vi, type Mock } from 'vitest';
import { CacheLayer, SourceFetchError, noopLogger, type Logger } from '../src';

function createClock(start = 1_000_000) {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
}

function createLogger(): Logger & { debug: Mock; warn: Mock } {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

/**
 * Promise plus the functions settling it, to hold a fetch open.
 */
function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((resolvePromise, rejectPromise) => {
    resolve = resolvePromise;
    reject = rejectPromise;
  });
  return { promise, resolve, reject };
}


describe('CacheLayer - Freshness', () => {
  it('fetches once and serves fresh values until the TTL passes', async () => {
    const clock = createClock();
    const cache = new CacheLayer<string>({ now: clock.now, logger: noopLogger });
    const fetchFn = vi.fn(async () => 'v1');

    const first = await cache.getOrFetch('k', fetchFn, 1000);
    clock.advance(999);
    const second = await cache.getOrFetch('k', fetchFn, 1000);

    expect(first).toEqual({ value: 'v1', status: 'fetched', degraded: false, storedAt: 1_000_000 });
    expect(second).toEqual({ value: 'v1', status: 'fresh', degraded: false, storedAt: 1_000_000 });
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });


  it('refetches once the TTL has elapsed', async () => {
    const clock = createClock();
    const cache = new CacheLayer<number>({ now: clock.now, logger: noopLogger });
    let calls = 0;
    const fetchFn = () => ++calls;

    await cache.getOrFetch('k', fetchFn, 1000);
    clock.advance(1000);
    const lookup = await cache.getOrFetch('k', fetchFn, 1000);

    expect(lookup.value).toBe(2);
    expect(lookup.status).toBe('fetched');
    expect(lookup.storedAt).toBe(1_001_000);
  });


  it('uses the default TTL of one hour', async () => {
    const clock = createClock();
    const cache = new CacheLayer<string>({ now: clock.now, logger: noopLogger });

    await cache.getOrFetch('k', () => 'v1');
    expect(cache.peek('k')?.ttlMs).toBe(60 * 60 * 1000);

    clock.advance(60 * 60 * 1000 - 1);
    expect(cache.peek('k')?.expired).toBe(false);
    clock.advance(1);
    expect(cache.peek('k')?.expired).toBe(true);
  });


  it('keeps keys independent', async () => {
    const cache = new CacheLayer<string>({ logger: noopLogger });

    await cache.getOrFetch('a', () => 'A');
    await cache.getOrFetch('b', () => 'B');

    expect(cache.peek('a')?.value).toBe('A');
    expect(cache.peek('b')?.value).toBe('B');
  });
});


describe('CacheLayer - Stampede control', () => {
  it('shares one fetch between concurrent callers on an empty key', async () => {
    const cache = new CacheLayer<string[]>({ logger: noopLogger });
    const pending = deferred<string[]>();
    const fetchFn = vi.fn(() => pending.promise);

    const lookups = Array.from({ length: 10 }, () => cache.getOrFetch('k', fetchFn));
    pending.resolve(['x']);
    const results = await Promise.all(lookups);

    expect(fetchFn).toHaveBeenCalledTimes(1);
    for (const result of results) {
      expect(result.value).toBe(results[0].value);
      expect(result.status).toBe('fetched');
    }
  });


  it('shares the failure too', async () => {
    const cache = new CacheLayer<string>({ logger: noopLogger });
    const fetchFn = vi.fn(async (): Promise<string> => {
      throw new Error('down');
    });

    const results = await Promise.allSettled([
      cache.getOrFetch('k', fetchFn),
      cache.getOrFetch('k', fetchFn),
    ]);

    for (const result of results) {
      expect(result.status).toBe('rejected');
      if (result.status === 'rejected') {
        expect(result.reason).toBeInstanceOf(SourceFetchError);
      }
    }
    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(cache.peek('k')).toBeUndefined();
  });


  it('serves the stale value to callers arriving during a refetch', async () => {
    const clock = createClock();
    const cache = new CacheLayer<string>({ now: clock.now, logger: noopLogger });
    await cache.getOrFetch('k', () => 'old', 1000);
    clock.advance(5000);

    const pending = deferred<string>();
    const refetch = cache.getOrFetch('k', () => pending.promise, 1000);
    const during = await cache.getOrFetch('k', () => 'never', 1000);

    expect(during).toEqual({ value: 'old', status: 'stale', degraded: false, storedAt: 1_000_000 });

    pending.resolve('new');
    expect((await refetch).value).toBe('new');
    expect(cache.peek('k')?.value).toBe('new');
    expect(cache.stats().stale).toBe(1);
  });


  it('a synchronous throw still rejects every waiter', async () => {
    const cache = new CacheLayer<string>({ logger: noopLogger });
    const fetchFn = (): string => {
      throw new Error('sync failure');
    };

    const [first, second] = await Promise.allSettled([
      cache.getOrFetch('k', fetchFn),
      cache.getOrFetch('k', fetchFn),
    ]);

    expect(first).toEqual({ status: 'rejected', reason: expect.any(SourceFetchError) });
    expect(second).toEqual({ status: 'rejected', reason: expect.any(SourceFetchError) });
    if (first.status === 'rejected') {
      expect(first.reason).toHaveProperty('message', 'Fetching "k" failed: sync failure');
    }
  });
});


describe('CacheLayer - Fallback and refresh', () => {
  it('falls back to the stale value, then refresh propagates the failure', async () => {
    const clock = createClock();
    const logger = createLogger();
    const cache = new CacheLayer<string>({ now: clock.now, logger });

    let calls = 0;
    const fetchFn = async () => {
      calls++;
      if (calls > 1) throw new Error('upstream unavailable');
      return 'v1';
    };

    const first = await cache.getOrFetch('k', fetchFn, 1000);
    clock.advance(2000);
    const second = await cache.getOrFetch('k', fetchFn, 1000);

    expect(first.value).toBe('v1');
    expect(second).toEqual({ value: 'v1', status: 'fallback', degraded: true, storedAt: 1_000_000 });
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn.mock.calls[0]?.[0]).toBe('Fetching "k" failed, serving the previous value');

    await expect(cache.refresh('k', fetchFn, 1000)).rejects.toThrow(SourceFetchError);
    expect(cache.peek('k')?.value).toBe('v1');
  });


  it('refresh overwrites a fresh value', async () => {
    const cache = new CacheLayer<string>({ logger: noopLogger });
    await cache.getOrFetch('k', () => 'v1');

    expect(await cache.refresh('k', () => 'v2')).toBe('v2');
    expect((await cache.getOrFetch('k', () => 'v3')).value).toBe('v2');
  });


  it('refresh waits for a fetch in flight', async () => {
    const cache = new CacheLayer<string>({ logger: noopLogger });
    const pending = deferred<string>();
    const order: string[] = [];

    const lookup = cache.getOrFetch('k', () => pending.promise).then((result) => {
      order.push(`get:${result.value}`);
    });
    const refreshed = cache.refresh('k', () => 'v2').then((value) => {
      order.push(`refresh:${value}`);
    });

    pending.resolve('v1');
    await Promise.all([lookup, refreshed]);

    expect(order).toEqual(['get:v1', 'refresh:v2']);
    expect(cache.peek('k')?.value).toBe('v2');
  });


  it('keeps the original error as the cause', async () => {
    const cache = new CacheLayer<string>({ logger: noopLogger });
    const cause = new Error('timeout');

    const error = await cache
      .getOrFetch('k', async () => {
        throw cause;
      })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(SourceFetchError);
    if (error instanceof SourceFetchError) {
      expect(error.key).toBe('k');
      expect(error.cause).toBe(cause);
    }
  });
});


describe('CacheLayer - Invalidation', () => {
  it('invalidate forces the next lookup to fetch', async () => {
    const cache = new CacheLayer<number>({ logger: noopLogger });
    let calls = 0;
    const fetchFn = () => ++calls;

    await cache.getOrFetch('k', fetchFn);
    expect(cache.invalidate('k')).toBe(true);
    expect(cache.invalidate('k')).toBe(false);

    expect((await cache.getOrFetch('k', fetchFn)).value).toBe(2);
  });


  it('a fetch in flight during invalidation does not repopulate', async () => {
    const cache = new CacheLayer<string>({ logger: noopLogger });
    const pending = deferred<string>();

    const lookup = cache.getOrFetch('k', () => pending.promise);
    cache.invalidate('k');
    pending.resolve('v1');

    expect((await lookup).value).toBe('v1');
    expect(cache.peek('k')).toBeUndefined();
  });


  it('clear drops every entry', async () => {
    const cache = new CacheLayer<string>({ logger: noopLogger });
    await cache.getOrFetch('a', () => 'A');
    await cache.getOrFetch('b', () => 'B');

    cache.clear();
    expect(cache.stats().size).toBe(0);
  });
});


describe('CacheLayer - Stats and configuration', () => {
  it('counts hits, misses and fallbacks', async () => {
    const clock = createClock();
    const cache = new CacheLayer<string>({ now: clock.now, logger: noopLogger });

    await cache.getOrFetch('k', () => 'v1', 10);
    await cache.getOrFetch('k', () => 'v1', 10);
    clock.advance(10);
    await cache.getOrFetch('k', () => {
      throw new Error('down');
    }, 10);

    expect(cache.stats()).toEqual({
      hits: 1,
      misses: 2,
      stale: 0,
      fallbacks: 1,
      fetches: 2,
      failures: 1,
      size: 1,
    });
  });


  it('logs each fetch at debug level', async () => {
    const logger = createLogger();
    const cache = new CacheLayer<string>({ logger });

    await cache.getOrFetch('repos', () => 'v1');
    expect(logger.debug).toHaveBeenCalledWith('Fetching "repos"');
  });


  it('rejects invalid configuration', async () => {
    expect(() => new CacheLayer({ defaultTtlMs: -1 })).toThrow('Invalid TTL "-1"');
    expect(() => new CacheLayer({ defaultTtlMs: Number.NaN })).toThrow(/Invalid TTL/);

    const cache = new CacheLayer<string>({ logger: noopLogger });
    await expect(cache.getOrFetch('', () => 'v')).rejects.toThrow('Invalid cache key');
    await expect(cache.getOrFetch('k', () => 'v', -5)).rejects.toThrow('Invalid TTL "-5"');
  });
});
