// =============================================================================
// Cache Demo — walks through the core LRU + TTL behaviours
// =============================================================================
//   1. LRU eviction under capacity pressure
//   2. TTL expiry noticed on read
//   3. Pre-put drain reclaiming expired slots
//   4. Manual remove
//   5. Explicit background sweep
//
// Run after a build with `node dist/cache/demo.js`.  Tests drive it with a
// manual clock and an instant sleep.
// =============================================================================
import { setTimeout as delay } from 'timers/promises';
import { CacheStore } from './services/cacheStore';
import logger from './utils/logger';
import { describeError } from './utils/CacheConfigError';
import { Clock } from './types';

export interface DemoOptions {
  clock?: Clock;
  sleep?: (ms: number) => Promise<void>;
}

export interface DemoResult {
  lruEviction: Record<'a' | 'b' | 'c' | 'd', number | undefined>;
  ttlOnRead: {
    before: Record<string, string | undefined>;
    after: Record<string, string | undefined>;
  };
  drainOnPut: {
    sizeBeforeExpiry: number;
    sizeAfterInserts: number;
    values: Record<number, string | undefined>;
  };
  manualRemove: { permanent: string | undefined };
  backgroundSweep: {
    sizeBefore: number;
    swept: number;
    sizeAfter: number;
    z: number | undefined;
  };
}

const SLOW_SWEEP_MS = 60_000;

export async function runDemo(options: DemoOptions = {}): Promise<DemoResult> {
  const clock = options.clock ?? Date.now;
  const sleep = options.sleep ?? ((ms: number) => delay(ms));
  const build = <K, V>(capacity: number) =>
    new CacheStore<K, V>({ capacity, sweepIntervalMs: SLOW_SWEEP_MS, clock });

  // ── 1. LRU eviction ───────────────────────────────────────────────────────
  const cache = build<string, number>(3);
  cache.put('a', 1);
  cache.put('b', 2);
  cache.put('c', 3);
  cache.get('a'); // a becomes MRU, b is now LRU
  cache.put('d', 4);
  const lruEviction = {
    a: cache.get('a'),
    b: cache.get('b'),
    c: cache.get('c'),
    d: cache.get('d'),
  };
  logger.info('Scenario 1: LRU eviction', lruEviction);

  // ── 2. TTL expiry on read ─────────────────────────────────────────────────
  const ttlCache = build<string, string>(5);
  ttlCache.put('session:1', 'user-alice', 200);
  ttlCache.put('session:2', 'user-bob', 5000);
  ttlCache.put('permanent', 'admin');

  const readSessions = () => ({
    'session:1': ttlCache.get('session:1'),
    'session:2': ttlCache.get('session:2'),
    permanent: ttlCache.get('permanent'),
  });
  const before = readSessions();
  await sleep(300);
  const after = readSessions();
  logger.info('Scenario 2: TTL expiry on read', { before, after });

  // ── 3. Pre-put drain ──────────────────────────────────────────────────────
  const putCache = build<number, string>(3);
  putCache.put(1, 'one', 150);
  putCache.put(2, 'two', 150);
  putCache.put(3, 'three', 150);
  const sizeBeforeExpiry = putCache.size();
  await sleep(200);
  putCache.put(4, 'four');
  putCache.put(5, 'five');
  putCache.put(6, 'six');
  const drainOnPut = {
    sizeBeforeExpiry,
    sizeAfterInserts: putCache.size(),
    values: {
      1: putCache.get(1),
      4: putCache.get(4),
      5: putCache.get(5),
      6: putCache.get(6),
    },
  };
  logger.info('Scenario 3: expired slots reclaimed on put', drainOnPut);

  // ── 4. Manual remove ──────────────────────────────────────────────────────
  ttlCache.remove('permanent');
  const manualRemove = { permanent: ttlCache.get('permanent') };
  logger.info('Scenario 4: manual remove', manualRemove);

  // ── 5. Background sweep, triggered by hand ────────────────────────────────
  const bgCache = build<string, number>(10);
  bgCache.put('x', 100, 50);
  bgCache.put('y', 200, 50);
  bgCache.put('z', 300);
  await sleep(100);
  const sizeBefore = bgCache.size();
  const swept = bgCache.drainExpired();
  const backgroundSweep = {
    sizeBefore,
    swept,
    sizeAfter: bgCache.size(),
    z: bgCache.get('z'),
  };
  logger.info('Scenario 5: background sweep', backgroundSweep);

  await Promise.all([cache, ttlCache, putCache, bgCache].map((c) => c.shutdown()));

  return {
    lruEviction,
    ttlOnRead: { before, after },
    drainOnPut,
    manualRemove,
    backgroundSweep,
  };
}

if (require.main === module) {
  runDemo()
    .then(() => logger.info('All demo scenarios finished'))
    .catch((err: unknown) => {
      logger.error('Demo failed', { error: describeError(err) });
      process.exitCode = 1;
    });
}
