// =============================================================================
// Shared Type Definitions
// =============================================================================

/** Source of "now" in epoch milliseconds */
export type Clock = () => number;

/**
 * Capability set every cache implementation offers.
 *
 * Implementations clean up expired entries lazily inside both `get` and
 * `put`, so a stale entry is never returned and never holds a slot a new
 * key needs.
 */
export interface Cache<K, V> {
  /** The live value, or `undefined` if the key is absent or expired */
  get(key: K): V | undefined;
  /**
   * Insert or update.  A positive `ttlMs` sets an expiry deadline;
   * omitted or `<= 0` means the entry never expires.
   */
  put(key: K, value: V, ttlMs?: number): void;
  /** No-op when the key is absent */
  remove(key: K): void;
  /** Entries currently held, possibly including expired ones not yet swept */
  size(): number;
  /** Stops background work; idempotent */
  shutdown(): Promise<void>;
}

/** Construction options for CacheStore */
export interface CacheStoreOptions {
  /** Maximum number of entries (positive integer) */
  capacity: number;
  /** Background sweep interval in ms (defaults to config) */
  sweepIntervalMs?: number;
  /** Bounded wait for an in-flight sweep during shutdown (defaults to config) */
  shutdownTimeoutMs?: number;
  /** Set to `false` to run without a background sweeper */
  backgroundSweep?: boolean;
  /** Time source; defaults to `Date.now` */
  clock?: Clock;
}

/** Point-in-time counters reported by CacheStore.stats() */
export interface CacheStats {
  size: number;
  capacity: number;
  /** Heap references awaiting their deadline, stale ones included */
  pendingExpiries: number;
  hits: number;
  misses: number;
  /** Entries dropped to make room for a new key */
  evictions: number;
  /** Entries dropped because their TTL elapsed */
  expirations: number;
}

/**
 * Work performed by the background sweeper on every tick.  Returns the
 * number of entries removed.  The signal is aborted only when shutdown
 * gives up waiting for the run.
 */
export type SweepTask = (signal: AbortSignal) => number | Promise<number>;
