// =============================================================================
// Cache Store — bounded LRU cache with per-entry TTL
// =============================================================================
// Three structures are kept in step:
//
//   index    Map<K, CacheNode>   O(1) lookup by key
//   recency  RecencyList         MRU ⇄ LRU order, drives capacity eviction
//   expiry   ExpiryIndex         min-heap by deadline, drives TTL expiry
//
// Expired entries are removed in three places:
//   • get()            — the entry being read (lazy cleanup on read)
//   • put() new key    — every due entry, before the capacity check, so an
//                        expired entry never costs a live one its slot
//   • BackgroundSweeper — every due entry, on a timer
//
// The last two share drainExpired(), which costs O(k log k) for k expired
// entries and a single O(1) peek when nothing is due.
//
// Every public method is synchronous and never awaits, so each call runs to
// completion within one event-loop turn; that is the store's only lock.
// =============================================================================
import { z } from 'zod';
import config from '../config';
import { CacheNode } from '../models/CacheNode';
import { RecencyList } from '../utils/recencyList';
import { ExpiryIndex } from '../utils/expiryIndex';
import { CacheConfigError } from '../utils/CacheConfigError';
import logger from '../utils/logger';
import { BackgroundSweeper } from './backgroundSweeper';
import { Cache, CacheStats, CacheStoreOptions, Clock } from '../types';

const CacheStoreOptionsSchema = z.object({
  capacity: z.number().int().positive(),
  sweepIntervalMs: z.number().int().positive(),
  shutdownTimeoutMs: z.number().int().positive(),
  backgroundSweep: z.boolean(),
});

type ValidatedOptions = z.infer<typeof CacheStoreOptionsSchema>;

function validateOptions(options: CacheStoreOptions): ValidatedOptions {
  const parsed = CacheStoreOptionsSchema.safeParse({
    capacity: options.capacity,
    sweepIntervalMs: options.sweepIntervalMs ?? config.sweepIntervalMs,
    shutdownTimeoutMs: options.shutdownTimeoutMs ?? config.shutdownTimeoutMs,
    backgroundSweep: options.backgroundSweep ?? true,
  });
  if (!parsed.success) {
    const issues = parsed.error.issues;
    throw new CacheConfigError(
      [...new Set(issues.map((issue) => issue.path.join('.')))],
      issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return parsed.data;
}

/**
 * Log-safe rendering of a key.  Keys are arbitrary values, and some (a
 * prototype-less object, a throwing `toString`) have no string form.
 */
function describeKey(key: unknown): string {
  try {
    return String(key);
  } catch {
    return `[unprintable ${typeof key}]`;
  }
}

export class CacheStore<K, V> implements Cache<K, V> {
  private readonly capacity: number;
  private readonly clock: Clock;
  private readonly index = new Map<K, CacheNode<K, V>>();
  private readonly recency = new RecencyList<K, V>();
  private readonly expiry = new ExpiryIndex<K, V>();
  private readonly sweeper: BackgroundSweeper | null;

  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private expirations = 0;

  /**
   * @throws CacheConfigError when capacity is not a positive integer, or
   *         the sweep interval / shutdown timeout is not positive
   */
  constructor(options: CacheStoreOptions) {
    const validated = validateOptions(options);
    this.capacity = validated.capacity;
    this.clock = options.clock ?? Date.now;

    this.sweeper = validated.backgroundSweep
      ? new BackgroundSweeper({
          name: `cache(${validated.capacity})`,
          intervalMs: validated.sweepIntervalMs,
          shutdownTimeoutMs: validated.shutdownTimeoutMs,
          task: () => this.drainExpired(),
        })
      : null;
    this.sweeper?.start();
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Cache interface
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Returns the live value for `key` and promotes it to MRU.
   * An expired entry is evicted on the spot and reads as absent.
   */
  get(key: K): V | undefined {
    const node = this.index.get(key);
    if (!node) {
      this.misses++;
      return undefined;
    }

    if (node.isExpired(this.clock())) {
      this.evict(node);
      this.expirations++;
      this.misses++;
      logger.debug('Lazy-evicted expired entry on read', { key: describeKey(key) });
      return undefined;
    }

    this.recency.moveToFront(node);
    this.hits++;
    return node.value;
  }

  /**
   * Inserts or updates `key`.  A positive `ttlMs` sets a deadline of
   * now + ttlMs; anything else means no expiry.
   *
   * Updating an existing key never evicts anything.  Inserting a new key
   * first drains every expired entry, and only then evicts the LRU entry if
   * the cache is still full.
   */
  put(key: K, value: V, ttlMs?: number): void {
    const now = this.clock();
    const expiresAt = ttlMs !== undefined && ttlMs > 0 ? now + ttlMs : null;

    const existing = this.index.get(key);
    if (existing) {
      existing.value = value;
      existing.expiresAt = expiresAt;
      // Any earlier heap entry for this node is stale from here on
      this.expiry.insert(existing);
      this.recency.moveToFront(existing);
      return;
    }

    this.drainExpired(now);

    if (this.index.size >= this.capacity) {
      const lru = this.recency.removeBack();
      if (lru) {
        this.index.delete(lru.key);
        this.evictions++;
        logger.debug('Evicted LRU entry to make room', { key: describeKey(lru.key) });
      }
    }

    const node = new CacheNode(key, value, expiresAt);
    this.recency.addFront(node);
    this.index.set(key, node);
    this.expiry.insert(node);
  }

  /** Removes `key` if present.  Its heap entry, if any, goes stale. */
  remove(key: K): void {
    const node = this.index.get(key);
    if (node) this.evict(node);
  }

  /**
   * Entries currently in the index.  Expired entries nobody has read since
   * are still counted until a put() or a sweep drains them; call
   * drainExpired() first for an exact live count.
   */
  size(): number {
    return this.index.size;
  }

  /**
   * Stops the background sweeper.  The cache stays usable afterwards; only
   * the timed sweep stops.
   */
  async shutdown(): Promise<void> {
    await this.sweeper?.shutdown();
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Expiry drain
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Evicts every entry whose deadline is at or before `now`.
   *
   * Pops the heap while its minimum is due.  A popped entry only counts if
   * the index still maps its key to that exact node and the node still
   * carries the deadline the entry was filed under; anything else is a
   * leftover from an eviction, removal or update and is dropped.
   *
   * @returns — The number of live entries evicted
   */
  drainExpired(now: number = this.clock()): number {
    let drained = 0;
    for (;;) {
      const earliest = this.expiry.peekMin();
      if (!earliest || earliest.expiresAt > now) break;

      this.expiry.extractMin();

      const { node } = earliest;
      if (this.index.get(node.key) !== node || node.expiresAt !== earliest.expiresAt) {
        continue;
      }

      this.evict(node);
      drained++;
    }

    this.expirations += drained;
    return drained;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Introspection
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Reads `key` without promoting it.  Expired entries read as absent but
   * are left for the next drain.
   */
  peek(key: K): V | undefined {
    const node = this.index.get(key);
    if (!node || node.isExpired(this.clock())) return undefined;
    return node.value;
  }

  /** Keys in recency order, most recently used first. */
  keys(): K[] {
    return Array.from(this.recency, (node) => node.key);
  }

  /** Drops every entry.  Counters are kept. */
  clear(): void {
    this.index.clear();
    this.recency.clear();
    this.expiry.clear();
  }

  stats(): CacheStats {
    return {
      size: this.index.size,
      capacity: this.capacity,
      pendingExpiries: this.expiry.size,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      expirations: this.expirations,
    };
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Internals
  // ─────────────────────────────────────────────────────────────────────────

  /** Unlinks `node` from the recency list and the index. */
  private evict(node: CacheNode<K, V>): void {
    this.recency.unlink(node);
    this.index.delete(node.key);
  }
}

/**
 * Builds a store from environment configuration.  Any option passed in
 * `overrides` wins over the configured value.
 */
export function createCacheFromConfig<K, V>(
  overrides: Partial<CacheStoreOptions> = {},
): CacheStore<K, V> {
  return new CacheStore<K, V>({
    capacity: config.capacity,
    sweepIntervalMs: config.sweepIntervalMs,
    shutdownTimeoutMs: config.shutdownTimeoutMs,
    ...overrides,
  });
}
