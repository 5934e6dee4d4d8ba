// =============================================================================
// CacheNode — one entry of the cache, plus the recency-list sentinel
// =============================================================================
// A node carries its key, value, absolute expiry deadline and the two links
// used by the RecencyList.  The list's head and tail are RecencySentinel
// instances; both kinds share the `sentinel` discriminant so list code can
// tell them apart without casts.
//
// A freshly built link points at itself, so `prev` / `next` are never null.
// =============================================================================

/** Anything that can sit in the recency list: a real node or a sentinel. */
export type RecencyLink<K, V> = CacheNode<K, V> | RecencySentinel<K, V>;

export class RecencySentinel<K, V> {
  readonly sentinel = true as const;
  prev: RecencyLink<K, V> = this;
  next: RecencyLink<K, V> = this;
}

export class CacheNode<K, V> {
  readonly sentinel = false as const;
  prev: RecencyLink<K, V> = this;
  next: RecencyLink<K, V> = this;

  readonly key: K;
  value: V;
  /** Epoch ms after which the entry is stale; `null` = never expires */
  expiresAt: number | null;

  constructor(key: K, value: V, expiresAt: number | null) {
    this.key = key;
    this.value = value;
    this.expiresAt = expiresAt;
  }

  /** `true` once a deadline is set and `now` is strictly past it. */
  isExpired(now: number): boolean {
    return this.expiresAt !== null && now > this.expiresAt;
  }
}
