// =============================================================================
// Expiry Index — min-heap of cache nodes ordered by deadline
// =============================================================================
//   peekMin()    → O(1)      is anything due yet?
//   extractMin() → O(log n)  pop the earliest deadline
//   insert()     → O(log n)  file a node under its current deadline
//
// References are never removed eagerly.  When the store evicts or removes a
// node, or rewrites its deadline, the old heap entry stays put and is
// discarded once it surfaces at the top (lazy deletion — see
// CacheStore.drainExpired).
//
// Each entry records the deadline it was filed under.  Nodes are mutated in
// place on update, so ordering by the live `node.expiresAt` would silently
// break the heap property.
// =============================================================================
import { CacheNode } from '../models/CacheNode';

export interface ExpiryEntry<K, V> {
  node: CacheNode<K, V>;
  /** The node's deadline when this entry was inserted */
  expiresAt: number;
}

export class ExpiryIndex<K, V> {
  private heap: ExpiryEntry<K, V>[] = [];

  /** Number of entries, stale ones included. */
  get size(): number {
    return this.heap.length;
  }

  /**
   * Files `node` under its current deadline.  Nodes without a deadline are
   * ignored; the store only calls this right after setting one.
   */
  insert(node: CacheNode<K, V>): void {
    if (node.expiresAt === null) return;
    this.heap.push({ node, expiresAt: node.expiresAt });
    this.siftUp(this.heap.length - 1);
  }

  peekMin(): ExpiryEntry<K, V> | undefined {
    return this.heap[0];
  }

  extractMin(): ExpiryEntry<K, V> | undefined {
    const top = this.heap[0];
    const last = this.heap.pop();
    if (top === undefined || last === undefined) return undefined;

    if (this.heap.length > 0) {
      this.heap[0] = last;
      this.siftDown(0);
    }
    return top;
  }

  clear(): void {
    this.heap = [];
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Heap maintenance
  // ─────────────────────────────────────────────────────────────────────────

  private siftUp(start: number): void {
    const entry = this.heap[start];
    let i = start;
    while (i > 0) {
      const parentIdx = (i - 1) >> 1;
      const parent = this.heap[parentIdx];
      if (parent.expiresAt <= entry.expiresAt) break;
      this.heap[i] = parent;
      i = parentIdx;
    }
    this.heap[i] = entry;
  }

  private siftDown(start: number): void {
    const n = this.heap.length;
    const entry = this.heap[start];
    let i = start;
    for (;;) {
      const left = 2 * i + 1;
      if (left >= n) break;
      const right = left + 1;
      const child =
        right < n && this.heap[right].expiresAt < this.heap[left].expiresAt ? right : left;
      if (this.heap[child].expiresAt >= entry.expiresAt) break;
      this.heap[i] = this.heap[child];
      i = child;
    }
    this.heap[i] = entry;
  }
}
