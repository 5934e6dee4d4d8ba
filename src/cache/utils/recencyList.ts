// =============================================================================
// Recency List — MRU ⇄ LRU ordering for the cache
// =============================================================================
// Doubly linked list with sentinel head and tail:
//
//   head.next → most-recently used (MRU)
//   tail.prev → least-recently used (LRU)
//
// Every operation is O(1) pointer rewiring.  Nothing here allocates nodes;
// the CacheStore owns node lifetime.
// =============================================================================
import { CacheNode, RecencySentinel } from '../models/CacheNode';

export class RecencyList<K, V> {
  private readonly head = new RecencySentinel<K, V>();
  private readonly tail = new RecencySentinel<K, V>();

  constructor() {
    this.head.next = this.tail;
    this.tail.prev = this.head;
  }

  /** Link `node` right after the head (MRU position). */
  addFront(node: CacheNode<K, V>): void {
    node.next = this.head.next;
    node.prev = this.head;
    this.head.next.prev = node;
    this.head.next = node;
  }

  /** Link `node` right before the tail (LRU position). */
  addBack(node: CacheNode<K, V>): void {
    node.prev = this.tail.prev;
    node.next = this.tail;
    this.tail.prev.next = node;
    this.tail.prev = node;
  }

  /**
   * Detach `node` from its neighbours and point it back at itself, so a
   * second unlink of the same node is harmless.
   */
  unlink(node: CacheNode<K, V>): void {
    node.prev.next = node.next;
    node.next.prev = node.prev;
    node.prev = node;
    node.next = node;
  }

  moveToFront(node: CacheNode<K, V>): void {
    this.unlink(node);
    this.addFront(node);
  }

  /**
   * Unlink and return the LRU node.
   * Returns `undefined` when the list holds no real nodes.
   */
  removeBack(): CacheNode<K, V> | undefined {
    const last = this.tail.prev;
    if (last.sentinel) return undefined;
    this.unlink(last);
    return last;
  }

  isEmpty(): boolean {
    return this.head.next === this.tail;
  }

  /** Drop every node at once; callers discard their own references. */
  clear(): void {
    this.head.next = this.tail;
    this.tail.prev = this.head;
  }

  /** Walks MRU → LRU. */
  *[Symbol.iterator](): IterableIterator<CacheNode<K, V>> {
    let cursor = this.head.next;
    while (!cursor.sentinel) {
      const next = cursor.next;
      yield cursor;
      cursor = next;
    }
  }
}
