// =============================================================================
// Expiry Index Tests
// =============================================================================
// Tests: insert, peekMin, extractMin, size, clear, deadline snapshots
// =============================================================================
import { CacheNode } from '../models/CacheNode';
import { ExpiryIndex } from '../utils/expiryIndex';

function node(key: string, expiresAt: number | null): CacheNode<string, string> {
  return new CacheNode(key, key, expiresAt);
}

function drain(index: ExpiryIndex<string, string>): number[] {
  const out: number[] = [];
  for (let entry = index.extractMin(); entry; entry = index.extractMin()) {
    out.push(entry.expiresAt);
  }
  return out;
}

describe('ExpiryIndex', () => {
  let index: ExpiryIndex<string, string>;

  beforeEach(() => {
    index = new ExpiryIndex<string, string>();
  });

  it('should be empty initially', () => {
    expect(index.size).toBe(0);
    expect(index.peekMin()).toBeUndefined();
    expect(index.extractMin()).toBeUndefined();
  });

  it('should ignore nodes without a deadline', () => {
    index.insert(node('forever', null));
    expect(index.size).toBe(0);
  });

  it('should expose the earliest deadline at the top', () => {
    const soon = node('soon', 100);
    index.insert(node('later', 500));
    index.insert(soon);
    index.insert(node('mid', 300));

    expect(index.peekMin()?.node).toBe(soon);
    expect(index.size).toBe(3);
  });

  it('should extract deadlines in ascending order', () => {
    for (const t of [700, 100, 900, 300, 500, 200, 800, 400, 600]) {
      index.insert(node(`k${t}`, t));
    }

    expect(drain(index)).toEqual([100, 200, 300, 400, 500, 600, 700, 800, 900]);
    expect(index.size).toBe(0);
  });

  it('should keep duplicate deadlines', () => {
    index.insert(node('a', 50));
    index.insert(node('b', 50));
    index.insert(node('c', 10));

    expect(drain(index)).toEqual([10, 50, 50]);
  });

  it('should order by the deadline recorded at insert time', () => {
    const n = node('k', 100);
    index.insert(n);
    n.expiresAt = 1000;
    index.insert(n);
    index.insert(node('other', 500));

    const first = index.extractMin();
    expect(first?.node).toBe(n);
    expect(first?.expiresAt).toBe(100);
    expect(drain(index)).toEqual([500, 1000]);
  });

  it('should not change size on peek', () => {
    index.insert(node('a', 1));
    index.peekMin();
    index.peekMin();
    expect(index.size).toBe(1);
  });

  it('should drop everything on clear', () => {
    index.insert(node('a', 1));
    index.insert(node('b', 2));

    index.clear();

    expect(index.size).toBe(0);
    expect(index.peekMin()).toBeUndefined();
  });
});
