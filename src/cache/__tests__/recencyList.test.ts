// =============================================================================
// Recency List Tests
// =============================================================================
// Tests: addFront, addBack, unlink, moveToFront, removeBack, isEmpty, clear,
//        iteration order
// =============================================================================
import { CacheNode } from '../models/CacheNode';
import { RecencyList } from '../utils/recencyList';

function node(key: string): CacheNode<string, number> {
  return new CacheNode(key, key.charCodeAt(0), null);
}

function keysOf(list: RecencyList<string, number>): string[] {
  return Array.from(list, (n) => n.key);
}

describe('RecencyList', () => {
  let list: RecencyList<string, number>;

  beforeEach(() => {
    list = new RecencyList<string, number>();
  });

  it('should start empty', () => {
    expect(list.isEmpty()).toBe(true);
    expect(keysOf(list)).toEqual([]);
  });

  it('should return undefined from removeBack when empty', () => {
    expect(list.removeBack()).toBeUndefined();
  });

  it('should place addFront nodes at the MRU end', () => {
    list.addFront(node('a'));
    list.addFront(node('b'));
    list.addFront(node('c'));
    expect(keysOf(list)).toEqual(['c', 'b', 'a']);
  });

  it('should place addBack nodes at the LRU end', () => {
    list.addFront(node('a'));
    list.addBack(node('z'));
    expect(keysOf(list)).toEqual(['a', 'z']);
  });

  it('should unlink a node from the middle', () => {
    const b = node('b');
    list.addFront(node('a'));
    list.addFront(b);
    list.addFront(node('c'));

    list.unlink(b);

    expect(keysOf(list)).toEqual(['c', 'a']);
    expect(b.prev).toBe(b);
    expect(b.next).toBe(b);
  });

  it('should tolerate unlinking the same node twice', () => {
    const a = node('a');
    list.addFront(a);
    list.addFront(node('b'));

    list.unlink(a);
    list.unlink(a);

    expect(keysOf(list)).toEqual(['b']);
  });

  it('should move an existing node to the front', () => {
    const a = node('a');
    list.addFront(a);
    list.addFront(node('b'));
    list.addFront(node('c'));

    list.moveToFront(a);

    expect(keysOf(list)).toEqual(['a', 'c', 'b']);
  });

  it('should keep order when moving the current front', () => {
    const b = node('b');
    list.addFront(node('a'));
    list.addFront(b);

    list.moveToFront(b);

    expect(keysOf(list)).toEqual(['b', 'a']);
  });

  it('should remove nodes from the back in LRU order', () => {
    list.addFront(node('a'));
    list.addFront(node('b'));

    expect(list.removeBack()?.key).toBe('a');
    expect(list.removeBack()?.key).toBe('b');
    expect(list.removeBack()).toBeUndefined();
    expect(list.isEmpty()).toBe(true);
  });

  it('should drop everything on clear', () => {
    list.addFront(node('a'));
    list.addFront(node('b'));

    list.clear();

    expect(list.isEmpty()).toBe(true);
    expect(list.removeBack()).toBeUndefined();
  });
});
