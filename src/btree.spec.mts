import { describe, it, expect, beforeEach, vi } from 'vitest';
import random from 'random';
import { BTree } from './btree.mjs';

function sortedUnique(keys: number[]): number[] {
  return [...new Set(keys)].sort((a, b) => a - b);
}

describe('BTree', () => {
  let tree: BTree<number>;

  beforeEach(() => {
    tree = new BTree<number>(4);
  });

  it('throws for an order below 3 or not an integer', () => {
    expect(() => new BTree<number>(2)).toThrow('order must be an integer >= 3');
    expect(() => new BTree<number>(0)).toThrow();
    expect(() => new BTree<number>(3.5)).toThrow();
    expect(() => new BTree<number>(3)).not.toThrow();
  });

  it('starts empty', () => {
    expect(tree.traverse()).toEqual([]);
    expect(tree.get(1)).toBeNull();
    expect(tree.size).toBe(0);
    expect(tree.height).toBe(1);
    tree.checkValid();
  });

  it('inserts 1..10 ascending and finds every key', () => {
    for (let k = 1; k <= 10; k++) tree.insert(k);

    expect(tree.traverse()).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    for (let k = 1; k <= 10; k++) expect(tree.get(k)).toBe(k);
    expect(tree.get(11)).toBeNull();
    expect(tree.has(11)).toBe(false);
    expect(tree.has(7)).toBe(true);
    expect(tree.size).toBe(10);
    expect(tree.height).toBe(2);
    tree.checkValid();
  });

  it('inserting a duplicate leaves the tree unchanged', () => {
    const keys = [5, 1, 9, 3, 7, 2, 8];
    for (const k of keys) tree.insert(k);
    const before = tree.traverse();

    for (const k of keys) tree.insert(k);

    expect(tree.traverse()).toEqual(before);
    expect(tree.size).toBe(keys.length);
    tree.checkValid();
  });

  it('grows in height only when the root splits', () => {
    const order3 = new BTree<number>(3);
    order3.insert(1);
    order3.insert(2);
    expect(order3.height).toBe(1);

    order3.insert(3);
    expect(order3.height).toBe(2);

    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    order3.printTree();
    expect(logSpy.mock.calls.map((c) => String(c[0]))).toEqual(['Root(keys:2)', 'Leaf(keys:1) | Leaf(keys:3)']);
    logSpy.mockRestore();

    let height = order3.height;
    for (let k = 4; k <= 200; k++) {
      order3.insert(k);
      const next = order3.height;
      expect(next === height || next === height + 1).toBe(true);
      height = next;
      order3.checkValid();
    }
    expect(height).toBeGreaterThan(2);
  });

  it('keeps every invariant after each insertion of random keys with duplicates', () => {
    const nextKey = random.uniformInt(0, 500);
    const inserted: number[] = [];

    for (let i = 0; i < 1000; i++) {
      const key = nextKey();
      inserted.push(key);
      tree.insert(key);
      tree.checkValid();
    }

    const expected = sortedUnique(inserted);
    expect(tree.traverse()).toEqual(expected);
    expect(tree.size).toBe(expected.length);
    for (const k of expected) expect(tree.get(k)).toBe(k);
    expect(tree.get(-1)).toBeNull();
    expect(tree.get(501)).toBeNull();
  });

  it('works for a range of orders', () => {
    for (let order = 3; order <= 9; order++) {
      const t = new BTree<number>(order);
      const nextKey = random.uniformInt(0, 300);
      const inserted: number[] = [];
      for (let i = 0; i < 400; i++) {
        const key = nextKey();
        inserted.push(key);
        t.insert(key);
      }
      t.checkValid();
      expect(t.traverse()).toEqual(sortedUnique(inserted));
    }
  });

  it('orders keys with a custom comparator', () => {
    const words = new BTree<string>(3, (a, b) => a.localeCompare(b, 'en', { sensitivity: 'base' }));
    for (const w of ['pear', 'Apple', 'fig', 'apple', 'kiwi', 'banana']) words.insert(w);

    expect(words.traverse()).toEqual(['Apple', 'banana', 'fig', 'kiwi', 'pear']);
    expect(words.get('APPLE')).toBe('APPLE');
    expect(words.size).toBe(5);
    words.checkValid();

    const descending = new BTree<number>(3, (a, b) => b - a);
    for (const k of [1, 4, 2, 5, 3]) descending.insert(k);
    expect(descending.traverse()).toEqual([5, 4, 3, 2, 1]);
    descending.checkValid();
  });

  it('leaves the tree untouched when the comparator throws', () => {
    const strict = new BTree<number>(3, (a, b) => {
      if (Number.isNaN(a) || Number.isNaN(b)) throw new Error('NaN is not comparable');
      return a - b;
    });
    for (const k of [1, 2, 3, 4, 5]) strict.insert(k);

    expect(() => strict.insert(NaN)).toThrow('NaN is not comparable');
    expect(strict.traverse()).toEqual([1, 2, 3, 4, 5]);
    expect(strict.size).toBe(5);
    strict.checkValid();
  });

  it('keys(), iteration and forEach yield keys in ascending order', () => {
    const keys = [20, 5, 15, 25, 10, 30, 1];
    for (const k of keys) tree.insert(k);
    const sorted = sortedUnique(keys);

    expect([...tree.keys()]).toEqual(sorted);
    expect([...tree]).toEqual(sorted);

    const seen: Array<{ key: number; index: number }> = [];
    tree.forEach((key, index) => seen.push({ key, index }));
    expect(seen.map((s) => s.key)).toEqual(sorted);
    expect(seen.map((s) => s.index)).toEqual([0, 1, 2, 3, 4, 5, 6]);
  });

  it('clear resets the tree to an empty root', () => {
    for (let k = 0; k < 50; k++) tree.insert(k);
    expect(tree.height).toBeGreaterThan(1);

    tree.clear();

    expect(tree.traverse()).toEqual([]);
    expect(tree.size).toBe(0);
    expect(tree.height).toBe(1);
    tree.insert(3);
    expect(tree.traverse()).toEqual([3]);
    tree.checkValid();
  });

  it('printTree prints one line per level', () => {
    for (let k = 1; k <= 10; k++) tree.insert(k);
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    tree.printTree();

    expect(logSpy.mock.calls.map((c) => String(c[0]))).toEqual([
      'Root(keys:3,6,9)',
      'Leaf(keys:1,2) | Leaf(keys:4,5) | Leaf(keys:7,8) | Leaf(keys:10)',
    ]);
    logSpy.mockRestore();
  });

  it('printTree and ascii print <empty> for an empty tree', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    tree.printTree();
    tree.ascii();

    expect(logSpy.mock.calls.map((c) => String(c[0]))).toEqual(['<empty>', '<empty>']);
    logSpy.mockRestore();
  });

  it('ascii prints the expected picture for a small tree', () => {
    const small = new BTree<number>(3);
    for (const k of [1, 2, 3]) small.insert(k);
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    small.ascii();

    expect(logSpy.mock.calls.map((c) => String(c[0]))).toEqual([
      '   [2]   ',
      ' ---|--- ',
      ' |     | ',
      '[1]   [3]',
    ]);
    logSpy.mockRestore();
  });
});
