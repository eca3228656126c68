import assert from 'node:assert/strict';
import { BTreeNode, defaultComparator, type Comparator } from './btree-node.mjs';
import { describeLevels, drawAscii } from './render.mjs';

/**
 * An in-memory B-tree holding a set of keys.
 *
 * @template KeysType - The type of the keys. The comparator must define a total order over them.
 *
 * @example
 * const tree = new BTree<number>(4);
 * tree.insert(3);
 * tree.get(3); // 3
 */
export class BTree<KeysType> {
  private root: BTreeNode<KeysType>;
  private count = 0;
  readonly order: number;
  private readonly compareKeys: Comparator<KeysType>;

  /**
   * Creates an empty B-tree.
   *
   * @param order - The maximum number of children per node.
   * @param compareKeys - Total order over the keys, `<`/`>` based by default.
   * @throws {Error} If the order is not an integer of at least 3.
   */
  constructor(order: number, compareKeys: Comparator<KeysType> = defaultComparator) {
    if (!Number.isInteger(order) || order < 3) throw new Error('order must be an integer >= 3');
    this.order = order;
    this.compareKeys = compareKeys;
    this.root = this.createRoot();
  }

  get size(): number {
    return this.count;
  }

  get height(): number {
    return this.root.height();
  }

  /**
   * Looks a key up.
   *
   * @param key - The key to search for.
   * @returns The key when the tree contains it, null otherwise.
   */
  get(key: KeysType): KeysType | null {
    return this.root.get(key);
  }

  has(key: KeysType): boolean {
    return this.root.get(key) !== null;
  }

  /**
   * Inserts a key. Inserting a key that is already present changes nothing.
   *
   * @param key - The key to insert.
   */
  insert(key: KeysType): void {
    if (this.root.insert(key)) this.count++;
    if (this.root.isOverflow()) this.splitRoot();
  }

  /**
   * Returns all keys in ascending order.
   */
  traverse(): KeysType[] {
    return this.root.traverse();
  }

  *keys(): Generator<KeysType, void, undefined> {
    yield* this.root.inOrder();
  }

  [Symbol.iterator](): Generator<KeysType, void, undefined> {
    return this.keys();
  }

  /**
   * Calls `callback` once per key, in ascending order.
   */
  forEach(callback: (key: KeysType, index: number) => void): void {
    let index = 0;
    for (const key of this.keys()) {
      callback(key, index++);
    }
  }

  /**
   * Removes every key, leaving an empty single-node tree.
   */
  clear(): void {
    this.root = this.createRoot();
    this.count = 0;
  }

  /**
   * Asserts that the tree satisfies every B-tree invariant.
   *
   * @throws {AssertionError} If an invariant is violated.
   */
  checkValid(): void {
    assert.equal(this.root.kind, 'root', 'tree root must be a root node');
    this.root.checkValid();
  }

  /**
   * Prints one line per level of the tree to the console.
   */
  printTree(): void {
    for (const line of describeLevels(this.root)) console.log(line);
  }

  /**
   * Prints an ASCII picture of the tree to the console.
   *
   * @example
   *    [2]
   *  ---|---
   *  |     |
   * [1]   [3]
   */
  ascii(): void {
    for (const line of drawAscii(this.root)) console.log(line);
  }

  private createRoot(): BTreeNode<KeysType> {
    return new BTreeNode<KeysType>({ order: this.order, compareKeys: this.compareKeys, kind: 'root' });
  }

  /**
   * Replaces an overflowing root by a new root holding its median key, with the two halves as children.
   * The root has no parent to take the median, so this cannot go through `BTreeNode.splitChild`.
   */
  private splitRoot(): void {
    const old = this.root;
    const index = Math.floor(old.order / 2);
    const kind = old.isLeaf() ? 'leaf' : 'internal';

    const left = new BTreeNode<KeysType>({
      order: old.order,
      compareKeys: old.compareKeys,
      kind,
      keys: old.keys.slice(0, index),
      children: old.children.slice(0, index + 1),
    });
    const right = new BTreeNode<KeysType>({
      order: old.order,
      compareKeys: old.compareKeys,
      kind,
      keys: old.keys.slice(index + 1),
      children: old.children.slice(index + 1),
    });

    this.root = new BTreeNode<KeysType>({
      order: old.order,
      compareKeys: old.compareKeys,
      kind: 'root',
      keys: [old.keys[index]],
      children: [left, right],
    });
  }
}
