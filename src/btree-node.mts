import assert from 'node:assert/strict';

/**
 * Total order over keys: negative when `a` sorts before `b`, zero when they are equal, positive otherwise.
 */
export type Comparator<KeysType> = (a: KeysType, b: KeysType) => number;

/**
 * Structural role of a node. A `'root'` node without children is the whole tree and behaves as a leaf.
 */
export type NodeKind = 'root' | 'internal' | 'leaf';

export interface BTreeNodeInit<KeysType> {
  order: number;
  compareKeys: Comparator<KeysType>;
  kind?: NodeKind;
  keys?: KeysType[];
  children?: BTreeNode<KeysType>[];
}

/**
 * Result of a binary search over the keys of a single node.
 * `index` is the position of the key when `isAtKey` is true, otherwise the position it would be inserted at,
 * which is also the index of the child subtree that must contain it.
 */
export interface LocateResult {
  index: number;
  isAtKey: boolean;
}

type Bound<KeysType> = { key: KeysType } | null;

export function defaultComparator<KeysType>(a: KeysType, b: KeysType): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * A node of an in-memory B-tree.
 *
 * Every node holds at most `order - 1` keys once an insertion has completed. A node reaching `order` keys
 * overflows and is split by its parent while the insertion unwinds; the root is split by the owning tree.
 *
 * @template KeysType - The type of the keys stored in the tree.
 */
export class BTreeNode<KeysType> {
  readonly order: number;
  kind: NodeKind;
  readonly keys: KeysType[];
  readonly children: BTreeNode<KeysType>[];
  readonly compareKeys: Comparator<KeysType>;

  constructor(init: BTreeNodeInit<KeysType>) {
    this.order = init.order;
    this.compareKeys = init.compareKeys;
    this.kind = init.kind ?? 'root';
    this.keys = init.keys ?? [];
    this.children = init.children ?? [];
  }

  isLeaf(): boolean {
    return this.children.length === 0;
  }

  isOverflow(): boolean {
    return this.keys.length === this.order;
  }

  /**
   * Binary-searches the keys of this node only.
   *
   * @param key - The key to look for.
   * @returns The matching position, or the insertion position when the key is absent.
   */
  locate(key: KeysType): LocateResult {
    let low = 0;
    let high = this.keys.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      const cmp = this.compareKeys(this.keys[mid], key);
      if (cmp === 0) return { index: mid, isAtKey: true };
      if (cmp < 0) low = mid + 1;
      else high = mid;
    }
    return { index: low, isAtKey: false };
  }

  /**
   * Looks the key up in this subtree.
   *
   * The tree stores keys only, so a hit answers with the key that was asked for.
   *
   * @param key - The key to look for.
   * @returns The key when it is present, null otherwise.
   */
  get(key: KeysType): KeysType | null {
    const { index, isAtKey } = this.locate(key);
    if (isAtKey) return key;
    if (this.isLeaf()) return null;
    return this.children[index].get(key);
  }

  /**
   * Inserts a key into this subtree, splitting any child that overflows on the way back up.
   * This node itself may be left overflowing; its parent (or the tree, for the root) resolves that.
   *
   * @param key - The key to insert.
   * @returns True when the key was added, false when it was already present.
   */
  insert(key: KeysType): boolean {
    const { index, isAtKey } = this.locate(key);
    if (isAtKey) return false;

    if (this.isLeaf()) {
      this.keys.splice(index, 0, key);
      return true;
    }

    const inserted = this.children[index].insert(key);
    if (this.children[index].isOverflow()) {
      this.splitChild(index);
    }
    return inserted;
  }

  /**
   * Splits the overflowing child at `index` in two and moves its median key up into this node.
   *
   * The child keeps the lower half, a new sibling of the same kind takes the upper half and is placed right
   * after it, so this node gains exactly one key and one child.
   *
   * @param index - Position of the overflowing child.
   */
  splitChild(index: number): void {
    const child = this.children[index];
    assert.ok(child !== undefined, `no child at index ${index}`);
    assert.ok(child.isOverflow(), `child at index ${index} holds ${child.keys.length} keys, it is not overflowing`);

    const splitAt = Math.floor(child.order / 2);
    const upperKeys = child.keys.splice(splitAt);
    const median = upperKeys[0];
    const sibling = new BTreeNode<KeysType>({
      order: child.order,
      compareKeys: child.compareKeys,
      kind: child.kind,
      keys: upperKeys.slice(1),
      children: child.isLeaf() ? [] : child.children.splice(splitAt + 1),
    });

    this.keys.splice(index, 0, median);
    this.children.splice(index + 1, 0, sibling);
  }

  /**
   * Returns every key of this subtree in ascending order.
   */
  traverse(): KeysType[] {
    const out: KeysType[] = [];
    this.collect(out);
    return out;
  }

  /**
   * Lazily yields the same sequence as `traverse()`.
   */
  *inOrder(): Generator<KeysType, void, undefined> {
    if (this.isLeaf()) {
      yield* this.keys;
      return;
    }
    for (let i = 0; i < this.keys.length; i++) {
      yield* this.children[i].inOrder();
      yield this.keys[i];
    }
    yield* this.children[this.keys.length].inOrder();
  }

  /**
   * Number of levels in this subtree, a lone node counting as one.
   */
  height(): number {
    let levels = 1;
    let node: BTreeNode<KeysType> = this;
    while (!node.isLeaf()) {
      node = node.children[0];
      levels++;
    }
    return levels;
  }

  /**
   * Asserts the structural invariants of this subtree.
   *
   * @throws {AssertionError} On the first violated invariant.
   */
  checkValid(): void {
    this.checkNode(this.order, null, null);
  }

  private collect(out: KeysType[]): void {
    if (this.isLeaf()) {
      out.push(...this.keys);
      return;
    }
    for (let i = 0; i < this.keys.length; i++) {
      this.children[i].collect(out);
      out.push(this.keys[i]);
    }
    this.children[this.keys.length].collect(out);
  }

  private checkNode(order: number, lower: Bound<KeysType>, upper: Bound<KeysType>): void {
    assert.equal(this.order, order, `node order ${this.order} differs from tree order ${order}`);
    assert.ok(this.keys.length < this.order, `node holds ${this.keys.length} keys, order is ${this.order}`);
    assert.ok(this.children.length < this.order + 1, `node holds ${this.children.length} children`);

    switch (this.kind) {
      case 'leaf':
        assert.equal(this.children.length, 0, 'leaf node has children');
        break;
      case 'root':
        assert.ok(this.children.length !== 1, 'root node has a single child');
        break;
      case 'internal':
        assert.ok(
          this.children.length >= Math.ceil(this.order / 2),
          `internal node has ${this.children.length} children, needs at least ${Math.ceil(this.order / 2)}`,
        );
        break;
    }
    if (this.kind !== 'leaf' && !this.isLeaf()) {
      assert.equal(this.children.length, this.keys.length + 1, 'children count must be keys count + 1');
    }

    for (let i = 0; i < this.keys.length; i++) {
      const key = this.keys[i];
      if (i > 0) {
        assert.ok(this.compareKeys(this.keys[i - 1], key) < 0, `keys are not strictly increasing at ${String(key)}`);
      }
      if (lower) assert.ok(this.compareKeys(lower.key, key) < 0, `key ${String(key)} is not above its separator`);
      if (upper) assert.ok(this.compareKeys(key, upper.key) < 0, `key ${String(key)} is not below its separator`);
    }

    this.children.forEach((child, i) => {
      assert.notEqual(child.kind, 'root', 'only the tree root may be a root node');
      const childLower = i === 0 ? lower : { key: this.keys[i - 1] };
      const childUpper = i === this.keys.length ? upper : { key: this.keys[i] };
      child.checkNode(order, childLower, childUpper);
    });
  }
}
