export { BTree } from './btree.mjs';
export { BTreeNode, defaultComparator } from './btree-node.mjs';
export type { Comparator, NodeKind, BTreeNodeInit, LocateResult } from './btree-node.mjs';
export { describeLevels, drawAscii } from './render.mjs';
