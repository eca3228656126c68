import type { BTreeNode } from './btree-node.mjs';

const CHILD_GAP = 3;

interface Picture {
  lines: string[];
  width: number;
  middle: number;
}

function nodeText<KeysType>(node: BTreeNode<KeysType>): string {
  return `[${node.keys.map((k) => String(k)).join(',')}]`;
}

function label<KeysType>(node: BTreeNode<KeysType>): string {
  const keys = node.keys.map((k) => String(k)).join(',');
  switch (node.kind) {
    case 'root':
      return `Root(keys:${keys})`;
    case 'internal':
      return `Internal(keys:${keys})`;
    case 'leaf':
      return `Leaf(keys:${keys})`;
  }
}

/**
 * Describes the tree one level per line, left to right.
 *
 * @example
 * describeLevels(root) // ['Root(keys:2)', 'Leaf(keys:1) | Leaf(keys:3)']
 */
export function describeLevels<KeysType>(root: BTreeNode<KeysType>): string[] {
  if (root.isLeaf() && root.keys.length === 0) return ['<empty>'];

  const lines: string[] = [];
  let level: BTreeNode<KeysType>[] = [root];
  while (level.length > 0) {
    lines.push(level.map((n) => label(n)).join(' | '));
    level = level.flatMap((n) => n.children);
  }
  return lines;
}

function layout<KeysType>(node: BTreeNode<KeysType>): Picture {
  const text = nodeText(node);
  if (node.isLeaf()) {
    return { lines: [text], width: text.length, middle: Math.floor(text.length / 2) };
  }

  const pictures = node.children.map((c) => layout(c));
  const childrenWidth = pictures.reduce((sum, p) => sum + p.width, 0) + CHILD_GAP * (pictures.length - 1);
  const width = Math.max(text.length, childrenWidth);

  const starts: number[] = [];
  let cursor = Math.floor((width - childrenWidth) / 2);
  for (const p of pictures) {
    starts.push(cursor);
    cursor += p.width + CHILD_GAP;
  }

  const childMiddles = pictures.map((p, i) => starts[i] + p.middle);
  const first = childMiddles[0];
  const last = childMiddles[childMiddles.length - 1];
  const middle = Math.floor((first + last) / 2);

  const textStart = Math.min(Math.max(0, middle - Math.floor(text.length / 2)), width - text.length);
  const parentLine = ' '.repeat(textStart) + text + ' '.repeat(width - textStart - text.length);

  const bridge = Array.from<unknown, string>({ length: width }, (_, c) => (c >= first && c <= last ? '-' : ' '));
  bridge[middle] = '|';
  const drops = Array.from({ length: width }, (_, c) => (childMiddles.includes(c) ? '|' : ' '));

  const depth = Math.max(...pictures.map((p) => p.lines.length));
  const rows: string[] = [];
  for (let row = 0; row < depth; row++) {
    let line = '';
    pictures.forEach((p, i) => {
      line = line.padEnd(starts[i]) + (p.lines[row] ?? ' '.repeat(p.width));
    });
    rows.push(line.padEnd(width));
  }

  return { lines: [parentLine, bridge.join(''), drops.join(''), ...rows], width, middle };
}

/**
 * Draws the tree as ASCII art, parents centered above their children.
 *
 * @example
 *    [2]
 *  ---|---
 *  |     |
 * [1]   [3]
 */
export function drawAscii<KeysType>(root: BTreeNode<KeysType>): string[] {
  if (root.isLeaf() && root.keys.length === 0) return ['<empty>'];
  return layout(root).lines;
}
