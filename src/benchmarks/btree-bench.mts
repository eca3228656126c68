import { performance } from 'perf_hooks';
import { BTree } from '../btree.mjs';

const SIZES = [1000, 10000, 100000, 500000];
const ORDER = 32;

function xorshift32(seed: number) {
  let s = seed >>> 0;
  return () => {
    s ^= s << 13;
    s ^= s >>> 17;
    s ^= s << 5;
    return s >>> 0;
  };
}

function makeRandomKeys(n: number, maxKey: number, seed = 1234567): number[] {
  const rand = xorshift32(seed);
  return Array.from({ length: n }, () => rand() % Math.max(1, maxKey));
}

function shuffle<T>(arr: T[], seed = 42) {
  const rnd = xorshift32(seed);
  for (let i = arr.length - 1; i > 0; i--) {
    const j = rnd() % (i + 1);
    [arr[i], arr[j]] = [arr[j], arr[i]];
  }
}

function time(run: () => void): number {
  const t0 = performance.now();
  run();
  return performance.now() - t0;
}

function runOnce(n: number, mode: 'random' | 'sequential') {
  const tree = new BTree<number>(ORDER, (a, b) => a - b);
  const keys = mode === 'sequential' ? Array.from({ length: n }, (_, i) => i) : makeRandomKeys(n, n * 2, 12345);

  const insertMs = time(() => {
    for (const key of keys) tree.insert(key);
  });

  const searchKeys = keys.slice();
  shuffle(searchKeys, 9999);
  const searchMs = time(() => {
    for (const key of searchKeys) tree.get(key);
  });

  return { insertMs, searchMs, height: tree.height };
}

function runSizes(mode: 'random' | 'sequential') {
  console.log('n\theight\tinsert_total_ms\tinsert_us/op\tsearch_total_ms\tsearch_us/op');
  for (const n of SIZES) {
    try {
      const { insertMs, searchMs, height } = runOnce(n, mode);
      console.log(
        `${n}\t${height}\t${insertMs.toFixed(2)}\t${((insertMs / n) * 1000).toFixed(3)}\t${searchMs.toFixed(
          2,
        )}\t${((searchMs / n) * 1000).toFixed(3)}`,
      );
    } catch (err) {
      console.error('error running size', n, err);
      break;
    }
  }
}

console.log(`B-tree benchmark, order ${ORDER}`);
console.log('Mode: random inserts/searches');
runSizes('random');
console.log('\nMode: sequential inserts/searches');
runSizes('sequential');
