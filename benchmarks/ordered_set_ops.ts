import { assert } from "chai";
import createRBTree from "functional-red-black-tree";
import { defaultCompare, MultiSet, OrderedSet } from "../src";
import { elapsedMs, randomInts } from "./internal/util";

const SIZE = 100_000;

/**
 * Compares OrderedSet with a persistent red-black tree, the usual way to keep
 * a persistent sorted set in JavaScript.
 */
export function orderedSetOps() {
  console.log("\n## OrderedSet\n");
  console.log(
    `Build a set of ${SIZE} ascending values, then look up and insert random values. Baseline: functional-red-black-tree.\n`
  );

  const sorted = Array.from({ length: SIZE }, (_, i) => 2 * i);
  const queries = randomInts("ordered-set", 10000, 2 * SIZE);

  let compares = 0;
  const counting = (a: number, b: number) => {
    compares++;
    return defaultCompare(a, b);
  };

  let startTime = process.hrtime.bigint();
  const set = OrderedSet.fromDistinctAsc(sorted, counting);
  console.log("- OrderedSet build time (ms):", elapsedMs(startTime));
  console.log("- OrderedSet build comparisons:", compares);
  assert.strictEqual(set.size, SIZE);

  compares = 0;
  startTime = process.hrtime.bigint();
  let rbTree = createRBTree<number, true>(counting);
  for (const value of sorted) rbTree = rbTree.insert(value, true);
  console.log("- Red-black tree build time (ms):", elapsedMs(startTime));
  console.log("- Red-black tree build comparisons:", compares);
  assert.strictEqual(rbTree.length, SIZE);

  const multiSet = MultiSet.fromDistinctAsc(sorted);
  startTime = process.hrtime.bigint();
  assert.strictEqual(multiSet.support().size, SIZE);
  console.log("- MultiSet.support() time (ms):", elapsedMs(startTime));

  startTime = process.hrtime.bigint();
  let found = 0;
  for (const q of queries) if (set.has(q)) found++;
  console.log(
    "- Time for 10000 OrderedSet has() calls (ms):",
    elapsedMs(startTime)
  );

  startTime = process.hrtime.bigint();
  let rbFound = 0;
  for (const q of queries) if (rbTree.get(q) !== undefined) rbFound++;
  console.log(
    "- Time for 10000 red-black tree get() calls (ms):",
    elapsedMs(startTime)
  );
  assert.strictEqual(found, rbFound);

  startTime = process.hrtime.bigint();
  let inserted = set;
  for (const q of queries) inserted = inserted.insert(q + 1);
  console.log(
    "- Time for 10000 OrderedSet insert() calls (ms):",
    elapsedMs(startTime)
  );
  assert.isAbove(inserted.size, SIZE);
}
