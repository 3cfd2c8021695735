import { assert } from "chai";
import { MultiSet } from "../src";
import { avg, elapsedMs, randomInts } from "./internal/util";

const OPS = 200_000;
const RANGE = 50_000;

export function multiSetOps() {
  console.log("\n## MultiSet\n");
  console.log(
    `Insert ${OPS} random values from [0, ${RANGE}), query, then combine with a second multiset.\n`
  );

  const values = randomInts("multiset", OPS, RANGE);
  const others = randomInts("multiset-other", OPS, RANGE);

  let startTime = process.hrtime.bigint();
  const a = MultiSet.from(values);
  console.log("- Insert time (ms):", elapsedMs(startTime));
  assert.strictEqual(a.size, OPS);

  startTime = process.hrtime.bigint();
  const counts: number[] = [];
  for (let i = 0; i < 10000; i++) counts.push(a.count(i % RANGE));
  console.log("- Time for 10000 count() calls (ms):", elapsedMs(startTime));
  console.log("- Avg multiplicity:", avg(counts).toFixed(2));

  startTime = process.hrtime.bigint();
  for (let k = 1; k <= 10000; k++) a.kthSmallestElem(k * 10);
  console.log(
    "- Time for 10000 kthSmallestElem() calls (ms):",
    elapsedMs(startTime)
  );

  const b = MultiSet.fromAsc(others.slice().sort((x, y) => x - y));

  startTime = process.hrtime.bigint();
  const union = a.union(b);
  console.log("- Union time (ms):", elapsedMs(startTime));
  assert.strictEqual(union.size, a.size + b.size);

  startTime = process.hrtime.bigint();
  const intersection = a.intersection(b);
  console.log("- Intersection time (ms):", elapsedMs(startTime));
  assert.strictEqual(union.size + intersection.size, a.size + b.size);

  startTime = process.hrtime.bigint();
  const difference = a.difference(b);
  console.log("- Difference time (ms):", elapsedMs(startTime));
  assert.isTrue(difference.isSubsetOf(a));

  // A small set against a large one, where splits skip long runs.
  const small = MultiSet.from(values.slice(0, 100));
  startTime = process.hrtime.bigint();
  for (let i = 0; i < 1000; i++) small.isSubsetOf(a);
  console.log(
    "- Time for 1000 small isSubsetOf() calls (ms):",
    elapsedMs(startTime)
  );
}
