import { assert } from "chai";
import { Deque } from "../src";
import { elapsedMs, getMemUsed, randomInts, sleep } from "./internal/util";

const OPS = 1_000_000;

export async function dequeOps() {
  console.log("\n## Deque\n");
  console.log(
    `Push ${OPS} values at random ends, then pop them all from random ends.\n`
  );

  const ends = randomInts("deque", 2 * OPS, 2);

  let startTime = process.hrtime.bigint();
  let deque = Deque.new<number>();
  for (let i = 0; i < OPS; i++) {
    deque = ends[i] === 0 ? deque.pushFront(i) : deque.pushBack(i);
  }
  console.log("- Push time (ms):", elapsedMs(startTime));
  assert.strictEqual(deque.size, OPS);

  await memory(deque);

  startTime = process.hrtime.bigint();
  for (let i = 0; i < 1000; i++) deque.at(Math.floor((i * OPS) / 1000));
  console.log("- Time for 1000 at() calls (ms):", elapsedMs(startTime));

  startTime = process.hrtime.bigint();
  let popped = 0;
  for (let i = OPS; i < 2 * OPS; i++) {
    const view = ends[i] === 0 ? deque.tryViewFront() : deque.tryViewBack();
    if (view === undefined) break;
    deque = ends[i] === 0 ? view[1] : view[0];
    popped++;
  }
  console.log("- Pop time (ms):", elapsedMs(startTime));
  assert.strictEqual(popped, OPS);
  assert.isTrue(deque.isEmpty());
}

async function memory(deque: Deque<number>) {
  // Build a copy in a separate scope, after a pause, so that GC is more consistent.
  await sleep(1000);
  const startMem = getMemUsed();

  let copy: Deque<number> | null = null;
  (function () {
    copy = Deque.from(deque);
  })();

  console.log(
    "- Mem used estimate (MB):",
    ((getMemUsed() - startMem) / 1000000).toFixed(1)
  );

  // Keep stuff in scope so we don't accidentally subtract its memory usage.
  void copy;
}
