import seedrandom from "seedrandom";

export function avg(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((a, b) => a + b, 0) / values.length;
}

export function getMemUsed(): number {
  return process.memoryUsage().heapUsed;
}

export async function sleep(ms: number): Promise<void> {
  await new Promise<void>((resolve) => setTimeout(resolve, ms));
}

/**
 * Milliseconds since startTime, from `process.hrtime.bigint()`.
 */
export function elapsedMs(startTime: bigint): number {
  return Math.round(Number(process.hrtime.bigint() - startTime) / 1000000);
}

/**
 * Deterministic random integers in [0, range).
 */
export function randomInts(seed: string, count: number, range: number) {
  const prng = seedrandom(seed);
  const ans: number[] = [];
  for (let i = 0; i < count; i++) ans.push(Math.floor(prng() * range));
  return ans;
}
