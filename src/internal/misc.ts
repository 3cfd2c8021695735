/**
 * @throws If count is not a non-negative safe integer.
 */
export function checkCount(count: number): void {
  if (!(Number.isSafeInteger(count) && count >= 0)) {
    throw new Error(`Invalid count: ${count}`);
  }
}

/**
 * @throws If index is not an integer in [0, length).
 */
export function checkIndex(index: number, length: number): void {
  if (!(Number.isSafeInteger(index) && 0 <= index && index < length)) {
    throw new Error(`Index out of bounds: ${index} (length: ${length})`);
  }
}

/**
 * Returns whether k is a valid 1-based rank, i.e., a positive safe integer.
 * Ranks past the end are not checked here.
 */
export function isRank(k: number): boolean {
  return Number.isSafeInteger(k) && k >= 1;
}
