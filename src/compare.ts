/**
 * A total order: negative if a < b, 0 if a and b are equal, positive if a > b.
 */
export type Comparator<T> = (a: T, b: T) => number;

/**
 * The default order for MultiSet and OrderedSet.
 *
 * Orders numbers, strings, and bigints by `<`. For any other type, pass your own
 * Comparator to the collection's constructor.
 *
 * @throws If a and b are not both numbers, both strings, or both bigints.
 * @throws If a or b is NaN, which has no place in a total order.
 */
export function defaultCompare(a: unknown, b: unknown): number {
  if (typeof a === "number" && typeof b === "number") {
    if (Number.isNaN(a) || Number.isNaN(b)) {
      throw new Error("NaN is not supported");
    }
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === "string" && typeof b === "string") {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === "bigint" && typeof b === "bigint") {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  throw new Error(
    `No default order for ${typeof a} and ${typeof b}; pass a compare function`
  );
}
