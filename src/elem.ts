import { Max, Measurer, maxMonoid, sizeMonoid } from "./measure";

/**
 * A Deque item: one occurrence of a value.
 */
export interface Elem<T> {
  readonly value: T;
}

/**
 * Measures each Elem as 1, so a tree's measure is its length.
 */
export const elemMeasurer: Measurer<Elem<unknown>, number> = {
  identity: sizeMonoid.identity,
  combine: sizeMonoid.combine,
  measure: () => 1,
};

export function* foldElem<T>(elem: Elem<T>): IterableIterator<T> {
  yield elem.value;
}

export function mapElem<T, U>(f: (value: T) => U, elem: Elem<T>): Elem<U> {
  return { value: f(elem.value) };
}

/**
 * A MultiSet record: a value with its number of occurrences.
 *
 * Records with multiplicity 0 are never stored; see {@link changeMultiplicity}.
 */
export interface MultiElem<T> {
  readonly value: T;
  /**
   * A positive safe integer.
   */
  readonly multiplicity: number;
}

/**
 * The measure of a run of MultiElems.
 */
export interface MultiMeasure<T> {
  /**
   * The sum of multiplicities.
   */
  readonly cardinality: number;
  /**
   * The number of records, i.e., distinct values.
   */
  readonly supportSize: number;
  /**
   * The last record's value, which is the largest in a sorted run.
   */
  readonly maxKey: Max<T>;
}

export function multiMeasurer<T>(): Measurer<MultiElem<T>, MultiMeasure<T>> {
  const max = maxMonoid<T>();
  return {
    identity: { cardinality: 0, supportSize: 0, maxKey: max.identity },
    combine: (a, b) => ({
      cardinality: sizeMonoid.combine(a.cardinality, b.cardinality),
      supportSize: sizeMonoid.combine(a.supportSize, b.supportSize),
      maxKey: max.combine(a.maxKey, b.maxKey),
    }),
    measure: (elem) => ({
      cardinality: elem.multiplicity,
      supportSize: 1,
      maxKey: { value: elem.value },
    }),
  };
}

export function multiElem<T>(value: T): MultiElem<T> {
  return { value, multiplicity: 1 };
}

/**
 * Applies `f` to the record's multiplicity.
 *
 * Returns undefined if the result is <= 0, so that callers drop the record.
 * All multiplicity arithmetic goes through this function.
 *
 * @throws If the result is positive but not a safe integer.
 */
export function changeMultiplicity<T>(
  f: (multiplicity: number) => number,
  elem: MultiElem<T>
): MultiElem<T> | undefined {
  const multiplicity = f(elem.multiplicity);
  if (multiplicity <= 0) return undefined;
  if (!Number.isSafeInteger(multiplicity)) {
    throw new Error(`Invalid multiplicity: ${multiplicity}`);
  }
  return { value: elem.value, multiplicity };
}

/**
 * Like changeMultiplicity, for callers that know the result is positive.
 */
function changePositive<T>(
  f: (multiplicity: number) => number,
  elem: MultiElem<T>
): MultiElem<T> {
  const ans = changeMultiplicity(f, elem);
  if (ans === undefined) {
    throw new Error(`Invalid multiplicity: ${f(elem.multiplicity)}`);
  }
  return ans;
}

/**
 * @throws If multiplicity is not positive.
 */
export function setMultiplicity<T>(
  multiplicity: number,
  elem: MultiElem<T>
): MultiElem<T> {
  return changePositive(() => multiplicity, elem);
}

export function incrementMultiElem<T>(elem: MultiElem<T>): MultiElem<T> {
  return changePositive((m) => m + 1, elem);
}

export function decrementMultiElem<T>(
  elem: MultiElem<T>
): MultiElem<T> | undefined {
  return changeMultiplicity((m) => m - 1, elem);
}

// The binary helpers assume that x and y have equal values. The result keeps x's value.

export function sumMultiElem<T>(x: MultiElem<T>, y: MultiElem<T>): MultiElem<T> {
  return changePositive((m) => m + y.multiplicity, x);
}

export function minMultiElem<T>(x: MultiElem<T>, y: MultiElem<T>): MultiElem<T> {
  return changePositive((m) => Math.min(m, y.multiplicity), x);
}

export function differenceMultiElem<T>(
  x: MultiElem<T>,
  y: MultiElem<T>
): MultiElem<T> | undefined {
  return changeMultiplicity((m) => m - y.multiplicity, x);
}

/**
 * Yields the record's value `multiplicity` times.
 */
export function* foldMultiElem<T>(elem: MultiElem<T>): IterableIterator<T> {
  for (let i = 0; i < elem.multiplicity; i++) yield elem.value;
}

export function mapMultiElem<T, U>(
  f: (value: T) => U,
  elem: MultiElem<T>
): MultiElem<U> {
  return { value: f(elem.value), multiplicity: elem.multiplicity };
}
