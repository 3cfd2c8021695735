/**
 * An associative combine operation with an identity element.
 *
 * `combine` must be associative and `identity` must be neutral on both sides.
 * FingerTree relies on this to cache subtree measures in any grouping.
 */
export interface Monoid<M> {
  readonly identity: M;
  combine(a: M, b: M): M;
}

/**
 * A monoid together with a way to measure a single item.
 *
 * The measure of a sequence is the in-order combination of its items' measures.
 */
export interface Measurer<V, M> extends Monoid<M> {
  measure(value: V): M;
}

/**
 * Counts items.
 */
export const sizeMonoid: Monoid<number> = {
  identity: 0,
  combine: (a, b) => a + b,
};

/**
 * The maximum of a sequence, or null for the empty sequence.
 */
export type Max<T> = { readonly value: T } | null;

const maxMonoidInstance: Monoid<Max<never>> = {
  identity: null,
  combine: (a, b) => b ?? a,
};

/**
 * Right-biased maximum: combining keeps the right operand unless it is empty.
 *
 * This is only a maximum for sequences that are sorted ascending,
 * which is the only place we use it.
 */
export function maxMonoid<T>(): Monoid<Max<T>> {
  return maxMonoidInstance;
}
