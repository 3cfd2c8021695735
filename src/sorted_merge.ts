import type { FingerTree } from "./finger_tree";
import { Max } from "./measure";

/**
 * Describes a FingerTree that is sorted strictly ascending by key,
 * with a measure that exposes the maximum key of its items.
 */
export interface SortedOps<V, M, K> {
  key(item: V): K;
  maxKey(measure: M): Max<K>;
  compare(a: K, b: K): number;
}

/**
 * Returns the monotone predicate "the max key so far is >= key".
 *
 * Splitting on it separates the items with keys < key from the rest.
 */
export function atLeast<V, M, K>(
  ops: SortedOps<V, M, K>,
  key: K
): (measure: M) => boolean {
  return (measure) => {
    const max = ops.maxKey(measure);
    return max !== null && ops.compare(max.value, key) >= 0;
  };
}

function sameKey<V, M, K>(ops: SortedOps<V, M, K>, a: V, b: V): boolean {
  return ops.compare(ops.key(a), ops.key(b)) === 0;
}

/*
 The algorithms below alternate between the two inputs: take the head of one side,
 split the other side where its keys reach the head's key, emit what was skipped,
 then swap roles. Each split costs O(log d) for a distance d, which sums to
 O(m log(n/m + 1)) when the inputs have sizes m <= n.

 They are loops rather than recursions so that heavily interleaved inputs
 do not grow the call stack.
*/

/**
 * Returns all items of xs and ys in key order. Items with equal keys are merged
 * with `combine(xItem, yItem)`.
 */
export function unionWith<V, M, K>(
  ops: SortedOps<V, M, K>,
  combine: (x: V, y: V) => V,
  xs: FingerTree<V, M>,
  ys: FingerTree<V, M>
): FingerTree<V, M> {
  let acc = xs.empty();
  // We split `a` at the head of `b`; `flipped` is true when a came from ys.
  let a = xs;
  let b = ys;
  let flipped = false;
  for (;;) {
    const view = b.viewFront();
    if (view === undefined) return acc.concat(a);
    const [head, bRest] = view;

    const [skipped, aRest] = a.split(atLeast(ops, ops.key(head)));
    acc = acc.concat(skipped);

    const match = aRest.viewFront();
    if (match !== undefined && sameKey(ops, match[0], head)) {
      acc = acc.pushBack(
        flipped ? combine(head, match[0]) : combine(match[0], head)
      );
      a = bRest;
      b = match[1];
    } else {
      acc = acc.pushBack(head);
      a = bRest;
      b = aRest;
    }
    flipped = !flipped;
  }
}

/**
 * Returns the items whose keys occur in both xs and ys, merged with
 * `combine(xItem, yItem)`. A merged item is dropped if combine returns undefined.
 */
export function intersectionWith<V, M, K>(
  ops: SortedOps<V, M, K>,
  combine: (x: V, y: V) => V | undefined,
  xs: FingerTree<V, M>,
  ys: FingerTree<V, M>
): FingerTree<V, M> {
  let acc = xs.empty();
  let a = xs;
  let b = ys;
  let flipped = false;
  for (;;) {
    const view = b.viewFront();
    if (view === undefined) return acc;
    const [head, bRest] = view;

    const aRest = a.split(atLeast(ops, ops.key(head)))[1];
    const match = aRest.viewFront();
    if (match === undefined) return acc;

    if (sameKey(ops, match[0], head)) {
      const merged = flipped
        ? combine(head, match[0])
        : combine(match[0], head);
      if (merged !== undefined) acc = acc.pushBack(merged);
      a = bRest;
      b = match[1];
    } else {
      a = bRest;
      b = aRest;
    }
    flipped = !flipped;
  }
}

/**
 * Returns the items of xs, where each item whose key also occurs in ys is replaced
 * by `combine(xItem, yItem)`, or dropped if that returns undefined.
 */
export function differenceWith<V, M, K>(
  ops: SortedOps<V, M, K>,
  combine: (x: V, y: V) => V | undefined,
  xs: FingerTree<V, M>,
  ys: FingerTree<V, M>
): FingerTree<V, M> {
  let acc = xs.empty();
  let a = xs;
  let b = ys;
  for (;;) {
    const view = a.viewFront();
    if (view === undefined) return acc;
    const [head, aRest] = view;

    b = b.split(atLeast(ops, ops.key(head)))[1];
    const match = b.viewFront();
    if (match === undefined) return acc.concat(a);

    if (sameKey(ops, match[0], head)) {
      const merged = combine(head, match[0]);
      if (merged !== undefined) acc = acc.pushBack(merged);
      a = aRest;
      b = match[1];
    } else {
      // Everything in a before b's head is kept as-is. This includes head.
      const [kept, rest] = a.split(atLeast(ops, ops.key(match[0])));
      acc = acc.concat(kept);
      a = rest;
    }
  }
}

/**
 * Returns whether xs and ys have no key in common.
 */
export function areDisjointWith<V, M, K>(
  ops: SortedOps<V, M, K>,
  xs: FingerTree<V, M>,
  ys: FingerTree<V, M>
): boolean {
  let a = xs;
  let b = ys;
  for (;;) {
    const view = b.viewFront();
    if (view === undefined) return true;
    const [head, bRest] = view;

    const aRest = a.split(atLeast(ops, ops.key(head)))[1];
    const match = aRest.viewFront();
    if (match === undefined) return true;
    if (sameKey(ops, match[0], head)) return false;

    a = bRest;
    b = aRest;
  }
}

/**
 * Returns whether every item of xs has an item with the same key in ys,
 * with `fits(xItem, yItem)`.
 *
 * `sizeOf` must be monotone under taking suffixes (e.g. an element count);
 * we return false early whenever the rest of xs is larger than the rest of ys.
 */
export function isSubsetOfWith<V, M, K>(
  ops: SortedOps<V, M, K>,
  sizeOf: (measure: M) => number,
  fits: (x: V, y: V) => boolean,
  xs: FingerTree<V, M>,
  ys: FingerTree<V, M>
): boolean {
  let a = xs;
  let b = ys;
  for (;;) {
    const view = a.viewFront();
    if (view === undefined) return true;
    if (sizeOf(a.measure) > sizeOf(b.measure)) return false;
    const [head, aRest] = view;

    // Skip ys's items with smaller keys; they cannot match anything left in xs.
    b = b.split(atLeast(ops, ops.key(head)))[1];
    const match = b.viewFront();
    if (match === undefined) return false;
    if (!sameKey(ops, match[0], head)) return false;
    if (!fits(head, match[0])) return false;

    a = aRest;
    b = match[1];
  }
}

