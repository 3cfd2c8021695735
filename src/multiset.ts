import { Comparator, defaultCompare } from "./compare";
import {
  decrementMultiElem,
  differenceMultiElem,
  foldMultiElem,
  incrementMultiElem,
  mapMultiElem,
  minMultiElem,
  MultiElem,
  multiElem,
  MultiMeasure,
  multiMeasurer,
  setMultiplicity,
  sumMultiElem,
} from "./elem";
import { FingerTree } from "./finger_tree";
import { checkCount, isRank } from "./internal/misc";
import { OrderedSet } from "./ordered_set";
import {
  areDisjointWith,
  atLeast,
  differenceWith,
  intersectionWith,
  isSubsetOfWith,
  SortedOps,
  unionWith,
} from "./sorted_merge";

type MultiTree<T> = FingerTree<MultiElem<T>, MultiMeasure<T>>;

/**
 * An ordered multiset (bag), as a persistent (immutable) data structure.
 *
 * A MultiSet stores each distinct value once, together with its multiplicity
 * (number of occurrences), in ascending order according to its Comparator.
 * Mutating methods return a new MultiSet and leave the current one unchanged,
 * sharing memory with it where possible.
 *
 * Internally, a MultiSet is a {@link FingerTree} of {@link MultiElem} records, sorted
 * strictly ascending by value. Each subtree caches its cardinality (sum of
 * multiplicities), support size (number of records), and maximum value. Those let
 * point operations and order statistics run in logarithmic time, and let set
 * operations skip over runs that cannot interact.
 *
 * Complexity, for a multiset with n records:
 * - size, uniqueCount, isEmpty, smallestElem, largestElem: O(1).
 * - insert, deleteOnce, deleteAll, count: O(log(min(i, n - i))), where i is the
 * position of the value.
 * - kth*: O(log(min(k, n - k))).
 * - union, intersection, difference, isDisjointFrom, isSubsetOf: amortized
 * O(m log(n/m + 1)) for inputs with m <= n records.
 *
 * Binary operations use this multiset's Comparator for both inputs.
 */
export class MultiSet<T> implements Iterable<T> {
  /**
   * Internal - construct a MultiSet using a static method (e.g. `MultiSet.new`).
   */
  private constructor(
    private readonly tree: MultiTree<T>,
    /**
     * The order on values.
     */
    readonly compare: Comparator<T>
  ) {}

  /**
   * Constructs an empty multiset.
   *
   * To begin with a non-empty multiset, use {@link MultiSet.from} or
   * one of the other static builders.
   *
   * @param compare The order on values. Defaults to {@link defaultCompare}.
   */
  static new<T>(compare: Comparator<T> = defaultCompare): MultiSet<T> {
    return new this(FingerTree.new(multiMeasurer<T>()), compare);
  }

  static singleton<T>(
    value: T,
    compare: Comparator<T> = defaultCompare
  ): MultiSet<T> {
    return new this(
      FingerTree.singleton(multiMeasurer<T>(), multiElem(value)),
      compare
    );
  }

  /**
   * Constructs a multiset with the given values, in any order. O(n log(n)).
   */
  static from<T>(
    values: Iterable<T>,
    compare: Comparator<T> = defaultCompare
  ): MultiSet<T> {
    let ans = MultiSet.new(compare);
    for (const value of values) ans = ans.insert(value);
    return ans;
  }

  /**
   * Constructs a multiset from ascending values. O(n).
   *
   * Equal values must be adjacent. This is not checked: non-adjacent repeats
   * become separate records and corrupt the multiset.
   */
  static fromAsc<T>(
    values: Iterable<T>,
    compare: Comparator<T> = defaultCompare
  ): MultiSet<T> {
    let tree = FingerTree.new(multiMeasurer<T>());
    let last: MultiElem<T> | undefined = undefined;
    for (const value of values) {
      if (last !== undefined && compare(last.value, value) === 0) {
        last = incrementMultiElem(last);
      } else {
        if (last !== undefined) tree = tree.pushBack(last);
        last = multiElem(value);
      }
    }
    if (last !== undefined) tree = tree.pushBack(last);
    return new this(tree, compare);
  }

  /**
   * Constructs a multiset from descending values. O(n).
   *
   * Equal values must be adjacent. This is not checked: non-adjacent repeats
   * become separate records and corrupt the multiset.
   */
  static fromDesc<T>(
    values: Iterable<T>,
    compare: Comparator<T> = defaultCompare
  ): MultiSet<T> {
    let tree = FingerTree.new(multiMeasurer<T>());
    let first: MultiElem<T> | undefined = undefined;
    for (const value of values) {
      if (first !== undefined && compare(first.value, value) === 0) {
        first = incrementMultiElem(first);
      } else {
        if (first !== undefined) tree = tree.pushFront(first);
        first = multiElem(value);
      }
    }
    if (first !== undefined) tree = tree.pushFront(first);
    return new this(tree, compare);
  }

  /**
   * Constructs a multiset from strictly ascending values. O(n).
   *
   * This is not checked. Out-of-order or repeated values corrupt the multiset.
   */
  static fromDistinctAsc<T>(
    values: Iterable<T>,
    compare: Comparator<T> = defaultCompare
  ): MultiSet<T> {
    let tree = FingerTree.new(multiMeasurer<T>());
    for (const value of values) tree = tree.pushBack(multiElem(value));
    return new this(tree, compare);
  }

  /**
   * Constructs a multiset from strictly descending values. O(n).
   *
   * This is not checked. Out-of-order or repeated values corrupt the multiset.
   */
  static fromDistinctDesc<T>(
    values: Iterable<T>,
    compare: Comparator<T> = defaultCompare
  ): MultiSet<T> {
    let tree = FingerTree.new(multiMeasurer<T>());
    for (const value of values) tree = tree.pushFront(multiElem(value));
    return new this(tree, compare);
  }

  /**
   * Constructs a multiset from `[value, count]` pairs, in any order.
   * Repeated values add up.
   *
   * @throws If any count is not a non-negative safe integer.
   */
  static fromOccurrences<T>(
    occurrences: Iterable<readonly [value: T, count: number]>,
    compare: Comparator<T> = defaultCompare
  ): MultiSet<T> {
    let ans = MultiSet.new(compare);
    for (const [value, count] of occurrences) {
      ans = ans.insertMany(value, count);
    }
    return ans;
  }

  /**
   * @throws If the tree's cardinality is not a safe integer.
   */
  private static fromTree<T>(
    tree: MultiTree<T>,
    compare: Comparator<T>
  ): MultiSet<T> {
    const size = tree.measure.cardinality;
    if (!Number.isSafeInteger(size)) {
      throw new Error(`Invalid size: ${size}`);
    }
    return new MultiSet(tree, compare);
  }

  private wrap(tree: MultiTree<T>): MultiSet<T> {
    return MultiSet.fromTree(tree, this.compare);
  }

  private get ops(): SortedOps<MultiElem<T>, MultiMeasure<T>, T> {
    return {
      key: (elem) => elem.value,
      maxKey: (measure) => measure.maxKey,
      compare: this.compare,
    };
  }

  /**
   * The monotone predicate whose split point is the first record >= value.
   */
  private locate(value: T): (measure: MultiMeasure<T>) => boolean {
    return atLeast(this.ops, value);
  }

  private isRecordOf(elem: MultiElem<T>, value: T): boolean {
    return this.compare(elem.value, value) === 0;
  }

  // Accessors

  /**
   * The number of values, counting multiplicity.
   */
  get size(): number {
    return this.tree.measure.cardinality;
  }

  /**
   * The number of distinct values.
   */
  get uniqueCount(): number {
    return this.tree.measure.supportSize;
  }

  isEmpty(): boolean {
    return this.tree.isEmpty();
  }

  /**
   * Returns the multiplicity of value, or 0 if it is not present.
   */
  count(value: T): number {
    const elem = this.tree.lookup(this.locate(value));
    if (elem === undefined || !this.isRecordOf(elem, value)) return 0;
    return elem.multiplicity;
  }

  has(value: T): boolean {
    return this.count(value) !== 0;
  }

  // Mutators

  /**
   * Adds one occurrence of value.
   */
  insert(value: T): MultiSet<T> {
    return this.wrap(
      this.tree.modify(this.locate(value), (current) => {
        if (current === undefined) return [multiElem(value)];
        if (this.isRecordOf(current, value)) {
          return [incrementMultiElem(current)];
        }
        return [multiElem(value), current];
      })
    );
  }

  /**
   * Adds `count` occurrences of value.
   *
   * @throws If count is not a non-negative safe integer.
   */
  insertMany(value: T, count: number): MultiSet<T> {
    checkCount(count);
    if (count === 0) return this;
    return this.wrap(
      this.tree.modify(this.locate(value), (current) => {
        const added = setMultiplicity(count, multiElem(value));
        if (current === undefined) return [added];
        if (this.isRecordOf(current, value)) {
          return [sumMultiElem(current, added)];
        }
        return [added, current];
      })
    );
  }

  /**
   * Removes one occurrence of value, removing its record once none are left.
   *
   * If value is not present, this multiset is returned unchanged.
   */
  deleteOnce(value: T): MultiSet<T> {
    if (!this.has(value)) return this;
    return this.wrap(
      this.tree.modify(this.locate(value), (current) => {
        if (current === undefined) return [];
        if (!this.isRecordOf(current, value)) return [current];
        const decremented = decrementMultiElem(current);
        return decremented === undefined ? [] : [decremented];
      })
    );
  }

  /**
   * Removes all occurrences of value.
   *
   * If value is not present, this multiset is returned unchanged.
   */
  deleteAll(value: T): MultiSet<T> {
    if (!this.has(value)) return this;
    return this.wrap(
      this.tree.modify(this.locate(value), (current) => {
        if (current === undefined || this.isRecordOf(current, value)) return [];
        return [current];
      })
    );
  }

  /**
   * Maps each value through f, which need not preserve order. O(n log(n)).
   *
   * @param compare The order on the result. Defaults to {@link defaultCompare}.
   */
  map<U>(
    f: (value: T) => U,
    compare: Comparator<U> = defaultCompare
  ): MultiSet<U> {
    let ans = MultiSet.new(compare);
    for (const elem of this.tree) {
      ans = ans.insertMany(f(elem.value), elem.multiplicity);
    }
    return ans;
  }

  /**
   * Maps each value through f, keeping the records' order and multiplicities. O(n).
   *
   * f must be strictly increasing: `this.compare(a, b) < 0` must imply
   * `compare(f(a), f(b)) < 0`. This is not checked; other functions corrupt
   * the result. Use {@link map} instead if unsure.
   *
   * @param compare The order on the result. Defaults to {@link defaultCompare}.
   */
  mapMonotonic<U>(
    f: (value: T) => U,
    compare: Comparator<U> = defaultCompare
  ): MultiSet<U> {
    return MultiSet.fromTree(
      this.tree.mapItems(multiMeasurer<U>(), (elem) => mapMultiElem(f, elem)),
      compare
    );
  }

  // Order statistics

  /**
   * Returns the least value, or undefined if empty.
   */
  smallestElem(): T | undefined {
    return this.tree.peekFront()?.value;
  }

  /**
   * Returns the greatest value, or undefined if empty.
   */
  largestElem(): T | undefined {
    return this.tree.peekBack()?.value;
  }

  /**
   * Returns the k-th least value (1-based), counting multiplicity.
   *
   * Returns undefined if k is not an integer in the range [1, size].
   */
  kthSmallestElem(k: number): T | undefined {
    if (!isRank(k)) return undefined;
    return this.tree.lookup((measure) => measure.cardinality >= k)?.value;
  }

  /**
   * Returns the k-th greatest value (1-based), counting multiplicity.
   *
   * Returns undefined if k is not an integer in the range [1, size].
   */
  kthLargestElem(k: number): T | undefined {
    if (!isRank(k)) return undefined;
    return this.kthSmallestElem(this.size - k + 1);
  }

  /**
   * Returns the k-th least distinct value (1-based), ignoring multiplicity.
   *
   * Returns undefined if k is not an integer in the range [1, uniqueCount].
   */
  kthSmallestUniqueElem(k: number): T | undefined {
    if (!isRank(k)) return undefined;
    return this.tree.lookup((measure) => measure.supportSize >= k)?.value;
  }

  /**
   * Returns the k-th greatest distinct value (1-based), ignoring multiplicity.
   *
   * Returns undefined if k is not an integer in the range [1, uniqueCount].
   */
  kthLargestUniqueElem(k: number): T | undefined {
    if (!isRank(k)) return undefined;
    return this.kthSmallestUniqueElem(this.uniqueCount - k + 1);
  }

  // Set operations

  /**
   * Returns the multiset sum: multiplicities add up.
   */
  union(other: MultiSet<T>): MultiSet<T> {
    return this.wrap(unionWith(this.ops, sumMultiElem, this.tree, other.tree));
  }

  /**
   * Returns the values in both multisets, each with its smaller multiplicity.
   */
  intersection(other: MultiSet<T>): MultiSet<T> {
    return this.wrap(
      intersectionWith(this.ops, minMultiElem, this.tree, other.tree)
    );
  }

  /**
   * Returns this multiset with other's occurrences taken away.
   * Values whose multiplicity drops to 0 or below are removed.
   */
  difference(other: MultiSet<T>): MultiSet<T> {
    return this.wrap(
      differenceWith(this.ops, differenceMultiElem, this.tree, other.tree)
    );
  }

  /**
   * Returns whether no value is in both multisets.
   */
  isDisjointFrom(other: MultiSet<T>): boolean {
    return areDisjointWith(this.ops, this.tree, other.tree);
  }

  /**
   * Returns whether each value occurs in other at least as many times as in this.
   */
  isSubsetOf(other: MultiSet<T>): boolean {
    return isSubsetOfWith(
      this.ops,
      (measure) => measure.cardinality,
      (x, y) => x.multiplicity <= y.multiplicity,
      this.tree,
      other.tree
    );
  }

  /**
   * Returns whether each value occurs in this at least as many times as in other.
   */
  isSupsetOf(other: MultiSet<T>): boolean {
    return other.isSubsetOf(this);
  }

  /**
   * Returns whether the two multisets have the same values with the same multiplicities.
   */
  equals(other: MultiSet<T>): boolean {
    return this.isSubsetOf(other) && other.isSubsetOf(this);
  }

  /**
   * Returns the distinct values as an OrderedSet. O(n).
   */
  support(): OrderedSet<T> {
    return OrderedSet.fromDistinctAsc(this.distinctValues(), this.compare);
  }

  // Iterators

  /**
   * Iterates over the values in ascending order, repeating each by its multiplicity.
   */
  *[Symbol.iterator](): IterableIterator<T> {
    for (const elem of this.tree) yield* foldMultiElem(elem);
  }

  values(): IterableIterator<T> {
    return this[Symbol.iterator]();
  }

  /**
   * Iterates over the distinct values in ascending order.
   */
  *distinctValues(): IterableIterator<T> {
    for (const elem of this.tree) yield elem.value;
  }

  /**
   * Iterates over `[value, multiplicity]` pairs in ascending order of value.
   */
  *occurrences(): IterableIterator<[value: T, count: number]> {
    for (const elem of this.tree) yield [elem.value, elem.multiplicity];
  }

  toArray(): T[] {
    return [...this];
  }

  toString(): string {
    return `MultiSet {${this.toArray().join(", ")}}`;
  }
}
