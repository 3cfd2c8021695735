import { Comparator, defaultCompare } from "./compare";
import { FingerTree } from "./finger_tree";
import { Max, maxMonoid, Measurer, sizeMonoid } from "./measure";
import { atLeast, SortedOps } from "./sorted_merge";

interface SetMeasure<T> {
  readonly size: number;
  readonly maxValue: Max<T>;
}

function setMeasurer<T>(): Measurer<T, SetMeasure<T>> {
  const max = maxMonoid<T>();
  return {
    identity: { size: sizeMonoid.identity, maxValue: max.identity },
    combine: (a, b) => ({
      size: sizeMonoid.combine(a.size, b.size),
      maxValue: max.combine(a.maxValue, b.maxValue),
    }),
    measure: (value) => ({ size: 1, maxValue: { value } }),
  };
}

/**
 * A set of distinct values in ascending order, as a persistent (immutable) data structure.
 *
 * This is the plain (multiplicity-free) counterpart of MultiSet, returned by
 * {@link MultiSet.support}. Like MultiSet, it is a sorted {@link FingerTree},
 * so building it from ascending values is O(n) and makes no comparisons.
 */
export class OrderedSet<T> implements Iterable<T> {
  /**
   * Internal - construct an OrderedSet using a static method (e.g. `OrderedSet.new`).
   */
  private constructor(
    private readonly tree: FingerTree<T, SetMeasure<T>>,
    /**
     * The order on values.
     */
    readonly compare: Comparator<T>
  ) {}

  /**
   * Constructs an empty set.
   *
   * @param compare The order on values. Defaults to {@link defaultCompare}.
   */
  static new<T>(compare: Comparator<T> = defaultCompare): OrderedSet<T> {
    return new this(FingerTree.new(setMeasurer<T>()), compare);
  }

  /**
   * Constructs a set from values that are already strictly ascending. O(n).
   *
   * This is not checked. If values are out of order or repeated,
   * the set's lookups will be wrong.
   */
  static fromDistinctAsc<T>(
    values: Iterable<T>,
    compare: Comparator<T> = defaultCompare
  ): OrderedSet<T> {
    return new this(FingerTree.from(setMeasurer<T>(), values), compare);
  }

  private get ops(): SortedOps<T, SetMeasure<T>, T> {
    return {
      key: (value) => value,
      maxKey: (measure) => measure.maxValue,
      compare: this.compare,
    };
  }

  has(value: T): boolean {
    const found = this.tree.lookup(atLeast(this.ops, value));
    return found !== undefined && this.compare(found, value) === 0;
  }

  /**
   * Returns a set that also contains value, or this set if it already does.
   */
  insert(value: T): OrderedSet<T> {
    if (this.has(value)) return this;
    return new OrderedSet(
      this.tree.modify(atLeast(this.ops, value), (current) =>
        current === undefined ? [value] : [value, current]
      ),
      this.compare
    );
  }

  /**
   * Returns a set without value, or this set if it does not contain value.
   */
  delete(value: T): OrderedSet<T> {
    if (!this.has(value)) return this;
    return new OrderedSet(
      this.tree.modify(atLeast(this.ops, value), () => []),
      this.compare
    );
  }

  get size(): number {
    return this.tree.measure.size;
  }

  isEmpty(): boolean {
    return this.tree.isEmpty();
  }

  /**
   * The smallest value, or undefined if empty.
   */
  min(): T | undefined {
    return this.tree.peekFront();
  }

  /**
   * The largest value, or undefined if empty.
   */
  max(): T | undefined {
    return this.tree.peekBack();
  }

  /**
   * Iterates over the values in ascending order.
   */
  [Symbol.iterator](): IterableIterator<T> {
    return this.tree[Symbol.iterator]();
  }

  values(): IterableIterator<T> {
    return this[Symbol.iterator]();
  }

  toArray(): T[] {
    return [...this];
  }

  toString(): string {
    return `OrderedSet {${this.toArray().join(", ")}}`;
  }
}
