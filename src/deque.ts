import { Elem, elemMeasurer, foldElem, mapElem } from "./elem";
import { FingerTree } from "./finger_tree";
import { checkIndex } from "./internal/misc";

/**
 * A double-ended queue, as a persistent (immutable) data structure.
 *
 * Values are kept in insertion order; no order on values is needed.
 * Mutating methods return a new Deque and leave the current one unchanged,
 * sharing memory with it where possible. Adding or removing at either end
 * takes O(1) amortized time, even if you keep using old versions.
 *
 * Internally, a Deque is a {@link FingerTree} of {@link Elem}s measured by their count.
 */
export class Deque<T> implements Iterable<T> {
  /**
   * Internal - construct a Deque using a static method (e.g. `Deque.new`).
   */
  private constructor(private readonly tree: FingerTree<Elem<T>, number>) {}

  /**
   * Constructs an empty deque.
   */
  static new<T>(): Deque<T> {
    return new this(FingerTree.new<Elem<T>, number>(elemMeasurer));
  }

  static singleton<T>(value: T): Deque<T> {
    return new this(
      FingerTree.singleton<Elem<T>, number>(elemMeasurer, { value })
    );
  }

  /**
   * Constructs a deque with the given values, in order. O(n).
   */
  static from<T>(values: Iterable<T>): Deque<T> {
    const arr = [...values];
    let tree = FingerTree.new<Elem<T>, number>(elemMeasurer);
    // Front-insert in reverse so that the result reads in arr's order.
    for (let i = arr.length - 1; i >= 0; i--) {
      tree = tree.pushFront({ value: arr[i] });
    }
    return new this(tree);
  }

  get size(): number {
    return this.tree.measure;
  }

  isEmpty(): boolean {
    return this.tree.isEmpty();
  }

  pushFront(value: T): Deque<T> {
    return new Deque(this.tree.pushFront({ value }));
  }

  pushBack(value: T): Deque<T> {
    return new Deque(this.tree.pushBack({ value }));
  }

  /**
   * Returns the first value and the rest of the deque, or undefined if the deque is empty.
   */
  tryViewFront(): [first: T, rest: Deque<T>] | undefined {
    const view = this.tree.viewFront();
    if (view === undefined) return undefined;
    return [view[0].value, new Deque(view[1])];
  }

  /**
   * Returns the rest of the deque and the last value, or undefined if the deque is empty.
   */
  tryViewBack(): [rest: Deque<T>, last: T] | undefined {
    const view = this.tree.viewBack();
    if (view === undefined) return undefined;
    return [new Deque(view[0]), view[1].value];
  }

  /**
   * Returns the first value.
   *
   * @throws If the deque is empty.
   */
  head(): T {
    const first = this.tree.peekFront();
    if (first === undefined) throw new Error("Deque is empty");
    return first.value;
  }

  /**
   * Returns the deque without its first value.
   *
   * @throws If the deque is empty.
   */
  tail(): Deque<T> {
    const view = this.tryViewFront();
    if (view === undefined) throw new Error("Deque is empty");
    return view[1];
  }

  /**
   * Returns the last value.
   *
   * @throws If the deque is empty.
   */
  last(): T {
    const last = this.tree.peekBack();
    if (last === undefined) throw new Error("Deque is empty");
    return last.value;
  }

  /**
   * Returns the deque without its last value.
   *
   * @throws If the deque is empty.
   */
  init(): Deque<T> {
    const view = this.tryViewBack();
    if (view === undefined) throw new Error("Deque is empty");
    return view[0];
  }

  /**
   * Returns the value at the given index. O(log(min(index, size - index))).
   *
   * @throws If index is out of bounds.
   */
  at(index: number): T {
    checkIndex(index, this.size);
    const elem = this.tree.lookup((count) => count > index);
    if (elem === undefined) throw new Error("Internal error");
    return elem.value;
  }

  /**
   * Returns this deque followed by other.
   */
  concat(other: Deque<T>): Deque<T> {
    return new Deque(this.tree.concat(other.tree));
  }

  map<U>(f: (value: T) => U): Deque<U> {
    return new Deque(
      this.tree.mapItems<Elem<U>, number>(elemMeasurer, (elem) =>
        mapElem(f, elem)
      )
    );
  }

  // Iterators

  /**
   * Iterates over the values, front to back.
   */
  *[Symbol.iterator](): IterableIterator<T> {
    for (const elem of this.tree) yield* foldElem(elem);
  }

  values(): IterableIterator<T> {
    return this[Symbol.iterator]();
  }

  /**
   * Iterates over the values, back to front.
   */
  *reversed(): IterableIterator<T> {
    for (const elem of this.tree.reversed()) yield* foldElem(elem);
  }

  toArray(): T[] {
    return [...this];
  }

  toString(): string {
    return `Deque [${this.toArray().join(", ")}]`;
  }
}
