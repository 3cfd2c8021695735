import { Measurer } from "./measure";

// Most of this file is internal. FingerTree and MAX_DIGIT are the public exports;
// Level, Lazy and Tree are exported for tests that check the tree's structure.

/*
 FingerTree implementation: a 2-3 finger tree (Hinze & Paterson), as a persistent data structure.

 A non-empty tree is either a Single item or a Deep node made of a prefix digit (1-4 items),
 a middle tree whose items are Nodes (2-3 items each, from this level), and a suffix digit.
 So the middle tree of a level-k tree stores level-(k+1) items. The code is generic in
 the item type A, and a Level object tells each function how to measure the current
 level's items.

 Each Deep node caches its measure. Measures let us split the sequence at the first point
 where a monotone predicate on the accumulated (prefix) measure becomes true, which
 gives indexed access, sorted search, and so on depending on the chosen monoid.

 The middle tree of a Deep node is held in a Lazy cell. Pushing into a full digit
 suspends the push into the middle tree, and Deep nodes that share a middle tree share
 its cell, so the suspended work runs at most once. Before suspending a push, we force
 the cell it builds on, so each level has at most one pending suspension and forcing
 never recurses deeper than the tree.

 Concatenation and splitting build their middle trees eagerly; both take O(log n)
 anyway.
*/

/**
 * The maximum number of items in a digit (the prefix or suffix of a Deep node).
 */
export const MAX_DIGIT = 4;

/**
 * An internal 2-3 node, whose items come from the level below.
 */
class Node<A, M> {
  constructor(readonly measure: M, readonly items: readonly A[]) {}
}

/**
 * How to measure the items at one level of the tree.
 *
 * Level 0 measures user items; level k + 1 measures the Nodes of level k.
 */
export class Level<A, M> {
  private _next?: Level<Node<A, M>, M>;

  constructor(
    readonly measure: (item: A) => M,
    readonly combine: (a: M, b: M) => M,
    readonly identity: M
  ) {}

  /**
   * The level of this level's middle trees, created on first use.
   */
  get next(): Level<Node<A, M>, M> {
    if (this._next === undefined) {
      this._next = new Level<Node<A, M>, M>(
        nodeMeasure,
        this.combine,
        this.identity
      );
    }
    return this._next;
  }

  measureAll(items: readonly A[]): M {
    let acc = this.identity;
    for (const item of items) acc = this.combine(acc, this.measure(item));
    return acc;
  }

  node(items: readonly A[]): Node<A, M> {
    return new Node(this.measureAll(items), items);
  }
}

function nodeMeasure<A, M>(node: Node<A, M>): M {
  return node.measure;
}

/**
 * A memoized suspension.
 */
export class Lazy<T> {
  private constructor(
    private state: { forced: true; value: T } | { forced: false; thunk: () => T }
  ) {}

  static of<T>(value: T): Lazy<T> {
    return new this({ forced: true, value });
  }

  static suspend<T>(thunk: () => T): Lazy<T> {
    return new this({ forced: false, thunk });
  }

  get isForced(): boolean {
    return this.state.forced;
  }

  get value(): T {
    const state = this.state;
    if (state.forced) return state.value;
    const value = state.thunk();
    this.state = { forced: true, value };
    return value;
  }
}

function emptyMiddle<A, M>(): Lazy<Tree<Node<A, M>, M>> {
  return Lazy.of<Tree<Node<A, M>, M>>(EMPTY);
}

interface Empty {
  readonly kind: "empty";
}

const EMPTY: Empty = { kind: "empty" };

class Single<A> {
  readonly kind = "single";

  constructor(readonly item: A) {}
}

class Deep<A, M> {
  readonly kind = "deep";

  private cachedMeasure: { value: M } | null = null;

  constructor(
    readonly level: Level<A, M>,
    readonly prefix: readonly A[],
    /**
     * Shared with every other Deep node that has the same middle tree.
     */
    readonly middleCell: Lazy<Tree<Node<A, M>, M>>,
    readonly suffix: readonly A[]
  ) {}

  /**
   * The middle tree, forcing it if needed.
   */
  get middle(): Tree<Node<A, M>, M> {
    return this.middleCell.value;
  }

  get measure(): M {
    if (this.cachedMeasure === null) {
      const level = this.level;
      this.cachedMeasure = {
        value: level.combine(
          level.combine(
            level.measureAll(this.prefix),
            measureTree(level.next, this.middle)
          ),
          level.measureAll(this.suffix)
        ),
      };
    }
    return this.cachedMeasure.value;
  }
}

export type Tree<A, M> = Empty | Single<A> | Deep<A, M>;

/**
 * A split point: left ++ [item] ++ right.
 */
interface Split<A, M> {
  left: Tree<A, M>;
  item: A;
  right: Tree<A, M>;
}

/**
 * A persistent sequence of items, each annotated with a measure from a monoid.
 *
 * All mutating methods return a new FingerTree and leave the current one unchanged,
 * sharing memory where possible.
 *
 * Complexity, for a tree of n items:
 * - measure, isEmpty, peekFront, peekBack: O(1).
 * - pushFront, pushBack, viewFront, viewBack: O(1) amortized.
 * - split, lookup, modify: O(log(min(i, n - i))), where i is the position found.
 * - concat: O(log(min(n1, n2))).
 */
export class FingerTree<V, M> implements Iterable<V> {
  /**
   * Internal - construct a FingerTree using a static method (e.g. `FingerTree.new`).
   */
  private constructor(
    private readonly level: Level<V, M>,
    private readonly root: Tree<V, M>
  ) {}

  /**
   * Constructs an empty tree whose items are measured by `measurer`.
   */
  static new<V, M>(measurer: Measurer<V, M>): FingerTree<V, M> {
    return new FingerTree(levelOf(measurer), EMPTY);
  }

  static singleton<V, M>(measurer: Measurer<V, M>, value: V): FingerTree<V, M> {
    return new FingerTree(levelOf(measurer), new Single(value));
  }

  /**
   * Constructs a tree with the given values, in order. O(n).
   */
  static from<V, M>(
    measurer: Measurer<V, M>,
    values: Iterable<V>
  ): FingerTree<V, M> {
    const level = levelOf(measurer);
    let root: Tree<V, M> = EMPTY;
    for (const value of values) root = pushBack(level, root, value);
    return new FingerTree(level, root);
  }

  /**
   * Returns an empty tree with the same measurer.
   */
  empty(): FingerTree<V, M> {
    return this.wrap(EMPTY);
  }

  private wrap(root: Tree<V, M>): FingerTree<V, M> {
    return new FingerTree(this.level, root);
  }

  /**
   * The combined measure of all items (the identity if empty).
   */
  get measure(): M {
    return measureTree(this.level, this.root);
  }

  isEmpty(): boolean {
    return this.root.kind === "empty";
  }

  pushFront(value: V): FingerTree<V, M> {
    return this.wrap(pushFront(this.level, value, this.root));
  }

  pushBack(value: V): FingerTree<V, M> {
    return this.wrap(pushBack(this.level, this.root, value));
  }

  /**
   * Returns the first item and the rest of the tree, or undefined if empty.
   */
  viewFront(): [first: V, rest: FingerTree<V, M>] | undefined {
    const view = viewFront(this.level, this.root);
    if (view === undefined) return undefined;
    return [view[0], this.wrap(view[1])];
  }

  /**
   * Returns the rest of the tree and the last item, or undefined if empty.
   */
  viewBack(): [rest: FingerTree<V, M>, last: V] | undefined {
    const view = viewBack(this.level, this.root);
    if (view === undefined) return undefined;
    return [this.wrap(view[0]), view[1]];
  }

  peekFront(): V | undefined {
    switch (this.root.kind) {
      case "empty":
        return undefined;
      case "single":
        return this.root.item;
      case "deep":
        return this.root.prefix[0];
    }
  }

  peekBack(): V | undefined {
    switch (this.root.kind) {
      case "empty":
        return undefined;
      case "single":
        return this.root.item;
      case "deep":
        return this.root.suffix[this.root.suffix.length - 1];
    }
  }

  /**
   * Splits the tree before the first item at which `predicate` becomes true,
   * when applied to the measure of all items up to and including that item.
   *
   * `predicate` must be monotone: once true for a prefix, true for every longer prefix.
   * If it is never true, the right tree is empty.
   */
  split(
    predicate: (measure: M) => boolean
  ): [left: FingerTree<V, M>, right: FingerTree<V, M>] {
    if (this.root.kind === "empty") return [this, this];
    if (!predicate(this.measure)) return [this, this.empty()];
    const split = splitTree(
      this.level,
      predicate,
      this.level.identity,
      this.root
    );
    return [
      this.wrap(split.left),
      this.wrap(pushFront(this.level, split.item, split.right)),
    ];
  }

  /**
   * Returns the item that starts the right tree of `split(predicate)`,
   * or undefined if there is none. Unlike split, this does not build any trees.
   */
  lookup(predicate: (measure: M) => boolean): V | undefined {
    if (this.root.kind === "empty") return undefined;
    if (!predicate(this.measure)) return undefined;
    return lookupTree(this.level, predicate, this.level.identity, this.root)
      .item;
  }

  /**
   * Replaces the item that `lookup(predicate)` would return by the items that `update` returns.
   *
   * `update` receives undefined if there is no such item; its return value is then inserted
   * at the end. Return `[]` to delete, `[item]` to replace, or several items to insert.
   */
  modify(
    predicate: (measure: M) => boolean,
    update: (current: V | undefined) => readonly V[]
  ): FingerTree<V, M> {
    const [left, right] = this.split(predicate);
    const view = viewFront(this.level, right.root);
    const replacement = update(view?.[0]);
    return this.wrap(
      app3(
        this.level,
        left.root,
        replacement,
        view === undefined ? EMPTY : view[1]
      )
    );
  }

  /**
   * Returns the concatenation of this tree and `other`.
   *
   * `other` must use the same measurer.
   */
  concat(other: FingerTree<V, M>): FingerTree<V, M> {
    return this.wrap(app3(this.level, this.root, [], other.root));
  }

  /**
   * Maps each item, rebuilding the tree under a new measurer. O(n).
   */
  mapItems<V2, M2>(
    measurer: Measurer<V2, M2>,
    f: (value: V) => V2
  ): FingerTree<V2, M2> {
    const root = this.root;
    return FingerTree.from(
      measurer,
      (function* () {
        for (const value of iterate(root)) yield f(value);
      })()
    );
  }

  /**
   * Iterates over all items, front to back.
   */
  [Symbol.iterator](): IterableIterator<V> {
    return iterate(this.root);
  }

  /**
   * Iterates over all items, back to front.
   */
  reversed(): IterableIterator<V> {
    return iterateReversed(this.root);
  }

  toArray(): V[] {
    return [...this];
  }
}

function levelOf<V, M>(measurer: Measurer<V, M>): Level<V, M> {
  return new Level<V, M>(
    (value) => measurer.measure(value),
    (a, b) => measurer.combine(a, b),
    measurer.identity
  );
}

function measureTree<A, M>(level: Level<A, M>, tree: Tree<A, M>): M {
  switch (tree.kind) {
    case "empty":
      return level.identity;
    case "single":
      return level.measure(tree.item);
    case "deep":
      return tree.measure;
  }
}

/**
 * Converts a digit (0-4 items) to a tree.
 */
function digitToTree<A, M>(level: Level<A, M>, digit: readonly A[]): Tree<A, M> {
  switch (digit.length) {
    case 0:
      return EMPTY;
    case 1:
      return new Single(digit[0]);
    default: {
      const half = Math.ceil(digit.length / 2);
      return new Deep(
        level,
        digit.slice(0, half),
        emptyMiddle(),
        digit.slice(half)
      );
    }
  }
}

function pushFront<A, M>(
  level: Level<A, M>,
  item: A,
  tree: Tree<A, M>
): Tree<A, M> {
  switch (tree.kind) {
    case "empty":
      return new Single(item);
    case "single":
      return new Deep(level, [item], emptyMiddle(), [tree.item]);
    case "deep": {
      const prefix = tree.prefix;
      if (prefix.length < MAX_DIGIT) {
        return new Deep(level, [item, ...prefix], tree.middleCell, tree.suffix);
      }
      // Full prefix: keep two items and push the other three down as a node.
      const middle = tree.middle;
      return new Deep(
        level,
        [item, prefix[0]],
        Lazy.suspend(() =>
          pushFront(
            level.next,
            level.node([prefix[1], prefix[2], prefix[3]]),
            middle
          )
        ),
        tree.suffix
      );
    }
  }
}

function pushBack<A, M>(
  level: Level<A, M>,
  tree: Tree<A, M>,
  item: A
): Tree<A, M> {
  switch (tree.kind) {
    case "empty":
      return new Single(item);
    case "single":
      return new Deep(level, [tree.item], emptyMiddle(), [item]);
    case "deep": {
      const suffix = tree.suffix;
      if (suffix.length < MAX_DIGIT) {
        return new Deep(level, tree.prefix, tree.middleCell, [...suffix, item]);
      }
      const middle = tree.middle;
      return new Deep(
        level,
        tree.prefix,
        Lazy.suspend(() =>
          pushBack(
            level.next,
            middle,
            level.node([suffix[0], suffix[1], suffix[2]])
          )
        ),
        [suffix[3], item]
      );
    }
  }
}

function pushFrontAll<A, M>(
  level: Level<A, M>,
  items: readonly A[],
  tree: Tree<A, M>
): Tree<A, M> {
  let ans = tree;
  for (let i = items.length - 1; i >= 0; i--) {
    ans = pushFront(level, items[i], ans);
  }
  return ans;
}

function pushBackAll<A, M>(
  level: Level<A, M>,
  tree: Tree<A, M>,
  items: readonly A[]
): Tree<A, M> {
  let ans = tree;
  for (const item of items) ans = pushBack(level, ans, item);
  return ans;
}

function viewFront<A, M>(
  level: Level<A, M>,
  tree: Tree<A, M>
): [A, Tree<A, M>] | undefined {
  switch (tree.kind) {
    case "empty":
      return undefined;
    case "single":
      return [tree.item, EMPTY];
    case "deep":
      return [
        tree.prefix[0],
        deepFront(level, tree.prefix.slice(1), tree.middleCell, tree.suffix),
      ];
  }
}

function viewBack<A, M>(
  level: Level<A, M>,
  tree: Tree<A, M>
): [Tree<A, M>, A] | undefined {
  switch (tree.kind) {
    case "empty":
      return undefined;
    case "single":
      return [EMPTY, tree.item];
    case "deep":
      return [
        deepBack(level, tree.prefix, tree.middleCell, tree.suffix.slice(0, -1)),
        tree.suffix[tree.suffix.length - 1],
      ];
  }
}

/**
 * Builds a Deep node whose prefix may be empty, borrowing from the middle tree if so.
 */
function deepFront<A, M>(
  level: Level<A, M>,
  prefix: readonly A[],
  middle: Lazy<Tree<Node<A, M>, M>>,
  suffix: readonly A[]
): Tree<A, M> {
  if (prefix.length !== 0) return new Deep(level, prefix, middle, suffix);
  const view = viewFront(level.next, middle.value);
  if (view === undefined) return digitToTree(level, suffix);
  return new Deep(level, view[0].items, Lazy.of(view[1]), suffix);
}

/**
 * Builds a Deep node whose suffix may be empty, borrowing from the middle tree if so.
 */
function deepBack<A, M>(
  level: Level<A, M>,
  prefix: readonly A[],
  middle: Lazy<Tree<Node<A, M>, M>>,
  suffix: readonly A[]
): Tree<A, M> {
  if (suffix.length !== 0) return new Deep(level, prefix, middle, suffix);
  const view = viewBack(level.next, middle.value);
  if (view === undefined) return digitToTree(level, prefix);
  return new Deep(level, prefix, Lazy.of(view[0]), view[1].items);
}

/**
 * Finds the first index in items where predicate(acc + measure(items[0..i])) holds,
 * defaulting to the last index.
 */
function splitDigit<A, M>(
  level: Level<A, M>,
  predicate: (measure: M) => boolean,
  acc: M,
  items: readonly A[]
): [left: A[], item: A, right: A[]] {
  let current = acc;
  for (let i = 0; i < items.length - 1; i++) {
    current = level.combine(current, level.measure(items[i]));
    if (predicate(current)) {
      return [items.slice(0, i), items[i], items.slice(i + 1)];
    }
  }
  return [items.slice(0, -1), items[items.length - 1], []];
}

/**
 * Splits a non-empty tree at the first item where predicate(acc + prefix measure) holds.
 *
 * The caller must ensure that predicate(acc + measure(tree)) holds.
 */
function splitTree<A, M>(
  level: Level<A, M>,
  predicate: (measure: M) => boolean,
  acc: M,
  tree: Single<A> | Deep<A, M>
): Split<A, M> {
  if (tree.kind === "single") {
    return { left: EMPTY, item: tree.item, right: EMPTY };
  }

  const prefixEnd = level.combine(acc, level.measureAll(tree.prefix));
  if (predicate(prefixEnd)) {
    const [left, item, right] = splitDigit(level, predicate, acc, tree.prefix);
    return {
      left: digitToTree(level, left),
      item,
      right: deepFront(level, right, tree.middleCell, tree.suffix),
    };
  }

  const middle = tree.middle;
  const middleEnd = level.combine(prefixEnd, measureTree(level.next, middle));
  if (middle.kind !== "empty" && predicate(middleEnd)) {
    const inner = splitTree(level.next, predicate, prefixEnd, middle);
    const beforeNode = level.combine(
      prefixEnd,
      measureTree(level.next, inner.left)
    );
    const [left, item, right] = splitDigit(
      level,
      predicate,
      beforeNode,
      inner.item.items
    );
    return {
      left: deepBack(level, tree.prefix, Lazy.of(inner.left), left),
      item,
      right: deepFront(level, right, Lazy.of(inner.right), tree.suffix),
    };
  }

  const [left, item, right] = splitDigit(
    level,
    predicate,
    middleEnd,
    tree.suffix
  );
  return {
    left: deepBack(level, tree.prefix, tree.middleCell, left),
    item,
    right: digitToTree(level, right),
  };
}

/**
 * Like splitTree, but only returns the item and the measure before it.
 */
function lookupTree<A, M>(
  level: Level<A, M>,
  predicate: (measure: M) => boolean,
  acc: M,
  tree: Single<A> | Deep<A, M>
): { before: M; item: A } {
  if (tree.kind === "single") return { before: acc, item: tree.item };

  const prefixEnd = level.combine(acc, level.measureAll(tree.prefix));
  if (predicate(prefixEnd)) {
    return lookupDigit(level, predicate, acc, tree.prefix);
  }

  const middle = tree.middle;
  const middleEnd = level.combine(prefixEnd, measureTree(level.next, middle));
  if (middle.kind !== "empty" && predicate(middleEnd)) {
    const inner = lookupTree(level.next, predicate, prefixEnd, middle);
    return lookupDigit(level, predicate, inner.before, inner.item.items);
  }

  return lookupDigit(level, predicate, middleEnd, tree.suffix);
}

function lookupDigit<A, M>(
  level: Level<A, M>,
  predicate: (measure: M) => boolean,
  acc: M,
  items: readonly A[]
): { before: M; item: A } {
  let before = acc;
  for (let i = 0; i < items.length - 1; i++) {
    const after = level.combine(before, level.measure(items[i]));
    if (predicate(after)) return { before, item: items[i] };
    before = after;
  }
  return { before, item: items[items.length - 1] };
}

/**
 * Concatenates left ++ items ++ right.
 */
function app3<A, M>(
  level: Level<A, M>,
  left: Tree<A, M>,
  items: readonly A[],
  right: Tree<A, M>
): Tree<A, M> {
  if (left.kind === "empty") return pushFrontAll(level, items, right);
  if (right.kind === "empty") return pushBackAll(level, left, items);
  if (left.kind === "single") {
    return pushFront(level, left.item, pushFrontAll(level, items, right));
  }
  if (right.kind === "single") {
    return pushBack(level, pushBackAll(level, left, items), right.item);
  }

  return new Deep(
    level,
    left.prefix,
    Lazy.of(
      app3(
        level.next,
        left.middle,
        toNodes(level, [...left.suffix, ...items, ...right.prefix]),
        right.middle
      )
    ),
    right.suffix
  );
}

/**
 * Groups 2 or more items into 2-3 nodes.
 */
function toNodes<A, M>(level: Level<A, M>, items: readonly A[]): Node<A, M>[] {
  const ans: Node<A, M>[] = [];
  let i = 0;
  while (items.length - i > 4) {
    ans.push(level.node(items.slice(i, i + 3)));
    i += 3;
  }
  if (items.length - i === 4) {
    ans.push(
      level.node(items.slice(i, i + 2)),
      level.node(items.slice(i + 2))
    );
  } else {
    ans.push(level.node(items.slice(i)));
  }
  return ans;
}

function* iterate<A, M>(tree: Tree<A, M>): IterableIterator<A> {
  switch (tree.kind) {
    case "empty":
      return;
    case "single":
      yield tree.item;
      return;
    case "deep":
      yield* tree.prefix;
      for (const node of iterate(tree.middle)) yield* node.items;
      yield* tree.suffix;
  }
}

function* iterateReversed<A, M>(tree: Tree<A, M>): IterableIterator<A> {
  switch (tree.kind) {
    case "empty":
      return;
    case "single":
      yield tree.item;
      return;
    case "deep":
      for (let i = tree.suffix.length - 1; i >= 0; i--) yield tree.suffix[i];
      for (const node of iterateReversed(tree.middle)) {
        for (let i = node.items.length - 1; i >= 0; i--) yield node.items[i];
      }
      for (let i = tree.prefix.length - 1; i >= 0; i--) yield tree.prefix[i];
  }
}
