export * from "./compare";
export * from "./deque";
export {
  changeMultiplicity,
  decrementMultiElem,
  differenceMultiElem,
  elemMeasurer,
  foldElem,
  foldMultiElem,
  incrementMultiElem,
  mapElem,
  mapMultiElem,
  minMultiElem,
  multiElem,
  multiMeasurer,
  setMultiplicity,
  sumMultiElem,
} from "./elem";
export type { Elem, MultiElem, MultiMeasure } from "./elem";
export { FingerTree, MAX_DIGIT } from "./finger_tree";
export * from "./measure";
export * from "./multiset";
export * from "./ordered_set";
export {
  areDisjointWith,
  atLeast,
  differenceWith,
  intersectionWith,
  isSubsetOfWith,
  unionWith,
} from "./sorted_merge";
export type { SortedOps } from "./sorted_merge";
