/**
 * @module structured-collections
 * Classic data structures with value semantics: a rose tree, a persistent
 * linked list with stack and queue views, an immutable tuple with binary
 * search, and list sorting.
 */

export { compare, equals, hashValue, isStructural } from './value';
export type { Comparable, Comparator, Structural } from './value';

export { LinkedList } from './linked-list';
export * as Stack from './stack';
export * as Queue from './queue';

export { quicksort, mergesort } from './sort';

export { Tuple, binarySearch, searchTrace } from './tuple';
export type { SearchTrace } from './tuple';

export { RoseTree, emptyTree, leaf, fromNested } from './rose-tree';
export type { Meta, NestedInput, TreeInput, Flattened } from './rose-tree';
