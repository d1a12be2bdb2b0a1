/**
 * @categoryDescription Heap
 * Binary heap with optional position tracking.
 * @module
 */
export {
  newHeap,
  BinaryHeap,
  type Heap,
  type HeapOptions,
  type Less,
  type IndexChanged,
} from './heap';
export { newList, List, type ListElement } from './list';
export { HeapkitError, EmptyHeapError, HeapIndexError } from './common';
