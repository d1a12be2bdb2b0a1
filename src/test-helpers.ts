import type { Heap, Less } from './heap';

/**
 * Deterministic pseudo-random generator (mulberry32), so that randomized tests replay identically.
 *
 * @returns a function yielding floats in `[0, 1)`.
 */
export function newRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Random integer in `[0, bound)`. */
export function randomInt(random: () => number, bound: number): number {
  return Math.floor(random() * bound);
}

/**
 * Finds the first parent/child pair breaking the heap order.
 *
 * @returns a description of the violation, or undefined if the heap is ordered.
 */
export function heapViolation<E>(heap: Heap<E>, less: Less<E>): string | undefined {
  for (let child = 1; child < heap.size; child++) {
    const parent = Math.floor((child - 1) / 2);
    if (less(heap.at(child), heap.at(parent))) {
      return `heap invariant invalidated [${parent}] = ${String(heap.at(parent))} > [${child}] = ${String(heap.at(child))}`;
    }
  }
  return undefined;
}

/** Drains the heap, returning the elements in pop order. */
export function drain<E>(heap: Heap<E>): E[] {
  const out: E[] = [];
  while (heap.size > 0) {
    out.push(heap.pop());
  }
  return out;
}
