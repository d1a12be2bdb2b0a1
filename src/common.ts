/**
 * @categoryDescription Common
 * Common functions and types.
 * @module
 */

/**
 * Base error class for all heapkit errors
 */
export class HeapkitError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'HeapkitError';
  }
}

/**
 * Error thrown when reading or removing the minimum of an empty heap
 */
export class EmptyHeapError extends HeapkitError {
  constructor(message: string = 'Heap is empty', options?: ErrorOptions) {
    super(message, options);
    this.name = 'EmptyHeapError';
  }
}

/**
 * Error thrown when a heap slot index is not an integer in `[0, size)`
 */
export class HeapIndexError extends HeapkitError {
  readonly index: number;
  readonly size: number;

  constructor(index: number, size: number, options?: ErrorOptions) {
    super(`Heap index ${index} out of range [0, ${size})`, options);
    this.name = 'HeapIndexError';
    this.index = index;
    this.size = size;
  }
}
