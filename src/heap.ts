import { EmptyHeapError, HeapIndexError, HeapkitError } from './common';

/**
 * Strict ordering predicate: returns true when `a` must come before `b`.
 *
 * It must be a consistent strict weak ordering for as long as the heap uses it.
 * An inconsistent predicate leaves the heap order undefined.
 *
 * @category Heap
 */
export type Less<E> = (a: E, b: E) => boolean;

/**
 * Observer invoked whenever an element moves to a new slot, and with `-1` once it leaves the heap.
 *
 * It runs synchronously inside the heap operation and must not mutate the heap.
 *
 * @category Heap
 */
export type IndexChanged<E> = (element: E, index: number) => void;

/**
 * @category Heap
 */
export interface HeapOptions<E> {
  /**
   * Initial contents. The heap takes ownership of the array: the caller must not use it afterwards.
   *
   * Call {@link Heap.init} before relying on heap order, unless the data is empty or already sorted.
   * The callback is not invoked for the adopted elements; they are expected to already know their slot.
   */
  data?: E[];
  /** Number of slots to reserve without populating them. Defaults to 0. */
  initialCapacity?: number;
  /** Called with the element and its new index on every move, so the caller can later target it with {@link Heap.fix} or {@link Heap.remove}. */
  onIndexChanged?: IndexChanged<E>;
}

/**
 * @category Heap
 * @summary Binary min-heap with optional position tracking.
 */
export interface Heap<E> {
  /** number of elements in the heap */
  get size(): number;
  /** number of reserved slots; always at least {@link size} */
  get capacity(): number;
  /** the minimum element, without removing it. throws {@link EmptyHeapError} if the heap is empty */
  peek(): E;
  /** the element at slot `index`, where `0 <= index < size` */
  at(index: number): E;
  /** re-establish the heap order over the current contents */
  init(): void;
  /** insert an element */
  push(value: E): void;
  /** remove and return the minimum element. throws {@link EmptyHeapError} if the heap is empty */
  pop(): E;
  /** remove and return the element at slot `index` */
  remove(index: number): E;
  /** restore the heap order after the element at slot `index` changed its ordering key in place */
  fix(index: number): void;
}

/**
 * Creates a new {@link Heap} ordered by `less`.
 *
 * The minimum element under `less` is always at the root. Inverting the predicate gives a max-heap.
 *
 * @category Heap
 *
 * @example
 * ```typescript
 * const heap = newHeap<number>((a, b) => a < b, { data: [2, 1, 5] });
 * heap.init();
 * heap.push(3);
 *
 * heap.peek(); // 1
 * while (heap.size > 0) {
 *   console.log(heap.pop()); // 1, 2, 3, 5
 * }
 * ```
 *
 * @example Tracking positions to re-prioritize an element
 * ```typescript
 * interface Task {
 *   priority: number;
 *   index: number;
 * }
 *
 * const tasks = newHeap<Task>((a, b) => a.priority > b.priority, {
 *   onIndexChanged: (task, index) => {
 *     task.index = index;
 *   },
 * });
 * const task: Task = { priority: 1, index: -1 };
 * tasks.push(task);
 *
 * task.priority = 5;
 * tasks.fix(task.index);
 * ```
 */
export function newHeap<E>(less: Less<E>, options?: HeapOptions<E>): Heap<E> {
  return new BinaryHeap(less, options);
}

/**
 * Array-backed binary heap. Slot `i` has its children at `2i+1` and `2i+2`, and no child is ever less than its parent.
 *
 * Not synchronized: concurrent use needs external coordination.
 *
 * @category Heap
 */
export class BinaryHeap<E> implements Heap<E> {
  /** largest length a JavaScript array can have */
  static readonly MAX_CAPACITY = 2 ** 32 - 1;

  readonly #less: Less<E>;
  readonly #onIndexChanged: IndexChanged<E> | undefined;
  /** slots `[0, #size)` hold the elements, the rest is reserved space. */
  #slots: (E | undefined)[];
  #size: number;

  constructor(less: Less<E>, options?: HeapOptions<E>) {
    const capacity = options?.initialCapacity ?? 0;
    if (
      !Number.isInteger(capacity) ||
      capacity < 0 ||
      capacity > BinaryHeap.MAX_CAPACITY
    ) {
      throw new HeapkitError(
        `Invalid initial capacity: ${capacity}; expected an integer in [0, ${BinaryHeap.MAX_CAPACITY}]`
      );
    }

    this.#less = less;
    this.#onIndexChanged = options?.onIndexChanged;
    this.#slots = options?.data ?? [];
    this.#size = this.#slots.length;
    if (this.#slots.length < capacity) {
      this.#slots.length = capacity;
    }
  }

  get size(): number {
    return this.#size;
  }

  get capacity(): number {
    return this.#slots.length;
  }

  peek(): E {
    if (this.#size === 0) {
      throw new EmptyHeapError('Cannot peek an empty heap');
    }
    return this.#slots[0]!;
  }

  at(index: number): E {
    this.#checkIndex(index);
    return this.#slots[index]!;
  }

  /**
   * Establishes the heap order over the current contents in O(n), sifting down every parent from the last one to the root.
   *
   * Idempotent; may be called whenever the order may have been invalidated.
   */
  init(): void {
    const n = this.#size;
    for (let i = Math.floor(n / 2) - 1; i >= 0; i--) {
      this.#heapifyDown(i, n);
    }
  }

  push(value: E): void {
    const n = this.#size;
    if (n === BinaryHeap.MAX_CAPACITY) {
      throw new HeapkitError(`Heap is full at ${n} elements`);
    }
    if (n === this.#slots.length) {
      this.#slots.length = Math.min(
        BinaryHeap.MAX_CAPACITY,
        Math.max(1, n * 2)
      );
    }
    this.#slots[n] = value;
    this.#size = n + 1;
    this.#onIndexChanged?.(value, n);
    this.#heapifyUp(n);
  }

  /** Equivalent to `remove(0)`. */
  pop(): E {
    if (this.#size === 0) {
      throw new EmptyHeapError('Cannot pop an empty heap');
    }
    const last = this.#size - 1;
    this.#swap(0, last);
    this.#heapifyDown(0, last);
    return this.#detachLast();
  }

  remove(index: number): E {
    this.#checkIndex(index);
    const last = this.#size - 1;
    if (index !== last) {
      this.#swap(index, last);
      if (!this.#heapifyDown(index, last)) {
        this.#heapifyUp(index);
      }
    }
    return this.#detachLast();
  }

  /**
   * Changing the element at `index` and then calling `fix` is equivalent to, but cheaper than,
   * removing it and pushing the new value.
   */
  fix(index: number): void {
    this.#checkIndex(index);
    if (!this.#heapifyDown(index, this.#size)) {
      this.#heapifyUp(index);
    }
  }

  #checkIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.#size) {
      throw new HeapIndexError(index, this.#size);
    }
  }

  #detachLast(): E {
    const last = this.#size - 1;
    const value = this.#slots[last]!;
    // drop the reference so the heap does not keep removed elements alive
    this.#slots[last] = undefined;
    this.#size = last;
    this.#onIndexChanged?.(value, -1);
    return value;
  }

  #heapifyUp(index: number): void {
    while (index > 0) {
      const parentIndex = Math.floor((index - 1) / 2);

      if (!this.#less(this.#slots[index]!, this.#slots[parentIndex]!)) {
        break;
      }

      this.#swap(index, parentIndex);
      index = parentIndex;
    }
  }

  /**
   * Sifts the element at `start` down within the first `n` slots.
   *
   * @returns whether the element moved.
   */
  #heapifyDown(start: number, n: number): boolean {
    let index = start;
    while (true) {
      const leftChild = 2 * index + 1;
      if (leftChild >= n) {
        break;
      }

      let minChild = leftChild;
      const rightChild = leftChild + 1;
      if (
        rightChild < n &&
        this.#less(this.#slots[rightChild]!, this.#slots[leftChild]!)
      ) {
        minChild = rightChild;
      }

      if (!this.#less(this.#slots[minChild]!, this.#slots[index]!)) {
        break;
      }

      this.#swap(index, minChild);
      index = minChild;
    }
    return index > start;
  }

  #swap(i: number, j: number): void {
    if (i === j) {
      return;
    }
    [this.#slots[i], this.#slots[j]] = [this.#slots[j], this.#slots[i]];

    if (this.#onIndexChanged) {
      this.#onIndexChanged(this.#slots[i]!, i);
      this.#onIndexChanged(this.#slots[j]!, j);
    }
  }
}
