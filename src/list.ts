/**
 * A doubly linked list.
 *
 * Internally the list is a ring around a sentinel node: the sentinel's `next` is the front
 * and its `prev` is the back, so every splice is the same four pointer updates.
 *
 * @example
 * ```typescript
 * const list = newList<string>();
 * const b = list.pushBack('b');
 * list.pushFront('a');
 * list.insertAfter('c', b);
 *
 * for (let e = list.front(); e; e = e.next()) {
 *   console.log(e.value); // 'a', 'b', 'c'
 * }
 * ```
 *
 * @categoryDescription List
 * Doubly linked list with constant-time splicing.
 * @module
 */

type ListNode<E> = ListElement<E> | Sentinel<E>;

class Sentinel<E> {
  _next: ListNode<E> = this;
  _prev: ListNode<E> = this;
}

/**
 * An element of a {@link List}.
 *
 * @category List
 */
export class ListElement<E> {
  /** the value stored with this element */
  value: E;
  /** @internal */
  _next: ListNode<E> = this;
  /** @internal */
  _prev: ListNode<E> = this;
  /** @internal the list this element belongs to; undefined once removed */
  _list: List<E> | undefined;

  /** @internal */
  constructor(value: E) {
    this.value = value;
    this._list = undefined;
  }

  /** the next element, or undefined at the back of the list or after removal */
  next(): ListElement<E> | undefined {
    const node = this._next;
    return this._list !== undefined && node instanceof ListElement
      ? node
      : undefined;
  }

  /** the previous element, or undefined at the front of the list or after removal */
  prev(): ListElement<E> | undefined {
    const node = this._prev;
    return this._list !== undefined && node instanceof ListElement
      ? node
      : undefined;
  }
}

/**
 * Creates an empty {@link List}.
 *
 * @category List
 */
export function newList<E>(): List<E> {
  return new List<E>();
}

/**
 * @category List
 * @summary Doubly linked list with O(1) insertion, removal and moves.
 */
export class List<E> implements Iterable<E> {
  readonly #root = new Sentinel<E>();
  #size = 0;

  /** number of elements, O(1) */
  get size(): number {
    return this.#size;
  }

  front(): ListElement<E> | undefined {
    const node = this.#root._next;
    return node instanceof ListElement ? node : undefined;
  }

  back(): ListElement<E> | undefined {
    const node = this.#root._prev;
    return node instanceof ListElement ? node : undefined;
  }

  /** Removes every element. Removed elements no longer report neighbours. */
  clear(): void {
    for (let e = this.front(); e; ) {
      const next = e.next();
      this.#detach(e);
      e = next;
    }
    this.#root._next = this.#root;
    this.#root._prev = this.#root;
    this.#size = 0;
  }

  /**
   * Removes `e` if it is an element of this list.
   *
   * @returns `e.value`, whether or not it was removed.
   */
  remove(e: ListElement<E>): E {
    if (e._list === this) {
      e._prev._next = e._next;
      e._next._prev = e._prev;
      this.#detach(e);
      this.#size--;
    }
    return e.value;
  }

  pushFront(value: E): ListElement<E> {
    return this.#insertValue(value, this.#root);
  }

  pushBack(value: E): ListElement<E> {
    return this.#insertValue(value, this.#root._prev);
  }

  /** @returns the new element, or undefined if `mark` is not an element of this list. */
  insertBefore(value: E, mark: ListElement<E>): ListElement<E> | undefined {
    if (mark._list !== this) {
      return undefined;
    }
    return this.#insertValue(value, mark._prev);
  }

  /** @returns the new element, or undefined if `mark` is not an element of this list. */
  insertAfter(value: E, mark: ListElement<E>): ListElement<E> | undefined {
    if (mark._list !== this) {
      return undefined;
    }
    return this.#insertValue(value, mark);
  }

  moveToFront(e: ListElement<E>): void {
    if (e._list !== this || this.#root._next === e) {
      return;
    }
    this.#move(e, this.#root);
  }

  moveToBack(e: ListElement<E>): void {
    if (e._list !== this || this.#root._prev === e) {
      return;
    }
    this.#move(e, this.#root._prev);
  }

  /** Moves `e` right before `mark`. A no-op if either is foreign to this list or `e === mark`. */
  moveBefore(e: ListElement<E>, mark: ListElement<E>): void {
    if (e._list !== this || mark._list !== this || e === mark) {
      return;
    }
    this.#move(e, mark._prev);
  }

  /** Moves `e` right after `mark`. A no-op if either is foreign to this list or `e === mark`. */
  moveAfter(e: ListElement<E>, mark: ListElement<E>): void {
    if (e._list !== this || mark._list !== this || e === mark) {
      return;
    }
    this.#move(e, mark);
  }

  /** Appends a copy of every value of `other`, which may be this list. */
  pushBackList(other: List<E>): void {
    // the count is fixed first so that appending a list to itself terminates
    for (let n = other.size, e = other.front(); n > 0 && e; n--, e = e.next()) {
      this.#insertValue(e.value, this.#root._prev);
    }
  }

  /** Prepends a copy of every value of `other`, which may be this list, keeping their order. */
  pushFrontList(other: List<E>): void {
    for (let n = other.size, e = other.back(); n > 0 && e; n--, e = e.prev()) {
      this.#insertValue(e.value, this.#root);
    }
  }

  pushBackArray(values: readonly E[]): void {
    for (const value of values) {
      this.#insertValue(value, this.#root._prev);
    }
  }

  /** Prepends `values`, keeping their order. */
  pushFrontArray(values: readonly E[]): void {
    for (let i = values.length - 1; i >= 0; i--) {
      this.#insertValue(values[i]!, this.#root);
    }
  }

  /** Iterates the values from front to back. */
  *values(): IterableIterator<E> {
    for (let e = this.front(); e; e = e.next()) {
      yield e.value;
    }
  }

  [Symbol.iterator](): IterableIterator<E> {
    return this.values();
  }

  #insertValue(value: E, at: ListNode<E>): ListElement<E> {
    const e = new ListElement(value);
    e._list = this;
    e._prev = at;
    e._next = at._next;
    at._next._prev = e;
    at._next = e;
    this.#size++;
    return e;
  }

  /** moves `e` right after `at` */
  #move(e: ListElement<E>, at: ListNode<E>): void {
    if (e === at) {
      return;
    }
    e._prev._next = e._next;
    e._next._prev = e._prev;

    e._prev = at;
    e._next = at._next;
    at._next._prev = e;
    at._next = e;
  }

  #detach(e: ListElement<E>): void {
    e._next = e;
    e._prev = e;
    e._list = undefined;
  }
}
