/**
 * Append-only typed store
 *
 * Values are kept in insertion order in a dense array; the handle issued for
 * index i is kept beside it. Nothing is ever removed, so a handle issued by a
 * store resolves for the lifetime of that store.
 */

import { type Handle, type StoreId, allocateStoreId, createHandle } from './handles.js';

/**
 * One stored value together with its handle
 */
export interface StoreEntry<T> {
  handle: Handle<T>;
  value: T;
}

/**
 * Read-only view of a store
 */
export interface ReadonlyStore<T> extends Iterable<StoreEntry<T>> {
  readonly id: StoreId;
  readonly size: number;
  contains(handle: Handle<T>): boolean;
  get(handle: Handle<T>): T;
  iter(): IterableIterator<StoreEntry<T>>;
  handles(): IterableIterator<Handle<T>>;
  values(): IterableIterator<T>;
}

export class Store<T> implements ReadonlyStore<T> {
  readonly id: StoreId = allocateStoreId();

  private readonly _handles: Handle<T>[] = [];
  private readonly _values: T[] = [];

  /**
   * @param kind Entity kind, used in error messages
   */
  constructor(readonly kind: string) {}

  get size(): number {
    return this._values.length;
  }

  /**
   * Insert a value and return its new handle
   *
   * Equal values inserted twice get two distinct handles.
   */
  insert(value: T): Handle<T> {
    const handle = createHandle<T>(this.id, this._values.length);
    this._handles.push(handle);
    this._values.push(value);
    return handle;
  }

  /**
   * Check whether this store issued the handle
   */
  contains(handle: Handle<T>): boolean {
    return handle.store === this.id && this._handles[handle.index] === handle;
  }

  /**
   * Dereference a handle
   *
   * @throws Error if the handle was not issued by this store
   */
  get(handle: Handle<T>): T {
    if (!this.contains(handle)) {
      throw new Error(`Handle ${handle.key} does not belong to the ${this.kind} store`);
    }
    return this._values[handle.index];
  }

  /**
   * Iterate entries in insertion order. Each call starts a new traversal.
   */
  *iter(): IterableIterator<StoreEntry<T>> {
    for (let i = 0; i < this._values.length; i++) {
      yield { handle: this._handles[i], value: this._values[i] };
    }
  }

  *handles(): IterableIterator<Handle<T>> {
    for (let i = 0; i < this._handles.length; i++) {
      yield this._handles[i];
    }
  }

  *values(): IterableIterator<T> {
    for (let i = 0; i < this._values.length; i++) {
      yield this._values[i];
    }
  }

  [Symbol.iterator](): IterableIterator<StoreEntry<T>> {
    return this.iter();
  }
}
