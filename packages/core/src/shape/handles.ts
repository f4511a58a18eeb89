/**
 * Handles into shape stores
 *
 * A handle is an opaque reference to one value living in one store. Handles
 * carry the id of the store that issued them, so two stores never accept
 * each other's handles even when the indices coincide. The store keeps the
 * handle object it issued and compares by identity, which makes handles
 * safe to use with `===`, as `Set` members and as `Map` keys.
 *
 * The type parameter is a phantom: `Handle<Vertex>` and `Handle<Edge>` are
 * not assignable to each other.
 */

/**
 * Identifies one store instance
 */
export type StoreId = number & { __brand: `StoreId` };

/**
 * Handle to a value of type T in a store
 */
export interface Handle<T> {
  /** Store that issued this handle */
  readonly store: StoreId;
  /** Insertion index within that store */
  readonly index: number;
  /** Stable string form, unique across all stores */
  readonly key: string;
  /** @internal Phantom marker for the referenced type; never set */
  readonly __entity?: T;
}

let nextStoreId = 0;

/**
 * Allocate a fresh store id
 *
 * @internal Only stores allocate ids.
 */
export function allocateStoreId(): StoreId {
  return nextStoreId++ as StoreId;
}

/**
 * @internal Only stores create handles; anything else is rejected by
 * `Store.contains` because it is not the issued object.
 */
export function createHandle<T>(store: StoreId, index: number): Handle<T> {
  return Object.freeze({ store, index, key: `${store}:${index}` });
}
