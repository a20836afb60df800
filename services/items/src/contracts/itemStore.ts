import type { Item, ItemId, NewItemInput } from '../types';

/**
 * Owner of every stored item and of the id counter.
 * Callers never touch the collection directly; each method is one atomic step.
 */
export interface ItemStore {
  /** Snapshot of all items, in no guaranteed order. */
  list(): Promise<Item[]>;
  /** Resolves `null` when no item has this id. */
  get(id: ItemId): Promise<Item | null>;
  /** Assigns the next id and creation time. Input must already be validated. */
  create(input: NewItemInput): Promise<Item>;
  /** Resolves `false` when no item had this id. */
  delete(id: ItemId): Promise<boolean>;
  count(): Promise<number>;
}
