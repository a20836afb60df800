import { ExclusiveLock } from './exclusiveLock';
import type { ItemStore } from '../contracts/itemStore';
import type { Item, ItemId, NewItemInput } from '../types';

export interface MemoryItemStoreOptions {
  /** Source of creation timestamps. Defaults to the wall clock. */
  now?: () => Date;
}

/**
 * Implements `ItemStore` on a process-local map.
 * Every operation runs inside one exclusive lock, so the id counter and the
 * map are always observed together.
 */
export class MemoryItemStore implements ItemStore {
  private readonly items = new Map<ItemId, Item>();
  private readonly lock = new ExclusiveLock();
  private readonly now: () => Date;
  private lastId = 0;

  constructor(options: MemoryItemStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  async list() {
    return this.lock.run(() => Array.from(this.items.values(), copyItem));
  }

  async get(id: ItemId) {
    return this.lock.run(() => {
      const item = this.items.get(id);
      return item ? copyItem(item) : null;
    });
  }

  async create(input: NewItemInput) {
    return this.lock.run(() => {
      const id = this.lastId + 1;
      const item: Item = {
        id,
        name: input.name,
        createdAt: new Date(this.now().getTime()),
        isActive: input.isActive,
      };
      this.items.set(id, item);
      this.lastId = id;
      return copyItem(item);
    });
  }

  async delete(id: ItemId) {
    return this.lock.run(() => this.items.delete(id));
  }

  async count() {
    return this.lock.run(() => this.items.size);
  }
}

function copyItem(item: Item): Item {
  return { ...item, createdAt: new Date(item.createdAt.getTime()) };
}
