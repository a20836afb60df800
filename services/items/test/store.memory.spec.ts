import { describe, expect, it } from 'vitest';
import { MemoryItemStore } from '../src/storage/memoryItemStore';
import { ExclusiveLock } from '../src/storage/exclusiveLock';

const fixedClock = () => new Date('2024-05-06T07:08:09.000Z');

describe('MemoryItemStore', () => {
  it('create then get returns an equal item', async () => {
    const store = new MemoryItemStore({ now: fixedClock });
    const created = await store.create({ name: 'Foo', isActive: true });

    expect(created).toEqual({
      id: 1,
      name: 'Foo',
      createdAt: new Date('2024-05-06T07:08:09.000Z'),
      isActive: true,
    });
    expect(await store.get(created.id)).toEqual(created);
  });

  it('assigns strictly increasing ids', async () => {
    const store = new MemoryItemStore();
    const a = await store.create({ name: 'Alpha', isActive: false });
    const b = await store.create({ name: 'Beta', isActive: false });
    const c = await store.create({ name: 'Gamma', isActive: false });
    expect([a.id, b.id, c.id]).toEqual([1, 2, 3]);
  });

  it('never hands out the same id to concurrent creates', async () => {
    const store = new MemoryItemStore();
    const names = ['Ann', 'Bob', 'Cat', 'Dan', 'Eve', 'Fay', 'Gus', 'Hal'];
    const created = await Promise.all(names.map((name) => store.create({ name, isActive: false })));

    const ids = created.map((item) => item.id).sort((x, y) => x - y);
    expect(ids).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
    expect(await store.count()).toBe(8);
  });

  it('does not reuse the id of a deleted item', async () => {
    const store = new MemoryItemStore();
    const first = await store.create({ name: 'Foo', isActive: false });
    await store.delete(first.id);
    const second = await store.create({ name: 'Bar', isActive: false });
    expect(second.id).toBe(2);
  });

  it('delete then get yields null, and repeated deletes keep failing', async () => {
    const store = new MemoryItemStore();
    const item = await store.create({ name: 'Foo', isActive: false });

    expect(await store.delete(item.id)).toBe(true);
    expect(await store.get(item.id)).toBeNull();
    expect(await store.delete(item.id)).toBe(false);
    expect(await store.delete(item.id)).toBe(false);
    expect(await store.delete(42)).toBe(false);
  });

  it('list returns a snapshot that callers cannot mutate through', async () => {
    const store = new MemoryItemStore({ now: fixedClock });
    await store.create({ name: 'Foo', isActive: false });

    const [listed] = await store.list();
    listed.name = 'Mutated';
    listed.createdAt.setUTCFullYear(1999);

    const stored = await store.get(1);
    expect(stored?.name).toBe('Foo');
    expect(stored?.createdAt.toISOString()).toBe('2024-05-06T07:08:09.000Z');
  });

  it('list of an empty store is an empty array', async () => {
    expect(await new MemoryItemStore().list()).toEqual([]);
  });
});

describe('ExclusiveLock', () => {
  it('runs sections one at a time in submission order', async () => {
    const lock = new ExclusiveLock();
    const events: string[] = [];

    const slow = lock.run(async () => {
      events.push('slow:start');
      await new Promise((resolve) => setTimeout(resolve, 10));
      events.push('slow:end');
    });
    const fast = lock.run(() => {
      events.push('fast');
    });

    await Promise.all([slow, fast]);
    expect(events).toEqual(['slow:start', 'slow:end', 'fast']);
  });

  it('keeps serving sections after one throws', async () => {
    const lock = new ExclusiveLock();
    await expect(
      lock.run(() => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    await expect(lock.run(() => 7)).resolves.toBe(7);
  });
});
