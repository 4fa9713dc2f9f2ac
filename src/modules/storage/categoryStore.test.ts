import { describe, it, expect, vi, afterEach } from 'vitest';
import { CATEGORIES_KEY, CategoryStore } from './categoryStore';
import { createMemoryKeyValueStore, type KeyValueStore } from './keyValueStore';

const HOME_ID = '6f1c2f4e-3b8a-4d2e-9c7a-1e5b8f0a2d41';
const OTHER_ID = '0b9e7d3c-5a41-4f6e-8d2b-7c3a9e1f4b52';
const GYM_ID = 'c2d4e6f8-1a3b-4c5d-8e7f-9a0b1c2d3e4f';

describe('CategoryStore', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('keeps one category per name across upserts and reloads', async () => {
    const kv = createMemoryKeyValueStore();
    const store = new CategoryStore(kv);
    await store.upsert({ id: HOME_ID, name: 'Home' });
    await store.upsert({ id: OTHER_ID, name: 'Home' });

    const reloaded = await new CategoryStore(kv).loadAll();
    expect(reloaded).toEqual([{ id: OTHER_ID, name: 'Home' }]);
  });

  it('replaces in place and appends new names', async () => {
    const store = new CategoryStore(createMemoryKeyValueStore());
    await store.upsert({ id: HOME_ID, name: 'Home' });
    await store.upsert({ id: GYM_ID, name: 'Gym' });
    await store.upsert({ id: OTHER_ID, name: 'Home' });

    expect(store.categories).toEqual([
      { id: OTHER_ID, name: 'Home' },
      { id: GYM_ID, name: 'Gym' },
    ]);
    expect(store.has('Gym')).toBe(true);
    expect(store.has('gym')).toBe(false);
  });

  it('updates memory before the write settles', () => {
    const store = new CategoryStore(createMemoryKeyValueStore());
    const pending = store.upsert({ id: HOME_ID, name: 'Home' });
    expect(store.categories).toEqual([{ id: HOME_ID, name: 'Home' }]);
    return pending;
  });

  it('drops entries that do not decode and keeps the rest', async () => {
    const kv = createMemoryKeyValueStore({
      [CATEGORIES_KEY]: [{ id: HOME_ID, name: 'Home' }, { id: OTHER_ID }],
    });
    expect(await new CategoryStore(kv).loadAll()).toEqual([{ id: HOME_ID, name: 'Home' }]);
  });

  it('drops entries with malformed ids or shapes', async () => {
    const kv = createMemoryKeyValueStore({
      [CATEGORIES_KEY]: [
        'Home',
        null,
        { id: 'not-a-uuid', name: 'Work' },
        { id: 42, name: 'School' },
        { id: GYM_ID, name: 'Gym' },
      ],
    });
    expect(await new CategoryStore(kv).loadAll()).toEqual([{ id: GYM_ID, name: 'Gym' }]);
  });

  it('loads nothing from an absent or non-array snapshot', async () => {
    expect(await new CategoryStore(createMemoryKeyValueStore()).loadAll()).toEqual([]);
    const kv = createMemoryKeyValueStore({ [CATEGORIES_KEY]: { id: HOME_ID, name: 'Home' } });
    expect(await new CategoryStore(kv).loadAll()).toEqual([]);
  });

  it('replaces the in-memory list on load', async () => {
    const kv = createMemoryKeyValueStore({ [CATEGORIES_KEY]: [{ id: GYM_ID, name: 'Gym' }] });
    const store = new CategoryStore(kv);
    store.categories.push({ id: HOME_ID, name: 'Home' });
    await store.loadAll();
    expect(store.categories).toEqual([{ id: GYM_ID, name: 'Gym' }]);
  });

  it('only deduplicates direct inserts on save', async () => {
    const kv = createMemoryKeyValueStore();
    const store = new CategoryStore(kv);
    store.categories.push({ id: HOME_ID, name: 'Home' }, { id: GYM_ID, name: 'Gym' });
    store.categories.push({ id: OTHER_ID, name: 'Home' });
    expect(store.categories).toHaveLength(3);

    await store.save();
    expect(store.categories).toEqual([
      { id: OTHER_ID, name: 'Home' },
      { id: GYM_ID, name: 'Gym' },
    ]);
    expect(await kv.get(CATEGORIES_KEY)).toEqual([
      { id: OTHER_ID, name: 'Home' },
      { id: GYM_ID, name: 'Gym' },
    ]);
  });

  it('absorbs write failures and keeps the in-memory list', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const kv: KeyValueStore = {
      get: () => Promise.resolve(undefined),
      set: () => Promise.reject(new Error('quota exceeded')),
    };
    const store = new CategoryStore(kv);

    await expect(store.upsert({ id: HOME_ID, name: 'Home' })).resolves.toBeUndefined();
    expect(store.categories).toEqual([{ id: HOME_ID, name: 'Home' }]);
    expect(error).toHaveBeenCalledTimes(1);
  });

  it('absorbs read failures as an empty list', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const kv: KeyValueStore = {
      get: () => Promise.reject(new Error('blocked')),
      set: () => Promise.resolve(),
    };
    expect(await new CategoryStore(kv).loadAll()).toEqual([]);
    expect(error).toHaveBeenCalledTimes(1);
  });
});
