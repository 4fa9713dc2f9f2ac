import { createStore, get, set } from 'idb-keyval';
import type { StorageConfig } from '../config';

export interface KeyValueStore {
  get(key: string): Promise<unknown>;
  set(key: string, value: unknown): Promise<void>;
}

/** IndexedDB-backed store, one object store per config. */
export function createIdbKeyValueStore({ dbName, storeName }: StorageConfig): KeyValueStore {
  const store = createStore(dbName, storeName);
  return {
    get: (key) => get(key, store),
    set: (key, value) => set(key, value, store),
  };
}

/**
 * Map-backed store for environments without IndexedDB. Values are cloned on
 * the way in and out so callers never share references with what is stored.
 */
export function createMemoryKeyValueStore(seed: Record<string, unknown> = {}): KeyValueStore {
  const entries = new Map<string, unknown>(Object.entries(seed));
  return {
    async get(key) {
      return entries.has(key) ? structuredClone(entries.get(key)) : undefined;
    },
    async set(key, value) {
      entries.set(key, structuredClone(value));
    },
  };
}

export function createKeyValueStore(config: StorageConfig): KeyValueStore {
  if (typeof indexedDB === 'undefined') {
    console.warn('IndexedDB unavailable, tasks will only live for this session');
    return createMemoryKeyValueStore();
  }
  return createIdbKeyValueStore(config);
}
