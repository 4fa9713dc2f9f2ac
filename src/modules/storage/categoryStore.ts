import type { CustomCategory } from '../types';
import { categoryKey } from '../task';
import type { KeyValueStore } from './keyValueStore';
import { categorySchema, toCategoryRecord } from './schema';

export const CATEGORIES_KEY = 'savedCustomCategories';

// Later entries replace earlier ones with the same key but keep their slot.
function dedupeBy<T>(items: T[], key: (item: T) => string): T[] {
  const result: T[] = [];
  const positions = new Map<string, number>();
  for (const item of items) {
    const k = key(item);
    const at = positions.get(k);
    if (at === undefined) {
      positions.set(k, result.length);
      result.push(item);
    } else {
      result[at] = item;
    }
  }
  return result;
}

export class CategoryStore {
  categories: CustomCategory[] = [];

  constructor(private readonly kv: KeyValueStore) {}

  has(name: string): boolean {
    return this.categories.some((c) => categoryKey(c) === name);
  }

  upsert(category: CustomCategory): Promise<void> {
    const idx = this.categories.findIndex((c) => categoryKey(c) === categoryKey(category));
    if (idx >= 0) {
      this.categories[idx] = category;
    } else {
      this.categories.push(category);
    }
    return this.save();
  }

  async save(): Promise<void> {
    this.categories = dedupeBy(this.categories, categoryKey);
    try {
      await this.kv.set(CATEGORIES_KEY, this.categories.map(toCategoryRecord));
    } catch (err) {
      console.error(err);
    }
  }

  async loadAll(): Promise<CustomCategory[]> {
    let raw: unknown;
    try {
      raw = await this.kv.get(CATEGORIES_KEY);
    } catch (err) {
      console.error(err);
      raw = undefined;
    }
    const loaded: CustomCategory[] = [];
    if (Array.isArray(raw)) {
      for (const entry of raw) {
        const parsed = categorySchema.safeParse(entry);
        if (parsed.success) {
          loaded.push(toCategoryRecord(parsed.data));
        }
      }
    }
    this.categories = loaded;
    return [...loaded];
  }
}
