import { useCallback, useEffect, useState } from "react";
import type { CustomCategory } from '@modules/types';
import { useStores } from '../../context/StoreContext';

export function useCategories() {
  const { categoryStore } = useStores();
  const [categories, setCategories] = useState<CustomCategory[]>([]);
  const [loaded, setLoaded] = useState(false);

  useEffect(() => {
    let cancelled = false;
    categoryStore.loadAll().then((list) => {
      if (cancelled) return;
      setCategories(list);
      setLoaded(true);
    }, console.error);
    return () => {
      cancelled = true;
    };
  }, [categoryStore]);

  const addCategory = useCallback(
    (category: CustomCategory): Promise<void> => {
      // an upsert before loadAll settles would save over the stored list
      if (!loaded) return Promise.resolve();
      const saved = categoryStore.upsert(category);
      setCategories([...categoryStore.categories]);
      return saved;
    },
    [categoryStore, loaded]
  );

  return { categories, loaded, addCategory };
}
