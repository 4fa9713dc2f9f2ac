import { createContext, useContext } from 'react';
import type { CategoryStore, TaskStore } from '@modules/storage';

export interface Stores {
  taskStore: TaskStore;
  categoryStore: CategoryStore;
}

const StoreContext = createContext<Stores | null>(null);

export function StoreProvider({ stores, children }: { stores: Stores; children: React.ReactNode }) {
  return <StoreContext.Provider value={stores}>{children}</StoreContext.Provider>;
}

export function useStores(): Stores {
  const stores = useContext(StoreContext);
  if (!stores) {
    throw new Error('useStores must be used inside a StoreProvider');
  }
  return stores;
}
