export interface StorageConfig {
  dbName: string;
  storeName: string;
}

export function storageConfig(env: Partial<ImportMetaEnv> = import.meta.env): StorageConfig {
  return {
    dbName: env.VITE_STORAGE_DB_NAME?.trim() || 'task-mark',
    storeName: env.VITE_STORAGE_STORE_NAME?.trim() || 'keyval',
  };
}
