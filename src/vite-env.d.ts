/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_STORAGE_DB_NAME?: string;
  readonly VITE_STORAGE_STORE_NAME?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
