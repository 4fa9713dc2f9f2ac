import React from 'react';
import ReactDOM from 'react-dom/client';
import App from './App';
import './index.css';
import { StoreProvider } from './context/StoreContext';
import { CategoryStore, TaskStore, createKeyValueStore } from './modules/storage';
import { storageConfig } from './modules/config';

const kv = createKeyValueStore(storageConfig());
const stores = {
  taskStore: new TaskStore(kv),
  categoryStore: new CategoryStore(kv),
};

ReactDOM.createRoot(document.getElementById('root') as HTMLElement).render(
  <React.StrictMode>
    <StoreProvider stores={stores}>
      <App />
    </StoreProvider>
  </React.StrictMode>
);
