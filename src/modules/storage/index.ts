export * from './keyValueStore';
export * from './categoryStore';
export * from './taskStore';
