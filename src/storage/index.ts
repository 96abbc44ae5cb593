export type { Storage } from './storage.js';
export type { JSONStorageConfig } from './json-storage.js';
export { JSONStorage, createJSONStorage } from './json-storage.js';
export type { PersistedWorld, WorldStateStoreConfig } from './world-state-store.js';
export { WorldStateStore, createWorldStateStore, WORLD_STATE_STORE_VERSION } from './world-state-store.js';
