export {
  MemoryResponseCacheStore,
  createMemoryResponseCacheStore,
  sharedResponseCache,
  type MemoryResponseCacheStoreOptions,
  type MemoryResponseCacheStats,
} from './memory.mjs';
