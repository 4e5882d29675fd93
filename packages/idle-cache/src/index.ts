export { CacheEntry } from './cache-entry.js';
export { CacheTable } from './cache-table.js';
export { CacheRegistry, getOrCreateTable } from './registry.js';
export { keyNotFound, keyNotFoundOrNotLoadable } from './errors.js';
export { createCacheLogger } from './logger.js';
export type {
  AddCallback,
  CacheError,
  CacheErrorCode,
  DeleteCallback,
  EvictCallback,
  LoadMissCallback,
  TableOptions,
} from './types.js';
