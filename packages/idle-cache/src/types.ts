import type { Logger } from 'pino';
import type { CacheEntry } from './cache-entry.js';

/**
 * Invoked by `get()` on a miss, with the key and any extra arguments given to `get()`.
 * Return an entry to have its value and idle TTL cached under the key,
 * or `undefined`/`null` when the key cannot be loaded.
 */
export type LoadMissCallback<K, V> = (
  key: K,
  ...args: unknown[]
) => CacheEntry<K, V> | null | undefined;

/** Invoked after an entry has been inserted into a table. */
export type AddCallback<K, V> = (entry: CacheEntry<K, V>) => void;

/** Invoked right before an entry is removed, explicitly or by expiry. */
export type DeleteCallback<K, V> = (entry: CacheEntry<K, V>) => void;

/** Per-entry hook invoked with the key right before the entry is removed. */
export type EvictCallback<K> = (key: K) => void;

export interface TableOptions<K, V> {
  /** Diagnostic sink. Default: none (logging disabled). */
  logger?: Logger;
  /** Loader consulted by `get()` for absent keys. */
  loadMissCallback?: LoadMissCallback<K, V>;
  addCallback?: AddCallback<K, V>;
  deleteCallback?: DeleteCallback<K, V>;
}

export type CacheErrorCode = 'KEY_NOT_FOUND' | 'KEY_NOT_FOUND_OR_NOT_LOADABLE';

export interface CacheError<K = unknown> {
  readonly code: CacheErrorCode;
  readonly message: string;
  /** The key that was requested. */
  readonly key: K;
}
