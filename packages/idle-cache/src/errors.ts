import type { CacheError, CacheErrorCode } from './types.js';

const defaultMessages: Record<CacheErrorCode, string> = {
  KEY_NOT_FOUND: 'Key not found in cache',
  KEY_NOT_FOUND_OR_NOT_LOADABLE: 'Key not found and could not be loaded into cache',
};

/** The key is absent and no loader is configured, or an absent key was deleted. */
export const keyNotFound = <K>(key: K): CacheError<K> => ({
  code: 'KEY_NOT_FOUND',
  message: defaultMessages.KEY_NOT_FOUND,
  key,
});

/** The key is absent and the configured loader returned nothing for it. */
export const keyNotFoundOrNotLoadable = <K>(key: K): CacheError<K> => ({
  code: 'KEY_NOT_FOUND_OR_NOT_LOADABLE',
  message: defaultMessages.KEY_NOT_FOUND_OR_NOT_LOADABLE,
  key,
});
