import { pino } from 'pino';
import type { DestinationStream, Logger, LoggerOptions } from 'pino';

/**
 * Builds a logger suitable for `CacheTable#setLogger`.
 * Tables log at `debug`, so that is the default level here.
 *
 * @example
 * ```typescript
 * const table = getOrCreateTable('sessions');
 * table.setLogger(createCacheLogger());
 * ```
 */
export const createCacheLogger = (
  options: LoggerOptions = {},
  destination?: DestinationStream,
): Logger => {
  const merged: LoggerOptions = { name: 'idle-cache', level: 'debug', ...options };
  return destination ? pino(merged, destination) : pino(merged);
};
