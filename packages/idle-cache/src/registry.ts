import { CacheTable } from './cache-table.js';
import type { TableOptions } from './types.js';

/**
 * Diretório de tabelas por nome. Cada tabela é criada no primeiro acesso
 * e vive enquanto o registro viver (não há remoção).
 */
export class CacheRegistry<K = unknown, V = unknown> {
  private readonly tables = new Map<string, CacheTable<K, V>>();

  /**
   * Returns the table registered under `name`, creating it on first use.
   * `options` only apply when the table is created by this call.
   */
  getOrCreate(name: string, options?: TableOptions<K, V>): CacheTable<K, V> {
    let table = this.tables.get(name);
    if (!table) {
      table = new CacheTable<K, V>(name, options);
      this.tables.set(name, table);
    }
    return table;
  }

  has(name: string): boolean {
    return this.tables.has(name);
  }

  /** Names of every table created so far, in creation order. */
  names(): string[] {
    return [...this.tables.keys()];
  }
}

// Registro do processo: começa vazio, tabelas nunca são removidas
const defaultRegistry = new CacheRegistry();

/** Returns the process-wide table named `name`, creating it on first use. */
export const getOrCreateTable = (
  name: string,
  options?: TableOptions<unknown, unknown>,
): CacheTable<unknown, unknown> => defaultRegistry.getOrCreate(name, options);
