import { err, ok, type Result } from 'neverthrow';
import type { Logger } from 'pino';
import { CacheEntry } from './cache-entry.js';
import { keyNotFound, keyNotFoundOrNotLoadable } from './errors.js';
import type {
  AddCallback,
  CacheError,
  DeleteCallback,
  LoadMissCallback,
  TableOptions,
} from './types.js';

// Maior atraso aceito por setTimeout; acima disso o Node usa 1 ms
const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Tabela nomeada de entries com expiração por inatividade.
 *
 * Estrutura interna:
 * - items: Map para lookup O(1) por chave
 * - sweepTimer: um único timer one-shot, armado para a próxima expiração conhecida
 *
 * Não há polling: cada varredura calcula quanto falta para a entry mais próxima
 * de expirar e dorme exatamente esse tempo. `add()` antecipa o timer quando a
 * nova entry expira antes do que está agendado.
 *
 * Callbacks rodam depois que o Map e o timer já foram atualizados, então podem
 * chamar a própria tabela de volta.
 */
export class CacheTable<K, V> {
  readonly name: string;

  private readonly items = new Map<K, CacheEntry<K, V>>();
  // Timer da próxima varredura (null = nada agendado)
  private sweepTimer: NodeJS.Timeout | null = null;
  // Momento absoluto (epoch ms) em que a varredura agendada dispara
  private sweepAt: number | null = null;
  // Quando o agendamento atual foi feito, só para log
  private sweepArmedAt = 0;
  // Entries cujos callbacks de remoção estão rodando agora
  private readonly removing = new Set<CacheEntry<K, V>>();

  private logger: Logger | undefined;
  private loadMissCallback: LoadMissCallback<K, V> | undefined;
  private addCallback: AddCallback<K, V> | undefined;
  private deleteCallback: DeleteCallback<K, V> | undefined;

  constructor(name: string, options?: TableOptions<K, V>) {
    this.name = name;
    this.logger = options?.logger;
    this.loadMissCallback = options?.loadMissCallback;
    this.addCallback = options?.addCallback;
    this.deleteCallback = options?.deleteCallback;
  }

  // ─── Configuration ─────────────────────────────────────────

  setLoadMissCallback(callback: LoadMissCallback<K, V> | undefined): void {
    this.loadMissCallback = callback;
  }

  setAddCallback(callback: AddCallback<K, V> | undefined): void {
    this.addCallback = callback;
  }

  setDeleteCallback(callback: DeleteCallback<K, V> | undefined): void {
    this.deleteCallback = callback;
  }

  setLogger(logger: Logger | undefined): void {
    this.logger = logger;
  }

  // ─── Core API ──────────────────────────────────────────────

  /**
   * Inserts an entry, replacing whatever was stored under `key`.
   * A nonzero `idleTtlMs` makes the entry expire after that long without a `get()`.
   */
  add(key: K, value: V, idleTtlMs = 0): CacheEntry<K, V> {
    const entry = new CacheEntry(key, value, idleTtlMs);
    this.addEntry(entry);
    return entry;
  }

  /** Inserts only when `key` is absent. Returns whether the entry was inserted. */
  notFoundAdd(key: K, value: V, idleTtlMs = 0): boolean {
    if (this.items.has(key)) return false;
    this.addEntry(new CacheEntry(key, value, idleTtlMs));
    return true;
  }

  /**
   * Returns the entry for `key` and marks it as accessed.
   *
   * On a miss the load-miss callback, if any, is called with the key and `args`.
   * A loaded entry's value and TTL are cached under `key` and the loaded entry
   * itself is returned.
   */
  get(key: K, ...args: unknown[]): Result<CacheEntry<K, V>, CacheError<K>> {
    const entry = this.items.get(key);
    if (entry) {
      entry.keepAlive();
      return ok(entry);
    }

    const load = this.loadMissCallback;
    if (!load) {
      return err(keyNotFound(key));
    }

    const loaded = load(key, ...args);
    if (loaded == null) {
      return err(keyNotFoundOrNotLoadable(key));
    }

    this.add(key, loaded.value, loaded.idleTtlMs);
    return ok(loaded);
  }

  /**
   * Removes the entry for `key`. The table's delete callback runs first, then the
   * entry's own evict callback, then the entry is dropped.
   */
  delete(key: K): Result<CacheEntry<K, V>, CacheError<K>> {
    const entry = this.items.get(key);
    if (!entry) {
      return err(keyNotFound(key));
    }
    this.removeEntry(entry);
    return ok(entry);
  }

  /** Does not count as an access. */
  exists(key: K): boolean {
    return this.items.has(key);
  }

  count(): number {
    return this.items.size;
  }

  get size(): number {
    return this.items.size;
  }

  /** Epoch ms at which the pending expiration check fires, or `null` if none is armed. */
  get nextSweepAt(): number | null {
    return this.sweepAt;
  }

  /** Drops every entry and cancels the pending expiration check. No callbacks fire. */
  flush(): void {
    this.log('Flushing table', { count: this.items.size });
    this.items.clear();
    this.cancelSweep();
  }

  // ─── Inspection ────────────────────────────────────────────

  /** Visits a snapshot of the table; `visit` may safely call back into the table. */
  forEach(visit: (key: K, entry: CacheEntry<K, V>) => void): void {
    for (const [key, entry] of [...this.items]) {
      visit(key, entry);
    }
  }

  /** Up to `n` entries ordered by descending access count. */
  mostAccessed(n: number): CacheEntry<K, V>[] {
    if (n <= 0) return [];

    // Lê cada contador uma vez só, antes de ordenar (sort é estável)
    const ranked = [...this.items.values()].map((entry) => ({
      entry,
      hits: entry.accessCount,
    }));
    ranked.sort((a, b) => b.hits - a.hits);

    return ranked.slice(0, n).map(({ entry }) => entry);
  }

  *[Symbol.iterator](): IterableIterator<[K, CacheEntry<K, V>]> {
    yield* [...this.items];
  }

  *keys(): IterableIterator<K> {
    for (const [key] of this) {
      yield key;
    }
  }

  *values(): IterableIterator<V> {
    for (const [, entry] of this) {
      yield entry.value;
    }
  }

  *entries(): IterableIterator<[K, CacheEntry<K, V>]> {
    yield* this;
  }

  // ─── Internal ──────────────────────────────────────────────

  private addEntry(entry: CacheEntry<K, V>): void {
    this.log('Adding entry', { key: entry.key, idleTtlMs: entry.idleTtlMs });
    this.items.set(entry.key, entry);

    this.addCallback?.(entry);

    // Só reagenda se a nova entry expira antes da varredura já agendada
    if (
      entry.idleTtlMs > 0 &&
      (this.sweepAt === null || entry.lastAccessedAt + entry.idleTtlMs < this.sweepAt)
    ) {
      this.expirationCheck('add');
    }
  }

  /**
   * Runs the delete callbacks, then drops the entry if it is still the one stored
   * under its key. A callback that replaced the key keeps its replacement.
   * Re-entrant calls for an entry whose callbacks are already running are ignored.
   */
  private removeEntry(entry: CacheEntry<K, V>): void {
    if (this.removing.has(entry)) return;

    const onDelete = this.deleteCallback;
    this.removing.add(entry);
    try {
      onDelete?.(entry);
      entry.notifyEvict();
    } finally {
      this.removing.delete(entry);
      if (this.items.get(entry.key) === entry) {
        this.log('Deleting entry', {
          key: entry.key,
          createdAt: entry.createdAt,
          accessCount: entry.accessCount,
        });
        this.items.delete(entry.key);
      }
    }
  }

  /**
   * Varredura de expiração, com timer auto-ajustável.
   *
   * Remove as entries inativas há `idleTtlMs` ou mais e agenda a próxima
   * varredura para a menor duração restante entre as demais.
   */
  private expirationCheck(trigger: 'timer' | 'add'): void {
    const now = Date.now();
    const wasScheduled = this.sweepAt !== null;
    this.cancelSweep();
    if (trigger === 'timer') {
      this.log('Expiration check triggered', { afterMs: now - this.sweepArmedAt });
    } else if (wasScheduled) {
      this.log('Expiration check rescheduled', { afterMs: now - this.sweepArmedAt });
    } else {
      this.log('Expiration check installed', {});
    }

    // null = nenhuma candidata ainda (zero é uma espera válida)
    let nextWaitMs: number | null = null;
    const expired: CacheEntry<K, V>[] = [];

    for (const entry of this.items.values()) {
      if (entry.idleTtlMs === 0 || this.removing.has(entry)) continue;

      const idleFor = now - entry.lastAccessedAt;
      if (idleFor >= entry.idleTtlMs) {
        expired.push(entry);
      } else {
        const remaining = entry.idleTtlMs - idleFor;
        if (nextWaitMs === null || remaining < nextWaitMs) {
          nextWaitMs = remaining;
        }
      }
    }

    // Agenda antes dos callbacks: um add() dentro deles compara com o agendamento novo
    if (nextWaitMs !== null) {
      this.scheduleSweep(now, nextWaitMs);
    }

    const failures: unknown[] = [];
    for (const entry of expired) {
      // Já removida (ou substituída) por outro caminho
      if (this.items.get(entry.key) !== entry) continue;
      try {
        this.removeEntry(entry);
      } catch (error) {
        failures.push(error);
        this.logger?.error({ table: this.name, key: entry.key, err: error }, 'Expiry callback failed');
      }
    }

    if (failures.length === 1) {
      throw failures[0];
    }
    if (failures.length > 1) {
      throw new AggregateError(failures, `${failures.length} expiry callbacks failed in table ${this.name}`);
    }
  }

  /**
   * Arms the timer for `waitMs`. Waits longer than the timer limit wake up early;
   * that sweep finds nothing expired and re-arms for the rest.
   */
  private scheduleSweep(now: number, waitMs: number): void {
    this.sweepArmedAt = now;
    this.sweepAt = now + waitMs;
    this.log('Next expiration check scheduled', { waitMs });

    this.sweepTimer = setTimeout(() => {
      this.sweepTimer = null;
      this.expirationCheck('timer');
    }, Math.min(waitMs, MAX_TIMER_DELAY_MS));
    // Não mantém o processo vivo só por causa do cache
    this.sweepTimer.unref();
  }

  private cancelSweep(): void {
    if (this.sweepTimer !== null) {
      clearTimeout(this.sweepTimer);
      this.sweepTimer = null;
    }
    this.sweepAt = null;
  }

  private log(message: string, fields: Record<string, unknown>): void {
    this.logger?.debug({ table: this.name, ...fields }, message);
  }
}
