import type { EvictCallback } from './types.js';

/**
 * Um item do cache: valor + metadados de acesso.
 * `idleTtlMs` conta a partir do último acesso, não da criação.
 */
export class CacheEntry<K, V> {
  readonly key: K;
  readonly value: V;
  /** Idle duration in ms after which the entry expires. `0` = never expires. */
  readonly idleTtlMs: number;
  /** Epoch ms at construction. */
  readonly createdAt: number;

  private accessedAt: number;
  private hits = 0;
  private onEvict: EvictCallback<K> | undefined;

  constructor(key: K, value: V, idleTtlMs = 0) {
    if (!Number.isFinite(idleTtlMs) || idleTtlMs < 0) {
      throw new RangeError(`idleTtlMs must be a finite number >= 0, got ${idleTtlMs}`);
    }
    this.key = key;
    this.value = value;
    this.idleTtlMs = idleTtlMs;
    this.createdAt = Date.now();
    this.accessedAt = this.createdAt;
  }

  /** Epoch ms of the last successful read (or of construction). */
  get lastAccessedAt(): number {
    return this.accessedAt;
  }

  get accessCount(): number {
    return this.hits;
  }

  /** Marca o acesso: reinicia o relógio de inatividade e incrementa o contador. */
  keepAlive(): void {
    // Nunca volta no tempo, mesmo se o relógio do sistema recuar
    this.accessedAt = Math.max(this.accessedAt, Date.now());
    this.hits++;
  }

  /** Replaces the callback invoked with the key right before removal. */
  setOnEvict(callback: EvictCallback<K> | undefined): void {
    this.onEvict = callback;
  }

  /** @internal Called by the owning table before it drops the entry. */
  notifyEvict(): void {
    this.onEvict?.(this.key);
  }
}
