import { describe, it, expect, vi, afterEach, beforeEach } from 'vitest';
import { CacheEntry } from '../src/index.js';

describe('CacheEntry', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('starts with createdAt == lastAccessedAt and no accesses', () => {
    const entry = new CacheEntry('a', 1, 100);
    expect(entry.key).toBe('a');
    expect(entry.value).toBe(1);
    expect(entry.idleTtlMs).toBe(100);
    expect(entry.lastAccessedAt).toBe(entry.createdAt);
    expect(entry.accessCount).toBe(0);
  });

  it('idleTtlMs defaults to 0 (never expires)', () => {
    expect(new CacheEntry('a', 1).idleTtlMs).toBe(0);
  });

  it('keepAlive() updates lastAccessedAt and increments accessCount', () => {
    const entry = new CacheEntry('a', 1, 100);
    const createdAt = entry.createdAt;

    vi.advanceTimersByTime(25);
    entry.keepAlive();
    expect(entry.lastAccessedAt).toBe(createdAt + 25);
    expect(entry.accessCount).toBe(1);

    vi.advanceTimersByTime(5);
    entry.keepAlive();
    expect(entry.lastAccessedAt).toBe(createdAt + 30);
    expect(entry.accessCount).toBe(2);
    expect(entry.createdAt).toBe(createdAt);
  });

  it('keepAlive() never moves lastAccessedAt backwards', () => {
    const entry = new CacheEntry('a', 1);
    const createdAt = entry.createdAt;

    vi.setSystemTime(createdAt - 1_000);
    entry.keepAlive();
    expect(entry.lastAccessedAt).toBe(createdAt);
    expect(entry.accessCount).toBe(1);
  });

  it('setOnEvict() replaces the callback (last writer wins)', () => {
    const first = vi.fn();
    const second = vi.fn();
    const entry = new CacheEntry('a', 1);

    entry.setOnEvict(first);
    entry.setOnEvict(second);
    entry.notifyEvict();

    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledWith('a');
  });

  it('notifyEvict() is a no-op without a callback', () => {
    const entry = new CacheEntry('a', 1);
    expect(() => entry.notifyEvict()).not.toThrow();
  });

  it('rejects negative or non-finite TTLs', () => {
    expect(() => new CacheEntry('a', 1, -1)).toThrow(RangeError);
    expect(() => new CacheEntry('a', 1, Number.NaN)).toThrow(RangeError);
    expect(() => new CacheEntry('a', 1, Infinity)).toThrow(RangeError);
  });
});
