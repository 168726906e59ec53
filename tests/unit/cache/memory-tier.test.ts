import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryTier } from '../../../src/cache/memory-tier.js';
import type { CacheRecord } from '../../../src/types/cache.js';

function record(key: string, expiresAt = 10_000, value = key): CacheRecord {
  return { key, value, createdAt: 0, expiresAt, hitCount: 0 };
}

describe('MemoryTier', () => {
  let now: number;
  let tier: MemoryTier;

  beforeEach(() => {
    now = 1_000;
    tier = new MemoryTier({ maxEntries: 3, now: () => now });
  });

  it('should reject a capacity below one', () => {
    expect(() => new MemoryTier({ maxEntries: 0 })).toThrow('maxEntries must be >= 1');
  });

  it('should return stored records and count hits', () => {
    tier.set(record('a'));

    expect(tier.get('a')?.value).toBe('a');
    expect(tier.get('a')?.hitCount).toBe(2);
    expect(tier.get('missing')).toBeUndefined();
  });

  it('should evict the least recently used record at capacity', () => {
    tier.set(record('a'));
    tier.set(record('b'));
    tier.set(record('c'));

    tier.get('a');
    tier.set(record('d'));

    expect(tier.keys()).toEqual(['c', 'a', 'd']);
    expect(tier.get('b')).toBeUndefined();
    expect(tier.evictionCount).toBe(1);
  });

  it('should replace an existing key without evicting', () => {
    tier.set(record('a'));
    tier.set(record('b'));
    tier.set(record('c'));
    tier.set(record('a', 10_000, 'updated'));

    expect(tier.size).toBe(3);
    expect(tier.evictionCount).toBe(0);
    expect(tier.keys()).toEqual(['b', 'c', 'a']);
    expect(tier.get('a')?.value).toBe('updated');
  });

  it('should purge an expired record on read', () => {
    tier.set(record('a', 2_000));

    now = 2_000;
    expect(tier.get('a')).toBeDefined();

    now = 2_001;
    expect(tier.get('a')).toBeUndefined();
    expect(tier.size).toBe(0);
    expect(tier.expirationCount).toBe(1);
  });

  it('should report presence without touching LRU order', () => {
    tier.set(record('a'));
    tier.set(record('b'));

    expect(tier.has('a')).toBe(true);
    expect(tier.keys()).toEqual(['a', 'b']);
  });

  it('should purge every expired record', () => {
    tier.set(record('a', 1_500));
    tier.set(record('b', 5_000));
    tier.set(record('c', 1_200));

    now = 2_000;

    expect(tier.purgeExpired()).toBe(2);
    expect(tier.keys()).toEqual(['b']);
    expect(tier.expirationCount).toBe(2);
  });

  it('should report how many records clear() removed', () => {
    tier.set(record('a'));
    tier.set(record('b'));

    expect(tier.clear()).toBe(2);
    expect(tier.size).toBe(0);
  });
});
