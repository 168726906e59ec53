/**
 * Memory tier (LRU with TTL)
 *
 * LRU Eviction Logic:
 * - Map iteration order === insertion order (oldest first)
 * - On get(): move entry to end (most recently used)
 * - On set() at capacity: delete first entry (least recently used)
 */

import type { Logger } from 'pino';
import type { CacheRecord } from '../types/cache.js';

export interface MemoryTierOptions {
  maxEntries: number;
  now?: () => number;
  logger?: Logger;
}

export class MemoryTier {
  private readonly records = new Map<string, CacheRecord>();
  private readonly maxEntries: number;
  private readonly now: () => number;
  private readonly logger?: Logger;

  private evictions = 0;
  private expirations = 0;

  constructor(options: MemoryTierOptions) {
    if (options.maxEntries < 1) {
      throw new Error('maxEntries must be >= 1');
    }
    this.maxEntries = options.maxEntries;
    this.now = options.now ?? Date.now;
    this.logger = options.logger;
  }

  /**
   * Look up a record and mark it most recently used. Expired records are
   * purged and reported absent.
   */
  public get(key: string): CacheRecord | undefined {
    const record = this.records.get(key);
    if (!record) {
      return undefined;
    }

    if (this.now() > record.expiresAt) {
      this.records.delete(key);
      this.expirations++;
      return undefined;
    }

    record.hitCount++;
    this.records.delete(key);
    this.records.set(key, record);
    return record;
  }

  /**
   * Insert or replace a record, evicting the LRU entry when at capacity.
   */
  public set(record: CacheRecord): void {
    if (this.records.has(record.key)) {
      this.records.delete(record.key);
    } else if (this.records.size >= this.maxEntries) {
      this.evictLRU();
    }
    this.records.set(record.key, record);
  }

  public has(key: string): boolean {
    const record = this.records.get(key);
    return record !== undefined && this.now() <= record.expiresAt;
  }

  public delete(key: string): boolean {
    return this.records.delete(key);
  }

  public clear(): number {
    const count = this.records.size;
    this.records.clear();
    return count;
  }

  /**
   * Drop every expired record, returning how many were removed.
   */
  public purgeExpired(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, record] of this.records) {
      if (now > record.expiresAt) {
        this.records.delete(key);
        removed++;
      }
    }
    this.expirations += removed;
    return removed;
  }

  /**
   * Keys from least to most recently used.
   */
  public keys(): string[] {
    return [...this.records.keys()];
  }

  public get size(): number {
    return this.records.size;
  }

  public get evictionCount(): number {
    return this.evictions;
  }

  public get expirationCount(): number {
    return this.expirations;
  }

  private evictLRU(): void {
    const oldest = this.records.keys().next();
    if (oldest.done) {
      return;
    }
    this.records.delete(oldest.value);
    this.evictions++;
    this.logger?.debug({ key: oldest.value }, 'Evicted LRU cache entry');
  }
}
