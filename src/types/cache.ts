/**
 * Cache Types
 *
 * Shapes shared by the memory and file tiers of the response cache.
 */

/**
 * Any value that survives a JSON round trip.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Single cached entry. Timestamps are epoch milliseconds.
 */
export interface CacheRecord {
  key: string;
  value: JsonValue;
  createdAt: number;
  expiresAt: number;
  hitCount: number;
}

/**
 * Cache store configuration (camelCase, derived from runtime.yaml)
 */
export interface CacheStoreConfig {
  /** Directory holding one `<key>.json` file per record */
  cacheDir: string;
  /** Memory tier capacity before LRU eviction */
  maxMemoryEntries: number;
  /** TTL applied when `set()` is called without one */
  defaultTtlMs: number;
  /** Periodic `cleanupExpired()` interval, 0 disables it */
  cleanupIntervalMs: number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  /** Percentage 0-100 */
  hitRate: number;
  memoryEntries: number;
  fileEntries: number;
  evictions: number;
  expirations: number;
}

export interface CacheHealth {
  status: 'healthy' | 'degraded';
  cacheDir: string;
  writable: boolean;
  memoryEntries: number;
  fileEntries: number;
  lastCleanup: string | null;
  error?: string;
}
