/**
 * Cache Store
 *
 * Two-tier key/value cache: a bounded LRU memory tier in front of a
 * file-per-record disk tier. Reads check memory first, then disk, and
 * promote disk hits into memory. Both tiers enforce TTL on read.
 *
 * File I/O failures never reach the caller: reads degrade to a miss and
 * writes keep the memory entry. When the cache directory cannot be created
 * the store runs on the memory tier alone.
 *
 * @module cache/cache-store
 */

import type { Logger } from 'pino';
import type {
  CacheHealth,
  CacheRecord,
  CacheStats,
  CacheStoreConfig,
  JsonValue,
} from '../types/cache.js';
import { CacheIOError, describeError } from '../api/errors.js';
import { lazyLog } from '../utils/logger.js';
import { percentage, round } from '../utils/math-helpers.js';
import { MemoryTier } from './memory-tier.js';
import { FileTier, type FileReadResult } from './file-tier.js';

export interface CacheStoreOptions {
  logger?: Logger;
  /** Clock in epoch ms, injectable for tests */
  now?: () => number;
}

export class CacheStore {
  private readonly config: CacheStoreConfig;
  private readonly logger?: Logger;
  private readonly now: () => number;
  private readonly memory: MemoryTier;
  private readonly files: FileTier;

  private initialized = false;
  private fileTierEnabled = true;
  private cleanupTimer: NodeJS.Timeout | null = null;
  private hits = 0;
  private misses = 0;
  private lastCleanup: string | null = null;

  constructor(config: CacheStoreConfig, options: CacheStoreOptions = {}) {
    this.config = config;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
    this.memory = new MemoryTier({
      maxEntries: config.maxMemoryEntries,
      now: this.now,
      logger: options.logger,
    });
    this.files = new FileTier(config.cacheDir, options.logger);
  }

  /**
   * Create the cache directory and start the cleanup timer (if configured).
   * Never throws: without a usable directory the store stays memory-only.
   */
  public async initialize(): Promise<void> {
    if (this.initialized) {
      this.logger?.warn('Cache store already initialized');
      return;
    }

    try {
      await this.files.initialize();
      this.fileTierEnabled = true;
    } catch (error) {
      this.fileTierEnabled = false;
      this.logger?.error(
        { error: new CacheIOError('initialize', null, error).message },
        'Cache directory unavailable, running memory-only'
      );
    }
    this.initialized = true;

    if (this.config.cleanupIntervalMs > 0) {
      this.cleanupTimer = setInterval(() => {
        this.cleanupExpired().catch((error: unknown) => {
          this.logger?.error({ error: describeError(error) }, 'Scheduled cache cleanup failed');
        });
      }, this.config.cleanupIntervalMs);
      this.cleanupTimer.unref();
    }

    this.logger?.info(
      {
        cacheDir: this.files.directory,
        fileTier: this.fileTierEnabled,
        fileEntries: await this.safeFileCount(),
        maxMemoryEntries: this.config.maxMemoryEntries,
      },
      'Cache store initialized'
    );
  }

  public async shutdown(): Promise<void> {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
    this.memory.clear();
    this.initialized = false;
  }

  /**
   * Value for `key`, or undefined when absent or expired in both tiers.
   */
  public async get(key: string): Promise<JsonValue | undefined> {
    const inMemory = this.memory.get(key);
    if (inMemory) {
      this.hits++;
      lazyLog(this.logger, 'debug', () => ({ key, tier: 'memory', hitCount: inMemory.hitCount }), 'Cache hit');
      return inMemory.value;
    }

    if (!this.fileTierEnabled) {
      this.misses++;
      return undefined;
    }

    let result: FileReadResult;
    try {
      result = await this.files.read(key, this.now());
    } catch (error) {
      this.logger?.warn({ error: new CacheIOError('read', key, error).message }, 'Cache file read failed, treating as miss');
      this.misses++;
      return undefined;
    }

    if (result.status !== 'hit') {
      this.misses++;
      lazyLog(this.logger, 'debug', () => ({ key, status: result.status }), 'Cache miss');
      return undefined;
    }

    const record: CacheRecord = { ...result.record, hitCount: result.record.hitCount + 1 };
    this.memory.set(record);
    this.hits++;
    lazyLog(this.logger, 'debug', () => ({ key, tier: 'file' }), 'Cache hit, promoted to memory');
    return record.value;
  }

  /**
   * Store `value` in both tiers. The memory write always lands; a failed
   * file write is logged.
   */
  public async set(key: string, value: JsonValue, ttlMs?: number): Promise<void> {
    const createdAt = this.now();
    const record: CacheRecord = {
      key,
      value,
      createdAt,
      expiresAt: createdAt + (ttlMs ?? this.config.defaultTtlMs),
      hitCount: 0,
    };

    this.memory.set(record);
    if (!this.fileTierEnabled) {
      return;
    }

    try {
      await this.files.write(record);
    } catch (error) {
      this.logger?.warn({ error: new CacheIOError('write', key, error).message }, 'Cache file write failed, kept in memory only');
    }
  }

  /**
   * True when `get(key)` would return a value, without touching LRU order
   * or hit counters.
   */
  public async has(key: string): Promise<boolean> {
    if (this.memory.has(key)) {
      return true;
    }
    if (!this.fileTierEnabled) {
      return false;
    }
    try {
      return (await this.files.read(key, this.now())).status === 'hit';
    } catch (error) {
      this.logger?.warn({ error: new CacheIOError('read', key, error).message }, 'Cache file read failed');
      return false;
    }
  }

  /**
   * Remove `key` from both tiers. True when either tier held it.
   */
  public async delete(key: string): Promise<boolean> {
    const fromMemory = this.memory.delete(key);
    let fromFile = false;
    if (this.fileTierEnabled) {
      try {
        fromFile = await this.files.delete(key);
      } catch (error) {
        this.logger?.warn({ error: new CacheIOError('delete', key, error).message }, 'Cache file delete failed');
      }
    }
    return fromMemory || fromFile;
  }

  /**
   * Empty both tiers and reset hit counters. Returns memory entries plus
   * file records removed.
   */
  public async clear(): Promise<number> {
    const memoryCount = this.memory.clear();
    let fileCount = 0;
    if (this.fileTierEnabled) {
      try {
        fileCount = await this.files.clear();
      } catch (error) {
        this.logger?.warn({ error: new CacheIOError('clear', null, error).message }, 'Cache file clear failed');
      }
    }

    this.hits = 0;
    this.misses = 0;
    this.logger?.info({ memoryCount, fileCount }, 'Cache cleared');
    return memoryCount + fileCount;
  }

  /**
   * Remove expired and corrupted records from both tiers. Returns the
   * number of file records removed.
   */
  public async cleanupExpired(): Promise<number> {
    const now = this.now();
    const memoryRemoved = this.memory.purgeExpired();
    let fileRemoved = 0;

    if (this.fileTierEnabled) {
      try {
        fileRemoved = await this.files.cleanupExpired(now);
      } catch (error) {
        this.logger?.warn({ error: new CacheIOError('cleanup', null, error).message }, 'Cache file cleanup failed');
      }
    }

    this.lastCleanup = new Date(now).toISOString();
    if (memoryRemoved > 0 || fileRemoved > 0) {
      this.logger?.info({ memoryRemoved, fileRemoved }, 'Expired cache entries removed');
    }
    return fileRemoved;
  }

  /**
   * False once initialize() failed to create the cache directory.
   */
  public get isFileTierEnabled(): boolean {
    return this.fileTierEnabled;
  }

  public async getStats(): Promise<CacheStats> {
    const lookups = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      hitRate: round(percentage(this.hits, lookups)),
      memoryEntries: this.memory.size,
      fileEntries: await this.safeFileCount(),
      evictions: this.memory.evictionCount,
      expirations: this.memory.expirationCount,
    };
  }

  /**
   * Probe-write the cache directory.
   */
  public async healthCheck(): Promise<CacheHealth> {
    const base = {
      cacheDir: this.files.directory,
      memoryEntries: this.memory.size,
      lastCleanup: this.lastCleanup,
    };

    try {
      await this.files.probe();
      return {
        ...base,
        status: 'healthy',
        writable: true,
        fileEntries: await this.files.count(),
      };
    } catch (error) {
      return {
        ...base,
        status: 'degraded',
        writable: false,
        fileEntries: 0,
        error: describeError(error),
      };
    }
  }

  private async safeFileCount(): Promise<number> {
    if (!this.fileTierEnabled) {
      return 0;
    }
    try {
      return await this.files.count();
    } catch (error) {
      this.logger?.warn({ error: describeError(error) }, 'Unable to count cache files');
      return 0;
    }
  }
}
