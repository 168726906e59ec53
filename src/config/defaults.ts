/**
 * Default Configuration Constants
 *
 * Fallback values used when runtime.yaml omits a section and by tests.
 */

import type { RuntimeConfig } from './loader.js';

/**
 * Response Cache Configuration
 */
export const CACHE = {
  /** Cache directory (one JSON file per record) */
  CACHE_DIR: 'data/cache',

  /** Memory tier capacity before LRU eviction */
  MAX_MEMORY_ENTRIES: 100,

  /** Default record TTL (ms) */
  DEFAULT_TTL_MS: 3_600_000, // 1 hour

  /** Periodic cleanup interval (ms), 0 disables */
  CLEANUP_INTERVAL_MS: 0,
} as const;

/**
 * Metrics Store Configuration
 */
export const METRICS = {
  DATA_DIR: 'data/metrics',

  /** Entries older than this move to archive/ */
  RETENTION_DAYS: 30,

  /** Background archival interval (ms) */
  ARCHIVE_INTERVAL_MS: 3_600_000, // 1 hour

  /** System sampler interval (ms) */
  SAMPLER_INTERVAL_MS: 10_000, // 10 seconds

  /** System points older than this are pruned */
  SAMPLER_MAX_AGE_MS: 86_400_000, // 24 hours

  /** Persist the system window after this many samples */
  SAMPLER_PERSIST_EVERY: 30, // ~5 minutes at 10s
} as const;

/**
 * Inference Client Configuration
 */
export const INFERENCE = {
  MODEL: 'qwen2.5:3b',
  FALLBACK_MODEL: 'gemma2:2b',
  TEMPERATURE: 0.3,
  MAX_TOKENS: 2000,

  /** Per-attempt provider timeout (ms) */
  TIMEOUT_MS: 120_000, // 2 minutes

  /** Provider calls per request across primary and fallback */
  MAX_ATTEMPTS: 3,

  /** Backoff: 1s, 2s, 4s */
  INITIAL_DELAY_MS: 1_000,
  MAX_DELAY_MS: 4_000,
  BACKOFF_MULTIPLIER: 2,
} as const;

/**
 * Provider Configuration
 */
export const PROVIDER = {
  HOST: 'http://localhost:11434',
} as const;

/**
 * Complete snake_case configuration built from the constants above.
 * runtime.yaml is merged over it, so the file may omit any section.
 */
export function defaultRuntimeConfig(): RuntimeConfig {
  return {
    logging: { level: 'info' },
    cache: {
      cache_dir: CACHE.CACHE_DIR,
      max_memory_entries: CACHE.MAX_MEMORY_ENTRIES,
      default_ttl_ms: CACHE.DEFAULT_TTL_MS,
      cleanup_interval_ms: CACHE.CLEANUP_INTERVAL_MS,
    },
    metrics: {
      data_dir: METRICS.DATA_DIR,
      retention_days: METRICS.RETENTION_DAYS,
      archive_interval_ms: METRICS.ARCHIVE_INTERVAL_MS,
      sampler: {
        enabled: true,
        interval_ms: METRICS.SAMPLER_INTERVAL_MS,
        max_age_ms: METRICS.SAMPLER_MAX_AGE_MS,
        persist_every: METRICS.SAMPLER_PERSIST_EVERY,
      },
    },
    inference: {
      model: INFERENCE.MODEL,
      fallback_model: INFERENCE.FALLBACK_MODEL,
      temperature: INFERENCE.TEMPERATURE,
      max_tokens: INFERENCE.MAX_TOKENS,
      timeout_ms: INFERENCE.TIMEOUT_MS,
      retry: {
        max_attempts: INFERENCE.MAX_ATTEMPTS,
        initial_delay_ms: INFERENCE.INITIAL_DELAY_MS,
        max_delay_ms: INFERENCE.MAX_DELAY_MS,
        backoff_multiplier: INFERENCE.BACKOFF_MULTIPLIER,
      },
    },
    provider: {
      type: 'ollama',
      host: PROVIDER.HOST,
      verify_model_on_start: true,
    },
  };
}
