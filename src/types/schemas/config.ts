/**
 * Runtime Configuration Schemas
 *
 * Zod schemas for validating runtime.yaml configuration (snake_case keys).
 *
 * @module schemas/config
 */

import { z } from 'zod';

/**
 * Logging Configuration
 */
export const LoggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']),
});

/**
 * Response Cache Configuration
 */
export const CacheConfigSchema = z.object({
  cache_dir: z.string().min(1, 'Cache directory cannot be empty'),
  max_memory_entries: z.number().int().positive('Max memory entries must be positive'),
  default_ttl_ms: z.number().int().positive('Default TTL must be positive'),
  cleanup_interval_ms: z.number().int().min(0, 'must be >= 0'),
});

/**
 * System Sampler Configuration
 */
export const SamplerConfigSchema = z.object({
  enabled: z.boolean(),
  interval_ms: z.number().int().min(100, 'must be >= 100ms'),
  max_age_ms: z.number().int().positive('must be positive'),
  persist_every: z.number().int().min(1, 'must be >= 1'),
}).refine(
  (data) => data.max_age_ms >= data.interval_ms,
  {
    message: 'must be >= interval_ms',
    path: ['max_age_ms'],
  }
);

/**
 * Metrics Store Configuration
 */
export const MetricsConfigSchema = z.object({
  data_dir: z.string().min(1, 'Data directory cannot be empty'),
  retention_days: z.number().int().min(1, 'must be >= 1'),
  archive_interval_ms: z.number().int().min(0, 'must be >= 0'),
  sampler: SamplerConfigSchema,
});

/**
 * Inference Retry Configuration
 */
export const RetryConfigSchema = z.object({
  max_attempts: z.number().int().min(1, 'must be >= 1'),
  initial_delay_ms: z.number().int().min(0, 'must be >= 0'),
  max_delay_ms: z.number().int().min(0, 'must be >= 0'),
  backoff_multiplier: z.number().min(1, 'must be >= 1'),
}).refine(
  (data) => data.max_delay_ms >= data.initial_delay_ms,
  {
    message: 'must be >= initial_delay_ms',
    path: ['max_delay_ms'],
  }
);

/**
 * Inference Client Configuration
 */
export const InferenceConfigSchema = z.object({
  model: z.string().min(1, 'Model cannot be empty'),
  fallback_model: z.string().min(1, 'Fallback model cannot be empty').nullable(),
  temperature: z.number().min(0).max(1),
  max_tokens: z.number().int().min(1).max(4096),
  timeout_ms: z.number().int().min(1000, 'must be >= 1000ms'),
  retry: RetryConfigSchema,
});

/**
 * Provider Configuration
 */
export const ProviderConfigSchema = z.object({
  type: z.literal('ollama'),
  host: z.string().url('Provider host must be a URL'),
  verify_model_on_start: z.boolean(),
});

/**
 * Complete Runtime Configuration Schema
 */
export const RuntimeConfigSchema = z.object({
  logging: LoggingConfigSchema,
  cache: CacheConfigSchema,
  metrics: MetricsConfigSchema,
  inference: InferenceConfigSchema,
  provider: ProviderConfigSchema,
});

export type RuntimeConfigInput = z.infer<typeof RuntimeConfigSchema>;
