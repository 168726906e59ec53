/**
 * Configuration Loader
 *
 * Loads runtime.yaml, applies the environment-specific section and
 * environment variable overrides, validates with zod and converts the
 * snake_case sections into component configs.
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import type { z } from 'zod';
import { RuntimeConfigSchema } from '../types/schemas/config.js';
import type { CacheStoreConfig } from '../types/cache.js';
import type { MetricsStoreConfig } from '../types/metrics.js';
import type { InferenceClientConfig } from '../types/inference.js';
import type { OllamaProviderConfig } from '../providers/ollama-provider.js';
import { ConfigValidationError, describeError, formatZodIssues } from '../api/errors.js';
import { defaultRuntimeConfig } from './defaults.js';

export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;

export type Environment = 'production' | 'development' | 'test';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects; arrays and scalars in `source` replace.
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const output: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = output[key];
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      output[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      output[key] = sourceValue;
    }
  }

  return output;
}

/**
 * Find the package root directory by looking for package.json
 */
function findPackageRoot(): string {
  let currentDir = dirname(fileURLToPath(import.meta.url));

  while (currentDir !== dirname(currentDir)) {
    if (existsSync(join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  return process.cwd();
}

export function defaultConfigPath(): string {
  return join(findPackageRoot(), 'config', 'runtime.yaml');
}

function resolveEnvironment(environment?: Environment): Environment {
  const env = environment ?? process.env.NODE_ENV;
  return env === 'production' || env === 'test' ? env : 'development';
}

/**
 * Overrides from INFERENCE_* environment variables.
 */
function environmentOverrides(env: NodeJS.ProcessEnv): PlainObject {
  const overrides: PlainObject = {};

  if (env.INFERENCE_PROVIDER_HOST) {
    overrides.provider = { host: env.INFERENCE_PROVIDER_HOST };
  }

  const inference: PlainObject = {};
  if (env.INFERENCE_MODEL) {
    inference.model = env.INFERENCE_MODEL;
  }
  if (env.INFERENCE_FALLBACK_MODEL !== undefined) {
    inference.fallback_model = env.INFERENCE_FALLBACK_MODEL === '' ? null : env.INFERENCE_FALLBACK_MODEL;
  }
  if (Object.keys(inference).length > 0) {
    overrides.inference = inference;
  }

  if (env.INFERENCE_DATA_DIR) {
    overrides.cache = { cache_dir: join(env.INFERENCE_DATA_DIR, 'cache') };
    overrides.metrics = { data_dir: join(env.INFERENCE_DATA_DIR, 'metrics') };
  }

  return overrides;
}

/**
 * Load, merge and validate configuration. Precedence (lowest first):
 * built-in defaults, runtime.yaml, its environment section, INFERENCE_* variables.
 *
 * @throws ConfigValidationError when the file is missing, unparsable or invalid
 */
export function loadConfig(
  configPath?: string,
  environment?: Environment,
  env: NodeJS.ProcessEnv = process.env
): RuntimeConfig {
  const finalPath = configPath ?? defaultConfigPath();

  let raw: unknown;
  try {
    raw = yaml.load(readFileSync(finalPath, 'utf8'));
  } catch (error) {
    throw new ConfigValidationError([`${finalPath}: ${describeError(error)}`]);
  }

  if (!isPlainObject(raw)) {
    throw new ConfigValidationError([`${finalPath}: root must be a mapping`]);
  }

  const { environments, ...base } = raw;
  let merged = deepMerge({ ...defaultRuntimeConfig() }, base);

  if (isPlainObject(environments)) {
    const section = environments[resolveEnvironment(environment)];
    if (isPlainObject(section)) {
      merged = deepMerge(merged, section);
    }
  }

  merged = deepMerge(merged, environmentOverrides(env));
  return validateConfig(merged);
}

/**
 * Validate configuration values
 */
export function validateConfig(config: unknown): RuntimeConfig {
  const parseResult = RuntimeConfigSchema.safeParse(config);
  if (!parseResult.success) {
    throw new ConfigValidationError(formatZodIssues(parseResult.error));
  }
  return parseResult.data;
}

export function getCacheStoreConfig(config: RuntimeConfig): CacheStoreConfig {
  return {
    cacheDir: config.cache.cache_dir,
    maxMemoryEntries: config.cache.max_memory_entries,
    defaultTtlMs: config.cache.default_ttl_ms,
    cleanupIntervalMs: config.cache.cleanup_interval_ms,
  };
}

export function getMetricsStoreConfig(config: RuntimeConfig): MetricsStoreConfig {
  return {
    dataDir: config.metrics.data_dir,
    retentionDays: config.metrics.retention_days,
    archiveIntervalMs: config.metrics.archive_interval_ms,
    sampler: {
      enabled: config.metrics.sampler.enabled,
      intervalMs: config.metrics.sampler.interval_ms,
      maxAgeMs: config.metrics.sampler.max_age_ms,
      persistEvery: config.metrics.sampler.persist_every,
    },
  };
}

export function getInferenceClientConfig(config: RuntimeConfig): InferenceClientConfig {
  return {
    model: config.inference.model,
    fallbackModel: config.inference.fallback_model,
    temperature: config.inference.temperature,
    maxTokens: config.inference.max_tokens,
    timeoutMs: config.inference.timeout_ms,
    retry: {
      maxAttempts: config.inference.retry.max_attempts,
      initialDelayMs: config.inference.retry.initial_delay_ms,
      maxDelayMs: config.inference.retry.max_delay_ms,
      backoffMultiplier: config.inference.retry.backoff_multiplier,
    },
  };
}

export function getProviderConfig(config: RuntimeConfig): OllamaProviderConfig {
  return {
    host: config.provider.host,
    model: config.inference.model,
    fallbackModel: config.inference.fallback_model,
    verifyModelOnStart: config.provider.verify_model_on_start,
  };
}
