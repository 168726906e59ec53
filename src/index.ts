/**
 * local-inference-core
 *
 * Resilient local inference: a retrying, falling-back client over a
 * two-tier response cache, per-call metrics with monthly shards, and a
 * generic step pipeline.
 *
 * @example
 * ```typescript
 * import { createInferenceRuntime } from 'local-inference-core';
 *
 * const runtime = createInferenceRuntime();
 * await runtime.start();
 * const result = await runtime.client.generateText('Summarize this posting', { module: 'rinser' });
 * await runtime.shutdown();
 * ```
 */

export { createInferenceRuntime, InferenceRuntime } from './runtime.js';
export type { InferenceRuntimeOptions, RuntimeHealth } from './runtime.js';

export { CacheStore } from './cache/cache-store.js';
export type { CacheStoreOptions } from './cache/cache-store.js';
export { deriveCacheKey, generateKey, canonicalJson } from './cache/cache-key.js';
export type { CacheKeyFields } from './cache/cache-key.js';

export { MetricsStore } from './monitoring/metrics-store.js';
export type { MetricsStoreOptions } from './monitoring/metrics-store.js';
export { SystemCollector, THROTTLING_THRESHOLD_C } from './monitoring/system-collector.js';
export type { SystemProbe, SystemSnapshot } from './monitoring/system-collector.js';
export { tokensPerSecond, totalTokens } from './monitoring/metrics-statistics.js';

export { InferenceClient, stripCodeFence } from './core/inference-client.js';
export type { InferenceClientOptions, StructuredOptions } from './core/inference-client.js';
export type { InferenceProvider } from './providers/provider.js';
export { OllamaProvider } from './providers/ollama-provider.js';
export type { OllamaProviderConfig } from './providers/ollama-provider.js';

export { PipelineOrchestrator, createRunId } from './pipeline/pipeline-orchestrator.js';
export type { PipelineOrchestratorOptions } from './pipeline/pipeline-orchestrator.js';
export { createJobPipeline, JOB_PIPELINE_STEPS } from './pipeline/job-pipeline.js';
export type { JobPipelineStep, JobStepHandlers } from './pipeline/job-pipeline.js';

export {
  loadConfig,
  validateConfig,
  getCacheStoreConfig,
  getMetricsStoreConfig,
  getInferenceClientConfig,
  getProviderConfig,
} from './config/loader.js';
export type { RuntimeConfig, Environment } from './config/loader.js';

export {
  InferenceError,
  TransientProviderError,
  TerminalProviderError,
  RetryExhaustedError,
  ResponseParseError,
  CacheIOError,
  MetricsPersistenceError,
  MetricsInitializationError,
  StepExecutionError,
  ProviderInitializationError,
  NotInitializedError,
  ConfigValidationError,
  toInferenceError,
  zodErrorToInferenceError,
} from './api/errors.js';
export type { InferenceErrorCode, InferenceErrorShape } from './api/errors.js';
export type * from './api/events.js';

export { createLogger } from './utils/logger.js';

export type * from './types/index.js';
export * from './types/schemas/index.js';
