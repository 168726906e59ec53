/**
 * Inference Runtime
 *
 * Composition root: builds the cache, metrics store, provider and client
 * once, wires them together and owns their lifecycle. Components start in
 * dependency order and stop in reverse.
 */

import type { Logger } from 'pino';
import type { CacheHealth } from './types/cache.js';
import type { InferenceClientHealth } from './types/inference.js';
import type { PipelineStepDefinition } from './types/pipeline.js';
import { InferenceError, MetricsInitializationError, describeError, toInferenceError } from './api/errors.js';
import {
  loadConfig,
  getCacheStoreConfig,
  getInferenceClientConfig,
  getMetricsStoreConfig,
  getProviderConfig,
  type RuntimeConfig,
} from './config/loader.js';
import { createLogger, componentLogger } from './utils/logger.js';
import { CacheStore } from './cache/cache-store.js';
import { MetricsStore } from './monitoring/metrics-store.js';
import type { SystemCollector } from './monitoring/system-collector.js';
import type { InferenceProvider } from './providers/provider.js';
import { OllamaProvider } from './providers/ollama-provider.js';
import { InferenceClient } from './core/inference-client.js';
import { PipelineOrchestrator } from './pipeline/pipeline-orchestrator.js';

export interface InferenceRuntimeOptions {
  config?: RuntimeConfig;
  provider?: InferenceProvider;
  logger?: Logger;
  /** null disables system readings and the sampler */
  collector?: SystemCollector | null;
}

export interface RuntimeHealth {
  status: 'healthy' | 'degraded' | 'unavailable';
  cache: CacheHealth;
  inference: InferenceClientHealth;
  metrics: { initialized: boolean };
}

export class InferenceRuntime {
  public readonly config: RuntimeConfig;
  public readonly logger: Logger;
  public readonly cache: CacheStore;
  public readonly metrics: MetricsStore;
  public readonly provider: InferenceProvider;
  public readonly client: InferenceClient;

  private started = false;
  private startPromise: Promise<void> | null = null;
  private shutdownPromise: Promise<void> | null = null;

  constructor(options: InferenceRuntimeOptions = {}) {
    this.config = options.config ?? loadConfig();
    this.logger = options.logger ?? createLogger({ level: this.config.logging.level });

    this.cache = new CacheStore(getCacheStoreConfig(this.config), {
      logger: componentLogger(this.logger, 'cache'),
    });
    this.metrics = new MetricsStore(getMetricsStoreConfig(this.config), {
      logger: componentLogger(this.logger, 'metrics'),
      collector: options.collector,
    });
    this.provider = options.provider ?? new OllamaProvider(getProviderConfig(this.config), {
      logger: componentLogger(this.logger, 'provider'),
    });
    this.client = new InferenceClient(getInferenceClientConfig(this.config), {
      provider: this.provider,
      cache: this.cache,
      metrics: this.metrics,
      logger: componentLogger(this.logger, 'inference'),
    });
  }

  /**
   * Initialize cache, metrics and client (in that order). Concurrent
   * calls share one start. Only a client failure fails the start: the
   * cache falls back to memory and calls go unrecorded without metrics.
   */
  public async start(): Promise<void> {
    if (this.started) {
      return;
    }
    if (this.shutdownPromise) {
      throw new InferenceError('NotInitialized', 'Runtime shutdown in progress');
    }

    if (!this.startPromise) {
      this.startPromise = (async () => {
        await this.cache.initialize();
        await this.initializeMetrics();
        await this.client.initialize();
        this.started = true;
        this.logger.info('Inference runtime started');
      })().catch(async (error: unknown) => {
        this.startPromise = null;
        await this.stopComponents();
        throw toInferenceError(error);
      });
    }

    await this.startPromise;
  }

  /**
   * Stop the client, metrics (cancelling and awaiting the sampler) and
   * cache, in that order.
   */
  public async shutdown(): Promise<void> {
    if (this.shutdownPromise) {
      return this.shutdownPromise;
    }

    this.shutdownPromise = (async () => {
      try {
        await this.stopComponents();
        this.logger.info('Inference runtime stopped');
      } finally {
        this.started = false;
        this.startPromise = null;
        this.shutdownPromise = null;
      }
    })();

    return this.shutdownPromise;
  }

  public get isStarted(): boolean {
    return this.started;
  }

  /**
   * Build a pipeline orchestrator sharing the runtime logger.
   */
  public createPipeline<TContext>(
    steps: readonly PipelineStepDefinition<TContext>[],
    optionalStep?: string
  ): PipelineOrchestrator<TContext> {
    return new PipelineOrchestrator<TContext>({
      steps,
      optionalStep,
      logger: componentLogger(this.logger, 'pipeline'),
    });
  }

  public async healthCheck(): Promise<RuntimeHealth> {
    const [cache, inference] = await Promise.all([this.cache.healthCheck(), this.client.healthCheck()]);
    const metricsInitialized = this.metrics.isInitialized;

    let status: RuntimeHealth['status'] = 'healthy';
    if (inference.provider.status === 'unavailable') {
      status = 'unavailable';
    } else if (inference.provider.status === 'degraded' || cache.status === 'degraded' || !metricsInitialized) {
      status = 'degraded';
    }

    return {
      status,
      cache,
      inference,
      metrics: { initialized: metricsInitialized },
    };
  }

  private async initializeMetrics(): Promise<void> {
    try {
      await this.metrics.initialize();
    } catch (error) {
      if (!(error instanceof MetricsInitializationError)) {
        throw error;
      }
      this.logger.error({ error: error.message }, 'Metrics unavailable, continuing without recording');
    }
  }

  private async stopComponents(): Promise<void> {
    const steps: Array<[string, () => Promise<void>]> = [
      ['inference', () => this.client.shutdown()],
      ['metrics', () => this.metrics.shutdown()],
      ['cache', () => this.cache.shutdown()],
    ];
    for (const [component, stop] of steps) {
      try {
        await stop();
      } catch (error) {
        this.logger.error({ component, error: describeError(error) }, 'Component shutdown failed');
      }
    }
  }
}

export function createInferenceRuntime(options: InferenceRuntimeOptions = {}): InferenceRuntime {
  return new InferenceRuntime(options);
}
