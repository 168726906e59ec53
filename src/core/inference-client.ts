/**
 * Inference Client
 *
 * Per-call flow:
 * ```
 * VALIDATE → CACHE_LOOKUP ─hit─→ return (cached)
 *                │ miss
 *                ▼
 *      PRIMARY attempts (backoff 1s, 2s, 4s …)
 *                │ transient failures exhausted / model missing
 *                ▼
 *      FALLBACK attempts (what is left of the budget, this call only)
 *                │
 *                ▼
 *      RECORD + CACHE_STORE → return
 * ```
 *
 * `retry.maxAttempts` bounds the provider calls of one request across both
 * models. With a distinct fallback configured, the primary keeps all but
 * the last call of the budget for itself; a missing primary model hands
 * the whole remainder to the fallback at once.
 *
 * Every attempt that reaches the provider records exactly one metrics
 * entry, with `retryCount` counting calls made earlier in the request.
 * Terminal provider errors are never retried.
 *
 * @module core/inference-client
 */

import { EventEmitter } from 'eventemitter3';
import { randomUUID } from 'node:crypto';
import { performance } from 'node:perf_hooks';
import type { Logger } from 'pino';
import type { ZodType } from 'zod';
import type {
  GenerateTextOptions,
  InferenceClientConfig,
  InferenceClientHealth,
  InferenceClientStats,
  InferenceRequest,
  InferenceResult,
  ProviderCompletion,
  ProviderRequest,
} from '../types/inference.js';
import type { JsonValue } from '../types/cache.js';
import type { MetricsRecorder } from '../types/metrics.js';
import type { InferenceClientEvents } from '../api/events.js';
import {
  InferenceError,
  NotInitializedError,
  ResponseParseError,
  RetryExhaustedError,
  TerminalProviderError,
  TransientProviderError,
  describeError,
  formatZodIssues,
  toInferenceError,
  zodErrorToInferenceError,
} from '../api/errors.js';
import {
  CachedCompletionSchema,
  InferenceRequestSchema,
  type CachedCompletion,
} from '../types/schemas/inference.js';
import { JsonValueSchema } from '../types/schemas/common.js';
import type { InferenceProvider } from '../providers/provider.js';
import type { CacheStore } from '../cache/cache-store.js';
import { deriveCacheKey } from '../cache/cache-key.js';
import { retryWithBackoff } from '../utils/retry.js';
import { lazyLog } from '../utils/logger.js';

export const JSON_ONLY_INSTRUCTION = 'You must respond with valid JSON only. No other text.';
export const STRUCTURED_TEMPERATURE = 0.1;

const CODE_FENCE = /^```[a-zA-Z]*\s*\n?([\s\S]*?)\n?\s*```$/;

export interface InferenceClientOptions {
  provider: InferenceProvider;
  cache?: CacheStore | null;
  metrics?: MetricsRecorder | null;
  logger?: Logger;
}

export type StructuredOptions<T> = GenerateTextOptions & { schema?: ZodType<T> };

interface AttemptOutcome {
  completion: ProviderCompletion;
  retryCount: number;
  fallbackUsed: boolean;
}

interface CallContext {
  requestId: string;
  request: InferenceRequest;
  attempts: number;
  models: string[];
}

/**
 * Strip a surrounding markdown code fence, if any.
 */
export function stripCodeFence(content: string): string {
  const trimmed = content.trim();
  const match = CODE_FENCE.exec(trimmed);
  return match ? match[1].trim() : trimmed;
}

/**
 * Short label stored as `errorType` on failed metrics entries.
 */
export function errorTypeOf(error: InferenceError): string {
  if (error instanceof TransientProviderError || error instanceof TerminalProviderError) {
    return error.reason;
  }
  return error.code;
}

export class InferenceClient extends EventEmitter<InferenceClientEvents> {
  private readonly config: InferenceClientConfig;
  private readonly provider: InferenceProvider;
  private readonly cache: CacheStore | null;
  private readonly metrics: MetricsRecorder | null;
  private readonly logger?: Logger;

  private initialized = false;
  private readonly stats: InferenceClientStats = {
    totalRequests: 0,
    cacheHits: 0,
    providerCalls: 0,
    failures: 0,
    fallbacksEngaged: 0,
    lastError: null,
    lastRequestAt: null,
  };

  constructor(config: InferenceClientConfig, options: InferenceClientOptions) {
    super();
    this.config = config;
    this.provider = options.provider;
    this.cache = options.cache ?? null;
    this.metrics = options.metrics ?? null;
    this.logger = options.logger;
  }

  public async initialize(): Promise<void> {
    if (this.initialized) {
      this.logger?.warn('Inference client already initialized');
      return;
    }
    await this.provider.initialize();
    this.initialized = true;
    this.logger?.info(
      {
        provider: this.provider.name,
        model: this.config.model,
        fallbackModel: this.config.fallbackModel,
      },
      'Inference client initialized'
    );
  }

  public async shutdown(): Promise<void> {
    if (!this.initialized) {
      return;
    }
    await this.provider.shutdown();
    this.initialized = false;
  }

  /**
   * Run one inference request through cache, retries and fallback.
   *
   * @throws TerminalProviderError for invalid requests and non-retryable provider failures
   * @throws RetryExhaustedError once every attempt has failed transiently
   */
  public async generate(request: InferenceRequest): Promise<InferenceResult> {
    if (!this.initialized) {
      throw new NotInitializedError('InferenceClient');
    }

    const validation = InferenceRequestSchema.safeParse(request);
    if (!validation.success) {
      throw zodErrorToInferenceError(validation.error);
    }

    const requestId = randomUUID();
    const startedAt = performance.now();
    this.stats.totalRequests++;
    this.stats.lastRequestAt = new Date().toISOString();

    const cacheKey = this.cache && request.cache.use
      ? deriveCacheKey({
          messages: request.messages,
          system: request.system,
          temperature: request.temperature,
          maxTokens: request.maxTokens,
          model: this.config.model,
          responseFormat: request.responseFormat,
        })
      : null;

    if (cacheKey) {
      const cached = await this.lookupCache(cacheKey);
      if (cached) {
        const latencyMs = performance.now() - startedAt;
        this.stats.cacheHits++;
        this.emit('cache:hit', { requestId, key: cacheKey, timestamp: Date.now() });
        this.emit('request:completed', {
          requestId,
          success: true,
          model: cached.model,
          cached: true,
          latencyMs,
          timestamp: Date.now(),
        });
        return {
          requestId,
          content: cached.content,
          usage: cached.usage,
          latencyMs,
          model: cached.model,
          cached: true,
          retryCount: 0,
          fallbackUsed: cached.fallbackUsed,
        };
      }
    }

    const context: CallContext = { requestId, request, attempts: 0, models: [] };

    let outcome: AttemptOutcome;
    try {
      outcome = await this.callWithFallback(context);
    } catch (error) {
      const failure = toInferenceError(error);
      this.stats.failures++;
      this.stats.lastError = failure.message;
      this.emit('request:completed', {
        requestId,
        success: false,
        model: null,
        cached: false,
        latencyMs: performance.now() - startedAt,
        timestamp: Date.now(),
      });
      this.logger?.error(
        { requestId, purpose: request.purpose, module: request.module, attempts: context.attempts, error: failure.toObject() },
        'Inference request failed'
      );
      throw failure;
    }

    if (cacheKey) {
      await this.storeInCache(cacheKey, outcome, request.cache.ttlMs);
    }

    const latencyMs = performance.now() - startedAt;
    this.emit('request:completed', {
      requestId,
      success: true,
      model: outcome.completion.model,
      cached: false,
      latencyMs,
      timestamp: Date.now(),
    });

    return {
      requestId,
      content: outcome.completion.content,
      usage: outcome.completion.usage,
      latencyMs,
      model: outcome.completion.model,
      cached: false,
      retryCount: outcome.retryCount,
      fallbackUsed: outcome.fallbackUsed,
    };
  }

  /**
   * Single-prompt convenience wrapper around `generate()`. The cache is
   * used unless `useCache` is false.
   */
  public async generateText(prompt: string, options: GenerateTextOptions = {}): Promise<InferenceResult> {
    return this.generate(this.buildRequest(prompt, options, 'text'));
  }

  /**
   * Ask for JSON and parse the reply. With a schema the parsed value is
   * validated and typed; parse failures are not retried.
   *
   * @throws ResponseParseError when the reply is not JSON or fails the schema
   */
  public async generateStructured(prompt: string, options?: GenerateTextOptions): Promise<JsonValue>;
  public async generateStructured<T>(prompt: string, options: GenerateTextOptions & { schema: ZodType<T> }): Promise<T>;
  public async generateStructured<T>(prompt: string, options: StructuredOptions<T> = {}): Promise<T | JsonValue> {
    const system = options.system ? `${options.system}\n\n${JSON_ONLY_INSTRUCTION}` : JSON_ONLY_INSTRUCTION;
    const result = await this.generate(
      this.buildRequest(prompt, { ...options, system, temperature: options.temperature ?? STRUCTURED_TEMPERATURE }, 'json')
    );

    const body = stripCodeFence(result.content);
    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch (error) {
      throw new ResponseParseError(`Failed to parse JSON response: ${describeError(error)}`, result.content, {
        requestId: result.requestId,
        model: result.model,
      });
    }

    if (options.schema) {
      const validated = options.schema.safeParse(parsed);
      if (!validated.success) {
        throw new ResponseParseError(
          `Response did not match schema: ${formatZodIssues(validated.error).join('; ')}`,
          result.content,
          { requestId: result.requestId, model: result.model }
        );
      }
      return validated.data;
    }

    return JsonValueSchema.parse(parsed);
  }

  public async healthCheck(): Promise<InferenceClientHealth> {
    return {
      provider: await this.provider.healthCheck(),
      stats: this.getStats(),
    };
  }

  public getStats(): InferenceClientStats {
    return { ...this.stats };
  }

  private buildRequest(
    prompt: string,
    options: GenerateTextOptions,
    responseFormat: 'text' | 'json'
  ): InferenceRequest {
    return {
      messages: [{ role: 'user', content: prompt }],
      system: options.system,
      temperature: options.temperature ?? this.config.temperature,
      maxTokens: options.maxTokens ?? this.config.maxTokens,
      module: options.module,
      purpose: options.purpose,
      jobId: options.jobId,
      responseFormat,
      cache: { use: options.useCache ?? true, ttlMs: options.cacheTtlMs },
      timeoutMs: options.timeoutMs,
    };
  }

  private async callWithFallback(context: CallContext): Promise<AttemptOutcome> {
    const primary = this.config.model;
    const fallback = this.config.fallbackModel !== primary ? this.config.fallbackModel : null;
    const budget = this.config.retry.maxAttempts;
    const primaryBudget = fallback && budget > 1 ? budget - 1 : budget;

    try {
      return await this.runAttempts(context, primary, false, primaryBudget);
    } catch (error) {
      const failure = toInferenceError(error);
      const remaining = budget - context.attempts;
      if (!fallback || remaining < 1 || !this.shouldFallback(failure)) {
        throw this.finalError(context, failure);
      }

      this.stats.fallbacksEngaged++;
      this.emit('fallback:engaged', {
        requestId: context.requestId,
        primaryModel: primary,
        fallbackModel: fallback,
        reason: errorTypeOf(failure),
        timestamp: Date.now(),
      });
      this.logger?.warn(
        { requestId: context.requestId, primary, fallback, reason: errorTypeOf(failure), remaining },
        'Primary model failed, switching to fallback'
      );

      try {
        return await this.runAttempts(context, fallback, true, remaining);
      } catch (fallbackError) {
        throw this.finalError(context, toInferenceError(fallbackError));
      }
    }
  }

  private shouldFallback(error: InferenceError): boolean {
    if (error instanceof TransientProviderError) {
      return true;
    }
    return error instanceof TerminalProviderError && error.reason === 'model_not_found';
  }

  private finalError(context: CallContext, error: InferenceError): InferenceError {
    if (error instanceof TransientProviderError) {
      return new RetryExhaustedError(context.attempts, error, context.models);
    }
    return error;
  }

  private async runAttempts(
    context: CallContext,
    model: string,
    fallbackUsed: boolean,
    maxAttempts: number
  ): Promise<AttemptOutcome> {
    const { request, requestId } = context;
    context.models.push(model);

    const providerRequest: ProviderRequest = {
      model,
      messages: request.messages,
      system: request.system,
      temperature: request.temperature,
      maxTokens: request.maxTokens,
      responseFormat: request.responseFormat ?? 'text',
      timeoutMs: request.timeoutMs ?? this.config.timeoutMs,
    };

    return retryWithBackoff(
      async (attempt) => {
        const retryCount = context.attempts++;
        this.stats.providerCalls++;
        const started = performance.now();

        let completion: ProviderCompletion;
        try {
          completion = await this.provider.generate(providerRequest);
        } catch (error) {
          const failure = toInferenceError(error);
          await this.recordAttempt(request, {
            model,
            durationMs: performance.now() - started,
            promptTokens: 0,
            completionTokens: 0,
            success: false,
            errorType: errorTypeOf(failure),
            retryCount,
            fallbackUsed,
          });
          throw failure;
        }

        await this.recordAttempt(request, {
          model: completion.model,
          durationMs: performance.now() - started,
          promptTokens: completion.usage.inputTokens,
          completionTokens: completion.usage.outputTokens,
          success: true,
          errorType: null,
          retryCount,
          fallbackUsed,
        });

        lazyLog(
          this.logger,
          'debug',
          () => ({ requestId, model: completion.model, attempt, outputTokens: completion.usage.outputTokens }),
          'Provider call succeeded'
        );

        return { completion, retryCount, fallbackUsed };
      },
      {
        maxAttempts,
        initialDelayMs: this.config.retry.initialDelayMs,
        maxDelayMs: this.config.retry.maxDelayMs,
        backoffMultiplier: this.config.retry.backoffMultiplier,
        isRetryable: (error) => error instanceof TransientProviderError,
        onAttemptFailed: ({ attempt, delayMs, error }) => {
          const failure = toInferenceError(error);
          this.emit('attempt:failed', {
            requestId,
            model,
            attempt,
            fallbackUsed,
            willRetry: delayMs !== null,
            error: failure.toObject(),
            timestamp: Date.now(),
          });
          this.logger?.warn(
            { requestId, model, attempt, delayMs, error: failure.message },
            delayMs !== null ? 'Provider attempt failed, retrying' : 'Provider attempt failed'
          );
        },
      }
    );
  }

  private async recordAttempt(
    request: InferenceRequest,
    attempt: {
      model: string;
      durationMs: number;
      promptTokens: number;
      completionTokens: number;
      success: boolean;
      errorType: string | null;
      retryCount: number;
      fallbackUsed: boolean;
    }
  ): Promise<void> {
    if (!this.metrics) {
      return;
    }
    try {
      await this.metrics.record({
        ...attempt,
        module: request.module ?? null,
        jobId: request.jobId ?? null,
      });
    } catch (error) {
      this.logger?.warn({ error: describeError(error) }, 'Failed to record inference metrics');
    }
  }

  private async lookupCache(key: string): Promise<CachedCompletion | null> {
    if (!this.cache) {
      return null;
    }
    try {
      const value = await this.cache.get(key);
      if (value === undefined) {
        return null;
      }
      const parsed = CachedCompletionSchema.safeParse(value);
      if (!parsed.success) {
        this.logger?.warn({ key }, 'Ignoring cached value with unexpected shape');
        return null;
      }
      return parsed.data;
    } catch (error) {
      this.logger?.warn({ key, error: describeError(error) }, 'Cache lookup failed');
      return null;
    }
  }

  private async storeInCache(key: string, outcome: AttemptOutcome, ttlMs?: number): Promise<void> {
    const { completion, fallbackUsed } = outcome;
    if (!this.cache) {
      return;
    }
    try {
      await this.cache.set(
        key,
        {
          content: completion.content,
          model: completion.model,
          usage: {
            inputTokens: completion.usage.inputTokens,
            outputTokens: completion.usage.outputTokens,
            totalTokens: completion.usage.totalTokens,
          },
          fallbackUsed,
        },
        ttlMs
      );
    } catch (error) {
      this.logger?.warn({ key, error: describeError(error) }, 'Cache store failed');
    }
  }
}
