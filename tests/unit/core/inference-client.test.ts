/**
 * Inference Client Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { tmpdir } from 'node:os';
import { z } from 'zod';
import {
  InferenceClient,
  JSON_ONLY_INSTRUCTION,
  STRUCTURED_TEMPERATURE,
  stripCodeFence,
} from '../../../src/core/inference-client.js';
import { CacheStore } from '../../../src/cache/cache-store.js';
import {
  NotInitializedError,
  ResponseParseError,
  RetryExhaustedError,
  TerminalProviderError,
  TransientProviderError,
} from '../../../src/api/errors.js';
import type { InferenceClientConfig, InferenceRequest } from '../../../src/types/inference.js';
import { defaultRuntimeConfig } from '../../../src/config/defaults.js';
import { getInferenceClientConfig } from '../../../src/config/loader.js';
import { FAKE_USAGE, RecordingMetrics, ScriptedProvider } from '../../helpers/scripted-provider.js';

const PRIMARY = 'primary-model';
const FALLBACK = 'fallback-model';

const serverError = (): TransientProviderError =>
  new TransientProviderError('server_error', 'Provider returned HTTP 503', 503);

const request = (overrides: Partial<InferenceRequest> = {}): InferenceRequest => ({
  messages: [{ role: 'user', content: 'Describe the role' }],
  temperature: 0.7,
  maxTokens: 256,
  cache: { use: false },
  ...overrides,
});

describe('InferenceClient', () => {
  let config: InferenceClientConfig;
  let provider: ScriptedProvider;
  let metrics: RecordingMetrics;
  let client: InferenceClient;

  const createClient = (overrides: Partial<InferenceClientConfig> = {}, cache: CacheStore | null = null): InferenceClient =>
    new InferenceClient({ ...config, ...overrides }, { provider, metrics, cache });

  beforeEach(async () => {
    config = {
      model: PRIMARY,
      fallbackModel: FALLBACK,
      temperature: 0.7,
      maxTokens: 1024,
      timeoutMs: 60_000,
      retry: { maxAttempts: 4, initialDelayMs: 1000, maxDelayMs: 4000, backoffMultiplier: 2 },
    };
    provider = new ScriptedProvider('generated text');
    metrics = new RecordingMetrics();
    client = createClient();
    await client.initialize();
  });

  describe('lifecycle', () => {
    it('should reject requests before initialization', async () => {
      const fresh = createClient();

      await expect(fresh.generate(request())).rejects.toBeInstanceOf(NotInitializedError);
      expect(provider.requests).toHaveLength(0);
    });

    it('should initialize and shut down the provider', async () => {
      expect(provider.initialized).toBe(true);

      await client.shutdown();

      expect(provider.initialized).toBe(false);
    });
  });

  describe('generate', () => {
    it('should return the primary model completion', async () => {
      const result = await client.generate(request({ system: 'Be concise', module: 'analyzer', jobId: 'job-7' }));

      expect(result).toMatchObject({
        content: 'generated text',
        model: PRIMARY,
        usage: FAKE_USAGE,
        cached: false,
        retryCount: 0,
        fallbackUsed: false,
      });
      expect(result.requestId).toMatch(/^[0-9a-f-]{36}$/);
      expect(provider.requests[0]).toEqual({
        model: PRIMARY,
        messages: [{ role: 'user', content: 'Describe the role' }],
        system: 'Be concise',
        temperature: 0.7,
        maxTokens: 256,
        responseFormat: 'text',
        timeoutMs: 60_000,
      });
    });

    it('should record one metrics entry for a successful call', async () => {
      await client.generate(request({ module: 'analyzer', jobId: 'job-7' }));

      expect(metrics.inputs).toHaveLength(1);
      expect(metrics.inputs[0]).toMatchObject({
        model: PRIMARY,
        module: 'analyzer',
        jobId: 'job-7',
        promptTokens: 12,
        completionTokens: 34,
        success: true,
        errorType: null,
        retryCount: 0,
        fallbackUsed: false,
      });
    });

    it('should reject invalid requests without calling the provider', async () => {
      const error = await client.generate(request({ temperature: 1.5 })).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TerminalProviderError);
      expect(error).toMatchObject({
        reason: 'bad_request',
        message: "Validation error on field 'temperature': Temperature must be at most 1",
      });
      expect(provider.requests).toHaveLength(0);
    });

    it('should reject an empty message list', async () => {
      await expect(client.generate(request({ messages: [] }))).rejects.toThrow(
        "Validation error on field 'messages': At least one message is required"
      );
    });

    it('should not retry terminal provider errors', async () => {
      provider.script(PRIMARY, new TerminalProviderError('auth', 'Provider returned HTTP 401', 401));

      await expect(client.generate(request())).rejects.toMatchObject({
        code: 'TerminalProviderError',
        reason: 'auth',
      });
      expect(provider.requests).toHaveLength(1);
      expect(metrics.inputs.map((input) => input.errorType)).toEqual(['auth']);
    });

    it('should switch to the fallback at once when the primary model is missing', async () => {
      provider.script(PRIMARY, new TerminalProviderError('model_not_found', 'model not found', 404));

      const result = await client.generate(request());

      expect(result.model).toBe(FALLBACK);
      expect(result.fallbackUsed).toBe(true);
      expect(provider.callsFor(PRIMARY)).toBe(1);
    });

    it('should keep working when metrics recording fails', async () => {
      metrics.failWith = new Error('disk full');

      const result = await client.generate(request());

      expect(result.content).toBe('generated text');
    });
  });

  describe('retries and fallback', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('should retry transient failures with 1s and 2s backoff', async () => {
      provider.script(PRIMARY, serverError(), serverError());
      const failed = vi.fn();
      client.on('attempt:failed', failed);

      const promise = client.generate(request());
      await vi.advanceTimersByTimeAsync(999);
      expect(provider.requests).toHaveLength(1);
      await vi.advanceTimersByTimeAsync(2001);
      const result = await promise;

      expect(result.retryCount).toBe(2);
      expect(result.fallbackUsed).toBe(false);
      expect(provider.requests).toHaveLength(3);
      expect(failed).toHaveBeenCalledTimes(2);
      expect(failed.mock.calls[0][0]).toMatchObject({ model: PRIMARY, attempt: 0, willRetry: true });
    });

    it('should record one metrics entry per attempt', async () => {
      provider.script(PRIMARY, serverError(), serverError());

      const promise = client.generate(request());
      await vi.runAllTimersAsync();
      await promise;

      expect(
        metrics.inputs.map((input) => [input.success, input.errorType, input.retryCount, input.fallbackUsed])
      ).toEqual([
        [false, 'server_error', 0, false],
        [false, 'server_error', 1, false],
        [true, null, 2, false],
      ]);
    });

    it('should give the fallback the last attempt of the budget', async () => {
      provider.script(PRIMARY, serverError(), serverError(), serverError());
      const engaged = vi.fn();
      client.on('fallback:engaged', engaged);

      const promise = client.generate(request());
      await vi.runAllTimersAsync();
      const result = await promise;

      expect(result).toMatchObject({ model: FALLBACK, fallbackUsed: true, retryCount: 3 });
      expect(provider.callsFor(PRIMARY)).toBe(3);
      expect(provider.callsFor(FALLBACK)).toBe(1);
      expect(engaged).toHaveBeenCalledWith(
        expect.objectContaining({ primaryModel: PRIMARY, fallbackModel: FALLBACK, reason: 'server_error' })
      );
      expect(metrics.inputs).toHaveLength(4);
      expect(metrics.inputs[3]).toMatchObject({ model: FALLBACK, success: true, retryCount: 3, fallbackUsed: true });
      expect(client.getStats().fallbacksEngaged).toBe(1);
    });

    it('should not carry the fallback model over to the next request', async () => {
      provider.script(PRIMARY, serverError(), serverError(), serverError());

      const first = client.generate(request());
      await vi.runAllTimersAsync();
      expect((await first).fallbackUsed).toBe(true);

      const second = await client.generate(request());

      expect(provider.requests.at(-1)?.model).toBe(PRIMARY);
      expect(second).toMatchObject({ model: PRIMARY, fallbackUsed: false, retryCount: 0 });
    });

    it('should raise RetryExhaustedError when there is no fallback', async () => {
      client = createClient({ fallbackModel: null });
      await client.initialize();
      provider.script(PRIMARY, serverError(), serverError(), serverError(), serverError());

      const promise = client.generate(request());
      const expectation = expect(promise).rejects.toBeInstanceOf(RetryExhaustedError);
      await vi.runAllTimersAsync();
      await expectation;

      const error = await promise.catch((e: unknown) => e);
      expect(error).toMatchObject({
        attempts: 4,
        message: 'Inference failed after 4 attempts: Provider returned HTTP 503',
        details: { models: [PRIMARY] },
      });
      expect(metrics.inputs).toHaveLength(4);
      expect(client.getStats().failures).toBe(1);
    });

    it('should raise RetryExhaustedError when the fallback fails too', async () => {
      provider
        .script(PRIMARY, serverError(), serverError(), serverError())
        .script(FALLBACK, serverError());

      const promise = client.generate(request());
      const expectation = expect(promise).rejects.toMatchObject({
        code: 'RetryExhausted',
        attempts: 4,
        details: { models: [PRIMARY, FALLBACK] },
      });
      await vi.runAllTimersAsync();
      await expectation;

      expect(metrics.inputs).toHaveLength(4);
      expect(metrics.inputs.filter((input) => input.fallbackUsed)).toHaveLength(1);
    });

    it('should stop at max_attempts provider calls with the default configuration', async () => {
      const defaults = getInferenceClientConfig(defaultRuntimeConfig());
      client = createClient(defaults);
      await client.initialize();
      provider
        .script(defaults.model, serverError(), serverError(), serverError())
        .script('gemma2:2b', serverError(), serverError(), serverError());

      const promise = client.generate(request());
      const expectation = expect(promise).rejects.toBeInstanceOf(RetryExhaustedError);
      await vi.runAllTimersAsync();
      await expectation;

      expect(defaults.retry.maxAttempts).toBe(3);
      expect(provider.requests.map((sent) => sent.model)).toEqual(['qwen2.5:3b', 'qwen2.5:3b', 'gemma2:2b']);
      expect(metrics.inputs.map((input) => input.retryCount)).toEqual([0, 1, 2]);
    });

    it('should not fall back to the same model', async () => {
      client = createClient({ fallbackModel: PRIMARY, retry: { ...config.retry, maxAttempts: 2 } });
      await client.initialize();
      provider.script(PRIMARY, serverError(), serverError());

      const promise = client.generate(request());
      const expectation = expect(promise).rejects.toBeInstanceOf(RetryExhaustedError);
      await vi.runAllTimersAsync();
      await expectation;

      expect(provider.requests).toHaveLength(2);
    });
  });

  describe('cache', () => {
    let cacheRoot: string;
    let cache: CacheStore;

    beforeEach(async () => {
      cacheRoot = await fs.mkdtemp(path.join(tmpdir(), 'inference-client-cache-'));
      cache = new CacheStore({
        cacheDir: cacheRoot,
        maxMemoryEntries: 10,
        defaultTtlMs: 60_000,
        cleanupIntervalMs: 0,
      });
      await cache.initialize();
      client = createClient({}, cache);
      await client.initialize();
    });

    afterEach(async () => {
      await cache.shutdown();
      await fs.rm(cacheRoot, { recursive: true, force: true });
    });

    it('should answer a repeated request from the cache', async () => {
      const hits = vi.fn();
      client.on('cache:hit', hits);

      const first = await client.generate(request({ cache: { use: true } }));
      const second = await client.generate(request({ cache: { use: true } }));

      expect(first.cached).toBe(false);
      expect(second).toMatchObject({
        content: 'generated text',
        model: PRIMARY,
        usage: FAKE_USAGE,
        cached: true,
        retryCount: 0,
        fallbackUsed: false,
      });
      expect(provider.requests).toHaveLength(1);
      expect(metrics.inputs).toHaveLength(1);
      expect(hits).toHaveBeenCalledTimes(1);
      expect(client.getStats()).toMatchObject({ totalRequests: 2, cacheHits: 1, providerCalls: 1 });
    });

    it('should bypass the cache when asked to', async () => {
      await client.generate(request({ cache: { use: true } }));
      await client.generate(request({ cache: { use: false } }));

      expect(provider.requests).toHaveLength(2);
    });

    it('should key the cache on request parameters', async () => {
      await client.generate(request({ cache: { use: true } }));
      await client.generate(request({ cache: { use: true }, temperature: 0.2 }));

      expect(provider.requests).toHaveLength(2);
    });

    it('should use the cache by default for generateText', async () => {
      await client.generateText('Hello');
      const second = await client.generateText('Hello');

      expect(second.cached).toBe(true);
      expect(provider.requests).toHaveLength(1);
    });

    it('should report fallback use on a cache hit', async () => {
      provider.script(PRIMARY, new TerminalProviderError('model_not_found', 'model not found', 404));

      const first = await client.generate(request({ cache: { use: true } }));
      const second = await client.generate(request({ cache: { use: true } }));

      expect(first.fallbackUsed).toBe(true);
      expect(second).toMatchObject({ cached: true, model: FALLBACK, fallbackUsed: true });
      expect(provider.requests).toHaveLength(2);
    });

    it('should not cache failed calls', async () => {
      provider.script(PRIMARY, new TerminalProviderError('bad_request', 'rejected', 400));

      await expect(client.generate(request({ cache: { use: true } }))).rejects.toThrow('rejected');
      const result = await client.generate(request({ cache: { use: true } }));

      expect(result.cached).toBe(false);
    });
  });

  describe('generateText', () => {
    it('should apply configured defaults', async () => {
      await client.generateText('Hello', { useCache: false, module: 'rinser' });

      expect(provider.requests[0]).toMatchObject({
        messages: [{ role: 'user', content: 'Hello' }],
        temperature: 0.7,
        maxTokens: 1024,
        responseFormat: 'text',
      });
      expect(metrics.inputs[0].module).toBe('rinser');
    });
  });

  describe('generateStructured', () => {
    it('should request JSON at a low temperature', async () => {
      provider.script(PRIMARY, '{"title":"Engineer"}');

      const value = await client.generateStructured('Extract', { system: 'You extract fields', useCache: false });

      expect(value).toEqual({ title: 'Engineer' });
      expect(provider.requests[0]).toMatchObject({
        system: `You extract fields\n\n${JSON_ONLY_INSTRUCTION}`,
        temperature: STRUCTURED_TEMPERATURE,
        responseFormat: 'json',
      });
    });

    it('should strip a markdown code fence', async () => {
      provider.script(PRIMARY, '```json\n{"skills":["ts","sql"]}\n```');

      const value = await client.generateStructured('Extract', { useCache: false });

      expect(value).toEqual({ skills: ['ts', 'sql'] });
      expect(provider.requests[0].system).toBe(JSON_ONLY_INSTRUCTION);
    });

    it('should validate against a schema', async () => {
      provider.script(PRIMARY, '{"score": 7}');
      const schema = z.object({ score: z.number().int() });

      const value = await client.generateStructured('Rate', { schema, useCache: false });

      expect(value.score).toBe(7);
    });

    it('should raise ResponseParseError for non-JSON replies without retrying', async () => {
      provider.script(PRIMARY, 'Sure! Here is the data you asked for.');

      const error = await client.generateStructured('Extract', { useCache: false }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ResponseParseError);
      expect(error).toMatchObject({
        code: 'ResponseParseError',
        excerpt: 'Sure! Here is the data you asked for.',
      });
      expect(provider.requests).toHaveLength(1);
    });

    it('should raise ResponseParseError when the schema does not match', async () => {
      provider.script(PRIMARY, '{"score": "high"}');
      const schema = z.object({ score: z.number() });

      await expect(client.generateStructured('Rate', { schema, useCache: false })).rejects.toThrow(
        'Response did not match schema: score Expected number, received string'
      );
    });
  });

  describe('stripCodeFence', () => {
    it('should leave plain content untouched', () => {
      expect(stripCodeFence('  {"a":1}  ')).toBe('{"a":1}');
    });

    it('should remove fences with or without a language tag', () => {
      expect(stripCodeFence('```\n[1,2]\n```')).toBe('[1,2]');
      expect(stripCodeFence('```json\n{"a":1}\n```')).toBe('{"a":1}');
    });
  });

  describe('healthCheck', () => {
    it('should combine provider health and stats', async () => {
      await client.generate(request());

      const health = await client.healthCheck();

      expect(health.provider.status).toBe('healthy');
      expect(health.stats.totalRequests).toBe(1);
    });
  });
});
