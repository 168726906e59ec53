/**
 * Ollama Provider
 *
 * Talks to a local Ollama server over its HTTP chat API:
 * - `POST /api/chat` (non-streaming) for completions
 * - `GET /api/tags` for installed models
 *
 * Response bodies are parsed with zod into a tagged ChatOutcome before use.
 */

import type { Logger } from 'pino';
import type {
  ProviderCompletion,
  ProviderHealth,
  ProviderRequest,
} from '../types/inference.js';
import {
  ChatOutcomeSchema,
  ModelTagsSchema,
  type ChatOutcome,
} from '../types/schemas/provider.js';
import {
  ProviderInitializationError,
  TerminalProviderError,
  TransientProviderError,
  classifyHttpStatus,
  describeError,
} from '../api/errors.js';
import type { InferenceProvider } from './provider.js';

export interface OllamaProviderConfig {
  host: string;
  model: string;
  fallbackModel: string | null;
  /** Check that the primary model is installed during initialize() */
  verifyModelOnStart: boolean;
  /** Timeout for health and model-list calls */
  probeTimeoutMs?: number;
}

const DEFAULT_PROBE_TIMEOUT_MS = 5_000;

type FetchFn = typeof fetch;

export class OllamaProvider implements InferenceProvider {
  public readonly name = 'ollama';

  private readonly config: OllamaProviderConfig;
  private readonly baseUrl: string;
  private readonly logger?: Logger;
  private readonly fetchFn: FetchFn;

  constructor(config: OllamaProviderConfig, options: { logger?: Logger; fetch?: FetchFn } = {}) {
    this.config = config;
    this.baseUrl = config.host.replace(/\/+$/, '');
    this.logger = options.logger;
    this.fetchFn = options.fetch ?? fetch;
  }

  /**
   * Confirm the server is reachable and, if configured, that the primary
   * model is installed.
   */
  public async initialize(): Promise<void> {
    if (!this.config.verifyModelOnStart) {
      return;
    }

    let models: string[];
    try {
      models = await this.listModels();
    } catch (error) {
      throw new ProviderInitializationError(
        `Cannot reach Ollama at ${this.baseUrl}: ${describeError(error)}`,
        { host: this.baseUrl }
      );
    }

    if (!this.hasModel(models, this.config.model)) {
      throw new ProviderInitializationError(
        `Model ${this.config.model} is not installed (run: ollama pull ${this.config.model})`,
        { model: this.config.model, available: models }
      );
    }

    if (this.config.fallbackModel && !this.hasModel(models, this.config.fallbackModel)) {
      this.logger?.warn({ fallbackModel: this.config.fallbackModel }, 'Fallback model is not installed');
    }

    this.logger?.info({ host: this.baseUrl, model: this.config.model }, 'Ollama provider initialized');
  }

  public async shutdown(): Promise<void> {
    this.logger?.debug('Ollama provider shut down');
  }

  public async generate(request: ProviderRequest): Promise<ProviderCompletion> {
    const messages = request.system
      ? [{ role: 'system', content: request.system }, ...request.messages]
      : request.messages;

    const body: Record<string, unknown> = {
      model: request.model,
      messages,
      stream: false,
      options: {
        temperature: request.temperature,
        num_predict: request.maxTokens,
      },
    };
    if (request.responseFormat === 'json') {
      body.format = 'json';
    }

    const response = await this.request('/api/chat', {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(body),
    }, request.timeoutMs);

    const outcome = await this.readOutcome(response);
    if (outcome.kind === 'error') {
      if (/not found/i.test(outcome.message)) {
        throw new TerminalProviderError('model_not_found', outcome.message, response.status, { model: request.model });
      }
      throw new TransientProviderError('server_error', outcome.message, response.status);
    }

    const inputTokens = outcome.body.prompt_eval_count ?? 0;
    const outputTokens = outcome.body.eval_count ?? 0;
    return {
      content: outcome.body.message.content,
      model: outcome.body.model || request.model,
      usage: {
        inputTokens,
        outputTokens,
        totalTokens: inputTokens + outputTokens,
      },
    };
  }

  public async healthCheck(): Promise<ProviderHealth> {
    try {
      const models = await this.listModels();
      const modelAvailable = this.hasModel(models, this.config.model);
      return {
        status: modelAvailable ? 'healthy' : 'degraded',
        provider: this.name,
        model: this.config.model,
        fallbackModel: this.config.fallbackModel,
        details: {
          host: this.baseUrl,
          modelAvailable,
          availableModels: models,
        },
      };
    } catch (error) {
      return {
        status: 'unavailable',
        provider: this.name,
        model: this.config.model,
        fallbackModel: this.config.fallbackModel,
        details: { host: this.baseUrl, error: describeError(error) },
      };
    }
  }

  /**
   * Names of installed models.
   */
  public async listModels(): Promise<string[]> {
    const response = await this.request('/api/tags', { method: 'GET' }, this.config.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS);
    const parsed = ModelTagsSchema.safeParse(await this.readJson(response));
    if (!parsed.success) {
      throw new TerminalProviderError('invalid_response', 'Unexpected /api/tags response shape', response.status);
    }
    return parsed.data.models.map((model) => model.name);
  }

  private hasModel(models: readonly string[], name: string): boolean {
    const bare = name.includes(':') ? name : `${name}:latest`;
    return models.some((model) => model === name || model === bare);
  }

  /**
   * fetch with a timeout. Network failures and timeouts become transient
   * errors; non-2xx statuses are classified by code.
   */
  private async request(path: string, init: RequestInit, timeoutMs: number): Promise<Response> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    let response: Response;
    try {
      response = await this.fetchFn(`${this.baseUrl}${path}`, { ...init, signal: controller.signal });
    } catch (error) {
      if (controller.signal.aborted) {
        throw new TransientProviderError('timeout', `Request to ${path} timed out after ${timeoutMs}ms`, undefined, { cause: error });
      }
      throw new TransientProviderError('connection', `Request to ${path} failed: ${describeError(error)}`, undefined, { cause: error });
    } finally {
      clearTimeout(timer);
    }

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw classifyHttpStatus(response.status, text);
    }

    return response;
  }

  private async readJson(response: Response): Promise<unknown> {
    try {
      return await response.json();
    } catch (error) {
      throw new TransientProviderError('server_error', `Malformed JSON from provider: ${describeError(error)}`, response.status);
    }
  }

  private async readOutcome(response: Response): Promise<ChatOutcome> {
    const parsed = ChatOutcomeSchema.safeParse(await this.readJson(response));
    if (!parsed.success) {
      throw new TerminalProviderError('invalid_response', 'Unexpected /api/chat response shape', response.status);
    }
    return parsed.data;
  }
}
