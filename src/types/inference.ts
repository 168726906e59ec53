/**
 * Inference Types
 *
 * Request and result shapes for the inference client and its providers.
 */

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export type ResponseFormat = 'text' | 'json';

/**
 * Cache policy attached to a single request.
 */
export interface CachePolicy {
  use: boolean;
  ttlMs?: number;
}

export interface InferenceRequest {
  messages: ChatMessage[];
  system?: string;
  /** 0.0 - 1.0 */
  temperature: number;
  /** 1 - 4096 */
  maxTokens: number;
  /** Caller module, recorded on every metrics entry */
  module?: string;
  /** Free-form label used in logs */
  purpose?: string;
  jobId?: string;
  responseFormat?: ResponseFormat;
  cache: CachePolicy;
  /** Overrides the client-wide provider timeout */
  timeoutMs?: number;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface InferenceResult {
  requestId: string;
  content: string;
  usage: TokenUsage;
  latencyMs: number;
  model: string;
  cached: boolean;
  /** Zero-based index of the attempt that succeeded */
  retryCount: number;
  fallbackUsed: boolean;
}

/**
 * Convenience options for prompt-style calls.
 */
export interface GenerateTextOptions {
  system?: string;
  temperature?: number;
  maxTokens?: number;
  module?: string;
  purpose?: string;
  jobId?: string;
  useCache?: boolean;
  cacheTtlMs?: number;
  timeoutMs?: number;
}

/**
 * Request as handed to a provider: the model is resolved per attempt.
 */
export interface ProviderRequest {
  model: string;
  messages: ChatMessage[];
  system?: string;
  temperature: number;
  maxTokens: number;
  responseFormat: ResponseFormat;
  timeoutMs: number;
}

export interface ProviderCompletion {
  content: string;
  model: string;
  usage: TokenUsage;
}

export type ProviderHealthStatus = 'healthy' | 'degraded' | 'unavailable';

export interface ProviderHealth {
  status: ProviderHealthStatus;
  provider: string;
  model?: string;
  fallbackModel?: string | null;
  details: Record<string, unknown>;
}

export interface InferenceClientConfig {
  model: string;
  fallbackModel: string | null;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
  retry: {
    /** Provider calls per request, fallback included */
    maxAttempts: number;
    initialDelayMs: number;
    maxDelayMs: number;
    backoffMultiplier: number;
  };
}

export interface InferenceClientStats {
  totalRequests: number;
  cacheHits: number;
  providerCalls: number;
  failures: number;
  fallbacksEngaged: number;
  lastError: string | null;
  lastRequestAt: string | null;
}

export interface InferenceClientHealth {
  provider: ProviderHealth;
  stats: InferenceClientStats;
}
