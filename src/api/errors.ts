/**
 * Inference error utilities.
 *
 * Provides a consistent error type for every public surface and helpers to
 * convert lower-level failures (fetch, fs, zod) into InferenceError
 * instances that callers can reason about.
 */

import type { ZodError } from 'zod';

/**
 * Error codes surfaced to API consumers.
 */
export type InferenceErrorCode =
  | 'TransientProviderError'
  | 'TerminalProviderError'
  | 'RetryExhausted'
  | 'ResponseParseError'
  | 'CacheIOError'
  | 'MetricsPersistenceError'
  | 'MetricsInitializationError'
  | 'StepExecutionError'
  | 'ProviderInitializationError'
  | 'NotInitialized'
  | 'ConfigValidationError'
  | 'ValidationError'
  | 'UnknownError';

/**
 * Plain error shape (for JSON responses and logs).
 */
export interface InferenceErrorShape {
  code: InferenceErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Base error for everything this package throws.
 */
export class InferenceError extends Error implements InferenceErrorShape {
  public readonly code: InferenceErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: InferenceErrorCode,
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'InferenceError';
    this.code = code;
    this.details = details;
  }

  /**
   * Serialize error into plain shape.
   */
  public toObject(): InferenceErrorShape {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

export type TransientReason = 'timeout' | 'server_error' | 'rate_limit' | 'connection';

export type TerminalReason = 'bad_request' | 'auth' | 'model_not_found' | 'invalid_response';

/**
 * Provider failure worth retrying: timeouts, 5xx, 429, dropped connections.
 */
export class TransientProviderError extends InferenceError {
  public readonly reason: TransientReason;
  public readonly status?: number;

  constructor(reason: TransientReason, message: string, status?: number, options?: { cause?: unknown }) {
    super('TransientProviderError', message, { reason, status }, options);
    this.name = 'TransientProviderError';
    this.reason = reason;
    this.status = status;
  }
}

/**
 * Provider failure that no retry will fix.
 */
export class TerminalProviderError extends InferenceError {
  public readonly reason: TerminalReason;
  public readonly status?: number;

  constructor(
    reason: TerminalReason,
    message: string,
    status?: number,
    details?: Record<string, unknown>
  ) {
    super('TerminalProviderError', message, { reason, status, ...details });
    this.name = 'TerminalProviderError';
    this.reason = reason;
    this.status = status;
  }
}

/**
 * Raised once every attempt (primary and fallback) has failed transiently.
 */
export class RetryExhaustedError extends InferenceError {
  public readonly attempts: number;
  public readonly lastError: InferenceError;

  constructor(attempts: number, lastError: InferenceError, models: string[]) {
    super(
      'RetryExhausted',
      `Inference failed after ${attempts} attempts: ${lastError.message}`,
      { attempts, models, lastError: lastError.toObject() },
      { cause: lastError }
    );
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

/**
 * Structured output could not be parsed or failed its schema.
 */
export class ResponseParseError extends InferenceError {
  public readonly excerpt: string;

  constructor(message: string, content: string, details?: Record<string, unknown>) {
    const excerpt = content.slice(0, 200);
    super('ResponseParseError', message, { excerpt, ...details });
    this.name = 'ResponseParseError';
    this.excerpt = excerpt;
  }
}

export class CacheIOError extends InferenceError {
  constructor(operation: string, key: string | null, cause: unknown) {
    super(
      'CacheIOError',
      `Cache ${operation} failed${key ? ` for ${key}` : ''}: ${describeError(cause)}`,
      { operation, key },
      { cause }
    );
    this.name = 'CacheIOError';
  }
}

export class MetricsPersistenceError extends InferenceError {
  constructor(path: string, cause: unknown) {
    super(
      'MetricsPersistenceError',
      `Failed to persist metrics to ${path}: ${describeError(cause)}`,
      { path },
      { cause }
    );
    this.name = 'MetricsPersistenceError';
  }
}

export class MetricsInitializationError extends InferenceError {
  constructor(dataDir: string, cause: unknown) {
    super(
      'MetricsInitializationError',
      `Failed to initialize metrics store at ${dataDir}: ${describeError(cause)}`,
      { dataDir },
      { cause }
    );
    this.name = 'MetricsInitializationError';
  }
}

/**
 * Wraps whatever a pipeline step threw.
 */
export class StepExecutionError extends InferenceError {
  public readonly stepName: string;

  constructor(stepName: string, cause: unknown) {
    super(
      'StepExecutionError',
      `${capitalize(stepName)} step failed: ${describeError(cause)}`,
      { step: stepName },
      { cause }
    );
    this.name = 'StepExecutionError';
    this.stepName = stepName;
  }
}

export class ProviderInitializationError extends InferenceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('ProviderInitializationError', message, details);
    this.name = 'ProviderInitializationError';
  }
}

export class NotInitializedError extends InferenceError {
  constructor(component: string) {
    super('NotInitialized', `${component} is not initialized`, { component });
    this.name = 'NotInitializedError';
  }
}

export class ConfigValidationError extends InferenceError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super('ConfigValidationError', `Configuration validation failed:\n${issues.join('\n')}`, { issues });
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

/**
 * Classify an HTTP status returned by a provider.
 *
 * 408, 425, 429 and 5xx are transient; 404 means the model is missing;
 * every other 4xx is terminal.
 */
export function classifyHttpStatus(
  status: number,
  body: string
): TransientProviderError | TerminalProviderError {
  const message = `Provider returned HTTP ${status}${body ? `: ${body.slice(0, 200)}` : ''}`;

  if (status === 429) {
    return new TransientProviderError('rate_limit', message, status);
  }
  if (status === 408 || status === 425) {
    return new TransientProviderError('timeout', message, status);
  }
  if (status >= 500) {
    return new TransientProviderError('server_error', message, status);
  }
  if (status === 401 || status === 403) {
    return new TerminalProviderError('auth', message, status);
  }
  if (status === 404) {
    return new TerminalProviderError('model_not_found', message, status);
  }
  return new TerminalProviderError('bad_request', message, status);
}

/**
 * Map unknown errors into InferenceError instances.
 *
 * @param error - Error thrown by a provider, the filesystem or caller code
 * @param fallbackCode - Code to use when we cannot infer a specific one
 */
export function toInferenceError(
  error: unknown,
  fallbackCode: InferenceErrorCode = 'UnknownError'
): InferenceError {
  if (error instanceof InferenceError) {
    return error;
  }

  if (error instanceof Error) {
    if (error.name === 'AbortError' || error.name === 'TimeoutError') {
      return new TransientProviderError('timeout', error.message || 'Request aborted', undefined, { cause: error });
    }

    if (/timeout|timed\s+out/i.test(error.message)) {
      return new TransientProviderError('timeout', error.message, undefined, { cause: error });
    }

    return new InferenceError(fallbackCode, error.message, undefined, { cause: error });
  }

  return new InferenceError(fallbackCode, `Unknown error: ${String(error)}`);
}

/**
 * Convert Zod validation error to a terminal bad_request error.
 *
 * @example
 * ```typescript
 * const result = InferenceRequestSchema.safeParse({ messages: [] });
 * if (!result.success) {
 *   throw zodErrorToInferenceError(result.error);
 * }
 * // Throws: "Validation error on field 'messages': At least one message is required"
 * ```
 */
export function zodErrorToInferenceError(error: ZodError): TerminalProviderError {
  const firstIssue = error.issues[0];
  const field = firstIssue && firstIssue.path.length > 0 ? firstIssue.path.join('.') : 'root';
  const message = `Validation error on field '${field}': ${firstIssue?.message ?? 'invalid input'}`;

  return new TerminalProviderError('bad_request', message, undefined, {
    field,
    issues: error.issues.map((issue) => ({
      path: issue.path,
      message: issue.message,
      code: issue.code,
    })),
  });
}

/**
 * `field message` lines for every zod issue.
 */
export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const field = issue.path.length > 0 ? issue.path.join('.') : 'root';
    return `${field} ${issue.message}`;
  });
}

/**
 * Human-readable text for any thrown value.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

function capitalize(value: string): string {
  return value.length > 0 ? value[0].toUpperCase() + value.slice(1) : value;
}
