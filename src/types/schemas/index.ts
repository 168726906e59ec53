/**
 * Zod schema exports
 *
 * Runtime validation for configuration, persisted cache and metrics files,
 * inference requests and provider responses.
 *
 * @example
 * ```typescript
 * const result = InferenceRequestSchema.safeParse(request);
 * if (!result.success) {
 *   throw zodErrorToInferenceError(result.error);
 * }
 * ```
 */

export * from './common.js';
export * from './config.js';
export * from './cache.js';
export * from './metrics.js';
export * from './inference.js';
export * from './provider.js';
