/**
 * Inference request schema
 */

import { z } from 'zod';
import { NonEmptyString, PositiveInteger } from './common.js';

export const ChatMessageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant']),
  content: z.string(),
});

export const InferenceRequestSchema = z.object({
  messages: z.array(ChatMessageSchema).min(1, 'At least one message is required'),
  system: z.string().optional(),
  temperature: z
    .number()
    .min(0, 'Temperature must be at least 0')
    .max(1, 'Temperature must be at most 1'),
  maxTokens: z
    .number()
    .int('Must be an integer')
    .min(1, 'maxTokens must be at least 1')
    .max(4096, 'maxTokens must be at most 4096'),
  module: NonEmptyString.optional(),
  purpose: z.string().optional(),
  jobId: z.string().optional(),
  responseFormat: z.enum(['text', 'json']).optional(),
  cache: z.object({
    use: z.boolean(),
    ttlMs: PositiveInteger.optional(),
  }),
  timeoutMs: PositiveInteger.optional(),
});

/**
 * Shape of an `InferenceResult` stored in the response cache.
 */
export const CachedCompletionSchema = z.object({
  content: z.string(),
  model: NonEmptyString,
  usage: z.object({
    inputTokens: z.number().int().min(0),
    outputTokens: z.number().int().min(0),
    totalTokens: z.number().int().min(0),
  }),
  /** Produced by the fallback model; records written before this field count as primary */
  fallbackUsed: z.boolean().default(false),
});

export type CachedCompletion = z.infer<typeof CachedCompletionSchema>;
