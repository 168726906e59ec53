/**
 * Provider wire schemas (Ollama-compatible chat API)
 *
 * Raw response bodies are parsed into a tagged `ChatOutcome` before the
 * provider looks at them.
 */

import { z } from 'zod';

const ChatCompletionBodySchema = z.object({
  model: z.string(),
  message: z.object({
    role: z.string(),
    content: z.string(),
  }),
  done: z.boolean().optional(),
  prompt_eval_count: z.number().int().min(0).optional(),
  eval_count: z.number().int().min(0).optional(),
  total_duration: z.number().optional(),
});

const ChatErrorBodySchema = z.object({
  error: z.string(),
});

export const ChatOutcomeSchema = z.union([
  ChatCompletionBodySchema.transform((body) => ({ kind: 'completion' as const, body })),
  ChatErrorBodySchema.transform((body) => ({ kind: 'error' as const, message: body.error })),
]);

export type ChatOutcome = z.infer<typeof ChatOutcomeSchema>;

export const ModelTagsSchema = z.object({
  models: z.array(
    z.object({
      name: z.string(),
      size: z.number().optional(),
      modified_at: z.string().optional(),
    })
  ),
});

export type ModelTags = z.infer<typeof ModelTagsSchema>;
