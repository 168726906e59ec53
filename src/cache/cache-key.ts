/**
 * Cache key derivation
 *
 * Keys are SHA-256 digests of a canonical JSON rendering (object keys sorted
 * recursively, undefined dropped), so logically equal requests share a key
 * regardless of property order.
 */

import { createHash } from 'node:crypto';
import type { ChatMessage, ResponseFormat } from '../types/inference.js';

/**
 * Every request field that changes the response body.
 */
export interface CacheKeyFields {
  messages: readonly ChatMessage[];
  system?: string | null;
  temperature: number;
  maxTokens: number;
  model: string;
  responseFormat?: ResponseFormat;
}

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }

  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    const entries: Array<[string, unknown]> = Object.entries(value);
    entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [key, entry] of entries) {
      if (entry !== undefined) {
        sorted[key] = canonicalize(entry);
      }
    }
    return sorted;
  }

  return value;
}

/**
 * Stable JSON string for any value.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(canonicalize(value)) ?? 'null';
}

/**
 * Hash arbitrary parts into a cache key.
 */
export function generateKey(...parts: unknown[]): string {
  return createHash('sha256').update(canonicalJson(parts)).digest('hex');
}

/**
 * Derive the cache key for an inference request.
 */
export function deriveCacheKey(fields: CacheKeyFields): string {
  return generateKey({
    messages: fields.messages.map((message) => ({ role: message.role, content: message.content })),
    system: fields.system ?? null,
    temperature: fields.temperature,
    maxTokens: fields.maxTokens,
    model: fields.model,
    responseFormat: fields.responseFormat ?? 'text',
  });
}
