/**
 * Common Zod schema primitives
 */

import { z } from 'zod';
import type { JsonValue } from '../cache.js';

/**
 * Non-empty string validator
 */
export const NonEmptyString = z.string().min(1, 'Cannot be empty');

/**
 * Positive integer validator
 */
export const PositiveInteger = z
  .number()
  .int('Must be an integer')
  .positive('Must be a positive integer');

/**
 * Non-negative integer validator
 */
export const NonNegativeInteger = z
  .number()
  .int('Must be an integer')
  .min(0, 'Must be non-negative');

/**
 * Non-negative number validator
 */
export const NonNegativeNumber = z.number().min(0, 'Must be non-negative');

/**
 * ISO-8601 timestamp string
 */
export const IsoTimestamp = z.string().datetime({ offset: true });

/**
 * Any JSON value (recursive)
 */
export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);
