/**
 * Cache record schema: validates `<key>.json` files read back from disk.
 */

import { z } from 'zod';
import { JsonValueSchema, NonEmptyString, NonNegativeInteger } from './common.js';

export const CacheRecordSchema = z.object({
  key: NonEmptyString,
  value: JsonValueSchema,
  createdAt: z.number().finite(),
  expiresAt: z.number().finite(),
  hitCount: NonNegativeInteger,
});

export type CacheRecordInput = z.infer<typeof CacheRecordSchema>;
