/**
 * Metrics persistence schemas
 *
 * Validate monthly shard files and the system-metrics window on load.
 */

import { z } from 'zod';
import { IsoTimestamp, NonEmptyString, NonNegativeInteger, NonNegativeNumber } from './common.js';

export const MetricsEntrySchema = z.object({
  id: NonEmptyString,
  timestamp: IsoTimestamp,
  model: NonEmptyString,
  module: z.string().nullable(),
  jobId: z.string().nullable(),
  durationMs: NonNegativeNumber,
  promptTokens: NonNegativeInteger,
  completionTokens: NonNegativeInteger,
  success: z.boolean(),
  errorType: z.string().nullable(),
  retryCount: NonNegativeInteger,
  fallbackUsed: z.boolean(),
  cpuPercent: z.number().nullable(),
  memoryMb: z.number().nullable(),
  temperatureC: z.number().nullable(),
});

export const MetricsShardSchema = z.object({
  /** `YYYY_MM` */
  period: z.string().regex(/^\d{4}_\d{2}$/, 'Must be YYYY_MM'),
  updatedAt: IsoTimestamp,
  entries: z.array(MetricsEntrySchema),
});

export const SystemMetricsPointSchema = z.object({
  timestamp: IsoTimestamp,
  cpuPercent: z.number().nullable(),
  memoryPercent: z.number().nullable(),
  memoryMb: z.number().nullable(),
  temperatureC: z.number().nullable(),
});

export const SystemMetricsFileSchema = z.object({
  updatedAt: IsoTimestamp,
  intervalMs: z.number().int().positive(),
  maxAgeMs: z.number().int().positive(),
  points: z.array(SystemMetricsPointSchema),
});

export const MetricsInputSchema = z.object({
  model: NonEmptyString,
  durationMs: NonNegativeNumber,
  promptTokens: NonNegativeInteger,
  completionTokens: NonNegativeInteger,
  success: z.boolean(),
  module: z.string().nullish(),
  jobId: z.string().nullish(),
  errorType: z.string().nullish(),
  retryCount: NonNegativeInteger.optional(),
  fallbackUsed: z.boolean().optional(),
  timestamp: z.date().optional(),
});

export type MetricsShard = z.infer<typeof MetricsShardSchema>;
export type SystemMetricsFile = z.infer<typeof SystemMetricsFileSchema>;
