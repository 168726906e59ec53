/**
 * Metrics statistics
 *
 * Pure aggregation over MetricsEntry lists. Durations and throughput
 * averages consider successful calls only; rates are percentages (0-100).
 */

import type {
  MetricsEntry,
  ModelStats,
  ModuleStats,
  PerformanceSummary,
  PerformanceTrend,
} from '../types/metrics.js';
import {
  averageOrNull,
  median,
  percentage,
  percentile,
  safeAverage,
  safeDivide,
} from '../utils/math-helpers.js';

const HOUR_MS = 60 * 60 * 1000;

/** Relative throughput change that flips the trend */
export const TREND_THRESHOLD = 0.1;

export const UNKNOWN_MODULE = 'unknown';

/**
 * Output tokens per second, 0 for a zero duration.
 */
export function tokensPerSecond(entry: Pick<MetricsEntry, 'completionTokens' | 'durationMs'>): number {
  return entry.durationMs > 0 ? entry.completionTokens / (entry.durationMs / 1000) : 0;
}

export function totalTokens(entry: Pick<MetricsEntry, 'promptTokens' | 'completionTokens'>): number {
  return entry.promptTokens + entry.completionTokens;
}

/**
 * Average tokens/s over successful entries with a positive duration.
 */
export function averageThroughput(entries: readonly MetricsEntry[]): number {
  return safeAverage(
    entries.filter((entry) => entry.success && entry.durationMs > 0).map(tokensPerSecond)
  );
}

export function errorBreakdown(entries: readonly MetricsEntry[]): Record<string, number> {
  const breakdown: Record<string, number> = {};
  for (const entry of entries) {
    if (!entry.success && entry.errorType) {
      breakdown[entry.errorType] = (breakdown[entry.errorType] ?? 0) + 1;
    }
  }
  return breakdown;
}

function groupBy(entries: readonly MetricsEntry[], keyOf: (entry: MetricsEntry) => string): Map<string, MetricsEntry[]> {
  const groups = new Map<string, MetricsEntry[]>();
  for (const entry of entries) {
    const key = keyOf(entry);
    const group = groups.get(key);
    if (group) {
      group.push(entry);
    } else {
      groups.set(key, [entry]);
    }
  }
  return groups;
}

export function modelStats(entries: readonly MetricsEntry[]): Record<string, ModelStats> {
  const stats: Record<string, ModelStats> = {};
  for (const [modelName, group] of groupBy(entries, (entry) => entry.model)) {
    const successful = group.filter((entry) => entry.success);
    const totalDurationMs = successful.reduce((sum, entry) => sum + entry.durationMs, 0);
    stats[modelName] = {
      modelName,
      totalCalls: group.length,
      successCount: successful.length,
      successRate: percentage(successful.length, group.length),
      totalTokens: group.reduce((sum, entry) => sum + totalTokens(entry), 0),
      totalDurationMs,
      avgDurationMs: safeDivide(totalDurationMs, successful.length),
      avgTokensPerSecond: averageThroughput(group),
      errorBreakdown: errorBreakdown(group),
    };
  }
  return stats;
}

export function moduleStats(entries: readonly MetricsEntry[]): Record<string, ModuleStats> {
  const stats: Record<string, ModuleStats> = {};
  for (const [moduleName, group] of groupBy(entries, (entry) => entry.module ?? UNKNOWN_MODULE)) {
    const successful = group.filter((entry) => entry.success);
    const totalDurationMs = successful.reduce((sum, entry) => sum + entry.durationMs, 0);
    stats[moduleName] = {
      moduleName,
      totalCalls: group.length,
      successCount: successful.length,
      successRate: percentage(successful.length, group.length),
      totalDurationMs,
      avgDurationMs: safeDivide(totalDurationMs, successful.length),
      avgTokensPerSecond: averageThroughput(group),
    };
  }
  return stats;
}

/**
 * Compare the last hour's average throughput with the hour before it.
 * Either hour without successful calls yields `stable`.
 */
export function performanceTrend(entries: readonly MetricsEntry[], now: number): PerformanceTrend {
  const oneHourAgo = now - HOUR_MS;
  const twoHoursAgo = now - 2 * HOUR_MS;

  const lastHour: MetricsEntry[] = [];
  const previousHour: MetricsEntry[] = [];
  for (const entry of entries) {
    if (!entry.success || entry.durationMs <= 0) {
      continue;
    }
    const at = Date.parse(entry.timestamp);
    if (at >= oneHourAgo && at <= now) {
      lastHour.push(entry);
    } else if (at >= twoHoursAgo && at < oneHourAgo) {
      previousHour.push(entry);
    }
  }

  if (lastHour.length === 0 || previousHour.length === 0) {
    return 'stable';
  }

  const previous = averageThroughput(previousHour);
  if (previous === 0) {
    return 'stable';
  }

  const change = (averageThroughput(lastHour) - previous) / previous;
  if (change >= TREND_THRESHOLD) {
    return 'improving';
  }
  if (change <= -TREND_THRESHOLD) {
    return 'degrading';
  }
  return 'stable';
}

/**
 * Today's call-level numbers (everything but the live system snapshot).
 */
export function dailyStatus(entries: readonly MetricsEntry[]): {
  callsToday: number;
  successRateToday: number;
  avgTokensPerSecond: number;
  avgDurationMs: number;
  primaryModelSuccessRate: number;
  fallbackUsageRate: number;
} {
  const successful = entries.filter((entry) => entry.success);
  const primary = entries.filter((entry) => !entry.fallbackUsed);
  const primarySuccessful = primary.filter((entry) => entry.success);

  return {
    callsToday: entries.length,
    successRateToday: percentage(successful.length, entries.length),
    avgTokensPerSecond: averageThroughput(entries),
    avgDurationMs: safeAverage(successful.map((entry) => entry.durationMs)),
    primaryModelSuccessRate: percentage(primarySuccessful.length, primary.length),
    fallbackUsageRate: percentage(entries.length - primary.length, entries.length),
  };
}

export function summarize(
  entries: readonly MetricsEntry[],
  periodStart: Date,
  periodEnd: Date
): PerformanceSummary {
  const successful = entries.filter((entry) => entry.success);
  const durations = successful.map((entry) => entry.durationMs);

  return {
    periodStart: periodStart.toISOString(),
    periodEnd: periodEnd.toISOString(),
    totalCalls: entries.length,
    totalTokens: entries.reduce((sum, entry) => sum + totalTokens(entry), 0),
    successfulCalls: successful.length,
    successRate: percentage(successful.length, entries.length),
    avgTokensPerSecond: averageThroughput(entries),
    medianDurationMs: median(durations),
    p95DurationMs: percentile(durations, 0.95),
    errorBreakdown: errorBreakdown(entries),
    fallbackRate: percentage(entries.filter((entry) => entry.fallbackUsed).length, entries.length),
    modelStats: modelStats(entries),
    moduleStats: moduleStats(entries),
    avgCpuPercent: averageOrNull(entries.map((entry) => entry.cpuPercent)),
    avgMemoryMb: averageOrNull(entries.map((entry) => entry.memoryMb)),
    avgTemperatureC: averageOrNull(entries.map((entry) => entry.temperatureC)),
  };
}
