/**
 * Metrics Types
 *
 * Per-call inference metrics, system samples and the aggregates computed
 * over them.
 */

/**
 * One inference attempt. Entries are immutable once recorded.
 */
export interface MetricsEntry {
  readonly id: string;
  /** ISO-8601 */
  readonly timestamp: string;
  readonly model: string;
  readonly module: string | null;
  readonly jobId: string | null;
  readonly durationMs: number;
  readonly promptTokens: number;
  readonly completionTokens: number;
  readonly success: boolean;
  readonly errorType: string | null;
  readonly retryCount: number;
  readonly fallbackUsed: boolean;
  readonly cpuPercent: number | null;
  readonly memoryMb: number | null;
  readonly temperatureC: number | null;
}

/**
 * Input accepted by `MetricsStore.record()`.
 */
export interface MetricsInput {
  model: string;
  durationMs: number;
  promptTokens: number;
  completionTokens: number;
  success: boolean;
  module?: string | null;
  jobId?: string | null;
  errorType?: string | null;
  retryCount?: number;
  fallbackUsed?: boolean;
  timestamp?: Date;
}

export interface SystemMetricsPoint {
  timestamp: string;
  cpuPercent: number | null;
  memoryPercent: number | null;
  memoryMb: number | null;
  temperatureC: number | null;
}

export type PerformanceTrend = 'improving' | 'stable' | 'degrading';

export interface PerformanceStatus {
  callsToday: number;
  successRateToday: number;
  avgTokensPerSecond: number;
  avgDurationMs: number;
  primaryModelSuccessRate: number;
  fallbackUsageRate: number;
  currentCpuPercent: number | null;
  currentMemoryPercent: number | null;
  currentTemperatureC: number | null;
  throttlingWarning: boolean;
  performanceTrend: PerformanceTrend;
}

export interface ModelStats {
  modelName: string;
  totalCalls: number;
  successCount: number;
  successRate: number;
  totalTokens: number;
  totalDurationMs: number;
  avgDurationMs: number;
  avgTokensPerSecond: number;
  errorBreakdown: Record<string, number>;
}

export interface ModuleStats {
  moduleName: string;
  totalCalls: number;
  successCount: number;
  successRate: number;
  totalDurationMs: number;
  avgDurationMs: number;
  avgTokensPerSecond: number;
}

export interface PerformanceSummary {
  periodStart: string;
  periodEnd: string;
  totalCalls: number;
  totalTokens: number;
  successfulCalls: number;
  successRate: number;
  avgTokensPerSecond: number;
  medianDurationMs: number;
  p95DurationMs: number;
  errorBreakdown: Record<string, number>;
  fallbackRate: number;
  modelStats: Record<string, ModelStats>;
  moduleStats: Record<string, ModuleStats>;
  avgCpuPercent: number | null;
  avgMemoryMb: number | null;
  avgTemperatureC: number | null;
}

export interface SummaryRange {
  start?: Date;
  end?: Date;
}

export interface MetricsStoreConfig {
  dataDir: string;
  retentionDays: number;
  /** Interval of the background archival pass, 0 disables it */
  archiveIntervalMs: number;
  sampler: SystemSamplerConfig;
}

export interface SystemSamplerConfig {
  enabled: boolean;
  intervalMs: number;
  /** Points older than this are pruned from the window */
  maxAgeMs: number;
  /** Persist after this many collected samples */
  persistEvery: number;
}

export interface ArchiveResult {
  archived: number;
  shards: string[];
}

/**
 * Write side of the metrics store, as seen by the inference client.
 */
export interface MetricsRecorder {
  record(input: MetricsInput): Promise<MetricsEntry>;
}
