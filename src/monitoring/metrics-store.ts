/**
 * Metrics Store
 *
 * Records one entry per inference attempt into monthly JSON shards,
 * archives entries past the retention window, derives status and summary
 * statistics, and owns the background system sampler.
 *
 * Persistence failures are logged and emitted; they never fail `record()`.
 *
 * @module monitoring/metrics-store
 */

import { EventEmitter } from 'eventemitter3';
import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type {
  ArchiveResult,
  MetricsEntry,
  MetricsInput,
  MetricsRecorder,
  MetricsStoreConfig,
  ModelStats,
  PerformanceStatus,
  PerformanceSummary,
  SummaryRange,
  SystemMetricsPoint,
} from '../types/metrics.js';
import type { MetricsStoreEvents } from '../api/events.js';
import {
  InferenceError,
  MetricsInitializationError,
  MetricsPersistenceError,
  NotInitializedError,
  describeError,
  formatZodIssues,
} from '../api/errors.js';
import { MetricsInputSchema } from '../types/schemas/metrics.js';
import { MetricsShardFiles, periodBounds, periodOf } from './metrics-shards.js';
import {
  dailyStatus,
  modelStats,
  performanceTrend,
  summarize,
  tokensPerSecond,
} from './metrics-statistics.js';
import { SystemCollector, type SystemSnapshot } from './system-collector.js';
import { SystemMetricsSampler } from './system-sampler.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const MAX_HISTORY_MINUTES = 1440;

const EMPTY_SNAPSHOT: SystemSnapshot = { cpuPercent: null, memoryMb: null, temperatureC: null };

export interface MetricsStoreOptions {
  logger?: Logger;
  /** System readings attached to entries; null disables them and the sampler */
  collector?: SystemCollector | null;
  /** Clock, injectable for tests */
  now?: () => Date;
}

export class MetricsStore extends EventEmitter<MetricsStoreEvents> implements MetricsRecorder {
  private readonly config: MetricsStoreConfig;
  private readonly logger?: Logger;
  private readonly collector: SystemCollector | null;
  private readonly now: () => Date;
  private readonly shards: MetricsShardFiles;
  private readonly sampler: SystemMetricsSampler | null;

  private entries: MetricsEntry[] = [];
  private currentPeriod: string | null = null;
  private initialized = false;
  private archiveTimer: NodeJS.Timeout | null = null;

  constructor(config: MetricsStoreConfig, options: MetricsStoreOptions = {}) {
    super();
    this.config = config;
    this.logger = options.logger;
    this.collector = options.collector === undefined
      ? new SystemCollector({ logger: options.logger })
      : options.collector;
    this.now = options.now ?? (() => new Date());
    this.shards = new MetricsShardFiles(config.dataDir, options.logger);

    const collector = this.collector;
    this.sampler = collector
      ? new SystemMetricsSampler({
          config: config.sampler,
          collector,
          persist: (points) => this.shards.writeSystemMetrics(points, config.sampler.intervalMs, config.sampler.maxAgeMs),
          logger: options.logger,
          now: this.now,
        })
      : null;
  }

  /**
   * Create directories, load the current shard and system window, archive
   * expired entries and start background work.
   */
  public async initialize(): Promise<void> {
    if (this.initialized) {
      this.logger?.warn('Metrics store already initialized');
      return;
    }

    try {
      await this.shards.ensureLayout();
      this.currentPeriod = periodOf(this.now());
      this.entries = await this.shards.readShard(this.currentPeriod);
      this.sampler?.load(await this.shards.readSystemMetrics());
      this.initialized = true;
      await this.archiveOldEntries();
    } catch (error) {
      this.initialized = false;
      this.logger?.error({ error: describeError(error) }, 'Failed to initialize metrics store');
      throw new MetricsInitializationError(this.config.dataDir, error);
    }

    if (this.config.sampler.enabled) {
      this.sampler?.start();
    }

    if (this.config.archiveIntervalMs > 0) {
      this.archiveTimer = setInterval(() => {
        this.archiveOldEntries().catch((error: unknown) => {
          this.logger?.error({ error: describeError(error) }, 'Scheduled metrics archival failed');
        });
      }, this.config.archiveIntervalMs);
      this.archiveTimer.unref();
    }

    this.logger?.info(
      {
        dataDir: this.shards.directory,
        period: this.currentPeriod,
        entries: this.entries.length,
        systemPoints: this.sampler?.snapshot().length ?? 0,
      },
      'Metrics store initialized'
    );
  }

  /**
   * Stop the sampler (waiting for an in-flight sample), then persist state.
   */
  public async shutdown(): Promise<void> {
    if (!this.initialized) {
      return;
    }

    if (this.archiveTimer) {
      clearInterval(this.archiveTimer);
      this.archiveTimer = null;
    }

    await this.sampler?.stop();
    await this.persistCurrentPeriod();
    this.initialized = false;
    this.logger?.info('Metrics store shut down');
  }

  /**
   * Append one entry and persist its shard.
   */
  public async record(input: MetricsInput): Promise<MetricsEntry> {
    this.ensureInitialized();

    const parsed = MetricsInputSchema.safeParse(input);
    if (!parsed.success) {
      throw new InferenceError('ValidationError', `Invalid metrics entry: ${formatZodIssues(parsed.error).join('; ')}`);
    }

    const data = parsed.data;
    const snapshot = this.collector ? await this.collector.snapshot() : EMPTY_SNAPSHOT;
    const timestamp = data.timestamp ?? this.now();

    const entry: MetricsEntry = Object.freeze({
      id: randomUUID(),
      timestamp: timestamp.toISOString(),
      model: data.model,
      module: data.module ?? null,
      jobId: data.jobId ?? null,
      durationMs: data.durationMs,
      promptTokens: data.promptTokens,
      completionTokens: data.completionTokens,
      success: data.success,
      errorType: data.errorType ?? null,
      retryCount: data.retryCount ?? 0,
      fallbackUsed: data.fallbackUsed ?? false,
      cpuPercent: snapshot.cpuPercent,
      memoryMb: snapshot.memoryMb,
      temperatureC: snapshot.temperatureC,
    });

    const period = periodOf(timestamp);
    if (this.currentPeriod === null || period > this.currentPeriod) {
      await this.rollOver(period);
    }

    if (period === this.currentPeriod) {
      this.entries.push(entry);
      await this.persistCurrentPeriod();
    } else {
      await this.appendToPastPeriod(period, entry);
    }

    this.emit('recorded', entry);
    this.logger?.debug(
      {
        model: entry.model,
        module: entry.module,
        durationMs: entry.durationMs,
        tokensPerSecond: Math.round(tokensPerSecond(entry) * 10) / 10,
        success: entry.success,
        errorType: entry.errorType,
      },
      'Recorded inference metrics'
    );

    return entry;
  }

  /**
   * Today's numbers, a live system snapshot and the hourly trend.
   */
  public async getStatus(): Promise<PerformanceStatus> {
    this.ensureInitialized();

    const now = this.now();
    const today = now.toISOString().slice(0, 10);
    const todays = this.entries.filter((entry) => entry.timestamp.startsWith(today));
    const point = this.collector ? await this.collector.collectPoint(now) : null;

    return {
      ...dailyStatus(todays),
      currentCpuPercent: point?.cpuPercent ?? null,
      currentMemoryPercent: point?.memoryPercent ?? null,
      currentTemperatureC: point?.temperatureC ?? null,
      throttlingWarning: SystemCollector.isThrottling(point?.temperatureC ?? null),
      performanceTrend: performanceTrend(this.entries, now.getTime()),
    };
  }

  /**
   * Statistics over `[start, end]`, defaulting to the current month so far.
   * Reads active shards and archives for every month in range.
   */
  public async getSummary(range: SummaryRange = {}): Promise<PerformanceSummary> {
    this.ensureInitialized();

    const now = this.now();
    const start = range.start ?? new Date(periodBounds(periodOf(now)).start);
    const end = range.end ?? now;
    const entries = await this.entriesBetween(start.getTime(), end.getTime());
    return summarize(entries, start, end);
  }

  /**
   * Per-model statistics for the current month.
   */
  public getModelComparison(): Record<string, ModelStats> {
    this.ensureInitialized();
    return modelStats(this.entries);
  }

  /**
   * System points from the last `minutes` (capped at 24h), oldest first.
   */
  public getSystemMetricsHistory(minutes = 15): SystemMetricsPoint[] {
    this.ensureInitialized();

    const window = Math.min(Math.max(minutes, 0), MAX_HISTORY_MINUTES);
    const since = this.now().getTime() - window * 60_000;
    return (this.sampler?.history(since) ?? []).sort((a, b) => a.timestamp.localeCompare(b.timestamp));
  }

  /**
   * Entries recorded in the current month (in-memory view).
   */
  public getEntries(): readonly MetricsEntry[] {
    return [...this.entries];
  }

  /**
   * Move entries older than the retention window from every active shard
   * into `archive/`. Archive merges skip ids already present, so an
   * interrupted pass can be repeated safely.
   */
  public async archiveOldEntries(): Promise<ArchiveResult> {
    this.ensureInitialized();

    const cutoff = this.now().getTime() - this.config.retentionDays * DAY_MS;
    const isOld = (entry: MetricsEntry): boolean => Date.parse(entry.timestamp) < cutoff;
    const result: ArchiveResult = { archived: 0, shards: [] };

    const periods = new Set(await this.shards.listActivePeriods());
    if (this.currentPeriod !== null) {
      periods.add(this.currentPeriod);
    }

    for (const period of [...periods].sort()) {
      if (periodBounds(period).start >= cutoff) {
        continue;
      }

      const source = period === this.currentPeriod ? this.entries : await this.shards.readShard(period);
      const old = source.filter(isOld);
      if (old.length === 0) {
        continue;
      }

      const byPeriod = new Map<string, MetricsEntry[]>();
      for (const entry of old) {
        const entryPeriod = periodOf(new Date(entry.timestamp));
        byPeriod.set(entryPeriod, [...(byPeriod.get(entryPeriod) ?? []), entry]);
      }
      for (const [archivePeriod, group] of byPeriod) {
        await this.shards.appendToArchive(archivePeriod, group);
      }

      if (period === this.currentPeriod) {
        this.entries = this.entries.filter((entry) => !isOld(entry));
        await this.shards.writeShard(period, this.entries);
      } else {
        const kept = source.filter((entry) => !isOld(entry));
        if (kept.length === 0) {
          await this.shards.removeShard(period);
        } else {
          await this.shards.writeShard(period, kept);
        }
      }

      result.archived += old.length;
      result.shards.push(period);
      this.logger?.info({ period, archived: old.length }, 'Archived metrics past retention');
    }

    if (result.archived > 0) {
      this.emit('archived', result);
    }
    return result;
  }

  public get isInitialized(): boolean {
    return this.initialized;
  }

  private async entriesBetween(startMs: number, endMs: number): Promise<MetricsEntry[]> {
    const seen = new Set<string>();
    const collected: MetricsEntry[] = [];
    const add = (entries: readonly MetricsEntry[]): void => {
      for (const entry of entries) {
        const at = Date.parse(entry.timestamp);
        if (at >= startMs && at <= endMs && !seen.has(entry.id)) {
          seen.add(entry.id);
          collected.push(entry);
        }
      }
    };

    const overlaps = (period: string): boolean => {
      const bounds = periodBounds(period);
      return bounds.start <= endMs && bounds.end > startMs;
    };

    add(this.entries);

    for (const period of await this.shards.listActivePeriods()) {
      if (period !== this.currentPeriod && overlaps(period)) {
        add(await this.shards.readShard(period));
      }
    }

    for (let cursor = new Date(startMs); cursor.getTime() <= endMs; ) {
      const period = periodOf(cursor);
      add(await this.shards.readArchive(period));
      cursor = new Date(periodBounds(period).end);
    }

    return collected;
  }

  private async rollOver(period: string): Promise<void> {
    if (this.currentPeriod !== null) {
      await this.persistCurrentPeriod();
    }
    this.currentPeriod = period;
    try {
      this.entries = await this.shards.readShard(period);
    } catch (error) {
      this.logger?.warn({ period, error: describeError(error) }, 'Unable to load shard, starting empty');
      this.entries = [];
    }
    this.logger?.info({ period }, 'Started new metrics period');
  }

  private async appendToPastPeriod(period: string, entry: MetricsEntry): Promise<void> {
    try {
      const existing = await this.shards.readShard(period);
      await this.shards.writeShard(period, [...existing, entry]);
    } catch (error) {
      this.reportPersistFailure(this.shards.shardPath(period), error);
    }
  }

  private async persistCurrentPeriod(): Promise<void> {
    if (this.currentPeriod === null) {
      return;
    }
    try {
      await this.shards.writeShard(this.currentPeriod, this.entries);
    } catch (error) {
      this.reportPersistFailure(this.shards.shardPath(this.currentPeriod), error);
    }
  }

  private reportPersistFailure(path: string, cause: unknown): void {
    const error = new MetricsPersistenceError(path, cause);
    this.logger?.error({ error: error.message }, 'Metrics persistence failed, entry kept in memory');
    this.emit('persist:failed', error.toObject());
  }

  private ensureInitialized(): void {
    if (!this.initialized) {
      throw new NotInitializedError('MetricsStore');
    }
  }
}
