/**
 * System Metrics Sampler
 *
 * Fixed-interval background loop feeding an age-bounded window of system
 * points. The window is handed to `persist` every `persistEvery` samples
 * and once more on stop.
 */

import type { Logger } from 'pino';
import type { SystemMetricsPoint, SystemSamplerConfig } from '../types/metrics.js';
import { describeError } from '../api/errors.js';
import type { SystemCollector } from './system-collector.js';

export interface SystemSamplerOptions {
  config: SystemSamplerConfig;
  collector: SystemCollector;
  persist: (points: readonly SystemMetricsPoint[]) => Promise<void>;
  logger?: Logger;
  now?: () => Date;
}

export class SystemMetricsSampler {
  private readonly config: SystemSamplerConfig;
  private readonly collector: SystemCollector;
  private readonly persist: (points: readonly SystemMetricsPoint[]) => Promise<void>;
  private readonly logger?: Logger;
  private readonly now: () => Date;

  private points: SystemMetricsPoint[] = [];
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private running = false;
  private samplesSincePersist = 0;

  constructor(options: SystemSamplerOptions) {
    this.config = options.config;
    this.collector = options.collector;
    this.persist = options.persist;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Seed the window with previously persisted points.
   */
  public load(points: readonly SystemMetricsPoint[]): void {
    this.points = [...points];
    this.prune();
  }

  public start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.schedule();
    this.logger?.info({ intervalMs: this.config.intervalMs }, 'System sampler started');
  }

  /**
   * Cancel the loop, wait for an in-flight sample, then persist the window.
   */
  public async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
    await this.flush();
    this.logger?.info('System sampler stopped');
  }

  public get isRunning(): boolean {
    return this.running;
  }

  /**
   * Collect one point. Exposed for tests and manual sampling; failures are
   * logged and the loop continues.
   */
  public async sample(): Promise<void> {
    try {
      const point = await this.collector.collectPoint(this.now());
      this.points.push(point);
      this.prune();
      this.samplesSincePersist++;

      if (this.samplesSincePersist >= this.config.persistEvery) {
        await this.flush();
      }
    } catch (error) {
      this.logger?.error({ error: describeError(error) }, 'System sample failed');
    }
  }

  /**
   * Latest point, if any.
   */
  public latest(): SystemMetricsPoint | null {
    return this.points.length > 0 ? this.points[this.points.length - 1] : null;
  }

  /**
   * Points newer than `sinceMs` epoch ms, oldest first.
   */
  public history(sinceMs: number): SystemMetricsPoint[] {
    return this.points.filter((point) => Date.parse(point.timestamp) >= sinceMs);
  }

  public snapshot(): readonly SystemMetricsPoint[] {
    return [...this.points];
  }

  private schedule(): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.inFlight = this.sample().finally(() => {
        this.inFlight = null;
        if (this.running) {
          this.schedule();
        }
      });
    }, this.config.intervalMs);
    this.timer.unref();
  }

  private prune(): void {
    const cutoff = this.now().getTime() - this.config.maxAgeMs;
    this.points = this.points.filter((point) => Date.parse(point.timestamp) >= cutoff);
  }

  private async flush(): Promise<void> {
    this.samplesSincePersist = 0;
    try {
      await this.persist(this.snapshot());
    } catch (error) {
      this.logger?.error({ error: describeError(error) }, 'Failed to persist system metrics');
    }
  }
}
