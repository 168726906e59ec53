/**
 * Metrics shard files
 *
 * Layout:
 * ```
 * dataDir/
 * ├── metrics_YYYY_MM.json          active monthly shards
 * ├── system_metrics.json           rolling system window
 * └── archive/
 *     └── metrics_YYYY_MM.json      entries past retention
 * ```
 *
 * Periods are computed in UTC. Every write is atomic.
 *
 * @module monitoring/metrics-shards
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Logger } from 'pino';
import type { MetricsEntry, SystemMetricsPoint } from '../types/metrics.js';
import { MetricsShardSchema, SystemMetricsFileSchema } from '../types/schemas/metrics.js';
import { readFileIfExists, writeJsonAtomic } from '../utils/fs-helpers.js';

const SHARD_PATTERN = /^metrics_(\d{4}_\d{2})\.json$/;
export const ARCHIVE_DIR = 'archive';
export const SYSTEM_METRICS_FILE = 'system_metrics.json';

/**
 * `YYYY_MM` period of a date (UTC).
 */
export function periodOf(date: Date): string {
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  return `${date.getUTCFullYear()}_${month}`;
}

/**
 * First and last instant of a period, as epoch ms (end exclusive).
 */
export function periodBounds(period: string): { start: number; end: number } {
  const [year, month] = period.split('_').map((part) => Number.parseInt(part, 10));
  return {
    start: Date.UTC(year, month - 1, 1),
    end: Date.UTC(year, month, 1),
  };
}

export class MetricsShardFiles {
  private readonly dataDir: string;
  private readonly logger?: Logger;

  constructor(dataDir: string, logger?: Logger) {
    this.dataDir = path.resolve(dataDir);
    this.logger = logger;
  }

  public get directory(): string {
    return this.dataDir;
  }

  public async ensureLayout(): Promise<void> {
    await fs.mkdir(path.join(this.dataDir, ARCHIVE_DIR), { recursive: true });
  }

  public shardPath(period: string): string {
    return path.join(this.dataDir, `metrics_${period}.json`);
  }

  public archivePath(period: string): string {
    return path.join(this.dataDir, ARCHIVE_DIR, `metrics_${period}.json`);
  }

  public get systemMetricsPath(): string {
    return path.join(this.dataDir, SYSTEM_METRICS_FILE);
  }

  /**
   * Periods with an active shard file, oldest first.
   */
  public async listActivePeriods(): Promise<string[]> {
    const names = await fs.readdir(this.dataDir);
    const periods: string[] = [];
    for (const name of names) {
      const match = SHARD_PATTERN.exec(name);
      if (match) {
        periods.push(match[1]);
      }
    }
    return periods.sort();
  }

  public async readShard(period: string): Promise<MetricsEntry[]> {
    return this.readEntries(this.shardPath(period));
  }

  public async readArchive(period: string): Promise<MetricsEntry[]> {
    return this.readEntries(this.archivePath(period));
  }

  public async writeShard(period: string, entries: readonly MetricsEntry[]): Promise<void> {
    await writeJsonAtomic(this.shardPath(period), {
      period,
      updatedAt: new Date().toISOString(),
      entries,
    });
  }

  public async removeShard(period: string): Promise<void> {
    await fs.rm(this.shardPath(period), { force: true });
  }

  /**
   * Merge entries into the period's archive file, skipping ids already
   * archived. Returns how many were added.
   */
  public async appendToArchive(period: string, entries: readonly MetricsEntry[]): Promise<number> {
    const existing = await this.readArchive(period);
    const known = new Set(existing.map((entry) => entry.id));
    const additions = entries.filter((entry) => !known.has(entry.id));
    if (additions.length === 0) {
      return 0;
    }

    const merged = [...existing, ...additions].sort((a, b) => a.timestamp.localeCompare(b.timestamp));
    await writeJsonAtomic(this.archivePath(period), {
      period,
      updatedAt: new Date().toISOString(),
      entries: merged,
    });
    return additions.length;
  }

  public async readSystemMetrics(): Promise<SystemMetricsPoint[]> {
    const raw = await readFileIfExists(this.systemMetricsPath);
    if (raw === null) {
      return [];
    }

    const parsed = SystemMetricsFileSchema.safeParse(parseJson(raw));
    if (!parsed.success) {
      this.logger?.warn({ path: this.systemMetricsPath }, 'Ignoring unreadable system metrics file');
      return [];
    }
    return parsed.data.points;
  }

  public async writeSystemMetrics(
    points: readonly SystemMetricsPoint[],
    intervalMs: number,
    maxAgeMs: number
  ): Promise<void> {
    await writeJsonAtomic(this.systemMetricsPath, {
      updatedAt: new Date().toISOString(),
      intervalMs,
      maxAgeMs,
      points,
    });
  }

  /**
   * Entries of a shard file. A file that fails validation is moved aside
   * (`*.corrupt-<epoch>`) so the next write does not destroy it.
   */
  private async readEntries(filePath: string): Promise<MetricsEntry[]> {
    const raw = await readFileIfExists(filePath);
    if (raw === null) {
      return [];
    }

    const parsed = MetricsShardSchema.safeParse(parseJson(raw));
    if (parsed.success) {
      return parsed.data.entries;
    }

    const quarantine = `${filePath}.corrupt-${Date.now()}`;
    await fs.rename(filePath, quarantine);
    this.logger?.error(
      { filePath, quarantine, issues: parsed.error.issues.length },
      'Metrics shard failed validation, moved aside'
    );
    return [];
  }
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}
