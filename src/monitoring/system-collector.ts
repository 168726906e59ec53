/**
 * System Collector
 *
 * Point-in-time CPU, memory and temperature readings. Each reading fails
 * independently: a sensor that cannot be read yields null for its field
 * only.
 */

import * as os from 'node:os';
import { readFile } from 'node:fs/promises';
import type { Logger } from 'pino';
import type { SystemMetricsPoint } from '../types/metrics.js';
import { describeError } from '../api/errors.js';
import { round } from '../utils/math-helpers.js';

/** Sysfs thermal sources, values in millidegrees Celsius */
export const THERMAL_PATHS = [
  '/sys/class/thermal/thermal_zone0/temp',
  '/sys/class/hwmon/hwmon0/temp1_input',
] as const;

/** Temperature at or above which throttling is likely */
export const THROTTLING_THRESHOLD_C = 80;

export interface CpuTimesSnapshot {
  idle: number;
  total: number;
}

/**
 * Raw host access, replaceable in tests.
 */
export interface SystemProbe {
  cpuTimes(): CpuTimesSnapshot;
  memory(): { totalBytes: number; freeBytes: number };
  readThermal(path: string): Promise<string>;
}

export const hostProbe: SystemProbe = {
  cpuTimes() {
    let idle = 0;
    let total = 0;
    for (const cpu of os.cpus()) {
      const { user, nice, sys, irq } = cpu.times;
      total += user + nice + sys + irq + cpu.times.idle;
      idle += cpu.times.idle;
    }
    return { idle, total };
  },
  memory() {
    return { totalBytes: os.totalmem(), freeBytes: os.freemem() };
  },
  readThermal(path: string) {
    return readFile(path, 'utf8');
  },
};

/**
 * Snapshot attached to each metrics entry.
 */
export interface SystemSnapshot {
  cpuPercent: number | null;
  memoryMb: number | null;
  temperatureC: number | null;
}

export class SystemCollector {
  private readonly probe: SystemProbe;
  private readonly thermalPaths: readonly string[];
  private readonly logger?: Logger;
  private lastCpu: CpuTimesSnapshot | null = null;

  constructor(options: { probe?: SystemProbe; thermalPaths?: readonly string[]; logger?: Logger } = {}) {
    this.probe = options.probe ?? hostProbe;
    this.thermalPaths = options.thermalPaths ?? THERMAL_PATHS;
    this.logger = options.logger;
  }

  /**
   * CPU usage (0-100) since the previous call. The first call measures
   * against boot, as the OS counters do.
   */
  public getCpuPercent(): number | null {
    try {
      const current = this.probe.cpuTimes();
      const previous = this.lastCpu ?? { idle: 0, total: 0 };
      this.lastCpu = current;

      const idleDelta = current.idle - previous.idle;
      const totalDelta = current.total - previous.total;
      if (totalDelta <= 0) {
        return 0;
      }

      const usage = 100 - (idleDelta / totalDelta) * 100;
      return round(Math.max(0, Math.min(100, usage)), 1);
    } catch (error) {
      this.logger?.debug({ error: describeError(error) }, 'CPU reading unavailable');
      return null;
    }
  }

  /**
   * Used memory in MB and as a percentage of total.
   */
  public getMemory(): { memoryMb: number; memoryPercent: number } | null {
    try {
      const { totalBytes, freeBytes } = this.probe.memory();
      if (totalBytes <= 0) {
        return null;
      }
      const used = totalBytes - freeBytes;
      return {
        memoryMb: round(used / (1024 * 1024), 1),
        memoryPercent: round((used / totalBytes) * 100, 1),
      };
    } catch (error) {
      this.logger?.debug({ error: describeError(error) }, 'Memory reading unavailable');
      return null;
    }
  }

  /**
   * First readable thermal source, in degrees Celsius.
   */
  public async getTemperature(): Promise<number | null> {
    for (const path of this.thermalPaths) {
      try {
        const raw = await this.probe.readThermal(path);
        const milli = Number.parseInt(raw.trim(), 10);
        if (Number.isFinite(milli)) {
          return round(milli / 1000, 1);
        }
      } catch (error) {
        this.logger?.trace({ path, error: describeError(error) }, 'Thermal source unavailable');
      }
    }
    return null;
  }

  public async snapshot(): Promise<SystemSnapshot> {
    const memory = this.getMemory();
    return {
      cpuPercent: this.getCpuPercent(),
      memoryMb: memory?.memoryMb ?? null,
      temperatureC: await this.getTemperature(),
    };
  }

  public async collectPoint(now: Date = new Date()): Promise<SystemMetricsPoint> {
    const memory = this.getMemory();
    return {
      timestamp: now.toISOString(),
      cpuPercent: this.getCpuPercent(),
      memoryPercent: memory?.memoryPercent ?? null,
      memoryMb: memory?.memoryMb ?? null,
      temperatureC: await this.getTemperature(),
    };
  }

  public static isThrottling(temperatureC: number | null): boolean {
    return temperatureC !== null && temperatureC >= THROTTLING_THRESHOLD_C;
  }
}
