import { describe, it, expect } from 'vitest';
import {
  SystemCollector,
  type CpuTimesSnapshot,
  type SystemProbe,
} from '../../../src/monitoring/system-collector.js';

const GB = 1024 * 1024 * 1024;

function fakeProbe(overrides: Partial<SystemProbe> = {}, cpuReadings: CpuTimesSnapshot[] = []): SystemProbe {
  let index = 0;
  return {
    cpuTimes: () => cpuReadings[Math.min(index++, cpuReadings.length - 1)],
    memory: () => ({ totalBytes: 16 * GB, freeBytes: 4 * GB }),
    readThermal: async () => '55300\n',
    ...overrides,
  };
}

describe('SystemCollector', () => {
  describe('getCpuPercent', () => {
    it('should measure the first reading against zero counters', () => {
      const collector = new SystemCollector({
        probe: fakeProbe({}, [{ idle: 750, total: 1000 }]),
      });

      expect(collector.getCpuPercent()).toBe(25);
    });

    it('should measure later readings against the previous one', () => {
      const collector = new SystemCollector({
        probe: fakeProbe({}, [
          { idle: 750, total: 1000 },
          { idle: 850, total: 1400 },
        ]),
      });

      collector.getCpuPercent();

      expect(collector.getCpuPercent()).toBe(75);
    });

    it('should return 0 when no time has elapsed', () => {
      const collector = new SystemCollector({
        probe: fakeProbe({}, [
          { idle: 750, total: 1000 },
          { idle: 750, total: 1000 },
        ]),
      });

      collector.getCpuPercent();

      expect(collector.getCpuPercent()).toBe(0);
    });

    it('should return null when the counters cannot be read', () => {
      const collector = new SystemCollector({
        probe: fakeProbe({
          cpuTimes: () => {
            throw new Error('no /proc');
          },
        }),
      });

      expect(collector.getCpuPercent()).toBeNull();
    });
  });

  describe('getMemory', () => {
    it('should report used memory in MB and percent', () => {
      const collector = new SystemCollector({ probe: fakeProbe() });

      expect(collector.getMemory()).toEqual({ memoryMb: 12288, memoryPercent: 75 });
    });

    it('should return null for an empty total', () => {
      const collector = new SystemCollector({
        probe: fakeProbe({ memory: () => ({ totalBytes: 0, freeBytes: 0 }) }),
      });

      expect(collector.getMemory()).toBeNull();
    });
  });

  describe('getTemperature', () => {
    it('should convert millidegrees to Celsius', async () => {
      const collector = new SystemCollector({ probe: fakeProbe() });

      expect(await collector.getTemperature()).toBe(55.3);
    });

    it('should try the next source when one fails', async () => {
      const collector = new SystemCollector({
        thermalPaths: ['/missing', '/present'],
        probe: fakeProbe({
          readThermal: async (path) => {
            if (path === '/missing') {
              throw new Error('ENOENT');
            }
            return '81000';
          },
        }),
      });

      expect(await collector.getTemperature()).toBe(81);
    });

    it('should return null when no source is readable', async () => {
      const collector = new SystemCollector({
        probe: fakeProbe({ readThermal: async () => 'garbage' }),
      });

      expect(await collector.getTemperature()).toBeNull();
    });
  });

  describe('collectPoint', () => {
    it('should combine every reading under the given timestamp', async () => {
      const collector = new SystemCollector({
        probe: fakeProbe({}, [{ idle: 900, total: 1000 }]),
      });

      const point = await collector.collectPoint(new Date('2025-03-01T10:00:00.000Z'));

      expect(point).toEqual({
        timestamp: '2025-03-01T10:00:00.000Z',
        cpuPercent: 10,
        memoryPercent: 75,
        memoryMb: 12288,
        temperatureC: 55.3,
      });
    });
  });

  describe('isThrottling', () => {
    it('should flag temperatures at or above 80C', () => {
      expect(SystemCollector.isThrottling(79.9)).toBe(false);
      expect(SystemCollector.isThrottling(80)).toBe(true);
      expect(SystemCollector.isThrottling(null)).toBe(false);
    });
  });
});
