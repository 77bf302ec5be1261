/**
 * ProcMetricSource Tests
 *
 * The filesystem is mocked; each test lays out the files it needs.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { existsSync, readFileSync } from 'node:fs';
import { DEFAULT_PROC_PATHS, ProcMetricSource, parseCpuStatLine, parseMeminfo, parseProcStat } from './proc-metric-source.js';

vi.mock('node:fs', () => ({
  readFileSync: vi.fn(),
  existsSync: vi.fn(),
}));

const mockReadFileSync = vi.mocked(readFileSync);
const mockExistsSync = vi.mocked(existsSync);

const PROC_STAT = [
  'cpu  400 10 100 1600 40 0 20 5',
  'cpu0 200 5 50 800 20 0 10 3',
  'cpu1 200 5 50 800 20 0 10 2',
  'intr 12345 0 0',
  'ctxt 67890',
].join('\n');

const PROC_MEMINFO = [
  'MemTotal:        1000000 kB',
  'MemFree:          200000 kB',
  'MemAvailable:     400000 kB',
  'Buffers:           50000 kB',
  'Cached:           100000 kB',
  'SwapTotal:        500000 kB',
  'SwapFree:         250000 kB',
].join('\n');

const PROC_CPUINFO = [
  'processor\t: 0',
  'model name\t: Test Processor @ 2.00GHz',
  '',
  'processor\t: 1',
  'model name\t: Test Processor @ 2.00GHz',
].join('\n');

function mockFiles(files: Record<string, string>): void {
  mockExistsSync.mockImplementation((path) => String(path) in files);
  mockReadFileSync.mockImplementation((path) => {
    const content = files[String(path)];
    if (content === undefined) {
      throw new Error(`ENOENT: no such file ${String(path)}`);
    }
    return content;
  });
}

describe('parseCpuStatLine', () => {
  it('should parse every counter field', () => {
    expect(parseCpuStatLine('cpu  100 1 50 800 10 2 5 3', 42)).toEqual({
      user: 100,
      nice: 1,
      system: 50,
      idle: 800,
      iowait: 10,
      irq: 2,
      softirq: 5,
      steal: 3,
      timestamp: 42,
    });
  });

  it('should default a missing steal field to 0', () => {
    expect(parseCpuStatLine('cpu0 100 1 50 800 10 2 5', 0)?.steal).toBe(0);
  });

  it('should reject short, foreign or malformed lines', () => {
    expect(parseCpuStatLine('cpu 1 2 3', 0)).toBeNull();
    expect(parseCpuStatLine('intr 1 2 3 4 5 6 7 8', 0)).toBeNull();
    expect(parseCpuStatLine('cpu 100 x 50 800 10 2 5 3', 0)).toBeNull();
  });
});

describe('parseProcStat', () => {
  it('should split the aggregate line from the per-core lines', () => {
    const reading = parseProcStat(PROC_STAT, 2, 7);

    expect(reading.aggregate?.user).toBe(400);
    expect(reading.aggregate?.idle).toBe(1600);
    expect(reading.cores).toHaveLength(2);
    expect(reading.cores[1]?.steal).toBe(2);
  });

  it('should mark cores without a line as null', () => {
    const reading = parseProcStat(PROC_STAT, 3, 7);

    expect(reading.cores[2]).toBeNull();
  });
});

describe('parseMeminfo', () => {
  it('should convert kB values to bytes', () => {
    expect(parseMeminfo(PROC_MEMINFO)).toEqual({
      total: 1_024_000_000,
      free: 204_800_000,
      available: 409_600_000,
      buffers: 51_200_000,
      cached: 102_400_000,
      swapTotal: 512_000_000,
      swapFree: 256_000_000,
    });
  });

  it('should fall back to MemFree when MemAvailable is absent', () => {
    const counters = parseMeminfo('MemTotal: 1000 kB\nMemFree: 300 kB');

    expect(counters?.available).toBe(307_200);
  });

  it('should return null without MemTotal', () => {
    expect(parseMeminfo('MemFree: 300 kB')).toBeNull();
  });
});

describe('ProcMetricSource', () => {
  let source: ProcMetricSource;

  beforeEach(() => {
    vi.clearAllMocks();
    source = new ProcMetricSource();
  });

  describe('CPU', () => {
    it('should count cores from cpuinfo', async () => {
      mockFiles({ [DEFAULT_PROC_PATHS.cpuinfo]: PROC_CPUINFO });

      await expect(source.readCoreCount()).resolves.toBe(2);
    });

    it('should count cores from stat when cpuinfo is missing', async () => {
      mockFiles({ [DEFAULT_PROC_PATHS.stat]: PROC_STAT });

      await expect(source.readCoreCount()).resolves.toBe(2);
    });

    it('should report 0 cores when nothing is readable', async () => {
      mockFiles({});

      await expect(source.readCoreCount()).resolves.toBe(0);
    });

    it('should read the model name', async () => {
      mockFiles({ [DEFAULT_PROC_PATHS.cpuinfo]: PROC_CPUINFO });

      await expect(source.readCpuModel()).resolves.toBe('Test Processor @ 2.00GHz');
    });

    it('should fall back to the Model key used on ARM boards', async () => {
      mockFiles({ [DEFAULT_PROC_PATHS.cpuinfo]: 'processor\t: 0\nModel\t\t: Test Board Rev 1.0' });

      await expect(source.readCpuModel()).resolves.toBe('Test Board Rev 1.0');
    });

    it('should return unavailable counters when stat is unreadable', async () => {
      mockFiles({ [DEFAULT_PROC_PATHS.cpuinfo]: PROC_CPUINFO });

      await expect(source.readCpuCounters()).resolves.toEqual({ aggregate: null, cores: [null, null] });
    });

    it('should read aggregate and per-core counters', async () => {
      mockFiles({ [DEFAULT_PROC_PATHS.cpuinfo]: PROC_CPUINFO, [DEFAULT_PROC_PATHS.stat]: PROC_STAT });

      const reading = await source.readCpuCounters();

      expect(reading.aggregate?.system).toBe(100);
      expect(reading.cores.map((core) => core?.user)).toEqual([200, 200]);
    });
  });

  describe('Sensors', () => {
    it('should convert millidegrees to degrees', async () => {
      mockFiles({ [DEFAULT_PROC_PATHS.thermalZone]: '52375\n' });

      await expect(source.readTemperature()).resolves.toBe(52.375);
    });

    it('should convert kHz to MHz', async () => {
      mockFiles({ [DEFAULT_PROC_PATHS.cpuFrequency]: '1800000\n' });

      await expect(source.readFrequency()).resolves.toBe(1800);
    });

    it('should report missing or unparsable sensors as null', async () => {
      mockFiles({ [DEFAULT_PROC_PATHS.cpuFrequency]: 'n/a' });

      await expect(source.readTemperature()).resolves.toBeNull();
      await expect(source.readFrequency()).resolves.toBeNull();
    });

    it('should treat a read error as unavailable', async () => {
      mockExistsSync.mockReturnValue(true);
      mockReadFileSync.mockImplementation(() => {
        throw new Error('EACCES: permission denied');
      });

      await expect(source.readTemperature()).resolves.toBeNull();
      await expect(source.readMemoryCounters()).resolves.toBeNull();
    });
  });

  describe('Memory', () => {
    it('should read meminfo', async () => {
      mockFiles({ [DEFAULT_PROC_PATHS.meminfo]: PROC_MEMINFO });

      const counters = await source.readMemoryCounters();

      expect(counters?.total).toBe(1_024_000_000);
      expect(counters?.swapFree).toBe(256_000_000);
    });

    it('should honor custom paths', async () => {
      source = new ProcMetricSource({ meminfo: '/tmp/test-meminfo' });
      mockFiles({ '/tmp/test-meminfo': 'MemTotal: 2048 kB\nMemAvailable: 1024 kB' });

      const counters = await source.readMemoryCounters();

      expect(counters?.total).toBe(2_097_152);
      expect(counters?.available).toBe(1_048_576);
    });
  });
});
