/**
 * Proc Metric Source
 *
 * RawMetricSource backed by the Linux /proc and /sys filesystems. Every read
 * degrades to `null` (or an empty result) when the file is missing or malformed.
 */

import { readFileSync, existsSync } from 'node:fs';
import { createSubsystemLogger, errorMeta } from '../../logging/subsystem.js';
import type { CounterSnapshot, CpuCounterReading, MemoryCounters } from '../types/counters.js';
import type { RawMetricSource } from './raw-metric-source.js';

export interface ProcPaths {
  stat: string;
  meminfo: string;
  cpuinfo: string;
  thermalZone: string;
  cpuFrequency: string;
}

export const DEFAULT_PROC_PATHS: ProcPaths = {
  stat: '/proc/stat',
  meminfo: '/proc/meminfo',
  cpuinfo: '/proc/cpuinfo',
  thermalZone: '/sys/class/thermal/thermal_zone0/temp',
  cpuFrequency: '/sys/devices/system/cpu/cpu0/cpufreq/scaling_cur_freq',
};

const BYTES_PER_KB = 1024;

/**
 * Parses one `cpu`/`cpuN` line of /proc/stat; `steal` is optional
 */
export function parseCpuStatLine(line: string, timestamp: number): CounterSnapshot | null {
  const parts = line.trim().split(/\s+/);
  if (parts.length < 8 || !parts[0]?.startsWith('cpu')) {
    return null;
  }

  const values = parts.slice(1, 9).map((part) => Number.parseInt(part, 10));
  if (values.slice(0, 7).some((value) => Number.isNaN(value) || value < 0)) {
    return null;
  }

  const field = (index: number): number => {
    const value = values[index];
    return value !== undefined && Number.isFinite(value) && value >= 0 ? value : 0;
  };

  return {
    user: field(0),
    nice: field(1),
    system: field(2),
    idle: field(3),
    iowait: field(4),
    irq: field(5),
    softirq: field(6),
    steal: field(7),
    timestamp,
  };
}

/**
 * Parses the aggregate and per-core counters from the /proc/stat content
 */
export function parseProcStat(content: string, coreCount: number, timestamp: number): CpuCounterReading {
  const lines = content.split('\n').filter((line) => line.trim().length > 0);
  const aggregateLine = lines.find((line) => /^cpu\s/.test(line));

  const cores: Array<CounterSnapshot | null> = [];
  for (let core = 0; core < coreCount; core++) {
    const prefix = `cpu${core}`;
    const coreLine = lines.find((line) => line.split(/\s+/)[0] === prefix);
    cores.push(coreLine ? parseCpuStatLine(coreLine, timestamp) : null);
  }

  return {
    aggregate: aggregateLine ? parseCpuStatLine(aggregateLine, timestamp) : null,
    cores,
  };
}

/**
 * Parses /proc/meminfo into bytes; returns null without MemTotal
 */
export function parseMeminfo(content: string): MemoryCounters | null {
  const values = new Map<string, number>();
  for (const line of content.split('\n')) {
    const match = line.match(/^(\w+(?:\(\w+\))?):\s+(\d+)/);
    if (match?.[1] && match[2]) {
      values.set(match[1], Number.parseInt(match[2], 10) * BYTES_PER_KB);
    }
  }

  const total = values.get('MemTotal');
  if (total === undefined) {
    return null;
  }

  const free = values.get('MemFree') ?? 0;
  return {
    total,
    free,
    // Kernels before 3.14 have no MemAvailable
    available: values.get('MemAvailable') ?? free,
    buffers: values.get('Buffers') ?? 0,
    cached: values.get('Cached') ?? 0,
    swapTotal: values.get('SwapTotal') ?? 0,
    swapFree: values.get('SwapFree') ?? 0,
  };
}

export class ProcMetricSource implements RawMetricSource {
  private readonly paths: ProcPaths;
  private readonly logger = createSubsystemLogger('monitor/source');
  private coreCount?: number;

  constructor(paths: Partial<ProcPaths> = {}) {
    this.paths = { ...DEFAULT_PROC_PATHS, ...paths };
  }

  async readCpuCounters(): Promise<CpuCounterReading> {
    const coreCount = await this.readCoreCount();
    const content = this.readText(this.paths.stat);
    if (content === null) {
      return { aggregate: null, cores: new Array<CounterSnapshot | null>(coreCount).fill(null) };
    }
    return parseProcStat(content, coreCount, Date.now());
  }

  async readMemoryCounters(): Promise<MemoryCounters | null> {
    const content = this.readText(this.paths.meminfo);
    return content === null ? null : parseMeminfo(content);
  }

  async readTemperature(): Promise<number | null> {
    const milliCelsius = this.readInteger(this.paths.thermalZone);
    return milliCelsius === null ? null : milliCelsius / 1000;
  }

  async readFrequency(): Promise<number | null> {
    const kiloHertz = this.readInteger(this.paths.cpuFrequency);
    return kiloHertz === null ? null : kiloHertz / 1000;
  }

  async readCoreCount(): Promise<number> {
    if (this.coreCount !== undefined) {
      return this.coreCount;
    }

    const content = this.readText(this.paths.cpuinfo);
    const fromCpuinfo = content === null ? 0 : content.split('\n').filter((line) => /^processor\s*:/.test(line)).length;
    if (fromCpuinfo > 0) {
      this.coreCount = fromCpuinfo;
      return fromCpuinfo;
    }

    const stat = this.readText(this.paths.stat);
    const fromStat = stat === null ? 0 : stat.split('\n').filter((line) => /^cpu\d+\s/.test(line)).length;
    if (fromStat > 0) {
      this.coreCount = fromStat;
    }
    return fromStat;
  }

  async readCpuModel(): Promise<string> {
    const content = this.readText(this.paths.cpuinfo);
    if (content === null) {
      return 'Unknown';
    }

    for (const key of ['model name', 'Model', 'Hardware']) {
      const line = content.split('\n').find((candidate) => candidate.startsWith(key));
      const value = line?.split(':').slice(1).join(':').trim();
      if (value) {
        return value;
      }
    }
    return 'Unknown';
  }

  private readText(path: string): string | null {
    try {
      if (!existsSync(path)) {
        this.logger.debug('Counter file not found', { path });
        return null;
      }
      return readFileSync(path, 'utf8');
    } catch (error) {
      this.logger.debug('Failed to read counter file', { path, ...errorMeta(error) });
      return null;
    }
  }

  private readInteger(path: string): number | null {
    const text = this.readText(path);
    if (text === null) {
      return null;
    }
    const value = Number.parseInt(text.trim(), 10);
    return Number.isNaN(value) ? null : value;
  }
}
