/**
 * Memory Monitor Implementation
 *
 * Samples RAM and swap counters. The kernel already reports these as
 * instantaneous byte values, so no delta computation is involved.
 */

import { createSubsystemLogger, type SubsystemLogger } from '../../logging/subsystem.js';
import { resolveMonitorConfig } from '../config/configuration.js';
import { PeriodicSampler, type SamplerEvents, type SamplerStrategy } from '../sampler/periodic-sampler.js';
import { softRead } from '../source/soft-read.js';
import type { RawMetricSource } from '../source/raw-metric-source.js';
import type { MemoryCounters } from '../types/counters.js';
import type { MemorySnapshot, MetricStatus } from '../types/metric-snapshot.js';
import type { MonitorConfig, ThresholdPair } from '../types/monitor-config.js';
import { clampPercentage, roundTo2, sanitizeBytes } from '../validation.js';

export type MemoryMonitorEvents = SamplerEvents<MemorySnapshot> & {
  memoryWarning: [usagePercentage: number];
  memoryCritical: [usagePercentage: number];
  swapWarning: [swapPercentage: number];
  lowMemory: [availableBytes: number];
};

export interface MemoryMonitorOptions {
  config?: MonitorConfig;
}

interface MemoryClassification {
  thresholds: ThresholdPair;
  lowMemoryBytes: number;
}

export function classifyMemoryStatus(
  snapshot: Pick<MemorySnapshot, 'totalBytes' | 'availableBytes' | 'usagePercentage'>,
  { thresholds, lowMemoryBytes }: MemoryClassification,
): MetricStatus {
  if (snapshot.totalBytes <= 0) return 'unknown';
  if (snapshot.usagePercentage >= thresholds.critical) return 'critical';
  if (snapshot.usagePercentage >= thresholds.warning) return 'warning';
  if (snapshot.availableBytes < lowMemoryBytes) return 'warning';
  return 'normal';
}

export function createInitialMemorySnapshot(): MemorySnapshot {
  return {
    kind: 'memory',
    totalBytes: 0,
    freeBytes: 0,
    availableBytes: 0,
    usedBytes: 0,
    buffersBytes: 0,
    cachedBytes: 0,
    swapTotalBytes: 0,
    swapUsedBytes: 0,
    usagePercentage: 0,
    swapPercentage: 0,
    status: 'unknown',
    timestamp: null,
  };
}

function percentOf(part: number, whole: number): number {
  return whole > 0 ? (part / whole) * 100 : 0;
}

export class MemorySamplingStrategy implements SamplerStrategy<MemoryCounters | null, MemorySnapshot> {
  constructor(
    private readonly source: RawMetricSource,
    private readonly classification: MemoryClassification,
    private readonly logger: SubsystemLogger,
  ) {}

  async collect(): Promise<MemoryCounters | null> {
    return softRead(() => this.source.readMemoryCounters(), null, this.logger, 'memory counters');
  }

  derive(raw: MemoryCounters | null, previous: MemorySnapshot, now: Date): MemorySnapshot {
    if (!raw) {
      this.logger.debug('Memory counters unavailable, keeping previous values');
      return { ...previous, timestamp: now };
    }

    const usedBytes = raw.total - raw.available;
    const swapUsedBytes = raw.swapTotal - raw.swapFree;
    const derived = {
      totalBytes: raw.total,
      freeBytes: raw.free,
      availableBytes: raw.available,
      usedBytes,
      buffersBytes: raw.buffers,
      cachedBytes: raw.cached,
      swapTotalBytes: raw.swapTotal,
      swapUsedBytes,
      usagePercentage: percentOf(usedBytes, raw.total),
      swapPercentage: percentOf(swapUsedBytes, raw.swapTotal),
    };

    return {
      kind: 'memory',
      ...derived,
      status: classifyMemoryStatus(derived, this.classification),
      timestamp: now,
    };
  }

  validate(snapshot: MemorySnapshot): MemorySnapshot {
    const validated = {
      totalBytes: sanitizeBytes(snapshot.totalBytes),
      freeBytes: sanitizeBytes(snapshot.freeBytes),
      availableBytes: sanitizeBytes(snapshot.availableBytes),
      usedBytes: sanitizeBytes(snapshot.usedBytes),
      buffersBytes: sanitizeBytes(snapshot.buffersBytes),
      cachedBytes: sanitizeBytes(snapshot.cachedBytes),
      swapTotalBytes: sanitizeBytes(snapshot.swapTotalBytes),
      swapUsedBytes: sanitizeBytes(snapshot.swapUsedBytes),
      usagePercentage: roundTo2(clampPercentage(snapshot.usagePercentage)),
      swapPercentage: roundTo2(clampPercentage(snapshot.swapPercentage)),
    };

    if (!Number.isFinite(snapshot.usagePercentage)) {
      this.logger.warn('Memory usage percentage invalid, reset to 0', { usagePercentage: snapshot.usagePercentage });
    }

    return {
      ...snapshot,
      ...validated,
      status: classifyMemoryStatus(validated, this.classification),
    };
  }
}

export interface MemoryMonitor {
  on<E extends keyof MemoryMonitorEvents>(event: E, listener: (...args: MemoryMonitorEvents[E]) => void): this;
  once<E extends keyof MemoryMonitorEvents>(event: E, listener: (...args: MemoryMonitorEvents[E]) => void): this;
  off<E extends keyof MemoryMonitorEvents>(event: E, listener: (...args: MemoryMonitorEvents[E]) => void): this;
  emit<E extends keyof MemoryMonitorEvents>(event: E, ...args: MemoryMonitorEvents[E]): boolean;
}

export class MemoryMonitor extends PeriodicSampler<MemoryCounters | null, MemorySnapshot> {
  private readonly config: MonitorConfig;

  constructor(source: RawMetricSource, options: MemoryMonitorOptions = {}) {
    const config = options.config ?? resolveMonitorConfig();
    const logger = createSubsystemLogger('monitor/memory');

    super(
      'memory',
      new MemorySamplingStrategy(
        source,
        { thresholds: config.thresholds.memory, lowMemoryBytes: config.lowMemoryBytes },
        logger,
      ),
      createInitialMemorySnapshot(),
      { intervalMs: config.updateIntervalMs, historySize: config.historySize },
    );

    this.config = config;
  }

  /**
   * Available memory as a percentage of total
   */
  getMemoryEfficiency(): number {
    const { totalBytes, availableBytes } = this.getCurrentSnapshot();
    return totalBytes > 0 ? roundTo2((availableBytes / totalBytes) * 100) : 0;
  }

  /**
   * Used memory excluding buffers and page cache, in bytes
   */
  getMemoryPressure(): number {
    const { usedBytes, buffersBytes, cachedBytes } = this.getCurrentSnapshot();
    return Math.max(0, usedBytes - buffersBytes - cachedBytes);
  }

  isSwapping(): boolean {
    return this.getCurrentSnapshot().swapUsedBytes > 0;
  }

  protected afterPublish(snapshot: MemorySnapshot): void {
    if (snapshot.status === 'unknown') return;

    const { memory } = this.config.thresholds;
    if (snapshot.usagePercentage >= memory.critical) {
      this.emit('memoryCritical', snapshot.usagePercentage);
    } else if (snapshot.usagePercentage >= memory.warning) {
      this.emit('memoryWarning', snapshot.usagePercentage);
    }

    if (snapshot.swapPercentage > this.config.swapWarningPercent) {
      this.emit('swapWarning', snapshot.swapPercentage);
    }

    if (snapshot.availableBytes < this.config.lowMemoryBytes) {
      this.emit('lowMemory', snapshot.availableBytes);
    }
  }
}
