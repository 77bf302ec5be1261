/**
 * Metric Snapshot Types
 *
 * Immutable values produced once per sampler tick. Temperature and frequency
 * are `null` when the sensor is unavailable, which is distinct from a reading of zero.
 */

export type MetricStatus = 'unknown' | 'normal' | 'warning' | 'critical';

export type MetricKind = 'cpu' | 'memory';

export interface CpuCoreSnapshot {
  readonly coreId: number;
  /** Usage percentage (0-100) */
  readonly usage: number;
  /** Frequency in MHz */
  readonly frequency: number | null;
  /** Temperature in Celsius */
  readonly temperature: number | null;
}

export interface CpuSnapshot {
  readonly kind: 'cpu';
  readonly model: string;
  readonly coreCount: number;
  /** Aggregate usage percentage (0-100) */
  readonly totalUsage: number;
  readonly cores: readonly CpuCoreSnapshot[];
  /** Package temperature in Celsius */
  readonly temperature: number | null;
  /** Average frequency in MHz */
  readonly frequency: number | null;
  readonly status: MetricStatus;
  /** `null` until the first publish */
  readonly timestamp: Date | null;
}

export interface MemorySnapshot {
  readonly kind: 'memory';
  readonly totalBytes: number;
  readonly freeBytes: number;
  readonly availableBytes: number;
  readonly usedBytes: number;
  readonly buffersBytes: number;
  readonly cachedBytes: number;
  readonly swapTotalBytes: number;
  readonly swapUsedBytes: number;
  /** used / total (0-100) */
  readonly usagePercentage: number;
  /** swapUsed / swapTotal (0-100) */
  readonly swapPercentage: number;
  readonly status: MetricStatus;
  readonly timestamp: Date | null;
}

export type MetricSnapshot = CpuSnapshot | MemorySnapshot;

export interface SystemOverview {
  readonly cpu: CpuSnapshot | null;
  readonly memory: MemorySnapshot | null;
  /** Time of the last aggregation tick */
  readonly timestamp: Date | null;
}

/**
 * A snapshot is valid once it has been published and classified
 */
export function isValidSnapshot(snapshot: MetricSnapshot | null): snapshot is MetricSnapshot {
  return snapshot !== null && snapshot.timestamp !== null && snapshot.status !== 'unknown';
}
