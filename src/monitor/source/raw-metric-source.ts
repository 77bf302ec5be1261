/**
 * RawMetricSource Interface
 *
 * Point-in-time reads of kernel counters. Implementations keep no state of their
 * own and report an unreadable value as `null` instead of rejecting.
 */

import type { CpuCounterReading, MemoryCounters } from '../types/counters.js';

export interface RawMetricSource {
  /** Aggregate and per-core cumulative tick counters */
  readCpuCounters(): Promise<CpuCounterReading>;
  /** Memory counters in bytes */
  readMemoryCounters(): Promise<MemoryCounters | null>;
  /** CPU temperature in Celsius */
  readTemperature(): Promise<number | null>;
  /** Current CPU frequency in MHz */
  readFrequency(): Promise<number | null>;
  /** Number of CPU cores; 0 when it cannot be determined */
  readCoreCount(): Promise<number>;
  readCpuModel(): Promise<string>;
}
