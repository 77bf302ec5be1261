/**
 * CounterSnapshot Interface
 *
 * Cumulative kernel CPU tick counters as read from one line of /proc/stat.
 * Values are monotonically non-decreasing within one boot epoch.
 */

export interface CounterSnapshot {
  user: number;
  nice: number;
  system: number;
  idle: number;
  iowait: number;
  irq: number;
  softirq: number;
  steal: number;
  /** Capture time in epoch milliseconds */
  timestamp: number;
}

export const COUNTER_FIELDS = ['user', 'nice', 'system', 'idle', 'iowait', 'irq', 'softirq', 'steal'] as const;

export type CounterField = (typeof COUNTER_FIELDS)[number];

/** Sum of every tick field */
export function totalTicks(snapshot: CounterSnapshot): number {
  return COUNTER_FIELDS.reduce((sum, field) => sum + snapshot[field], 0);
}

/** Ticks spent doing nothing useful (idle + iowait) */
export function idleTicks(snapshot: CounterSnapshot): number {
  return snapshot.idle + snapshot.iowait;
}

/**
 * True when any field went backwards, i.e. the counters were reset or wrapped
 */
export function hasRegressed(current: CounterSnapshot, previous: CounterSnapshot): boolean {
  return COUNTER_FIELDS.some((field) => current[field] < previous[field]);
}

/** Memory counters in bytes, already instantaneous */
export interface MemoryCounters {
  total: number;
  free: number;
  available: number;
  buffers: number;
  cached: number;
  swapTotal: number;
  swapFree: number;
}

/** One read of the aggregate and per-core CPU counters; `null` marks an unreadable line */
export interface CpuCounterReading {
  aggregate: CounterSnapshot | null;
  cores: Array<CounterSnapshot | null>;
}
