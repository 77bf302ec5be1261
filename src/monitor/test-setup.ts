/**
 * Test Utilities for hostwatch
 *
 * Shared fast-check generators, builders for raw counters and an in-memory
 * RawMetricSource whose readings tests set directly.
 */

import * as fc from 'fast-check';
import type { RawMetricSource } from './source/raw-metric-source.js';
import type { CounterSnapshot, CpuCounterReading, MemoryCounters } from './types/counters.js';

const MiB = 1024 * 1024;

/**
 * Builds a counter snapshot with every unspecified field at zero
 */
export function makeCounters(fields: Partial<CounterSnapshot> = {}): CounterSnapshot {
  return {
    user: 0,
    nice: 0,
    system: 0,
    idle: 0,
    iowait: 0,
    irq: 0,
    softirq: 0,
    steal: 0,
    timestamp: 0,
    ...fields,
  };
}

export function makeMemoryCounters(fields: Partial<MemoryCounters> = {}): MemoryCounters {
  return {
    total: 1000 * MiB,
    free: 500 * MiB,
    available: 600 * MiB,
    buffers: 0,
    cached: 0,
    swapTotal: 0,
    swapFree: 0,
    ...fields,
  };
}

/**
 * RawMetricSource with directly settable readings
 */
export class FakeMetricSource implements RawMetricSource {
  coreCount = 2;
  model = 'Test CPU';
  cpu: CpuCounterReading = { aggregate: null, cores: [null, null] };
  memory: MemoryCounters | null = makeMemoryCounters();
  temperature: number | null = null;
  frequency: number | null = null;
  /** When set, readCoreCount rejects with it */
  coreCountError: Error | null = null;
  /** When set, readMemoryCounters rejects with it */
  memoryError: Error | null = null;
  cpuReads = 0;
  memoryReads = 0;

  /** Sets the aggregate and per-core counters from (total, idle) tick pairs */
  setCpuTicks(aggregate: [number, number], cores: Array<[number, number]> = []): void {
    const toCounters = ([total, idle]: [number, number]): CounterSnapshot =>
      makeCounters({ user: total - idle, idle });
    this.cpu = { aggregate: toCounters(aggregate), cores: cores.map(toCounters) };
  }

  async readCpuCounters(): Promise<CpuCounterReading> {
    this.cpuReads++;
    return this.cpu;
  }

  async readMemoryCounters(): Promise<MemoryCounters | null> {
    this.memoryReads++;
    if (this.memoryError) throw this.memoryError;
    return this.memory;
  }

  async readTemperature(): Promise<number | null> {
    return this.temperature;
  }

  async readFrequency(): Promise<number | null> {
    return this.frequency;
  }

  async readCoreCount(): Promise<number> {
    if (this.coreCountError) throw this.coreCountError;
    return this.coreCount;
  }

  async readCpuModel(): Promise<string> {
    return this.model;
  }
}

/**
 * Fast-check generators
 */

const tickArbitrary = fc.integer({ min: 0, max: 1_000_000_000 });

export const counterSnapshotArbitrary: fc.Arbitrary<CounterSnapshot> = fc.record({
  user: tickArbitrary,
  nice: tickArbitrary,
  system: tickArbitrary,
  idle: tickArbitrary,
  iowait: tickArbitrary,
  irq: tickArbitrary,
  softirq: tickArbitrary,
  steal: tickArbitrary,
  timestamp: fc.nat(),
});

/** A pair of snapshots where every field of the second is >= the first */
export const monotonicCounterPairArbitrary: fc.Arbitrary<[CounterSnapshot, CounterSnapshot]> = fc
  .tuple(counterSnapshotArbitrary, counterSnapshotArbitrary)
  .map(([previous, increments]): [CounterSnapshot, CounterSnapshot] => [
    previous,
    {
      user: previous.user + increments.user,
      nice: previous.nice + increments.nice,
      system: previous.system + increments.system,
      idle: previous.idle + increments.idle,
      iowait: previous.iowait + increments.iowait,
      irq: previous.irq + increments.irq,
      softirq: previous.softirq + increments.softirq,
      steal: previous.steal + increments.steal,
      timestamp: previous.timestamp + increments.timestamp,
    },
  ]);

export const memoryCountersArbitrary: fc.Arbitrary<MemoryCounters> = fc
  .record({
    total: fc.integer({ min: 64 * MiB, max: 64 * 1024 * MiB }),
    availableRatio: fc.double({ min: 0, max: 1, noNaN: true }),
    swapTotal: fc.integer({ min: 0, max: 8 * 1024 * MiB }),
    swapFreeRatio: fc.double({ min: 0, max: 1, noNaN: true }),
  })
  .map(({ total, availableRatio, swapTotal, swapFreeRatio }) => {
    const available = Math.floor(total * availableRatio);
    return {
      total,
      free: available,
      available,
      buffers: 0,
      cached: 0,
      swapTotal,
      swapFree: Math.floor(swapTotal * swapFreeRatio),
    };
  });

/** A sequence of metric values in [0, 100] with timestamps advancing by 0..60s */
export const valueSeriesArbitrary: fc.Arbitrary<Array<{ value: number; advanceMs: number }>> = fc.array(
  fc.record({
    value: fc.double({ min: 0, max: 100, noNaN: true }),
    advanceMs: fc.integer({ min: 0, max: 60_000 }),
  }),
  { minLength: 1, maxLength: 50 },
);

/**
 * Test configuration for property-based tests
 */
export const propertyTestConfig = {
  numRuns: 30,
  timeout: 5000,
  verbose: false,
};
