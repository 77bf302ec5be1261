/**
 * Rate Computer Implementation
 *
 * Turns consecutive cumulative CPU tick counters into a usage percentage.
 * A non-positive total delta (first sample, counter reset or wraparound)
 * yields 0 for that tick only; the next positive delta recovers.
 */

import { hasRegressed, idleTicks, totalTicks, type CounterSnapshot } from '../types/counters.js';
import { clampPercentage } from '../validation.js';

/**
 * usage = 100 × (1 − idleDelta / totalDelta), clamped to [0, 100]
 */
export function computeUsage(
  currentTotal: number,
  currentIdle: number,
  previousTotal: number,
  previousIdle: number,
): number {
  const totalDelta = currentTotal - previousTotal;
  if (!(totalDelta > 0)) {
    return 0;
  }

  const idleDelta = currentIdle - previousIdle;
  return clampPercentage((1 - idleDelta / totalDelta) * 100);
}

/**
 * Usage between two counter snapshots; any regressed field counts as a reset
 */
export function computeSnapshotUsage(current: CounterSnapshot, previous: CounterSnapshot): number {
  if (hasRegressed(current, previous)) {
    return 0;
  }
  return computeUsage(totalTicks(current), idleTicks(current), totalTicks(previous), idleTicks(previous));
}

export class RateComputer {
  private previous?: CounterSnapshot;

  /**
   * Feeds the next snapshot and returns usage since the previous one
   */
  update(current: CounterSnapshot): number {
    const previous = this.previous;
    this.previous = { ...current };
    return previous ? computeSnapshotUsage(current, previous) : 0;
  }

  reset(): void {
    this.previous = undefined;
  }
}

/**
 * Applies the same computation independently per core. A core whose counters
 * are missing keeps both its previous counters and its previous usage.
 */
export class PerCoreRateComputer {
  readonly coreCount: number;
  private readonly computers: RateComputer[];
  private readonly usage: number[];

  constructor(coreCount: number) {
    this.coreCount = coreCount;
    this.computers = Array.from({ length: coreCount }, () => new RateComputer());
    this.usage = new Array<number>(coreCount).fill(0);
  }

  update(cores: ReadonlyArray<CounterSnapshot | null>): number[] {
    this.computers.forEach((computer, index) => {
      const current = cores[index];
      if (current) {
        this.usage[index] = computer.update(current);
      }
    });
    return [...this.usage];
  }

  reset(): void {
    this.computers.forEach((computer) => computer.reset());
    this.usage.fill(0);
  }
}
