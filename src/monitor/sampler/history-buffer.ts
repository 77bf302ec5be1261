/**
 * HistoryBuffer
 *
 * Fixed-capacity, insertion-ordered store of published snapshots. The oldest
 * entry is evicted when a push exceeds the capacity.
 */

import { DEFAULT_HISTORY_SIZE, MAX_HISTORY_SIZE, MIN_HISTORY_SIZE } from '../config/configuration.js';

export function clampHistorySize(size: number): number {
  if (!Number.isFinite(size)) return DEFAULT_HISTORY_SIZE;
  return Math.max(MIN_HISTORY_SIZE, Math.min(MAX_HISTORY_SIZE, Math.floor(size)));
}

export class HistoryBuffer<T> {
  private items: T[] = [];
  private capacity: number;

  constructor(capacity: number = DEFAULT_HISTORY_SIZE) {
    this.capacity = clampHistorySize(capacity);
  }

  push(item: T): void {
    this.items.push(item);
    this.trim();
  }

  /**
   * Changes the capacity (clamped to [10, 1000]); shrinking drops the oldest entries.
   * Returns the capacity actually applied.
   */
  resize(capacity: number): number {
    this.capacity = clampHistorySize(capacity);
    this.trim();
    return this.capacity;
  }

  getCapacity(): number {
    return this.capacity;
  }

  get size(): number {
    return this.items.length;
  }

  toArray(): T[] {
    return [...this.items];
  }

  private trim(): void {
    if (this.items.length > this.capacity) {
      this.items.splice(0, this.items.length - this.capacity);
    }
  }
}
