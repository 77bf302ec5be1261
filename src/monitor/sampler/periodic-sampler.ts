/**
 * Periodic Sampler Implementation
 *
 * Generic scheduled-sampling lifecycle shared by every metric monitor. A sampler
 * owns a timer, the latest published snapshot and a bounded history. Each tick
 * runs collect → derive → validate from a SamplerStrategy and then publishes
 * the result, all under one exclusive lock so ticks of the same sampler never
 * overlap. Readers and listeners get frozen copies of published snapshots.
 */

import { EventEmitter } from 'node:events';
import { createSubsystemLogger, errorMeta, type SubsystemLogger } from '../../logging/subsystem.js';
import { DEFAULT_UPDATE_INTERVAL_MS, MIN_UPDATE_INTERVAL_MS } from '../config/configuration.js';
import { deepFreeze, frozenCopy } from '../immutable.js';
import { ExclusiveLock } from './exclusive-lock.js';
import { HistoryBuffer } from './history-buffer.js';

export interface SamplerStrategy<TRaw, TSnapshot> {
  /** Reads raw counters; soft read failures should resolve to "unavailable" values, not reject */
  collect(): Promise<TRaw>;
  /** Turns raw counters into a snapshot; `previous` is the last published snapshot */
  derive(raw: TRaw, previous: TSnapshot, now: Date): TSnapshot;
  /** Clamps or resets out-of-range values */
  validate(snapshot: TSnapshot): TSnapshot;
  /** Drops rate baselines; called on every start */
  reset?(): void;
}

export interface SamplerOptions {
  intervalMs?: number;
  historySize?: number;
}

/** Listener arguments per event */
export type SamplerEvents<TSnapshot> = {
  started: [info: { name: string; intervalMs: number }];
  stopped: [info: { name: string }];
  paused: [];
  resumed: [];
  intervalChanged: [intervalMs: number];
  snapshot: [snapshot: TSnapshot];
  monitoringError: [error: Error];
};

export function clampInterval(intervalMs: number): number {
  if (!Number.isFinite(intervalMs)) return MIN_UPDATE_INTERVAL_MS;
  return Math.max(MIN_UPDATE_INTERVAL_MS, Math.floor(intervalMs));
}

export interface PeriodicSampler<TRaw, TSnapshot extends object> {
  on<E extends keyof SamplerEvents<TSnapshot>>(event: E, listener: (...args: SamplerEvents<TSnapshot>[E]) => void): this;
  once<E extends keyof SamplerEvents<TSnapshot>>(event: E, listener: (...args: SamplerEvents<TSnapshot>[E]) => void): this;
  off<E extends keyof SamplerEvents<TSnapshot>>(event: E, listener: (...args: SamplerEvents<TSnapshot>[E]) => void): this;
  emit<E extends keyof SamplerEvents<TSnapshot>>(event: E, ...args: SamplerEvents<TSnapshot>[E]): boolean;
}

export class PeriodicSampler<TRaw, TSnapshot extends object> extends EventEmitter {
  readonly name: string;
  protected readonly logger: SubsystemLogger;
  private readonly strategy: SamplerStrategy<TRaw, TSnapshot>;
  private readonly lock = new ExclusiveLock();
  private readonly history: HistoryBuffer<TSnapshot>;
  private timer?: NodeJS.Timeout;
  private running = false;
  private paused = false;
  private intervalMs: number;
  private current: TSnapshot;
  private lastUpdateAt: Date | null = null;

  constructor(
    name: string,
    strategy: SamplerStrategy<TRaw, TSnapshot>,
    initialSnapshot: TSnapshot,
    options: SamplerOptions = {},
  ) {
    super();
    this.name = name;
    this.logger = createSubsystemLogger(`monitor/${name}`);
    this.strategy = strategy;
    this.current = deepFreeze(initialSnapshot);
    this.intervalMs = clampInterval(options.intervalMs ?? DEFAULT_UPDATE_INTERVAL_MS);
    this.history = new HistoryBuffer<TSnapshot>(options.historySize);
  }

  /**
   * Starts ticking; the first tick fires one interval from now
   */
  start(): void {
    if (this.running) return;

    this.running = true;
    this.paused = false;
    this.strategy.reset?.();
    this.schedule();

    this.logger.info('Sampler started', { intervalMs: this.intervalMs });
    super.emit('started', { name: this.name, intervalMs: this.intervalMs });
  }

  /**
   * Cancels the timer and waits for an in-flight tick to finish.
   * No tick runs after the returned promise resolves.
   */
  async stop(): Promise<void> {
    if (!this.running) {
      await this.lock.idle();
      return;
    }

    this.clearTimer();
    this.running = false;
    this.paused = false;

    await this.lock.idle();
    // restarted while waiting
    if (this.running) return;

    this.logger.info('Sampler stopped');
    super.emit('stopped', { name: this.name });
  }

  /**
   * Skips ticks until resumed; skipped ticks are not replayed
   */
  pause(): void {
    if (this.paused) return;
    this.paused = true;
    this.logger.debug('Sampler paused');
    super.emit('paused');
  }

  resume(): void {
    if (!this.paused) return;
    this.paused = false;
    this.logger.debug('Sampler resumed');
    super.emit('resumed');
  }

  /**
   * Sets the tick period (minimum 100ms), rescheduling immediately if running
   */
  setUpdateInterval(intervalMs: number): void {
    this.intervalMs = clampInterval(intervalMs);
    if (this.running) {
      this.clearTimer();
      this.schedule();
    }
    super.emit('intervalChanged', this.intervalMs);
  }

  getUpdateInterval(): number {
    return this.intervalMs;
  }

  isRunning(): boolean {
    return this.running;
  }

  isPaused(): boolean {
    return this.paused;
  }

  getLastUpdateAt(): Date | null {
    return this.lastUpdateAt ? new Date(this.lastUpdateAt.getTime()) : null;
  }

  /**
   * True when nothing has been published within `maxAgeMs`
   */
  isStale(maxAgeMs = 5000): boolean {
    if (!this.lastUpdateAt) return true;
    return Date.now() - this.lastUpdateAt.getTime() > maxAgeMs;
  }

  getCurrentSnapshot(): TSnapshot {
    return frozenCopy(this.current);
  }

  getHistory(): TSnapshot[] {
    return this.history.toArray().map((snapshot) => frozenCopy(snapshot));
  }

  /**
   * Resizes the history (clamped to [10, 1000]), returning the applied size
   */
  setHistorySize(size: number): number {
    return this.history.resize(size);
  }

  getHistorySize(): number {
    return this.history.getCapacity();
  }

  /**
   * Runs one tick now, outside the timer and regardless of pause, and returns
   * the snapshot current afterwards
   */
  async sampleNow(): Promise<TSnapshot> {
    return this.lock.runExclusive(async () => {
      await this.runPhases();
      return frozenCopy(this.current);
    });
  }

  private schedule(): void {
    this.timer = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
  }

  private clearTimer(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  private async tick(): Promise<void> {
    if (!this.running || this.paused) return;

    if (this.lock.isLocked()) {
      this.logger.debug('Skipping tick, previous tick still in progress');
      return;
    }

    await this.lock.runExclusive(() => this.runPhases());
  }

  /**
   * Runs after the `snapshot` listeners of every published tick
   */
  protected afterPublish(_snapshot: TSnapshot): void {}

  private async runPhases(): Promise<void> {
    const snapshot = await this.sample();
    if (snapshot) this.publish(snapshot);
  }

  private async sample(): Promise<TSnapshot | null> {
    try {
      const raw = await this.strategy.collect();
      const derived = this.strategy.derive(raw, this.current, new Date());
      return this.strategy.validate(derived);
    } catch (error) {
      this.logger.error('Sampler tick failed, keeping previous snapshot', errorMeta(error));
      super.emit('monitoringError', toError(error));
      return null;
    }
  }

  private publish(snapshot: TSnapshot): void {
    const published = deepFreeze(snapshot);
    this.current = published;
    this.history.push(published);
    this.lastUpdateAt = new Date();

    this.notify(() => super.emit('snapshot', frozenCopy(published)));
    this.notify(() => this.afterPublish(published));
  }

  /**
   * A throwing listener does not undo the publish or stop the remaining notifications
   */
  private notify(deliver: () => void): void {
    try {
      deliver();
    } catch (error) {
      this.logger.error('Snapshot listener failed', errorMeta(error));
      super.emit('monitoringError', toError(error));
    }
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
