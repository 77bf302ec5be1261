/**
 * Aggregation Coordinator
 *
 * Owns the CPU and memory monitors and the alert engine. Keeps a combined
 * system overview up to date from the monitors' snapshots, feeds every snapshot
 * to the alert engine and republishes the overview on its own timer once both
 * monitors have produced valid data.
 */

import { EventEmitter } from 'node:events';
import { createSubsystemLogger, errorMeta } from '../../logging/subsystem.js';
import { AlertEngine } from '../alert-engine/alert-engine.js';
import { resolveMonitorConfig, type MonitorConfigInput } from '../config/configuration.js';
import { CpuMonitor } from '../cpu-monitor/cpu-monitor.js';
import { MonitorInitializationError } from '../errors.js';
import { MemoryMonitor } from '../memory-monitor/memory-monitor.js';
import { clampHistorySize } from '../sampler/history-buffer.js';
import { clampInterval } from '../sampler/periodic-sampler.js';
import { ProcMetricSource, type ProcPaths } from '../source/proc-metric-source.js';
import type { RawMetricSource } from '../source/raw-metric-source.js';
import type { Alert } from '../types/alert.js';
import {
  isValidSnapshot,
  type CpuSnapshot,
  type MemorySnapshot,
  type MetricKind,
  type SystemOverview,
} from '../types/metric-snapshot.js';
import type { MonitorConfig } from '../types/monitor-config.js';

export type CoordinatorEvents = {
  initialized: [];
  initializationFailed: [error: MonitorInitializationError];
  /** `active` is true while running and not paused */
  monitoringStateChanged: [active: boolean];
  overviewUpdated: [overview: SystemOverview];
  monitoringError: [error: Error, source: MetricKind];
};

interface Monitors {
  cpu: CpuMonitor;
  memory: MemoryMonitor;
}

export interface AggregationCoordinator {
  on<E extends keyof CoordinatorEvents>(event: E, listener: (...args: CoordinatorEvents[E]) => void): this;
  once<E extends keyof CoordinatorEvents>(event: E, listener: (...args: CoordinatorEvents[E]) => void): this;
  off<E extends keyof CoordinatorEvents>(event: E, listener: (...args: CoordinatorEvents[E]) => void): this;
  emit<E extends keyof CoordinatorEvents>(event: E, ...args: CoordinatorEvents[E]): boolean;
}

export class AggregationCoordinator extends EventEmitter {
  readonly alerts: AlertEngine;
  private readonly logger = createSubsystemLogger('monitor/coordinator');
  private readonly source: RawMetricSource;
  private readonly config: MonitorConfig;
  private monitors: Monitors | null = null;
  private initializing?: Promise<boolean>;
  private initializationError?: MonitorInitializationError;
  private aggregationTimer?: NodeJS.Timeout;
  private running = false;
  private paused = false;
  /** Bumped by every stop() so that a start() still initializing gives up */
  private stopGeneration = 0;
  private intervalMs: number;
  private historySize: number;
  private overview: SystemOverview = { cpu: null, memory: null, timestamp: null };

  constructor(source: RawMetricSource = new ProcMetricSource(), config: MonitorConfigInput = {}) {
    super();
    this.source = source;
    this.config = resolveMonitorConfig(config);
    this.intervalMs = this.config.updateIntervalMs;
    this.historySize = this.config.historySize;
    this.alerts = new AlertEngine(this.config);
  }

  /**
   * Reads the host's core count and CPU model and builds the monitors.
   * A failure is reported once; later calls resolve to false.
   */
  async initialize(): Promise<boolean> {
    if (this.monitors) return true;
    if (this.initializationError) return false;

    if (!this.initializing) {
      this.initializing = this.createMonitors().finally(() => {
        this.initializing = undefined;
      });
    }
    return this.initializing;
  }

  /**
   * Starts the monitors, the aggregation timer and alert cleanup.
   * Returns false when initialization fails or stop() is called meanwhile.
   */
  async start(): Promise<boolean> {
    const generation = this.stopGeneration;
    const initialized = await this.initialize();
    if (!initialized || !this.monitors) return false;
    if (generation !== this.stopGeneration) {
      this.logger.info('Start abandoned, stopped during initialization');
      return false;
    }
    if (this.running) return true;

    this.running = true;
    this.paused = false;
    this.monitors.cpu.start();
    this.monitors.memory.start();
    this.scheduleAggregation();
    this.alerts.startCleanup();

    this.logger.info('Monitoring started', { intervalMs: this.intervalMs });
    this.emit('monitoringStateChanged', true);
    return true;
  }

  /**
   * Stops all timers and waits for in-flight monitor ticks
   */
  async stop(): Promise<void> {
    this.stopGeneration++;
    const wasRunning = this.running;
    this.running = false;
    this.paused = false;
    this.clearAggregation();
    this.alerts.stopCleanup();

    if (this.monitors) {
      await Promise.all([this.monitors.cpu.stop(), this.monitors.memory.stop()]);
    }

    if (wasRunning && !this.running) {
      this.logger.info('Monitoring stopped');
      this.emit('monitoringStateChanged', false);
    }
  }

  pause(): void {
    if (!this.running || this.paused || !this.monitors) return;

    this.paused = true;
    this.monitors.cpu.pause();
    this.monitors.memory.pause();
    this.clearAggregation();

    this.logger.info('Monitoring paused');
    this.emit('monitoringStateChanged', false);
  }

  resume(): void {
    if (!this.running || !this.paused || !this.monitors) return;

    this.paused = false;
    this.monitors.cpu.resume();
    this.monitors.memory.resume();
    this.scheduleAggregation();

    this.logger.info('Monitoring resumed');
    this.emit('monitoringStateChanged', true);
  }

  /**
   * Applies a new tick period (minimum 100ms) to the monitors and the aggregation timer
   */
  setUpdateInterval(intervalMs: number): number {
    this.intervalMs = clampInterval(intervalMs);

    if (this.monitors) {
      this.monitors.cpu.setUpdateInterval(this.intervalMs);
      this.monitors.memory.setUpdateInterval(this.intervalMs);
    }
    if (this.aggregationTimer) {
      this.clearAggregation();
      this.scheduleAggregation();
    }
    return this.intervalMs;
  }

  getUpdateInterval(): number {
    return this.intervalMs;
  }

  /**
   * Applies a history size to both monitors, returning the clamped value
   */
  setHistorySize(size: number): number {
    if (this.monitors) {
      this.historySize = this.monitors.cpu.setHistorySize(size);
      this.monitors.memory.setHistorySize(size);
    } else {
      this.historySize = clampHistorySize(size);
    }
    return this.historySize;
  }

  getCurrentOverview(): SystemOverview {
    return structuredClone(this.overview);
  }

  getCurrentCpuSnapshot(): CpuSnapshot | null {
    return this.monitors ? this.monitors.cpu.getCurrentSnapshot() : null;
  }

  getCurrentMemorySnapshot(): MemorySnapshot | null {
    return this.monitors ? this.monitors.memory.getCurrentSnapshot() : null;
  }

  getCpuMonitor(): CpuMonitor | null {
    return this.monitors ? this.monitors.cpu : null;
  }

  getMemoryMonitor(): MemoryMonitor | null {
    return this.monitors ? this.monitors.memory : null;
  }

  isInitialized(): boolean {
    return this.monitors !== null;
  }

  isRunning(): boolean {
    return this.running;
  }

  isPaused(): boolean {
    return this.paused;
  }

  acknowledge(alertId: number): boolean {
    return this.alerts.acknowledge(alertId);
  }

  getActiveAlerts(): Alert[] {
    return this.alerts.getActiveAlerts();
  }

  getAllAlerts(): Alert[] {
    return this.alerts.getAllAlerts();
  }

  private async createMonitors(): Promise<boolean> {
    try {
      const [coreCount, model] = await Promise.all([this.source.readCoreCount(), this.source.readCpuModel()]);
      const config: MonitorConfig = { ...this.config, updateIntervalMs: this.intervalMs };

      const cpu = new CpuMonitor(this.source, { coreCount, model, config });
      const memory = new MemoryMonitor(this.source, { config });
      cpu.setHistorySize(this.historySize);
      this.historySize = memory.setHistorySize(this.historySize);

      this.wireMonitors({ cpu, memory });
      this.monitors = { cpu, memory };

      this.logger.info('Monitors initialized', { coreCount, model });
      this.emit('initialized');
      return true;
    } catch (error) {
      const failure =
        error instanceof MonitorInitializationError
          ? error
          : new MonitorInitializationError('Failed to initialize monitors', { cause: error });
      this.initializationError = failure;

      this.logger.error('Monitor initialization failed', errorMeta(failure));
      this.emit('initializationFailed', failure);
      return false;
    }
  }

  private wireMonitors({ cpu, memory }: Monitors): void {
    cpu.on('snapshot', (snapshot) => {
      this.overview = { ...this.overview, cpu: structuredClone(snapshot) };
      this.alerts.evaluateCpu(snapshot);
    });
    memory.on('snapshot', (snapshot) => {
      this.overview = { ...this.overview, memory: structuredClone(snapshot) };
      this.alerts.evaluateMemory(snapshot);
    });

    cpu.on('monitoringError', (error) => this.emit('monitoringError', error, 'cpu'));
    memory.on('monitoringError', (error) => this.emit('monitoringError', error, 'memory'));
  }

  private scheduleAggregation(): void {
    this.aggregationTimer = setInterval(() => {
      this.aggregate();
    }, this.intervalMs);
  }

  private clearAggregation(): void {
    if (this.aggregationTimer) {
      clearInterval(this.aggregationTimer);
      this.aggregationTimer = undefined;
    }
  }

  private aggregate(): void {
    if (!isValidSnapshot(this.overview.cpu) || !isValidSnapshot(this.overview.memory)) {
      return;
    }

    this.overview = { ...this.overview, timestamp: new Date() };
    this.emit('overviewUpdated', this.getCurrentOverview());
  }
}

export interface HostMonitorOptions {
  /** Overrides for the procfs/sysfs file locations */
  paths?: Partial<ProcPaths>;
  config?: MonitorConfigInput;
}

/**
 * Creates an uninitialized coordinator reading this host's procfs and sysfs
 */
export function createHostMonitor(options: HostMonitorOptions = {}): AggregationCoordinator {
  return new AggregationCoordinator(new ProcMetricSource(options.paths), options.config);
}
