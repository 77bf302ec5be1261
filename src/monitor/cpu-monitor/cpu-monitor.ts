/**
 * CPU Monitor Implementation
 *
 * Samples aggregate and per-core CPU tick counters, temperature and frequency,
 * converts the counters into usage percentages and classifies the result.
 * Temperature takes priority over usage when deciding the status.
 */

import { createSubsystemLogger, type SubsystemLogger } from '../../logging/subsystem.js';
import { MonitorInitializationError } from '../errors.js';
import { PerCoreRateComputer, RateComputer } from '../rate-computer/rate-computer.js';
import { PeriodicSampler, type SamplerEvents, type SamplerStrategy } from '../sampler/periodic-sampler.js';
import { softRead } from '../source/soft-read.js';
import type { RawMetricSource } from '../source/raw-metric-source.js';
import type { CpuCounterReading } from '../types/counters.js';
import type { CpuCoreSnapshot, CpuSnapshot, MetricStatus } from '../types/metric-snapshot.js';
import type { MetricThresholds, MonitorConfig } from '../types/monitor-config.js';
import { resolveMonitorConfig } from '../config/configuration.js';
import { clampPercentage, isValidTemperature, roundTo2 } from '../validation.js';

export interface CpuSample {
  counters: CpuCounterReading;
  temperature: number | null;
  frequency: number | null;
}

export type CpuMonitorEvents = SamplerEvents<CpuSnapshot> & {
  usageWarning: [usage: number];
  usageCritical: [usage: number];
  temperatureWarning: [temperature: number];
  temperatureCritical: [temperature: number];
};

export interface CpuMonitorOptions {
  coreCount: number;
  model?: string;
  config?: MonitorConfig;
}

type CpuThresholds = Pick<MetricThresholds, 'cpu' | 'temperature'>;

/**
 * Temperature thresholds first, then usage thresholds, else normal
 */
export function classifyCpuStatus(usage: number, temperature: number | null, thresholds: CpuThresholds): MetricStatus {
  if (temperature !== null) {
    if (temperature >= thresholds.temperature.critical) return 'critical';
    if (temperature >= thresholds.temperature.warning) return 'warning';
  }
  if (usage >= thresholds.cpu.critical) return 'critical';
  if (usage >= thresholds.cpu.warning) return 'warning';
  return 'normal';
}

export function createInitialCpuSnapshot(coreCount: number, model: string): CpuSnapshot {
  return {
    kind: 'cpu',
    model,
    coreCount,
    totalUsage: 0,
    cores: Array.from({ length: coreCount }, (_, coreId) => ({
      coreId,
      usage: 0,
      frequency: null,
      temperature: null,
    })),
    temperature: null,
    frequency: null,
    status: 'unknown',
    timestamp: null,
  };
}

function assertCoreCount(coreCount: number): number {
  if (!Number.isInteger(coreCount) || coreCount <= 0) {
    throw new MonitorInitializationError(`Cannot monitor CPU: invalid core count ${String(coreCount)}`);
  }
  return coreCount;
}

export class CpuSamplingStrategy implements SamplerStrategy<CpuSample, CpuSnapshot> {
  private readonly aggregate = new RateComputer();
  private readonly perCore: PerCoreRateComputer;

  constructor(
    private readonly source: RawMetricSource,
    private readonly coreCount: number,
    private readonly thresholds: CpuThresholds,
    private readonly logger: SubsystemLogger,
  ) {
    this.perCore = new PerCoreRateComputer(coreCount);
  }

  async collect(): Promise<CpuSample> {
    const unavailable: CpuCounterReading = { aggregate: null, cores: [] };
    const [counters, temperature, frequency] = await Promise.all([
      softRead(() => this.source.readCpuCounters(), unavailable, this.logger, 'cpu counters'),
      softRead(() => this.source.readTemperature(), null, this.logger, 'temperature'),
      softRead(() => this.source.readFrequency(), null, this.logger, 'frequency'),
    ]);
    return { counters, temperature, frequency };
  }

  reset(): void {
    this.aggregate.reset();
    this.perCore.reset();
  }

  derive(raw: CpuSample, previous: CpuSnapshot, now: Date): CpuSnapshot {
    // Unreadable aggregate counters keep the last usage and leave the baseline untouched
    const totalUsage = raw.counters.aggregate ? this.aggregate.update(raw.counters.aggregate) : previous.totalUsage;

    const cores: CpuCoreSnapshot[] = this.perCore.update(raw.counters.cores).map((usage, coreId) => ({
      coreId,
      usage,
      frequency: raw.frequency,
      temperature: raw.temperature,
    }));

    return {
      kind: 'cpu',
      model: previous.model,
      coreCount: this.coreCount,
      totalUsage,
      cores,
      temperature: raw.temperature,
      frequency: raw.frequency,
      status: classifyCpuStatus(totalUsage, raw.temperature, this.thresholds),
      timestamp: now,
    };
  }

  validate(snapshot: CpuSnapshot): CpuSnapshot {
    let temperature = snapshot.temperature;
    if (temperature !== null && !isValidTemperature(temperature)) {
      this.logger.warn('Temperature reading out of range, treating as unavailable', { temperature });
      temperature = null;
    }

    let frequency = snapshot.frequency;
    if (frequency !== null && !(Number.isFinite(frequency) && frequency > 0)) {
      this.logger.warn('Frequency reading out of range, treating as unavailable', { frequency });
      frequency = null;
    }

    const totalUsage = roundTo2(clampPercentage(snapshot.totalUsage));
    const cores = snapshot.cores.map((core) => ({
      ...core,
      usage: roundTo2(clampPercentage(core.usage)),
      frequency,
      temperature,
    }));

    return {
      ...snapshot,
      totalUsage,
      cores,
      temperature,
      frequency,
      status: classifyCpuStatus(totalUsage, temperature, this.thresholds),
    };
  }
}

export interface CpuMonitor {
  on<E extends keyof CpuMonitorEvents>(event: E, listener: (...args: CpuMonitorEvents[E]) => void): this;
  once<E extends keyof CpuMonitorEvents>(event: E, listener: (...args: CpuMonitorEvents[E]) => void): this;
  off<E extends keyof CpuMonitorEvents>(event: E, listener: (...args: CpuMonitorEvents[E]) => void): this;
  emit<E extends keyof CpuMonitorEvents>(event: E, ...args: CpuMonitorEvents[E]): boolean;
}

export class CpuMonitor extends PeriodicSampler<CpuSample, CpuSnapshot> {
  private readonly thresholds: CpuThresholds;

  /**
   * @throws MonitorInitializationError when `coreCount` is not a positive integer
   */
  constructor(source: RawMetricSource, options: CpuMonitorOptions) {
    const config = options.config ?? resolveMonitorConfig();
    const coreCount = assertCoreCount(options.coreCount);
    const logger = createSubsystemLogger('monitor/cpu');

    super(
      'cpu',
      new CpuSamplingStrategy(source, coreCount, config.thresholds, logger),
      createInitialCpuSnapshot(coreCount, options.model ?? 'Unknown'),
      { intervalMs: config.updateIntervalMs, historySize: config.historySize },
    );

    this.thresholds = config.thresholds;
  }

  getCoreCount(): number {
    return this.getCurrentSnapshot().coreCount;
  }

  getModel(): string {
    return this.getCurrentSnapshot().model;
  }

  /**
   * Emits the threshold events once every `snapshot` listener has run
   */
  protected afterPublish(snapshot: CpuSnapshot): void {
    if (snapshot.temperature !== null) {
      if (snapshot.temperature >= this.thresholds.temperature.critical) {
        this.emit('temperatureCritical', snapshot.temperature);
      } else if (snapshot.temperature >= this.thresholds.temperature.warning) {
        this.emit('temperatureWarning', snapshot.temperature);
      }
    }

    if (snapshot.totalUsage >= this.thresholds.cpu.critical) {
      this.emit('usageCritical', snapshot.totalUsage);
    } else if (snapshot.totalUsage >= this.thresholds.cpu.warning) {
      this.emit('usageWarning', snapshot.totalUsage);
    }
  }
}
