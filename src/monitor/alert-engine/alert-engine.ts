/**
 * Alert Engine Implementation
 *
 * Classifies metric snapshots against warning/critical thresholds and raises
 * de-duplicated alerts. Each (source, severity) pair has its own state: an alert
 * fires on the first crossing, then again only after the cooldown has elapsed
 * while the condition persists. Dropping below the warning threshold clears both
 * states of the source without emitting anything.
 *
 * Fired alerts go into a bounded log. Acknowledged alerts older than the
 * retention window are removed by a periodic cleanup task.
 */

import { EventEmitter } from 'node:events';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import { MAX_ALERT_HISTORY, MIN_ALERT_HISTORY, MIN_CLEANUP_INTERVAL_MS, resolveMonitorConfig } from '../config/configuration.js';
import type {
  Alert,
  AlertCounts,
  AlertInput,
  AlertSource,
  AlertState,
  ThresholdSeverity,
} from '../types/alert.js';
import type { CpuSnapshot, MemorySnapshot } from '../types/metric-snapshot.js';
import type { MetricThresholds, MonitorConfig, ThresholdPair } from '../types/monitor-config.js';

export type AlertEngineEvents = {
  alertAdded: [alert: Alert];
  criticalAlert: [alert: Alert];
  alertAcknowledged: [alertId: number];
  alertCountChanged: [counts: AlertCounts];
};

type StateKey = `${AlertSource}:${ThresholdSeverity}`;

const ALERT_SOURCES: readonly AlertSource[] = ['cpu', 'memory', 'temperature'];
const THRESHOLD_SEVERITIES: readonly ThresholdSeverity[] = ['warning', 'critical'];

const SOURCE_UNITS: Record<AlertSource, string> = {
  cpu: '%',
  memory: '%',
  temperature: '°C',
};

const SOURCE_LABELS: Record<AlertSource, string> = {
  cpu: 'CPU',
  memory: 'Memory',
  temperature: 'Temperature',
};

function stateKey(source: AlertSource, severity: ThresholdSeverity): StateKey {
  return `${source}:${severity}`;
}

function cloneAlert(alert: Alert): Alert {
  return { ...alert, timestamp: new Date(alert.timestamp.getTime()) };
}

export function clampAlertHistory(maxCount: number): number {
  if (!Number.isFinite(maxCount)) return MAX_ALERT_HISTORY;
  return Math.max(MIN_ALERT_HISTORY, Math.min(MAX_ALERT_HISTORY, Math.floor(maxCount)));
}

/**
 * Builds the title and message of a threshold alert
 */
export function describeThresholdAlert(source: AlertSource, severity: ThresholdSeverity, value: number): AlertInput {
  const unit = SOURCE_UNITS[source];
  const level = severity === 'critical' ? 'Critical' : 'Warning';
  const formatted = `${value.toFixed(1)}${unit}`;

  let message: string;
  switch (source) {
    case 'cpu':
      message = severity === 'critical'
        ? `CPU usage exceeded critical threshold: ${formatted}`
        : `CPU usage high: ${formatted}`;
      break;
    case 'memory':
      message = severity === 'critical' ? `Memory usage critical: ${formatted}` : `Memory usage high: ${formatted}`;
      break;
    case 'temperature':
      message = `CPU temperature: ${formatted}`;
      break;
  }

  return {
    severity,
    title: `${SOURCE_LABELS[source]} ${level}`,
    message,
    source,
    value,
    unit,
  };
}

export interface AlertEngine {
  on<E extends keyof AlertEngineEvents>(event: E, listener: (...args: AlertEngineEvents[E]) => void): this;
  once<E extends keyof AlertEngineEvents>(event: E, listener: (...args: AlertEngineEvents[E]) => void): this;
  off<E extends keyof AlertEngineEvents>(event: E, listener: (...args: AlertEngineEvents[E]) => void): this;
  emit<E extends keyof AlertEngineEvents>(event: E, ...args: AlertEngineEvents[E]): boolean;
}

export class AlertEngine extends EventEmitter {
  private readonly logger = createSubsystemLogger('monitor/alerts');
  private readonly thresholds: MetricThresholds;
  private readonly cooldownMs: number;
  private readonly retentionMs: number;
  private maxAlerts: number;
  private cleanupIntervalMs: number;
  private cleanupTimer?: NodeJS.Timeout;
  private alerts: Alert[] = [];
  private nextAlertId = 1;
  private readonly states = new Map<StateKey, AlertState>();

  constructor(config: MonitorConfig = resolveMonitorConfig()) {
    super();
    this.thresholds = config.thresholds;
    this.cooldownMs = config.alerts.cooldownMs;
    this.retentionMs = config.alerts.retentionMs;
    this.maxAlerts = clampAlertHistory(config.alerts.maxHistory);
    this.cleanupIntervalMs = Math.max(MIN_CLEANUP_INTERVAL_MS, config.alerts.cleanupIntervalMs);

    for (const source of ALERT_SOURCES) {
      for (const severity of THRESHOLD_SEVERITIES) {
        this.states.set(stateKey(source, severity), { isActive: false, lastFiredAt: null });
      }
    }
  }

  /**
   * Evaluates CPU usage and, when available, temperature. Returns the alerts fired.
   */
  evaluateCpu(snapshot: CpuSnapshot): Alert[] {
    if (snapshot.status === 'unknown') return [];

    const fired: Alert[] = [];
    const usageAlert = this.evaluate('cpu', snapshot.totalUsage, this.thresholds.cpu);
    if (usageAlert) fired.push(usageAlert);

    if (snapshot.temperature !== null) {
      const temperatureAlert = this.evaluate('temperature', snapshot.temperature, this.thresholds.temperature);
      if (temperatureAlert) fired.push(temperatureAlert);
    }
    return fired;
  }

  /**
   * Evaluates memory usage percentage. Returns the alerts fired.
   */
  evaluateMemory(snapshot: MemorySnapshot): Alert[] {
    if (snapshot.status === 'unknown') return [];

    const alert = this.evaluate('memory', snapshot.usagePercentage, this.thresholds.memory);
    return alert ? [alert] : [];
  }

  /**
   * Whether an alert of this (source, severity) may fire now
   */
  shouldFire(source: AlertSource, severity: ThresholdSeverity, now: number = Date.now()): boolean {
    const state = this.getState(source, severity);
    if (!state.isActive || state.lastFiredAt === null) return true;
    return now - state.lastFiredAt > this.cooldownMs;
  }

  /**
   * Appends an alert to the log, evicting the oldest one beyond capacity
   */
  addAlert(input: AlertInput): Alert {
    const alert: Alert = {
      ...input,
      id: this.nextAlertId++,
      timestamp: new Date(),
      acknowledged: false,
    };

    this.alerts.push(alert);
    if (this.alerts.length > this.maxAlerts) {
      this.alerts.splice(0, this.alerts.length - this.maxAlerts);
    }

    this.logAlert(alert);

    this.emit('alertAdded', cloneAlert(alert));
    if (alert.severity === 'critical' || alert.severity === 'emergency') {
      this.emit('criticalAlert', cloneAlert(alert));
    }
    this.emitCountChanged();

    return cloneAlert(alert);
  }

  /**
   * Marks an alert acknowledged. Unknown or already acknowledged ids are ignored.
   */
  acknowledge(alertId: number): boolean {
    const alert = this.alerts.find((candidate) => candidate.id === alertId);
    if (!alert || alert.acknowledged) {
      return false;
    }

    alert.acknowledged = true;
    this.logger.debug('Alert acknowledged', { alertId, source: alert.source });
    this.emit('alertAcknowledged', alertId);
    this.emitCountChanged();
    return true;
  }

  clearAll(): void {
    this.alerts = [];
    this.emitCountChanged();
  }

  clearAcknowledged(): void {
    this.alerts = this.alerts.filter((alert) => !alert.acknowledged);
    this.emitCountChanged();
  }

  /**
   * Removes acknowledged alerts older than the retention window
   */
  cleanupExpired(now: number = Date.now()): number {
    const cutoff = now - this.retentionMs;
    const before = this.alerts.length;
    this.alerts = this.alerts.filter((alert) => !(alert.acknowledged && alert.timestamp.getTime() < cutoff));

    const removed = before - this.alerts.length;
    if (removed > 0) {
      this.logger.debug('Expired acknowledged alerts removed', { removed });
      this.emitCountChanged();
    }
    return removed;
  }

  startCleanup(): void {
    if (this.cleanupTimer) return;
    this.cleanupTimer = setInterval(() => {
      this.cleanupExpired();
    }, this.cleanupIntervalMs);
  }

  stopCleanup(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = undefined;
    }
  }

  isCleanupRunning(): boolean {
    return this.cleanupTimer !== undefined;
  }

  /**
   * Sets the cleanup period (minimum one minute), restarting the task if running
   */
  setCleanupInterval(intervalMs: number): number {
    this.cleanupIntervalMs = Number.isFinite(intervalMs)
      ? Math.max(MIN_CLEANUP_INTERVAL_MS, Math.floor(intervalMs))
      : MIN_CLEANUP_INTERVAL_MS;

    if (this.cleanupTimer) {
      this.stopCleanup();
      this.startCleanup();
    }
    return this.cleanupIntervalMs;
  }

  getCleanupInterval(): number {
    return this.cleanupIntervalMs;
  }

  /**
   * Sets the log capacity (clamped to [50, 1000]), dropping the oldest alerts beyond it
   */
  setMaxAlertsHistory(maxCount: number): number {
    this.maxAlerts = clampAlertHistory(maxCount);
    if (this.alerts.length > this.maxAlerts) {
      this.alerts.splice(0, this.alerts.length - this.maxAlerts);
      this.emitCountChanged();
    }
    return this.maxAlerts;
  }

  getMaxAlertsHistory(): number {
    return this.maxAlerts;
  }

  getActiveAlerts(): Alert[] {
    return this.alerts.filter((alert) => !alert.acknowledged).map(cloneAlert);
  }

  getAllAlerts(): Alert[] {
    return this.alerts.map(cloneAlert);
  }

  getUnacknowledgedCount(): number {
    return this.alerts.reduce((count, alert) => count + (alert.acknowledged ? 0 : 1), 0);
  }

  getAlertCounts(): AlertCounts {
    return { total: this.alerts.length, unacknowledged: this.getUnacknowledgedCount() };
  }

  getAlertState(source: AlertSource, severity: ThresholdSeverity): AlertState {
    return { ...this.getState(source, severity) };
  }

  private evaluate(source: AlertSource, value: number, pair: ThresholdPair): Alert | null {
    const now = Date.now();

    // Critical takes precedence; warning is not evaluated while critical holds
    if (value >= pair.critical) {
      return this.shouldFire(source, 'critical', now) ? this.fire(source, 'critical', value, now) : null;
    }

    if (value >= pair.warning) {
      return this.shouldFire(source, 'warning', now) ? this.fire(source, 'warning', value, now) : null;
    }

    this.clearSource(source);
    return null;
  }

  private fire(source: AlertSource, severity: ThresholdSeverity, value: number, now: number): Alert {
    const state = this.getState(source, severity);
    state.isActive = true;
    state.lastFiredAt = now;
    return this.addAlert(describeThresholdAlert(source, severity, value));
  }

  private clearSource(source: AlertSource): void {
    for (const severity of THRESHOLD_SEVERITIES) {
      this.getState(source, severity).isActive = false;
    }
  }

  private getState(source: AlertSource, severity: ThresholdSeverity): AlertState {
    const key = stateKey(source, severity);
    let state = this.states.get(key);
    if (!state) {
      state = { isActive: false, lastFiredAt: null };
      this.states.set(key, state);
    }
    return state;
  }

  private logAlert(alert: Alert): void {
    const logData = {
      alertId: alert.id,
      source: alert.source,
      value: alert.value,
      unit: alert.unit,
    };

    switch (alert.severity) {
      case 'emergency':
        this.logger.fatal(`${alert.title}: ${alert.message}`, logData);
        break;
      case 'critical':
        this.logger.error(`${alert.title}: ${alert.message}`, logData);
        break;
      case 'warning':
        this.logger.warn(`${alert.title}: ${alert.message}`, logData);
        break;
      case 'info':
      default:
        this.logger.info(`${alert.title}: ${alert.message}`, logData);
        break;
    }
  }

  private emitCountChanged(): void {
    this.emit('alertCountChanged', this.getAlertCounts());
  }
}
