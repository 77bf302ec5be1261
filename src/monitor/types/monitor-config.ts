/**
 * MonitorConfig Interface
 *
 * Resolved, immutable configuration injected into monitors and the alert engine.
 * Build it with `resolveMonitorConfig` rather than by hand.
 */

export interface ThresholdPair {
  /** Value at or above which the metric is in warning */
  warning: number;
  /** Value at or above which the metric is critical */
  critical: number;
}

export interface MetricThresholds {
  /** CPU usage percentage */
  cpu: ThresholdPair;
  /** Memory usage percentage */
  memory: ThresholdPair;
  /** CPU temperature in Celsius */
  temperature: ThresholdPair;
}

export interface AlertPolicy {
  /** Minimum time between repeated alerts of one (source, severity) */
  cooldownMs: number;
  /** Alert log capacity */
  maxHistory: number;
  /** Period of the acknowledged-alert expiry task */
  cleanupIntervalMs: number;
  /** Age after which acknowledged alerts are dropped */
  retentionMs: number;
}

export interface MonitorConfig {
  /** Sampling and aggregation period in milliseconds */
  updateIntervalMs: number;
  /** History ring buffer capacity per monitor */
  historySize: number;
  thresholds: MetricThresholds;
  /** Available-memory floor in bytes below which memory is in warning */
  lowMemoryBytes: number;
  /** Swap usage percentage above which `swapWarning` is emitted */
  swapWarningPercent: number;
  alerts: AlertPolicy;
}
