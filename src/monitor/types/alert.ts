/**
 * Alert Types
 *
 * Alerts raised by the AlertEngine when a metric crosses a threshold.
 */

export type AlertSeverity = 'info' | 'warning' | 'critical' | 'emergency';

export type AlertSource = 'cpu' | 'memory' | 'temperature';

/** Severities the threshold state machine tracks */
export type ThresholdSeverity = Extract<AlertSeverity, 'warning' | 'critical'>;

export interface Alert {
  id: number;
  severity: AlertSeverity;
  title: string;
  message: string;
  source: AlertSource;
  /** Metric value that triggered the alert */
  value: number;
  /** Unit of `value`, e.g. '%' or '°C' */
  unit: string;
  timestamp: Date;
  acknowledged: boolean;
}

export type AlertInput = Omit<Alert, 'id' | 'timestamp' | 'acknowledged'>;

export interface AlertState {
  isActive: boolean;
  /** Epoch milliseconds of the last firing, `null` if never fired */
  lastFiredAt: number | null;
}

export interface AlertCounts {
  total: number;
  unacknowledged: number;
}
