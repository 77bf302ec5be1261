/**
 * Monitor Configuration
 *
 * Validates a partial configuration input, fills in the defaults and returns
 * one frozen MonitorConfig shared by the monitors and the alert engine.
 */

import { z } from 'zod';
import type { MonitorConfig, ThresholdPair } from '../types/monitor-config.js';
import { deepFreeze } from '../immutable.js';

export const MIN_UPDATE_INTERVAL_MS = 100;
export const DEFAULT_UPDATE_INTERVAL_MS = 1000;
export const MIN_HISTORY_SIZE = 10;
export const MAX_HISTORY_SIZE = 1000;
export const DEFAULT_HISTORY_SIZE = 120;
export const MIN_ALERT_HISTORY = 50;
export const MAX_ALERT_HISTORY = 1000;
export const MIN_CLEANUP_INTERVAL_MS = 60_000;
export const LOW_MEMORY_BYTES = 50 * 1024 * 1024;

function thresholdPair(defaults: ThresholdPair) {
  return z
    .object({
      warning: z.number().finite().default(defaults.warning),
      critical: z.number().finite().default(defaults.critical),
    })
    .refine((pair) => pair.warning < pair.critical, {
      message: 'warning threshold must be below critical threshold',
    })
    .default({});
}

export const MonitorConfigSchema = z.object({
  updateIntervalMs: z.number().int().min(MIN_UPDATE_INTERVAL_MS).default(DEFAULT_UPDATE_INTERVAL_MS),
  historySize: z.number().int().min(MIN_HISTORY_SIZE).max(MAX_HISTORY_SIZE).default(DEFAULT_HISTORY_SIZE),
  thresholds: z
    .object({
      cpu: thresholdPair({ warning: 75, critical: 90 }),
      memory: thresholdPair({ warning: 80, critical: 95 }),
      temperature: thresholdPair({ warning: 70, critical: 80 }),
    })
    .default({}),
  lowMemoryBytes: z.number().int().nonnegative().default(LOW_MEMORY_BYTES),
  swapWarningPercent: z.number().min(0).max(100).default(50),
  alerts: z
    .object({
      cooldownMs: z.number().int().nonnegative().default(30_000),
      maxHistory: z.number().int().min(MIN_ALERT_HISTORY).max(MAX_ALERT_HISTORY).default(200),
      cleanupIntervalMs: z.number().int().min(MIN_CLEANUP_INTERVAL_MS).default(300_000),
      retentionMs: z.number().int().positive().default(24 * 60 * 60 * 1000),
    })
    .default({}),
});

export type MonitorConfigInput = z.input<typeof MonitorConfigSchema>;

/**
 * Resolves a partial input into a complete configuration
 *
 * @throws ZodError when a value is out of range or a warning threshold is not below its critical one
 */
export function resolveMonitorConfig(input: MonitorConfigInput = {}): MonitorConfig {
  const parsed: MonitorConfig = MonitorConfigSchema.parse(input);
  return deepFreeze(parsed);
}
