/**
 * Host Monitor Entry Point
 *
 * Sampling, rate computation, alerting and aggregation of host CPU and memory
 * metrics. `createHostMonitor()` returns a coordinator wired to this host's
 * procfs and sysfs; tests and other platforms can pass their own RawMetricSource
 * to `AggregationCoordinator` instead.
 */

export * from './types/index.js';
export * from './config/index.js';
export * from './errors.js';
export * from './validation.js';
export * from './rate-computer/index.js';
export * from './source/index.js';
export { ExclusiveLock } from './sampler/exclusive-lock.js';
export { HistoryBuffer, clampHistorySize } from './sampler/history-buffer.js';
export {
  PeriodicSampler,
  clampInterval,
  type SamplerEvents,
  type SamplerOptions,
  type SamplerStrategy,
} from './sampler/periodic-sampler.js';
export * from './cpu-monitor/index.js';
export * from './memory-monitor/index.js';
export * from './alert-engine/index.js';
export * from './coordinator/index.js';
