/**
 * CPU Monitor Component
 *
 * Aggregate and per-core CPU usage, temperature and frequency sampling.
 */

export * from './cpu-monitor.js';
