/**
 * Memory Monitor Component
 *
 * RAM and swap usage sampling with low-memory detection.
 */

export * from './memory-monitor.js';
