/**
 * hostwatch - Type Definitions
 *
 * This module exports all TypeScript interfaces and types for the monitor.
 */

export * from './counters.js';
export * from './metric-snapshot.js';
export * from './alert.js';
export * from './monitor-config.js';
