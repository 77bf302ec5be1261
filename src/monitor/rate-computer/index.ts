/**
 * Rate Computer Component
 *
 * Delta engines converting cumulative counters into bounded percentages.
 */

export * from './rate-computer.js';
