/**
 * Alert Engine Component
 *
 * Threshold alerts with cooldown, acknowledgement and expiry.
 */

export * from './alert-engine.js';
