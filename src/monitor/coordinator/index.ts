/**
 * Aggregation Coordinator Component
 *
 * Combines the monitors and the alert engine behind one lifecycle.
 */

export * from './aggregation-coordinator.js';
