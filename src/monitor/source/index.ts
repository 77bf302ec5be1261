export * from './raw-metric-source.js';
export * from './proc-metric-source.js';
export * from './soft-read.js';
