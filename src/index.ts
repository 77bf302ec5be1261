export * from './monitor/index.js';
export { createSubsystemLogger, type LogMeta, type SubsystemLogger } from './logging/subsystem.js';
