/**
 * Subsystem Logging
 *
 * Structured logging shared by every hostwatch component. Each component asks for
 * a logger named after its subsystem (e.g. `monitor/cpu`) and logs a message with
 * optional structured metadata. Output is newline-delimited JSON from pino.
 */

import pino, { type Logger, type LevelWithSilent } from 'pino';

export type LogMeta = Record<string, unknown>;

export interface SubsystemLogger {
  readonly subsystem: string;
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  fatal(message: string, meta?: LogMeta): void;
  isLevelEnabled(level: LevelWithSilent): boolean;
}

const LOG_LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function resolveLevel(raw: string | undefined): LevelWithSilent {
  const level = LOG_LEVELS.find((candidate) => candidate === raw?.toLowerCase());
  return level ?? 'info';
}

let rootLogger: Logger | undefined;

function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = pino({
      level: resolveLevel(process.env.LOG_LEVEL),
      base: {
        service: 'hostwatch',
        pid: process.pid,
      },
    });
  }
  return rootLogger;
}

type LogMethod = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

function write(logger: Logger, method: LogMethod, message: string, meta?: LogMeta): void {
  if (meta) {
    logger[method](meta, message);
  } else {
    logger[method](message);
  }
}

/**
 * Creates a logger bound to one subsystem name
 */
export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  const logger = getRootLogger().child({ subsystem });

  return {
    subsystem,
    debug: (message, meta) => write(logger, 'debug', message, meta),
    info: (message, meta) => write(logger, 'info', message, meta),
    warn: (message, meta) => write(logger, 'warn', message, meta),
    error: (message, meta) => write(logger, 'error', message, meta),
    fatal: (message, meta) => write(logger, 'fatal', message, meta),
    isLevelEnabled: (level) => logger.isLevelEnabled(level),
  };
}

/**
 * Flattens an unknown throwable into log metadata
 */
export function errorMeta(error: unknown): LogMeta {
  if (error instanceof Error) {
    return { error: error.message, errorName: error.name };
  }
  return { error: String(error) };
}
