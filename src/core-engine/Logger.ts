/**
 * Leveled logging for the Nertz engine.
 *
 * Components never reach for a process-wide logger: the engine
 * builds one with {@link createEngineLogger} (or is handed one) and
 * passes it to the generator, resolver and executor it owns.
 */

import winston from 'winston';

export type EngineLogger = winston.Logger;

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = [
  'error',
  'warn',
  'info',
  'debug',
] as const;

export interface EngineLoggerOptions {
  /** Minimum level written (default 'info'). */
  level?: LogLevel;
  /** Drop every entry; tests use this. */
  silent?: boolean;
}

/**
 * `2026-01-01 12:00:00 [INFO] Turn 3 started {"players":2}`
 */
const lineFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} [${level.toUpperCase()}] ${String(message)}${metaStr}`;
  }),
);

/**
 * Create a logger writing `[LEVEL] message` lines to the console.
 */
export function createEngineLogger(options: EngineLoggerOptions = {}): EngineLogger {
  const { level = 'info', silent = false } = options;

  return winston.createLogger({
    level,
    silent,
    format: lineFormat,
    transports: [new winston.transports.Console()],
  });
}

/**
 * A logger that discards everything. Default for components built
 * without one.
 */
export function createSilentLogger(): EngineLogger {
  return createEngineLogger({ silent: true });
}
