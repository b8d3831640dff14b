/**
 * Structured Logging Module
 *
 * pino root logger with module-scoped children. JSON output in production,
 * pino-pretty everywhere else.
 */

import pino, { Logger } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
}

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

let rootLogger: Logger | null = null;

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && (LOG_LEVELS as readonly string[]).includes(value);
}

function buildLogger(config: LoggerConfig): Logger {
  const envLevel = process.env.LOG_LEVEL;
  const level = config.level ?? (isLogLevel(envLevel) ? envLevel : 'info');
  const pretty = config.pretty ?? process.env.NODE_ENV !== 'production';

  if (pretty) {
    return pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
          messageFormat: '[{module}] {msg}',
        },
      },
    });
  }
  return pino({ level });
}

/**
 * Initialize the root logger. Call once at startup, before any module
 * asks for a scoped logger, or the defaults win.
 */
export function initLogger(config: LoggerConfig = {}): void {
  rootLogger = buildLogger(config);
}

/** Root logger, created with defaults on first use. */
export function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = buildLogger({});
  }
  return rootLogger;
}

/**
 * Scoped logger for one module. Children bind to the root that exists at
 * call time, so long-lived objects take theirs in the constructor.
 */
export function getLogger(module: string): Logger {
  return getRootLogger().child({ module });
}
