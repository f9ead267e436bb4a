/**
 * Tagged logger — structured logging with a service tag.
 * Use instead of calling console.log/warn/error directly.
 *
 * All levels go to stderr: in gateway mode stdout carries protocol
 * messages only.
 *
 * Usage:
 *   const log = createLogger('Poller');
 *   log.info('Monitoring started');
 *   log.warn('Read failed', { failures: 3 });
 *   log.error('Save failed', err);
 */

import { Console } from 'console';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/** Global log level — can be adjusted at runtime */
let globalLogLevel: LogLevel = 'info';

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const sink = new Console({ stdout: process.stderr, stderr: process.stderr });

export function setLogLevel(level: LogLevel): void {
  globalLogLevel = level;
}

export function getLogLevel(): LogLevel {
  return globalLogLevel;
}

/**
 * Create a tagged logger for a specific service/module.
 *
 * @param tag - Service/module name (e.g. 'HistoryStore', 'Gateway')
 */
export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;

  const shouldLog = (level: LogLevel): boolean => {
    return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[globalLogLevel];
  };

  return {
    debug(message: string, ...args: unknown[]) {
      if (shouldLog('debug')) {
        sink.debug(prefix, message, ...args);
      }
    },
    info(message: string, ...args: unknown[]) {
      if (shouldLog('info')) {
        sink.info(prefix, message, ...args);
      }
    },
    warn(message: string, ...args: unknown[]) {
      if (shouldLog('warn')) {
        sink.warn(prefix, message, ...args);
      }
    },
    error(message: string, ...args: unknown[]) {
      if (shouldLog('error')) {
        sink.error(prefix, message, ...args);
      }
    },
  };
}
