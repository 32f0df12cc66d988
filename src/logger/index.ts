/**
 * Logger Module
 *
 * JSON-lines console logger and no-op metrics used as defaults by every
 * module. Callers that care about output inject their own implementations.
 */

import type { Logger, Metrics } from '../types/index.js';

export type { Logger, Metrics };

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Create a console logger that writes one JSON object per line
 *
 * @param module - Module name stamped on every entry
 * @param level - Minimum level to emit (default: info)
 */
export function createLogger(module: string, level: LogLevel = 'info'): Logger {
  const threshold = LEVEL_ORDER[level];

  const write = (entryLevel: LogLevel, message: string, meta?: Record<string, unknown>): void => {
    if (LEVEL_ORDER[entryLevel] < threshold) {
      return;
    }
    const line = JSON.stringify({
      level: entryLevel,
      module,
      message,
      ...meta,
      timestamp: new Date().toISOString(),
    });
    switch (entryLevel) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'debug':
        console.debug(line);
        break;
      default:
        console.log(line);
    }
  };

  return {
    info: (message, meta) => write('info', message, meta),
    warn: (message, meta) => write('warn', message, meta),
    error: (message, meta) => write('error', message, meta),
    debug: (message, meta) => write('debug', message, meta),
  };
}

/**
 * Default no-op metrics implementation
 */
export const noopMetrics: Metrics = {
  increment: () => { /* no-op */ },
  gauge: () => { /* no-op */ },
  timing: () => { /* no-op */ },
};

/**
 * Extract a printable message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
