/**
 * Tagged logger: one console line per call, stamped with time, level and
 * the emitting service.
 *
 *   2026-10-19T12:00:00.000Z WARN  [SnapshotManager] Cycle failed
 *
 * Usage:
 *   const log = createLogger('SnapshotManager');
 *   log.info('Cycle complete');
 *   log.warn('Cycle failed', { category: 'network' });
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/** Set from config at startup and on every logLevel change */
let threshold: LogLevel = 'info';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// warn and error write to stderr
const SINKS: Record<LogLevel, (...data: unknown[]) => void> = {
  debug: (...data) => console.debug(...data),
  info: (...data) => console.log(...data),
  warn: (...data) => console.warn(...data),
  error: (...data) => console.error(...data),
};

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

/**
 * @param tag - Service/module name, e.g. 'RefreshScheduler'
 */
export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  const at =
    (level: LogLevel) =>
    (message: string, ...args: unknown[]): void => {
      if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
      SINKS[level](new Date().toISOString(), level.toUpperCase().padEnd(5), prefix, message, ...args);
    };

  return { debug: at('debug'), info: at('info'), warn: at('warn'), error: at('error') };
}
