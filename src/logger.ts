/**
 * Leveled logger for the bridge.
 * @packageDocumentation
 */

export const LogLevels = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LogLevels)[number];

export interface Logger {
  debug(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
}

const PREFIX = '[bridge]';

/**
 * Create a console logger that drops messages below `level`.
 */
export function createLogger(level: LogLevel = 'info'): Logger {
  const threshold = LogLevels.indexOf(level);
  const enabled = (l: LogLevel) => LogLevels.indexOf(l) >= threshold;
  return {
    debug: (msg, ...args) => {
      if (enabled('debug')) console.debug(`${PREFIX} ${msg}`, ...args);
    },
    info: (msg, ...args) => {
      if (enabled('info')) console.log(`${PREFIX} ${msg}`, ...args);
    },
    warn: (msg, ...args) => {
      if (enabled('warn')) console.warn(`${PREFIX} ${msg}`, ...args);
    },
    error: (msg, ...args) => {
      if (enabled('error')) console.error(`${PREFIX} ${msg}`, ...args);
    },
  };
}

export const defaultLogger: Logger = createLogger('info');

/** Discards everything. Handy for tests and embedding. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
