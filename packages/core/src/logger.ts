/** Logger contract accepted by every runtime component. */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/** Console-backed logger writing `[LEVEL] message` lines. */
export function createConsoleLogger(level: LogLevel = 'info'): Logger {
  const threshold = LOG_LEVELS.indexOf(level);
  const enabled = (l: LogLevel) => LOG_LEVELS.indexOf(l) >= threshold;

  return {
    debug: (msg, ...args) => {
      if (enabled('debug')) console.debug(`[DEBUG] ${msg}`, ...args);
    },
    info: (msg, ...args) => {
      if (enabled('info')) console.log(`[INFO] ${msg}`, ...args);
    },
    warn: (msg, ...args) => {
      if (enabled('warn')) console.warn(`[WARN] ${msg}`, ...args);
    },
    error: (msg, ...args) => {
      if (enabled('error')) console.error(`[ERROR] ${msg}`, ...args);
    },
  };
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((l) => l === value);
}
