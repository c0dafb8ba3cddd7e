/** Logger interface injected into every service. */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/** Console-backed logger that drops messages below `level`. */
export function createConsoleLogger(level: LogLevel = 'info'): Logger {
  const threshold = SEVERITY[level];
  const enabled = (l: LogLevel): boolean => SEVERITY[l] >= threshold;
  return {
    debug: (msg: string, ...args: unknown[]) => {
      if (enabled('debug')) console.debug(`[DEBUG] ${msg}`, ...args);
    },
    info: (msg: string, ...args: unknown[]) => {
      if (enabled('info')) console.log(`[INFO] ${msg}`, ...args);
    },
    warn: (msg: string, ...args: unknown[]) => {
      if (enabled('warn')) console.warn(`[WARN] ${msg}`, ...args);
    },
    error: (msg: string, ...args: unknown[]) => {
      if (enabled('error')) console.error(`[ERROR] ${msg}`, ...args);
    },
  };
}

/** Discards everything. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
