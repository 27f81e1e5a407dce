/**
 * Minimal logging surface used across the transport.
 * Components take an optional Logger and stay silent without one.
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Console-backed logger. Every line is prefixed, e.g. "[lanmesh] Discovered 3 nodes".
 *
 * @param prefix - Tag placed in brackets before each message
 * @param minLevel - Messages below this level are discarded
 */
export function createConsoleLogger(prefix = 'lanmesh', minLevel: LogLevel = 'info'): Logger {
  const enabled = (level: LogLevel): boolean => LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
  const format = (message: string): string => `[${prefix}] ${message}`;

  return {
    debug(message: string): void {
      if (enabled('debug')) console.debug(format(message));
    },
    info(message: string): void {
      if (enabled('info')) console.info(format(message));
    },
    warn(message: string): void {
      if (enabled('warn')) console.warn(format(message));
    },
    error(message: string): void {
      if (enabled('error')) console.error(format(message));
    },
  };
}
