export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

export type Logger = {
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export function createConsoleLogger(prefix = '[depman]', level: LogLevel = 'info'): Logger {
  const max = LEVEL_ORDER[level];
  const enabled = (l: LogLevel) => LEVEL_ORDER[l] <= max;
  return {
    info: (...args: unknown[]) => {
      if (enabled('info')) console.log(prefix, ...args);
    },
    warn: (...args: unknown[]) => {
      if (enabled('warn')) console.warn(prefix, ...args);
    },
    error: (...args: unknown[]) => {
      if (enabled('error')) console.error(prefix, ...args);
    },
    debug: (...args: unknown[]) => {
      if (enabled('debug')) console.debug(prefix, ...args);
    },
  };
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};
