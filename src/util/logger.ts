import { CFG, type LogLevel } from '../config';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

function enabled(level: Exclude<LogLevel, 'silent'>, threshold: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

/**
 * Console logger that prefixes every line with `[scope]`.
 * Every level writes to stderr; stdout belongs to command output.
 * The threshold defaults to `LOG_LEVEL` from the environment.
 */
export function createLogger(scope: string, threshold: LogLevel = CFG.LOG_LEVEL): Logger {
  const prefix = `[${scope}]`;
  return {
    debug: (...args) => {
      if (enabled('debug', threshold)) console.error(prefix, ...args);
    },
    info: (...args) => {
      if (enabled('info', threshold)) console.error(prefix, ...args);
    },
    warn: (...args) => {
      if (enabled('warn', threshold)) console.warn(prefix, ...args);
    },
    error: (...args) => {
      if (enabled('error', threshold)) console.error(prefix, ...args);
    }
  };
}
