// Tagged console logging, gated by LOG_LEVEL (error | warn | info | debug).

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LEVEL_ORDER: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, debug: 3 };

function isLogLevel(x: string | undefined): x is LogLevel {
  return x === 'error' || x === 'warn' || x === 'info' || x === 'debug';
}

export function currentLevel(): LogLevel {
  const env = process.env.LOG_LEVEL?.toLowerCase();
  return isLogLevel(env) ? env : 'info';
}

export interface Logger {
  error: (msg: string, ...rest: unknown[]) => void;
  warn: (msg: string, ...rest: unknown[]) => void;
  info: (msg: string, ...rest: unknown[]) => void;
  debug: (msg: string, ...rest: unknown[]) => void;
}

export function createLogger(tag: string): Logger {
  const enabled = (level: LogLevel) => LEVEL_ORDER[level] <= LEVEL_ORDER[currentLevel()];
  const prefix = `[${tag}]`;
  return {
    error: (msg, ...rest) => { if (enabled('error')) console.error(prefix, msg, ...rest); },
    warn: (msg, ...rest) => { if (enabled('warn')) console.warn(prefix, msg, ...rest); },
    info: (msg, ...rest) => { if (enabled('info')) console.log(prefix, msg, ...rest); },
    debug: (msg, ...rest) => { if (enabled('debug')) console.debug(prefix, msg, ...rest); },
  };
}
