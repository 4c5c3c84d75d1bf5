export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(scope: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let defaultLevel: LogLevel = 'info';

export const setDefaultLogLevel = (level: LogLevel): void => {
  defaultLevel = level;
};

export const createLogger = (scope: string, level?: LogLevel): Logger => {
  const enabled = (candidate: LogLevel): boolean =>
    LEVEL_ORDER[candidate] >= LEVEL_ORDER[level ?? defaultLevel];

  const write = (
    candidate: LogLevel,
    message: string,
    context?: Record<string, unknown>
  ): void => {
    if (!enabled(candidate)) return;
    const line = `[${new Date().toISOString()}] ${candidate.toUpperCase()} [${scope}] ${message}`;
    const args: unknown[] = context ? [line, context] : [line];
    if (candidate === 'error') console.error(...args);
    else if (candidate === 'warn') console.warn(...args);
    else if (candidate === 'debug') console.debug(...args);
    else console.info(...args);
  };

  return {
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context),
    child: (childScope) => createLogger(`${scope}:${childScope}`, level),
  };
};
