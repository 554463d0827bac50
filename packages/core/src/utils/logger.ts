// packages/core/src/utils/logger.ts

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  /** Logger with the same threshold whose lines carry `[scope]`. */
  child(scope: string): Logger;
}

type EmitLevel = Exclude<LogLevel, 'silent'>;

export function createLogger(level: LogLevel = 'info', scope?: string): Logger {
  const threshold = LOG_LEVELS[level];

  function log(msgLevel: EmitLevel, message: string, args: unknown[]): void {
    if (LOG_LEVELS[msgLevel] < threshold) return;
    const timestamp = new Date().toISOString();
    const tag = scope ? ` [${scope}]` : '';
    const prefix = `[${timestamp}] ${msgLevel.toUpperCase()}${tag}:`;
    // stdout belongs to command output; diagnostics go to stderr
    console.error(prefix, message, ...args);
  }

  return {
    debug: (message, ...args) => log('debug', message, args),
    info: (message, ...args) => log('info', message, args),
    warn: (message, ...args) => log('warn', message, args),
    error: (message, ...args) => log('error', message, args),
    child: (childScope) => createLogger(level, scope ? `${scope}:${childScope}` : childScope),
  };
}
