import type { LogLevel } from '../types/config.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export type LogSink = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

export function createLogger(level: LogLevel = 'info', sink: LogSink = console): Logger {
  const threshold = LEVEL_ORDER[level];
  const emit = (at: LogLevel) => (message: string, ...args: unknown[]) => {
    if (LEVEL_ORDER[at] < threshold) return;
    sink[at](message, ...args);
  };

  return {
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
  };
}
