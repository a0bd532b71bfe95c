export type LogLevel = 'silent' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'info', 'debug'];

export interface Logger {
  level: LogLevel;
  info(msg: string, meta?: unknown): void;
  debug(msg: string, meta?: unknown): void;
  error(msg: string, meta?: unknown): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}
