import type { Logger, LogLevel } from './Logger.js';

export type LogWriter = (line: string) => void;

export interface ConsoleLoggerOptions {
  /** Tag placed before every line, e.g. `[CardDeck]` */
  prefix?: string;
  /** Add an `HH:MM:SS.mmm` clock after the prefix (default true) */
  timestamps?: boolean;
  /** Sink for info and debug lines (default console.log) */
  out?: LogWriter;
  /** Sink for error lines (default console.error) */
  err?: LogWriter;
}

export const DEFAULT_LOG_PREFIX = '[CardDeck]';

export class ConsoleLogger implements Logger {
  level: LogLevel;
  private prefix: string;
  private timestamps: boolean;
  private out: LogWriter;
  private err: LogWriter;

  constructor(level: LogLevel = 'info', options: ConsoleLoggerOptions = {}) {
    this.level = level;
    this.prefix = options.prefix ?? DEFAULT_LOG_PREFIX;
    this.timestamps = options.timestamps ?? true;
    this.out = options.out ?? ((line) => console.log(line));
    this.err = options.err ?? ((line) => console.error(line));
  }

  private head(tag?: string): string {
    const parts = [this.prefix];
    if (this.timestamps) parts.push(new Date().toISOString().slice(11, 23));
    if (tag) parts.push(tag);
    return parts.join(' ');
  }

  private formatMeta(meta: unknown): string {
    if (meta === undefined) return '';
    if (this.level === 'debug') {
      return '\n' + JSON.stringify(meta, null, 2);
    }
    return ' ' + JSON.stringify(meta);
  }

  info(msg: string, meta?: unknown): void {
    if (this.level === 'silent') return;
    this.out(`${this.head()} ${msg}${this.formatMeta(meta)}`);
  }

  debug(msg: string, meta?: unknown): void {
    if (this.level !== 'debug') return;
    this.out(`${this.head('[DEBUG]')} ${msg}${this.formatMeta(meta)}`);
  }

  error(msg: string, meta?: unknown): void {
    if (this.level === 'silent') return;
    this.err(`${this.head('[ERROR]')} ${msg}${this.formatMeta(meta)}`);
  }
}
