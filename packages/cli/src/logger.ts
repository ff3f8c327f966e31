/**
 * @module logger
 * Console-backed {@link Logger} with a level threshold.
 */

import type { LogLevel, Logger } from '@testpattern/types';

const SEVERITY: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, debug: 3 };

/** Writes to `console`, dropping messages noisier than `level`. */
export class ConsoleLogger implements Logger {
  constructor(readonly level: LogLevel = 'info') {}

  /** Whether messages at `level` are written. */
  enabled(level: LogLevel): boolean {
    return SEVERITY[level] <= SEVERITY[this.level];
  }

  error(message: string): void {
    console.error(message);
  }

  warn(message: string): void {
    if (this.enabled('warn')) console.warn(message);
  }

  info(message: string): void {
    if (this.enabled('info')) console.info(message);
  }

  debug(message: string): void {
    if (this.enabled('debug')) console.debug(message);
  }
}
