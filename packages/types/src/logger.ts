/**
 * @module logger
 * Logging contract for front ends. The engine itself reports through the
 * event bus and never logs.
 */

/** Verbosity threshold, from quietest to noisiest. */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/** Leveled logger. */
export interface Logger {
  readonly level: LogLevel;
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}
