import { describe, expect, it } from 'vitest';
import { LOG_LEVEL_ENV, logLevelFromEnv, parseArgs } from './args';

describe('parseArgs', () => {
  it('applies defaults', () => {
    expect(parseArgs(['card.json'])).toEqual({
      descriptor: 'card.json',
      png: true,
      deflate: false,
      fullRange: true,
      logLevel: 'info',
      help: false,
      version: false,
    });
  });

  it('reads the optional output path and flags', () => {
    const options = parseArgs(['card.json', 'out.tif', '--no-png', '--deflate', '--no-full-range']);
    expect(options.output).toBe('out.tif');
    expect(options.png).toBe(false);
    expect(options.deflate).toBe(true);
    expect(options.fullRange).toBe(false);
  });

  it('lets the last of --png / --no-png win', () => {
    expect(parseArgs(['--no-png', '--png', 'a.json']).png).toBe(true);
  });

  it('maps --verbose and --quiet to log levels over the environment', () => {
    const env = { [LOG_LEVEL_ENV]: 'warn' };
    expect(parseArgs(['a.json'], env).logLevel).toBe('warn');
    expect(parseArgs(['a.json', '--verbose'], env).logLevel).toBe('debug');
    expect(parseArgs(['a.json', '-q'], env).logLevel).toBe('error');
  });

  it('recognizes help and version', () => {
    expect(parseArgs(['-h']).help).toBe(true);
    expect(parseArgs(['--version']).version).toBe(true);
  });

  it('rejects unknown options and extra positionals', () => {
    expect(() => parseArgs(['--bogus'])).toThrow('Unknown option: --bogus');
    expect(() => parseArgs(['a.json', 'b.tif', 'c'])).toThrow('Unexpected argument: c');
  });
});

describe('logLevelFromEnv', () => {
  it('defaults to info', () => {
    expect(logLevelFromEnv({})).toBe('info');
    expect(logLevelFromEnv({ [LOG_LEVEL_ENV]: '' })).toBe('info');
  });

  it('accepts levels case-insensitively', () => {
    expect(logLevelFromEnv({ [LOG_LEVEL_ENV]: 'DEBUG' })).toBe('debug');
  });

  it('rejects unknown levels', () => {
    expect(() => logLevelFromEnv({ [LOG_LEVEL_ENV]: 'loud' })).toThrow(
      "Invalid TESTPATTERN_LOG_LEVEL 'loud' (expected error, warn, info, debug)",
    );
  });
});
