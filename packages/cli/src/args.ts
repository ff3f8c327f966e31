/**
 * @module args
 * Command line and environment parsing.
 */

import type { LogLevel } from '@testpattern/types';

/** Options for one invocation. */
export interface CliOptions {
  /** Descriptor file (first positional). */
  descriptor?: string;
  /** Explicit TIFF path (second positional). */
  output?: string;
  /** Write the 8-bit PNG preview. */
  png: boolean;
  /** Adobe Deflate compression for the TIFF. */
  deflate: boolean;
  /** Replicate high bits when widening 10/12-bit samples. */
  fullRange: boolean;
  logLevel: LogLevel;
  help: boolean;
  version: boolean;
}

/** Name of the environment variable holding the default log level. */
export const LOG_LEVEL_ENV = 'TESTPATTERN_LOG_LEVEL';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** Default level from the environment, or `info`. */
export function logLevelFromEnv(env: Record<string, string | undefined>): LogLevel {
  const raw = env[LOG_LEVEL_ENV]?.trim().toLowerCase();
  if (!raw) return 'info';
  if (!isLogLevel(raw)) {
    throw new Error(`Invalid ${LOG_LEVEL_ENV} '${raw}' (expected ${LOG_LEVELS.join(', ')})`);
  }
  return raw;
}

/**
 * Parse arguments (without the node executable and script).
 * @throws On unknown options or surplus positionals.
 */
export function parseArgs(argv: string[], env: Record<string, string | undefined> = {}): CliOptions {
  const options: CliOptions = {
    png: true,
    deflate: false,
    fullRange: true,
    logLevel: logLevelFromEnv(env),
    help: false,
    version: false,
  };

  for (const arg of argv) {
    switch (arg) {
      case '--help':
      case '-h':
        options.help = true;
        continue;
      case '--version':
      case '-V':
        options.version = true;
        continue;
      case '--png':
        options.png = true;
        continue;
      case '--no-png':
        options.png = false;
        continue;
      case '--deflate':
        options.deflate = true;
        continue;
      case '--no-full-range':
        options.fullRange = false;
        continue;
      case '--verbose':
      case '-v':
        options.logLevel = 'debug';
        continue;
      case '--quiet':
      case '-q':
        options.logLevel = 'error';
        continue;
    }
    if (arg.startsWith('-') && arg !== '-') {
      throw new Error(`Unknown option: ${arg}`);
    }
    if (!options.descriptor) {
      options.descriptor = arg;
      continue;
    }
    if (!options.output) {
      options.output = arg;
      continue;
    }
    throw new Error(`Unexpected argument: ${arg}`);
  }

  return options;
}

/** Usage text. */
export const HELP_TEXT = `testpattern - render a test pattern descriptor to TIFF

Usage:
  testpattern <descriptor.json> [output.tif] [options]

Options:
  --png, --no-png     Write (default) or skip the 8-bit PNG preview
  --deflate           Compress the TIFF with Adobe Deflate
  --no-full-range     Shift 10/12-bit samples without low-bit replication
  --verbose, -v       Log every patch as it is rendered
  --quiet, -q         Log errors only
  --version, -V       Print the version
  --help, -h          Show this help

Environment:
  ${LOG_LEVEL_ENV}   error | warn | info | debug (default info)
`;
