/**
 * @module cli
 * `testpattern` command: render a descriptor file and write TIFF + PNG.
 *
 * Nothing is written unless the whole render succeeds. Every failure is
 * reported as its message on stderr with exit code 1.
 */

import * as fs from 'fs';
import type { Logger } from '@testpattern/types';
import { EventBusImpl, encodePreviewPng, encodeTiff, loadDescriptor } from '@testpattern/core';
import { HELP_TEXT, parseArgs } from './args';
import type { CliOptions } from './args';
import { ConsoleLogger } from './logger';
import { outputPaths } from './output';

export const VERSION = '0.1.0';

/** Log render progress events at the logger's level. */
function attachLogger(events: EventBusImpl, logger: Logger): void {
  events.on('render:started', ({ name, width, height, depth }) => {
    logger.info(`[render] ${name ?? 'pattern'}: ${width}x${height} at depth ${depth}`);
  });
  events.on('render:finished', ({ durationMs }) => {
    logger.info(`[render] ${durationMs.toFixed(2)}ms`);
  });
  if (logger.level === 'debug') {
    events.on('overlay:loaded', ({ path, file, width, height }) => {
      logger.debug(`[render] ${path || 'root'}: loaded ${file} (${width}x${height})`);
    });
    events.on('patch:rendered', ({ path, rect }) => {
      logger.debug(`[render] ${path || 'root'}: ${rect.width}x${rect.height} at ${rect.x},${rect.y}`);
    });
  }
}

async function render(descriptor: string, options: CliOptions, logger: Logger): Promise<void> {
  const events = new EventBusImpl();
  attachLogger(events, logger);

  const result = await loadDescriptor(descriptor, { events });
  const paths = outputPaths(descriptor, result.name, options.output);

  const tiff = encodeTiff(result.buffer, { deflate: options.deflate, fullRange: options.fullRange });
  const png = options.png ? encodePreviewPng(result.buffer) : undefined;

  await fs.promises.writeFile(paths.tiff, tiff);
  logger.info(`[write] ${paths.tiff}`);

  if (png) {
    try {
      await fs.promises.writeFile(paths.png, png);
    } catch (err) {
      await fs.promises.rm(paths.tiff, { force: true });
      throw err;
    }
    logger.info(`[write] ${paths.png}`);
  }
}

/**
 * Run the command.
 *
 * @param argv - Arguments after the script name.
 * @param env - Environment consulted for the default log level.
 * @param createLogger - Logger factory, for tests.
 * @returns Process exit code.
 */
export async function run(
  argv: string[],
  env: Record<string, string | undefined> = process.env,
  createLogger: (options: CliOptions) => Logger = (options) => new ConsoleLogger(options.logLevel),
): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(argv, env);
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    process.stderr.write(HELP_TEXT);
    return 1;
  }

  if (options.help) {
    process.stdout.write(HELP_TEXT);
    return 0;
  }
  if (options.version) {
    process.stdout.write(`${VERSION}\n`);
    return 0;
  }

  const logger = createLogger(options);
  if (!options.descriptor) {
    logger.error('Missing descriptor file');
    process.stderr.write(HELP_TEXT);
    return 1;
  }

  try {
    await render(options.descriptor, options, logger);
    return 0;
  } catch (err) {
    logger.error(err instanceof Error ? err.message : String(err));
    return 1;
  }
}
