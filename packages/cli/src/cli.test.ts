import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterAll, afterEach, beforeAll, describe, expect, it, vi } from 'vitest';
import type { LogLevel, Logger } from '@testpattern/types';
import { run, VERSION } from './cli';

function stubLogger(level: LogLevel = 'info') {
  return { level, error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() } satisfies Logger;
}

describe('run', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'testpattern-cli-'));
    await fs.promises.writeFile(
      path.join(dir, 'card.json'),
      JSON.stringify({ name: 'Grey card', depth: 8, width: 2, height: 1, color: 128 }),
    );
    await fs.promises.writeFile(path.join(dir, 'bad.json'), JSON.stringify({ depth: 8, width: 2, height: 1, colour: 1 }));
  });

  afterAll(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes a TIFF and a PNG preview named after the descriptor', async () => {
    const logger = stubLogger();
    const code = await run([path.join(dir, 'card.json')], {}, () => logger);

    const tiff = path.join(dir, 'Grey_card.tif');
    const png = path.join(dir, 'Grey_card.png');
    expect(code).toBe(0);
    expect(Array.from((await fs.promises.readFile(tiff)).subarray(0, 4))).toEqual([0x49, 0x49, 42, 0]);
    expect(Array.from((await fs.promises.readFile(png)).subarray(1, 4))).toEqual([0x50, 0x4e, 0x47]);
    expect(logger.info).toHaveBeenCalledWith('[render] Grey card: 2x1 at depth 8');
    expect(logger.info).toHaveBeenCalledWith(`[write] ${tiff}`);
    expect(logger.info).toHaveBeenCalledWith(`[write] ${png}`);
    expect(logger.debug).not.toHaveBeenCalled();
  });

  it('honours an explicit output path and --no-png', async () => {
    const output = path.join(dir, 'explicit.tif');
    const code = await run([path.join(dir, 'card.json'), output, '--no-png', '--deflate'], {}, () => stubLogger());

    expect(code).toBe(0);
    expect(fs.existsSync(output)).toBe(true);
    expect(fs.existsSync(path.join(dir, 'explicit.png'))).toBe(false);
  });

  it('logs every patch at debug level', async () => {
    const logger = stubLogger('debug');
    await run([path.join(dir, 'card.json'), path.join(dir, 'verbose.tif'), '--no-png'], {}, () => logger);
    expect(logger.debug).toHaveBeenCalledWith('[render] root: 2x1 at 0,0');
  });

  it('passes the parsed log level to the logger factory', async () => {
    const factory = vi.fn(() => stubLogger());
    await run([path.join(dir, 'card.json'), path.join(dir, 'quiet.tif'), '--quiet'], {}, factory);
    expect(factory).toHaveBeenCalledWith(expect.objectContaining({ logLevel: 'error' }));
  });

  it('reports descriptor errors and writes nothing', async () => {
    const logger = stubLogger();
    const code = await run([path.join(dir, 'bad.json')], {}, () => logger);

    expect(code).toBe(1);
    expect(logger.error).toHaveBeenCalledWith("Unrecognized key(s) in object: 'colour'");
    expect(fs.existsSync(path.join(dir, 'bad.tif'))).toBe(false);
  });

  it('removes the TIFF when the preview cannot be written', async () => {
    await fs.promises.mkdir(path.join(dir, 'blocked.png'));
    const logger = stubLogger();
    const code = await run([path.join(dir, 'card.json'), path.join(dir, 'blocked.tif')], {}, () => logger);

    expect(code).toBe(1);
    expect(logger.error).toHaveBeenCalledOnce();
    expect(fs.existsSync(path.join(dir, 'blocked.tif'))).toBe(false);
  });

  it('requires a descriptor', async () => {
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const logger = stubLogger();
    expect(await run([], {}, () => logger)).toBe(1);
    expect(logger.error).toHaveBeenCalledWith('Missing descriptor file');
  });

  it('rejects unknown options', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    expect(await run(['--bogus'], {})).toBe(1);
    expect(error).toHaveBeenCalledWith('Unknown option: --bogus');
  });

  it('prints the version', async () => {
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    expect(await run(['--version'], {})).toBe(0);
    expect(write).toHaveBeenCalledWith(`${VERSION}\n`);
  });

  it('prints help', async () => {
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    expect(await run(['--help'], {})).toBe(0);
    expect(write.mock.calls[0][0]).toMatch(/^testpattern - render a test pattern descriptor to TIFF/);
  });
});
