import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { ResourceError } from './errors';
import { encodePng } from './png-codec';
import { createPngOverlayLoader, toOverlayImage } from './png-loader';

describe('toOverlayImage', () => {
  it('expands 8-bit grey to RGB', () => {
    const image = toOverlayImage({ width: 2, height: 1, channels: 1, bitDepth: 8, data: new Uint8Array([0, 255]) });
    expect(image.channels).toBe(3);
    expect(Array.from(image.data)).toEqual([0, 0, 0, 1, 1, 1]);
  });

  it('keeps alpha from 16-bit grey+alpha', () => {
    const image = toOverlayImage({
      width: 1,
      height: 1,
      channels: 2,
      bitDepth: 16,
      data: new Uint16Array([65535, 0]),
    });
    expect(image.channels).toBe(4);
    expect(Array.from(image.data)).toEqual([1, 1, 1, 0]);
  });

  it('normalizes RGBA samples', () => {
    const image = toOverlayImage({ width: 1, height: 1, channels: 4, bitDepth: 8, data: new Uint8Array([255, 0, 51, 255]) });
    expect(Array.from(image.data)).toEqual([1, 0, Math.fround(0.2), 1]);
  });
});

describe('createPngOverlayLoader', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'testpattern-loader-'));
    await fs.promises.writeFile(
      path.join(dir, 'dot.png'),
      encodePng({ width: 1, height: 1, data: new Uint8Array([255, 0, 0, 255]) }),
    );
    await fs.promises.writeFile(path.join(dir, 'bad.png'), 'not a png');
  });

  afterAll(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  it('resolves relative paths against the base directory', async () => {
    const image = await createPngOverlayLoader(dir).load('dot.png');
    expect(image).toEqual({ width: 1, height: 1, channels: 4, data: new Float32Array([1, 0, 0, 1]) });
  });

  it('keeps absolute paths', async () => {
    const image = await createPngOverlayLoader(os.tmpdir()).load(path.join(dir, 'dot.png'));
    expect(image.width).toBe(1);
  });

  it('reports a missing file as a resource error with its cause', async () => {
    const error = await createPngOverlayLoader(dir)
      .load('nope.png')
      .catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ResourceError);
    expect(error).toMatchObject({ message: "cannot read image 'nope.png'" });
    expect(error instanceof Error && error.cause).toBeTruthy();
  });

  it('reports an undecodable file', async () => {
    await expect(createPngOverlayLoader(dir).load('bad.png')).rejects.toThrow(
      "cannot decode image 'bad.png': Invalid PNG signature",
    );
  });
});
