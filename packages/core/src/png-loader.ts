/**
 * @module png-loader
 * Filesystem-backed {@link OverlayLoader} for PNG overlays.
 *
 * Relative paths resolve against a base directory, normally the directory
 * of the descriptor file. Greyscale is expanded to RGB and samples are
 * normalized to [0, 1].
 */

import * as fs from 'fs';
import * as path from 'path';
import type { OverlayImage, OverlayLoader } from '@testpattern/types';
import { ResourceError } from './errors';
import { decodePng } from './png-codec';
import type { DecodedPng } from './png-codec';

/** Convert decoded PNG samples to a normalized RGB or RGBA overlay. */
export function toOverlayImage(png: DecodedPng): OverlayImage {
  const { width, height, channels: source } = png;
  const hasAlpha = source === 2 || source === 4;
  const channels = hasAlpha ? 4 : 3;
  const scale = png.bitDepth === 16 ? 65535 : 255;
  const data = new Float32Array(width * height * channels);

  for (let i = 0; i < width * height; i++) {
    const src = i * source;
    const dst = i * channels;
    if (source <= 2) {
      const grey = png.data[src] / scale;
      data[dst] = grey;
      data[dst + 1] = grey;
      data[dst + 2] = grey;
    } else {
      data[dst] = png.data[src] / scale;
      data[dst + 1] = png.data[src + 1] / scale;
      data[dst + 2] = png.data[src + 2] / scale;
    }
    if (hasAlpha) data[dst + 3] = png.data[src + source - 1] / scale;
  }

  return { width, height, channels, data };
}

/**
 * Create a loader reading PNG files from disk.
 *
 * @param baseDir - Directory relative overlay paths are resolved against.
 * @returns A loader whose failures are {@link ResourceError}s carrying the cause.
 */
export function createPngOverlayLoader(baseDir: string): OverlayLoader {
  return {
    async load(file: string): Promise<OverlayImage> {
      const resolved = path.resolve(baseDir, file);
      let bytes: Uint8Array;
      try {
        bytes = await fs.promises.readFile(resolved);
      } catch (err) {
        throw new ResourceError('', `cannot read image '${file}'`, err);
      }
      try {
        return toOverlayImage(decodePng(bytes));
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new ResourceError('', `cannot decode image '${file}': ${reason}`, err);
      }
    },
  };
}
