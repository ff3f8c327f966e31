/**
 * @module pixel-buffer
 * Allocation and rectangle writes on the shared RGB output buffer.
 *
 * All writes take already-quantized samples.
 */

import type { Depth, PixelBuffer, Rect, Rgb } from '@testpattern/types';
import { isFloatDepth } from './color';

/** Allocate a black buffer. */
export function createPixelBuffer(width: number, height: number, depth: Depth): PixelBuffer {
  const length = width * height * 3;
  return {
    width,
    height,
    depth,
    data: isFloatDepth(depth) ? new Float32Array(length) : new Uint16Array(length),
  };
}

/** Read the sample triplet at (x, y). */
export function getPixel(buffer: PixelBuffer, x: number, y: number): Rgb {
  const i = (y * buffer.width + x) * 3;
  return [buffer.data[i], buffer.data[i + 1], buffer.data[i + 2]];
}

/** Write one sample triplet at (x, y). */
export function setPixel(buffer: PixelBuffer, x: number, y: number, sample: Rgb): void {
  const i = (y * buffer.width + x) * 3;
  buffer.data[i] = sample[0];
  buffer.data[i + 1] = sample[1];
  buffer.data[i + 2] = sample[2];
}

/** Fill a rectangle with one sample. Empty rectangles are a no-op. */
export function fillRect(buffer: PixelBuffer, rect: Rect, sample: Rgb): void {
  const { data, width } = buffer;
  const [r, g, b] = sample;
  for (let y = rect.y; y < rect.y + rect.height; y++) {
    let i = (y * width + rect.x) * 3;
    for (let x = 0; x < rect.width; x++) {
      data[i] = r;
      data[i + 1] = g;
      data[i + 2] = b;
      i += 3;
    }
  }
}

/** Fill column `x` of a rectangle. */
export function fillColumn(buffer: PixelBuffer, rect: Rect, x: number, sample: Rgb): void {
  fillRect(buffer, { x: rect.x + x, y: rect.y, width: 1, height: rect.height }, sample);
}

/** Fill row `y` of a rectangle. */
export function fillRow(buffer: PixelBuffer, rect: Rect, y: number, sample: Rgb): void {
  fillRect(buffer, { x: rect.x, y: rect.y + y, width: rect.width, height: 1 }, sample);
}
