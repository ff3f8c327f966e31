/**
 * @module preview
 * Reduces a rendered buffer to 8-bit RGBA for a PNG preview.
 */

import type { Depth, PixelBuffer } from '@testpattern/types';
import { maxSample } from './color';
import { encodePng } from './png-codec';
import type { RgbaImage } from './png-codec';

/** Map one stored sample to an 8-bit value. */
export function toPreviewSample(sample: number, depth: Depth): number {
  if (depth === 32) {
    const clamped = sample < 0 ? 0 : sample > 1 ? 1 : sample;
    return Math.round(clamped * 255);
  }
  if (depth === 8) return sample;
  return Math.floor((sample * 255) / maxSample(depth));
}

/** Opaque 8-bit RGBA copy of a buffer. */
export function toPreviewImage(buffer: PixelBuffer): RgbaImage {
  const { width, height, depth, data: samples } = buffer;
  const data = new Uint8Array(width * height * 4);
  for (let i = 0; i < width * height; i++) {
    data[i * 4] = toPreviewSample(samples[i * 3], depth);
    data[i * 4 + 1] = toPreviewSample(samples[i * 3 + 1], depth);
    data[i * 4 + 2] = toPreviewSample(samples[i * 3 + 2], depth);
    data[i * 4 + 3] = 255;
  }
  return { width, height, data };
}

/** Encode a buffer as an 8-bit RGBA PNG. */
export function encodePreviewPng(buffer: PixelBuffer): Uint8Array {
  return encodePng(toPreviewImage(buffer));
}
