/**
 * @module color
 * Depth-aware color values: broadcasting, quantization and interpolation.
 *
 * Colors are interpolated in their authored representation and quantized
 * once, at the end. Integer depths are code values in `[0, 2^depth - 1]`;
 * depth 32 is float in `[0, 1]` and is never rounded or range-checked.
 */

import type { ColorValue, Depth, Rgb } from '@testpattern/types';
import { SemanticError } from './errors';

/** Whether samples at this depth are IEEE floats. */
export function isFloatDepth(depth: Depth): boolean {
  return depth === 32;
}

/** Largest sample value at a depth (1 for float). */
export function maxSample(depth: Depth): number {
  return isFloatDepth(depth) ? 1 : 2 ** depth - 1;
}

/** Broadcast a greyscale value to a triplet; triplets are copied. */
export function toRgb(value: ColorValue): Rgb {
  if (typeof value === 'number') return [value, value, value];
  return [value[0], value[1], value[2]];
}

/**
 * Quantize one component.
 * @throws {SemanticError} When an integer-depth sample rounds outside the code range.
 */
export function quantizeSample(value: number, depth: Depth, path = ''): number {
  if (isFloatDepth(depth)) return Math.fround(value);
  const code = Math.floor(value + 0.5);
  const max = maxSample(depth);
  if (!(code >= 0 && code <= max)) {
    throw new SemanticError(path, `sample ${value} is outside [0, ${max}] for depth ${depth}`);
  }
  return code;
}

/**
 * Quantize a color for storage at `depth`.
 *
 * @param color - Authored color (scalar or triplet).
 * @param depth - Target depth.
 * @param path - Descriptor path reported on failure.
 * @returns The stored sample triplet.
 * @throws {SemanticError} When a component is out of range.
 */
export function quantize(color: ColorValue, depth: Depth, path = ''): Rgb {
  const [r, g, b] = toRgb(color);
  return [quantizeSample(r, depth, path), quantizeSample(g, depth, path), quantizeSample(b, depth, path)];
}

/**
 * Component-wise linear interpolation, exact at both ends.
 * @param t - Blend factor; 0 yields `a`, 1 yields `b`.
 */
export function lerpColor(a: Rgb, b: Rgb, t: number): Rgb {
  const s = 1 - t;
  return [a[0] * s + b[0] * t, a[1] * s + b[1] * t, a[2] * s + b[2] * t];
}

/** Convert a stored sample to [0, 1]. */
export function normalizeSample(sample: number, depth: Depth): number {
  return isFloatDepth(depth) ? sample : sample / maxSample(depth);
}

/** Convert a [0, 1] value to a stored sample, clamping integer depths to the code range. */
export function denormalizeSample(value: number, depth: Depth): number {
  if (isFloatDepth(depth)) return Math.fround(value);
  const max = maxSample(depth);
  const code = Math.floor(value * max + 0.5);
  return code < 0 ? 0 : code > max ? max : code;
}
