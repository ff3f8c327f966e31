/**
 * @module gradient
 * Two-color linear ramps along one axis of a patch.
 *
 * The first sample along the axis is exactly `from` and the last exactly
 * `to`; every line across the axis is uniform.
 *
 * @packageDocumentation
 */

import type { Depth, GradientBackground, PixelBuffer, Rect, Rgb } from '@testpattern/types';
import { lerpColor, quantize } from './color';
import { fillColumn, fillRow } from './pixel-buffer';

// ---------------------------------------------------------------------------
// Sampling
// ---------------------------------------------------------------------------

/**
 * Blend factor at offset `x` of a ramp `length` pixels long.
 * A single-pixel ramp yields 0.
 */
export function gradientT(x: number, length: number): number {
  return length > 1 ? x / (length - 1) : 0;
}

/** Authored (unquantized) ramp color at offset `x`. */
export function sampleGradient(from: Rgb, to: Rgb, x: number, length: number): Rgb {
  return lerpColor(from, to, gradientT(x, length));
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

/**
 * Render a ramp across a rectangle of the buffer.
 *
 * @param buffer - Destination buffer.
 * @param rect - Absolute rectangle to fill.
 * @param ramp - Ramp background.
 * @param path - Descriptor path reported if a sample is out of range.
 */
export function renderGradient(buffer: PixelBuffer, rect: Rect, ramp: GradientBackground, path = ''): void {
  const depth: Depth = buffer.depth;
  if (ramp.axis === 'horizontal') {
    for (let x = 0; x < rect.width; x++) {
      fillColumn(buffer, rect, x, quantize(sampleGradient(ramp.from, ramp.to, x, rect.width), depth, path));
    }
  } else {
    for (let y = 0; y < rect.height; y++) {
      fillRow(buffer, rect, y, quantize(sampleGradient(ramp.from, ramp.to, y, rect.height), depth, path));
    }
  }
}
