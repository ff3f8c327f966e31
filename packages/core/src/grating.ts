/**
 * @module grating
 * Frequency gratings: square, sine and cosine alternation between two
 * colors, with an optional linear sweep of the half-period.
 *
 * Phase is measured in half-cycles: one half-period of pixels advances it
 * by 1. It is the integral of the instantaneous frequency `1 / p(x)`, where
 * the half-period `p(x)` moves linearly from the start value at the first
 * pixel to the end value at the last.
 *
 * Square gratings are not anti-aliased. A constant half-period of 1 pixel
 * is the Nyquist limit and always renders as a square wave.
 */

import type { GratingBackground, PixelBuffer, Rect, Rgb, Waveform } from '@testpattern/types';
import { lerpColor, quantize } from './color';
import { fillColumn, fillRow } from './pixel-buffer';

/**
 * Phase in half-cycles at offset `x` of a grating `length` pixels long.
 *
 * @param x - Pixel offset along the grating axis.
 * @param length - Grating length in pixels.
 * @param startHalfPeriod - Half-period at offset 0.
 * @param endHalfPeriod - Half-period at offset `length - 1`.
 */
export function gratingPhase(x: number, length: number, startHalfPeriod: number, endHalfPeriod: number): number {
  const slope = length > 1 ? (endHalfPeriod - startHalfPeriod) / (length - 1) : 0;
  if (slope === 0) return x / startHalfPeriod;
  return Math.log1p((slope * x) / startHalfPeriod) / slope;
}

/**
 * Blend factor toward the second color at a phase.
 * Square waves hold the first color for the first half of each cycle.
 */
export function waveformMix(waveform: Waveform, phase: number): number {
  switch (waveform) {
    case 'square': {
      const cycle = ((phase % 2) + 2) % 2;
      return cycle < 1 ? 0 : 1;
    }
    case 'sine':
      return (Math.sin(Math.PI * phase) + 1) / 2;
    case 'cosine':
      return (Math.cos(Math.PI * phase) + 1) / 2;
  }
}

/** The waveform actually drawn, after the Nyquist substitution. */
export function effectiveWaveform(grating: GratingBackground): Waveform {
  if (grating.startHalfPeriod === 1 && grating.endHalfPeriod === 1) return 'square';
  return grating.waveform;
}

/** Authored (unquantized) grating color at offset `x`. */
export function sampleGrating(grating: GratingBackground, x: number, length: number): Rgb {
  const phase = gratingPhase(x, length, grating.startHalfPeriod, grating.endHalfPeriod);
  return lerpColor(grating.from, grating.to, waveformMix(effectiveWaveform(grating), phase));
}

/**
 * Render a grating across a rectangle of the buffer.
 *
 * @param buffer - Destination buffer.
 * @param rect - Absolute rectangle to fill.
 * @param grating - Grating background.
 * @param path - Descriptor path reported if a sample is out of range.
 */
export function renderGrating(buffer: PixelBuffer, rect: Rect, grating: GratingBackground, path = ''): void {
  if (grating.axis === 'horizontal') {
    for (let x = 0; x < rect.width; x++) {
      fillColumn(buffer, rect, x, quantize(sampleGrating(grating, x, rect.width), buffer.depth, path));
    }
  } else {
    for (let y = 0; y < rect.height; y++) {
      fillRow(buffer, rect, y, quantize(sampleGrating(grating, y, rect.height), buffer.depth, path));
    }
  }
}
