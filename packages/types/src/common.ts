/**
 * @module common
 * Common primitive types used across all packages.
 */

/** Axis-aligned rectangle in absolute image pixels. */
export interface Rect {
  /** Left edge X coordinate */
  x: number;
  /** Top edge Y coordinate */
  y: number;
  /** Width in pixels */
  width: number;
  /** Height in pixels */
  height: number;
}

/**
 * Sample precision of a test pattern.
 * 8/10/12/16 are integer code values; 32 is IEEE float in [0, 1].
 */
export type Depth = 8 | 10 | 12 | 16 | 32;

/** An RGB triplet in the authored (pre-quantization) representation. */
export type Rgb = [number, number, number];

/** Direction a ramp or grating varies along. */
export type Axis = 'horizontal' | 'vertical';
