/**
 * @module pixels
 * Raster buffers produced by the renderer and consumed from overlays.
 */

import type { Depth } from './common';

/** Sample storage: 16-bit code values for integer depths, float32 for depth 32. */
export type SampleArray = Uint16Array | Float32Array;

/** Interleaved RGB image at a document depth. */
export interface PixelBuffer {
  width: number;
  height: number;
  depth: Depth;
  /** RGB samples, row-major. Length is `width * height * 3`. */
  data: SampleArray;
}

/** Decoded overlay with samples normalized to [0, 1]. */
export interface OverlayImage {
  width: number;
  height: number;
  /** 3 for RGB, 4 for RGBA. */
  channels: 3 | 4;
  /** Interleaved samples. Length is `width * height * channels`. */
  data: Float32Array;
}

/** Loads overlay images referenced by a descriptor's `image` field. */
export interface OverlayLoader {
  /**
   * Load an overlay.
   * @param file - Path as authored in the descriptor.
   */
  load(file: string): Promise<OverlayImage>;
}
