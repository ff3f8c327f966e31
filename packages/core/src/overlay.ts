/**
 * @module overlay
 * Composites a decoded overlay image, centered, onto a patch rectangle.
 *
 * RGB overlays replace the samples they cover. RGBA overlays are blended
 * in normalized float: `dst * (1 - a) + src` for premultiplied color, or
 * `dst * (1 - a) + a * src` for straight color.
 */

import type { OverlayImage, PixelBuffer, Rect } from '@testpattern/types';
import { denormalizeSample, normalizeSample } from './color';
import { SemanticError } from './errors';

/** Top-left corner that centers `image` in `rect`. */
export function overlayOrigin(rect: Rect, image: OverlayImage): { x: number; y: number } {
  return {
    x: rect.x + Math.floor((rect.width - image.width) / 2),
    y: rect.y + Math.floor((rect.height - image.height) / 2),
  };
}

/**
 * Composite an overlay into the buffer.
 *
 * @param buffer - Destination buffer.
 * @param rect - Patch rectangle the overlay is centered in.
 * @param image - Decoded overlay.
 * @param premultiplied - Whether RGBA color is already multiplied by alpha.
 * @param path - Descriptor path of the patch.
 * @throws {SemanticError} When the overlay is larger than the patch.
 */
export function compositeOverlay(
  buffer: PixelBuffer,
  rect: Rect,
  image: OverlayImage,
  premultiplied: boolean,
  path = '',
): void {
  if (image.width > rect.width || image.height > rect.height) {
    throw new SemanticError(
      path,
      `the image (${image.width}x${image.height}) is larger than the patch (${rect.width}x${rect.height})`,
    );
  }

  const { depth, data } = buffer;
  const origin = overlayOrigin(rect, image);
  const stride = image.channels;

  for (let y = 0; y < image.height; y++) {
    for (let x = 0; x < image.width; x++) {
      const src = (y * image.width + x) * stride;
      const dst = ((origin.y + y) * buffer.width + origin.x + x) * 3;
      const alpha = stride === 4 ? image.data[src + 3] : 1;

      for (let c = 0; c < 3; c++) {
        const color = image.data[src + c];
        const below = normalizeSample(data[dst + c], depth);
        const over = premultiplied ? color : alpha * color;
        data[dst + c] = denormalizeSample(below * (1 - alpha) + over, depth);
      }
    }
  }
}
