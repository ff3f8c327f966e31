/**
 * @testpattern/core
 *
 * Descriptor validation, layout resolution and rasterization of test
 * patterns, plus the PNG and TIFF codecs used around them.
 *
 * @packageDocumentation
 */

// Errors
export { DescriptorError, StructuralError, SemanticError, ResourceError, joinPath } from './errors';
export type { DescriptorErrorKind } from './errors';

// Color model
export {
  isFloatDepth,
  maxSample,
  toRgb,
  quantize,
  quantizeSample,
  lerpColor,
  normalizeSample,
  denormalizeSample,
} from './color';

// Descriptor schema and validation
export { parseDescriptor, formatIssuePath } from './schema';
export { buildDocument, LATEST_VERSION } from './document';

// Geometry
export { resolveAxis, axisLength, cellStarts, HORIZONTAL, VERTICAL } from './grid';
export type { AxisContext, AxisNames, ParentAxis } from './grid';
export { placeNext, placeChildren, INITIAL_CURSOR } from './placement';
export type { GridShape, PlacementCursor } from './placement';
export { resolveLayout } from './layout';

// Rasterization
export { createPixelBuffer, getPixel, setPixel, fillRect, fillColumn, fillRow } from './pixel-buffer';
export { gradientT, sampleGradient, renderGradient } from './gradient';
export { gratingPhase, waveformMix, effectiveWaveform, sampleGrating, renderGrating } from './grating';
export { overlayOrigin, compositeOverlay } from './overlay';
export { renderDocument, fillBackground, drawBorder, drawSpacing } from './compositor';
export type { RenderOptions } from './compositor';

// Pipeline
export { renderDescriptor, loadDescriptor, validateDescriptor, parseDescriptorText } from './render';
export type { RenderResult } from './render';

// Events
export { EventBusImpl } from './event-bus';

// Codecs
export { encodePng, decodePng } from './png-codec';
export type { RgbaImage, DecodedPng } from './png-codec';
export { createPngOverlayLoader, toOverlayImage } from './png-loader';
export { encodeTiff, widenSample, tiffBitsPerSample } from './tiff';
export type { TiffOptions } from './tiff';
export { toPreviewImage, toPreviewSample, encodePreviewPng } from './preview';
