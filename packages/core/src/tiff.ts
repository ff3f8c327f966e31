/**
 * @module tiff
 * Baseline TIFF encoder for rendered buffers.
 *
 * Writes a little-endian, single-IFD, single-strip, chunky RGB image:
 *   - depth 8: 8 bits per sample
 *   - depths 10, 12, 16: 16 bits per sample
 *   - depth 32: 32-bit IEEE float (SampleFormat 3)
 *
 * Optional Adobe Deflate (compression 8) uses fflate's zlib stream.
 *
 * @see https://www.itu.int/itudoc/itu-t/com16/tiff-fx/docs/tiff6.pdf
 */

import type { Depth, PixelBuffer } from '@testpattern/types';
import { zlibSync } from 'fflate';

/** Encoder options. */
export interface TiffOptions {
  /** Compress the strip with Adobe Deflate. Default false. */
  deflate?: boolean;
  /** Replicate high bits into the low bits when widening 10/12-bit samples. Default true. */
  fullRange?: boolean;
}

// Field types
const SHORT = 3;
const LONG = 4;

// Tag numbers
const TAG = {
  ImageWidth: 256,
  ImageLength: 257,
  BitsPerSample: 258,
  Compression: 259,
  PhotometricInterpretation: 262,
  StripOffsets: 273,
  SamplesPerPixel: 277,
  RowsPerStrip: 278,
  StripByteCounts: 279,
  PlanarConfiguration: 284,
  SampleFormat: 339,
} as const;

const COMPRESSION_NONE = 1;
const COMPRESSION_ADOBE_DEFLATE = 8;
const PHOTOMETRIC_RGB = 2;
const SAMPLE_FORMAT_UINT = 1;
const SAMPLE_FORMAT_FLOAT = 3;

const HEADER_SIZE = 8;
const ENTRY_SIZE = 12;

interface IfdEntry {
  tag: number;
  type: typeof SHORT | typeof LONG;
  values: number[];
}

/** Bits per stored TIFF sample for a document depth. */
export function tiffBitsPerSample(depth: Depth): 8 | 16 | 32 {
  if (depth === 8) return 8;
  if (depth === 32) return 32;
  return 16;
}

/**
 * Widen a code value at `depth` (10 to 16 bits) to a 16-bit sample.
 * With `fullRange`, the top bits are copied into the vacated low bits so
 * the maximum code maps to 65535.
 */
export function widenSample(value: number, depth: Depth, fullRange = true): number {
  if (depth >= 16) return value;
  const shifted = value * 2 ** (16 - depth);
  return fullRange ? shifted + Math.floor(value / 2 ** (2 * depth - 16)) : shifted;
}

/** Serialize the sample data, row-major RGB, little-endian. */
function encodeStrip(buffer: PixelBuffer, fullRange: boolean): Uint8Array {
  const { data, depth } = buffer;
  const bits = tiffBitsPerSample(depth);
  const out = new Uint8Array(data.length * (bits / 8));
  const view = new DataView(out.buffer);

  for (let i = 0; i < data.length; i++) {
    if (bits === 8) out[i] = data[i];
    else if (bits === 16) view.setUint16(i * 2, widenSample(data[i], depth, fullRange), true);
    else view.setFloat32(i * 4, data[i], true);
  }
  return out;
}

/**
 * Encode a rendered buffer as a TIFF file.
 *
 * @param buffer - Rendered RGB buffer.
 * @param options - Compression and widening options.
 * @returns The complete file.
 */
export function encodeTiff(buffer: PixelBuffer, options: TiffOptions = {}): Uint8Array {
  const { width, height, depth } = buffer;
  const raw = encodeStrip(buffer, options.fullRange ?? true);
  const strip = options.deflate ? zlibSync(raw) : raw;
  const bits = tiffBitsPerSample(depth);
  const format = bits === 32 ? SAMPLE_FORMAT_FLOAT : SAMPLE_FORMAT_UINT;

  const entryCount = 11;
  const ifdSize = 2 + entryCount * ENTRY_SIZE + 4;
  const bitsOffset = HEADER_SIZE + ifdSize;
  const formatOffset = bitsOffset + 6;
  const stripOffset = formatOffset + 6;

  const entries: IfdEntry[] = [
    { tag: TAG.ImageWidth, type: LONG, values: [width] },
    { tag: TAG.ImageLength, type: LONG, values: [height] },
    { tag: TAG.BitsPerSample, type: SHORT, values: [bits, bits, bits] },
    { tag: TAG.Compression, type: SHORT, values: [options.deflate ? COMPRESSION_ADOBE_DEFLATE : COMPRESSION_NONE] },
    { tag: TAG.PhotometricInterpretation, type: SHORT, values: [PHOTOMETRIC_RGB] },
    { tag: TAG.StripOffsets, type: LONG, values: [stripOffset] },
    { tag: TAG.SamplesPerPixel, type: SHORT, values: [3] },
    { tag: TAG.RowsPerStrip, type: LONG, values: [height] },
    { tag: TAG.StripByteCounts, type: LONG, values: [strip.length] },
    { tag: TAG.PlanarConfiguration, type: SHORT, values: [1] },
    { tag: TAG.SampleFormat, type: SHORT, values: [format, format, format] },
  ];

  const out = new Uint8Array(stripOffset + strip.length);
  const view = new DataView(out.buffer);

  // Header: "II", 42, offset of the first IFD
  out[0] = 0x49;
  out[1] = 0x49;
  view.setUint16(2, 42, true);
  view.setUint32(4, HEADER_SIZE, true);

  let pos = HEADER_SIZE;
  view.setUint16(pos, entries.length, true);
  pos += 2;
  for (const entry of entries) {
    view.setUint16(pos, entry.tag, true);
    view.setUint16(pos + 2, entry.type, true);
    view.setUint32(pos + 4, entry.values.length, true);
    if (entry.values.length === 1) {
      if (entry.type === SHORT) view.setUint16(pos + 8, entry.values[0], true);
      else view.setUint32(pos + 8, entry.values[0], true);
    } else {
      // Three SHORTs do not fit in the entry; they live after the IFD
      const offset = entry.tag === TAG.BitsPerSample ? bitsOffset : formatOffset;
      view.setUint32(pos + 8, offset, true);
      entry.values.forEach((value, i) => view.setUint16(offset + i * 2, value, true));
    }
    pos += ENTRY_SIZE;
  }
  view.setUint32(pos, 0, true); // no next IFD

  out.set(strip, stripOffset);
  return out;
}
