/**
 * @module png-codec
 * Minimal PNG encoder/decoder using fflate for the zlib-wrapped IDAT stream.
 * Pure JS, no native image libraries.
 *
 * The decoder reads the non-interlaced greyscale, grey+alpha, RGB and RGBA
 * formats at 8 or 16 bits per sample, which covers overlay images. The
 * encoder writes 8-bit RGBA, used for previews.
 *
 * @see https://www.w3.org/TR/PNG/ — PNG specification
 */

import { unzlibSync, zlibSync } from 'fflate';

/** RGBA image data suitable for PNG encoding. */
export interface RgbaImage {
  /** RGBA pixel data. Length must be width * height * 4. */
  data: Uint8Array | Uint8ClampedArray;
  /** Width in pixels. */
  width: number;
  /** Height in pixels. */
  height: number;
}

/** A decoded PNG with its samples as stored. */
export interface DecodedPng {
  width: number;
  height: number;
  /** 1 grey, 2 grey+alpha, 3 RGB, 4 RGBA. */
  channels: 1 | 2 | 3 | 4;
  bitDepth: 8 | 16;
  /** Interleaved samples, one element per sample. */
  data: Uint8Array | Uint16Array;
}

// ── CRC32 lookup table (256 entries) ──

const crcTable = new Uint32Array(256);
for (let n = 0; n < 256; n++) {
  let c = n;
  for (let k = 0; k < 8; k++) {
    c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
  }
  crcTable[n] = c;
}

function crc32(data: Uint8Array, start: number, end: number): number {
  let crc = 0xffffffff;
  for (let i = start; i < end; i++) {
    crc = crcTable[(crc ^ data[i]) & 0xff] ^ (crc >>> 8);
  }
  return (crc ^ 0xffffffff) >>> 0;
}

// ── Helpers ──

function write32(buf: Uint8Array, offset: number, value: number): void {
  buf[offset] = (value >>> 24) & 0xff;
  buf[offset + 1] = (value >>> 16) & 0xff;
  buf[offset + 2] = (value >>> 8) & 0xff;
  buf[offset + 3] = value & 0xff;
}

function read32(buf: Uint8Array, offset: number): number {
  return (
    ((buf[offset] << 24) | (buf[offset + 1] << 16) | (buf[offset + 2] << 8) | buf[offset + 3]) >>>
    0
  );
}

// PNG signature: 8 bytes
const PNG_SIGNATURE = new Uint8Array([137, 80, 78, 71, 13, 10, 26, 10]);

/** Channels per PNG color type; palette (3) is not supported. */
const CHANNELS_BY_COLOR_TYPE: Record<number, DecodedPng['channels'] | undefined> = {
  0: 1,
  2: 3,
  4: 2,
  6: 4,
};

/** Append a chunk (length, type, data, CRC) at `offset`; returns the new offset. */
function writeChunk(out: Uint8Array, offset: number, type: string, data: Uint8Array): number {
  write32(out, offset, data.length);
  const typeStart = offset + 4;
  for (let i = 0; i < 4; i++) out[typeStart + i] = type.charCodeAt(i);
  out.set(data, typeStart + 4);
  const end = typeStart + 4 + data.length;
  write32(out, end, crc32(out, typeStart, end));
  return end + 4;
}

/**
 * Encodes an RGBA image as a PNG file.
 * Uses filter type 0 (None) for simplicity.
 *
 * @param image - The RGBA image to encode.
 * @returns PNG file data as Uint8Array.
 */
export function encodePng(image: RgbaImage): Uint8Array {
  const { data, width, height } = image;

  if (data.length !== width * height * 4) {
    throw new Error(
      `Image data length (${data.length}) does not match dimensions (${width}x${height}x4 = ${width * height * 4})`,
    );
  }

  // Build raw scanlines with filter byte 0 (None) prepended to each row
  const rowBytes = width * 4;
  const rawData = new Uint8Array(height * (1 + rowBytes));
  for (let y = 0; y < height; y++) {
    rawData[y * (1 + rowBytes)] = 0; // filter: None
    rawData.set(data.subarray(y * rowBytes, (y + 1) * rowBytes), y * (1 + rowBytes) + 1);
  }

  const ihdr = new Uint8Array(13);
  write32(ihdr, 0, width);
  write32(ihdr, 4, height);
  ihdr[8] = 8; // bit depth
  ihdr[9] = 6; // color type: RGBA

  const compressed = zlibSync(rawData);
  const out = new Uint8Array(8 + (12 + 13) + (12 + compressed.length) + 12);
  out.set(PNG_SIGNATURE, 0);
  let offset = writeChunk(out, 8, 'IHDR', ihdr);
  offset = writeChunk(out, offset, 'IDAT', compressed);
  writeChunk(out, offset, 'IEND', new Uint8Array(0));
  return out;
}

/**
 * Decodes a PNG file.
 * Supports filter types 0-4 (None, Sub, Up, Average, Paeth).
 *
 * @param png - PNG file data.
 * @returns Decoded samples at their stored bit depth.
 * @throws If the file is not a PNG or uses an unsupported format.
 */
export function decodePng(png: Uint8Array): DecodedPng {
  // Verify PNG signature
  for (let i = 0; i < 8; i++) {
    if (png[i] !== PNG_SIGNATURE[i]) {
      throw new Error('Invalid PNG signature');
    }
  }

  let width = 0;
  let height = 0;
  let bitDepth = 0;
  let channels: DecodedPng['channels'] | undefined;
  const idatChunks: Uint8Array[] = [];

  let offset = 8;
  while (offset + 8 <= png.length) {
    const length = read32(png, offset);
    offset += 4;
    const typeStr = String.fromCharCode(png[offset], png[offset + 1], png[offset + 2], png[offset + 3]);
    offset += 4;

    if (typeStr === 'IHDR') {
      width = read32(png, offset);
      height = read32(png, offset + 4);
      bitDepth = png[offset + 8];
      const colorType = png[offset + 9];
      const interlace = png[offset + 12];
      channels = CHANNELS_BY_COLOR_TYPE[colorType];

      if (!channels || (bitDepth !== 8 && bitDepth !== 16)) {
        throw new Error(
          `Unsupported PNG format: bitDepth=${bitDepth}, colorType=${colorType}. Only 8/16-bit grey, grey+alpha, RGB and RGBA are supported.`,
        );
      }
      if (interlace !== 0) {
        throw new Error('Interlaced PNG files are not supported');
      }
    } else if (typeStr === 'IDAT') {
      idatChunks.push(png.slice(offset, offset + length));
    } else if (typeStr === 'IEND') {
      break;
    }

    offset += length + 4; // skip data + CRC
  }

  if (width === 0 || height === 0 || !channels) {
    throw new Error('PNG missing IHDR chunk');
  }

  // Concatenate IDAT chunks and inflate
  let totalLen = 0;
  for (const chunk of idatChunks) totalLen += chunk.length;
  const combined = new Uint8Array(totalLen);
  let pos = 0;
  for (const chunk of idatChunks) {
    combined.set(chunk, pos);
    pos += chunk.length;
  }

  const rawData = unzlibSync(combined);
  const bytesPerSample = bitDepth / 8;
  const bpp = channels * bytesPerSample; // bytes per complete pixel, the filter distance
  const rowBytes = width * bpp;
  if (rawData.length < height * (1 + rowBytes)) {
    throw new Error('PNG image data is truncated');
  }
  const bytes = new Uint8Array(height * rowBytes);

  // Reconstruct scanlines with filter reversal
  for (let y = 0; y < height; y++) {
    const filterType = rawData[y * (1 + rowBytes)];
    const scanlineOffset = y * (1 + rowBytes) + 1;
    const outOffset = y * rowBytes;

    for (let x = 0; x < rowBytes; x++) {
      const raw = rawData[scanlineOffset + x];
      const a = x >= bpp ? bytes[outOffset + x - bpp] : 0; // left
      const b = y > 0 ? bytes[outOffset - rowBytes + x] : 0; // above
      const c = x >= bpp && y > 0 ? bytes[outOffset - rowBytes + x - bpp] : 0; // above-left

      let reconstructed: number;
      switch (filterType) {
        case 0: // None
          reconstructed = raw;
          break;
        case 1: // Sub
          reconstructed = (raw + a) & 0xff;
          break;
        case 2: // Up
          reconstructed = (raw + b) & 0xff;
          break;
        case 3: // Average
          reconstructed = (raw + ((a + b) >> 1)) & 0xff;
          break;
        case 4: // Paeth
          reconstructed = (raw + paethPredictor(a, b, c)) & 0xff;
          break;
        default:
          throw new Error(`Unsupported PNG filter type: ${filterType}`);
      }

      bytes[outOffset + x] = reconstructed;
    }
  }

  if (bitDepth === 8) {
    return { width, height, channels, bitDepth: 8, data: bytes };
  }

  // 16-bit samples are big-endian
  const samples = new Uint16Array(bytes.length / 2);
  for (let i = 0; i < samples.length; i++) {
    samples[i] = (bytes[i * 2] << 8) | bytes[i * 2 + 1];
  }
  return { width, height, channels, bitDepth: 16, data: samples };
}

/**
 * Paeth predictor function used in PNG filter type 4.
 */
function paethPredictor(a: number, b: number, c: number): number {
  const p = a + b - c;
  const pa = Math.abs(p - a);
  const pb = Math.abs(p - b);
  const pc = Math.abs(p - c);
  if (pa <= pb && pa <= pc) return a;
  if (pb <= pc) return b;
  return c;
}
