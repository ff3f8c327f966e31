/**
 * @module render
 * One-call pipeline: parse, validate, lay out and rasterize a descriptor.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { Depth, PixelBuffer, TestPatternDocument } from '@testpattern/types';
import { renderDocument } from './compositor';
import type { RenderOptions } from './compositor';
import { buildDocument } from './document';
import { ResourceError, StructuralError } from './errors';
import { createPngOverlayLoader } from './png-loader';
import { parseDescriptor } from './schema';

/** Outcome of a successful render. */
export interface RenderResult {
  buffer: PixelBuffer;
  /** The descriptor's `name`, if any. */
  name?: string;
  depth: Depth;
  document: TestPatternDocument;
}

/**
 * Structurally and semantically validate a parsed descriptor without rendering.
 * Layout errors (grid fit, placement bounds) surface only when rendering.
 */
export function validateDescriptor(input: unknown): TestPatternDocument {
  return buildDocument(parseDescriptor(input));
}

/** Parse descriptor text; malformed JSON is a structural failure. */
export function parseDescriptorText(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new StructuralError('', `invalid JSON: ${reason}`);
  }
}

/**
 * Render a parsed descriptor.
 *
 * @param input - Descriptor as parsed from JSON.
 * @param options - Overlay loader and event bus.
 */
export async function renderDescriptor(input: unknown, options: RenderOptions = {}): Promise<RenderResult> {
  const document = validateDescriptor(input);
  const buffer = await renderDocument(document, options);
  return { buffer, name: document.name, depth: document.depth, document };
}

/**
 * Read and render a descriptor file. Unless a loader is given, overlays are
 * read as PNG files relative to the descriptor's directory.
 *
 * @throws {ResourceError} When the file cannot be read.
 */
export async function loadDescriptor(file: string, options: RenderOptions = {}): Promise<RenderResult> {
  let text: string;
  try {
    text = await fs.promises.readFile(file, 'utf-8');
  } catch (err) {
    throw new ResourceError('', `cannot read descriptor '${file}'`, err);
  }
  const loader = options.loader ?? createPngOverlayLoader(path.dirname(path.resolve(file)));
  return renderDescriptor(parseDescriptorText(text), { ...options, loader });
}
