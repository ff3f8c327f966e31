/**
 * @module compositor
 * Rasterizes a resolved patch tree into a single pixel buffer.
 *
 * Per patch, in order:
 *   1. background across the whole rectangle, border band included
 *   2. border band in `bordercolor`, if set
 *   3. spacing gaps in `bordercolor`, if set and the patch has children
 *   4. children, concurrently
 *   5. overlay image, on top of everything drawn for the patch
 *
 * Sibling rectangles never overlap, so children write to the shared buffer
 * without coordination; the only barrier is the join before step 5.
 */

import type {
  Background,
  EventBus,
  OverlayImage,
  OverlayLoader,
  PixelBuffer,
  Rect,
  ResolvedPatch,
  Rgb,
  TestPatternDocument,
} from '@testpattern/types';
import { quantize } from './color';
import { ResourceError, joinPath } from './errors';
import { renderGradient } from './gradient';
import { renderGrating } from './grating';
import { resolveLayout } from './layout';
import { compositeOverlay } from './overlay';
import { createPixelBuffer, fillRect } from './pixel-buffer';

/** Collaborators used while rendering. */
export interface RenderOptions {
  /** Loads `image` overlays. Required only if the document uses them. */
  loader?: OverlayLoader;
  /** Receives progress events. */
  events?: EventBus;
}

/** State shared by every patch of one render. */
interface RenderContext {
  buffer: PixelBuffer;
  loader?: OverlayLoader;
  events?: EventBus;
}

// ---------------------------------------------------------------------------
// Steps
// ---------------------------------------------------------------------------

/** Step 1: fill the patch rectangle with its background. */
export function fillBackground(buffer: PixelBuffer, rect: Rect, background: Background, path = ''): void {
  switch (background.kind) {
    case 'none':
      return;
    case 'solid':
      fillRect(buffer, rect, quantize(background.color, buffer.depth, joinPath(path, 'color')));
      return;
    case 'gradient':
      renderGradient(buffer, rect, background, path);
      return;
    case 'grating':
      renderGrating(buffer, rect, background, path);
      return;
  }
}

/** Step 2: paint the outer band of the patch. */
export function drawBorder(buffer: PixelBuffer, patch: ResolvedPatch, sample: Rgb): void {
  const { rect } = patch;
  const h = Math.min(patch.columns.border, rect.width);
  const v = Math.min(patch.rows.border, rect.height);
  if (v > 0) {
    fillRect(buffer, { x: rect.x, y: rect.y, width: rect.width, height: v }, sample);
    fillRect(buffer, { x: rect.x, y: rect.y + rect.height - v, width: rect.width, height: v }, sample);
  }
  if (h > 0) {
    fillRect(buffer, { x: rect.x, y: rect.y, width: h, height: rect.height }, sample);
    fillRect(buffer, { x: rect.x + rect.width - h, y: rect.y, width: h, height: rect.height }, sample);
  }
}

/** Step 3: paint the gaps between grid cells across the patch interior. */
export function drawSpacing(buffer: PixelBuffer, patch: ResolvedPatch, sample: Rgb): void {
  const { rect, columns, rows } = patch;
  const inner: Rect = {
    x: rect.x + columns.border,
    y: rect.y + rows.border,
    width: rect.width - 2 * columns.border,
    height: rect.height - 2 * rows.border,
  };
  if (columns.spacing > 0) {
    for (let i = 1; i < columns.starts.length; i++) {
      fillRect(buffer, { x: columns.starts[i] - columns.spacing, y: inner.y, width: columns.spacing, height: inner.height }, sample);
    }
  }
  if (rows.spacing > 0) {
    for (let i = 1; i < rows.starts.length; i++) {
      fillRect(buffer, { x: inner.x, y: rows.starts[i] - rows.spacing, width: inner.width, height: rows.spacing }, sample);
    }
  }
}

async function drawOverlay(ctx: RenderContext, patch: ResolvedPatch): Promise<void> {
  const { overlay, path } = patch.node;
  if (!overlay) return;
  const where = joinPath(path, 'image');
  if (!ctx.loader) {
    throw new ResourceError(where, `cannot load '${overlay.file}': no overlay loader is configured`);
  }
  let image: OverlayImage;
  try {
    image = await ctx.loader.load(overlay.file);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ResourceError(where, reason, err);
  }
  ctx.events?.emit('overlay:loaded', { path, file: overlay.file, width: image.width, height: image.height });
  compositeOverlay(ctx.buffer, patch.rect, image, overlay.premultiplied, where);
}

async function renderPatch(ctx: RenderContext, patch: ResolvedPatch): Promise<void> {
  const { node, rect } = patch;
  const { buffer } = ctx;

  fillBackground(buffer, rect, node.background, node.path);

  if (node.borderColor) {
    const sample = quantize(node.borderColor, buffer.depth, joinPath(node.path, 'bordercolor'));
    drawBorder(buffer, patch, sample);
    if (patch.children.length > 0) drawSpacing(buffer, patch, sample);
  }

  await Promise.all(patch.children.map((child) => renderPatch(ctx, child)));

  await drawOverlay(ctx, patch);
  ctx.events?.emit('patch:rendered', { path: node.path, rect });
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

/**
 * Lay out and render a validated document.
 *
 * @param document - Output of {@link buildDocument}.
 * @param options - Overlay loader and event bus.
 * @returns A buffer at the document depth covering the root patch.
 * @throws {SemanticError} On layout failures.
 * @throws {ResourceError} When an overlay cannot be loaded.
 */
export async function renderDocument(
  document: TestPatternDocument,
  options: RenderOptions = {},
): Promise<PixelBuffer> {
  const started = performance.now();
  const root = resolveLayout(document);
  const buffer = createPixelBuffer(root.rect.width, root.rect.height, document.depth);

  options.events?.emit('render:started', {
    name: document.name,
    width: buffer.width,
    height: buffer.height,
    depth: buffer.depth,
  });

  await renderPatch({ buffer, loader: options.loader, events: options.events }, root);

  options.events?.emit('render:finished', { durationMs: performance.now() - started });
  return buffer;
}
