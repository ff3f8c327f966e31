/**
 * @module layout
 * Top-down geometry pass: gives every patch an absolute rectangle and grid.
 *
 * The root's size is derived from its grid. Each child's rectangle covers
 * the parent cells it spans, including the spacing between them, and the
 * parent cells are handed down for `'parent'` grids.
 */

import type { AxisGrid, CellSpan, PatchNode, Rect, ResolvedPatch, TestPatternDocument } from '@testpattern/types';
import { HORIZONTAL, VERTICAL, resolveAxis } from './grid';
import type { ParentAxis } from './grid';
import { placeChildren } from './placement';

/** Parent cells spanned by a child, on both axes. */
interface ParentCells {
  columns: ParentAxis;
  rows: ParentAxis;
}

/** Absolute extent covered by cells `first` to `first + count - 1`. */
function spanExtent(axis: AxisGrid, first: number, count: number): { start: number; length: number } {
  const last = first + count - 1;
  const start = axis.starts[first];
  return { start, length: axis.starts[last] + axis.sizes[last] - start };
}

function childRect(columns: AxisGrid, rows: AxisGrid, span: CellSpan): Rect {
  const x = spanExtent(columns, span.left, span.columns);
  const y = spanExtent(rows, span.top, span.rows);
  return { x: x.start, y: y.start, width: x.length, height: y.length };
}

function spannedCells(columns: AxisGrid, rows: AxisGrid, span: CellSpan): ParentCells {
  return {
    columns: { sizes: columns.sizes.slice(span.left, span.left + span.columns), spacing: columns.spacing },
    rows: { sizes: rows.sizes.slice(span.top, span.top + span.rows), spacing: rows.spacing },
  };
}

function resolvePatch(node: PatchNode, rect: Rect, parent: ParentCells): ResolvedPatch {
  const columns = resolveAxis(node.columns, {
    names: HORIZONTAL,
    origin: rect.x,
    extent: rect.width,
    parent: parent.columns,
    path: node.path,
    hasChildren: node.children.length > 0,
  });
  const rows = resolveAxis(node.rows, {
    names: VERTICAL,
    origin: rect.y,
    extent: rect.height,
    parent: parent.rows,
    path: node.path,
    hasChildren: node.children.length > 0,
  });
  return { node, rect, columns, rows, children: resolveChildren(node, columns, rows) };
}

function resolveChildren(node: PatchNode, columns: AxisGrid, rows: AxisGrid): ResolvedPatch[] {
  const spans = placeChildren(node.children, { rows: rows.sizes.length, columns: columns.sizes.length });
  return node.children.map((child, i) =>
    resolvePatch(child, childRect(columns, rows, spans[i]), spannedCells(columns, rows, spans[i])),
  );
}

/**
 * Resolve the geometry of a whole document.
 *
 * @param document - A validated document.
 * @returns The root patch, whose rectangle is the full image.
 * @throws {SemanticError} On the first grid or placement violation.
 */
export function resolveLayout(document: TestPatternDocument): ResolvedPatch {
  const { root } = document;
  const columns = resolveAxis(root.columns, { names: HORIZONTAL, origin: 0, path: root.path });
  const rows = resolveAxis(root.rows, { names: VERTICAL, origin: 0, path: root.path });
  const rect: Rect = { x: 0, y: 0, width: columns.length, height: rows.length };
  return { node: root, rect, columns, rows, children: resolveChildren(root, columns, rows) };
}
