/**
 * @module placement
 * Assigns each child patch a block of cells in its parent grid.
 *
 * Children are placed in order. A cursor starts at the first cell with a
 * 1x1 span; a child without explicit placement takes the cursor position
 * and span. After each child the cursor moves right by the child's width
 * and, when another block of that width would not fit in the row, wraps to
 * the first column of the row below the child.
 */

import type { CellSpan, Placement } from '@testpattern/types';
import { SemanticError } from './errors';

/** Column and row counts of a grid. */
export interface GridShape {
  rows: number;
  columns: number;
}

/** Default position and span for the next child. */
export type PlacementCursor = CellSpan;

/** Cursor before the first child. */
export const INITIAL_CURSOR: PlacementCursor = { top: 0, left: 0, rows: 1, columns: 1 };

function spanFor(placement: Placement, cursor: PlacementCursor, path: string): CellSpan {
  switch (placement.kind) {
    case 'next':
      return { ...cursor };
    case 'cell':
      return { top: placement.row, left: placement.column, rows: 1, columns: 1 };
    case 'range':
      return {
        top: placement.top,
        left: placement.left,
        rows: placement.bottom - placement.top,
        columns: placement.right - placement.left,
      };
    case 'edges': {
      const left = placement.left ?? cursor.left;
      const top = placement.top ?? cursor.top;
      const columns = placement.right !== undefined ? placement.right - left : cursor.columns;
      const rows = placement.bottom !== undefined ? placement.bottom - top : cursor.rows;
      if (columns < 1) {
        throw new SemanticError(path, `'right' (${placement.right}) must be greater than 'left' (${left})`);
      }
      if (rows < 1) {
        throw new SemanticError(path, `'bottom' (${placement.bottom}) must be greater than 'top' (${top})`);
      }
      return { top, left, rows, columns };
    }
  }
}

function describeSpan(span: CellSpan): string {
  const rows = span.rows > 1 ? `rows ${span.top + 1}-${span.top + span.rows}` : `row ${span.top + 1}`;
  const columns =
    span.columns > 1 ? `columns ${span.left + 1}-${span.left + span.columns}` : `column ${span.left + 1}`;
  return `${rows}, ${columns}`;
}

/**
 * Place one child and advance the cursor.
 *
 * @param cursor - Cursor left by the previous sibling.
 * @param placement - The child's placement.
 * @param grid - Shape of the parent grid.
 * @param path - Descriptor path of the child.
 * @returns The child's span and the cursor for the next sibling.
 * @throws {SemanticError} When the span leaves the grid.
 */
export function placeNext(
  cursor: PlacementCursor,
  placement: Placement,
  grid: GridShape,
  path: string,
): { span: CellSpan; cursor: PlacementCursor } {
  const span = spanFor(placement, cursor, path);

  if (span.top + span.rows > grid.rows || span.left + span.columns > grid.columns) {
    throw new SemanticError(
      path,
      `placement at ${describeSpan(span)} lies outside the ${grid.rows}x${grid.columns} grid`,
    );
  }

  let left = span.left + span.columns;
  let top = span.top;
  if (left + span.columns > grid.columns) {
    left = 0;
    top += span.rows;
  }
  return { span, cursor: { top, left, rows: span.rows, columns: span.columns } };
}

/**
 * Place a list of siblings in order.
 *
 * @param children - Placement and descriptor path of each child.
 * @param grid - Shape of the parent grid.
 * @returns One span per child, in order.
 */
export function placeChildren(
  children: ReadonlyArray<{ placement: Placement; path: string }>,
  grid: GridShape,
): CellSpan[] {
  const { spans } = children.reduce<{ spans: CellSpan[]; cursor: PlacementCursor }>(
    (acc, child) => {
      const placed = placeNext(acc.cursor, child.placement, grid, child.path);
      return { spans: [...acc.spans, placed.span], cursor: placed.cursor };
    },
    { spans: [], cursor: INITIAL_CURSOR },
  );
  return spans;
}
