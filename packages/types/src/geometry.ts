/**
 * @module geometry
 * Pixel geometry derived from a {@link TestPatternDocument} for one render.
 */

import type { Rect } from './common';
import type { PatchNode } from './model';

/** Resolved cells along one axis. */
export interface AxisGrid {
  border: number;
  spacing: number;
  /** Cell sizes in pixels. */
  sizes: number[];
  /** Absolute start coordinate of each cell. */
  starts: number[];
  /** Borders + cells + spacing. */
  length: number;
}

/** A patch with its absolute rectangle and grid. */
export interface ResolvedPatch {
  node: PatchNode;
  rect: Rect;
  columns: AxisGrid;
  rows: AxisGrid;
  children: ResolvedPatch[];
}

/** A rectangular block of grid cells, 0-based. */
export interface CellSpan {
  top: number;
  left: number;
  rows: number;
  columns: number;
}
