/**
 * @module model
 * Validated patch tree built from a descriptor.
 *
 * Each background kind is one variant of {@link Background}, so a patch
 * cannot carry two of them once built.
 */

import type { Axis, Depth, Rgb } from './common';

/** Grating waveform shape. */
export type Waveform = 'square' | 'sine' | 'cosine';

/** No fill: whatever lies beneath shows through. */
export interface NoBackground {
  kind: 'none';
}

/** A single uniform color. */
export interface SolidBackground {
  kind: 'solid';
  color: Rgb;
}

/** A linear ramp between two colors. */
export interface GradientBackground {
  kind: 'gradient';
  axis: Axis;
  from: Rgb;
  to: Rgb;
}

/** A periodic alternation between two colors, optionally swept. */
export interface GratingBackground {
  kind: 'grating';
  axis: Axis;
  waveform: Waveform;
  /** Half-period in pixels at the start of the patch. */
  startHalfPeriod: number;
  /** Half-period in pixels at the end of the patch. Equal to the start when not swept. */
  endHalfPeriod: number;
  from: Rgb;
  to: Rgb;
}

export type Background = NoBackground | SolidBackground | GradientBackground | GratingBackground;

/** How the cells along one axis are sized. */
export type CellSizing =
  | { kind: 'default' }
  | { kind: 'pixels'; sizes: number[] }
  | { kind: 'parent' };

/** A length declared alongside the breakdown, checked after resolution. */
export type DeclaredLength =
  | { kind: 'total'; pixels: number }
  | { kind: 'sizes'; sizes: number[] }
  | { kind: 'parent' };

/** Grid definition for one axis of a patch. */
export interface GridAxisDefinition {
  cells: CellSizing;
  declared?: DeclaredLength;
  /** Thickness of the band at each end of the axis. */
  border: number;
  /** Gap between adjacent cells; inherited or zero when undefined. */
  spacing?: number;
}

/**
 * Where a child sits in its parent grid. Indices are 0-based and
 * `bottom`/`right` exclusive.
 */
export type Placement =
  | { kind: 'next' }
  | { kind: 'cell'; row: number; column: number }
  | { kind: 'range'; top: number; left: number; bottom: number; right: number }
  | { kind: 'edges'; left?: number; top?: number; right?: number; bottom?: number };

/** Image composited on top of a patch after its children. */
export interface OverlayRef {
  file: string;
  premultiplied: boolean;
}

/** One node of the validated patch tree. */
export interface PatchNode {
  /** Descriptor path, e.g. `patches[2].patches[0]`; empty for the root. */
  path: string;
  columns: GridAxisDefinition;
  rows: GridAxisDefinition;
  background: Background;
  borderColor?: Rgb;
  overlay?: OverlayRef;
  placement: Placement;
  children: PatchNode[];
  description?: string;
  descriptions: string[];
}

/** A validated descriptor, ready for layout. */
export interface TestPatternDocument {
  version: number;
  name?: string;
  depth: Depth;
  root: PatchNode;
}
