/**
 * @module descriptor
 * Wire types of a test pattern descriptor, as authored in JSON.
 *
 * These mirror the descriptor schema one-to-one. They carry no resolved
 * information; see {@link ./model.ts} for the validated tree.
 */

import type { Depth } from './common';

/** A greyscale sample or an `[r, g, b]` triplet. */
export type ColorValue = number | [number, number, number];

/**
 * Grid breakdown along one axis: a single cell size, one size per cell,
 * or `'parent'` to reuse the cells of the parent grid this patch spans.
 */
export type GridSpec = number | number[] | 'parent';

/** A single thickness for both axes, or `[vertical, horizontal]`. */
export type PairSpec = number | [number, number];

/** Two-color ramp: `[from, to]`. */
export type RampSpec = [ColorValue, ColorValue];

/**
 * Grating: `[halfPeriod, color1, color2]`, or
 * `[startHalfPeriod, endHalfPeriod, color1, color2]` for a sweep.
 */
export type GratingSpec =
  | [number, ColorValue, ColorValue]
  | [number, number, ColorValue, ColorValue];

/** 1-based `[row, column]`, or inclusive `[top, left, bottom, right]`. */
export type CellSpec = [number, number] | [number, number, number, number];

/** Fields shared by the root and every nested patch. */
export interface PatchFields {
  rows?: GridSpec;
  columns?: GridSpec;
  width?: GridSpec;
  height?: GridSpec;
  border?: PairSpec;
  spacing?: PairSpec;
  bordercolor?: ColorValue;
  color?: ColorValue;
  hramp?: RampSpec;
  vramp?: RampSpec;
  hsquare?: GratingSpec;
  vsquare?: GratingSpec;
  hsine?: GratingSpec;
  vsine?: GratingSpec;
  hcosine?: GratingSpec;
  vcosine?: GratingSpec;
  image?: string;
  premul?: boolean;
  description?: string;
  descriptions?: string[];
  patches?: ChildDescriptor[];
  /** Deprecated alias of `patches`. */
  subpatches?: ChildDescriptor[];
}

/** A nested patch, optionally placed explicitly within its parent grid. */
export interface PatchDescriptor extends PatchFields {
  cell?: CellSpec;
  /** Legacy 0-based, half-open placement. */
  left?: number;
  top?: number;
  right?: number;
  bottom?: number;
}

/** A child entry: a full patch, or a bare color filling the next cell. */
export type ChildDescriptor = ColorValue | PatchDescriptor;

/** The top-level descriptor document. */
export interface RootDescriptor extends PatchFields {
  /** Format version. Defaults to 1. */
  version?: number;
  name?: string;
  depth: Depth;
}

/** Keys that select a patch background, in precedence order. */
export type BackgroundKey =
  | 'color'
  | 'hramp'
  | 'vramp'
  | 'hsquare'
  | 'vsquare'
  | 'hsine'
  | 'vsine'
  | 'hcosine'
  | 'vcosine';
