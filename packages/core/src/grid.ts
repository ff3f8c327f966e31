/**
 * @module grid
 * Resolves one axis of a patch grid into absolute cell boundaries.
 *
 * Along an axis the layout is: border, cell, spacing, cell, ..., cell,
 * border, so the total length is `2 * border + sum(sizes) + spacing * (n - 1)`.
 */

import type { AxisGrid, DeclaredLength, GridAxisDefinition } from '@testpattern/types';
import { SemanticError, joinPath } from './errors';

/** The parent's cells spanned by a patch, passed down for `'parent'` grids. */
export interface ParentAxis {
  sizes: number[];
  spacing: number;
}

/** Descriptor vocabulary for one axis, used in messages. */
export interface AxisNames {
  breakdown: 'columns' | 'rows';
  alias: 'width' | 'height';
}

export const HORIZONTAL: AxisNames = { breakdown: 'columns', alias: 'width' };
export const VERTICAL: AxisNames = { breakdown: 'rows', alias: 'height' };

/** Where an axis is being resolved. */
export interface AxisContext {
  names: AxisNames;
  /** Absolute coordinate of the patch edge. */
  origin: number;
  /** Patch length along the axis; undefined for the root, whose length is derived. */
  extent?: number;
  /** Parent cells spanned by the patch; undefined for the root. */
  parent?: ParentAxis;
  /** Descriptor path of the patch. */
  path: string;
  /** Whether child patches will be placed in the grid. */
  hasChildren?: boolean;
}

/** Sum of borders, cells and spacing. */
export function axisLength(sizes: readonly number[], border: number, spacing: number): number {
  const cells = sizes.reduce((sum, size) => sum + size, 0);
  return 2 * border + cells + spacing * Math.max(0, sizes.length - 1);
}

/** Absolute start of every cell. */
export function cellStarts(sizes: readonly number[], origin: number, border: number, spacing: number): number[] {
  const starts: number[] = [];
  let cursor = origin + border;
  for (const size of sizes) {
    starts.push(cursor);
    cursor += size + spacing;
  }
  return starts;
}

function requireParent(ctx: AxisContext, key: string): ParentAxis {
  if (!ctx.parent) {
    throw new SemanticError(joinPath(ctx.path, key), "'parent' requires an enclosing grid");
  }
  return ctx.parent;
}

function sameSizes(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((size, i) => size === b[i]);
}

function checkDeclared(declared: DeclaredLength, grid: AxisGrid, ctx: AxisContext): void {
  const where = joinPath(ctx.path, ctx.names.alias);
  if (declared.kind === 'total') {
    if (declared.pixels !== grid.length) {
      throw new SemanticError(
        where,
        `the calculated ${ctx.names.alias} (${grid.length}) does not match the specified ${ctx.names.alias} (${declared.pixels})`,
      );
    }
    return;
  }
  const sizes = declared.kind === 'sizes' ? declared.sizes : requireParent(ctx, ctx.names.alias).sizes;
  if (!sameSizes(sizes, grid.sizes)) {
    throw new SemanticError(
      where,
      `[${sizes.join(', ')}] does not match ${ctx.names.breakdown} [${grid.sizes.join(', ')}]`,
    );
  }
}

function cellSizes(def: GridAxisDefinition, ctx: AxisContext): { sizes: number[]; inheritedSpacing: number } {
  switch (def.cells.kind) {
    case 'pixels':
      return { sizes: def.cells.sizes, inheritedSpacing: 0 };
    case 'parent': {
      const parent = requireParent(ctx, ctx.names.breakdown);
      return { sizes: [...parent.sizes], inheritedSpacing: parent.spacing };
    }
    case 'default': {
      if (ctx.extent === undefined) {
        throw new SemanticError(ctx.path, `'${ctx.names.alias}' or '${ctx.names.breakdown}' is required`);
      }
      const size = ctx.extent - 2 * def.border;
      // A childless patch may be all border; its band covers the rectangle.
      if (size <= 0 && !ctx.hasChildren) return { sizes: [], inheritedSpacing: 0 };
      if (size <= 0) {
        throw new SemanticError(
          joinPath(ctx.path, 'border'),
          `a border of ${def.border} leaves no room inside a ${ctx.extent} pixel ${ctx.names.alias}`,
        );
      }
      return { sizes: [size], inheritedSpacing: 0 };
    }
  }
}

/**
 * Resolve one axis of a patch grid.
 *
 * @param def - The axis definition from the patch.
 * @param ctx - Position, extent and parent cells of the patch.
 * @returns Cell sizes, absolute starts and the total length.
 * @throws {SemanticError} When the alias disagrees with the breakdown, a
 *   default cell for children has no room, or the grid overflows the patch.
 */
export function resolveAxis(def: GridAxisDefinition, ctx: AxisContext): AxisGrid {
  const { border } = def;
  const { sizes, inheritedSpacing } = cellSizes(def, ctx);

  const spacing = def.spacing ?? inheritedSpacing;
  const grid: AxisGrid = {
    border,
    spacing,
    sizes,
    starts: cellStarts(sizes, ctx.origin, border, spacing),
    length: sizes.length === 0 && ctx.extent !== undefined ? ctx.extent : axisLength(sizes, border, spacing),
  };

  if (def.declared) checkDeclared(def.declared, grid, ctx);

  if (ctx.extent !== undefined && grid.length > ctx.extent) {
    throw new SemanticError(
      ctx.path,
      `the grid ${ctx.names.alias} (${grid.length}) exceeds the patch ${ctx.names.alias} (${ctx.extent})`,
    );
  }
  return grid;
}
