/**
 * @module document
 * Builds the validated patch tree from a structurally valid descriptor.
 *
 * Checks every rule that the schema cannot express: version gating,
 * conflicting background kinds, color ranges at the declared depth,
 * grating half-periods, `parent` on the root and placement consistency.
 * Geometry is not resolved here; see {@link ./layout.ts}.
 */

import type {
  Background,
  BackgroundKey,
  CellSizing,
  CellSpec,
  ChildDescriptor,
  ColorValue,
  DeclaredLength,
  Depth,
  GratingSpec,
  GridAxisDefinition,
  GridSpec,
  PairSpec,
  PatchDescriptor,
  PatchFields,
  PatchNode,
  Placement,
  RampSpec,
  Rgb,
  RootDescriptor,
  TestPatternDocument,
} from '@testpattern/types';
import { isFloatDepth, quantize, toRgb } from './color';
import { SemanticError, joinPath } from './errors';

/** Highest descriptor version understood by this engine. */
export const LATEST_VERSION = 2;

/** Fields introduced by version 2 of the format. */
const VERSION_2_FIELDS = [
  'border',
  'spacing',
  'bordercolor',
  'cell',
  'hsquare',
  'vsquare',
  'hsine',
  'vsine',
  'hcosine',
  'vcosine',
  'image',
  'premul',
  'description',
  'descriptions',
  'patches',
] as const;

/** Per-document state threaded through the recursion. */
interface BuildContext {
  version: number;
  depth: Depth;
}

// ---------------------------------------------------------------------------
// Colors
// ---------------------------------------------------------------------------

/** Broadcast a color and, for integer depths, check it against the code range. */
function checkedColor(value: ColorValue, ctx: BuildContext, path: string): Rgb {
  if (!isFloatDepth(ctx.depth)) quantize(value, ctx.depth, path);
  return toRgb(value);
}

// ---------------------------------------------------------------------------
// Backgrounds
// ---------------------------------------------------------------------------

type GratingKey = Exclude<BackgroundKey, 'color' | 'hramp' | 'vramp'>;

const GRATING_KEYS: readonly GratingKey[] = ['hsquare', 'vsquare', 'hsine', 'vsine', 'hcosine', 'vcosine'];

/** A background field as authored, tagged by its key. */
type BackgroundField =
  | { key: 'color'; value: ColorValue }
  | { key: 'hramp' | 'vramp'; value: RampSpec }
  | { key: GratingKey; value: GratingSpec };

function backgroundFields(fields: PatchFields): BackgroundField[] {
  const found: BackgroundField[] = [];
  if (fields.color !== undefined) found.push({ key: 'color', value: fields.color });
  if (fields.hramp !== undefined) found.push({ key: 'hramp', value: fields.hramp });
  if (fields.vramp !== undefined) found.push({ key: 'vramp', value: fields.vramp });
  for (const key of GRATING_KEYS) {
    const value = fields[key];
    if (value !== undefined) found.push({ key, value });
  }
  return found;
}

function gratingBackground(key: GratingKey, spec: GratingSpec, ctx: BuildContext, path: string): Background {
  const short = spec.length === 3;
  const [start, end, from, to]: [number, number, ColorValue, ColorValue] = short
    ? [spec[0], spec[0], spec[1], spec[2]]
    : spec;
  const colorAt = short ? 1 : 2;

  for (const [period, at] of [[start, 0], [end, short ? 0 : 1]]) {
    if (period < 1) {
      throw new SemanticError(joinPath(path, at), `half-period ${period} is below the 1-pixel Nyquist limit`);
    }
  }

  return {
    kind: 'grating',
    axis: key.startsWith('h') ? 'horizontal' : 'vertical',
    waveform: key.endsWith('square') ? 'square' : key.endsWith('cosine') ? 'cosine' : 'sine',
    startHalfPeriod: start,
    endHalfPeriod: end,
    from: checkedColor(from, ctx, joinPath(path, colorAt)),
    to: checkedColor(to, ctx, joinPath(path, colorAt + 1)),
  };
}

/**
 * Turn the background fields of a patch into one variant.
 * @throws {SemanticError} When more than one background kind is set.
 */
function buildBackground(fields: PatchFields, ctx: BuildContext, path: string): Background {
  const present = backgroundFields(fields);
  if (present.length > 1) {
    const names = present.map((field) => `'${field.key}'`).join(', ');
    throw new SemanticError(path, `conflicting backgrounds ${names}; a patch takes at most one`);
  }
  if (present.length === 0) return { kind: 'none' };

  const field = present[0];
  const keyPath = joinPath(path, field.key);
  switch (field.key) {
    case 'color':
      return { kind: 'solid', color: checkedColor(field.value, ctx, keyPath) };
    case 'hramp':
    case 'vramp':
      return {
        kind: 'gradient',
        axis: field.key === 'hramp' ? 'horizontal' : 'vertical',
        from: checkedColor(field.value[0], ctx, joinPath(keyPath, 0)),
        to: checkedColor(field.value[1], ctx, joinPath(keyPath, 1)),
      };
    default:
      return gratingBackground(field.key, field.value, ctx, keyPath);
  }
}

// ---------------------------------------------------------------------------
// Grid axes
// ---------------------------------------------------------------------------

function toSizing(spec: GridSpec | undefined): CellSizing {
  if (spec === undefined) return { kind: 'default' };
  if (spec === 'parent') return { kind: 'parent' };
  return { kind: 'pixels', sizes: typeof spec === 'number' ? [spec] : [...spec] };
}

function toDeclared(spec: GridSpec): DeclaredLength {
  if (spec === 'parent') return { kind: 'parent' };
  if (typeof spec === 'number') return { kind: 'total', pixels: spec };
  return { kind: 'sizes', sizes: [...spec] };
}

/** `[vertical, horizontal]` thickness pair. */
function splitPair(spec: PairSpec | undefined): [number, number] | undefined {
  if (spec === undefined) return undefined;
  return typeof spec === 'number' ? [spec, spec] : [spec[0], spec[1]];
}

function buildAxis(
  breakdownKey: 'columns' | 'rows',
  aliasKey: 'width' | 'height',
  fields: PatchFields,
  border: number,
  spacing: number | undefined,
  isRoot: boolean,
  path: string,
): GridAxisDefinition {
  const breakdown = fields[breakdownKey];
  const alias = fields[aliasKey];
  if (isRoot) {
    for (const [key, value] of [[breakdownKey, breakdown], [aliasKey, alias]] as const) {
      if (value === 'parent') {
        throw new SemanticError(joinPath(path, key), "'parent' is only valid on a nested patch");
      }
    }
  }

  const axis: GridAxisDefinition = { cells: toSizing(breakdown ?? alias), border, spacing };
  if (breakdown !== undefined && alias !== undefined) axis.declared = toDeclared(alias);
  return axis;
}

// ---------------------------------------------------------------------------
// Placement
// ---------------------------------------------------------------------------

function cellPlacement(cell: CellSpec, path: string): Placement {
  if (cell.length === 2) return { kind: 'cell', row: cell[0] - 1, column: cell[1] - 1 };
  const [top, left, bottom, right] = cell;
  if (top > bottom || left > right) {
    throw new SemanticError(
      path,
      `cell range [${cell.join(', ')}] must have its top-left at or before its bottom-right`,
    );
  }
  return { kind: 'range', top: top - 1, left: left - 1, bottom, right };
}

function buildPlacement(patch: PatchDescriptor, path: string): Placement {
  const { cell, left, top, right, bottom } = patch;
  // 'cell' takes precedence over the legacy edge keys.
  if (cell !== undefined) return cellPlacement(cell, joinPath(path, 'cell'));
  if (left !== undefined || top !== undefined || right !== undefined || bottom !== undefined) {
    return { kind: 'edges', left, top, right, bottom };
  }
  return { kind: 'next' };
}

// ---------------------------------------------------------------------------
// Patches
// ---------------------------------------------------------------------------

function checkVersionGates(fields: PatchDescriptor, ctx: BuildContext, path: string): void {
  if (ctx.version >= 2) return;
  for (const key of VERSION_2_FIELDS) {
    if (fields[key] !== undefined) {
      throw new SemanticError(
        joinPath(path, key),
        `'${key}' requires version 2 but the descriptor declares version ${ctx.version}`,
      );
    }
  }
}

function colorPatch(value: ColorValue, ctx: BuildContext, path: string): PatchNode {
  return {
    path,
    columns: { cells: { kind: 'default' }, border: 0 },
    rows: { cells: { kind: 'default' }, border: 0 },
    background: { kind: 'solid', color: checkedColor(value, ctx, path) },
    placement: { kind: 'next' },
    children: [],
    descriptions: [],
  };
}

function buildChild(child: ChildDescriptor, ctx: BuildContext, path: string): PatchNode {
  if (typeof child === 'number' || Array.isArray(child)) return colorPatch(child, ctx, path);
  return buildPatch(child, buildPlacement(child, path), false, ctx, path);
}

function buildPatch(
  fields: PatchFields,
  placement: Placement,
  isRoot: boolean,
  ctx: BuildContext,
  path: string,
): PatchNode {
  checkVersionGates(fields, ctx, path);

  if (fields.patches !== undefined && fields.subpatches !== undefined) {
    throw new SemanticError(path, "'patches' and its deprecated alias 'subpatches' cannot both be set");
  }

  const [vBorder, hBorder] = splitPair(fields.border) ?? [0, 0];
  const spacing = splitPair(fields.spacing);

  const childKey = fields.patches !== undefined ? 'patches' : 'subpatches';
  const children = (fields.patches ?? fields.subpatches ?? []).map((child, i) =>
    buildChild(child, ctx, joinPath(joinPath(path, childKey), i)),
  );

  const node: PatchNode = {
    path,
    columns: buildAxis('columns', 'width', fields, hBorder, spacing?.[1], isRoot, path),
    rows: buildAxis('rows', 'height', fields, vBorder, spacing?.[0], isRoot, path),
    background: buildBackground(fields, ctx, path),
    placement,
    children,
    description: fields.description,
    descriptions: fields.descriptions ?? [],
  };
  if (fields.bordercolor !== undefined) {
    node.borderColor = checkedColor(fields.bordercolor, ctx, joinPath(path, 'bordercolor'));
  }
  if (fields.image !== undefined) {
    node.overlay = { file: fields.image, premultiplied: fields.premul ?? true };
  }
  return node;
}

/**
 * Validate a descriptor and build its patch tree.
 *
 * @param descriptor - Output of {@link parseDescriptor}.
 * @returns The validated document.
 * @throws {SemanticError} On the first rule violation.
 */
export function buildDocument(descriptor: RootDescriptor): TestPatternDocument {
  const version = descriptor.version ?? 1;
  if (version > LATEST_VERSION) {
    throw new SemanticError(
      'version',
      `unsupported version ${version}; versions 1 to ${LATEST_VERSION} are supported`,
    );
  }
  const ctx: BuildContext = { version, depth: descriptor.depth };
  return {
    version,
    name: descriptor.name,
    depth: descriptor.depth,
    root: buildPatch(descriptor, { kind: 'next' }, true, ctx, ''),
  };
}
