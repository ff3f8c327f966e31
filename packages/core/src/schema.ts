/**
 * @module schema
 * Structural validation of descriptor JSON.
 *
 * Objects are strict: unknown keys are rejected at every level. Only the
 * shape of the document is checked here; rules that need the rest of the
 * tree (versions, conflicting backgrounds, color ranges) live in
 * {@link ./document.ts}.
 *
 * Dependencies:
 * - zod: schema definition and parsing
 */

import { z } from 'zod';
import type { ChildDescriptor, PatchDescriptor, RootDescriptor } from '@testpattern/types';
import { StructuralError } from './errors';

// ---------------------------------------------------------------------------
// Leaves
// ---------------------------------------------------------------------------

const sample = z.number().finite();

const colorSchema = z.union([sample, z.tuple([sample, sample, sample])], {
  errorMap: () => ({ message: 'expected a number or an [r, g, b] triplet' }),
});

const cellSize = z.number().int().positive();

const gridSchema = z.union([cellSize, z.array(cellSize).min(1), z.literal('parent')], {
  errorMap: () => ({ message: "expected a pixel count, a list of pixel counts or 'parent'" }),
});

const thickness = z.number().int().nonnegative();

const pairSchema = z.union([thickness, z.tuple([thickness, thickness])], {
  errorMap: () => ({ message: 'expected a pixel count or a [vertical, horizontal] pair' }),
});

const rampSchema = z.tuple([colorSchema, colorSchema]);

const halfPeriod = z.number().finite().positive();

const gratingSchema = z.union(
  [
    z.tuple([halfPeriod, colorSchema, colorSchema]),
    z.tuple([halfPeriod, halfPeriod, colorSchema, colorSchema]),
  ],
  {
    errorMap: () => ({
      message: 'expected [halfPeriod, color, color] or [startHalfPeriod, endHalfPeriod, color, color]',
    }),
  },
);

const cellIndex = z.number().int().positive();

const cellSchema = z.union(
  [z.tuple([cellIndex, cellIndex]), z.tuple([cellIndex, cellIndex, cellIndex, cellIndex])],
  { errorMap: () => ({ message: 'expected [row, column] or [top, left, bottom, right]' }) },
);

const edge = z.number().int().nonnegative();

const depthSchema = z.union([z.literal(8), z.literal(10), z.literal(12), z.literal(16), z.literal(32)], {
  errorMap: () => ({ message: 'expected one of 8, 10, 12, 16, 32' }),
});

// ---------------------------------------------------------------------------
// Patches
// ---------------------------------------------------------------------------

const patchFields = {
  rows: gridSchema.optional(),
  columns: gridSchema.optional(),
  width: gridSchema.optional(),
  height: gridSchema.optional(),
  border: pairSchema.optional(),
  spacing: pairSchema.optional(),
  bordercolor: colorSchema.optional(),
  color: colorSchema.optional(),
  hramp: rampSchema.optional(),
  vramp: rampSchema.optional(),
  hsquare: gratingSchema.optional(),
  vsquare: gratingSchema.optional(),
  hsine: gratingSchema.optional(),
  vsine: gratingSchema.optional(),
  hcosine: gratingSchema.optional(),
  vcosine: gratingSchema.optional(),
  image: z.string().min(1).optional(),
  premul: z.boolean().optional(),
  description: z.string().optional(),
  descriptions: z.array(z.string()).optional(),
};

const childSchema: z.ZodType<ChildDescriptor> = z.lazy(() =>
  z.union([colorSchema, patchSchema], {
    errorMap: () => ({ message: 'expected a patch object or a color' }),
  }),
);

const patchSchema: z.ZodType<PatchDescriptor> = z.lazy(() =>
  z
    .object({
      ...patchFields,
      patches: z.array(childSchema).optional(),
      subpatches: z.array(childSchema).optional(),
      cell: cellSchema.optional(),
      left: edge.optional(),
      top: edge.optional(),
      right: edge.optional(),
      bottom: edge.optional(),
    })
    .strict(),
);

const rootSchema = z
  .object({
    ...patchFields,
    patches: z.array(childSchema).optional(),
    subpatches: z.array(childSchema).optional(),
    version: z.number().int().positive().optional(),
    name: z.string().optional(),
    depth: depthSchema,
  })
  .strict()
  .superRefine((root, ctx) => {
    const hasSize = root.width !== undefined && root.height !== undefined;
    const hasGrid = root.rows !== undefined && root.columns !== undefined;
    if (!hasSize && !hasGrid) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "the root patch needs both 'width' and 'height', or both 'rows' and 'columns'",
      });
    }
  });

// ---------------------------------------------------------------------------
// Issue reporting
// ---------------------------------------------------------------------------

/** Render a zod issue path as `patches[1].color`. */
export function formatIssuePath(path: ReadonlyArray<string | number>): string {
  let out = '';
  for (const segment of path) {
    if (typeof segment === 'number') out += `[${segment}]`;
    else out += out ? `.${segment}` : segment;
  }
  return out;
}

function sameLocation(a: ReadonlyArray<string | number>, b: ReadonlyArray<string | number>): boolean {
  return a.length === b.length && a.every((segment, i) => segment === b[i]);
}

/** Issue codes meaning the value itself, not one of its parts, has the wrong shape. */
const MISMATCH_CODES: ReadonlySet<z.ZodIssueCode> = new Set<z.ZodIssueCode>([
  z.ZodIssueCode.invalid_type,
  z.ZodIssueCode.invalid_literal,
  z.ZodIssueCode.invalid_union,
]);

/**
 * Replace union failures by the issues of the one branch whose base type
 * matched, so a malformed child patch reports its bad field rather than
 * "expected a patch object or a color". Unions where no branch, or more
 * than one, matched keep their own message.
 */
function flattenIssues(issues: z.ZodIssue[]): z.ZodIssue[] {
  const out: z.ZodIssue[] = [];
  for (const issue of issues) {
    if (issue.code !== z.ZodIssueCode.invalid_union) {
      out.push(issue);
      continue;
    }
    const matched = issue.unionErrors.filter(
      (branch) =>
        !branch.issues.some((inner) => MISMATCH_CODES.has(inner.code) && sameLocation(inner.path, issue.path)),
    );
    if (matched.length === 1) {
      out.push(...flattenIssues(matched[0].issues));
    } else {
      out.push(issue);
    }
  }
  return out;
}

/**
 * Validate parsed JSON against the descriptor schema.
 *
 * @param input - Any parsed JSON value.
 * @returns The typed descriptor.
 * @throws {StructuralError} Listing every violation; the error path is the first one's.
 */
export function parseDescriptor(input: unknown): RootDescriptor {
  const result = rootSchema.safeParse(input);
  if (result.success) return result.data;

  const issues = flattenIssues(result.error.issues);
  const formatted = issues.map((issue) => {
    const where = formatIssuePath(issue.path);
    return where ? `${where}: ${issue.message}` : issue.message;
  });
  const first = issues[0];
  const more = issues.length > 1 ? ` (and ${issues.length - 1} more)` : '';
  throw new StructuralError(formatIssuePath(first.path), `${first.message}${more}`, formatted);
}
