import { describe, expect, it } from 'vitest';
import type { ResolvedPatch } from '@testpattern/types';
import { buildDocument } from './document';
import { resolveLayout } from './layout';
import { parseDescriptor } from './schema';

function layout(input: unknown): ResolvedPatch {
  return resolveLayout(buildDocument(parseDescriptor(input)));
}

const GRID = { version: 2, depth: 8, columns: [2, 3], rows: [2], border: 1, spacing: 1 };

describe('resolveLayout', () => {
  it('derives the image size from the root grid', () => {
    const root = layout(GRID);
    expect(root.rect).toEqual({ x: 0, y: 0, width: 8, height: 4 });
    expect(root.columns.starts).toEqual([1, 4]);
    expect(root.rows.starts).toEqual([1]);
  });

  it('gives each child the rectangle of its cell', () => {
    const root = layout({ ...GRID, patches: [1, 2] });
    expect(root.children.map((child) => child.rect)).toEqual([
      { x: 1, y: 1, width: 2, height: 2 },
      { x: 4, y: 1, width: 3, height: 2 },
    ]);
  });

  it('includes the spacing between spanned cells', () => {
    const root = layout({ ...GRID, patches: [{ cell: [1, 1, 1, 2] }] });
    expect(root.children[0].rect).toEqual({ x: 1, y: 1, width: 6, height: 2 });
  });

  it("hands the spanned cells down to 'parent' grids", () => {
    const root = layout({
      ...GRID,
      patches: [{ columns: 'parent', rows: 'parent', cell: [1, 1, 1, 2], patches: [5, 6] }],
    });
    const [child] = root.children;
    expect(child.columns.sizes).toEqual([2, 3]);
    expect(child.columns.spacing).toBe(1);
    expect(child.children.map((grandchild) => grandchild.rect)).toEqual([
      { x: 1, y: 1, width: 2, height: 2 },
      { x: 4, y: 1, width: 3, height: 2 },
    ]);
  });

  it('lays out a nested grid relative to its patch', () => {
    const root = layout({ ...GRID, patches: [1, { columns: [1, 1], spacing: [0, 1], patches: [3, 4] }] });
    expect(root.children[1].children.map((grandchild) => grandchild.rect)).toEqual([
      { x: 4, y: 1, width: 1, height: 2 },
      { x: 6, y: 1, width: 1, height: 2 },
    ]);
  });

  it('rejects a nested grid larger than its cell', () => {
    expect(() => layout({ ...GRID, patches: [{ columns: [3, 3] }] })).toThrow(
      'patches[0]: the grid width (6) exceeds the patch width (2)',
    );
  });

  it('rejects children beyond the grid', () => {
    expect(() => layout({ ...GRID, patches: [1, 2, 3] })).toThrow(
      'patches[2]: placement at row 2, column 1 lies outside the 1x2 grid',
    );
  });
});
