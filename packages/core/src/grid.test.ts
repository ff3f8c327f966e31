import { describe, expect, it } from 'vitest';
import type { GridAxisDefinition } from '@testpattern/types';
import { HORIZONTAL, axisLength, cellStarts, resolveAxis } from './grid';

function pixels(sizes: number[], border = 0, spacing?: number): GridAxisDefinition {
  return { cells: { kind: 'pixels', sizes }, border, spacing };
}

describe('axisLength', () => {
  it('adds both borders, every cell and the gaps between cells', () => {
    const cases: Array<[number[], number, number]> = [
      [[5], 0, 0],
      [[5], 3, 7],
      [[2, 3, 4], 1, 2],
      [[10, 10], 0, 5],
    ];
    for (const [sizes, border, spacing] of cases) {
      const sum = sizes.reduce((a, b) => a + b, 0);
      expect(axisLength(sizes, border, spacing)).toBe(2 * border + sum + spacing * (sizes.length - 1));
    }
  });
});

describe('cellStarts', () => {
  it('offsets the first cell by the border and the rest by size plus spacing', () => {
    expect(cellStarts([2, 3, 4], 10, 1, 2)).toEqual([11, 15, 20]);
  });
});

describe('resolveAxis', () => {
  it('resolves explicit cell sizes', () => {
    expect(resolveAxis(pixels([2, 3], 1, 2), { names: HORIZONTAL, origin: 10, path: '' })).toEqual({
      border: 1,
      spacing: 2,
      sizes: [2, 3],
      starts: [11, 15],
      length: 9,
    });
  });

  it('fills the patch with one cell by default', () => {
    const axis = resolveAxis(
      { cells: { kind: 'default' }, border: 2 },
      { names: HORIZONTAL, origin: 4, extent: 10, path: 'patches[0]' },
    );
    expect(axis.sizes).toEqual([6]);
    expect(axis.starts).toEqual([6]);
    expect(axis.length).toBe(10);
  });

  it('requires a size on the root', () => {
    expect(() => resolveAxis({ cells: { kind: 'default' }, border: 0 }, { names: HORIZONTAL, origin: 0, path: '' })).toThrow(
      "'width' or 'columns' is required",
    );
  });

  it('rejects a default cell swallowed by the border when children need it', () => {
    expect(() =>
      resolveAxis(
        { cells: { kind: 'default' }, border: 2 },
        { names: HORIZONTAL, origin: 0, extent: 4, path: 'patches[1]', hasChildren: true },
      ),
    ).toThrow('patches[1].border: a border of 2 leaves no room inside a 4 pixel width');
  });

  it('leaves a childless patch with no cells when the border fills it', () => {
    const axis = resolveAxis(
      { cells: { kind: 'default' }, border: 3 },
      { names: HORIZONTAL, origin: 2, extent: 4, path: 'patches[1]' },
    );
    expect(axis).toEqual({ border: 3, spacing: 0, sizes: [], starts: [], length: 4 });
  });

  it("copies the parent's cells and spacing for 'parent'", () => {
    const ctx = { names: HORIZONTAL, origin: 0, extent: 8, parent: { sizes: [3, 4], spacing: 1 }, path: 'patches[0]' };
    const inherited = resolveAxis({ cells: { kind: 'parent' }, border: 0 }, ctx);
    expect(inherited.sizes).toEqual([3, 4]);
    expect(inherited.spacing).toBe(1);
    expect(inherited.starts).toEqual([0, 4]);

    const overridden = resolveAxis({ cells: { kind: 'parent' }, border: 0, spacing: 0 }, { ...ctx, extent: 7 });
    expect(overridden.spacing).toBe(0);
    expect(overridden.length).toBe(7);
  });

  it("rejects 'parent' without an enclosing grid", () => {
    expect(() => resolveAxis({ cells: { kind: 'parent' }, border: 0 }, { names: HORIZONTAL, origin: 0, path: '' })).toThrow(
      "columns: 'parent' requires an enclosing grid",
    );
  });

  it('checks a total width against the resolved length', () => {
    const def: GridAxisDefinition = { ...pixels([2, 2], 1), declared: { kind: 'total', pixels: 5 } };
    expect(() => resolveAxis(def, { names: HORIZONTAL, origin: 0, path: '' })).toThrow(
      'width: the calculated width (6) does not match the specified width (5)',
    );
    const ok: GridAxisDefinition = { ...pixels([2, 2], 1), declared: { kind: 'total', pixels: 6 } };
    expect(resolveAxis(ok, { names: HORIZONTAL, origin: 0, path: '' }).length).toBe(6);
  });

  it('checks a width list against the columns element-wise', () => {
    const def: GridAxisDefinition = { ...pixels([2, 2]), declared: { kind: 'sizes', sizes: [2, 3] } };
    expect(() => resolveAxis(def, { names: HORIZONTAL, origin: 0, path: '' })).toThrow(
      'width: [2, 3] does not match columns [2, 2]',
    );
  });

  it('rejects a grid larger than its patch', () => {
    expect(() =>
      resolveAxis(pixels([3, 3]), { names: HORIZONTAL, origin: 0, extent: 5, path: 'patches[0]' }),
    ).toThrow('patches[0]: the grid width (6) exceeds the patch width (5)');
  });

  it('allows a grid smaller than its patch', () => {
    expect(resolveAxis(pixels([3]), { names: HORIZONTAL, origin: 0, extent: 5, path: 'patches[0]' }).length).toBe(3);
  });
});
