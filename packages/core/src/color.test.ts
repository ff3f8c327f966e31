import { describe, expect, it } from 'vitest';
import {
  denormalizeSample,
  lerpColor,
  maxSample,
  normalizeSample,
  quantize,
  quantizeSample,
  toRgb,
} from './color';
import { SemanticError } from './errors';

describe('toRgb', () => {
  it('broadcasts a scalar to all three components', () => {
    expect(toRgb(0.25)).toEqual([0.25, 0.25, 0.25]);
  });

  it('copies a triplet', () => {
    const source: [number, number, number] = [1, 2, 3];
    const rgb = toRgb(source);
    expect(rgb).toEqual([1, 2, 3]);
    expect(rgb).not.toBe(source);
  });
});

describe('maxSample', () => {
  it('is 2^depth - 1 for integer depths and 1 for float', () => {
    expect(maxSample(8)).toBe(255);
    expect(maxSample(10)).toBe(1023);
    expect(maxSample(12)).toBe(4095);
    expect(maxSample(16)).toBe(65535);
    expect(maxSample(32)).toBe(1);
  });
});

describe('quantizeSample', () => {
  it('rounds half up at integer depths', () => {
    expect(quantizeSample(511.5, 10)).toBe(512);
    expect(quantizeSample(511.49, 10)).toBe(511);
  });

  it('accepts the full code range', () => {
    expect(quantizeSample(0, 10)).toBe(0);
    expect(quantizeSample(1023, 10)).toBe(1023);
  });

  it('rejects codes outside the range with the path', () => {
    expect(() => quantizeSample(1024, 10, 'color')).toThrow(SemanticError);
    expect(() => quantizeSample(1024, 10, 'color')).toThrow(
      'color: sample 1024 is outside [0, 1023] for depth 10',
    );
    expect(() => quantizeSample(-1, 8)).toThrow('sample -1 is outside [0, 255] for depth 8');
  });

  it('passes floats through unchecked at depth 32', () => {
    expect(quantizeSample(0.5, 32)).toBe(0.5);
    expect(quantizeSample(1.5, 32)).toBe(1.5);
    expect(quantizeSample(0.1, 32)).toBe(Math.fround(0.1));
  });
});

describe('quantize', () => {
  it('broadcasts and rounds a scalar', () => {
    expect(quantize(100.5, 8)).toEqual([101, 101, 101]);
  });

  it('quantizes each component of a triplet', () => {
    expect(quantize([0, 2047.5, 4095], 12)).toEqual([0, 2048, 4095]);
  });
});

describe('lerpColor', () => {
  it('is exact at both ends', () => {
    const a: [number, number, number] = [0.1, 0.2, 0.3];
    const b: [number, number, number] = [0.7, 0.8, 0.9];
    expect(lerpColor(a, b, 0)).toEqual(a);
    expect(lerpColor(a, b, 1)).toEqual(b);
  });

  it('interpolates component-wise', () => {
    expect(lerpColor([0, 100, 200], [100, 200, 0], 0.5)).toEqual([50, 150, 100]);
  });
});

describe('normalizeSample / denormalizeSample', () => {
  it('maps code values to [0, 1]', () => {
    expect(normalizeSample(255, 8)).toBe(1);
    expect(normalizeSample(0, 16)).toBe(0);
    expect(normalizeSample(0.25, 32)).toBe(0.25);
  });

  it('rounds and clamps on the way back', () => {
    expect(denormalizeSample(0.5, 8)).toBe(128);
    expect(denormalizeSample(1.2, 8)).toBe(255);
    expect(denormalizeSample(-0.1, 10)).toBe(0);
    expect(denormalizeSample(0.75, 32)).toBe(0.75);
  });
});
