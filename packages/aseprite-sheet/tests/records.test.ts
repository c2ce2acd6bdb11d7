import { describe, test, expect } from 'vitest';
import { BlendMode, blendModeToCss, parseBlendMode } from '../src/parser/structure/record/blend-mode.ts';
import { Direction, parseDirection } from '../src/parser/structure/record/frame-tag.ts';
import { rectContains } from '../src/parser/structure/record/rect.ts';
import { sliceKeyAt } from '../src/parser/structure/record/slice.ts';
import { formatPath } from '../src/parser/issues.ts';
import { Errors, hasFlag } from '../src/error/errors.ts';

describe('blend modes', () => {
  test('parses both spellings', () => {
    expect(parseBlendMode('color_dodge')).toBe(BlendMode.ColorDodge);
    expect(parseBlendMode('colorDodge')).toBe(BlendMode.ColorDodge);
    expect(parseBlendMode('hslSaturation')).toBe(BlendMode.HslSaturation);
    expect(parseBlendMode('normal')).toBe(BlendMode.Normal);
  });

  test('returns null for unknown identifiers', () => {
    expect(parseBlendMode('glow')).toBeNull();
  });

  test('maps to CSS', () => {
    expect(blendModeToCss(BlendMode.HardLight)).toBe('hard-light');
    expect(blendModeToCss(BlendMode.HslHue)).toBe('hue');
    expect(blendModeToCss(BlendMode.Addition)).toBeNull();
  });
});

describe('directions', () => {
  test('parses known directions', () => {
    expect(parseDirection('reverse')).toBe(Direction.Reverse);
    expect(parseDirection('Reverse')).toBeNull();
  });
});

describe('rectangles', () => {
  test('excludes right and bottom edges', () => {
    const rect = { x: 2, y: 2, w: 4, h: 4 };

    expect(rectContains(rect, { x: 2, y: 2 })).toBe(true);
    expect(rectContains(rect, { x: 5, y: 5 })).toBe(true);
    expect(rectContains(rect, { x: 6, y: 5 })).toBe(false);
  });
});

describe('sliceKeyAt', () => {
  const slice = {
    name: 'hurtbox',
    color: '#ff0000ff',
    keys: [
      { frame: 4, bounds: { x: 1, y: 1, w: 1, h: 1 } },
      { frame: 0, bounds: { x: 0, y: 0, w: 1, h: 1 } },
    ],
  };

  test('returns nothing before the first key', () => {
    expect(sliceKeyAt({ ...slice, keys: slice.keys.slice(0, 1) }, 3)).toBeUndefined();
  });

  test('returns the latest key at or before the frame', () => {
    expect(sliceKeyAt(slice, 3)?.frame).toBe(0);
    expect(sliceKeyAt(slice, 4)?.frame).toBe(4);
    expect(sliceKeyAt(slice, 9)?.frame).toBe(4);
  });
});

describe('formatPath', () => {
  test('formats indices and identifiers', () => {
    expect(formatPath(['frames', 0, 'frame', 'x'])).toBe('frames[0].frame.x');
    expect(formatPath(['meta', 'layers', 2])).toBe('meta.layers[2]');
  });

  test('quotes keys that are not identifiers', () => {
    expect(formatPath(['frames', 'idle 0.ase', 'duration'])).toBe('frames["idle 0.ase"].duration');
  });

  test('formats the document root as empty', () => {
    expect(formatPath([])).toBe('');
  });
});

describe('error flags', () => {
  test('default leaves unknown fields and ranges unchecked', () => {
    expect(hasFlag(Errors.DEFAULT, Errors.UNKNOWN_DIRECTION)).toBe(true);
    expect(hasFlag(Errors.DEFAULT, Errors.UNKNOWN_FIELD)).toBe(false);
    expect(hasFlag(Errors.DEFAULT, Errors.INVALID_RANGE)).toBe(false);
    expect(hasFlag(Errors.ALL, Errors.UNKNOWN_FIELD | Errors.INVALID_RANGE)).toBe(true);
  });
});
