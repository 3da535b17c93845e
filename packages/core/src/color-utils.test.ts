import { describe, expect, it } from 'vitest';
import { blendColors, colorToHex, hexToColor } from './color-utils';

describe('hexToColor', () => {
  it('parses #RRGGBB', () => {
    expect(hexToColor('#ff8000')).toEqual({ r: 255, g: 128, b: 0, a: 1 });
  });

  it('parses shorthand #RGB', () => {
    expect(hexToColor('#fff')).toEqual({ r: 255, g: 255, b: 255, a: 1 });
  });

  it('parses #RRGGBBAA alpha into 0-1', () => {
    expect(hexToColor('#00000080')).toEqual({ r: 0, g: 0, b: 0, a: 0.502 });
  });

  it('accepts a missing leading #', () => {
    expect(hexToColor('000000')).toEqual({ r: 0, g: 0, b: 0, a: 1 });
  });

  it('returns null for non-hex input', () => {
    expect(hexToColor('black')).toBeNull();
    expect(hexToColor('#12345')).toBeNull();
    expect(hexToColor('#gg0000')).toBeNull();
  });
});

describe('colorToHex', () => {
  it('omits alpha for opaque colors', () => {
    expect(colorToHex({ r: 255, g: 0, b: 16, a: 1 })).toBe('#ff0010');
  });

  it('appends alpha for translucent colors', () => {
    expect(colorToHex({ r: 0, g: 0, b: 0, a: 0.5 })).toBe('#00000080');
  });
});

describe('blendColors', () => {
  it('returns the foreground when it is opaque', () => {
    const result = blendColors({ r: 0, g: 0, b: 255, a: 1 }, { r: 255, g: 0, b: 0, a: 1 });
    expect(result).toEqual({ r: 255, g: 0, b: 0, a: 1 });
  });

  it('mixes a half-transparent foreground over an opaque background', () => {
    const result = blendColors({ r: 0, g: 0, b: 0, a: 1 }, { r: 200, g: 100, b: 50, a: 0.5 });
    expect(result).toEqual({ r: 100, g: 50, b: 25, a: 1 });
  });

  it('returns transparent black when both inputs are transparent', () => {
    const result = blendColors({ r: 10, g: 10, b: 10, a: 0 }, { r: 20, g: 20, b: 20, a: 0 });
    expect(result).toEqual({ r: 0, g: 0, b: 0, a: 0 });
  });
});
