// Color helpers shared by the rasteriser and configuration.
// RGB channels are 0-255, alpha is 0-1.

import type { Color } from '@layerstack/types';

/** Clamp a value between min and max. */
function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/** Round a number to a given number of decimal places. */
function round(value: number, decimals: number = 2): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

// ---------------------------------------------------------------------------
// Hex Conversion
// ---------------------------------------------------------------------------

/**
 * Parse a hex color string.
 * Supports "#RGB", "#RRGGBB" and "#RRGGBBAA" (the leading # is optional).
 *
 * @returns The color, or null if the string is not a hex color.
 */
export function hexToColor(hex: string): Color | null {
  const cleaned = hex.trim().replace(/^#/, '');
  if (!/^[0-9a-fA-F]+$/.test(cleaned)) return null;

  if (cleaned.length === 3) {
    return {
      r: parseInt(cleaned[0] + cleaned[0], 16),
      g: parseInt(cleaned[1] + cleaned[1], 16),
      b: parseInt(cleaned[2] + cleaned[2], 16),
      a: 1,
    };
  }
  if (cleaned.length === 6 || cleaned.length === 8) {
    return {
      r: parseInt(cleaned.slice(0, 2), 16),
      g: parseInt(cleaned.slice(2, 4), 16),
      b: parseInt(cleaned.slice(4, 6), 16),
      a: cleaned.length === 8 ? round(parseInt(cleaned.slice(6, 8), 16) / 255, 4) : 1,
    };
  }
  return null;
}

/**
 * Convert a color to "#RRGGBB", or "#RRGGBBAA" when it is not fully opaque.
 */
export function colorToHex(color: Color): string {
  const toHex = (n: number): string => clamp(Math.round(n), 0, 255).toString(16).padStart(2, '0');
  const rgb = `#${toHex(color.r)}${toHex(color.g)}${toHex(color.b)}`;
  return color.a >= 1 ? rgb : `${rgb}${toHex(color.a * 255)}`;
}

// ---------------------------------------------------------------------------
// Color Operations
// ---------------------------------------------------------------------------

/**
 * Alpha-composite the foreground color over the background color
 * (Porter-Duff source-over, non-premultiplied).
 */
export function blendColors(bg: Color, fg: Color): Color {
  const aFg = fg.a;
  const aBg = bg.a;
  const aOut = aFg + aBg * (1 - aFg);

  if (aOut === 0) {
    return { r: 0, g: 0, b: 0, a: 0 };
  }

  return {
    r: Math.round((fg.r * aFg + bg.r * aBg * (1 - aFg)) / aOut),
    g: Math.round((fg.g * aFg + bg.g * aBg * (1 - aFg)) / aOut),
    b: Math.round((fg.b * aFg + bg.b * aBg * (1 - aFg)) / aOut),
    a: round(aOut, 4),
  };
}
