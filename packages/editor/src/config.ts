/**
 * @module config
 * Editor configuration and its defaults.
 */

import type { ImageDecoder } from '@layerstack/core';
import { hexToColor } from '@layerstack/core';

export interface EditorConfig {
  /** Initial canvas width in pixels. */
  canvasWidth: number;
  /** Initial canvas height in pixels. */
  canvasHeight: number;
  /**
   * Space kept free when a layer is shrunk to fit the canvas width, and the
   * amount subtracted from the canvas size for undecodable images.
   */
  fitMargin: number;
  /** Background fill as a hex colour. */
  backgroundColor: string;
  /** Interval of the periodic refresh signal. */
  tickIntervalMs: number;
  /** Log redraw timings with `console.debug`. */
  logRenderTimings: boolean;
  /** Image decoder; the built-in PNG decoder when unset. */
  decoder?: ImageDecoder;
}

export const DEFAULT_EDITOR_CONFIG: Readonly<EditorConfig> = {
  canvasWidth: 1280,
  canvasHeight: 720,
  fitMargin: 20,
  backgroundColor: '#000000',
  tickIntervalMs: 16,
  logRenderTimings: false,
};

function isPositive(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

/**
 * Merges `overrides` onto {@link DEFAULT_EDITOR_CONFIG}.
 *
 * @throws RangeError when a value is unusable.
 */
export function resolveConfig(overrides: Partial<EditorConfig> = {}): EditorConfig {
  const config: EditorConfig = { ...DEFAULT_EDITOR_CONFIG, ...overrides };

  if (!isPositive(config.canvasWidth) || !isPositive(config.canvasHeight)) {
    throw new RangeError(
      `Canvas size must be positive, got ${config.canvasWidth}x${config.canvasHeight}`,
    );
  }
  if (!(Number.isFinite(config.fitMargin) && config.fitMargin >= 0)) {
    throw new RangeError(`fitMargin must be a non-negative number, got ${config.fitMargin}`);
  }
  if (!hexToColor(config.backgroundColor)) {
    throw new RangeError(`backgroundColor must be a hex colour, got '${config.backgroundColor}'`);
  }
  if (!isPositive(config.tickIntervalMs)) {
    throw new RangeError(`tickIntervalMs must be positive, got ${config.tickIntervalMs}`);
  }
  return config;
}
