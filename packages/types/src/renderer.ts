/**
 * @module renderer
 * Render cache and compositor types.
 */

import type { Size } from './common';

/** The two independently cached render layers. */
export type RenderSlot = 'background' | 'layers';

/**
 * Conditions under which a cached surface stays valid.
 * A slot is reused only when every field matches the request.
 */
export interface CacheKey {
  /** Output width in pixels. */
  width: number;
  /** Output height in pixels. */
  height: number;
  /** Data generation the surface was drawn from. */
  generation: number;
}

/** Options for the layer compositor. */
export interface CompositorOptions {
  /** Fill colour of the background slot, as a hex string. Defaults to `#000000`. */
  backgroundColor?: string;
  /** Space kept free when a layer is shrunk to fit the output width. Defaults to 20. */
  fitMargin?: number;
  /** Log redraw timings with `console.debug`. */
  logRenderTimings?: boolean;
  /** Called after a slot has been redrawn. */
  onRedraw?: (slot: RenderSlot, size: Size, redrawCount: number) => void;
}
