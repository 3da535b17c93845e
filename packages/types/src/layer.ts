/**
 * @module layer
 * Layer type definitions for the compositing model.
 * Layers form a flat, ordered stack: index 0 is painted first (bottom),
 * later layers are painted on top.
 */

import type { Point, Size } from './common';

/** Decoded RGBA pixels. `data.length === width * height * 4`. */
export interface RgbaImage {
  /** RGBA pixel data, row-major, 4 bytes per pixel. */
  data: Uint8Array | Uint8ClampedArray;
  /** Width in pixels. */
  width: number;
  /** Height in pixels. */
  height: number;
}

/**
 * Pixel payload owned by a single layer.
 * Never mutated after the layer is constructed.
 */
export interface PixelSource {
  /** Encoded bytes exactly as supplied by the host. */
  readonly bytes: Uint8Array;
  /** Decoded pixels, or null when the bytes could not be decoded. */
  readonly image: RgbaImage | null;
}

/** A positioned image in the layer stack. */
export interface ImageLayer {
  /** Unique identifier (UUID v4). */
  readonly id: string;
  /** Display name shown in the layer list. */
  readonly name: string;
  /** Top-left corner in canvas coordinates. */
  readonly position: Point;
  /**
   * Intrinsic content size. Both dimensions are > 0, and the aspect ratio
   * is fixed for the lifetime of the layer.
   */
  readonly size: Size;
  /** Size multiplier applied at draw time (1 = intrinsic size). */
  readonly scale: number;
  /** Opacity from 0 (transparent) to 1 (opaque). */
  readonly opacity: number;
  /** Encoded and decoded pixel content. */
  readonly source: PixelSource;
}

/** Layer fields that may be changed after construction. */
export interface LayerPatch {
  position?: Point;
  scale?: number;
  opacity?: number;
}

/**
 * Read-only view of an ordered layer stack, as consumed by the compositor.
 * `generation` changes whenever the stack or any layer in it changes.
 */
export interface LayerSource {
  readonly layers: readonly ImageLayer[];
  readonly generation: number;
}
