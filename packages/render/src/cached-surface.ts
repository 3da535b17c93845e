/**
 * @module cached-surface
 * A rasterised surface that is redrawn only when it goes stale.
 *
 * Each slot moves between two states: empty, and valid for one
 * {@link CacheKey} (output size plus data generation). A request for the key
 * the slot is valid for returns the stored surface untouched; any other
 * request, or a request after {@link CachedSurface.invalidate}, redraws onto
 * a fresh canvas. Surfaces handed out earlier are never drawn on again.
 */

import type { CacheKey, Size } from '@layerstack/types';
import type { CanvasContext2DLike, CanvasFactory, CanvasLike } from './canvas';

/** Paints a slot's content onto a blank canvas of `size`. */
export type DrawFn = (ctx: CanvasContext2DLike, size: Size) => void;

/** Options for {@link CachedSurface}. */
export interface CachedSurfaceOptions {
  /** Called after every redraw with the new total redraw count. */
  onRedraw?: (size: Size, redrawCount: number) => void;
}

export class CachedSurface {
  private surface: CanvasLike | null = null;
  private key: CacheKey | null = null;
  private _redrawCount = 0;

  constructor(
    private readonly draw: DrawFn,
    private readonly createCanvas: CanvasFactory,
    private readonly options: CachedSurfaceOptions = {},
  ) {}

  /** Whether a surface is currently stored. */
  get isValid(): boolean {
    return this.surface !== null;
  }

  /** The key the stored surface was drawn for, or null when empty. */
  get validKey(): CacheKey | null {
    return this.key ? { ...this.key } : null;
  }

  /** How many times the slot has been drawn. */
  get redrawCount(): number {
    return this._redrawCount;
  }

  /**
   * Returns the surface for `size` at `generation`, drawing it first when the
   * slot is empty or was drawn for a different key.
   *
   * @throws Error when the canvas factory yields a canvas without a 2D context.
   */
  get(size: Size, generation: number = 0): CanvasLike {
    if (this.surface && this.matches(size, generation)) {
      return this.surface;
    }

    const canvas = this.createCanvas(size.width, size.height);
    const ctx = canvas.getContext('2d');
    if (!ctx) {
      throw new Error('Canvas factory returned a canvas without a 2D context');
    }
    this.draw(ctx, size);

    this.surface = canvas;
    this.key = { width: size.width, height: size.height, generation };
    this._redrawCount++;
    this.options.onRedraw?.(size, this._redrawCount);
    return canvas;
  }

  /** Drops the stored surface; the next {@link get} redraws. */
  invalidate(): void {
    this.surface = null;
    this.key = null;
  }

  private matches(size: Size, generation: number): boolean {
    return (
      this.key !== null &&
      this.key.width === size.width &&
      this.key.height === size.height &&
      this.key.generation === generation
    );
  }
}
