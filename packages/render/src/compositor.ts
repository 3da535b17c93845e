/**
 * @module compositor
 * Two-slot layer compositor.
 *
 * Output is split into two independently cached surfaces:
 * - **background**: a flat fill of the whole output. It depends only on the
 *   output size, so it is redrawn on resize and nothing else.
 * - **layers**: every layer painted bottom to top. It is keyed on the output
 *   size and the layer source's generation, and is also dropped on every
 *   {@link LayerCompositor.tick}.
 *
 * Key design decisions:
 * - `putImageData` ignores `globalAlpha`, so each layer's pixels are put on a
 *   sprite canvas once and then composited with `drawImage`.
 * - Sprites are keyed by the layer's {@link PixelSource}, which survives
 *   position/scale/opacity updates, so an update never re-uploads pixels.
 * - Layers without decoded pixels, or whose draw size is not positive, are
 *   skipped.
 *
 * @see {@link @layerstack/types!LayerSource}
 * @see {@link @layerstack/types!CompositorOptions}
 */

import type {
  CompositorOptions,
  ImageLayer,
  LayerSource,
  PixelSource,
  RenderSlot,
  RgbaImage,
  Size,
} from '@layerstack/types';
import type { CanvasContext2DLike, CanvasFactory, CanvasLike } from './canvas';
import { CachedSurface } from './cached-surface';
import { DEFAULT_FIT_MARGIN, layerDrawRect } from './fit';
import { createRasterCanvas } from './raster-canvas';

/** Background fill used when none is configured. */
const DEFAULT_BACKGROUND_COLOR = '#000000';

/**
 * Composites a {@link LayerSource} into cached surfaces.
 *
 * Usage:
 * ```ts
 * const compositor = new LayerCompositor(store, { backgroundColor: '#202020' });
 * const bg = compositor.getBackgroundSurface({ width: 1280, height: 720 });
 * const fg = compositor.getLayersSurface({ width: 1280, height: 720 });
 * ```
 */
export class LayerCompositor {
  private readonly background: CachedSurface;
  private readonly layers: CachedSurface;
  private readonly canvasFactory: CanvasFactory;
  private readonly backgroundColor: string;
  private readonly fitMargin: number;
  private readonly logRenderTimings: boolean;
  private sprites = new WeakMap<PixelSource, CanvasLike>();
  private outputSize: Size | null = null;

  /**
   * @param source        - Layer stack to draw. Read on every layers redraw.
   * @param options       - Colours, margin and hooks.
   * @param canvasFactory - Creates slot and sprite canvases. Defaults to the
   *                        software {@link RasterCanvas}.
   */
  constructor(
    private readonly source: LayerSource,
    options: CompositorOptions = {},
    canvasFactory?: CanvasFactory,
  ) {
    this.canvasFactory = canvasFactory ?? createRasterCanvas;
    this.backgroundColor = options.backgroundColor ?? DEFAULT_BACKGROUND_COLOR;
    this.fitMargin = options.fitMargin ?? DEFAULT_FIT_MARGIN;
    this.logRenderTimings = options.logRenderTimings ?? false;

    const onRedraw = options.onRedraw;
    this.background = new CachedSurface(
      (ctx, size) => this.timed('background', size, () => this.drawBackground(ctx, size)),
      this.canvasFactory,
      { onRedraw: onRedraw && ((size, count) => onRedraw('background', size, count)) },
    );
    this.layers = new CachedSurface(
      (ctx, size) => this.timed('layers', size, () => this.drawLayers(ctx, size)),
      this.canvasFactory,
      { onRedraw: onRedraw && ((size, count) => onRedraw('layers', size, count)) },
    );
  }

  /** Last output size passed to {@link resize}, or null. */
  get size(): Size | null {
    return this.outputSize ? { ...this.outputSize } : null;
  }

  /** Number of redraws per slot so far. */
  get redrawCounts(): Record<RenderSlot, number> {
    return { background: this.background.redrawCount, layers: this.layers.redrawCount };
  }

  /**
   * Records a new output size. The background slot is dropped only when the
   * size actually changed.
   *
   * @returns Whether the size changed.
   */
  resize(size: Size): boolean {
    const previous = this.outputSize;
    if (previous && previous.width === size.width && previous.height === size.height) {
      return false;
    }
    this.outputSize = { width: size.width, height: size.height };
    this.background.invalidate();
    return true;
  }

  /** Periodic refresh signal: drops the layers slot unconditionally. */
  tick(): void {
    this.layers.invalidate();
  }

  /** Background surface for `size`, redrawn only when stale. */
  getBackgroundSurface(size: Size): CanvasLike {
    return this.background.get(size);
  }

  /** Layers surface for `size`, redrawn only when stale. */
  getLayersSurface(size: Size): CanvasLike {
    return this.layers.get(size, this.source.generation);
  }

  /**
   * Draws background and layers onto `target`, using the cached surfaces at
   * the target's size.
   */
  render(target: CanvasLike): void {
    const ctx = target.getContext('2d');
    if (!ctx) return;

    const size = { width: target.width, height: target.height };
    ctx.clearRect(0, 0, size.width, size.height);
    ctx.drawImage(this.getBackgroundSurface(size), 0, 0);
    ctx.drawImage(this.getLayersSurface(size), 0, 0);
  }

  /** Drops both slots and all sprites. */
  dispose(): void {
    this.background.invalidate();
    this.layers.invalidate();
    this.sprites = new WeakMap();
  }

  private drawBackground(ctx: CanvasContext2DLike, size: Size): void {
    ctx.fillStyle = this.backgroundColor;
    ctx.fillRect(0, 0, size.width, size.height);
  }

  private drawLayers(ctx: CanvasContext2DLike, size: Size): void {
    for (const layer of this.source.layers) {
      this.drawLayer(ctx, layer, size);
    }
  }

  private drawLayer(ctx: CanvasContext2DLike, layer: ImageLayer, size: Size): void {
    const image = layer.source.image;
    if (!image) return;

    const rect = layerDrawRect(layer, size.width, this.fitMargin);
    if (!(rect.width > 0 && rect.height > 0) || layer.opacity <= 0) return;

    const sprite = this.spriteFor(layer.source, image);
    if (!sprite) return;

    ctx.save();
    ctx.globalAlpha = layer.opacity;
    ctx.drawImage(sprite, rect.x, rect.y, rect.width, rect.height);
    ctx.restore();
  }

  /** Canvas holding a layer's decoded pixels at 1:1, created on first use. */
  private spriteFor(source: PixelSource, image: RgbaImage): CanvasLike | null {
    const cached = this.sprites.get(source);
    if (cached) return cached;

    const sprite = this.canvasFactory(image.width, image.height);
    const ctx = sprite.getContext('2d');
    if (!ctx) return null;
    ctx.putImageData(
      { data: new Uint8ClampedArray(image.data), width: image.width, height: image.height },
      0,
      0,
    );
    this.sprites.set(source, sprite);
    return sprite;
  }

  private timed(slot: RenderSlot, size: Size, draw: () => void): void {
    if (!this.logRenderTimings) {
      draw();
      return;
    }
    const start = performance.now();
    draw();
    const elapsed = performance.now() - start;
    // eslint-disable-next-line no-console
    console.debug(`[render] ${slot} ${elapsed.toFixed(2)}ms (${size.width}x${size.height})`);
  }
}
