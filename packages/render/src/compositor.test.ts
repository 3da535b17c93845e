import { describe, it, expect, vi, afterEach } from 'vitest';
import type { ImageLayer, LayerSource } from '@layerstack/types';
import { LayerStore } from '@layerstack/core';
import { LayerCompositor } from './compositor';
import { RasterCanvas, createRasterCanvas } from './raster-canvas';
import type { CanvasLike } from './canvas';

const SIZE = { width: 4, height: 4 };

let nextId = 0;

/** A decoded layer filled with one colour. */
function solidLayer(
  width: number,
  height: number,
  rgba: [number, number, number, number],
  overrides: Partial<Pick<ImageLayer, 'position' | 'scale' | 'opacity'>> = {},
): ImageLayer {
  const data = new Uint8Array(width * height * 4);
  for (let i = 0; i < data.length; i += 4) data.set(rgba, i);
  return {
    id: `layer-${nextId++}`,
    name: 'solid',
    position: { x: 0, y: 0 },
    size: { width, height },
    scale: 1,
    opacity: 1,
    source: { bytes: new Uint8Array(0), image: { data, width, height } },
    ...overrides,
  };
}

function undecodedLayer(): ImageLayer {
  return {
    id: `layer-${nextId++}`,
    name: 'broken',
    position: { x: 0, y: 0 },
    size: { width: 3, height: 3 },
    scale: 1,
    opacity: 1,
    source: { bytes: new Uint8Array([1, 2, 3]), image: null },
  };
}

function pixelAt(canvas: CanvasLike, x: number, y: number): number[] {
  const ctx = canvas.getContext('2d');
  if (!ctx) throw new Error('missing 2d context');
  return Array.from(ctx.getImageData(x, y, 1, 1).data);
}

const RED = [255, 0, 0, 255];
const BLUE = [0, 0, 255, 255];
const CLEAR = [0, 0, 0, 0];

describe('LayerCompositor', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('background slot', () => {
    it('fills the whole output with the background colour', () => {
      const compositor = new LayerCompositor(new LayerStore(), { backgroundColor: '#102030' });
      const surface = compositor.getBackgroundSurface(SIZE);
      expect(surface.width).toBe(4);
      expect(surface.height).toBe(4);
      expect(pixelAt(surface, 0, 0)).toEqual([16, 32, 48, 255]);
      expect(pixelAt(surface, 3, 3)).toEqual([16, 32, 48, 255]);
    });

    it('defaults to black', () => {
      const compositor = new LayerCompositor(new LayerStore());
      expect(pixelAt(compositor.getBackgroundSurface(SIZE), 1, 1)).toEqual([0, 0, 0, 255]);
    });

    it('is not redrawn by layer changes or ticks', () => {
      const store = new LayerStore();
      const compositor = new LayerCompositor(store);
      const first = compositor.getBackgroundSurface(SIZE);
      store.append(solidLayer(1, 1, [255, 0, 0, 255]));
      compositor.tick();
      expect(compositor.getBackgroundSurface(SIZE)).toBe(first);
      expect(compositor.redrawCounts.background).toBe(1);
    });
  });

  describe('layers slot', () => {
    it('is transparent with no layers', () => {
      const compositor = new LayerCompositor(new LayerStore());
      expect(pixelAt(compositor.getLayersSurface(SIZE), 0, 0)).toEqual(CLEAR);
    });

    it('paints layers bottom to top', () => {
      const store = new LayerStore();
      store.append(solidLayer(2, 2, [255, 0, 0, 255]));
      store.append(solidLayer(1, 1, [0, 0, 255, 255]));
      const surface = new LayerCompositor(store).getLayersSurface(SIZE);

      expect(pixelAt(surface, 0, 0)).toEqual(BLUE);
      expect(pixelAt(surface, 1, 1)).toEqual(RED);
      expect(pixelAt(surface, 2, 2)).toEqual(CLEAR);
    });

    it('draws each layer at its position', () => {
      const store = new LayerStore();
      store.append(solidLayer(1, 1, [255, 0, 0, 255], { position: { x: 2, y: 1 } }));
      const surface = new LayerCompositor(store).getLayersSurface(SIZE);

      expect(pixelAt(surface, 2, 1)).toEqual(RED);
      expect(pixelAt(surface, 0, 0)).toEqual(CLEAR);
    });

    it('applies scale', () => {
      const store = new LayerStore();
      store.append(solidLayer(1, 1, [255, 0, 0, 255], { scale: 2 }));
      const surface = new LayerCompositor(store).getLayersSurface(SIZE);

      expect(pixelAt(surface, 1, 1)).toEqual(RED);
      expect(pixelAt(surface, 2, 2)).toEqual(CLEAR);
    });

    it('applies opacity', () => {
      const store = new LayerStore();
      store.append(solidLayer(1, 1, [255, 255, 255, 255], { opacity: 0.5 }));
      const surface = new LayerCompositor(store).getLayersSurface(SIZE);

      expect(pixelAt(surface, 0, 0)).toEqual([255, 255, 255, 128]);
    });

    it('skips fully transparent layers', () => {
      const store = new LayerStore();
      store.append(solidLayer(1, 1, [255, 0, 0, 255], { opacity: 0 }));
      const surface = new LayerCompositor(store).getLayersSurface(SIZE);

      expect(pixelAt(surface, 0, 0)).toEqual(CLEAR);
    });

    it('shrinks layers wider than the output to the width minus the margin', () => {
      const store = new LayerStore();
      store.append(solidLayer(10, 2, [255, 0, 0, 255]));
      const surface = new LayerCompositor(store, { fitMargin: 2 }).getLayersSurface({ width: 8, height: 4 });

      // 10x2 fits to 6x1.2, which rounds to 6x1.
      expect(pixelAt(surface, 5, 0)).toEqual(RED);
      expect(pixelAt(surface, 6, 0)).toEqual(CLEAR);
      expect(pixelAt(surface, 0, 1)).toEqual(CLEAR);
    });

    it('skips layers without decoded pixels', () => {
      const store = new LayerStore();
      store.append(undecodedLayer());
      store.append(solidLayer(1, 1, [0, 0, 255, 255], { position: { x: 3, y: 3 } }));
      const compositor = new LayerCompositor(store);

      const surface = compositor.getLayersSurface(SIZE);
      expect(pixelAt(surface, 0, 0)).toEqual(CLEAR);
      expect(pixelAt(surface, 3, 3)).toEqual(BLUE);
    });
  });

  describe('caching', () => {
    it('returns the same surface while nothing changes', () => {
      const store = new LayerStore();
      store.append(solidLayer(1, 1, [255, 0, 0, 255]));
      const compositor = new LayerCompositor(store);

      const first = compositor.getLayersSurface(SIZE);
      expect(compositor.getLayersSurface(SIZE)).toBe(first);
      expect(compositor.redrawCounts).toEqual({ background: 0, layers: 1 });
    });

    it('redraws the layers slot after an append', () => {
      const store = new LayerStore();
      const compositor = new LayerCompositor(store);
      const first = compositor.getLayersSurface(SIZE);

      store.append(solidLayer(1, 1, [255, 0, 0, 255]));
      const second = compositor.getLayersSurface(SIZE);
      expect(second).not.toBe(first);
      expect(pixelAt(second, 0, 0)).toEqual(RED);
      expect(compositor.redrawCounts.layers).toBe(2);
    });

    it('redraws the layers slot after a removal', () => {
      const store = new LayerStore();
      store.append(solidLayer(1, 1, [255, 0, 0, 255]));
      const compositor = new LayerCompositor(store);
      compositor.getLayersSurface(SIZE);

      store.removeAt(0);
      expect(pixelAt(compositor.getLayersSurface(SIZE), 0, 0)).toEqual(CLEAR);
      expect(compositor.redrawCounts.layers).toBe(2);
    });

    it('redraws the layers slot after an update', () => {
      const store = new LayerStore();
      store.append(solidLayer(1, 1, [255, 0, 0, 255]));
      const compositor = new LayerCompositor(store);
      compositor.getLayersSurface(SIZE);

      store.updateAt(0, { position: { x: 1, y: 0 } });
      const surface = compositor.getLayersSurface(SIZE);
      expect(pixelAt(surface, 0, 0)).toEqual(CLEAR);
      expect(pixelAt(surface, 1, 0)).toEqual(RED);
    });

    it('redraws the layers slot on every tick', () => {
      const compositor = new LayerCompositor(new LayerStore());
      const first = compositor.getLayersSurface(SIZE);
      compositor.tick();
      expect(compositor.getLayersSurface(SIZE)).not.toBe(first);
      expect(compositor.redrawCounts.layers).toBe(2);
    });

    it('redraws both slots when the output size changes', () => {
      const compositor = new LayerCompositor(new LayerStore());
      compositor.getBackgroundSurface(SIZE);
      compositor.getLayersSurface(SIZE);

      const bigger = { width: 6, height: 4 };
      expect(compositor.getBackgroundSurface(bigger).width).toBe(6);
      expect(compositor.getLayersSurface(bigger).width).toBe(6);
      expect(compositor.redrawCounts).toEqual({ background: 2, layers: 2 });
    });

    it('reuses sprites across redraws of the same pixels', () => {
      const factory = vi.fn(createRasterCanvas);
      const store = new LayerStore();
      store.append(solidLayer(1, 1, [255, 0, 0, 255]));
      const compositor = new LayerCompositor(store, {}, factory);

      compositor.getLayersSurface(SIZE);
      expect(factory).toHaveBeenCalledTimes(2);

      store.updateAt(0, { opacity: 0.5 });
      compositor.getLayersSurface(SIZE);
      expect(factory).toHaveBeenCalledTimes(3);
    });

    it('drops everything on dispose', () => {
      const compositor = new LayerCompositor(new LayerStore());
      const background = compositor.getBackgroundSurface(SIZE);
      const layers = compositor.getLayersSurface(SIZE);
      compositor.dispose();

      expect(compositor.getBackgroundSurface(SIZE)).not.toBe(background);
      expect(compositor.getLayersSurface(SIZE)).not.toBe(layers);
    });
  });

  describe('resize', () => {
    it('reports the first size as a change', () => {
      const compositor = new LayerCompositor(new LayerStore());
      expect(compositor.size).toBeNull();
      expect(compositor.resize(SIZE)).toBe(true);
      expect(compositor.size).toEqual(SIZE);
    });

    it('keeps the background when the size is unchanged', () => {
      const compositor = new LayerCompositor(new LayerStore());
      compositor.resize(SIZE);
      const first = compositor.getBackgroundSurface(SIZE);

      expect(compositor.resize({ width: 4, height: 4 })).toBe(false);
      expect(compositor.getBackgroundSurface(SIZE)).toBe(first);
    });

    it('invalidates the background when the size changes', () => {
      const compositor = new LayerCompositor(new LayerStore());
      compositor.resize(SIZE);
      compositor.getBackgroundSurface(SIZE);

      expect(compositor.resize({ width: 8, height: 4 })).toBe(true);
      expect(compositor.redrawCounts.background).toBe(1);
      compositor.getBackgroundSurface({ width: 8, height: 4 });
      expect(compositor.redrawCounts.background).toBe(2);
    });
  });

  describe('render', () => {
    it('draws background then layers onto the target', () => {
      const store = new LayerStore();
      store.append(solidLayer(1, 1, [0, 0, 255, 255], { position: { x: 1, y: 1 } }));
      const compositor = new LayerCompositor(store, { backgroundColor: '#ff0000' });
      const target = new RasterCanvas(2, 2);

      compositor.render(target);
      expect(pixelAt(target, 0, 0)).toEqual(RED);
      expect(pixelAt(target, 1, 1)).toEqual(BLUE);
    });

    it('does nothing for a target without a 2D context', () => {
      const compositor = new LayerCompositor(new LayerStore());
      compositor.render({ width: 2, height: 2, getContext: () => null });
      expect(compositor.redrawCounts).toEqual({ background: 0, layers: 0 });
    });
  });

  describe('hooks', () => {
    it('reports redraws per slot', () => {
      const onRedraw = vi.fn();
      const compositor = new LayerCompositor(new LayerStore(), { onRedraw });
      compositor.getBackgroundSurface(SIZE);
      compositor.getLayersSurface(SIZE);
      compositor.getLayersSurface(SIZE);

      expect(onRedraw).toHaveBeenCalledTimes(2);
      expect(onRedraw).toHaveBeenNthCalledWith(1, 'background', SIZE, 1);
      expect(onRedraw).toHaveBeenNthCalledWith(2, 'layers', SIZE, 1);
    });

    it('logs redraw timings when enabled', () => {
      const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
      const compositor = new LayerCompositor(new LayerStore(), { logRenderTimings: true });
      compositor.getBackgroundSurface(SIZE);

      expect(debug).toHaveBeenCalledTimes(1);
      expect(debug).toHaveBeenCalledWith(expect.stringMatching(/^\[render\] background \d+\.\d{2}ms \(4x4\)$/));
    });

    it('does not log timings by default', () => {
      const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
      new LayerCompositor(new LayerStore()).getLayersSurface(SIZE);
      expect(debug).not.toHaveBeenCalled();
    });
  });

  it('accepts any LayerSource', () => {
    const source: LayerSource = { layers: [solidLayer(1, 1, [255, 0, 0, 255])], generation: 0 };
    expect(pixelAt(new LayerCompositor(source).getLayersSurface(SIZE), 0, 0)).toEqual(RED);
  });
});
