/**
 * @module raster-canvas
 * Software canvas for headless compositing.
 *
 * Implements {@link CanvasLike} on a plain RGBA buffer so the compositor runs
 * in Node.js without a browser. Semantics follow Canvas 2D where it matters
 * for compositing:
 * - `fillRect` and `drawImage` blend with source-over, scaled by `globalAlpha`.
 * - `putImageData` and `clearRect` write pixels directly, ignoring alpha.
 * - `drawImage` resamples with nearest-neighbour.
 * - Rectangle edges are rounded to whole pixels and clipped to the canvas.
 * - An unparsable `fillStyle` assignment is ignored.
 */

import type { Color } from '@layerstack/types';
import { blendColors, hexToColor } from '@layerstack/core';
import type { CanvasContext2DLike, CanvasLike, PixelBuffer } from './canvas';

/** Pixel span `[start, end)` on one axis, already clipped. */
interface Span {
  start: number;
  end: number;
  /** Unclipped rounded origin, used to map back into the source. */
  origin: number;
  /** Unclipped rounded length. */
  length: number;
}

function span(pos: number, size: number, limit: number): Span {
  let a = Math.round(pos);
  let b = Math.round(pos + size);
  if (b < a) [a, b] = [b, a];
  return {
    start: Math.min(Math.max(a, 0), limit),
    end: Math.min(Math.max(b, 0), limit),
    origin: a,
    length: b - a,
  };
}

/** An RGBA canvas backed by a `Uint8ClampedArray`. */
export class RasterCanvas implements CanvasLike {
  readonly width: number;
  readonly height: number;
  /** Backing pixels, row-major RGBA. */
  readonly pixels: Uint8ClampedArray;
  private readonly context: RasterContext;

  constructor(width: number, height: number) {
    this.width = Math.max(0, Math.round(width));
    this.height = Math.max(0, Math.round(height));
    this.pixels = new Uint8ClampedArray(this.width * this.height * 4);
    this.context = new RasterContext(this);
  }

  getContext(_type: '2d'): CanvasContext2DLike {
    return this.context;
  }
}

/** {@link CanvasFactory} producing {@link RasterCanvas} instances. */
export function createRasterCanvas(width: number, height: number): RasterCanvas {
  return new RasterCanvas(width, height);
}

interface ContextState {
  globalAlpha: number;
  fillStyle: string;
  fillColor: Color;
}

class RasterContext implements CanvasContext2DLike {
  globalAlpha = 1;
  private _fillStyle = '#000000';
  private fillColor: Color = { r: 0, g: 0, b: 0, a: 1 };
  private stack: ContextState[] = [];

  constructor(private readonly canvas: RasterCanvas) {}

  get fillStyle(): string {
    return this._fillStyle;
  }

  set fillStyle(value: string) {
    const color = hexToColor(value);
    if (!color) return;
    this._fillStyle = value;
    this.fillColor = color;
  }

  save(): void {
    this.stack.push({
      globalAlpha: this.globalAlpha,
      fillStyle: this._fillStyle,
      fillColor: this.fillColor,
    });
  }

  restore(): void {
    const state = this.stack.pop();
    if (!state) return;
    this.globalAlpha = state.globalAlpha;
    this._fillStyle = state.fillStyle;
    this.fillColor = state.fillColor;
  }

  clearRect(x: number, y: number, w: number, h: number): void {
    const xs = span(x, w, this.canvas.width);
    const ys = span(y, h, this.canvas.height);
    for (let py = ys.start; py < ys.end; py++) {
      const row = (py * this.canvas.width) * 4;
      this.canvas.pixels.fill(0, row + xs.start * 4, row + xs.end * 4);
    }
  }

  fillRect(x: number, y: number, w: number, h: number): void {
    const { r, g, b } = this.fillColor;
    const alpha = this.fillColor.a * this.alpha();
    const xs = span(x, w, this.canvas.width);
    const ys = span(y, h, this.canvas.height);
    for (let py = ys.start; py < ys.end; py++) {
      for (let px = xs.start; px < xs.end; px++) {
        this.blendPixel((py * this.canvas.width + px) * 4, r, g, b, alpha);
      }
    }
  }

  drawImage(source: CanvasLike, dx: number, dy: number, dw?: number, dh?: number): void {
    const srcCtx = source.getContext('2d');
    if (!srcCtx || source.width === 0 || source.height === 0) return;
    const src = srcCtx.getImageData(0, 0, source.width, source.height);

    const xs = span(dx, dw ?? source.width, this.canvas.width);
    const ys = span(dy, dh ?? source.height, this.canvas.height);
    if (xs.length === 0 || ys.length === 0) return;

    const alpha = this.alpha();
    for (let py = ys.start; py < ys.end; py++) {
      const sy = Math.min(Math.floor(((py - ys.origin + 0.5) * src.height) / ys.length), src.height - 1);
      for (let px = xs.start; px < xs.end; px++) {
        const sx = Math.min(Math.floor(((px - xs.origin + 0.5) * src.width) / xs.length), src.width - 1);
        const si = (sy * src.width + sx) * 4;
        this.blendPixel(
          (py * this.canvas.width + px) * 4,
          src.data[si],
          src.data[si + 1],
          src.data[si + 2],
          (src.data[si + 3] / 255) * alpha,
        );
      }
    }
  }

  putImageData(imageData: PixelBuffer, dx: number, dy: number): void {
    const ox = Math.round(dx);
    const oy = Math.round(dy);
    for (let y = 0; y < imageData.height; y++) {
      const py = oy + y;
      if (py < 0 || py >= this.canvas.height) continue;
      for (let x = 0; x < imageData.width; x++) {
        const px = ox + x;
        if (px < 0 || px >= this.canvas.width) continue;
        const si = (y * imageData.width + x) * 4;
        const di = (py * this.canvas.width + px) * 4;
        this.canvas.pixels.set(imageData.data.subarray(si, si + 4), di);
      }
    }
  }

  getImageData(sx: number, sy: number, sw: number, sh: number): PixelBuffer {
    const width = Math.max(0, Math.round(sw));
    const height = Math.max(0, Math.round(sh));
    const ox = Math.round(sx);
    const oy = Math.round(sy);
    const data = new Uint8ClampedArray(width * height * 4);
    for (let y = 0; y < height; y++) {
      const py = oy + y;
      if (py < 0 || py >= this.canvas.height) continue;
      for (let x = 0; x < width; x++) {
        const px = ox + x;
        if (px < 0 || px >= this.canvas.width) continue;
        const si = (py * this.canvas.width + px) * 4;
        data.set(this.canvas.pixels.subarray(si, si + 4), (y * width + x) * 4);
      }
    }
    return { data, width, height };
  }

  private alpha(): number {
    return Math.min(Math.max(this.globalAlpha, 0), 1);
  }

  private blendPixel(i: number, r: number, g: number, b: number, a: number): void {
    if (a <= 0) return;
    const d = this.canvas.pixels;
    if (a >= 1) {
      d[i] = r;
      d[i + 1] = g;
      d[i + 2] = b;
      d[i + 3] = 255;
      return;
    }
    const out = blendColors({ r: d[i], g: d[i + 1], b: d[i + 2], a: d[i + 3] / 255 }, { r, g, b, a });
    d[i] = out.r;
    d[i + 1] = out.g;
    d[i + 2] = out.b;
    d[i + 3] = Math.round(out.a * 255);
  }
}
