/**
 * @module canvas
 * Canvas abstraction shared by the compositor and its caches.
 *
 * The interfaces cover the subset of the Canvas 2D API the compositor uses,
 * so a browser `OffscreenCanvas` and the software {@link RasterCanvas} can
 * both be plugged in through a {@link CanvasFactory}.
 */

/** Pixel rectangle in the layout of the DOM `ImageData`. */
export interface PixelBuffer {
  /** RGBA bytes, row-major. Length = width * height * 4. */
  data: Uint8ClampedArray;
  width: number;
  height: number;
}

/** Canvas-like interface that works in both browser and Node environments. */
export interface CanvasLike {
  readonly width: number;
  readonly height: number;
  getContext(type: '2d'): CanvasContext2DLike | null;
}

/** Minimal 2D context interface for compositing. */
export interface CanvasContext2DLike {
  globalAlpha: number;
  fillStyle: string;
  save(): void;
  restore(): void;
  clearRect(x: number, y: number, w: number, h: number): void;
  fillRect(x: number, y: number, w: number, h: number): void;
  drawImage(source: CanvasLike, dx: number, dy: number): void;
  drawImage(source: CanvasLike, dx: number, dy: number, dw: number, dh: number): void;
  putImageData(imageData: PixelBuffer, dx: number, dy: number): void;
  getImageData(sx: number, sy: number, sw: number, sh: number): PixelBuffer;
}

/** Factory function for creating canvases. */
export type CanvasFactory = (width: number, height: number) => CanvasLike;
