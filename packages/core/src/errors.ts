/**
 * @module errors
 * Error types raised by the layer model.
 */

/**
 * Thrown when encoded image bytes cannot be decoded.
 * Ingestion catches it and falls back to a placeholder-sized layer.
 */
export class ImageDecodeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ImageDecodeError';
  }
}

/** Thrown when a layer index does not address an existing layer. */
export class LayerIndexError extends RangeError {
  readonly index: number;
  readonly length: number;

  constructor(index: number, length: number) {
    super(`Layer index ${index} is out of range (layer count: ${length})`);
    this.name = 'LayerIndexError';
    this.index = index;
    this.length = length;
  }
}
