/**
 * @module layer-factory
 * Factory functions for creating image layers from host-supplied bytes.
 *
 * Layer creation never fails: when the bytes cannot be decoded the layer is
 * still built, sized to a fallback and carrying no decoded pixels, so the
 * store never holds a half-constructed entry.
 */

import type { ImageLayer, LayerPatch, RgbaImage, Size } from '@layerstack/types';
import { decodeImage, type ImageDecoder } from './image-decoder';
import { generateId } from './uuid';

/** Name given to layers whose source has no usable file name. */
export const UNNAMED_LAYER = 'Unnamed';

/** Default margin subtracted from the canvas size for undecodable layers. */
export const DEFAULT_FALLBACK_MARGIN = 20;

/** Options for {@link createImageLayer}. */
export interface CreateImageLayerOptions {
  /** Size used when decoding fails. */
  fallbackSize: Size;
  /** Decoder to use. Defaults to {@link decodeImage}. */
  decoder?: ImageDecoder;
}

/**
 * Size given to layers whose pixels could not be decoded:
 * the canvas size minus `margin` on each axis.
 */
export function fallbackLayerSize(canvas: Size, margin: number = DEFAULT_FALLBACK_MARGIN): Size {
  return { width: canvas.width - margin, height: canvas.height - margin };
}

/**
 * Derives a display name from a file path: the base name when there is one,
 * otherwise the path itself, otherwise {@link UNNAMED_LAYER}.
 */
export function layerNameFromPath(path: string | null | undefined): string {
  if (!path) return UNNAMED_LAYER;
  const segments = path.split(/[\\/]/);
  const baseName = segments[segments.length - 1];
  if (baseName && baseName !== '.' && baseName !== '..') return baseName;
  return path;
}

/**
 * Creates an image layer from encoded bytes.
 *
 * The layer takes its size from the decoded image. If decoding throws, a
 * warning is logged and the layer gets `options.fallbackSize` and a null
 * `source.image`.
 *
 * @throws RangeError when the resulting size is not positive.
 */
export function createImageLayer(
  name: string,
  bytes: Uint8Array,
  options: CreateImageLayerOptions,
): ImageLayer {
  const decoder = options.decoder ?? decodeImage;
  const ownedBytes = new Uint8Array(bytes);

  let image: RgbaImage | null = null;
  try {
    image = decoder(ownedBytes);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    console.warn(`[core] Could not decode "${name}" (${reason}); using fallback size`);
  }

  const size: Size = image
    ? { width: image.width, height: image.height }
    : { ...options.fallbackSize };

  if (!(size.width > 0 && size.height > 0)) {
    throw new RangeError(`Layer "${name}" must have a positive size, got ${size.width}x${size.height}`);
  }

  return {
    id: generateId(),
    name: name || UNNAMED_LAYER,
    position: { x: 0, y: 0 },
    size,
    scale: 1,
    opacity: 1,
    source: { bytes: ownedBytes, image },
  };
}

/**
 * Returns a copy of `layer` with `patch` applied.
 *
 * @throws RangeError when a patched value is out of range.
 */
export function applyLayerPatch(layer: ImageLayer, patch: LayerPatch): ImageLayer {
  if (patch.position !== undefined) {
    const { x, y } = patch.position;
    if (!Number.isFinite(x) || !Number.isFinite(y)) {
      throw new RangeError(`Layer position must be finite, got (${x}, ${y})`);
    }
  }
  if (patch.scale !== undefined && !(Number.isFinite(patch.scale) && patch.scale > 0)) {
    throw new RangeError(`Layer scale must be a positive number, got ${patch.scale}`);
  }
  if (patch.opacity !== undefined && !(patch.opacity >= 0 && patch.opacity <= 1)) {
    throw new RangeError(`Layer opacity must be between 0 and 1, got ${patch.opacity}`);
  }

  return {
    ...layer,
    position: patch.position ? { x: patch.position.x, y: patch.position.y } : layer.position,
    scale: patch.scale ?? layer.scale,
    opacity: patch.opacity ?? layer.opacity,
  };
}
