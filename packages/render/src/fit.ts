/**
 * @module fit
 * Fit-to-bounds sizing of layers.
 *
 * A layer is drawn at its intrinsic size times its scale. When that is wider
 * than the output, the width is reduced to the output width minus a fixed
 * margin and the height follows the layer's aspect ratio. Only the width is
 * checked; a tall, narrow layer is drawn at full height.
 */

import type { ImageLayer, Rect, Size } from '@layerstack/types';

/** Space kept free when a layer is shrunk to fit, in output pixels. */
export const DEFAULT_FIT_MARGIN = 20;

/**
 * Returns the size a layer is drawn at inside an output `boundsWidth` wide.
 * Never changes the layer itself.
 */
export function computeDrawSize(
  layer: Pick<ImageLayer, 'size' | 'scale'>,
  boundsWidth: number,
  margin: number = DEFAULT_FIT_MARGIN,
): Size {
  const { width, height } = layer.size;
  const aspectRatio = width / height;
  const scaledWidth = width * layer.scale;
  const scaledHeight = height * layer.scale;

  if (scaledWidth > boundsWidth) {
    const drawWidth = boundsWidth - margin;
    return { width: drawWidth, height: drawWidth / aspectRatio };
  }
  return { width: scaledWidth, height: scaledHeight };
}

/** Destination rectangle of a layer: its position plus {@link computeDrawSize}. */
export function layerDrawRect(
  layer: Pick<ImageLayer, 'position' | 'size' | 'scale'>,
  boundsWidth: number,
  margin: number = DEFAULT_FIT_MARGIN,
): Rect {
  const size = computeDrawSize(layer, boundsWidth, margin);
  return { x: layer.position.x, y: layer.position.y, width: size.width, height: size.height };
}
