/**
 * @module export
 * Flattens the editor's output into a PNG file.
 */

import type { Size } from '@layerstack/types';
import { encodePng } from '@layerstack/core';
import { createRasterCanvas } from '@layerstack/render';
import type { EditorState } from './editor-state';

/**
 * Composites background and layers at `size` (the canvas size by default)
 * and encodes the result as an RGBA PNG.
 */
export function exportPng(state: EditorState, size: Size = state.canvasSize): Uint8Array {
  const target = createRasterCanvas(size.width, size.height);
  state.compositor.render(target);
  return encodePng({ data: target.pixels, width: target.width, height: target.height });
}
