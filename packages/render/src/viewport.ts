/**
 * @module viewport
 * Display sizing of the canvas inside the host's canvas area.
 *
 * The canvas keeps its document size (e.g. 1280x720) while its on-screen box
 * shrinks when the container is narrower, preserving the canvas aspect ratio.
 * Only the width is compared; a container that is too short is not
 * considered.
 */

import type { Size } from '@layerstack/types';

/**
 * On-screen size of a `canvas` shown inside `container`.
 *
 * @returns `container.width` by `container.width / aspect` when the canvas is
 *   wider than the container, otherwise the canvas size itself.
 */
export function fitCanvasToContainer(canvas: Size, container: Size): Size {
  if (canvas.width > container.width) {
    const aspectRatio = canvas.width / canvas.height;
    return { width: container.width, height: container.width / aspectRatio };
  }
  return { width: canvas.width, height: canvas.height };
}

/**
 * Scale from canvas coordinates to on-screen coordinates for
 * {@link fitCanvasToContainer}. 1 when the canvas is shown at full size.
 */
export function displayScale(canvas: Size, container: Size): number {
  return fitCanvasToContainer(canvas, container).width / canvas.width;
}
