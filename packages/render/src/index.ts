/**
 * @layerstack/render
 *
 * Layer compositing, cached render surfaces and display sizing.
 *
 * @packageDocumentation
 */

// Canvas abstraction
export type { CanvasLike, CanvasContext2DLike, CanvasFactory, PixelBuffer } from './canvas';
export { RasterCanvas, createRasterCanvas } from './raster-canvas';

// Compositor
export { LayerCompositor } from './compositor';
export { CachedSurface } from './cached-surface';
export type { DrawFn, CachedSurfaceOptions } from './cached-surface';
export { DEFAULT_FIT_MARGIN, computeDrawSize, layerDrawRect } from './fit';

// Viewport
export { fitCanvasToContainer, displayScale } from './viewport';
