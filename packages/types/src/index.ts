/**
 * @layerstack/types
 *
 * Shared type definitions for the layer editor.
 * This package contains zero runtime code: only TypeScript interfaces and
 * types that serve as the "contract" between all packages.
 *
 * @packageDocumentation
 */

// Common primitives
export type { Color, Point, Rect, Size } from './common';

// Layer types
export type { ImageLayer, LayerPatch, LayerSource, PixelSource, RgbaImage } from './layer';

// Render cache & compositor
export type { CacheKey, CompositorOptions, RenderSlot } from './renderer';

// Events
export type { EventBus, EventCallback, EventMap } from './events';
