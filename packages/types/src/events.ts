/**
 * @module events
 * Type-safe event bus definitions for cross-module communication.
 * The layer store, selection model and compositor report changes here so the
 * host can refresh its views without polling.
 */

import type { Size } from './common';
import type { ImageLayer } from './layer';
import type { RenderSlot } from './renderer';

/**
 * Map of event names to their payload types.
 *
 * `layer:*` events are emitted by the layer store as the stack changes, before
 * the editor re-clamps the selection. When an action also moves the selection,
 * `selection:changed` follows within the same dispatch; listeners that need
 * the new selected index should subscribe to that event.
 */
export interface EventMap {
  /** Fired when a layer is appended to the stack. */
  'layer:added': { layer: ImageLayer; index: number };
  /** Fired when a layer is removed from the stack. */
  'layer:removed': { layer: ImageLayer; index: number };
  /** Fired when a layer's position, scale or opacity changes. */
  'layer:updated': { layer: ImageLayer; index: number };
  /** Fired when the selected index changes. */
  'selection:changed': { index: number };
  /** Fired when the canvas size changes. */
  'canvas:resized': { size: Size };
  /** Fired when the periodic refresh signal invalidates the layers cache. */
  'render:tick': undefined;
  /** Fired after a cache slot has been redrawn. */
  'render:redrawn': { slot: RenderSlot; size: Size; redrawCount: number };
  /** Fired when the attached audio file changes (attached, removed or load state). */
  'audio:changed': { fileName: string | null; isLoading: boolean };
}

/** Callback function type for event listeners. */
export type EventCallback<K extends keyof EventMap> = EventMap[K] extends undefined
  ? () => void
  : (payload: EventMap[K]) => void;

/** Type-safe event bus for pub/sub communication. */
export interface EventBus {
  /** Subscribe to an event. Returns an unsubscribe function. */
  on<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void;
  /**
   * Subscribe to an event for a single emission. A callback registered with
   * both `on` and `once` is kept as two entries.
   */
  once<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void;
  /** Unsubscribe every registration of a callback from an event. */
  off<K extends keyof EventMap>(event: K, callback: EventCallback<K>): void;
  /** Emit an event with an optional payload. Listener errors do not reach the caller. */
  emit<K extends keyof EventMap>(
    event: K,
    ...args: EventMap[K] extends undefined ? [] : [EventMap[K]]
  ): void;
  /** Remove all listeners for all events. */
  clear(): void;
}
