/**
 * @module editor-state
 * The aggregate owned by one editor instance.
 *
 * Everything an editor mutates lives here and is passed explicitly to the
 * action dispatcher; there is no module-level state.
 */

import type { EventBus, Size } from '@layerstack/types';
import { AudioAttachment, EventBusImpl, LayerStore, SelectionModel } from '@layerstack/core';
import { LayerCompositor } from '@layerstack/render';
import type { CanvasFactory } from '@layerstack/render';
import type { EditorConfig } from './config';

export interface EditorState {
  readonly config: EditorConfig;
  readonly events: EventBus;
  readonly layers: LayerStore;
  readonly selection: SelectionModel;
  readonly compositor: LayerCompositor;
  readonly audio: AudioAttachment;
  /** Current canvas size. Replaced, never mutated, by `setCanvasSize`. */
  canvasSize: Size;
}

/**
 * Builds a fresh aggregate. Compositor redraws are forwarded to the bus as
 * `render:redrawn`.
 *
 * @param canvasFactory - Canvas implementation for the compositor's surfaces.
 */
export function createEditorState(config: EditorConfig, canvasFactory?: CanvasFactory): EditorState {
  const events = new EventBusImpl();
  const layers = new LayerStore(events);
  const compositor = new LayerCompositor(
    layers,
    {
      backgroundColor: config.backgroundColor,
      fitMargin: config.fitMargin,
      logRenderTimings: config.logRenderTimings,
      onRedraw: (slot, size, redrawCount) => {
        events.emit('render:redrawn', { slot, size, redrawCount });
      },
    },
    canvasFactory,
  );
  const canvasSize = { width: config.canvasWidth, height: config.canvasHeight };
  compositor.resize(canvasSize);

  return {
    config,
    events,
    layers,
    selection: new SelectionModel(events),
    compositor,
    audio: new AudioAttachment(events),
    canvasSize,
  };
}
