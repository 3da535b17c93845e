/**
 * @module editor-actions/dispatcher
 * Central dispatcher for EditorAction execution.
 *
 * Validates params, applies the action to the editor aggregate and returns a
 * structured result. Nothing here throws: validation failures and errors
 * raised while applying an action both come back as `success: false`.
 *
 * Architecture:
 *   EditorAction → validateAction() → store / selection / compositor → ActionResult
 */

import { createImageLayer, fallbackLayerSize } from '@layerstack/core';
import type { EditorState } from '../editor-state';
import { validateAction } from './validators';
import type { ActionResult, EditorAction } from './types';

function rejected(action: EditorAction, error: string): ActionResult {
  console.warn(`[editor] ${action.type} rejected: ${error}`);
  return { success: false, actionType: action.type, error };
}

/**
 * Execute a single EditorAction against `state`.
 */
export function executeAction(state: EditorState, action: EditorAction): ActionResult {
  // 1. Validate
  const validation = validateAction(action, state);
  if (!validation.valid) {
    return rejected(action, validation.error ?? 'Invalid action');
  }

  // 2. Apply
  try {
    switch (action.type) {
      // --- Canvas ---
      case 'setCanvasSize': {
        const size = { width: action.params.width, height: action.params.height };
        state.canvasSize = size;
        if (state.compositor.resize(size)) {
          state.events.emit('canvas:resized', { size });
        }
        return { success: true, actionType: action.type };
      }

      case 'tick': {
        state.compositor.tick();
        state.events.emit('render:tick');
        return { success: true, actionType: action.type };
      }

      // --- Layers ---
      case 'imageLoaded': {
        const layer = createImageLayer(action.params.name, action.params.bytes, {
          fallbackSize: fallbackLayerSize(state.canvasSize, state.config.fitMargin),
          decoder: state.config.decoder,
        });
        // layer:added goes out from append(); selection:changed follows.
        const index = state.layers.append(layer);
        state.selection.selectLast(state.layers.length);
        return { success: true, actionType: action.type, layerIndex: index };
      }

      case 'removeLayer': {
        state.layers.removeAt(action.params.index);
        state.selection.selectLast(state.layers.length);
        return { success: true, actionType: action.type };
      }

      case 'selectLayer': {
        state.selection.select(action.params.index);
        return { success: true, actionType: action.type, layerIndex: action.params.index };
      }

      case 'selectLastLayer': {
        state.selection.selectLast(state.layers.length);
        return { success: true, actionType: action.type, layerIndex: state.selection.selectedIndex };
      }

      case 'updateLayer': {
        state.layers.updateAt(action.params.index, action.params.patch);
        return { success: true, actionType: action.type, layerIndex: action.params.index };
      }

      // --- Audio ---
      case 'audioLoadStarted': {
        if (!state.audio.beginLoad()) {
          return rejected(action, 'An audio file is already loading');
        }
        return { success: true, actionType: action.type };
      }

      case 'audioLoaded': {
        state.audio.complete(action.params.name, action.params.bytes);
        return { success: true, actionType: action.type };
      }

      case 'audioLoadFailed': {
        state.audio.fail();
        return { success: true, actionType: action.type };
      }

      case 'removeAudio': {
        state.audio.remove();
        return { success: true, actionType: action.type };
      }
    }
  } catch (e) {
    return rejected(action, String(e));
  }
}

/**
 * Execute multiple actions in order.
 * A failing action does not stop the rest.
 */
export function executeActions(state: EditorState, actions: EditorAction[]): ActionResult[] {
  return actions.map((action) => executeAction(state, action));
}
