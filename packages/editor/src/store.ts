/**
 * @module store
 * Zustand state store for an editor.
 *
 * The store wraps one {@link EditorState} aggregate and publishes a plain
 * snapshot of it after every dispatched action:
 * - Layer names and the current selection
 * - Canvas size
 * - Attached audio file and its load state
 * - A revision counter bumped on every successful action except `tick`,
 *   which only refreshes the compositor
 *
 * Views subscribe to the snapshot; all mutations go through `dispatch`.
 *
 * @see https://github.com/pmndrs/zustand
 */

import { createStore } from 'zustand/vanilla';
import type { StoreApi } from 'zustand/vanilla';
import type { ImageLayer, Size } from '@layerstack/types';
import { resolveConfig } from './config';
import type { EditorConfig } from './config';
import { createEditorState } from './editor-state';
import type { EditorState } from './editor-state';
import { executeAction } from './editor-actions';
import type { ActionResult, EditorAction } from './editor-actions';

/** Serializable view of the editor, rebuilt after every action. */
export interface EditorSnapshot {
  /** Layer names in paint order. */
  layerNames: readonly string[];
  /** Raw selected index; check it against `layerNames.length`. */
  selectedIndex: number;
  /** The selected layer, or null when the index does not address one. */
  selectedLayer: ImageLayer | null;
  canvasSize: Size;
  audioFileName: string | null;
  isLoadingAudio: boolean;
  /** Bumped on every successful action other than `tick`. */
  revision: number;
}

export interface EditorActions {
  /** Apply an action and refresh the snapshot. */
  dispatch: (action: EditorAction) => ActionResult;
  /** The underlying aggregate, for rendering and export. */
  getEditorState: () => EditorState;
}

export type EditorStore = StoreApi<EditorSnapshot & EditorActions>;

function snapshotOf(state: EditorState): Omit<EditorSnapshot, 'revision'> {
  return {
    layerNames: state.layers.namesProjection(),
    selectedIndex: state.selection.selectedIndex,
    selectedLayer: state.selection.current(state.layers),
    canvasSize: { ...state.canvasSize },
    audioFileName: state.audio.fileName,
    isLoadingAudio: state.audio.isLoading,
  };
}

/**
 * Creates a store around a fresh editor.
 *
 * @throws RangeError when `config` contains unusable values.
 */
export function createEditorStore(config: Partial<EditorConfig> = {}): EditorStore {
  const editor = createEditorState(resolveConfig(config));

  return createStore<EditorSnapshot & EditorActions>()((set, get) => ({
    ...snapshotOf(editor),
    revision: 0,

    dispatch: (action): ActionResult => {
      const result = executeAction(editor, action);
      if (result.success && action.type !== 'tick') {
        set({ ...snapshotOf(editor), revision: get().revision + 1 });
      }
      return result;
    },

    getEditorState: (): EditorState => editor,
  }));
}
