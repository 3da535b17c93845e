/**
 * @module editor-actions/types
 * EditorAction type definitions.
 *
 * Every change to an editor goes through one of these actions, so a host
 * (UI, file loader, ticker) never touches the store or the compositor
 * directly.
 */

import type { LayerPatch } from '@layerstack/types';

/** Result of executing a single EditorAction. */
export interface ActionResult {
  success: boolean;
  actionType: EditorAction['type'];
  error?: string;
  /** Index of the layer the action created or touched, when there is one. */
  layerIndex?: number;
}

/** Discriminated union of all editor actions. */
export type EditorAction =
  // --- Canvas ---
  | { type: 'setCanvasSize'; params: { width: number; height: number } }
  | { type: 'tick'; params?: Record<string, never> }
  // --- Layers ---
  | { type: 'imageLoaded'; params: { name: string; bytes: Uint8Array } }
  | { type: 'removeLayer'; params: { index: number } }
  | { type: 'selectLayer'; params: { index: number } }
  | { type: 'selectLastLayer'; params?: Record<string, never> }
  | { type: 'updateLayer'; params: { index: number; patch: LayerPatch } }
  // --- Audio ---
  | { type: 'audioLoadStarted'; params?: Record<string, never> }
  | { type: 'audioLoaded'; params: { name: string; bytes: Uint8Array } }
  | { type: 'audioLoadFailed'; params?: Record<string, never> }
  | { type: 'removeAudio'; params?: Record<string, never> };

/** The `type` tag of any {@link EditorAction}. */
export type EditorActionType = EditorAction['type'];
