/**
 * @layerstack/editor
 *
 * Host-facing editor: configuration, the editor aggregate, the action
 * dispatcher, the zustand store, file loading, the ticker and PNG export.
 *
 * @packageDocumentation
 */

// Configuration
export { DEFAULT_EDITOR_CONFIG, resolveConfig } from './config';
export type { EditorConfig } from './config';

// Aggregate
export { createEditorState } from './editor-state';
export type { EditorState } from './editor-state';

// Actions
export { executeAction, executeActions, validateAction } from './editor-actions';
export type {
  ActionResult,
  EditorAction,
  EditorActionType,
  ValidationResult,
} from './editor-actions';

// Store
export { createEditorStore } from './store';
export type { EditorActions, EditorSnapshot, EditorStore } from './store';

// Host integration
export { FileLoadError, loadAudioFile, loadImageFile } from './file-loader';
export type { FileLoadErrorKind } from './file-loader';
export { startTicker } from './ticker';
export { exportPng } from './export';
