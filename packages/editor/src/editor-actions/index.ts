/**
 * @module editor-actions
 * Editor Action API: the single way to change an editor.
 */

export type { EditorAction, EditorActionType, ActionResult } from './types';
export { executeAction, executeActions } from './dispatcher';
export { validateAction } from './validators';
export type { ValidationResult } from './validators';
