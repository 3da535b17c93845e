/**
 * @module editor-actions/validators
 * Validation of EditorAction parameters.
 *
 * Runs before dispatch so that bad indices and numbers are rejected with a
 * message instead of reaching the store.
 */

import type { LayerPatch } from '@layerstack/types';
import type { EditorState } from '../editor-state';
import type { EditorAction } from './types';

export interface ValidationResult {
  valid: boolean;
  error?: string;
}

function ok(): ValidationResult {
  return { valid: true };
}

function fail(error: string): ValidationResult {
  return { valid: false, error };
}

function isFiniteNum(v: unknown): v is number {
  return typeof v === 'number' && Number.isFinite(v);
}

function isIndex(v: unknown): v is number {
  return typeof v === 'number' && Number.isInteger(v) && v >= 0;
}

function requireLayerIndex(index: number, state: Pick<EditorState, 'layers'>): ValidationResult | null {
  if (!isIndex(index)) return fail(`index must be a non-negative integer, got ${index}`);
  if (index >= state.layers.length) {
    return fail(`No layer at index ${index} (layer count: ${state.layers.length})`);
  }
  return null;
}

function validatePatch(patch: LayerPatch): ValidationResult | null {
  if (patch.position === undefined && patch.scale === undefined && patch.opacity === undefined) {
    return fail('patch must change position, scale or opacity');
  }
  if (patch.position !== undefined && !(isFiniteNum(patch.position.x) && isFiniteNum(patch.position.y))) {
    return fail('position must have finite x and y');
  }
  if (patch.scale !== undefined && !(isFiniteNum(patch.scale) && patch.scale > 0)) {
    return fail(`scale must be a positive number, got ${patch.scale}`);
  }
  if (patch.opacity !== undefined && !(isFiniteNum(patch.opacity) && patch.opacity >= 0 && patch.opacity <= 1)) {
    return fail(`opacity must be between 0 and 1, got ${patch.opacity}`);
  }
  return null;
}

/**
 * Validate an EditorAction against the current editor state.
 * Requires minimal state: the layer store for index checks and the audio
 * attachment for load-state checks.
 */
export function validateAction(
  action: EditorAction,
  state: Pick<EditorState, 'layers' | 'audio'>,
): ValidationResult {
  switch (action.type) {
    case 'setCanvasSize': {
      const { width, height } = action.params;
      if (!(isFiniteNum(width) && width > 0 && isFiniteNum(height) && height > 0)) {
        return fail(`Canvas size must be positive, got ${width}x${height}`);
      }
      return ok();
    }

    case 'imageLoaded':
      if (!(action.params.bytes instanceof Uint8Array)) return fail('bytes must be a Uint8Array');
      return ok();

    case 'removeLayer':
      return requireLayerIndex(action.params.index, state) ?? ok();

    case 'selectLayer':
      // Out-of-range selection is allowed; it reads back as no selection.
      if (!isIndex(action.params.index)) {
        return fail(`index must be a non-negative integer, got ${action.params.index}`);
      }
      return ok();

    case 'updateLayer':
      return requireLayerIndex(action.params.index, state) ?? validatePatch(action.params.patch) ?? ok();

    case 'audioLoadStarted':
      if (state.audio.isLoading) return fail('An audio file is already loading');
      return ok();

    case 'audioLoaded':
      if (!action.params.name) return fail('name is required');
      if (!(action.params.bytes instanceof Uint8Array)) return fail('bytes must be a Uint8Array');
      return ok();

    case 'tick':
    case 'selectLastLayer':
    case 'audioLoadFailed':
    case 'removeAudio':
      return ok();
  }
}
