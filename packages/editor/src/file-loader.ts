/**
 * @module file-loader
 * Reads picked files from disk and hands the result to the editor as one
 * action.
 *
 * The file picker itself belongs to the host. It passes the chosen path, or
 * null when the dialog was closed without a choice; a null path issues no
 * action at all.
 */

import { readFile } from 'fs/promises';
import * as path from 'path';
import { AUDIO_FILE_EXTENSIONS, layerNameFromPath } from '@layerstack/core';
import type { ActionResult } from './editor-actions';
import type { EditorStore } from './store';

/** Why a file could not be loaded. */
export type FileLoadErrorKind = 'io' | 'unsupported';

/** Thrown when a picked file cannot be turned into an action. */
export class FileLoadError extends Error {
  readonly kind: FileLoadErrorKind;
  readonly filePath: string;

  constructor(kind: FileLoadErrorKind, filePath: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FileLoadError';
    this.kind = kind;
    this.filePath = filePath;
  }
}

/** Lower-case extension without the dot, or '' when there is none. */
function extensionOf(filePath: string): string {
  return path.extname(filePath).slice(1).toLowerCase();
}

async function readBytes(filePath: string): Promise<Uint8Array> {
  try {
    return new Uint8Array(await readFile(filePath));
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new FileLoadError('io', filePath, `Failed to read ${filePath}: ${reason}`, { cause: e });
  }
}

/**
 * Reads an image and appends it as a new layer.
 *
 * Undecodable contents still produce a layer (see `createImageLayer`); only
 * a failed read is an error.
 *
 * @returns The dispatch result, or null when `filePath` is null.
 * @throws FileLoadError when the file cannot be read.
 */
export async function loadImageFile(store: EditorStore, filePath: string | null): Promise<ActionResult | null> {
  if (filePath === null) return null;

  const bytes = await readBytes(filePath);
  return store.getState().dispatch({
    type: 'imageLoaded',
    params: { name: layerNameFromPath(filePath), bytes },
  });
}

/**
 * Reads an audio file and attaches it, replacing any previous one.
 *
 * The attachment is marked as loading for the duration of the read. A
 * second load while one is in flight is rejected without reading.
 *
 * @returns The dispatch result of the final action, or null when `filePath`
 *   is null.
 * @throws FileLoadError when the extension is not an audio type or the file
 *   cannot be read.
 */
export async function loadAudioFile(store: EditorStore, filePath: string | null): Promise<ActionResult | null> {
  if (filePath === null) return null;

  if (!AUDIO_FILE_EXTENSIONS.includes(extensionOf(filePath))) {
    throw new FileLoadError(
      'unsupported',
      filePath,
      `Unsupported audio file: ${filePath} (expected ${AUDIO_FILE_EXTENSIONS.join(', ')})`,
    );
  }

  const { dispatch } = store.getState();
  const started = dispatch({ type: 'audioLoadStarted' });
  if (!started.success) return started;

  let bytes: Uint8Array;
  try {
    bytes = await readBytes(filePath);
  } catch (e) {
    dispatch({ type: 'audioLoadFailed' });
    throw e;
  }
  return dispatch({ type: 'audioLoaded', params: { name: path.basename(filePath), bytes } });
}
