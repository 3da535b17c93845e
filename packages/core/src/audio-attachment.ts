/**
 * @module audio-attachment
 * Bookkeeping for the single audio file attached to a project.
 * The bytes are held as-is; nothing here decodes or plays them.
 */

import type { EventBus } from '@layerstack/types';

/** Audio file extensions offered by the file picker. */
export const AUDIO_FILE_EXTENSIONS: readonly string[] = ['wav', 'mp3', 'flac'];

export class AudioAttachment {
  private _fileName: string | null = null;
  private _bytes: Uint8Array = new Uint8Array(0);
  private _isLoading = false;

  constructor(private readonly events?: EventBus) {}

  /** Name of the attached file, or null when none is attached. */
  get fileName(): string | null {
    return this._fileName;
  }

  /** Contents of the attached file (empty when none is attached). */
  get bytes(): Uint8Array {
    return this._bytes;
  }

  /** Whether a file load is in flight. */
  get isLoading(): boolean {
    return this._isLoading;
  }

  /**
   * Marks a load as started.
   * @returns false when another load is already in flight.
   */
  beginLoad(): boolean {
    if (this._isLoading) return false;
    this._isLoading = true;
    this.notify();
    return true;
  }

  /** Attaches a loaded file, replacing any previous one. */
  complete(fileName: string, bytes: Uint8Array): void {
    this._isLoading = false;
    this._fileName = fileName;
    this._bytes = new Uint8Array(bytes);
    this.notify();
  }

  /** Ends an in-flight load without changing the attached file. */
  fail(): void {
    if (!this._isLoading) return;
    this._isLoading = false;
    this.notify();
  }

  /** Detaches the current file and cancels the loading state. */
  remove(): void {
    this._isLoading = false;
    this._fileName = null;
    this._bytes = new Uint8Array(0);
    this.notify();
  }

  private notify(): void {
    this.events?.emit('audio:changed', { fileName: this._fileName, isLoading: this._isLoading });
  }
}
