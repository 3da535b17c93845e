/**
 * @module test-helpers
 * Shared fixtures for the editor tests.
 */

import { encode as encodeJpeg } from 'jpeg-js';
import { encodePng } from '@layerstack/core';

/** Encodes a `width` x `height` PNG filled with one RGBA color. */
export function solidPng(width: number, height: number, rgba: [number, number, number, number]): Uint8Array {
  const data = new Uint8Array(width * height * 4);
  for (let i = 0; i < data.length; i += 4) {
    data.set(rgba, i);
  }
  return encodePng({ data, width, height });
}

/** Encodes a `width` x `height` JPEG filled with one RGB color at full quality. */
export function solidJpeg(width: number, height: number, rgb: [number, number, number]): Uint8Array {
  const data = new Uint8Array(width * height * 4);
  for (let i = 0; i < data.length; i += 4) {
    data.set([...rgb, 255], i);
  }
  return new Uint8Array(encodeJpeg({ data, width, height }, 100).data);
}

/** Bytes no decoder recognises. */
export const JUNK_BYTES = new Uint8Array([1, 2, 3, 4, 5]);
