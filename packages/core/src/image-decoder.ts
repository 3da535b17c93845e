/**
 * @module image-decoder
 * Turns encoded image bytes into RGBA pixels.
 *
 * The built-in decoder understands PNG and baseline/progressive JPEG. WebP,
 * and any other format, is left to a host-supplied {@link ImageDecoder}
 * passed to the layer factory.
 */

import { decode as decodeJpegData } from 'jpeg-js';
import type { RgbaImage } from '@layerstack/types';
import { ImageDecodeError } from './errors';
import { decodePng, isPng } from './png-codec';

/**
 * Decodes encoded image bytes.
 * Implementations throw when the bytes cannot be decoded.
 */
export type ImageDecoder = (bytes: Uint8Array) => RgbaImage;

/** True when `bytes` start with the JPEG SOI marker. */
export function isJpeg(bytes: Uint8Array): boolean {
  return bytes.length >= 3 && bytes[0] === 0xff && bytes[1] === 0xd8 && bytes[2] === 0xff;
}

function malformed(format: string, e: unknown): ImageDecodeError {
  const reason = e instanceof Error ? e.message : String(e);
  return new ImageDecodeError(`Malformed ${format} data: ${reason}`, { cause: e });
}

function decodeJpeg(bytes: Uint8Array): RgbaImage {
  const { data, width, height } = decodeJpegData(bytes, { useTArray: true, formatAsRGBA: true });
  return { data, width, height };
}

/**
 * Default decoder. Detects the format from the file signature.
 *
 * @throws ImageDecodeError for unknown formats and malformed PNG or JPEG data.
 */
export const decodeImage: ImageDecoder = (bytes) => {
  if (isPng(bytes)) {
    try {
      return decodePng(bytes);
    } catch (e) {
      throw malformed('PNG', e);
    }
  }
  if (isJpeg(bytes)) {
    try {
      return decodeJpeg(bytes);
    } catch (e) {
      throw malformed('JPEG', e);
    }
  }
  throw new ImageDecodeError('Unsupported or unrecognised image format');
};
