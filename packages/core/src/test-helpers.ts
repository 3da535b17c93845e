/**
 * @module test-helpers
 * Builders for synthetic PNG and JPEG files used by the tests.
 */

import { deflateSync } from 'fflate';
import { encode as encodeJpeg } from 'jpeg-js';
import { encodePng } from './png-codec';

/** Options for {@link buildPng}. */
export interface BuildPngOptions {
  bitDepth?: number;
  interlace?: number;
  /** Leave out the IDAT chunk entirely. */
  omitData?: boolean;
}

function u32(value: number): number[] {
  return [(value >>> 24) & 0xff, (value >>> 16) & 0xff, (value >>> 8) & 0xff, value & 0xff];
}

function chunk(type: string, data: Uint8Array): number[] {
  // The decoder does not verify CRCs, so they are left as zero.
  return [...u32(data.length), ...[...type].map((c) => c.charCodeAt(0)), ...data, 0, 0, 0, 0];
}

/**
 * Builds a PNG from raw scanlines. Each row must start with its filter byte.
 */
export function buildPng(
  width: number,
  height: number,
  colorType: number,
  rows: number[][],
  options: BuildPngOptions = {},
): Uint8Array {
  const ihdr = new Uint8Array([
    ...u32(width),
    ...u32(height),
    options.bitDepth ?? 8,
    colorType,
    0,
    0,
    options.interlace ?? 0,
  ]);
  const raw = new Uint8Array(rows.flat());
  return new Uint8Array([
    137, 80, 78, 71, 13, 10, 26, 10,
    ...chunk('IHDR', ihdr),
    ...(options.omitData ? [] : chunk('IDAT', deflateSync(raw))),
    ...chunk('IEND', new Uint8Array(0)),
  ]);
}

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
