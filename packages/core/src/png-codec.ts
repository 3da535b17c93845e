/**
 * @module png-codec
 * PNG encoder/decoder using fflate for deflate/inflate.
 * Pure JS, no browser APIs required.
 *
 * Decoding covers 8-bit, non-interlaced greyscale, greyscale + alpha, RGB and
 * RGBA images and always produces RGBA output. Encoding always writes RGBA.
 *
 * @see https://www.w3.org/TR/PNG/
 */

import { deflateSync, inflateSync } from 'fflate';
import type { RgbaImage } from '@layerstack/types';

// ── CRC32 lookup table (256 entries) ──

const crcTable = new Uint32Array(256);
for (let n = 0; n < 256; n++) {
  let c = n;
  for (let k = 0; k < 8; k++) {
    c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
  }
  crcTable[n] = c;
}

function crc32(data: Uint8Array, start: number, end: number): number {
  let crc = 0xffffffff;
  for (let i = start; i < end; i++) {
    crc = crcTable[(crc ^ data[i]) & 0xff] ^ (crc >>> 8);
  }
  return (crc ^ 0xffffffff) >>> 0;
}

// ── Helpers ──

function write32(buf: Uint8Array, offset: number, value: number): void {
  buf[offset] = (value >>> 24) & 0xff;
  buf[offset + 1] = (value >>> 16) & 0xff;
  buf[offset + 2] = (value >>> 8) & 0xff;
  buf[offset + 3] = value & 0xff;
}

function read32(buf: Uint8Array, offset: number): number {
  return (
    ((buf[offset] << 24) | (buf[offset + 1] << 16) | (buf[offset + 2] << 8) | buf[offset + 3]) >>>
    0
  );
}

function writeChunk(out: Uint8Array, offset: number, type: string, data: Uint8Array): number {
  write32(out, offset, data.length);
  const typeStart = offset + 4;
  for (let i = 0; i < 4; i++) {
    out[typeStart + i] = type.charCodeAt(i);
  }
  out.set(data, typeStart + 4);
  const crcOffset = typeStart + 4 + data.length;
  write32(out, crcOffset, crc32(out, typeStart, crcOffset));
  return crcOffset + 4;
}

// PNG signature: 8 bytes
const PNG_SIGNATURE = new Uint8Array([137, 80, 78, 71, 13, 10, 26, 10]);

/** Samples per pixel for each supported PNG colour type. */
const CHANNELS_BY_COLOR_TYPE: Readonly<Record<number, number>> = {
  0: 1, // greyscale
  2: 3, // RGB
  4: 2, // greyscale + alpha
  6: 4, // RGBA
};

/** Returns true when `bytes` starts with the PNG file signature. */
export function isPng(bytes: Uint8Array): boolean {
  if (bytes.length < PNG_SIGNATURE.length) return false;
  for (let i = 0; i < PNG_SIGNATURE.length; i++) {
    if (bytes[i] !== PNG_SIGNATURE[i]) return false;
  }
  return true;
}

/**
 * Encodes an RGBA image as a PNG file.
 * Uses filter type 0 (None) for every scanline.
 */
export function encodePng(image: RgbaImage): Uint8Array {
  const { data, width, height } = image;

  if (data.length !== width * height * 4) {
    throw new Error(
      `Image data length (${data.length}) does not match dimensions (${width}x${height}x4 = ${width * height * 4})`,
    );
  }

  const rowBytes = width * 4;
  const rawData = new Uint8Array(height * (1 + rowBytes));
  for (let y = 0; y < height; y++) {
    rawData[y * (1 + rowBytes)] = 0; // filter: None
    rawData.set(data.subarray(y * rowBytes, (y + 1) * rowBytes), y * (1 + rowBytes) + 1);
  }
  const compressed = deflateSync(rawData);

  const ihdr = new Uint8Array(13);
  write32(ihdr, 0, width);
  write32(ihdr, 4, height);
  ihdr[8] = 8; // bit depth
  ihdr[9] = 6; // color type: RGBA
  // compression, filter and interlace methods stay 0

  // length(4) + type(4) + data + crc(4) per chunk
  const totalLen = 8 + (12 + ihdr.length) + (12 + compressed.length) + 12;
  const out = new Uint8Array(totalLen);
  out.set(PNG_SIGNATURE, 0);
  let offset = 8;
  offset = writeChunk(out, offset, 'IHDR', ihdr);
  offset = writeChunk(out, offset, 'IDAT', compressed);
  writeChunk(out, offset, 'IEND', new Uint8Array(0));

  return out;
}

/**
 * Decodes a PNG file into RGBA image data.
 * Supports filter types 0-4 (None, Sub, Up, Average, Paeth).
 *
 * @throws Error when the data is not a PNG or uses an unsupported format.
 */
export function decodePng(png: Uint8Array): RgbaImage {
  if (!isPng(png)) {
    throw new Error('Invalid PNG signature');
  }

  let width = 0;
  let height = 0;
  let channels = 0;
  const idatChunks: Uint8Array[] = [];

  let offset = 8;
  while (offset + 8 <= png.length) {
    const length = read32(png, offset);
    offset += 4;
    const typeStr = String.fromCharCode(png[offset], png[offset + 1], png[offset + 2], png[offset + 3]);
    offset += 4;

    if (offset + length > png.length) {
      throw new Error(`Truncated PNG chunk "${typeStr}"`);
    }

    if (typeStr === 'IHDR') {
      width = read32(png, offset);
      height = read32(png, offset + 4);
      const bitDepth = png[offset + 8];
      const colorType = png[offset + 9];
      const interlace = png[offset + 12];

      const colorChannels = CHANNELS_BY_COLOR_TYPE[colorType];
      if (bitDepth !== 8 || colorChannels === undefined) {
        throw new Error(`Unsupported PNG format: bitDepth=${bitDepth}, colorType=${colorType}`);
      }
      if (interlace !== 0) {
        throw new Error('Interlaced PNG images are not supported');
      }
      channels = colorChannels;
    } else if (typeStr === 'IDAT') {
      idatChunks.push(png.subarray(offset, offset + length));
    } else if (typeStr === 'IEND') {
      break;
    }

    offset += length + 4; // skip data + CRC
  }

  if (width === 0 || height === 0) {
    throw new Error('PNG missing IHDR chunk');
  }
  if (idatChunks.length === 0) {
    throw new Error('PNG missing IDAT chunk');
  }

  let totalLen = 0;
  for (const chunk of idatChunks) totalLen += chunk.length;
  const combined = new Uint8Array(totalLen);
  let pos = 0;
  for (const chunk of idatChunks) {
    combined.set(chunk, pos);
    pos += chunk.length;
  }

  const rawData = inflateSync(combined);
  const rowBytes = width * channels;
  if (rawData.length < height * (1 + rowBytes)) {
    throw new Error('PNG image data is shorter than its dimensions require');
  }

  const samples = unfilterScanlines(rawData, width, height, channels);
  return { data: expandToRgba(samples, width * height, channels), width, height };
}

/** Reverses the per-scanline filters, returning tightly packed samples. */
function unfilterScanlines(
  rawData: Uint8Array,
  width: number,
  height: number,
  bpp: number,
): Uint8Array {
  const rowBytes = width * bpp;
  const out = new Uint8Array(rowBytes * height);

  for (let y = 0; y < height; y++) {
    const filterType = rawData[y * (1 + rowBytes)];
    const scanlineOffset = y * (1 + rowBytes) + 1;
    const outOffset = y * rowBytes;

    for (let x = 0; x < rowBytes; x++) {
      const raw = rawData[scanlineOffset + x];
      const a = x >= bpp ? out[outOffset + x - bpp] : 0; // left
      const b = y > 0 ? out[outOffset - rowBytes + x] : 0; // above
      const c = x >= bpp && y > 0 ? out[outOffset - rowBytes + x - bpp] : 0; // above-left

      let reconstructed: number;
      switch (filterType) {
        case 0: // None
          reconstructed = raw;
          break;
        case 1: // Sub
          reconstructed = (raw + a) & 0xff;
          break;
        case 2: // Up
          reconstructed = (raw + b) & 0xff;
          break;
        case 3: // Average
          reconstructed = (raw + ((a + b) >> 1)) & 0xff;
          break;
        case 4: // Paeth
          reconstructed = (raw + paethPredictor(a, b, c)) & 0xff;
          break;
        default:
          throw new Error(`Unsupported PNG filter type: ${filterType}`);
      }

      out[outOffset + x] = reconstructed;
    }
  }

  return out;
}

/** Widens greyscale / grey+alpha / RGB samples to RGBA. */
function expandToRgba(samples: Uint8Array, pixelCount: number, channels: number): Uint8Array {
  if (channels === 4) return samples;

  const rgba = new Uint8Array(pixelCount * 4);
  for (let i = 0; i < pixelCount; i++) {
    const src = i * channels;
    const dst = i * 4;
    if (channels === 3) {
      rgba[dst] = samples[src];
      rgba[dst + 1] = samples[src + 1];
      rgba[dst + 2] = samples[src + 2];
      rgba[dst + 3] = 255;
    } else {
      const grey = samples[src];
      rgba[dst] = grey;
      rgba[dst + 1] = grey;
      rgba[dst + 2] = grey;
      rgba[dst + 3] = channels === 2 ? samples[src + 1] : 255;
    }
  }
  return rgba;
}

/**
 * Paeth predictor function used in PNG filter type 4.
 */
function paethPredictor(a: number, b: number, c: number): number {
  const p = a + b - c;
  const pa = Math.abs(p - a);
  const pb = Math.abs(p - b);
  const pc = Math.abs(p - c);
  if (pa <= pb && pa <= pc) return a;
  if (pb <= pc) return b;
  return c;
}
