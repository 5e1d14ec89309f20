/**
 * Pixel frame buffer
 *
 * Pixels are stored as packed RGB bytes, row-major. Every write goes
 * through blendPixel; an opaque write is a blend at alpha 1.
 */

import type { Frame, RGB } from "./types.js";

export const BYTES_PER_PIXEL = 3;

/** Byte offset of (x, y), or -1 when the pixel is outside the frame */
export function pixelOffset(frame: Frame, x: number, y: number): number {
  if (!Number.isInteger(x) || !Number.isInteger(y)) return -1;
  if (x < 0 || y < 0 || x >= frame.width || y >= frame.height) return -1;
  return (y * frame.width + x) * BYTES_PER_PIXEL;
}

/** Overwrite every pixel with `color` */
export function fillFrame(frame: Frame, color: RGB): void {
  const { pixels } = frame;
  for (let offset = 0; offset < pixels.length; offset += BYTES_PER_PIXEL) {
    pixels.set([color.r, color.g, color.b], offset);
  }
}

export function createSolidFrame(width: number, height: number, color?: RGB): Frame {
  const frame: Frame = { width, height, pixels: new Uint8Array(width * height * BYTES_PER_PIXEL) };
  // Fresh buffers are already black
  if (color && (color.r !== 0 || color.g !== 0 || color.b !== 0)) fillFrame(frame, color);
  return frame;
}

/**
 * Composite `color` over the pixel at (x, y). `alpha` is clamped to [0, 1].
 * Writes outside the frame are dropped.
 */
export function blendPixel(frame: Frame, x: number, y: number, color: RGB, alpha: number): void {
  const offset = pixelOffset(frame, x, y);
  const a = Math.min(1, Math.max(0, alpha));
  if (offset < 0 || a === 0) return;

  const { pixels } = frame;
  const channels = [color.r, color.g, color.b];
  for (let c = 0; c < BYTES_PER_PIXEL; c++) {
    const current = pixels[offset + c];
    pixels[offset + c] = a === 1 ? channels[c] : Math.round(current + (channels[c] - current) * a);
  }
}

export function setPixel(frame: Frame, x: number, y: number, color: RGB): void {
  blendPixel(frame, x, y, color, 1);
}

export function getPixel(frame: Frame, x: number, y: number): RGB | null {
  const offset = pixelOffset(frame, x, y);
  if (offset < 0) return null;
  const [r, g, b] = frame.pixels.subarray(offset, offset + BYTES_PER_PIXEL);
  return { r, g, b };
}

/** Pixel bytes as base64, the form preview clients receive */
export function encodeFrame(frame: Frame): string {
  return Buffer.from(frame.pixels.buffer, frame.pixels.byteOffset, frame.pixels.byteLength).toString("base64");
}

/**
 * Rebuild a frame from base64 pixel bytes.
 * Throws a RangeError when the byte count does not match the dimensions.
 */
export function decodeFrame(base64: string, width: number, height: number): Frame {
  const bytes = Buffer.from(base64, "base64");
  const expected = width * height * BYTES_PER_PIXEL;
  if (bytes.length !== expected) {
    throw new RangeError(`Expected ${expected} bytes for a ${width}x${height} frame, got ${bytes.length}`);
  }
  return { width, height, pixels: new Uint8Array(bytes) };
}
