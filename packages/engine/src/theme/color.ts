/**
 * Color helpers
 *
 * Colors are RGBA with every channel in [0, 1]. Conversion to the 0-255
 * RGB storage of a Frame happens only at the raster boundary.
 */

import type { Color, RGB } from "@hudkit/core";

/** Returned whenever a color reference cannot be resolved */
export const FALLBACK_COLOR: Readonly<Color> = Object.freeze({ r: 0.5, g: 0.5, b: 0.5, a: 1 });

export function rgba(r: number, g: number, b: number, a: number = 1): Color {
  return { r, g, b, a };
}

export function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/** Copy of `color` with its alpha replaced */
export function withAlpha(color: Color, alpha: number): Color {
  return { r: color.r, g: color.g, b: color.b, a: alpha };
}

/**
 * Multiply the RGB channels by `factor`, alpha untouched.
 * Used for dimmed variants (phosphor dim, glow falloff).
 */
export function scaleColor(color: Color, factor: number): Color {
  return {
    r: clamp01(color.r * factor),
    g: clamp01(color.g * factor),
    b: clamp01(color.b * factor),
    a: color.a,
  };
}

/**
 * Interpolate between two colors, channel by channel
 */
export function lerpColor(c1: Color, c2: Color, t: number): Color {
  return {
    r: c1.r + (c2.r - c1.r) * t,
    g: c1.g + (c2.g - c1.g) * t,
    b: c1.b + (c2.b - c1.b) * t,
    a: c1.a + (c2.a - c1.a) * t,
  };
}

export function colorToRgb8(color: Color): RGB {
  return {
    r: Math.round(clamp01(color.r) * 255),
    g: Math.round(clamp01(color.g) * 255),
    b: Math.round(clamp01(color.b) * 255),
  };
}

export function colorFromRgb8(rgb: RGB, alpha: number = 1): Color {
  return { r: rgb.r / 255, g: rgb.g / 255, b: rgb.b / 255, a: alpha };
}

export function colorsEqual(a: Color, b: Color, epsilon: number = 1e-9): boolean {
  return (
    Math.abs(a.r - b.r) <= epsilon &&
    Math.abs(a.g - b.g) <= epsilon &&
    Math.abs(a.b - b.b) <= epsilon &&
    Math.abs(a.a - b.a) <= epsilon
  );
}
