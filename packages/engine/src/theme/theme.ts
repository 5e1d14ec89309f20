/**
 * Theme model
 *
 * A theme is a small fixed palette: 4 colors, 2 fonts and 1 gradient.
 * Skin configs refer into it through ColorSource / FontSource values so a
 * whole panel can be restyled by swapping the theme alone.
 */

import type { Color } from "@hudkit/core";

export interface FontSpec {
  family: string;
  size: number;
}

/** Fixed neutral font used when a font reference cannot be resolved */
export const FALLBACK_FONT: Readonly<FontSpec> = Object.freeze({ family: "monospace", size: 12 });

/** Either a literal color, or a 1-based index into the theme palette */
export type ColorSource =
  | { kind: "literal"; color: Color }
  | { kind: "theme"; index: number; alpha?: number };

/** Either a literal font, or a 1-based theme font slot (1 or 2) */
export type FontSource =
  | { kind: "literal"; family: string; size: number }
  | { kind: "theme"; slot: number; size?: number };

export interface GradientStop {
  /** Position along the gradient in [0, 1] */
  position: number;
  color: ColorSource;
}

export interface Gradient {
  stops: GradientStop[];
  /** Degrees, 0 = left to right, 90 = top to bottom */
  angle: number;
}

export interface Theme {
  colors: [Color, Color, Color, Color];
  fonts: [FontSpec, FontSpec];
  gradient: Gradient;
}

export function literalColor(color: Color): ColorSource {
  return { kind: "literal", color };
}

export function themeColor(index: number, alpha?: number): ColorSource {
  return alpha === undefined ? { kind: "theme", index } : { kind: "theme", index, alpha };
}

export function literalFont(family: string, size: number): FontSource {
  return { kind: "literal", family, size };
}

export function themeFont(slot: number, size?: number): FontSource {
  return size === undefined ? { kind: "theme", slot } : { kind: "theme", slot, size };
}

/** Deep copy, so presets are never shared between panels */
export function cloneTheme(theme: Theme): Theme {
  const [c1, c2, c3, c4] = theme.colors;
  const [f1, f2] = theme.fonts;
  return {
    colors: [{ ...c1 }, { ...c2 }, { ...c3 }, { ...c4 }],
    fonts: [{ ...f1 }, { ...f2 }],
    gradient: {
      angle: theme.gradient.angle,
      stops: theme.gradient.stops.map((stop) => ({
        position: stop.position,
        color: cloneColorSource(stop.color),
      })),
    },
  };
}

export function cloneColorSource(source: ColorSource): ColorSource {
  return source.kind === "literal"
    ? { kind: "literal", color: { ...source.color } }
    : { ...source };
}
