/**
 * Compact 3x5 bitmap font
 *
 * Glyphs live in tiny-font.json as rows of "#" (on) and "." (off).
 * Lowercase letters render with the uppercase glyph. Text is scaled by an
 * integer factor derived from the requested font size.
 */

import { readFileSync } from "fs";
import { isRecord } from "../config/parse.js";

export interface BitmapFont {
  width: number;
  height: number;
  glyphs: Map<string, boolean[][]>;
}

/** A glyph rendered at an integer scale: row-major on/off mask */
export interface ScaledGlyph {
  width: number;
  height: number;
  mask: Uint8Array;
}

/** Horizontal gap between glyphs, in unscaled pixels */
export const GLYPH_SPACING = 1;

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((row) => typeof row === "string");
}

export function parseBitmapFont(raw: unknown): BitmapFont {
  if (!isRecord(raw)) {
    throw new Error("Bitmap font must be an object");
  }
  const { width, height, glyphs } = raw;
  if (typeof width !== "number" || typeof height !== "number") {
    throw new Error("Bitmap font needs numeric width and height");
  }
  if (!isRecord(glyphs)) {
    throw new Error("Bitmap font needs a glyphs object");
  }

  const parsed = new Map<string, boolean[][]>();
  for (const [char, rows] of Object.entries(glyphs)) {
    if (!isStringArray(rows) || rows.length !== height || rows.some((row) => row.length !== width)) {
      throw new Error(`Glyph "${char}" does not match the ${width}x${height} font size`);
    }
    parsed.set(
      char,
      rows.map((row) => Array.from(row, (cell) => cell === "#"))
    );
  }
  return { width, height, glyphs: parsed };
}

export const TINY_FONT: BitmapFont = parseBitmapFont(
  JSON.parse(readFileSync(new URL("./tiny-font.json", import.meta.url), "utf8"))
);

export function glyphFor(font: BitmapFont, char: string): boolean[][] | undefined {
  return font.glyphs.get(char) ?? font.glyphs.get(char.toUpperCase());
}

/**
 * Integer scale for a font size: 12-17 draw at 2x, 18-23 at 3x, and so on.
 * Never below 1.
 */
export function scaleForSize(size: number): number {
  if (!Number.isFinite(size)) return 1;
  return Math.max(1, Math.floor(size / 6));
}

/** Pixel size of `text` at `scale` */
export function measureBitmapText(font: BitmapFont, text: string, scale: number): { width: number; height: number } {
  const count = Array.from(text).length;
  const advance = (font.width + GLYPH_SPACING) * scale;
  return {
    width: count === 0 ? 0 : count * advance - GLYPH_SPACING * scale,
    height: font.height * scale,
  };
}

export function scaleGlyph(rows: boolean[][], scale: number): ScaledGlyph {
  const srcHeight = rows.length;
  const srcWidth = srcHeight > 0 ? rows[0].length : 0;
  const width = srcWidth * scale;
  const height = srcHeight * scale;
  const mask = new Uint8Array(width * height);
  for (let y = 0; y < height; y++) {
    const row = rows[Math.floor(y / scale)];
    for (let x = 0; x < width; x++) {
      if (row[Math.floor(x / scale)]) mask[y * width + x] = 1;
    }
  }
  return { width, height, mask };
}
