/**
 * Abstract 2D drawing surface
 *
 * Skins and content renderers draw exclusively through this interface, so the
 * same panel can be rasterized into a pixel Frame, recorded for inspection,
 * or bridged to any other vector backend.
 */

import type { Color, Rect } from "./types.js";

/** A gradient stop whose color is already resolved */
export interface ResolvedStop {
  position: number;
  color: Color;
}

/** Linear gradient fill between two points, stops in declaration order */
export interface LinearGradientPaint {
  kind: "linear";
  x0: number;
  y0: number;
  x1: number;
  y1: number;
  stops: ResolvedStop[];
}

export interface SolidPaint {
  kind: "solid";
  color: Color;
}

export type Paint = SolidPaint | LinearGradientPaint;

export interface StrokeStyle {
  color: Color;
  width: number;
  /** Alternating on/off lengths; empty or absent draws a solid line */
  dash?: number[];
}

export interface TextStyle {
  family: string;
  size: number;
  weight?: "normal" | "bold";
  style?: "normal" | "italic";
  color: Color;
}

export interface TextMetrics {
  width: number;
  height: number;
}

export type PathCommand =
  | { op: "move"; x: number; y: number }
  | { op: "line"; x: number; y: number }
  | { op: "curve"; x1: number; y1: number; x2: number; y2: number; x: number; y: number }
  | { op: "close" };

/**
 * Drawing operations every backend provides.
 * Implementations throw SurfaceError when the backend itself fails.
 */
export interface DrawingSurface {
  save(): void;
  restore(): void;
  translate(dx: number, dy: number): void;
  pushClip(rect: Rect): void;
  popClip(): void;

  fillRect(rect: Rect, paint: Paint): void;
  strokeRect(rect: Rect, stroke: StrokeStyle): void;
  fillRoundedRect(rect: Rect, radius: number, paint: Paint): void;
  strokeRoundedRect(rect: Rect, radius: number, stroke: StrokeStyle): void;
  fillPath(path: PathCommand[], paint: Paint): void;
  strokePath(path: PathCommand[], stroke: StrokeStyle): void;
  /** Angles in radians, clockwise from the positive x axis */
  fillArc(cx: number, cy: number, radius: number, start: number, end: number, paint: Paint): void;
  strokeArc(
    cx: number,
    cy: number,
    radius: number,
    start: number,
    end: number,
    stroke: StrokeStyle
  ): void;

  /** Draw text with its top-left corner at (x, y) */
  drawText(text: string, x: number, y: number, style: TextStyle): void;
  measureText(text: string, style: Omit<TextStyle, "color">): TextMetrics;
}

/** Shorthand for a solid paint */
export function solid(color: Color): SolidPaint {
  return { kind: "solid", color };
}
