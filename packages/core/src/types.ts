/**
 * Core types for the hudkit panel system
 */

/** RGBA color, every channel in [0, 1] */
export interface Color {
  r: number;
  g: number;
  b: number;
  a: number;
}

/** RGB color (0-255 per channel), the storage format of a Frame */
export interface RGB {
  r: number;
  g: number;
  b: number;
}

/** Axis-aligned rectangle in panel-local pixel coordinates */
export interface Rect {
  x: number;
  y: number;
  w: number;
  h: number;
}

/**
 * How a region is split.
 * "vertical" stacks children top to bottom, "horizontal" places them left to right.
 */
export type Orientation = "vertical" | "horizontal";

/** Panel dimensions */
export interface DisplaySize {
  width: number;
  height: number;
}

/** A single frame of pixel data */
export interface Frame {
  width: number;
  height: number;
  /** Flat array of RGB values: [r0,g0,b0, r1,g1,b1, ...] */
  pixels: Uint8Array;
}

/** A metric value as delivered by the data-source layer */
export type MetricValue = number | string | boolean;

/**
 * Snapshot of metric field name -> value.
 * Slot data uses keys of the form `group{G}_{I}_{field}`.
 */
export type MetricSnapshot = Record<string, MetricValue>;

/** The zero rectangle */
export const ZERO_RECT: Readonly<Rect> = Object.freeze({ x: 0, y: 0, w: 0, h: 0 });
