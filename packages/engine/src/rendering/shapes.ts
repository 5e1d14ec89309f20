/**
 * Path builders shared by skins and surfaces
 */

import type { PathCommand, Rect } from "@hudkit/core";

/** Cubic bezier handle length for a quarter circle */
const KAPPA = 0.5522847498;

export function linePath(x0: number, y0: number, x1: number, y1: number): PathCommand[] {
  return [
    { op: "move", x: x0, y: y0 },
    { op: "line", x: x1, y: y1 },
  ];
}

export function rectPath(rect: Rect): PathCommand[] {
  const { x, y, w, h } = rect;
  return [
    { op: "move", x, y },
    { op: "line", x: x + w, y },
    { op: "line", x: x + w, y: y + h },
    { op: "line", x, y: y + h },
    { op: "close" },
  ];
}

/**
 * Rounded rectangle; the radius is limited to half the shorter side.
 * Corners are cubic curves.
 */
export function roundedRectPath(rect: Rect, radius: number): PathCommand[] {
  const { x, y, w, h } = rect;
  const r = Math.max(0, Math.min(radius, w / 2, h / 2));
  if (r === 0) return rectPath(rect);
  const k = r * KAPPA;
  return [
    { op: "move", x: x + r, y },
    { op: "line", x: x + w - r, y },
    { op: "curve", x1: x + w - r + k, y1: y, x2: x + w, y2: y + r - k, x: x + w, y: y + r },
    { op: "line", x: x + w, y: y + h - r },
    { op: "curve", x1: x + w, y1: y + h - r + k, x2: x + w - r + k, y2: y + h, x: x + w - r, y: y + h },
    { op: "line", x: x + r, y: y + h },
    { op: "curve", x1: x + r - k, y1: y + h, x2: x, y2: y + h - r + k, x, y: y + h - r },
    { op: "line", x, y: y + r },
    { op: "curve", x1: x, y1: y + r - k, x2: x + r - k, y2: y, x: x + r, y },
    { op: "close" },
  ];
}

/** Rectangle with 45° cut corners */
export function chamferedRectPath(rect: Rect, chamfer: number): PathCommand[] {
  const { x, y, w, h } = rect;
  const c = Math.max(0, Math.min(chamfer, w / 2, h / 2));
  return [
    { op: "move", x: x + c, y },
    { op: "line", x: x + w - c, y },
    { op: "line", x: x + w, y: y + c },
    { op: "line", x: x + w, y: y + h - c },
    { op: "line", x: x + w - c, y: y + h },
    { op: "line", x: x + c, y: y + h },
    { op: "line", x, y: y + h - c },
    { op: "line", x, y: y + c },
    { op: "close" },
  ];
}

/**
 * Octagon with a point pushed out from the middle of each side
 */
export function angularRectPath(rect: Rect, pointSize: number): PathCommand[] {
  const { x, y, w, h } = rect;
  const p = Math.max(0, Math.min(pointSize, w / 4, h / 4));
  return [
    { op: "move", x: x - p, y: y + h / 2 },
    { op: "line", x, y },
    { op: "line", x: x + w / 2, y: y - p },
    { op: "line", x: x + w, y },
    { op: "line", x: x + w + p, y: y + h / 2 },
    { op: "line", x: x + w, y: y + h },
    { op: "line", x: x + w / 2, y: y + h + p },
    { op: "line", x, y: y + h },
    { op: "close" },
  ];
}

/** Shrink a rect on every side, never below zero size */
export function insetRect(rect: Rect, inset: number): Rect {
  return {
    x: rect.x + inset,
    y: rect.y + inset,
    w: Math.max(0, rect.w - inset * 2),
    h: Math.max(0, rect.h - inset * 2),
  };
}
