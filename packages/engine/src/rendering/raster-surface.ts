/**
 * Raster drawing surface
 *
 * Draws into an RGB Frame. Coverage is point-sampled at pixel centers (no
 * anti-aliasing), colors are alpha-blended over what is already there.
 *
 * - clip rects are intersected as they are pushed and are axis-aligned only
 * - paths and arcs fill with the even-odd rule
 * - strokes are built from one quad per segment, unioned into a mask so a
 *   translucent stroke blends once per pixel; widths below 1 draw 1px wide
 *   with proportionally lower alpha
 * - text uses the 3x5 bitmap font scaled by an integer factor; scaled glyphs
 *   are kept in a bounded LRU cache owned by this surface
 */

import type {
  Color,
  DrawingSurface,
  Frame,
  Paint,
  PathCommand,
  Rect,
  StrokeStyle,
  TextMetrics,
  TextStyle,
} from "@hudkit/core";
import { SurfaceError, blendPixel, createSolidFrame } from "@hudkit/core";
import { colorToRgb8, withAlpha } from "../theme/color.js";
import { sampleGradient } from "../theme/resolve.js";
import {
  GLYPH_SPACING,
  TINY_FONT,
  glyphFor,
  measureBitmapText,
  scaleForSize,
  scaleGlyph,
  type BitmapFont,
  type ScaledGlyph,
} from "./bitmap-font.js";
import { LruCache } from "./glyph-cache.js";
import { rectPath, roundedRectPath } from "./shapes.js";

export interface RasterSurfaceOptions {
  /** Initial fill, defaults to black */
  background?: Color;
  /** Scaled glyphs kept in the cache (default: 256) */
  glyphCacheSize?: number;
  /** Largest frame this surface agrees to allocate (default: 4096 * 4096) */
  maxPixels?: number;
  font?: BitmapFont;
}

interface Point {
  x: number;
  y: number;
}

interface Polyline {
  points: Point[];
  closed: boolean;
}

interface SavedState {
  tx: number;
  ty: number;
  clipDepth: number;
}

/** Integer pixel bounds, end-exclusive */
interface PixelBounds {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

type Shader = (x: number, y: number) => Color;

const DEFAULT_MAX_PIXELS = 4096 * 4096;
const DEFAULT_GLYPH_CACHE_SIZE = 256;
const CURVE_SEGMENTS = 16;
const ITALIC_SHEAR = 0.2;

function intersect(a: Rect, b: Rect): Rect {
  const x0 = Math.max(a.x, b.x);
  const y0 = Math.max(a.y, b.y);
  const x1 = Math.min(a.x + a.w, b.x + b.w);
  const y1 = Math.min(a.y + a.h, b.y + b.h);
  return { x: x0, y: y0, w: Math.max(0, x1 - x0), h: Math.max(0, y1 - y0) };
}

/** Pixels whose centers fall in [start, end) */
function pixelRange(start: number, end: number): [number, number] {
  return [Math.ceil(start - 0.5), Math.ceil(end - 0.5)];
}

function arcPoints(cx: number, cy: number, radius: number, start: number, end: number): Point[] {
  const sweep = end - start;
  const segments = Math.min(256, Math.max(8, Math.ceil((Math.abs(sweep) * Math.max(radius, 1)) / 2)));
  const points: Point[] = [];
  for (let i = 0; i <= segments; i++) {
    const angle = start + (sweep * i) / segments;
    points.push({ x: cx + radius * Math.cos(angle), y: cy + radius * Math.sin(angle) });
  }
  return points;
}

function isFullCircle(start: number, end: number): boolean {
  return Math.abs(end - start) >= Math.PI * 2 - 1e-9;
}

/**
 * Split a polyline into the "on" pieces of a dash pattern.
 * The pattern restarts at the beginning of every polyline.
 */
function applyDash(points: Point[], dash: number[]): Array<[Point, Point]> {
  const pieces: Array<[Point, Point]> = [];
  let index = 0;
  let remaining = dash[0];
  let on = true;

  for (let i = 0; i < points.length - 1; i++) {
    const a = points[i];
    const b = points[i + 1];
    const length = Math.hypot(b.x - a.x, b.y - a.y);
    if (length === 0) continue;
    let travelled = 0;

    while (travelled < length) {
      const step = Math.min(remaining, length - travelled);
      if (on && step > 0) {
        const t0 = travelled / length;
        const t1 = (travelled + step) / length;
        pieces.push([
          { x: a.x + (b.x - a.x) * t0, y: a.y + (b.y - a.y) * t0 },
          { x: a.x + (b.x - a.x) * t1, y: a.y + (b.y - a.y) * t1 },
        ]);
      }
      travelled += step;
      remaining -= step;
      if (remaining <= 0) {
        index = (index + 1) % dash.length;
        remaining = dash[index];
        on = !on;
      }
    }
  }

  return pieces;
}

function segmentQuad(a: Point, b: Point, halfWidth: number): Point[] | undefined {
  const length = Math.hypot(b.x - a.x, b.y - a.y);
  if (length < 1e-9) return undefined;
  const dx = ((b.x - a.x) / length) * halfWidth;
  const dy = ((b.y - a.y) / length) * halfWidth;
  // Square caps: extend half the width past both ends so joints close up
  const start = { x: a.x - dx, y: a.y - dy };
  const end = { x: b.x + dx, y: b.y + dy };
  return [
    { x: start.x - dy, y: start.y + dx },
    { x: end.x - dy, y: end.y + dx },
    { x: end.x + dy, y: end.y - dx },
    { x: start.x + dy, y: start.y - dx },
  ];
}

export class RasterSurface implements DrawingSurface {
  readonly frame: Frame;
  readonly glyphCache: LruCache<string, ScaledGlyph>;

  private readonly font: BitmapFont;
  private tx = 0;
  private ty = 0;
  private readonly states: SavedState[] = [];
  private readonly clips: Rect[] = [];

  constructor(width: number, height: number, options: RasterSurfaceOptions = {}) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 0 || height < 0) {
      throw new SurfaceError("allocate", `invalid frame size ${width}x${height}`);
    }
    const maxPixels = options.maxPixels ?? DEFAULT_MAX_PIXELS;
    if (width * height > maxPixels) {
      throw new SurfaceError("allocate", `${width}x${height} exceeds the ${maxPixels} pixel limit`);
    }

    this.frame = createSolidFrame(width, height, colorToRgb8(options.background ?? { r: 0, g: 0, b: 0, a: 1 }));
    this.glyphCache = new LruCache(options.glyphCacheSize ?? DEFAULT_GLYPH_CACHE_SIZE);
    this.font = options.font ?? TINY_FONT;
  }

  save(): void {
    this.states.push({ tx: this.tx, ty: this.ty, clipDepth: this.clips.length });
  }

  restore(): void {
    const state = this.states.pop();
    if (!state) return;
    this.tx = state.tx;
    this.ty = state.ty;
    this.clips.length = Math.min(this.clips.length, state.clipDepth);
  }

  translate(dx: number, dy: number): void {
    this.tx += dx;
    this.ty += dy;
  }

  pushClip(rect: Rect): void {
    this.clips.push(intersect(this.currentClip(), this.toDevice(rect)));
  }

  popClip(): void {
    this.clips.pop();
  }

  fillRect(rect: Rect, paint: Paint): void {
    const area = intersect(this.currentClip(), this.toDevice(rect));
    const [x0, x1] = pixelRange(area.x, area.x + area.w);
    const [y0, y1] = pixelRange(area.y, area.y + area.h);
    const shader = this.shader(paint);
    for (let py = y0; py < y1; py++) {
      for (let px = x0; px < x1; px++) {
        this.blend(px, py, shader(px + 0.5, py + 0.5));
      }
    }
  }

  strokeRect(rect: Rect, stroke: StrokeStyle): void {
    this.strokePath(rectPath(rect), stroke);
  }

  fillRoundedRect(rect: Rect, radius: number, paint: Paint): void {
    this.fillPath(roundedRectPath(rect, radius), paint);
  }

  strokeRoundedRect(rect: Rect, radius: number, stroke: StrokeStyle): void {
    this.strokePath(roundedRectPath(rect, radius), stroke);
  }

  fillPath(path: PathCommand[], paint: Paint): void {
    const polygons = this.flatten(path)
      .map((line) => line.points)
      .filter((points) => points.length >= 3);
    if (polygons.length === 0) return;
    this.fillPolygons(polygons, this.shader(paint));
  }

  strokePath(path: PathCommand[], stroke: StrokeStyle): void {
    if (!(stroke.width > 0)) return;

    const halfWidth = Math.max(stroke.width, 1) / 2;
    const alphaScale = Math.min(stroke.width, 1);
    const dash = stroke.dash && stroke.dash.length > 0 && stroke.dash.every((d) => d >= 0) && stroke.dash.some((d) => d > 0)
      ? stroke.dash
      : undefined;

    const quads: Point[][] = [];
    for (const line of this.flatten(path)) {
      const points = line.closed ? [...line.points, line.points[0]] : line.points;
      const pieces: Array<[Point, Point]> = dash
        ? applyDash(points, dash)
        : points.slice(1).map((p, i): [Point, Point] => [points[i], p]);
      for (const [a, b] of pieces) {
        const quad = segmentQuad(a, b, halfWidth);
        if (quad) quads.push(quad);
      }
    }
    if (quads.length === 0) return;

    const color = withAlpha(stroke.color, stroke.color.a * alphaScale);
    this.fillPolygons(quads, () => color, false);
  }

  fillArc(cx: number, cy: number, radius: number, start: number, end: number, paint: Paint): void {
    if (!(radius > 0)) return;
    const points = arcPoints(cx + this.tx, cy + this.ty, radius, start, end);
    const polygon = isFullCircle(start, end) ? points : [{ x: cx + this.tx, y: cy + this.ty }, ...points];
    this.fillPolygons([polygon], this.shader(paint));
  }

  strokeArc(cx: number, cy: number, radius: number, start: number, end: number, stroke: StrokeStyle): void {
    if (!(radius > 0)) return;
    const points = arcPoints(cx, cy, radius, start, end);
    const path: PathCommand[] = points.map((p, i) => (i === 0 ? { op: "move", x: p.x, y: p.y } : { op: "line", x: p.x, y: p.y }));
    if (isFullCircle(start, end)) path.push({ op: "close" });
    this.strokePath(path, stroke);
  }

  drawText(text: string, x: number, y: number, style: TextStyle): void {
    if (text === "" || style.color.a <= 0) return;

    const scale = scaleForSize(style.size);
    const bold = style.weight === "bold";
    const italic = style.style === "italic";
    const clip = this.clipBounds();
    const advance = (this.font.width + GLYPH_SPACING) * scale;
    const rgb = colorToRgb8(style.color);

    let cursorX = Math.round(x + this.tx);
    const originY = Math.round(y + this.ty);

    for (const char of text) {
      const rows = glyphFor(this.font, char);
      if (rows) {
        const glyph = this.glyphCache.getOrCreate(`${char}:${scale}`, () => scaleGlyph(rows, scale));
        const columns = glyph.width + (bold ? 1 : 0);
        for (let row = 0; row < glyph.height; row++) {
          const py = originY + row;
          if (py < clip.y0 || py >= clip.y1) continue;
          const shear = italic ? Math.round((glyph.height - 1 - row) * ITALIC_SHEAR) : 0;
          for (let col = 0; col < columns; col++) {
            const on =
              (col < glyph.width && glyph.mask[row * glyph.width + col] === 1) ||
              (bold && col > 0 && glyph.mask[row * glyph.width + col - 1] === 1);
            if (!on) continue;
            const px = cursorX + col + shear;
            if (px < clip.x0 || px >= clip.x1) continue;
            blendPixel(this.frame, px, py, rgb, style.color.a);
          }
        }
      }
      // Missing glyphs still advance the cursor
      cursorX += advance;
    }
  }

  measureText(text: string, style: Omit<TextStyle, "color">): TextMetrics {
    return measureBitmapText(this.font, text, scaleForSize(style.size));
  }

  private toDevice(rect: Rect): Rect {
    return { x: rect.x + this.tx, y: rect.y + this.ty, w: Math.max(0, rect.w), h: Math.max(0, rect.h) };
  }

  private currentClip(): Rect {
    return this.clips[this.clips.length - 1] ?? { x: 0, y: 0, w: this.frame.width, h: this.frame.height };
  }

  private clipBounds(): PixelBounds {
    const clip = this.currentClip();
    const [x0, x1] = pixelRange(clip.x, clip.x + clip.w);
    const [y0, y1] = pixelRange(clip.y, clip.y + clip.h);
    return { x0, y0, x1, y1 };
  }

  private shader(paint: Paint): Shader {
    if (paint.kind === "solid") {
      const color = paint.color;
      return () => color;
    }
    // Gradient endpoints are in user space at the time of the call
    const x0 = paint.x0 + this.tx;
    const y0 = paint.y0 + this.ty;
    const dx = paint.x1 - paint.x0;
    const dy = paint.y1 - paint.y0;
    const lengthSq = dx * dx + dy * dy;
    const stops = paint.stops;
    return (x, y) => {
      const t = lengthSq === 0 ? 0 : ((x - x0) * dx + (y - y0) * dy) / lengthSq;
      return sampleGradient(stops, t);
    };
  }

  private blend(px: number, py: number, color: Color): void {
    if (color.a <= 0) return;
    blendPixel(this.frame, px, py, colorToRgb8(color), color.a);
  }

  /** Flatten a path into device-space polylines */
  private flatten(path: PathCommand[]): Polyline[] {
    const lines: Polyline[] = [];
    let current: Polyline | undefined;
    let last: Point | undefined;

    const begin = (start: Point): Polyline => {
      const line: Polyline = { points: [start], closed: false };
      lines.push(line);
      return line;
    };

    for (const cmd of path) {
      switch (cmd.op) {
        case "move": {
          last = { x: cmd.x + this.tx, y: cmd.y + this.ty };
          current = begin(last);
          break;
        }
        case "line": {
          const p = { x: cmd.x + this.tx, y: cmd.y + this.ty };
          current ??= begin(last ?? p);
          current.points.push(p);
          last = p;
          break;
        }
        case "curve": {
          const c1 = { x: cmd.x1 + this.tx, y: cmd.y1 + this.ty };
          const c2 = { x: cmd.x2 + this.tx, y: cmd.y2 + this.ty };
          const end = { x: cmd.x + this.tx, y: cmd.y + this.ty };
          const from = last ?? c1;
          current ??= begin(from);
          for (let i = 1; i <= CURVE_SEGMENTS; i++) {
            const t = i / CURVE_SEGMENTS;
            const u = 1 - t;
            current.points.push({
              x: u * u * u * from.x + 3 * u * u * t * c1.x + 3 * u * t * t * c2.x + t * t * t * end.x,
              y: u * u * u * from.y + 3 * u * u * t * c1.y + 3 * u * t * t * c2.y + t * t * t * end.y,
            });
          }
          last = end;
          break;
        }
        case "close": {
          if (current) {
            current.closed = true;
            last = current.points[0];
          }
          current = undefined;
          break;
        }
      }
    }

    return lines;
  }

  /**
   * Scanline-fill polygons into a coverage mask, then blend the mask once.
   * `evenOdd` fills all polygons together with the even-odd rule; otherwise
   * each polygon is filled on its own and the results are unioned.
   */
  private fillPolygons(polygons: Point[][], shader: Shader, evenOdd: boolean = true): void {
    const clip = this.clipBounds();
    let minX = Infinity;
    let minY = Infinity;
    let maxX = -Infinity;
    let maxY = -Infinity;
    for (const polygon of polygons) {
      for (const p of polygon) {
        if (p.x < minX) minX = p.x;
        if (p.y < minY) minY = p.y;
        if (p.x > maxX) maxX = p.x;
        if (p.y > maxY) maxY = p.y;
      }
    }
    if (!Number.isFinite(minX) || !Number.isFinite(minY) || !Number.isFinite(maxX) || !Number.isFinite(maxY)) return;

    const bounds: PixelBounds = {
      x0: Math.max(clip.x0, Math.floor(minX)),
      y0: Math.max(clip.y0, Math.floor(minY)),
      x1: Math.min(clip.x1, Math.ceil(maxX) + 1),
      y1: Math.min(clip.y1, Math.ceil(maxY) + 1),
    };
    const width = bounds.x1 - bounds.x0;
    const height = bounds.y1 - bounds.y0;
    if (width <= 0 || height <= 0) return;

    const mask = new Uint8Array(width * height);
    if (evenOdd) {
      this.scanFill(polygons, mask, bounds);
    } else {
      for (const polygon of polygons) this.scanFill([polygon], mask, bounds);
    }

    for (let py = bounds.y0; py < bounds.y1; py++) {
      const rowOffset = (py - bounds.y0) * width;
      for (let px = bounds.x0; px < bounds.x1; px++) {
        if (mask[rowOffset + px - bounds.x0] === 1) {
          this.blend(px, py, shader(px + 0.5, py + 0.5));
        }
      }
    }
  }

  private scanFill(polygons: Point[][], mask: Uint8Array, bounds: PixelBounds): void {
    const width = bounds.x1 - bounds.x0;
    const crossings: number[] = [];

    for (let py = bounds.y0; py < bounds.y1; py++) {
      const yc = py + 0.5;
      crossings.length = 0;

      for (const polygon of polygons) {
        for (let i = 0; i < polygon.length; i++) {
          const a = polygon[i];
          const b = polygon[(i + 1) % polygon.length];
          if (a.y <= yc !== b.y <= yc) {
            crossings.push(a.x + ((yc - a.y) * (b.x - a.x)) / (b.y - a.y));
          }
        }
      }
      if (crossings.length < 2) continue;
      crossings.sort((p, q) => p - q);

      const rowOffset = (py - bounds.y0) * width;
      for (let i = 0; i + 1 < crossings.length; i += 2) {
        const [start, end] = pixelRange(crossings[i], crossings[i + 1]);
        const from = Math.max(start, bounds.x0);
        const to = Math.min(end, bounds.x1);
        for (let px = from; px < to; px++) {
          mask[rowOffset + px - bounds.x0] = 1;
        }
      }
    }
  }
}
