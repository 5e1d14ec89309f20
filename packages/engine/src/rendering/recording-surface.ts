/**
 * Recording drawing surface
 *
 * Keeps every drawing call in order instead of producing pixels. Used by
 * tests to assert what a skin drew, and by `hudkit trace`.
 */

import type {
  DrawingSurface,
  Paint,
  PathCommand,
  Rect,
  StrokeStyle,
  TextMetrics,
  TextStyle,
} from "@hudkit/core";
import { SurfaceError } from "@hudkit/core";

export type DrawOp = Exclude<keyof DrawingSurface, "measureText">;

export interface DrawCall {
  op: DrawOp;
  args: readonly unknown[];
}

export interface RecordingSurfaceOptions {
  /** Throw a SurfaceError whenever this operation is called */
  failOn?: DrawOp;
  /** Average glyph width as a fraction of the font size (default: 0.6) */
  charWidth?: number;
}

function isRect(value: unknown): value is Rect {
  return (
    typeof value === "object" &&
    value !== null &&
    "x" in value &&
    "y" in value &&
    "w" in value &&
    "h" in value &&
    typeof value.x === "number" &&
    typeof value.y === "number" &&
    typeof value.w === "number" &&
    typeof value.h === "number"
  );
}

export class RecordingSurface implements DrawingSurface {
  readonly calls: DrawCall[] = [];
  private readonly failOn: DrawOp | undefined;
  private readonly charWidth: number;

  constructor(options: RecordingSurfaceOptions = {}) {
    this.failOn = options.failOn;
    this.charWidth = options.charWidth ?? 0.6;
  }

  /** Calls of one kind, in order */
  callsOf(op: DrawOp): DrawCall[] {
    return this.calls.filter((call) => call.op === op);
  }

  /** Every rect argument recorded so far, in call order */
  rects(): Rect[] {
    return this.calls.flatMap((call) => call.args.filter(isRect));
  }

  clear(): void {
    this.calls.length = 0;
  }

  save(): void {
    this.record("save", []);
  }

  restore(): void {
    this.record("restore", []);
  }

  translate(dx: number, dy: number): void {
    this.record("translate", [dx, dy]);
  }

  pushClip(rect: Rect): void {
    this.record("pushClip", [{ ...rect }]);
  }

  popClip(): void {
    this.record("popClip", []);
  }

  fillRect(rect: Rect, paint: Paint): void {
    this.record("fillRect", [{ ...rect }, paint]);
  }

  strokeRect(rect: Rect, stroke: StrokeStyle): void {
    this.record("strokeRect", [{ ...rect }, stroke]);
  }

  fillRoundedRect(rect: Rect, radius: number, paint: Paint): void {
    this.record("fillRoundedRect", [{ ...rect }, radius, paint]);
  }

  strokeRoundedRect(rect: Rect, radius: number, stroke: StrokeStyle): void {
    this.record("strokeRoundedRect", [{ ...rect }, radius, stroke]);
  }

  fillPath(path: PathCommand[], paint: Paint): void {
    this.record("fillPath", [[...path], paint]);
  }

  strokePath(path: PathCommand[], stroke: StrokeStyle): void {
    this.record("strokePath", [[...path], stroke]);
  }

  fillArc(cx: number, cy: number, radius: number, start: number, end: number, paint: Paint): void {
    this.record("fillArc", [cx, cy, radius, start, end, paint]);
  }

  strokeArc(cx: number, cy: number, radius: number, start: number, end: number, stroke: StrokeStyle): void {
    this.record("strokeArc", [cx, cy, radius, start, end, stroke]);
  }

  drawText(text: string, x: number, y: number, style: TextStyle): void {
    this.record("drawText", [text, x, y, style]);
  }

  measureText(text: string, style: Omit<TextStyle, "color">): TextMetrics {
    return { width: Array.from(text).length * style.size * this.charWidth, height: style.size };
  }

  private record(op: DrawOp, args: unknown[]): void {
    if (this.failOn === op) {
      throw new SurfaceError(op, "recording surface configured to fail");
    }
    this.calls.push({ op, args });
  }
}

function formatArg(value: unknown): string {
  if (typeof value === "number") {
    return Number.isInteger(value) ? String(value) : value.toFixed(2);
  }
  if (typeof value === "string") return JSON.stringify(value);
  if (Array.isArray(value)) return `[${value.length}]`;
  if (value !== null && typeof value === "object") {
    if ("kind" in value && value.kind === "linear") return "gradient";
    if ("x" in value && "y" in value && "w" in value && "h" in value) {
      return `{${formatArg(value.x)},${formatArg(value.y)} ${formatArg(value.w)}x${formatArg(value.h)}}`;
    }
    if ("family" in value && "size" in value) return `font(${formatArg(value.size)})`;
    if ("width" in value && "color" in value) return `stroke(${formatArg(value.width)})`;
    if ("color" in value) return "solid";
  }
  return String(value);
}

/**
 * One-line rendering of a call, e.g. `fillRect {0,0 10x10} solid`
 */
export function formatDrawCall(call: DrawCall): string {
  return call.args.length === 0 ? call.op : `${call.op} ${call.args.map(formatArg).join(" ")}`;
}
