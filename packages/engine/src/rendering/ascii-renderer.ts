/**
 * ASCII output of a rendered frame
 * Used by `hudkit render` and for eyeballing frames in test failures
 */

import type { Frame } from "@hudkit/core";
import { BYTES_PER_PIXEL } from "@hudkit/core";

export interface AsciiOptions {
  /** Sample every Nth column/row, for panels wider than the terminal */
  step?: number;
}

const SHADE_RAMP = [" ", "·", "░", "▒", "▓", "█"] as const;
const SIMPLE_RAMP = [" ", ".", "+", "*", "#", "@"] as const;

/**
 * Mean channel brightness, 0-255
 */
function brightnessAt(frame: Frame, x: number, y: number): number {
  const offset = (y * frame.width + x) * BYTES_PER_PIXEL;
  const px = frame.pixels;
  return ((px[offset] ?? 0) + (px[offset + 1] ?? 0) + (px[offset + 2] ?? 0)) / 3;
}

/** Thresholds: <5 off, <50 very dim, then 50-wide bands */
function rampIndex(brightness: number): number {
  if (brightness < 5) return 0;
  if (brightness < 50) return 1;
  if (brightness < 100) return 2;
  if (brightness < 150) return 3;
  if (brightness < 200) return 4;
  return 5;
}

function sampledRows(frame: Frame, ramp: readonly string[], options: AsciiOptions): string[] {
  const step = Math.max(1, Math.floor(options.step ?? 1));
  const rows: string[] = [];
  for (let y = 0; y < frame.height; y += step) {
    let line = "";
    for (let x = 0; x < frame.width; x += step) {
      line += ramp[rampIndex(brightnessAt(frame, x, y))];
    }
    rows.push(line);
  }
  return rows;
}

/**
 * Shaded block characters inside a box border
 */
export function frameToAscii(frame: Frame, options: AsciiOptions = {}): string {
  const rows = sampledRows(frame, SHADE_RAMP, options);
  const width = rows[0]?.length ?? 0;
  return ["┌" + "─".repeat(width) + "┐", ...rows.map((row) => `│${row}│`), "└" + "─".repeat(width) + "┘"].join("\n");
}

/**
 * Like frameToAscii, with row/column markers and a legend
 */
export function frameToAsciiDetailed(frame: Frame, options: AsciiOptions = {}): string {
  const step = Math.max(1, Math.floor(options.step ?? 1));
  const rows = sampledRows(frame, SHADE_RAMP, options);
  const width = rows[0]?.length ?? 0;
  const gutter = String(Math.max(0, frame.height - 1)).length;

  let columns = " ".repeat(gutter + 1);
  for (let c = 0; c < width; c++) {
    const x = c * step;
    columns += x % 10 === 0 ? String((x / 10) % 10) : " ";
  }

  const lines = [
    `${frame.width}x${frame.height}` + (step > 1 ? ` (every ${step}px)` : ""),
    columns,
    " ".repeat(gutter) + "┌" + "─".repeat(width) + "┐",
    ...rows.map((row, i) => String(i * step).padStart(gutter, " ") + "│" + row + "│"),
    " ".repeat(gutter) + "└" + "─".repeat(width) + "┘",
    "Legend: █=bright ▓=medium ▒=dim ░=faint ·=very dim (space)=off",
  ];
  return lines.join("\n");
}

/**
 * Plain ASCII, no border; safe for logs
 */
export function frameToSimpleAscii(frame: Frame, options: AsciiOptions = {}): string {
  return sampledRows(frame, SIMPLE_RAMP, options).join("\n");
}
