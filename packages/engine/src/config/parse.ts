/**
 * Tolerant readers for persisted configs
 *
 * Every reader takes the raw (already JSON-parsed) object, a key and the
 * field's default. A missing or invalid value yields the default; nothing
 * here throws.
 *
 * Numeric policy:
 * - non-finite values are replaced by the field default
 * - `min` / `max` clamp finite values (sizes use min 0, scale-like fields
 *   use their smallest sensible value)
 */

import type { Color, Orientation } from "@hudkit/core";
import { cloneTheme, type ColorSource, type FontSource, type Gradient, type GradientStop, type Theme } from "../theme/theme.js";
import { MIN_ANIMATION_SPEED, type ContentItemConfig, type FrameConfigBase } from "./frame-config.js";

export type RawRecord = Record<string, unknown>;

export interface NumberBounds {
  min?: number;
  max?: number;
}

const ORIENTATIONS: readonly Orientation[] = ["vertical", "horizontal"];

export function isRecord(value: unknown): value is RawRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function clampNumber(value: number, bounds: NumberBounds): number {
  let result = value;
  if (bounds.min !== undefined) result = Math.max(bounds.min, result);
  if (bounds.max !== undefined) result = Math.min(bounds.max, result);
  return result;
}

export function readNumber(raw: RawRecord, key: string, fallback: number, bounds: NumberBounds = {}): number {
  const value = raw[key];
  if (typeof value !== "number" || !Number.isFinite(value)) return fallback;
  return clampNumber(value, bounds);
}

export function readInteger(raw: RawRecord, key: string, fallback: number, bounds: NumberBounds = {}): number {
  const value = readNumber(raw, key, fallback, bounds);
  return Math.floor(value);
}

export function readBoolean(raw: RawRecord, key: string, fallback: boolean): boolean {
  const value = raw[key];
  return typeof value === "boolean" ? value : fallback;
}

export function readString(raw: RawRecord, key: string, fallback: string): string {
  const value = raw[key];
  return typeof value === "string" ? value : fallback;
}

export function readEnum<T extends string>(raw: RawRecord, key: string, values: readonly T[], fallback: T): T {
  const value = raw[key];
  return values.find((candidate) => candidate === value) ?? fallback;
}

/**
 * Read a list of numbers; invalid entries are replaced by `entryFallback`
 */
export function readNumberArray(
  raw: RawRecord,
  key: string,
  fallback: readonly number[],
  entryFallback: number,
  bounds: NumberBounds = {}
): number[] {
  const value = raw[key];
  if (!Array.isArray(value)) return [...fallback];
  return value.map((entry: unknown) =>
    typeof entry === "number" && Number.isFinite(entry) ? clampNumber(entry, bounds) : entryFallback
  );
}

export function readOrientation(raw: RawRecord, key: string, fallback: Orientation): Orientation {
  return readEnum(raw, key, ORIENTATIONS, fallback);
}

/**
 * Read a list of orientations; invalid entries are replaced by `entryFallback`
 */
export function readOrientationArray(
  raw: RawRecord,
  key: string,
  fallback: readonly Orientation[],
  entryFallback: Orientation
): Orientation[] {
  const value = raw[key];
  if (!Array.isArray(value)) return [...fallback];
  return value.map((entry: unknown) => ORIENTATIONS.find((o) => o === entry) ?? entryFallback);
}

/**
 * Read the shared base fields of any skin config
 */
export function parseBaseConfig(raw: RawRecord, defaults: FrameConfigBase): FrameConfigBase {
  const groupCount = readInteger(raw, "groupCount", defaults.groupCount, { min: 1 });
  const splitOrientation = readOrientation(raw, "splitOrientation", defaults.splitOrientation);
  return {
    theme: parseTheme(raw.theme, defaults.theme),
    groupCount,
    groupItemCounts: readNumberArray(raw, "groupItemCounts", defaults.groupItemCounts, 1, { min: 0 }).map(Math.floor),
    groupWeights: readNumberArray(raw, "groupWeights", defaults.groupWeights, 1),
    groupItemOrientations: readOrientationArray(
      raw,
      "groupItemOrientations",
      defaults.groupItemOrientations,
      splitOrientation
    ),
    splitOrientation,
    contentSlots: "contentSlots" in raw ? parseContentSlots(raw.contentSlots) : { ...defaults.contentSlots },
    contentPadding: readNumber(raw, "contentPadding", defaults.contentPadding, { min: 0 }),
    itemSpacing: readNumber(raw, "itemSpacing", defaults.itemSpacing, { min: 0 }),
    dividerWidth: readNumber(raw, "dividerWidth", defaults.dividerWidth, { min: 0 }),
    dividerPadding: readNumber(raw, "dividerPadding", defaults.dividerPadding, { min: 0 }),
    itemFrameEnabled: readBoolean(raw, "itemFrameEnabled", defaults.itemFrameEnabled),
    animationEnabled: readBoolean(raw, "animationEnabled", defaults.animationEnabled),
    animationSpeed: readNumber(raw, "animationSpeed", defaults.animationSpeed, { min: MIN_ANIMATION_SPEED }),
  };
}
