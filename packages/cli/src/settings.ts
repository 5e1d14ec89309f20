/**
 * User settings in ~/.hudkit/config.json
 *
 * Every field is optional; command-line flags override whatever is set here.
 */

import { readFileSync, writeFileSync, mkdirSync } from "fs";
import { homedir } from "os";
import { join } from "path";

export const SETTINGS_DIR = join(homedir(), ".hudkit");
export const SETTINGS_FILE = join(SETTINGS_DIR, "config.json");

export interface HudkitSettings {
  width?: number;
  height?: number;
  skin?: string;
  port?: number;
  /** Preview frame interval in milliseconds */
  intervalMs?: number;
}

export type ResolvedSettings = Required<HudkitSettings>;

export const DEFAULT_SETTINGS: Readonly<ResolvedSettings> = Object.freeze({
  width: 320,
  height: 180,
  skin: "cyberpunk",
  port: 8080,
  intervalMs: 100,
});

function isSettingsObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function positiveInteger(value: unknown): number | undefined {
  return typeof value === "number" && Number.isInteger(value) && value > 0 ? value : undefined;
}

/**
 * Load saved settings; a missing or unreadable file yields {}
 */
export function loadSettings(): HudkitSettings {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(SETTINGS_FILE, "utf-8"));
  } catch {
    return {};
  }
  if (!isSettingsObject(raw)) return {};

  const { width, height, skin, port, intervalMs } = raw;
  const settings: HudkitSettings = {};
  const w = positiveInteger(width);
  const h = positiveInteger(height);
  const p = positiveInteger(port);
  const interval = positiveInteger(intervalMs);
  if (w !== undefined) settings.width = w;
  if (h !== undefined) settings.height = h;
  if (typeof skin === "string" && skin !== "") settings.skin = skin;
  if (p !== undefined) settings.port = p;
  if (interval !== undefined) settings.intervalMs = interval;
  return settings;
}

export function saveSettings(settings: HudkitSettings): void {
  try {
    mkdirSync(SETTINGS_DIR, { recursive: true });
    writeFileSync(SETTINGS_FILE, JSON.stringify(settings, null, 2));
  } catch (error) {
    console.error("Failed to save settings:", error);
  }
}

/** Saved settings layered over the defaults */
export function resolveSettings(settings: HudkitSettings = loadSettings()): ResolvedSettings {
  return { ...DEFAULT_SETTINGS, ...settings };
}
