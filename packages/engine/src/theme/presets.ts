/**
 * Built-in theme presets
 */

import { rgba } from "./color.js";
import { cloneTheme, literalColor, themeColor, type Theme } from "./theme.js";

export interface ThemePreset {
  id: string;
  name: string;
  theme: Theme;
}

const PRESETS: ThemePreset[] = [
  {
    id: "cyberpunk",
    name: "Cyberpunk",
    theme: {
      colors: [
        rgba(0, 1, 1), // cyan
        rgba(1, 0, 0.6), // magenta
        rgba(0.6, 0, 1), // violet
        rgba(1, 1, 0), // warning yellow
      ],
      fonts: [
        { family: "Rajdhani", size: 14 },
        { family: "Share Tech Mono", size: 12 },
      ],
      gradient: {
        angle: 90,
        stops: [
          { position: 0, color: themeColor(1) },
          { position: 1, color: themeColor(2) },
        ],
      },
    },
  },
  {
    id: "retro_green",
    name: "Retro Green",
    theme: {
      colors: [rgba(0.2, 1, 0.2), rgba(0.1, 0.5, 0.1), rgba(0.6, 1, 0.6), rgba(1, 0.3, 0.2)],
      fonts: [
        { family: "VT323", size: 14 },
        { family: "monospace", size: 12 },
      ],
      gradient: {
        angle: 90,
        stops: [
          { position: 0, color: themeColor(1) },
          { position: 1, color: themeColor(2) },
        ],
      },
    },
  },
  {
    id: "retro_amber",
    name: "Retro Amber",
    theme: {
      colors: [rgba(1, 0.69, 0), rgba(0.5, 0.35, 0), rgba(1, 0.85, 0.5), rgba(1, 0.3, 0.2)],
      fonts: [
        { family: "VT323", size: 14 },
        { family: "monospace", size: 12 },
      ],
      gradient: {
        angle: 90,
        stops: [
          { position: 0, color: themeColor(1) },
          { position: 1, color: themeColor(2) },
        ],
      },
    },
  },
  {
    id: "synthwave",
    name: "Synthwave",
    theme: {
      colors: [rgba(1, 0.2, 0.6), rgba(0.2, 0.8, 1), rgba(0.5, 0.1, 0.8), rgba(1, 0.6, 0.1)],
      fonts: [
        { family: "Orbitron", size: 14 },
        { family: "sans-serif", size: 12 },
      ],
      gradient: {
        angle: 90,
        stops: [
          { position: 0, color: literalColor(rgba(0.1, 0.02, 0.2)) },
          { position: 0.5, color: themeColor(3) },
          { position: 1, color: themeColor(1) },
        ],
      },
    },
  },
  {
    id: "art_deco",
    name: "Art Deco",
    theme: {
      colors: [rgba(0.85, 0.7, 0.3), rgba(0.1, 0.1, 0.12), rgba(0.95, 0.9, 0.75), rgba(0.55, 0.1, 0.15)],
      fonts: [
        { family: "Poiret One", size: 16 },
        { family: "serif", size: 12 },
      ],
      gradient: {
        angle: 0,
        stops: [
          { position: 0, color: themeColor(1) },
          { position: 0.5, color: themeColor(3) },
          { position: 1, color: themeColor(1) },
        ],
      },
    },
  },
  {
    id: "industrial",
    name: "Industrial",
    theme: {
      colors: [rgba(0.55, 0.57, 0.58), rgba(1, 0.6, 0), rgba(0.25, 0.25, 0.25), rgba(0.8, 0.1, 0.1)],
      fonts: [
        { family: "sans-serif", size: 14 },
        { family: "monospace", size: 12 },
      ],
      gradient: {
        angle: 90,
        stops: [
          { position: 0, color: literalColor(rgba(0.75, 0.77, 0.78)) },
          { position: 1, color: literalColor(rgba(0.4, 0.42, 0.43)) },
        ],
      },
    },
  },
];

export const DEFAULT_THEME_PRESET = "cyberpunk";

/**
 * Get a theme preset by ID.
 * Returns a fresh copy of the theme, or undefined when the id is unknown.
 */
export function getThemePreset(id: string): ThemePreset | undefined {
  const preset = PRESETS.find((p) => p.id === id);
  if (!preset) return undefined;
  return { id: preset.id, name: preset.name, theme: cloneTheme(preset.theme) };
}

/**
 * Get all preset IDs, in display order
 */
export function getThemePresetIds(): string[] {
  return PRESETS.map((p) => p.id);
}

/** Default theme used by skins that do not pick their own */
export function defaultTheme(): Theme {
  const preset = PRESETS.find((p) => p.id === DEFAULT_THEME_PRESET) ?? PRESETS[0];
  return cloneTheme(preset.theme);
}
