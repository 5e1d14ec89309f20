/**
 * Retro Terminal skin
 *
 * A CRT monitor: bezel, phosphor-tinted screen, scanlines, vignette and a
 * terminal-style header with a blinking cursor.
 *
 * ┌──────────────────────────────┐
 * │ ┌──────────────────────────┐ │  bezel
 * │ │      SYSTEM MONITOR      │ │  header
 * │ ├──────────────────────────┤ │
 * │ │  group 1                 │ │
 * │ │ - - - - - - - - - - - -  │ │  divider
 * │ │  group 2                 │ │
 * │ └──────────────────────────┘ │
 * │ o                            │  power LED
 * └──────────────────────────────┘
 */

import type { Color, DrawingSurface, Rect, StrokeStyle } from "@hudkit/core";
import { ZERO_RECT, solid } from "@hudkit/core";
import { defaultBaseConfig, type FrameConfigBase } from "../config/frame-config.js";
import { isRecord, parseBaseConfig, readBoolean, readColor, readEnum, readFontSource, readNumber, readString } from "../config/parse.js";
import { computeGroupRects } from "../layout/layout-engine.js";
import { rgba, withAlpha } from "../theme/color.js";
import { defaultTheme, getThemePreset } from "../theme/presets.js";
import { resolveColor, resolveFont } from "../theme/resolve.js";
import { themeColor, themeFont, type FontSource } from "../theme/theme.js";
import { isDrawable, type FrameRenderer } from "./frame-renderer.js";
import { linePath } from "../rendering/shapes.js";

export const PHOSPHOR_COLORS = ["green", "amber", "white", "blue", "theme"] as const;
export const BEZEL_STYLES = ["classic", "slim", "industrial", "none"] as const;
export const TERMINAL_HEADER_STYLES = ["title_bar", "status_line", "prompt", "none"] as const;
export const TERMINAL_DIVIDER_STYLES = ["dashed", "solid", "box_drawing", "pipe", "ascii", "none"] as const;

export type PhosphorColor = (typeof PHOSPHOR_COLORS)[number];
export type BezelStyle = (typeof BEZEL_STYLES)[number];
export type TerminalHeaderStyle = (typeof TERMINAL_HEADER_STYLES)[number];
export type TerminalDividerStyle = (typeof TERMINAL_DIVIDER_STYLES)[number];

export interface RetroTerminalConfig extends FrameConfigBase {
  phosphorColor: PhosphorColor;
  backgroundColor: Color;
  /** Multiplier applied to phosphor text */
  textBrightness: number;

  scanlineIntensity: number;
  scanlineSpacing: number;
  /** Scroll the scanlines; speed follows animationSpeed */
  scanlineScroll: boolean;
  curvatureAmount: number;
  vignetteIntensity: number;
  screenGlow: number;

  bezelStyle: BezelStyle;
  bezelColor: Color;
  bezelWidth: number;
  showPowerLed: boolean;
  powerLedColor: Color;

  showHeader: boolean;
  headerText: string;
  headerStyle: TerminalHeaderStyle;
  headerFont: FontSource;
  headerHeight: number;

  dividerStyle: TerminalDividerStyle;
  cursorBlink: boolean;
}

/** Dividers are always 2px on a terminal, whatever dividerWidth says */
export const TERMINAL_DIVIDER_WIDTH = 2;

const PHOSPHOR_RGB: Record<Exclude<PhosphorColor, "theme">, Color> = {
  green: rgba(0.2, 1, 0.2),
  amber: rgba(1, 0.69, 0),
  white: rgba(0.9, 0.9, 0.85),
  blue: rgba(0.4, 0.6, 1),
};

const CURSOR_BLINK_HZ = 1;
const SCANLINE_SCROLL_PX_PER_SPEED = 1;
const BLACK = rgba(0, 0, 0);
/** Smallest bezel the power LED fits in */
const LED_MIN_BEZEL = 12;

export function phosphorColor(config: RetroTerminalConfig): Color {
  if (config.phosphorColor === "theme") {
    return resolveColor(themeColor(1), config.theme);
  }
  return { ...PHOSPHOR_RGB[config.phosphorColor] };
}

/** Dimmed phosphor for secondary elements (dividers, title bar) */
export function dimPhosphorColor(config: RetroTerminalConfig): Color {
  const c = phosphorColor(config);
  return { r: c.r * 0.5, g: c.g * 0.5, b: c.b * 0.5, a: c.a * 0.7 };
}

function textColor(config: RetroTerminalConfig): Color {
  const c = phosphorColor(config);
  return rgba(c.r * config.textBrightness, c.g * config.textBrightness, c.b * config.textBrightness, 1);
}

export function defaultRetroTerminalConfig(): RetroTerminalConfig {
  const base = defaultBaseConfig({
    theme: getThemePreset("retro_green")?.theme ?? defaultTheme(),
    groupCount: 1,
    groupItemCounts: [4],
    groupWeights: [1],
    splitOrientation: "vertical",
    contentPadding: 12,
    itemSpacing: 4,
    dividerWidth: TERMINAL_DIVIDER_WIDTH,
    dividerPadding: 4,
  });
  return {
    ...base,
    phosphorColor: "green",
    backgroundColor: rgba(0.02, 0.02, 0.02, 1),
    textBrightness: 0.9,
    scanlineIntensity: 0.25,
    scanlineSpacing: 2,
    scanlineScroll: false,
    curvatureAmount: 0.02,
    vignetteIntensity: 0.4,
    screenGlow: 0.5,
    bezelStyle: "classic",
    bezelColor: rgba(0.12, 0.12, 0.1, 1),
    bezelWidth: 16,
    showPowerLed: true,
    powerLedColor: rgba(0.2, 0.8, 0.2, 1),
    showHeader: true,
    headerText: "SYSTEM MONITOR",
    headerStyle: "title_bar",
    headerFont: themeFont(1, 14),
    headerHeight: 28,
    dividerStyle: "dashed",
    cursorBlink: true,
  };
}

export function parseRetroTerminalConfig(raw: unknown): RetroTerminalConfig {
  const defaults = defaultRetroTerminalConfig();
  const r = isRecord(raw) ? raw : {};
  return {
    ...parseBaseConfig(r, defaults),
    phosphorColor: readEnum(r, "phosphorColor", PHOSPHOR_COLORS, defaults.phosphorColor),
    backgroundColor: readColor(r, "backgroundColor", defaults.backgroundColor),
    textBrightness: readNumber(r, "textBrightness", defaults.textBrightness, { min: 0, max: 1 }),
    scanlineIntensity: readNumber(r, "scanlineIntensity", defaults.scanlineIntensity, { min: 0, max: 1 }),
    scanlineSpacing: readNumber(r, "scanlineSpacing", defaults.scanlineSpacing, { min: 1 }),
    scanlineScroll: readBoolean(r, "scanlineScroll", defaults.scanlineScroll),
    curvatureAmount: readNumber(r, "curvatureAmount", defaults.curvatureAmount, { min: 0 }),
    vignetteIntensity: readNumber(r, "vignetteIntensity", defaults.vignetteIntensity, { min: 0, max: 1 }),
    screenGlow: readNumber(r, "screenGlow", defaults.screenGlow, { min: 0, max: 1 }),
    bezelStyle: readEnum(r, "bezelStyle", BEZEL_STYLES, defaults.bezelStyle),
    bezelColor: readColor(r, "bezelColor", defaults.bezelColor),
    bezelWidth: readNumber(r, "bezelWidth", defaults.bezelWidth, { min: 0 }),
    showPowerLed: readBoolean(r, "showPowerLed", defaults.showPowerLed),
    powerLedColor: readColor(r, "powerLedColor", defaults.powerLedColor),
    showHeader: readBoolean(r, "showHeader", defaults.showHeader),
    headerText: readString(r, "headerText", defaults.headerText),
    headerStyle: readEnum(r, "headerStyle", TERMINAL_HEADER_STYLES, defaults.headerStyle),
    headerFont: readFontSource(r, "headerFont", defaults.headerFont),
    headerHeight: readNumber(r, "headerHeight", defaults.headerHeight, { min: 0 }),
    dividerStyle: readEnum(r, "dividerStyle", TERMINAL_DIVIDER_STYLES, defaults.dividerStyle),
    cursorBlink: readBoolean(r, "cursorBlink", defaults.cursorBlink),
  };
}

function strokeLine(surface: DrawingSurface, x0: number, y0: number, x1: number, y1: number, stroke: StrokeStyle): void {
  surface.strokePath(linePath(x0, y0, x1, y1), stroke);
}

export class RetroTerminalRenderer implements FrameRenderer<RetroTerminalConfig> {
  readonly skinId = "retro_terminal";
  readonly skinName = "Retro Terminal";

  /** [0, 1); the cursor shows during the first half */
  private cursorPhase = 0;
  /** Pixels, in [0, scanlineSpacing) */
  private scanlineOffset = 0;

  defaultConfig(): RetroTerminalConfig {
    return defaultRetroTerminalConfig();
  }

  parseConfig(raw: unknown): RetroTerminalConfig {
    return parseRetroTerminalConfig(raw);
  }

  get cursorVisible(): boolean {
    return this.cursorPhase < 0.5;
  }

  get currentScanlineOffset(): number {
    return this.scanlineOffset;
  }

  renderFrame(surface: DrawingSurface, config: RetroTerminalConfig, width: number, height: number): Rect {
    if (!isDrawable(width, height)) {
      return { ...ZERO_RECT };
    }

    const bw = config.bezelStyle === "none" ? 0 : config.bezelWidth;
    if (width <= bw * 2 || height <= bw * 2) {
      return { ...ZERO_RECT };
    }

    surface.save();
    const screen = this.drawBezel(surface, config, width, height);
    this.drawScreenBackground(surface, config, screen);
    const headerHeight = this.drawHeader(surface, config, screen);
    this.drawScanlines(surface, config, screen);
    this.drawVignette(surface, config, screen);
    surface.restore();

    const pad = config.contentPadding;
    return {
      x: screen.x + pad,
      y: screen.y + headerHeight + pad,
      w: Math.max(0, screen.w - pad * 2),
      h: Math.max(0, screen.h - headerHeight - pad * 2),
    };
  }

  calculateGroupLayouts(config: RetroTerminalConfig, contentRect: Rect, out?: Rect[]): Rect[] {
    return computeGroupRects(
      {
        content: contentRect,
        groupCount: config.groupCount,
        weights: config.groupWeights,
        orientation: config.splitOrientation,
        dividerWidth: TERMINAL_DIVIDER_WIDTH,
        dividerPadding: config.dividerPadding,
      },
      out
    );
  }

  drawGroupDividers(surface: DrawingSurface, config: RetroTerminalConfig, groupRects: readonly Rect[]): void {
    if (groupRects.length < 2 || config.dividerStyle === "none") return;

    const offset = config.dividerPadding + TERMINAL_DIVIDER_WIDTH / 2;
    for (let i = 0; i < groupRects.length - 1; i++) {
      const g = groupRects[i];
      if (config.splitOrientation === "vertical") {
        this.drawDivider(surface, config, g.x, g.y + g.h + offset, g.w, true);
      } else {
        this.drawDivider(surface, config, g.x + g.w + offset, g.y, g.h, false);
      }
    }
  }

  animateCustom(config: RetroTerminalConfig, elapsedSeconds: number): boolean {
    const elapsed = Number.isFinite(elapsedSeconds) && elapsedSeconds > 0 ? elapsedSeconds : 0;
    let redraw = false;

    if (config.cursorBlink && config.showHeader && config.headerStyle === "prompt") {
      const before = this.cursorVisible;
      this.cursorPhase = (this.cursorPhase + elapsed * CURSOR_BLINK_HZ) % 1;
      if (this.cursorVisible !== before) redraw = true;
    }

    if (config.scanlineScroll && config.scanlineIntensity > 0) {
      const spacing = Math.max(1, config.scanlineSpacing);
      const before = Math.floor(this.scanlineOffset);
      const advance = elapsed * config.animationSpeed * SCANLINE_SCROLL_PX_PER_SPEED;
      this.scanlineOffset = (this.scanlineOffset + advance) % spacing;
      if (Math.floor(this.scanlineOffset) !== before) redraw = true;
    }

    return redraw;
  }

  private drawBezel(surface: DrawingSurface, config: RetroTerminalConfig, width: number, height: number): Rect {
    if (config.bezelStyle === "none") {
      return { x: 0, y: 0, w: width, h: height };
    }

    const bw = config.bezelWidth;
    const bezel = config.bezelColor;
    const outer = { x: 0, y: 0, w: width, h: height };

    switch (config.bezelStyle) {
      case "classic": {
        const radius = 8;
        surface.fillRoundedRect(outer, radius, solid(bezel));

        // Highlight top/left, shadow bottom/right
        const highlight = rgba(Math.min(bezel.r + 0.1, 1), Math.min(bezel.g + 0.1, 1), Math.min(bezel.b + 0.08, 1), 0.6);
        const shadow = rgba(0, 0, 0, 0.4);
        strokeLine(surface, radius, 0, width - radius, 0, { color: highlight, width: 2 });
        strokeLine(surface, 0, radius, 0, height - radius, { color: highlight, width: 2 });
        strokeLine(surface, radius, height, width - radius, height, { color: shadow, width: 2 });
        strokeLine(surface, width, radius, width, height - radius, { color: shadow, width: 2 });

        const inset = Math.max(0, bw - 4);
        surface.strokeRoundedRect(
          { x: inset, y: inset, w: Math.max(0, width - 2 * inset), h: Math.max(0, height - 2 * inset) },
          4,
          { color: rgba(0, 0, 0, 0.6), width: 3 }
        );

        if (config.showPowerLed && bw >= LED_MIN_BEZEL) {
          const cx = bw / 2;
          const cy = height - bw / 2;
          const led = config.powerLedColor;
          surface.fillArc(cx, cy, 6, 0, Math.PI * 2, solid(withAlpha(led, 0.3)));
          surface.fillArc(cx, cy, 3, 0, Math.PI * 2, solid(led));
        }
        break;
      }
      case "slim": {
        surface.fillRoundedRect(outer, 4, solid(bezel));
        const edge = Math.max(0, bw - 1);
        surface.strokeRoundedRect(
          { x: edge, y: edge, w: Math.max(0, width - 2 * edge), h: Math.max(0, height - 2 * edge) },
          2,
          { color: rgba(0, 0, 0, 0.5), width: 1 }
        );
        break;
      }
      case "industrial": {
        surface.fillRect(outer, solid(rgba(bezel.r * 0.8, bezel.g * 0.8, bezel.b * 0.8, bezel.a)));

        // Ventilation slots down both sides
        const slot = solid(rgba(0, 0, 0, 0.7));
        const slotHeight = 4;
        const slotGap = 6;
        const slotWidth = Math.max(0, bw - 8);
        for (let y = bw + 10; y < height - bw - 10; y += slotHeight + slotGap) {
          surface.fillRect({ x: 4, y, w: slotWidth, h: slotHeight }, slot);
          surface.fillRect({ x: width - bw + 4, y, w: slotWidth, h: slotHeight }, slot);
        }

        const edge = Math.max(0, bw - 2);
        surface.strokeRect(
          { x: edge, y: edge, w: Math.max(0, width - 2 * edge), h: Math.max(0, height - 2 * edge) },
          { color: rgba(0, 0, 0, 0.6), width: 3 }
        );

        if (config.showPowerLed && bw >= LED_MIN_BEZEL) {
          surface.fillRect({ x: width / 2 - 8, y: height - bw / 2 - 3, w: 16, h: 6 }, solid(config.powerLedColor));
        }
        break;
      }
    }

    return { x: bw, y: bw, w: Math.max(0, width - 2 * bw), h: Math.max(0, height - 2 * bw) };
  }

  private drawScreenBackground(surface: DrawingSurface, config: RetroTerminalConfig, screen: Rect): void {
    surface.fillRect(screen, solid(config.backgroundColor));

    if (config.screenGlow > 0) {
      // Phosphor persistence, brightest across the middle of the screen
      const glow = phosphorColor(config);
      const alpha = config.screenGlow * 0.05;
      surface.fillRect(screen, {
        kind: "linear",
        x0: screen.x,
        y0: screen.y,
        x1: screen.x,
        y1: screen.y + screen.h,
        stops: [
          { position: 0, color: withAlpha(glow, 0) },
          { position: 0.5, color: withAlpha(glow, alpha) },
          { position: 1, color: withAlpha(glow, 0) },
        ],
      });
    }
  }

  private drawHeader(surface: DrawingSurface, config: RetroTerminalConfig, screen: Rect): number {
    if (!config.showHeader || config.headerStyle === "none") return 0;

    const { x, y, w } = screen;
    const headerHeight = Math.min(config.headerHeight, screen.h);
    const font = resolveFont(config.headerFont, config.theme);
    const fontStyle = { family: font.family, size: font.size, weight: "bold" as const };
    const phosphor = phosphorColor(config);
    const text = config.headerText === "" ? "TERMINAL" : config.headerText;

    const draw = (value: string, tx: number, color: Color) => {
      const metrics = surface.measureText(value, fontStyle);
      surface.drawText(value, tx, y + (headerHeight - metrics.height) / 2, { ...fontStyle, color });
    };

    switch (config.headerStyle) {
      case "title_bar": {
        surface.fillRect({ x, y, w, h: headerHeight }, solid(withAlpha(dimPhosphorColor(config), 0.15)));
        strokeLine(surface, x, y + headerHeight, x + w, y + headerHeight, { color: withAlpha(phosphor, 0.5), width: 1 });
        const tx = x + (w - surface.measureText(text, fontStyle).width) / 2;
        if (config.screenGlow > 0) draw(text, tx, withAlpha(phosphor, config.screenGlow * 0.3));
        draw(text, tx, textColor(config));
        break;
      }
      case "status_line": {
        // Reverse video
        surface.fillRect({ x, y, w, h: headerHeight }, solid(rgba(phosphor.r * 0.8, phosphor.g * 0.8, phosphor.b * 0.8, 0.9)));
        draw(text, x + 8, BLACK);
        const info = "STATUS: OK";
        draw(info, x + w - surface.measureText(info, fontStyle).width - 8, BLACK);
        break;
      }
      case "prompt": {
        const cursor = !config.cursorBlink || this.cursorVisible ? "_" : " ";
        const prompt = `$ ${text.toUpperCase()} ${cursor}`;
        if (config.screenGlow > 0) draw(prompt, x + 8, withAlpha(phosphor, config.screenGlow * 0.3));
        draw(prompt, x + 8, textColor(config));
        break;
      }
    }

    return headerHeight;
  }

  private drawScanlines(surface: DrawingSurface, config: RetroTerminalConfig, screen: Rect): void {
    if (config.scanlineIntensity <= 0) return;

    const paint = solid(rgba(0, 0, 0, config.scanlineIntensity * 0.5));
    const spacing = Math.max(1, config.scanlineSpacing);

    surface.pushClip(screen);
    const bottom = screen.y + screen.h;
    for (let y = screen.y + (this.scanlineOffset % spacing); y < bottom; y += spacing) {
      surface.fillRect({ x: screen.x, y, w: screen.w, h: Math.min(1, bottom - y) }, paint);
    }
    surface.popClip();
  }

  private drawVignette(surface: DrawingSurface, config: RetroTerminalConfig, screen: Rect): void {
    if (config.curvatureAmount <= 0 && config.vignetteIntensity <= 0) return;

    const edgeAlpha = Math.min(1, config.vignetteIntensity * 0.9 + config.curvatureAmount * 2);
    const band = Math.min(screen.w, screen.h) * 0.25;
    if (band <= 0) return;

    const dark = withAlpha(BLACK, edgeAlpha);
    const clear = withAlpha(BLACK, 0);
    const { x, y, w, h } = screen;
    const edges: Array<{ rect: Rect; from: [number, number]; to: [number, number] }> = [
      { rect: { x, y, w, h: band }, from: [x, y], to: [x, y + band] },
      { rect: { x, y: y + h - band, w, h: band }, from: [x, y + h], to: [x, y + h - band] },
      { rect: { x, y, w: band, h }, from: [x, y], to: [x + band, y] },
      { rect: { x: x + w - band, y, w: band, h }, from: [x + w, y], to: [x + w - band, y] },
    ];

    surface.pushClip(screen);
    for (const edge of edges) {
      surface.fillRect(edge.rect, {
        kind: "linear",
        x0: edge.from[0],
        y0: edge.from[1],
        x1: edge.to[0],
        y1: edge.to[1],
        stops: [
          { position: 0, color: dark },
          { position: 1, color: clear },
        ],
      });
    }
    surface.popClip();
  }

  private drawDivider(
    surface: DrawingSurface,
    config: RetroTerminalConfig,
    x: number,
    y: number,
    length: number,
    horizontal: boolean
  ): void {
    const color = dimPhosphorColor(config);
    const along = (offset: number, stroke: StrokeStyle) => {
      if (horizontal) strokeLine(surface, x, y + offset, x + length, y + offset, stroke);
      else strokeLine(surface, x + offset, y, x + offset, y + length, stroke);
    };
    const across = (at: number, half: number, stroke: StrokeStyle) => {
      if (horizontal) strokeLine(surface, x + at, y - half, x + at, y + half, stroke);
      else strokeLine(surface, x - half, y + at, x + half, y + at, stroke);
    };

    switch (config.dividerStyle) {
      case "dashed":
        along(0, { color, width: 1, dash: [6, 4] });
        break;
      case "solid":
        along(0, { color, width: 2 });
        break;
      case "box_drawing":
        across(0, 6, { color, width: 1 });
        along(0, { color, width: 1 });
        across(length, 6, { color, width: 1 });
        break;
      case "pipe":
        for (let at = 0; at < length; at += 4) {
          across(at, 4, { color, width: 1 });
        }
        break;
      case "ascii":
        along(-1.5, { color, width: 2 });
        along(1.5, { color, width: 2 });
        break;
      case "none":
        break;
    }
  }
}
