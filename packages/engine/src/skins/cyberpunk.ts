/**
 * Cyberpunk HUD skin
 *
 * Neon border with glow, a faint grid and scanlines over a dark translucent
 * background, bracketed header and glowing dividers.
 */

import type { Color, DrawingSurface, PathCommand, Rect, StrokeStyle } from "@hudkit/core";
import { ZERO_RECT, solid } from "@hudkit/core";
import { defaultBaseConfig, type FrameConfigBase } from "../config/frame-config.js";
import {
  isRecord,
  parseBaseConfig,
  readBoolean,
  readColorSource,
  readEnum,
  readFontSource,
  readNumber,
  readString,
} from "../config/parse.js";
import { computeGroupRects } from "../layout/layout-engine.js";
import { rgba, withAlpha } from "../theme/color.js";
import { defaultTheme, getThemePreset } from "../theme/presets.js";
import { resolveColor, resolveFont } from "../theme/resolve.js";
import { literalColor, themeColor, themeFont, type ColorSource, type FontSource } from "../theme/theme.js";
import { isDrawable, type FrameRenderer } from "./frame-renderer.js";
import { angularRectPath, chamferedRectPath, linePath, rectPath } from "../rendering/shapes.js";

export const CORNER_STYLES = ["chamfer", "bracket", "angular"] as const;
export const HUD_HEADER_STYLES = ["brackets", "underline", "box", "none"] as const;
export const HUD_DIVIDER_STYLES = ["line", "dashed", "glow", "dots", "none"] as const;

export type CornerStyle = (typeof CORNER_STYLES)[number];
export type HudHeaderStyle = (typeof HUD_HEADER_STYLES)[number];
export type HudDividerStyle = (typeof HUD_DIVIDER_STYLES)[number];

export interface CyberpunkConfig extends FrameConfigBase {
  borderWidth: number;
  borderColor: ColorSource;
  glowIntensity: number;
  cornerStyle: CornerStyle;
  cornerSize: number;

  backgroundColor: ColorSource;
  showGrid: boolean;
  gridColor: ColorSource;
  gridSpacing: number;
  showScanlines: boolean;
  scanlineOpacity: number;

  showHeader: boolean;
  headerText: string;
  headerFont: FontSource;
  headerColor: ColorSource;
  headerStyle: HudHeaderStyle;

  dividerStyle: HudDividerStyle;
  dividerColor: ColorSource;

  itemFrameColor: ColorSource;
  itemGlowEnabled: boolean;
}

const GLOW_STEPS = 4;
const ITEM_CHAMFER = 4;
const HEADER_SIDE_PADDING = 10;
const MIN_GRID_SPACING = 4;

export function defaultCyberpunkConfig(): CyberpunkConfig {
  const base = defaultBaseConfig({
    theme: getThemePreset("cyberpunk")?.theme ?? defaultTheme(),
    groupCount: 2,
    groupItemCounts: [1, 1],
    groupWeights: [1, 1],
    splitOrientation: "vertical",
    contentPadding: 10,
    itemSpacing: 4,
    dividerWidth: 1,
    dividerPadding: 4,
    itemFrameEnabled: false,
  });
  return {
    ...base,
    borderWidth: 2,
    borderColor: themeColor(1),
    glowIntensity: 0.6,
    cornerStyle: "chamfer",
    cornerSize: 12,
    backgroundColor: literalColor(rgba(0.04, 0.06, 0.1, 0.9)),
    showGrid: true,
    gridColor: themeColor(2),
    gridSpacing: 20,
    showScanlines: true,
    scanlineOpacity: 0.08,
    showHeader: false,
    headerText: "",
    headerFont: themeFont(1, 18),
    headerColor: themeColor(1),
    headerStyle: "brackets",
    dividerStyle: "line",
    dividerColor: themeColor(1),
    itemFrameColor: themeColor(1),
    itemGlowEnabled: false,
  };
}

export function parseCyberpunkConfig(raw: unknown): CyberpunkConfig {
  const defaults = defaultCyberpunkConfig();
  const r = isRecord(raw) ? raw : {};
  return {
    ...parseBaseConfig(r, defaults),
    borderWidth: readNumber(r, "borderWidth", defaults.borderWidth, { min: 0 }),
    borderColor: readColorSource(r, "borderColor", defaults.borderColor),
    glowIntensity: readNumber(r, "glowIntensity", defaults.glowIntensity, { min: 0, max: 1 }),
    cornerStyle: readEnum(r, "cornerStyle", CORNER_STYLES, defaults.cornerStyle),
    cornerSize: readNumber(r, "cornerSize", defaults.cornerSize, { min: 0 }),
    backgroundColor: readColorSource(r, "backgroundColor", defaults.backgroundColor),
    showGrid: readBoolean(r, "showGrid", defaults.showGrid),
    gridColor: readColorSource(r, "gridColor", defaults.gridColor),
    gridSpacing: readNumber(r, "gridSpacing", defaults.gridSpacing, { min: MIN_GRID_SPACING }),
    showScanlines: readBoolean(r, "showScanlines", defaults.showScanlines),
    scanlineOpacity: readNumber(r, "scanlineOpacity", defaults.scanlineOpacity, { min: 0, max: 1 }),
    showHeader: readBoolean(r, "showHeader", defaults.showHeader),
    headerText: readString(r, "headerText", defaults.headerText),
    headerFont: readFontSource(r, "headerFont", defaults.headerFont),
    headerColor: readColorSource(r, "headerColor", defaults.headerColor),
    headerStyle: readEnum(r, "headerStyle", HUD_HEADER_STYLES, defaults.headerStyle),
    dividerStyle: readEnum(r, "dividerStyle", HUD_DIVIDER_STYLES, defaults.dividerStyle),
    dividerColor: readColorSource(r, "dividerColor", defaults.dividerColor),
    itemFrameColor: readColorSource(r, "itemFrameColor", defaults.itemFrameColor),
    itemGlowEnabled: readBoolean(r, "itemGlowEnabled", defaults.itemGlowEnabled),
  };
}

/** Space between the panel edge and the frame, leaving room for the glow */
export function frameMargin(config: CyberpunkConfig): number {
  return config.borderWidth + config.glowIntensity * 8;
}

function framePath(config: CyberpunkConfig, rect: Rect): PathCommand[] {
  switch (config.cornerStyle) {
    case "chamfer":
      return chamferedRectPath(rect, config.cornerSize);
    case "angular":
      return angularRectPath(rect, config.cornerSize);
    case "bracket":
      return rectPath(rect);
  }
}

export class CyberpunkRenderer implements FrameRenderer<CyberpunkConfig> {
  readonly skinId = "cyberpunk";
  readonly skinName = "Cyberpunk HUD";

  defaultConfig(): CyberpunkConfig {
    return defaultCyberpunkConfig();
  }

  parseConfig(raw: unknown): CyberpunkConfig {
    return parseCyberpunkConfig(raw);
  }

  renderFrame(surface: DrawingSurface, config: CyberpunkConfig, width: number, height: number): Rect {
    if (!isDrawable(width, height)) {
      return { ...ZERO_RECT };
    }

    const theme = config.theme;
    const margin = Math.min(frameMargin(config), width / 2, height / 2);
    const frame: Rect = {
      x: margin,
      y: margin,
      w: Math.max(0, width - margin * 2),
      h: Math.max(0, height - margin * 2),
    };
    // Too small to fit the glow margin and a frame
    if (frame.w <= 0 || frame.h <= 0) {
      return { ...ZERO_RECT };
    }
    const border = resolveColor(config.borderColor, theme);
    const outline = framePath(config, frame);

    surface.save();

    this.drawGlow(surface, config, outline, border);
    surface.fillPath(outline, solid(resolveColor(config.backgroundColor, theme)));
    this.drawGrid(surface, config, frame);

    surface.strokePath(outline, { color: border, width: config.borderWidth });
    if (config.cornerStyle === "bracket") {
      this.drawBracketCorners(surface, frame, config.cornerSize, { color: border, width: config.borderWidth });
    }

    const headerHeight = this.drawHeader(surface, config, frame, border);
    this.drawScanlines(surface, config, frame);

    surface.restore();

    const pad = config.contentPadding;
    return {
      x: frame.x + pad,
      y: frame.y + headerHeight + pad,
      w: Math.max(0, frame.w - pad * 2),
      h: Math.max(0, frame.h - headerHeight - pad * 2),
    };
  }

  calculateGroupLayouts(config: CyberpunkConfig, contentRect: Rect, out?: Rect[]): Rect[] {
    return computeGroupRects(
      {
        content: contentRect,
        groupCount: config.groupCount,
        weights: config.groupWeights,
        orientation: config.splitOrientation,
        dividerWidth: config.dividerWidth,
        dividerPadding: config.dividerPadding,
      },
      out
    );
  }

  drawGroupDividers(surface: DrawingSurface, config: CyberpunkConfig, groupRects: readonly Rect[]): void {
    if (groupRects.length < 2 || config.dividerStyle === "none") return;

    const offset = config.dividerPadding + config.dividerWidth / 2;
    for (let i = 0; i < groupRects.length - 1; i++) {
      const g = groupRects[i];
      if (config.splitOrientation === "vertical") {
        this.drawDivider(surface, config, g.x, g.y + g.h + offset, g.w, true);
      } else {
        this.drawDivider(surface, config, g.x + g.w + offset, g.y, g.h, false);
      }
    }
  }

  drawItemFrame(surface: DrawingSurface, config: CyberpunkConfig, itemRect: Rect): void {
    const color = resolveColor(config.itemFrameColor, config.theme);
    const path = chamferedRectPath(itemRect, ITEM_CHAMFER);

    if (config.itemGlowEnabled) {
      for (let i = 2; i >= 1; i--) {
        surface.strokePath(path, { color: withAlpha(color, color.a * (i / 2) * 0.3), width: 1 + i });
      }
    }
    surface.strokePath(path, { color, width: 1 });
  }

  private drawGlow(surface: DrawingSurface, config: CyberpunkConfig, outline: PathCommand[], border: Color): void {
    if (config.glowIntensity <= 0) return;

    // Widest, faintest stroke first
    for (let i = GLOW_STEPS; i >= 1; i--) {
      const alpha = config.glowIntensity * (i / GLOW_STEPS) * 0.25;
      surface.strokePath(outline, { color: withAlpha(border, alpha), width: config.borderWidth + i * 2 });
    }
  }

  private drawGrid(surface: DrawingSurface, config: CyberpunkConfig, frame: Rect): void {
    if (!config.showGrid || config.gridSpacing <= 0) return;

    const base = resolveColor(config.gridColor, config.theme);
    const stroke: StrokeStyle = { color: withAlpha(base, base.a * 0.2), width: 0.5 };
    const spacing = Math.max(MIN_GRID_SPACING, config.gridSpacing);
    const path: PathCommand[] = [];

    for (let x = frame.x + spacing; x < frame.x + frame.w; x += spacing) {
      path.push({ op: "move", x, y: frame.y }, { op: "line", x, y: frame.y + frame.h });
    }
    for (let y = frame.y + spacing; y < frame.y + frame.h; y += spacing) {
      path.push({ op: "move", x: frame.x, y }, { op: "line", x: frame.x + frame.w, y });
    }
    if (path.length === 0) return;

    surface.pushClip(frame);
    surface.strokePath(path, stroke);
    surface.popClip();
  }

  private drawScanlines(surface: DrawingSurface, config: CyberpunkConfig, frame: Rect): void {
    if (!config.showScanlines || config.scanlineOpacity <= 0) return;

    const paint = solid(rgba(0, 0, 0, config.scanlineOpacity));
    surface.pushClip(frame);
    const bottom = frame.y + frame.h;
    for (let y = frame.y; y < bottom; y += 2) {
      surface.fillRect({ x: frame.x, y, w: frame.w, h: Math.min(1, bottom - y) }, paint);
    }
    surface.popClip();
  }

  private drawBracketCorners(surface: DrawingSurface, frame: Rect, size: number, stroke: StrokeStyle): void {
    const { x, y, w, h } = frame;
    const s = size;
    const corner = (points: Array<[number, number]>): PathCommand[] =>
      points.map<PathCommand>(([px, py], i) => (i === 0 ? { op: "move", x: px, y: py } : { op: "line", x: px, y: py }));

    surface.strokePath(corner([[x, y + s], [x, y], [x + s, y]]), stroke);
    surface.strokePath(corner([[x + w - s, y], [x + w, y], [x + w, y + s]]), stroke);
    surface.strokePath(corner([[x + w, y + h - s], [x + w, y + h], [x + w - s, y + h]]), stroke);
    surface.strokePath(corner([[x + s, y + h], [x, y + h], [x, y + h - s]]), stroke);
  }

  private drawHeader(surface: DrawingSurface, config: CyberpunkConfig, frame: Rect, border: Color): number {
    if (!config.showHeader || config.headerText === "") return 0;

    const { x, y, w } = frame;
    const font = resolveFont(config.headerFont, config.theme);
    const fontStyle = { family: font.family, size: font.size, weight: "bold" as const };
    const headerHeight = font.size + 16;
    const metrics = surface.measureText(config.headerText, fontStyle);
    const textX = x + (w - metrics.width) / 2;
    const textY = y + (headerHeight - metrics.height) / 2;
    const midY = y + headerHeight / 2;

    switch (config.headerStyle) {
      case "brackets": {
        const stroke = { color: border, width: 1.5 };
        const left = x + HEADER_SIDE_PADDING;
        const right = x + w - HEADER_SIDE_PADDING;
        surface.strokePath(
          [...linePath(left, midY - 8, left, midY + 8), ...linePath(left, midY, textX - 10, midY)],
          stroke
        );
        surface.strokePath(
          [...linePath(right, midY - 8, right, midY + 8), ...linePath(textX + metrics.width + 10, midY, right, midY)],
          stroke
        );
        break;
      }
      case "underline":
        surface.strokePath(
          linePath(x + HEADER_SIDE_PADDING, y + headerHeight - 4, x + w - HEADER_SIDE_PADDING, y + headerHeight - 4),
          { color: withAlpha(border, 0.6), width: 1 }
        );
        break;
      case "box": {
        const box = { x: textX - 10, y: y + 4, w: metrics.width + 20, h: Math.max(0, headerHeight - 8) };
        const path = chamferedRectPath(box, 4);
        surface.fillPath(path, solid(withAlpha(border, 0.3)));
        surface.strokePath(path, { color: border, width: 1 });
        break;
      }
      case "none":
        break;
    }

    surface.drawText(config.headerText, textX, textY, {
      ...fontStyle,
      color: resolveColor(config.headerColor, config.theme),
    });

    return headerHeight;
  }

  private drawDivider(
    surface: DrawingSurface,
    config: CyberpunkConfig,
    x: number,
    y: number,
    length: number,
    horizontal: boolean
  ): void {
    const color = resolveColor(config.dividerColor, config.theme);
    const path = horizontal ? linePath(x, y, x + length, y) : linePath(x, y, x, y + length);

    switch (config.dividerStyle) {
      case "line":
        surface.strokePath(path, { color, width: config.dividerWidth });
        break;
      case "dashed":
        surface.strokePath(path, { color, width: config.dividerWidth, dash: [8, 4] });
        break;
      case "glow":
        for (let i = 3; i >= 1; i--) {
          surface.strokePath(path, {
            color: withAlpha(color, color.a * (i / 3) * 0.3),
            width: config.dividerWidth + i * 2,
          });
        }
        surface.strokePath(path, { color, width: config.dividerWidth });
        break;
      case "dots": {
        const paint = solid(color);
        for (let d = 0; d < length; d += 6) {
          const cx = horizontal ? x + d : x;
          const cy = horizontal ? y : y + d;
          surface.fillArc(cx, cy, 1.5, 0, Math.PI * 2, paint);
        }
        break;
      }
      case "none":
        break;
    }
  }
}
