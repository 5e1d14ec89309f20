/**
 * Skin contract
 *
 * A skin draws the decorative frame around a panel and decides where the
 * content goes. Each skin has its own config type extending FrameConfigBase
 * and keeps any animation state on the renderer instance, so one renderer
 * instance belongs to one panel.
 */

import type { DrawingSurface, Rect } from "@hudkit/core";
import type { FrameConfigBase } from "../config/frame-config.js";

export interface FrameRenderer<C extends FrameConfigBase> {
  /** Identifier used in panel documents, e.g. "cyberpunk" */
  readonly skinId: string;
  /** Display name, e.g. "Cyberpunk HUD" */
  readonly skinName: string;

  defaultConfig(): C;

  /** Read a persisted config; every missing or invalid field takes its default */
  parseConfig(raw: unknown): C;

  /**
   * Draw background, border, header and decoration.
   * Returns the content rect; for width or height below 1 returns the
   * zero rect without drawing anything.
   */
  renderFrame(surface: DrawingSurface, config: C, width: number, height: number): Rect;

  calculateGroupLayouts(config: C, contentRect: Rect, out?: Rect[]): Rect[];

  /** Draw a divider in each gap. No-op for fewer than 2 groups. */
  drawGroupDividers(surface: DrawingSurface, config: C, groupRects: readonly Rect[]): void;

  drawItemFrame?(surface: DrawingSurface, config: C, itemRect: Rect): void;

  /**
   * Advance skin-private animation state.
   * Returns whether another frame is needed.
   */
  animateCustom?(config: C, elapsedSeconds: number): boolean;
}

export function isDrawable(width: number, height: number): boolean {
  return Number.isFinite(width) && Number.isFinite(height) && width >= 1 && height >= 1;
}
