/**
 * Shared frame configuration
 *
 * Every skin config extends FrameConfigBase, which is the union of three
 * capability interfaces the composer and layout engine rely on:
 *
 * - Themed:       the palette ColorSource / FontSource values resolve against
 * - LayoutConfig: groups, weights, orientations, slots, spacing
 * - Animated:     whether and how fast the panel animates
 */

import type { Orientation } from "@hudkit/core";
import { defaultTheme } from "../theme/presets.js";
import { cloneTheme, type Theme } from "../theme/theme.js";

/**
 * Configuration of the content item bound to one slot.
 * Only `displayAs` is interpreted here; `options` belong to the item renderer.
 */
export interface ContentItemConfig {
  displayAs: string;
  options: Record<string, unknown>;
}

export interface Themed {
  theme: Theme;
}

export interface LayoutConfig {
  groupCount: number;
  /** Items per group; missing entries mean 1 */
  groupItemCounts: number[];
  groupWeights: number[];
  /** Item stacking per group; missing entries use splitOrientation */
  groupItemOrientations: Orientation[];
  splitOrientation: Orientation;
  /** Keyed by slot name `group{G}_{I}` */
  contentSlots: Record<string, ContentItemConfig>;
  contentPadding: number;
  itemSpacing: number;
  dividerWidth: number;
  dividerPadding: number;
  itemFrameEnabled: boolean;
}

export interface Animated {
  animationEnabled: boolean;
  /** Higher is faster; 8 settles a value change in roughly half a second */
  animationSpeed: number;
}

export interface FrameConfigBase extends Themed, LayoutConfig, Animated {}

export const MIN_ANIMATION_SPEED = 0.1;

/** Shared field defaults; skins override the layout fields they care about */
export function defaultBaseConfig(overrides: Partial<FrameConfigBase> = {}): FrameConfigBase {
  return {
    theme: defaultTheme(),
    groupCount: 1,
    groupItemCounts: [1],
    groupWeights: [1],
    groupItemOrientations: [],
    splitOrientation: "vertical",
    contentSlots: {},
    contentPadding: 8,
    itemSpacing: 4,
    dividerWidth: 1,
    dividerPadding: 4,
    itemFrameEnabled: false,
    animationEnabled: true,
    animationSpeed: 8,
    ...overrides,
  };
}

/**
 * Replace only the theme. ThemeRef sources pick up the new palette on the
 * next render; literal colors are unaffected.
 */
export function withTheme<C extends Themed>(config: C, theme: Theme): C {
  return { ...config, theme: cloneTheme(theme) };
}

export function cloneContentSlots(
  slots: Record<string, ContentItemConfig>
): Record<string, ContentItemConfig> {
  const copy: Record<string, ContentItemConfig> = {};
  for (const [name, item] of Object.entries(slots)) {
    copy[name] = { displayAs: item.displayAs, options: structuredClone(item.options) };
  }
  return copy;
}
