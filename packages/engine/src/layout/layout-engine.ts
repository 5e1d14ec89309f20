/**
 * Layout engine
 *
 * Splits a content rect into weighted groups along the split axis, with a
 * fixed allowance between consecutive groups for the divider, and splits
 * each group into equal item cells.
 *
 *   ┌────────┐ pad │ pad ┌────────┐ pad │ pad ┌────────────────┐
 *   │ group1 │     ┃     │ group2 │     ┃     │     group3     │
 *   └────────┘   divider └────────┘   divider └────────────────┘
 *
 * All functions are pure. Each accepts an optional output array which is
 * cleared and refilled, so callers can reuse scratch buffers across frames.
 */

import type { Orientation, Rect } from "@hudkit/core";

export interface GroupLayoutInput {
  content: Rect;
  groupCount: number;
  weights: readonly number[];
  orientation: Orientation;
  dividerWidth: number;
  dividerPadding: number;
}

export interface ItemLayoutInput {
  group: Rect;
  itemCount: number;
  orientation: Orientation;
  itemSpacing?: number;
}

export interface PanelLayoutInput extends GroupLayoutInput {
  itemCounts: readonly number[];
  itemOrientations: readonly Orientation[];
  itemSpacing: number;
}

export interface PanelLayout {
  groups: Rect[];
  items: Rect[][];
}

function finiteOr(value: number, fallback: number): number {
  return Number.isFinite(value) ? value : fallback;
}

function nonNegative(value: number): number {
  return Math.max(0, finiteOr(value, 0));
}

/**
 * Group count is at least 1. Non-integers are floored.
 */
export function normalizeGroupCount(count: number): number {
  if (!Number.isFinite(count)) return 1;
  return Math.max(1, Math.floor(count));
}

/**
 * Normalize a weight list to exactly `groupCount` entries: pad with 1.0,
 * truncate extras.
 */
export function normalizeWeights(weights: readonly number[], groupCount: number): number[] {
  const count = normalizeGroupCount(groupCount);
  const result = weights.slice(0, count);
  while (result.length < count) {
    result.push(1);
  }
  return result;
}

/**
 * Weights actually used for a computation: negative or non-finite entries
 * count as 0, and a non-positive total becomes an equal split.
 * The config itself is never rewritten.
 */
export function effectiveWeights(weights: readonly number[], groupCount: number): number[] {
  const normalized = normalizeWeights(weights, groupCount).map(nonNegative);
  const total = normalized.reduce((sum, w) => sum + w, 0);
  if (total <= 0) {
    return normalized.map(() => 1);
  }
  return normalized;
}

/**
 * Total main-axis space reserved for dividers
 */
export function dividerSpace(groupCount: number, dividerWidth: number, dividerPadding: number): number {
  const dividers = Math.max(normalizeGroupCount(groupCount) - 1, 0);
  return dividers * (nonNegative(dividerWidth) + 2 * nonNegative(dividerPadding));
}

/**
 * Compute the rect of each group. Returns exactly `groupCount` rects.
 */
export function computeGroupRects(input: GroupLayoutInput, out: Rect[] = []): Rect[] {
  out.length = 0;

  const count = normalizeGroupCount(input.groupCount);
  const weights = effectiveWeights(input.weights, count);
  const total = weights.reduce((sum, w) => sum + w, 0);

  const x = finiteOr(input.content.x, 0);
  const y = finiteOr(input.content.y, 0);
  const w = nonNegative(input.content.w);
  const h = nonNegative(input.content.h);

  const gap = nonNegative(input.dividerWidth) + 2 * nonNegative(input.dividerPadding);
  const vertical = input.orientation === "vertical";
  const mainExtent = vertical ? h : w;
  const available = Math.max(mainExtent - dividerSpace(count, input.dividerWidth, input.dividerPadding), 0);

  let cursor = vertical ? y : x;
  for (let i = 0; i < count; i++) {
    const size = available * (weights[i] / total);
    out.push(vertical ? { x, y: cursor, w, h: size } : { x: cursor, y, w: size, h });
    cursor += size;
    if (i < count - 1) {
      cursor += gap;
    }
  }

  return out;
}

/**
 * Split a group into `itemCount` equal cells along `orientation`,
 * separated by `itemSpacing`.
 */
export function computeItemRects(input: ItemLayoutInput, out: Rect[] = []): Rect[] {
  out.length = 0;

  const count = Number.isFinite(input.itemCount) ? Math.max(0, Math.floor(input.itemCount)) : 0;
  if (count === 0) return out;

  const { group } = input;
  const x = finiteOr(group.x, 0);
  const y = finiteOr(group.y, 0);
  const w = nonNegative(group.w);
  const h = nonNegative(group.h);
  const spacing = nonNegative(input.itemSpacing ?? 0);

  const vertical = input.orientation === "vertical";
  const extent = vertical ? h : w;
  const size = Math.max(extent - spacing * (count - 1), 0) / count;

  for (let i = 0; i < count; i++) {
    const offset = i * (size + spacing);
    out.push(vertical ? { x, y: y + offset, w, h: size } : { x: x + offset, y, w: size, h });
  }

  return out;
}

/**
 * Items in group `index` (0-based); missing entries default to 1
 */
export function itemCountFor(itemCounts: readonly number[], index: number): number {
  const count = itemCounts[index];
  if (count === undefined || !Number.isFinite(count)) return 1;
  return Math.max(0, Math.floor(count));
}

/**
 * Item orientation of group `index`; missing entries use the split orientation
 */
export function itemOrientationFor(
  orientations: readonly Orientation[],
  index: number,
  fallback: Orientation
): Orientation {
  return orientations[index] ?? fallback;
}

/**
 * Group rects plus every group's item rects.
 * `out` is reused when given, including its nested item arrays.
 */
export function computeLayout(input: PanelLayoutInput, out?: PanelLayout): PanelLayout {
  const layout = out ?? { groups: [], items: [] };
  computeGroupRects(input, layout.groups);

  const groupCount = layout.groups.length;
  layout.items.length = Math.min(layout.items.length, groupCount);
  for (let g = 0; g < groupCount; g++) {
    const existing = layout.items[g] ?? [];
    layout.items[g] = computeItemRects(
      {
        group: layout.groups[g],
        itemCount: itemCountFor(input.itemCounts, g),
        orientation: itemOrientationFor(input.itemOrientations, g, input.orientation),
        itemSpacing: input.itemSpacing,
      },
      existing
    );
  }

  return layout;
}
