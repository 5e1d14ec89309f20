/**
 * Panel composer - draws one complete panel pass
 *
 * Order of a pass:
 * 1. skin frame (background, border, header) -> content rect
 * 2. group rects from the skin, item rects per group
 * 3. each populated slot goes to the content renderer
 * 4. group dividers, then item frames when enabled
 * 5. skin animation, when enabled
 *
 * A failing content item is logged and skipped; the rest of the panel still
 * renders. A SurfaceError aborts the pass and is returned to the caller.
 */

import type { DrawingSurface, MetricSnapshot, Rect } from "@hudkit/core";
import { SurfaceError } from "@hudkit/core";
import type { FrameConfigBase } from "../config/frame-config.js";
import { slotName, slotValues } from "../config/slots.js";
import { computeItemRects, itemCountFor, itemOrientationFor, type PanelLayout } from "../layout/layout-engine.js";
import { isDrawable, type FrameRenderer } from "../skins/frame-renderer.js";
import { TextContentRenderer, type ContentItemRenderer } from "./content-renderer.js";

export interface ComposeInput<C extends FrameConfigBase> {
  surface: DrawingSurface;
  config: C;
  renderer: FrameRenderer<C>;
  width: number;
  height: number;
  elapsedSeconds: number;
  metrics: MetricSnapshot;
  /** Defaults to TextContentRenderer */
  contentRenderer?: ContentItemRenderer;
  /** Data changed since the last pass, or values are still animating */
  dataChanged?: boolean;
  /** Animated value fractions keyed by slot name */
  animatedFractions?: ReadonlyMap<string, number>;
  /** Reused for the group and item rects when given */
  scratch?: PanelLayout;
}

export type ComposeResult =
  | {
      ok: true;
      contentRect: Rect;
      groups: Rect[];
      items: Rect[][];
      needsRedraw: boolean;
      /** Slots whose content renderer threw */
      failedSlots: string[];
    }
  | { ok: false; error: SurfaceError };

const defaultContentRenderer = new TextContentRenderer();

/**
 * Run a content renderer, logging anything it throws.
 * Surface failures are not the item's fault and abort the pass.
 */
function safeRender(slot: string, renderFn: () => void): boolean {
  try {
    renderFn();
    return true;
  } catch (error) {
    if (error instanceof SurfaceError) throw error;
    console.error(`[${slot}] Render failed:`, error);
    return false;
  }
}

function runPass<C extends FrameConfigBase>(input: ComposeInput<C>): ComposeResult {
  const { surface, config, renderer, width, height } = input;
  const layout = input.scratch ?? { groups: [], items: [] };
  const dataChanged = input.dataChanged ?? false;

  const contentRect = renderer.renderFrame(surface, config, width, height);
  if (!isDrawable(width, height)) {
    layout.groups.length = 0;
    layout.items.length = 0;
    return { ok: true, contentRect, groups: layout.groups, items: layout.items, needsRedraw: dataChanged, failedSlots: [] };
  }

  const groups = renderer.calculateGroupLayouts(config, contentRect, layout.groups);
  layout.items.length = Math.min(layout.items.length, groups.length);
  for (let g = 0; g < groups.length; g++) {
    layout.items[g] = computeItemRects(
      {
        group: groups[g],
        itemCount: itemCountFor(config.groupItemCounts, g),
        orientation: itemOrientationFor(config.groupItemOrientations, g, config.splitOrientation),
        itemSpacing: config.itemSpacing,
      },
      layout.items[g] ?? []
    );
  }

  const contentRenderer = input.contentRenderer ?? defaultContentRenderer;
  const failedSlots: string[] = [];

  layout.items.forEach((itemRects, g) => {
    itemRects.forEach((rect, i) => {
      const slot = slotName(g + 1, i + 1);
      const content = config.contentSlots[slot];
      if (!content) {
        console.debug(`[composer] No content configured for ${slot}`);
        return;
      }

      const animatedFraction = input.animatedFractions?.get(slot);
      surface.save();
      surface.pushClip(rect);
      const ok = safeRender(slot, () =>
        contentRenderer.render({
          surface,
          rect,
          slot,
          group: g + 1,
          item: i + 1,
          content,
          values: slotValues(input.metrics, g + 1, i + 1),
          metrics: input.metrics,
          theme: config.theme,
          ...(animatedFraction === undefined ? {} : { animatedFraction }),
        })
      );
      surface.popClip();
      surface.restore();
      if (!ok) failedSlots.push(slot);
    });
  });

  renderer.drawGroupDividers(surface, config, groups);

  if (config.itemFrameEnabled && renderer.drawItemFrame) {
    for (const itemRects of layout.items) {
      for (const rect of itemRects) {
        renderer.drawItemFrame(surface, config, rect);
      }
    }
  }

  let needsRedraw = dataChanged;
  if (config.animationEnabled && renderer.animateCustom) {
    needsRedraw = renderer.animateCustom(config, input.elapsedSeconds) || needsRedraw;
  }

  if (failedSlots.length > 0) {
    console.warn(`[composer] Panel rendered with ${failedSlots.length} item error(s): ${failedSlots.join(", ")}`);
  }

  return { ok: true, contentRect, groups, items: layout.items, needsRedraw, failedSlots };
}

/**
 * Compose one panel pass onto `input.surface`
 */
export function composePanel<C extends FrameConfigBase>(input: ComposeInput<C>): ComposeResult {
  try {
    return runPass(input);
  } catch (error) {
    if (error instanceof SurfaceError) {
      console.warn(`[composer] Surface failed, pass aborted:`, error.message);
      return { ok: false, error };
    }
    throw error;
  }
}
