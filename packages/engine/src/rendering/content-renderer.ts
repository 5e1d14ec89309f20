/**
 * Content item rendering
 *
 * The composer hands each populated slot to a ContentItemRenderer. Concrete
 * displayers (graphs, gauges) plug in here; TextContentRenderer is the
 * built-in one, drawing a caption with either the value text or a bar.
 */

import type { DrawingSurface, MetricSnapshot, Paint, Rect } from "@hudkit/core";
import { solid } from "@hudkit/core";
import type { ContentItemConfig } from "../config/frame-config.js";
import { slotFraction, type SlotValues } from "../config/slots.js";
import { withAlpha } from "../theme/color.js";
import { resolveColor, resolveFont, resolveGradient } from "../theme/resolve.js";
import { themeColor, themeFont, type Theme } from "../theme/theme.js";

export interface ContentItemContext {
  surface: DrawingSurface;
  rect: Rect;
  /** Slot name, e.g. "group1_2" */
  slot: string;
  group: number;
  item: number;
  content: ContentItemConfig;
  values: SlotValues;
  /** Animated position within the limits; absent when the slot is not animating */
  animatedFraction?: number;
  metrics: MetricSnapshot;
  theme: Theme;
}

export interface ContentItemRenderer {
  render(context: ContentItemContext): void;
}

const PADDING = 2;
const LINE_GAP = 2;
const MAX_BAR_HEIGHT = 8;

function captionFor(context: ContentItemContext): string | undefined {
  const override = context.content.options.caption;
  if (typeof override === "string") return override;
  if (context.content.options.showCaption === false) return undefined;
  return context.values.caption;
}

function barPaint(theme: Theme, track: Rect): Paint {
  const gradient = resolveGradient(theme.gradient, theme);
  if (gradient.stops.length === 0) {
    return solid(resolveColor(themeColor(1), theme));
  }
  return {
    kind: "linear",
    x0: track.x,
    y0: track.y,
    x1: track.x + track.w,
    y1: track.y,
    stops: gradient.stops,
  };
}

export class TextContentRenderer implements ContentItemRenderer {
  render(context: ContentItemContext): void {
    const { surface, rect, theme } = context;
    if (rect.w <= PADDING * 2 || rect.h <= PADDING * 2) return;

    let y = rect.y + PADDING;
    const caption = captionFor(context);
    if (caption !== undefined && caption !== "") {
      const font = resolveFont(themeFont(2), theme);
      surface.drawText(caption, rect.x + PADDING, y, {
        family: font.family,
        size: font.size,
        color: resolveColor(themeColor(2), theme),
      });
      y += surface.measureText(caption, font).height + LINE_GAP;
    }

    if (context.content.displayAs === "bar") {
      this.drawBar(context, y);
    } else {
      this.drawValue(context, y);
    }
  }

  private drawValue(context: ContentItemContext, y: number): void {
    const { surface, rect, theme, values } = context;
    if (values.value === undefined) return;

    const text = values.unit ? `${values.value} ${values.unit}` : values.value;
    const font = resolveFont(themeFont(1), theme);
    surface.drawText(text, rect.x + PADDING, y, {
      family: font.family,
      size: font.size,
      weight: "bold",
      color: resolveColor(themeColor(1), theme),
    });
  }

  private drawBar(context: ContentItemContext, y: number): void {
    const { surface, rect, theme } = context;
    const track: Rect = {
      x: rect.x + PADDING,
      y,
      w: rect.w - PADDING * 2,
      h: Math.min(MAX_BAR_HEIGHT, rect.y + rect.h - PADDING - y),
    };
    if (track.w <= 0 || track.h <= 0) return;

    const accent = resolveColor(themeColor(1), theme);
    surface.fillRect(track, solid(withAlpha(accent, accent.a * 0.2)));

    const fraction = context.animatedFraction ?? slotFraction(context.values) ?? 0;
    if (fraction <= 0) return;
    surface.fillRect({ ...track, w: track.w * fraction }, barPaint(theme, track));
  }
}
