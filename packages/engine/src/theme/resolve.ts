/**
 * Color / font / gradient resolution against a Theme
 *
 * None of these functions fail: unresolvable references produce
 * FALLBACK_COLOR / FALLBACK_FONT.
 */

import type { Color, ResolvedStop } from "@hudkit/core";
import { FALLBACK_COLOR, clamp01, lerpColor, withAlpha } from "./color.js";
import {
  FALLBACK_FONT,
  type ColorSource,
  type FontSource,
  type FontSpec,
  type Gradient,
  type Theme,
} from "./theme.js";

export interface ResolvedGradient {
  stops: ResolvedStop[];
  angle: number;
}

/**
 * Resolve a color source. Theme indices are 1-based (1..4).
 */
export function resolveColor(source: ColorSource, theme: Theme): Color {
  if (source.kind === "literal") {
    return source.color;
  }
  const color = Number.isInteger(source.index) ? theme.colors[source.index - 1] : undefined;
  if (!color) {
    return { ...FALLBACK_COLOR };
  }
  return source.alpha === undefined ? { ...color } : withAlpha(color, source.alpha);
}

/**
 * Resolve a font source. A size override replaces the theme font size.
 */
export function resolveFont(source: FontSource, theme: Theme): FontSpec {
  if (source.kind === "literal") {
    return { family: source.family, size: source.size };
  }
  const font = Number.isInteger(source.slot) ? theme.fonts[source.slot - 1] : undefined;
  if (!font) {
    return { ...FALLBACK_FONT };
  }
  return { family: font.family, size: source.size ?? font.size };
}

/**
 * Resolve every stop of a gradient, keeping declaration order.
 */
export function resolveGradient(gradient: Gradient, theme: Theme): ResolvedGradient {
  return {
    angle: gradient.angle,
    stops: gradient.stops.map((stop) => ({
      position: stop.position,
      color: resolveColor(stop.color, theme),
    })),
  };
}

/**
 * Sample a resolved gradient at `position` (clamped to [0, 1]).
 *
 * Stops are sorted by position (stable, so duplicate positions keep their
 * declared order and form a hard edge). Between two stops channels are
 * interpolated linearly; at or beyond the outer stops the exact stop color
 * is returned.
 */
export function sampleGradient(stops: readonly ResolvedStop[], position: number): Color {
  if (stops.length === 0) {
    return { ...FALLBACK_COLOR };
  }
  if (stops.length === 1) {
    return { ...stops[0].color };
  }

  const sorted = [...stops].sort((a, b) => a.position - b.position);
  const t = clamp01(position);

  const first = sorted[0];
  const last = sorted[sorted.length - 1];
  if (t <= first.position) return { ...first.color };
  if (t >= last.position) return { ...last.color };

  for (let i = 0; i < sorted.length - 1; i++) {
    const lo = sorted[i];
    const hi = sorted[i + 1];
    if (t >= lo.position && t <= hi.position) {
      const span = hi.position - lo.position;
      if (span <= 0) return { ...hi.color };
      return lerpColor(lo.color, hi.color, (t - lo.position) / span);
    }
  }

  return { ...last.color };
}
