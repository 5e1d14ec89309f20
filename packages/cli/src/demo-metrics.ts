/**
 * Synthetic metrics for previews
 *
 * Deterministic in `timeSeconds`, so the same time always gives the same
 * frame. Each configured slot gets a slow sine wave between 0 and 100.
 */

import type { MetricSnapshot } from "@hudkit/core";
import { parseSlotName, slotFieldKey, type FrameConfigBase } from "@hudkit/engine";

const PERIOD_SECONDS = 12;

export function demoMetrics(config: FrameConfigBase, timeSeconds: number): MetricSnapshot {
  const metrics: MetricSnapshot = {};
  for (const [slot, content] of Object.entries(config.contentSlots)) {
    const address = parseSlotName(slot);
    if (!address) continue;
    const { group, item } = address;

    const phase = (group * 3 + item) * 0.7;
    const value = 50 + 40 * Math.sin((timeSeconds / PERIOD_SECONDS) * Math.PI * 2 + phase);
    const label = content.options.label;

    metrics[slotFieldKey(group, item, "caption")] = typeof label === "string" ? label : `G${group}.${item}`;
    metrics[slotFieldKey(group, item, "value")] = value.toFixed(0);
    metrics[slotFieldKey(group, item, "unit")] = "%";
    metrics[slotFieldKey(group, item, "numerical_value")] = value;
    metrics[slotFieldKey(group, item, "min_limit")] = 0;
    metrics[slotFieldKey(group, item, "max_limit")] = 100;
  }
  return metrics;
}
