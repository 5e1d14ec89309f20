/**
 * Slot naming
 *
 * A slot is one cell of the layout, addressed as `group{G}_{I}` with both
 * indices 1-based. Metric data for a slot uses `group{G}_{I}_{field}` keys.
 */

import type { MetricSnapshot } from "@hudkit/core";

export const SLOT_FIELDS = ["caption", "value", "unit", "numerical_value", "min_limit", "max_limit"] as const;

export type SlotField = (typeof SLOT_FIELDS)[number];

export interface SlotAddress {
  group: number;
  item: number;
}

/** Values published for one slot */
export interface SlotValues {
  caption?: string;
  value?: string;
  unit?: string;
  numericalValue?: number;
  minLimit?: number;
  maxLimit?: number;
}

const SLOT_PATTERN = /^group(\d+)_(\d+)$/;

export function slotName(group: number, item: number): string {
  return `group${group}_${item}`;
}

export function slotFieldKey(group: number, item: number, field: SlotField): string {
  return `${slotName(group, item)}_${field}`;
}

export function parseSlotName(name: string): SlotAddress | undefined {
  const match = SLOT_PATTERN.exec(name);
  if (!match) return undefined;
  const group = Number(match[1]);
  const item = Number(match[2]);
  if (group < 1 || item < 1) return undefined;
  return { group, item };
}

function asText(value: MetricSnapshot[string] | undefined): string | undefined {
  if (value === undefined) return undefined;
  return typeof value === "string" ? value : String(value);
}

function asNumber(value: MetricSnapshot[string] | undefined): number | undefined {
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  if (typeof value === "boolean") return value ? 1 : 0;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

/**
 * Collect the fields published for one slot from a metric snapshot
 */
export function slotValues(metrics: MetricSnapshot, group: number, item: number): SlotValues {
  const values: SlotValues = {};
  const caption = asText(metrics[slotFieldKey(group, item, "caption")]);
  const value = asText(metrics[slotFieldKey(group, item, "value")]);
  const unit = asText(metrics[slotFieldKey(group, item, "unit")]);
  const numericalValue = asNumber(metrics[slotFieldKey(group, item, "numerical_value")]);
  const minLimit = asNumber(metrics[slotFieldKey(group, item, "min_limit")]);
  const maxLimit = asNumber(metrics[slotFieldKey(group, item, "max_limit")]);

  if (caption !== undefined) values.caption = caption;
  if (value !== undefined) values.value = value;
  if (unit !== undefined) values.unit = unit;
  if (numericalValue !== undefined) values.numericalValue = numericalValue;
  if (minLimit !== undefined) values.minLimit = minLimit;
  if (maxLimit !== undefined) values.maxLimit = maxLimit;
  return values;
}

/**
 * Position of the slot's numeric value within its limits, in [0, 1].
 * Limits default to 0..100; undefined when the slot has no numeric value.
 */
export function slotFraction(values: SlotValues): number | undefined {
  if (values.numericalValue === undefined) return undefined;
  const min = values.minLimit ?? 0;
  const max = values.maxLimit ?? 100;
  if (!(max > min)) return 0;
  return Math.min(1, Math.max(0, (values.numericalValue - min) / (max - min)));
}
