/**
 * Value animator
 *
 * Eases each slot's displayed value toward its latest reading. Values are
 * tracked as fractions of the slot's limits so one threshold works for
 * every range.
 */

import type { MetricSnapshot } from "@hudkit/core";
import { parseSlotName, slotFraction, slotValues } from "../config/slots.js";

/** Target changes smaller than this are ignored */
export const TARGET_THRESHOLD = 0.005;
/** Values this close to their target snap onto it */
export const SNAP_THRESHOLD = 0.001;

interface AnimatedValue {
  current: number;
  target: number;
}

export class ValueAnimator {
  private readonly values = new Map<string, AnimatedValue>();

  /**
   * Take new targets from a snapshot for the given slots.
   * Slots not listed, or without a numeric value, are dropped.
   * Returns whether any target changed.
   */
  update(metrics: MetricSnapshot, slots: Iterable<string>, animationEnabled: boolean): boolean {
    let changed = false;
    const seen = new Set<string>();

    for (const slot of slots) {
      const address = parseSlotName(slot);
      if (!address) continue;
      const fraction = slotFraction(slotValues(metrics, address.group, address.item));
      if (fraction === undefined) continue;
      seen.add(slot);

      const existing = this.values.get(slot);
      if (!existing) {
        // First reading shows immediately
        this.values.set(slot, { current: fraction, target: fraction });
        changed = true;
        continue;
      }
      if (Math.abs(fraction - existing.target) <= TARGET_THRESHOLD) continue;

      existing.target = fraction;
      if (!animationEnabled) existing.current = fraction;
      changed = true;
    }

    for (const slot of [...this.values.keys()]) {
      if (!seen.has(slot)) {
        this.values.delete(slot);
        changed = true;
      }
    }

    return changed;
  }

  /**
   * Move every value toward its target.
   * `speed` is the fraction of the remaining distance covered per second.
   * Returns whether any value moved.
   */
  step(elapsedSeconds: number, speed: number): boolean {
    const elapsed = Number.isFinite(elapsedSeconds) && elapsedSeconds > 0 ? elapsedSeconds : 0;
    const factor = Math.min(1, Math.max(0, speed * elapsed));
    let moved = false;

    for (const value of this.values.values()) {
      const diff = value.target - value.current;
      if (diff === 0) continue;
      if (Math.abs(diff) <= SNAP_THRESHOLD) {
        value.current = value.target;
        moved = true;
        continue;
      }
      if (factor === 0) continue;
      value.current += diff * factor;
      if (Math.abs(value.target - value.current) <= SNAP_THRESHOLD) {
        value.current = value.target;
      }
      moved = true;
    }

    return moved;
  }

  /** Jump every value to its target */
  settle(): void {
    for (const value of this.values.values()) {
      value.current = value.target;
    }
  }

  /** Whether any value has not reached its target */
  get animating(): boolean {
    for (const value of this.values.values()) {
      if (value.current !== value.target) return true;
    }
    return false;
  }

  /** Current displayed fraction per slot */
  fractions(): Map<string, number> {
    const out = new Map<string, number>();
    for (const [slot, value] of this.values) {
      out.set(slot, value.current);
    }
    return out;
  }

  clear(): void {
    this.values.clear();
  }
}
