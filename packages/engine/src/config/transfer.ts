/**
 * Transferable config
 *
 * The layout and content fields that survive a skin switch. Decorative
 * fields (borders, headers, dividers styles) always come from the new
 * skin's defaults.
 */

import type { Orientation } from "@hudkit/core";
import { cloneContentSlots, type ContentItemConfig, type FrameConfigBase } from "./frame-config.js";

export interface TransferableConfig {
  groupCount: number;
  groupItemCounts: number[];
  groupWeights: number[];
  groupItemOrientations: Orientation[];
  splitOrientation: Orientation;
  contentSlots: Record<string, ContentItemConfig>;
  contentPadding: number;
  itemSpacing: number;
  animationEnabled: boolean;
  animationSpeed: number;
}

export function extractTransferable(config: FrameConfigBase): TransferableConfig {
  return {
    groupCount: config.groupCount,
    groupItemCounts: [...config.groupItemCounts],
    groupWeights: [...config.groupWeights],
    groupItemOrientations: [...config.groupItemOrientations],
    splitOrientation: config.splitOrientation,
    contentSlots: cloneContentSlots(config.contentSlots),
    contentPadding: config.contentPadding,
    itemSpacing: config.itemSpacing,
    animationEnabled: config.animationEnabled,
    animationSpeed: config.animationSpeed,
  };
}

/**
 * Copy the transferable fields onto another skin's default config
 */
export function applyTransferable<C extends FrameConfigBase>(defaults: C, transferable: TransferableConfig): C {
  return {
    ...defaults,
    groupCount: transferable.groupCount,
    groupItemCounts: [...transferable.groupItemCounts],
    groupWeights: [...transferable.groupWeights],
    groupItemOrientations: [...transferable.groupItemOrientations],
    splitOrientation: transferable.splitOrientation,
    contentSlots: cloneContentSlots(transferable.contentSlots),
    contentPadding: transferable.contentPadding,
    itemSpacing: transferable.itemSpacing,
    animationEnabled: transferable.animationEnabled,
    animationSpeed: transferable.animationSpeed,
  };
}

/** Whether there is any layout or slot content to carry over */
export function hasTransferableContent(transferable: TransferableConfig): boolean {
  return transferable.groupCount > 0 || Object.keys(transferable.contentSlots).length > 0;
}
