/**
 * Command implementations
 *
 * Each command works on documents and returns its output as text, leaving
 * file access and process exit to cli.ts.
 */

import {
  PANEL_DOCUMENT_VERSION,
  RecordingSurface,
  formatDrawCall,
  frameToAscii,
  frameToAsciiDetailed,
  frameToSimpleAscii,
  getSkin,
  getSkinIds,
  getThemePreset,
  getThemePresetIds,
  itemCountFor,
  listSkins,
  normalizeGroupCount,
  panelFromDocument,
  slotName,
  type ContentItemConfig,
  type PanelDocument,
} from "@hudkit/engine";
import { demoMetrics } from "./demo-metrics.js";

export type AsciiStyle = "box" | "detailed" | "simple";

export interface RenderOptions {
  width: number;
  height: number;
  style: AsciiStyle;
  /** Sample every Nth pixel */
  step: number;
  /** Time fed to the demo metrics, in seconds */
  time: number;
}

/**
 * Render a document to ASCII art using demo metrics
 */
export function renderDocument(document: PanelDocument, options: RenderOptions): string {
  const panel = panelFromDocument(document);
  panel.updateMetrics(demoMetrics(panel.config, options.time));
  const result = panel.renderToFrame(options.width, options.height, 0);
  if (!result.ok) {
    throw new Error(`Render failed: ${result.error.message}`);
  }
  if (!result.frame) {
    throw new Error("Render produced no frame");
  }

  const ascii = { step: options.step };
  switch (options.style) {
    case "detailed":
      return frameToAsciiDetailed(result.frame, ascii);
    case "simple":
      return frameToSimpleAscii(result.frame, ascii);
    case "box":
      return frameToAscii(result.frame, ascii);
  }
}

/**
 * Every drawing call of one pass, one per line
 */
export function traceDocument(document: PanelDocument, width: number, height: number): string[] {
  const panel = panelFromDocument(document);
  panel.updateMetrics(demoMetrics(panel.config, 0));
  const surface = new RecordingSurface();
  const result = panel.render(surface, width, height, 0);
  const lines = surface.calls.map(formatDrawCall);
  if (result.ok) {
    const { x, y, w, h } = result.contentRect;
    lines.push(`# content ${x},${y} ${w}x${h}, ${result.groups.length} group(s), redraw=${result.needsRedraw}`);
  }
  return lines;
}

export function describeSkins(): string[] {
  return listSkins().map((skin) => `${skin.id.padEnd(16)} ${skin.name}`);
}

export function describePresets(): string[] {
  return getThemePresetIds().map((id) => {
    const preset = getThemePreset(id);
    return preset ? `${id.padEnd(16)} ${preset.name}` : id;
  });
}

/**
 * Replace the document's theme with a preset
 */
export function applyThemePreset(document: PanelDocument, presetId: string): PanelDocument {
  const preset = getThemePreset(presetId);
  if (!preset) {
    throw new Error(`Unknown preset "${presetId}". Available: ${getThemePresetIds().join(", ")}`);
  }
  const panel = panelFromDocument(document);
  panel.setTheme(preset.theme);
  return panel.toDocument();
}

/**
 * Move the document to another skin, keeping layout and content
 */
export function switchDocumentSkin(document: PanelDocument, skinId: string): PanelDocument {
  if (!getSkin(skinId)) {
    throw new Error(`Unknown skin "${skinId}". Available: ${getSkinIds().join(", ")}`);
  }
  const panel = panelFromDocument(document);
  panel.switchSkin(skinId);
  return panel.toDocument();
}

/**
 * A new document for `skinId`, every slot filled; items alternate text and bar
 */
export function createDocument(skinId: string, groupCount?: number): PanelDocument {
  const skin = getSkin(skinId);
  if (!skin) {
    throw new Error(`Unknown skin "${skinId}". Available: ${getSkinIds().join(", ")}`);
  }

  const config = skin.defaultConfig();
  if (groupCount !== undefined) {
    config.groupCount = normalizeGroupCount(groupCount);
  }

  const slots: Record<string, ContentItemConfig> = {};
  for (let g = 1; g <= config.groupCount; g++) {
    const items = itemCountFor(config.groupItemCounts, g - 1);
    for (let i = 1; i <= items; i++) {
      slots[slotName(g, i)] = { displayAs: i % 2 === 0 ? "bar" : "text", options: {} };
    }
  }
  config.contentSlots = slots;

  return { version: PANEL_DOCUMENT_VERSION, skin: skin.id, config };
}
