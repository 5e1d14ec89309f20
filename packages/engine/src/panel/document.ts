/**
 * Persisted panel document
 *
 *   { "version": 1, "skin": "cyberpunk", "config": { ... } }
 *
 * Reading never fails: a missing or unknown skin becomes the default skin
 * and every config field falls back to that skin's default on its own.
 */

import { isRecord, readString } from "../config/parse.js";
import { DEFAULT_SKIN_ID } from "../skins/registry.js";

export const PANEL_DOCUMENT_VERSION = 1;

export interface PanelDocument {
  version: number;
  skin: string;
  /** Skin config; parsed by the skin when the panel is created */
  config: unknown;
}

export function serializePanelDocument(document: PanelDocument): string {
  return JSON.stringify(document, null, 2);
}

/**
 * Normalize an already-parsed document
 */
export function readPanelDocument(raw: unknown): PanelDocument {
  if (!isRecord(raw)) {
    return { version: PANEL_DOCUMENT_VERSION, skin: DEFAULT_SKIN_ID, config: {} };
  }
  const { version: rawVersion, config } = raw;
  const version = typeof rawVersion === "number" ? rawVersion : PANEL_DOCUMENT_VERSION;
  if (version > PANEL_DOCUMENT_VERSION) {
    console.warn(`[panel-document] Document version ${version} is newer than ${PANEL_DOCUMENT_VERSION}, reading what is known`);
  }
  return {
    version: PANEL_DOCUMENT_VERSION,
    skin: readString(raw, "skin", DEFAULT_SKIN_ID),
    config: isRecord(config) ? config : {},
  };
}

/**
 * Parse document text. Malformed JSON reads as an empty document.
 */
export function decodePanelDocument(text: string): PanelDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    console.warn("[panel-document] Invalid JSON, using defaults:", error instanceof Error ? error.message : error);
    raw = {};
  }
  return readPanelDocument(raw);
}
