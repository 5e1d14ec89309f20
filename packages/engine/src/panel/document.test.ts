import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  PANEL_DOCUMENT_VERSION,
  decodePanelDocument,
  readPanelDocument,
  serializePanelDocument,
} from "./document.js";

describe("panel documents", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("serializes with a two-space indent", () => {
    const text = serializePanelDocument({ version: 1, skin: "retro_terminal", config: { groupCount: 2 } });
    expect(text).toBe('{\n  "version": 1,\n  "skin": "retro_terminal",\n  "config": {\n    "groupCount": 2\n  }\n}');
  });

  it("reads a well-formed document", () => {
    const document = decodePanelDocument('{"version":1,"skin":"retro_terminal","config":{"groupCount":3}}');
    expect(document).toEqual({ version: 1, skin: "retro_terminal", config: { groupCount: 3 } });
    expect(console.warn).not.toHaveBeenCalled();
  });

  it("fills in missing fields", () => {
    expect(readPanelDocument({})).toEqual({ version: PANEL_DOCUMENT_VERSION, skin: "cyberpunk", config: {} });
    expect(readPanelDocument({ skin: 7, config: [1, 2] })).toEqual({
      version: PANEL_DOCUMENT_VERSION,
      skin: "cyberpunk",
      config: {},
    });
  });

  it("treats non-objects as empty documents", () => {
    expect(readPanelDocument(null).skin).toBe("cyberpunk");
    expect(readPanelDocument("retro_terminal").config).toEqual({});
  });

  it("falls back to defaults on malformed JSON", () => {
    const document = decodePanelDocument("{ not json");
    expect(document).toEqual({ version: PANEL_DOCUMENT_VERSION, skin: "cyberpunk", config: {} });
    expect(console.warn).toHaveBeenCalledWith("[panel-document] Invalid JSON, using defaults:", expect.any(String));
  });

  it("reads newer documents with a warning", () => {
    const document = decodePanelDocument('{"version":4,"skin":"cyberpunk","config":{"glowIntensity":0.5}}');
    expect(document.version).toBe(PANEL_DOCUMENT_VERSION);
    expect(document.config).toEqual({ glowIntensity: 0.5 });
    expect(console.warn).toHaveBeenCalledWith(
      "[panel-document] Document version 4 is newer than 1, reading what is known"
    );
  });
});
