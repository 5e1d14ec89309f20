import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { getThemePreset } from "@hudkit/engine";
import {
  applyThemePreset,
  createDocument,
  describePresets,
  describeSkins,
  renderDocument,
  switchDocumentSkin,
  traceDocument,
} from "./commands.js";

describe("commands", () => {
  beforeEach(() => {
    vi.spyOn(console, "debug").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("createDocument", () => {
    it("fills every slot, alternating text and bar", () => {
      const document = createDocument("retro_terminal");
      expect(document.version).toBe(1);
      expect(document.skin).toBe("retro_terminal");
      expect(document.config).toMatchObject({
        contentSlots: {
          group1_1: { displayAs: "text", options: {} },
          group1_2: { displayAs: "bar", options: {} },
          group1_3: { displayAs: "text", options: {} },
          group1_4: { displayAs: "bar", options: {} },
        },
      });
    });

    it("uses one item for groups beyond the configured counts", () => {
      const document = createDocument("cyberpunk", 3);
      expect(document.config).toMatchObject({ groupCount: 3 });
      expect(document.config).toHaveProperty("contentSlots.group3_1");
      expect(document.config).not.toHaveProperty("contentSlots.group1_2");
    });

    it("rejects unknown skins", () => {
      expect(() => createDocument("neon")).toThrow('Unknown skin "neon". Available: cyberpunk, retro_terminal');
    });
  });

  describe("listings", () => {
    it("describes skins", () => {
      expect(describeSkins()).toEqual([
        `${"cyberpunk".padEnd(16)} Cyberpunk HUD`,
        `${"retro_terminal".padEnd(16)} Retro Terminal`,
      ]);
    });

    it("describes presets", () => {
      expect(describePresets()[0]).toBe(`${"cyberpunk".padEnd(16)} Cyberpunk`);
      expect(describePresets()).toContain(`${"retro_amber".padEnd(16)} Retro Amber`);
    });
  });

  describe("applyThemePreset", () => {
    it("replaces the theme and keeps the layout", () => {
      const document = applyThemePreset(createDocument("cyberpunk", 3), "synthwave");
      expect(document.config).toMatchObject({ groupCount: 3, theme: getThemePreset("synthwave")?.theme });
    });

    it("rejects unknown presets", () => {
      expect(() => applyThemePreset(createDocument("cyberpunk"), "pastel")).toThrow('Unknown preset "pastel"');
    });
  });

  describe("switchDocumentSkin", () => {
    it("moves layout and content to the new skin", () => {
      const source = createDocument("cyberpunk", 3);
      const switched = switchDocumentSkin(source, "retro_terminal");

      expect(switched.skin).toBe("retro_terminal");
      expect(switched.config).toMatchObject({
        groupCount: 3,
        dividerWidth: 2,
        theme: getThemePreset("retro_green")?.theme,
      });
      expect(switched.config).toHaveProperty("contentSlots.group3_1");
    });

    it("rejects unknown skins", () => {
      expect(() => switchDocumentSkin(createDocument("cyberpunk"), "neon")).toThrow('Unknown skin "neon"');
    });
  });

  describe("renderDocument", () => {
    const document = createDocument("cyberpunk");

    it("renders one character per pixel", () => {
      const lines = renderDocument(document, { width: 40, height: 20, style: "simple", step: 1, time: 0 }).split("\n");
      expect(lines).toHaveLength(20);
      expect(lines.every((line) => line.length === 40)).toBe(true);
    });

    it("samples with a step", () => {
      const lines = renderDocument(document, { width: 40, height: 20, style: "simple", step: 2, time: 0 }).split("\n");
      expect(lines).toHaveLength(10);
      expect(lines[0]).toHaveLength(20);
    });

    it("supports the boxed and detailed styles", () => {
      const boxed = renderDocument(document, { width: 8, height: 4, style: "box", step: 1, time: 0 }).split("\n");
      expect(boxed[0]).toBe("┌────────┐");
      expect(boxed).toHaveLength(6);

      const detailed = renderDocument(document, { width: 8, height: 4, style: "detailed", step: 1, time: 0 });
      expect(detailed.split("\n")[0]).toBe("8x4");
    });

    it("reports frames that cannot be allocated", () => {
      expect(() =>
        renderDocument(document, { width: 5000, height: 5000, style: "simple", step: 1, time: 0 })
      ).toThrow("Render failed: allocate: 5000x5000 exceeds the 16777216 pixel limit");
    });
  });

  describe("traceDocument", () => {
    it("lists drawing calls and a summary line", () => {
      const lines = traceDocument(createDocument("cyberpunk"), 200, 100);

      expect(lines.some((line) => line.startsWith('drawText "G1.1"'))).toBe(true);
      expect(lines[lines.length - 1]).toMatch(/^# content .+, 2 group\(s\), redraw=false$/);
    });
  });
});
