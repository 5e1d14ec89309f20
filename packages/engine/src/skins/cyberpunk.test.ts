import { describe, it, expect } from "vitest";
import type { StrokeStyle } from "@hudkit/core";
import { CyberpunkRenderer, defaultCyberpunkConfig, frameMargin, parseCyberpunkConfig, type CyberpunkConfig } from "./cyberpunk.js";
import { RecordingSurface } from "../rendering/recording-surface.js";
import { withTheme } from "../config/frame-config.js";
import { getThemePreset } from "../theme/presets.js";
import { literalColor } from "../theme/theme.js";
import { rgba } from "../theme/color.js";

function config(overrides: Partial<CyberpunkConfig> = {}): CyberpunkConfig {
  return { ...defaultCyberpunkConfig(), glowIntensity: 0, ...overrides };
}

function isStrokeStyle(value: unknown): value is StrokeStyle {
  return typeof value === "object" && value !== null && "width" in value && typeof value.width === "number" && "color" in value;
}

function strokeOf(surface: RecordingSurface, index: number): StrokeStyle | undefined {
  const style = surface.callsOf("strokePath")[index]?.args[1];
  return isStrokeStyle(style) ? style : undefined;
}

describe("CyberpunkRenderer", () => {
  const renderer = new CyberpunkRenderer();

  it("identifies itself", () => {
    expect(renderer.skinId).toBe("cyberpunk");
    expect(renderer.skinName).toBe("Cyberpunk HUD");
  });

  describe("renderFrame", () => {
    it("returns the zero rect and draws nothing below 1px", () => {
      const surface = new RecordingSurface();
      expect(renderer.renderFrame(surface, config(), 0, 100)).toEqual({ x: 0, y: 0, w: 0, h: 0 });
      expect(renderer.renderFrame(surface, config(), 100, 0.5)).toEqual({ x: 0, y: 0, w: 0, h: 0 });
      expect(surface.calls).toHaveLength(0);
    });

    it("draws nothing on panels smaller than the glow margin", () => {
      const surface = new RecordingSurface();
      const rect = renderer.renderFrame(surface, defaultCyberpunkConfig(), 3, 3);
      expect(rect).toEqual({ x: 0, y: 0, w: 0, h: 0 });
      expect(surface.calls).toHaveLength(0);
    });

    it.each([
      [3, 3],
      [14, 14],
      [40, 24],
      [200, 100],
    ])("keeps every rect inside a %ix%i panel", (width, height) => {
      const surface = new RecordingSurface();
      renderer.renderFrame(surface, defaultCyberpunkConfig(), width, height);
      const outside = surface
        .rects()
        .filter((r) => r.x < 0 || r.y < 0 || r.x + r.w > width || r.y + r.h > height);
      expect(outside).toEqual([]);
    });

    it("insets the content rect by border margin and padding", () => {
      const surface = new RecordingSurface();
      const rect = renderer.renderFrame(surface, config(), 200, 100);
      expect(rect).toEqual({ x: 12, y: 12, w: 176, h: 76 });
    });

    it("reserves header height below the frame top", () => {
      const surface = new RecordingSurface();
      const rect = renderer.renderFrame(surface, config({ showHeader: true, headerText: "HUD" }), 200, 100);
      // 18px header font + 16
      expect(rect).toEqual({ x: 12, y: 46, w: 176, h: 42 });
      expect(surface.callsOf("drawText").map((call) => call.args[0])).toEqual(["HUD"]);
    });

    it("leaves room for the glow", () => {
      expect(frameMargin(config({ borderWidth: 2, glowIntensity: 0.5 }))).toBe(6);
    });

    it("strokes four glow passes before the border", () => {
      const surface = new RecordingSurface();
      renderer.renderFrame(surface, config({ glowIntensity: 0.5, showGrid: false }), 200, 100);

      const widths = surface.callsOf("strokePath").map((_, i) => strokeOf(surface, i)?.width);
      expect(widths).toEqual([10, 8, 6, 4, 2]);
    });

    it("balances save/restore and clip push/pop", () => {
      const surface = new RecordingSurface();
      renderer.renderFrame(surface, config({ showHeader: true, headerText: "HUD" }), 200, 100);
      expect(surface.callsOf("save")).toHaveLength(surface.callsOf("restore").length);
      expect(surface.callsOf("pushClip")).toHaveLength(surface.callsOf("popClip").length);
    });

    it("resolves theme colors against the current theme", () => {
      const amber = getThemePreset("retro_amber");
      if (!amber) throw new Error("missing preset");
      const background = literalColor(rgba(0.1, 0.2, 0.3, 1));
      const themed = withTheme(config({ showGrid: false, backgroundColor: background }), amber.theme);

      const surface = new RecordingSurface();
      renderer.renderFrame(surface, themed, 200, 100);

      expect(strokeOf(surface, 0)?.color).toEqual(amber.theme.colors[0]);
      expect(surface.callsOf("fillPath")[0]?.args[1]).toEqual({ kind: "solid", color: rgba(0.1, 0.2, 0.3, 1) });
    });
  });

  describe("drawGroupDividers", () => {
    const groups = [
      { x: 10, y: 10, w: 100, h: 40 },
      { x: 10, y: 59, w: 100, h: 40 },
    ];

    it("centers a line divider in the gap", () => {
      const surface = new RecordingSurface();
      renderer.drawGroupDividers(surface, config(), groups);

      expect(surface.calls).toHaveLength(1);
      expect(surface.calls[0].args[0]).toEqual([
        { op: "move", x: 10, y: 54.5 },
        { op: "line", x: 110, y: 54.5 },
      ]);
    });

    it("draws vertical dividers for horizontal splits", () => {
      const surface = new RecordingSurface();
      renderer.drawGroupDividers(surface, config({ splitOrientation: "horizontal" }), [
        { x: 0, y: 0, w: 50, h: 30 },
        { x: 59, y: 0, w: 50, h: 30 },
      ]);

      expect(surface.calls[0].args[0]).toEqual([
        { op: "move", x: 54.5, y: 0 },
        { op: "line", x: 54.5, y: 30 },
      ]);
    });

    it("does nothing for a single group or style none", () => {
      const surface = new RecordingSurface();
      renderer.drawGroupDividers(surface, config(), [groups[0]]);
      renderer.drawGroupDividers(surface, config({ dividerStyle: "none" }), groups);
      expect(surface.calls).toHaveLength(0);
    });

    it("places a dot every 6px", () => {
      const surface = new RecordingSurface();
      renderer.drawGroupDividers(surface, config({ dividerStyle: "dots" }), [
        { x: 0, y: 0, w: 20, h: 10 },
        { x: 0, y: 19, w: 20, h: 10 },
      ]);
      expect(surface.callsOf("fillArc").map((call) => call.args[0])).toEqual([0, 6, 12, 18]);
    });

    it("dashes the dashed style", () => {
      const surface = new RecordingSurface();
      renderer.drawGroupDividers(surface, config({ dividerStyle: "dashed" }), groups);
      expect(strokeOf(surface, 0)?.dash).toEqual([8, 4]);
    });
  });

  describe("drawItemFrame", () => {
    it("strokes one chamfered outline", () => {
      const surface = new RecordingSurface();
      renderer.drawItemFrame(surface, config(), { x: 0, y: 0, w: 40, h: 20 });
      expect(surface.callsOf("strokePath")).toHaveLength(1);
    });

    it("adds two glow passes when enabled", () => {
      const surface = new RecordingSurface();
      renderer.drawItemFrame(surface, config({ itemGlowEnabled: true }), { x: 0, y: 0, w: 40, h: 20 });
      expect(surface.callsOf("strokePath")).toHaveLength(3);
    });
  });

  describe("parseCyberpunkConfig", () => {
    it("falls back per field", () => {
      const parsed = parseCyberpunkConfig({ cornerStyle: "round", gridSpacing: 1, borderWidth: "thick", headerText: "OPS" });
      expect(parsed.cornerStyle).toBe("chamfer");
      expect(parsed.gridSpacing).toBe(4);
      expect(parsed.borderWidth).toBe(2);
      expect(parsed.headerText).toBe("OPS");
    });

    it("reads a non-object as all defaults", () => {
      expect(parseCyberpunkConfig(null)).toEqual(defaultCyberpunkConfig());
    });
  });
});
