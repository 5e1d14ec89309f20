import { describe, it, expect, vi, afterEach } from "vitest";
import { RecordingSurface } from "../rendering/recording-surface.js";
import { getThemePreset } from "../theme/presets.js";
import { DEFAULT_SKIN_ID, getSkin, getSkinIds, listSkins, resolveSkin } from "./registry.js";

describe("skin registry", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("lists the built-in skins", () => {
    expect(getSkinIds()).toEqual(["cyberpunk", "retro_terminal"]);
    expect(listSkins()).toEqual([
      { id: "cyberpunk", name: "Cyberpunk HUD" },
      { id: "retro_terminal", name: "Retro Terminal" },
    ]);
    expect(DEFAULT_SKIN_ID).toBe("cyberpunk");
  });

  it("returns undefined for unknown ids and resolves them to the default", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    expect(getSkin("neon")).toBeUndefined();
    expect(resolveSkin("neon").id).toBe("cyberpunk");
    expect(warn).toHaveBeenCalledWith('[registry] Unknown skin "neon", using cyberpunk');
  });

  it("binds independent configs", () => {
    const skin = resolveSkin("retro_terminal");
    const a = skin.bind();
    const b = skin.bind({ groupCount: 3 });

    expect(a.config.groupCount).toEqual(skin.defaultConfig().groupCount);
    expect(b.config.groupCount).toBe(3);
    expect(a.config).not.toBe(b.config);
  });

  it("replaces the theme of a binding only", () => {
    const skin = resolveSkin("cyberpunk");
    const a = skin.bind();
    const b = skin.bind();
    const amber = getThemePreset("retro_amber");
    if (!amber) throw new Error("missing preset");

    a.setTheme(amber.theme);
    expect(a.config.theme).toEqual(amber.theme);
    expect(b.config.theme).toEqual(skin.defaultConfig().theme);
  });

  it("composes through the bound renderer", () => {
    vi.spyOn(console, "debug").mockImplementation(() => {});
    const binding = resolveSkin("cyberpunk").bind();
    const result = binding.compose({
      surface: new RecordingSurface(),
      width: 200,
      height: 100,
      elapsedSeconds: 0,
      metrics: {},
    });

    expect(result.ok).toBe(true);
    if (result.ok) expect(result.groups).toHaveLength(2);
  });
});
