import { describe, it, expect } from "vitest";
import { resolveColor, resolveFont, resolveGradient, sampleGradient } from "./resolve.js";
import { FALLBACK_COLOR, rgba } from "./color.js";
import { FALLBACK_FONT, literalColor, literalFont, themeColor, themeFont, type Theme } from "./theme.js";
import { defaultTheme, getThemePreset, getThemePresetIds } from "./presets.js";

const RED = rgba(1, 0, 0);
const GREEN = rgba(0, 1, 0);
const BLUE = rgba(0, 0, 1);

function testTheme(): Theme {
  return {
    colors: [RED, GREEN, BLUE, rgba(1, 1, 1, 0.5)],
    fonts: [
      { family: "Display", size: 18 },
      { family: "Body", size: 11 },
    ],
    gradient: {
      angle: 45,
      stops: [
        { position: 0, color: themeColor(1) },
        { position: 1, color: literalColor(BLUE) },
      ],
    },
  };
}

describe("resolveColor", () => {
  it("returns literal colors unchanged", () => {
    const color = rgba(0.1, 0.2, 0.3, 0.4);
    expect(resolveColor(literalColor(color), testTheme())).toEqual(color);
  });

  it("looks up theme colors by 1-based index", () => {
    expect(resolveColor(themeColor(1), testTheme())).toEqual(RED);
    expect(resolveColor(themeColor(4), testTheme())).toEqual(rgba(1, 1, 1, 0.5));
  });

  it("applies an alpha override", () => {
    expect(resolveColor(themeColor(2, 0.25), testTheme())).toEqual(rgba(0, 1, 0, 0.25));
  });

  it("falls back for out of range indices", () => {
    expect(resolveColor(themeColor(99), testTheme())).toEqual(FALLBACK_COLOR);
    expect(resolveColor(themeColor(0), testTheme())).toEqual(FALLBACK_COLOR);
    expect(resolveColor(themeColor(-3), defaultTheme())).toEqual(FALLBACK_COLOR);
    expect(resolveColor(themeColor(1.5), testTheme())).toEqual(FALLBACK_COLOR);
  });

  it("returns the fallback for index 99 with every preset", () => {
    for (const id of getThemePresetIds()) {
      const preset = getThemePreset(id);
      expect(preset).toBeDefined();
      if (preset) {
        expect(resolveColor(themeColor(99), preset.theme)).toEqual({ r: 0.5, g: 0.5, b: 0.5, a: 1 });
      }
    }
  });
});

describe("resolveFont", () => {
  it("resolves literal fonts", () => {
    expect(resolveFont(literalFont("Mono", 9), testTheme())).toEqual({ family: "Mono", size: 9 });
  });

  it("uses the theme size unless overridden", () => {
    expect(resolveFont(themeFont(1), testTheme())).toEqual({ family: "Display", size: 18 });
    expect(resolveFont(themeFont(2, 20), testTheme())).toEqual({ family: "Body", size: 20 });
  });

  it("falls back for invalid slots", () => {
    expect(resolveFont(themeFont(3), testTheme())).toEqual(FALLBACK_FONT);
    expect(resolveFont(themeFont(0, 40), testTheme())).toEqual({ family: "monospace", size: 12 });
  });
});

describe("resolveGradient", () => {
  it("resolves each stop in declaration order", () => {
    const theme = testTheme();
    expect(resolveGradient(theme.gradient, theme)).toEqual({
      angle: 45,
      stops: [
        { position: 0, color: RED },
        { position: 1, color: BLUE },
      ],
    });
  });
});

describe("sampleGradient", () => {
  const stops = [
    { position: 0, color: RED },
    { position: 0.5, color: GREEN },
    { position: 1, color: BLUE },
  ];

  it("returns the exact end colors", () => {
    expect(sampleGradient(stops, 0)).toEqual(RED);
    expect(sampleGradient(stops, 1)).toEqual(BLUE);
  });

  it("interpolates the channel-wise midpoint", () => {
    expect(sampleGradient(stops, 0.25)).toEqual({ r: 0.5, g: 0.5, b: 0, a: 1 });
  });

  it("clamps positions outside [0, 1]", () => {
    expect(sampleGradient(stops, -2)).toEqual(RED);
    expect(sampleGradient(stops, 7)).toEqual(BLUE);
  });

  it("sorts stops declared out of order", () => {
    const shuffled = [stops[2], stops[0], stops[1]];
    expect(sampleGradient(shuffled, 0.75)).toEqual({ r: 0, g: 0.5, b: 0.5, a: 1 });
  });

  it("returns the exact color beyond the outer stops", () => {
    const inner = [
      { position: 0.2, color: RED },
      { position: 0.8, color: BLUE },
    ];
    expect(sampleGradient(inner, 0.1)).toEqual(RED);
    expect(sampleGradient(inner, 0.9)).toEqual(BLUE);
  });

  it("handles single and empty stop lists", () => {
    expect(sampleGradient([{ position: 0.3, color: GREEN }], 0.9)).toEqual(GREEN);
    expect(sampleGradient([], 0.5)).toEqual(FALLBACK_COLOR);
  });

  it("makes a hard edge at duplicate positions", () => {
    const edge = [
      { position: 0, color: RED },
      { position: 0.5, color: RED },
      { position: 0.5, color: BLUE },
      { position: 1, color: BLUE },
    ];
    expect(sampleGradient(edge, 0.49)).toEqual(RED);
    expect(sampleGradient(edge, 0.51)).toEqual(BLUE);
  });
});

describe("theme presets", () => {
  it("returns undefined for unknown ids", () => {
    expect(getThemePreset("nope")).toBeUndefined();
  });

  it("returns independent copies", () => {
    const a = getThemePreset("synthwave");
    const b = getThemePreset("synthwave");
    expect(a?.theme).toEqual(b?.theme);
    if (a) a.theme.colors[0].r = 0;
    expect(b?.theme.colors[0].r).toBe(1);
  });
});
