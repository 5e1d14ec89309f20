import { describe, it, expect } from "vitest";
import { SurfaceError, getPixel, solid } from "@hudkit/core";
import { RasterSurface } from "./raster-surface.js";
import { rgba } from "../theme/color.js";
import { linePath } from "./shapes.js";

const RED = rgba(1, 0, 0);
const WHITE = rgba(1, 1, 1);
const BLACK_RGB = { r: 0, g: 0, b: 0 };
const WHITE_RGB = { r: 255, g: 255, b: 255 };

describe("RasterSurface", () => {
  describe("allocation", () => {
    it("starts filled with the background color", () => {
      const surface = new RasterSurface(3, 2, { background: rgba(0, 0, 1) });
      expect(getPixel(surface.frame, 2, 1)).toEqual({ r: 0, g: 0, b: 255 });
    });

    it("allows an empty frame", () => {
      const surface = new RasterSurface(0, 0);
      expect(surface.frame.pixels.length).toBe(0);
    });

    it("rejects negative or fractional sizes", () => {
      expect(() => new RasterSurface(-1, 4)).toThrow(SurfaceError);
      expect(() => new RasterSurface(2.5, 4)).toThrow("allocate: invalid frame size 2.5x4");
    });

    it("rejects frames above the pixel limit", () => {
      expect(() => new RasterSurface(10, 10, { maxPixels: 50 })).toThrow(SurfaceError);
    });
  });

  describe("fillRect", () => {
    it("fills pixels whose centers fall inside the rect", () => {
      const surface = new RasterSurface(4, 4);
      surface.fillRect({ x: 1, y: 1, w: 2, h: 2 }, solid(RED));

      expect(getPixel(surface.frame, 1, 1)).toEqual({ r: 255, g: 0, b: 0 });
      expect(getPixel(surface.frame, 2, 2)).toEqual({ r: 255, g: 0, b: 0 });
      expect(getPixel(surface.frame, 0, 0)).toEqual(BLACK_RGB);
      expect(getPixel(surface.frame, 3, 3)).toEqual(BLACK_RGB);
    });

    it("blends translucent paint over the existing pixel", () => {
      const surface = new RasterSurface(1, 1, { background: WHITE });
      surface.fillRect({ x: 0, y: 0, w: 1, h: 1 }, solid(rgba(0, 0, 0, 0.5)));
      expect(getPixel(surface.frame, 0, 0)).toEqual({ r: 128, g: 128, b: 128 });
    });

    it("samples a linear gradient at pixel centers", () => {
      const surface = new RasterSurface(4, 1);
      surface.fillRect(
        { x: 0, y: 0, w: 4, h: 1 },
        {
          kind: "linear",
          x0: 0,
          y0: 0,
          x1: 4,
          y1: 0,
          stops: [
            { position: 0, color: rgba(0, 0, 0) },
            { position: 1, color: WHITE },
          ],
        }
      );

      const reds = [0, 1, 2, 3].map((x) => getPixel(surface.frame, x, 0)?.r);
      expect(reds).toEqual([32, 96, 159, 223]);
    });
  });

  describe("clip and transform", () => {
    it("limits drawing to the clip rect until popped", () => {
      const surface = new RasterSurface(4, 1);
      surface.pushClip({ x: 0, y: 0, w: 2, h: 1 });
      surface.fillRect({ x: 0, y: 0, w: 4, h: 1 }, solid(RED));
      surface.popClip();

      expect(getPixel(surface.frame, 1, 0)).toEqual({ r: 255, g: 0, b: 0 });
      expect(getPixel(surface.frame, 2, 0)).toEqual(BLACK_RGB);

      surface.fillRect({ x: 3, y: 0, w: 1, h: 1 }, solid(WHITE));
      expect(getPixel(surface.frame, 3, 0)).toEqual(WHITE_RGB);
    });

    it("intersects nested clips", () => {
      const surface = new RasterSurface(4, 1);
      surface.pushClip({ x: 0, y: 0, w: 3, h: 1 });
      surface.pushClip({ x: 2, y: 0, w: 2, h: 1 });
      surface.fillRect({ x: 0, y: 0, w: 4, h: 1 }, solid(RED));

      expect(getPixel(surface.frame, 1, 0)).toEqual(BLACK_RGB);
      expect(getPixel(surface.frame, 2, 0)).toEqual({ r: 255, g: 0, b: 0 });
      expect(getPixel(surface.frame, 3, 0)).toEqual(BLACK_RGB);
    });

    it("restores translation and clip depth", () => {
      const surface = new RasterSurface(4, 4);
      surface.save();
      surface.translate(2, 2);
      surface.pushClip({ x: 0, y: 0, w: 1, h: 1 });
      surface.fillRect({ x: 0, y: 0, w: 2, h: 2 }, solid(RED));
      surface.restore();
      surface.fillRect({ x: 0, y: 0, w: 1, h: 1 }, solid(WHITE));

      expect(getPixel(surface.frame, 2, 2)).toEqual({ r: 255, g: 0, b: 0 });
      expect(getPixel(surface.frame, 3, 3)).toEqual(BLACK_RGB);
      expect(getPixel(surface.frame, 0, 0)).toEqual(WHITE_RGB);
    });

    it("ignores restore without a matching save", () => {
      const surface = new RasterSurface(2, 2);
      surface.restore();
      surface.fillRect({ x: 0, y: 0, w: 1, h: 1 }, solid(RED));
      expect(getPixel(surface.frame, 0, 0)).toEqual({ r: 255, g: 0, b: 0 });
    });
  });

  describe("strokes", () => {
    it("draws a 1px line on the row its band covers", () => {
      const surface = new RasterSurface(10, 5);
      surface.strokePath(linePath(0, 2.5, 10, 2.5), { color: WHITE, width: 1 });

      expect(getPixel(surface.frame, 0, 2)).toEqual(WHITE_RGB);
      expect(getPixel(surface.frame, 9, 2)).toEqual(WHITE_RGB);
      expect(getPixel(surface.frame, 5, 1)).toEqual(BLACK_RGB);
      expect(getPixel(surface.frame, 5, 3)).toEqual(BLACK_RGB);
    });

    it("leaves gaps for a dash pattern", () => {
      const surface = new RasterSurface(12, 5);
      surface.strokePath(linePath(0, 2.5, 10, 2.5), { color: WHITE, width: 1, dash: [2, 2] });

      expect(getPixel(surface.frame, 0, 2)).toEqual(WHITE_RGB);
      expect(getPixel(surface.frame, 2, 2)).toEqual(BLACK_RGB);
      expect(getPixel(surface.frame, 4, 2)).toEqual(WHITE_RGB);
      expect(getPixel(surface.frame, 6, 2)).toEqual(BLACK_RGB);
      expect(getPixel(surface.frame, 8, 2)).toEqual(WHITE_RGB);
    });

    it("draws hairlines at 1px with reduced alpha", () => {
      const surface = new RasterSurface(10, 5);
      surface.strokePath(linePath(0, 2.5, 10, 2.5), { color: WHITE, width: 0.5 });
      expect(getPixel(surface.frame, 4, 2)).toEqual({ r: 128, g: 128, b: 128 });
    });

    it("draws nothing for a zero width", () => {
      const surface = new RasterSurface(10, 5);
      surface.strokePath(linePath(0, 2.5, 10, 2.5), { color: WHITE, width: 0 });
      expect(surface.frame.pixels.every((v) => v === 0)).toBe(true);
    });
  });

  describe("paths and arcs", () => {
    it("fills a closed triangle", () => {
      const surface = new RasterSurface(10, 10);
      surface.fillPath(
        [
          { op: "move", x: 0, y: 0 },
          { op: "line", x: 10, y: 0 },
          { op: "line", x: 0, y: 10 },
          { op: "close" },
        ],
        solid(RED)
      );

      expect(getPixel(surface.frame, 1, 1)).toEqual({ r: 255, g: 0, b: 0 });
      expect(getPixel(surface.frame, 8, 8)).toEqual(BLACK_RGB);
    });

    it("fills a full circle around its center", () => {
      const surface = new RasterSurface(10, 10);
      surface.fillArc(5, 5, 3, 0, Math.PI * 2, solid(WHITE));

      expect(getPixel(surface.frame, 5, 5)).toEqual(WHITE_RGB);
      expect(getPixel(surface.frame, 4, 4)).toEqual(WHITE_RGB);
      expect(getPixel(surface.frame, 0, 0)).toEqual(BLACK_RGB);
      expect(getPixel(surface.frame, 9, 5)).toEqual(BLACK_RGB);
    });
  });

  describe("text", () => {
    it("draws bitmap glyphs at scale 1", () => {
      const surface = new RasterSurface(6, 7);
      surface.drawText("1", 1, 1, { family: "mono", size: 6, color: WHITE });

      expect(getPixel(surface.frame, 2, 1)).toEqual(WHITE_RGB);
      expect(getPixel(surface.frame, 1, 1)).toEqual(BLACK_RGB);
      expect(getPixel(surface.frame, 1, 2)).toEqual(WHITE_RGB);
      expect(getPixel(surface.frame, 3, 5)).toEqual(WHITE_RGB);
    });

    it("scales glyphs with the font size", () => {
      const surface = new RasterSurface(8, 10);
      surface.drawText("1", 0, 0, { family: "mono", size: 12, color: WHITE });

      expect(getPixel(surface.frame, 0, 0)).toEqual(BLACK_RGB);
      expect(getPixel(surface.frame, 2, 0)).toEqual(WHITE_RGB);
      expect(getPixel(surface.frame, 3, 1)).toEqual(WHITE_RGB);
      expect(getPixel(surface.frame, 4, 0)).toEqual(BLACK_RGB);
    });

    it("thickens bold glyphs by one pixel", () => {
      const surface = new RasterSurface(6, 5);
      surface.drawText("1", 0, 0, { family: "mono", size: 6, weight: "bold", color: WHITE });

      expect(getPixel(surface.frame, 2, 0)).toEqual(WHITE_RGB);
      expect(getPixel(surface.frame, 3, 4)).toEqual(WHITE_RGB);
      expect(getPixel(surface.frame, 0, 0)).toEqual(BLACK_RGB);
    });

    it("caches each scaled glyph once", () => {
      const surface = new RasterSurface(16, 5);
      surface.drawText("11", 0, 0, { family: "mono", size: 6, color: WHITE });

      expect(surface.glyphCache.size).toBe(1);
      expect(surface.glyphCache.misses).toBe(1);
      expect(surface.glyphCache.hits).toBe(1);
    });

    it("keeps the glyph cache within its capacity", () => {
      const surface = new RasterSurface(64, 5, { glyphCacheSize: 2 });
      surface.drawText("ABC", 0, 0, { family: "mono", size: 6, color: WHITE });
      expect(surface.glyphCache.size).toBe(2);
      expect(surface.glyphCache.has("A:1")).toBe(false);
    });

    it("measures text from the bitmap metrics", () => {
      const surface = new RasterSurface(1, 1);
      expect(surface.measureText("11", { family: "mono", size: 12 })).toEqual({ width: 14, height: 10 });
    });
  });
});
