import { describe, it, expect } from "vitest";
import {
  BYTES_PER_PIXEL,
  blendPixel,
  createSolidFrame,
  decodeFrame,
  encodeFrame,
  fillFrame,
  getPixel,
  pixelOffset,
  setPixel,
} from "./frame.js";
import { SurfaceError, isSurfaceError } from "./errors.js";

describe("createSolidFrame", () => {
  it("allocates width * height RGB pixels", () => {
    const frame = createSolidFrame(4, 3);
    expect(frame.pixels.length).toBe(4 * 3 * BYTES_PER_PIXEL);
    expect(frame.width).toBe(4);
    expect(frame.height).toBe(3);
  });

  it("fills every pixel with the given color", () => {
    const frame = createSolidFrame(2, 2, { r: 10, g: 20, b: 30 });
    expect(getPixel(frame, 1, 1)).toEqual({ r: 10, g: 20, b: 30 });
    expect(getPixel(frame, 0, 0)).toEqual({ r: 10, g: 20, b: 30 });
  });
});

describe("setPixel / getPixel", () => {
  it("writes and reads back a pixel", () => {
    const frame = createSolidFrame(8, 8);
    setPixel(frame, 3, 5, { r: 255, g: 128, b: 1 });
    expect(getPixel(frame, 3, 5)).toEqual({ r: 255, g: 128, b: 1 });
    expect(getPixel(frame, 5, 3)).toEqual({ r: 0, g: 0, b: 0 });
  });

  it("ignores out of bounds writes", () => {
    const frame = createSolidFrame(2, 2);
    setPixel(frame, -1, 0, { r: 255, g: 255, b: 255 });
    setPixel(frame, 2, 0, { r: 255, g: 255, b: 255 });
    expect(Array.from(frame.pixels)).toEqual(new Array(12).fill(0));
  });

  it("returns null out of bounds", () => {
    const frame = createSolidFrame(2, 2);
    expect(getPixel(frame, 2, 2)).toBeNull();
  });
});

describe("blendPixel", () => {
  it("mixes half way at alpha 0.5", () => {
    const frame = createSolidFrame(1, 1, { r: 0, g: 100, b: 200 });
    blendPixel(frame, 0, 0, { r: 200, g: 100, b: 0 }, 0.5);
    expect(getPixel(frame, 0, 0)).toEqual({ r: 100, g: 100, b: 100 });
  });

  it("replaces the pixel at alpha 1 and clamps higher values", () => {
    const frame = createSolidFrame(1, 1);
    blendPixel(frame, 0, 0, { r: 9, g: 8, b: 7 }, 3);
    expect(getPixel(frame, 0, 0)).toEqual({ r: 9, g: 8, b: 7 });
  });

  it("leaves the pixel alone at alpha 0", () => {
    const frame = createSolidFrame(1, 1, { r: 1, g: 2, b: 3 });
    blendPixel(frame, 0, 0, { r: 255, g: 255, b: 255 }, 0);
    expect(getPixel(frame, 0, 0)).toEqual({ r: 1, g: 2, b: 3 });
  });
});

describe("fillFrame", () => {
  it("overwrites every pixel", () => {
    const frame = createSolidFrame(2, 1, { r: 9, g: 9, b: 9 });
    fillFrame(frame, { r: 1, g: 2, b: 3 });
    expect(Array.from(frame.pixels)).toEqual([1, 2, 3, 1, 2, 3]);
  });
});

describe("pixelOffset", () => {
  it("addresses row-major RGB triples", () => {
    const frame = createSolidFrame(4, 3);
    expect(pixelOffset(frame, 1, 2)).toBe(27);
  });

  it("rejects fractional and out of range coordinates", () => {
    const frame = createSolidFrame(4, 3);
    expect(pixelOffset(frame, 0.5, 0)).toBe(-1);
    expect(pixelOffset(frame, 4, 0)).toBe(-1);
    expect(pixelOffset(frame, 0, -1)).toBe(-1);
  });
});

describe("base64 encoding", () => {
  it("round trips pixel bytes", () => {
    const frame = createSolidFrame(2, 1, { r: 1, g: 2, b: 3 });
    const encoded = encodeFrame(frame);
    expect(encoded).toBe("AQIDAQID");
    const decoded = decodeFrame(encoded, 2, 1);
    expect(Array.from(decoded.pixels)).toEqual([1, 2, 3, 1, 2, 3]);
  });

  it("rejects byte counts that do not match the size", () => {
    expect(() => decodeFrame("AQID", 2, 1)).toThrow(new RangeError("Expected 6 bytes for a 2x1 frame, got 3"));
  });
});

describe("SurfaceError", () => {
  it("prefixes the message with the operation", () => {
    const error = new SurfaceError("allocate", "out of memory");
    expect(error.message).toBe("allocate: out of memory");
    expect(error.name).toBe("SurfaceError");
    expect(error.operation).toBe("allocate");
    expect(isSurfaceError(error)).toBe(true);
    expect(isSurfaceError(new Error("x"))).toBe(false);
  });
});
