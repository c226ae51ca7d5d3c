/**
 * Tests for color helpers
 */

import { describe, it, expect } from "vitest";
import { blendColor, dimColor, lerpColor, parseColor, rgbEquals, toHex } from "./color.js";

const WHITE = { r: 255, g: 255, b: 255 };
const BLACK = { r: 0, g: 0, b: 0 };
const FALLBACK = { r: 1, g: 2, b: 3 };

describe("dimColor", () => {
  it("truncates toward zero", () => {
    expect(dimColor(WHITE, 0.5)).toEqual({ r: 127, g: 127, b: 127 });
  });

  it("goes to black at factor 0", () => {
    expect(dimColor(WHITE, 0)).toEqual(BLACK);
  });

  it("defaults to 30%", () => {
    // 100 * 0.3 = 30.000000000000004 -> 30, 10 * 0.3 -> 3
    expect(dimColor({ r: 100, g: 10, b: 0 })).toEqual({ r: 30, g: 3, b: 0 });
  });
});

describe("blendColor", () => {
  it("blends halfway with truncation", () => {
    expect(blendColor(BLACK, WHITE, 0.5)).toEqual({ r: 127, g: 127, b: 127 });
  });

  it("returns the endpoints at 0 and 1", () => {
    expect(blendColor(BLACK, WHITE, 0)).toEqual(BLACK);
    expect(blendColor(BLACK, WHITE, 1)).toEqual(WHITE);
  });
});

describe("lerpColor", () => {
  it("rounds and clamps t", () => {
    expect(lerpColor(BLACK, WHITE, 0.5)).toEqual({ r: 128, g: 128, b: 128 });
    expect(lerpColor(BLACK, WHITE, 2)).toEqual(WHITE);
  });
});

describe("parseColor", () => {
  it("accepts a 3-element numeric array", () => {
    expect(parseColor([10, 20, 30], FALLBACK)).toEqual({ r: 10, g: 20, b: 30 });
  });

  it("converts integer strings and truncates floats", () => {
    expect(parseColor(["10", 20.9, "30"], FALLBACK)).toEqual({ r: 10, g: 20, b: 30 });
  });

  it("reads boolean channels as 1 and 0", () => {
    expect(parseColor([true, false, 200], FALLBACK)).toEqual({ r: 1, g: 0, b: 200 });
    expect(parseColor({ r: false, g: true, b: 3 }, FALLBACK)).toEqual({ r: 0, g: 1, b: 3 });
  });

  it("accepts an RGB object", () => {
    expect(parseColor({ r: 5, g: 6, b: 7 }, FALLBACK)).toEqual({ r: 5, g: 6, b: 7 });
  });

  it("returns the fallback for other shapes", () => {
    expect(parseColor(null, FALLBACK)).toBe(FALLBACK);
    expect(parseColor(undefined, FALLBACK)).toBe(FALLBACK);
    expect(parseColor("red", FALLBACK)).toBe(FALLBACK);
    expect(parseColor([1, 2], FALLBACK)).toBe(FALLBACK);
    expect(parseColor([1, 2, 3, 4], FALLBACK)).toBe(FALLBACK);
    expect(parseColor(["a", 2, 3], FALLBACK)).toBe(FALLBACK);
    expect(parseColor(42, FALLBACK)).toBe(FALLBACK);
  });
});

describe("rgbEquals / toHex", () => {
  it("compares channels", () => {
    expect(rgbEquals({ r: 1, g: 2, b: 3 }, { r: 1, g: 2, b: 3 })).toBe(true);
    expect(rgbEquals({ r: 1, g: 2, b: 3 }, { r: 1, g: 2, b: 4 })).toBe(false);
  });

  it("formats hex", () => {
    expect(toHex({ r: 27, g: 158, b: 119 })).toBe("#1b9e77");
  });
});
