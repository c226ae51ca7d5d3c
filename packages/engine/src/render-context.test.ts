import { describe, it, expect, vi, afterEach } from "vitest";
import { getLogLevel, setLogLevel } from "@glance/core";
import { loadAssetCatalog } from "./asset-catalog.js";
import { COLORS } from "./rendering/palette.js";
import { Renderer } from "./rendering/renderer.js";
import { compareSizeCategory, getSizeCategory, RenderContext } from "./render-context.js";
import { THEME_TEXT_PRIMARY, themeAccent, type Theme } from "./theme.js";

const theme: Theme = {
  name: "test",
  background: { r: 0, g: 0, b: 0 },
  panel: { r: 10, g: 10, b: 10 },
  panelBorder: { r: 20, g: 20, b: 20 },
  textPrimary: { r: 240, g: 240, b: 240 },
  textSecondary: { r: 100, g: 100, b: 100 },
  accents: [{ r: 1, g: 2, b: 3 }],
};

const renderer = new Renderer(loadAssetCatalog());

function context(x1: number, y1: number, x2: number, y2: number): RenderContext {
  return new RenderContext(renderer, renderer.createCanvas(), { x1, y1, x2, y2 }, theme);
}

describe("getSizeCategory", () => {
  it("buckets heights by threshold", () => {
    expect([77, 78, 99, 100, 139, 140, 199, 200].map(getSizeCategory)).toEqual([
      "micro",
      "tiny",
      "tiny",
      "small",
      "small",
      "medium",
      "medium",
      "large",
    ]);
  });

  it("orders categories", () => {
    expect(compareSizeCategory("micro", "large")).toBeLessThan(0);
    expect(compareSizeCategory("medium", "medium")).toBe(0);
  });
});

describe("RenderContext", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("derives size and density flags from its rect", () => {
    const small = context(100, 50, 200, 150);
    expect([small.width, small.height]).toEqual([100, 100]);
    expect(small.sizeCategory).toBe("small");
    expect(small.isCompact).toBe(true);
    expect(small.showSecondary).toBe(false);

    const large = context(0, 0, 240, 224);
    expect(large.isCompact).toBe(false);
    expect(large.showSecondary).toBe(true);
    expect(large.showTertiary).toBe(true);
  });

  it("scales fonts to its own height", () => {
    const ctx = context(0, 0, 100, 100);
    expect(ctx.getFont("primary").size).toBe(70);
    expect(ctx.getFont("primary")).toBe(renderer.getScaledFont("primary", 200));
  });

  it("picks fonts for a target height in logical pixels", () => {
    const ctx = context(0, 0, 100, 100);
    // primary at 200 canvas pixels is 35% of it
    expect(ctx.getFontForHeight(100).size).toBe(70);
    expect(ctx.getFontForHeight(10).size).toBe(22);
    expect(ctx.getFontForHeight(100, true).bold).toBe(true);
  });

  it("fits text in logical pixels", () => {
    const ctx = context(0, 0, 100, 100);
    // "AB" measures 1.1 * size; 55 logical pixels allow size 100
    expect(ctx.fitText("AB", 55, 100).size).toBe(100);
  });

  it("translates local coordinates", () => {
    const ctx = context(100, 50, 200, 150);
    const drawText = vi.spyOn(renderer, "drawText").mockImplementation(() => {});
    const font = ctx.getFont("tiny");
    ctx.drawText("Hi", [10, 5], font, COLORS.white, "mm");
    expect(drawText).toHaveBeenCalledWith(ctx.canvas, "Hi", [110, 55], font, COLORS.white, "mm");
  });

  it("resolves theme colors before drawing", () => {
    const ctx = context(10, 10, 60, 60);
    const drawRect = vi.spyOn(renderer, "drawRect").mockImplementation(() => {});
    ctx.drawRect({ x1: 0, y1: 0, x2: 5, y2: 5 }, { fill: THEME_TEXT_PRIMARY, outline: themeAccent(0) });
    expect(drawRect).toHaveBeenCalledWith(
      ctx.canvas,
      { x1: 10, y1: 10, x2: 15, y2: 15 },
      { fill: theme.textPrimary, outline: { r: 1, g: 2, b: 3 }, width: undefined }
    );
  });

  it("logs out-of-bounds draws and still performs them", () => {
    const level = getLogLevel();
    setLogLevel("debug");
    try {
      const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
      const drawRect = vi.spyOn(renderer, "drawRect").mockImplementation(() => {});
      const ctx = context(0, 0, 100, 100);
      ctx.drawRect({ x1: -5, y1: 0, x2: 10, y2: 10 }, { fill: COLORS.red });
      expect(debug).toHaveBeenCalledWith("[context] rect (-5, 0, 10, 10) is outside 100x100");
      expect(drawRect).toHaveBeenCalledTimes(1);
    } finally {
      setLogLevel(level);
    }
  });

  it("checks bounds inclusively", () => {
    const ctx = context(0, 0, 50, 40);
    expect(ctx.isPointInBounds(50, 40)).toBe(true);
    expect(ctx.isPointInBounds(51, 0)).toBe(false);
    expect(ctx.isRectInBounds({ x1: 0, y1: 0, x2: 50, y2: 40 })).toBe(true);
    expect(ctx.isRectInBounds({ x1: 0, y1: 0, x2: 50, y2: 41 })).toBe(false);
  });
});
