import { describe, it, expect, vi, afterEach } from "vitest";
import { countPixels, createSolidFrame } from "@glance/core";
import { loadAssetCatalog } from "../../asset-catalog.js";
import { IconSet } from "../icons.js";

const BLACK = { r: 0, g: 0, b: 0 };
const WHITE = { r: 255, g: 255, b: 255 };

const set = IconSet.fromJson({
  grid: 10,
  fallback: "box",
  shapes: {
    box: [{ op: "rect", x1: 0, y1: 0, x2: 10, y2: 10, fill: true }],
    half: [{ op: "rect", x1: 0, y1: 0, x2: 5, y2: 10, fill: true }],
  },
  aliases: { square: "box", "half-box": "half" },
});

describe("IconSet", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("resolves names, aliases and prefixes", () => {
    expect(set.resolve("box")).toEqual({ name: "box", fallback: false });
    expect(set.resolve("mdi:Square")).toEqual({ name: "box", fallback: false });
    expect(set.resolve("half_box")).toEqual({ name: "half", fallback: false });
    expect(set.resolve("rocket")).toEqual({ name: "box", fallback: true });
    expect(set.isKnown("rocket")).toBe(false);
  });

  it("lists canonical names and aliases", () => {
    expect(set.names).toEqual(["box", "half"]);
    expect(set.aliasNames).toEqual(["half-box", "square"]);
  });

  it("scales shapes from the design grid", () => {
    const frame = createSolidFrame(30, 30, BLACK);
    set.draw(frame, "half", 5, 5, 20, WHITE);
    expect(countPixels(frame, WHITE)).toBe(200);
  });

  it("draws the fallback for unknown names", () => {
    const frame = createSolidFrame(30, 30, BLACK);
    set.draw(frame, "rocket", 0, 0, 20, WHITE);
    expect(countPixels(frame, WHITE)).toBe(400);
  });

  it("ignores empty sizes", () => {
    const frame = createSolidFrame(10, 10, BLACK);
    set.draw(frame, "box", 0, 0, 0, WHITE);
    expect(countPixels(frame, WHITE)).toBe(0);
  });

  it("rejects a catalog without its fallback", () => {
    expect(() => IconSet.fromJson({ fallback: "nope", shapes: {} })).toThrow('fallback icon "nope" has no shape');
  });

  it("rejects unknown shape ops", () => {
    expect(() => IconSet.fromJson({ fallback: "x", shapes: { x: [{ op: "star" }] } })).toThrow("unknown icon shape op: star");
  });

  describe("bundled catalog", () => {
    const icons = loadAssetCatalog().icons;

    it("knows the common dashboard icons", () => {
      for (const name of ["thermometer", "temp", "cpu", "mdi:home", "arrow_up", "weather-sunny", "warning", "check"]) {
        expect(icons.isKnown(name)).toBe(true);
      }
      expect(icons.resolve("temp").name).toBe("thermometer");
    });

    it("draws every icon inside its box", () => {
      for (const name of icons.names) {
        const frame = createSolidFrame(64, 64, BLACK);
        icons.draw(frame, name, 16, 16, 32, WHITE);
        const inked = countPixels(frame, WHITE);
        expect(inked).toBeGreaterThan(0);
        // Nothing in the outer 8px ring around the icon box
        for (let y = 0; y < 64; y++) {
          for (let x = 0; x < 64; x++) {
            if (x >= 8 && x < 56 && y >= 8 && y < 56) continue;
            expect(frame.pixels[(y * 64 + x) * 3]).toBe(0);
          }
        }
      }
    });
  });
});
