import { describe, it, expect, vi, afterEach } from "vitest";
import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadAssetCatalog, loadFontFaces } from "./asset-catalog.js";
import { parseEntityStateTables } from "./entity-states.js";

function tempFile(name: string, content: string): string {
  const dir = mkdtempSync(join(tmpdir(), "glance-assets-"));
  const path = join(dir, name);
  writeFileSync(path, content);
  return path;
}

describe("loadAssetCatalog", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("loads the bundled fonts, icons and themes", () => {
    const catalog = loadAssetCatalog();
    expect(catalog.fonts.faces.map((face) => face.name)).toEqual(["glance-5x7"]);
    expect(catalog.icons.isKnown("thermometer")).toBe(true);
    expect(catalog.defaultTheme.name).toBe("classic");
    expect(catalog.themeNames).toContain("neon");
    expect(catalog.entityStates.binarySensor.door).toEqual(["Open", "Closed"]);
    expect(catalog.entityStates.domainIcons.light).toBe("lightbulb");
  });

  it("falls back to the default theme for unknown names", () => {
    const catalog = loadAssetCatalog();
    expect(catalog.theme("neon").name).toBe("neon");
    expect(catalog.theme("does-not-exist").name).toBe("classic");
    expect(catalog.theme().name).toBe("classic");
    expect(catalog.hasTheme("does-not-exist")).toBe(false);
  });

  it("puts extra fonts ahead of the bundled face", () => {
    const path = tempFile("extra.json", JSON.stringify({ name: "extra", ascent: 1, descent: 1, glyphs: { A: ["#", "."] } }));
    const catalog = loadAssetCatalog({ fontPaths: [path] });
    expect(catalog.fonts.faces.map((face) => face.name)).toEqual(["extra", "glance-5x7"]);
    expect(catalog.fonts.resolve("A").face.name).toBe("extra");
    expect(catalog.fonts.resolve("B").face.name).toBe("glance-5x7");
  });
});

describe("loadFontFaces", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("skips files that do not parse", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const broken = tempFile("broken.json", "{ not json");
    const good = tempFile("good.json", JSON.stringify({ name: "good", ascent: 1, descent: 1, glyphs: {} }));

    const faces = loadFontFaces([broken, join(tmpdir(), "glance-missing-font.json"), good]);
    expect(faces.map((face) => face.name)).toEqual(["good"]);
    expect(warn).toHaveBeenCalledTimes(2);
  });
});

describe("parseEntityStateTables", () => {
  it("keeps only well-formed entries", () => {
    const tables = parseEntityStateTables({
      binarySensor: { door: ["Open", "Closed"], bad: ["only one"] },
      domainIcons: { light: "lightbulb" },
      deviceClassIcons: { temperature: 5, humidity: "water-percent" },
    });
    expect(tables).toEqual({
      binarySensor: { door: ["Open", "Closed"] },
      deviceClassIcons: { humidity: "water-percent" },
      domainIcons: { light: "lightbulb" },
    });
  });

  it("gives empty tables for a document that is not an object", () => {
    expect(parseEntityStateTables(null)).toEqual({ binarySensor: {}, deviceClassIcons: {}, domainIcons: {} });
  });
});
