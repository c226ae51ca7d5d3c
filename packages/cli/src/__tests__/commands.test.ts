import { describe, it, expect, vi, afterEach, beforeEach } from "vitest";
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { DEFAULT_CONFIG, loadAssetCatalog } from "@glance/engine";
import { configFrom, createProgram } from "../cli.js";
import { describeIcons, describeLayouts, outputBase, renderSamples, renderSceneFile } from "../commands.js";

const scene = {
  layout: { type: "split_vertical" },
  now: "2025-01-15T10:30:00Z",
  widgets: [
    { type: "text", slot: 0, options: { text: "Hello" } },
    { type: "gauge", slot: 1, entityId: "sensor.cpu", options: { style: "ring" } },
  ],
  entities: { "sensor.cpu": { state: "40" } },
};

afterEach(() => {
  vi.restoreAllMocks();
});

describe("describeLayouts", () => {
  it("lists every layout with its slot sizes", () => {
    const lines = describeLayouts({ width: 240, height: 240 });
    expect(lines).toHaveLength(19);
    expect(lines[0]).toBe(`${"grid_2x2".padEnd(16)}  4 slot(s)  108x108 108x108 108x108 108x108`);
    expect(lines[18]).toBe(`${"fullscreen".padEnd(16)}  1 slot(s)  240x240`);
  });
});

describe("describeIcons", () => {
  const catalog = loadAssetCatalog();

  it("lists icon names", () => {
    const lines = describeIcons(catalog);
    expect(lines).toContain("thermometer");
    expect(lines).not.toContain("temp -> thermometer");
  });

  it("appends aliases on request", () => {
    expect(describeIcons(catalog, true)).toContain("temp -> thermometer");
  });
});

describe("configFrom", () => {
  it("lets flags override the environment", () => {
    const config = configFrom({ theme: "neon", rotation: 90 }, { GLANCE_THEME: "soft", GLANCE_JPEG_QUALITY: "70" });
    expect(config).toMatchObject({ theme: "neon", rotation: 90, jpegQuality: 70 });
  });

  it("keeps environment values for flags that are not given", () => {
    expect(configFrom({}, { GLANCE_THEME: "soft" }).theme).toBe("soft");
    expect(configFrom({}, {})).toEqual(DEFAULT_CONFIG);
  });
});

describe("file commands", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "glance-cli-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("derives output names from the scene", () => {
    expect(outputBase("/scenes/weather.json", "out")).toBe(join("out", "weather"));
  });

  it("renders a scene to JPEG and PNG", async () => {
    writeFileSync(join(dir, "demo.json"), JSON.stringify(scene));
    const result = await renderSceneFile(join(dir, "demo.json"), join(dir, "demo"), DEFAULT_CONFIG, { png: true });

    expect(result.jpegPath).toBe(join(dir, "demo.jpg"));
    expect(result.pngPath).toBe(join(dir, "demo.png"));
    expect(result.failedSlots).toEqual([]);
    const jpeg = readFileSync(result.jpegPath);
    expect(jpeg.length).toBe(result.jpegBytes);
    expect([jpeg[0], jpeg[1]]).toEqual([0xff, 0xd8]);
    expect(readFileSync(join(dir, "demo.png")).subarray(1, 4).toString("ascii")).toBe("PNG");
  });

  it("skips the PNG unless asked", async () => {
    writeFileSync(join(dir, "demo.json"), JSON.stringify(scene));
    const result = await renderSceneFile(join(dir, "demo.json"), join(dir, "demo"), DEFAULT_CONFIG);
    expect(result.pngPath).toBeNull();
    expect(existsSync(join(dir, "demo.png"))).toBe(false);
  });

  it("renders a directory of samples and reports broken scenes", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const scenes = join(dir, "scenes");
    mkdirSync(scenes);
    writeFileSync(join(scenes, "a.json"), JSON.stringify(scene));
    writeFileSync(join(scenes, "b.json"), JSON.stringify({ ...scene, layout: { type: "spiral" } }));
    writeFileSync(join(scenes, "notes.txt"), "not a scene");

    const out = join(dir, "out");
    const result = await renderSamples(scenes, out, DEFAULT_CONFIG);

    expect(result.rendered.map((r) => r.jpegPath)).toEqual([join(out, "a.jpg")]);
    expect(result.failed).toEqual([{ scene: join(scenes, "b.json"), error: 'layout.type: unknown layout type "spiral"' }]);
    expect(existsSync(join(out, "a.png"))).toBe(true);
    expect(error).toHaveBeenCalledWith('[cli] Skipping b.json: layout.type: unknown layout type "spiral"');
  });
});

describe("createProgram", () => {
  it("prints the layout table", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    await createProgram().parseAsync(["layouts"], { from: "user" });
    expect(log).toHaveBeenCalledTimes(19);
    expect(log.mock.calls[4]?.[0]).toBe(`${"hero".padEnd(16)}  4 slot(s)  224x140 69x76 69x76 69x76`);
  });

  it("renders through the render command", async () => {
    const dir = mkdtempSync(join(tmpdir(), "glance-cli-"));
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    try {
      writeFileSync(join(dir, "demo.json"), JSON.stringify(scene));
      await createProgram().parseAsync(["--theme", "retro", "render", join(dir, "demo.json"), "-o", join(dir, "x")], {
        from: "user",
      });
      expect(existsSync(join(dir, "x.jpg"))).toBe(true);
      expect(log.mock.calls[0]?.[0]).toMatch(/^Wrote .*x\.jpg \(\d+ bytes\)$/);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
