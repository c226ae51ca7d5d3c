import { describe, it, expect, vi, afterEach } from "vitest";
import { getPixel, type RGB } from "@glance/core";
import { loadAssetCatalog } from "../../asset-catalog.js";
import { panel } from "../../components/components.js";
import { Renderer } from "../../rendering/renderer.js";
import type { Theme } from "../../theme.js";
import { DRAWN, emptyWidgetState, tree, type Widget, type WidgetConfig, type WidgetState } from "../../widgets/types.js";
import { createLayout } from "../layout.js";

const RED: RGB = { r: 255, g: 0, b: 0 };
const GREEN: RGB = { r: 0, g: 255, b: 0 };

const THEME: Theme = {
  name: "test",
  background: { r: 1, g: 2, b: 3 },
  panel: { r: 20, g: 20, b: 20 },
  panelBorder: { r: 40, g: 40, b: 40 },
  textPrimary: { r: 255, g: 255, b: 255 },
  textSecondary: { r: 128, g: 128, b: 128 },
  accents: [{ r: 0, g: 200, b: 255 }],
};

function fakeWidget(slot: number, render: Widget["render"], entityIds: string[] = []): Widget {
  const config: WidgetConfig = { type: "text", slot, options: {} };
  return { config, entityIds: () => entityIds, render };
}

const fillSlot: Widget["render"] = (ctx) => {
  ctx.drawRect({ x1: 0, y1: 0, x2: ctx.width, y2: ctx.height }, { fill: RED });
  return DRAWN;
};

describe("Layout", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("starts with empty slots", () => {
    const layout = createLayout("grid_2x2");
    expect(layout.slotCount).toBe(4);
    expect(layout.isEmpty).toBe(true);
    expect(layout.getSlot(4)).toBeNull();
    expect(layout.getSlot(-1)).toBeNull();
  });

  it("places widgets idempotently and ignores bad indices", () => {
    const layout = createLayout("grid_2x2");
    const widget = fakeWidget(1, fillSlot);
    layout.setWidget(1, widget);
    layout.setWidget(1, widget);
    layout.setWidget(9, widget);
    layout.setWidget(-1, widget);
    layout.setWidget(0.5, widget);

    expect(layout.slots.map((slot) => slot.widget)).toEqual([null, widget, null, null]);
    expect(layout.isEmpty).toBe(false);
  });

  it("collects entity ids from every widget", () => {
    const layout = createLayout("split_horizontal");
    layout.setWidget(0, fakeWidget(0, fillSlot, ["sensor.a"]));
    layout.setWidget(1, fakeWidget(1, fillSlot, ["sensor.b", "sensor.c"]));
    expect(layout.getAllEntities()).toEqual(["sensor.a", "sensor.b", "sensor.c"]);
  });

  describe("render", () => {
    const catalog = loadAssetCatalog();

    it("keeps each widget inside its slot", () => {
      const renderer = new Renderer(catalog);
      const canvas = renderer.createCanvas(THEME.background);
      const layout = createLayout("grid_2x2");
      layout.setWidget(0, fakeWidget(0, (ctx) => {
        ctx.drawRect({ x1: -50, y1: -50, x2: 300, y2: 300 }, { fill: RED });
        return DRAWN;
      }));

      expect(layout.render(renderer, canvas, new Map(), THEME)).toEqual([]);
      // Canvas is 2x supersampled: logical (60, 60) is pixel (120, 120)
      expect(getPixel(canvas, 120, 120)).toEqual(RED);
      expect(getPixel(canvas, 240, 120)).toEqual(THEME.background);
      expect(getPixel(canvas, 340, 120)).toEqual(THEME.background);
      expect(getPixel(canvas, 10, 10)).toEqual(THEME.background);
    });

    it("renders component trees into the slot", () => {
      const renderer = new Renderer(catalog);
      const canvas = renderer.createCanvas(THEME.background);
      const layout = createLayout("grid_2x2");
      layout.setWidget(2, fakeWidget(2, () => tree(panel(undefined, { color: GREEN }))));

      layout.render(renderer, canvas, new Map(), THEME);
      expect(getPixel(canvas, 120, 360)).toEqual(GREEN);
      expect(getPixel(canvas, 120, 120)).toEqual(THEME.background);
    });

    it("hands each widget the state for its slot", () => {
      const renderer = new Renderer(catalog);
      const canvas = renderer.createCanvas(THEME.background);
      const layout = createLayout("split_vertical");
      const seen: WidgetState[] = [];
      const record: Widget["render"] = (_ctx, state) => {
        seen.push(state);
        return DRAWN;
      };
      layout.setWidget(0, fakeWidget(0, record));
      layout.setWidget(1, fakeWidget(1, record));

      const state = { ...emptyWidgetState(new Date("2024-03-05T12:00:00Z")), history: [1, 2, 3] };
      layout.render(renderer, canvas, new Map([[1, state]]), THEME);

      expect(seen[0].history).toEqual([]);
      expect(seen[1]).toBe(state);
    });

    it("skips a widget that throws and reports it once", () => {
      const error = vi.spyOn(console, "error").mockImplementation(() => {});
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      const renderer = new Renderer(catalog);
      const canvas = renderer.createCanvas(THEME.background);
      const layout = createLayout("grid_2x2");
      const boom = new Error("boom");
      layout.setWidget(0, fakeWidget(0, fillSlot));
      layout.setWidget(1, fakeWidget(1, (ctx) => {
        ctx.drawRect({ x1: 0, y1: 0, x2: ctx.width, y2: ctx.height }, { fill: GREEN });
        throw boom;
      }));

      expect(layout.render(renderer, canvas, new Map(), THEME)).toEqual([1]);
      expect(getPixel(canvas, 120, 120)).toEqual(RED);
      // Nothing of the failed widget reaches the canvas
      expect(getPixel(canvas, 340, 120)).toEqual(THEME.background);
      expect(error).toHaveBeenCalledWith("[layout] [text@1] Render failed:", boom);
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn).toHaveBeenCalledWith("[layout] Frame rendered with 1 widget error(s): text@1");
    });
  });
});
