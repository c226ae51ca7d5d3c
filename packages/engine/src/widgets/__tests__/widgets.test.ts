import { describe, it, expect, vi, afterEach } from "vitest";
import { createSolidFrame } from "@glance/core";
import { loadAssetCatalog } from "../../asset-catalog.js";
import type { Component } from "../../components/components.js";
import { RenderContext } from "../../render-context.js";
import { COLORS } from "../../rendering/palette.js";
import { Renderer } from "../../rendering/renderer.js";
import { themeAccent } from "../../theme.js";
import { cameraWidget } from "../camera.js";
import { chartWidget, isBinarySeries } from "../chart.js";
import { entityWidget } from "../entity.js";
import { gaugeWidget } from "../gauge.js";
import { iconWidget } from "../icon.js";
import { buildProgress, progressPercent, progressValueText, progressWidget } from "../progress.js";
import { statusWidget } from "../status.js";
import { textWidget } from "../text.js";
import {
  emptyWidgetState,
  type EntitySnapshot,
  type WidgetConfig,
  type WidgetOutput,
  type WidgetState,
  type WidgetType,
} from "../types.js";
import { conditionTitle, weatherIcon, weatherWidget } from "../weather.js";

const catalog = loadAssetCatalog();
const renderer = new Renderer(catalog);
const NOW = new Date("2024-03-05T14:07:09Z");

function ctxOf(width: number, height: number): RenderContext {
  return new RenderContext(renderer, renderer.createCanvas(), { x1: 0, y1: 0, x2: width, y2: height }, catalog.theme());
}

function config(type: WidgetType, rest: Partial<WidgetConfig> = {}): WidgetConfig {
  return { type, slot: 0, options: {}, ...rest };
}

function stateWith(entity: EntitySnapshot | null, extra: Partial<WidgetState> = {}): WidgetState {
  return { ...emptyWidgetState(NOW), entity, ...extra };
}

function sensor(entityId: string, state: string, attributes: Record<string, unknown> = {}): EntitySnapshot {
  return { entityId, available: true, state, attributes };
}

function rootOf(output: WidgetOutput): Component {
  if (output.kind !== "tree") throw new Error("expected a component tree");
  return output.root;
}

/** Text of every text node, depth first */
function texts(node: Component): string[] {
  switch (node.kind) {
    case "text":
      return [node.text];
    case "row":
    case "column":
    case "stack":
    case "adaptive":
      return node.children.flatMap(texts);
    case "center":
    case "padding":
      return texts(node.child);
    case "panel":
      return node.child ? texts(node.child) : [];
    default:
      return [];
  }
}

function drawnTexts(ctx: RenderContext, render: () => WidgetOutput): string[] {
  const spy = vi.spyOn(ctx, "drawText");
  expect(render()).toEqual({ kind: "drawn" });
  return spy.mock.calls.map((call) => call[0]);
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("textWidget", () => {
  it("draws static text in the middle", () => {
    const ctx = ctxOf(100, 100);
    const spy = vi.spyOn(ctx, "drawText");
    textWidget.render(ctx, config("text", { options: { text: "Hello" } }), stateWith(null));
    expect(spy).toHaveBeenCalledWith("Hello", [50, 50], expect.anything(), COLORS.white, "mm");
  });

  it("aligns left with padding", () => {
    const ctx = ctxOf(100, 100);
    const spy = vi.spyOn(ctx, "drawText");
    textWidget.render(ctx, config("text", { options: { text: "Hi", align: "left" } }), stateWith(null));
    expect(spy.mock.calls[0]?.[1]).toEqual([4, 50]);
    expect(spy.mock.calls[0]?.[4]).toBe("lm");
  });

  it("shows the entity state, or a placeholder when it is unavailable", () => {
    const cfg = config("text", { entityId: "sensor.mode", label: "Mode" });
    const missing = ctxOf(100, 100);
    expect(drawnTexts(missing, () => textWidget.render(missing, cfg, stateWith(null)))).toEqual(["", "MODE"]);

    const ctx = ctxOf(100, 100);
    expect(drawnTexts(ctx, () => textWidget.render(ctx, cfg, stateWith(sensor("sensor.mode", "eco"))))).toEqual([
      "eco",
      "MODE",
    ]);
    const offline = ctxOf(100, 100);
    expect(
      drawnTexts(offline, () =>
        textWidget.render(offline, cfg, stateWith({ entityId: "sensor.mode", available: false }))
      )
    ).toEqual(["--", "MODE"]);
  });
});

describe("entityWidget", () => {
  const kitchen = sensor("sensor.kitchen", "21.5", { unit_of_measurement: "°C", friendly_name: "Kitchen" });

  it("shows value with unit over the name", () => {
    const root = rootOf(entityWidget.render(ctxOf(100, 100), config("entity", { entityId: "sensor.kitchen" }), stateWith(kitchen)));
    expect(root.kind).toBe("column");
    expect(texts(root)).toEqual(["21.5°C", "KITCHEN"]);
  });

  it("hides unit and name on request", () => {
    const cfg = config("entity", { entityId: "sensor.kitchen", options: { show_unit: false, show_name: false } });
    expect(texts(rootOf(entityWidget.render(ctxOf(100, 100), cfg, stateWith(kitchen))))).toEqual(["21.5"]);
  });

  it("falls back to placeholders", () => {
    const cfg = config("entity", { entityId: "sensor.kitchen" });
    expect(texts(rootOf(entityWidget.render(ctxOf(100, 100), cfg, stateWith(null))))).toEqual(["--", "SENSOR.KITCHEN"]);
  });

  it("uses the icon layout and an optional panel", () => {
    const cfg = config("entity", { entityId: "sensor.kitchen", options: { icon: "thermometer", show_panel: true } });
    const root = rootOf(entityWidget.render(ctxOf(100, 100), cfg, stateWith(kitchen)));
    if (root.kind !== "panel") throw new Error("expected panel");
    expect(root.child?.kind).toBe("column");
    expect(texts(root)).toEqual(["21.5°C", "KITCHEN"]);
  });
});

describe("gaugeWidget", () => {
  const cpu = sensor("sensor.cpu", "42.4", { friendly_name: "CPU" });

  it("draws a bar gauge by default", () => {
    const cfg = config("gauge", { entityId: "sensor.cpu", options: { unit: "%" } });
    const root = rootOf(gaugeWidget.render(ctxOf(100, 100), cfg, stateWith(cpu)));
    if (root.kind !== "column") throw new Error("expected column");
    expect(root.children[1]).toMatchObject({ kind: "bar", percent: 42.4 });
    expect(texts(root)).toEqual(["CPU", "42%"]);
  });

  it("maps the value into min and max", () => {
    const cfg = config("gauge", { options: { min: 20, max: 60, style: "ring" } });
    const root = rootOf(gaugeWidget.render(ctxOf(100, 100), cfg, stateWith(sensor("sensor.t", "30"))));
    if (root.kind !== "stack") throw new Error("expected stack");
    expect(root.children[0]).toMatchObject({ kind: "ring", percent: 25 });
  });

  it("shows an empty arc without a value", () => {
    const root = rootOf(gaugeWidget.render(ctxOf(100, 100), config("gauge", { label: "Load", options: { style: "arc" } }), stateWith(null)));
    if (root.kind !== "stack") throw new Error("expected stack");
    expect(root.children[1]).toMatchObject({ kind: "arc", percent: 0 });
    expect(texts(root)).toEqual(["LOAD", "--"]);
  });
});

describe("progress", () => {
  it("computes percent and value text", () => {
    expect(progressPercent(50, 200)).toBe(25);
    expect(progressPercent(300, 200)).toBe(100);
    expect(progressPercent(5, 0)).toBe(0);
    expect(progressValueText({ value: 6500, target: 10000, unit: "steps", showTarget: true })).toBe("6.5k/10k steps");
    expect(progressValueText({ value: 6500, target: 10000, unit: "", showTarget: false })).toBe("6.5k");
  });

  const props = {
    value: 50,
    target: 200,
    label: "Steps",
    unit: "",
    color: COLORS.lime,
    showTarget: true,
    barHeight: "normal" as const,
  };

  it("gives medium cells a row each for label, value and bar", () => {
    const root = buildProgress(ctxOf(200, 160), props);
    if (root.kind !== "column") throw new Error("expected column");
    expect(root.children).toHaveLength(3);
    expect(texts(root)).toEqual(["STEPS", "50/200", "25%"]);
    expect(root.gap).toBe(9);
  });

  it("puts micro cells on two rows", () => {
    const root = buildProgress(ctxOf(200, 60), { ...props, icon: "walk" });
    if (root.kind !== "column") throw new Error("expected column");
    expect(root.children).toHaveLength(2);
    expect(texts(root)).toEqual(["50/200", "25%"]);
    const bar = root.children[1];
    if (bar.kind !== "row") throw new Error("expected row");
    expect(bar.children[0]).toMatchObject({ kind: "bar", percent: 25, height: 10 });
  });

  it("reads the entity and options", () => {
    const cfg = config("progress", { slot: 2, options: { target: 0, show_target: false, unit: "km" } });
    const root = rootOf(progressWidget.render(ctxOf(200, 160), cfg, stateWith(sensor("sensor.run", "42", { friendly_name: "Run" }))));
    expect(texts(root)).toEqual(["RUN", "42 km", "42%"]);
    if (root.kind !== "column") throw new Error("expected column");
    const barRow = root.children[2];
    if (barRow.kind !== "row") throw new Error("expected row");
    expect(barRow.children[0]).toMatchObject({ color: themeAccent(2) });
  });
});

describe("chartWidget", () => {
  it("detects on/off series", () => {
    expect(isBinarySeries([0, 1, 1, 0])).toBe(true);
    expect(isBinarySeries([0, 2])).toBe(false);
    expect(isBinarySeries([])).toBe(false);
  });

  it("says when there is too little data", () => {
    const ctx = ctxOf(200, 100);
    expect(drawnTexts(ctx, () => chartWidget.render(ctx, config("chart"), stateWith(null, { history: [3] })))).toEqual([
      "No data",
    ]);
  });

  it("draws a sparkline with its range", () => {
    const ctx = ctxOf(200, 100);
    const sparkline = vi.spyOn(ctx, "drawSparkline");
    const labels = drawnTexts(ctx, () => chartWidget.render(ctx, config("chart"), stateWith(null, { history: [1, 4, 2.25] })));
    expect(labels).toEqual(["1.0", "4.0"]);
    expect(sparkline).toHaveBeenCalledWith(
      { x1: 16, y1: 8, x2: 184, y2: 88 },
      [1, 4, 2.25],
      { color: themeAccent(0), fill: true, gradient: false }
    );
  });

  it("draws a timeline for binary history", () => {
    const ctx = ctxOf(200, 100);
    const timeline = vi.spyOn(ctx, "drawTimelineBar");
    chartWidget.render(ctx, config("chart"), stateWith(null, { history: [0, 1, 1, 0] }));
    expect(timeline).toHaveBeenCalledWith({ x1: 16, y1: 8, x2: 184, y2: 96 }, [0, 1, 1, 0], themeAccent(0));
  });
});

describe("statusWidget", () => {
  const door = sensor("binary_sensor.front", "on", { device_class: "door", friendly_name: "Front Door" });

  it("speaks the device class", () => {
    const root = rootOf(statusWidget.render(ctxOf(200, 60), config("status"), stateWith(door)));
    if (root.kind !== "row") throw new Error("expected row");
    expect(texts(root)).toEqual(["Front Door", "Open"]);
    expect(root.children[2]).toMatchObject({ kind: "text", text: "Open", color: COLORS.lime });
  });

  it("uses configured texts and colors", () => {
    const cfg = config("status", { options: { off_text: "Shut", off_color: [0, 0, 255] } });
    const root = rootOf(statusWidget.render(ctxOf(200, 60), cfg, stateWith(sensor("binary_sensor.front", "off", { device_class: "door" }))));
    if (root.kind !== "row") throw new Error("expected row");
    expect(root.children[2]).toMatchObject({ text: "Shut", color: { r: 0, g: 0, b: 255 } });
  });

  it("falls back to ON/OFF without a device class", () => {
    const root = rootOf(statusWidget.render(ctxOf(200, 60), config("status", { label: "Pump" }), stateWith(null)));
    expect(texts(root)).toEqual(["Pump", "OFF"]);
  });

  it("stacks the icon on top in larger cells", () => {
    const cfg = config("status", { options: { icon: "door" } });
    const root = rootOf(statusWidget.render(ctxOf(200, 150), cfg, stateWith(door)));
    if (root.kind !== "column") throw new Error("expected column");
    expect(root.children[0]).toMatchObject({ kind: "icon", name: "door", size: 60 });
    expect(texts(root)).toEqual(["Front Door", "Open"]);
  });
});

describe("weatherWidget", () => {
  const weather = sensor("weather.home", "rainy", { temperature: 21, humidity: 40 });
  const forecast = ["Mon", "Tue", "Wed", "Thu"].map((label, i) => ({ label, condition: "sunny", value: 12.4 + i * 3 }));

  it("maps conditions to icons and titles", () => {
    expect(weatherIcon("pouring")).toBe("weather-rainy");
    expect(weatherIcon("volcanic")).toBe("weather-sunny");
    expect(conditionTitle("clear-night")).toBe("Clear Night");
  });

  it("reports missing data", () => {
    const ctx = ctxOf(100, 100);
    expect(drawnTexts(ctx, () => weatherWidget.render(ctx, config("weather"), stateWith(null)))).toEqual([
      "No Weather Data",
    ]);
  });

  it("keeps small cells compact", () => {
    const ctx = ctxOf(100, 100);
    const spy = vi.spyOn(ctx, "drawText");
    weatherWidget.render(ctx, config("weather"), stateWith(weather));
    expect(spy.mock.calls.map((call) => [call[0], call[1]])).toEqual([
      ["21°", [96, 46]],
      ["40%", [96, 65]],
    ]);
  });

  it("adds a forecast row to tall cells", () => {
    const ctx = ctxOf(200, 200);
    const state = stateWith(weather, { forecast });
    expect(drawnTexts(ctx, () => weatherWidget.render(ctx, config("weather"), state))).toEqual([
      "21°",
      "Rainy",
      "40%",
      "MON",
      "12°",
      "TUE",
      "15°",
      "WED",
      "18°",
    ]);
  });
});

describe("cameraWidget", () => {
  it("shows the decoded image with the configured fit", () => {
    const frame = createSolidFrame(4, 4, COLORS.red);
    const root = rootOf(cameraWidget.render(ctxOf(100, 100), config("camera", { options: { fit: "cover" } }), stateWith(null, { image: frame })));
    expect(root).toEqual({ kind: "image", source: frame, fit: "cover" });
  });

  it("shows a placeholder without one", () => {
    expect(texts(rootOf(cameraWidget.render(ctxOf(100, 100), config("camera"), stateWith(null))))).toEqual(["No image"]);
    expect(texts(rootOf(cameraWidget.render(ctxOf(100, 100), config("camera", { label: "Porch" }), stateWith(null))))).toEqual([
      "Porch",
    ]);
  });
});

describe("iconWidget", () => {
  function iconNode(cfg: WidgetConfig): Component {
    const root = rootOf(iconWidget.render(ctxOf(100, 100), cfg, stateWith(null)));
    if (root.kind !== "center") throw new Error("expected center");
    return root.child;
  }

  it("strips icon prefixes and uses the slot accent", () => {
    expect(iconNode(config("icon", { slot: 3, options: { icon: "mdi:fan" } }))).toMatchObject({
      name: "fan",
      maxSize: 32,
      color: themeAccent(3),
    });
  });

  it("fills the cell when huge and takes an explicit color", () => {
    expect(iconNode(config("icon", { options: { size: "huge", color: [1, 2, 3] } }))).toMatchObject({
      name: "help",
      maxSize: 240,
      color: { r: 1, g: 2, b: 3 },
    });
  });
});
