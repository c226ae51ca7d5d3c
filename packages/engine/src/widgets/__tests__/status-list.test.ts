import { describe, it, expect } from "vitest";
import { COLORS } from "../../rendering/palette.js";
import { readStatusEntries, statusListWidget } from "../status-list.js";
import { childrenOf, config, ctxOf, rootOf, sensor, stateWith, texts } from "./widget-fixtures.js";

const entities = {
  "binary_sensor.front_door": sensor("binary_sensor.front_door", "on", {
    device_class: "door",
    friendly_name: "Front Door",
  }),
  "light.porch": sensor("light.porch", "off"),
};

const list = ["binary_sensor.front_door", ["light.porch", "Porch"], "binary_sensor.missing"];

function render(options: Record<string, unknown>, width = 240, height = 240) {
  const cfg = config("status_list", { options: { entities: list, ...options } });
  return rootOf(statusListWidget.render(ctxOf(width, height), cfg, stateWith(null, { entities })));
}

describe("readStatusEntries", () => {
  it("reads ids and [id, label] pairs", () => {
    expect(readStatusEntries({ entities: ["a.b", ["c.d", "Label"], ["e.f"], "", 7, [3, "x"]] })).toEqual([
      { entityId: "a.b" },
      { entityId: "c.d", label: "Label" },
      { entityId: "e.f", label: undefined },
    ]);
    expect(readStatusEntries({ entities: "a.b" })).toEqual([]);
  });
});

describe("statusListWidget", () => {
  it("labels rows by configured label, friendly name, then id", () => {
    expect(texts(render({}))).toEqual(["Front Door", "Porch", "binary_sensor.missing"]);
  });

  it("shows status words only once configured", () => {
    expect(texts(render({ on_text: "Open", off_text: "Closed" }))).toEqual([
      "Front Door",
      "Open",
      "Porch",
      "Closed",
      "binary_sensor.missing",
      "Closed",
    ]);
    expect(texts(render({ on_text: "Open" }))).toEqual(["Front Door", "Open", "Porch", "binary_sensor.missing"]);
  });

  it("colors entity icons by state", () => {
    const root = render({ off_color: [0, 0, 255] });
    if (root.kind !== "column") throw new Error("expected column");
    expect(root.gap).toBe(2);
    expect(root.padding).toBe(12);

    const [door, porch, missing] = root.children;
    expect(childrenOf(door)[0]).toMatchObject({ kind: "icon", name: "door", size: 16, color: COLORS.lime });
    expect(childrenOf(porch)[0]).toMatchObject({ kind: "icon", name: "lightbulb", color: { r: 0, g: 0, b: 255 } });
    expect(childrenOf(missing).map((node) => node.kind)).toEqual(["text"]);
  });

  it("puts the title first and widens the gap", () => {
    const root = render({ title: "Doors" });
    if (root.kind !== "column") throw new Error("expected column");
    expect(root.gap).toBe(4);
    expect(root.children[0]).toMatchObject({ kind: "text", text: "DOORS", font: "small", align: "start" });
  });

  it("shortens long labels in the middle", () => {
    expect(texts(render({}, 100, 100))[0]).toBe("Fr..r");
  });
});
