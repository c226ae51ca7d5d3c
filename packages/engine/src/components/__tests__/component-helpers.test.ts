import { describe, it, expect } from "vitest";
import { COLORS } from "../../rendering/palette.js";
import {
  arcGauge,
  barGauge,
  centeredValue,
  conditional,
  iconValue,
  labelValue,
  progressRow,
  ringGauge,
  statusIndicator,
} from "../component-helpers.js";
import { empty, text, type Component } from "../components.js";

/** Text content of every text node, depth first */
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

function kinds(nodes: readonly Component[]): string[] {
  return nodes.map((node) => node.kind);
}

const gauge = { percent: 75, value: "75%", label: "cpu", color: COLORS.teal };

describe("barGauge", () => {
  it("builds a header over a bar", () => {
    const node = barGauge({ ...gauge, icon: "chip" });
    if (node.kind !== "column") throw new Error(`expected column, got ${node.kind}`);
    expect(node.padding).toBe(8);
    expect(node.align).toBe("stretch");
    expect(kinds(node.children)).toEqual(["adaptive", "bar"]);

    const header = node.children[0];
    if (header.kind !== "adaptive") throw new Error("expected adaptive header");
    expect(kinds(header.children)).toEqual(["icon", "text", "spacer", "text"]);
    expect(texts(node)).toEqual(["CPU", "75%"]);
  });

  it("leaves the icon out when none is given", () => {
    const node = barGauge(gauge);
    if (node.kind !== "column") throw new Error("expected column");
    const header = node.children[0];
    if (header.kind !== "adaptive") throw new Error("expected adaptive header");
    expect(kinds(header.children)).toEqual(["text", "spacer", "text"]);
  });

  it("passes the percentage to the bar", () => {
    const node = barGauge({ ...gauge, percent: 33 });
    if (node.kind !== "column") throw new Error("expected column");
    expect(node.children[1]).toMatchObject({ kind: "bar", percent: 33, color: COLORS.teal, background: COLORS.darkGray });
  });
});

describe("ringGauge and arcGauge", () => {
  it("overlays value and label on a ring", () => {
    const node = ringGauge(gauge);
    if (node.kind !== "stack") throw new Error("expected stack");
    expect(kinds(node.children)).toEqual(["ring", "column"]);
    expect(texts(node)).toEqual(["75%", "CPU"]);
  });

  it("puts the arc between label and value", () => {
    const node = arcGauge(gauge);
    if (node.kind !== "stack") throw new Error("expected stack");
    expect(kinds(node.children)).toEqual(["column", "arc", "column"]);
    expect(texts(node)).toEqual(["CPU", "75%"]);
  });
});

describe("value helpers", () => {
  it("iconValue stacks icon, value and label", () => {
    const node = iconValue({ icon: "thermometer", value: "21°", label: "living", color: COLORS.orange });
    if (node.kind !== "column") throw new Error("expected column");
    expect(kinds(node.children)).toEqual(["icon", "text", "text"]);
    expect(node.children[0]).toMatchObject({ name: "thermometer", maxSize: 24 });
    expect(texts(node)).toEqual(["21°", "LIVING"]);
  });

  it("centeredValue omits an empty label", () => {
    expect(texts(centeredValue({ value: "42" }))).toEqual(["42"]);
    expect(texts(centeredValue({ value: "42", label: "" }))).toEqual(["42"]);
    expect(texts(centeredValue({ value: "42", label: "power" }))).toEqual(["42", "POWER"]);
  });

  it("labelValue separates label and value with a spacer", () => {
    const node = labelValue({ label: "Humidity", value: "40%" });
    if (node.kind !== "adaptive") throw new Error("expected adaptive");
    expect(kinds(node.children)).toEqual(["text", "spacer", "text"]);
    expect(node.children[0]).toMatchObject({ align: "start" });
    expect(node.children[2]).toMatchObject({ align: "end" });
  });

  it("progressRow shows the rounded percentage", () => {
    expect(texts(progressRow({ label: "steps", value: "6k", percent: 62.6, color: COLORS.lime }))).toEqual([
      "STEPS",
      "6k",
      "63%",
    ]);
  });

  it("progressRow sizes the icon and bar when asked", () => {
    const node = progressRow({
      label: "water",
      value: "1/2",
      percent: 50,
      color: COLORS.blue,
      icon: "cup",
      iconSize: 11,
      barHeight: 9,
      padding: 3,
    });
    if (node.kind !== "column") throw new Error("expected column");
    const [header, bottom] = node.children;
    if (header.kind !== "row" || bottom.kind !== "row") throw new Error("expected rows");
    expect(header.padding).toBe(3);
    expect(kinds(header.children)).toEqual(["icon", "text", "spacer", "text"]);
    expect(header.children[0]).toMatchObject({ name: "cup", size: 11, color: COLORS.blue });
    expect(bottom.children[0]).toMatchObject({ kind: "bar", percent: 50, height: 9, background: COLORS.darkGray });
  });
});

describe("statusIndicator", () => {
  const props = { label: "Door", onColor: COLORS.lime, offColor: COLORS.red };

  it("colors the icon and status with the on color", () => {
    const node = statusIndicator({ ...props, isOn: true, statusText: "Open", icon: "door" });
    if (node.kind !== "row") throw new Error("expected row");
    expect(kinds(node.children)).toEqual(["icon", "text", "spacer", "text"]);
    expect(node.children[0]).toMatchObject({ name: "door", size: 12, color: COLORS.lime });
    expect(node.children[3]).toMatchObject({ text: "Open", color: COLORS.lime, align: "end" });
  });

  it("uses the off color", () => {
    const node = statusIndicator({ ...props, isOn: false, statusText: "Closed", icon: "door", iconSize: 10 });
    if (node.kind !== "row") throw new Error("expected row");
    expect(node.children[0]).toMatchObject({ size: 10, color: COLORS.red });
    expect(node.children[3]).toMatchObject({ text: "Closed", color: COLORS.red });
  });

  it("leaves out an empty status and a missing icon", () => {
    const node = statusIndicator({ ...props, isOn: true, statusText: "", icon: null });
    if (node.kind !== "row") throw new Error("expected row");
    expect(kinds(node.children)).toEqual(["text"]);
    expect(texts(node)).toEqual(["Door"]);
  });
});

describe("conditional", () => {
  it("picks a branch", () => {
    const a = text("a");
    const b = text("b");
    expect(conditional(true, a, b)).toBe(a);
    expect(conditional(false, a, b)).toBe(b);
    expect(conditional(false, a)).toEqual(empty());
  });
});
