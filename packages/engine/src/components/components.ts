/**
 * Declarative component tree
 *
 * Widgets describe what to show as a tree of plain nodes; the layout pass
 * (see layout.ts) decides where everything goes. Nodes are immutable for
 * the duration of a render.
 *
 *   column([text("75%", { font: "medium", bold: true }), bar(75)])
 */

import type { Frame } from "@glance/core";
import type { FitMode, FontSize } from "../rendering/renderer.js";
import { COLORS } from "../rendering/palette.js";
import type { Color } from "../theme.js";

/** Cross-axis alignment */
export type Align = "start" | "center" | "end" | "stretch";
/** Main-axis distribution */
export type Justify = "start" | "center" | "end" | "space-between" | "space-around";
export type TextAlign = "start" | "center" | "end";

// Leaves

export interface TextNode {
  kind: "text";
  text: string;
  font: FontSize;
  bold: boolean;
  color: Color;
  align: TextAlign;
  /** Size steps of 15% up (positive) or down (negative) */
  adjust: number;
}

export interface IconNode {
  kind: "icon";
  name: string;
  /** Fixed size; otherwise the smaller side of the box */
  size?: number;
  /** Upper bound for the automatic size */
  maxSize?: number;
  color: Color;
}

export interface BarNode {
  kind: "bar";
  percent: number;
  color: Color;
  background: Color;
  /** Fixed height; otherwise 15% of the available height, at least 6 */
  height?: number;
}

export interface RingNode {
  kind: "ring";
  percent: number;
  color: Color;
  background: Color;
  thickness?: number;
}

export interface ArcNode {
  kind: "arc";
  percent: number;
  color: Color;
  background: Color;
  width: number;
}

export interface SparklineNode {
  kind: "sparkline";
  data: readonly number[];
  color: Color;
  fill: boolean;
  smooth: boolean;
  gradient: boolean;
}

export interface ImageNode {
  kind: "image";
  source: Frame;
  fit: FitMode;
}

export interface SpacerNode {
  kind: "spacer";
  minSize: number;
}

export interface EmptyNode {
  kind: "empty";
}

// Containers

export interface FlexNode {
  kind: "row" | "column";
  children: readonly Component[];
  gap: number;
  align: Align;
  justify: Justify;
  padding: number;
}

export interface StackNode {
  kind: "stack";
  children: readonly Component[];
}

export interface AdaptiveNode {
  kind: "adaptive";
  children: readonly Component[];
  gap: number;
  padding: number;
}

export interface CenterNode {
  kind: "center";
  child: Component;
}

export interface PaddingNode {
  kind: "padding";
  child: Component;
  all: number;
  horizontal?: number;
  vertical?: number;
  top?: number;
  right?: number;
  bottom?: number;
  left?: number;
}

export interface PanelNode {
  kind: "panel";
  child?: Component;
  color: Color;
  border?: Color;
  radius: number;
}

export type Component =
  | TextNode
  | IconNode
  | BarNode
  | RingNode
  | ArcNode
  | SparklineNode
  | ImageNode
  | SpacerNode
  | EmptyNode
  | FlexNode
  | StackNode
  | AdaptiveNode
  | CenterNode
  | PaddingNode
  | PanelNode;

export type ComponentKind = Component["kind"];

type Options<T extends { kind: string }, K extends keyof T> = Partial<Omit<T, "kind" | K>>;

const GAUGE_COLOR = COLORS.cyan;

export function text(value: string, options: Options<TextNode, "text"> = {}): TextNode {
  return {
    kind: "text",
    text: value,
    font: options.font ?? "regular",
    bold: options.bold ?? false,
    color: options.color ?? COLORS.white,
    align: options.align ?? "center",
    adjust: options.adjust ?? 0,
  };
}

export function icon(name: string, options: Options<IconNode, "name"> = {}): IconNode {
  return { kind: "icon", name, size: options.size, maxSize: options.maxSize, color: options.color ?? COLORS.white };
}

export function bar(percent: number, options: Options<BarNode, "percent"> = {}): BarNode {
  return {
    kind: "bar",
    percent,
    color: options.color ?? GAUGE_COLOR,
    background: options.background ?? COLORS.darkGray,
    height: options.height,
  };
}

export function ring(percent: number, options: Options<RingNode, "percent"> = {}): RingNode {
  return {
    kind: "ring",
    percent,
    color: options.color ?? GAUGE_COLOR,
    background: options.background ?? COLORS.darkGray,
    thickness: options.thickness,
  };
}

export function arc(percent: number, options: Options<ArcNode, "percent"> = {}): ArcNode {
  return {
    kind: "arc",
    percent,
    color: options.color ?? GAUGE_COLOR,
    background: options.background ?? COLORS.darkGray,
    width: options.width ?? 8,
  };
}

export function sparkline(data: readonly number[], options: Options<SparklineNode, "data"> = {}): SparklineNode {
  return {
    kind: "sparkline",
    data,
    color: options.color ?? GAUGE_COLOR,
    fill: options.fill ?? true,
    smooth: options.smooth ?? true,
    gradient: options.gradient ?? false,
  };
}

export function image(source: Frame, fit: FitMode = "contain"): ImageNode {
  return { kind: "image", source, fit };
}

export function spacer(minSize = 0): SpacerNode {
  return { kind: "spacer", minSize };
}

export function empty(): EmptyNode {
  return { kind: "empty" };
}

type FlexOptions = Options<FlexNode, "children">;

function flex(kind: FlexNode["kind"], children: readonly Component[], options: FlexOptions): FlexNode {
  return {
    kind,
    children,
    gap: options.gap ?? 0,
    align: options.align ?? "center",
    justify: options.justify ?? "start",
    padding: options.padding ?? 0,
  };
}

/** Horizontal container */
export function row(children: readonly Component[], options: FlexOptions = {}): FlexNode {
  return flex("row", children, options);
}

/** Vertical container */
export function column(children: readonly Component[], options: FlexOptions = {}): FlexNode {
  return flex("column", children, options);
}

/** Children drawn on top of each other, first child at the back */
export function stack(children: readonly Component[]): StackNode {
  return { kind: "stack", children };
}

/** A row when the children fit side by side, otherwise a column */
export function adaptive(children: readonly Component[], options: Options<AdaptiveNode, "children"> = {}): AdaptiveNode {
  return { kind: "adaptive", children, gap: options.gap ?? 4, padding: options.padding ?? 0 };
}

export function center(child: Component): CenterNode {
  return { kind: "center", child };
}

export function padding(child: Component, options: Options<PaddingNode, "child"> = {}): PaddingNode {
  return { kind: "padding", child, ...options, all: options.all ?? 0 };
}

/** Rounded card behind an optional child */
export function panel(child?: Component, options: Options<PanelNode, "child"> = {}): PanelNode {
  return {
    kind: "panel",
    child,
    color: options.color ?? { r: 30, g: 30, b: 35 },
    border: options.border,
    radius: options.radius ?? 4,
  };
}
