/**
 * Vector icons
 *
 * Icons are small programs of geometric primitives on a square design grid
 * (24 units, the Material Design grid). They are scaled to the requested
 * size and drawn with the raster primitives, so they stay sharp at any size.
 *
 * Names resolve through:
 * - an optional "mdi:" prefix, stripped
 * - canonical shape names ("thermometer")
 * - aliases, including short legacy names ("temp", "cpu")
 * - underscores read as hyphens ("arrow_up")
 * Anything else draws the fallback icon.
 */

import type { Frame, Point, RGB } from "@glance/core";
import { createLogger } from "@glance/core";
import {
  fillEllipse,
  fillPolygon,
  fillRoundedRect,
  strokeArc,
  strokeEllipse,
  strokePolyline,
  strokeRoundedRect,
} from "./raster.js";

const log = createLogger("icons");

export type IconShape =
  | { op: "circle"; cx: number; cy: number; r: number; fill: boolean; width: number }
  | { op: "rect"; x1: number; y1: number; x2: number; y2: number; radius: number; fill: boolean; width: number }
  | { op: "polygon"; points: Point[]; fill: boolean; width: number }
  | { op: "line"; points: Point[]; width: number }
  | { op: "arc"; cx: number; cy: number; r: number; start: number; end: number; width: number };

export interface ResolvedIcon {
  /** Canonical shape name that will be drawn */
  name: string;
  /** True when the requested name was unknown */
  fallback: boolean;
}

function num(record: Record<string, unknown>, key: string, fallback?: number): number {
  const value = record[key];
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (fallback !== undefined && value === undefined) return fallback;
  throw new Error(`icon shape: "${key}" must be a number`);
}

function points(record: Record<string, unknown>): Point[] {
  const raw = record.points;
  if (!Array.isArray(raw)) throw new Error('icon shape: "points" must be an array');
  return raw.map((p): Point => {
    if (!Array.isArray(p) || p.length !== 2 || typeof p[0] !== "number" || typeof p[1] !== "number") {
      throw new Error("icon shape: every point must be [x, y]");
    }
    return [p[0], p[1]];
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseShape(value: unknown): IconShape {
  if (!isRecord(value)) throw new Error("icon shape must be an object");
  const fill = value.fill === true;
  switch (value.op) {
    case "circle":
      return { op: "circle", cx: num(value, "cx"), cy: num(value, "cy"), r: num(value, "r"), fill, width: num(value, "width", 2) };
    case "rect":
      return {
        op: "rect",
        x1: num(value, "x1"),
        y1: num(value, "y1"),
        x2: num(value, "x2"),
        y2: num(value, "y2"),
        radius: num(value, "radius", 0),
        fill,
        width: num(value, "width", 2),
      };
    case "polygon":
      return { op: "polygon", points: points(value), fill, width: num(value, "width", 2) };
    case "line":
      return { op: "line", points: points(value), width: num(value, "width", 2) };
    case "arc":
      return {
        op: "arc",
        cx: num(value, "cx"),
        cy: num(value, "cy"),
        r: num(value, "r"),
        start: num(value, "start"),
        end: num(value, "end"),
        width: num(value, "width", 2),
      };
    default:
      throw new Error(`unknown icon shape op: ${String(value.op)}`);
  }
}

export class IconSet {
  readonly grid: number;
  readonly fallbackName: string;
  private readonly shapes: ReadonlyMap<string, readonly IconShape[]>;
  private readonly aliases: ReadonlyMap<string, string>;

  constructor(
    grid: number,
    fallbackName: string,
    shapes: ReadonlyMap<string, readonly IconShape[]>,
    aliases: ReadonlyMap<string, string>
  ) {
    if (!shapes.has(fallbackName)) {
      throw new Error(`fallback icon "${fallbackName}" has no shape`);
    }
    this.grid = grid;
    this.fallbackName = fallbackName;
    this.shapes = shapes;
    this.aliases = aliases;
  }

  /** Parse the JSON icon catalog */
  static fromJson(value: unknown): IconSet {
    if (!isRecord(value)) throw new Error("icon catalog must be an object");
    const grid = num(value, "grid", 24);
    const fallback = typeof value.fallback === "string" ? value.fallback : "help";

    const shapes = new Map<string, IconShape[]>();
    if (!isRecord(value.shapes)) throw new Error("icon catalog: missing shapes");
    for (const [name, ops] of Object.entries(value.shapes)) {
      if (!Array.isArray(ops)) throw new Error(`icon "${name}": shapes must be an array`);
      shapes.set(name, ops.map(parseShape));
    }

    const aliases = new Map<string, string>();
    if (isRecord(value.aliases)) {
      for (const [alias, target] of Object.entries(value.aliases)) {
        if (typeof target === "string") aliases.set(alias, target);
      }
    }
    return new IconSet(grid, fallback, shapes, aliases);
  }

  /** Canonical names of every drawable icon */
  get names(): string[] {
    return [...this.shapes.keys()].sort();
  }

  /** Alias names, sorted */
  get aliasNames(): string[] {
    return [...this.aliases.keys()].sort();
  }

  private lookup(name: string): string | null {
    if (this.shapes.has(name)) return name;
    const alias = this.aliases.get(name);
    if (alias !== undefined && this.shapes.has(alias)) return alias;
    return null;
  }

  resolve(name: string): ResolvedIcon {
    const bare = name.trim().toLowerCase().replace(/^mdi:/, "");
    const found = this.lookup(bare) ?? this.lookup(bare.replace(/_/g, "-"));
    if (found !== null) return { name: found, fallback: false };
    return { name: this.fallbackName, fallback: true };
  }

  isKnown(name: string): boolean {
    return !this.resolve(name).fallback;
  }

  shapesFor(name: string): readonly IconShape[] {
    const resolved = this.resolve(name);
    if (resolved.fallback) {
      log.debug(`Unknown icon "${name}", drawing "${resolved.name}"`);
    }
    return this.shapes.get(resolved.name) ?? [];
  }

  /**
   * Draw an icon into the `size` x `size` canvas-pixel box at (x, y)
   */
  draw(frame: Frame, name: string, x: number, y: number, size: number, color: RGB): void {
    if (size <= 0) return;
    const k = size / this.grid;
    const px = (v: number) => x + v * k;
    const py = (v: number) => y + v * k;
    const stroke = (w: number) => Math.max(1, Math.round(w * k));

    for (const shape of this.shapesFor(name)) {
      switch (shape.op) {
        case "circle": {
          if (shape.fill) {
            fillEllipse(frame, { x1: px(shape.cx - shape.r), y1: py(shape.cy - shape.r), x2: px(shape.cx + shape.r), y2: py(shape.cy + shape.r) }, color);
          } else {
            const r = shape.r + shape.width / 2;
            strokeEllipse(frame, { x1: px(shape.cx - r), y1: py(shape.cy - r), x2: px(shape.cx + r), y2: py(shape.cy + r) }, color, stroke(shape.width));
          }
          break;
        }
        case "rect": {
          if (shape.fill) {
            fillRoundedRect(frame, { x1: px(shape.x1), y1: py(shape.y1), x2: px(shape.x2), y2: py(shape.y2) }, shape.radius * k, color);
          } else {
            const h = shape.width / 2;
            strokeRoundedRect(
              frame,
              { x1: px(shape.x1 - h), y1: py(shape.y1 - h), x2: px(shape.x2 + h), y2: py(shape.y2 + h) },
              (shape.radius + h) * k,
              color,
              stroke(shape.width)
            );
          }
          break;
        }
        case "polygon": {
          const pts = shape.points.map(([vx, vy]): Point => [px(vx), py(vy)]);
          if (shape.fill) {
            fillPolygon(frame, pts, color);
          } else if (pts.length > 1) {
            strokePolyline(frame, [...pts, pts[0]], color, stroke(shape.width));
          }
          break;
        }
        case "line":
          strokePolyline(frame, shape.points.map(([vx, vy]): Point => [px(vx), py(vy)]), color, stroke(shape.width));
          break;
        case "arc": {
          const r = shape.r + shape.width / 2;
          strokeArc(
            frame,
            { x1: px(shape.cx - r), y1: py(shape.cy - r), x2: px(shape.cx + r), y2: py(shape.cy + r) },
            shape.start,
            shape.end,
            color,
            stroke(shape.width)
          );
          break;
        }
      }
    }
  }
}
