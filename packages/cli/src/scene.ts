/**
 * Scene files
 *
 * A scene is a JSON document with a layout, widgets and a snapshot of the
 * state they read. Image payloads are referenced by path, relative to the
 * scene file, and read before the render starts.
 */

import { readFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { createLogger, parseColor, type RGB } from "@glance/core";
import {
  isLayoutType,
  isWidgetType,
  type DashboardScene,
  type EntitySnapshot,
  type ForecastEntry,
  type SceneLayout,
  type WidgetConfig,
} from "@glance/engine";

const log = createLogger("scene");

/** Validation failure, with the JSON path of the offending value */
export class SceneError extends Error {
  constructor(
    readonly path: string,
    message: string
  ) {
    super(`${path}: ${message}`);
    this.name = "SceneError";
  }
}

/** A parsed scene whose images are still paths */
export interface SceneFile extends Omit<DashboardScene, "images"> {
  images: ReadonlyMap<number, string>;
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function expectObject(value: unknown, path: string): JsonObject {
  if (!isObject(value)) throw new SceneError(path, "expected an object");
  return value;
}

function optionalString(value: unknown, path: string): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "string") throw new SceneError(path, "expected a string");
  return value;
}

function optionalNumber(value: unknown, path: string): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value)) throw new SceneError(path, "expected a number");
  return value;
}

function slotIndex(value: unknown, path: string): number {
  const n = typeof value === "string" && /^\d+$/.test(value) ? Number(value) : value;
  if (typeof n !== "number" || !Number.isInteger(n) || n < 0) {
    throw new SceneError(path, "expected a slot index (integer >= 0)");
  }
  return n;
}

function parseLayout(value: unknown): SceneLayout {
  const raw = expectObject(value, "layout");
  const type = raw.type;
  if (typeof type !== "string" || !isLayoutType(type)) {
    throw new SceneError("layout.type", `unknown layout type ${JSON.stringify(type)}`);
  }
  const footerSlots = optionalNumber(raw.footerSlots, "layout.footerSlots");
  if (footerSlots !== undefined && (!Number.isInteger(footerSlots) || footerSlots < 1)) {
    throw new SceneError("layout.footerSlots", "expected an integer >= 1");
  }
  const ratio = optionalNumber(raw.ratio, "layout.ratio");
  const heroRatio = optionalNumber(raw.heroRatio, "layout.heroRatio");
  for (const [key, r] of [["ratio", ratio], ["heroRatio", heroRatio]] as const) {
    if (r !== undefined && (r <= 0 || r >= 1)) throw new SceneError(`layout.${key}`, "expected a value between 0 and 1");
  }

  return {
    type,
    padding: optionalNumber(raw.padding, "layout.padding"),
    gap: optionalNumber(raw.gap, "layout.gap"),
    ratio,
    heroRatio,
    footerSlots,
  };
}

function parseColorField(value: unknown, path: string): RGB | undefined {
  if (value === undefined) return undefined;
  const sentinel = { r: -1, g: -1, b: -1 };
  const color = parseColor(value, sentinel);
  if (color === sentinel) throw new SceneError(path, "expected [r, g, b] or {r, g, b}");
  return color;
}

function parseWidget(value: unknown, index: number): WidgetConfig {
  const path = `widgets[${index}]`;
  const raw = expectObject(value, path);
  const type = raw.type;
  if (typeof type !== "string" || !isWidgetType(type)) {
    throw new SceneError(`${path}.type`, `unknown widget type ${JSON.stringify(type)}`);
  }
  return {
    type,
    slot: slotIndex(raw.slot, `${path}.slot`),
    entityId: optionalString(raw.entityId, `${path}.entityId`),
    label: optionalString(raw.label, `${path}.label`),
    color: parseColorField(raw.color, `${path}.color`),
    options: raw.options === undefined ? {} : expectObject(raw.options, `${path}.options`),
  };
}

function parseEntity(entityId: string, value: unknown): EntitySnapshot {
  const path = `entities.${entityId}`;
  const raw = expectObject(value, path);
  if (raw.available === false) return { entityId, available: false };

  const state = raw.state;
  if (typeof state !== "string" && typeof state !== "number" && typeof state !== "boolean") {
    throw new SceneError(`${path}.state`, "expected a string, number or boolean");
  }
  return {
    entityId,
    available: true,
    state: String(state),
    attributes: raw.attributes === undefined ? {} : expectObject(raw.attributes, `${path}.attributes`),
    unit: optionalString(raw.unit, `${path}.unit`),
    friendlyName: optionalString(raw.friendlyName, `${path}.friendlyName`),
  };
}

function parseBySlot<T>(value: unknown, key: string, parse: (item: unknown, path: string) => T): Map<number, T> {
  const result = new Map<number, T>();
  if (value === undefined) return result;
  for (const [slot, item] of Object.entries(expectObject(value, key))) {
    result.set(slotIndex(slot, `${key}.${slot}`), parse(item, `${key}.${slot}`));
  }
  return result;
}

function parseSeries(value: unknown, path: string): number[] {
  if (!Array.isArray(value)) throw new SceneError(path, "expected an array of numbers");
  return value.map((item: unknown, i) => {
    if (typeof item === "boolean") return item ? 1 : 0;
    if (typeof item !== "number" || !Number.isFinite(item)) throw new SceneError(`${path}[${i}]`, "expected a number");
    return item;
  });
}

function parseForecast(value: unknown): ForecastEntry[] {
  if (value === undefined) return [];
  if (!Array.isArray(value)) throw new SceneError("forecast", "expected an array");
  return value.map((item: unknown, i) => {
    const path = `forecast[${i}]`;
    const raw = expectObject(item, path);
    const entryValue = optionalNumber(raw.value, `${path}.value`);
    if (entryValue === undefined) throw new SceneError(`${path}.value`, "expected a number");
    return {
      label: optionalString(raw.label, `${path}.label`) ?? "",
      condition: optionalString(raw.condition, `${path}.condition`) ?? "sunny",
      value: entryValue,
    };
  });
}

function parseNow(value: unknown): Date {
  if (value === undefined) return new Date();
  const text = optionalString(value, "now");
  const date = new Date(text ?? "");
  if (Number.isNaN(date.getTime())) throw new SceneError("now", `invalid date ${JSON.stringify(value)}`);
  return date;
}

/**
 * Validate a scene document. Throws SceneError on the first problem.
 */
export function parseScene(value: unknown): SceneFile {
  const raw = expectObject(value, "$");
  const widgets = raw.widgets;
  if (!Array.isArray(widgets)) throw new SceneError("widgets", "expected an array");

  const entities: Record<string, EntitySnapshot> = {};
  if (raw.entities !== undefined) {
    for (const [entityId, snapshot] of Object.entries(expectObject(raw.entities, "entities"))) {
      entities[entityId] = parseEntity(entityId, snapshot);
    }
  }

  return {
    layout: parseLayout(raw.layout),
    theme: optionalString(raw.theme, "theme"),
    widgets: widgets.map((widget: unknown, i) => parseWidget(widget, i)),
    entities,
    history: parseBySlot(raw.history, "history", parseSeries),
    forecast: parseForecast(raw.forecast),
    images: parseBySlot(raw.images, "images", (item, path) => {
      const file = optionalString(item, path);
      if (file === undefined) throw new SceneError(path, "expected a file path");
      return file;
    }),
    now: parseNow(raw.now),
  };
}

/**
 * Read image payloads named by a scene, relative to `baseDir`. A file that
 * cannot be read leaves its slot without an image.
 */
export async function readSceneImages(scene: SceneFile, baseDir: string): Promise<DashboardScene> {
  const images = new Map<number, Uint8Array>();
  for (const [slot, file] of scene.images) {
    const path = resolve(baseDir, file);
    try {
      images.set(slot, await readFile(path));
    } catch (error) {
      log.warn(`Could not read image for slot ${slot} (${path}):`, error instanceof Error ? error.message : error);
    }
  }
  return { ...scene, images };
}

/**
 * Read, validate and resolve a scene file
 */
export async function loadScene(path: string): Promise<DashboardScene> {
  let json: unknown;
  try {
    json = JSON.parse(await readFile(path, "utf-8"));
  } catch (error) {
    throw new SceneError("$", `cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }
  return readSceneImages(parseScene(json), dirname(path));
}
