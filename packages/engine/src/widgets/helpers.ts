/**
 * Shared widget utilities
 *
 * Value extraction and formatting, entity state interpretation and the
 * option readers every widget uses to pick settings out of its config.
 */

import { createLogger, parseColor, type RGB } from "@glance/core";
import type { EntityStateSource } from "../entity-states.js";
import type { RenderContext } from "../render-context.js";
import type { Font } from "../rendering/bitmap-font.js";
import { isFontSize, type FontSize } from "../rendering/renderer.js";
import type { EntitySnapshot, WidgetConfig } from "./types.js";

export { parseColor };

const log = createLogger("widgets");

/** States treated as "on" (lower case) */
export const ON_STATES: ReadonlySet<string> = new Set(["on", "true", "home", "locked", "open", "unlocked", "1"]);

// ---------------------------------------------------------------------------
// Entity access
// ---------------------------------------------------------------------------

/** Parse a number the way config files write them; blanks are not zero */
export function toNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value !== "string" || value.trim() === "") return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

/**
 * Numeric state (or attribute) of an entity; null when absent,
 * unavailable or not a number
 */
export function readNumeric(entity: EntitySnapshot | null, attribute?: string): number | null {
  if (!entity?.available) return null;
  return toNumber(attribute ? entity.attributes[attribute] : entity.state);
}

export function extractNumeric(entity: EntitySnapshot | null, attribute?: string, fallback = 0): number {
  return readNumeric(entity, attribute) ?? fallback;
}

/** String form of an attribute, or null */
export function readAttribute(entity: EntitySnapshot | null, name: string): string | null {
  if (!entity?.available) return null;
  const value = entity.attributes[name];
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return null;
}

export function getUnit(entity: EntitySnapshot | null, fallback = ""): string {
  if (!entity?.available) return fallback;
  return entity.unit ?? readAttribute(entity, "unit_of_measurement") ?? fallback;
}

export function getFriendlyName(entity: EntitySnapshot | null): string | null {
  if (!entity?.available) return null;
  return entity.friendlyName ?? readAttribute(entity, "friendly_name");
}

/** Configured label, then the entity's friendly name, then `fallback` */
export function resolveLabel(config: Pick<WidgetConfig, "label">, entity: EntitySnapshot | null, fallback = ""): string {
  if (config.label) return config.label;
  return getFriendlyName(entity) ?? fallback;
}

export function isEntityOn(entity: EntitySnapshot | null): boolean {
  if (!entity?.available) return false;
  return ON_STATES.has(entity.state.toLowerCase());
}

/**
 * Human wording of a binary sensor state, e.g. door + "on" gives "Open".
 * Unknown classes and states other than on/off pass through.
 */
export function translateBinaryState(
  source: EntityStateSource,
  state: string,
  deviceClass: string | null | undefined
): string {
  if (!deviceClass) return state;
  const pair = source.entityStates.binarySensor[deviceClass];
  if (!pair) return state;
  const lower = state.toLowerCase();
  if (lower === "on") return pair[0];
  if (lower === "off") return pair[1];
  return state;
}

function domainOf(entityId: string): string | null {
  const dot = entityId.indexOf(".");
  return dot > 0 ? entityId.slice(0, dot) : null;
}

/**
 * Icon for an entity: its `icon` attribute, then its device class, then
 * its domain. Prefixes such as "mdi:" are dropped.
 */
export function getEntityIcon(source: EntityStateSource, entity: EntitySnapshot | null): string | null {
  if (!entity?.available) return null;
  const explicit = readAttribute(entity, "icon");
  if (explicit) return explicit.replace(/^[a-z]+:/, "");

  const { deviceClassIcons, domainIcons } = source.entityStates;
  const deviceClass = readAttribute(entity, "device_class");
  if (deviceClass && deviceClassIcons[deviceClass]) return deviceClassIcons[deviceClass];

  const domain = domainOf(entity.entityId);
  return (domain && domainIcons[domain]) || null;
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

export type TruncateStyle = "end" | "middle" | "start";

/**
 * Shorten text to `maxChars`, marking the cut with `ellipsis`:
 * end "very lo..", middle "very..ext", start "..ng text"
 */
export function truncateText(text: string, maxChars: number, style: TruncateStyle = "end", ellipsis = ".."): string {
  if (text.length <= maxChars) return text;
  const available = maxChars - ellipsis.length;
  if (available <= 0) return ellipsis.slice(0, Math.max(0, maxChars));

  switch (style) {
    case "middle": {
      const head = Math.floor((available + 1) / 2);
      const tail = available - head;
      return text.slice(0, head) + ellipsis + (tail > 0 ? text.slice(-tail) : "");
    }
    case "start":
      return ellipsis + text.slice(-available);
    case "end":
      return text.slice(0, available) + ellipsis;
  }
}

/**
 * Cut `text` from the end until it fits `maxWidth` logical pixels in
 * `font`, marking the cut with `ellipsis`. Empty when not even the
 * ellipsis fits.
 */
export function truncateToWidth(
  measure: Pick<RenderContext, "getTextSize">,
  text: string,
  font: Font,
  maxWidth: number,
  ellipsis = ".."
): string {
  if (measure.getTextSize(text, font).width <= maxWidth) return text;
  for (let length = text.length - 1; length > 0; length--) {
    const candidate = text.slice(0, length).trimEnd() + ellipsis;
    if (measure.getTextSize(candidate, font).width <= maxWidth) return candidate;
  }
  return measure.getTextSize(ellipsis, font).width <= maxWidth ? ellipsis : "";
}

function trimFixed(value: number, precision: number): string {
  const fixed = value.toFixed(precision);
  return fixed.includes(".") ? fixed.replace(/0+$/, "").replace(/\.$/, "") : fixed;
}

const MAGNITUDES: ReadonlyArray<readonly [number, string]> = [
  [1e12, "T"],
  [1e9, "B"],
  [1e6, "M"],
  [1e3, "k"],
];

/**
 * Abbreviate large numbers: 1500 → "1.5k", 2000000 → "2M".
 * Strings that are not numbers come back unchanged.
 */
export function formatNumber(value: number | string, precision = 1, threshold = 1000): string {
  const n = typeof value === "string" ? toNumber(value) : value;
  if (n === null) return String(value);
  if (n < 0) return `-${formatNumber(-n, precision, threshold)}`;
  if (n < threshold) return Number.isInteger(n) ? String(n) : trimFixed(n, precision);

  for (const [magnitude, suffix] of MAGNITUDES) {
    if (n >= magnitude) return `${trimFixed(n / magnitude, precision)}${suffix}`;
  }
  return String(n);
}

export interface ValueFormatOptions {
  separator?: string;
  abbreviate?: boolean;
  threshold?: number;
}

export function formatValueWithUnit(value: string | number, unit: string, options: ValueFormatOptions = {}): string {
  const shown = options.abbreviate ? formatNumber(value, 1, options.threshold ?? 1000) : String(value);
  return unit ? `${shown}${options.separator ?? ""}${unit}` : shown;
}

/** Display form of a numeric state: integers stay, others get `decimals` */
export function formatStateValue(value: number, decimals = 1): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(decimals);
}

/** Percentage of value within [min, max], clamped to 0-100 */
export function calculatePercent(value: number, min: number, max: number): number {
  const range = max - min;
  if (range <= 0) return 0;
  return Math.max(0, Math.min(100, ((value - min) / range) * 100));
}

// ---------------------------------------------------------------------------
// Sizing
// ---------------------------------------------------------------------------

export function estimateMaxChars(availableWidth: number, charWidth = 8, padding = 10): number {
  return Math.max(1, Math.floor((availableWidth - 2 * padding) / charWidth));
}

export type Density = "compact" | "standard" | "spacious";

const DENSITY_RATIO: Record<Density, number> = { compact: 0.04, standard: 0.05, spacious: 0.06 };

/** Padding as a share of width, at least 4 */
export function calculatePadding(width: number, density: Density = "standard"): number {
  return Math.max(4, Math.trunc(width * DENSITY_RATIO[density]));
}

export type Prominence = "small" | "standard" | "large";

const PROMINENCE_RATIO: Record<Prominence, number> = { small: 0.18, standard: 0.25, large: 0.35 };

/** Icon size as a share of height, between 12 and 48 */
export function calculateIconSize(height: number, prominence: Prominence = "standard"): number {
  return Math.max(12, Math.min(48, Math.trunc(height * PROMINENCE_RATIO[prominence])));
}

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

type Options = Readonly<Record<string, unknown>>;

export function optionString(options: Options, key: string, fallback: string): string;
export function optionString(options: Options, key: string): string | undefined;
export function optionString(options: Options, key: string, fallback?: string): string | undefined {
  const value = options[key];
  return typeof value === "string" ? value : fallback;
}

export function optionNumber(options: Options, key: string, fallback: number): number {
  const value = toNumber(options[key]);
  if (value === null && options[key] !== undefined) {
    log.debug(`Option "${key}" is not a number, using ${fallback}`);
  }
  return value ?? fallback;
}

export function optionBoolean(options: Options, key: string, fallback: boolean): boolean {
  const value = options[key];
  return typeof value === "boolean" ? value : fallback;
}

/** One of `allowed`, or `fallback` */
export function optionEnum<T extends string>(options: Options, key: string, allowed: readonly T[], fallback: T): T {
  const value = options[key];
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined && value !== undefined) {
    log.debug(`Option "${key}" must be one of ${allowed.join(", ")}, using "${fallback}"`);
  }
  return match ?? fallback;
}

export function optionFontSize(options: Options, key: string, fallback: FontSize): FontSize {
  const value = options[key];
  return typeof value === "string" && isFontSize(value) ? value : fallback;
}

export function optionColor(options: Options, key: string, fallback: RGB): RGB {
  return parseColor(options[key], fallback);
}

export function optionStringList(options: Options, key: string): string[] {
  const value = options[key];
  return Array.isArray(value) ? value.filter((v: unknown): v is string => typeof v === "string") : [];
}

/** A plain object, as list options nest them */
export function isOptionRecord(value: unknown): value is Options {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Entries of a list option that are objects; anything else is dropped */
export function optionObjectList(options: Options, key: string): Options[] {
  const value = options[key];
  return Array.isArray(value) ? value.filter(isOptionRecord) : [];
}
