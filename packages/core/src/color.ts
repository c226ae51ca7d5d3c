/**
 * Color math shared by the renderer and widgets
 */

import type { RGB } from "./types.js";

/**
 * Linear interpolation between two values, rounded to an integer
 */
function lerp(a: number, b: number, t: number): number {
  return Math.round(a + (b - a) * t);
}

/**
 * Interpolate between two colors (rounded, t clamped to [0, 1])
 */
export function lerpColor(c1: RGB, c2: RGB, t: number): RGB {
  const k = Math.max(0, Math.min(1, t));
  return {
    r: lerp(c1.r, c2.r, k),
    g: lerp(c1.g, c2.g, k),
    b: lerp(c1.b, c2.b, k),
  };
}

/**
 * Scale each channel by `factor`, truncating toward zero.
 * dimColor(white, 0.5) is (127, 127, 127).
 */
export function dimColor(color: RGB, factor = 0.3): RGB {
  return {
    r: Math.trunc(color.r * factor),
    g: Math.trunc(color.g * factor),
    b: Math.trunc(color.b * factor),
  };
}

/**
 * Blend from c1 (factor 0) to c2 (factor 1), truncating toward zero
 */
export function blendColor(c1: RGB, c2: RGB, factor = 0.5): RGB {
  return {
    r: Math.trunc(c1.r + (c2.r - c1.r) * factor),
    g: Math.trunc(c1.g + (c2.g - c1.g) * factor),
    b: Math.trunc(c1.b + (c2.b - c1.b) * factor),
  };
}

export function rgbEquals(a: RGB, b: RGB): boolean {
  return a.r === b.r && a.g === b.g && a.b === b.b;
}

/** Format as #rrggbb */
export function toHex(color: RGB): string {
  const hex = (v: number) => v.toString(16).padStart(2, "0");
  return `#${hex(color.r)}${hex(color.g)}${hex(color.b)}`;
}

/**
 * Convert one channel the way an integer cast would: numbers truncate,
 * booleans give 1 or 0, strings must be integer literals. Anything else is
 * rejected.
 */
function toChannel(value: unknown): number | null {
  if (typeof value === "boolean") return value ? 1 : 0;
  if (typeof value === "number") {
    return Number.isFinite(value) ? Math.trunc(value) : null;
  }
  if (typeof value === "string" && /^\s*[+-]?\d+\s*$/.test(value)) {
    return Number.parseInt(value, 10);
  }
  return null;
}

/**
 * Parse a color value coming from configuration.
 *
 * Accepts a 3-element array whose items convert to integers, or an object
 * with numeric r/g/b. Every other shape (wrong length, null, strings,
 * unconvertible items) returns `fallback` unchanged.
 */
export function parseColor(value: unknown, fallback: RGB): RGB {
  if (Array.isArray(value)) {
    if (value.length !== 3) return fallback;
    const r = toChannel(value[0]);
    const g = toChannel(value[1]);
    const b = toChannel(value[2]);
    if (r === null || g === null || b === null) return fallback;
    return { r, g, b };
  }
  if (typeof value === "object" && value !== null && "r" in value && "g" in value && "b" in value) {
    const r = toChannel(value.r);
    const g = toChannel(value.g);
    const b = toChannel(value.b);
    if (r === null || g === null || b === null) return fallback;
    return { r, g, b };
  }
  return fallback;
}
