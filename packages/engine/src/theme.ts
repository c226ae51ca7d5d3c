/**
 * Color themes
 */

import type { RGB } from "@glance/core";
import { parseColor } from "@glance/core";

export interface Theme {
  name: string;
  background: RGB;
  panel: RGB;
  panelBorder: RGB;
  textPrimary: RGB;
  textSecondary: RGB;
  /** Accent colors, cycled by index */
  accents: RGB[];
}

/** Semantic color slots a component can ask for instead of a fixed color */
export type ThemeRole = "textPrimary" | "textSecondary" | "accent" | "background" | "panel";

export interface ThemeColor {
  role: ThemeRole;
  /** Accent index, only used by the "accent" role */
  index?: number;
}

/** Either a literal color or a theme slot resolved at draw time */
export type Color = RGB | ThemeColor;

export const THEME_TEXT_PRIMARY: ThemeColor = { role: "textPrimary" };
export const THEME_TEXT_SECONDARY: ThemeColor = { role: "textSecondary" };

export function themeAccent(index = 0): ThemeColor {
  return { role: "accent", index };
}

export function isThemeColor(color: Color): color is ThemeColor {
  return "role" in color;
}

/**
 * Accent for `index`, wrapping around the palette
 */
export function accentColor(theme: Theme, index = 0): RGB {
  if (theme.accents.length === 0) return theme.textPrimary;
  const i = ((Math.trunc(index) % theme.accents.length) + theme.accents.length) % theme.accents.length;
  return theme.accents[i];
}

export function resolveThemeColor(theme: Theme, color: Color): RGB {
  if (!isThemeColor(color)) return color;
  switch (color.role) {
    case "textPrimary":
      return theme.textPrimary;
    case "textSecondary":
      return theme.textSecondary;
    case "accent":
      return accentColor(theme, color.index ?? 0);
    case "background":
      return theme.background;
    case "panel":
      return theme.panel;
  }
}

const BLACK: RGB = { r: 0, g: 0, b: 0 };
const WHITE: RGB = { r: 255, g: 255, b: 255 };

/**
 * Parse one theme entry from themes.json. Missing colors fall back to the
 * dark defaults.
 */
export function parseTheme(value: unknown): Theme {
  if (!isRecord(value) || typeof value.name !== "string") {
    throw new Error("theme entry must be an object with a name");
  }
  const accents = Array.isArray(value.accents) ? value.accents.map((a: unknown) => parseColor(a, WHITE)) : [];

  return {
    name: value.name,
    background: parseColor(value.background, BLACK),
    panel: parseColor(value.panel, { r: 18, g: 18, b: 18 }),
    panelBorder: parseColor(value.panelBorder, { r: 60, g: 60, b: 60 }),
    textPrimary: parseColor(value.textPrimary, WHITE),
    textSecondary: parseColor(value.textSecondary, { r: 150, g: 150, b: 150 }),
    accents,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
