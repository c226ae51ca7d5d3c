/**
 * Shared color and sizing constants for dashboard rendering
 */

import type { RGB } from "@glance/core";

export const COLORS = {
  white: { r: 255, g: 255, b: 255 },
  black: { r: 0, g: 0, b: 0 },
  gray: { r: 150, g: 150, b: 150 },
  darkGray: { r: 50, g: 50, b: 50 },
  panel: { r: 18, g: 18, b: 18 },
  panelBorder: { r: 60, g: 60, b: 60 },

  // Accents
  purple: { r: 127, g: 60, b: 141 },
  teal: { r: 17, g: 165, b: 121 },
  blue: { r: 57, g: 105, b: 172 },
  yellow: { r: 242, g: 183, b: 1 },
  pink: { r: 231, g: 63, b: 116 },
  green: { r: 128, g: 186, b: 90 },
  cyan: { r: 27, g: 158, b: 119 },
  orange: { r: 217, g: 95, b: 2 },
  lavender: { r: 117, g: 112, b: 179 },
  magenta: { r: 231, g: 41, b: 138 },
  lime: { r: 102, g: 166, b: 30 },
  gold: { r: 230, g: 171, b: 2 },
  brown: { r: 166, g: 118, b: 29 },
  red: { r: 231, g: 76, b: 60 },
} satisfies Record<string, RGB>;

/** Shown when a value is missing or not numeric */
export const PLACEHOLDER_VALUE = "--";
export const PLACEHOLDER_TEXT = "No data";
export const PLACEHOLDER_NAME = "Unknown";

/** Spacing steps in logical pixels */
export const SPACING = {
  xs: 4,
  sm: 6,
  md: 8,
  lg: 10,
  xl: 14,
} as const;

/** Icon sizes in logical pixels */
export const ICON_SIZE = {
  xs: 12,
  sm: 14,
  md: 16,
  lg: 20,
  xl: 24,
  xxl: 32,
} as const;
