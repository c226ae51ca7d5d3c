/**
 * Slot geometry for every layout type
 *
 * Each function turns the canvas size, padding and gap into the ordered
 * list of slot rectangles. Cells along an axis share
 * `(available - (n - 1) * gap) / n`, truncated to whole pixels.
 */

import { rectFromSize, type Rect } from "@glance/core";

export const LAYOUT_TYPES = [
  "grid_2x2",
  "grid_2x3",
  "grid_3x2",
  "grid_3x3",
  "hero",
  "hero_simple",
  "split_horizontal",
  "split_vertical",
  "split_h_1_2",
  "split_h_2_1",
  "three_column",
  "three_row",
  "sidebar_left",
  "sidebar_right",
  "hero_corner_tl",
  "hero_corner_tr",
  "hero_corner_bl",
  "hero_corner_br",
  "fullscreen",
] as const;

export type LayoutType = (typeof LAYOUT_TYPES)[number];

export function isLayoutType(value: string): value is LayoutType {
  return LAYOUT_TYPES.some((type) => type === value);
}

/** The padded area slots are carved from */
export interface Area {
  x: number;
  y: number;
  width: number;
  height: number;
  gap: number;
}

export function cellSize(available: number, count: number, gap: number): number {
  return Math.trunc((available - (count - 1) * gap) / count);
}

/** Whole pixels of `total` at `ratio`; float noise such as 143.99999 rounds back up */
export function portion(total: number, ratio: number): number {
  return Math.trunc(Math.round(total * ratio * 1e6) / 1e6);
}

/** `rows` x `cols` equal cells, row-major */
export function gridSlots(area: Area, rows: number, cols: number): Rect[] {
  const w = cellSize(area.width, cols, area.gap);
  const h = cellSize(area.height, rows, area.gap);
  const rects: Rect[] = [];
  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) {
      rects.push(rectFromSize(area.x + c * (w + area.gap), area.y + r * (h + area.gap), w, h));
    }
  }
  return rects;
}

/**
 * Hero on top taking `heroRatio` of the gapped height, then a footer row
 * of `footerSlots` equal cells
 */
export function heroSlots(area: Area, heroRatio: number, footerSlots: number): Rect[] {
  const heroHeight = portion(area.height - area.gap, heroRatio);
  const footerY = area.y + heroHeight + area.gap;
  const footerHeight = area.height - heroHeight - area.gap;
  const rects = [rectFromSize(area.x, area.y, area.width, heroHeight)];
  if (footerSlots <= 0) return rects;
  const w = cellSize(area.width, footerSlots, area.gap);
  for (let i = 0; i < footerSlots; i++) {
    rects.push(rectFromSize(area.x + i * (w + area.gap), footerY, w, footerHeight));
  }
  return rects;
}

/** Left/right (horizontal) or top/bottom (vertical) split at `ratio` */
export function splitSlots(area: Area, direction: "horizontal" | "vertical", ratio: number): Rect[] {
  if (direction === "horizontal") {
    const first = portion(area.width - area.gap, ratio);
    return [
      rectFromSize(area.x, area.y, first, area.height),
      rectFromSize(area.x + first + area.gap, area.y, area.width - first - area.gap, area.height),
    ];
  }
  const first = portion(area.height - area.gap, ratio);
  return [
    rectFromSize(area.x, area.y, area.width, first),
    rectFromSize(area.x, area.y + first + area.gap, area.width, area.height - first - area.gap),
  ];
}

/**
 * A wide pane (2/3 of the width) and a column of three rows. The wide pane
 * is always slot 0.
 */
export function sidebarSlots(area: Area, side: "left" | "right"): Rect[] {
  const wide = portion(area.width - area.gap, 2 / 3);
  const narrow = area.width - wide - area.gap;
  const wideX = side === "left" ? area.x : area.x + narrow + area.gap;
  const rowsX = side === "left" ? area.x + wide + area.gap : area.x;
  const h = cellSize(area.height, 3, area.gap);

  const rects = [rectFromSize(wideX, area.y, wide, area.height)];
  for (let i = 0; i < 3; i++) {
    rects.push(rectFromSize(rowsX, area.y + i * (h + area.gap), narrow, h));
  }
  return rects;
}

export type Corner = "tl" | "tr" | "bl" | "br";

/**
 * 3x3 grid where the hero (slot 0) covers the 2x2 block in `corner`; the
 * five remaining cells follow in row-major order
 */
export function heroCornerSlots(area: Area, corner: Corner): Rect[] {
  const cells = gridSlots(area, 3, 3);
  const heroRows = corner[0] === "t" ? [0, 1] : [1, 2];
  const heroCols = corner[1] === "l" ? [0, 1] : [1, 2];
  const covered = (index: number) => heroRows.includes(Math.floor(index / 3)) && heroCols.includes(index % 3);

  const first = cells[heroRows[0] * 3 + heroCols[0]];
  const last = cells[heroRows[1] * 3 + heroCols[1]];
  const hero: Rect = { x1: first.x1, y1: first.y1, x2: last.x2, y2: last.y2 };
  return [hero, ...cells.filter((_, i) => !covered(i))];
}
