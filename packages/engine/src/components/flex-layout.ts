/**
 * Box-model helpers for widgets that position things by hand
 *
 * Each helper splits one axis into named LayoutBoxes in local
 * coordinates; drawing is left to the caller.
 */

import type { Rect } from "@glance/core";

export class LayoutBox {
  constructor(
    readonly x: number,
    readonly y: number,
    readonly width: number,
    readonly height: number
  ) {}

  get center(): [number, number] {
    return [this.x + Math.floor(this.width / 2), this.y + Math.floor(this.height / 2)];
  }

  get right(): number {
    return this.x + this.width;
  }

  get bottom(): number {
    return this.y + this.height;
  }

  get rect(): Rect {
    return { x1: this.x, y1: this.y, x2: this.right, y2: this.bottom };
  }
}

/** Fixed sizes, or null for an entry that shares the remaining space */
export type LayoutSpec = Readonly<Record<string, number | null>>;

function splitAxis(total: number, sizes: LayoutSpec): Map<string, { offset: number; size: number }> {
  const entries = Object.entries(sizes);
  const fixed = entries.reduce((sum, [, size]) => sum + (size ?? 0), 0);
  const flexCount = entries.filter(([, size]) => size === null).length;
  const share = flexCount > 0 ? Math.floor(Math.max(0, total - fixed) / flexCount) : 0;

  const out = new Map<string, { offset: number; size: number }>();
  let offset = 0;
  for (const [name, size] of entries) {
    const resolved = size ?? share;
    out.set(name, { offset, size: resolved });
    offset += resolved;
  }
  return out;
}

/**
 * Stack entries top to bottom, each spanning the full width
 */
export function createVerticalLayout(width: number, height: number, sizes: LayoutSpec): Record<string, LayoutBox> {
  const boxes: Record<string, LayoutBox> = {};
  for (const [name, { offset, size }] of splitAxis(height, sizes)) {
    boxes[name] = new LayoutBox(0, offset, width, size);
  }
  return boxes;
}

/**
 * Place entries left to right, each spanning the full height
 */
export function createHorizontalLayout(width: number, height: number, sizes: LayoutSpec): Record<string, LayoutBox> {
  const boxes: Record<string, LayoutBox> = {};
  for (const [name, { offset, size }] of splitAxis(width, sizes)) {
    boxes[name] = new LayoutBox(offset, 0, size, height);
  }
  return boxes;
}
