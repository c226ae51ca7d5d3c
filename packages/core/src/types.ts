/**
 * Core types shared by the renderer, the layout system and the CLI
 */

/** Width and height in pixels */
export interface Size {
  width: number;
  height: number;
}

/** RGB color (0-255 per channel) */
export interface RGB {
  r: number;
  g: number;
  b: number;
}

/** A single frame of pixel data */
export interface Frame {
  width: number;
  height: number;
  /** Flat array of RGB values: [r0,g0,b0, r1,g1,b1, ...] */
  pixels: Uint8Array;
}

/**
 * Axis-aligned rectangle. Edges are half-open: x2 and y2 are the first
 * column and row outside the rectangle.
 */
export interface Rect {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

/** A point as [x, y] */
export type Point = readonly [number, number];

/** Width of a rectangle */
export function rectWidth(rect: Rect): number {
  return rect.x2 - rect.x1;
}

/** Height of a rectangle */
export function rectHeight(rect: Rect): number {
  return rect.y2 - rect.y1;
}

/** Build a rect from origin and size */
export function rectFromSize(x: number, y: number, width: number, height: number): Rect {
  return { x1: x, y1: y, x2: x + width, y2: y + height };
}

/** True when the two rectangles share at least one pixel */
export function rectsOverlap(a: Rect, b: Rect): boolean {
  return a.x1 < b.x2 && b.x1 < a.x2 && a.y1 < b.y2 && b.y1 < a.y2;
}
