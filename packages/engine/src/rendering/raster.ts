/**
 * Raster primitives on RGB frames
 *
 * Everything here works in canvas pixels (already supersampled). Shapes are
 * sampled at pixel centres: a pixel belongs to a shape when (x + 0.5, y + 0.5)
 * lies inside it. Rects are half-open.
 */

import type { Frame, Point, Rect, RGB } from "@glance/core";
import { fillRect as fillPixels, fillSpan, setPixel } from "@glance/core";

/** A horizontal run [x1, x2) */
type Span = readonly [number, number];

/**
 * Fill an axis-aligned rectangle with edges rounded to whole pixels
 */
export function fillRect(frame: Frame, rect: Rect, color: RGB): void {
  fillPixels(
    frame,
    { x1: Math.round(rect.x1), y1: Math.round(rect.y1), x2: Math.round(rect.x2), y2: Math.round(rect.y2) },
    color
  );
}

function clampRadius(rect: Rect, radius: number): number {
  const w = rect.x2 - rect.x1;
  const h = rect.y2 - rect.y1;
  return Math.max(0, Math.min(radius, w / 2, h / 2));
}

/**
 * Span of a rounded rectangle on the row whose centre is `yc`
 */
function roundedSpan(rect: Rect, radius: number, yc: number): Span | null {
  if (yc < rect.y1 || yc >= rect.y2 || rect.x2 <= rect.x1) return null;
  const r = clampRadius(rect, radius);
  let inset = 0;
  if (r > 0) {
    let d = 0;
    if (yc < rect.y1 + r) d = rect.y1 + r - yc;
    else if (yc > rect.y2 - r) d = yc - (rect.y2 - r);
    if (d > 0) inset = r - Math.sqrt(Math.max(0, r * r - d * d));
  }
  const a = Math.round(rect.x1 + inset);
  const b = Math.round(rect.x2 - inset);
  return b > a ? [a, b] : null;
}

/**
 * Span of the ellipse inscribed in `rect` on the row whose centre is `yc`
 */
function ellipseSpan(rect: Rect, yc: number): Span | null {
  const rx = (rect.x2 - rect.x1) / 2;
  const ry = (rect.y2 - rect.y1) / 2;
  if (rx <= 0 || ry <= 0) return null;
  const cx = rect.x1 + rx;
  const cy = rect.y1 + ry;
  const dy = (yc - cy) / ry;
  if (Math.abs(dy) > 1) return null;
  const half = rx * Math.sqrt(1 - dy * dy);
  const a = Math.round(cx - half);
  const b = Math.round(cx + half);
  return b > a ? [a, b] : null;
}

function insetRect(rect: Rect, by: number): Rect {
  return { x1: rect.x1 + by, y1: rect.y1 + by, x2: rect.x2 - by, y2: rect.y2 - by };
}

/**
 * Fill the outer shape minus the inner one, row by row
 */
function fillRing(
  frame: Frame,
  rows: Rect,
  outer: (yc: number) => Span | null,
  inner: (yc: number) => Span | null,
  color: RGB
): void {
  const y1 = Math.max(0, Math.floor(rows.y1));
  const y2 = Math.min(frame.height, Math.ceil(rows.y2));
  for (let y = y1; y < y2; y++) {
    const yc = y + 0.5;
    const o = outer(yc);
    if (!o) continue;
    const i = inner(yc);
    if (!i || i[0] >= o[1] || i[1] <= o[0]) {
      fillSpan(frame, y, o[0], o[1], color);
      continue;
    }
    fillSpan(frame, y, o[0], i[0], color);
    fillSpan(frame, y, i[1], o[1], color);
  }
}

/**
 * Outline a rectangle with a border `width` pixels thick, drawn inward
 */
export function strokeRect(frame: Frame, rect: Rect, color: RGB, width: number): void {
  strokeRoundedRect(frame, rect, 0, color, width);
}

export function fillRoundedRect(frame: Frame, rect: Rect, radius: number, color: RGB): void {
  const y1 = Math.max(0, Math.floor(rect.y1));
  const y2 = Math.min(frame.height, Math.ceil(rect.y2));
  for (let y = y1; y < y2; y++) {
    const span = roundedSpan(rect, radius, y + 0.5);
    if (span) fillSpan(frame, y, span[0], span[1], color);
  }
}

export function strokeRoundedRect(
  frame: Frame,
  rect: Rect,
  radius: number,
  color: RGB,
  width: number
): void {
  const w = Math.max(1, width);
  const inner = insetRect(rect, w);
  const innerRadius = Math.max(0, radius - w);
  fillRing(
    frame,
    rect,
    (yc) => roundedSpan(rect, radius, yc),
    (yc) => roundedSpan(inner, innerRadius, yc),
    color
  );
}

/**
 * Fill the ellipse inscribed in `rect`
 */
export function fillEllipse(frame: Frame, rect: Rect, color: RGB): void {
  const y1 = Math.max(0, Math.floor(rect.y1));
  const y2 = Math.min(frame.height, Math.ceil(rect.y2));
  for (let y = y1; y < y2; y++) {
    const span = ellipseSpan(rect, y + 0.5);
    if (span) fillSpan(frame, y, span[0], span[1], color);
  }
}

export function strokeEllipse(frame: Frame, rect: Rect, color: RGB, width: number): void {
  const inner = insetRect(rect, Math.max(1, width));
  fillRing(
    frame,
    rect,
    (yc) => ellipseSpan(rect, yc),
    (yc) => ellipseSpan(inner, yc),
    color
  );
}

/**
 * Fill a polygon using the even-odd rule
 */
export function fillPolygon(frame: Frame, points: readonly Point[], color: RGB): void {
  if (points.length < 3) return;
  let minY = Infinity;
  let maxY = -Infinity;
  for (const [, y] of points) {
    minY = Math.min(minY, y);
    maxY = Math.max(maxY, y);
  }
  const y1 = Math.max(0, Math.floor(minY));
  const y2 = Math.min(frame.height, Math.ceil(maxY));

  const crossings: number[] = [];
  for (let y = y1; y < y2; y++) {
    const yc = y + 0.5;
    crossings.length = 0;
    for (let i = 0; i < points.length; i++) {
      const [ax, ay] = points[i];
      const [bx, by] = points[(i + 1) % points.length];
      if ((ay <= yc && by > yc) || (by <= yc && ay > yc)) {
        crossings.push(ax + ((yc - ay) / (by - ay)) * (bx - ax));
      }
    }
    crossings.sort((a, b) => a - b);
    for (let i = 0; i + 1 < crossings.length; i += 2) {
      fillSpan(frame, y, Math.ceil(crossings[i] - 0.5), Math.ceil(crossings[i + 1] - 0.5), color);
    }
  }
}

/**
 * One-pixel line (Bresenham)
 */
function thinLine(frame: Frame, from: Point, to: Point, color: RGB): void {
  let x0 = Math.round(from[0]);
  let y0 = Math.round(from[1]);
  const x1 = Math.round(to[0]);
  const y1 = Math.round(to[1]);
  const dx = Math.abs(x1 - x0);
  const dy = -Math.abs(y1 - y0);
  const sx = x0 < x1 ? 1 : -1;
  const sy = y0 < y1 ? 1 : -1;
  let err = dx + dy;

  for (;;) {
    setPixel(frame, x0, y0, color);
    if (x0 === x1 && y0 === y1) break;
    const e2 = 2 * err;
    if (e2 >= dy) {
      err += dy;
      x0 += sx;
    }
    if (e2 <= dx) {
      err += dx;
      y0 += sy;
    }
  }
}

/**
 * Draw a polyline. Segments wider than two pixels get round joins.
 */
export function strokePolyline(frame: Frame, points: readonly Point[], color: RGB, width: number): void {
  if (points.length < 2) return;
  if (width <= 1) {
    for (let i = 0; i + 1 < points.length; i++) {
      thinLine(frame, points[i], points[i + 1], color);
    }
    return;
  }

  const half = width / 2;
  for (let i = 0; i + 1 < points.length; i++) {
    const [ax, ay] = points[i];
    const [bx, by] = points[i + 1];
    const len = Math.hypot(bx - ax, by - ay);
    if (len === 0) continue;
    const nx = (-(by - ay) / len) * half;
    const ny = ((bx - ax) / len) * half;
    fillPolygon(
      frame,
      [
        [ax + nx, ay + ny],
        [bx + nx, by + ny],
        [bx - nx, by - ny],
        [ax - nx, ay - ny],
      ],
      color
    );
  }

  if (width > 2) {
    for (let i = 1; i + 1 < points.length; i++) {
      const [x, y] = points[i];
      fillEllipse(frame, { x1: x - half, y1: y - half, x2: x + half, y2: y + half }, color);
    }
  }
}

/**
 * Normalise an angle in degrees to [0, 360)
 */
function normalizeAngle(deg: number): number {
  const a = deg % 360;
  return a < 0 ? a + 360 : a;
}

/**
 * True when `angle` lies on the clockwise sweep from `start` to `end`
 */
export function angleInSweep(angle: number, start: number, end: number): boolean {
  const sweep = end - start;
  if (sweep <= 0) return false;
  if (sweep >= 360) return true;
  const s = normalizeAngle(start);
  const a = normalizeAngle(angle);
  return (a >= s && a <= s + sweep) || (a + 360 >= s && a + 360 <= s + sweep);
}

/**
 * Stroke part of the ellipse inscribed in `bbox`, `width` pixels thick,
 * drawn inward. Angles are degrees measured clockwise from 3 o'clock, so
 * -90 is 12 o'clock.
 */
export function strokeArc(
  frame: Frame,
  bbox: Rect,
  start: number,
  end: number,
  color: RGB,
  width: number
): void {
  const rx = (bbox.x2 - bbox.x1) / 2;
  const ry = (bbox.y2 - bbox.y1) / 2;
  if (rx <= 0 || ry <= 0 || end <= start) return;
  const cx = bbox.x1 + rx;
  const cy = bbox.y1 + ry;
  const w = Math.max(1, width);
  const irx = rx - w;
  const iry = ry - w;

  const y1 = Math.max(0, Math.floor(bbox.y1));
  const y2 = Math.min(frame.height, Math.ceil(bbox.y2));
  const x1 = Math.max(0, Math.floor(bbox.x1));
  const x2 = Math.min(frame.width, Math.ceil(bbox.x2));

  for (let y = y1; y < y2; y++) {
    const dy = y + 0.5 - cy;
    for (let x = x1; x < x2; x++) {
      const dx = x + 0.5 - cx;
      if ((dx * dx) / (rx * rx) + (dy * dy) / (ry * ry) > 1) continue;
      if (irx > 0 && iry > 0 && (dx * dx) / (irx * irx) + (dy * dy) / (iry * iry) < 1) continue;
      const angle = (Math.atan2(dy, dx) * 180) / Math.PI;
      if (angleInSweep(angle, start, end)) {
        setPixel(frame, x, y, color);
      }
    }
  }
}
