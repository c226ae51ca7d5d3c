/**
 * Chart geometry
 *
 * Pure point math for sparklines; drawing lives in the renderer.
 */

import type { Point, Rect, RGB } from "@glance/core";

/**
 * Interpolate control points with a Catmull-Rom spline.
 *
 * The first and last control points are repeated as phantom neighbours, so
 * the curve starts and ends exactly on the raw data. Two points give a
 * straight line of `numPoints` samples.
 */
export function catmullRom(points: readonly Point[], numPoints = 100): Point[] {
  if (points.length < 2) return [...points];
  if (points.length === 2) {
    const [[ax, ay], [bx, by]] = points;
    const out: Point[] = [];
    for (let i = 0; i < numPoints; i++) {
      const t = numPoints > 1 ? i / (numPoints - 1) : 0;
      out.push([ax + t * (bx - ax), ay + t * (by - ay)]);
    }
    return out;
  }

  const pts: Point[] = [points[0], ...points, points[points.length - 1]];
  const segments = pts.length - 3;
  const perSegment = Math.max(1, Math.floor(numPoints / segments));
  const out: Point[] = [];

  for (let i = 0; i < segments; i++) {
    const [p0, p1, p2, p3] = [pts[i], pts[i + 1], pts[i + 2], pts[i + 3]];
    for (let j = 0; j < perSegment; j++) {
      const t = j / perSegment;
      const t2 = t * t;
      const t3 = t2 * t;
      const axis = (k: 0 | 1) =>
        0.5 *
        (2 * p1[k] +
          (-p0[k] + p2[k]) * t +
          (2 * p0[k] - 5 * p1[k] + 4 * p2[k] - p3[k]) * t2 +
          (-p0[k] + 3 * p1[k] - 3 * p2[k] + p3[k]) * t3);
      out.push([axis(0), axis(1)]);
    }
  }

  out.push(pts[pts.length - 2]);
  return out;
}

/**
 * Place a series in `rect`: x spread evenly from left to right edge, y
 * normalized against the series' own min/max. A flat series sits on the
 * vertical midline.
 */
export function sparklineControlPoints(data: readonly number[], rect: Rect): Point[] {
  const n = data.length;
  if (n === 0) return [];
  const width = rect.x2 - rect.x1;
  const height = rect.y2 - rect.y1;
  const min = Math.min(...data);
  const max = Math.max(...data);
  const range = max - min;

  return data.map((value, i): Point => {
    const x = n > 1 ? rect.x1 + (i / (n - 1)) * width : rect.x1;
    const y = range === 0 ? rect.y2 - height / 2 : rect.y2 - ((value - min) / range) * height;
    return [x, y];
  });
}

/**
 * Points of the sparkline polyline. Smoothing needs at least three values
 * and samples `max(50, width / 2)` points.
 */
export function sparklinePoints(data: readonly number[], rect: Rect, smooth: boolean): Point[] {
  if (data.length < 2) return [];
  const control = sparklineControlPoints(data, rect);
  if (!smooth || control.length < 3) return control;
  const width = rect.x2 - rect.x1;
  return catmullRom(control, Math.max(50, Math.floor(width / 2)));
}

/**
 * Mean of the series normalized to [0, 1]; 0 for a flat series
 */
export function averageNormalized(data: readonly number[]): number {
  if (data.length === 0) return 0;
  const min = Math.min(...data);
  const range = Math.max(...data) - min;
  if (range === 0) return 0;
  return data.reduce((sum, v) => sum + (v - min) / range, 0) / data.length;
}

/**
 * Fill color under a sparkline: the line color at a third of its
 * brightness, or a steel-blue to orange blend picked by the series' average
 */
export function sparklineFillColor(data: readonly number[], color: RGB, gradient: boolean): RGB {
  if (!gradient) {
    return { r: Math.floor(color.r / 3), g: Math.floor(color.g / 3), b: Math.floor(color.b / 3) };
  }
  const a = averageNormalized(data);
  return {
    r: Math.floor(Math.trunc(70 + 185 * a) / 3),
    g: Math.floor(Math.trunc(130 + 10 * a) / 3),
    b: Math.floor(Math.trunc(180 - 180 * a) / 3),
  };
}
