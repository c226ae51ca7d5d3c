/**
 * Renderer
 *
 * Draws onto a supersampled canvas. Every public method takes logical
 * coordinates (the 240x240 display space); values are multiplied by the
 * scale factor and truncated before they reach the raster primitives.
 * finalize() box-filters the canvas back down, which anti-aliases every
 * edge drawn at the higher resolution.
 */

import type { Frame, Point, Rect, RGB, Size } from "@glance/core";
import {
  blendColor,
  blitFrame,
  createLogger,
  createSolidFrame,
  cropFrame,
  dimColor,
  downscaleFrame,
  resizeFrame,
  rotateFrame,
  type Rotation,
} from "@glance/core";
import type { AssetCatalog } from "../asset-catalog.js";
import type { EntityStateTables } from "../entity-states.js";
import { DEFAULT_CONFIG, type EngineConfig } from "../config.js";
import { measureTextWidth, paintText, type Font, type FontChain } from "./bitmap-font.js";
import { sparklineFillColor, sparklinePoints } from "./charts.js";
import { clampQuality, encodeJpeg, encodePng } from "./codec.js";
import type { IconSet } from "./icons.js";
import { COLORS } from "./palette.js";
import {
  fillEllipse,
  fillPolygon,
  fillRect,
  fillRoundedRect,
  strokeArc,
  strokeEllipse,
  strokePolyline,
  strokeRect,
  strokeRoundedRect,
} from "./raster.js";

const log = createLogger("renderer");

/** Font sizes relative to the container height */
export type SemanticFontSize = "primary" | "secondary" | "tertiary";
/** Fixed font sizes, scaled with the container */
export type NamedFontSize = "tiny" | "small" | "regular" | "medium" | "large" | "xlarge" | "huge";
export type FontSize = SemanticFontSize | NamedFontSize;

const SEMANTIC_RATIOS: Record<SemanticFontSize, number> = {
  primary: 0.35,
  secondary: 0.2,
  tertiary: 0.12,
};

/** [size at a full-height container in scaled pixels, minimum size] */
const NAMED_SIZES: Record<NamedFontSize, readonly [number, number]> = {
  tiny: [38, 20],
  small: [57, 28],
  regular: [72, 36],
  medium: [96, 48],
  large: [134, 67],
  xlarge: [168, 84],
  huge: [216, 108],
};

const SEMANTIC_MIN_SIZE = 22;

export function isFontSize(value: string): value is FontSize {
  return Object.hasOwn(SEMANTIC_RATIOS, value) || Object.hasOwn(NAMED_SIZES, value);
}

function isSemantic(size: FontSize): size is SemanticFontSize {
  return Object.hasOwn(SEMANTIC_RATIOS, size);
}

/** Horizontal (l, m, r) then vertical (t, m, b) text anchor */
export type TextAnchor = `${"l" | "m" | "r"}${"t" | "m" | "b"}`;

export type FitMode = "contain" | "cover" | "stretch";

export interface ShapeStyle<C = RGB> {
  fill?: C;
  outline?: C;
  /** Outline width in logical pixels */
  width?: number;
}

export interface RoundedRectStyle<C = RGB> extends ShapeStyle<C> {
  radius?: number;
}

export interface GaugeStyle<C = RGB> {
  color?: C;
  background?: C;
  width?: number;
}

export interface SparklineStyle<C = RGB> {
  color?: C;
  fill?: boolean;
  smooth?: boolean;
  gradient?: boolean;
}

export interface BarSegment<C = RGB> {
  percent: number;
  color: C;
}

export interface MiniBarStyle<C = RGB> {
  color?: C;
  background?: C;
  barWidth?: number;
  gap?: number;
}

export interface PanelStyle<C = RGB> {
  background?: C;
  border?: C;
  radius?: number;
}

export interface ExportOptions {
  quality?: number;
  /** Byte budget; null disables the cap. Defaults to the configured budget. */
  maxBytes?: number | null;
  rotation?: Rotation;
}

export function clampPercent(percent: number): number {
  if (Number.isNaN(percent)) return 0;
  return Math.max(0, Math.min(100, percent));
}

export class Renderer {
  readonly width: number;
  readonly height: number;
  readonly scale: number;
  readonly icons: IconSet;
  readonly entityStates: EntityStateTables;
  private readonly config: EngineConfig;
  private readonly fonts: FontChain;
  private readonly fontCache = new Map<string, Font>();

  constructor(catalog: AssetCatalog, config: EngineConfig = DEFAULT_CONFIG) {
    this.config = config;
    this.width = config.width;
    this.height = config.height;
    this.scale = config.scale;
    this.fonts = catalog.fonts;
    this.icons = catalog.icons;
    this.entityStates = catalog.entityStates;
  }

  get scaledWidth(): number {
    return this.width * this.scale;
  }

  get scaledHeight(): number {
    return this.height * this.scale;
  }

  /** Logical to canvas pixels */
  s(value: number): number {
    return Math.trunc(value * this.scale);
  }

  private scaleRect(rect: Rect): Rect {
    return { x1: this.s(rect.x1), y1: this.s(rect.y1), x2: this.s(rect.x2), y2: this.s(rect.y2) };
  }

  private scalePoint([x, y]: Point): Point {
    return [this.s(x), this.s(y)];
  }

  // ---------------------------------------------------------------------------
  // Canvas
  // ---------------------------------------------------------------------------

  createCanvas(background: RGB = COLORS.black): Frame {
    return createSolidFrame(this.scaledWidth, this.scaledHeight, background);
  }

  /** Off-screen canvas for a region of `width` x `height` logical pixels */
  createSurface(width: number, height: number, background: RGB = COLORS.black): Frame {
    return createSolidFrame(Math.max(0, this.s(width)), Math.max(0, this.s(height)), background);
  }

  /** Paste a surface with its top-left corner at logical (x, y) */
  pasteSurface(canvas: Frame, surface: Frame, x: number, y: number): void {
    blitFrame(canvas, surface, this.s(x), this.s(y));
  }

  // ---------------------------------------------------------------------------
  // Fonts
  // ---------------------------------------------------------------------------

  private font(size: number, bold: boolean): Font {
    const key = `${size}:${bold ? "b" : "r"}`;
    let font = this.fontCache.get(key);
    if (!font) {
      font = { face: this.fonts, size, bold };
      this.fontCache.set(key, font);
    }
    return font;
  }

  /**
   * Font scaled to a container.
   *
   * Semantic sizes are a fraction of the container height (never below 22
   * scaled pixels). Named sizes scale their full-screen size by the
   * container's share of the canvas height, with a per-size floor. Each
   * `adjust` step is a 15% change.
   *
   * @param containerHeight - container height in canvas (scaled) pixels
   */
  getScaledFont(size: FontSize, containerHeight: number, bold = false, adjust = 0): Font {
    const adjustFactor = 1.15 ** adjust;
    let px: number;
    if (isSemantic(size)) {
      px = Math.max(SEMANTIC_MIN_SIZE, Math.trunc(containerHeight * SEMANTIC_RATIOS[size] * adjustFactor));
    } else {
      const [base, min] = NAMED_SIZES[size] ?? NAMED_SIZES.regular;
      px = Math.max(min, Math.trunc(base * (containerHeight / this.scaledHeight) * adjustFactor));
    }
    return this.font(px, bold);
  }

  /**
   * Largest font (binary search over sizes) whose rendering of `text`
   * fits in maxWidth x maxHeight canvas pixels
   */
  fitTextFont(text: string, maxWidth: number, maxHeight: number, bold = false, minSize = 20, maxSize = 200): Font {
    let low = minSize;
    let high = maxSize;
    let best = this.font(minSize, bold);
    while (low <= high) {
      const mid = Math.floor((low + high) / 2);
      const font = this.font(mid, bold);
      if (measureTextWidth(font, text) <= maxWidth && font.size <= maxHeight) {
        best = font;
        low = mid + 1;
      } else {
        high = mid - 1;
      }
    }
    return best;
  }

  /** Default font: "regular" at full canvas height */
  get defaultFont(): Font {
    return this.getScaledFont("regular", this.scaledHeight);
  }

  /** Text size in logical pixels */
  getTextSize(text: string, font: Font = this.defaultFont): Size {
    if (text.length === 0) return { width: 0, height: 0 };
    return {
      width: Math.trunc(measureTextWidth(font, text) / this.scale),
      height: Math.trunc(font.size / this.scale),
    };
  }

  // ---------------------------------------------------------------------------
  // Primitives
  // ---------------------------------------------------------------------------

  drawText(
    canvas: Frame,
    text: string,
    position: Point,
    font: Font = this.defaultFont,
    color: RGB = COLORS.white,
    anchor: TextAnchor = "lt"
  ): void {
    if (text.length === 0) return;
    const [x, y] = this.scalePoint(position);
    const width = measureTextWidth(font, text);
    const left = anchor[0] === "l" ? x : anchor[0] === "m" ? x - width / 2 : x - width;
    const top = anchor[1] === "t" ? y : anchor[1] === "m" ? y - font.size / 2 : y - font.size;
    paintText(canvas, font, text, Math.round(left), Math.round(top), color);
  }

  drawRect(canvas: Frame, rect: Rect, style: ShapeStyle = {}): void {
    const r = this.scaleRect(rect);
    if (style.fill) fillRect(canvas, r, style.fill);
    if (style.outline) strokeRect(canvas, r, style.outline, this.s(style.width ?? 1));
  }

  drawRoundedRect(canvas: Frame, rect: Rect, style: RoundedRectStyle = {}): void {
    const r = this.scaleRect(rect);
    const radius = this.s(style.radius ?? 4);
    if (style.fill) fillRoundedRect(canvas, r, radius, style.fill);
    if (style.outline) strokeRoundedRect(canvas, r, radius, style.outline, this.s(style.width ?? 1));
  }

  drawEllipse(canvas: Frame, rect: Rect, style: ShapeStyle = {}): void {
    const r = this.scaleRect(rect);
    if (style.fill) fillEllipse(canvas, r, style.fill);
    if (style.outline) strokeEllipse(canvas, r, style.outline, this.s(style.width ?? 1));
  }

  drawLine(canvas: Frame, points: readonly Point[], color: RGB = COLORS.white, width = 1): void {
    if (points.length < 2) return;
    strokePolyline(
      canvas,
      points.map((p) => this.scalePoint(p)),
      color,
      this.s(width)
    );
  }

  drawPolygon(canvas: Frame, points: readonly Point[], style: ShapeStyle = {}): void {
    if (points.length < 2) return;
    const pts = points.map((p) => this.scalePoint(p));
    if (style.fill) fillPolygon(canvas, pts, style.fill);
    if (style.outline) strokePolyline(canvas, [...pts, pts[0]], style.outline, this.s(style.width ?? 1));
  }

  /**
   * Draw a named vector icon in the `size` x `size` box at `position`
   * (top-left). Unknown names draw the fallback icon.
   */
  drawIcon(canvas: Frame, name: string, position: Point, size = 16, color: RGB = COLORS.white): void {
    const [x, y] = this.scalePoint(position);
    this.icons.draw(canvas, name, x, y, this.s(size), color);
  }

  /**
   * Paste a decoded image into `rect`.
   * - contain: fit inside, letterboxed and centered
   * - cover: fill, cropping the overflow around the center
   * - stretch: fill, ignoring the aspect ratio
   */
  drawImage(canvas: Frame, source: Frame, rect: Rect, fit: FitMode = "contain"): void {
    const { x1, y1, x2, y2 } = this.scaleRect(rect);
    const destWidth = x2 - x1;
    const destHeight = y2 - y1;
    if (destWidth <= 0 || destHeight <= 0 || source.width === 0 || source.height === 0) return;

    const srcRatio = source.width / source.height;
    const destRatio = destWidth / destHeight;

    if (fit === "contain") {
      const wider = srcRatio > destRatio;
      const w = wider ? destWidth : Math.trunc(destHeight * srcRatio);
      const h = wider ? Math.trunc(destWidth / srcRatio) : destHeight;
      const resized = resizeFrame(source, w, h);
      blitFrame(canvas, resized, x1 + Math.floor((destWidth - w) / 2), y1 + Math.floor((destHeight - h) / 2));
    } else if (fit === "cover") {
      const wider = srcRatio > destRatio;
      const w = wider ? Math.trunc(destHeight * srcRatio) : destWidth;
      const h = wider ? destHeight : Math.trunc(destWidth / srcRatio);
      const resized = resizeFrame(source, w, h);
      const cx = Math.floor((w - destWidth) / 2);
      const cy = Math.floor((h - destHeight) / 2);
      blitFrame(canvas, cropFrame(resized, { x1: cx, y1: cy, x2: cx + destWidth, y2: cy + destHeight }), x1, y1);
    } else {
      blitFrame(canvas, resizeFrame(source, destWidth, destHeight), x1, y1);
    }
  }

  // ---------------------------------------------------------------------------
  // Gauges and charts
  // ---------------------------------------------------------------------------

  /**
   * Horizontal progress bar. The fill is drawn only when it is at least
   * one logical pixel wide.
   */
  drawBar(canvas: Frame, rect: Rect, percent: number, color: RGB = COLORS.cyan, background: RGB = COLORS.gray): void {
    const fillWidth = Math.trunc((rect.x2 - rect.x1) * (clampPercent(percent) / 100));
    this.drawRoundedRect(canvas, rect, { radius: 2, fill: background });
    if (fillWidth > 0) {
      this.drawRoundedRect(canvas, { ...rect, x2: rect.x1 + fillWidth }, { radius: 2, fill: color });
    }
  }

  /** 270-degree gauge opening at the bottom, filling clockwise from 135 degrees */
  drawArc(canvas: Frame, rect: Rect, percent: number, style: GaugeStyle = {}): void {
    const bbox = this.scaleRect(rect);
    const width = this.s(style.width ?? 8);
    const p = clampPercent(percent);
    strokeArc(canvas, bbox, 135, 405, style.background ?? COLORS.gray, width);
    if (p > 0) {
      strokeArc(canvas, bbox, 135, 135 + (p / 100) * 270, style.color ?? COLORS.cyan, width);
    }
  }

  /** Full ring filling clockwise from 12 o'clock */
  drawRingGauge(canvas: Frame, center: Point, radius: number, percent: number, style: GaugeStyle = {}): void {
    const [cx, cy] = this.scalePoint(center);
    const r = this.s(radius);
    const width = this.s(style.width ?? 6);
    const bbox = { x1: cx - r, y1: cy - r, x2: cx + r, y2: cy + r };
    const p = clampPercent(percent);
    strokeArc(canvas, bbox, 0, 360, style.background ?? COLORS.darkGray, width);
    if (p > 0) {
      strokeArc(canvas, bbox, -90, -90 + (p / 100) * 360, style.color ?? COLORS.cyan, width);
    }
  }

  /**
   * Line chart of `data` normalized to its own range. Fewer than two
   * values draw nothing.
   */
  drawSparkline(canvas: Frame, rect: Rect, data: readonly number[], style: SparklineStyle = {}): void {
    if (data.length < 2) return;
    const r = this.scaleRect(rect);
    const color = style.color ?? COLORS.cyan;
    const points = sparklinePoints(data, r, style.smooth ?? true).map(([x, y]): Point => [Math.trunc(x), Math.trunc(y)]);

    if (style.fill ?? true) {
      fillPolygon(canvas, [[r.x1, r.y2], ...points, [r.x2, r.y2]], sparklineFillColor(data, color, style.gradient ?? false));
    }
    strokePolyline(canvas, points, color, this.s(2));
  }

  /**
   * Equal-width segments colored by state; values of 0.5 and above are "on"
   */
  drawTimelineBar(
    canvas: Frame,
    rect: Rect,
    data: readonly number[],
    onColor: RGB = COLORS.cyan,
    offColor: RGB = COLORS.gray
  ): void {
    if (data.length === 0) return;
    const { x1, y1, x2, y2 } = this.scaleRect(rect);
    const segment = (x2 - x1) / data.length;
    data.forEach((value, i) => {
      fillRect(
        canvas,
        { x1: Math.trunc(x1 + i * segment), y1, x2: Math.trunc(x1 + (i + 1) * segment), y2 },
        value >= 0.5 ? onColor : offColor
      );
    });
  }

  /**
   * Segments left to right over a rounded background. Edges sit at the
   * rounded running total, so the widths add up to the covered share of
   * the bar; anything past 100% is cut off.
   */
  drawSegmentedBar(
    canvas: Frame,
    rect: Rect,
    segments: readonly BarSegment[],
    background: RGB = COLORS.darkGray,
    radius = 2
  ): void {
    const total = rect.x2 - rect.x1;
    this.drawRoundedRect(canvas, rect, { radius, fill: background });
    let covered = 0;
    let x = rect.x1;
    for (const seg of segments) {
      covered = Math.min(100, covered + clampPercent(seg.percent));
      const end = rect.x1 + Math.round((total * covered) / 100);
      if (end > x) {
        this.drawRect(canvas, { x1: x, y1: rect.y1, x2: end, y2: rect.y2 }, { fill: seg.color });
        x = end;
      }
    }
  }

  /**
   * Vertical bars, newest on the right. Only as many trailing values as
   * fit are shown.
   */
  drawMiniBars(canvas: Frame, rect: Rect, data: readonly number[], style: MiniBarStyle = {}): void {
    if (data.length === 0) return;
    const { x1, y1, x2, y2 } = this.scaleRect(rect);
    const height = y2 - y1;
    const bw = this.s(style.barWidth ?? 3);
    const gap = this.s(style.gap ?? 1);
    if (bw + gap <= 0) return;

    if (style.background) fillRect(canvas, { x1, y1, x2, y2 }, style.background);

    // A series that never rises above zero is scaled against 1
    const max = Math.max(...data) > 0 ? Math.max(...data) : 1;
    const min = Math.min(...data);
    const range = max !== min ? max - min : 1;
    const count = Math.min(data.length, Math.floor((x2 - x1) / (bw + gap)));
    const shown = data.slice(data.length - count).reverse();

    shown.forEach((value, i) => {
      const barX = x2 - (i + 1) * (bw + gap);
      if (barX < x1) return;
      const barHeight = Math.max(Math.trunc(((value - min) / range) * height * 0.9), this.s(2));
      fillRect(canvas, { x1: barX, y1: y2 - barHeight, x2: barX + bw, y2 }, style.color ?? COLORS.cyan);
    });
  }

  /** Card background with rounded corners */
  drawPanel(canvas: Frame, rect: Rect, style: PanelStyle = {}): void {
    this.drawRoundedRect(canvas, rect, {
      radius: style.radius ?? 4,
      fill: style.background ?? COLORS.panel,
      outline: style.border,
    });
  }

  // ---------------------------------------------------------------------------
  // Colors
  // ---------------------------------------------------------------------------

  dimColor(color: RGB, factor = 0.3): RGB {
    return dimColor(color, factor);
  }

  blendColor(a: RGB, b: RGB, factor = 0.5): RGB {
    return blendColor(a, b, factor);
  }

  // ---------------------------------------------------------------------------
  // Export
  // ---------------------------------------------------------------------------

  /** Downscale the supersampled canvas to display resolution */
  finalize(canvas: Frame): Frame {
    return downscaleFrame(canvas, this.scale);
  }

  /**
   * Encode the canvas as JPEG within the byte budget. While the output is
   * too large, quality drops by the configured step until it reaches the
   * floor; the last attempt is returned even if it is still over budget.
   */
  async toJpeg(canvas: Frame, options: ExportOptions = {}): Promise<Buffer> {
    const maxBytes = options.maxBytes === undefined ? this.config.maxImageBytes : (options.maxBytes ?? Infinity);
    const frame = rotateFrame(this.finalize(canvas), options.rotation ?? this.config.rotation);
    const step = Math.max(1, this.config.qualityStep);

    let quality = clampQuality(options.quality ?? this.config.jpegQuality);
    let result = await encodeJpeg(frame, quality);
    while (result.length > maxBytes && quality > this.config.qualityFloor) {
      quality -= step;
      result = await encodeJpeg(frame, quality);
    }

    if (result.length > maxBytes) {
      log.warn(`JPEG is ${result.length} bytes at quality ${clampQuality(quality)}, over the ${maxBytes} byte budget`);
    } else {
      log.debug(`JPEG ${result.length} bytes at quality ${clampQuality(quality)}`);
    }
    return result;
  }

  async toPng(canvas: Frame, options: Pick<ExportOptions, "rotation"> = {}): Promise<Buffer> {
    return encodePng(rotateFrame(this.finalize(canvas), options.rotation ?? this.config.rotation));
  }

  // ---------------------------------------------------------------------------
  // Welcome screen
  // ---------------------------------------------------------------------------

  /** Placeholder shown when nothing is configured */
  drawWelcomeScreen(canvas: Frame): void {
    const cx = Math.floor(this.width / 2);
    const cy = Math.floor(this.height / 2);

    for (let i = 0; i < 3; i++) {
      const offset = i * 15;
      const shade = 30 - i * 8;
      this.drawRoundedRect(
        canvas,
        { x1: offset, y1: offset, x2: this.width - offset, y2: this.height - offset },
        { radius: 20 - i * 5, fill: { r: shade, g: shade, b: shade + 5 } }
      );
    }

    // Gear
    const gearY = cy - 50;
    const gear = 40;
    const inner = Math.floor(gear / 3);
    this.drawEllipse(
      canvas,
      { x1: cx - gear / 2, y1: gearY - gear / 2, x2: cx + gear / 2, y2: gearY + gear / 2 },
      { outline: COLORS.cyan }
    );
    this.drawEllipse(
      canvas,
      {
        x1: cx - Math.floor(inner / 2),
        y1: gearY - Math.floor(inner / 2),
        x2: cx + Math.floor(inner / 2),
        y2: gearY + Math.floor(inner / 2),
      },
      { fill: COLORS.cyan }
    );
    for (let angle = 0; angle < 360; angle += 45) {
      const rad = (angle * Math.PI) / 180;
      const tx = cx + Math.trunc((gear / 2 + 2) * Math.cos(rad));
      const ty = gearY + Math.trunc((gear / 2 + 2) * Math.sin(rad));
      this.drawRect(canvas, { x1: tx - 3, y1: ty - 4, x2: tx + 3, y2: ty + 4 }, { fill: COLORS.cyan });
    }

    const full = this.scaledHeight;
    this.drawText(canvas, "Glance", [cx, cy + 10], this.getScaledFont("large", full), COLORS.white, "mm");
    this.drawText(canvas, "Dashboard", [cx, cy + 35], this.getScaledFont("small", full), COLORS.cyan, "mm");
    this.drawText(canvas, "Add widgets to", [cx, cy + 65], this.getScaledFont("tiny", full), COLORS.gray, "mm");
    this.drawText(canvas, "a scene file", [cx, cy + 80], this.getScaledFont("tiny", full), COLORS.gray, "mm");
  }
}
