/**
 * Render context
 *
 * A widget's view of the canvas: a rectangle with its own origin. Every
 * draw call takes local coordinates and is translated before it reaches
 * the Renderer, and theme colors are resolved here. Drawing outside the
 * rectangle is logged at debug level and still performed.
 */

import type { Frame, Point, Rect, RGB, Size } from "@glance/core";
import { createLogger } from "@glance/core";
import type { EntityStateTables } from "./entity-states.js";
import type { Font } from "./rendering/bitmap-font.js";
import { COLORS } from "./rendering/palette.js";
import type {
  BarSegment,
  FitMode,
  FontSize,
  GaugeStyle,
  MiniBarStyle,
  PanelStyle,
  Renderer,
  RoundedRectStyle,
  ShapeStyle,
  SparklineStyle,
  TextAnchor,
} from "./rendering/renderer.js";
import { resolveThemeColor, type Color, type Theme } from "./theme.js";

const log = createLogger("context");

export const SIZE_CATEGORIES = ["micro", "tiny", "small", "medium", "large"] as const;

/** Size bucket of a widget's area, from smallest to largest */
export type SizeCategory = (typeof SIZE_CATEGORIES)[number];

/** Upper bounds (exclusive) of the first four categories, in logical pixels */
export const SIZE_THRESHOLDS = {
  micro: 78,
  tiny: 100,
  small: 140,
  medium: 200,
} as const;

export function getSizeCategory(height: number): SizeCategory {
  if (height < SIZE_THRESHOLDS.micro) return "micro";
  if (height < SIZE_THRESHOLDS.tiny) return "tiny";
  if (height < SIZE_THRESHOLDS.small) return "small";
  if (height < SIZE_THRESHOLDS.medium) return "medium";
  return "large";
}

/** Negative when `a` is smaller than `b` */
export function compareSizeCategory(a: SizeCategory, b: SizeCategory): number {
  return SIZE_CATEGORIES.indexOf(a) - SIZE_CATEGORIES.indexOf(b);
}

export class RenderContext {
  readonly renderer: Renderer;
  readonly canvas: Frame;
  readonly theme: Theme;
  readonly width: number;
  readonly height: number;
  private readonly x0: number;
  private readonly y0: number;

  /**
   * @param rect - the widget's area on `canvas`, in logical pixels
   */
  constructor(renderer: Renderer, canvas: Frame, rect: Rect, theme: Theme) {
    this.renderer = renderer;
    this.canvas = canvas;
    this.theme = theme;
    this.x0 = rect.x1;
    this.y0 = rect.y1;
    this.width = rect.x2 - rect.x1;
    this.height = rect.y2 - rect.y1;
  }

  // Responsive helpers

  get sizeCategory(): SizeCategory {
    return getSizeCategory(this.height);
  }

  /** micro, tiny and small areas */
  get isCompact(): boolean {
    return compareSizeCategory(this.sizeCategory, "medium") < 0;
  }

  /** Room for supporting text (medium and large) */
  get showSecondary(): boolean {
    return compareSizeCategory(this.sizeCategory, "medium") >= 0;
  }

  /** Room for captions and extras (large only) */
  get showTertiary(): boolean {
    return this.sizeCategory === "large";
  }

  /** Binary sensor wording and icon lookups from the asset catalog */
  get entityStates(): EntityStateTables {
    return this.renderer.entityStates;
  }

  resolveColor(color: Color): RGB {
    return resolveThemeColor(this.theme, color);
  }

  // Coordinates

  private abs([x, y]: Point): Point {
    return [this.x0 + x, this.y0 + y];
  }

  private absRect(rect: Rect): Rect {
    return { x1: this.x0 + rect.x1, y1: this.y0 + rect.y1, x2: this.x0 + rect.x2, y2: this.y0 + rect.y2 };
  }

  isPointInBounds(x: number, y: number): boolean {
    return x >= 0 && x <= this.width && y >= 0 && y <= this.height;
  }

  isRectInBounds(rect: Rect): boolean {
    return rect.x1 >= 0 && rect.y1 >= 0 && rect.x2 <= this.width && rect.y2 <= this.height;
  }

  private checkPoint([x, y]: Point, what: string): void {
    if (!this.isPointInBounds(x, y)) {
      log.debug(`${what} at (${x}, ${y}) is outside ${this.width}x${this.height}`);
    }
  }

  private checkRect(rect: Rect, what: string): void {
    if (!this.isRectInBounds(rect)) {
      log.debug(`${what} (${rect.x1}, ${rect.y1}, ${rect.x2}, ${rect.y2}) is outside ${this.width}x${this.height}`);
    }
  }

  // Fonts

  /** Font scaled to this context's height */
  getFont(size: FontSize = "secondary", bold = false, adjust = 0): Font {
    return this.renderer.getScaledFont(size, this.height * this.renderer.scale, bold, adjust);
  }

  /**
   * Largest font whose rendering of `text` fits. Defaults to 95% of the
   * width and 90% of the height.
   */
  fitText(text: string, maxWidth?: number, maxHeight?: number, bold = false): Font {
    const w = maxWidth ?? Math.trunc(this.width * 0.95);
    const h = maxHeight ?? Math.trunc(this.height * 0.9);
    return this.renderer.fitTextFont(text, w * this.renderer.scale, h * this.renderer.scale, bold);
  }

  /** Font about `targetHeight` logical pixels tall */
  getFontForHeight(targetHeight: number, bold = false): Font {
    return this.renderer.getScaledFont("primary", targetHeight * this.renderer.scale, bold);
  }

  getTextSize(text: string, font?: Font): Size {
    return this.renderer.getTextSize(text, font ?? this.getFont("regular"));
  }

  // Drawing, all in local coordinates

  drawText(text: string, position: Point, font?: Font, color: Color = COLORS.white, anchor?: TextAnchor): void {
    this.checkPoint(position, "text");
    this.renderer.drawText(this.canvas, text, this.abs(position), font ?? this.getFont("regular"), this.resolveColor(color), anchor);
  }

  private resolveShape(style: ShapeStyle<Color>): ShapeStyle {
    return {
      fill: style.fill && this.resolveColor(style.fill),
      outline: style.outline && this.resolveColor(style.outline),
      width: style.width,
    };
  }

  drawRect(rect: Rect, style: ShapeStyle<Color> = {}): void {
    this.checkRect(rect, "rect");
    this.renderer.drawRect(this.canvas, this.absRect(rect), this.resolveShape(style));
  }

  drawRoundedRect(rect: Rect, style: RoundedRectStyle<Color> = {}): void {
    this.checkRect(rect, "rounded rect");
    this.renderer.drawRoundedRect(this.canvas, this.absRect(rect), { ...this.resolveShape(style), radius: style.radius });
  }

  drawPanel(rect: Rect, style: PanelStyle<Color> = {}): void {
    this.checkRect(rect, "panel");
    this.renderer.drawPanel(this.canvas, this.absRect(rect), {
      background: this.resolveColor(style.background ?? COLORS.panel),
      border: style.border && this.resolveColor(style.border),
      radius: style.radius,
    });
  }

  drawEllipse(rect: Rect, style: ShapeStyle<Color> = {}): void {
    this.checkRect(rect, "ellipse");
    this.renderer.drawEllipse(this.canvas, this.absRect(rect), this.resolveShape(style));
  }

  drawLine(points: readonly Point[], color: Color = COLORS.white, width = 1): void {
    points.forEach((p) => this.checkPoint(p, "line"));
    this.renderer.drawLine(
      this.canvas,
      points.map((p) => this.abs(p)),
      this.resolveColor(color),
      width
    );
  }

  drawPolygon(points: readonly Point[], style: ShapeStyle<Color> = {}): void {
    points.forEach((p) => this.checkPoint(p, "polygon"));
    this.renderer.drawPolygon(
      this.canvas,
      points.map((p) => this.abs(p)),
      this.resolveShape(style)
    );
  }

  drawIcon(name: string, position: Point, size = 16, color: Color = COLORS.white): void {
    const [x, y] = position;
    this.checkRect({ x1: x, y1: y, x2: x + size, y2: y + size }, `icon "${name}"`);
    this.renderer.drawIcon(this.canvas, name, this.abs(position), size, this.resolveColor(color));
  }

  drawBar(rect: Rect, percent: number, color: Color = COLORS.cyan, background: Color = COLORS.gray): void {
    this.checkRect(rect, "bar");
    this.renderer.drawBar(this.canvas, this.absRect(rect), percent, this.resolveColor(color), this.resolveColor(background));
  }

  drawArc(rect: Rect, percent: number, style: GaugeStyle<Color> = {}): void {
    this.checkRect(rect, "arc");
    this.renderer.drawArc(this.canvas, this.absRect(rect), percent, {
      color: style.color && this.resolveColor(style.color),
      background: style.background && this.resolveColor(style.background),
      width: style.width,
    });
  }

  drawRingGauge(center: Point, radius: number, percent: number, style: GaugeStyle<Color> = {}): void {
    const [cx, cy] = center;
    this.checkRect({ x1: cx - radius, y1: cy - radius, x2: cx + radius, y2: cy + radius }, "ring");
    this.renderer.drawRingGauge(this.canvas, this.abs(center), radius, percent, {
      color: style.color && this.resolveColor(style.color),
      background: style.background && this.resolveColor(style.background),
      width: style.width,
    });
  }

  drawSparkline(rect: Rect, data: readonly number[], style: SparklineStyle<Color> = {}): void {
    this.checkRect(rect, "sparkline");
    this.renderer.drawSparkline(this.canvas, this.absRect(rect), data, {
      ...style,
      color: style.color && this.resolveColor(style.color),
    });
  }

  drawTimelineBar(rect: Rect, data: readonly number[], onColor: Color = COLORS.cyan, offColor: Color = COLORS.gray): void {
    this.checkRect(rect, "timeline");
    this.renderer.drawTimelineBar(this.canvas, this.absRect(rect), data, this.resolveColor(onColor), this.resolveColor(offColor));
  }

  drawSegmentedBar(rect: Rect, segments: readonly BarSegment<Color>[], background: Color = COLORS.darkGray): void {
    this.checkRect(rect, "segmented bar");
    this.renderer.drawSegmentedBar(
      this.canvas,
      this.absRect(rect),
      segments.map((seg) => ({ percent: seg.percent, color: this.resolveColor(seg.color) })),
      this.resolveColor(background)
    );
  }

  drawMiniBars(rect: Rect, data: readonly number[], style: MiniBarStyle<Color> = {}): void {
    this.checkRect(rect, "mini bars");
    this.renderer.drawMiniBars(this.canvas, this.absRect(rect), data, {
      ...style,
      color: style.color && this.resolveColor(style.color),
      background: style.background && this.resolveColor(style.background),
    });
  }

  /** Paste an image; without `rect` it fills the whole context */
  drawImage(source: Frame, rect?: Rect, fit: FitMode = "contain"): void {
    const target = rect ?? { x1: 0, y1: 0, x2: this.width, y2: this.height };
    this.checkRect(target, "image");
    this.renderer.drawImage(this.canvas, source, this.absRect(target), fit);
  }

  // Colors

  dimColor(color: Color, factor = 0.3): RGB {
    return this.renderer.dimColor(this.resolveColor(color), factor);
  }

  blendColor(a: Color, b: Color, factor = 0.5): RGB {
    return this.renderer.blendColor(this.resolveColor(a), this.resolveColor(b), factor);
  }
}
