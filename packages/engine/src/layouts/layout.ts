/**
 * Layouts and slots
 *
 * A Layout owns an ordered list of slots. Rendering gives every occupied
 * slot its own off-screen surface, so a widget can never paint over its
 * neighbours, then pastes the surfaces onto the main canvas.
 */

import type { Frame, Rect } from "@glance/core";
import { createLogger, rectHeight, rectWidth } from "@glance/core";
import { renderComponent } from "../components/layout.js";
import { RenderContext } from "../render-context.js";
import type { Renderer } from "../rendering/renderer.js";
import type { Theme } from "../theme.js";
import { emptyWidgetState, type Widget, type WidgetState } from "../widgets/types.js";
import {
  gridSlots,
  heroCornerSlots,
  heroSlots,
  sidebarSlots,
  splitSlots,
  type Area,
  type LayoutType,
} from "./geometry.js";

const log = createLogger("layout");

export interface Slot {
  readonly index: number;
  readonly rect: Rect;
  widget: Widget | null;
}

export interface LayoutOptions {
  padding?: number;
  gap?: number;
  /** Split layouts: share of the first pane */
  ratio?: number;
  /** Hero layouts: share of the hero row */
  heroRatio?: number;
  /** Hero layout: cells in the footer row */
  footerSlots?: number;
  /** Canvas size in logical pixels */
  width?: number;
  height?: number;
}

export const DEFAULT_PADDING = 8;
export const DEFAULT_GAP = 8;

/**
 * Safely render a widget, catching and logging any errors.
 * Returns true if rendering succeeded, false if it failed.
 */
function safeRender(name: string, renderFn: () => void): boolean {
  try {
    renderFn();
    return true;
  } catch (error) {
    log.error(`[${name}] Render failed:`, error);
    return false;
  }
}

export class Layout {
  readonly type: LayoutType;
  readonly padding: number;
  readonly gap: number;
  readonly width: number;
  readonly height: number;
  readonly slots: readonly Slot[];

  constructor(type: LayoutType, rects: readonly Rect[], options: Required<Pick<LayoutOptions, "padding" | "gap" | "width" | "height">>) {
    this.type = type;
    this.padding = options.padding;
    this.gap = options.gap;
    this.width = options.width;
    this.height = options.height;
    this.slots = rects.map((rect, index) => ({ index, rect, widget: null }));
  }

  get slotCount(): number {
    return this.slots.length;
  }

  getSlot(index: number): Slot | null {
    return this.slots[index] ?? null;
  }

  /**
   * Place a widget. Indices outside the layout are ignored.
   */
  setWidget(index: number, widget: Widget): void {
    const slot = Number.isInteger(index) ? this.getSlot(index) : null;
    if (!slot) {
      log.debug(`${this.type} has no slot ${index}, ignoring ${widget.config.type} widget`);
      return;
    }
    slot.widget = widget;
  }

  /** True when no slot holds a widget */
  get isEmpty(): boolean {
    return this.slots.every((slot) => slot.widget === null);
  }

  getAllEntities(): string[] {
    return this.slots.flatMap((slot) => slot.widget?.entityIds() ?? []);
  }

  /**
   * Draw every occupied slot onto `canvas`. A widget that throws leaves
   * its slot showing the background. Returns the slots that failed.
   */
  render(renderer: Renderer, canvas: Frame, states: ReadonlyMap<number, WidgetState>, theme: Theme): number[] {
    const failed: number[] = [];
    const errors: string[] = [];
    const fallbackState = emptyWidgetState();

    for (const slot of this.slots) {
      const widget = slot.widget;
      if (!widget) continue;
      const width = rectWidth(slot.rect);
      const height = rectHeight(slot.rect);
      const surface = renderer.createSurface(width, height, theme.background);
      const ctx = new RenderContext(renderer, surface, { x1: 0, y1: 0, x2: width, y2: height }, theme);
      const state = states.get(slot.index) ?? fallbackState;

      const name = `${widget.config.type}@${slot.index}`;
      const ok = safeRender(name, () => {
        const output = widget.render(ctx, state);
        if (output.kind === "tree") renderComponent(ctx, output.root, 0, 0, width, height);
      });
      if (ok) {
        renderer.pasteSurface(canvas, surface, slot.rect.x1, slot.rect.y1);
      } else {
        failed.push(slot.index);
        errors.push(name);
      }
    }

    if (errors.length > 0) {
      log.warn(`Frame rendered with ${errors.length} widget error(s): ${errors.join(", ")}`);
    }
    return failed;
  }
}

/**
 * Build the layout for `type`
 */
export function createLayout(type: LayoutType, options: LayoutOptions = {}): Layout {
  const width = options.width ?? 240;
  const height = options.height ?? 240;
  const padding = type === "fullscreen" ? 0 : (options.padding ?? DEFAULT_PADDING);
  const gap = options.gap ?? DEFAULT_GAP;
  const area: Area = { x: padding, y: padding, width: width - padding * 2, height: height - padding * 2, gap };
  const ratio = options.ratio ?? 0.5;

  let rects: Rect[];
  switch (type) {
    case "grid_2x2":
      rects = gridSlots(area, 2, 2);
      break;
    case "grid_2x3":
      rects = gridSlots(area, 2, 3);
      break;
    case "grid_3x2":
      rects = gridSlots(area, 3, 2);
      break;
    case "grid_3x3":
      rects = gridSlots(area, 3, 3);
      break;
    case "hero":
      rects = heroSlots(area, options.heroRatio ?? 0.65, options.footerSlots ?? 3);
      break;
    case "hero_simple":
      rects = heroSlots(area, options.heroRatio ?? 0.75, 1);
      break;
    case "split_horizontal":
      rects = splitSlots(area, "horizontal", ratio);
      break;
    case "split_vertical":
      rects = splitSlots(area, "vertical", ratio);
      break;
    case "split_h_1_2":
      rects = splitSlots(area, "horizontal", 1 / 3);
      break;
    case "split_h_2_1":
      rects = splitSlots(area, "horizontal", 2 / 3);
      break;
    case "three_column":
      rects = gridSlots(area, 1, 3);
      break;
    case "three_row":
      rects = gridSlots(area, 3, 1);
      break;
    case "sidebar_left":
      rects = sidebarSlots(area, "left");
      break;
    case "sidebar_right":
      rects = sidebarSlots(area, "right");
      break;
    case "hero_corner_tl":
      rects = heroCornerSlots(area, "tl");
      break;
    case "hero_corner_tr":
      rects = heroCornerSlots(area, "tr");
      break;
    case "hero_corner_bl":
      rects = heroCornerSlots(area, "bl");
      break;
    case "hero_corner_br":
      rects = heroCornerSlots(area, "br");
      break;
    case "fullscreen":
      rects = [{ x1: 0, y1: 0, x2: width, y2: height }];
      break;
  }
  return new Layout(type, rects, { padding, gap, width, height });
}
