/**
 * Dashboard pipeline
 *
 * One refresh cycle: decode payloads, build the layout, run the
 * synchronous render pass, then encode. Only the codec steps await.
 */

import type { Frame } from "@glance/core";
import { createLogger } from "@glance/core";
import type { AssetCatalog } from "./asset-catalog.js";
import { DEFAULT_CONFIG, type EngineConfig } from "./config.js";
import { createLayout, type Layout, type LayoutOptions } from "./layouts/layout.js";
import type { LayoutType } from "./layouts/geometry.js";
import { decodeImage } from "./rendering/codec.js";
import { Renderer } from "./rendering/renderer.js";
import type { Theme } from "./theme.js";
import { createWidget } from "./widgets/registry.js";
import type { EntitySnapshot, ForecastEntry, WidgetConfig, WidgetState } from "./widgets/types.js";

const log = createLogger("dashboard");

export interface SceneLayout extends Omit<LayoutOptions, "width" | "height"> {
  type: LayoutType;
}

/** Everything one cycle needs, already fetched */
export interface DashboardScene {
  layout: SceneLayout;
  theme?: string;
  widgets: readonly WidgetConfig[];
  entities: Readonly<Record<string, EntitySnapshot>>;
  /** History series by slot index */
  history: ReadonlyMap<number, readonly number[]>;
  forecast: readonly ForecastEntry[];
  /** Encoded image payloads by slot index */
  images: ReadonlyMap<number, Uint8Array>;
  now: Date;
}

export interface RenderedDashboard {
  jpeg: Buffer;
  png: Buffer;
  /** Display-resolution frame before rotation */
  frame: Frame;
  layout: Layout;
  /** Slots whose widget threw */
  failedSlots: number[];
}

/**
 * Build a layout and place the scene's widgets in it
 */
export function buildLayout(scene: Pick<DashboardScene, "layout" | "widgets">, config: EngineConfig = DEFAULT_CONFIG): Layout {
  const { type, ...options } = scene.layout;
  const layout = createLayout(type, { ...options, width: config.width, height: config.height });
  for (const widgetConfig of scene.widgets) {
    layout.setWidget(widgetConfig.slot, createWidget(widgetConfig));
  }
  return layout;
}

/**
 * Per-slot widget state. Image payloads are decoded here so the render
 * pass itself does no I/O; a payload that fails to decode leaves the
 * slot without an image.
 */
export async function prepareWidgetState(scene: DashboardScene, layout: Layout): Promise<Map<number, WidgetState>> {
  const states = new Map<number, WidgetState>();

  for (const slot of layout.slots) {
    const widget = slot.widget;
    if (!widget) continue;

    const entityId = widget.config.entityId;
    const entity = entityId === undefined ? null : (scene.entities[entityId] ?? null);
    if (entityId !== undefined && entity === null) {
      log.debug(`No snapshot for ${entityId} (slot ${slot.index})`);
    }

    let image: Frame | null = null;
    const payload = scene.images.get(slot.index);
    if (payload) {
      try {
        image = await decodeImage(payload);
      } catch (error) {
        log.warn(`Could not decode image for slot ${slot.index}:`, error instanceof Error ? error.message : error);
      }
    }

    states.set(slot.index, {
      entity,
      entities: scene.entities,
      history: scene.history.get(slot.index) ?? [],
      forecast: scene.forecast,
      image,
      now: scene.now,
    });
  }
  return states;
}

/**
 * The synchronous render pass. Returns the supersampled canvas and the
 * slots that failed.
 */
export function composeFrame(
  renderer: Renderer,
  layout: Layout,
  states: ReadonlyMap<number, WidgetState>,
  theme: Theme
): { canvas: Frame; failedSlots: number[] } {
  const canvas = renderer.createCanvas(theme.background);
  if (layout.isEmpty) {
    renderer.drawWelcomeScreen(canvas);
    return { canvas, failedSlots: [] };
  }
  const failedSlots = layout.render(renderer, canvas, states, theme);
  return { canvas, failedSlots };
}

/**
 * Render a scene to JPEG (within the byte budget) and PNG
 */
export async function renderDashboard(
  scene: DashboardScene,
  catalog: AssetCatalog,
  config: EngineConfig = DEFAULT_CONFIG
): Promise<RenderedDashboard> {
  const renderer = new Renderer(catalog, config);
  const theme = catalog.theme(scene.theme ?? config.theme);
  const layout = buildLayout(scene, config);
  const states = await prepareWidgetState(scene, layout);

  const started = Date.now();
  const { canvas, failedSlots } = composeFrame(renderer, layout, states, theme);
  log.debug(`Rendered ${layout.type} with ${layout.slotCount} slots in ${Date.now() - started}ms`);

  const [jpeg, png] = await Promise.all([renderer.toJpeg(canvas), renderer.toPng(canvas)]);
  return { jpeg, png, frame: renderer.finalize(canvas), layout, failedSlots };
}
