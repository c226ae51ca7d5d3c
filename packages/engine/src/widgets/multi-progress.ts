/**
 * Multi-progress widget
 * Several values against their targets, one progress row each, e.g. the
 * day's activity rings as bars.
 */

import { progressRow } from "../components/component-helpers.js";
import { column, row, text, type Component } from "../components/components.js";
import type { RenderContext } from "../render-context.js";
import { THEME_TEXT_SECONDARY, themeAccent, type Color } from "../theme.js";
import {
  extractNumeric,
  getFriendlyName,
  getUnit,
  optionColor,
  optionNumber,
  optionObjectList,
  optionString,
} from "./helpers.js";
import { progressPercent } from "./progress.js";
import { tree, type WidgetDefinition, type WidgetState } from "./types.js";

export interface ProgressItem {
  label: string;
  value: number;
  target: number;
  color: Color;
  icon?: string;
  unit: string;
}

export function progressItemText(item: Pick<ProgressItem, "value" | "target" | "unit">): string {
  const shown = `${item.value.toFixed(0)}/${item.target.toFixed(0)}`;
  return item.unit ? `${shown} ${item.unit}` : shown;
}

/**
 * Resolve the configured items against the scene's entities. Labels fall
 * back to the friendly name, then the entity id; units to the entity's.
 */
export function readProgressItems(
  ctx: Pick<RenderContext, "resolveColor">,
  options: Readonly<Record<string, unknown>>,
  state: Pick<WidgetState, "entities">
): ProgressItem[] {
  return optionObjectList(options, "items").map((item, i) => {
    const entityId = optionString(item, "entity_id");
    const entity = entityId ? (state.entities[entityId] ?? null) : null;
    return {
      label: optionString(item, "label") || getFriendlyName(entity) || entityId || "Item",
      value: extractNumeric(entity),
      target: optionNumber(item, "target", 100),
      color: optionColor(item, "color", ctx.resolveColor(themeAccent(i))),
      icon: optionString(item, "icon"),
      unit: optionString(item, "unit") || getUnit(entity),
    };
  });
}

export function buildMultiProgress(
  ctx: Pick<RenderContext, "width" | "height">,
  items: readonly ProgressItem[],
  title?: string
): Component {
  const { width, height } = ctx;
  const padding = Math.trunc(width * 0.05);
  const titleHeight = title ? Math.trunc(height * 0.14) : 0;
  const available = height - titleHeight - padding * 2;
  const rowHeight = Math.min(Math.trunc(height * 0.35), Math.floor(available / Math.max(1, items.length)));
  const barHeight = Math.max(4, Math.trunc(height * 0.06));
  const iconSize = Math.max(8, Math.trunc(height * 0.09));

  const children: Component[] = [];
  if (title) {
    children.push(
      row([text(title.toUpperCase(), { font: "small", color: THEME_TEXT_SECONDARY, align: "start" })], { padding })
    );
  }
  for (const item of items) {
    children.push(
      progressRow({
        label: item.label,
        value: progressItemText(item),
        percent: progressPercent(item.value, item.target),
        color: item.color,
        icon: item.icon,
        iconSize,
        barHeight,
        padding,
        gap: Math.trunc(rowHeight * 0.15),
      })
    );
  }

  return column(children, { gap: Math.trunc(height * 0.02), justify: "start", align: "stretch" });
}

export const multiProgressWidget: WidgetDefinition = {
  type: "multi_progress",
  name: "Multi Progress",

  entityIds(config) {
    return optionObjectList(config.options, "items").flatMap((item) => optionString(item, "entity_id") || []);
  },

  render(ctx, config, state) {
    const items = readProgressItems(ctx, config.options, state);
    return tree(buildMultiProgress(ctx, items, optionString(config.options, "title")));
  },
};
