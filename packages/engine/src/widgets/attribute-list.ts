/**
 * Attribute list widget
 * Label/value rows read from one entity's attributes, e.g. a bus
 * arrival sensor's route, destination and due time.
 */

import type { RGB } from "@glance/core";
import { createHorizontalLayout, createVerticalLayout } from "../components/flex-layout.js";
import type { RenderContext } from "../render-context.js";
import { PLACEHOLDER_NAME, PLACEHOLDER_VALUE } from "../rendering/palette.js";
import { THEME_TEXT_SECONDARY, themeAccent } from "../theme.js";
import { getFriendlyName, isOptionRecord, optionColor, optionString, truncateToWidth } from "./helpers.js";
import { DRAWN, type EntitySnapshot, type WidgetDefinition } from "./types.js";

/** Minimum space between a label and its value */
const ROW_GAP = 6;

export interface AttributeRow {
  label: string;
  value: string;
  color: RGB;
}

/** Display form of an attribute value */
export function formatAttributeValue(value: unknown): string {
  if (value === null || value === undefined) return PLACEHOLDER_VALUE;
  if (typeof value === "boolean") return value ? "Yes" : "No";
  if (typeof value === "number") return Number.isInteger(value) ? String(value) : value.toFixed(1);
  if (Array.isArray(value)) return `[${value.length} items]`;
  if (typeof value === "object") return `{${Object.keys(value).length} keys}`;
  return String(value);
}

/**
 * Widths for a label and value sharing `available` pixels. When both do
 * not fit the label gets 40% and the value 60%, and a side that needs
 * less than its share gives the rest to the other.
 */
export function splitLabelValue(
  labelWidth: number,
  valueWidth: number,
  available: number
): { label: number; value: number } {
  if (labelWidth + valueWidth <= available) return { label: labelWidth, value: available - labelWidth };

  const labelMax = Math.trunc(available * 0.4);
  if (labelWidth <= labelMax) return { label: labelWidth, value: available - labelWidth };
  if (valueWidth <= available - labelMax) return { label: available - valueWidth, value: valueWidth };
  return { label: labelMax, value: available - labelMax };
}

/**
 * One row per configured attribute. Entries are attribute names, or
 * objects with a key and optional label and color; the key "state"
 * reads the entity's state.
 */
export function readAttributeRows(
  options: Readonly<Record<string, unknown>>,
  entity: EntitySnapshot | null,
  accent: RGB
): AttributeRow[] {
  const raw = options.attributes;
  if (!Array.isArray(raw)) return [];

  return raw.map((entry: unknown): AttributeRow => {
    const item = isOptionRecord(entry) ? entry : null;
    const key = item ? optionString(item, "key", "") : String(entry);
    const label = item ? optionString(item, "label", key) : key;
    const color = item ? optionColor(item, "color", accent) : accent;

    let value = PLACEHOLDER_VALUE;
    if (entity?.available) value = key === "state" ? entity.state : formatAttributeValue(entity.attributes[key]);
    return { label, value, color };
  });
}

export function drawAttributeList(ctx: RenderContext, rows: readonly AttributeRow[], title?: string): void {
  const padding = Math.trunc(ctx.width * 0.05);
  const innerWidth = ctx.width - padding * 2;
  const innerHeight = ctx.height - padding * 2;
  const titleFont = ctx.getFont("small");
  const labelFont = ctx.getFont("small");
  const valueFont = ctx.getFont("small", true);
  const lineHeight = ctx.getTextSize("Hg", labelFont).height;
  const gap = title ? 4 : 2;

  const sizes: Record<string, number | null> = {};
  if (title) sizes.title = lineHeight;
  rows.forEach((_, i) => {
    if (title || i > 0) sizes[`gap${i}`] = gap;
    sizes[`row${i}`] = lineHeight;
  });
  sizes.rest = null;
  const boxes = createVerticalLayout(innerWidth, innerHeight, sizes);

  if (title) {
    const [, cy] = boxes.title.center;
    const shown = truncateToWidth(ctx, title.toUpperCase(), titleFont, innerWidth);
    ctx.drawText(shown, [padding, padding + cy], titleFont, THEME_TEXT_SECONDARY, "lm");
  }

  rows.forEach((row, i) => {
    const box = boxes[`row${i}`];
    // Rows past the bottom edge are dropped
    if (box.bottom > innerHeight) return;

    const labelWidth = ctx.getTextSize(row.label, labelFont).width;
    const valueWidth = ctx.getTextSize(row.value, valueFont).width;
    const split = splitLabelValue(labelWidth, valueWidth, innerWidth - ROW_GAP);
    const parts = createHorizontalLayout(innerWidth, box.height, { label: split.label, gap: ROW_GAP, value: null });
    const y = padding + box.center[1];

    const label = truncateToWidth(ctx, row.label, labelFont, parts.label.width);
    ctx.drawText(label, [padding, y], labelFont, THEME_TEXT_SECONDARY, "lm");
    ctx.drawText(
      truncateToWidth(ctx, row.value, valueFont, parts.value.width),
      [padding + parts.value.right, y],
      valueFont,
      row.color,
      "rm"
    );
  });
}

export const attributeListWidget: WidgetDefinition = {
  type: "attribute_list",
  name: "Attribute List",

  render(ctx, config, state) {
    const { options } = config;
    const entity = state.entity;
    const rows = readAttributeRows(options, entity, ctx.resolveColor(config.color ?? themeAccent(config.slot)));

    let title = optionString(options, "title");
    // Without attributes the entity's name stands in as the title
    if (rows.length === 0) title = title || getFriendlyName(entity) || config.entityId || PLACEHOLDER_NAME;

    drawAttributeList(ctx, rows, title);
    return DRAWN;
  },
};
