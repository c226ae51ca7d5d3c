/**
 * Status list widget
 * A column of on/off indicators, one per entity, e.g. every door and
 * window sensor in the house.
 */

import { statusIndicator } from "../components/component-helpers.js";
import { column, text, type Component } from "../components/components.js";
import type { RenderContext } from "../render-context.js";
import { COLORS } from "../rendering/palette.js";
import { THEME_TEXT_SECONDARY, type Color } from "../theme.js";
import {
  estimateMaxChars,
  getEntityIcon,
  getFriendlyName,
  isEntityOn,
  optionColor,
  optionString,
  truncateText,
} from "./helpers.js";
import { tree, type WidgetConfig, type WidgetDefinition } from "./types.js";

export interface StatusListEntry {
  entityId: string;
  label?: string;
}

/** Entries are entity ids, or [entity id, label] pairs */
export function readStatusEntries(options: WidgetConfig["options"]): StatusListEntry[] {
  const value = options.entities;
  if (!Array.isArray(value)) return [];
  return value.flatMap((entry: unknown): StatusListEntry[] => {
    if (typeof entry === "string") return entry ? [{ entityId: entry }] : [];
    if (Array.isArray(entry) && typeof entry[0] === "string" && entry[0]) {
      return [{ entityId: entry[0], label: typeof entry[1] === "string" ? entry[1] : undefined }];
    }
    return [];
  });
}

export interface StatusItem {
  label: string;
  isOn: boolean;
  icon: string | null;
}

export interface StatusListOptions {
  onColor: Color;
  offColor: Color;
  onText?: string;
  offText?: string;
  title?: string;
}

export function buildStatusList(
  ctx: Pick<RenderContext, "width" | "height">,
  items: readonly StatusItem[],
  options: StatusListOptions
): Component {
  const { width, height } = ctx;
  const padding = Math.trunc(width * 0.05);
  const available = height - padding * 2 - (options.title ? Math.trunc(height * 0.15) : 0);
  const rowHeight = Math.min(Math.trunc(height * 0.17), Math.floor(available / Math.max(1, items.length)));
  const iconSize = Math.max(10, Math.min(16, Math.trunc(rowHeight * 0.7)));
  const maxChars = estimateMaxChars(width, 7, 30);
  // Status words only show once the scene names them
  const showStatus = Boolean(options.onText || options.offText);

  const rows: Component[] = [];
  if (options.title) {
    rows.push(text(options.title.toUpperCase(), { font: "small", color: THEME_TEXT_SECONDARY, align: "start" }));
  }
  for (const item of items) {
    rows.push(
      statusIndicator({
        label: truncateText(item.label, maxChars, "middle"),
        isOn: item.isOn,
        onColor: options.onColor,
        offColor: options.offColor,
        statusText: showStatus ? (item.isOn ? options.onText : options.offText) : undefined,
        icon: item.icon,
        iconSize,
        font: "tiny",
      })
    );
  }

  return column(rows, { gap: options.title ? 4 : 2, padding, align: "stretch", justify: "start" });
}

export const statusListWidget: WidgetDefinition = {
  type: "status_list",
  name: "Status List",

  entityIds(config) {
    return readStatusEntries(config.options).map((entry) => entry.entityId);
  },

  render(ctx, config, state) {
    const { options } = config;
    const items = readStatusEntries(options).map((entry): StatusItem => {
      const entity = state.entities[entry.entityId] ?? null;
      return {
        label: entry.label || getFriendlyName(entity) || entry.entityId,
        isOn: isEntityOn(entity),
        icon: getEntityIcon(ctx, entity),
      };
    });

    return tree(
      buildStatusList(ctx, items, {
        onColor: optionColor(options, "on_color", COLORS.lime),
        offColor: optionColor(options, "off_color", COLORS.red),
        onText: optionString(options, "on_text"),
        offText: optionString(options, "off_text"),
        title: optionString(options, "title"),
      })
    );
  },
};
