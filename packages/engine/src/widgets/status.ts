/**
 * Status widget
 * On/off indicator for a binary entity. Medium and larger cells with an
 * icon get a vertical arrangement with the icon on top.
 */

import { statusIndicator } from "../components/component-helpers.js";
import { column, icon, text, type Component } from "../components/components.js";
import { compareSizeCategory } from "../render-context.js";
import { COLORS, PLACEHOLDER_NAME } from "../rendering/palette.js";
import { THEME_TEXT_PRIMARY } from "../theme.js";
import {
  estimateMaxChars,
  getFriendlyName,
  isEntityOn,
  optionBoolean,
  optionColor,
  optionString,
  readAttribute,
  translateBinaryState,
  truncateText,
} from "./helpers.js";
import { tree, type WidgetDefinition } from "./types.js";

export const statusWidget: WidgetDefinition = {
  type: "status",
  name: "Status",

  render(ctx, config, state) {
    const { options } = config;
    const entity = state.entity;
    const isOn = isEntityOn(entity);
    const onColor = optionColor(options, "on_color", COLORS.lime);
    const offColor = optionColor(options, "off_color", COLORS.red);
    const color = isOn ? onColor : offColor;
    const name = config.label || getFriendlyName(entity) || PLACEHOLDER_NAME;
    const iconName = optionString(options, "icon");
    const showStatus = optionBoolean(options, "show_status_text", true);

    // Explicit texts win; binary sensors otherwise speak their device class
    const deviceClass = readAttribute(entity, "device_class");
    const fallbackText = deviceClass ? translateBinaryState(ctx, isOn ? "on" : "off", deviceClass) : isOn ? "ON" : "OFF";
    const statusText = optionString(options, isOn ? "on_text" : "off_text", fallbackText);

    const { width, height } = ctx;

    if (iconName && compareSizeCategory(ctx.sizeCategory, "medium") >= 0) {
      const padding = Math.trunc(width * 0.08);
      const children: Component[] = [
        icon(iconName, { size: Math.max(32, Math.min(64, Math.trunc(height * 0.4))), color }),
        text(truncateText(name, estimateMaxChars(width, 8, padding * 2), "middle"), {
          font: "small",
          color: THEME_TEXT_PRIMARY,
        }),
      ];
      if (showStatus) children.push(text(statusText, { font: "medium", bold: true, color }));
      return tree(column(children, { gap: Math.trunc(height * 0.05), padding, align: "center", justify: "center" }));
    }

    return tree(
      statusIndicator({
        label: truncateText(name, estimateMaxChars(width, 7, 20), "middle"),
        isOn,
        onColor,
        offColor,
        statusText: showStatus ? statusText : undefined,
        icon: iconName,
        iconSize: Math.max(12, Math.min(24, Math.trunc(height * 0.35))),
        padding: Math.trunc(width * 0.06),
      })
    );
  },
};
