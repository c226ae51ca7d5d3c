/**
 * Chart widget
 * Sparkline of the entity's history with its current value and range.
 * A series made only of 0 and 1 is drawn as an on/off timeline instead.
 */

import { renderComponent } from "../components/layout.js";
import { row, spacer, text, type Component } from "../components/components.js";
import { PLACEHOLDER_TEXT } from "../rendering/palette.js";
import { THEME_TEXT_SECONDARY, themeAccent } from "../theme.js";
import {
  estimateMaxChars,
  getFriendlyName,
  getUnit,
  optionBoolean,
  readNumeric,
  truncateText,
} from "./helpers.js";
import { DRAWN, type WidgetDefinition } from "./types.js";

export function isBinarySeries(data: readonly number[]): boolean {
  return data.length > 0 && data.every((v) => v === 0 || v === 1);
}

export const chartWidget: WidgetDefinition = {
  type: "chart",
  name: "Chart",

  render(ctx, config, state) {
    const { options } = config;
    const showRange = optionBoolean(options, "show_range", true);
    const data = state.history;
    const label = config.label || getFriendlyName(state.entity);
    const current = optionBoolean(options, "show_value", true) ? readNumeric(state.entity) : null;
    const color = config.color ?? themeAccent(config.slot);

    const { width, height } = ctx;
    const fontLabel = ctx.getFont("small");
    const padding = Math.trunc(width * 0.08);
    const binary = isBinarySeries(data);

    const headerHeight = Math.trunc(height * (label ? 0.15 : 0.08));
    const footerHeight = Math.trunc(height * (showRange && !binary ? 0.12 : 0.04));
    const chartBottom = height - footerHeight;
    const chartRect = { x1: padding, y1: headerHeight, x2: width - padding, y2: chartBottom };

    const header: Component[] = [];
    if (label) {
      header.push(
        text(truncateText(label.toUpperCase(), estimateMaxChars(width, 7, padding)), {
          font: "small",
          color: THEME_TEXT_SECONDARY,
          align: "start",
        })
      );
    }
    if (current !== null) {
      if (label) header.push(spacer());
      header.push(text(`${current.toFixed(1)}${getUnit(state.entity)}`, { font: "regular", color, align: "end" }));
    }
    if (header.length > 0) {
      renderComponent(ctx, row(header, { gap: 4, padding }), 0, 0, width, headerHeight);
    }

    if (data.length < 2) {
      ctx.drawText(
        PLACEHOLDER_TEXT,
        [Math.floor(width / 2), Math.floor((headerHeight + chartBottom) / 2)],
        fontLabel,
        THEME_TEXT_SECONDARY,
        "mm"
      );
      return DRAWN;
    }

    if (binary) {
      ctx.drawTimelineBar(chartRect, data, color);
      return DRAWN;
    }

    ctx.drawSparkline(chartRect, data, {
      color,
      fill: optionBoolean(options, "fill", true),
      gradient: optionBoolean(options, "color_gradient", false),
    });

    if (showRange) {
      const rangeY = chartBottom + Math.trunc(height * 0.08);
      ctx.drawText(Math.min(...data).toFixed(1), [padding, rangeY], fontLabel, THEME_TEXT_SECONDARY, "lm");
      ctx.drawText(Math.max(...data).toFixed(1), [width - padding, rangeY], fontLabel, THEME_TEXT_SECONDARY, "rm");
    }
    return DRAWN;
  },
};
