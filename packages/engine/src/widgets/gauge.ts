/**
 * Gauge widget
 * A numeric entity shown as a bar, ring or arc between min and max.
 */

import { arcGauge, barGauge, ringGauge } from "../components/component-helpers.js";
import { COLORS, PLACEHOLDER_VALUE } from "../rendering/palette.js";
import {
  calculatePercent,
  formatValueWithUnit,
  getUnit,
  optionBoolean,
  optionEnum,
  optionNumber,
  optionString,
  readNumeric,
  resolveLabel,
} from "./helpers.js";
import { tree, type WidgetDefinition } from "./types.js";

export const GAUGE_STYLES = ["bar", "ring", "arc"] as const;

export const gaugeWidget: WidgetDefinition = {
  type: "gauge",
  name: "Gauge",

  render(_ctx, config, state) {
    const { options } = config;
    const min = optionNumber(options, "min", 0);
    const max = optionNumber(options, "max", 100);
    const value = readNumeric(state.entity, optionString(options, "attribute"));
    const unit = optionString(options, "unit") || getUnit(state.entity);

    const shown = value === null ? PLACEHOLDER_VALUE : value.toFixed(0);
    const props = {
      percent: value === null ? 0 : calculatePercent(value, min, max),
      value: optionBoolean(options, "show_value", true) ? formatValueWithUnit(shown, unit) : "",
      label: resolveLabel(config, state.entity),
      color: config.color ?? COLORS.cyan,
      background: COLORS.darkGray,
    };

    switch (optionEnum(options, "style", GAUGE_STYLES, "bar")) {
      case "ring":
        return tree(ringGauge(props));
      case "arc":
        return tree(arcGauge(props));
      case "bar":
        return tree(barGauge({ ...props, icon: optionString(options, "icon") }));
    }
  },
};
