/**
 * Entity widget
 * Value and unit of one entity with its name underneath.
 */

import { centeredValue, iconValue } from "../components/component-helpers.js";
import { panel } from "../components/components.js";
import { COLORS, PLACEHOLDER_NAME, PLACEHOLDER_VALUE } from "../rendering/palette.js";
import {
  estimateMaxChars,
  formatValueWithUnit,
  getUnit,
  optionBoolean,
  optionString,
  resolveLabel,
  truncateText,
} from "./helpers.js";
import { tree, type WidgetDefinition } from "./types.js";

export const entityWidget: WidgetDefinition = {
  type: "entity",
  name: "Entity",

  render(ctx, config, state) {
    const showName = optionBoolean(config.options, "show_name", true);
    const showUnit = optionBoolean(config.options, "show_unit", true);
    const icon = optionString(config.options, "icon");
    const entity = state.entity;

    let value = PLACEHOLDER_VALUE;
    let unit = "";
    let name = config.label ?? config.entityId ?? PLACEHOLDER_NAME;
    if (entity?.available) {
      value = entity.state;
      unit = showUnit ? getUnit(entity) : "";
      name = resolveLabel(config, entity, entity.entityId);
    }

    value = truncateText(value, estimateMaxChars(ctx.width, 6, 6));
    name = truncateText(name, estimateMaxChars(ctx.width, 5, 4));

    const color = config.color ?? COLORS.cyan;
    const valueText = formatValueWithUnit(value, unit);
    const label = showName ? name : null;

    const content = icon
      ? iconValue({ icon, value: valueText, label: label ?? "", color })
      : centeredValue({ value: valueText, label, valueColor: color });

    return tree(optionBoolean(config.options, "show_panel", false) ? panel(content, { color: COLORS.panel }) : content);
  },
};
