/**
 * Icon widget
 * One centered icon; "huge" lets it fill the cell.
 */

import { center, icon, panel } from "../components/components.js";
import { COLORS, ICON_SIZE } from "../rendering/palette.js";
import { themeAccent, type Color } from "../theme.js";
import { optionBoolean, optionEnum, optionString, parseColor } from "./helpers.js";
import { tree, type WidgetDefinition } from "./types.js";

export const iconWidget: WidgetDefinition = {
  type: "icon",
  name: "Icon",
  entityIds: () => [],

  render(_ctx, config) {
    const { options } = config;
    const name = optionString(options, "icon", "help").replace(/^[a-z]+:/, "");
    const huge = optionEnum(options, "size", ["regular", "huge"], "regular") === "huge";
    const color: Color =
      options.color === undefined
        ? (config.color ?? themeAccent(config.slot))
        : parseColor(options.color, config.color ?? COLORS.white);

    const content = center(icon(name, { maxSize: huge ? 240 : ICON_SIZE.xxl, color }));
    return tree(optionBoolean(options, "show_panel", false) ? panel(content) : content);
  },
};
