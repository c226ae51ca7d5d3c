/**
 * Text widget
 * Static text, or the state of an entity when one is configured.
 */

import { COLORS, PLACEHOLDER_VALUE } from "../rendering/palette.js";
import type { TextAnchor } from "../rendering/renderer.js";
import { optionEnum, optionFontSize, optionString } from "./helpers.js";
import { DRAWN, type WidgetConfig, type WidgetDefinition, type WidgetState } from "./types.js";

const ALIGNS = ["left", "center", "right"] as const;

function displayText(config: WidgetConfig, state: WidgetState): string {
  if (config.entityId) {
    if (state.entity?.available) return state.entity.state;
    if (state.entity) return PLACEHOLDER_VALUE;
  }
  return optionString(config.options, "text", "");
}

export const textWidget: WidgetDefinition = {
  type: "text",
  name: "Text",

  render(ctx, config, state) {
    const font = ctx.getFont(optionFontSize(config.options, "size", "regular"));
    const align = optionEnum(config.options, "align", ALIGNS, "center");
    const padding = Math.trunc(ctx.width * 0.04);

    let x = Math.floor(ctx.width / 2);
    let anchor: TextAnchor = "mm";
    if (align === "left") {
      x = padding;
      anchor = "lm";
    } else if (align === "right") {
      x = ctx.width - padding;
      anchor = "rm";
    }

    ctx.drawText(displayText(config, state), [x, Math.floor(ctx.height / 2)], font, config.color ?? COLORS.white, anchor);

    if (config.label) {
      ctx.drawText(
        config.label.toUpperCase(),
        [Math.floor(ctx.width / 2), Math.trunc(ctx.height * 0.15)],
        ctx.getFont("small"),
        COLORS.gray,
        "mm"
      );
    }
    return DRAWN;
  },
};
