/**
 * Camera widget
 * Shows the slot's decoded image payload, or a placeholder without one.
 */

import { column, icon, image, text } from "../components/components.js";
import { COLORS, ICON_SIZE } from "../rendering/palette.js";
import type { FitMode } from "../rendering/renderer.js";
import { optionEnum } from "./helpers.js";
import { tree, type WidgetDefinition } from "./types.js";

export const CAMERA_PLACEHOLDER = "No image";

export const cameraWidget: WidgetDefinition = {
  type: "camera",
  name: "Camera",

  render(_ctx, config, state) {
    if (state.image) {
      return tree(image(state.image, optionEnum<FitMode>(config.options, "fit", ["contain", "cover", "stretch"], "contain")));
    }
    return tree(
      column(
        [
          icon("camera", { maxSize: ICON_SIZE.xxl, color: COLORS.gray }),
          text(config.label ?? CAMERA_PLACEHOLDER, { font: "small", color: COLORS.gray }),
        ],
        { gap: 4, align: "center", justify: "center" }
      )
    );
  },
};
