/**
 * Widget registry
 * Maps widget types to their definitions.
 */

import { attributeListWidget } from "./attribute-list.js";
import { cameraWidget } from "./camera.js";
import { chartWidget } from "./chart.js";
import { clockWidget } from "./clock.js";
import { entityWidget } from "./entity.js";
import { gaugeWidget } from "./gauge.js";
import { iconWidget } from "./icon.js";
import { mediaWidget } from "./media.js";
import { multiProgressWidget } from "./multi-progress.js";
import { progressWidget } from "./progress.js";
import { statusListWidget } from "./status-list.js";
import { statusWidget } from "./status.js";
import { textWidget } from "./text.js";
import { weatherWidget } from "./weather.js";
import type { Widget, WidgetConfig, WidgetDefinition, WidgetRegistry, WidgetType } from "./types.js";

/**
 * Registry of all available widgets.
 */
export const widgetRegistry: WidgetRegistry = {
  text: textWidget,
  clock: clockWidget,
  entity: entityWidget,
  gauge: gaugeWidget,
  progress: progressWidget,
  chart: chartWidget,
  status: statusWidget,
  weather: weatherWidget,
  camera: cameraWidget,
  icon: iconWidget,
  media: mediaWidget,
  multi_progress: multiProgressWidget,
  status_list: statusListWidget,
  attribute_list: attributeListWidget,
};

export function getWidget(type: WidgetType): WidgetDefinition {
  return widgetRegistry[type];
}

/**
 * Get all registered widget types.
 */
export function getWidgetIds(): WidgetType[] {
  return Object.values(widgetRegistry).map((definition) => definition.type);
}

/**
 * Bind a config to its definition
 */
export function createWidget(config: WidgetConfig): Widget {
  const definition = getWidget(config.type);
  return {
    config,
    entityIds: () => definition.entityIds?.(config) ?? (config.entityId ? [config.entityId] : []),
    render: (ctx, state) => definition.render(ctx, config, state),
  };
}
