export * from "./types.js";
export * from "./helpers.js";
export * from "./registry.js";
export { formatClock, type ClockOptions, type ClockText, type TimeFormat } from "./clock.js";
export { buildProgress, progressPercent, progressValueText, type ProgressProps } from "./progress.js";
export { isBinarySeries } from "./chart.js";
export { conditionTitle, weatherIcon } from "./weather.js";
export { GAUGE_STYLES } from "./gauge.js";
export { CAMERA_PLACEHOLDER } from "./camera.js";
export { formatMediaTime, mediaPosition, IDLE_STATES } from "./media.js";
export { progressItemText, type ProgressItem } from "./multi-progress.js";
export { readStatusEntries, type StatusListEntry } from "./status-list.js";
export { formatAttributeValue, splitLabelValue } from "./attribute-list.js";
