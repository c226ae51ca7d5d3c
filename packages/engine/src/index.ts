/**
 * Dashboard rendering engine
 */

export * from "./config.js";
export * from "./theme.js";
export * from "./asset-catalog.js";
export * from "./entity-states.js";
export * from "./rendering/index.js";
export * from "./render-context.js";
export * from "./components/index.js";
export * from "./widgets/index.js";
export * from "./layouts/index.js";
export * from "./dashboard.js";
