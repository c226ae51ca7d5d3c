/**
 * Rendering backend
 * Raster primitives, fonts, icons, charts and the codec behind the Renderer.
 */

export * from "./renderer.js";
export * from "./palette.js";
export * from "./charts.js";
export * from "./codec.js";
export * from "./icons.js";
export * from "./bitmap-font.js";
export * from "./raster.js";
