export * from "./types.js";
export * from "./frame.js";
export * from "./color.js";
export * from "./logger.js";
