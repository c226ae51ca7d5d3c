export * from "./components.js";
export * from "./layout.js";
export * from "./flex-layout.js";
export * from "./component-helpers.js";
