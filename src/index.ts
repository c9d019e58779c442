export * from "./core/index.js";
export * from "./view/index.js";
export * from "./dom/index.js";
