export {
  createViewController,
  type ViewController,
  type ViewControllerConfig,
  type ViewControllerStatus,
} from "./view-controller.js";
export * from "./types.js";
export * from "./define.js";
export * from "./view-state.js";
export * from "./view-registry.js";
export * from "./deep-link.js";
export * from "./modal.js";
export * from "./render-scheduler.js";
