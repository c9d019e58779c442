export * from "./scope.js";
export * from "./signal.js";
export * from "./errors.js";

export { setDevMode, isInDevMode, setErrorHandler, reportError, warnDev, resetDevWarnings } from "./dev.js";
export { schedule, scheduleMicrotask, configureScheduler, getSchedulerConfig, type SchedulerPriority, type ScheduleOptions } from "./scheduler.js";
export { createDispatcher, type Dispatcher, type DispatchMode, type DispatcherOptions } from "./dispatcher.js";
