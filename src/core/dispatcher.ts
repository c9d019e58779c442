import { schedule, scheduleMicrotask, type SchedulerPriority } from './scheduler.js';

/**
 * The single UI execution context.
 *
 * Render work is handed to `dispatch` and runs later, serially, on the
 * scheduler queues. The returned promise settles with the work's outcome.
 */
export interface Dispatcher {
  dispatch<T>(work: () => T): Promise<T>;
  /** True while a work item handed to this dispatcher is running. */
  isDispatching(): boolean;
}

export type DispatchMode = 'frame' | 'microtask';

export interface DispatcherOptions {
  /** `frame` groups work per animation frame; `microtask` runs it after the current stack. Default: 'frame'. */
  mode?: DispatchMode;
  priority?: SchedulerPriority;
}

export function createDispatcher(options: DispatcherOptions = {}): Dispatcher {
  const mode = options.mode ?? 'frame';
  const priority = options.priority ?? 'medium';
  const enqueue = mode === 'microtask' ? scheduleMicrotask : schedule;
  let depth = 0;

  function dispatch<T>(work: () => T): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      enqueue(
        () => {
          depth++;
          try {
            resolve(work());
          } catch (error) {
            reject(error);
          } finally {
            depth--;
          }
        },
        { priority }
      );
    });
  }

  return {
    dispatch,
    isDispatching: () => depth > 0,
  };
}
