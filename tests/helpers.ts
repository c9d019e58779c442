import { setErrorHandler } from '../src/core/dev.js';
import { defineLayout, defineView } from '../src/view/define.js';
import type { Composition, RenderHandle, Renderer } from '../src/view/types.js';

export const tick = (ms = 0) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Renderer whose dispatcher only runs work when the test says so.
 * Lets a test observe exactly how many render passes were queued.
 */
export function createManualRenderer<TOutput>() {
  const queue: Array<() => void> = [];
  const rendered: Composition<TOutput>[] = [];
  const handles: RenderHandle[] = [];

  const renderer: Renderer<TOutput> = {
    attach(handle) {
      handles.push(handle);
    },
    dispatch<T>(work: () => T): Promise<T> {
      return new Promise<T>((resolve, reject) => {
        queue.push(() => {
          try {
            resolve(work());
          } catch (error) {
            reject(error);
          }
        });
      });
    },
    render(composition) {
      rendered.push(composition);
    },
  };

  return {
    renderer,
    rendered,
    handles,
    queued: () => queue.length,
    /** Run queued work, including work queued while flushing. */
    flush() {
      let task = queue.shift();
      while (task) {
        task();
        task = queue.shift();
      }
    },
  };
}

/** Collects recovered errors instead of printing them. Call the returned function to restore. */
export function captureErrors() {
  const errors: Array<{ error: Error; source: string }> = [];
  setErrorHandler((error, source) => errors.push({ error, source }));
  return {
    errors,
    restore: () => setErrorHandler(null),
  };
}

export const Home = defineView<string>({ name: 'Home', create: () => 'home' });

export const Forecast = defineView<string>({
  name: 'WeatherForecastViewerView',
  create: (params) => `forecast:${String(params.ID ?? 'none')}`,
});

export const Broken = defineView<string>({
  name: 'Broken',
  create: () => {
    throw new Error('cannot build');
  },
});

export const MainLayout = defineLayout<string>({ name: 'Main', render: (child) => `[main ${child}]` });

export const SideLayout = defineLayout<string>({ name: 'Side', render: (child) => `[side ${child}]` });
