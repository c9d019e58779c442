import { reportError } from '../core/dev.js';

export interface RenderScheduler {
  /** Ask for a render pass. No-op while one is already pending. */
  request(): void;
  isPending(): boolean;
  /** Resolves once no pass is pending or running. */
  whenIdle(): Promise<void>;
  /** Number of passes that have run. */
  passCount(): number;
}

export interface RenderSchedulerOptions {
  dispatch: (work: () => void) => Promise<void>;
  /** One render pass: build the composition and hand it to the renderer. */
  render: () => void;
}

/**
 * Coalesces bursts of state changes into one render pass.
 *
 * The pending flag is cleared before `render` runs, so a change made during the
 * pass schedules a fresh one instead of being dropped.
 */
export function createRenderScheduler(options: RenderSchedulerOptions): RenderScheduler {
  const { dispatch, render } = options;
  let pending = false;
  let passes = 0;
  let inFlight: Promise<void> | null = null;

  function request(): void {
    if (pending) return;
    pending = true;

    let started = false;
    const runPass = () => {
      started = true;
      pending = false;
      passes++;
      render();
    };

    const task = dispatch(runPass).catch((error: unknown) => {
      // A dispatcher that failed before running the pass must not leave it pending forever.
      if (!started) pending = false;
      reportError(error, 'render pass');
    });
    const tracked: Promise<void> = task.finally(() => {
      if (inFlight === tracked) inFlight = null;
    });
    inFlight = tracked;
  }

  async function whenIdle(): Promise<void> {
    while (inFlight) {
      await inFlight;
    }
  }

  return {
    request,
    isPending: () => pending,
    whenIdle,
    passCount: () => passes,
  };
}
