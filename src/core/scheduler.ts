/**
 * Low-level scheduler.
 *
 * What it provides:
 * - A frame queue (`schedule`) for work that should be grouped per frame (DOM writes, render passes)
 * - A microtask queue (`scheduleMicrotask`) for reactive follow-ups and short jobs
 *
 * Invariants:
 * - Tasks are executed in FIFO order within each priority.
 * - Queues are drained fully (up to a hard iteration limit) before returning control.
 * - A throwing task is reported and never stops the rest of the drain.
 */
import { formatMessage, reportError, warnDev } from './dev.js';

type Task = () => void;
export type SchedulerPriority = 'high' | 'medium' | 'low';

export interface ScheduleOptions {
  /** Priority used by the frame/microtask queues. Default: 'medium'. */
  priority?: SchedulerPriority;
}

interface SchedulerConfig {
  /**
   * Maximum microtask drain waves before stopping (prevents infinite loops).
   * Default: 1000.
   */
  maxMicrotaskIterations: number;

  /**
   * Maximum frame drain waves before stopping. Frame work is heavier (DOM),
   * so keep it lower. Default: 100.
   */
  maxRafIterations: number;
}

const schedulerConfig: SchedulerConfig = {
  maxMicrotaskIterations: 1000,
  maxRafIterations: 100,
};

const PRIORITY_ORDER: readonly SchedulerPriority[] = ['high', 'medium', 'low'];
const FAIRNESS_QUOTAS = {
  high: 8,
  medium: 4,
  low: 2,
} as const;

type PriorityQueues = Record<SchedulerPriority, Task[]>;

function isSchedulerPriority(value: unknown): value is SchedulerPriority {
  return value === 'high' || value === 'medium' || value === 'low';
}

/**
 * Configure scheduler limits.
 *
 * Example:
 * ```ts
 * configureScheduler({ maxMicrotaskIterations: 2000 });
 * ```
 */
export function configureScheduler(config: Partial<SchedulerConfig>): void {
  Object.assign(schedulerConfig, config);
}

export function getSchedulerConfig(): Readonly<SchedulerConfig> {
  return { ...schedulerConfig };
}

let rafScheduled = false;
let microtaskScheduled = false;
let isFlushingRaf = false;
let isFlushingMicrotasks = false;

const rafQueue: PriorityQueues = { high: [], medium: [], low: [] };
const microtaskQueue: PriorityQueues = { high: [], medium: [], low: [] };

function requestFrame(cb: () => void): void {
  if (typeof globalThis.requestAnimationFrame === 'function') {
    globalThis.requestAnimationFrame(() => cb());
  } else {
    setTimeout(cb, 0);
  }
}

function normalizePriority(priority: unknown): SchedulerPriority {
  if (priority == null) return 'medium';
  if (isSchedulerPriority(priority)) return priority;
  warnDev(`Invalid scheduler priority "${String(priority)}". Falling back to "medium".`);
  return 'medium';
}

/**
 * Schedule work for the next animation frame.
 * (In Node, without `requestAnimationFrame`, this falls back to `setTimeout(0)`.)
 */
export function schedule(task: Task, options: ScheduleOptions = {}): void {
  rafQueue[normalizePriority(options.priority)].push(task);

  if (!rafScheduled) {
    rafScheduled = true;
    requestFrame(flushRaf);
  }
}

/** Schedule work to run after the current call stack, before the next frame. */
export function scheduleMicrotask(task: Task, options: ScheduleOptions = {}): void {
  microtaskQueue[normalizePriority(options.priority)].push(task);

  if (!microtaskScheduled) {
    microtaskScheduled = true;
    queueMicrotask(flushMicrotasks);
  }
}

function flushMicrotasks(): void {
  if (isFlushingMicrotasks) return;
  isFlushingMicrotasks = true;

  try {
    drain(microtaskQueue, schedulerConfig.maxMicrotaskIterations, 'microtask');
  } finally {
    isFlushingMicrotasks = false;
    microtaskScheduled = false;

    if (hasQueuedTasks(microtaskQueue)) {
      microtaskScheduled = true;
      queueMicrotask(flushMicrotasks);
    }
  }
}

function flushRaf(): void {
  if (isFlushingRaf) return;
  isFlushingRaf = true;

  try {
    drain(rafQueue, schedulerConfig.maxRafIterations, 'frame');
  } finally {
    isFlushingRaf = false;
    rafScheduled = false;

    if (hasQueuedTasks(rafQueue)) {
      rafScheduled = true;
      requestFrame(flushRaf);
    }
  }
}

function drain(queues: PriorityQueues, maxIterations: number, label: string): void {
  let iterations = 0;
  while (hasQueuedTasks(queues) && iterations < maxIterations) {
    iterations++;
    drainPriorityCycle(queues);
  }

  if (iterations >= maxIterations && hasQueuedTasks(queues)) {
    console.error(
      formatMessage(
        `Scheduler exceeded ${maxIterations} ${label} iterations. ` +
          `Possible infinite loop detected. Remaining ${countQueuedTasks(queues)} tasks discarded.`
      )
    );
    for (const priority of PRIORITY_ORDER) queues[priority].length = 0;
  }
}

function hasQueuedTasks(queues: PriorityQueues): boolean {
  return queues.high.length > 0 || queues.medium.length > 0 || queues.low.length > 0;
}

function countQueuedTasks(queues: PriorityQueues): number {
  return queues.high.length + queues.medium.length + queues.low.length;
}

/**
 * Drain one fairness wave from the current queue snapshot:
 * `high` goes first, but queued `medium`/`low` tasks still make progress.
 *
 * Tasks enqueued while draining wait for the next wave, so the iteration cap
 * counts requeue waves.
 */
function drainPriorityCycle(queues: PriorityQueues): void {
  const snapshot: PriorityQueues = {
    high: queues.high.splice(0),
    medium: queues.medium.splice(0),
    low: queues.low.splice(0),
  };
  const indices: Record<SchedulerPriority, number> = { high: 0, medium: 0, low: 0 };

  let remaining = snapshot.high.length + snapshot.medium.length + snapshot.low.length;
  while (remaining > 0) {
    for (const priority of PRIORITY_ORDER) {
      const tasks = snapshot[priority];
      const start = indices[priority];
      const end = Math.min(start + FAIRNESS_QUOTAS[priority], tasks.length);
      indices[priority] = end;
      remaining -= end - start;

      for (let i = start; i < end; i++) {
        runTask(tasks[i]);
      }
    }
  }
}

function runTask(task: Task): void {
  try {
    task();
  } catch (error) {
    reportError(error, 'scheduled task');
  }
}
