import { getCurrentScope, withScope, type Scope } from './scope.js';
import { scheduleMicrotask } from './scheduler.js';
import { reportError } from './dev.js';

type EffectFn = (() => void) & {
  /**
   * Reverse dependency tracking: the subscriber sets this effect is registered in,
   * so it can unsubscribe on re-run (dynamic deps) and on dispose.
   */
  deps?: Set<Set<EffectFn>>;

  /** When true, this effect must never execute again. */
  disposed?: boolean;
};

/**
 * Currently executing effect (dependency collector).
 * Signals read while this is set subscribe this effect.
 */
let activeEffect: EffectFn | null = null;

/**
 * Dedup set for scheduled effects.
 * Multiple signal writes in the same tick enqueue an effect once.
 */
const pendingEffects = new Set<EffectFn>();

/** Stable runner per effect, so queue dedupe works by function identity. */
const effectRunners = new WeakMap<EffectFn, () => void>();

function scheduleEffect(eff: EffectFn): void {
  if (eff.disposed) return;
  if (pendingEffects.has(eff)) return;
  pendingEffects.add(eff);

  let runEffect = effectRunners.get(eff);
  if (!runEffect) {
    runEffect = () => {
      pendingEffects.delete(eff);
      if (eff.disposed) return;

      try {
        eff();
      } catch (error) {
        reportError(error, 'effect');
      }
    };
    effectRunners.set(eff, runEffect);
  }

  scheduleMicrotask(runEffect);
}

export interface Signal<T> {
  (): T;
  set(value: T): void;
  update(fn: (v: T) => T): void;
  /** Reads the value without subscribing the running effect. */
  peek(): T;
}

/** Read-only view of a signal, for state owned by someone else. */
export interface ReadonlySignal<T> {
  (): T;
  peek(): T;
}

/**
 * Creates a signal: a mutable value with automatic dependency tracking.
 *
 * Reads inside effects subscribe the effect; writes schedule subscribers.
 */
export function signal<T>(initialValue: T): Signal<T> {
  let value = initialValue;
  const subscribers = new Set<EffectFn>();

  const read = () => {
    if (activeEffect && !activeEffect.disposed && !subscribers.has(activeEffect)) {
      subscribers.add(activeEffect);
      (activeEffect.deps ??= new Set()).add(subscribers);
    }
    return value;
  };

  const set = (nextValue: T) => {
    if (Object.is(value, nextValue)) return;
    value = nextValue;
    for (const eff of subscribers) scheduleEffect(eff);
  };

  return Object.assign(read, {
    set,
    update: (fn: (v: T) => T) => set(fn(value)),
    peek: () => value,
  });
}

/**
 * Creates an effect: reruns `fn` whenever any tracked signal changes.
 *
 * - First run is scheduled (microtask) to coalesce writes.
 * - Dependencies are re-collected on every run.
 * - Created inside a scope, the effect is disposed with it.
 */
export function effect(fn: () => void): () => void {
  const owningScope: Scope | null = getCurrentScope();

  const cleanupDeps = () => {
    if (!run.deps) return;
    for (const depSet of run.deps) depSet.delete(run);
    run.deps.clear();
  };

  const dispose = () => {
    if (run.disposed) return;
    run.disposed = true;
    cleanupDeps();
    pendingEffects.delete(run);
  };

  const run: EffectFn = () => {
    if (run.disposed) return;
    cleanupDeps();

    const prevEffect = activeEffect;
    activeEffect = run;
    try {
      if (owningScope && !owningScope.disposed) withScope(owningScope, fn);
      else fn();
    } finally {
      activeEffect = prevEffect;
    }
  };

  scheduleEffect(run);
  if (owningScope) owningScope.onCleanup(dispose);

  return dispose;
}
