import { reportError } from './dev.js';

/**
 * A Scope is a simple lifecycle container.
 * Anything registered via `onCleanup` will run when `dispose()` is called.
 *
 * Each render pass mounts its view tree inside a scope, so effects and event
 * listeners created by views end when the next pass replaces them.
 */
export interface Scope {
  /** Register a cleanup callback to run when the scope is disposed. */
  onCleanup(fn: () => void): void;

  /** Dispose the scope: child scopes first, then local cleanups in FIFO order. */
  dispose(): void;

  readonly disposed: boolean;
  readonly parent: Scope | null;
}

/**
 * The currently active scope for the running code path.
 * Set by `withScope()` and read by `effect()` and `onCleanup()`.
 */
let currentScope: Scope | null = null;

/** Child lists of scopes created here, so disposal can run children first. */
const childScopes = new WeakMap<Scope, Scope[]>();

/**
 * Creates a new Scope.
 *
 * The parent defaults to the current scope. A disposed parent yields a
 * detached scope instead.
 */
export function createScope(parentOverride?: Scope | null): Scope {
  const candidate = parentOverride === undefined ? currentScope : parentOverride;
  const parent = candidate && !candidate.disposed ? candidate : null;

  const children: Scope[] = [];
  const cleanups: Array<() => void> = [];
  let disposed = false;

  const runCleanup = (fn: () => void) => {
    try {
      fn();
    } catch (error) {
      reportError(error, 'scope cleanup');
    }
  };

  const scope: Scope = {
    onCleanup(fn: () => void) {
      if (disposed) {
        runCleanup(fn);
        return;
      }
      cleanups.push(fn);
    },
    dispose() {
      if (disposed) return;
      disposed = true;

      const siblings = parent ? childScopes.get(parent) : undefined;
      if (siblings) {
        const index = siblings.indexOf(scope);
        if (index !== -1) siblings.splice(index, 1);
      }

      for (const child of children.splice(0)) child.dispose();
      for (const fn of cleanups.splice(0)) runCleanup(fn);
    },
    get disposed() {
      return disposed;
    },
    parent,
  };

  childScopes.set(scope, children);

  if (parent) {
    const siblings = childScopes.get(parent);
    if (siblings) siblings.push(scope);
    else parent.onCleanup(() => scope.dispose());
  }

  return scope;
}

/** Returns the current active scope (or null if none). */
export function getCurrentScope(): Scope | null {
  return currentScope;
}

/**
 * Runs a function with the given scope set as current, then restores the previous scope.
 */
export function withScope<T>(scope: Scope, fn: () => T): T {
  if (scope.disposed) {
    throw new Error('[Switchyard] withScope() cannot enter a disposed scope.');
  }
  const prevScope = currentScope;
  currentScope = scope;
  try {
    return fn();
  } finally {
    currentScope = prevScope;
  }
}

/**
 * Registers a cleanup on the current scope.
 * Returns false when called outside any scope (nothing was registered).
 */
export function onCleanup(fn: () => void): boolean {
  if (!currentScope) return false;
  currentScope.onCleanup(fn);
  return true;
}
