import { reportError, warnDev } from '../core/dev.js';
import { invalidArgument, invalidOperation } from '../core/errors.js';
import { signal, type ReadonlySignal } from '../core/signal.js';
import { decodeDeepLink, encodeDeepLink, type EncodeDeepLinkOptions } from './deep-link.js';
import { createModalSlot, validateModalOptions, type ModalComponent, type ModalOptions, type ModalResult, type ModalSlot } from './modal.js';
import { createRenderScheduler } from './render-scheduler.js';
import { createViewState, type ViewState } from './view-state.js';
import type { ViewRegistry } from './view-registry.js';
import type {
  Composition,
  FallbackReason,
  LayoutDefinition,
  Renderer,
  ViewConstructionFailure,
  ViewContent,
  ViewDefinition,
  ViewNavigator,
} from './types.js';

export type ViewControllerStatus = 'uninitialized' | 'active' | 'locked';

/**
 * Configuration for `createViewController`.
 */
export interface ViewControllerConfig<TOutput> {
  registry: ViewRegistry<TOutput>;
  renderer: Renderer<TOutput>;
  /** Content drawn when there is nothing (or nothing valid) to draw. */
  fallback: (failure: FallbackReason<TOutput>) => TOutput;
  /** View loaded when navigation starts from nothing. */
  defaultView?: ViewDefinition<TOutput>;
  /** Layout for views whose registration names none. Falls back after the registry default. */
  defaultLayout?: LayoutDefinition<TOutput>;
  /** Called after every accepted navigation. */
  onNavigate?: (current: ViewState<TOutput>, previous: ViewState<TOutput> | null) => void;
}

/** Public controller API returned by `createViewController`. */
export interface ViewController<TOutput = unknown> extends ViewNavigator<TOutput> {
  readonly currentView: ReadonlySignal<ViewState<TOutput> | null>;
  readonly previousView: ReadonlySignal<ViewState<TOutput> | null>;
  /** The narrow contract to hand to views, layouts and links. */
  readonly navigator: ViewNavigator<TOutput>;
  readonly modalSlot: ModalSlot<TOutput>;

  lock(): void;
  unlock(): void;
  isLocked(): boolean;
  status(): ViewControllerStatus;
  /** Apply a deep link to the current view. Returns false while locked. */
  restoreFromQueryString(raw: string): boolean;
  /** Return to the previous view. Returns false while locked or without one. */
  goBack(): boolean;
  buildComposition(): Composition<TOutput>;
  /** Deep link for the current view, or null before the first navigation. */
  toQueryString(options?: EncodeDeepLinkOptions): string | null;
  /** Resolves once pending render passes have run. */
  whenRendered(): Promise<void>;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Create the view controller: the in-memory replacement for URL routing.
 *
 * Holds the current and previous ViewState and the navigation lock, and
 * coalesces every change into one render pass on the renderer's dispatcher.
 *
 * Example:
 * ```ts
 * const controller = createViewController({ registry, renderer, fallback, defaultView: Home });
 * controller.restoreFromQueryString(location.search);
 * ```
 */
export function createViewController<TOutput>(config: ViewControllerConfig<TOutput>): ViewController<TOutput> {
  const { registry, renderer, fallback, defaultView, defaultLayout, onNavigate } = config;
  if (!registry || !renderer) {
    throw invalidArgument('createViewController() requires a registry and a renderer');
  }
  if (typeof fallback !== 'function') {
    throw invalidArgument('createViewController() requires a fallback content function');
  }

  const current = signal<ViewState<TOutput> | null>(null);
  const previous = signal<ViewState<TOutput> | null>(null);
  const locked = signal(false);
  const modalSlot = createModalSlot<TOutput>();

  const scheduler = createRenderScheduler({
    dispatch: (work) => renderer.dispatch(work),
    render: () => renderer.render(buildComposition()),
  });

  function commit(next: ViewState<TOutput>): void {
    const prior = current.peek();
    previous.set(prior);
    current.set(next);

    if (onNavigate) {
      try {
        onNavigate(next, previous.peek());
      } catch (error) {
        reportError(error, 'onNavigate');
      }
    }
  }

  function loadView(state?: ViewState<TOutput> | null): boolean {
    if (locked.peek()) return false;

    // No state: re-render the current view as it is.
    if (state || !current.peek()) {
      const next = state ?? (defaultView ? createViewState(defaultView) : null);
      if (!next) {
        throw invalidOperation('a view controller requires a resolvable current view');
      }
      commit(next);
    }
    scheduler.request();
    return true;
  }

  function isCurrentView(view: ViewDefinition<TOutput>): boolean {
    const state = current();
    return state !== null && state.view === view;
  }

  async function showModal<TResult = unknown>(
    component: ModalComponent<TOutput, TResult>,
    options: ModalOptions = {}
  ): Promise<ModalResult<TResult>> {
    const host = modalSlot.host();
    if (!host) {
      throw invalidOperation('showModal() called before a modal host was bound');
    }
    validateModalOptions(options);
    return host.show(component, options);
  }

  function restoreFromQueryString(raw: string): boolean {
    if (locked.peek()) return false;

    const decoded = decodeDeepLink(raw, registry);
    if (decoded.unresolvedIdentity !== undefined) {
      warnDev(`Deep link names unknown view "${decoded.unresolvedIdentity}"; keeping the current view.`);
    }

    if (!current.peek() && defaultView) {
      commit(createViewState(defaultView));
    }
    const existing = current.peek();
    if (decoded.view && (!existing || existing.view !== decoded.view)) {
      commit(createViewState(decoded.view));
    }

    const state = current.peek();
    if (!state) {
      throw invalidOperation('a view controller requires a resolvable current view');
    }

    for (const [name, value] of decoded.parameterUpdates) {
      state.setParameter(name, value);
    }
    for (const [name, value] of decoded.fieldUpdates) {
      state.setField(name, value);
    }

    scheduler.request();
    return true;
  }

  function goBack(): boolean {
    const target = previous.peek();
    if (locked.peek() || !target) return false;
    commit(target);
    scheduler.request();
    return true;
  }

  function lock(): void {
    locked.set(true);
    if (current.peek()) scheduler.request();
  }

  function unlock(): void {
    locked.set(false);
    if (current.peek()) scheduler.request();
  }

  const navigator: ViewNavigator<TOutput> = { loadView, isCurrentView, showModal };

  function composeFallback(failure: FallbackReason<TOutput>): Composition<TOutput> {
    return { kind: 'fallback', failure, output: fallback(failure) };
  }

  function buildComposition(): Composition<TOutput> {
    const state = current.peek();
    if (!state) {
      return composeFallback({ reason: 'no-view' });
    }

    const layout = registry.layoutOf(state.view) ?? defaultLayout;
    if (!layout) {
      return composeFallback({ reason: 'no-layout', view: state.view });
    }

    let content: ViewContent<TOutput>;
    const parameters = state.parameters();
    try {
      const output = state.view.create(parameters, { state, navigator });
      content = { kind: 'view', view: state.view, parameters, output };
    } catch (error) {
      const failure: ViewConstructionFailure<TOutput> = {
        reason: 'view-construction',
        view: state.view,
        error: toError(error),
      };
      reportError(failure.error, `view "${state.view.name}"`);
      content = { kind: 'fallback', failure, output: fallback(failure) };
    }

    return { kind: 'layout', modalSlot, layout, state, navigator, content };
  }

  renderer.attach({ requestRender: () => scheduler.request() });

  return {
    currentView: current,
    previousView: previous,
    navigator,
    modalSlot,
    loadView,
    isCurrentView,
    showModal,
    lock,
    unlock,
    isLocked: () => locked.peek(),
    status: () => {
      if (!current.peek()) return 'uninitialized';
      return locked.peek() ? 'locked' : 'active';
    },
    restoreFromQueryString,
    goBack,
    buildComposition,
    toQueryString: (options) => {
      const state = current.peek();
      return state ? encodeDeepLink(state, options) : null;
    },
    whenRendered: () => scheduler.whenIdle(),
  };
}
