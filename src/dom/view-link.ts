import { onCleanup } from '../core/scope.js';
import { effect } from '../core/signal.js';
import { encodeDeepLink } from '../view/deep-link.js';
import { createViewState, type ParameterInit } from '../view/view-state.js';
import type { ViewDefinition, ViewNavigator } from '../view/types.js';

export interface ViewLinkOptions<TOutput> {
  navigator: ViewNavigator<TOutput>;
  view: ViewDefinition<TOutput>;
  /** Parameters for the ViewState created on each click. A function is read per click. */
  parameters?: ParameterInit | (() => ParameterInit);
  /** Class toggled while `view` is the current view. Default: 'active'. */
  activeClass?: string;
}

function shouldHandleClick(event: MouseEvent, element: Element): boolean {
  if (event.defaultPrevented) return false;
  if (event.button !== 0) return false;
  if (event.metaKey || event.ctrlKey || event.shiftKey || event.altKey) return false;
  const target = element.getAttribute('target');
  if (target && target !== '_self') return false;
  return true;
}

/**
 * Turn `element` into a navigation trigger for `view`.
 *
 * Clicks load a fresh ViewState; while the view is current the element gets
 * `activeClass` and `aria-current="page"`. Anchors also get an `href` holding
 * the view's deep link, so the link can be opened or shared.
 *
 * Returns a disposer. Called inside a scope, it is disposed with the scope.
 */
export function bindViewLink<TOutput>(element: HTMLElement, options: ViewLinkOptions<TOutput>): () => void {
  const { navigator, view } = options;
  const activeClass = options.activeClass ?? 'active';

  const resolveParameters = (): ParameterInit | undefined =>
    typeof options.parameters === 'function' ? options.parameters() : options.parameters;

  if (element.tagName === 'A') {
    const state = createViewState(view, resolveParameters());
    element.setAttribute('href', encodeDeepLink(state, { includeFields: false }));
  }

  const onClick = (event: MouseEvent) => {
    if (!shouldHandleClick(event, element)) return;
    event.preventDefault();
    navigator.loadView(createViewState(view, resolveParameters()));
  };
  element.addEventListener('click', onClick);

  const stopEffect = effect(() => {
    const active = navigator.isCurrentView(view);
    element.classList.toggle(activeClass, active);
    if (active) element.setAttribute('aria-current', 'page');
    else element.removeAttribute('aria-current');
  });

  let disposed = false;
  const dispose = () => {
    if (disposed) return;
    disposed = true;
    stopEffect();
    element.removeEventListener('click', onClick);
  };

  onCleanup(dispose);
  return dispose;
}
