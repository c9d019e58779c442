import { createDispatcher, type Dispatcher } from '../core/dispatcher.js';
import { invalidOperation } from '../core/errors.js';
import { createScope, withScope, type Scope } from '../core/scope.js';
import type { ModalSlot } from '../view/modal.js';
import type { Composition, RenderHandle, Renderer } from '../view/types.js';
import { createDialogModalHost, type DialogModalDefaults, type DialogModalHost } from './dialog-modal-host.js';
import { toNodes, type DomOutput } from './nodes.js';

export interface DomRendererOptions {
  /** Element the view tree is mounted into. Its children are owned by the renderer. */
  outlet: Element;
  /** UI execution context for render passes. Default: a frame dispatcher. */
  dispatcher?: Dispatcher;
  /** Defaults for the dialog modal host. */
  modal?: DialogModalDefaults;
}

export interface DomRenderer extends Renderer<DomOutput> {
  /** The attached controller's handle, or null before `attach`. */
  handle(): RenderHandle | null;
  /** Modal host created on the first layout composition. */
  modalHost(): DialogModalHost | null;
  /** Dispose the mounted view tree and empty the outlet. */
  dispose(): void;
}

/**
 * Mounts compositions into a DOM outlet.
 *
 * The outlet holds two children: the view root, replaced on every pass, and
 * the modal slot container, created once and never moved so open dialogs
 * survive re-renders. Each pass runs inside its own scope; the previous pass
 * scope is disposed once the new tree is mounted.
 */
export function createDomRenderer(options: DomRendererOptions): DomRenderer {
  const { outlet } = options;
  const doc = outlet.ownerDocument;
  const dispatcher = options.dispatcher ?? createDispatcher({ mode: 'frame' });

  let attached: RenderHandle | null = null;
  let activeScope: Scope | null = null;
  let passScope: Scope | null = null;
  let host: DialogModalHost | null = null;

  const viewRoot = doc.createElement('div');
  viewRoot.setAttribute('data-view-root', '');
  outlet.replaceChildren(viewRoot);

  function ensureModalHost(slot: ModalSlot<DomOutput>): void {
    let bound = host;
    if (!bound) {
      const slotContainer = doc.createElement('div');
      slotContainer.setAttribute('data-modal-slot', '');
      outlet.append(slotContainer);
      bound = createDialogModalHost(slotContainer, options.modal);
      host = bound;
    }
    slot.bind(bound);
  }

  function materialize(composition: Composition<DomOutput>): Node[] {
    if (composition.kind === 'fallback') {
      return toNodes(composition.output);
    }

    ensureModalHost(composition.modalSlot);
    const wrapped = composition.layout.render(composition.content.output, {
      state: composition.state,
      navigator: composition.navigator,
    });
    return toNodes(wrapped);
  }

  function dispatch<T>(work: () => T): Promise<T> {
    return dispatcher.dispatch(() => {
      const scope = createScope(null);
      passScope = scope;
      try {
        return withScope(scope, work);
      } finally {
        passScope = null;
        if (scope !== activeScope) scope.dispose();
      }
    });
  }

  function render(composition: Composition<DomOutput>): void {
    const scope = passScope ?? createScope(null);
    try {
      viewRoot.replaceChildren(...withScope(scope, () => materialize(composition)));
    } catch (error) {
      if (scope !== passScope) scope.dispose();
      throw error;
    }

    const previous = activeScope;
    activeScope = scope;
    if (previous && previous !== scope) previous.dispose();
  }

  return {
    attach(handle) {
      if (attached) {
        throw invalidOperation('this DOM renderer is already attached to a view controller');
      }
      attached = handle;
    },
    dispatch,
    render,
    handle: () => attached,
    modalHost: () => host,
    dispose() {
      activeScope?.dispose();
      activeScope = null;
      viewRoot.replaceChildren();
    },
  };
}
