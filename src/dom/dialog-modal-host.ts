import { createScope, withScope } from '../core/scope.js';
import type { ModalComponent, ModalHost, ModalOptions, ModalReference, ModalResult } from '../view/modal.js';
import { toNodes, type DomOutput } from './nodes.js';

export interface DialogModalDefaults {
  /** Default: true. */
  closeOnBackdrop?: boolean;
  /** Default: true. */
  closeOnEscape?: boolean;
}

export interface DialogModalHost extends ModalHost<DomOutput> {
  /** Dialogs currently shown, oldest first. */
  openDialogs(): HTMLDialogElement[];
}

function openDialog(el: HTMLDialogElement): void {
  if (typeof el.showModal === 'function') el.showModal();
  else el.setAttribute('open', '');
}

function closeDialog(el: HTMLDialogElement): void {
  if (!el.hasAttribute('open')) return;
  if (typeof el.close === 'function') el.close();
  else el.removeAttribute('open');
}

/**
 * Modal host backed by `<dialog>` elements appended to `container`.
 *
 * Every `show` gets its own dialog, so modals stack. The returned promise
 * settles once: through the component's `ModalReference`, a backdrop click,
 * Escape, or a native close.
 */
export function createDialogModalHost(container: Element, defaults: DialogModalDefaults = {}): DialogModalHost {
  const doc = container.ownerDocument;
  const shown: HTMLDialogElement[] = [];

  function show<TResult>(
    component: ModalComponent<DomOutput, TResult>,
    options: ModalOptions = {}
  ): Promise<ModalResult<TResult>> {
    const closeOnBackdrop = options.closeOnBackdrop ?? defaults.closeOnBackdrop ?? true;
    const closeOnEscape = options.closeOnEscape ?? defaults.closeOnEscape ?? true;

    const dialog = doc.createElement('dialog');
    dialog.setAttribute('aria-modal', 'true');
    dialog.dataset.modal = component.name;
    if (options.title) {
      const header = doc.createElement('header');
      header.textContent = options.title;
      dialog.append(header);
      dialog.setAttribute('aria-label', options.title);
    }

    return new Promise<ModalResult<TResult>>((resolve, reject) => {
      const scope = createScope(null);
      let settled = false;

      const settle = (result: ModalResult<TResult>) => {
        if (settled) return;
        settled = true;
        scope.dispose();
        closeDialog(dialog);
        dialog.remove();
        const index = shown.indexOf(dialog);
        if (index !== -1) shown.splice(index, 1);
        resolve(result);
      };

      const reference: ModalReference<TResult> = {
        close: (data) => settle({ cancelled: false, data }),
        cancel: () => settle({ cancelled: true }),
      };

      const onClose = () => reference.cancel();
      const onBackdropClick = (e: MouseEvent) => {
        if (closeOnBackdrop && e.target === dialog) reference.cancel();
      };
      const onCancel = (e: Event) => {
        if (!closeOnEscape) e.preventDefault();
      };
      const onKeydown = (e: KeyboardEvent) => {
        if (e.key !== 'Escape') return;
        e.preventDefault();
        if (closeOnEscape) reference.cancel();
      };

      dialog.addEventListener('close', onClose);
      dialog.addEventListener('click', onBackdropClick);
      dialog.addEventListener('cancel', onCancel);
      dialog.addEventListener('keydown', onKeydown);
      scope.onCleanup(() => {
        dialog.removeEventListener('close', onClose);
        dialog.removeEventListener('click', onBackdropClick);
        dialog.removeEventListener('cancel', onCancel);
        dialog.removeEventListener('keydown', onKeydown);
      });

      try {
        const output = withScope(scope, () => component.create(options.parameters ?? {}, reference));
        dialog.append(...toNodes(output));
      } catch (error) {
        settled = true;
        scope.dispose();
        reject(error);
        return;
      }
      if (settled) return;

      container.append(dialog);
      shown.push(dialog);
      openDialog(dialog);
    });
  }

  return {
    show,
    openDialogs: () => shown.slice(),
  };
}
