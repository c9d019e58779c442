import { test } from 'node:test';
import assert from 'node:assert/strict';
import { JSDOM } from 'jsdom';

import { createDialogModalHost } from '../src/dom/dialog-modal-host.js';
import type { DomOutput } from '../src/dom/nodes.js';
import type { ModalComponent } from '../src/view/modal.js';

function setupDom() {
  const dom = new JSDOM('<!doctype html><html><body><div id="slot"></div></body></html>');
  const doc = dom.window.document;
  const container = doc.getElementById('slot');
  if (!container) throw new Error('missing container');

  const click = (target: Element) =>
    target.dispatchEvent(new dom.window.MouseEvent('click', { bubbles: true, cancelable: true, button: 0 }));
  const pressEscape = (target: Element) =>
    target.dispatchEvent(new dom.window.KeyboardEvent('keydown', { key: 'Escape', bubbles: true, cancelable: true }));

  const EditName: ModalComponent<DomOutput, string> = {
    name: 'EditName',
    create: (params, modal) => {
      const button = doc.createElement('button');
      button.textContent = `save ${String(params.Name)}`;
      button.addEventListener('click', () => modal.close(`saved ${String(params.Name)}`));
      return button;
    },
  };

  return { doc, container, click, pressEscape, EditName };
}

test('show(): renders the component in an open dialog and resolves with its result', async () => {
  const { container, click, EditName } = setupDom();
  const host = createDialogModalHost(container);

  const pending = host.show(EditName, { title: 'Rename', parameters: { Name: 'ada' } });

  const dialog = container.querySelector('dialog');
  assert.ok(dialog);
  assert.equal(dialog.hasAttribute('open'), true);
  assert.equal(dialog.getAttribute('aria-modal'), 'true');
  assert.equal(dialog.getAttribute('aria-label'), 'Rename');
  assert.equal(dialog.querySelector('header')?.textContent, 'Rename');
  assert.equal(dialog.dataset.modal, 'EditName');
  assert.deepEqual(host.openDialogs(), [dialog]);

  const button = dialog.querySelector('button');
  assert.ok(button);
  assert.equal(button.textContent, 'save ada');
  click(button);

  assert.deepEqual(await pending, { cancelled: false, data: 'saved ada' });
  assert.equal(container.querySelector('dialog'), null);
  assert.deepEqual(host.openDialogs(), []);
});

test('show(): a backdrop click cancels', async () => {
  const { container, click, EditName } = setupDom();
  const host = createDialogModalHost(container);

  const pending = host.show(EditName);
  const dialog = container.querySelector('dialog');
  assert.ok(dialog);
  click(dialog);

  assert.deepEqual(await pending, { cancelled: true });
});

test('show(): closeOnBackdrop=false ignores the backdrop; Escape still cancels', async () => {
  const { container, click, pressEscape, EditName } = setupDom();
  const host = createDialogModalHost(container);

  const pending = host.show(EditName, { closeOnBackdrop: false });
  const dialog = container.querySelector('dialog');
  assert.ok(dialog);

  click(dialog);
  assert.equal(host.openDialogs().length, 1);

  pressEscape(dialog);
  assert.deepEqual(await pending, { cancelled: true });
});

test('host defaults apply unless the call overrides them', async () => {
  const { container, click, pressEscape, EditName } = setupDom();
  const host = createDialogModalHost(container, { closeOnEscape: false, closeOnBackdrop: false });

  const pending = host.show(EditName, { closeOnBackdrop: true });
  const dialog = container.querySelector('dialog');
  assert.ok(dialog);

  pressEscape(dialog);
  assert.equal(host.openDialogs().length, 1);

  click(dialog);
  assert.deepEqual(await pending, { cancelled: true });
});

test('modals stack, each with its own dialog', async () => {
  const { container, click, EditName } = setupDom();
  const host = createDialogModalHost(container);

  const first = host.show(EditName, { parameters: { Name: 'one' } });
  const second = host.show(EditName, { parameters: { Name: 'two' } });
  assert.equal(container.querySelectorAll('dialog').length, 2);

  const [, top] = host.openDialogs();
  click(top);
  assert.deepEqual(await second, { cancelled: true });
  assert.equal(container.querySelectorAll('dialog').length, 1);

  const [bottom] = host.openDialogs();
  const button = bottom.querySelector('button');
  assert.ok(button);
  click(button);
  assert.deepEqual(await first, { cancelled: false, data: 'saved one' });
});

test('a component that throws rejects the call and leaves no dialog behind', async () => {
  const { container } = setupDom();
  const host = createDialogModalHost(container);
  const Failing: ModalComponent<DomOutput, never> = {
    name: 'Failing',
    create: () => {
      throw new Error('cannot render modal');
    },
  };

  await assert.rejects(host.show(Failing), /cannot render modal/);
  assert.equal(container.querySelector('dialog'), null);
});
