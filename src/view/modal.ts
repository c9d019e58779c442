import { warnDev } from '../core/dev.js';
import { invalidOperation } from '../core/errors.js';
import type { ViewParameters } from './types.js';

export type ModalResult<T = unknown> = { cancelled: true } | { cancelled: false; data: T };

/** Handed to a modal component so it can settle its own dialog. */
export interface ModalReference<TResult = unknown> {
  close(data: TResult): void;
  cancel(): void;
}

export interface ModalComponent<TOutput = unknown, TResult = unknown> {
  readonly name: string;
  create(parameters: ViewParameters, modal: ModalReference<TResult>): TOutput;
}

export interface ModalOptions {
  title?: string;
  parameters?: ViewParameters;
  /** Default: true. */
  closeOnBackdrop?: boolean;
  /** Default: true. */
  closeOnEscape?: boolean;
}

/** The modal capability the controller drives. Its show/hide state is its own. */
export interface ModalHost<TOutput = unknown> {
  show<TResult>(component: ModalComponent<TOutput, TResult>, options?: ModalOptions): Promise<ModalResult<TResult>>;
}

/**
 * The place in every layout composition where a modal host lives.
 * The renderer binds the concrete host once; until then the slot is unbound.
 */
export interface ModalSlot<TOutput = unknown> {
  bind(host: ModalHost<TOutput>): void;
  host(): ModalHost<TOutput> | null;
  isBound(): boolean;
}

export function createModalSlot<TOutput = unknown>(): ModalSlot<TOutput> {
  let bound: ModalHost<TOutput> | null = null;

  return {
    bind(host) {
      if (bound === host) return;
      if (bound) {
        throw invalidOperation('the modal slot is already bound to another modal host');
      }
      bound = host;
    },
    host: () => bound,
    isBound: () => bound !== null,
  };
}

export function validateModalOptions(options: ModalOptions): void {
  const record: Record<string, unknown> = { ...options };
  for (const key of ['closeOnBackdrop', 'closeOnEscape'] as const) {
    const value = record[key];
    if (value !== undefined && typeof value !== 'boolean') {
      warnDev(`showModal: "${key}" expected boolean, got ${typeof value} (${String(value)})`);
    }
  }
  if (record.title !== undefined && typeof record.title !== 'string') {
    warnDev(`showModal: "title" expected string, got ${typeof record.title}`);
  }
}
