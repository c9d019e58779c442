import { invalidArgument } from '../core/errors.js';
import { isViewDefinition } from './define.js';
import type { ParameterValue, ViewDefinition, ViewParameters } from './types.js';

export type ParameterInit = Readonly<Record<string, ParameterValue>> | Iterable<readonly [string, ParameterValue]>;

/**
 * The unit of navigation state: which view, with which parameters.
 *
 * `view` is fixed for the life of the record. Parameters are handed to the view
 * as inputs; fields are state shared by the components of this view instance
 * and never reach the view as parameters.
 */
export interface ViewState<TOutput = unknown> {
  readonly view: ViewDefinition<TOutput>;

  getParameter(name: string): ParameterValue | undefined;
  setParameter(name: string, value: ParameterValue): void;
  hasParameter(name: string): boolean;
  /** Frozen snapshot, in insertion order. */
  parameters(): ViewParameters;

  getField(name: string): ParameterValue | undefined;
  setField(name: string, value: ParameterValue): void;
  hasField(name: string): boolean;
  fields(): ViewParameters;
}

function isIterable(value: object): value is Iterable<readonly [string, ParameterValue]> {
  return typeof (value as { [Symbol.iterator]?: unknown })[Symbol.iterator] === 'function';
}

function toEntries(init: ParameterInit | undefined): Array<readonly [string, ParameterValue]> {
  if (!init) return [];
  if (isIterable(init)) return Array.from(init);
  return Object.entries(init);
}

function snapshot(map: Map<string, ParameterValue>): ViewParameters {
  return Object.freeze(Object.fromEntries(map));
}

/**
 * Create a ViewState.
 *
 * Throws `INVALID_ARGUMENT` when `view` is missing or is not a view definition.
 */
export function createViewState<TOutput>(
  view: ViewDefinition<TOutput>,
  parameters?: ParameterInit
): ViewState<TOutput> {
  if (view == null) {
    throw invalidArgument('a ViewState requires a view');
  }
  if (!isViewDefinition<TOutput>(view)) {
    throw invalidArgument('a ViewState view must have a non-empty "name" and a "create" function');
  }

  const params = new Map<string, ParameterValue>(toEntries(parameters));
  const fieldMap = new Map<string, ParameterValue>();

  return {
    view,
    getParameter: (name) => params.get(name),
    setParameter: (name, value) => {
      params.set(name, value);
    },
    hasParameter: (name) => params.has(name),
    parameters: () => snapshot(params),
    getField: (name) => fieldMap.get(name),
    setField: (name, value) => {
      fieldMap.set(name, value);
    },
    hasField: (name) => fieldMap.has(name),
    fields: () => snapshot(fieldMap),
  };
}
