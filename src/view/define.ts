import { invalidArgument } from '../core/errors.js';
import type { LayoutDefinition, ViewDefinition } from './types.js';

/** True when `value` satisfies the View capability: a non-empty `name` and a `create` function. */
export function isViewDefinition<TOutput = unknown>(value: unknown): value is ViewDefinition<TOutput> {
  if (!value || typeof value !== 'object') return false;
  if (!('name' in value) || !('create' in value)) return false;
  return typeof value.name === 'string' && value.name.trim().length > 0 && typeof value.create === 'function';
}

export function isLayoutDefinition<TOutput = unknown>(value: unknown): value is LayoutDefinition<TOutput> {
  if (!value || typeof value !== 'object') return false;
  if (!('name' in value) || !('render' in value)) return false;
  return typeof value.name === 'string' && value.name.trim().length > 0 && typeof value.render === 'function';
}

/**
 * Validate and freeze a view definition.
 *
 * Example:
 * ```ts
 * const Forecast = defineView({
 *   name: 'WeatherForecastViewerView',
 *   create: (params) => renderForecast(params.ID),
 * });
 * ```
 */
export function defineView<TOutput>(definition: ViewDefinition<TOutput>): ViewDefinition<TOutput> {
  if (!isViewDefinition<TOutput>(definition)) {
    throw invalidArgument('defineView() requires a non-empty "name" and a "create" function');
  }
  return Object.freeze({ name: definition.name.trim(), create: definition.create });
}

export function defineLayout<TOutput>(definition: LayoutDefinition<TOutput>): LayoutDefinition<TOutput> {
  if (!isLayoutDefinition<TOutput>(definition)) {
    throw invalidArgument('defineLayout() requires a non-empty "name" and a "render" function');
  }
  return Object.freeze({ name: definition.name.trim(), render: definition.render });
}
