import { invalidArgument } from '../core/errors.js';
import { isLayoutDefinition, isViewDefinition } from './define.js';
import type { LayoutDefinition, ViewDefinition } from './types.js';

export interface RegisterViewOptions<TOutput> {
  /** Layout wrapping this view. Omitted: the registry default applies. */
  layout?: LayoutDefinition<TOutput>;
}

export interface ViewRegistration<TOutput> extends RegisterViewOptions<TOutput> {
  view: ViewDefinition<TOutput>;
}

/**
 * The table of known views, built at startup.
 *
 * Deep links resolve view names here, and the controller resolves each view's
 * layout here.
 */
export interface ViewRegistry<TOutput = unknown> {
  register(view: ViewDefinition<TOutput>, options?: RegisterViewOptions<TOutput>): void;
  resolve(name: string): ViewDefinition<TOutput> | undefined;
  has(view: ViewDefinition<TOutput>): boolean;
  /** Registered layout for `view`, else the registry default. */
  layoutOf(view: ViewDefinition<TOutput>): LayoutDefinition<TOutput> | undefined;
  names(): string[];
}

export interface ViewRegistryConfig<TOutput> {
  views?: ReadonlyArray<ViewDefinition<TOutput> | ViewRegistration<TOutput>>;
  defaultLayout?: LayoutDefinition<TOutput>;
}

export function createViewRegistry<TOutput = unknown>(
  config: ViewRegistryConfig<TOutput> = {}
): ViewRegistry<TOutput> {
  const byName = new Map<string, ViewDefinition<TOutput>>();
  const layouts = new Map<ViewDefinition<TOutput>, LayoutDefinition<TOutput>>();
  const defaultLayout = config.defaultLayout;

  if (defaultLayout !== undefined && !isLayoutDefinition(defaultLayout)) {
    throw invalidArgument('defaultLayout must have a non-empty "name" and a "render" function');
  }

  function register(view: ViewDefinition<TOutput>, options: RegisterViewOptions<TOutput> = {}): void {
    if (!isViewDefinition<TOutput>(view)) {
      throw invalidArgument('register() requires a view with a non-empty "name" and a "create" function');
    }
    const existing = byName.get(view.name);
    if (existing && existing !== view) {
      throw invalidArgument(`duplicate view name: ${view.name}`);
    }
    if (options.layout !== undefined && !isLayoutDefinition(options.layout)) {
      throw invalidArgument(`layout for view "${view.name}" must have a non-empty "name" and a "render" function`);
    }

    byName.set(view.name, view);
    if (options.layout) layouts.set(view, options.layout);
  }

  for (const entry of config.views ?? []) {
    if ('view' in entry) register(entry.view, { layout: entry.layout });
    else register(entry);
  }

  return {
    register,
    resolve: (name) => byName.get(name),
    has: (view) => byName.get(view.name) === view,
    layoutOf: (view) => layouts.get(view) ?? defaultLayout,
    names: () => Array.from(byName.keys()),
  };
}
