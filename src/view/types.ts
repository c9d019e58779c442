import type { ViewState } from './view-state.js';
import type { ModalComponent, ModalOptions, ModalResult, ModalSlot } from './modal.js';

/** Typed values a view accepts as parameters. Integers and decimals are both `number`. */
export type ParameterValue = string | number | boolean | object;

export type ViewParameters = Readonly<Record<string, ParameterValue>>;

/**
 * The navigation capability handed to views, layouts and links.
 * Nothing else of the controller is reachable from inside a view.
 */
export interface ViewNavigator<TOutput = unknown> {
  loadView(state?: ViewState<TOutput> | null): boolean;
  isCurrentView(view: ViewDefinition<TOutput>): boolean;
  showModal<TResult = unknown>(
    component: ModalComponent<TOutput, TResult>,
    options?: ModalOptions
  ): Promise<ModalResult<TResult>>;
}

export interface ViewContext<TOutput = unknown> {
  /** The view's own state record; fields hold state shared within this view instance. */
  state: ViewState<TOutput>;
  navigator: ViewNavigator<TOutput>;
}

/** A renderable unit selected by identity. The definition object is the identity. */
export interface ViewDefinition<TOutput = unknown> {
  readonly name: string;
  create(parameters: ViewParameters, context: ViewContext<TOutput>): TOutput;
}

/** Wraps exactly one child composition. */
export interface LayoutDefinition<TOutput = unknown> {
  readonly name: string;
  render(child: TOutput, context: ViewContext<TOutput>): TOutput;
}

export type FallbackReason<TOutput = unknown> =
  | { reason: 'no-view' }
  | { reason: 'no-layout'; view: ViewDefinition<TOutput> }
  | ViewConstructionFailure<TOutput>;

export interface ViewConstructionFailure<TOutput = unknown> {
  reason: 'view-construction';
  view: ViewDefinition<TOutput>;
  error: Error;
}

export type ViewContent<TOutput = unknown> =
  | { kind: 'view'; view: ViewDefinition<TOutput>; parameters: ViewParameters; output: TOutput }
  | { kind: 'fallback'; failure: ViewConstructionFailure<TOutput>; output: TOutput };

/** "What to draw next": rebuilt on every render pass, never stored. */
export type Composition<TOutput = unknown> =
  | { kind: 'fallback'; failure: FallbackReason<TOutput>; output: TOutput }
  | {
      kind: 'layout';
      /** A modal slot exists here; the renderer binds its host once. */
      modalSlot: ModalSlot<TOutput>;
      layout: LayoutDefinition<TOutput>;
      state: ViewState<TOutput>;
      navigator: ViewNavigator<TOutput>;
      content: ViewContent<TOutput>;
    };

/** What the controller hands the renderer when it attaches. */
export interface RenderHandle {
  /** Ask for a fresh render pass (coalesced with any pending one). */
  requestRender(): void;
}

/** The host renderer contract the controller consumes. */
export interface Renderer<TOutput = unknown> {
  /** Bind the output sink. Called once per renderer. */
  attach(handle: RenderHandle): void;
  /** Run work on the UI execution context. */
  dispatch<T>(work: () => T): Promise<T>;
  /** Paint the latest composition. Called once per coalesced pass. */
  render(composition: Composition<TOutput>): void;
}
