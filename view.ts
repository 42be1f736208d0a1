/**
 * Framework-agnostic view bindings.
 *
 * A {@link BlocView} turns a container's state into some output (a virtual
 * DOM node, a string, a component's props…) and decides, per new state,
 * whether to rebuild that output and whether to fire a side-effect listener.
 * Adapters for a UI framework only need to render `output` whenever
 * `onBuild` fires.
 *
 * @module
 */

import type { Subscription } from "./_types.ts";
import type { BlocBase } from "./bloc_base.ts";
import "./symbol.ts";

/** Decides whether a new state should rebuild the view. */
export type BlocBuilderCondition<State> = (previous: State, current: State) => boolean;

/** Decides whether a new state should fire the listener. */
export type BlocListenerCondition<State> = (previous: State, current: State) => boolean;

/**
 * Options for {@link BlocView}.
 */
export interface BlocViewOptions<State, Output> {
  /** Produces the output for a state. Should be pure. */
  builder: (state: State) => Output;

  /**
   * Rebuild only when this holds.
   * @defaultValue always rebuild
   */
  buildWhen?: BlocBuilderCondition<State>;

  /** Side effect run for new states, e.g. a toast or a navigation. */
  listener?: (state: State) => void;

  /**
   * Fire the listener only when this holds.
   * @defaultValue fire for every new state (the initial state never fires)
   */
  listenerWhen?: BlocListenerCondition<State>;

  /** Called after every rebuild triggered by a new state. */
  onBuild?: (output: Output, state: State) => void;
}

/**
 * Binds a container to a piece of UI.
 *
 * The initial output is built from the container's current state when the
 * view is created. After {@link mount}, for every state the container emits:
 *
 * 1. `previous` is `bloc.previousState`, falling back to the state the view
 *    last displayed;
 * 2. the listener fires when `listenerWhen(previous, next)` holds, or
 *    always when no `listenerWhen` is given;
 * 3. the view rebuilds when `buildWhen(previous, next)` holds, or always
 *    when no `buildWhen` is given.
 *
 * @example
 * ```ts
 * const view = new BlocView(counter, {
 *   builder: count => `Count: ${count}`,
 *   buildWhen: (prev, next) => next % 2 === 0,
 *   listener: count => { if (count > 9) alert("double digits!"); },
 *   onBuild: text => (label.textContent = text),
 * }).mount();
 *
 * // later
 * view.unmount();
 * ```
 */
export class BlocView<State, Output> implements Disposable {
  readonly #bloc: BlocBase<State>;
  readonly #options: BlocViewOptions<State, Output>;

  #displayState: State;
  #output: Output;
  #subscription: Subscription | null = null;

  constructor(bloc: BlocBase<State>, options: BlocViewOptions<State, Output>) {
    this.#bloc = bloc;
    this.#options = options;
    this.#displayState = bloc.state;
    this.#output = options.builder(bloc.state);
  }

  /** The state the current output was built from. */
  get displayState(): State {
    return this.#displayState;
  }

  /** The last built output. */
  get output(): Output {
    return this.#output;
  }

  get mounted(): boolean {
    return this.#subscription !== null;
  }

  /**
   * Starts listening. Catches up with the container first, in case it moved
   * on since the view was created. Mounting twice is a no-op.
   */
  mount(): this {
    if (this.#subscription) return this;

    if (!Object.is(this.#displayState, this.#bloc.state)) {
      this.#rebuild(this.#bloc.state, false);
    }

    const subscription = this.#bloc.stream.subscribe({
      next: state => this.#handleState(state),
      complete: () => { this.#subscription = null; },
    });

    // A closed container completes the subscription before it is returned.
    this.#subscription = subscription.closed ? null : subscription;
    return this;
  }

  /** Stops listening. The last output stays available. */
  unmount(): void {
    const subscription = this.#subscription;
    this.#subscription = null;
    subscription?.unsubscribe();
  }

  [Symbol.dispose](): void {
    this.unmount();
  }

  #handleState(next: State): void {
    const { listener, listenerWhen, buildWhen } = this.#options;
    const previous = this.#bloc.previousState ?? this.#displayState;

    if (listener && (!listenerWhen || listenerWhen(previous, next))) {
      listener(next);
    }

    if (!buildWhen || buildWhen(previous, next)) {
      this.#rebuild(next, true);
    }
  }

  #rebuild(state: State, notify: boolean): void {
    this.#displayState = state;
    this.#output = this.#options.builder(state);
    if (notify) this.#options.onBuild?.(this.#output, state);
  }
}

/**
 * A mounted view that only rebuilds.
 *
 * @example
 * ```ts
 * blocBuilder(counter, count => `Count: ${count}`, {
 *   onBuild: text => (label.textContent = text),
 * });
 * ```
 */
export function blocBuilder<State, Output>(
  bloc: BlocBase<State>,
  builder: (state: State) => Output,
  options: Pick<BlocViewOptions<State, Output>, "buildWhen" | "onBuild"> = {},
): BlocView<State, Output> {
  return new BlocView(bloc, { ...options, builder }).mount();
}

/**
 * A mounted binding that only runs side effects and never rebuilds.
 *
 * @example
 * ```ts
 * blocListener(auth, state => router.go("/login"), {
 *   listenerWhen: (prev, next) => prev.loggedIn && !next.loggedIn,
 * });
 * ```
 */
export function blocListener<State>(
  bloc: BlocBase<State>,
  listener: (state: State) => void,
  options: Pick<BlocViewOptions<State, void>, "listenerWhen"> = {},
): BlocView<State, void> {
  return new BlocView<State, void>(bloc, {
    ...options,
    listener,
    builder: () => undefined,
    buildWhen: () => false,
  }).mount();
}

/**
 * A mounted view that both rebuilds and runs side effects.
 */
export function blocConsumer<State, Output>(
  bloc: BlocBase<State>,
  options: BlocViewOptions<State, Output> & { listener: (state: State) => void },
): BlocView<State, Output> {
  return new BlocView(bloc, options).mount();
}
