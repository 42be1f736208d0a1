/**
 * Containers that skip emits which would not change the state.
 *
 * @module
 */

import type { BlocOptions } from "./bloc_base.ts";
import type { BlocEventOptions } from "./bloc.ts";

import { Bloc } from "./bloc.ts";
import { Cubit } from "./cubit.ts";
import { isEqual } from "./utils.ts";

/** Decides whether two states are the same value. */
export type StateEquality<State> = (a: State, b: State) => boolean;

/**
 * Options shared by the equatable containers.
 */
export interface EquatableOptions<State> {
  /**
   * @defaultValue {@link isEqual}
   */
  equals?: StateEquality<State>;
}

/**
 * A {@link Cubit} whose `emit` is a no-op when the new state equals the
 * current one: no `onChange`, no observer call, no notification, and
 * `previousState` stays where it was.
 *
 * @example
 * ```ts
 * interface FormState { count: number; loading: boolean }
 *
 * class FormCubit extends EquatableCubit<FormState> {
 *   constructor() { super({ count: 1, loading: false }); }
 *   setCount(count: number) { this.emit({ ...this.state, count }); }
 * }
 *
 * form.setCount(1); // same value, nobody is notified
 * ```
 */
export class EquatableCubit<State> extends Cubit<State> {
  readonly #equals: StateEquality<State>;

  constructor(initialState: State, options: BlocOptions & EquatableOptions<State> = {}) {
    super(initialState, options);
    this.#equals = options.equals ?? isEqual;
  }

  protected override shouldEmit(newState: State): boolean {
    return !this.#equals(this.state, newState);
  }
}

/**
 * A {@link Bloc} with the same suppression as {@link EquatableCubit}. An
 * event whose next state equals the current one is dropped before a
 * {@link Transition} is built, so the transition hooks do not run either.
 */
export class EquatableBloc<Event, State> extends Bloc<Event, State> {
  readonly #equals: StateEquality<State>;

  constructor(initialState: State, options: BlocEventOptions<Event, State> & EquatableOptions<State> = {}) {
    super(initialState, options);
    this.#equals = options.equals ?? isEqual;
  }

  protected override shouldEmit(newState: State): boolean {
    return !this.#equals(this.state, newState);
  }
}
