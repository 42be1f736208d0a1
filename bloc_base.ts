/**
 * The state container shared by {@link Cubit} and {@link Bloc}.
 *
 * @module
 */

import type { Observer, Subscription } from "./_types.ts";
import type { Observable } from "./observable.ts";
import type { BlocObserver } from "./observer.ts";

import { Change } from "./change.ts";
import { BlocClosedError } from "./error.ts";
import { getBlocObserver } from "./observer.ts";
import { StateStream } from "./stream.ts";
import "./symbol.ts";

/**
 * Options accepted by every container.
 */
export interface BlocOptions {
  /**
   * Label used in logs and errors.
   * @defaultValue the class name
   */
  name?: string;

  /**
   * Observer for this container only. When omitted the process-wide one
   * ({@link getBlocObserver}) is looked up on every notification, so
   * replacing it at startup also covers containers created earlier.
   */
  observer?: BlocObserver;
}

/**
 * Owns the current state, the previous state and the stream that publishes
 * every new state.
 *
 * Every update goes through {@link emit}, which records the previous state,
 * runs the `onChange` hooks, assigns the new state and only then notifies
 * subscribers, so a subscriber always finds `bloc.state` equal to the value
 * it received.
 *
 * All work happens on the JavaScript event loop; no two emits for one
 * container ever interleave.
 *
 * @typeParam State - The immutable state type.
 */
export abstract class BlocBase<State> implements Disposable, AsyncDisposable {
  readonly name: string;

  #state: State;
  #previousState: State | undefined = undefined;
  #hasPrevious = false;
  #stream = new StateStream<State>();
  #observer: BlocObserver | undefined;

  constructor(initialState: State, options: BlocOptions = {}) {
    this.#state = initialState;
    this.#observer = options.observer;
    this.name = options.name ?? new.target.name;
  }

  /** The current state. */
  get state(): State {
    return this.#state;
  }

  /**
   * The state before the last committed emit, or `undefined` before the
   * first one. Use {@link hasPreviousState} when `undefined` is itself a
   * valid state.
   */
  get previousState(): State | undefined {
    return this.#previousState;
  }

  /** Whether at least one emit has been committed. */
  get hasPreviousState(): boolean {
    return this.#hasPrevious;
  }

  /**
   * Every state emitted from now on. The current state is not replayed;
   * read {@link state} when attaching.
   */
  get stream(): Observable<State> {
    return this.#stream;
  }

  /** Whether {@link close} has been called. */
  get isClosed(): boolean {
    return this.#stream.closed;
  }

  /** The observer notifications go to. */
  protected get observer(): BlocObserver {
    return this.#observer ?? getBlocObserver();
  }

  /**
   * Shortcut for `bloc.stream.subscribe(...)`.
   */
  subscribe(observer: Observer<State> | ((state: State) => void)): Subscription {
    return typeof observer === "function"
      ? this.#stream.subscribe(observer)
      : this.#stream.subscribe(observer);
  }

  /**
   * Replaces the state and notifies everyone. Equal states are emitted
   * again unless a subclass gates them through {@link shouldEmit}.
   *
   * Order: `previousState` is updated, `onChange` runs, the observer's
   * `onChange` runs, `state` is assigned, subscribers are notified in
   * subscription order.
   *
   * After {@link close} the state is left untouched and a
   * {@link BlocClosedError} goes to {@link onError}.
   */
  emit(newState: State): void {
    if (this.isClosed) {
      this.onError(new BlocClosedError(this.name, "emit"));
      return;
    }

    if (!this.shouldEmit(newState)) return;

    const currentState = this.#state;
    this.#previousState = currentState;
    this.#hasPrevious = true;

    const change = new Change(currentState, newState);
    this.onChange(change);
    this.observer.onChange(change, this);

    this.#state = newState;
    this.#stream.emit(newState);
  }

  /**
   * Computes the next state from the current one and emits it.
   *
   * @example
   * ```ts
   * counter.transform(count => count + 1);
   * ```
   */
  transform(fn: (state: State) => State): void {
    this.emit(fn(this.#state));
  }

  /**
   * Gate in front of every emit. Always true here; the equatable
   * containers use it to drop states equal to the current one.
   */
  protected shouldEmit(_newState: State): boolean {
    return true;
  }

  /**
   * Called with every {@link Change} before the state is assigned.
   * Does nothing by default.
   */
  protected onChange(_change: Change<State>): void {}

  /**
   * Called with errors raised while producing a state. Forwards to the
   * observer by default; overrides should call `super.onError(error)` to
   * keep that.
   */
  onError(error: unknown): void {
    this.observer.onError(error, this);
  }

  /**
   * Completes every subscriber. Later emits and events are refused.
   * Idempotent.
   */
  close(): void {
    this.#stream.close();
  }

  [Symbol.dispose](): void {
    this.close();
  }

  async [Symbol.asyncDispose](): Promise<void> {
    this.close();
  }

  get [Symbol.toStringTag](): string {
    return this.name;
  }
}
