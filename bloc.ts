/**
 * Event-driven containers.
 *
 * @module
 */

import type { BlocOptions } from "./bloc_base.ts";
import type { Queue } from "./queue.ts";

import { BlocBase } from "./bloc_base.ts";
import { Transition } from "./change.ts";
import { BlocClosedError, BlocError, MissingEventHandlerError } from "./error.ts";
import { reportError } from "./observable.ts";
import { clear, createQueue, dequeue, enqueue, getSize } from "./queue.ts";

/**
 * Maps one event to the next state. May be async; a throw or a rejection
 * goes to `onError` and leaves the state as it was.
 *
 * `bloc` is the container itself, for reading `bloc.state`.
 */
export type EventHandler<Event, State> = (
  event: Event,
  bloc: Bloc<Event, State>,
) => State | PromiseLike<State>;

/**
 * Options for {@link Bloc}.
 */
export interface BlocEventOptions<Event, State> extends BlocOptions {
  /**
   * Event handler, for blocs that are not subclassed. A subclass override
   * of {@link Bloc.mapEventToState} takes precedence.
   */
  mapEventToState?: EventHandler<Event, State>;
}

/** Queue slot; keeps `undefined` events distinguishable from empty slots. */
interface Envelope<Event> {
  event: Event;
}

/**
 * A container driven by events.
 *
 * {@link add} queues an event and returns at once. Events are handled one at
 * a time, in the order they were added, starting on a later microtask: each
 * is mapped to a next state, which produces a {@link Transition} from the
 * state read just before the handler ran, runs the transition hooks, then
 * goes through {@link BlocBase.emit}.
 *
 * A handler may be async. While it is pending the bloc keeps accepting
 * events but does not start the next one, so handlers for one bloc never
 * overlap. A failing handler is reported to {@link BlocBase.onError} and the
 * bloc moves on to the next event.
 *
 * ```text
 *  add(e) ──► [queue] ──► Idle ──► Processing(e) ──► emit ──► Idle ─┐
 *                 ▲                                                  │
 *                 └──────────────── next queued event ◄──────────────┘
 * ```
 *
 * @typeParam Event - Events accepted by {@link add}.
 * @typeParam State - The immutable state type.
 *
 * @example Subclassing
 * ```ts
 * type CounterEvent =
 *   | { type: "increment" }
 *   | { type: "incrementBy"; value: number };
 *
 * class CounterBloc extends Bloc<CounterEvent, number> {
 *   constructor() { super(0); }
 *
 *   override mapEventToState(event: CounterEvent): number {
 *     switch (event.type) {
 *       case "increment": return this.state + 1;
 *       case "incrementBy":
 *         if (event.value < 0) throw new RangeError("value must be positive");
 *         return this.state + event.value;
 *     }
 *   }
 * }
 * ```
 *
 * @example Handler passed as an option
 * ```ts
 * const search = new Bloc<string, Result[]>([], {
 *   name: "SearchBloc",
 *   mapEventToState: async (query) => api.search(query),
 * });
 * search.add("bloc");
 * ```
 */
export class Bloc<Event, State> extends BlocBase<State> {
  #queue: Queue<Envelope<Event>> = createQueue();
  #processing = false;
  #handler: EventHandler<Event, State> | undefined;

  /**
   * @throws MissingEventHandlerError when the class does not override
   *   {@link mapEventToState} and no `mapEventToState` option is given
   */
  constructor(initialState: State, options: BlocEventOptions<Event, State> = {}) {
    super(initialState, options);

    const overridden = this.mapEventToState !== Bloc.prototype.mapEventToState;
    if (!overridden && !options.mapEventToState) {
      throw new MissingEventHandlerError(this.name);
    }

    this.#handler = options.mapEventToState;
  }

  /** Events waiting to be handled, not counting the one in progress. */
  get pendingEvents(): number {
    return getSize(this.#queue);
  }

  /** Whether an event is being handled or waiting to be. */
  get isProcessing(): boolean {
    return this.#processing;
  }

  /**
   * Queues an event. Never blocks and never throws; the resulting state is
   * visible at the earliest one microtask later.
   *
   * On a closed bloc the event is dropped and a {@link BlocClosedError} goes
   * to {@link onError}.
   */
  add(event: Event): void {
    if (this.isClosed) {
      this.onError(new BlocClosedError(this.name, "add", event));
      return;
    }

    enqueue(this.#queue, { event });
    if (this.#processing) return;

    this.#processing = true;
    queueMicrotask(() => {
      this.#drain().catch(reportError);
    });
  }

  /**
   * Maps an event to the next state. Read the current state from
   * `this.state`; never emit from here, return the state instead.
   *
   * Subclasses override this, or pass `mapEventToState` in the options.
   */
  mapEventToState(event: Event): State | PromiseLike<State> {
    if (!this.#handler) throw new MissingEventHandlerError(this.name);
    return this.#handler(event, this);
  }

  /**
   * Called with every {@link Transition}, before the observer's
   * `onTransition` and before the state is emitted. Does nothing by default.
   */
  protected onTransition(_transition: Transition<Event, State>): void {}

  /**
   * Drops the queued events, then closes like any container. A handler
   * already in progress finishes, but its state is not emitted.
   */
  override close(): void {
    clear(this.#queue);
    super.close();
  }

  async #drain(): Promise<void> {
    for (let envelope = dequeue(this.#queue); envelope && !this.isClosed; envelope = dequeue(this.#queue)) {
      try {
        await this.#handle(envelope.event);
      } catch (err) {
        // A throwing hook or a missing handler; failures of the handler
        // itself were already routed to onError.
        reportError(err);
      }
    }

    this.#processing = false;
  }

  #handle(event: Event): Promise<void> {
    const currentState = this.state;

    // The executor turns a synchronous throw into a rejection.
    return new Promise<State>(resolve => resolve(this.mapEventToState(event))).then(
      nextState => this.#commit(currentState, event, nextState),
      err => {
        if (err instanceof MissingEventHandlerError) throw err;
        this.onError(BlocError.from(err, { bloc: this.name, event }));
      },
    );
  }

  #commit(currentState: State, event: Event, nextState: State): void {
    // The handler may have been pending while the bloc was closed.
    if (this.isClosed || !this.shouldEmit(nextState)) return;

    const transition = new Transition(currentState, event, nextState);
    this.onTransition(transition);
    this.observer.onTransition(transition, this);

    this.emit(nextState);
  }
}
