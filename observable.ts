// @filename: observable.ts
/**
 * The push-based subscription primitive that state streams are built on.
 *
 * An `Observable` stores a subscriber function and runs it once per
 * `subscribe()` call. The subscriber receives a {@link SubscriptionObserver}
 * to push values through and may return a teardown, which runs exactly once
 * when the subscription ends, however it ends.
 *
 * ## Error Propagation Policy
 * 1. If the observer supplies an `error` callback, exceptions thrown by its
 *    own `next()`/`complete()` are routed there.
 * 2. Without an `error` callback the exception is re-thrown on the microtask
 *    queue, with the same timing as an unhandled Promise rejection.
 * 3. An exception thrown inside `error()` is always queued to the microtask
 *    queue.
 *
 * None of these paths interrupt the producer, so one faulty subscriber
 * cannot stop a container from notifying the others.
 *
 * @example
 * ```ts
 * const ticks = new Observable<number>(observer => {
 *   const id = setInterval(() => observer.next(Date.now()), 1000);
 *   return () => clearInterval(id);
 * });
 *
 * using sub = ticks.subscribe(t => console.log(t));
 * ```
 *
 * @module
 */
import type { Observer, Subscription } from "./_types.ts";
import "./symbol.ts";

/**
 * What a subscriber function may return to release its resources.
 *
 * - `() => void`: plain cleanup callback.
 * - `{ unsubscribe() }`: another subscription.
 * - `{ [Symbol.dispose]() }` / `{ [Symbol.asyncDispose]() }`: disposables.
 * - nothing: no cleanup.
 *
 * Cleanup is captured even if the subscriber completes or errors
 * synchronously before returning it.
 */
export type Teardown =
  | (() => void)
  | { unsubscribe(): void }
  | Disposable
  | AsyncDisposable
  | null
  | undefined
  | void;

/** Per-subscription state, kept out of the public facade. */
interface StateMap<T> {
  /** True once closed via unsubscribe, error or complete */
  closed: boolean;

  /** Nulled on closure so the observer can be collected */
  observer: Observer<T> | null;

  cleanup: Teardown;

  removeAbortHandler: (() => void) | null;
}

const SubscriptionStateMap = new WeakMap<Subscription, StateMap<unknown>>();

/** Re-throws on the microtask queue, the way a host reports an uncaught error. */
export function reportError(err: unknown): void {
  queueMicrotask(() => { throw err; });
}

/**
 * Creates the subscription facade and its backing state.
 *
 * @throws TypeError if observer methods are present but not functions
 * @internal
 */
function createSubscription<T>(observer: Observer<T>, opts?: { signal?: AbortSignal }): { subscription: Subscription; state: StateMap<T> } {
  for (const key of ["next", "error", "complete"] as const) {
    if (observer[key] !== undefined && typeof observer[key] !== "function") {
      throw new TypeError(`Observer.${key} must be a function`);
    }
  }

  const state: StateMap<T> = {
    closed: false,
    observer,
    cleanup: null,
    removeAbortHandler: null,
  };

  const subscription: Subscription = {
    get [Symbol.toStringTag](): "Subscription" { return "Subscription" as const; },

    get closed() { return state.closed; },

    unsubscribe(): void { closeSubscription(this); },

    [Symbol.dispose]() {
      this.unsubscribe();
    },

    [Symbol.asyncDispose]() {
      return Promise.resolve(this.unsubscribe());
    },
  };

  const signal = opts?.signal;
  if (signal) {
    const abortHandler = () => subscription.unsubscribe();
    signal.addEventListener("abort", abortHandler, { once: true });
    state.removeAbortHandler = () => signal.removeEventListener("abort", abortHandler);
  }

  SubscriptionStateMap.set(subscription, state);
  return { subscription, state };
}

/**
 * Closes a subscription and runs its teardown. Idempotent.
 * @internal
 */
function closeSubscription(subscription: Subscription): void {
  const state = SubscriptionStateMap.get(subscription);
  if (!state || state.closed) return;

  state.closed = true;

  const cleanup = state.cleanup;
  const removeAbortHandler = state.removeAbortHandler;

  state.cleanup = null;
  state.observer = null;
  state.removeAbortHandler = null;

  removeAbortHandler?.();

  try {
    cleanupSubscription(cleanup);
  } finally {
    SubscriptionStateMap.delete(subscription);
  }
}

/**
 * Runs whichever kind of teardown the subscriber handed back. Errors thrown
 * during cleanup are reported asynchronously so unsubscribe always finishes.
 * @internal
 */
function cleanupSubscription(cleanup: Teardown): void {
  if (!cleanup) return;

  try {
    if (typeof cleanup === "function") cleanup();
    else if ("unsubscribe" in cleanup) cleanup.unsubscribe();
    else if (Symbol.asyncDispose in cleanup) cleanup[Symbol.asyncDispose]().catch(reportError);
    else if (Symbol.dispose in cleanup) cleanup[Symbol.dispose]();
  } catch (err) {
    reportError(err);
  }
}

/**
 * The producer-side view of one subscription.
 *
 * Guarantees that nothing is delivered after the subscription closes, that
 * `error`/`complete` close it, and that observer callbacks are called with
 * the observer as `this`.
 *
 * @typeParam T - The type of values delivered by the parent Observable.
 */
export class SubscriptionObserver<T> {
  #state: StateMap<T> | null;
  #subscription: Subscription | null;

  constructor(subscription: Subscription, state: StateMap<T>) {
    this.#subscription = subscription;
    this.#state = state;
  }

  /** Whether the subscription is closed; producers should stop when true. */
  get closed(): boolean {
    return this.#state?.closed ?? true;
  }

  /**
   * Delivers the next value if the subscription is open. This is the hot
   * path: one call per subscriber per emitted state.
   */
  next(value: T): void {
    const state = this.#state;
    if (!state || state.closed) return;

    const observer = state.observer;
    if (!observer || typeof observer.next !== "function") return;

    try {
      observer.next(value);
    } catch (err) {
      if (typeof observer.error === "function") {
        try { observer.error(err); }
        catch (innerErr) { reportError(innerErr); }
      }
      else reportError(err);
    }
  }

  /** Delivers an error, then closes the subscription. */
  error(err: unknown): void {
    const state = this.#state;
    if (!state || state.closed) return;

    const observer = state.observer;
    if (observer && typeof observer.error === "function") {
      try { observer.error(err); }
      catch (innerErr) { reportError(innerErr); }
    }
    else reportError(err);

    this.#close();
  }

  /** Signals completion, then closes the subscription. */
  complete(): void {
    const state = this.#state;
    if (!state || state.closed) return;

    const observer = state.observer;
    if (observer && typeof observer.complete === "function") {
      try {
        observer.complete();
      } catch (err) {
        if (typeof observer.error === "function") {
          try { observer.error(err); }
          catch (innerErr) { reportError(innerErr); }
        }
        else reportError(err);
      }
    }

    this.#close();
  }

  #close(): void {
    const subscription = this.#subscription;
    this.#subscription = null;
    this.#state = null;
    try {
      subscription?.unsubscribe();
    } catch (err) {
      reportError(err);
    }
  }

  get [Symbol.toStringTag](): "Subscription Observer" { return "Subscription Observer" as const; }
}

/**
 * A lazy, push-based source of values.
 *
 * Nothing runs until `subscribe()` is called; each subscription runs the
 * subscriber function independently and cleans up independently.
 *
 * @typeParam T - Type of values emitted by this Observable
 */
export class Observable<T> {
  #subscribeFn: (obs: SubscriptionObserver<T>) => Teardown;

  /**
   * @param subscribeFn - Called once per subscription with the observer to
   *   push values through. May return a {@link Teardown}.
   * @throws TypeError if subscribeFn is not a function
   */
  constructor(subscribeFn: (obs: SubscriptionObserver<T>) => Teardown) {
    if (typeof subscribeFn !== "function") {
      throw new TypeError("Observable initializer must be a function");
    }

    this.#subscribeFn = subscribeFn;
  }

  /** Interop: foreign libraries adopt this Observable through this hook. */
  [Symbol.observable](): Observable<T> { return this; }

  /**
   * Subscribes with an observer object.
   *
   * @param opts.signal - Aborting it unsubscribes.
   *
   * @example
   * ```ts
   * const sub = counter.stream.subscribe({
   *   next(count) { console.log(count); },
   *   complete() { console.log("closed"); },
   * });
   * sub.unsubscribe();
   * ```
   */
  subscribe(observer: Observer<T>, opts?: { signal?: AbortSignal }): Subscription;

  /**
   * Subscribes with separate callbacks.
   *
   * @example
   * ```ts
   * counter.stream.subscribe(count => console.log(count));
   * ```
   */
  subscribe(
    next: (value: T) => void,
    error?: (e: unknown) => void,
    complete?: () => void,
    opts?: { signal?: AbortSignal },
  ): Subscription;

  subscribe(
    observerOrNext: Observer<T> | ((value: T) => void),
    errorOrOpts?: ((e: unknown) => void) | { signal?: AbortSignal },
    complete?: () => void,
    maybeOpts?: { signal?: AbortSignal },
  ): Subscription {
    let observer: Observer<T>;
    let opts: { signal?: AbortSignal } | undefined;

    if (typeof observerOrNext === "function") {
      observer = {
        next: observerOrNext,
        error: typeof errorOrOpts === "function" ? errorOrOpts : undefined,
        complete,
      };
      opts = maybeOpts;
    } else {
      observer = observerOrNext ?? {};
      opts = typeof errorOrOpts === "function" ? undefined : errorOrOpts;
    }

    const { subscription, state } = createSubscription(observer, opts);
    const subObserver = new SubscriptionObserver<T>(subscription, state);

    try {
      observer.start?.(subscription);
      if (subscription.closed) return subscription;
    } catch (err) {
      reportError(err);
      subscription.unsubscribe();
      return subscription;
    }

    try {
      const cleanup = this.#subscribeFn.call(undefined, subObserver);

      // The subscriber may already have completed or errored synchronously,
      // in which case nobody is left to run the teardown but us.
      if (subscription.closed) cleanupSubscription(cleanup);
      else state.cleanup = cleanup;
    } catch (err) {
      subObserver.error(err);
    }

    return subscription;
  }

  get [Symbol.toStringTag](): string { return "Observable"; }
}
