// @filename: _types.ts
import "./symbol.ts";

/**
 * Receives notifications from a state stream.
 *
 * Every callback is optional. A container's stream never errors on its own
 * and only completes when the container is closed, so most observers only
 * supply `next`.
 *
 * @typeParam T - Type of values this observer can receive.
 *
 * @example
 * ```ts
 * const logger: Observer<number> = {
 *   start(subscription) { console.log("attached", !subscription.closed); },
 *   next(count) { console.log("count", count); },
 *   complete() { console.log("container closed"); },
 * };
 * counter.stream.subscribe(logger);
 * ```
 */
export interface Observer<T> {
  /** Called once, before the first value, with the new subscription. */
  start?(subscription: Subscription): void;

  /** Receives each emitted value. Exceptions thrown here go to `error`. */
  next?(value: T): void;

  /** Receives an error; the subscription is closed afterwards. */
  error?(error: unknown): void;

  /** Called when the source completes; the subscription is closed afterwards. */
  complete?(): void;
}

/**
 * Handle returned by `subscribe()`.
 *
 * `unsubscribe()` is idempotent. Subscriptions also work in `using` and
 * `await using` blocks.
 *
 * @example
 * ```ts
 * {
 *   using sub = counter.stream.subscribe(render);
 *   counter.increment();
 * } // detached here
 * ```
 */
export interface Subscription extends Disposable, AsyncDisposable {
  /** True once unsubscribed, completed or errored. Never reopens. */
  readonly closed: boolean;

  /** Detaches the observer and runs the teardown, at most once. */
  unsubscribe(): void;

  readonly [Symbol.toStringTag]: "Subscription";
}

