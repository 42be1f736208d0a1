/**
 * @module StateStream
 */

import type { SubscriptionObserver } from "./observable.ts";
import type { Queue } from "./queue.ts";

import { Observable } from "./observable.ts";
import { clear, createQueue, dequeue, enqueue } from "./queue.ts";
import "./symbol.ts";

/**
 * The multicast notification channel behind every container.
 *
 * Unlike a plain {@link Observable}, a `StateStream` is hot: subscribing does
 * not produce anything by itself, it only registers for values pushed later
 * through {@link emit}. Late subscribers do not see earlier values.
 *
 * - {@link emit} delivers to the subscribers attached at the moment of the
 *   call, in the order they subscribed.
 * - A value emitted from inside a subscriber waits until every subscriber
 *   has received the current one, so all of them see values in emission
 *   order.
 * - {@link close} completes every subscriber; subscribing afterwards
 *   completes immediately and further emits are ignored.
 *
 * @typeParam T - The type of values carried by the stream.
 *
 * @example
 * ```ts
 * const stream = new StateStream<number>();
 * stream.subscribe(n => console.log("got", n));
 * stream.emit(1); // got 1
 * stream.close();
 * ```
 */
export class StateStream<T> extends Observable<T> {
  #subscribers = new Set<SubscriptionObserver<T>>();
  #pending: Queue<{ value: T }> = createQueue();
  #delivering = false;
  #closed = false;

  constructor() {
    super(subscriber => {
      if (this.#closed) {
        subscriber.complete();
        return;
      }

      this.#subscribers.add(subscriber);
      return () => {
        this.#subscribers.delete(subscriber);
      };
    });
  }

  /** Whether {@link close} has been called. */
  get closed(): boolean {
    return this.#closed;
  }

  /** Number of live subscribers. */
  get size(): number {
    return this.#subscribers.size;
  }

  /**
   * Push a value to every current subscriber.
   *
   * Subscribers added while the value is being delivered only receive later
   * values. Called from a subscriber, the value is queued and delivered once
   * the current one has reached everyone.
   */
  emit(value: T): void {
    if (this.#closed) return;

    enqueue(this.#pending, { value });
    if (this.#delivering) return;

    this.#delivering = true;
    try {
      for (let item = dequeue(this.#pending); item && !this.#closed; item = dequeue(this.#pending)) {
        for (const subscriber of [...this.#subscribers]) {
          subscriber.next(item.value);
        }
      }
    } finally {
      this.#delivering = false;
    }
  }

  /** Complete all subscribers and refuse further emits. */
  close(): void {
    if (this.#closed) return;
    this.#closed = true;
    clear(this.#pending);

    for (const subscriber of [...this.#subscribers]) {
      subscriber.complete();
    }

    this.#subscribers.clear();
  }

  [Symbol.dispose](): void {
    this.close();
  }

  async [Symbol.asyncDispose](): Promise<void> {
    this.close();
  }

  override get [Symbol.toStringTag](): string { return "StateStream"; }
}
