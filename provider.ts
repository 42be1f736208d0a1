/**
 * Hands containers to the parts of an application that need them, keyed by
 * class, without threading them through every constructor.
 *
 * @module
 */

import type { BlocBase } from "./bloc_base.ts";

import { BlocNotProvidedError } from "./error.ts";
import "./symbol.ts";

/** A container class, abstract ones included. */
export type BlocConstructor<B extends BlocBase<unknown>> = abstract new (...args: never[]) => B;

interface Entry {
  /** Created on first read, for lazy entries. */
  factory: (() => BlocBase<unknown>) | null;
  instance: BlocBase<unknown> | null;
  /** Whether the provider closes the instance. */
  owned: boolean;
}

/**
 * A scope of containers.
 *
 * - {@link provide} registers an existing instance; its owner closes it.
 * - {@link create} registers a factory that runs on first {@link read}; the
 *   provider closes what it created.
 *
 * {@link read} looks in this scope first, then in each parent. A child
 * created with {@link scope} can shadow a parent's entry for the same class.
 *
 * @example
 * ```ts
 * const app = new BlocProvider();
 * app.create(CounterCubit, () => new CounterCubit());
 *
 * const page = app.scope();
 * page.provide(SearchBloc, search);
 *
 * page.read(CounterCubit).increment();
 * page.close(); // closes nothing: search belongs to whoever made it
 * app.close();  // closes the counter
 * ```
 */
export class BlocProvider implements Disposable {
  readonly #parent: BlocProvider | null;
  readonly #entries = new Map<BlocConstructor<BlocBase<unknown>>, Entry>();
  #closed = false;

  constructor(parent: BlocProvider | null = null) {
    this.#parent = parent;
  }

  get closed(): boolean {
    return this.#closed;
  }

  /**
   * Registers an instance under its class. Replaces any previous entry for
   * that class in this scope.
   */
  provide<B extends BlocBase<unknown>>(type: BlocConstructor<B>, bloc: B): this {
    this.#assertOpen();
    this.#entries.set(type, { factory: null, instance: bloc, owned: false });
    return this;
  }

  /**
   * Registers a factory, run the first time the class is read from this
   * scope or a child.
   */
  create<B extends BlocBase<unknown>>(type: BlocConstructor<B>, factory: () => B): this {
    this.#assertOpen();
    this.#entries.set(type, { factory, instance: null, owned: true });
    return this;
  }

  /** Whether this scope or a parent has an entry for the class. */
  has(type: BlocConstructor<BlocBase<unknown>>): boolean {
    return this.#entries.has(type) || (this.#parent?.has(type) ?? false);
  }

  /**
   * Returns the nearest instance registered for the class.
   *
   * @throws BlocNotProvidedError when neither this scope nor a parent has one
   */
  read<B extends BlocBase<unknown>>(type: BlocConstructor<B>): B {
    const entry = this.#entries.get(type);
    if (!entry) {
      if (this.#parent) return this.#parent.read(type);
      throw new BlocNotProvidedError(type.name);
    }

    if (!entry.instance && entry.factory) {
      entry.instance = entry.factory();
      entry.factory = null;
    }

    const instance = entry.instance;
    if (!(instance instanceof type)) {
      throw new TypeError(`The entry for ${type.name} is not an instance of it`);
    }

    return instance;
  }

  /** A child scope whose reads fall back to this one. */
  scope(): BlocProvider {
    this.#assertOpen();
    return new BlocProvider(this);
  }

  /**
   * Closes the containers this scope created and forgets every entry.
   * Provided instances and parent scopes are left alone. Idempotent.
   */
  close(): void {
    if (this.#closed) return;
    this.#closed = true;

    for (const entry of this.#entries.values()) {
      if (entry.owned) entry.instance?.close();
    }

    this.#entries.clear();
  }

  [Symbol.dispose](): void {
    this.close();
  }

  #assertOpen(): void {
    if (this.#closed) throw new Error("BlocProvider is closed");
  }
}
