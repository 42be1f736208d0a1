/**
 * Well-known symbols used by state streams.
 *
 * `Symbol.observable` lets other reactive libraries (RxJS, zen-observable…)
 * adopt a container's `stream` directly, and `Symbol.dispose` /
 * `Symbol.asyncDispose` let subscriptions and containers sit in `using`
 * blocks. Runtimes that lack any of them get a registered symbol installed on
 * the global constructor, so every copy of this module agrees on identity.
 *
 * Import this module for its side effect before touching any of the three.
 *
 * @module
 */

declare global {
  interface SymbolConstructor {
    /**
     * Interop hook: an object with a `[Symbol.observable]()` method can hand
     * out something subscribable.
     *
     * @see {@link https://github.com/tc39/proposal-observable | TC39 Observable proposal}
     */
    readonly observable: unique symbol;
  }
}

function install(name: "observable" | "dispose" | "asyncDispose"): void {
  if (typeof Reflect.get(Symbol, name) === "symbol") return;

  Reflect.defineProperty(Symbol, name, {
    value: Symbol.for(`Symbol.${name}`),
    enumerable: false,
    configurable: false,
    writable: false,
  });
}

install("observable");
install("dispose");
install("asyncDispose");

export {};
