/**
 * Predictable state management built on a tiny Observable core.
 *
 * A container owns one immutable state value and publishes every new state
 * to its subscribers. Two flavours share that core:
 *
 * - {@link Cubit}: call methods, they {@link BlocBase.emit} new states.
 * - {@link Bloc}: {@link Bloc.add} events, which are handled one at a time,
 *   in order, each mapped to the next state.
 *
 * Every change, transition and error is also reported to a process-wide
 * {@link BlocObserver}, which logs to the console until replaced with
 * {@link setBlocObserver}.
 *
 * @example Cubit
 * ```ts
 * import { Cubit } from "bloc-state";
 *
 * class CounterCubit extends Cubit<number> {
 *   constructor() { super(0); }
 *   increment() { this.transform(count => count + 1); }
 * }
 *
 * const counter = new CounterCubit();
 * counter.subscribe(count => console.log("count is", count));
 * counter.increment(); // count is 1
 * ```
 *
 * @example Bloc
 * ```ts
 * import { Bloc } from "bloc-state";
 *
 * type CounterEvent = "increment" | "decrement";
 *
 * const counter = new Bloc<CounterEvent, number>(0, {
 *   name: "CounterBloc",
 *   mapEventToState: (event, bloc) =>
 *     event === "increment" ? bloc.state + 1 : bloc.state - 1,
 * });
 *
 * counter.add("increment");
 * counter.add("increment");
 * counter.add("decrement");
 * // one microtask-driven queue later: counter.state === 1
 * ```
 *
 * @example Skipping equal states
 * ```ts
 * import { EquatableCubit } from "bloc-state";
 *
 * const form = new EquatableCubit({ count: 1, loading: false });
 * form.emit({ count: 1, loading: false }); // nobody is notified
 * ```
 *
 * @module
 */

import "./symbol.ts";

export type { Observer, Subscription } from "./_types.ts";
export type { Teardown } from "./observable.ts";
export { Observable, SubscriptionObserver, reportError } from "./observable.ts";
export { StateStream } from "./stream.ts";

export type { BlocErrorContext } from "./error.ts";
export { BlocClosedError, BlocError, BlocNotProvidedError, MissingEventHandlerError, isBlocError } from "./error.ts";

export type { EquatableState } from "./utils.ts";
export { describe, isEqual } from "./utils.ts";

export { Change, Transition } from "./change.ts";

export type { BlocObserver } from "./observer.ts";
export { ConsoleBlocObserver, getBlocObserver, setBlocObserver } from "./observer.ts";

export type { BlocOptions } from "./bloc_base.ts";
export { BlocBase } from "./bloc_base.ts";
export { Cubit } from "./cubit.ts";

export type { BlocEventOptions, EventHandler } from "./bloc.ts";
export { Bloc } from "./bloc.ts";

export type { EquatableOptions, StateEquality } from "./equatable.ts";
export { EquatableBloc, EquatableCubit } from "./equatable.ts";

export type { BlocBuilderCondition, BlocListenerCondition, BlocViewOptions } from "./view.ts";
export { BlocView, blocBuilder, blocConsumer, blocListener } from "./view.ts";

export type { BlocConstructor } from "./provider.ts";
export { BlocProvider } from "./provider.ts";
