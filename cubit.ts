import { BlocBase } from "./bloc_base.ts";

/**
 * A container driven by direct calls: subclasses expose methods that call
 * {@link BlocBase.emit} or {@link BlocBase.transform}.
 *
 * @typeParam State - The immutable state type.
 *
 * @example
 * ```ts
 * class CounterCubit extends Cubit<number> {
 *   constructor() { super(0); }
 *   increment() { this.transform(count => count + 1); }
 *   reset() { this.emit(0); }
 * }
 *
 * const counter = new CounterCubit();
 * counter.stream.subscribe(count => console.log(count));
 * counter.increment(); // 1
 * ```
 */
export class Cubit<State> extends BlocBase<State> {}
