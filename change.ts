import { describe } from "./utils.ts";

/**
 * One committed state update: the state before and the state after.
 *
 * Built once per `emit()`, handed to `onChange` and to the observer, then
 * dropped. Instances are frozen.
 *
 * @example
 * ```ts
 * new Change(0, 1).toString(); // "Change { currentState: 0, nextState: 1 }"
 * ```
 */
export class Change<State> {
  constructor(
    readonly currentState: State,
    readonly nextState: State,
  ) {
    Object.freeze(this);
  }

  toString(): string {
    return `Change { currentState: ${describe(this.currentState)}, nextState: ${describe(this.nextState)} }`;
  }
}

/**
 * A {@link Change} together with the event that caused it. Only a
 * {@link Bloc} produces these, right before it emits the next state.
 */
export class Transition<Event, State> {
  constructor(
    readonly currentState: State,
    readonly event: Event,
    readonly nextState: State,
  ) {
    Object.freeze(this);
  }

  toString(): string {
    return `Transition { currentState: ${describe(this.currentState)}, event: ${describe(this.event)}, nextState: ${describe(this.nextState)} }`;
  }
}
