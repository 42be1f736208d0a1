/**
 * The process-wide sink that sees every change, transition and error of
 * every container, for logging and telemetry.
 *
 * @module
 */

import type { BlocBase } from "./bloc_base.ts";
import type { Change, Transition } from "./change.ts";

/**
 * Cross-cutting hooks called by every container after its own
 * `onChange`/`onTransition`/`onError`.
 *
 * Implementations must not throw; they run inside the emit path.
 *
 * @example Forwarding errors to a tracker
 * ```ts
 * setBlocObserver({
 *   onChange() {},
 *   onTransition() {},
 *   onError(error, bloc) { tracker.capture(error, { bloc: bloc.name }); },
 * });
 * ```
 */
export interface BlocObserver {
  onChange<State>(change: Change<State>, bloc: BlocBase<State>): void;
  onTransition<Event, State>(transition: Transition<Event, State>, bloc: BlocBase<State>): void;
  onError<State>(error: unknown, bloc: BlocBase<State>): void;
}

/**
 * Default observer: prints every notification to the console.
 */
export class ConsoleBlocObserver implements BlocObserver {
  onChange<State>(change: Change<State>): void {
    console.info(`[BlocObserver] onChange: ${change}`);
  }

  onTransition<Event, State>(transition: Transition<Event, State>): void {
    console.info(`[BlocObserver] onTransition: ${transition}`);
  }

  onError<State>(error: unknown, bloc: BlocBase<State>): void {
    console.error(`[BlocObserver] onError: ${error} in ${bloc.name}`);
  }
}

let current: BlocObserver = new ConsoleBlocObserver();

/**
 * Returns the process-wide observer.
 */
export function getBlocObserver(): BlocObserver {
  return current;
}

/**
 * Replaces the process-wide observer. Meant for application startup;
 * containers built with an explicit `observer` option are unaffected.
 *
 * @returns The observer that was installed before
 */
export function setBlocObserver(observer: BlocObserver): BlocObserver {
  const previous = current;
  current = observer;
  return previous;
}
