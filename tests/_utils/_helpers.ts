import type { BlocBase } from "../../bloc_base.ts";
import type { Change, Transition } from "../../change.ts";
import type { BlocObserver } from "../../observer.ts";

import { vi } from "vitest";

import { Bloc } from "../../bloc.ts";
import { Cubit } from "../../cubit.ts";

/** Captures what `reportError` schedules instead of letting it throw. */
export function captureReported(run: () => void): (() => void)[] {
  const tasks: (() => void)[] = [];
  const spy = vi.spyOn(globalThis, "queueMicrotask").mockImplementation(task => {
    tasks.push(task);
  });

  try {
    run();
  } finally {
    spy.mockRestore();
  }

  return tasks;
}

/**
 * Resolves after every pending microtask (and so every queued event handled
 * by a synchronous mapping) has run.
 */
export function flush(): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, 0));
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

/** A promise settled from the outside. */
export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/**
 * Observer that keeps everything it is told, plus a flat log of the
 * notifications in the order they arrived.
 */
export class RecordingObserver implements BlocObserver {
  readonly changes: Change<unknown>[] = [];
  readonly transitions: Transition<unknown, unknown>[] = [];
  readonly errors: unknown[] = [];
  readonly log: string[] = [];

  onChange<State>(change: Change<State>, bloc: BlocBase<State>): void {
    this.changes.push(change);
    this.log.push(`${bloc.name} change ${change}`);
  }

  onTransition<Event, State>(transition: Transition<Event, State>, bloc: BlocBase<State>): void {
    this.transitions.push(transition);
    this.log.push(`${bloc.name} transition ${transition}`);
  }

  onError<State>(error: unknown, bloc: BlocBase<State>): void {
    this.errors.push(error);
    this.log.push(`${bloc.name} error`);
  }
}

export class CounterCubit extends Cubit<number> {
  constructor(observer?: BlocObserver) {
    super(0, { observer });
  }

  increment(): void {
    this.transform(count => count + 1);
  }

  decrement(): void {
    this.transform(count => count - 1);
  }
}

export type CounterEvent =
  | { type: "increment" }
  | { type: "decrement" }
  | { type: "incrementBy"; value: number };

export const increment: CounterEvent = { type: "increment" };
export const decrement: CounterEvent = { type: "decrement" };
export const incrementBy = (value: number): CounterEvent => ({ type: "incrementBy", value });

export class InvalidValueError extends Error {
  constructor(value: number) {
    super(`invalid value ${value}`);
    this.name = "InvalidValueError";
  }
}

export class CounterBloc extends Bloc<CounterEvent, number> {
  constructor(observer?: BlocObserver) {
    super(0, { observer });
  }

  override mapEventToState(event: CounterEvent): number {
    switch (event.type) {
      case "increment":
        return this.state + 1;
      case "decrement":
        return this.state - 1;
      case "incrementBy":
        if (event.value < 0) throw new InvalidValueError(event.value);
        return this.state + event.value;
    }
  }
}
