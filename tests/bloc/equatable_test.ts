import type { BlocObserver } from "../../observer.ts";
import type { EquatableState } from "../../utils.ts";

import { expect, test, vi } from "vitest";

import { EquatableBloc, EquatableCubit } from "../../equatable.ts";
import { RecordingObserver, flush } from "../_utils/_helpers.ts";

interface FormState {
  count: number;
  loading: boolean;
}

class FormCubit extends EquatableCubit<FormState> {
  constructor(observer: BlocObserver) {
    super({ count: 1, loading: false }, { observer });
  }

  setCount(count: number): void {
    this.emit({ ...this.state, count });
  }

  startLoading(): void {
    this.emit({ ...this.state, loading: true });
  }
}

test("only a state that differs notifies", () => {
  const observer = new RecordingObserver();
  const form = new FormCubit(observer);
  const next = vi.fn();
  form.subscribe(next);

  form.setCount(1);
  expect(next).toHaveBeenCalledTimes(0);

  form.startLoading();
  expect(next).toHaveBeenCalledTimes(1);

  form.startLoading();
  expect(next).toHaveBeenCalledTimes(1);

  expect(next).toHaveBeenCalledWith({ count: 1, loading: true });
  expect(observer.changes).toHaveLength(1);
});

test("a suppressed emit leaves previousState alone", () => {
  const form = new FormCubit(new RecordingObserver());

  form.setCount(1);
  expect(form.hasPreviousState).toBe(false);
  expect(form.previousState).toBeUndefined();

  form.startLoading();
  const previous = form.previousState;
  const current = form.state;

  form.startLoading();

  expect(form.previousState).toBe(previous);
  expect(form.previousState).toEqual({ count: 1, loading: false });
  expect(form.state).toBe(current);
});

test("a custom equality replaces the structural one", () => {
  const observer = new RecordingObserver();
  const temperature = new EquatableCubit(20, {
    observer,
    equals: (a, b) => Math.abs(a - b) < 1,
  });

  temperature.emit(20.5);
  temperature.emit(22);

  expect(temperature.state).toBe(22);
  expect(observer.changes.map(String)).toEqual(["Change { currentState: 20, nextState: 22 }"]);
});

test("states with an equals() method decide for themselves", () => {
  class Session implements EquatableState {
    constructor(readonly userId: string, readonly refreshedAt: number) {}

    equals(other: unknown): boolean {
      return other instanceof Session && other.userId === this.userId;
    }
  }

  const observer = new RecordingObserver();
  const session = new EquatableCubit(new Session("user-1", 0), { observer });

  session.emit(new Session("user-1", 100));
  session.emit(new Session("user-2", 200));

  expect(session.state.userId).toBe("user-2");
  expect(observer.changes).toHaveLength(1);
});

test("an equatable bloc builds no transition for an equal next state", async () => {
  const observer = new RecordingObserver();
  const bloc = new EquatableBloc<"refresh" | "increment", { count: number }>({ count: 0 }, {
    observer,
    mapEventToState: (event, self) => event === "refresh" ? { ...self.state } : { count: self.state.count + 1 },
  });
  const next = vi.fn();
  bloc.subscribe(next);

  bloc.add("refresh");
  bloc.add("increment");
  bloc.add("refresh");
  await flush();

  expect(bloc.state).toEqual({ count: 1 });
  expect(next).toHaveBeenCalledTimes(1);
  expect(observer.log).toEqual([
    "EquatableBloc transition Transition { currentState: {\"count\":0}, event: increment, nextState: {\"count\":1} }",
    "EquatableBloc change Change { currentState: {\"count\":0}, nextState: {\"count\":1} }",
  ]);
});
