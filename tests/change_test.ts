import { expect, test } from "vitest";

import { Change, Transition } from "../change.ts";

test("Change renders both states", () => {
  const change = new Change({ count: 0 }, { count: 1 });

  expect(change.toString()).toBe('Change { currentState: {"count":0}, nextState: {"count":1} }');
  expect(`${new Change(0, 1)}`).toBe("Change { currentState: 0, nextState: 1 }");
});

test("Transition renders the event between the states", () => {
  const transition = new Transition(0, { type: "increment" }, 1);

  expect(transition.toString()).toBe('Transition { currentState: 0, event: {"type":"increment"}, nextState: 1 }');
  expect(transition.event).toEqual({ type: "increment" });
});

test("records are frozen", () => {
  const change = new Change(0, 1);
  const transition = new Transition(0, "increment", 1);

  expect(Object.isFrozen(change)).toBe(true);
  expect(Object.isFrozen(transition)).toBe(true);
  expect(() => Reflect.set(change, "nextState", 2)).not.toThrow();
  expect(change.nextState).toBe(1);
});
