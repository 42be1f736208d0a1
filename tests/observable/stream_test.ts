import { expect, test, vi } from "vitest";

import { StateStream } from "../../stream.ts";

test("late subscribers only see later values", () => {
  const stream = new StateStream<number>();
  const early: number[] = [];
  const late: number[] = [];

  stream.subscribe(v => early.push(v));
  stream.emit(1);
  stream.subscribe(v => late.push(v));
  stream.emit(2);

  expect(early).toEqual([1, 2]);
  expect(late).toEqual([2]);
});

test("delivers in subscription order", () => {
  const stream = new StateStream<string>();
  const order: string[] = [];

  stream.subscribe(v => order.push(`a:${v}`));
  stream.subscribe(v => order.push(`b:${v}`));
  stream.emit("x");

  expect(order).toEqual(["a:x", "b:x"]);
});

test("a subscriber added during delivery waits for the next value", () => {
  const stream = new StateStream<number>();
  const nested: number[] = [];

  const first = stream.subscribe(() => {
    first.unsubscribe();
    stream.subscribe(v => nested.push(v));
  });

  stream.emit(1);
  stream.emit(2);

  expect(nested).toEqual([2]);
  expect(stream.size).toBe(1);
});

test("a value emitted from a subscriber reaches everyone after the current one", () => {
  const stream = new StateStream<number>();
  const first: number[] = [];
  const second: number[] = [];

  stream.subscribe(v => {
    first.push(v);
    if (v === 1) stream.emit(2);
  });
  stream.subscribe(v => second.push(v));

  stream.emit(1);

  expect(first).toEqual([1, 2]);
  expect(second).toEqual([1, 2]);
});

test("values still queued at close are dropped", () => {
  const stream = new StateStream<number>();
  const second: number[] = [];

  stream.subscribe(v => {
    if (v === 1) {
      stream.emit(2);
      stream.close();
    }
  });
  stream.subscribe(v => second.push(v));

  stream.emit(1);

  expect(second).toEqual([]);
  expect(stream.closed).toBe(true);
});

test("unsubscribing removes the subscriber", () => {
  const stream = new StateStream<number>();
  const next = vi.fn();

  const subscription = stream.subscribe(next);
  expect(stream.size).toBe(1);

  subscription.unsubscribe();
  stream.emit(1);

  expect(stream.size).toBe(0);
  expect(next).not.toHaveBeenCalled();
});

test("close completes subscribers and refuses later values", () => {
  const stream = new StateStream<number>();
  const next = vi.fn();
  const complete = vi.fn();

  const subscription = stream.subscribe({ next, complete });
  stream.close();
  stream.close();
  stream.emit(1);

  expect(stream.closed).toBe(true);
  expect(subscription.closed).toBe(true);
  expect(complete).toHaveBeenCalledTimes(1);
  expect(next).not.toHaveBeenCalled();
  expect(stream.size).toBe(0);
});

test("subscribing after close completes immediately", () => {
  const stream = new StateStream<number>();
  stream[Symbol.dispose]();

  const complete = vi.fn();
  const subscription = stream.subscribe({ complete });

  expect(complete).toHaveBeenCalledTimes(1);
  expect(subscription.closed).toBe(true);
  expect(String(stream)).toBe("[object StateStream]");
});
