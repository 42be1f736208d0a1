import { expect, test } from "vitest";

import { DEFAULT_CAPACITY, clear, createQueue, dequeue, enqueue, getSize } from "../queue.ts";

test("dequeues in insertion order", () => {
  const queue = createQueue<string>();
  enqueue(queue, "a");
  enqueue(queue, "b");
  enqueue(queue, "c");

  expect(dequeue(queue)).toBe("a");
  expect(dequeue(queue)).toBe("b");
  expect(getSize(queue)).toBe(1);
  expect(dequeue(queue)).toBe("c");
  expect(getSize(queue)).toBe(0);
});

test("returns undefined when empty", () => {
  const queue = createQueue<number>();

  expect(dequeue(queue)).toBeUndefined();
});

test("grows past its initial capacity while keeping order across the wrap", () => {
  const queue = createQueue<number>(2);

  enqueue(queue, 1);
  enqueue(queue, 2);
  dequeue(queue);
  enqueue(queue, 3);
  enqueue(queue, 4);
  enqueue(queue, 5);

  expect(queue.items.length).toBe(4);
  expect([dequeue(queue), dequeue(queue), dequeue(queue), dequeue(queue)]).toEqual([2, 3, 4, 5]);
  expect(dequeue(queue)).toBeUndefined();
});

test("clear empties the queue and resets its capacity", () => {
  const queue = createQueue<number>(1);
  for (let i = 0; i < 40; i++) enqueue(queue, i);

  clear(queue);

  expect(getSize(queue)).toBe(0);
  expect(queue.items.length).toBe(DEFAULT_CAPACITY);
  expect(dequeue(queue)).toBeUndefined();
});

test("rejects a capacity that is not a positive integer", () => {
  expect(() => createQueue(0)).toThrow(RangeError);
  expect(() => createQueue(1.5)).toThrow("Queue capacity must be a positive integer, got 1.5");
});
