/**
 * An unbounded FIFO queue on a circular buffer, used as the event intake of
 * a {@link Bloc} and the pending values of a {@link StateStream}.
 *
 * `Array.prototype.shift()` is O(n); a busy bloc can have thousands of events
 * waiting behind a slow async handler, so the queue keeps a head index and a size
 * instead and doubles its backing array when it fills up.
 *
 * @example
 * ```ts
 * const events = createQueue<string>();
 * enqueue(events, "increment");
 * enqueue(events, "decrement");
 *
 * dequeue(events); // "increment"
 * getSize(events); // 1
 * ```
 *
 * @module
 */

///////////////////////
// Core Data Types   //
///////////////////////

/**
 * Circular buffer state. Treat the fields as private and go through the
 * functions below.
 *
 * @template T - The type of elements stored in the queue; `undefined` and
 * `null` are reserved for empty slots
 */
export interface Queue<T extends {}> {
  /** Backing slots; `undefined` marks an empty slot */
  items: (T | undefined)[];
  /** Index of the front element (next to dequeue) */
  head: number;
  /** Number of elements currently stored */
  size: number;
}

/** Slots allocated by {@link createQueue} when no capacity is given. */
export const DEFAULT_CAPACITY = 16;

////////////////////////////
// Factory & Core Setup   //
////////////////////////////

/**
 * Creates an empty queue.
 *
 * @param initialCapacity - Slots to allocate up front; the queue grows past it
 */
export function createQueue<T extends {}>(initialCapacity: number = DEFAULT_CAPACITY): Queue<T> {
  if (!Number.isInteger(initialCapacity) || initialCapacity < 1) {
    throw new RangeError(`Queue capacity must be a positive integer, got ${initialCapacity}`);
  }

  return {
    items: new Array<T | undefined>(initialCapacity).fill(undefined),
    head: 0,
    size: 0,
  };
}

///////////////////////////
// Core Queue Operations //
///////////////////////////

/**
 * Adds an element at the back. Amortized O(1).
 */
export function enqueue<T extends {}>(queue: Queue<T>, item: T): void {
  if (queue.size === queue.items.length) grow(queue);

  queue.items[(queue.head + queue.size) % queue.items.length] = item;
  queue.size++;
}

/**
 * Removes and returns the front element, or `undefined` when empty. O(1).
 */
export function dequeue<T extends {}>(queue: Queue<T>): T | undefined {
  if (queue.size === 0) return undefined;

  const item = queue.items[queue.head];
  queue.items[queue.head] = undefined;
  queue.head = (queue.head + 1) % queue.items.length;
  queue.size--;

  return item;
}

////////////////////////////////
// Utility & Status Functions //
////////////////////////////////

export function getSize<T extends {}>(queue: Queue<T>): number {
  return queue.size;
}

/**
 * Drops every element and shrinks back to the default capacity.
 */
export function clear<T extends {}>(queue: Queue<T>): void {
  queue.items = new Array<T | undefined>(DEFAULT_CAPACITY).fill(undefined);
  queue.head = 0;
  queue.size = 0;
}

/** Doubles the backing array, unrolling the ring so the head lands at 0. */
function grow<T extends {}>(queue: Queue<T>): void {
  const capacity = queue.items.length;
  const items = new Array<T | undefined>(capacity * 2).fill(undefined);

  for (let i = 0; i < queue.size; i++) {
    items[i] = queue.items[(queue.head + i) % capacity];
  }

  queue.items = items;
  queue.head = 0;
}
