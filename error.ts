// @filename: error.ts
/**
 * Errors raised by containers, with the context needed to trace them back to
 * the bloc and event involved.
 *
 * @module
 */

import { describe } from "./utils.ts";

/** Context attached to a {@link BlocError}. */
export interface BlocErrorContext {
  /** Name of the container that reported the error */
  bloc?: string;

  /** The event being processed, when an event handler failed */
  event?: unknown;

  /** The underlying error */
  cause?: unknown;

  /** A hint at the likely fix */
  tip?: string;
}

/**
 * Base class for every error a container reports.
 *
 * Event handler failures reach `onError` wrapped in a `BlocError` whose
 * `cause` is the thrown value, so the observer can tell which bloc and which
 * event were involved without the handler doing any bookkeeping.
 *
 * @example
 * ```ts
 * class Counter extends Bloc<CounterEvent, number> {
 *   override onError(error: unknown) {
 *     if (isBlocError(error)) console.warn(error.event, error.cause);
 *     super.onError(error);
 *   }
 * }
 * ```
 */
export class BlocError extends Error {
  readonly bloc?: string;
  readonly event?: unknown;
  readonly tip?: string;

  constructor(message: string, context: BlocErrorContext = {}) {
    super(message, { cause: context.cause });
    this.name = "BlocError";
    this.bloc = context.bloc;
    this.event = context.event;
    this.tip = context.tip;
  }

  /**
   * Renders the message plus whatever context is available.
   */
  override toString(): string {
    let result = `${this.name}: ${this.message}`;

    if (this.bloc) {
      result += `\n  in bloc: ${this.bloc}`;
    }

    if (this.event !== undefined) {
      result += `\n  processing event: ${describe(this.event).slice(0, 100)}`;
    }

    if (this.cause !== undefined) {
      result += `\n  caused by: ${String(this.cause)}`;
    }

    if (this.tip) {
      result += `\n  tip: ${this.tip}`;
    }

    return result;
  }

  /**
   * Wraps any thrown value in a `BlocError`.
   *
   * An existing `BlocError` is returned as is, only gaining the context it
   * lacked, so errors are never wrapped twice.
   *
   * @param error - The thrown value
   * @param context - Bloc and event to attach
   */
  static from(error: unknown, context: Omit<BlocErrorContext, "cause"> = {}): BlocError {
    if (error instanceof BlocError) {
      if ((error.bloc || !context.bloc) && (error.event !== undefined || context.event === undefined)) {
        return error;
      }

      return new BlocError(error.message, {
        bloc: error.bloc ?? context.bloc,
        event: error.event ?? context.event,
        cause: error.cause,
        tip: error.tip ?? context.tip,
      });
    }

    return new BlocError(
      error instanceof Error ? error.message : String(error),
      { ...context, cause: error },
    );
  }
}

/**
 * Thrown when a {@link Bloc} is constructed without a way to map events to
 * states. This is an integration mistake, so it fails at construction rather
 * than at the first event.
 */
export class MissingEventHandlerError extends BlocError {
  constructor(bloc: string) {
    super(`${bloc} has no event handler`, {
      bloc,
      tip: "override mapEventToState() or pass the mapEventToState option",
    });
    this.name = "MissingEventHandlerError";
  }
}

/**
 * Reported through `onError` when a closed container is asked to emit or to
 * accept an event.
 */
export class BlocClosedError extends BlocError {
  readonly action: "emit" | "add";

  constructor(bloc: string, action: "emit" | "add", event?: unknown) {
    super(action === "emit" ? `Cannot emit after ${bloc} was closed` : `Cannot add events after ${bloc} was closed`, {
      bloc,
      event,
    });
    this.name = "BlocClosedError";
    this.action = action;
  }
}

/**
 * Thrown by {@link BlocProvider.read} when no provider in the chain holds a
 * container of the requested type.
 */
export class BlocNotProvidedError extends BlocError {
  constructor(type: string) {
    super(`No ${type} was provided`, {
      bloc: type,
      tip: `provide it with provider.provide(${type}, bloc) or provider.create(${type}, factory) in this scope or a parent`,
    });
    this.name = "BlocNotProvidedError";
  }
}

/**
 * Narrows an unknown value to {@link BlocError}, subclasses included.
 */
export function isBlocError(value: unknown): value is BlocError {
  return value instanceof BlocError;
}
