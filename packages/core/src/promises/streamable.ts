import { withResolvers, type Operation, type Stream, type Subscription } from "effection";
import { ValidationError, toError } from "../errors.ts";
import { useLogger } from "../logger/index.ts";

/**
 * The producing side of an `AsyncStreamable`.
 */
export interface StreamSink<T> {
  readonly isClosed: boolean;
  send(item: T): void;
  /** Idempotent. */
  close(): void;
}

/**
 * Replayable broadcast stream.
 *
 * A producer pushes raw items through a sink. Every subscriber gets its own
 * cursor over one shared, append-only backlog of converted items, so late
 * subscribers replay everything that was already produced before following
 * the live tail. Raw items are converted lazily by whichever subscriber first
 * needs them, one at a time.
 *
 * A subscriber halted in the middle of a conversion leaves the item
 * unconverted: the next subscriber to pull converts it again, and the outputs
 * that were already emitted for it are not emitted a second time.
 * `convert` must therefore produce the same outputs, in the same order, when
 * it is repeated.
 */
export abstract class AsyncStreamable<TIn, TOut> implements Stream<TOut, void> {
  readonly #incoming: TIn[] = [];
  readonly #outgoing: TOut[] = [];
  #incomingClosed = false;
  #convertedCount = 0;
  #converting = false;
  /** Outputs already emitted for the item at `#convertedCount`. */
  #emittedForCurrent = 0;
  #failure: Error | undefined;
  #waiters: Array<() => void> = [];

  /**
   * Turn one raw item into zero or more output items, handing each to
   * `emit` as soon as it exists.
   */
  protected abstract convert(item: TIn, emit: (converted: TOut) => Operation<void>): Operation<void>;

  get isClosed(): boolean {
    return this.#incomingClosed;
  }

  *[Symbol.iterator]() {
    let cursor = 0;
    const pull = (position: number) => this.#pull(position);

    const subscription: Subscription<TOut, void> = {
      *next(): Operation<IteratorResult<TOut, void>> {
        const result = yield* pull(cursor);
        if (!result.done) {
          cursor += 1;
        }
        return result;
      },
    };
    return subscription;
  }

  /** Every output item, once the producer has closed. */
  *materializeAsList(): Operation<TOut[]> {
    const subscription = yield* this;
    const items: TOut[] = [];
    let next = yield* subscription.next();
    while (!next.done) {
      items.push(next.value);
      next = yield* subscription.next();
    }
    return items;
  }

  protected sink(): StreamSink<TIn> {
    const streamable = this;
    return {
      get isClosed() {
        return streamable.#incomingClosed;
      },
      send(item: TIn): void {
        if (streamable.#incomingClosed) {
          throw new ValidationError(`${streamable.constructor.name} is closed, nothing more can be sent`);
        }
        streamable.#incoming.push(item);
        streamable.#notify();
      },
      close(): void {
        if (!streamable.#incomingClosed) {
          streamable.#incomingClosed = true;
          streamable.#notify();
        }
      },
    };
  }

  *#pull(cursor: number): Operation<IteratorResult<TOut, void>> {
    while (true) {
      if (cursor < this.#outgoing.length) {
        return { done: false, value: this.#outgoing[cursor] };
      }
      if (this.#failure) {
        throw this.#failure;
      }
      if (!this.#converting) {
        if (this.#convertedCount < this.#incoming.length) {
          yield* this.#convertNext();
          continue;
        }
        if (this.#incomingClosed) {
          return { done: true, value: undefined };
        }
      }
      yield* this.#waitForChange();
    }
  }

  *#convertNext(): Operation<void> {
    const position = this.#convertedCount;
    const item = this.#incoming[position];
    const alreadyEmitted = this.#emittedForCurrent;
    const streamable = this;
    let emitted = 0;
    let settled = false;
    this.#converting = true;
    try {
      yield* this.convert(item, function* (converted) {
        emitted += 1;
        if (emitted > alreadyEmitted) {
          streamable.#emit(converted);
          streamable.#emittedForCurrent = emitted;
        }
      });
      settled = true;
    } catch (error) {
      settled = true;
      const log = yield* useLogger("promises:streamable");
      this.#failure = toError(error);
      log.debug({ position, error: this.#failure.message }, "conversion failed");
    } finally {
      if (settled) {
        this.#convertedCount += 1;
        this.#emittedForCurrent = 0;
      }
      this.#converting = false;
      this.#notify();
    }
  }

  #emit(converted: TOut): void {
    this.#outgoing.push(converted);
    this.#notify();
  }

  *#waitForChange(): Operation<void> {
    const { operation, resolve } = withResolvers<void>();
    this.#waiters.push(() => resolve());
    yield* operation;
  }

  #notify(): void {
    const waiters = this.#waiters;
    this.#waiters = [];
    for (const wake of waiters) {
      wake();
    }
  }
}
