import { call, createChannel, resource, spawn, type Operation, type Stream } from "effection";
import type { Forum } from "../forum/forum.ts";
import {
  ContentMessagePromise,
  type BranchPoint,
  type ContentMessagePromiseInit,
  type MessagePromise,
} from "../promises/message-promise.ts";
import { AsyncMessageSequence } from "../promises/sequence.ts";
import {
  assertNever,
  classifyContent,
  isAsyncIterable,
  type MessageInput,
  type MessageSequenceInput,
} from "./content.ts";

/**
 * The end of a conversation branch. A `sequence` tip stands for the
 * concluding message of that sequence and is resolved on the next append.
 */
export type ConversationTip = BranchPoint | { readonly kind: "sequence"; readonly sequence: AsyncMessageSequence };

export const UNDETERMINED_TIP: ConversationTip = { kind: "undetermined" };
export const ROOT_TIP: ConversationTip = { kind: "root" };

export function tipFrom(branchFrom: MessagePromise | AsyncMessageSequence): ConversationTip {
  return branchFrom instanceof AsyncMessageSequence
    ? { kind: "sequence", sequence: branchFrom }
    : { kind: "message", promise: branchFrom };
}

export interface AppendOptions {
  readonly defaultSenderAlias: string;
  readonly doNotForwardIfPossible?: boolean;
  readonly overrideSenderAlias?: string;
  readonly metadata?: Readonly<Record<string, unknown>>;
}

/**
 * Tracks the tip of one conversation branch and chains appended content
 * onto it.
 *
 * A tracker has a single writer: appends must not interleave.
 */
export class ConversationTracker {
  #tip: ConversationTip;

  constructor(
    readonly forum: Forum,
    tip: ConversationTip = UNDETERMINED_TIP
  ) {
    this.#tip = tip;
  }

  get tip(): ConversationTip {
    return this.#tip;
  }

  get hasPriorHistory(): boolean {
    return this.#tip.kind === "message" || this.#tip.kind === "sequence";
  }

  /** A new tracker starting where this one currently ends. */
  branch(): ConversationTracker {
    return new ConversationTracker(this.forum, this.#tip);
  }

  advanceTo(promise: MessagePromise): void {
    this.#tip = { kind: "message", promise };
  }

  /** Put the tip back where it was before an append that did not finish. */
  rewindTo(tip: ConversationTip): void {
    this.#tip = tip;
  }

  /** The current tip, with a `sequence` tip replaced by its concluding message. */
  *resolveTip(): Operation<BranchPoint> {
    const tip = this.#tip;
    if (tip.kind !== "sequence") {
      return tip;
    }
    const concluding = yield* tip.sequence.findConcludingPromise();
    const resolved: BranchPoint = concluding ? { kind: "message", promise: concluding } : { kind: "root" };
    this.#tip = resolved;
    return resolved;
  }

  /**
   * Append content as zero or more messages. Each resulting promise becomes
   * the tip before it is handed to `emit`, and before the next one is made.
   */
  *appendEach(
    input: MessageInput,
    options: AppendOptions,
    emit: (promise: MessagePromise) => Operation<void>
  ): Operation<void> {
    const branchFrom = yield* this.resolveTip();
    const content = classifyContent(input);
    const base = {
      branchFrom,
      defaultSenderAlias: options.defaultSenderAlias,
      overrideSenderAlias: options.overrideSenderAlias,
      doNotForwardIfPossible: options.doNotForwardIfPossible,
      metadata: options.metadata,
    };

    switch (content.type) {
      case "sequence":
        yield* this.#appendSequence(content.items, options, emit);
        return;

      case "error": {
        const preceding = branchFrom.kind === "message" ? branchFrom.promise : undefined;
        const formatted = yield* this.forum.errorFormatter.format(content.error, preceding);
        yield* this.#push(
          {
            ...base,
            source: { type: "text", text: formatted.text },
            metadata: { ...formatted.metadata, ...options.metadata },
            isError: true,
            error: content.error,
          },
          emit
        );
        return;
      }

      case "promise":
        yield* this.#push(
          { ...base, source: content, isError: content.promise.isError, error: content.promise.error },
          emit
        );
        return;

      case "message":
        yield* this.#push({ ...base, source: content, isError: content.message.isError }, emit);
        return;

      case "text":
      case "fields":
      case "stream":
        yield* this.#push({ ...base, source: content }, emit);
        return;

      default:
        assertNever(content);
    }
  }

  /**
   * `appendEach` as a stream: promises are delivered as they are appended.
   */
  append(input: MessageInput, options: AppendOptions): Stream<MessagePromise, void> {
    const tracker = this;
    return resource(function* (provide) {
      const channel = createChannel<MessagePromise, void>();
      const subscription = yield* channel;

      yield* spawn(function* () {
        yield* tracker.appendEach(input, options, (promise) => channel.send(promise));
        yield* channel.close();
      });

      yield* provide(subscription);
    });
  }

  *#appendSequence(
    items: MessageSequenceInput,
    options: AppendOptions,
    emit: (promise: MessagePromise) => Operation<void>
  ): Operation<void> {
    if (items instanceof AsyncMessageSequence) {
      const subscription = yield* items;
      let next = yield* subscription.next();
      while (!next.done) {
        yield* this.appendEach(next.value, options, emit);
        next = yield* subscription.next();
      }
      return;
    }

    if (isAsyncIterable(items)) {
      const replay = replayOf(items);
      try {
        let position = 0;
        let next = yield* replay.itemAt(position);
        while (!next.done) {
          yield* this.appendEach(next.value, options, emit);
          position += 1;
          next = yield* replay.itemAt(position);
        }
      } catch (error) {
        yield* replay.close();
        throw error;
      }
      return;
    }

    for (const item of items) {
      yield* this.appendEach(item, options, emit);
    }
  }

  *#push(
    init: ContentMessagePromiseInit,
    emit: (promise: MessagePromise) => Operation<void>
  ): Operation<void> {
    const promise = new ContentMessagePromise(this.forum.trees, init);
    this.#tip = { kind: "message", promise };
    yield* emit(promise);
  }
}

const replays = new WeakMap<AsyncIterable<MessageInput>, AsyncIterableReplay>();

function replayOf(items: AsyncIterable<MessageInput>): AsyncIterableReplay {
  let replay = replays.get(items);
  if (!replay) {
    replay = new AsyncIterableReplay(items[Symbol.asyncIterator]());
    replays.set(items, replay);
  }
  return replay;
}

/**
 * Reads a one-shot async iterable once and remembers what it produced, so an
 * append that was halted part way through can start over from the first item.
 * The pending `next()` outlives a halted reader and is picked up by the next one.
 */
class AsyncIterableReplay {
  readonly #iterator: AsyncIterator<MessageInput>;
  readonly #items: MessageInput[] = [];
  #done = false;
  #failure: unknown;
  #fetching: Promise<void> | undefined;

  constructor(iterator: AsyncIterator<MessageInput>) {
    this.#iterator = iterator;
  }

  *itemAt(position: number): Operation<IteratorResult<MessageInput, void>> {
    while (position >= this.#items.length && !this.#done) {
      yield* call(() => this.#fetch());
    }
    if (position < this.#items.length) {
      return { done: false, value: this.#items[position] };
    }
    if (this.#failure !== undefined) {
      throw this.#failure;
    }
    return { done: true, value: undefined };
  }

  /** Stop reading the source and let it release what it holds. */
  *close(): Operation<void> {
    if (this.#done) {
      return;
    }
    this.#done = true;
    const iterator = this.#iterator;
    yield* call(async () => {
      await iterator.return?.();
    });
  }

  #fetch(): Promise<void> {
    this.#fetching ??= this.#iterator.next().then(
      (result) => {
        this.#fetching = undefined;
        if (result.done) {
          this.#done = true;
        } else {
          this.#items.push(result.value);
        }
      },
      (error: unknown) => {
        this.#fetching = undefined;
        this.#done = true;
        this.#failure = error ?? new Error("async iterable failed");
      }
    );
    return this.#fetching;
  }
}
