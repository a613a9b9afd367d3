import type { Operation } from "effection";
import { ValidationError } from "../errors.ts";
import type { MessageInput } from "../conversation/content.ts";
import type { ConversationTracker } from "../conversation/tracker.ts";
import type { Message } from "../models/message.ts";
import type { MessagePromise } from "./message-promise.ts";
import { AsyncStreamable, type StreamSink } from "./streamable.ts";

export interface SendOptions {
  /** Sender of the resulting messages instead of the sequence default. */
  readonly senderAlias?: string;
  readonly metadata?: Readonly<Record<string, unknown>>;
}

export interface PendingMessage extends SendOptions {
  readonly content: MessageInput;
}

export interface MessageSequenceOptions {
  readonly defaultSenderAlias: string;
  readonly doNotForwardIfPossible?: boolean;
}

/**
 * Broadcast sequence of message promises. Whatever the producer sends is
 * appended to the sequence's conversation, one promise per resulting message,
 * in send order; nested sequences are spliced in where they were sent.
 */
export class AsyncMessageSequence extends AsyncStreamable<PendingMessage, MessagePromise> {
  readonly #conversation: ConversationTracker;
  readonly #options: MessageSequenceOptions;

  private constructor(conversation: ConversationTracker, options: MessageSequenceOptions) {
    super();
    this.#conversation = conversation;
    this.#options = options;
  }

  static create(
    conversation: ConversationTracker,
    options: MessageSequenceOptions
  ): [AsyncMessageSequence, MessageProducer] {
    const sequence = new AsyncMessageSequence(conversation, options);
    return [sequence, new MessageProducer(sequence.sink())];
  }

  get defaultSenderAlias(): string {
    return this.#options.defaultSenderAlias;
  }

  *materializeAll(): Operation<Message[]> {
    const promises = yield* this.materializeAsList();
    const messages: Message[] = [];
    for (const promise of promises) {
      messages.push(yield* promise.materialize());
    }
    return messages;
  }

  /** The last promise once the producer has closed, if there was any. */
  *findConcludingPromise(): Operation<MessagePromise | undefined> {
    const promises = yield* this.materializeAsList();
    return promises.at(-1);
  }

  *getConcludingPromise(): Operation<MessagePromise> {
    const concluding = yield* this.findConcludingPromise();
    if (!concluding) {
      throw new ValidationError("the message sequence is empty, there is no concluding message");
    }
    return concluding;
  }

  *materializeConcluding(): Operation<Message> {
    const concluding = yield* this.getConcludingPromise();
    return yield* concluding.materialize();
  }

  protected *convert(
    item: PendingMessage,
    emit: (converted: MessagePromise) => Operation<void>
  ): Operation<void> {
    const tip = this.#conversation.tip;
    let appended = false;
    try {
      yield* this.#conversation.appendEach(
        item.content,
        {
          defaultSenderAlias: this.#options.defaultSenderAlias,
          doNotForwardIfPossible: this.#options.doNotForwardIfPossible ?? true,
          overrideSenderAlias: item.senderAlias,
          metadata: item.metadata,
        },
        emit
      );
      appended = true;
    } finally {
      if (!appended) {
        // the item is converted again from the same place
        this.#conversation.rewindTo(tip);
      }
    }
  }
}

/**
 * Write side of an `AsyncMessageSequence`.
 */
export class MessageProducer {
  readonly #sink: StreamSink<PendingMessage>;

  constructor(sink: StreamSink<PendingMessage>) {
    this.#sink = sink;
  }

  get isClosed(): boolean {
    return this.#sink.isClosed;
  }

  send(content: MessageInput, options: SendOptions = {}): this {
    this.#sink.send({ ...options, content });
    return this;
  }

  close(): void {
    this.#sink.close();
  }
}
