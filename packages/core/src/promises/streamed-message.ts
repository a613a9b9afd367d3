import type { Operation } from "effection";
import { AsyncStreamable, type StreamSink } from "./streamable.ts";

export interface StreamedMessageOptions {
  /** Sender of the message unless the append names another one. */
  readonly senderAlias?: string;
  readonly metadata?: Readonly<Record<string, unknown>>;
}

/**
 * Message content that arrives in chunks, such as tokens from a language
 * model. Chunks are broadcast to every subscriber as they are sent; the
 * message itself exists once the producer closes the stream.
 *
 * ```typescript
 * const [reply, tokens] = StreamedMessage.create({ metadata: { model: "test-model" } });
 * ctx.respond(reply);
 * tokens.send("Hel");
 * tokens.send("lo");
 * tokens.close();
 * ```
 */
export class StreamedMessage extends AsyncStreamable<string, string> {
  private constructor(readonly options: StreamedMessageOptions) {
    super();
  }

  static create(options: StreamedMessageOptions = {}): [StreamedMessage, StreamSink<string>] {
    const message = new StreamedMessage(options);
    return [message, message.sink()];
  }

  get senderAlias(): string | undefined {
    return this.options.senderAlias;
  }

  get metadata(): Readonly<Record<string, unknown>> {
    return this.options.metadata ?? {};
  }

  /** The full content, once the stream is closed. */
  *materializeContent(): Operation<string> {
    const chunks = yield* this.materializeAsList();
    return chunks.join("");
  }

  protected *convert(chunk: string, emit: (converted: string) => Operation<void>): Operation<void> {
    yield* emit(chunk);
  }
}
