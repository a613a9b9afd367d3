import { ValidationError } from "../errors.ts";
import { Message } from "../models/message.ts";
import { MessagePromise } from "../promises/message-promise.ts";
import { AsyncMessageSequence } from "../promises/sequence.ts";
import { StreamedMessage } from "../promises/streamed-message.ts";

/** A mapping of message fields; anything beyond these is metadata. */
export interface MessageOverrides {
  readonly content: string;
  readonly senderAlias?: string;
  readonly [field: string]: unknown;
}

export type MessageSequenceInput =
  | readonly MessageInput[]
  | AsyncMessageSequence
  | AsyncIterable<MessageInput>;

/** Everything that can be sent into a conversation. */
export type MessageInput =
  | string
  | Error
  | Message
  | MessagePromise
  | StreamedMessage
  | MessageOverrides
  | MessageSequenceInput;

export type MessageContent =
  | { readonly type: "text"; readonly text: string }
  | { readonly type: "error"; readonly error: Error }
  | { readonly type: "message"; readonly message: Message }
  | { readonly type: "promise"; readonly promise: MessagePromise }
  | { readonly type: "stream"; readonly stream: StreamedMessage }
  | { readonly type: "fields"; readonly fields: MessageOverrides }
  | { readonly type: "sequence"; readonly items: MessageSequenceInput };

export function classifyContent(input: unknown): MessageContent {
  if (typeof input === "string") {
    return { type: "text", text: input };
  }
  if (input instanceof Error) {
    return { type: "error", error: input };
  }
  if (input instanceof Message) {
    return { type: "message", message: input };
  }
  if (input instanceof MessagePromise) {
    return { type: "promise", promise: input };
  }
  if (input instanceof StreamedMessage) {
    return { type: "stream", stream: input };
  }
  if (input instanceof AsyncMessageSequence || isInputList(input) || isAsyncIterable(input)) {
    return { type: "sequence", items: input };
  }
  if (isOverrides(input)) {
    return { type: "fields", fields: input };
  }
  throw new ValidationError(`Unexpected message content type: ${describe(input)}`);
}

export function isAsyncIterable(value: unknown): value is AsyncIterable<MessageInput> {
  return typeof value === "object" && value !== null && Symbol.asyncIterator in value;
}

export function assertNever(value: never): never {
  throw new ValidationError(`Unexpected message content: ${JSON.stringify(value)}`);
}

function isInputList(value: unknown): value is readonly MessageInput[] {
  return Array.isArray(value);
}

function isOverrides(value: unknown): value is MessageOverrides {
  return typeof value === "object" && value !== null && "content" in value && typeof value.content === "string";
}

function describe(value: unknown): string {
  if (typeof value === "object" && value !== null) {
    return value.constructor?.name ?? "Object";
  }
  return typeof value;
}
