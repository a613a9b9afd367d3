import type { Operation } from "effection";
import type { MessageInput } from "../conversation/content.ts";
import type { AppendOptions, ConversationTracker } from "../conversation/tracker.ts";
import { AgentCallMsg, ForwardedMessage, type Message } from "../models/message.ts";
import type { MessagePromise } from "../promises/message-promise.ts";
import { AsyncMessageSequence } from "../promises/sequence.ts";

export interface MessageSummary {
  kind: string;
  senderAlias: string;
  content?: string;
  original?: MessageSummary;
  messagesInRequest?: number;
  isError?: boolean;
}

/** Forwards are described by their original instead of their content. */
export function summarize(message: Message): MessageSummary {
  const summary: MessageSummary = { kind: message.imModel, senderAlias: message.senderAlias };
  if (message instanceof ForwardedMessage) {
    summary.original = summarize(message.getOriginal());
  } else {
    summary.content = message.content;
  }
  if (message.isError) {
    summary.isError = true;
  }
  return summary;
}

/**
 * The whole branch ending at `source`, call markers included, oldest first.
 */
export function* representConversation(source: MessagePromise | AsyncMessageSequence): Operation<MessageSummary[]> {
  const concluding = source instanceof AsyncMessageSequence ? yield* source.getConcludingPromise() : source;
  const history = yield* concluding.materializeHistory(false);
  return history.map((message, index) => {
    const summary = summarize(message);
    if (message instanceof AgentCallMsg) {
      const start = history.findIndex((candidate) => candidate.hashKey === message.msgSeqStartHashKey);
      summary.messagesInRequest = start === -1 ? 0 : index - start;
    }
    return summary;
  });
}

export function* appendAll(
  tracker: ConversationTracker,
  input: MessageInput,
  options: AppendOptions
): Operation<MessagePromise[]> {
  const promises: MessagePromise[] = [];
  yield* tracker.appendEach(input, options, function* (promise) {
    promises.push(promise);
  });
  return promises;
}

export function* contentsOf(sequence: AsyncMessageSequence): Operation<string[]> {
  const messages = yield* sequence.materializeAll();
  return messages.map((message) => message.content);
}

export function* captureError(op: () => Operation<unknown>): Operation<unknown> {
  try {
    yield* op();
  } catch (error) {
    return error;
  }
  return undefined;
}
