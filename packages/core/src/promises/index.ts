export { AsyncStreamable, type StreamSink } from "./streamable.ts";
export {
  MessagePromise,
  ContentMessagePromise,
  AgentCallMsgPromise,
  type BranchPoint,
  type ContentMessagePromiseInit,
  type MessagePromiseOptions,
  type PromiseSource,
} from "./message-promise.ts";
export {
  AsyncMessageSequence,
  MessageProducer,
  type MessageSequenceOptions,
  type PendingMessage,
  type SendOptions,
} from "./sequence.ts";
export { StreamedMessage, type StreamedMessageOptions } from "./streamed-message.ts";
