export { canonicalJson, sha256Hex, type PlainValue } from "./canonical.ts";
export {
  Immutable,
  Freeform,
  type FieldSchema,
  type FreeformInput,
  type ImmutableValue,
  type Primitive,
} from "./immutable.ts";
export {
  Message,
  ForwardedMessage,
  AgentCallMsg,
  type MessageFields,
  type ForwardedMessageFields,
  type AgentCallMsgFields,
} from "./message.ts";
