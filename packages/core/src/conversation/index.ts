export {
  classifyContent,
  type MessageContent,
  type MessageInput,
  type MessageOverrides,
  type MessageSequenceInput,
} from "./content.ts";
export { defaultErrorFormatter, type ErrorFormatter, type FormattedError } from "./error-formatter.ts";
export {
  ConversationTracker,
  ROOT_TIP,
  UNDETERMINED_TIP,
  tipFrom,
  type AppendOptions,
  type ConversationTip,
} from "./tracker.ts";
