export {
  Agent,
  type AgentArgs,
  type AgentFunction,
  type AgentOptions,
  type CallOptions,
  type RequestOptions,
} from "./agent.ts";
export { AgentCall, type AgentCallInit, type CallOutcome } from "./agent-call.ts";
export {
  CurrentInteractionContext,
  InteractionContext,
  useInteractionContext,
  type InteractionContextInit,
} from "./interaction-context.ts";
export { Forum, type ForumOptions } from "./forum.ts";
