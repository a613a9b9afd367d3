import { ensure, spawn, type Operation } from "effection";
import { AgentFailure, ValidationError, toError } from "../errors.ts";
import { useLogger } from "../logger/index.ts";
import type { MessageInput } from "../conversation/content.ts";
import { ConversationTracker, ROOT_TIP, UNDETERMINED_TIP, tipFrom } from "../conversation/tracker.ts";
import { Freeform, type FreeformInput } from "../models/immutable.ts";
import type { MessagePromise } from "../promises/message-promise.ts";
import type { AsyncMessageSequence } from "../promises/sequence.ts";
import { AgentCall, type CallOutcome } from "./agent-call.ts";
import { InteractionContext, useInteractionContext } from "./interaction-context.ts";
import type { Forum } from "./forum.ts";

export type AgentArgs = Readonly<Record<string, FreeformInput>>;

/**
 * An agent body. It reads `ctx.requestMessages`, may call other agents and
 * sends its output through `ctx.respond`.
 */
export type AgentFunction = (ctx: InteractionContext, args: AgentArgs) => Operation<void>;

export interface AgentOptions {
  /** Defaults to the function's name. */
  readonly alias?: string;
  /** Defaults to a `description` string carried on the function itself. */
  readonly description?: string;
  /** Upper-case an alias derived from the function name. */
  readonly uppercaseAlias?: boolean;
  readonly normalizeDescription?: boolean;
}

export interface CallOptions {
  /** Start a new branch after this message or sequence. */
  readonly branchFrom?: MessagePromise | AsyncMessageSequence;
  /** Continue this conversation; the call becomes its new tip. */
  readonly conversation?: ConversationTracker;
  /** Never reuse existing messages: everything sent is forwarded into a fresh tree. */
  readonly forceNewConversation?: boolean;
  readonly args?: AgentArgs;
}

export interface RequestOptions extends CallOptions {
  /** Sender of the request messages instead of the caller's alias. */
  readonly overrideSenderAlias?: string;
}

const ALIAS_PLACEHOLDER = "{AGENT_ALIAS}";

export class Agent {
  readonly alias: string;
  readonly description: string | undefined;

  constructor(
    readonly forum: Forum,
    readonly fn: AgentFunction,
    options: AgentOptions = {}
  ) {
    this.alias = options.alias ?? deriveAlias(fn, options.uppercaseAlias ?? forum.config.uppercaseAgentAliases);
    const description = options.description ?? carriedDescription(fn);
    this.description = description
      ? describe(description, this.alias, options.normalizeDescription ?? forum.config.normalizeDescriptions)
      : undefined;
  }

  /**
   * Ask the agent and get the sequence its responses will arrive in. The
   * agent starts running right away.
   */
  *ask(content?: MessageInput, options: RequestOptions = {}): Operation<AsyncMessageSequence> {
    const call = yield* this.startAsking(options);
    if (content !== undefined) {
      call.sendRequest(content, { senderAlias: options.overrideSenderAlias });
    }
    return call.responseSequence();
  }

  /** Start the agent without waiting for anything back. */
  *tell(content?: MessageInput, options: RequestOptions = {}): Operation<void> {
    const call = yield* this.startTelling(options);
    if (content !== undefined) {
      call.sendRequest(content, { senderAlias: options.overrideSenderAlias });
    }
    call.finish();
  }

  /** Start an asking call whose request is sent piece by piece. */
  startAsking(options: CallOptions = {}): Operation<AgentCall> {
    return this.#startCall(true, options);
  }

  startTelling(options: CallOptions = {}): Operation<AgentCall> {
    return this.#startCall(false, options);
  }

  *#startCall(isAsking: boolean, options: CallOptions): Operation<AgentCall> {
    const { branchFrom, conversation, forceNewConversation = false, args = {} } = options;
    if (branchFrom && conversation) {
      throw new ValidationError("cannot start a call with both branchFrom and conversation");
    }
    const tracker =
      conversation ??
      new ConversationTracker(
        this.forum,
        branchFrom ? tipFrom(branchFrom) : forceNewConversation ? ROOT_TIP : UNDETERMINED_TIP
      );
    if (forceNewConversation && tracker.hasPriorHistory) {
      throw new ValidationError("cannot force a new conversation on a conversation that already has history");
    }

    const parentContext = yield* useInteractionContext(this.forum);
    const call = new AgentCall({
      receivingAgent: this,
      parentContext,
      conversation: tracker,
      functionArgs: new Freeform(args),
      isAsking,
      doNotForwardIfPossible: !forceNewConversation,
    });
    parentContext.registerChildCall(call);
    // a task halted before it starts never reaches its own cleanup
    yield* ensure(() => {
      call.responseProducer?.close();
      call.reportOutcome({ status: "halted" });
    });

    yield* spawn(() => runAgentTask(this, call, args));
    return call;
  }
}

function* runAgentTask(agent: Agent, call: AgentCall, args: AgentArgs): Operation<void> {
  let outcome: CallOutcome = { status: "halted" };
  try {
    const log = yield* useLogger("forum:agent");
    const context = new InteractionContext({
      forum: agent.forum,
      agent,
      requestMessages: call.requestMessages,
      responseProducer: call.responseProducer,
      parent: call.parentContext,
    });
    log.debug({ agent: agent.alias, caller: call.parentContext.agent.alias, asked: call.isAsking }, "agent task started");

    outcome = yield* context.run(function* (): Operation<CallOutcome> {
      try {
        yield* agent.fn(context, args);
        return { status: "complete" };
      } catch (error) {
        const failure = new AgentFailure(agent.alias, toError(error));
        log.debug({ agent: agent.alias, error: failure.cause.message }, "agent raised an error, responding with it");
        try {
          context.respond(failure.cause);
        } catch (respondError) {
          log.error(
            { agent: agent.alias, error: failure.cause.message, reason: toError(respondError).message },
            "agent failed and the error could not be delivered"
          );
        }
        return { status: "failed", error: failure };
      }
    });
    log.debug({ agent: agent.alias, status: outcome.status }, "agent task ended");
  } finally {
    call.responseProducer?.close();
    call.reportOutcome(outcome);
  }
}

function deriveAlias(fn: AgentFunction, uppercase: boolean): string {
  const name = fn.name.trim();
  if (!name) {
    throw new ValidationError("an agent function without a name needs an explicit alias");
  }
  return uppercase ? name.toUpperCase() : name;
}

function carriedDescription(fn: AgentFunction): string | undefined {
  return "description" in fn && typeof fn.description === "string" ? fn.description : undefined;
}

function describe(description: string, alias: string, normalize: boolean): string {
  const text = normalize ? description.split(/\s+/).filter(Boolean).join(" ") : description;
  return text.replaceAll(ALIAS_PLACEHOLDER, alias);
}
