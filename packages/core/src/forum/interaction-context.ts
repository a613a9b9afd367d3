import { createContext, scoped, type Operation } from "effection";
import { NoAskingAgentError, ValidationError } from "../errors.ts";
import { useLogger } from "../logger/index.ts";
import type { MessageInput } from "../conversation/content.ts";
import type { AsyncMessageSequence, MessageProducer, SendOptions } from "../promises/sequence.ts";
import type { Agent } from "./agent.ts";
import type { AgentCall, CallOutcome } from "./agent-call.ts";
import type { Forum } from "./forum.ts";

/**
 * The interaction context installed in the current task. Agent calls made
 * from a task without one belong to the forum's root context.
 */
export const CurrentInteractionContext = createContext<InteractionContext>("parley.interaction-context");

export interface InteractionContextInit {
  readonly forum: Forum;
  readonly agent: Agent;
  readonly requestMessages: AsyncMessageSequence;
  /** Present when the agent was asked rather than told. */
  readonly responseProducer?: MessageProducer;
  readonly parent?: InteractionContext;
}

/**
 * State of one agent invocation: what it was asked, where its responses go,
 * who called it and which calls it made itself.
 */
export class InteractionContext {
  readonly forum: Forum;
  readonly agent: Agent;
  readonly requestMessages: AsyncMessageSequence;
  readonly parent: InteractionContext | undefined;
  readonly #responseProducer: MessageProducer | undefined;
  readonly #childCalls: AgentCall[] = [];
  #active = false;

  constructor(init: InteractionContextInit) {
    this.forum = init.forum;
    this.agent = init.agent;
    this.requestMessages = init.requestMessages;
    this.parent = init.parent;
    this.#responseProducer = init.responseProducer;
  }

  get wasAsked(): boolean {
    return this.#responseProducer !== undefined;
  }

  /** Calls started from this context that have not been drained yet. */
  get childCalls(): readonly AgentCall[] {
    return [...this.#childCalls];
  }

  /**
   * Send content back to whoever asked. A context that was only told
   * responds on behalf of its nearest asked ancestor.
   */
  respond(content: MessageInput, options?: SendOptions): void {
    for (let context: InteractionContext | undefined = this; context; context = context.parent) {
      const producer = context.#responseProducer;
      if (producer) {
        producer.send(content, options);
        return;
      }
    }
    throw new NoAskingAgentError(this.agent.alias);
  }

  getAskedContext(): InteractionContext {
    for (let context: InteractionContext | undefined = this; context; context = context.parent) {
      if (context.wasAsked) {
        return context;
      }
    }
    throw new NoAskingAgentError(this.agent.alias);
  }

  registerChildCall(call: AgentCall): void {
    this.#childCalls.push(call);
  }

  /**
   * Run `body` with this context installed for the current task, then wait
   * for every call it started. Not reentrant.
   */
  *run<T>(body: () => Operation<T>): Operation<T> {
    if (this.#active) {
      throw new ValidationError(`the interaction context of ${this.agent.alias} is already active`);
    }
    this.#active = true;
    const context = this;
    try {
      return yield* scoped(function* () {
        yield* CurrentInteractionContext.set(context);
        let result: T;
        try {
          result = yield* body();
        } catch (error) {
          yield* context.join();
          throw error;
        }
        yield* context.join();
        return result;
      });
    } finally {
      this.#active = false;
    }
  }

  /**
   * Finish every child call's request, then wait for all of them. Failures
   * are collected, never re-thrown.
   */
  join(): Operation<CallOutcome[]> {
    return this.#joinCalls([...this.#childCalls]);
  }

  /** `join`, forgetting the joined calls so the next drain only sees newer ones. */
  drain(): Operation<CallOutcome[]> {
    return this.#joinCalls(this.#childCalls.splice(0));
  }

  *#joinCalls(calls: readonly AgentCall[]): Operation<CallOutcome[]> {
    const log = yield* useLogger("forum:context");
    for (const call of calls) {
      call.finish();
    }
    const outcomes: CallOutcome[] = [];
    for (const call of calls) {
      const outcome = yield* call.outcome();
      if (outcome.status === "failed") {
        log.debug({ agent: this.agent.alias, child: call.receivingAgent.alias }, "child call failed");
      }
      outcomes.push(outcome);
    }
    return outcomes;
  }
}

/**
 * The context installed in the current task, or the forum's root context.
 */
export function* useInteractionContext(forum: Forum): Operation<InteractionContext> {
  const current = yield* CurrentInteractionContext.get();
  return current && current.forum === forum ? current : forum.rootContext;
}
