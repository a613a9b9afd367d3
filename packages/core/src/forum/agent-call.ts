import { withResolvers, type Operation } from "effection";
import { NoAskingAgentError, type AgentFailure } from "../errors.ts";
import type { MessageInput } from "../conversation/content.ts";
import type { ConversationTracker } from "../conversation/tracker.ts";
import type { Freeform } from "../models/immutable.ts";
import { AgentCallMsgPromise } from "../promises/message-promise.ts";
import { AsyncMessageSequence, type MessageProducer, type SendOptions } from "../promises/sequence.ts";
import type { Agent } from "./agent.ts";
import type { InteractionContext } from "./interaction-context.ts";

export type CallOutcome =
  | { readonly status: "complete" }
  | { readonly status: "failed"; readonly error: AgentFailure }
  | { readonly status: "halted" };

export interface AgentCallInit {
  readonly receivingAgent: Agent;
  readonly parentContext: InteractionContext;
  /** The caller's conversation; the call marker becomes its new tip. */
  readonly conversation: ConversationTracker;
  readonly functionArgs: Freeform;
  readonly isAsking: boolean;
  readonly doNotForwardIfPossible: boolean;
}

/**
 * One invocation of an agent, seen from the caller's side.
 *
 * The request branches off the conversation tip as it was when the call
 * started. The call marker is chained after the request and becomes the
 * conversation tip; responses, when asking, follow the marker.
 */
export class AgentCall {
  readonly receivingAgent: Agent;
  readonly parentContext: InteractionContext;
  readonly conversation: ConversationTracker;
  readonly functionArgs: Freeform;
  readonly requestMessages: AsyncMessageSequence;
  readonly callMessage: AgentCallMsgPromise;
  readonly responseProducer: MessageProducer | undefined;
  readonly #requestProducer: MessageProducer;
  readonly #responseMessages: AsyncMessageSequence | undefined;
  readonly #outcome = withResolvers<CallOutcome>();
  #reported = false;

  constructor(init: AgentCallInit) {
    this.receivingAgent = init.receivingAgent;
    this.parentContext = init.parentContext;
    this.conversation = init.conversation;
    this.functionArgs = init.functionArgs;

    const requestConversation = init.conversation.branch();
    const [requestMessages, requestProducer] = AsyncMessageSequence.create(requestConversation, {
      defaultSenderAlias: init.parentContext.agent.alias,
      doNotForwardIfPossible: init.doNotForwardIfPossible,
    });
    this.requestMessages = requestMessages;
    this.#requestProducer = requestProducer;

    this.callMessage = new AgentCallMsgPromise(
      init.parentContext.forum.trees,
      requestMessages,
      requestConversation,
      init.receivingAgent.alias,
      init.functionArgs
    );
    init.conversation.advanceTo(this.callMessage);

    if (init.isAsking) {
      const [responseMessages, responseProducer] = AsyncMessageSequence.create(init.conversation, {
        defaultSenderAlias: init.receivingAgent.alias,
      });
      this.#responseMessages = responseMessages;
      this.responseProducer = responseProducer;
    } else {
      this.#responseMessages = undefined;
      this.responseProducer = undefined;
    }
  }

  get isAsking(): boolean {
    return this.#responseMessages !== undefined;
  }

  sendRequest(content: MessageInput, options?: SendOptions): this {
    this.#requestProducer.send(content, options);
    return this;
  }

  /** Close the request. Idempotent. */
  finish(): this {
    this.#requestProducer.close();
    return this;
  }

  /**
   * Finishes the request and returns the sequence the agent responds into.
   * A told call has none.
   */
  responseSequence(): AsyncMessageSequence {
    if (!this.#responseMessages) {
      throw new NoAskingAgentError(this.receivingAgent.alias);
    }
    this.finish();
    return this.#responseMessages;
  }

  /** Waits for the agent task to end. */
  *outcome(): Operation<CallOutcome> {
    return yield* this.#outcome.operation;
  }

  reportOutcome(outcome: CallOutcome): void {
    if (!this.#reported) {
      this.#reported = true;
      this.#outcome.resolve(outcome);
    }
  }
}
