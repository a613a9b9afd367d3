import type { Operation } from "effection";
import { resolveForumConfig, type ForumConfig } from "../config.ts";
import { ValidationError } from "../errors.ts";
import { defaultErrorFormatter, type ErrorFormatter } from "../conversation/error-formatter.ts";
import { ConversationTracker, UNDETERMINED_TIP, ROOT_TIP, tipFrom } from "../conversation/tracker.ts";
import type { Immutable } from "../models/immutable.ts";
import type { MessagePromise } from "../promises/message-promise.ts";
import { AsyncMessageSequence } from "../promises/sequence.ts";
import { createForumTrees, type ForumTrees } from "../storage/trees.ts";
import type { ImmutableStorage } from "../storage/types.ts";
import { Agent, type AgentFunction, type AgentOptions } from "./agent.ts";
import type { CallOutcome } from "./agent-call.ts";
import { InteractionContext } from "./interaction-context.ts";

export interface ForumOptions {
  /** Defaults to an in-memory store. */
  readonly storage?: ImmutableStorage;
  readonly errorFormatter?: ErrorFormatter;
  readonly config?: Partial<ForumConfig>;
}

/**
 * Registry of agents sharing one message store, plus the root interaction
 * context that calls made outside of any agent belong to.
 *
 * @example
 * ```typescript
 * const forum = new Forum();
 * const echo = forum.agent(function* echo(ctx) {
 *   ctx.respond(ctx.requestMessages);
 * });
 *
 * await run(function* () {
 *   const responses = yield* echo.ask("hello");
 *   const reply = yield* responses.materializeConcluding();
 * });
 * ```
 */
export class Forum {
  readonly trees: ForumTrees;
  readonly errorFormatter: ErrorFormatter;
  readonly config: ForumConfig;
  readonly #agents = new Map<string, Agent>();
  readonly #conversations = new Map<string, ConversationTracker>();
  #rootContext: InteractionContext | undefined;

  constructor(options: ForumOptions = {}) {
    this.config = resolveForumConfig(options.config);
    this.trees = createForumTrees(options.storage);
    this.errorFormatter = options.errorFormatter ?? defaultErrorFormatter;
  }

  /** Register an agent function. */
  agent(fn: AgentFunction, options?: AgentOptions): Agent {
    const agent = new Agent(this, fn, options);
    if (agent.alias === this.config.userAlias || this.#agents.has(agent.alias)) {
      throw new ValidationError(`an agent called ${agent.alias} is already registered`);
    }
    this.#agents.set(agent.alias, agent);
    return agent;
  }

  getAgent(alias: string): Agent | undefined {
    return this.#agents.get(alias);
  }

  get agents(): readonly Agent[] {
    return [...this.#agents.values()];
  }

  /**
   * The conversation identified by `descriptor`. The first request for a
   * descriptor creates it, optionally branching from an existing message.
   */
  getConversation(
    descriptor: Immutable,
    branchFromIfNew?: MessagePromise | AsyncMessageSequence
  ): ConversationTracker {
    const existing = this.#conversations.get(descriptor.hashKey);
    if (existing) {
      return existing;
    }
    const conversation = new ConversationTracker(this, branchFromIfNew ? tipFrom(branchFromIfNew) : UNDETERMINED_TIP);
    this.#conversations.set(descriptor.hashKey, conversation);
    return conversation;
  }

  /** Context of the external initiator, created on first use. */
  get rootContext(): InteractionContext {
    if (!this.#rootContext) {
      const user = new Agent(this, function* () {}, { alias: this.config.userAlias });
      const [requestMessages, producer] = AsyncMessageSequence.create(new ConversationTracker(this, ROOT_TIP), {
        defaultSenderAlias: user.alias,
      });
      producer.close();
      this.#rootContext = new InteractionContext({ forum: this, agent: user, requestMessages });
    }
    return this.#rootContext;
  }

  /**
   * Finish and wait for every call started outside of an agent since the
   * previous settle.
   */
  settle(): Operation<CallOutcome[]> {
    return this.rootContext.drain();
  }
}
