import { withResolvers, type Operation, type Stream, type Subscription } from "effection";
import { toError } from "../errors.ts";
import type { MessageContent } from "../conversation/content.ts";
import type { ConversationTracker } from "../conversation/tracker.ts";
import type { Freeform } from "../models/immutable.ts";
import { AgentCallMsg, ForwardedMessage, Message } from "../models/message.ts";
import type { ForumTrees } from "../storage/trees.ts";
import type { AsyncMessageSequence } from "./sequence.ts";

/**
 * Where a new message attaches: nowhere yet (the first message decides),
 * explicitly at a new root, or after another message.
 */
export type BranchPoint =
  | { readonly kind: "undetermined" }
  | { readonly kind: "root" }
  | { readonly kind: "message"; readonly promise: MessagePromise };

export interface MessagePromiseOptions {
  readonly isError?: boolean;
  readonly error?: Error;
}

/**
 * Handle to a message that may not be known yet. Materialization happens at
 * most once; concurrent callers share it.
 */
export abstract class MessagePromise {
  readonly isError: boolean;
  /** The condition an error message was produced from. */
  readonly error: Error | undefined;
  #message: Message | undefined;
  #pending: Operation<Message | undefined> | undefined;

  protected constructor(
    protected readonly trees: ForumTrees,
    options: MessagePromiseOptions = {}
  ) {
    this.isError = options.isError ?? false;
    this.error = options.error;
  }

  static resolved(message: Message): MessagePromise {
    return new ResolvedMessagePromise(message);
  }

  get isMaterialized(): boolean {
    return this.#message !== undefined;
  }

  *materialize(): Operation<Message> {
    while (this.#pending) {
      const shared = yield* this.#pending;
      if (shared) {
        return shared;
      }
    }
    if (this.#message) {
      return this.#message;
    }

    // a halted builder hands waiters `undefined` and they build the message themselves
    const { operation, resolve, reject } = withResolvers<Message | undefined>();
    this.#pending = operation;
    let settled = false;
    try {
      const message = yield* this.build();
      yield* this.trees.storeMessage(message);
      this.#message = message;
      settled = true;
      resolve(message);
      return message;
    } catch (error) {
      settled = true;
      reject(toError(error));
      throw error;
    } finally {
      this.#pending = undefined;
      if (!settled) {
        resolve(undefined);
      }
    }
  }

  /**
   * The content as it arrives. Only streamed content comes in more than one
   * chunk; anything else is delivered whole once it materializes.
   */
  chunks(): Stream<string, void> {
    const promise = this;
    return {
      *[Symbol.iterator]() {
        let delivered = false;
        const subscription: Subscription<string, void> = {
          *next(): Operation<IteratorResult<string, void>> {
            if (delivered) {
              return { done: true, value: undefined };
            }
            const message = yield* promise.materialize();
            delivered = true;
            return { done: false, value: message.content };
          },
        };
        return subscription;
      },
    };
  }

  *hashKey(): Operation<string> {
    const message = yield* this.materialize();
    return message.hashKey;
  }

  *previous(skipCallMarkers = true): Operation<MessagePromise | undefined> {
    const previous = yield* this.materializePrevious(skipCallMarkers);
    return previous ? MessagePromise.resolved(previous) : undefined;
  }

  *materializePrevious(skipCallMarkers = true): Operation<Message | undefined> {
    const message = yield* this.materialize();
    return yield* message.previous(skipCallMarkers);
  }

  /**
   * The chain from the root of the tree up to and including this message,
   * oldest first.
   */
  *materializeHistory(skipCallMarkers = true): Operation<Message[]> {
    let message: Message | undefined = yield* this.materialize();
    const history: Message[] = [];
    while (message) {
      history.push(message);
      message = yield* message.previous(skipCallMarkers);
    }
    return history.reverse();
  }

  protected abstract build(): Operation<Message>;
}

/** The content shapes a single promise can be built from. */
export type PromiseSource = Extract<
  MessageContent,
  { readonly type: "text" | "message" | "promise" | "fields" | "stream" }
>;

export interface ContentMessagePromiseInit extends MessagePromiseOptions {
  readonly source: PromiseSource;
  readonly branchFrom: BranchPoint;
  readonly defaultSenderAlias: string;
  readonly overrideSenderAlias?: string;
  /**
   * Reuse an existing message as-is when it already sits at the branch
   * point (or when the branch is undetermined) instead of forwarding it.
   */
  readonly doNotForwardIfPossible?: boolean;
  readonly metadata?: Readonly<Record<string, unknown>>;
}

/**
 * A promise created by a conversation tracker for one piece of content.
 */
export class ContentMessagePromise extends MessagePromise {
  readonly #init: ContentMessagePromiseInit;

  constructor(trees: ForumTrees, init: ContentMessagePromiseInit) {
    super(trees, init);
    this.#init = init;
  }

  chunks(): Stream<string, void> {
    const { source } = this.#init;
    switch (source.type) {
      case "stream":
        return source.stream;
      case "promise":
        return source.promise.chunks();
      default:
        return super.chunks();
    }
  }

  protected *build(): Operation<Message> {
    const { source, branchFrom, defaultSenderAlias, overrideSenderAlias, doNotForwardIfPossible = false } = this.#init;
    const prevMsgHashKey = yield* branchHashKey(branchFrom);
    const metadata = this.isError ? { ...this.#init.metadata, isError: true } : { ...this.#init.metadata };

    switch (source.type) {
      case "text":
        return new Message(this.trees, {
          ...metadata,
          content: source.text,
          senderAlias: overrideSenderAlias ?? defaultSenderAlias,
          prevMsgHashKey,
        });

      case "fields": {
        const { senderAlias, ...fields } = source.fields;
        return new Message(this.trees, {
          ...metadata,
          ...fields,
          senderAlias: overrideSenderAlias ?? senderAlias ?? defaultSenderAlias,
          prevMsgHashKey,
        });
      }

      case "stream": {
        const content = yield* source.stream.materializeContent();
        return new Message(this.trees, {
          ...source.stream.metadata,
          ...metadata,
          content,
          senderAlias: overrideSenderAlias ?? source.stream.senderAlias ?? defaultSenderAlias,
          prevMsgHashKey,
        });
      }

      case "message":
      case "promise": {
        const original = source.type === "message" ? source.message : yield* source.promise.materialize();
        if (source.type === "message") {
          yield* this.trees.storeMessage(original);
        }
        const alreadyInPlace = branchFrom.kind === "undetermined" || original.prevMsgHashKey === prevMsgHashKey;
        if (doNotForwardIfPossible && alreadyInPlace) {
          return original;
        }
        const forward = new ForwardedMessage(this.trees, {
          ...metadata,
          content: original.content,
          senderAlias: overrideSenderAlias ?? defaultSenderAlias,
          prevMsgHashKey,
          originalMsgHashKey: original.hashKey,
        });
        forward.attachOriginal(original);
        return forward;
      }
    }
  }
}

/**
 * The call marker of an agent call. It can only be built once the request
 * sequence is closed: it links to the last request message and records the
 * first one.
 */
export class AgentCallMsgPromise extends MessagePromise {
  constructor(
    trees: ForumTrees,
    readonly requestMessages: AsyncMessageSequence,
    readonly requestConversation: ConversationTracker,
    readonly receiverAlias: string,
    readonly functionArgs: Freeform
  ) {
    super(trees);
  }

  protected *build(): Operation<Message> {
    const requests = yield* this.requestMessages.materializeAll();
    const lastRequest = yield* this.requestConversation.resolveTip();
    return new AgentCallMsg(this.trees, {
      receiverAlias: this.receiverAlias,
      functionArgs: this.functionArgs,
      prevMsgHashKey: yield* branchHashKey(lastRequest),
      msgSeqStartHashKey: requests.at(0)?.hashKey,
    });
  }
}

class ResolvedMessagePromise extends MessagePromise {
  constructor(readonly message: Message) {
    super(message.trees, { isError: message.isError });
  }

  protected *build(): Operation<Message> {
    return this.message;
  }
}

function* branchHashKey(branch: BranchPoint): Operation<string | undefined> {
  if (branch.kind !== "message") {
    return undefined;
  }
  const message = yield* branch.promise.materialize();
  return message.hashKey;
}
