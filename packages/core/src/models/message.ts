import type { Operation } from "effection";
import { z } from "zod";
import { ValidationError } from "../errors.ts";
import type { ForumTrees } from "../storage/trees.ts";
import { Freeform, type FieldSchema, type ImmutableValue } from "./immutable.ts";

const TRANSIENT_FIELDS: ReadonlySet<string> = new Set(["trees"]);
const ACCESSOR_FIELDS: ReadonlySet<string> = new Set(["isError"]);

const MessageSchema = z
  .object({
    imModel: z.literal("message"),
    content: z.string(),
    senderAlias: z.string(),
    prevMsgHashKey: z.string().optional(),
    isError: z.boolean().optional(),
  })
  .passthrough();

const ForwardedMessageSchema = MessageSchema.extend({
  imModel: z.literal("forward"),
  originalMsgHashKey: z.string(),
});

const AgentCallMsgSchema = MessageSchema.extend({
  imModel: z.literal("call"),
  senderAlias: z.literal(""),
  functionArgs: z.instanceof(Freeform),
  msgSeqStartHashKey: z.string().optional(),
});

const MESSAGE_FIELDS: ReadonlySet<string> = new Set(["imModel", "content", "senderAlias", "prevMsgHashKey"]);
const FORWARD_FIELDS: ReadonlySet<string> = new Set([...MESSAGE_FIELDS, "originalMsgHashKey"]);
const CALL_FIELDS: ReadonlySet<string> = new Set([...MESSAGE_FIELDS, "functionArgs", "msgSeqStartHashKey"]);

/** Fields of a message; anything beyond the named ones is metadata. */
export interface MessageFields {
  readonly content: string;
  readonly senderAlias: string;
  readonly prevMsgHashKey?: string;
  readonly [metadata: string]: unknown;
}

/**
 * A node of the message tree. Only the link to the predecessor is stored;
 * the tree is navigated backwards through the store the message belongs to.
 */
export class Message extends Freeform {
  declare readonly imModel: "message" | "forward" | "call";
  declare readonly trees: ForumTrees;
  declare readonly content: string;
  declare readonly senderAlias: string;
  declare readonly prevMsgHashKey: string | undefined;

  constructor(trees: ForumTrees, fields: MessageFields) {
    super({ imModel: "message", ...fields, trees });
  }

  /** Every field that is not part of the message structure itself. */
  get metadata(): Readonly<Record<string, ImmutableValue>> {
    const core = this.coreFieldNames();
    return Object.fromEntries(this.entries().filter(([field]) => !core.has(field)));
  }

  get isError(): boolean {
    return this.get("isError") === true;
  }

  /**
   * The predecessor, or `undefined` at the root of the tree. Call markers are
   * skipped by default: a marker is replaced with its own predecessor.
   */
  *previous(skipCallMarkers = true): Operation<Message | undefined> {
    if (this.prevMsgHashKey === undefined) {
      return undefined;
    }
    let previous: Message | undefined = yield* this.trees.retrieveMessage(this.prevMsgHashKey);
    while (skipCallMarkers && previous instanceof AgentCallMsg) {
      previous = yield* previous.previous(false);
    }
    return previous;
  }

  /**
   * The message whose content this one carries. A message that is not a
   * forward returns itself, or `undefined` when `returnSelfIfNone` is false.
   */
  getOriginal(): Message;
  getOriginal(returnSelfIfNone: boolean): Message | undefined;
  getOriginal(returnSelfIfNone = true): Message | undefined {
    return returnSelfIfNone ? this : undefined;
  }

  /** The same message attached to another store. */
  withTrees(trees: ForumTrees): Message {
    return new Message(trees, {
      ...this.metadata,
      content: this.content,
      senderAlias: this.senderAlias,
      prevMsgHashKey: this.prevMsgHashKey,
    });
  }

  protected override fieldSchema(): FieldSchema {
    return MessageSchema;
  }

  protected override excludeFromHash(): ReadonlySet<string> {
    return TRANSIENT_FIELDS;
  }

  protected override fieldAccessors(): ReadonlySet<string> {
    return ACCESSOR_FIELDS;
  }

  protected coreFieldNames(): ReadonlySet<string> {
    return MESSAGE_FIELDS;
  }
}

export interface ForwardedMessageFields extends MessageFields {
  readonly originalMsgHashKey: string;
}

const originals = new WeakMap<ForwardedMessage, Message>();

/**
 * A verbatim copy of another message's content placed at a different point
 * of the tree. The original is attached out-of-band by whoever resolves the
 * forward and is checked against `originalMsgHashKey` on every access.
 */
export class ForwardedMessage extends Message {
  declare readonly imModel: "forward";
  declare readonly originalMsgHashKey: string;

  constructor(trees: ForumTrees, fields: ForwardedMessageFields) {
    super(trees, { ...fields, imModel: "forward" });
  }

  attachOriginal(original: Message): void {
    originals.set(this, original);
  }

  override getOriginal(): Message;
  override getOriginal(returnSelfIfNone: boolean): Message | undefined;
  override getOriginal(): Message | undefined {
    const original = originals.get(this);
    if (!original) {
      throw new ValidationError(
        `original message ${this.originalMsgHashKey} was never attached to forward ${this.hashKey}`,
        this.modelName,
        "originalMsgHashKey"
      );
    }
    if (original.hashKey !== this.originalMsgHashKey) {
      throw new ValidationError(
        `attached original ${original.hashKey} does not match ${this.originalMsgHashKey}`,
        this.modelName,
        "originalMsgHashKey"
      );
    }
    return original;
  }

  override withTrees(trees: ForumTrees): ForwardedMessage {
    const copy = new ForwardedMessage(trees, {
      ...this.metadata,
      content: this.content,
      senderAlias: this.senderAlias,
      prevMsgHashKey: this.prevMsgHashKey,
      originalMsgHashKey: this.originalMsgHashKey,
    });
    const original = originals.get(this);
    if (original) {
      copy.attachOriginal(original);
    }
    return copy;
  }

  protected override fieldSchema(): FieldSchema {
    return ForwardedMessageSchema;
  }

  protected override coreFieldNames(): ReadonlySet<string> {
    return FORWARD_FIELDS;
  }
}

export interface AgentCallMsgFields {
  readonly receiverAlias: string;
  readonly functionArgs?: Freeform | Readonly<Record<string, unknown>>;
  readonly prevMsgHashKey?: string;
  readonly msgSeqStartHashKey?: string;
  readonly [metadata: string]: unknown;
}

/**
 * Marks the point where an agent was called. The request messages precede
 * it; `msgSeqStartHashKey` points at the first of them.
 */
export class AgentCallMsg extends Message {
  declare readonly imModel: "call";
  declare readonly functionArgs: Freeform;
  declare readonly msgSeqStartHashKey: string | undefined;

  constructor(trees: ForumTrees, fields: AgentCallMsgFields) {
    const { receiverAlias, functionArgs, ...rest } = fields;
    super(trees, {
      ...rest,
      imModel: "call",
      content: receiverAlias,
      senderAlias: "",
      functionArgs: functionArgs ?? {},
    });
  }

  get receiverAlias(): string {
    return this.content;
  }

  override withTrees(trees: ForumTrees): AgentCallMsg {
    return new AgentCallMsg(trees, {
      ...this.metadata,
      receiverAlias: this.receiverAlias,
      functionArgs: this.functionArgs,
      prevMsgHashKey: this.prevMsgHashKey,
      msgSeqStartHashKey: this.msgSeqStartHashKey,
    });
  }

  protected override fieldSchema(): FieldSchema {
    return AgentCallMsgSchema;
  }

  protected override coreFieldNames(): ReadonlySet<string> {
    return CALL_FIELDS;
  }
}
