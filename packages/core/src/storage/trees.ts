import type { Operation } from "effection";
import { ValidationError } from "../errors.ts";
import { ForwardedMessage, Message } from "../models/message.ts";
import { createInMemoryStorage } from "./in-memory.ts";
import type { ImmutableStorage } from "./types.ts";

/**
 * Message-level view over an `ImmutableStorage`: the arena every message
 * tree of a forum lives in.
 */
export interface ForumTrees {
  readonly storage: ImmutableStorage;
  storeMessage(message: Message): Operation<void>;
  /**
   * Throws `NotFoundError` for a miss and `ValidationError` when the value
   * is not a message. Forwarded messages come back with their original
   * attached.
   */
  retrieveMessage(hashKey: string): Operation<Message>;
}

export function createForumTrees(storage: ImmutableStorage = createInMemoryStorage()): ForumTrees {
  const trees: ForumTrees = {
    storage,

    *storeMessage(message: Message): Operation<void> {
      yield* storage.store(message);
    },

    *retrieveMessage(hashKey: string): Operation<Message> {
      const value = yield* storage.retrieve(hashKey);
      if (!(value instanceof Message)) {
        throw new ValidationError(`${hashKey} refers to a ${value.modelName}, not a message`, value.modelName);
      }
      if (value instanceof ForwardedMessage) {
        value.attachOriginal(yield* trees.retrieveMessage(value.originalMsgHashKey));
      }
      return value;
    },
  };
  return trees;
}
