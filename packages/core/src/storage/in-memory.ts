import type { Operation } from "effection";
import { NotFoundError } from "../errors.ts";
import type { Immutable } from "../models/immutable.ts";
import type { ImmutableStorage } from "./types.ts";

export interface InMemoryStorage extends ImmutableStorage {
  readonly size: number;
  has(hashKey: string): boolean;
}

/**
 * Map-backed `ImmutableStorage`.
 */
export function createInMemoryStorage(): InMemoryStorage {
  const values = new Map<string, Immutable>();

  return {
    get size() {
      return values.size;
    },

    has(hashKey: string): boolean {
      return values.has(hashKey);
    },

    *store(value: Immutable): Operation<void> {
      if (!values.has(value.hashKey)) {
        values.set(value.hashKey, value);
      }
    },

    *retrieve(hashKey: string): Operation<Immutable> {
      const value = values.get(hashKey);
      if (!value) {
        throw new NotFoundError(hashKey);
      }
      return value;
    },
  };
}
