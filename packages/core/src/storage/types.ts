import type { Operation } from "effection";
import type { Immutable } from "../models/immutable.ts";

/**
 * Content-addressable store for immutable values.
 *
 * The in-memory implementation covers a single process; other backends
 * implement the same two operations.
 */
export interface ImmutableStorage {
  /** Storing a value whose hash key is already present is a no-op. */
  store(value: Immutable): Operation<void>;
  /** Throws `NotFoundError` when nothing is stored under the key. */
  retrieve(hashKey: string): Operation<Immutable>;
}
