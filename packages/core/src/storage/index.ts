export type { ImmutableStorage } from "./types.ts";
export { createInMemoryStorage, type InMemoryStorage } from "./in-memory.ts";
export { createForumTrees, type ForumTrees } from "./trees.ts";
