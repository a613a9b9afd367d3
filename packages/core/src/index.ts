export * from "./errors.ts";
export { ForumConfigSchema, resolveForumConfig, type ForumConfig } from "./config.ts";
export * from "./logger/index.ts";
export * from "./models/index.ts";
export * from "./storage/index.ts";
export * from "./promises/index.ts";
export * from "./conversation/index.ts";
export * from "./forum/index.ts";
