import { z } from "zod";
import { env } from "./env.ts";
import { ValidationError } from "./errors.ts";

export const ForumConfigSchema = z.object({
  /** Alias of the external initiator that owns the root interaction context. */
  userAlias: z.string().min(1),
  /** Upper-case aliases derived from agent function names. */
  uppercaseAgentAliases: z.boolean(),
  /** Collapse whitespace runs in agent descriptions. */
  normalizeDescriptions: z.boolean(),
});

export type ForumConfig = z.infer<typeof ForumConfigSchema>;

/**
 * Resolve forum configuration: explicit options win over environment
 * defaults.
 */
export function resolveForumConfig(options: Partial<ForumConfig> = {}): ForumConfig {
  const result = ForumConfigSchema.safeParse({
    userAlias: options.userAlias ?? env.PARLEY_USER_ALIAS,
    uppercaseAgentAliases: options.uppercaseAgentAliases ?? true,
    normalizeDescriptions: options.normalizeDescriptions ?? true,
  });
  if (!result.success) {
    throw ValidationError.fromZodError("ForumConfig", result.error);
  }
  return result.data;
}
