import { createContext, type Operation } from "effection";
import type { Logger, LoggerFactory } from "./types.ts";
import { createNoopLogger } from "./noop-logger.ts";

export const LoggerFactoryContext = createContext<LoggerFactory>("parley.logger-factory");

/**
 * Get a logger for the given namespace, or a no-op logger when no factory
 * has been set up in the current scope.
 *
 * @example
 * ```typescript
 * const log = yield* useLogger("forum:agent");
 * log.debug({ agent: "ASSISTANT" }, "agent task started");
 * ```
 */
export function* useLogger(name: string): Operation<Logger> {
  const factory = yield* LoggerFactoryContext.get();
  if (!factory) {
    return createNoopLogger();
  }
  return factory(name);
}
