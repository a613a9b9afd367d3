import type { Operation } from "effection";
import type { LoggerFactory } from "./types.ts";
import { LoggerFactoryContext } from "./context.ts";
import { createPinoLoggerFactory, type PinoLoggerOptions } from "./pino-logger.ts";

/**
 * Install a pino logger factory in the current scope.
 *
 * @example
 * ```typescript
 * await run(function* () {
 *   yield* setupLogger({ level: "debug" });
 *   const forum = new Forum();
 *   // ...
 * });
 * ```
 */
export function* setupLogger(options?: PinoLoggerOptions): Operation<void> {
  yield* LoggerFactoryContext.set(createPinoLoggerFactory(options));
}

export function createLoggerSetup(factory: LoggerFactory) {
  return function* (): Operation<void> {
    yield* LoggerFactoryContext.set(factory);
  };
}
