import pino from "pino";
import { env } from "../env.ts";
import type { Logger, LoggerFactory } from "./types.ts";

const ROOT_NAME = "parley";

export interface PinoLoggerOptions {
  /** Defaults to `LOG_LEVEL`. */
  level?: string;
  /** Pretty printing through pino-pretty; defaults to on outside production. */
  pretty?: boolean;
}

/**
 * @example
 * ```typescript
 * const factory = createPinoLoggerFactory({ level: "debug" });
 * factory("forum:agent").debug({ agent: "ASSISTANT" }, "agent task started");
 * ```
 */
export function createPinoLoggerFactory(options: PinoLoggerOptions = {}): LoggerFactory {
  const { level = env.LOG_LEVEL, pretty = env.NODE_ENV !== "production" } = options;

  const rootLogger = pretty
    ? pino({
        name: ROOT_NAME,
        level,
        transport: { target: "pino-pretty", options: { colorize: true } },
      })
    : pino({ name: ROOT_NAME, level });

  return (name: string): Logger => {
    return rootLogger.child({ module: name }) as Logger;
  };
}
