import { describe, expect, it } from "../../__tests__/vitest-effection.ts";
import { Forum } from "../../forum/forum.ts";
import { createLoggerSetup } from "../setup.ts";
import { useLogger } from "../context.ts";
import type { Logger, LoggerFactory } from "../types.ts";

interface LogLine {
  readonly logger: string;
  readonly level: string;
  readonly msg: string | undefined;
  readonly fields: object | undefined;
}

function createRecordingFactory(lines: LogLine[]): LoggerFactory {
  return (name: string): Logger => {
    const record =
      (level: string) =>
      (first: string | object, msg?: string): void => {
        lines.push(
          typeof first === "string"
            ? { logger: name, level, msg: first, fields: undefined }
            : { logger: name, level, msg, fields: first }
        );
      };
    const logger: Logger = {
      trace: record("trace"),
      debug: record("debug"),
      info: record("info"),
      warn: record("warn"),
      error: record("error"),
      child: () => logger,
    };
    return logger;
  };
}

describe("logger", () => {
  it("falls back to a no-op logger", function* () {
    const log = yield* useLogger("forum:agent");

    expect(() => log.info({ agent: "ANY" }, "ignored")).not.toThrow();
    expect(log.child({ extra: true })).toBe(log);
  });

  it("uses the factory set up in the current scope", function* () {
    const lines: LogLine[] = [];
    yield* createLoggerSetup(createRecordingFactory(lines))();

    const log = yield* useLogger("forum:test");
    log.info("hello");

    expect(lines).toEqual([{ logger: "forum:test", level: "info", msg: "hello", fields: undefined }]);
  });

  it("records agent failures", function* () {
    const lines: LogLine[] = [];
    yield* createLoggerSetup(createRecordingFactory(lines))();
    const forum = new Forum();
    const faulty = forum.agent(function* faulty() {
      throw new Error("boom");
    });

    yield* (yield* faulty.ask("go")).materializeAll();
    yield* forum.settle();

    expect(lines).toContainEqual({
      logger: "forum:agent",
      level: "debug",
      msg: "agent raised an error, responding with it",
      fields: { agent: "FAULTY", error: "boom" },
    });
    expect(lines).toContainEqual({
      logger: "forum:context",
      level: "debug",
      msg: "child call failed",
      fields: { agent: "USER", child: "FAULTY" },
    });
  });
});
