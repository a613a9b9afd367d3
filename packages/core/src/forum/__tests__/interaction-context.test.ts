import { beforeEach, describe, expect, it } from "../../__tests__/vitest-effection.ts";
import { captureError } from "../../__tests__/helpers.ts";
import { NoAskingAgentError, ValidationError } from "../../errors.ts";
import { Forum } from "../forum.ts";
import { useInteractionContext, type InteractionContext } from "../interaction-context.ts";

describe("InteractionContext", () => {
  let forum: Forum;

  beforeEach(function* () {
    forum = new Forum();
  });

  it("is the forum's root context outside of any agent", function* () {
    const context = yield* useInteractionContext(forum);

    expect(context).toBe(forum.rootContext);
    expect(context.agent.alias).toBe("USER");
    expect(context.wasAsked).toBe(false);
    expect(context.parent).toBeUndefined();
    expect(yield* context.requestMessages.materializeAll()).toEqual([]);
  });

  it("is the agent's own context inside its body", function* () {
    let inside: InteractionContext | undefined;
    let received: InteractionContext | undefined;
    const inspector = forum.agent(function* inspector(ctx) {
      received = ctx;
      inside = yield* useInteractionContext(forum);
    });

    yield* inspector.tell();
    expect(forum.rootContext.childCalls).toHaveLength(1);
    yield* forum.settle();

    expect(inside).toBe(received);
    expect(inside?.agent.alias).toBe("INSPECTOR");
    expect(inside?.parent).toBe(forum.rootContext);
  });

  it("does not leak into another forum", function* () {
    const other = new Forum();
    let seen: InteractionContext | undefined;
    const inspector = forum.agent(function* inspector() {
      seen = yield* useInteractionContext(other);
    });

    yield* inspector.tell();
    yield* forum.settle();

    expect(seen).toBe(other.rootContext);
  });

  it("cannot be entered twice at once", function* () {
    const context = forum.rootContext;

    const error = yield* captureError(() =>
      context.run(function* () {
        yield* context.run(function* () {});
      })
    );

    expect(error).toBeInstanceOf(ValidationError);
    const result = yield* context.run(function* () {
      return "entered again";
    });
    expect(result).toBe("entered again");
  });

  it("finds the nearest asked context", function* () {
    let askedAlias: string | undefined;
    const helper = forum.agent(function* helper(ctx) {
      askedAlias = ctx.getAskedContext().agent.alias;
    });
    const lead = forum.agent(function* lead(ctx) {
      yield* helper.tell(ctx.requestMessages);
    });

    yield* (yield* lead.ask("start")).materializeAll();

    expect(askedAlias).toBe("LEAD");
    expect(() => forum.rootContext.getAskedContext()).toThrow(NoAskingAgentError);
  });
});
