import { all, sleep, spawn } from "effection";
import { beforeEach, describe, expect, it } from "../../__tests__/vitest-effection.ts";
import { appendAll } from "../../__tests__/helpers.ts";
import { ConversationTracker, ROOT_TIP, tipFrom } from "../../conversation/tracker.ts";
import { Forum } from "../../forum/forum.ts";
import { AgentCallMsg, ForwardedMessage, Message } from "../../models/message.ts";
import { createInMemoryStorage } from "../../storage/in-memory.ts";
import { MessagePromise } from "../message-promise.ts";

describe("MessagePromise", () => {
  let forum: Forum;

  beforeEach(function* () {
    forum = new Forum();
  });

  it("materializes once for concurrent callers", function* () {
    const storage = createInMemoryStorage();
    const local = new Forum({ storage });
    const [promise] = yield* appendAll(new ConversationTracker(local), "hello", { defaultSenderAlias: "USER" });

    expect(promise.isMaterialized).toBe(false);
    const [first, second] = yield* all([promise.materialize(), promise.materialize()]);

    expect(first).toBe(second);
    expect(promise.isMaterialized).toBe(true);
    expect(yield* promise.hashKey()).toBe(first.hashKey);
    expect(storage.size).toBe(1);
  });

  it("lets the remaining callers finish a materialization whose task was halted", function* () {
    const listener = forum.agent(function* listener() {});
    const call = yield* listener.startAsking();

    const halted = yield* spawn(() => call.callMessage.materialize());
    const waiting = yield* spawn(() => call.callMessage.materialize());
    yield* sleep(0);
    yield* halted.halt();

    call.sendRequest("hi");
    call.finish();
    const marker = yield* waiting;

    expect(marker).toBeInstanceOf(AgentCallMsg);
    expect(marker.content).toBe("LISTENER");
    expect(call.callMessage.isMaterialized).toBe(true);
  });

  it("resolves history from the root, with or without call markers", function* () {
    const clock = forum.agent(function* clock(ctx) {
      ctx.respond("noon");
    });

    const responses = yield* clock.ask("what time is it?");
    const reply = yield* responses.getConcludingPromise();

    const history = yield* reply.materializeHistory();
    expect(history.map((message) => [message.senderAlias, message.content])).toEqual([
      ["USER", "what time is it?"],
      ["CLOCK", "noon"],
    ]);

    const full = yield* reply.materializeHistory(false);
    expect(full.map((message) => [message.senderAlias, message.content])).toEqual([
      ["USER", "what time is it?"],
      ["", "CLOCK"],
      ["CLOCK", "noon"],
    ]);
    expect(full[1]).toBeInstanceOf(AgentCallMsg);

    const previous = yield* reply.previous();
    expect(previous && (yield* previous.materialize())).toBe(history[0]);
    expect(yield* reply.materializePrevious(false)).toBe(full[1]);
  });

  it("reuses a message that already sits at the branch point", function* () {
    const [first] = yield* appendAll(new ConversationTracker(forum), "first", { defaultSenderAlias: "A" });
    const [second] = yield* appendAll(new ConversationTracker(forum, tipFrom(first)), "second", {
      defaultSenderAlias: "A",
    });
    const secondMessage = yield* second.materialize();

    const [reused] = yield* appendAll(new ConversationTracker(forum, tipFrom(first)), secondMessage, {
      defaultSenderAlias: "B",
      doNotForwardIfPossible: true,
    });
    expect(yield* reused.materialize()).toBe(secondMessage);

    const [undetermined] = yield* appendAll(new ConversationTracker(forum), second, {
      defaultSenderAlias: "B",
      doNotForwardIfPossible: true,
    });
    expect(yield* undetermined.materialize()).toBe(secondMessage);
  });

  it("forwards a message that lives elsewhere in the tree", function* () {
    const [first] = yield* appendAll(new ConversationTracker(forum), "first", { defaultSenderAlias: "A" });
    const [second] = yield* appendAll(new ConversationTracker(forum, tipFrom(first)), "second", {
      defaultSenderAlias: "A",
    });
    const secondMessage = yield* second.materialize();

    const [forwarded] = yield* appendAll(new ConversationTracker(forum, ROOT_TIP), secondMessage, {
      defaultSenderAlias: "B",
      doNotForwardIfPossible: true,
    });
    const forward = yield* forwarded.materialize();

    expect(forward).toBeInstanceOf(ForwardedMessage);
    expect(forward.asDict).toEqual({
      content: "second",
      senderAlias: "B",
      originalMsgHashKey: secondMessage.hashKey,
    });
    expect(forward.getOriginal()).toBe(secondMessage);
  });

  it("always forwards when reuse is not allowed", function* () {
    const [first] = yield* appendAll(new ConversationTracker(forum), "first", { defaultSenderAlias: "A" });
    const firstMessage = yield* first.materialize();

    const [copy] = yield* appendAll(new ConversationTracker(forum), first, { defaultSenderAlias: "B" });
    const forward = yield* copy.materialize();

    expect(forward).toBeInstanceOf(ForwardedMessage);
    expect(forward.getOriginal()).toBe(firstMessage);
    expect(forward.prevMsgHashKey).toBeUndefined();
  });

  it("stores a message passed in directly before forwarding it", function* () {
    const stranger = new Message(forum.trees, { content: "from outside", senderAlias: "GUEST" });
    const [forwarded] = yield* appendAll(new ConversationTracker(forum, ROOT_TIP), stranger, {
      defaultSenderAlias: "HOST",
    });
    const forward = yield* forwarded.materialize();

    const retrieved = yield* forum.trees.retrieveMessage(forward.hashKey);
    expect(retrieved.getOriginal()).toBe(stranger);
  });

  it("wraps an existing message", function* () {
    const message = new Message(forum.trees, { content: "known", senderAlias: "USER", isError: true });
    const promise = MessagePromise.resolved(message);

    expect(promise.isError).toBe(true);
    expect(yield* promise.materialize()).toBe(message);
  });
});
