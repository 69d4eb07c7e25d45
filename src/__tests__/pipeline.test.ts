import { beforeEach, describe, expect, it } from "vitest";
import { RemoteApiError, ReplyDeliveryError, RunTimeoutError } from "../errors.js";
import { resolveKey } from "../identity.js";
import { DeliveryPipeline } from "../pipeline.js";
import type { ChatEvent, PipelineJob } from "../types.js";
import { chatEvent, createMockLogger, FakeConversationApi, RecordingReplyClient } from "./fakes.js";

let api: FakeConversationApi;
let replies: RecordingReplyClient;
let logger: ReturnType<typeof createMockLogger>;
let pipeline: DeliveryPipeline;

function jobFor(event: ChatEvent): PipelineJob {
  return { event, key: resolveKey(event), receivedAt: Date.now(), trace: ["Received", "Classified", "KeyResolved"] };
}

beforeEach(() => {
  api = new FakeConversationApi();
  replies = new RecordingReplyClient();
  logger = createMockLogger();
  pipeline = new DeliveryPipeline({ conversations: api, replies, logger, runTimeoutMs: 200 });
});

describe("DeliveryPipeline", () => {
  it("creates the remote conversation once for a new key, then appends, runs and replies", async () => {
    const event = chatEvent({ space: "spaceA", senderDisplayName: "alice", text: "hello", rawText: "<users/999> hello" });

    const outcome = await pipeline.run(jobFor(event));

    expect(outcome.state).toBe("Delivered");
    expect(outcome.trace).toEqual([
      "Received",
      "Classified",
      "KeyResolved",
      "ConversationReady",
      "MessageAppended",
      "ReplyGenerated",
      "Delivered",
    ]);
    expect(api.calls).toEqual(["findByKey", "createUser", "createConversation", "appendMessage", "executeRun"]);
    expect(api.appended).toEqual([{ conversationId: "conv-2", text: "hello", sender: "alice" }]);
    expect(replies.posted).toEqual([{ target: { space: "spaceA" }, text: "echo: hello" }]);
  });

  it("reuses the existing conversation without creating anything", async () => {
    const event = chatEvent();
    await pipeline.run(jobFor(event));
    api.calls.length = 0;

    const outcome = await pipeline.run(jobFor(chatEvent({ text: "again" })));

    expect(outcome.state).toBe("Delivered");
    expect(api.calls).toEqual(["findByKey", "appendMessage", "executeRun"]);
  });

  it("shares one conversation between thread participants and replies in the thread", async () => {
    const thread = "spaces/team/threads/threadX";
    const first = chatEvent({ spaceType: "SPACE", space: "spaces/team", thread, senderDisplayName: "alice", text: "q1" });
    const second = chatEvent({ spaceType: "SPACE", space: "spaces/team", thread, senderDisplayName: "bob", text: "q2" });

    await pipeline.run(jobFor(first));
    await pipeline.run(jobFor(second));

    expect(api.calls.filter((c) => c === "createConversation")).toHaveLength(1);
    expect(new Set(api.appended.map((m) => m.conversationId)).size).toBe(1);
    expect(replies.posted.map((p) => p.target)).toEqual([
      { space: "spaces/team", thread },
      { space: "spaces/team", thread },
    ]);
  });

  it("fails without appending when the lookup fails", async () => {
    api.findByKey = async () => {
      throw new RemoteApiError({ operation: "findByKey", status: 502, message: "HTTP 502" });
    };

    const outcome = await pipeline.run(jobFor(chatEvent()));

    expect(outcome.state).toBe("Failed");
    if (outcome.state !== "Failed") return;
    expect(outcome.failedAfter).toBe("KeyResolved");
    expect(outcome.error).toBeInstanceOf(RemoteApiError);
    expect(api.appended).toEqual([]);
    expect(replies.posted).toEqual([]);
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it("continues the trace the webhook handed over without changing it", async () => {
    const handed = ["Received"] as const;
    api.findByKey = async () => {
      throw new RemoteApiError({ operation: "findByKey", status: 500, message: "HTTP 500" });
    };

    const outcome = await pipeline.run({ event: chatEvent(), key: resolveKey(chatEvent()), receivedAt: Date.now(), trace: handed });

    expect(outcome.trace).toEqual(["Received", "Failed"]);
    expect(outcome.state === "Failed" && outcome.failedAfter).toBe("Received");
    expect(handed).toEqual(["Received"]);
  });

  it("times out a slow run and sends nothing", async () => {
    api.runImpl = () => new Promise<string>(() => {});

    const outcome = await pipeline.run(jobFor(chatEvent()));

    expect(outcome.state).toBe("Failed");
    if (outcome.state !== "Failed") return;
    expect(outcome.failedAfter).toBe("MessageAppended");
    expect(outcome.error).toBeInstanceOf(RunTimeoutError);
    expect(replies.posted).toEqual([]);
  });

  it("aborts the signal handed to the run when the deadline passes", async () => {
    let seen: AbortSignal | undefined;
    api.runImpl = (_handle, signal) => {
      seen = signal;
      return new Promise<string>(() => {});
    };

    await pipeline.run(jobFor(chatEvent()));

    expect(seen?.aborted).toBe(true);
    expect(seen?.reason).toBeInstanceOf(RunTimeoutError);
  });

  it("records a delivery failure after the reply was generated", async () => {
    replies.failWith = new ReplyDeliveryError({ attempts: 1, status: 500, message: "HTTP 500" });

    const outcome = await pipeline.run(jobFor(chatEvent()));

    expect(outcome.state).toBe("Failed");
    if (outcome.state !== "Failed") return;
    expect(outcome.failedAfter).toBe("ReplyGenerated");
    expect(api.calls).toContain("executeRun");
  });
});
