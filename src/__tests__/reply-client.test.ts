import { describe, expect, it, vi } from "vitest";
import type { CredentialProvider } from "../credentials.js";
import { ReplyDeliveryError } from "../errors.js";
import { GoogleChatReplyClient, spaceResourceName } from "../reply-client.js";
import { createFakeAdapter, createMockLogger, type FakeReply, type RecordedRequest } from "./fakes.js";

const credentials: CredentialProvider = { getAccessToken: async () => "test-token" };

function clientWith(
  handler: (req: RecordedRequest) => FakeReply | Promise<FakeReply>,
  opts: { maxAttempts?: number; credentials?: CredentialProvider } = {},
) {
  const { adapter, requests } = createFakeAdapter(handler);
  const logger = createMockLogger();
  const client = new GoogleChatReplyClient({
    baseUrl: "https://chat.test/v1",
    credentials: opts.credentials ?? credentials,
    logger,
    maxAttempts: opts.maxAttempts,
    retryDelayMs: 0,
    adapter,
  });
  return { client, requests, logger };
}

describe("spaceResourceName", () => {
  it("adds the spaces/ prefix only when missing", () => {
    expect(spaceResourceName("spaces/AAA")).toBe("spaces/AAA");
    expect(spaceResourceName("spaceA")).toBe("spaces/spaceA");
  });
});

describe("GoogleChatReplyClient", () => {
  it("posts a top-level message when there is no thread", async () => {
    const { client, requests } = clientWith(() => ({ status: 200, data: { name: "spaces/spaceA/messages/1" } }));

    await client.postReply({ space: "spaceA" }, "hi alice");

    expect(requests).toHaveLength(1);
    const [req] = requests;
    expect(req).toMatchObject({
      method: "POST",
      baseURL: "https://chat.test/v1",
      url: "/spaces/spaceA/messages",
      data: { text: "hi alice" },
      authorization: "Bearer test-token",
    });
    expect(req?.params?.messageReplyOption).toBeUndefined();
    expect(req?.params?.messageId).toMatch(/^client-[0-9a-f-]{36}$/);
  });

  it("replies inside the thread when one is given", async () => {
    const { client, requests } = clientWith(() => ({ status: 200, data: {} }));

    await client.postReply({ space: "spaces/team", thread: "spaces/team/threads/t1" }, "answer");

    expect(requests[0]).toMatchObject({
      url: "/spaces/team/messages",
      data: { text: "answer", thread: { name: "spaces/team/threads/t1" } },
      params: { messageReplyOption: "REPLY_MESSAGE_FALLBACK_TO_NEW_THREAD" },
    });
  });

  it("does not retry by default", async () => {
    const { client, requests } = clientWith(() => ({ status: 503 }));

    const error = await client.postReply({ space: "spaces/a" }, "x").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ReplyDeliveryError);
    expect(error).toMatchObject({ attempts: 1, status: 503, code: "REPLY_DELIVERY_FAILED" });
    expect(requests).toHaveLength(1);
  });

  it("retries transient failures up to the cap with one message id", async () => {
    const { client, requests, logger } = clientWith(
      (req) => (requests.length < 3 ? { status: 500 } : { status: 200, data: { name: req.url } }),
      { maxAttempts: 3 },
    );

    await client.postReply({ space: "spaces/a" }, "x");

    expect(requests).toHaveLength(3);
    const ids = new Set(requests.map((r) => r.params?.messageId));
    expect(ids.size).toBe(1);
    expect(logger.warn).toHaveBeenCalledTimes(2);
  });

  it("treats ALREADY_EXISTS on a retry as delivered", async () => {
    const { client, requests } = clientWith(
      () => (requests.length === 1 ? { status: 0, networkError: true } : { status: 409 }),
      { maxAttempts: 2 },
    );

    await expect(client.postReply({ space: "spaces/a" }, "x")).resolves.toBeUndefined();
    expect(requests).toHaveLength(2);
  });

  it("does not retry client errors", async () => {
    const { client, requests } = clientWith(() => ({ status: 403 }), { maxAttempts: 3 });

    const error = await client.postReply({ space: "spaces/a" }, "x").catch((e: unknown) => e);

    expect(error).toMatchObject({ attempts: 1, status: 403 });
    expect(requests).toHaveLength(1);
  });

  it("gives up when credentials cannot be obtained", async () => {
    const getAccessToken = vi.fn(async () => {
      throw new Error("no ADC");
    });
    const { client, requests } = clientWith(() => ({ status: 200 }), { credentials: { getAccessToken } });

    const error = await client.postReply({ space: "spaces/a" }, "x").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ReplyDeliveryError);
    expect(error instanceof Error && error.message).toBe(
      "reply not delivered after 1 attempt(s): could not obtain Chat credentials: no ADC",
    );
    expect(requests).toHaveLength(0);
  });
});
