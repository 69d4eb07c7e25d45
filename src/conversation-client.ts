import axios, { type AxiosAdapter, type AxiosInstance } from "axios";
import { z } from "zod";
import { RemoteApiError, RunFailedError, RunTimeoutError, type RemoteOperation } from "./errors.js";
import type { ConversationKey, RemoteConversationHandle, RemoteUserHandle } from "./types.js";

/**
 * The assistant API as the pipeline sees it. The API is the system of record:
 * `findByKey` after a create must return what was created, which is the only
 * thing that gives the stateless relay durable context.
 */
export interface RemoteConversationClient {
  findByKey(key: ConversationKey): Promise<RemoteConversationHandle | null>;
  createUser(key: ConversationKey, displayName: string): Promise<RemoteUserHandle>;
  createConversation(user: RemoteUserHandle, key: ConversationKey): Promise<RemoteConversationHandle>;
  appendMessage(conversation: RemoteConversationHandle, text: string, senderDisplayName: string): Promise<void>;
  /** Trigger generation and resolve with the reply text once the run completes. */
  executeRun(conversation: RemoteConversationHandle, options?: { signal?: AbortSignal }): Promise<string>;
}

// ---------------------------------------------------------------------------
// Wire schemas
// ---------------------------------------------------------------------------

const ConversationSchema = z.object({
  id: z.string().min(1),
  user_id: z.string().min(1),
  external_id: z.string().nullish(),
});

const ConversationListSchema = z.object({
  data: z.array(ConversationSchema),
});

const UserSchema = z.object({
  id: z.string().min(1),
});

const RunSchema = z.object({
  id: z.string().min(1),
  status: z.string(),
  output: z.string().nullish(),
  error: z
    .object({ message: z.string().optional() })
    .nullish(),
});

type Run = z.infer<typeof RunSchema>;

const PENDING_RUN_STATUSES = new Set(["queued", "in_progress", "running", "pending"]);

// ---------------------------------------------------------------------------
// HTTP client
// ---------------------------------------------------------------------------

export interface HttpConversationClientOptions {
  baseUrl: string;
  apiKey: string;
  pollIntervalMs: number;
  /** Per-request timeout for individual HTTP calls. */
  requestTimeoutMs?: number;
  /** Transport override; tests pass an in-process adapter. */
  adapter?: AxiosAdapter;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export class HttpConversationClient implements RemoteConversationClient {
  private readonly http: AxiosInstance;
  private readonly pollIntervalMs: number;

  constructor(opts: HttpConversationClientOptions) {
    this.pollIntervalMs = opts.pollIntervalMs;
    this.http = axios.create({
      baseURL: opts.baseUrl,
      timeout: opts.requestTimeoutMs ?? 30_000,
      headers: {
        Authorization: `Bearer ${opts.apiKey}`,
        "Content-Type": "application/json",
      },
      adapter: opts.adapter,
    });
  }

  async findByKey(key: ConversationKey): Promise<RemoteConversationHandle | null> {
    const body = await this.request("findByKey", ConversationListSchema, {
      method: "GET",
      url: "/conversations",
      params: { external_id: key },
    });
    // Entries without a matching external_id belong to some other key.
    const match = body.data.find((c) => c.external_id === key);
    return match ? { conversationId: match.id, userId: match.user_id } : null;
  }

  async createUser(key: ConversationKey, displayName: string): Promise<RemoteUserHandle> {
    const user = await this.request("createUser", UserSchema, {
      method: "POST",
      url: "/users",
      data: { external_id: key, display_name: displayName },
    });
    return { userId: user.id };
  }

  async createConversation(user: RemoteUserHandle, key: ConversationKey): Promise<RemoteConversationHandle> {
    const conversation = await this.request("createConversation", ConversationSchema, {
      method: "POST",
      url: "/conversations",
      data: { user_id: user.userId, external_id: key },
    });
    return { conversationId: conversation.id, userId: conversation.user_id };
  }

  async appendMessage(
    conversation: RemoteConversationHandle,
    text: string,
    senderDisplayName: string,
  ): Promise<void> {
    await this.request("appendMessage", z.unknown(), {
      method: "POST",
      url: `/conversations/${encodeURIComponent(conversation.conversationId)}/messages`,
      data: {
        role: "user",
        content: text,
        metadata: { sender_display_name: senderDisplayName },
      },
    });
  }

  async executeRun(conversation: RemoteConversationHandle, options: { signal?: AbortSignal } = {}): Promise<string> {
    const { signal } = options;
    const base = `/conversations/${encodeURIComponent(conversation.conversationId)}/runs`;

    let run = await this.request("executeRun", RunSchema, { method: "POST", url: base, data: {}, signal });
    while (PENDING_RUN_STATUSES.has(run.status)) {
      await sleep(this.pollIntervalMs, signal);
      run = await this.request("executeRun", RunSchema, {
        method: "GET",
        url: `${base}/${encodeURIComponent(run.id)}`,
        signal,
      });
    }
    return this.outputOf(run);
  }

  private outputOf(run: Run): string {
    if (run.status !== "completed") {
      throw new RunFailedError(run.status, run.error?.message);
    }
    const output = run.output?.trim() ?? "";
    if (!output) throw new RunFailedError(run.status, "run produced no output");
    return output;
  }

  private async request<T>(
    operation: RemoteOperation,
    schema: z.ZodType<T>,
    config: {
      method: "GET" | "POST";
      url: string;
      params?: Record<string, string>;
      data?: unknown;
      signal?: AbortSignal;
    },
  ): Promise<T> {
    let data: unknown;
    try {
      const res = await this.http.request<unknown>(config);
      data = res.data;
    } catch (error) {
      if (config.signal?.aborted && config.signal.reason instanceof RunTimeoutError) {
        throw config.signal.reason;
      }
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        throw new RemoteApiError({
          operation,
          status,
          message: status ? `HTTP ${status} from ${config.method} ${config.url}` : error.message,
          cause: error,
        });
      }
      throw new RemoteApiError({
        operation,
        message: error instanceof Error ? error.message : String(error),
        cause: error,
      });
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new RemoteApiError({
        operation,
        message: `unexpected response shape: ${parsed.error.issues[0]?.message ?? "invalid"}`,
      });
    }
    return parsed.data;
  }
}
