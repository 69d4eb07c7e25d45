import { randomUUID } from "node:crypto";
import axios, { type AxiosAdapter, type AxiosInstance } from "axios";
import type { CredentialProvider } from "./credentials.js";
import { ReplyDeliveryError } from "./errors.js";
import type { Logger } from "./logger.js";
import type { ReplyTarget } from "./types.js";

export interface ChatReplyClient {
  postReply(target: ReplyTarget, text: string): Promise<void>;
}

export interface GoogleChatReplyClientOptions {
  baseUrl: string;
  credentials: CredentialProvider;
  logger: Logger;
  /** Total attempts including the first; 1 disables retry. */
  maxAttempts?: number;
  /** Base delay for exponential backoff between attempts. */
  retryDelayMs?: number;
  adapter?: AxiosAdapter;
}

export function spaceResourceName(space: string): string {
  return space.startsWith("spaces/") ? space : `spaces/${space}`;
}

function isRetryableStatus(status: number | undefined): boolean {
  // No status means the request never got a response.
  return status === undefined || status === 429 || status >= 500;
}

/**
 * Posts replies through the Chat REST API (spaces.messages.create).
 *
 * Each reply gets one client-assigned message id shared by all of its
 * attempts. If an attempt that timed out was in fact stored, the retry gets
 * 409 ALREADY_EXISTS and is treated as delivered, so a reply is never posted
 * twice.
 */
export class GoogleChatReplyClient implements ChatReplyClient {
  private readonly http: AxiosInstance;
  private readonly opts: GoogleChatReplyClientOptions;
  private readonly maxAttempts: number;

  constructor(opts: GoogleChatReplyClientOptions) {
    this.opts = opts;
    this.maxAttempts = Math.max(1, opts.maxAttempts ?? 1);
    this.http = axios.create({ baseURL: opts.baseUrl, timeout: 30_000, adapter: opts.adapter });
  }

  async postReply(target: ReplyTarget, text: string): Promise<void> {
    const { logger, credentials } = this.opts;
    const url = `/${spaceResourceName(target.space)}/messages`;
    const messageId = `client-${randomUUID()}`;
    const params: Record<string, string> = { messageId };
    const body: { text: string; thread?: { name: string } } = { text };
    if (target.thread) {
      params.messageReplyOption = "REPLY_MESSAGE_FALLBACK_TO_NEW_THREAD";
      body.thread = { name: target.thread };
    }

    for (let attempt = 1; ; attempt++) {
      const token = await credentials.getAccessToken().catch((error: unknown) => {
        throw new ReplyDeliveryError({
          attempts: attempt,
          message: `could not obtain Chat credentials: ${error instanceof Error ? error.message : String(error)}`,
          cause: error,
        });
      });

      try {
        await this.http.post(url, body, {
          params,
          headers: { Authorization: `Bearer ${token}`, "Content-Type": "application/json" },
        });
        return;
      } catch (error) {
        if (!axios.isAxiosError(error)) {
          throw new ReplyDeliveryError({ attempts: attempt, message: String(error), cause: error });
        }
        const status = error.response?.status;
        if (status === 409 && attempt > 1) {
          logger.info(`Reply ${messageId} already stored by an earlier attempt`);
          return;
        }
        if (attempt >= this.maxAttempts || !isRetryableStatus(status)) {
          throw new ReplyDeliveryError({
            attempts: attempt,
            status,
            message: status ? `HTTP ${status} from POST ${url}` : error.message,
            cause: error,
          });
        }
        const delay = (this.opts.retryDelayMs ?? 500) * Math.pow(2, attempt - 1);
        logger.warn(
          `Reply post failed (attempt ${attempt}/${this.maxAttempts}, ${status ?? error.code ?? "no response"}), retrying in ${delay}ms`,
        );
        await new Promise((r) => setTimeout(r, delay));
      }
    }
  }
}
