import type { RemoteConversationClient } from "./conversation-client.js";
import { describeError, RunTimeoutError } from "./errors.js";
import type { Logger } from "./logger.js";
import type { ChatReplyClient } from "./reply-client.js";
import {
  replyTargetOf,
  type PipelineJob,
  type PipelineOutcome,
  type PipelineState,
  type RemoteConversationHandle,
} from "./types.js";

export interface DeliveryPipelineOptions {
  conversations: RemoteConversationClient;
  replies: ChatReplyClient;
  logger: Logger;
  runTimeoutMs: number;
}

/**
 * Carries one accepted event from its resolved key to a delivered reply:
 * resolve or create the remote conversation, append, run, post.
 *
 * Every step waits for the previous one. Nothing is retried here and nothing
 * is cached between runs; a failure ends the event.
 */
export class DeliveryPipeline {
  private readonly opts: DeliveryPipelineOptions;

  constructor(opts: DeliveryPipelineOptions) {
    this.opts = opts;
  }

  /** Never rejects. Failures come back as a "Failed" outcome and are logged. */
  async run(job: PipelineJob): Promise<PipelineOutcome> {
    const { conversations, replies, logger } = this.opts;
    const { event, key } = job;
    const shortKey = key.slice(0, 12);
    const trace: PipelineState[] = [...job.trace];
    const advance = (state: PipelineState): void => {
      trace.push(state);
      logger.debug(`${shortKey} → ${state}`);
    };

    try {
      const handle = await this.resolveConversation(job);
      advance("ConversationReady");

      await conversations.appendMessage(handle, event.text, event.senderDisplayName);
      advance("MessageAppended");

      const reply = await this.generate(handle);
      advance("ReplyGenerated");

      await replies.postReply(replyTargetOf(event), reply);
      advance("Delivered");

      logger.info(`${shortKey} delivered to ${event.thread ?? event.space} in ${Date.now() - job.receivedAt}ms`);
      return { state: "Delivered", key, trace };
    } catch (error) {
      const failedAfter = trace[trace.length - 1] ?? "Received";
      trace.push("Failed");
      logger.error(`${shortKey} failed after ${failedAfter}: ${describeError(error)}`);
      return { state: "Failed", key, failedAfter, error, trace };
    }
  }

  private async resolveConversation(job: PipelineJob): Promise<RemoteConversationHandle> {
    const { conversations, logger } = this.opts;
    const existing = await conversations.findByKey(job.key);
    if (existing) {
      logger.debug(`${job.key.slice(0, 12)} reusing conversation ${existing.conversationId}`);
      return existing;
    }

    const user = await conversations.createUser(job.key, job.event.senderDisplayName);
    const created = await conversations.createConversation(user, job.key);
    logger.info(`${job.key.slice(0, 12)} created conversation ${created.conversationId}`);
    return created;
  }

  // The deadline applies even to a client that ignores the abort signal.
  private async generate(handle: RemoteConversationHandle): Promise<string> {
    const { runTimeoutMs } = this.opts;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new RunTimeoutError(runTimeoutMs);
        controller.abort(error);
        reject(error);
      }, runTimeoutMs);
    });

    try {
      return await Promise.race([
        this.opts.conversations.executeRun(handle, { signal: controller.signal }),
        deadline,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }
}
