// ---------------------------------------------------------------------------
// Chat side
// ---------------------------------------------------------------------------

export type ChatEventKind = "MESSAGE" | "ADDED_TO_SPACE" | "OTHER";

/** Whether the space is a 1:1 DM with the bot or a shared space. */
export type SpaceType = "DM" | "SPACE";

export interface ChatEvent {
  readonly kind: ChatEventKind;
  /** Message text with bot-mention markup removed. */
  readonly text: string;
  readonly rawText: string;
  readonly senderDisplayName: string;
  /** Space resource name, e.g. "spaces/AAAA1234". */
  readonly space: string;
  readonly spaceType: SpaceType;
  /** Thread resource name. Never set for DM spaces. */
  readonly thread?: string;
}

export interface ReplyTarget {
  readonly space: string;
  readonly thread?: string;
}

// ---------------------------------------------------------------------------
// Assistant side
// ---------------------------------------------------------------------------

/** Hex SHA-256 digest identifying one chat context in the assistant API. */
export type ConversationKey = string;

export type KeyMode = "dm" | "thread" | "space";

export interface RemoteUserHandle {
  readonly userId: string;
}

export interface RemoteConversationHandle {
  readonly conversationId: string;
  readonly userId: string;
}

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

export type PipelineState =
  | "Received"
  | "Classified"
  | "KeyResolved"
  | "ConversationReady"
  | "MessageAppended"
  | "ReplyGenerated"
  | "Delivered"
  | "Failed";

export interface PipelineJob {
  readonly event: ChatEvent;
  readonly key: ConversationKey;
  readonly receivedAt: number;
  /** States the webhook reached before handing the job over. */
  readonly trace: readonly PipelineState[];
}

export type PipelineOutcome =
  | {
      state: "Delivered";
      key: ConversationKey;
      trace: PipelineState[];
    }
  | {
      state: "Failed";
      key: ConversationKey;
      /** Last state reached before the failure. */
      failedAfter: PipelineState;
      error: unknown;
      trace: PipelineState[];
    };

export function replyTargetOf(event: ChatEvent): ReplyTarget {
  return event.thread ? { space: event.space, thread: event.thread } : { space: event.space };
}
