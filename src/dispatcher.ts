import { z } from "zod";
import type { ChatEvent, ChatEventKind, SpaceType } from "./types.js";

// ---------------------------------------------------------------------------
// Inbound payload schemas
// ---------------------------------------------------------------------------

const SpaceSchema = z.object({
  name: z.string().min(1),
  type: z.string().optional(),
  spaceType: z.string().optional(),
  singleUserBotDm: z.boolean().optional(),
});

const UserSchema = z.object({
  name: z.string().optional(),
  displayName: z.string().optional(),
});

const MessageSchema = z.object({
  text: z.string().optional(),
  thread: z.object({ name: z.string().min(1) }).optional(),
  sender: UserSchema.optional(),
  space: SpaceSchema.optional(),
});

/** Classic Chat app event: `{ type, space, message, user }`. */
const LegacyEventSchema = z.object({
  type: z.string().min(1),
  space: SpaceSchema.optional(),
  message: MessageSchema.optional(),
  user: UserSchema.optional(),
});

/**
 * Workspace add-on interaction event: `{ chat: { user, <kind>Payload } }`.
 * Payloads other than message and added-to-space pass through and are only
 * read for their space.
 */
const InteractionEventSchema = z.object({
  chat: z
    .object({
      user: UserSchema.optional(),
      messagePayload: z
        .object({
          space: SpaceSchema.optional(),
          message: MessageSchema,
        })
        .optional(),
      addedToSpacePayload: z
        .object({
          space: SpaceSchema.optional(),
        })
        .optional(),
    })
    .passthrough(),
});

const PayloadWithSpaceSchema = z.object({ space: SpaceSchema });

type RawSpace = z.infer<typeof SpaceSchema>;
type RawMessage = z.infer<typeof MessageSchema>;
type RawUser = z.infer<typeof UserSchema>;

interface NormalizedEvent {
  kind: ChatEventKind;
  space?: RawSpace;
  message?: RawMessage;
  user?: RawUser;
}

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

export type Classification =
  | { outcome: "accepted"; event: ChatEvent }
  | { outcome: "acknowledged"; event: ChatEvent }
  | { outcome: "rejected"; reason: string };

// Matches the structural mention token for any user id, so a bot id that
// differs per deployment is still recognized.
const MENTION_TOKEN = /<users\/[^<>\s]+>[ \t]*/g;

export function stripMentions(text: string): string {
  return text.replace(MENTION_TOKEN, "").trim();
}

function kindOf(type: string): ChatEventKind {
  if (type === "MESSAGE") return "MESSAGE";
  if (type === "ADDED_TO_SPACE") return "ADDED_TO_SPACE";
  return "OTHER";
}

function normalize(raw: object): NormalizedEvent | string {
  if ("chat" in raw) {
    const parsed = InteractionEventSchema.safeParse(raw);
    if (!parsed.success) return `unrecognized interaction event: ${parsed.error.issues[0]?.message ?? "invalid"}`;
    const { chat } = parsed.data;
    if (chat.messagePayload) {
      const { message } = chat.messagePayload;
      return {
        kind: "MESSAGE",
        space: chat.messagePayload.space ?? message.space,
        message,
        user: chat.user,
      };
    }
    if (chat.addedToSpacePayload) {
      return { kind: "ADDED_TO_SPACE", space: chat.addedToSpacePayload.space, user: chat.user };
    }
    return { kind: "OTHER", space: payloadSpaceOf(chat), user: chat.user };
  }

  const parsed = LegacyEventSchema.safeParse(raw);
  if (!parsed.success) return `unrecognized event: ${parsed.error.issues[0]?.message ?? "invalid"}`;
  const event = parsed.data;
  return {
    kind: kindOf(event.type),
    space: event.space ?? event.message?.space,
    message: event.message,
    user: event.user,
  };
}

function payloadSpaceOf(chat: Record<string, unknown>): RawSpace | undefined {
  for (const [name, payload] of Object.entries(chat)) {
    if (!name.endsWith("Payload")) continue;
    const parsed = PayloadWithSpaceSchema.safeParse(payload);
    if (parsed.success) return parsed.data.space;
  }
  return undefined;
}

function spaceTypeOf(space: RawSpace, hasThread: boolean): SpaceType {
  if (space.singleUserBotDm) return "DM";
  const declared = (space.spaceType ?? space.type)?.toUpperCase();
  if (declared === "DM" || declared === "DIRECT_MESSAGE") return "DM";
  if (declared === "ROOM" || declared === "SPACE" || declared === "GROUP_CHAT") return "SPACE";
  return hasThread ? "SPACE" : "DM";
}

function displayNameOf(message: RawMessage | undefined, user: RawUser | undefined): string {
  const name = message?.sender?.displayName?.trim() || user?.displayName?.trim();
  return name || "unknown";
}

/**
 * Turn a raw webhook body into a ChatEvent.
 *
 * Messages with text left after mention stripping are "accepted" and need the
 * delivery pipeline. ADDED_TO_SPACE, other event types and empty messages are
 * only "acknowledged". Bodies missing a space (or a MESSAGE missing its
 * message) are "rejected".
 */
export function classify(raw: unknown): Classification {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    return { outcome: "rejected", reason: "event body must be a JSON object" };
  }

  const normalized = normalize(raw);
  if (typeof normalized === "string") return { outcome: "rejected", reason: normalized };

  const { kind, space, message, user } = normalized;
  if (!space) return { outcome: "rejected", reason: "event has no space" };
  if (kind === "MESSAGE" && !message) return { outcome: "rejected", reason: "MESSAGE event has no message" };

  const threadName = message?.thread?.name;
  const spaceType = spaceTypeOf(space, Boolean(threadName));
  const rawText = message?.text ?? "";

  const event: ChatEvent = {
    kind,
    text: stripMentions(rawText),
    rawText,
    senderDisplayName: displayNameOf(message, user),
    space: space.name,
    spaceType,
    // DM messages each carry their own implicit thread; context is per sender instead.
    ...(spaceType === "SPACE" && threadName ? { thread: threadName } : {}),
  };

  if (event.kind === "MESSAGE" && event.text.length > 0) {
    return { outcome: "accepted", event };
  }
  return { outcome: "acknowledged", event };
}
