import { createHash } from "node:crypto";
import type { ChatEvent, ConversationKey, KeyMode } from "./types.js";

export function keyModeOf(event: ChatEvent): KeyMode {
  if (event.thread) return "thread";
  return event.spaceType === "DM" ? "dm" : "space";
}

function keyParts(event: ChatEvent, mode: KeyMode): string[] {
  switch (mode) {
    case "thread":
      return [mode, event.thread ?? ""];
    case "dm":
      return [mode, event.space, event.senderDisplayName];
    case "space":
      return [mode, event.space];
  }
}

/**
 * Derive the external conversation key for an event.
 *
 * - thread present: every participant in the thread shares one context
 * - DM: one context per (space, sender)
 * - space without thread: one context for the whole space
 *
 * The hash input is a JSON array led by the mode tag, so field boundaries are
 * unambiguous and a DM key never equals a space key for the same space.
 */
export function resolveKey(event: ChatEvent): ConversationKey {
  const parts = keyParts(event, keyModeOf(event));
  return createHash("sha256").update(JSON.stringify(parts), "utf8").digest("hex");
}
