/**
 * config.ts — Runtime configuration for the relay.
 *
 * Everything comes from environment variables (a local `.env` is loaded by the
 * entry point through dotenv). `loadConfig` validates the whole set at once and
 * reports every problem in a single error.
 */

import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { LogLevel } from "./logger.js";

export const RELAY_VERSION = "0.1.0";

// ---------------------------------------------------------------------------
// Configuration Interface
// ---------------------------------------------------------------------------

export interface RelayConfig {
  // --- Required ---

  /** Bearer key for the assistant API. */
  aiApiKey: string;
  /** Base URL of the assistant API, e.g. "https://assistant.example.com/v1". */
  aiApiBaseUrl: string;

  // --- Optional (sensible defaults provided) ---

  /**
   * Google Cloud project number of the Chat app. When set, every webhook call
   * must carry a Chat-issued bearer token whose audience is this number.
   */
  chatProjectNumber?: string;
  /** Google Chat REST base URL. */
  chatApiBaseUrl: string;
  port: number;
  /** Upper bound for a single generation run before the event is dropped. */
  runTimeoutMs: number;
  /** Delay between run status polls. */
  runPollIntervalMs: number;
  /** Reply post attempts, 1 = no retry. */
  replyMaxAttempts: number;
  /** Run events that share a conversation key one after another. */
  serializePerConversation: boolean;
  /** Returned synchronously when the app is added to a space. */
  welcomeMessage?: string;
  logLevel: LogLevel;
  nodeEnv: string;
}

// ---------------------------------------------------------------------------
// Environment Schema
// ---------------------------------------------------------------------------

const optionalText = z
  .string()
  .optional()
  .transform((v) => (v && v.trim().length > 0 ? v.trim() : undefined));

const booleanFlag = (fallback: boolean) =>
  z
    .enum(["true", "false", "1", "0", "yes", "no"])
    .optional()
    .transform((v) => (v === undefined ? fallback : v === "true" || v === "1" || v === "yes"));

const EnvSchema = z.object({
  AI_API_KEY: z.string({ required_error: "AI_API_KEY is required" }).trim().min(1, "AI_API_KEY is required"),
  AI_API_BASE_URL: z
    .string({ required_error: "AI_API_BASE_URL is required" })
    .trim()
    .url("AI_API_BASE_URL must be a URL")
    .transform((v) => v.replace(/\/+$/, "")),
  CHAT_PROJECT_NUMBER: optionalText.refine((v) => v === undefined || /^\d+$/.test(v), {
    message: "CHAT_PROJECT_NUMBER must be numeric",
  }),
  CHAT_API_BASE_URL: z
    .string()
    .trim()
    .url("CHAT_API_BASE_URL must be a URL")
    .default("https://chat.googleapis.com/v1")
    .transform((v) => v.replace(/\/+$/, "")),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  RUN_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  RUN_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(1_000),
  REPLY_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(5).default(1),
  SERIALIZE_PER_CONVERSATION: booleanFlag(true),
  WELCOME_MESSAGE: optionalText,
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).optional(),
  NODE_ENV: z.string().default("development"),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RelayConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => {
        const field = issue.path.join(".");
        return issue.message.startsWith(field) ? issue.message : `${field}: ${issue.message}`;
      }),
    );
  }

  const e = parsed.data;
  return {
    aiApiKey: e.AI_API_KEY,
    aiApiBaseUrl: e.AI_API_BASE_URL,
    chatProjectNumber: e.CHAT_PROJECT_NUMBER,
    chatApiBaseUrl: e.CHAT_API_BASE_URL,
    port: e.PORT,
    runTimeoutMs: e.RUN_TIMEOUT_MS,
    runPollIntervalMs: e.RUN_POLL_INTERVAL_MS,
    replyMaxAttempts: e.REPLY_MAX_ATTEMPTS,
    serializePerConversation: e.SERIALIZE_PER_CONVERSATION,
    welcomeMessage: e.WELCOME_MESSAGE,
    logLevel: e.LOG_LEVEL ?? (e.NODE_ENV === "production" ? "info" : "debug"),
    nodeEnv: e.NODE_ENV,
  };
}
