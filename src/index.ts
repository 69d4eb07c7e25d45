import "dotenv/config";
import type { Server } from "node:http";
import { loadConfig, RELAY_VERSION, type RelayConfig } from "./config.js";
import { HttpConversationClient } from "./conversation-client.js";
import { GoogleCredentialProvider } from "./credentials.js";
import { describeError } from "./errors.js";
import { childLogger, createConsoleLogger } from "./logger.js";
import { DeliveryPipeline } from "./pipeline.js";
import { GoogleChatReplyClient } from "./reply-client.js";
import { createRelayServer } from "./server.js";
import { allowAllVerifier, ChatTokenVerifier } from "./verify.js";
import { DeliveryWorker } from "./worker.js";

let config: RelayConfig;
try {
  config = loadConfig();
} catch (error) {
  console.error(describeError(error));
  process.exit(1);
}

const logger = createConsoleLogger("relay", config.logLevel);

let server: Server | null = null;
let isShuttingDown = false;

async function main(): Promise<void> {
  logger.info(`Starting chat assistant relay v${RELAY_VERSION} (${config.nodeEnv})...`);

  const conversations = new HttpConversationClient({
    baseUrl: config.aiApiBaseUrl,
    apiKey: config.aiApiKey,
    pollIntervalMs: config.runPollIntervalMs,
  });

  const replies = new GoogleChatReplyClient({
    baseUrl: config.chatApiBaseUrl,
    credentials: new GoogleCredentialProvider(),
    logger: childLogger(logger, "reply"),
    maxAttempts: config.replyMaxAttempts,
  });

  const pipeline = new DeliveryPipeline({
    conversations,
    replies,
    logger: childLogger(logger, "pipeline"),
    runTimeoutMs: config.runTimeoutMs,
  });

  const worker = new DeliveryWorker(pipeline, {
    logger: childLogger(logger, "worker"),
    serializePerConversation: config.serializePerConversation,
  });

  let verifier = allowAllVerifier;
  if (config.chatProjectNumber) {
    verifier = new ChatTokenVerifier(config.chatProjectNumber);
    logger.info(`Verifying Chat tokens for project ${config.chatProjectNumber}`);
  } else {
    logger.warn("CHAT_PROJECT_NUMBER not set - webhook origin is not verified");
  }

  const app = createRelayServer({
    worker,
    verifier,
    logger: childLogger(logger, "webhook"),
    version: RELAY_VERSION,
    welcomeMessage: config.welcomeMessage,
  });

  server = await new Promise<Server>((resolve, reject) => {
    const s = app.listen(config.port, () => resolve(s));
    s.once("error", reject);
  });
  logger.info(`Listening on port ${config.port}`);

  const shutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) return;
    isShuttingDown = true;
    logger.info(`Received ${signal}, shutting down...`);
    const closing = new Promise<void>((resolve) => (server ? server.close(() => resolve()) : resolve()));
    if (worker.pending > 0) {
      logger.info(`Waiting for ${worker.pending} in-flight deliveries...`);
    }
    await worker.idle();
    await closing;
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

main().catch((error) => {
  logger.error(`Fatal error: ${describeError(error)}`);
  process.exit(1);
});
