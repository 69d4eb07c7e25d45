import express, { type NextFunction, type Request, type Response } from "express";
import { classify } from "./dispatcher.js";
import { describeError, WebhookAuthError } from "./errors.js";
import { keyModeOf, resolveKey } from "./identity.js";
import type { Logger } from "./logger.js";
import type { PipelineState } from "./types.js";
import type { RequestVerifier } from "./verify.js";
import type { DeliveryWorker } from "./worker.js";

export interface RelayServerDeps {
  worker: Pick<DeliveryWorker, "send">;
  verifier: RequestVerifier;
  logger: Logger;
  version: string;
  welcomeMessage?: string;
  /** Max accepted webhook body size, as understood by express.json. */
  bodyLimit?: string;
}

/**
 * The webhook surface. POST / answers as soon as the event is classified and
 * its key resolved; delivery happens later on the worker. GET / is the health
 * check.
 */
export function createRelayServer(deps: RelayServerDeps): express.Express {
  const { worker, verifier, logger } = deps;
  const app = express();
  app.disable("x-powered-by");

  app.get("/", (_req, res) => {
    res.json({ status: "alive", version: deps.version });
  });

  app.post("/", express.json({ limit: deps.bodyLimit ?? "1mb" }), async (req: Request, res: Response) => {
    const receivedAt = Date.now();
    const trace: PipelineState[] = ["Received"];

    try {
      await verifier.verify(req.get("authorization"));
    } catch (error) {
      const message = error instanceof WebhookAuthError ? error.message : "unauthorized";
      logger.warn(`Rejected webhook call: ${describeError(error)}`);
      res.status(401).json({ error: message });
      return;
    }

    const classification = classify(req.body);
    if (classification.outcome === "rejected") {
      logger.warn(`Rejected event: ${classification.reason}`);
      res.status(400).json({ error: classification.reason });
      return;
    }

    const { event } = classification;
    trace.push("Classified");
    if (classification.outcome === "acknowledged") {
      logger.info(`Acknowledged ${event.kind} event in ${event.space}`);
      if (event.kind === "ADDED_TO_SPACE" && deps.welcomeMessage) {
        res.status(200).json({ text: deps.welcomeMessage });
      } else {
        res.status(200).json({});
      }
      return;
    }

    const key = resolveKey(event);
    trace.push("KeyResolved");
    logger.info(
      `Message from ${event.senderDisplayName} in ${event.space} (${keyModeOf(event)} ${key.slice(0, 12)}): ${event.text.substring(0, 100)}`,
    );
    worker.send({ event, key, receivedAt, trace });
    res.status(200).json({});
  });

  // Body-parser failures (malformed JSON, oversized payload) land here.
  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    const status = statusOf(error);
    logger.warn(`Webhook request failed (${status}): ${describeError(error)}`);
    res.status(status).json({ error: status === 400 ? "invalid json" : status < 500 ? "bad request" : "internal error" });
  });

  return app;
}

function statusOf(error: unknown): number {
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return 500;
}
