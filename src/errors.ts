// ---------------------------------------------------------------------------
// Error taxonomy
// ---------------------------------------------------------------------------

export type RelayErrorCode =
  | "REMOTE_API_FAILED"
  | "RUN_TIMEOUT"
  | "RUN_FAILED"
  | "REPLY_DELIVERY_FAILED"
  | "WEBHOOK_UNAUTHORIZED"
  | "CONFIG_INVALID";

export class RelayError extends Error {
  readonly code: RelayErrorCode;

  constructor(code: RelayErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export type RemoteOperation =
  | "findByKey"
  | "createUser"
  | "createConversation"
  | "appendMessage"
  | "executeRun";

export class RemoteApiError extends RelayError {
  readonly operation: RemoteOperation;
  readonly status: number | undefined;

  constructor(params: {
    operation: RemoteOperation;
    message: string;
    status?: number;
    cause?: unknown;
  }) {
    super("REMOTE_API_FAILED", `${params.operation}: ${params.message}`, { cause: params.cause });
    this.operation = params.operation;
    this.status = params.status;
  }
}

export class RunTimeoutError extends RelayError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super("RUN_TIMEOUT", `run did not complete within ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

export class RunFailedError extends RelayError {
  readonly runStatus: string;

  constructor(runStatus: string, detail?: string) {
    super("RUN_FAILED", detail ? `run ended with status ${runStatus}: ${detail}` : `run ended with status ${runStatus}`);
    this.runStatus = runStatus;
  }
}

export class ReplyDeliveryError extends RelayError {
  readonly attempts: number;
  readonly status: number | undefined;

  constructor(params: { attempts: number; status?: number; message: string; cause?: unknown }) {
    super("REPLY_DELIVERY_FAILED", `reply not delivered after ${params.attempts} attempt(s): ${params.message}`, {
      cause: params.cause,
    });
    this.attempts = params.attempts;
    this.status = params.status;
  }
}

export class WebhookAuthError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("WEBHOOK_UNAUTHORIZED", message, options);
  }
}

export class ConfigError extends RelayError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("CONFIG_INVALID", `Invalid configuration:\n  - ${issues.join("\n  - ")}`);
    this.issues = issues;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof RelayError) return `${error.code} ${error.message}`;
  if (error instanceof Error) return error.message;
  return String(error);
}
