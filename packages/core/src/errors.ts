export type EngineErrorCode =
  | "VALIDATION_FAILED"
  | "TRANSIENT_DELIVERY"
  | "PERMANENT_DELIVERY"
  | "DOMAIN_SERVICE_FAILED"
  | "CONCURRENCY_CONFLICT"
  | "CONCURRENCY_EXHAUSTED"
  | "SESSION_STORE_FAILED"
  | "DEAD_LETTER_NOT_FOUND"
  | "CONFIG_INVALID";

export class EngineError extends Error {
  readonly code: EngineErrorCode;
  readonly retryable: boolean;

  constructor(
    code: EngineErrorCode,
    message: string,
    options: { retryable?: boolean; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "EngineError";
    this.code = code;
    this.retryable = Boolean(options.retryable);
  }
}

/** Bad user input. The caller re-prompts; the session is not changed. */
export class ValidationError extends EngineError {
  readonly field: string | null;

  constructor(message: string, options: { field?: string | null } = {}) {
    super("VALIDATION_FAILED", message);
    this.name = "ValidationError";
    this.field = options.field ?? null;
  }
}

export class TransientDeliveryError extends EngineError {
  readonly statusCode: number | null;
  readonly retryAfterMs: number | null;

  constructor(
    message: string,
    options: { statusCode?: number | null; retryAfterMs?: number | null; cause?: unknown } = {},
  ) {
    super("TRANSIENT_DELIVERY", message, { retryable: true, cause: options.cause });
    this.name = "TransientDeliveryError";
    this.statusCode = options.statusCode ?? null;
    this.retryAfterMs = options.retryAfterMs ?? null;
  }
}

export class PermanentDeliveryError extends EngineError {
  readonly statusCode: number | null;

  constructor(message: string, options: { statusCode?: number | null; cause?: unknown } = {}) {
    super("PERMANENT_DELIVERY", message, { retryable: false, cause: options.cause });
    this.name = "PermanentDeliveryError";
    this.statusCode = options.statusCode ?? null;
  }
}

export class DomainServiceError extends EngineError {
  readonly service: string;
  readonly operation: string;

  constructor(
    message: string,
    options: { service: string; operation: string; cause?: unknown },
  ) {
    super("DOMAIN_SERVICE_FAILED", message, { cause: options.cause });
    this.name = "DomainServiceError";
    this.service = options.service;
    this.operation = options.operation;
  }
}

export class ConcurrencyConflict extends EngineError {
  readonly userId: string;
  readonly expectedVersion: number;
  readonly actualVersion: number | null;

  constructor(input: { userId: string; expectedVersion: number; actualVersion: number | null }) {
    super(
      "CONCURRENCY_CONFLICT",
      `Session version mismatch (expected ${input.expectedVersion}, found ${input.actualVersion ?? "none"}).`,
      { retryable: true },
    );
    this.name = "ConcurrencyConflict";
    this.userId = input.userId;
    this.expectedVersion = input.expectedVersion;
    this.actualVersion = input.actualVersion;
  }
}

/** Raised when a transition keeps losing the compare-and-swap race. */
export class ConversationEngineError extends EngineError {
  readonly userId: string;
  readonly attempts: number;

  constructor(input: { userId: string; attempts: number; cause?: unknown }) {
    super(
      "CONCURRENCY_EXHAUSTED",
      `Session save lost ${input.attempts} compare-and-swap attempts in a row.`,
      { retryable: true, cause: input.cause },
    );
    this.name = "ConversationEngineError";
    this.userId = input.userId;
    this.attempts = input.attempts;
  }
}

export class SessionRepositoryError extends EngineError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super("SESSION_STORE_FAILED", message, { retryable: true, cause: options.cause });
    this.name = "SessionRepositoryError";
  }
}

export class DeadLetterNotFoundError extends EngineError {
  readonly deadLetterId: string;

  constructor(deadLetterId: string) {
    super("DEAD_LETTER_NOT_FOUND", `Dead letter '${deadLetterId}' not found.`);
    this.name = "DeadLetterNotFoundError";
    this.deadLetterId = deadLetterId;
  }
}

export class ConfigError extends EngineError {
  constructor(message: string) {
    super("CONFIG_INVALID", message);
    this.name = "ConfigError";
  }
}

export function describeError(error: unknown): { error_name: string; error_message: string } {
  if (error instanceof Error) {
    return {
      error_name: error.name || "Error",
      error_message: error.message || "Unknown error",
    };
  }
  return {
    error_name: "NonErrorThrown",
    error_message: typeof error === "string" && error.trim() ? error : "Unknown error",
  };
}
