import { redactPII } from "../../core/src/observability/redaction.ts";

export const DB_ERROR_CODES = {
  MISSING_ENV: "DB_MISSING_ENV",
  INVALID_ENV: "DB_INVALID_ENV",
  CLIENT_INIT_FAILED: "DB_CLIENT_INIT_FAILED",
  QUERY_FAILED: "DB_QUERY_FAILED",
  UNEXPECTED_RESPONSE: "DB_UNEXPECTED_RESPONSE",
} as const;

export type DbErrorCode = (typeof DB_ERROR_CODES)[keyof typeof DB_ERROR_CODES];

const SECRET_KEY_PATTERN = /(key|token|secret|password)$/i;

/** Context attached to a DbError never carries credentials or message text. */
export function sanitizeForError(value: unknown): unknown {
  return redactPII(stripSecrets(value, ""));
}

export class DbError extends Error {
  readonly code: DbErrorCode;
  readonly status: number;
  readonly context: unknown;

  constructor(
    code: DbErrorCode,
    message: string,
    options: { status?: number; context?: unknown; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "DbError";
    this.code = code;
    this.status = options.status ?? 500;
    this.context = options.context === undefined ? null : sanitizeForError(options.context);
  }

  toJSON(): { name: string; code: DbErrorCode; message: string; status: number; context: unknown } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      status: this.status,
      context: this.context,
    };
  }

  static fromUnknown(params: {
    code: DbErrorCode;
    message: string;
    error: unknown;
    status?: number;
    context?: unknown;
  }): DbError {
    if (params.error instanceof DbError) {
      return params.error;
    }
    return new DbError(params.code, params.message, {
      status: params.status,
      context: params.context,
      cause: params.error,
    });
  }
}

export function assertRequiredEnv(name: string, value: string | undefined | null): string {
  const normalized = typeof value === "string" ? value.trim() : "";
  if (!normalized) {
    throw new DbError(DB_ERROR_CODES.MISSING_ENV, `Missing required env var: ${name}`, {
      status: 500,
      context: { name },
    });
  }
  return normalized;
}

function stripSecrets(value: unknown, keyName: string): unknown {
  if (SECRET_KEY_PATTERN.test(keyName)) {
    return "[REDACTED]";
  }
  if (Array.isArray(value)) {
    return value.map((item) => stripSecrets(item, keyName));
  }
  if (value && typeof value === "object" && !(value instanceof Error)) {
    const output: Record<string, unknown> = {};
    for (const [childKey, childValue] of Object.entries(value)) {
      output[childKey] = stripSecrets(childValue, childKey);
    }
    return output;
  }
  return value;
}
