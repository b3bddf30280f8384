import type { LogLevel } from "./logger.ts";

export type SentryContext = {
  correlation_id?: string | null;
  user_id?: string | null;
  category?: string | null;
  tags?: Record<string, string | number | boolean | null | undefined>;
};

export type SentryCaptureInput = {
  level?: LogLevel;
  event?: string;
  context?: SentryContext;
  payload?: Record<string, unknown>;
};

export type SentrySpanOptions = {
  name: string;
  op?: string;
  attributes?: Record<string, unknown>;
};

export type SentryBridge = {
  captureException: (error: unknown, input?: SentryCaptureInput) => void;
  captureMessage: (message: string, input?: SentryCaptureInput) => void;
  startSpan: <T>(options: SentrySpanOptions, callback: () => T) => T;
  withScope: <T>(context: SentryContext, callback: () => T) => T;
};

const SENTRY_BRIDGE_KEY = Symbol.for("conversation_engine.observability.sentry_bridge");

type RuntimeGlobal = typeof globalThis & {
  [SENTRY_BRIDGE_KEY]?: SentryBridge | null;
};

const runtime: RuntimeGlobal = globalThis;

export function registerSentryBridge(bridge: SentryBridge | null): void {
  runtime[SENTRY_BRIDGE_KEY] = bridge;
}

export function getSentryBridge(): SentryBridge | null {
  return runtime[SENTRY_BRIDGE_KEY] ?? null;
}

export function withSentryContext<T>(
  context: SentryContext,
  callback: () => T,
): T {
  const bridge = getSentryBridge();
  if (!bridge) {
    return callback();
  }

  try {
    return bridge.withScope(context, callback);
  } catch {
    return callback();
  }
}

export function startSentrySpan<T>(
  options: SentrySpanOptions,
  callback: () => T,
): T {
  const bridge = getSentryBridge();
  if (!bridge) {
    return callback();
  }

  try {
    return bridge.startSpan(options, callback);
  } catch {
    return callback();
  }
}

export function captureSentryException(
  error: unknown,
  input?: SentryCaptureInput,
): void {
  const bridge = getSentryBridge();
  if (!bridge) {
    return;
  }

  try {
    bridge.captureException(error, input);
  } catch {
    // Sentry is best-effort; observability must never break request handling.
  }
}

export function captureSentryMessage(
  message: string,
  input?: SentryCaptureInput,
): void {
  const bridge = getSentryBridge();
  if (!bridge) {
    return;
  }

  try {
    bridge.captureMessage(message, input);
  } catch {
    // no-op
  }
}

export function captureSentryFromStructuredLog(logEvent: {
  level: LogLevel;
  event: string;
  category: string;
  correlation_id: string | null;
  user_id: string | null;
  payload: Record<string, unknown>;
}): void {
  if (logEvent.level !== "error" && logEvent.level !== "fatal") {
    return;
  }

  const input: SentryCaptureInput = {
    level: logEvent.level,
    event: logEvent.event,
    context: {
      category: logEvent.category,
      correlation_id: logEvent.correlation_id,
      user_id: logEvent.user_id,
    },
    payload: logEvent.payload,
  };

  const payloadError = logEvent.payload.error;
  if (payloadError instanceof Error) {
    captureSentryException(payloadError, input);
    return;
  }

  const errorMessage = readString(logEvent.payload.error_message);
  if (errorMessage) {
    const syntheticError = new Error(errorMessage);
    syntheticError.name = readString(logEvent.payload.error_name) ?? "StructuredLogError";
    captureSentryException(syntheticError, input);
    return;
  }

  captureSentryMessage(`structured_log.${logEvent.event}`, input);
}

function readString(value: unknown): string | null {
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}
