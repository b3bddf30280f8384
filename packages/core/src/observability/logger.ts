import {
  EVENT_CATALOG_BY_NAME,
  type CanonicalEventName,
  type EventCatalogEntry,
} from "./event-catalog.ts";
import { emitMetricBestEffort } from "./metrics.ts";
import { redactPII } from "./redaction.ts";
import { detectRuntimeEnv, normalizeRuntimeEnv } from "./runtime-env.ts";
import { captureSentryFromStructuredLog } from "./sentry.ts";

export type LogLevel = "debug" | "info" | "warn" | "error" | "fatal";

export type StructuredLogEventInput = {
  event: CanonicalEventName | string;
  user_id?: string | null;
  correlation_id?: string | null;
  payload: Record<string, unknown>;
  level?: LogLevel;
};

export type StructuredLogEvent = {
  ts: string;
  level: LogLevel;
  event: string;
  category: string;
  env: string;
  correlation_id: string | null;
  user_id: string | null;
  payload: Record<string, unknown>;
};

export type LoggerContext = {
  env?: string;
  correlation_id?: string | null;
  user_id?: string | null;
};

export type StructuredLogger = (input: StructuredLogEventInput) => StructuredLogEvent;

export function isKnownEventName(event: string): event is CanonicalEventName {
  return Object.prototype.hasOwnProperty.call(EVENT_CATALOG_BY_NAME, event);
}

export function createLogger(context: LoggerContext = {}): StructuredLogger {
  return (input) => logEvent({
    ...input,
    correlation_id: normalizeString(input.correlation_id) ??
      normalizeString(context.correlation_id) ??
      null,
    user_id: normalizeString(input.user_id) ?? normalizeString(context.user_id) ?? null,
  }, context.env);
}

export function logEvent(input: StructuredLogEventInput, explicitEnv?: string): StructuredLogEvent {
  const eventDef = resolveEventDefinition(input.event);
  const payload = ensurePayloadObject(input.payload);
  assertRequiredFields(eventDef, payload);

  const redactedPayload = redactPII(payload);
  const correlationId = normalizeString(input.correlation_id) ??
    normalizeString(redactedPayload.correlation_id) ??
    null;

  const event: StructuredLogEvent = {
    ts: new Date().toISOString(),
    level: input.level ?? "info",
    event: eventDef.event_name,
    category: eventDef.category,
    env: explicitEnv ? normalizeRuntimeEnv(explicitEnv) : detectRuntimeEnv(),
    correlation_id: correlationId,
    user_id: normalizeString(input.user_id),
    payload: redactedPayload,
  };

  emitDerivedMetricsFromLog(event);
  console.info(JSON.stringify(event));
  captureSentryFromStructuredLog(event);
  return event;
}
export { redactPII } from "./redaction.ts";

function resolveEventDefinition(event: string): EventCatalogEntry {
  const normalized = event.trim();
  if (!isKnownEventName(normalized)) {
    throw new Error(`Unknown structured log event: '${event}'.`);
  }
  return EVENT_CATALOG_BY_NAME[normalized];
}

function ensurePayloadObject(payload: Record<string, unknown>): Record<string, unknown> {
  if (!payload || typeof payload !== "object" || Array.isArray(payload)) {
    throw new Error("Structured log payload must be an object.");
  }
  return payload;
}

function assertRequiredFields(
  eventDef: EventCatalogEntry,
  payload: Record<string, unknown>,
): void {
  for (const requiredField of eventDef.required_fields) {
    if (isPresent(payload[requiredField])) {
      continue;
    }
    throw new Error(
      `Missing required field '${requiredField}' for log event '${eventDef.event_name}'.`,
    );
  }
}

function isPresent(value: unknown): boolean {
  if (value === null || value === undefined) {
    return false;
  }
  if (typeof value === "string") {
    return value.trim().length > 0;
  }
  return true;
}

function normalizeString(value: unknown): string | null {
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function emitDerivedMetricsFromLog(event: StructuredLogEvent): void {
  const payload = event.payload;
  switch (event.event) {
    case "system.unhandled_error":
      emitMetricBestEffort({
        metric: "system.error.count",
        value: 1,
        correlation_id: event.correlation_id,
        tags: {
          component: "structured_logger",
          phase: safeTagValue(payload.phase) ?? "unknown",
          error_name: safeTagValue(payload.error_name) ?? "Error",
        },
      });
      return;

    case "conversation.command_intercepted":
      emitMetricBestEffort({
        metric: "conversation.command.count",
        value: 1,
        correlation_id: event.correlation_id,
        tags: {
          component: "global_command_interceptor",
          command: safeTagValue(payload.command) ?? "unknown",
        },
      });
      return;

    case "conversation.concurrency_conflict":
      emitMetricBestEffort({
        metric: "conversation.concurrency.conflict",
        value: 1,
        correlation_id: event.correlation_id,
        tags: { component: "conversation_engine" },
      });
      return;

    case "outbound.rate_limited":
      emitMetricBestEffort({
        metric: "outbound.rate_limit.deferred",
        value: 1,
        correlation_id: event.correlation_id,
        tags: {
          component: "delivery_pipeline",
          limiter: safeTagValue(payload.limiter) ?? "unknown",
        },
      });
      return;

    case "outbound.delivered":
      emitMetricBestEffort({
        metric: "outbound.message.delivered",
        value: 1,
        correlation_id: event.correlation_id,
        tags: {
          component: "delivery_pipeline",
          payload_kind: safeTagValue(payload.payload_kind) ?? "unknown",
        },
      });
      return;

    case "outbound.retry_scheduled":
      emitMetricBestEffort({
        metric: "outbound.message.retried",
        value: 1,
        correlation_id: event.correlation_id,
        tags: {
          component: "delivery_pipeline",
          attempt: safeTagValue(payload.attempt) ?? "unknown",
        },
      });
      return;

    case "outbound.dead_lettered":
      emitMetricBestEffort({
        metric: "outbound.message.dead_lettered",
        value: 1,
        correlation_id: event.correlation_id,
        tags: {
          component: "delivery_pipeline",
          failure_reason: safeTagValue(payload.failure_reason) ?? "unknown",
        },
      });
      return;

    default:
      return;
  }
}

function safeTagValue(value: unknown): string | null {
  if (typeof value === "string") {
    const normalized = value.trim();
    return normalized.length > 0 ? normalized : null;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  if (typeof value === "boolean") {
    return value ? "true" : "false";
  }
  return null;
}
