import type { OutboundPayload } from "../../core/src/conversation/types.ts";

export type OutboundStatus = "Queued" | "Sending" | "Delivered" | "RetryScheduled" | "DeadLettered";

export type OutboundMessage = {
  id: string;
  recipient: string;
  payload: OutboundPayload;
  attempt: number;
  next_retry_at: string;
  status: OutboundStatus;
  /** Enqueue order; dequeue always prefers the lowest value. */
  sequence: number;
  enqueued_at: string;
  last_error: string | null;
  replay_of: string | null;
  correlation_id: string | null;
};

export type DeadLetterReason = "max_retries_exceeded" | "permanent_failure" | "queue_overflow";

export const DEAD_LETTER_REASONS: readonly DeadLetterReason[] = [
  "max_retries_exceeded",
  "permanent_failure",
  "queue_overflow",
];

export type DeadLetterEntry = {
  readonly id: string;
  readonly message_id: string;
  readonly recipient: string;
  readonly payload: OutboundPayload;
  readonly failure_reason: DeadLetterReason;
  readonly last_error: string | null;
  readonly retry_count: number;
  readonly enqueued_at: string;
  readonly dead_lettered_at: string;
};

export type DeadLetterFilter = {
  recipient?: string | null;
  failure_reason?: DeadLetterReason | null;
  since?: string | null;
  until?: string | null;
  limit?: number | null;
};

export function isDeadLetterReason(value: unknown): value is DeadLetterReason {
  return typeof value === "string" && DEAD_LETTER_REASONS.some((reason) => reason === value);
}

/** Validates a payload read back from storage. */
export function parseOutboundPayload(raw: unknown): OutboundPayload | null {
  if (!isRecord(raw)) {
    return null;
  }
  switch (raw.kind) {
    case "text":
      return typeof raw.body === "string" ? { kind: "text", body: raw.body } : null;
    case "buttons": {
      if (typeof raw.body !== "string" || !Array.isArray(raw.buttons)) {
        return null;
      }
      const buttons = raw.buttons.flatMap((button) =>
        isRecord(button) && typeof button.id === "string" && typeof button.title === "string"
          ? [{ id: button.id, title: button.title }]
          : []
      );
      return buttons.length === raw.buttons.length ? { kind: "buttons", body: raw.body, buttons } : null;
    }
    case "media": {
      const mediaKind = raw.media_kind;
      if ((mediaKind !== "image" && mediaKind !== "document") || typeof raw.media_ref !== "string") {
        return null;
      }
      return {
        kind: "media",
        media_kind: mediaKind,
        media_ref: raw.media_ref,
        caption: typeof raw.caption === "string" ? raw.caption : null,
        filename: typeof raw.filename === "string" ? raw.filename : null,
      };
    }
    default:
      return null;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}
