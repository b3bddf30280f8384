export type EventCategory =
  | "conversation"
  | "session"
  | "outbound"
  | "webhook"
  | "operator"
  | "system";

export type EventCatalogEntry = {
  event_name: string;
  category: EventCategory;
  description: string;
  required_fields: readonly string[];
};

export const EVENT_CATALOG = [
  {
    event_name: "conversation.inbound_received",
    category: "conversation",
    description: "Normalized inbound event accepted for processing.",
    required_fields: ["event_type", "idempotency_key"],
  },
  {
    event_name: "conversation.duplicate_ignored",
    category: "conversation",
    description: "Inbound event already applied to the session; acknowledged without effects.",
    required_fields: ["idempotency_key"],
  },
  {
    event_name: "conversation.command_intercepted",
    category: "conversation",
    description: "Global command token matched before handler dispatch.",
    required_fields: ["command", "previous_state", "next_state"],
  },
  {
    event_name: "conversation.handler_dispatched",
    category: "conversation",
    description: "A handler chain module produced the transition for an event.",
    required_fields: ["handler", "state"],
  },
  {
    event_name: "conversation.state_transition",
    category: "conversation",
    description: "Session state committed after an inbound event.",
    required_fields: ["previous_state", "next_state", "reason", "version"],
  },
  {
    event_name: "conversation.fallback_unrecognized",
    category: "conversation",
    description: "No handler or table rule matched; current prompt re-rendered.",
    required_fields: ["state", "input_kind"],
  },
  {
    event_name: "conversation.validation_rejected",
    category: "conversation",
    description: "User input failed validation; re-prompted without state change.",
    required_fields: ["state", "reason"],
  },
  {
    event_name: "conversation.domain_service_failed",
    category: "conversation",
    description: "Domain service facade failed; transition aborted.",
    required_fields: ["state", "service", "operation"],
  },
  {
    event_name: "conversation.concurrency_conflict",
    category: "conversation",
    description: "Session version changed under a transition; event retried on fresh session.",
    required_fields: ["attempt", "expected_version"],
  },
  {
    event_name: "session.created",
    category: "session",
    description: "Session initialized for a previously unseen user.",
    required_fields: ["state"],
  },
  {
    event_name: "session.stack_push_rejected",
    category: "session",
    description: "Navigation stack push rejected at the configured depth.",
    required_fields: ["state", "depth", "max_depth"],
  },
  {
    event_name: "session.resume_prompted",
    category: "session",
    description: "Idle session asked to resume, start over or return to the main menu.",
    required_fields: ["paused_state", "idle_ms"],
  },
  {
    event_name: "outbound.enqueued",
    category: "outbound",
    description: "Outbound message accepted by the delivery queue.",
    required_fields: ["message_id", "payload_kind"],
  },
  {
    event_name: "outbound.rate_limited",
    category: "outbound",
    description: "Send deferred until rate-limit capacity is available.",
    required_fields: ["message_id", "limiter", "next_retry_at"],
  },
  {
    event_name: "outbound.delivered",
    category: "outbound",
    description: "Gateway accepted the outbound message.",
    required_fields: ["message_id", "attempt"],
  },
  {
    event_name: "outbound.retry_scheduled",
    category: "outbound",
    description: "Transient send failure scheduled for retry with backoff.",
    required_fields: ["message_id", "attempt", "next_retry_at"],
  },
  {
    event_name: "outbound.dead_lettered",
    category: "outbound",
    description: "Outbound message moved to the dead-letter store.",
    required_fields: ["message_id", "dead_letter_id", "failure_reason", "retry_count"],
  },
  {
    event_name: "outbound.queue_overflow",
    category: "outbound",
    description: "Delivery queue at capacity; message dead-lettered on arrival.",
    required_fields: ["message_id", "capacity"],
  },
  {
    event_name: "outbound.dead_letters_purged",
    category: "outbound",
    description: "Dead-letter entries removed after the retention period.",
    required_fields: ["purged_count", "cutoff"],
  },
  {
    event_name: "operator.dead_letter_replayed",
    category: "operator",
    description: "Operator replayed a dead-lettered message as a fresh outbound message.",
    required_fields: ["dead_letter_id", "message_id"],
  },
  {
    event_name: "webhook.signature_rejected",
    category: "webhook",
    description: "Inbound webhook rejected due to a missing or invalid signature.",
    required_fields: ["reason"],
  },
  {
    event_name: "webhook.unsupported_message",
    category: "webhook",
    description: "Inbound gateway message type not handled by the engine.",
    required_fields: ["message_type"],
  },
  {
    event_name: "system.unhandled_error",
    category: "system",
    description: "Unhandled runtime error captured at a request or worker boundary.",
    required_fields: ["phase", "error_name", "error_message"],
  },
  {
    event_name: "system.request_rejected",
    category: "system",
    description: "HTTP request refused by the server adapter before reaching a handler.",
    required_fields: ["reason", "limit_bytes"],
  },
  {
    event_name: "system.config_error",
    category: "system",
    description: "Runtime configuration rejected at startup.",
    required_fields: ["error_message"],
  },
] as const satisfies readonly EventCatalogEntry[];

export type CanonicalEventName = (typeof EVENT_CATALOG)[number]["event_name"];

export const EVENT_CATALOG_BY_NAME: Readonly<Record<string, EventCatalogEntry>> = Object.freeze(
  Object.fromEntries(EVENT_CATALOG.map((entry) => [entry.event_name, entry])),
);
