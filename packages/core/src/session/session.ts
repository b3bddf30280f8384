import {
  DEFAULT_MAX_STACK_DEPTH,
  unwindTo,
  type NavigationStack,
} from "./navigation-stack.ts";
import { ROOT_STATE, isConversationState, type ConversationState } from "./states.ts";

export const SUPPORTED_LANGUAGES = ["en", "hi", "gu", "ta", "te"] as const;
export type Language = (typeof SUPPORTED_LANGUAGES)[number];
export const DEFAULT_LANGUAGE: Language = "en";

export const MAX_PROCESSED_EVENT_IDS = 50;

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type SessionData = Readonly<Record<string, JsonValue>>;

export type Session = {
  user_id: string;
  state: ConversationState;
  language: Language;
  stack: NavigationStack;
  data: SessionData;
  version: number;
  last_active: string;
  processed_event_ids: readonly string[];
};

export type SessionChanges = {
  state?: ConversationState;
  language?: Language;
  stack?: NavigationStack;
  data?: SessionData;
};

const PERSISTENT_DATA_KEYS: ReadonlySet<string> = new Set([
  "gstin",
  "business_name",
  "client_segment",
  "gst_onboarded",
  "filing_mode",
  "turnover_band",
  "multi_gstin",
  "additional_gstins",
  "notification_prefs",
  "ca_handoff",
]);

const FLOW_DATA_PREFIXES = [
  "wizard_",
  "payment_",
  "gst_filing_",
  "itr_",
  "nil_",
  "upload_",
  "credit_check",
  "refund_",
  "after_gstin_state",
  "pending_gstin",
  "switch_",
  "pre_expiry_state",
] as const;

const LANGUAGE_SET: ReadonlySet<string> = new Set(SUPPORTED_LANGUAGES);

export function isLanguage(value: unknown): value is Language {
  return typeof value === "string" && LANGUAGE_SET.has(value);
}

export function createSession(userId: string, nowIso: string): Session {
  return {
    user_id: userId,
    state: ROOT_STATE,
    language: DEFAULT_LANGUAGE,
    stack: [],
    data: {},
    version: 0,
    last_active: nowIso,
    processed_event_ids: [],
  };
}

/**
 * Produces the next committed snapshot: one version bump, `last_active` refreshed, the
 * event id remembered for duplicate detection, and the stack unwound below the new state.
 */
export function advanceSession(
  session: Session,
  changes: SessionChanges,
  options: { nowIso: string; eventId?: string | null },
): Session {
  const state = changes.state ?? session.state;
  const stack = unwindTo(changes.stack ?? session.stack, state);

  return {
    ...session,
    state,
    stack,
    language: changes.language ?? session.language,
    data: changes.data ?? session.data,
    version: session.version + 1,
    last_active: options.nowIso,
    processed_event_ids: rememberEventId(session.processed_event_ids, options.eventId ?? null),
  };
}

export function hasProcessedEvent(session: Session, eventId: string): boolean {
  return session.processed_event_ids.includes(eventId);
}

/** Removes flow-scoped keys while keeping profile-level data such as the GSTIN. */
export function clearFlowData(data: SessionData): SessionData {
  const next: Record<string, JsonValue> = {};
  for (const [key, value] of Object.entries(data)) {
    if (PERSISTENT_DATA_KEYS.has(key)) {
      next[key] = value;
      continue;
    }
    if (FLOW_DATA_PREFIXES.some((prefix) => key.startsWith(prefix))) {
      continue;
    }
    next[key] = value;
  }
  return next;
}

export function withData(data: SessionData, patch: Record<string, JsonValue | undefined>): SessionData {
  const next: Record<string, JsonValue> = { ...data };
  for (const [key, value] of Object.entries(patch)) {
    if (value === undefined) {
      delete next[key];
      continue;
    }
    next[key] = value;
  }
  return next;
}

export function readDataString(data: SessionData, key: string): string | null {
  const value = data[key];
  return typeof value === "string" && value.trim().length > 0 ? value : null;
}

export function readDataNumber(data: SessionData, key: string): number | null {
  const value = data[key];
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

export function readDataRecord(data: SessionData, key: string): Readonly<Record<string, JsonValue>> | null {
  const value = data[key];
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    return null;
  }
  return value;
}

/**
 * Validates a stored snapshot. Unknown states (for example after a state was retired)
 * fall back to the root and are dropped from the stack.
 */
export function parseStoredSession(
  raw: unknown,
  options: { userId: string; maxStackDepth?: number },
): Session | null {
  if (!isRecord(raw)) {
    return null;
  }

  const version = raw.version;
  const lastActive = raw.last_active;
  if (typeof version !== "number" || !Number.isSafeInteger(version) || version < 0) {
    return null;
  }
  const state = isConversationState(raw.state) ? raw.state : ROOT_STATE;
  const maxDepth = options.maxStackDepth ?? DEFAULT_MAX_STACK_DEPTH;
  const storedStack = Array.isArray(raw.stack) ? raw.stack.filter(isConversationState) : [];
  const stack = unwindTo(
    storedStack.filter((entry) => entry !== ROOT_STATE).slice(-maxDepth),
    state,
  );

  return {
    user_id: options.userId,
    state,
    language: isLanguage(raw.language) ? raw.language : DEFAULT_LANGUAGE,
    stack,
    data: isJsonRecord(raw.data) ? raw.data : {},
    version,
    last_active: typeof lastActive === "string" && !Number.isNaN(Date.parse(lastActive))
      ? lastActive
      : new Date(0).toISOString(),
    processed_event_ids: Array.isArray(raw.processed_event_ids)
      ? raw.processed_event_ids
        .filter((entry): entry is string => typeof entry === "string")
        .slice(-MAX_PROCESSED_EVENT_IDS)
      : [],
  };
}

function rememberEventId(existing: readonly string[], eventId: string | null): readonly string[] {
  if (!eventId || existing.includes(eventId)) {
    return existing;
  }
  return [...existing, eventId].slice(-MAX_PROCESSED_EVENT_IDS);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function isJsonValue(value: unknown): value is JsonValue {
  if (value === null || typeof value === "string" || typeof value === "boolean") {
    return true;
  }
  if (typeof value === "number") {
    return Number.isFinite(value);
  }
  if (Array.isArray(value)) {
    return value.every(isJsonValue);
  }
  return isJsonRecord(value);
}

function isJsonRecord(value: unknown): value is Record<string, JsonValue> {
  return isRecord(value) && Object.values(value).every(isJsonValue);
}
