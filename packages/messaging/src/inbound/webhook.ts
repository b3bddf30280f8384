import { createHmac, timingSafeEqual } from "node:crypto";
import type { InboundEvent } from "../../../core/src/conversation/types.ts";

export const SIGNATURE_HEADER = "x-hub-signature-256";
const SIGNATURE_PREFIX = "sha256=";

export type SignatureCheck =
  | { ok: true }
  | { ok: false; reason: "missing_signature" | "malformed_signature" | "signature_mismatch" };

export type VerificationCheck =
  | { ok: true; challenge: string }
  | { ok: false; reason: "invalid_mode" | "token_mismatch" | "missing_challenge" };

export type UnsupportedMessage = {
  message_type: string;
  sender_id: string | null;
  gateway_message_id: string | null;
};

export type NormalizedWebhook = {
  events: InboundEvent[];
  unsupported: UnsupportedMessage[];
  status_updates: number;
};

/** HMAC-SHA256 of the raw request body with the app secret, as sent in X-Hub-Signature-256. */
export function computeWebhookSignature(appSecret: string, rawBody: string): string {
  return `${SIGNATURE_PREFIX}${createHmac("sha256", appSecret).update(rawBody, "utf8").digest("hex")}`;
}

export function verifyWebhookSignature(input: {
  appSecret: string;
  rawBody: string;
  signatureHeader: string | null;
}): SignatureCheck {
  const header = input.signatureHeader?.trim() ?? "";
  if (!header) {
    return { ok: false, reason: "missing_signature" };
  }
  if (!header.startsWith(SIGNATURE_PREFIX) || !/^[0-9a-f]{64}$/i.test(header.slice(SIGNATURE_PREFIX.length))) {
    return { ok: false, reason: "malformed_signature" };
  }

  const expected = Buffer.from(computeWebhookSignature(input.appSecret, input.rawBody), "utf8");
  const received = Buffer.from(header.toLowerCase(), "utf8");
  if (expected.length !== received.length || !timingSafeEqual(expected, received)) {
    return { ok: false, reason: "signature_mismatch" };
  }
  return { ok: true };
}

/** Subscription handshake: `hub.mode=subscribe` with the configured verify token. */
export function verifySubscriptionChallenge(params: URLSearchParams, verifyToken: string): VerificationCheck {
  if (params.get("hub.mode") !== "subscribe") {
    return { ok: false, reason: "invalid_mode" };
  }
  if (params.get("hub.verify_token") !== verifyToken) {
    return { ok: false, reason: "token_mismatch" };
  }
  const challenge = params.get("hub.challenge");
  if (!challenge) {
    return { ok: false, reason: "missing_challenge" };
  }
  return { ok: true, challenge };
}

/**
 * Flattens `entry[].changes[].value.messages[]` into inbound events. Delivery status
 * callbacks are counted and otherwise ignored.
 */
export function normalizeWebhookPayload(raw: unknown): NormalizedWebhook {
  const result: NormalizedWebhook = { events: [], unsupported: [], status_updates: 0 };

  for (const entry of readArray(raw, "entry")) {
    for (const change of readArray(entry, "changes")) {
      const value = isRecord(change) ? change.value : null;
      result.status_updates += readArray(value, "statuses").length;

      for (const message of readArray(value, "messages")) {
        const event = normalizeMessage(message);
        if (event) {
          result.events.push(event);
          continue;
        }
        result.unsupported.push({
          message_type: readString(message, "type") ?? "unknown",
          sender_id: readString(message, "from"),
          gateway_message_id: readString(message, "id"),
        });
      }
    }
  }
  return result;
}

function normalizeMessage(message: unknown): InboundEvent | null {
  const senderId = readString(message, "from");
  const type = readString(message, "type");
  if (!senderId || !type || !isRecord(message)) {
    return null;
  }

  const base = {
    sender_id: senderId,
    timestamp: toIsoTimestamp(readString(message, "timestamp")),
    gateway_message_id: readString(message, "id"),
  };

  switch (type) {
    case "text":
      return {
        ...base,
        type: "text",
        text: readString(message.text, "body"),
        media_ref: null,
        media_mime_type: null,
      };

    case "image":
    case "document": {
      const media = message[type];
      const mediaRef = readString(media, "id") ?? readString(media, "link");
      if (!mediaRef) {
        return null;
      }
      return {
        ...base,
        type,
        text: readString(media, "caption"),
        media_ref: mediaRef,
        media_mime_type: readString(media, "mime_type"),
      };
    }

    case "interactive": {
      const interactive = message.interactive;
      const reply = isRecord(interactive)
        ? interactive.button_reply ?? interactive.list_reply
        : null;
      const replyId = readString(reply, "id");
      if (!replyId) {
        return null;
      }
      return { ...base, type: "interactive_reply", text: replyId, media_ref: null, media_mime_type: null };
    }

    case "button": {
      const payload = readString(message.button, "payload") ?? readString(message.button, "text");
      if (!payload) {
        return null;
      }
      return { ...base, type: "interactive_reply", text: payload, media_ref: null, media_mime_type: null };
    }

    default:
      return null;
  }
}

function toIsoTimestamp(seconds: string | null): string {
  if (seconds && /^\d+$/.test(seconds)) {
    return new Date(Number.parseInt(seconds, 10) * 1000).toISOString();
  }
  return new Date().toISOString();
}

function readArray(value: unknown, key: string): unknown[] {
  if (!isRecord(value)) {
    return [];
  }
  const list = value[key];
  return Array.isArray(list) ? list : [];
}

function readString(value: unknown, key: string): string | null {
  if (!isRecord(value)) {
    return null;
  }
  const candidate = value[key];
  if (typeof candidate === "number" && Number.isFinite(candidate)) {
    return String(candidate);
  }
  return typeof candidate === "string" && candidate.trim().length > 0 ? candidate.trim() : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}
