import {
  normalizeOptionalString,
  readOptionalEnv,
  type EnvReader,
} from "../../core/src/config/env.ts";
import type { OutboundPayload, ReplyButton } from "../../core/src/conversation/types.ts";

const DEFAULT_TIMEOUT_MS = 6000;
const DEFAULT_GRAPH_API_VERSION = "v20.0";
const GRAPH_API_BASE_URL = "https://graph.facebook.com";
const MAX_REPLY_BUTTONS = 3;
const MAX_BUTTON_TITLE_LENGTH = 20;

// Cloud API error codes that mean "slow down", not "this message is bad".
const THROTTLING_ERROR_CODES: ReadonlySet<number> = new Set([4, 80007, 130429, 131048, 131056]);

export type WhatsAppClientErrorCode = "CONFIG" | "AUTH" | "REQUEST" | "TIMEOUT" | "RESPONSE";

export type WhatsAppClientConfig = {
  accessToken: string;
  phoneNumberId: string;
  graphApiVersion?: string;
  baseUrl?: string;
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
};

export type WhatsAppSendResult = {
  messageId: string;
  recipientWaId: string | null;
};

export type WhatsAppMediaInput = {
  to: string;
  mediaKind: "image" | "document";
  mediaRef: string;
  caption?: string | null;
  filename?: string | null;
};

export type WhatsAppClient = {
  sendText: (input: { to: string; body: string }) => Promise<WhatsAppSendResult>;
  sendMedia: (input: WhatsAppMediaInput) => Promise<WhatsAppSendResult>;
  sendButtons: (input: {
    to: string;
    body: string;
    buttons: readonly ReplyButton[];
  }) => Promise<WhatsAppSendResult>;
  sendPayload: (to: string, payload: OutboundPayload) => Promise<WhatsAppSendResult>;
};

export class WhatsAppClientError extends Error {
  readonly code: WhatsAppClientErrorCode;
  readonly statusCode: number | null;
  readonly retryable: boolean;
  readonly retryAfterMs: number | null;
  readonly gatewayErrorCode: number | null;

  constructor(input: {
    code: WhatsAppClientErrorCode;
    message: string;
    statusCode?: number | null;
    retryable?: boolean;
    retryAfterMs?: number | null;
    gatewayErrorCode?: number | null;
    cause?: unknown;
  }) {
    super(input.message, { cause: input.cause });
    this.name = "WhatsAppClientError";
    this.code = input.code;
    this.statusCode = input.statusCode ?? null;
    this.retryable = Boolean(input.retryable);
    this.retryAfterMs = input.retryAfterMs ?? null;
    this.gatewayErrorCode = input.gatewayErrorCode ?? null;
  }
}

export function createWhatsAppClient(config: WhatsAppClientConfig): WhatsAppClient {
  const accessToken = normalizeRequiredString("WHATSAPP_ACCESS_TOKEN", config.accessToken);
  const phoneNumberId = normalizeRequiredString("WHATSAPP_PHONE_NUMBER_ID", config.phoneNumberId);
  const graphApiVersion = normalizeOptionalString(config.graphApiVersion) ?? DEFAULT_GRAPH_API_VERSION;
  const baseUrl = (normalizeOptionalString(config.baseUrl) ?? GRAPH_API_BASE_URL).replace(/\/+$/, "");

  const fetchImpl = config.fetchImpl ?? globalThis.fetch;
  if (typeof fetchImpl !== "function") {
    throw new WhatsAppClientError({
      code: "CONFIG",
      message: "Fetch implementation is required to create WhatsApp client.",
    });
  }

  const timeoutMs = config.timeoutMs !== undefined && Number.isFinite(config.timeoutMs)
    ? Math.max(1, Math.trunc(config.timeoutMs))
    : DEFAULT_TIMEOUT_MS;
  const endpoint = `${baseUrl}/${encodeURIComponent(graphApiVersion)}/${encodeURIComponent(phoneNumberId)}/messages`;

  const post = async (to: string, message: Record<string, unknown>): Promise<WhatsAppSendResult> => {
    const recipient = normalizeRecipient(to);
    const response = await fetchWithTimeout(
      fetchImpl,
      endpoint,
      {
        method: "POST",
        headers: {
          Authorization: `Bearer ${accessToken}`,
          "content-type": "application/json",
        },
        body: JSON.stringify({
          messaging_product: "whatsapp",
          recipient_type: "individual",
          to: recipient,
          ...message,
        }),
      },
      timeoutMs,
    );

    const json: unknown = await response.json().catch(() => null);
    if (!response.ok) {
      throw buildWhatsAppResponseError(response, json);
    }

    const messageId = readFirstId(json, "messages");
    if (!messageId) {
      throw new WhatsAppClientError({
        code: "RESPONSE",
        message: "WhatsApp response missing message id.",
        statusCode: response.status,
      });
    }
    return { messageId, recipientWaId: readFirstWaId(json) };
  };

  const sendText: WhatsAppClient["sendText"] = async (input) =>
    post(input.to, {
      type: "text",
      text: { body: normalizeRequiredString("body", input.body), preview_url: false },
    });

  const sendMedia: WhatsAppClient["sendMedia"] = async (input) => {
    const mediaRef = normalizeRequiredString("mediaRef", input.mediaRef);
    const media: Record<string, string> = isHttpUrl(mediaRef) ? { link: mediaRef } : { id: mediaRef };
    const caption = normalizeOptionalString(input.caption);
    if (caption) {
      media.caption = caption;
    }
    const filename = normalizeOptionalString(input.filename);
    if (filename && input.mediaKind === "document") {
      media.filename = filename;
    }
    return post(input.to, { type: input.mediaKind, [input.mediaKind]: media });
  };

  const sendButtons: WhatsAppClient["sendButtons"] = async (input) => {
    if (input.buttons.length === 0 || input.buttons.length > MAX_REPLY_BUTTONS) {
      throw new WhatsAppClientError({
        code: "REQUEST",
        message: `Reply buttons must number between 1 and ${MAX_REPLY_BUTTONS}.`,
      });
    }
    return post(input.to, {
      type: "interactive",
      interactive: {
        type: "button",
        body: { text: normalizeRequiredString("body", input.body) },
        action: {
          buttons: input.buttons.map((button) => ({
            type: "reply",
            reply: {
              id: normalizeRequiredString("button id", button.id),
              title: normalizeRequiredString("button title", button.title).slice(0, MAX_BUTTON_TITLE_LENGTH),
            },
          })),
        },
      },
    });
  };

  return {
    sendText,
    sendMedia,
    sendButtons,
    sendPayload: (to, payload) => {
      switch (payload.kind) {
        case "text":
          return sendText({ to, body: payload.body });
        case "buttons":
          return sendButtons({ to, body: payload.body, buttons: payload.buttons });
        case "media":
          return sendMedia({
            to,
            mediaKind: payload.media_kind,
            mediaRef: payload.media_ref,
            caption: payload.caption,
            filename: payload.filename,
          });
      }
    },
  };
}

export function createWhatsAppClientFromEnv(input: {
  getEnv: EnvReader;
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
}): WhatsAppClient {
  if (typeof input.getEnv !== "function") {
    throw new WhatsAppClientError({
      code: "CONFIG",
      message: "getEnv must be provided to create WhatsApp client from env.",
    });
  }

  return createWhatsAppClient({
    accessToken: readRequiredClientEnv(input.getEnv, "WHATSAPP_ACCESS_TOKEN"),
    phoneNumberId: readRequiredClientEnv(input.getEnv, "WHATSAPP_PHONE_NUMBER_ID"),
    graphApiVersion: readOptionalEnv(input.getEnv, "WHATSAPP_GRAPH_API_VERSION") ?? undefined,
    fetchImpl: input.fetchImpl,
    timeoutMs: input.timeoutMs,
  });
}

export function isTransientWhatsAppError(error: unknown): boolean {
  if (error instanceof WhatsAppClientError) {
    return error.retryable;
  }
  return false;
}

export function getWhatsAppErrorStatusCode(error: unknown): number | null {
  if (error instanceof WhatsAppClientError) {
    return error.statusCode;
  }
  return null;
}

/** Parses a Retry-After header given either in seconds or as an HTTP date. */
export function parseRetryAfterMs(value: string | null, nowMs: number = Date.now()): number | null {
  const normalized = normalizeOptionalString(value);
  if (!normalized) {
    return null;
  }
  if (/^\d+$/.test(normalized)) {
    return Number.parseInt(normalized, 10) * 1000;
  }
  const dateMs = Date.parse(normalized);
  if (Number.isNaN(dateMs)) {
    return null;
  }
  return Math.max(0, dateMs - nowMs);
}

function normalizeRequiredString(name: string, value: string): string {
  const normalized = value.trim();
  if (!normalized) {
    throw new WhatsAppClientError({
      code: "CONFIG",
      message: `${name} is required.`,
    });
  }
  return normalized;
}

function normalizeRecipient(value: string): string {
  const digits = normalizeRequiredString("to", value).replace(/^\+/, "");
  if (!/^\d{6,15}$/.test(digits)) {
    throw new WhatsAppClientError({
      code: "REQUEST",
      message: "Recipient must be a WhatsApp id (digits only, country code first).",
    });
  }
  return digits;
}

async function fetchWithTimeout(
  fetchImpl: typeof fetch,
  url: string,
  init: RequestInit,
  timeoutMs: number,
): Promise<Response> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => {
    controller.abort("whatsapp_timeout");
  }, timeoutMs);

  try {
    return await fetchImpl(url, {
      ...init,
      signal: controller.signal,
    });
  } catch (error) {
    if (isAbortError(error) || controller.signal.aborted) {
      throw new WhatsAppClientError({
        code: "TIMEOUT",
        message: "WhatsApp request timed out.",
        retryable: true,
        cause: error,
      });
    }

    throw new WhatsAppClientError({
      code: "REQUEST",
      message: "WhatsApp request failed.",
      retryable: true,
      cause: error,
    });
  } finally {
    clearTimeout(timeoutId);
  }
}

function buildWhatsAppResponseError(response: Response, payload: unknown): WhatsAppClientError {
  const statusCode = response.status;
  const error = readRecord(payload, "error");
  const gatewayErrorCode = readNumber(error, "code");
  const errorMessage = readString(error, "message") ?? "WhatsApp API request failed.";
  const throttled = statusCode === 429 ||
    (gatewayErrorCode !== null && THROTTLING_ERROR_CODES.has(gatewayErrorCode));

  return new WhatsAppClientError({
    code: statusCode === 401 ? "AUTH" : "RESPONSE",
    message: gatewayErrorCode !== null ? `${errorMessage} (code=${gatewayErrorCode})` : errorMessage,
    statusCode,
    retryable: throttled || (statusCode >= 500 && statusCode < 600),
    retryAfterMs: parseRetryAfterMs(response.headers.get("retry-after")),
    gatewayErrorCode,
  });
}

function readRecord(payload: unknown, key: string): Record<string, unknown> | null {
  if (!isRecord(payload)) {
    return null;
  }
  const value = payload[key];
  return isRecord(value) ? value : null;
}

function readString(payload: unknown, key: string): string | null {
  if (!isRecord(payload)) {
    return null;
  }
  const value = payload[key];
  return typeof value === "string" && value.trim().length > 0 ? value : null;
}

function readNumber(payload: unknown, key: string): number | null {
  if (!isRecord(payload)) {
    return null;
  }
  const value = payload[key];
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function readFirstId(payload: unknown, key: string): string | null {
  if (!isRecord(payload)) {
    return null;
  }
  const list = payload[key];
  return Array.isArray(list) ? readString(list[0], "id") : null;
}

function readFirstWaId(payload: unknown): string | null {
  if (!isRecord(payload)) {
    return null;
  }
  const contacts = payload.contacts;
  return Array.isArray(contacts) ? readString(contacts[0], "wa_id") : null;
}

function readRequiredClientEnv(getEnv: EnvReader, name: string): string {
  const value = readOptionalEnv(getEnv, name);
  if (!value) {
    throw new WhatsAppClientError({
      code: "CONFIG",
      message: `Missing required env var: ${name}`,
    });
  }
  return value;
}

function isHttpUrl(value: string): boolean {
  return /^https?:\/\//i.test(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error &&
    (error.name === "AbortError" || error.message === "The operation was aborted.");
}
