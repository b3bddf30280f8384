const EMAIL_PATTERN = /\b[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}\b/gi;
const PHONE_PATTERN = /(?:\+?\d[\d().\-\s]{8,}\d)/g;
const GSTIN_PATTERN = /\b[0-9]{2}[A-Z]{5}[0-9]{4}[A-Z][1-9A-Z]Z[0-9A-Z]\b/gi;
const PAN_PATTERN = /\b[A-Z]{5}[0-9]{4}[A-Z]\b/gi;

const FORBIDDEN_MESSAGE_TEXT_KEY_PATTERN =
  /(^|[_-])(text|body|caption|raw_text|message_text|inbound_text|outbound_text|free_text|ca_query)$/i;
const FORBIDDEN_CREDENTIAL_KEY_PATTERN = /(access_token|app_secret|verify_token|authorization|api_key)$/i;

export const REDACTED_MESSAGE_TEXT = "[REDACTED_MESSAGE_TEXT]";
export const REDACTED_CREDENTIAL = "[REDACTED_CREDENTIAL]";

export function redactPII<T>(input: T): T;
export function redactPII(input: unknown): unknown {
  return redactValue(input, "", new WeakSet<object>());
}

function redactValue(input: unknown, keyName: string, seen: WeakSet<object>): unknown {
  if (input === null || input === undefined) {
    return input;
  }

  if (FORBIDDEN_CREDENTIAL_KEY_PATTERN.test(keyName)) {
    return REDACTED_CREDENTIAL;
  }
  if (FORBIDDEN_MESSAGE_TEXT_KEY_PATTERN.test(keyName) && typeof input === "string") {
    return REDACTED_MESSAGE_TEXT;
  }

  if (typeof input === "string") {
    return redactString(input);
  }

  if (typeof input !== "object") {
    return input;
  }

  if (input instanceof Error) {
    return input;
  }

  if (seen.has(input)) {
    return "[Circular]";
  }
  seen.add(input);

  if (Array.isArray(input)) {
    return input.map((value) => redactValue(value, keyName, seen));
  }

  const output: Record<string, unknown> = {};
  for (const [childKey, childValue] of Object.entries(input)) {
    output[childKey] = redactValue(childValue, childKey, seen);
  }
  return output;
}

function redactString(input: string): string {
  let redacted = input.replace(EMAIL_PATTERN, "[REDACTED_EMAIL]");
  redacted = redacted.replace(GSTIN_PATTERN, "[REDACTED_GSTIN]");
  redacted = redacted.replace(PAN_PATTERN, "[REDACTED_PAN]");
  redacted = redacted.replace(PHONE_PATTERN, (candidate) => {
    const digits = candidate.replace(/\D/g, "");
    if (digits.length < 10 || digits.length > 15) {
      return candidate;
    }
    return "[REDACTED_PHONE]";
  });
  return redacted;
}
