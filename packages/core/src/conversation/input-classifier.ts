import type { ClassifiedInput, InboundEvent } from "./types.ts";

const CONFIRM_WORDS: ReadonlySet<string> = new Set(["yes", "y", "haan", "ha", "ok", "confirm", "हाँ", "हां"]);
const DENY_WORDS: ReadonlySet<string> = new Set(["no", "n", "nahi", "nahin", "cancel", "नहीं"]);
const MENU_CHOICE_PATTERN = /^\d{1,2}$/;

export function classifyInput(event: InboundEvent): ClassifiedInput {
  if ((event.type === "image" || event.type === "document") && event.media_ref) {
    return {
      kind: "media",
      media_kind: event.type,
      media_ref: event.media_ref,
      caption: normalizeText(event.text),
    };
  }

  const text = normalizeText(event.text);
  if (text === null) {
    return { kind: "empty" };
  }

  const lowered = text.toLowerCase();
  if (MENU_CHOICE_PATTERN.test(lowered)) {
    return { kind: "menu_choice", choice: Number.parseInt(lowered, 10), raw: text };
  }
  if (CONFIRM_WORDS.has(lowered)) {
    return { kind: "confirmation", confirmed: true, raw: text };
  }
  if (DENY_WORDS.has(lowered)) {
    return { kind: "confirmation", confirmed: false, raw: text };
  }
  return { kind: "free_text", text };
}

/** The typed text behind any textual input; null for media and empty messages. */
export function inputText(input: ClassifiedInput): string | null {
  switch (input.kind) {
    case "menu_choice":
    case "confirmation":
      return input.raw;
    case "free_text":
      return input.text;
    default:
      return null;
  }
}

function normalizeText(value: string | null): string | null {
  if (value === null) {
    return null;
  }
  const normalized = value.trim().replace(/\s+/g, " ");
  return normalized.length > 0 ? normalized : null;
}
