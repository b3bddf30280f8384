import type { DomainServices } from "../facades/types.ts";
import type { Language, Session, SessionData } from "../session/session.ts";
import type { ConversationState } from "../session/states.ts";

export type InboundEventType = "text" | "image" | "document" | "interactive_reply";

export type InboundEvent = {
  sender_id: string;
  type: InboundEventType;
  text: string | null;
  media_ref: string | null;
  media_mime_type: string | null;
  timestamp: string;
  gateway_message_id: string | null;
};

export type ReplyButton = {
  id: string;
  title: string;
};

export type OutboundPayload =
  | { kind: "text"; body: string }
  | { kind: "buttons"; body: string; buttons: readonly ReplyButton[] }
  | {
    kind: "media";
    media_kind: "image" | "document";
    media_ref: string;
    caption: string | null;
    filename: string | null;
  };

export type ClassifiedInput =
  | { kind: "menu_choice"; choice: number; raw: string }
  | { kind: "confirmation"; confirmed: boolean; raw: string }
  | { kind: "free_text"; text: string }
  | {
    kind: "media";
    media_kind: "image" | "document";
    media_ref: string;
    caption: string | null;
  }
  | { kind: "empty" };

export type Navigation =
  | { kind: "stay" }
  | { kind: "push"; to: ConversationState }
  | { kind: "replace"; to: ConversationState }
  | { kind: "pop" }
  | { kind: "reset"; to?: ConversationState };

/**
 * What a handler or the transition core decided. `replies` are sent first; when
 * `render_screen` is set the prompt of the resulting state follows them.
 */
export type StateTransition = {
  navigation: Navigation;
  data?: SessionData;
  language?: Language;
  replies: readonly OutboundPayload[];
  render_screen: boolean;
  reason: string;
};

export type HandlerContext = {
  session: Session;
  event: InboundEvent;
  input: ClassifiedInput;
  now: Date;
  idle_ms: number;
  services: DomainServices;
};

export type HandlerResponse =
  | { kind: "pass" }
  | { kind: "transition"; transition: StateTransition };

export interface ConversationHandler {
  readonly name: string;
  claims(state: ConversationState): boolean;
  handle(context: HandlerContext): Promise<HandlerResponse>;
}

export const PASS: HandlerResponse = { kind: "pass" };

export function transitionTo(transition: StateTransition): HandlerResponse {
  return { kind: "transition", transition };
}
