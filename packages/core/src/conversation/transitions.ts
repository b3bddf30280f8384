import type { ValidationError } from "../errors.ts";
import type { Session } from "../session/session.ts";
import { renderScreen, type ScreenParams } from "./screens/screen-catalog.ts";
import { renderStateScreen } from "./screens/state-screens.ts";
import type { OutboundPayload, StateTransition } from "./types.ts";

const VALIDATION_SCREENS: Readonly<Record<string, string>> = {
  gstin: "INVALID_GSTIN",
  pan: "INVALID_PAN",
  period: "INVALID_PERIOD",
  amount: "INVALID_AMOUNT",
  payment: "INVALID_PAYMENT",
  label: "INVALID_LABEL",
  document: "INVALID_DOCUMENT",
  irn: "INVALID_IRN",
  ewb_number: "INVALID_EWB_NUMBER",
  transport: "INVALID_TRANSPORT",
  vehicle_update: "INVALID_VEHICLE_UPDATE",
};

export function screenNotice(key: string, session: Session, params?: ScreenParams): OutboundPayload {
  return { kind: "text", body: renderScreen(key, session.language, params) };
}

/** Puts `prefix` in front of the payload text so the notice and the prompt arrive as one message. */
export function prefixPayload(prefix: string, payload: OutboundPayload): OutboundPayload {
  switch (payload.kind) {
    case "text":
    case "buttons":
      return { ...payload, body: `${prefix}\n\n${payload.body}` };
    case "media":
      return { ...payload, caption: payload.caption ? `${prefix}\n\n${payload.caption}` : prefix };
  }
}

export function unrecognizedInputTransition(session: Session, now: Date): StateTransition {
  return {
    navigation: { kind: "stay" },
    replies: [
      prefixPayload(renderScreen("NOT_UNDERSTOOD", session.language), renderStateScreen(session, now)),
    ],
    render_screen: false,
    reason: "unrecognized_input",
  };
}

export function validationRepromptTransition(
  error: ValidationError,
  session: Session,
  now: Date,
): StateTransition {
  const key = (error.field ? VALIDATION_SCREENS[error.field] : undefined) ?? "INVALID_INPUT";
  return {
    navigation: { kind: "stay" },
    replies: [prefixPayload(renderScreen(key, session.language), renderStateScreen(session, now))],
    render_screen: false,
    reason: "validation_rejected",
  };
}

export function serviceApologyReplies(session: Session): OutboundPayload[] {
  return [screenNotice("SERVICE_APOLOGY", session)];
}
