export const CONVERSATION_STATES = [
  "MAIN_MENU",
  "LANGUAGE_MENU",
  "GST_MENU",
  "WAIT_GSTIN",
  "ASK_GST_PERIOD_3B",
  "GST_3B_SUMMARY",
  "ASK_GST_PERIOD_1",
  "GST_1_PREVIEW",
  "GST_FILING_CONFIRM",
  "NIL_FILING_MENU",
  "NIL_FILING_CONFIRM",
  "GST_PAYMENT_ENTRY",
  "GST_PAYMENT_CONFIRM",
  "GST_UPLOAD_INVOICE",
  "GST_UPLOAD_SUMMARY",
  "GST_FILING_STATUS",
  "MEDIUM_CREDIT_CHECK",
  "MEDIUM_CREDIT_RESULT",
  "EINVOICE_MENU",
  "EINVOICE_UPLOAD",
  "EINVOICE_CONFIRM",
  "EINVOICE_STATUS_ASK",
  "EINVOICE_CANCEL",
  "EWAYBILL_MENU",
  "EWAYBILL_UPLOAD",
  "EWAYBILL_TRANSPORT",
  "EWAYBILL_TRACK_ASK",
  "EWAYBILL_VEHICLE_ASK",
  "MULTI_GSTIN_MENU",
  "MULTI_GSTIN_ADD",
  "MULTI_GSTIN_LABEL",
  "MULTI_GSTIN_SUMMARY",
  "REFUND_MENU",
  "REFUND_ASK_PERIOD",
  "NOTICE_UPLOAD",
  "ITR_MENU",
  "ITR1_ASK_PAN",
  "ITR1_ASK_SALARY",
  "ITR1_ASK_80C",
  "ITR1_ASK_TDS",
  "ITR4_ASK_PAN",
  "ITR4_ASK_TURNOVER",
  "ITR4_ASK_TDS",
  "ITR_RESULT",
  "ITR_FILING_CONFIRM",
  "ITR_DOC_UPLOAD",
  "ITR_DOC_CONFIRM",
  "SETTINGS_MENU",
  "NOTIFICATION_SETTINGS",
  "CONNECT_CA_MENU",
  "CONNECT_CA_ASK_TEXT",
  "SESSION_RESUME_PROMPT",
  "SENSITIVE_CONFIRM_EXPIRED",
  "CONFIRM_SWITCH_MODULE",
] as const;

export type ConversationState = (typeof CONVERSATION_STATES)[number];

export const ROOT_STATE = "MAIN_MENU" satisfies ConversationState;
export const NIL_FILING_ENTRY_STATE = "NIL_FILING_MENU" satisfies ConversationState;

export type ModuleMenuState = "MAIN_MENU" | "GST_MENU" | "ITR_MENU" | "CONNECT_CA_MENU" | "SETTINGS_MENU";

const CONVERSATION_STATE_SET: ReadonlySet<string> = new Set(CONVERSATION_STATES);

/** States where the user types literal values; keyword aliases are not intercepted there. */
export const FREE_INPUT_STATES: ReadonlySet<ConversationState> = new Set<ConversationState>([
  "WAIT_GSTIN",
  "ASK_GST_PERIOD_3B",
  "ASK_GST_PERIOD_1",
  "GST_PAYMENT_ENTRY",
  "MULTI_GSTIN_ADD",
  "MULTI_GSTIN_LABEL",
  "REFUND_ASK_PERIOD",
  "ITR1_ASK_PAN",
  "ITR1_ASK_SALARY",
  "ITR1_ASK_80C",
  "ITR1_ASK_TDS",
  "ITR4_ASK_PAN",
  "ITR4_ASK_TURNOVER",
  "ITR4_ASK_TDS",
  "CONNECT_CA_ASK_TEXT",
  "MEDIUM_CREDIT_CHECK",
  "EINVOICE_STATUS_ASK",
  "EINVOICE_CANCEL",
  "EWAYBILL_TRANSPORT",
  "EWAYBILL_TRACK_ASK",
  "EWAYBILL_VEHICLE_ASK",
]);

export const SENSITIVE_CONFIRM_STATES: ReadonlySet<ConversationState> = new Set<ConversationState>([
  "GST_FILING_CONFIRM",
  "NIL_FILING_CONFIRM",
  "GST_PAYMENT_CONFIRM",
  "ITR_FILING_CONFIRM",
  "EINVOICE_CONFIRM",
]);

const GST_PREFIXES = [
  "GST_",
  "MEDIUM_",
  "MULTI_GSTIN",
  "NIL_FILING",
  "WAIT_GSTIN",
  "ASK_GST_",
  "REFUND_",
  "NOTICE_",
  "EINVOICE_",
  "EWAYBILL_",
] as const;
const ITR_PREFIXES = ["ITR"] as const;
const CONNECT_CA_PREFIXES = ["CONNECT_CA_"] as const;
const SETTINGS_STATES: ReadonlySet<ConversationState> = new Set<ConversationState>([
  "SETTINGS_MENU",
  "NOTIFICATION_SETTINGS",
  "LANGUAGE_MENU",
]);

export function isConversationState(value: unknown): value is ConversationState {
  return typeof value === "string" && CONVERSATION_STATE_SET.has(value);
}

export function moduleMenuForState(state: ConversationState): ModuleMenuState {
  if (GST_PREFIXES.some((prefix) => state.startsWith(prefix))) {
    return "GST_MENU";
  }
  if (ITR_PREFIXES.some((prefix) => state.startsWith(prefix))) {
    return "ITR_MENU";
  }
  if (CONNECT_CA_PREFIXES.some((prefix) => state.startsWith(prefix))) {
    return "CONNECT_CA_MENU";
  }
  if (SETTINGS_STATES.has(state)) {
    return "SETTINGS_MENU";
  }
  return "MAIN_MENU";
}
