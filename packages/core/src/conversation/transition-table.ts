import type { ConversationState } from "../session/states.ts";
import {
  beginIncomeTaxReturn,
  beginInvoiceUpload,
  captureAmount,
  captureDeductions,
  captureGstin,
  capturePan,
  capturePayment,
  captureTdsAndEstimate,
  checkRefundStatus,
  computeGstr3b,
  finishInvoiceUpload,
  gateOnGstin,
  parseForm16,
  parseInvoice,
  parseNotice,
  prepareFiling,
  previewGstr1,
  recordPayment,
  requestCaCallback,
  selectNilForm,
  setLanguage,
  showHelp,
  submitGstReturn,
  submitIncomeTaxReturn,
  submitNilReturn,
  type TransitionAction,
} from "./transition-actions.ts";
import type { ClassifiedInput, Navigation } from "./types.ts";

export type InputMatcher =
  | { on: "choice"; choice: number }
  | { on: "confirm"; confirmed: boolean }
  | { on: "media" }
  | { on: "keyword"; words: readonly string[] }
  | { on: "text" }
  | { on: "any" };

export type TransitionRule = {
  match: InputMatcher;
  navigation: Navigation;
  action?: TransitionAction;
  reason: string;
};

export type TransitionTable = Readonly<Partial<Record<ConversationState, readonly TransitionRule[]>>>;

const push = (to: ConversationState): Navigation => ({ kind: "push", to });
const replace = (to: ConversationState): Navigation => ({ kind: "replace", to });
const STAY: Navigation = { kind: "stay" };
const POP: Navigation = { kind: "pop" };
const RESET: Navigation = { kind: "reset" };

const choice = (n: number): InputMatcher => ({ on: "choice", choice: n });
const YES: InputMatcher = { on: "confirm", confirmed: true };
const NO: InputMatcher = { on: "confirm", confirmed: false };
const TEXT: InputMatcher = { on: "text" };
const MEDIA: InputMatcher = { on: "media" };

export const TRANSITION_TABLE: TransitionTable = {
  MAIN_MENU: [
    { match: choice(1), navigation: push("GST_MENU"), reason: "main_menu.gst" },
    { match: choice(2), navigation: push("ITR_MENU"), reason: "main_menu.itr" },
    {
      match: choice(3),
      navigation: push("GST_UPLOAD_INVOICE"),
      action: beginInvoiceUpload,
      reason: "main_menu.upload",
    },
    { match: choice(4), navigation: STAY, action: showHelp, reason: "main_menu.help" },
    { match: choice(5), navigation: push("LANGUAGE_MENU"), reason: "main_menu.language" },
    { match: choice(6), navigation: push("SETTINGS_MENU"), reason: "main_menu.settings" },
    { match: choice(7), navigation: push("CONNECT_CA_MENU"), reason: "main_menu.connect_ca" },
  ],
  LANGUAGE_MENU: [
    { match: choice(1), navigation: POP, action: setLanguage("en"), reason: "language.en" },
    { match: choice(2), navigation: POP, action: setLanguage("hi"), reason: "language.hi" },
    { match: choice(3), navigation: POP, action: setLanguage("gu"), reason: "language.gu" },
    { match: choice(4), navigation: POP, action: setLanguage("ta"), reason: "language.ta" },
    { match: choice(5), navigation: POP, action: setLanguage("te"), reason: "language.te" },
  ],
  GST_MENU: [
    {
      match: choice(1),
      navigation: push("ASK_GST_PERIOD_3B"),
      action: gateOnGstin("ASK_GST_PERIOD_3B"),
      reason: "gst_menu.gstr3b",
    },
    {
      match: choice(2),
      navigation: push("ASK_GST_PERIOD_1"),
      action: gateOnGstin("ASK_GST_PERIOD_1"),
      reason: "gst_menu.gstr1",
    },
    {
      match: choice(3),
      navigation: push("NIL_FILING_MENU"),
      action: gateOnGstin("NIL_FILING_MENU"),
      reason: "gst_menu.nil",
    },
    {
      match: choice(4),
      navigation: push("GST_PAYMENT_ENTRY"),
      action: gateOnGstin("GST_PAYMENT_ENTRY"),
      reason: "gst_menu.payment",
    },
    {
      match: choice(5),
      navigation: push("GST_FILING_STATUS"),
      action: gateOnGstin("GST_FILING_STATUS"),
      reason: "gst_menu.status",
    },
    {
      match: choice(6),
      navigation: push("MEDIUM_CREDIT_CHECK"),
      action: gateOnGstin("MEDIUM_CREDIT_CHECK"),
      reason: "gst_menu.credit_check",
    },
    { match: choice(7), navigation: push("MULTI_GSTIN_MENU"), reason: "gst_menu.gstins" },
    { match: choice(8), navigation: push("REFUND_MENU"), reason: "gst_menu.refunds" },
    {
      match: choice(10),
      navigation: push("EINVOICE_MENU"),
      action: gateOnGstin("EINVOICE_MENU"),
      reason: "gst_menu.einvoice",
    },
    {
      match: choice(11),
      navigation: push("EWAYBILL_MENU"),
      action: gateOnGstin("EWAYBILL_MENU"),
      reason: "gst_menu.ewaybill",
    },
  ],
  WAIT_GSTIN: [
    { match: TEXT, navigation: replace("GST_MENU"), action: captureGstin, reason: "gstin.captured" },
  ],
  ASK_GST_PERIOD_3B: [
    {
      match: TEXT,
      navigation: replace("GST_3B_SUMMARY"),
      action: computeGstr3b,
      reason: "gstr3b.computed",
    },
  ],
  GST_3B_SUMMARY: [
    {
      match: choice(1),
      navigation: push("GST_FILING_CONFIRM"),
      action: prepareFiling("GSTR-3B"),
      reason: "gstr3b.file",
    },
    { match: choice(2), navigation: POP, reason: "gstr3b.back" },
  ],
  ASK_GST_PERIOD_1: [
    {
      match: TEXT,
      navigation: replace("GST_1_PREVIEW"),
      action: previewGstr1,
      reason: "gstr1.previewed",
    },
  ],
  GST_1_PREVIEW: [
    {
      match: choice(1),
      navigation: push("GST_FILING_CONFIRM"),
      action: prepareFiling("GSTR-1"),
      reason: "gstr1.file",
    },
    { match: choice(2), navigation: POP, reason: "gstr1.back" },
  ],
  GST_FILING_CONFIRM: [
    { match: YES, navigation: RESET, action: submitGstReturn, reason: "gst_return.submitted" },
    { match: NO, navigation: POP, reason: "gst_return.declined" },
  ],
  NIL_FILING_MENU: [
    {
      match: choice(1),
      navigation: push("NIL_FILING_CONFIRM"),
      action: selectNilForm("GSTR-3B"),
      reason: "nil.gstr3b",
    },
    {
      match: choice(2),
      navigation: push("NIL_FILING_CONFIRM"),
      action: selectNilForm("GSTR-1"),
      reason: "nil.gstr1",
    },
    {
      match: choice(3),
      navigation: push("NIL_FILING_CONFIRM"),
      action: selectNilForm("both"),
      reason: "nil.both",
    },
  ],
  NIL_FILING_CONFIRM: [
    { match: YES, navigation: RESET, action: submitNilReturn, reason: "nil.submitted" },
    { match: NO, navigation: POP, reason: "nil.declined" },
  ],
  GST_PAYMENT_ENTRY: [
    {
      match: TEXT,
      navigation: push("GST_PAYMENT_CONFIRM"),
      action: capturePayment,
      reason: "payment.captured",
    },
  ],
  GST_PAYMENT_CONFIRM: [
    { match: YES, navigation: replace("GST_MENU"), action: recordPayment, reason: "payment.recorded" },
    { match: NO, navigation: POP, reason: "payment.declined" },
  ],
  GST_UPLOAD_INVOICE: [
    { match: MEDIA, navigation: STAY, action: parseInvoice, reason: "upload.invoice_parsed" },
    {
      match: { on: "keyword", words: ["done", "finish", "ho gaya"] },
      navigation: replace("GST_UPLOAD_SUMMARY"),
      action: finishInvoiceUpload,
      reason: "upload.finished",
    },
  ],
  GST_UPLOAD_SUMMARY: [
    {
      match: choice(1),
      navigation: push("ASK_GST_PERIOD_3B"),
      action: gateOnGstin("ASK_GST_PERIOD_3B"),
      reason: "upload.prepare_gstr3b",
    },
    { match: choice(2), navigation: replace("GST_UPLOAD_INVOICE"), reason: "upload.more" },
  ],
  REFUND_MENU: [
    {
      match: choice(1),
      navigation: push("REFUND_ASK_PERIOD"),
      action: gateOnGstin("REFUND_ASK_PERIOD"),
      reason: "refund.status",
    },
    { match: choice(2), navigation: push("NOTICE_UPLOAD"), reason: "refund.notice" },
  ],
  REFUND_ASK_PERIOD: [
    { match: TEXT, navigation: POP, action: checkRefundStatus, reason: "refund.checked" },
  ],
  NOTICE_UPLOAD: [
    { match: MEDIA, navigation: POP, action: parseNotice, reason: "notice.parsed" },
  ],
  ITR_MENU: [
    {
      match: choice(1),
      navigation: push("ITR1_ASK_PAN"),
      action: beginIncomeTaxReturn("ITR-1"),
      reason: "itr_menu.itr1",
    },
    {
      match: choice(2),
      navigation: push("ITR4_ASK_PAN"),
      action: beginIncomeTaxReturn("ITR-4"),
      reason: "itr_menu.itr4",
    },
    { match: choice(3), navigation: push("ITR_DOC_UPLOAD"), reason: "itr_menu.form16" },
  ],
  ITR1_ASK_PAN: [
    { match: TEXT, navigation: push("ITR1_ASK_SALARY"), action: capturePan("ITR1_ASK_SALARY"), reason: "itr1.pan" },
  ],
  ITR1_ASK_SALARY: [
    {
      match: TEXT,
      navigation: push("ITR1_ASK_80C"),
      action: captureAmount("itr_gross_income", "ITR1_ASK_80C"),
      reason: "itr1.salary",
    },
  ],
  ITR1_ASK_80C: [
    { match: TEXT, navigation: push("ITR1_ASK_TDS"), action: captureDeductions, reason: "itr1.deductions" },
  ],
  ITR1_ASK_TDS: [
    { match: TEXT, navigation: push("ITR_RESULT"), action: captureTdsAndEstimate, reason: "itr1.estimated" },
  ],
  ITR4_ASK_PAN: [
    {
      match: TEXT,
      navigation: push("ITR4_ASK_TURNOVER"),
      action: capturePan("ITR4_ASK_TURNOVER"),
      reason: "itr4.pan",
    },
  ],
  ITR4_ASK_TURNOVER: [
    {
      match: TEXT,
      navigation: push("ITR4_ASK_TDS"),
      action: captureAmount("itr_gross_income", "ITR4_ASK_TDS"),
      reason: "itr4.turnover",
    },
  ],
  ITR4_ASK_TDS: [
    { match: TEXT, navigation: push("ITR_RESULT"), action: captureTdsAndEstimate, reason: "itr4.estimated" },
  ],
  ITR_RESULT: [
    { match: choice(1), navigation: push("ITR_FILING_CONFIRM"), reason: "itr.file" },
    { match: choice(2), navigation: replace("ITR_MENU"), reason: "itr.back_to_menu" },
  ],
  ITR_FILING_CONFIRM: [
    { match: YES, navigation: RESET, action: submitIncomeTaxReturn, reason: "itr.submitted" },
    { match: NO, navigation: POP, reason: "itr.declined" },
  ],
  ITR_DOC_UPLOAD: [
    { match: MEDIA, navigation: push("ITR_DOC_CONFIRM"), action: parseForm16, reason: "itr.form16_parsed" },
  ],
  ITR_DOC_CONFIRM: [
    { match: YES, navigation: push("ITR1_ASK_PAN"), reason: "itr.form16_confirmed" },
    { match: NO, navigation: POP, reason: "itr.form16_rejected" },
  ],
  SETTINGS_MENU: [
    { match: choice(1), navigation: push("LANGUAGE_MENU"), reason: "settings.language" },
    { match: choice(2), navigation: push("NOTIFICATION_SETTINGS"), reason: "settings.notifications" },
    { match: choice(3), navigation: push("MULTI_GSTIN_MENU"), reason: "settings.gstins" },
  ],
  CONNECT_CA_MENU: [
    { match: choice(1), navigation: push("CONNECT_CA_ASK_TEXT"), reason: "connect_ca.ask" },
    {
      match: choice(2),
      navigation: RESET,
      action: requestCaCallback({ withQuery: false }),
      reason: "connect_ca.callback",
    },
  ],
  CONNECT_CA_ASK_TEXT: [
    {
      match: TEXT,
      navigation: RESET,
      action: requestCaCallback({ withQuery: true }),
      reason: "connect_ca.query",
    },
  ],
};

export function matchesInput(matcher: InputMatcher, input: ClassifiedInput): boolean {
  switch (matcher.on) {
    case "choice":
      return input.kind === "menu_choice" && input.choice === matcher.choice;
    case "confirm":
      return input.kind === "confirmation" && input.confirmed === matcher.confirmed;
    case "media":
      return input.kind === "media";
    case "keyword": {
      const text = input.kind === "free_text" ? input.text.toLowerCase() : null;
      return text !== null && matcher.words.includes(text);
    }
    case "text":
      return input.kind === "free_text" || input.kind === "menu_choice" || input.kind === "confirmation";
    case "any":
      return true;
  }
}

export function findTransitionRule(
  table: TransitionTable,
  state: ConversationState,
  input: ClassifiedInput,
): TransitionRule | null {
  return table[state]?.find((rule) => matchesInput(rule.match, input)) ?? null;
}
