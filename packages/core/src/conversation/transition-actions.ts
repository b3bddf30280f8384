import { ValidationError } from "../errors.ts";
import { invokeFacade } from "../facades/invoke.ts";
import type { GstReturnForm, IncomeTaxForm } from "../facades/types.ts";
import {
  clearFlowData,
  readDataNumber,
  readDataRecord,
  readDataString,
  withData,
  type JsonValue,
  type Language,
} from "../session/session.ts";
import { isConversationState, type ConversationState } from "../session/states.ts";
import { inputText } from "./input-classifier.ts";
import {
  currentFilingPeriod,
  formatRupees,
  parseAmount,
  parsePaymentEntry,
  parsePeriod,
} from "./input-parsers.ts";
import { renderScreen } from "./screens/screen-catalog.ts";
import { readUploadedInvoices } from "./screens/state-screens.ts";
import { screenNotice } from "./transitions.ts";
import type { HandlerContext, Navigation, OutboundPayload, StateTransition } from "./types.ts";

export type DataPatch = Record<string, JsonValue | undefined>;

/**
 * What an action contributes to the transition. `navigation` overrides the rule's
 * target; `clear_flow_data` drops flow-scoped keys before `data` is applied.
 */
export type ActionOutcome = {
  data?: DataPatch;
  clear_flow_data?: boolean;
  language?: Language;
  replies?: OutboundPayload[];
  navigation?: Navigation;
  render_screen?: boolean;
};

export type TransitionAction = (context: HandlerContext) => Promise<ActionOutcome>;

export function outcomeToTransition(
  context: HandlerContext,
  outcome: ActionOutcome,
  defaults: { navigation: Navigation; reason: string },
): StateTransition {
  const baseData = outcome.clear_flow_data ? clearFlowData(context.session.data) : context.session.data;
  const changesData = outcome.clear_flow_data === true || outcome.data !== undefined;

  return {
    navigation: outcome.navigation ?? defaults.navigation,
    data: changesData ? withData(baseData, outcome.data ?? {}) : undefined,
    language: outcome.language,
    replies: outcome.replies ?? [],
    render_screen: outcome.render_screen ?? true,
    reason: defaults.reason,
  };
}

type EntryPreparer = (context: HandlerContext, gstin: string) => Promise<DataPatch>;

const GST_FILING_RESET: DataPatch = {
  gst_filing_form: undefined,
  gst_filing_period: undefined,
  gst_filing_3b: undefined,
  gst_filing_1: undefined,
};

// Data a GSTIN-gated screen needs before it is first shown.
const ENTRY_PREPARERS: Partial<Record<ConversationState, EntryPreparer>> = {
  NIL_FILING_MENU: async (context) => ({
    nil_period: currentFilingPeriod(context.now),
    nil_form: undefined,
  }),
  GST_FILING_STATUS: async (context, gstin) => {
    const status = await invokeFacade(
      { service: "tax", operation: "getFilingStatus" },
      () => context.services.tax.getFilingStatus({ gstin }),
    );
    return {
      gst_filing_status: status.entries.map((entry) => ({
        period: entry.period,
        form_type: entry.form_type,
        status: entry.status,
      })),
    };
  },
};

export function textOf(context: HandlerContext): string {
  return inputText(context.input) ?? "";
}

export function activeGstin(context: HandlerContext): string | null {
  return readDataString(context.session.data, "gstin");
}

/** Enters `target` directly when a GSTIN is on file, otherwise asks for one first. */
export function gateOnGstin(target: ConversationState): TransitionAction {
  return async (context) => {
    const gstin = activeGstin(context);
    if (!gstin) {
      return {
        data: { after_gstin_state: target },
        navigation: { kind: "push", to: "WAIT_GSTIN" },
      };
    }
    return {
      data: await prepareEntry(context, target, gstin),
      navigation: { kind: "push", to: target },
    };
  };
}

export const captureGstin: TransitionAction = async (context) => {
  const validated = await invokeFacade(
    { service: "identifiers", operation: "validateGstin", field: "gstin" },
    () => context.services.identifiers.validateGstin(textOf(context)),
  );
  const after = readDataString(context.session.data, "after_gstin_state");
  const target: ConversationState = isConversationState(after) ? after : "GST_MENU";

  return {
    data: {
      gstin: validated.gstin,
      after_gstin_state: undefined,
      ...(await prepareEntry(context, target, validated.gstin)),
    },
    replies: [screenNotice("GSTIN_SAVED", context.session, { gstin: validated.gstin })],
    navigation: { kind: "replace", to: target },
  };
};

export const showHelp: TransitionAction = async (context) => ({
  replies: [screenNotice("HELP", context.session)],
  render_screen: false,
});

export function setLanguage(language: Language): TransitionAction {
  return async () => ({
    language,
    replies: [{ kind: "text", body: renderScreen("LANGUAGE_UPDATED", language) }],
  });
}

export const beginInvoiceUpload: TransitionAction = async () => ({
  data: { upload_invoices: undefined },
});

export const computeGstr3b: TransitionAction = async (context) => {
  const gstin = activeGstin(context);
  if (!gstin) {
    return gateOnGstin("ASK_GST_PERIOD_3B")(context);
  }
  const period = parsePeriod(textOf(context), context.now);
  const summary = await invokeFacade(
    { service: "tax", operation: "computeGstr3bSummary" },
    () => context.services.tax.computeGstr3bSummary({ gstin, period }),
  );
  return {
    data: {
      ...GST_FILING_RESET,
      gst_filing_3b: {
        period: summary.period,
        output_tax: summary.output_tax,
        input_tax_credit: summary.input_tax_credit,
        net_payable: summary.net_payable,
      },
    },
  };
};

export const previewGstr1: TransitionAction = async (context) => {
  const gstin = activeGstin(context);
  if (!gstin) {
    return gateOnGstin("ASK_GST_PERIOD_1")(context);
  }
  const period = parsePeriod(textOf(context), context.now);
  const preview = await invokeFacade(
    { service: "tax", operation: "previewGstr1" },
    () => context.services.tax.previewGstr1({ gstin, period }),
  );
  return {
    data: {
      ...GST_FILING_RESET,
      gst_filing_1: {
        period: preview.period,
        b2b_count: preview.b2b_count,
        b2c_count: preview.b2c_count,
        total_taxable: preview.total_taxable,
      },
    },
  };
};

export function prepareFiling(form: GstReturnForm): TransitionAction {
  return async (context) => {
    const source = readDataRecord(context.session.data, form === "GSTR-3B" ? "gst_filing_3b" : "gst_filing_1");
    const period = source?.period;
    if (typeof period !== "string") {
      throw new ValidationError("No return prepared for filing.", { field: "period" });
    }
    return { data: { gst_filing_form: form, gst_filing_period: period } };
  };
}

export const submitGstReturn: TransitionAction = async (context) => {
  const data = context.session.data;
  const gstin = activeGstin(context);
  const form = readDataString(data, "gst_filing_form");
  const period = readDataString(data, "gst_filing_period");
  if (!gstin || (form !== "GSTR-3B" && form !== "GSTR-1") || !period) {
    throw new ValidationError("Filing details are incomplete.", { field: "period" });
  }
  const submitted = await invokeFacade(
    { service: "tax", operation: "submitGstReturn" },
    () => context.services.tax.submitGstReturn({ gstin, period, form_type: form, nil: false }),
  );
  return {
    data: GST_FILING_RESET,
    replies: [
      screenNotice("GST_RETURN_SUBMITTED", context.session, {
        form_type: form,
        period,
        reference: submitted.reference,
      }),
    ],
  };
};

export function selectNilForm(form: "GSTR-3B" | "GSTR-1" | "both"): TransitionAction {
  return async (context) => {
    if (!activeGstin(context)) {
      return gateOnGstin("NIL_FILING_MENU")(context);
    }
    return {
      data: {
        nil_form: form,
        nil_period: readDataString(context.session.data, "nil_period") ?? currentFilingPeriod(context.now),
      },
    };
  };
}

export const submitNilReturn: TransitionAction = async (context) => {
  const data = context.session.data;
  const gstin = activeGstin(context);
  const selected = readDataString(data, "nil_form");
  const period = readDataString(data, "nil_period") ?? currentFilingPeriod(context.now);
  if (!gstin || !selected) {
    throw new ValidationError("NIL filing details are incomplete.", { field: "period" });
  }

  const forms: GstReturnForm[] = selected === "both" ? ["GSTR-3B", "GSTR-1"] : selected === "GSTR-1" ? ["GSTR-1"] : ["GSTR-3B"];
  const replies: OutboundPayload[] = [];
  for (const form of forms) {
    const submitted = await invokeFacade(
      { service: "tax", operation: "submitGstReturn" },
      () => context.services.tax.submitGstReturn({ gstin, period, form_type: form, nil: true }),
    );
    replies.push(
      screenNotice("GST_RETURN_SUBMITTED", context.session, {
        form_type: form,
        period,
        reference: submitted.reference,
      }),
    );
  }
  return { data: { nil_form: undefined, nil_period: undefined }, replies };
};

export const capturePayment: TransitionAction = async (context) => {
  const entry = parsePaymentEntry(textOf(context));
  return {
    data: {
      payment_challan: entry.challan_number,
      payment_amount: entry.amount,
      payment_period: currentFilingPeriod(context.now),
    },
  };
};

export const recordPayment: TransitionAction = async (context) => {
  const data = context.session.data;
  const gstin = activeGstin(context);
  const challan = readDataString(data, "payment_challan");
  const amount = readDataNumber(data, "payment_amount");
  const period = readDataString(data, "payment_period") ?? currentFilingPeriod(context.now);
  if (!gstin || !challan || amount === null) {
    throw new ValidationError("Payment details are incomplete.", { field: "payment" });
  }
  const recorded = await invokeFacade(
    { service: "tax", operation: "recordTaxPayment" },
    () => context.services.tax.recordTaxPayment({ gstin, period, challan_number: challan, amount }),
  );
  return {
    data: { payment_challan: undefined, payment_amount: undefined, payment_period: undefined },
    replies: [screenNotice("PAYMENT_RECORDED", context.session, { reference: recorded.reference })],
  };
};

export const parseInvoice: TransitionAction = async (context) => {
  if (context.input.kind !== "media") {
    throw new ValidationError("Invoice must be an image or document.", { field: "document" });
  }
  const { media_ref, media_kind } = context.input;
  const parsed = await invokeFacade(
    { service: "documents", operation: "parseDocument", field: "document" },
    () => context.services.documents.parseDocument({ document_type: "invoice", media_ref, media_kind }),
  );
  const taxableValue = parsed.fields.taxable_value;
  const invoices = readUploadedInvoices(context.session.data);
  const next = [
    ...invoices,
    { summary: parsed.summary, taxable_value: typeof taxableValue === "number" ? taxableValue : 0 },
  ];
  return {
    data: { upload_invoices: next },
    replies: [
      screenNotice("INVOICE_PARSED", context.session, { count: next.length, summary: parsed.summary }),
    ],
    render_screen: false,
  };
};

export const finishInvoiceUpload: TransitionAction = async (context) => {
  if (readUploadedInvoices(context.session.data).length === 0) {
    return {
      replies: [screenNotice("INVOICE_UPLOAD_EMPTY", context.session)],
      navigation: { kind: "stay" },
      render_screen: false,
    };
  }
  return {};
};

export const checkRefundStatus: TransitionAction = async (context) => {
  const gstin = activeGstin(context);
  if (!gstin) {
    return gateOnGstin("REFUND_ASK_PERIOD")(context);
  }
  const period = parsePeriod(textOf(context), context.now);
  const refund = await invokeFacade(
    { service: "tax", operation: "getRefundStatus" },
    () => context.services.tax.getRefundStatus({ gstin, period }),
  );
  return {
    replies: [
      screenNotice("REFUND_STATUS", context.session, {
        period,
        status: refund.status,
        amount: formatRupees(refund.amount),
      }),
    ],
  };
};

export const parseNotice: TransitionAction = async (context) => {
  if (context.input.kind !== "media") {
    throw new ValidationError("Notice must be an image or document.", { field: "document" });
  }
  const { media_ref, media_kind } = context.input;
  const parsed = await invokeFacade(
    { service: "documents", operation: "parseDocument", field: "document" },
    () => context.services.documents.parseDocument({ document_type: "notice", media_ref, media_kind }),
  );
  return { replies: [screenNotice("NOTICE_PARSED", context.session, { summary: parsed.summary })] };
};

export function beginIncomeTaxReturn(form: IncomeTaxForm): TransitionAction {
  return async () => ({ clear_flow_data: true, data: { itr_form: form } });
}

export function capturePan(next: ConversationState): TransitionAction {
  return async (context) => {
    const validated = await invokeFacade(
      { service: "identifiers", operation: "validatePan", field: "pan" },
      () => context.services.identifiers.validatePan(textOf(context)),
    );
    const prefilled = context.session.data.itr_prefilled === true;
    return {
      data: { itr_pan: validated.pan },
      navigation: { kind: "push", to: prefilled && next === "ITR1_ASK_SALARY" ? "ITR1_ASK_80C" : next },
    };
  };
}

export function captureAmount(key: string, next: ConversationState): TransitionAction {
  return async (context) => ({
    data: { [key]: parseAmount(textOf(context)) },
    navigation: { kind: "push", to: next },
  });
}

/** 80C is the last question when salary and TDS were read from Form 16. */
export const captureDeductions: TransitionAction = async (context) => {
  const deductions = parseAmount(textOf(context));
  if (context.session.data.itr_prefilled !== true) {
    return { data: { itr_deductions: deductions }, navigation: { kind: "push", to: "ITR1_ASK_TDS" } };
  }
  const tds = readDataNumber(context.session.data, "itr_tds") ?? 0;
  return estimateIncomeTax(context, { itr_deductions: deductions }, deductions, tds);
};

export const captureTdsAndEstimate: TransitionAction = async (context) => {
  const tds = parseAmount(textOf(context));
  const deductions = readDataNumber(context.session.data, "itr_deductions") ?? 0;
  return estimateIncomeTax(context, { itr_tds: tds }, deductions, tds);
};

export const submitIncomeTaxReturn: TransitionAction = async (context) => {
  const data = context.session.data;
  const form = readDataString(data, "itr_form");
  const pan = readDataString(data, "itr_pan");
  if ((form !== "ITR-1" && form !== "ITR-4") || !pan) {
    throw new ValidationError("Return details are incomplete.", { field: "pan" });
  }
  const submitted = await invokeFacade(
    { service: "tax", operation: "submitIncomeTaxReturn" },
    () => context.services.tax.submitIncomeTaxReturn({ form, pan }),
  );
  return {
    clear_flow_data: true,
    replies: [screenNotice("ITR_SUBMITTED", context.session, { form, reference: submitted.reference })],
  };
};

export const parseForm16: TransitionAction = async (context) => {
  if (context.input.kind !== "media") {
    throw new ValidationError("Form 16 must be an image or document.", { field: "document" });
  }
  const { media_ref, media_kind } = context.input;
  const parsed = await invokeFacade(
    { service: "documents", operation: "parseDocument", field: "document" },
    () => context.services.documents.parseDocument({ document_type: "form16", media_ref, media_kind }),
  );
  const grossSalary = parsed.fields.gross_salary;
  const tds = parsed.fields.tds;
  if (typeof grossSalary !== "number" || typeof tds !== "number") {
    throw new ValidationError("Form 16 is missing salary or TDS.", { field: "document" });
  }
  return {
    clear_flow_data: true,
    data: {
      itr_form: "ITR-1",
      itr_prefilled: true,
      itr_gross_income: grossSalary,
      itr_tds: tds,
    },
  };
};

export function requestCaCallback(options: { withQuery: boolean }): TransitionAction {
  return async (context) => {
    const query = options.withQuery ? textOf(context) : null;
    const fromState = context.session.stack[context.session.stack.length - 1] ?? context.session.state;
    const ticket = await invokeFacade(
      { service: "notifications", operation: "requestCaCallback" },
      () =>
        context.services.notifications.requestCaCallback({
          user_id: context.session.user_id,
          query,
          from_state: fromState,
        }),
    );
    return {
      data: {
        ca_handoff: {
          requested_at: context.now.toISOString(),
          from_state: fromState,
          ticket_id: ticket.ticket_id,
        },
      },
      replies: [screenNotice("CA_CALLBACK_REQUESTED", context.session, { ticket_id: ticket.ticket_id })],
    };
  };
}

async function estimateIncomeTax(
  context: HandlerContext,
  patch: DataPatch,
  deductions: number,
  tds: number,
): Promise<ActionOutcome> {
  const data = context.session.data;
  const form = readDataString(data, "itr_form");
  const pan = readDataString(data, "itr_pan");
  const grossIncome = readDataNumber(data, "itr_gross_income");
  if ((form !== "ITR-1" && form !== "ITR-4") || !pan || grossIncome === null) {
    throw new ValidationError("Income details are incomplete.", { field: "amount" });
  }
  const estimate = await invokeFacade(
    { service: "tax", operation: "estimateIncomeTax" },
    () =>
      context.services.tax.estimateIncomeTax({
        form,
        pan,
        gross_income: grossIncome,
        deductions,
        tds,
      }),
  );
  return {
    data: {
      ...patch,
      itr_result: {
        taxable_income: estimate.taxable_income,
        tax_liability: estimate.tax_liability,
        balance: estimate.balance,
      },
    },
    navigation: { kind: "push", to: "ITR_RESULT" },
  };
}

async function prepareEntry(
  context: HandlerContext,
  target: ConversationState,
  gstin: string,
): Promise<DataPatch> {
  const prepare = ENTRY_PREPARERS[target];
  return prepare ? prepare(context, gstin) : {};
}
