import {
  readDataNumber,
  readDataRecord,
  readDataString,
  type JsonValue,
  type Session,
  type SessionData,
} from "../../session/session.ts";
import {
  moduleMenuForState,
  isConversationState,
  type ConversationState,
  type ModuleMenuState,
} from "../../session/states.ts";
import type { ExportInvoice } from "../../facades/types.ts";
import { currentFilingPeriod, formatRupees } from "../input-parsers.ts";
import type { OutboundPayload, ReplyButton } from "../types.ts";
import { renderScreen, type ScreenParams } from "./screen-catalog.ts";

const MODULE_LABELS: Readonly<Record<ModuleMenuState, string>> = {
  MAIN_MENU: "Main menu",
  GST_MENU: "GST",
  ITR_MENU: "Income tax",
  CONNECT_CA_MENU: "Talk to a CA",
  SETTINGS_MENU: "Settings",
};

const CONFIRM_BUTTON_STATES: ReadonlySet<ConversationState> = new Set<ConversationState>([
  "GST_FILING_CONFIRM",
  "NIL_FILING_CONFIRM",
  "GST_PAYMENT_CONFIRM",
  "ITR_FILING_CONFIRM",
  "ITR_DOC_CONFIRM",
  "EINVOICE_CONFIRM",
]);

const CONFIRM_BUTTONS: readonly ReplyButton[] = [
  { id: "yes", title: "Yes" },
  { id: "no", title: "No" },
];

const PLACEHOLDER = "-";

export function moduleLabel(module: ModuleMenuState): string {
  return MODULE_LABELS[module];
}

/** The prompt shown on entering (or re-entering) the session's current state. */
export function renderStateScreen(session: Session, now: Date): OutboundPayload {
  const body = renderScreen(session.state, session.language, screenParams(session, now));
  if (CONFIRM_BUTTON_STATES.has(session.state)) {
    return { kind: "buttons", body, buttons: CONFIRM_BUTTONS };
  }
  return { kind: "text", body };
}

export function screenParams(session: Session, now: Date): ScreenParams {
  const data = session.data;
  switch (session.state) {
    case "GST_3B_SUMMARY":
      return recordParams(data, "gst_filing_3b", ["period"], ["output_tax", "input_tax_credit", "net_payable"]);
    case "GST_1_PREVIEW":
      return {
        ...recordParams(data, "gst_filing_1", ["period"], ["total_taxable"]),
        b2b_count: readRecordNumber(data, "gst_filing_1", "b2b_count") ?? 0,
        b2c_count: readRecordNumber(data, "gst_filing_1", "b2c_count") ?? 0,
      };
    case "GST_FILING_CONFIRM":
      return {
        form_type: readDataString(data, "gst_filing_form") ?? PLACEHOLDER,
        period: readDataString(data, "gst_filing_period") ?? PLACEHOLDER,
        gstin: readDataString(data, "gstin") ?? PLACEHOLDER,
      };
    case "NIL_FILING_MENU":
      return { period: readDataString(data, "nil_period") ?? currentFilingPeriod(now) };
    case "NIL_FILING_CONFIRM":
      return {
        form_type: nilFormLabel(readDataString(data, "nil_form")),
        period: readDataString(data, "nil_period") ?? currentFilingPeriod(now),
        gstin: readDataString(data, "gstin") ?? PLACEHOLDER,
      };
    case "GST_PAYMENT_CONFIRM":
      return {
        amount: formatRupees(readDataNumber(data, "payment_amount") ?? 0),
        challan_number: readDataString(data, "payment_challan") ?? PLACEHOLDER,
        period: readDataString(data, "payment_period") ?? currentFilingPeriod(now),
      };
    case "GST_UPLOAD_SUMMARY": {
      const invoices = readUploadedInvoices(data);
      const total = invoices.reduce((sum, invoice) => sum + invoice.taxable_value, 0);
      return { count: invoices.length, total_taxable: formatRupees(total) };
    }
    case "GST_FILING_STATUS":
      return { status_lines: filingStatusLines(data, session) };
    case "MEDIUM_CREDIT_CHECK":
      return { period: currentFilingPeriod(now) };
    case "MEDIUM_CREDIT_RESULT":
      return {
        ...recordParams(data, "credit_check", ["period"], ["additional_credit"]),
        matched: readRecordNumber(data, "credit_check", "matched") ?? 0,
        value_mismatch: readRecordNumber(data, "credit_check", "value_mismatch") ?? 0,
        missing_in_2b: readRecordNumber(data, "credit_check", "missing_in_2b") ?? 0,
        missing_in_books: readRecordNumber(data, "credit_check", "missing_in_books") ?? 0,
      };
    case "EINVOICE_CONFIRM": {
      const invoices = readExportInvoices(data, EINVOICE_INVOICES_KEY);
      return {
        count: invoices.length,
        invoice_lines: invoices
          .map((invoice, index) => `${index + 1}. ${invoice.invoice_number} (${formatRupees(invoice.taxable_value)})`)
          .join("\n"),
      };
    }
    case "EWAYBILL_TRANSPORT":
      return { count: readExportInvoices(data, EWAYBILL_INVOICES_KEY).length };
    case "MULTI_GSTIN_MENU":
      return {
        active_gstin: readDataString(data, "gstin") ?? renderScreen("NO_ACTIVE_GSTIN", session.language),
      };
    case "MULTI_GSTIN_LABEL":
      return { gstin: readDataString(data, "pending_gstin") ?? PLACEHOLDER };
    case "MULTI_GSTIN_SUMMARY":
      return { gstin_lines: gstinLines(data, session) };
    case "ITR_RESULT":
      return {
        form: readDataString(data, "itr_form") ?? PLACEHOLDER,
        ...recordParams(data, "itr_result", [], ["taxable_income", "tax_liability"]),
        balance_line: balanceLine(readRecordNumber(data, "itr_result", "balance") ?? 0, session),
      };
    case "ITR_FILING_CONFIRM":
      return {
        form: readDataString(data, "itr_form") ?? PLACEHOLDER,
        pan: readDataString(data, "itr_pan") ?? PLACEHOLDER,
      };
    case "ITR_DOC_CONFIRM":
      return {
        gross_income: formatRupees(readDataNumber(data, "itr_gross_income") ?? 0),
        tds: formatRupees(readDataNumber(data, "itr_tds") ?? 0),
      };
    case "SESSION_RESUME_PROMPT": {
      const paused = readDataString(data, "pre_expiry_state");
      return {
        paused_label: moduleLabel(moduleMenuForState(isConversationState(paused) ? paused : "MAIN_MENU")),
      };
    }
    case "CONFIRM_SWITCH_MODULE":
      return {
        current_module: moduleLabelFromData(data, "switch_source_state"),
        target_module: moduleLabelFromData(data, "switch_target_module"),
      };
    default:
      return {};
  }
}

export type UploadedInvoice = {
  summary: string;
  taxable_value: number;
};

export function readUploadedInvoices(data: SessionData): UploadedInvoice[] {
  const raw = data.upload_invoices;
  if (!Array.isArray(raw)) {
    return [];
  }
  const invoices: UploadedInvoice[] = [];
  for (const entry of raw) {
    if (!isJsonObject(entry)) {
      continue;
    }
    const summary = entry.summary;
    const taxableValue = entry.taxable_value;
    invoices.push({
      summary: typeof summary === "string" ? summary : "",
      taxable_value: typeof taxableValue === "number" && Number.isFinite(taxableValue) ? taxableValue : 0,
    });
  }
  return invoices;
}

export const EINVOICE_INVOICES_KEY = "einvoice_invoices";
export const EWAYBILL_INVOICES_KEY = "ewaybill_invoices";

export function readExportInvoices(data: SessionData, key: string): ExportInvoice[] {
  const raw = data[key];
  if (!Array.isArray(raw)) {
    return [];
  }
  const invoices: ExportInvoice[] = [];
  for (const entry of raw) {
    if (!isJsonObject(entry)) {
      continue;
    }
    const { invoice_number, taxable_value, media_ref } = entry;
    if (typeof invoice_number !== "string" || typeof media_ref !== "string") {
      continue;
    }
    invoices.push({
      invoice_number,
      media_ref,
      taxable_value: typeof taxable_value === "number" && Number.isFinite(taxable_value) ? taxable_value : 0,
    });
  }
  return invoices;
}

export type RegisteredGstin = {
  gstin: string;
  label: string;
};

export function readRegisteredGstins(data: SessionData): RegisteredGstin[] {
  const raw = data.additional_gstins;
  if (!Array.isArray(raw)) {
    return [];
  }
  const gstins: RegisteredGstin[] = [];
  for (const entry of raw) {
    if (isJsonObject(entry) && typeof entry.gstin === "string" && typeof entry.label === "string") {
      gstins.push({ gstin: entry.gstin, label: entry.label });
    }
  }
  return gstins;
}

function recordParams(
  data: SessionData,
  key: string,
  textFields: readonly string[],
  rupeeFields: readonly string[],
): Record<string, string> {
  const record = readDataRecord(data, key);
  const params: Record<string, string> = {};
  for (const field of textFields) {
    const value = record?.[field];
    params[field] = typeof value === "string" ? value : PLACEHOLDER;
  }
  for (const field of rupeeFields) {
    params[field] = formatRupees(readRecordNumber(data, key, field) ?? 0);
  }
  return params;
}

function readRecordNumber(data: SessionData, key: string, field: string): number | null {
  const value = readDataRecord(data, key)?.[field];
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function nilFormLabel(form: string | null): string {
  if (form === "both") {
    return "GSTR-3B and GSTR-1";
  }
  return form ?? PLACEHOLDER;
}

function filingStatusLines(data: SessionData, session: Session): string {
  const raw = data.gst_filing_status;
  const lines: string[] = [];
  if (Array.isArray(raw)) {
    for (const entry of raw) {
      if (isJsonObject(entry)) {
        lines.push(`${String(entry.period)} ${String(entry.form_type)}: ${String(entry.status)}`);
      }
    }
  }
  return lines.length > 0 ? lines.join("\n") : renderScreen("FILING_STATUS_EMPTY", session.language);
}

function gstinLines(data: SessionData, session: Session): string {
  const gstins = readRegisteredGstins(data);
  if (gstins.length === 0) {
    return renderScreen("MULTI_GSTIN_EMPTY", session.language);
  }
  return gstins.map((entry, index) => `${index + 1}. ${entry.gstin} (${entry.label})`).join("\n");
}

function balanceLine(balance: number, session: Session): string {
  if (balance > 0) {
    return renderScreen("ITR_BALANCE_PAYABLE", session.language, { amount: formatRupees(balance) });
  }
  if (balance < 0) {
    return renderScreen("ITR_BALANCE_REFUND", session.language, { amount: formatRupees(-balance) });
  }
  return renderScreen("ITR_BALANCE_NONE", session.language);
}

function moduleLabelFromData(data: SessionData, key: string): string {
  const state = readDataString(data, key);
  return moduleLabel(moduleMenuForState(isConversationState(state) ? state : "MAIN_MENU"));
}

function isJsonObject(value: JsonValue): value is { [key: string]: JsonValue } {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}
