import { createFormatIdentifierValidator } from "./identifier-validator.ts";
import type {
  CreditCheckSummary,
  DocumentExporter,
  DocumentParser,
  DomainServices,
  EInvoiceRegistration,
  EwayBill,
  FacadeResult,
  FilingStatusEntry,
  Gstr1Preview,
  Gstr3bSummary,
  IdentifierValidator,
  IncomeTaxEstimate,
  NotificationScheduler,
  ParsedDocument,
  TaxComputation,
} from "./types.ts";

const DEFAULT_TIMEOUT_MS = 8000;

export type HttpDomainServicesConfig = {
  baseUrl: string;
  apiToken?: string | null;
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
  identifiers?: IdentifierValidator;
};

type JsonRecord = Record<string, unknown>;
type Parser<T> = (payload: JsonRecord) => T | null;
type PostJson = <T>(path: string, body: JsonRecord, parse: Parser<T>) => Promise<FacadeResult<T>>;

/**
 * Domain facades backed by one JSON-over-HTTP back office. Each operation is a POST to
 * `${baseUrl}/<path>`; 400/422 map to `invalid_input`, 5xx and transport failures to
 * `unavailable`, anything else to `failed`.
 */
export function createHttpDomainServices(config: HttpDomainServicesConfig): DomainServices {
  const post = createJsonPoster(config);

  return {
    identifiers: config.identifiers ?? createFormatIdentifierValidator(),
    documents: createDocumentParser(post),
    exports: createDocumentExporter(post),
    tax: createTaxComputation(post),
    notifications: createNotificationScheduler(post),
  };
}

function createDocumentParser(post: PostJson): DocumentParser {
  return {
    parseDocument: (input) =>
      post("documents/parse", { ...input }, (payload): ParsedDocument | null => {
        const summary = readString(payload, "summary");
        const fields = readFieldMap(payload.fields);
        if (summary === null || fields === null) {
          return null;
        }
        return { document_type: input.document_type, summary, fields };
      }),
  };
}

function createDocumentExporter(post: PostJson): DocumentExporter {
  return {
    generateEInvoice: (input) =>
      post("einvoice/generate", { ...input }, (payload): EInvoiceRegistration | null => {
        const irn = readString(payload, "irn");
        const ackNumber = readString(payload, "ack_number");
        return irn === null || ackNumber === null ? null : { irn, ack_number: ackNumber };
      }),
    getEInvoiceStatus: (input) => post("einvoice/status", { ...input }, parseIrnStatus),
    cancelEInvoice: (input) => post("einvoice/cancel", { ...input }, parseIrnStatus),
    generateEwayBill: (input) => post("ewaybill/generate", { ...input }, parseEwayBill),
    trackEwayBill: (input) =>
      post("ewaybill/track", { ...input }, (payload) => {
        const bill = parseEwayBill(payload);
        const status = readString(payload, "status");
        return bill === null || status === null ? null : { ...bill, status };
      }),
    updateEwayBillVehicle: (input) => post("ewaybill/vehicle", { ...input }, parseEwayBill),
  };
}

function createTaxComputation(post: PostJson): TaxComputation {
  return {
    computeGstr3bSummary: (input) =>
      post("gst/gstr3b/summary", { ...input }, (payload): Gstr3bSummary | null => {
        const outputTax = readNumber(payload, "output_tax");
        const inputTaxCredit = readNumber(payload, "input_tax_credit");
        const netPayable = readNumber(payload, "net_payable");
        if (outputTax === null || inputTaxCredit === null || netPayable === null) {
          return null;
        }
        return {
          period: input.period,
          output_tax: outputTax,
          input_tax_credit: inputTaxCredit,
          net_payable: netPayable,
        };
      }),
    previewGstr1: (input) =>
      post("gst/gstr1/preview", { ...input }, (payload): Gstr1Preview | null => {
        const b2bCount = readNumber(payload, "b2b_count");
        const b2cCount = readNumber(payload, "b2c_count");
        const totalTaxable = readNumber(payload, "total_taxable");
        if (b2bCount === null || b2cCount === null || totalTaxable === null) {
          return null;
        }
        return {
          period: input.period,
          b2b_count: b2bCount,
          b2c_count: b2cCount,
          total_taxable: totalTaxable,
        };
      }),
    submitGstReturn: (input) => post("gst/returns", { ...input }, parseReference),
    recordTaxPayment: (input) => post("gst/payments", { ...input }, parseReference),
    runCreditCheck: (input) =>
      post("gst/credit-check", { ...input }, (payload): CreditCheckSummary | null => {
        const matched = readNumber(payload, "matched");
        const valueMismatch = readNumber(payload, "value_mismatch");
        const missingIn2b = readNumber(payload, "missing_in_2b");
        const missingInBooks = readNumber(payload, "missing_in_books");
        const additionalCredit = readNumber(payload, "additional_credit");
        if (
          matched === null ||
          valueMismatch === null ||
          missingIn2b === null ||
          missingInBooks === null ||
          additionalCredit === null
        ) {
          return null;
        }
        return {
          period: input.period,
          matched,
          value_mismatch: valueMismatch,
          missing_in_2b: missingIn2b,
          missing_in_books: missingInBooks,
          additional_credit: additionalCredit,
        };
      }),
    getFilingStatus: (input) =>
      post("gst/filing-status", { ...input }, (payload) => {
        if (!Array.isArray(payload.entries)) {
          return null;
        }
        const entries: FilingStatusEntry[] = [];
        for (const entry of payload.entries) {
          if (!isRecord(entry)) {
            return null;
          }
          const period = readString(entry, "period");
          const formType = readString(entry, "form_type");
          const status = readString(entry, "status");
          if (period === null || formType === null || status === null) {
            return null;
          }
          entries.push({ period, form_type: formType, status });
        }
        return { entries };
      }),
    getRefundStatus: (input) =>
      post("gst/refunds/status", { ...input }, (payload) => {
        const status = readString(payload, "status");
        const amount = readNumber(payload, "amount");
        return status === null || amount === null ? null : { status, amount };
      }),
    estimateIncomeTax: (input) =>
      post("itr/estimate", { ...input }, (payload): IncomeTaxEstimate | null => {
        const taxableIncome = readNumber(payload, "taxable_income");
        const taxLiability = readNumber(payload, "tax_liability");
        const balance = readNumber(payload, "balance");
        if (taxableIncome === null || taxLiability === null || balance === null) {
          return null;
        }
        return {
          form: input.form,
          taxable_income: taxableIncome,
          tax_liability: taxLiability,
          balance,
        };
      }),
    submitIncomeTaxReturn: (input) => post("itr/returns", { ...input }, parseReference),
  };
}

function createNotificationScheduler(post: PostJson): NotificationScheduler {
  return {
    updatePreferences: (input) =>
      post("notifications/preferences", { user_id: input.user_id, ...input.preferences }, (payload) => {
        const scheduled = readNumber(payload, "scheduled_reminders");
        return scheduled === null ? null : { scheduled_reminders: scheduled };
      }),
    notifySuppliers: (input) =>
      post("notifications/suppliers", { ...input }, (payload) => {
        const notified = readNumber(payload, "notified");
        return notified === null ? null : { notified };
      }),
    requestCaCallback: (input) =>
      post("handoff/ca", { ...input }, (payload) => {
        const ticketId = readString(payload, "ticket_id");
        return ticketId === null ? null : { ticket_id: ticketId };
      }),
  };
}

function createJsonPoster(config: HttpDomainServicesConfig): PostJson {
  const baseUrl = config.baseUrl.trim().replace(/\/+$/, "");
  if (!baseUrl) {
    throw new Error("Domain services base URL is required.");
  }
  const fetchImpl = config.fetchImpl ?? globalThis.fetch;
  const timeoutMs = config.timeoutMs !== undefined && Number.isFinite(config.timeoutMs)
    ? Math.max(1, Math.trunc(config.timeoutMs))
    : DEFAULT_TIMEOUT_MS;
  const headers: Record<string, string> = { "content-type": "application/json" };
  if (config.apiToken) {
    headers.Authorization = `Bearer ${config.apiToken}`;
  }

  return async <T>(path: string, body: JsonRecord, parse: Parser<T>): Promise<FacadeResult<T>> => {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      controller.abort("domain_service_timeout");
    }, timeoutMs);

    let response: Response;
    try {
      response = await fetchImpl(`${baseUrl}/${path}`, {
        method: "POST",
        headers,
        body: JSON.stringify(body),
        signal: controller.signal,
      });
    } catch {
      return {
        ok: false,
        error: {
          kind: "unavailable",
          message: controller.signal.aborted ? `${path} timed out.` : `${path} request failed.`,
        },
      };
    } finally {
      clearTimeout(timeoutId);
    }

    const json: unknown = await response.json().catch(() => null);
    if (!response.ok) {
      const message = (isRecord(json) ? readString(json, "message") : null) ??
        `${path} failed with status ${response.status}.`;
      if (response.status === 400 || response.status === 422) {
        return { ok: false, error: { kind: "invalid_input", message } };
      }
      return {
        ok: false,
        error: { kind: response.status >= 500 ? "unavailable" : "failed", message },
      };
    }

    const value = isRecord(json) ? parse(json) : null;
    if (value === null) {
      return { ok: false, error: { kind: "failed", message: `${path} returned an invalid payload.` } };
    }
    return { ok: true, value };
  };
}

function parseReference(payload: JsonRecord): { reference: string } | null {
  const reference = readString(payload, "reference");
  return reference === null ? null : { reference };
}

function parseIrnStatus(payload: JsonRecord): { irn: string; status: string } | null {
  const irn = readString(payload, "irn");
  const status = readString(payload, "status");
  return irn === null || status === null ? null : { irn, status };
}

function parseEwayBill(payload: JsonRecord): EwayBill | null {
  const ewbNumber = readString(payload, "ewb_number");
  const validUpto = readString(payload, "valid_upto");
  return ewbNumber === null || validUpto === null ? null : { ewb_number: ewbNumber, valid_upto: validUpto };
}

function readFieldMap(value: unknown): Record<string, string | number> | null {
  if (!isRecord(value)) {
    return null;
  }
  const fields: Record<string, string | number> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === "string" || (typeof entry === "number" && Number.isFinite(entry))) {
      fields[key] = entry;
    }
  }
  return fields;
}

function readString(payload: JsonRecord, key: string): string | null {
  const value = payload[key];
  return typeof value === "string" && value.trim().length > 0 ? value : null;
}

function readNumber(payload: JsonRecord, key: string): number | null {
  const value = payload[key];
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function isRecord(value: unknown): value is JsonRecord {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}
