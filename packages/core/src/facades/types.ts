export type FacadeFailureKind = "invalid_input" | "unavailable" | "failed";

export type FacadeFailure = {
  kind: FacadeFailureKind;
  message: string;
};

export type FacadeResult<T> = { ok: true; value: T } | { ok: false; error: FacadeFailure };

export type GstReturnForm = "GSTR-3B" | "GSTR-1";
export type IncomeTaxForm = "ITR-1" | "ITR-4";
export type DocumentType = "invoice" | "form16" | "notice";

export type ValidatedGstin = {
  gstin: string;
  state_code: string;
  pan: string;
};

export type ParsedDocument = {
  document_type: DocumentType;
  summary: string;
  fields: Readonly<Record<string, string | number>>;
};

export type Gstr3bSummary = {
  period: string;
  output_tax: number;
  input_tax_credit: number;
  net_payable: number;
};

export type Gstr1Preview = {
  period: string;
  b2b_count: number;
  b2c_count: number;
  total_taxable: number;
};

export type CreditCheckSummary = {
  period: string;
  matched: number;
  value_mismatch: number;
  missing_in_2b: number;
  missing_in_books: number;
  additional_credit: number;
};

export type FilingStatusEntry = {
  period: string;
  form_type: string;
  status: string;
};

export type IncomeTaxEstimate = {
  form: IncomeTaxForm;
  taxable_income: number;
  tax_liability: number;
  /** Positive means the user owes tax, negative means a refund is due. */
  balance: number;
};

export type NotificationPreferences = {
  filing_reminders: boolean;
  risk_alerts: boolean;
  status_updates: boolean;
};

export type TransportMode = "road" | "rail" | "air" | "ship";

/** An uploaded invoice as sent for e-invoice or e-way bill generation. */
export type ExportInvoice = {
  invoice_number: string;
  taxable_value: number;
  media_ref: string;
};

export type TransportDetails = {
  vehicle_number: string;
  mode: TransportMode;
  distance_km: number;
};

export type EInvoiceRegistration = {
  irn: string;
  ack_number: string;
};

export type EwayBill = {
  ewb_number: string;
  valid_upto: string;
};

export interface IdentifierValidator {
  validateGstin(raw: string): Promise<FacadeResult<ValidatedGstin>>;
  validatePan(raw: string): Promise<FacadeResult<{ pan: string }>>;
}

export interface DocumentParser {
  parseDocument(input: {
    document_type: DocumentType;
    media_ref: string;
    media_kind: "image" | "document";
  }): Promise<FacadeResult<ParsedDocument>>;
}

/** IRN registration and e-way bill generation for uploaded invoices. */
export interface DocumentExporter {
  generateEInvoice(input: { gstin: string; invoice: ExportInvoice }): Promise<FacadeResult<EInvoiceRegistration>>;
  getEInvoiceStatus(input: { gstin: string; irn: string }): Promise<FacadeResult<{ irn: string; status: string }>>;
  cancelEInvoice(input: { gstin: string; irn: string }): Promise<FacadeResult<{ irn: string; status: string }>>;
  generateEwayBill(input: {
    gstin: string;
    invoice: ExportInvoice;
    transport: TransportDetails;
  }): Promise<FacadeResult<EwayBill>>;
  trackEwayBill(input: { gstin: string; ewb_number: string }): Promise<FacadeResult<EwayBill & { status: string }>>;
  updateEwayBillVehicle(input: {
    gstin: string;
    ewb_number: string;
    vehicle_number: string;
    reason: string;
  }): Promise<FacadeResult<EwayBill>>;
}

export interface TaxComputation {
  computeGstr3bSummary(input: { gstin: string; period: string }): Promise<FacadeResult<Gstr3bSummary>>;
  previewGstr1(input: { gstin: string; period: string }): Promise<FacadeResult<Gstr1Preview>>;
  submitGstReturn(input: {
    gstin: string;
    period: string;
    form_type: GstReturnForm;
    nil: boolean;
  }): Promise<FacadeResult<{ reference: string }>>;
  recordTaxPayment(input: {
    gstin: string;
    period: string;
    challan_number: string;
    amount: number;
  }): Promise<FacadeResult<{ reference: string }>>;
  runCreditCheck(input: { gstin: string; period: string }): Promise<FacadeResult<CreditCheckSummary>>;
  getFilingStatus(input: { gstin: string }): Promise<FacadeResult<{ entries: readonly FilingStatusEntry[] }>>;
  getRefundStatus(input: {
    gstin: string;
    period: string;
  }): Promise<FacadeResult<{ status: string; amount: number }>>;
  estimateIncomeTax(input: {
    form: IncomeTaxForm;
    pan: string;
    gross_income: number;
    deductions: number;
    tds: number;
  }): Promise<FacadeResult<IncomeTaxEstimate>>;
  submitIncomeTaxReturn(input: {
    form: IncomeTaxForm;
    pan: string;
  }): Promise<FacadeResult<{ reference: string }>>;
}

export interface NotificationScheduler {
  updatePreferences(input: {
    user_id: string;
    preferences: NotificationPreferences;
  }): Promise<FacadeResult<{ scheduled_reminders: number }>>;
  notifySuppliers(input: {
    user_id: string;
    gstin: string;
    period: string;
    missing_invoices: number;
  }): Promise<FacadeResult<{ notified: number }>>;
  requestCaCallback(input: {
    user_id: string;
    query: string | null;
    from_state: string;
  }): Promise<FacadeResult<{ ticket_id: string }>>;
}

export type DomainServices = {
  identifiers: IdentifierValidator;
  documents: DocumentParser;
  exports: DocumentExporter;
  tax: TaxComputation;
  notifications: NotificationScheduler;
};

export type DomainServiceName = keyof DomainServices;
