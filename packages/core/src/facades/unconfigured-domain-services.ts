import { createFormatIdentifierValidator } from "./identifier-validator.ts";
import type { DomainServices, FacadeResult } from "./types.ts";

/**
 * Used when no domain-service base URL is configured. Identifier checks still run locally;
 * every other call reports `unavailable`, which the engine turns into an apology.
 */
export function createUnconfiguredDomainServices(): DomainServices {
  const unavailable = async <T>(): Promise<FacadeResult<T>> => ({
    ok: false,
    error: { kind: "unavailable", message: "Domain services are not configured." },
  });

  return {
    identifiers: createFormatIdentifierValidator(),
    documents: { parseDocument: unavailable },
    exports: {
      generateEInvoice: unavailable,
      getEInvoiceStatus: unavailable,
      cancelEInvoice: unavailable,
      generateEwayBill: unavailable,
      trackEwayBill: unavailable,
      updateEwayBillVehicle: unavailable,
    },
    tax: {
      computeGstr3bSummary: unavailable,
      previewGstr1: unavailable,
      submitGstReturn: unavailable,
      recordTaxPayment: unavailable,
      runCreditCheck: unavailable,
      getFilingStatus: unavailable,
      getRefundStatus: unavailable,
      estimateIncomeTax: unavailable,
      submitIncomeTaxReturn: unavailable,
    },
    notifications: {
      updatePreferences: unavailable,
      notifySuppliers: unavailable,
      requestCaCallback: unavailable,
    },
  };
}
