import { ValidationError } from "../../errors.ts";
import { invokeFacade } from "../../facades/invoke.ts";
import type { ExportInvoice } from "../../facades/types.ts";
import { withData } from "../../session/session.ts";
import { renderScreen } from "../screens/screen-catalog.ts";
import { readExportInvoices } from "../screens/state-screens.ts";
import { textOf } from "../transition-actions.ts";
import { screenNotice, unrecognizedInputTransition } from "../transitions.ts";
import { transitionTo, type HandlerContext, type HandlerResponse } from "../types.ts";

export function isDoneReply(context: HandlerContext): boolean {
  return textOf(context).toLowerCase() === "done";
}

/** Reads one uploaded invoice and appends it to the list stored under `key`. */
export async function collectExportInvoice(
  context: HandlerContext,
  key: string,
  reason: string,
): Promise<HandlerResponse> {
  const { input, session } = context;
  if (input.kind !== "media") {
    return transitionTo(unrecognizedInputTransition(session, context.now));
  }

  const { media_ref, media_kind } = input;
  const parsed = await invokeFacade(
    { service: "documents", operation: "parseDocument", field: "document" },
    () => context.services.documents.parseDocument({ document_type: "invoice", media_ref, media_kind }),
  );
  const { invoice_number: invoiceNumber, taxable_value: taxableValue } = parsed.fields;
  const invoice: ExportInvoice = {
    invoice_number: typeof invoiceNumber === "string" && invoiceNumber.trim() ? invoiceNumber.trim() : parsed.summary,
    taxable_value: typeof taxableValue === "number" ? taxableValue : 0,
    media_ref,
  };
  const invoices = [...readExportInvoices(session.data, key), invoice];

  return transitionTo({
    navigation: { kind: "stay" },
    data: withData(session.data, { [key]: invoices }),
    replies: [
      screenNotice("EXPORT_INVOICE_ADDED", session, {
        count: invoices.length,
        invoice_number: invoice.invoice_number,
      }),
    ],
    render_screen: false,
    reason,
  });
}

/**
 * Runs `register` for each invoice in order. A rejected invoice becomes a failure line and the
 * rest still run; an unavailable service aborts the turn.
 */
export async function registerEachInvoice<T>(
  context: HandlerContext,
  invoices: readonly ExportInvoice[],
  register: (invoice: ExportInvoice) => Promise<T>,
  successLine: (invoice: ExportInvoice, result: T) => string,
): Promise<string> {
  const lines: string[] = [];
  for (const invoice of invoices) {
    try {
      lines.push(successLine(invoice, await register(invoice)));
    } catch (error) {
      if (!(error instanceof ValidationError)) {
        throw error;
      }
      lines.push(
        renderScreen("EXPORT_LINE_FAILED", context.session.language, {
          invoice_number: invoice.invoice_number,
          reason: error.message,
        }),
      );
    }
  }
  return lines.join("\n");
}
