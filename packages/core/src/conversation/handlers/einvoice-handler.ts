import { invokeFacade } from "../../facades/invoke.ts";
import { withData } from "../../session/session.ts";
import type { ConversationState } from "../../session/states.ts";
import { parseIrn } from "../input-parsers.ts";
import { renderScreen } from "../screens/screen-catalog.ts";
import { EINVOICE_INVOICES_KEY, readExportInvoices } from "../screens/state-screens.ts";
import { activeGstin, gateOnGstin, outcomeToTransition, textOf } from "../transition-actions.ts";
import { screenNotice, unrecognizedInputTransition } from "../transitions.ts";
import {
  transitionTo,
  type ConversationHandler,
  type HandlerContext,
  type HandlerResponse,
} from "../types.ts";
import { collectExportInvoice, isDoneReply, registerEachInvoice } from "./export-invoices.ts";

const CLAIMED_STATES: ReadonlySet<ConversationState> = new Set<ConversationState>([
  "EINVOICE_MENU",
  "EINVOICE_UPLOAD",
  "EINVOICE_CONFIRM",
  "EINVOICE_STATUS_ASK",
  "EINVOICE_CANCEL",
]);

export const einvoiceHandler: ConversationHandler = {
  name: "einvoice",
  claims: (state) => CLAIMED_STATES.has(state),
  handle: async (context) => {
    const gstin = activeGstin(context);
    if (!gstin) {
      const outcome = await gateOnGstin("EINVOICE_MENU")(context);
      return transitionTo(
        outcomeToTransition(context, outcome, {
          navigation: { kind: "push", to: "WAIT_GSTIN" },
          reason: "einvoice.gstin_required",
        }),
      );
    }

    switch (context.session.state) {
      case "EINVOICE_MENU":
        return handleMenu(context);
      case "EINVOICE_UPLOAD":
        return isDoneReply(context)
          ? reviewInvoices(context)
          : collectExportInvoice(context, EINVOICE_INVOICES_KEY, "einvoice.invoice_added");
      case "EINVOICE_CONFIRM":
        return generateIrns(context, gstin);
      case "EINVOICE_STATUS_ASK":
        return checkIrnStatus(context, gstin);
      default:
        return cancelIrn(context, gstin);
    }
  },
};

function handleMenu(context: HandlerContext): HandlerResponse {
  const { input, session } = context;
  const choice = input.kind === "menu_choice" ? input.choice : null;
  switch (choice) {
    case 1:
      return transitionTo({
        navigation: { kind: "replace", to: "EINVOICE_UPLOAD" },
        data: withData(session.data, { [EINVOICE_INVOICES_KEY]: undefined }),
        replies: [],
        render_screen: true,
        reason: "einvoice.generate",
      });
    case 2:
      return transitionTo({
        navigation: { kind: "replace", to: "EINVOICE_STATUS_ASK" },
        replies: [],
        render_screen: true,
        reason: "einvoice.status",
      });
    case 3:
      return transitionTo({
        navigation: { kind: "replace", to: "EINVOICE_CANCEL" },
        replies: [],
        render_screen: true,
        reason: "einvoice.cancel",
      });
    default:
      return transitionTo(unrecognizedInputTransition(session, context.now));
  }
}

function reviewInvoices(context: HandlerContext): HandlerResponse {
  const { session } = context;
  if (readExportInvoices(session.data, EINVOICE_INVOICES_KEY).length === 0) {
    return transitionTo({
      navigation: { kind: "stay" },
      replies: [screenNotice("INVOICE_UPLOAD_EMPTY", session)],
      render_screen: false,
      reason: "einvoice.upload_empty",
    });
  }
  return transitionTo({
    navigation: { kind: "replace", to: "EINVOICE_CONFIRM" },
    replies: [],
    render_screen: true,
    reason: "einvoice.review",
  });
}

async function generateIrns(context: HandlerContext, gstin: string): Promise<HandlerResponse> {
  const { input, session } = context;
  const confirmed = (input.kind === "confirmation" && input.confirmed) ||
    (input.kind === "menu_choice" && input.choice === 1);
  const data = withData(session.data, { [EINVOICE_INVOICES_KEY]: undefined });

  if (!confirmed) {
    return transitionTo({
      navigation: { kind: "pop" },
      data,
      replies: [screenNotice("EINVOICE_ABANDONED", session)],
      render_screen: true,
      reason: "einvoice.abandoned",
    });
  }

  const resultLines = await registerEachInvoice(
    context,
    readExportInvoices(session.data, EINVOICE_INVOICES_KEY),
    (invoice) =>
      invokeFacade(
        { service: "exports", operation: "generateEInvoice", field: "invoice" },
        () => context.services.exports.generateEInvoice({ gstin, invoice }),
      ),
    (invoice, registration) =>
      renderScreen("EINVOICE_LINE_OK", session.language, {
        invoice_number: invoice.invoice_number,
        irn: registration.irn,
        ack_number: registration.ack_number,
      }),
  );

  return transitionTo({
    navigation: { kind: "pop" },
    data,
    replies: [screenNotice("EINVOICE_RESULTS", session, { result_lines: resultLines })],
    render_screen: true,
    reason: "einvoice.generated",
  });
}

async function checkIrnStatus(context: HandlerContext, gstin: string): Promise<HandlerResponse> {
  const irn = parseIrn(textOf(context));
  const status = await invokeFacade(
    { service: "exports", operation: "getEInvoiceStatus", field: "irn" },
    () => context.services.exports.getEInvoiceStatus({ gstin, irn }),
  );
  return transitionTo({
    navigation: { kind: "pop" },
    replies: [screenNotice("EINVOICE_STATUS", context.session, { irn: status.irn, status: status.status })],
    render_screen: true,
    reason: "einvoice.status_checked",
  });
}

async function cancelIrn(context: HandlerContext, gstin: string): Promise<HandlerResponse> {
  const irn = parseIrn(textOf(context));
  const cancelled = await invokeFacade(
    { service: "exports", operation: "cancelEInvoice", field: "irn" },
    () => context.services.exports.cancelEInvoice({ gstin, irn }),
  );
  return transitionTo({
    navigation: { kind: "pop" },
    replies: [screenNotice("EINVOICE_CANCELLED", context.session, { irn: cancelled.irn, status: cancelled.status })],
    render_screen: true,
    reason: "einvoice.cancelled",
  });
}
