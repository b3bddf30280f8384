import { invokeFacade } from "../../facades/invoke.ts";
import { withData } from "../../session/session.ts";
import type { ConversationState } from "../../session/states.ts";
import { parseEwayBillNumber, parseTransportDetails, parseVehicleUpdate } from "../input-parsers.ts";
import { renderScreen } from "../screens/screen-catalog.ts";
import { EWAYBILL_INVOICES_KEY, readExportInvoices } from "../screens/state-screens.ts";
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
  "EWAYBILL_MENU",
  "EWAYBILL_UPLOAD",
  "EWAYBILL_TRANSPORT",
  "EWAYBILL_TRACK_ASK",
  "EWAYBILL_VEHICLE_ASK",
]);

const MENU_TARGETS: Readonly<Partial<Record<number, ConversationState>>> = {
  1: "EWAYBILL_UPLOAD",
  2: "EWAYBILL_TRACK_ASK",
  3: "EWAYBILL_VEHICLE_ASK",
};

export const ewaybillHandler: ConversationHandler = {
  name: "ewaybill",
  claims: (state) => CLAIMED_STATES.has(state),
  handle: async (context) => {
    const gstin = activeGstin(context);
    if (!gstin) {
      const outcome = await gateOnGstin("EWAYBILL_MENU")(context);
      return transitionTo(
        outcomeToTransition(context, outcome, {
          navigation: { kind: "push", to: "WAIT_GSTIN" },
          reason: "ewaybill.gstin_required",
        }),
      );
    }

    switch (context.session.state) {
      case "EWAYBILL_MENU":
        return handleMenu(context);
      case "EWAYBILL_UPLOAD":
        return isDoneReply(context)
          ? askForTransport(context)
          : collectExportInvoice(context, EWAYBILL_INVOICES_KEY, "ewaybill.invoice_added");
      case "EWAYBILL_TRANSPORT":
        return generateEwayBills(context, gstin);
      case "EWAYBILL_TRACK_ASK":
        return trackEwayBill(context, gstin);
      default:
        return updateVehicle(context, gstin);
    }
  },
};

function handleMenu(context: HandlerContext): HandlerResponse {
  const { input, session } = context;
  const target = input.kind === "menu_choice" ? MENU_TARGETS[input.choice] : undefined;
  if (!target) {
    return transitionTo(unrecognizedInputTransition(session, context.now));
  }
  return transitionTo({
    navigation: { kind: "replace", to: target },
    data: target === "EWAYBILL_UPLOAD" ? withData(session.data, { [EWAYBILL_INVOICES_KEY]: undefined }) : undefined,
    replies: [],
    render_screen: true,
    reason: `ewaybill.${target.slice("EWAYBILL_".length).toLowerCase()}`,
  });
}

function askForTransport(context: HandlerContext): HandlerResponse {
  const { session } = context;
  if (readExportInvoices(session.data, EWAYBILL_INVOICES_KEY).length === 0) {
    return transitionTo({
      navigation: { kind: "stay" },
      replies: [screenNotice("INVOICE_UPLOAD_EMPTY", session)],
      render_screen: false,
      reason: "ewaybill.upload_empty",
    });
  }
  return transitionTo({
    navigation: { kind: "replace", to: "EWAYBILL_TRANSPORT" },
    replies: [],
    render_screen: true,
    reason: "ewaybill.transport_requested",
  });
}

async function generateEwayBills(context: HandlerContext, gstin: string): Promise<HandlerResponse> {
  const { session } = context;
  const transport = parseTransportDetails(textOf(context));
  const resultLines = await registerEachInvoice(
    context,
    readExportInvoices(session.data, EWAYBILL_INVOICES_KEY),
    (invoice) =>
      invokeFacade(
        { service: "exports", operation: "generateEwayBill", field: "invoice" },
        () => context.services.exports.generateEwayBill({ gstin, invoice, transport }),
      ),
    (invoice, bill) =>
      renderScreen("EWAYBILL_LINE_OK", session.language, {
        invoice_number: invoice.invoice_number,
        ewb_number: bill.ewb_number,
        valid_upto: bill.valid_upto,
      }),
  );

  return transitionTo({
    navigation: { kind: "pop" },
    data: withData(session.data, { [EWAYBILL_INVOICES_KEY]: undefined }),
    replies: [screenNotice("EWAYBILL_RESULTS", session, { result_lines: resultLines })],
    render_screen: true,
    reason: "ewaybill.generated",
  });
}

async function trackEwayBill(context: HandlerContext, gstin: string): Promise<HandlerResponse> {
  const ewbNumber = parseEwayBillNumber(textOf(context));
  const bill = await invokeFacade(
    { service: "exports", operation: "trackEwayBill", field: "ewb_number" },
    () => context.services.exports.trackEwayBill({ gstin, ewb_number: ewbNumber }),
  );
  return transitionTo({
    navigation: { kind: "pop" },
    replies: [
      screenNotice("EWAYBILL_STATUS", context.session, {
        ewb_number: bill.ewb_number,
        status: bill.status,
        valid_upto: bill.valid_upto,
      }),
    ],
    render_screen: true,
    reason: "ewaybill.tracked",
  });
}

async function updateVehicle(context: HandlerContext, gstin: string): Promise<HandlerResponse> {
  const update = parseVehicleUpdate(textOf(context));
  const bill = await invokeFacade(
    { service: "exports", operation: "updateEwayBillVehicle", field: "vehicle_update" },
    () => context.services.exports.updateEwayBillVehicle({ gstin, ...update }),
  );
  return transitionTo({
    navigation: { kind: "pop" },
    replies: [
      screenNotice("EWAYBILL_VEHICLE_UPDATED", context.session, {
        ewb_number: bill.ewb_number,
        vehicle_number: update.vehicle_number,
        valid_upto: bill.valid_upto,
      }),
    ],
    render_screen: true,
    reason: "ewaybill.vehicle_updated",
  });
}
