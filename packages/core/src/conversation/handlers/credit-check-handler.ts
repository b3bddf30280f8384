import { invokeFacade } from "../../facades/invoke.ts";
import { readDataRecord, withData } from "../../session/session.ts";
import type { ConversationState } from "../../session/states.ts";
import { currentFilingPeriod, parsePeriod } from "../input-parsers.ts";
import { activeGstin, gateOnGstin, outcomeToTransition, textOf } from "../transition-actions.ts";
import { screenNotice, unrecognizedInputTransition } from "../transitions.ts";
import {
  transitionTo,
  type ConversationHandler,
  type HandlerContext,
  type HandlerResponse,
} from "../types.ts";

const CLAIMED_STATES: ReadonlySet<ConversationState> = new Set<ConversationState>([
  "MEDIUM_CREDIT_CHECK",
  "MEDIUM_CREDIT_RESULT",
  "GST_FILING_STATUS",
]);

export const creditCheckHandler: ConversationHandler = {
  name: "credit_check",
  claims: (state) => CLAIMED_STATES.has(state),
  handle: async (context) => {
    switch (context.session.state) {
      case "MEDIUM_CREDIT_CHECK":
        return runCreditCheck(context);
      case "MEDIUM_CREDIT_RESULT":
        return handleCreditResult(context);
      default:
        return transitionTo({
          navigation: { kind: "pop" },
          replies: [],
          render_screen: true,
          reason: "filing_status.closed",
        });
    }
  },
};

async function runCreditCheck(context: HandlerContext): Promise<HandlerResponse> {
  const { input, session } = context;
  if (input.kind === "media" || input.kind === "empty") {
    return transitionTo(unrecognizedInputTransition(session, context.now));
  }

  const gstin = activeGstin(context);
  if (!gstin) {
    const outcome = await gateOnGstin("MEDIUM_CREDIT_CHECK")(context);
    return transitionTo(
      outcomeToTransition(context, outcome, {
        navigation: { kind: "push", to: "WAIT_GSTIN" },
        reason: "credit_check.gstin_required",
      }),
    );
  }

  const period = input.kind === "menu_choice" && input.choice === 1
    ? currentFilingPeriod(context.now)
    : parsePeriod(textOf(context), context.now);
  const summary = await invokeFacade(
    { service: "tax", operation: "runCreditCheck" },
    () => context.services.tax.runCreditCheck({ gstin, period }),
  );

  return transitionTo({
    navigation: { kind: "replace", to: "MEDIUM_CREDIT_RESULT" },
    data: withData(session.data, {
      credit_check: {
        period: summary.period,
        matched: summary.matched,
        value_mismatch: summary.value_mismatch,
        missing_in_2b: summary.missing_in_2b,
        missing_in_books: summary.missing_in_books,
        additional_credit: summary.additional_credit,
      },
    }),
    replies: [],
    render_screen: true,
    reason: "credit_check.completed",
  });
}

async function handleCreditResult(context: HandlerContext): Promise<HandlerResponse> {
  const { input, session } = context;
  const result = readDataRecord(session.data, "credit_check");
  const storedPeriod = result?.period;
  const period = typeof storedPeriod === "string" ? storedPeriod : currentFilingPeriod(context.now);
  const count = (field: string): number => {
    const value = result?.[field];
    return typeof value === "number" ? value : 0;
  };

  const choice = input.kind === "menu_choice" ? input.choice : null;
  const gstin = activeGstin(context);

  if (choice === 1 && gstin) {
    const summary = await invokeFacade(
      { service: "tax", operation: "computeGstr3bSummary" },
      () => context.services.tax.computeGstr3bSummary({ gstin, period }),
    );
    return transitionTo({
      navigation: { kind: "replace", to: "GST_3B_SUMMARY" },
      data: withData(session.data, {
        gst_filing_3b: {
          period: summary.period,
          output_tax: summary.output_tax,
          input_tax_credit: summary.input_tax_credit,
          net_payable: summary.net_payable,
        },
      }),
      replies: [],
      render_screen: true,
      reason: "credit_check.continue_to_gstr3b",
    });
  }

  if (choice === 2) {
    return transitionTo({
      navigation: { kind: "stay" },
      replies: [
        screenNotice("CREDIT_CHECK_DETAILS", session, {
          period,
          value_mismatch: count("value_mismatch"),
          missing_in_2b: count("missing_in_2b"),
          missing_in_books: count("missing_in_books"),
        }),
      ],
      render_screen: false,
      reason: "credit_check.details",
    });
  }

  if (choice === 3 && gstin) {
    const missing = count("missing_in_2b");
    if (missing === 0) {
      return transitionTo({
        navigation: { kind: "stay" },
        replies: [screenNotice("NO_MISSING_INVOICES", session)],
        render_screen: false,
        reason: "credit_check.no_reminders",
      });
    }
    const reminder = await invokeFacade(
      { service: "notifications", operation: "notifySuppliers" },
      () =>
        context.services.notifications.notifySuppliers({
          user_id: session.user_id,
          gstin,
          period,
          missing_invoices: missing,
        }),
    );
    return transitionTo({
      navigation: { kind: "stay" },
      replies: [screenNotice("SUPPLIERS_NOTIFIED", session, { notified: reminder.notified })],
      render_screen: false,
      reason: "credit_check.suppliers_notified",
    });
  }

  return transitionTo({
    navigation: { kind: "pop" },
    replies: [],
    render_screen: true,
    reason: "credit_check.closed",
  });
}
