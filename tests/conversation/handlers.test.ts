import { describe, expect, it } from "vitest";
import { dispatchHandlerChain } from "../../packages/core/src/conversation/handler-chain.ts";
import { creditCheckHandler } from "../../packages/core/src/conversation/handlers/credit-check-handler.ts";
import { einvoiceHandler } from "../../packages/core/src/conversation/handlers/einvoice-handler.ts";
import { ewaybillHandler } from "../../packages/core/src/conversation/handlers/ewaybill-handler.ts";
import { moduleSwitchHandler } from "../../packages/core/src/conversation/handlers/module-switch-handler.ts";
import { multiGstinHandler } from "../../packages/core/src/conversation/handlers/multi-gstin-handler.ts";
import { notificationPreferencesHandler } from "../../packages/core/src/conversation/handlers/notification-preferences-handler.ts";
import { createDefaultHandlerChain } from "../../packages/core/src/conversation/handlers/registry.ts";
import { createSessionExpiryHandler } from "../../packages/core/src/conversation/handlers/session-expiry-handler.ts";
import type { HandlerResponse, StateTransition } from "../../packages/core/src/conversation/types.ts";
import { ValidationError } from "../../packages/core/src/errors.ts";
import type { ExportInvoice, TransportDetails } from "../../packages/core/src/facades/types.ts";
import {
  VALID_GSTIN,
  contextFor,
  createFakeDomainServices,
  mediaEvent,
  sessionAt,
  textEvent,
} from "../support/conversation-fixtures.ts";

const MINUTE_MS = 60_000;

function transitionOf(response: HandlerResponse): StateTransition {
  if (response.kind !== "transition") {
    throw new Error("expected the handler to produce a transition");
  }
  return response.transition;
}

describe("session expiry handler", () => {
  const expiry = createSessionExpiryHandler();

  it("offers to resume after a long pause outside the main menu", async () => {
    const response = await expiry.handle(
      contextFor(sessionAt({ state: "GST_MENU" }), textEvent("1"), { idleMs: 31 * MINUTE_MS }),
    );

    expect(transitionOf(response)).toEqual({
      navigation: { kind: "replace", to: "SESSION_RESUME_PROMPT" },
      data: { pre_expiry_state: "GST_MENU" },
      replies: [],
      render_screen: true,
      reason: "session.resume_prompted",
    });
  });

  it("expires a pending confirmation sooner", async () => {
    const response = await expiry.handle(
      contextFor(
        sessionAt({ state: "NIL_FILING_CONFIRM", data: { nil_form: "both" } }),
        textEvent("yes"),
        { idleMs: 11 * MINUTE_MS },
      ),
    );

    const transition = transitionOf(response);
    expect(transition.navigation).toEqual({ kind: "replace", to: "SENSITIVE_CONFIRM_EXPIRED" });
    expect(transition.data).toEqual({ nil_form: "both", pre_expiry_state: "NIL_FILING_CONFIRM" });
  });

  it("passes for recent activity and for the main menu", async () => {
    expect(
      await expiry.handle(contextFor(sessionAt({ state: "GST_MENU" }), textEvent("1"), { idleMs: 5 * MINUTE_MS })),
    ).toEqual({ kind: "pass" });
    expect(
      await expiry.handle(contextFor(sessionAt(), textEvent("1"), { idleMs: 600 * MINUTE_MS })),
    ).toEqual({ kind: "pass" });
  });

  it("honours configured thresholds", async () => {
    const strict = createSessionExpiryHandler({ resumePromptMs: MINUTE_MS });
    const response = await strict.handle(
      contextFor(sessionAt({ state: "ITR_MENU" }), textEvent("1"), { idleMs: MINUTE_MS }),
    );

    expect(transitionOf(response).reason).toBe("session.resume_prompted");
  });

  it("continues where the user left off", async () => {
    const response = await expiry.handle(
      contextFor(
        sessionAt({ state: "SESSION_RESUME_PROMPT", data: { pre_expiry_state: "NIL_FILING_MENU", gstin: VALID_GSTIN } }),
        textEvent("1"),
      ),
    );

    const transition = transitionOf(response);
    expect(transition.navigation).toEqual({ kind: "replace", to: "NIL_FILING_MENU" });
    expect(transition.data).toEqual({ gstin: VALID_GSTIN });
    expect(transition.reason).toBe("session.resumed");
  });

  it("restarts the paused module with fresh flow data", async () => {
    const response = await expiry.handle(
      contextFor(
        sessionAt({
          state: "SESSION_RESUME_PROMPT",
          data: { pre_expiry_state: "ITR1_ASK_SALARY", itr_pan: "ABCDE1234F", gstin: VALID_GSTIN },
        }),
        textEvent("2"),
      ),
    );

    const transition = transitionOf(response);
    expect(transition.navigation).toEqual({ kind: "replace", to: "ITR_MENU" });
    expect(transition.data).toEqual({ gstin: VALID_GSTIN });
  });

  it("goes to the main menu on the third option", async () => {
    const response = await expiry.handle(
      contextFor(sessionAt({ state: "SESSION_RESUME_PROMPT", data: { pre_expiry_state: "GST_MENU" } }), textEvent("3")),
    );

    const transition = transitionOf(response);
    expect(transition.navigation).toEqual({ kind: "reset" });
    expect(transition.data).toEqual({});
  });

  it("reopens an expired confirmation on any message", async () => {
    const response = await expiry.handle(
      contextFor(
        sessionAt({ state: "SENSITIVE_CONFIRM_EXPIRED", data: { pre_expiry_state: "GST_PAYMENT_CONFIRM" } }),
        textEvent("ok"),
      ),
    );

    const transition = transitionOf(response);
    expect(transition.navigation).toEqual({ kind: "replace", to: "GST_PAYMENT_CONFIRM" });
    expect(transition.reason).toBe("sensitive_confirm.reopened");
  });
});

describe("module switch handler", () => {
  it("asks before switching to another module", async () => {
    const response = await moduleSwitchHandler.handle(
      contextFor(sessionAt({ state: "NIL_FILING_MENU", stack: ["GST_MENU"] }), textEvent("ITR")),
    );

    const transition = transitionOf(response);
    expect(transition.navigation).toEqual({ kind: "replace", to: "CONFIRM_SWITCH_MODULE" });
    expect(transition.data).toEqual({
      switch_target_module: "ITR_MENU",
      switch_source_state: "NIL_FILING_MENU",
    });
  });

  it("passes for the current module and inside free-input states", async () => {
    expect(
      await moduleSwitchHandler.handle(contextFor(sessionAt({ state: "GST_MENU" }), textEvent("gst"))),
    ).toEqual({ kind: "pass" });
    expect(
      await moduleSwitchHandler.handle(contextFor(sessionAt({ state: "WAIT_GSTIN" }), textEvent("itr"))),
    ).toEqual({ kind: "pass" });
  });

  it("resets into the target module once confirmed", async () => {
    const response = await moduleSwitchHandler.handle(
      contextFor(
        sessionAt({
          state: "CONFIRM_SWITCH_MODULE",
          data: { switch_target_module: "ITR_MENU", switch_source_state: "GST_MENU", gstin: VALID_GSTIN },
        }),
        textEvent("1"),
      ),
    );

    const transition = transitionOf(response);
    expect(transition.navigation).toEqual({ kind: "reset", to: "ITR_MENU" });
    expect(transition.data).toEqual({ gstin: VALID_GSTIN });
  });

  it("returns to the source state when declined", async () => {
    const response = await moduleSwitchHandler.handle(
      contextFor(
        sessionAt({
          state: "CONFIRM_SWITCH_MODULE",
          data: { switch_target_module: "ITR_MENU", switch_source_state: "GST_MENU" },
        }),
        textEvent("2"),
      ),
    );

    const transition = transitionOf(response);
    expect(transition.navigation).toEqual({ kind: "replace", to: "GST_MENU" });
    expect(transition.data).toEqual({});
  });
});

describe("credit check handler", () => {
  it("runs a credit check for the current period", async () => {
    const response = await creditCheckHandler.handle(
      contextFor(sessionAt({ state: "MEDIUM_CREDIT_CHECK", data: { gstin: VALID_GSTIN } }), textEvent("1")),
    );

    const transition = transitionOf(response);
    expect(transition.navigation).toEqual({ kind: "replace", to: "MEDIUM_CREDIT_RESULT" });
    expect(transition.data).toEqual({
      gstin: VALID_GSTIN,
      credit_check: {
        period: "2026-09",
        matched: 10,
        value_mismatch: 1,
        missing_in_2b: 2,
        missing_in_books: 0,
        additional_credit: 1_500,
      },
    });
  });

  it("asks for a GSTIN first when none is on file", async () => {
    const response = await creditCheckHandler.handle(
      contextFor(sessionAt({ state: "MEDIUM_CREDIT_CHECK" }), textEvent("1")),
    );

    const transition = transitionOf(response);
    expect(transition.navigation).toEqual({ kind: "push", to: "WAIT_GSTIN" });
    expect(transition.data).toEqual({ after_gstin_state: "MEDIUM_CREDIT_CHECK" });
  });

  const resultSession = sessionAt({
    state: "MEDIUM_CREDIT_RESULT",
    data: {
      gstin: VALID_GSTIN,
      credit_check: { period: "2026-09", value_mismatch: 1, missing_in_2b: 2, missing_in_books: 0 },
    },
  });

  it("shows mismatch details in place", async () => {
    const transition = transitionOf(await creditCheckHandler.handle(contextFor(resultSession, textEvent("2"))));

    expect(transition.navigation).toEqual({ kind: "stay" });
    expect(transition.render_screen).toBe(false);
    expect(transition.replies).toEqual([
      {
        kind: "text",
        body: "*Mismatch details for 2026-09*\nValue mismatch: 1\nMissing in 2B: 2\nMissing in books: 0",
      },
    ]);
  });

  it("reminds suppliers about invoices missing from 2B", async () => {
    const transition = transitionOf(await creditCheckHandler.handle(contextFor(resultSession, textEvent("3"))));

    expect(transition.replies).toEqual([{ kind: "text", body: "Reminders sent to 2 suppliers." }]);
  });

  it("closes the filing status screen on any input", async () => {
    const transition = transitionOf(
      await creditCheckHandler.handle(contextFor(sessionAt({ state: "GST_FILING_STATUS" }), textEvent("thanks"))),
    );

    expect(transition.navigation).toEqual({ kind: "pop" });
  });
});

const INV_7 = { invoice_number: "INV-7", taxable_value: 10_000, media_ref: "media-7" };
const INV_8 = { invoice_number: "INV-8", taxable_value: 4_500, media_ref: "media-8" };
const IRN = "ab".repeat(32);

describe("e-invoice handler", () => {
  it("starts a fresh upload from the menu", async () => {
    const transition = transitionOf(
      await einvoiceHandler.handle(
        contextFor(
          sessionAt({ state: "EINVOICE_MENU", data: { gstin: VALID_GSTIN, einvoice_invoices: [INV_7] } }),
          textEvent("1"),
        ),
      ),
    );

    expect(transition.navigation).toEqual({ kind: "replace", to: "EINVOICE_UPLOAD" });
    expect(transition.data).toEqual({ gstin: VALID_GSTIN });
    expect(transition.render_screen).toBe(true);
  });

  it("asks for a GSTIN first when none is on file", async () => {
    const transition = transitionOf(
      await einvoiceHandler.handle(contextFor(sessionAt({ state: "EINVOICE_MENU" }), textEvent("1"))),
    );

    expect(transition.navigation).toEqual({ kind: "push", to: "WAIT_GSTIN" });
    expect(transition.data).toEqual({ after_gstin_state: "EINVOICE_MENU" });
  });

  it("adds each uploaded invoice to the batch", async () => {
    const transition = transitionOf(
      await einvoiceHandler.handle(
        contextFor(sessionAt({ state: "EINVOICE_UPLOAD", data: { gstin: VALID_GSTIN } }), mediaEvent("media-7")),
      ),
    );

    expect(transition.navigation).toEqual({ kind: "stay" });
    expect(transition.data).toEqual({ gstin: VALID_GSTIN, einvoice_invoices: [INV_7] });
    expect(transition.replies).toEqual([
      { kind: "text", body: "Invoice 1 added: INV-7\nSend the next one or reply *done*." },
    ]);
  });

  it("needs at least one invoice before review", async () => {
    const transition = transitionOf(
      await einvoiceHandler.handle(
        contextFor(sessionAt({ state: "EINVOICE_UPLOAD", data: { gstin: VALID_GSTIN } }), textEvent("Done")),
      ),
    );

    expect(transition.navigation).toEqual({ kind: "stay" });
    expect(transition.replies).toEqual([
      { kind: "text", body: "No invoices received yet. Send a photo or PDF first." },
    ]);
  });

  it("moves to review once the user is done", async () => {
    const transition = transitionOf(
      await einvoiceHandler.handle(
        contextFor(
          sessionAt({ state: "EINVOICE_UPLOAD", data: { gstin: VALID_GSTIN, einvoice_invoices: [INV_7] } }),
          textEvent("done"),
        ),
      ),
    );

    expect(transition.navigation).toEqual({ kind: "replace", to: "EINVOICE_CONFIRM" });
    expect(transition.reason).toBe("einvoice.review");
  });

  it("reports a line per invoice and keeps going past a rejected one", async () => {
    const services = createFakeDomainServices({
      exports: {
        generateEInvoice: async ({ invoice }) =>
          invoice.invoice_number === "INV-8"
            ? { ok: false, error: { kind: "invalid_input", message: "Buyer GSTIN missing." } }
            : { ok: true, value: { irn: "IRN-INV-7", ack_number: "112610000000001" } },
      },
    });

    const transition = transitionOf(
      await einvoiceHandler.handle(
        contextFor(
          sessionAt({
            state: "EINVOICE_CONFIRM",
            data: { gstin: VALID_GSTIN, einvoice_invoices: [INV_8, INV_7] },
          }),
          textEvent("yes"),
          { services },
        ),
      ),
    );

    expect(transition.navigation).toEqual({ kind: "pop" });
    expect(transition.data).toEqual({ gstin: VALID_GSTIN });
    expect(transition.replies).toEqual([
      {
        kind: "text",
        body: "*e-Invoice results*\n❌ INV-8: Buyer GSTIN missing.\n✅ INV-7: IRN IRN-INV-7 (ack 112610000000001)",
      },
    ]);
  });

  it("drops the batch when generation is declined", async () => {
    const transition = transitionOf(
      await einvoiceHandler.handle(
        contextFor(
          sessionAt({ state: "EINVOICE_CONFIRM", data: { gstin: VALID_GSTIN, einvoice_invoices: [INV_7] } }),
          textEvent("no"),
        ),
      ),
    );

    expect(transition.navigation).toEqual({ kind: "pop" });
    expect(transition.data).toEqual({ gstin: VALID_GSTIN });
    expect(transition.replies).toEqual([
      { kind: "text", body: "IRN generation cancelled. Nothing was registered." },
    ]);
  });

  it("looks up and cancels an IRN", async () => {
    const status = transitionOf(
      await einvoiceHandler.handle(
        contextFor(sessionAt({ state: "EINVOICE_STATUS_ASK", data: { gstin: VALID_GSTIN } }), textEvent(IRN.toUpperCase())),
      ),
    );
    const cancelled = transitionOf(
      await einvoiceHandler.handle(
        contextFor(sessionAt({ state: "EINVOICE_CANCEL", data: { gstin: VALID_GSTIN } }), textEvent(IRN)),
      ),
    );

    expect(status.navigation).toEqual({ kind: "pop" });
    expect(status.replies).toEqual([{ kind: "text", body: `IRN ${IRN}: active` }]);
    expect(cancelled.replies).toEqual([{ kind: "text", body: `IRN ${IRN} cancelled. Status: cancelled` }]);
  });

  it("rejects a malformed IRN", async () => {
    const error = await einvoiceHandler
      .handle(contextFor(sessionAt({ state: "EINVOICE_STATUS_ASK", data: { gstin: VALID_GSTIN } }), textEvent("12ab")))
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ValidationError);
    expect(error instanceof ValidationError ? error.field : null).toBe("irn");
  });
});

describe("e-way bill handler", () => {
  it("opens tracking from the menu", async () => {
    const transition = transitionOf(
      await ewaybillHandler.handle(
        contextFor(sessionAt({ state: "EWAYBILL_MENU", data: { gstin: VALID_GSTIN } }), textEvent("2")),
      ),
    );

    expect(transition.navigation).toEqual({ kind: "replace", to: "EWAYBILL_TRACK_ASK" });
    expect(transition.data).toBeUndefined();
    expect(transition.reason).toBe("ewaybill.track_ask");
  });

  it("re-prompts on an unknown menu option", async () => {
    const transition = transitionOf(
      await ewaybillHandler.handle(
        contextFor(sessionAt({ state: "EWAYBILL_MENU", data: { gstin: VALID_GSTIN } }), textEvent("4")),
      ),
    );

    expect(transition.reason).toBe("unrecognized_input");
  });

  it("asks for transport details after the upload", async () => {
    const transition = transitionOf(
      await ewaybillHandler.handle(
        contextFor(
          sessionAt({ state: "EWAYBILL_UPLOAD", data: { gstin: VALID_GSTIN, ewaybill_invoices: [INV_7] } }),
          textEvent("done"),
        ),
      ),
    );

    expect(transition.navigation).toEqual({ kind: "replace", to: "EWAYBILL_TRANSPORT" });
  });

  it("generates one e-way bill per invoice with the same transport", async () => {
    const calls: Array<{ invoice: ExportInvoice; transport: TransportDetails }> = [];
    const services = createFakeDomainServices({
      exports: {
        generateEwayBill: async ({ invoice, transport }) => {
          calls.push({ invoice, transport });
          return {
            ok: true,
            value: { ewb_number: `33100000000${calls.length}`, valid_upto: "2026-10-19" },
          };
        },
      },
    });

    const transition = transitionOf(
      await ewaybillHandler.handle(
        contextFor(
          sessionAt({
            state: "EWAYBILL_TRANSPORT",
            data: { gstin: VALID_GSTIN, ewaybill_invoices: [INV_7, INV_8] },
          }),
          textEvent("mh 12 ab 1234, Rail, 350"),
          { services },
        ),
      ),
    );

    const transport = { vehicle_number: "MH12AB1234", mode: "rail", distance_km: 350 };
    expect(calls).toEqual([
      { invoice: INV_7, transport },
      { invoice: INV_8, transport },
    ]);
    expect(transition.navigation).toEqual({ kind: "pop" });
    expect(transition.data).toEqual({ gstin: VALID_GSTIN });
    expect(transition.replies).toEqual([
      {
        kind: "text",
        body: "*e-Way bill results*\n" +
          "✅ INV-7: e-way bill 331000000001, valid until 2026-10-19\n" +
          "✅ INV-8: e-way bill 331000000002, valid until 2026-10-19",
      },
    ]);
  });

  it("defaults the mode to road and the distance to zero", async () => {
    const modes: TransportDetails[] = [];
    const services = createFakeDomainServices({
      exports: {
        generateEwayBill: async ({ transport }) => {
          modes.push(transport);
          return { ok: true, value: { ewb_number: "331000000001", valid_upto: "2026-10-19" } };
        },
      },
    });

    await ewaybillHandler.handle(
      contextFor(
        sessionAt({ state: "EWAYBILL_TRANSPORT", data: { gstin: VALID_GSTIN, ewaybill_invoices: [INV_7] } }),
        textEvent("GJ01X9999"),
        { services },
      ),
    );

    expect(modes).toEqual([{ vehicle_number: "GJ01X9999", mode: "road", distance_km: 0 }]);
  });

  it("rejects an unknown transport mode", async () => {
    const error = await ewaybillHandler
      .handle(
        contextFor(
          sessionAt({ state: "EWAYBILL_TRANSPORT", data: { gstin: VALID_GSTIN, ewaybill_invoices: [INV_7] } }),
          textEvent("MH12AB1234, boat"),
        ),
      )
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ValidationError);
    expect(error instanceof ValidationError ? error.field : null).toBe("transport");
  });

  it("tracks an e-way bill", async () => {
    const transition = transitionOf(
      await ewaybillHandler.handle(
        contextFor(sessionAt({ state: "EWAYBILL_TRACK_ASK", data: { gstin: VALID_GSTIN } }), textEvent("3310 0000 0001")),
      ),
    );

    expect(transition.replies).toEqual([
      { kind: "text", body: "E-way bill 331000000001: active, valid until 2026-10-19." },
    ]);
  });

  it("updates the vehicle with the default reason", async () => {
    const reasons: string[] = [];
    const services = createFakeDomainServices({
      exports: {
        updateEwayBillVehicle: async ({ ewb_number, reason }) => {
          reasons.push(reason);
          return { ok: true, value: { ewb_number, valid_upto: "2026-10-20" } };
        },
      },
    });

    const transition = transitionOf(
      await ewaybillHandler.handle(
        contextFor(
          sessionAt({ state: "EWAYBILL_VEHICLE_ASK", data: { gstin: VALID_GSTIN } }),
          textEvent("123456789012, KA01MN4321"),
          { services },
        ),
      ),
    );

    expect(reasons).toEqual(["Vehicle breakdown"]);
    expect(transition.navigation).toEqual({ kind: "pop" });
    expect(transition.replies).toEqual([
      {
        kind: "text",
        body: "Vehicle on e-way bill 123456789012 changed to KA01MN4321. Valid until 2026-10-20.",
      },
    ]);
  });
});

describe("multi-GSTIN handler", () => {
  it("validates a new GSTIN before asking for its label", async () => {
    const transition = transitionOf(
      await multiGstinHandler.handle(contextFor(sessionAt({ state: "MULTI_GSTIN_ADD" }), textEvent("29ABCDE1234F1Z5"))),
    );

    expect(transition.navigation).toEqual({ kind: "replace", to: "MULTI_GSTIN_LABEL" });
    expect(transition.data).toEqual({ pending_gstin: "29ABCDE1234F1Z5" });
  });

  it("stores the labelled GSTIN and keeps the active one", async () => {
    const transition = transitionOf(
      await multiGstinHandler.handle(
        contextFor(
          sessionAt({ state: "MULTI_GSTIN_LABEL", data: { gstin: VALID_GSTIN, pending_gstin: "29ABCDE1234F1Z5" } }),
          textEvent("Head  office"),
        ),
      ),
    );

    expect(transition.data).toEqual({
      gstin: VALID_GSTIN,
      additional_gstins: [{ gstin: "29ABCDE1234F1Z5", label: "Head office" }],
      multi_gstin: false,
    });
    expect(transition.replies).toEqual([{ kind: "text", body: "Added 29ABCDE1234F1Z5 as Head office." }]);
  });

  it("switches the active GSTIN from the summary", async () => {
    const transition = transitionOf(
      await multiGstinHandler.handle(
        contextFor(
          sessionAt({
            state: "MULTI_GSTIN_SUMMARY",
            data: { gstin: VALID_GSTIN, additional_gstins: [{ gstin: "29ABCDE1234F1Z5", label: "Branch" }] },
          }),
          textEvent("1"),
        ),
      ),
    );

    expect(transition.navigation).toEqual({ kind: "pop" });
    expect(transition.replies).toEqual([{ kind: "text", body: "Active GSTIN is now 29ABCDE1234F1Z5." }]);
  });
});

describe("notification preferences handler", () => {
  it("saves a preset and returns to settings", async () => {
    const transition = transitionOf(
      await notificationPreferencesHandler.handle(
        contextFor(sessionAt({ state: "NOTIFICATION_SETTINGS", stack: ["SETTINGS_MENU"] }), textEvent("2")),
      ),
    );

    expect(transition.navigation).toEqual({ kind: "replace", to: "SETTINGS_MENU" });
    expect(transition.data).toEqual({
      notification_prefs: { filing_reminders: true, risk_alerts: false, status_updates: false },
    });
    expect(transition.replies).toEqual([
      { kind: "text", body: "Notification preferences saved. 3 reminders scheduled." },
    ]);
  });

  it("re-prompts on an unknown preset", async () => {
    const transition = transitionOf(
      await notificationPreferencesHandler.handle(
        contextFor(sessionAt({ state: "NOTIFICATION_SETTINGS" }), textEvent("7")),
      ),
    );

    expect(transition.reason).toBe("unrecognized_input");
  });
});

describe("default handler chain", () => {
  it("lets session expiry win over every other handler", async () => {
    const result = await dispatchHandlerChain(
      createDefaultHandlerChain(),
      contextFor(sessionAt({ state: "GST_MENU" }), textEvent("itr"), { idleMs: 45 * MINUTE_MS }),
    );

    expect(result.kind === "handled" ? result.handler : null).toBe("session_expiry");
  });

  it("falls through to the module switch handler for recent activity", async () => {
    const result = await dispatchHandlerChain(
      createDefaultHandlerChain(),
      contextFor(sessionAt({ state: "GST_MENU" }), textEvent("itr")),
    );

    expect(result.kind === "handled" ? result.handler : null).toBe("module_switch");
  });

  it("routes e-invoice and e-way bill states to their handlers", async () => {
    const einvoice = await dispatchHandlerChain(
      createDefaultHandlerChain(),
      contextFor(sessionAt({ state: "EINVOICE_MENU", data: { gstin: VALID_GSTIN } }), textEvent("2")),
    );
    const ewaybill = await dispatchHandlerChain(
      createDefaultHandlerChain(),
      contextFor(sessionAt({ state: "EWAYBILL_MENU", data: { gstin: VALID_GSTIN } }), textEvent("3")),
    );

    expect(einvoice.kind === "handled" ? einvoice.handler : null).toBe("einvoice");
    expect(ewaybill.kind === "handled" ? ewaybill.handler : null).toBe("ewaybill");
  });

  it("leaves table-driven states unclaimed", async () => {
    const result = await dispatchHandlerChain(
      createDefaultHandlerChain(),
      contextFor(sessionAt({ state: "ITR_MENU" }), textEvent("1")),
    );

    expect(result).toEqual({ kind: "unclaimed" });
  });
});
