import { describe, expect, it } from "vitest";
import { runStateTransitionCore } from "../../packages/core/src/conversation/state-transition-core.ts";
import { findTransitionRule, TRANSITION_TABLE } from "../../packages/core/src/conversation/transition-table.ts";
import { validationRepromptTransition } from "../../packages/core/src/conversation/transitions.ts";
import { DomainServiceError, ValidationError } from "../../packages/core/src/errors.ts";
import {
  VALID_GSTIN,
  contextFor,
  createFakeDomainServices,
  mediaEvent,
  sessionAt,
  textEvent,
} from "../support/conversation-fixtures.ts";

const MAIN_MENU_TEXT = "*Main menu*\n1. GST services\n2. Income tax (ITR)\n3. Upload invoices\n4. Help\n5. Change language\n6. Settings\n7. Talk to a CA\n\nReply with a number. Send 0 anytime to come back here.";

describe("state transition core", () => {
  it("answers unmatched input with the not-understood notice and the current screen", async () => {
    const transition = await runStateTransitionCore(contextFor(sessionAt(), textEvent("hello there")));

    expect(transition).toEqual({
      navigation: { kind: "stay" },
      replies: [{ kind: "text", body: `Sorry, I didn't understand that.\n\n${MAIN_MENU_TEXT}` }],
      render_screen: false,
      reason: "unrecognized_input",
    });
  });

  it("pushes the GST menu from the main menu", async () => {
    const transition = await runStateTransitionCore(contextFor(sessionAt(), textEvent("1")));

    expect(transition).toEqual({
      navigation: { kind: "push", to: "GST_MENU" },
      data: undefined,
      language: undefined,
      replies: [],
      render_screen: true,
      reason: "main_menu.gst",
    });
  });

  it("asks for a GSTIN before a gated GST action", async () => {
    const transition = await runStateTransitionCore(
      contextFor(sessionAt({ state: "GST_MENU" }), textEvent("1")),
    );

    expect(transition.navigation).toEqual({ kind: "push", to: "WAIT_GSTIN" });
    expect(transition.data).toEqual({ after_gstin_state: "ASK_GST_PERIOD_3B" });
    expect(transition.reason).toBe("gst_menu.gstr3b");
  });

  it("enters the gated state directly when a GSTIN is on file", async () => {
    const transition = await runStateTransitionCore(
      contextFor(sessionAt({ state: "GST_MENU", data: { gstin: VALID_GSTIN } }), textEvent("3")),
    );

    expect(transition.navigation).toEqual({ kind: "push", to: "NIL_FILING_MENU" });
    expect(transition.data).toEqual({ gstin: VALID_GSTIN, nil_period: "2026-09" });
  });

  it("opens the e-invoice and e-way bill menus past option 9", async () => {
    const einvoice = await runStateTransitionCore(
      contextFor(sessionAt({ state: "GST_MENU", data: { gstin: VALID_GSTIN } }), textEvent("10")),
    );
    const ewaybill = await runStateTransitionCore(
      contextFor(sessionAt({ state: "GST_MENU", data: { gstin: VALID_GSTIN } }), textEvent("11")),
    );

    expect(einvoice.navigation).toEqual({ kind: "push", to: "EINVOICE_MENU" });
    expect(einvoice.reason).toBe("gst_menu.einvoice");
    expect(ewaybill.navigation).toEqual({ kind: "push", to: "EWAYBILL_MENU" });
  });

  it("saves a captured GSTIN and continues to the state that asked for it", async () => {
    const transition = await runStateTransitionCore(
      contextFor(
        sessionAt({ state: "WAIT_GSTIN", stack: ["GST_MENU"], data: { after_gstin_state: "ASK_GST_PERIOD_3B" } }),
        textEvent("27abcde 1234f1z5"),
      ),
    );

    expect(transition.navigation).toEqual({ kind: "replace", to: "ASK_GST_PERIOD_3B" });
    expect(transition.data).toEqual({ gstin: VALID_GSTIN });
    expect(transition.replies).toEqual([{ kind: "text", body: "GSTIN 27ABCDE1234F1Z5 saved." }]);
  });

  it("throws a ValidationError for a malformed GSTIN", async () => {
    const error = await runStateTransitionCore(
      contextFor(sessionAt({ state: "WAIT_GSTIN" }), textEvent("12345")),
    ).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ValidationError);
    expect(error instanceof ValidationError ? error.field : null).toBe("gstin");
  });

  it("computes a GSTR-3B summary for the requested period", async () => {
    const transition = await runStateTransitionCore(
      contextFor(sessionAt({ state: "ASK_GST_PERIOD_3B", data: { gstin: VALID_GSTIN } }), textEvent("09/2026")),
    );

    expect(transition.navigation).toEqual({ kind: "replace", to: "GST_3B_SUMMARY" });
    expect(transition.data).toEqual({
      gstin: VALID_GSTIN,
      gst_filing_3b: { period: "2026-09", output_tax: 18_000, input_tax_credit: 12_000, net_payable: 6_000 },
    });
  });

  it("rejects a period in the future", async () => {
    await expect(
      runStateTransitionCore(
        contextFor(sessionAt({ state: "ASK_GST_PERIOD_3B", data: { gstin: VALID_GSTIN } }), textEvent("2026-11")),
      ),
    ).rejects.toThrow(ValidationError);
  });

  it("surfaces domain failures as DomainServiceError", async () => {
    const services = createFakeDomainServices({
      tax: {
        computeGstr3bSummary: async () => ({ ok: false, error: { kind: "unavailable", message: "timeout" } }),
      },
    });
    const error = await runStateTransitionCore(
      contextFor(sessionAt({ state: "ASK_GST_PERIOD_3B", data: { gstin: VALID_GSTIN } }), textEvent("2026-09"), {
        services,
      }),
    ).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(DomainServiceError);
    expect(error instanceof DomainServiceError ? error.message : null).toBe(
      "tax.computeGstr3bSummary unavailable: timeout",
    );
  });

  it("files both NIL returns and resets to the main menu", async () => {
    const transition = await runStateTransitionCore(
      contextFor(
        sessionAt({
          state: "NIL_FILING_CONFIRM",
          stack: ["GST_MENU", "NIL_FILING_MENU"],
          data: { gstin: VALID_GSTIN, nil_form: "both", nil_period: "2026-09" },
        }),
        textEvent("Yes"),
      ),
    );

    expect(transition.navigation).toEqual({ kind: "reset" });
    expect(transition.data).toEqual({ gstin: VALID_GSTIN });
    expect(transition.replies).toEqual([
      { kind: "text", body: "GSTR-3B for 2026-09 submitted. Reference: ACK-GSTR-3B-2026-09" },
      { kind: "text", body: "GSTR-1 for 2026-09 submitted. Reference: ACK-GSTR-1-2026-09" },
    ]);
  });

  it("switches language and pops back", async () => {
    const transition = await runStateTransitionCore(
      contextFor(sessionAt({ state: "LANGUAGE_MENU", stack: ["SETTINGS_MENU"] }), textEvent("1")),
    );

    expect(transition.navigation).toEqual({ kind: "pop" });
    expect(transition.language).toBe("en");
    expect(transition.replies).toEqual([{ kind: "text", body: "Language set to English." }]);
  });

  it("clears earlier flow data when an income tax return starts", async () => {
    const transition = await runStateTransitionCore(
      contextFor(
        sessionAt({ state: "ITR_MENU", data: { gstin: VALID_GSTIN, nil_form: "both", itr_pan: "ABCDE1234F" } }),
        textEvent("1"),
      ),
    );

    expect(transition.navigation).toEqual({ kind: "push", to: "ITR1_ASK_PAN" });
    expect(transition.data).toEqual({ gstin: VALID_GSTIN, itr_form: "ITR-1" });
  });

  it("shows help from the main menu without re-rendering the screen", async () => {
    const transition = await runStateTransitionCore(contextFor(sessionAt(), textEvent("4")));

    expect(transition.navigation).toEqual({ kind: "stay" });
    expect(transition.render_screen).toBe(false);
    expect(transition.replies).toHaveLength(1);
  });

  it("reads an uploaded invoice and stays for the next one", async () => {
    const transition = await runStateTransitionCore(
      contextFor(sessionAt({ state: "GST_UPLOAD_INVOICE" }), mediaEvent("media-1")),
    );

    expect(transition.navigation).toEqual({ kind: "stay" });
    expect(transition.data).toEqual({
      upload_invoices: [{ summary: "INV-7 from Acme Traders", taxable_value: 10_000 }],
    });
    expect(transition.replies).toEqual([
      { kind: "text", body: "Invoice 1 read: INV-7 from Acme Traders\nSend the next one or reply *done*." },
    ]);
  });

  it("estimates an ITR-1 once TDS is known", async () => {
    const transition = await runStateTransitionCore(
      contextFor(
        sessionAt({
          state: "ITR1_ASK_TDS",
          data: { itr_form: "ITR-1", itr_pan: "ABCDE1234F", itr_gross_income: 900_000, itr_deductions: 150_000 },
        }),
        textEvent("12,000"),
      ),
    );

    expect(transition.navigation).toEqual({ kind: "push", to: "ITR_RESULT" });
    expect(transition.data).toMatchObject({
      itr_tds: 12_000,
      itr_result: { taxable_income: 750_000, tax_liability: 10_000, balance: -2_000 },
    });
  });
});

describe("transition table lookup", () => {
  it("matches keywords case-insensitively", () => {
    const rule = findTransitionRule(TRANSITION_TABLE, "GST_UPLOAD_INVOICE", { kind: "free_text", text: "Done" });
    expect(rule?.reason).toBe("upload.finished");
  });

  it("returns null when no rule matches", () => {
    expect(findTransitionRule(TRANSITION_TABLE, "MAIN_MENU", { kind: "menu_choice", choice: 42, raw: "42" }))
      .toBeNull();
  });
});

describe("validation re-prompt", () => {
  it("prefixes the field hint to the current screen", () => {
    const transition = validationRepromptTransition(
      new ValidationError("GSTIN format is invalid.", { field: "gstin" }),
      sessionAt({ state: "WAIT_GSTIN" }),
      new Date("2026-10-18T09:00:00.000Z"),
    );

    expect(transition.replies).toEqual([
      {
        kind: "text",
        body:
          "That GSTIN is not valid. It should look like 27ABCDE1234F1Z5.\n\nPlease send your 15-character GSTIN (for example 27ABCDE1234F1Z5).",
      },
    ]);
    expect(transition.navigation).toEqual({ kind: "stay" });
  });

  it("falls back to a generic hint for unknown fields", () => {
    const transition = validationRepromptTransition(
      new ValidationError("bad"),
      sessionAt({ state: "ITR1_ASK_PAN" }),
      new Date("2026-10-18T09:00:00.000Z"),
    );

    expect(transition.replies).toEqual([
      {
        kind: "text",
        body: "That doesn't look right. Please try again.\n\nSend your PAN (for example ABCDE1234F).",
      },
    ]);
  });
});
