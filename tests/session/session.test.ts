import { describe, expect, it } from "vitest";
import {
  MAX_PROCESSED_EVENT_IDS,
  advanceSession,
  clearFlowData,
  createSession,
  hasProcessedEvent,
  parseStoredSession,
  withData,
} from "../../packages/core/src/session/session.ts";
import { moduleMenuForState } from "../../packages/core/src/session/states.ts";

const NOW = "2026-10-18T09:00:00.000Z";
const LATER = "2026-10-18T09:05:00.000Z";

describe("session model", () => {
  it("creates a fresh session at the main menu", () => {
    expect(createSession("919800000001", NOW)).toEqual({
      user_id: "919800000001",
      state: "MAIN_MENU",
      language: "en",
      stack: [],
      data: {},
      version: 0,
      last_active: NOW,
      processed_event_ids: [],
    });
  });

  it("bumps the version exactly once per advance and remembers the event id", () => {
    const session = createSession("919800000001", NOW);
    const next = advanceSession(
      session,
      { state: "GST_MENU", stack: [] },
      { nowIso: LATER, eventId: "wamid.1" },
    );

    expect(next.version).toBe(1);
    expect(next.state).toBe("GST_MENU");
    expect(next.last_active).toBe(LATER);
    expect(next.processed_event_ids).toEqual(["wamid.1"]);
    expect(hasProcessedEvent(next, "wamid.1")).toBe(true);
    expect(hasProcessedEvent(next, "wamid.2")).toBe(false);
  });

  it("unwinds the stack so it never holds the current state", () => {
    const session = {
      ...createSession("919800000001", NOW),
      state: "NIL_FILING_CONFIRM" as const,
      stack: ["GST_MENU", "NIL_FILING_MENU"] as const,
    };
    const next = advanceSession(session, { state: "GST_MENU" }, { nowIso: LATER });

    expect(next.stack).toEqual([]);
    expect(next.processed_event_ids).toEqual([]);
  });

  it("keeps only the most recent processed event ids", () => {
    let session = createSession("919800000001", NOW);
    for (let index = 0; index < MAX_PROCESSED_EVENT_IDS + 2; index += 1) {
      session = advanceSession(session, {}, { nowIso: LATER, eventId: `wamid.${index}` });
    }

    expect(session.processed_event_ids).toHaveLength(MAX_PROCESSED_EVENT_IDS);
    expect(session.processed_event_ids[0]).toBe("wamid.2");
    expect(session.version).toBe(MAX_PROCESSED_EVENT_IDS + 2);
  });

  it("clears flow data but keeps profile fields", () => {
    const data = {
      gstin: "27ABCDE1234F1Z5",
      notification_prefs: { filing_reminders: true },
      nil_form: "GSTR3B",
      itr_form: "ITR1",
      after_gstin_state: "ASK_GST_PERIOD_3B",
      pending_gstin: "29ABCDE1234F1Z5",
      favourite_colour: "blue",
    };

    expect(clearFlowData(data)).toEqual({
      gstin: "27ABCDE1234F1Z5",
      notification_prefs: { filing_reminders: true },
      favourite_colour: "blue",
    });
  });

  it("removes keys patched to undefined", () => {
    expect(withData({ a: 1, b: "x" }, { a: undefined, c: true })).toEqual({ b: "x", c: true });
  });

  it("maps states to their module menu", () => {
    expect(moduleMenuForState("NIL_FILING_CONFIRM")).toBe("GST_MENU");
    expect(moduleMenuForState("ITR1_ASK_PAN")).toBe("ITR_MENU");
    expect(moduleMenuForState("CONNECT_CA_ASK_TEXT")).toBe("CONNECT_CA_MENU");
    expect(moduleMenuForState("LANGUAGE_MENU")).toBe("SETTINGS_MENU");
    expect(moduleMenuForState("SESSION_RESUME_PROMPT")).toBe("MAIN_MENU");
  });
});

describe("parseStoredSession", () => {
  it("rejects snapshots without a usable version", () => {
    expect(parseStoredSession(null, { userId: "u1" })).toBeNull();
    expect(parseStoredSession({ state: "GST_MENU" }, { userId: "u1" })).toBeNull();
    expect(parseStoredSession({ version: -1 }, { userId: "u1" })).toBeNull();
  });

  it("falls back to the root for unknown states and drops unknown stack entries", () => {
    const parsed = parseStoredSession(
      {
        state: "RETIRED_STATE",
        language: "hi",
        stack: ["GST_MENU", "NOT_A_STATE", "MAIN_MENU"],
        data: { gstin: "27ABCDE1234F1Z5" },
        version: 4,
        last_active: LATER,
        processed_event_ids: ["wamid.1", 7],
      },
      { userId: "u1" },
    );

    expect(parsed).toEqual({
      user_id: "u1",
      state: "MAIN_MENU",
      language: "hi",
      stack: [],
      data: { gstin: "27ABCDE1234F1Z5" },
      version: 4,
      last_active: LATER,
      processed_event_ids: ["wamid.1"],
    });
  });

  it("bounds the stack to the configured depth", () => {
    const parsed = parseStoredSession(
      {
        state: "NIL_FILING_CONFIRM",
        stack: ["GST_MENU", "ITR_MENU", "SETTINGS_MENU", "NIL_FILING_MENU"],
        version: 2,
      },
      { userId: "u1", maxStackDepth: 2 },
    );

    expect(parsed?.stack).toEqual(["SETTINGS_MENU", "NIL_FILING_MENU"]);
    expect(parsed?.language).toBe("en");
    expect(parsed?.last_active).toBe("1970-01-01T00:00:00.000Z");
  });
});
