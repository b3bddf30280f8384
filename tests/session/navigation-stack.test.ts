import { describe, expect, it } from "vitest";
import {
  DEFAULT_MAX_STACK_DEPTH,
  popState,
  pushState,
  unwindTo,
} from "../../packages/core/src/session/navigation-stack.ts";

describe("navigation stack", () => {
  it("pushes non-root states", () => {
    expect(pushState([], "GST_MENU")).toEqual({ stack: ["GST_MENU"], outcome: "pushed" });
    expect(pushState(["GST_MENU"], "NIL_FILING_MENU")).toEqual({
      stack: ["GST_MENU", "NIL_FILING_MENU"],
      outcome: "pushed",
    });
  });

  it("never stores the root state", () => {
    const stack = ["GST_MENU"] as const;
    const result = pushState(stack, "MAIN_MENU");
    expect(result.outcome).toBe("ignored_root");
    expect(result.stack).toBe(stack);
  });

  it("ignores a push of the state already on top", () => {
    expect(pushState(["GST_MENU"], "GST_MENU")).toEqual({
      stack: ["GST_MENU"],
      outcome: "ignored_duplicate",
    });
  });

  it("rejects pushes beyond the depth bound and leaves the stack unchanged", () => {
    const full = ["GST_MENU", "ITR_MENU", "SETTINGS_MENU"] as const;
    const result = pushState(full, "LANGUAGE_MENU", 3);
    expect(result.outcome).toBe("rejected_overflow");
    expect(result.stack).toEqual(["GST_MENU", "ITR_MENU", "SETTINGS_MENU"]);
    expect(DEFAULT_MAX_STACK_DEPTH).toBe(10);
  });

  it("pops the top entry", () => {
    expect(popState(["GST_MENU", "NIL_FILING_MENU"])).toEqual({
      stack: ["GST_MENU"],
      state: "NIL_FILING_MENU",
    });
  });

  it("returns a null state when popping an empty stack", () => {
    expect(popState([])).toEqual({ stack: [], state: null });
  });

  it("unwinds to below the target state", () => {
    expect(unwindTo(["GST_MENU", "NIL_FILING_MENU", "NIL_FILING_CONFIRM"], "NIL_FILING_MENU")).toEqual([
      "GST_MENU",
    ]);
    expect(unwindTo(["GST_MENU", "ITR_MENU"], "MAIN_MENU")).toEqual([]);
    expect(unwindTo(["GST_MENU"], "WAIT_GSTIN")).toEqual(["GST_MENU"]);
  });
});
