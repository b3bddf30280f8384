import { describe, expect, it } from "vitest";
import { OutboundQueue } from "../../packages/messaging/src/outbound/outbound-queue.ts";
import type { OutboundMessage } from "../../packages/messaging/src/types.ts";
import { text } from "../support/outbound-fixtures.ts";

function message(id: string, overrides: Partial<OutboundMessage> = {}): OutboundMessage {
  return {
    id,
    recipient: "919800000001",
    payload: text(id),
    attempt: 0,
    next_retry_at: "2026-10-18T09:00:00.000Z",
    status: "Queued",
    sequence: 1,
    enqueued_at: "2026-10-18T09:00:00.000Z",
    last_error: null,
    replay_of: null,
    correlation_id: null,
    ...overrides,
  };
}

const NOW_MS = Date.parse("2026-10-18T09:00:00.000Z");

describe("OutboundQueue", () => {
  it("returns due messages lowest sequence first", () => {
    const queue = new OutboundQueue(10);
    queue.add(message("late", { sequence: 3 }));
    queue.add(message("early", { sequence: 1, recipient: "919800000002" }));
    queue.add(message("middle", { sequence: 2 }));

    expect(queue.due(NOW_MS).map((item) => item.id)).toEqual(["early", "middle", "late"]);
    expect(queue.earliestDueAt()).toBe(NOW_MS);
  });

  it("holds a recipient's later messages behind one that is not yet due", () => {
    const queue = new OutboundQueue(10);
    queue.add(message("retrying", { sequence: 1, status: "RetryScheduled", next_retry_at: "2026-10-18T09:00:05.000Z" }));
    queue.add(message("fresh", { sequence: 2 }));
    queue.add(message("other", { sequence: 3, recipient: "919800000002", next_retry_at: "2026-10-18T09:00:09.000Z" }));

    expect(queue.due(NOW_MS)).toEqual([]);
    expect(queue.earliestDueAt()).toBe(NOW_MS + 5_000);
    expect(queue.due(NOW_MS + 5_000).map((item) => item.id)).toEqual(["retrying", "fresh"]);
  });

  it("skips every message for a recipient with a send in flight", () => {
    const queue = new OutboundQueue(10);
    queue.add(message("sending", { sequence: 1, status: "Sending" }));
    queue.add(message("waiting", { sequence: 2 }));
    queue.add(message("other", { sequence: 3, recipient: "919800000002" }));

    expect(queue.due(NOW_MS).map((item) => item.id)).toEqual(["other"]);
    expect(queue.statusCounts()).toEqual({ Queued: 2, Sending: 1, RetryScheduled: 0 });
  });

  it("enforces its capacity", () => {
    const queue = new OutboundQueue(1);
    queue.add(message("one"));

    expect(queue.isFull()).toBe(true);
    expect(() => queue.add(message("two"))).toThrow("Outbound queue is full.");
    expect(() => new OutboundQueue(0)).toThrow("Outbound queue capacity must be a positive integer.");
  });

  it("only updates messages it holds", () => {
    const queue = new OutboundQueue(2);

    expect(() => queue.update(message("ghost"))).toThrow("Outbound message 'ghost' is not queued.");
  });
});
