import type { OutboundMessage, OutboundStatus } from "../types.ts";

export type ActiveStatus = Extract<OutboundStatus, "Queued" | "Sending" | "RetryScheduled">;

/** Bounded set of messages not yet delivered or dead-lettered. */
export class OutboundQueue {
  private readonly messages = new Map<string, OutboundMessage>();

  constructor(readonly capacity: number) {
    if (!Number.isSafeInteger(capacity) || capacity <= 0) {
      throw new Error("Outbound queue capacity must be a positive integer.");
    }
  }

  get size(): number {
    return this.messages.size;
  }

  isFull(): boolean {
    return this.messages.size >= this.capacity;
  }

  add(message: OutboundMessage): void {
    if (this.isFull()) {
      throw new Error("Outbound queue is full.");
    }
    this.messages.set(message.id, message);
  }

  get(id: string): OutboundMessage | null {
    return this.messages.get(id) ?? null;
  }

  update(message: OutboundMessage): void {
    if (!this.messages.has(message.id)) {
      throw new Error(`Outbound message '${message.id}' is not queued.`);
    }
    this.messages.set(message.id, message);
  }

  remove(id: string): void {
    this.messages.delete(id);
  }

  /**
   * Messages whose retry time has come, lowest sequence first. A recipient's messages stop at
   * the first one still waiting (in flight or not yet due), so nothing overtakes an earlier
   * message for the same recipient.
   */
  due(nowMs: number): OutboundMessage[] {
    const blocked = new Set<string>();
    for (const message of this.messages.values()) {
      if (message.status === "Sending") {
        blocked.add(message.recipient);
      }
    }
    const ready: OutboundMessage[] = [];
    for (const message of this.bySequence()) {
      if (blocked.has(message.recipient)) {
        continue;
      }
      if (Date.parse(message.next_retry_at) > nowMs) {
        blocked.add(message.recipient);
        continue;
      }
      ready.push(message);
    }
    return ready;
  }

  /**
   * Earliest time any recipient's oldest message can go, or null when nothing waits.
   * Recipients with a send in flight are skipped.
   */
  earliestDueAt(): number | null {
    const heads = new Map<string, OutboundMessage>();
    for (const message of this.bySequence()) {
      if (!heads.has(message.recipient)) {
        heads.set(message.recipient, message);
      }
    }
    let earliest: number | null = null;
    for (const head of heads.values()) {
      if (head.status === "Sending") {
        continue;
      }
      const dueAt = Date.parse(head.next_retry_at);
      if (earliest === null || dueAt < earliest) {
        earliest = dueAt;
      }
    }
    return earliest;
  }

  statusCounts(): Record<ActiveStatus, number> {
    const counts: Record<ActiveStatus, number> = { Queued: 0, Sending: 0, RetryScheduled: 0 };
    for (const message of this.messages.values()) {
      if (message.status === "Queued" || message.status === "Sending" || message.status === "RetryScheduled") {
        counts[message.status] += 1;
      }
    }
    return counts;
  }

  private bySequence(): OutboundMessage[] {
    return [...this.messages.values()].sort((left, right) => left.sequence - right.sequence);
  }
}
