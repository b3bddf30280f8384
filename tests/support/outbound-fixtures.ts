import type { OutboundPayload } from "../../packages/core/src/conversation/types.ts";
import type { MessagingGateway, SendOutcome } from "../../packages/messaging/src/gateway.ts";
import type { Clock } from "../../packages/messaging/src/outbound/delivery-pipeline.ts";

export const PIPELINE_START_MS = Date.parse("2026-10-18T09:00:00.000Z");

export class ManualClock implements Clock {
  constructor(public nowMs: number = PIPELINE_START_MS) {}

  now(): number {
    return this.nowMs;
  }

  advance(ms: number): void {
    this.nowMs += ms;
  }
}

type ScriptedResult = SendOutcome | Error;

/**
 * Records every send. Scripted results are consumed in order; once they run out every send
 * is delivered.
 */
export class ScriptedGateway implements MessagingGateway {
  readonly sent: { recipient: string; payload: OutboundPayload }[] = [];
  private readonly script: ScriptedResult[];

  constructor(script: ScriptedResult[] = []) {
    this.script = [...script];
  }

  async send(recipient: string, payload: OutboundPayload): Promise<SendOutcome> {
    this.sent.push({ recipient, payload });
    const next = this.script.shift();
    if (next instanceof Error) {
      throw next;
    }
    return next ?? { kind: "delivered", gateway_message_id: `wamid.out.${this.sent.length}` };
  }

  bodiesFor(recipient: string): string[] {
    return this.sent
      .filter((entry) => entry.recipient === recipient)
      .map((entry) => (entry.payload.kind === "media" ? entry.payload.caption ?? "" : entry.payload.body));
  }
}

export function text(body: string): OutboundPayload {
  return { kind: "text", body };
}

export function sequentialIds(prefix = "id"): () => string {
  let next = 0;
  return () => {
    next += 1;
    return `${prefix}-${next}`;
  };
}
