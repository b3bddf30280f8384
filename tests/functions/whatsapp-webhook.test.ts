import { beforeEach, describe, expect, it, vi } from "vitest";
import type { InboundOutcome } from "../../packages/core/src/conversation/conversation-engine.ts";
import type { InboundEvent } from "../../packages/core/src/conversation/types.ts";
import { computeWebhookSignature } from "../../packages/messaging/src/inbound/webhook.ts";
import { createWhatsAppWebhookHandler } from "../../functions/whatsapp-webhook/index.ts";

const APP_SECRET = "test-secret";
const WEBHOOK_URL = "https://engine.test/webhooks/whatsapp";

function textMessage(id: string, body: string) {
  return { from: "919800000001", id, timestamp: "1792314000", type: "text", text: { body } };
}

function payload(messages: unknown[], statuses: unknown[] = []) {
  return { object: "whatsapp_business_account", entry: [{ id: "waba-1", changes: [{ field: "messages", value: { messages, statuses } }] }] };
}

function signedPost(body: string, signature = computeWebhookSignature(APP_SECRET, body)): Request {
  return new Request(WEBHOOK_URL, {
    method: "POST",
    headers: { "content-type": "application/json", "x-hub-signature-256": signature },
    body,
  });
}

function createFakeEngine(respond: (event: InboundEvent) => Promise<InboundOutcome>) {
  const received: InboundEvent[] = [];
  return {
    received,
    engine: {
      handleInbound: async (event: InboundEvent) => {
        received.push(event);
        return respond(event);
      },
    },
  };
}

const helpOutcome = async (): Promise<InboundOutcome> => ({ kind: "help", replies: [] });

beforeEach(() => {
  vi.spyOn(console, "info").mockImplementation(() => undefined);
});

describe("createWhatsAppWebhookHandler", () => {
  it("answers the subscription handshake", async () => {
    const { engine } = createFakeEngine(helpOutcome);
    const handler = createWhatsAppWebhookHandler({ engine, verifyToken: "test-verify-token", appSecret: APP_SECRET });

    const accepted = await handler(
      new Request(`${WEBHOOK_URL}?hub.mode=subscribe&hub.verify_token=test-verify-token&hub.challenge=8812`),
    );
    const refused = await handler(
      new Request(`${WEBHOOK_URL}?hub.mode=subscribe&hub.verify_token=wrong&hub.challenge=8812`),
    );

    expect(accepted.status).toBe(200);
    expect(await accepted.text()).toBe("8812");
    expect(refused.status).toBe(403);
    expect(await refused.text()).toBe("Forbidden");
  });

  it("passes every normalized event to the engine and reports counts", async () => {
    const { engine, received } = createFakeEngine(async (event) =>
      event.gateway_message_id === "wamid.in.2"
        ? { kind: "duplicate", idempotency_key: "919800000001:wamid.in.2" }
        : { kind: "help", replies: [] }
    );
    const handler = createWhatsAppWebhookHandler({ engine, verifyToken: "test-verify-token", appSecret: APP_SECRET });
    const body = JSON.stringify(
      payload(
        [
          textMessage("wamid.in.1", "1"),
          textMessage("wamid.in.2", "1"),
          { from: "919800000001", id: "wamid.in.3", timestamp: "1792314000", type: "sticker", sticker: {} },
        ],
        [{ id: "wamid.out.1", status: "delivered" }],
      ),
    );

    const response = await handler(signedPost(body));

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      ok: true,
      processed: 1,
      duplicates: 1,
      unsupported: 1,
      status_updates: 1,
    });
    expect(received.map((event) => event.gateway_message_id)).toEqual(["wamid.in.1", "wamid.in.2"]);
  });

  it("rejects unsigned and mis-signed bodies before parsing them", async () => {
    const { engine, received } = createFakeEngine(helpOutcome);
    const handler = createWhatsAppWebhookHandler({ engine, verifyToken: "test-verify-token", appSecret: APP_SECRET });
    const body = JSON.stringify(payload([textMessage("wamid.in.1", "1")]));

    const unsigned = await handler(new Request(WEBHOOK_URL, { method: "POST", body }));
    const misSigned = await handler(signedPost(body, computeWebhookSignature("other-secret", body)));

    expect(unsigned.status).toBe(401);
    expect(misSigned.status).toBe(403);
    expect(received).toEqual([]);
  });

  it("skips signature checks when no app secret is configured", async () => {
    const { engine, received } = createFakeEngine(helpOutcome);
    const handler = createWhatsAppWebhookHandler({ engine, verifyToken: "test-verify-token", appSecret: null });

    const response = await handler(
      new Request(WEBHOOK_URL, { method: "POST", body: JSON.stringify(payload([textMessage("wamid.in.1", "help")])) }),
    );

    expect(response.status).toBe(200);
    expect(received).toHaveLength(1);
  });

  it("returns 400 for a body that is not JSON", async () => {
    const { engine } = createFakeEngine(helpOutcome);
    const handler = createWhatsAppWebhookHandler({ engine, verifyToken: "test-verify-token", appSecret: APP_SECRET });

    const response = await handler(signedPost("{not json"));

    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({ code: 400, message: "Request body is not valid JSON." });
  });

  it("returns 500 when any event fails so the gateway redelivers the batch", async () => {
    const { engine, received } = createFakeEngine(async (event) => {
      if (event.gateway_message_id === "wamid.in.2") {
        throw new Error("session store unavailable");
      }
      return { kind: "help", replies: [] };
    });
    const handler = createWhatsAppWebhookHandler({ engine, verifyToken: "test-verify-token", appSecret: APP_SECRET });
    const body = JSON.stringify(payload([textMessage("wamid.in.1", "1"), textMessage("wamid.in.2", "2")]));

    const response = await handler(signedPost(body));

    expect(response.status).toBe(500);
    expect(await response.json()).toMatchObject({ code: 500, message: "Internal error", phase: "handle_inbound" });
    expect(received).toHaveLength(2);
  });

  it("refuses other methods", async () => {
    const { engine } = createFakeEngine(helpOutcome);
    const handler = createWhatsAppWebhookHandler({ engine, verifyToken: "test-verify-token", appSecret: null });

    const response = await handler(new Request(WEBHOOK_URL, { method: "PUT", body: "{}" }));

    expect(response.status).toBe(405);
  });
});
