import { randomUUID } from "node:crypto";
import type { InboundOutcome } from "../../packages/core/src/conversation/conversation-engine.ts";
import type { InboundEvent } from "../../packages/core/src/conversation/types.ts";
import { describeError } from "../../packages/core/src/errors.ts";
import { logEvent } from "../../packages/core/src/observability/logger.ts";
import {
  elapsedMetricMs,
  emitMetricBestEffort,
  nowMetricMs,
} from "../../packages/core/src/observability/metrics.ts";
import { withSentryContext } from "../../packages/core/src/observability/sentry.ts";
import {
  SIGNATURE_HEADER,
  normalizeWebhookPayload,
  verifySubscriptionChallenge,
  verifyWebhookSignature,
} from "../../packages/messaging/src/inbound/webhook.ts";
import {
  clientErrorResponse,
  jsonErrorResponse,
  jsonResponse,
  textResponse,
  type FetchHandler,
} from "../_shared/http.ts";

export type InboundEventProcessor = {
  handleInbound(event: InboundEvent): Promise<InboundOutcome>;
};

export type WhatsAppWebhookOptions = {
  engine: InboundEventProcessor;
  verifyToken: string;
  appSecret: string | null;
};

/**
 * `GET` answers the subscription handshake; `POST` carries message batches. A batch is
 * acknowledged with 200 only after every event in it was committed, so the gateway
 * redelivers on 5xx and idempotency absorbs the repeats.
 */
export function createWhatsAppWebhookHandler(options: WhatsAppWebhookOptions): FetchHandler {
  return async (req) => {
    const requestId = randomUUID();
    const startedAt = nowMetricMs();
    let outcome: "success" | "error" = "success";
    let phase = "start";

    return withSentryContext(
      {
        category: "whatsapp_inbound",
        correlation_id: requestId,
        tags: { handler: "functions/whatsapp-webhook" },
      },
      async () => {
        try {
          phase = "method";
          if (req.method === "GET") {
            phase = "verify_subscription";
            const check = verifySubscriptionChallenge(new URL(req.url).searchParams, options.verifyToken);
            if (!check.ok) {
              logEvent({
                level: "warn",
                event: "webhook.signature_rejected",
                correlation_id: requestId,
                payload: { reason: check.reason, phase },
              });
              return textResponse("Forbidden", 403);
            }
            return textResponse(check.challenge, 200);
          }
          if (req.method !== "POST") {
            return textResponse("Method Not Allowed", 405);
          }

          phase = "read_body";
          const rawBody = await req.text();

          if (options.appSecret) {
            phase = "signature";
            const signature = verifyWebhookSignature({
              appSecret: options.appSecret,
              rawBody,
              signatureHeader: req.headers.get(SIGNATURE_HEADER),
            });
            if (!signature.ok) {
              logEvent({
                level: "warn",
                event: "webhook.signature_rejected",
                correlation_id: requestId,
                payload: { reason: signature.reason, phase },
              });
              return signature.reason === "missing_signature"
                ? textResponse("Unauthorized", 401)
                : textResponse("Forbidden", 403);
            }
          }

          phase = "parse";
          let parsed: unknown;
          try {
            parsed = JSON.parse(rawBody);
          } catch {
            return clientErrorResponse(400, "Request body is not valid JSON.", requestId);
          }

          phase = "normalize";
          const normalized = normalizeWebhookPayload(parsed);
          for (const unsupported of normalized.unsupported) {
            logEvent({
              event: "webhook.unsupported_message",
              user_id: unsupported.sender_id,
              correlation_id: unsupported.gateway_message_id ?? requestId,
              payload: {
                message_type: unsupported.message_type,
                request_id: requestId,
              },
            });
          }

          phase = "handle_inbound";
          const results = await Promise.allSettled(
            normalized.events.map((event) => options.engine.handleInbound(event)),
          );

          let committed = 0;
          let duplicates = 0;
          let failed = 0;
          for (const result of results) {
            if (result.status === "rejected") {
              failed += 1;
              logEvent({
                level: "error",
                event: "system.unhandled_error",
                correlation_id: requestId,
                payload: { phase, ...describeError(result.reason) },
              });
              continue;
            }
            if (result.value.kind === "duplicate") {
              duplicates += 1;
            } else {
              committed += 1;
            }
          }

          if (failed > 0) {
            outcome = "error";
            return jsonErrorResponse(new Error("Inbound processing failed."), requestId, phase);
          }

          return jsonResponse({
            ok: true,
            request_id: requestId,
            processed: committed,
            duplicates,
            unsupported: normalized.unsupported.length,
            status_updates: normalized.status_updates,
          });
        } catch (error) {
          outcome = "error";
          logEvent({
            level: "error",
            event: "system.unhandled_error",
            correlation_id: requestId,
            payload: { phase, ...describeError(error) },
          });
          return jsonErrorResponse(error, requestId, phase);
        } finally {
          emitMetricBestEffort({
            metric: "system.request.latency",
            value: elapsedMetricMs(startedAt),
            correlation_id: requestId,
            tags: {
              component: "whatsapp_webhook",
              operation: req.method,
              outcome,
            },
          });
        }
      },
    );
  };
}
