import { randomUUID } from "node:crypto";
import { DeadLetterNotFoundError, describeError } from "../../packages/core/src/errors.ts";
import { logEvent } from "../../packages/core/src/observability/logger.ts";
import {
  elapsedMetricMs,
  emitMetricBestEffort,
  nowMetricMs,
} from "../../packages/core/src/observability/metrics.ts";
import { MAX_DEAD_LETTER_LIST_LIMIT } from "../../packages/messaging/src/outbound/dead-letter-store.ts";
import type { DeliveryPipeline } from "../../packages/messaging/src/outbound/delivery-pipeline.ts";
import { isDeadLetterReason, type DeadLetterFilter } from "../../packages/messaging/src/types.ts";
import {
  clientErrorResponse,
  hasBearerToken,
  jsonErrorResponse,
  jsonResponse,
  type FetchHandler,
} from "../_shared/http.ts";

const ROUTE_PREFIX = "/operator/dead-letters";
const REPLAY_ROUTE = /^\/operator\/dead-letters\/([^/]+)\/replay$/;

export type OperatorPipeline = Pick<DeliveryPipeline, "listDeadLetters" | "replay" | "purgeExpired">;

export type OperatorHandlerOptions = {
  pipeline: OperatorPipeline;
  apiToken: string;
};

type FilterParse = { ok: true; filter: DeadLetterFilter } | { ok: false; message: string };

export function createOutboundOperatorHandler(options: OperatorHandlerOptions): FetchHandler {
  return async (req) => {
    const requestId = randomUUID();
    const startedAt = nowMetricMs();
    let outcome: "success" | "error" = "success";
    let phase = "auth";
    const url = new URL(req.url);

    try {
      if (!hasBearerToken(req, options.apiToken)) {
        return clientErrorResponse(401, "Unauthorized", requestId);
      }

      if (url.pathname === ROUTE_PREFIX) {
        if (req.method !== "GET") {
          return clientErrorResponse(405, "Method Not Allowed", requestId);
        }
        phase = "list_dead_letters";
        const parsed = parseDeadLetterFilter(url.searchParams);
        if (!parsed.ok) {
          return clientErrorResponse(400, parsed.message, requestId);
        }
        const entries = await options.pipeline.listDeadLetters(parsed.filter);
        return jsonResponse({ request_id: requestId, count: entries.length, dead_letters: entries });
      }

      if (url.pathname === `${ROUTE_PREFIX}/purge`) {
        if (req.method !== "POST") {
          return clientErrorResponse(405, "Method Not Allowed", requestId);
        }
        phase = "purge_dead_letters";
        const purged = await options.pipeline.purgeExpired();
        return jsonResponse({ request_id: requestId, purged });
      }

      const replayMatch = REPLAY_ROUTE.exec(url.pathname);
      if (replayMatch?.[1]) {
        if (req.method !== "POST") {
          return clientErrorResponse(405, "Method Not Allowed", requestId);
        }
        phase = "replay_dead_letter";
        const deadLetterId = decodeURIComponent(replayMatch[1]);
        try {
          const messageId = await options.pipeline.replay(deadLetterId);
          return jsonResponse({ request_id: requestId, dead_letter_id: deadLetterId, message_id: messageId }, 202);
        } catch (error) {
          if (error instanceof DeadLetterNotFoundError) {
            return clientErrorResponse(404, error.message, requestId);
          }
          throw error;
        }
      }

      return clientErrorResponse(404, "Not Found", requestId);
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
        tags: { component: "outbound_operator", operation: phase, outcome },
      });
    }
  };
}

export function parseDeadLetterFilter(params: URLSearchParams): FilterParse {
  const filter: DeadLetterFilter = {};

  const recipient = params.get("recipient")?.trim();
  if (recipient) {
    filter.recipient = recipient;
  }

  const reason = params.get("failure_reason")?.trim();
  if (reason) {
    if (!isDeadLetterReason(reason)) {
      return { ok: false, message: `Unknown failure_reason '${reason}'.` };
    }
    filter.failure_reason = reason;
  }

  for (const key of ["since", "until"] as const) {
    const raw = params.get(key)?.trim();
    if (!raw) {
      continue;
    }
    const parsedMs = Date.parse(raw);
    if (Number.isNaN(parsedMs)) {
      return { ok: false, message: `${key} must be an ISO-8601 timestamp.` };
    }
    filter[key] = new Date(parsedMs).toISOString();
  }

  const limit = params.get("limit")?.trim();
  if (limit) {
    const parsedLimit = /^\d+$/.test(limit) ? Number.parseInt(limit, 10) : Number.NaN;
    if (!Number.isSafeInteger(parsedLimit) || parsedLimit < 1 || parsedLimit > MAX_DEAD_LETTER_LIST_LIMIT) {
      return { ok: false, message: `limit must be an integer between 1 and ${MAX_DEAD_LETTER_LIST_LIMIT}.` };
    }
    filter.limit = parsedLimit;
  }

  return { ok: true, filter };
}
