import type { OutboundPayload } from "../../core/src/conversation/types.ts";
import { PermanentDeliveryError, TransientDeliveryError, describeError } from "../../core/src/errors.ts";
import { WhatsAppClientError, type WhatsAppClient } from "./client.ts";

export type SendOutcome =
  | { kind: "delivered"; gateway_message_id: string }
  | { kind: "transient"; error: TransientDeliveryError }
  | { kind: "permanent"; error: PermanentDeliveryError };

/** The send side of the messaging provider, as the delivery pipeline sees it. */
export interface MessagingGateway {
  send(recipient: string, payload: OutboundPayload): Promise<SendOutcome>;
}

export function createWhatsAppGateway(client: WhatsAppClient): MessagingGateway {
  return {
    send: async (recipient, payload) => {
      try {
        const result = await client.sendPayload(recipient, payload);
        return { kind: "delivered", gateway_message_id: result.messageId };
      } catch (error) {
        return classifySendError(error);
      }
    },
  };
}

/**
 * Transient: timeouts, network failures, 5xx, 429 and throttling codes. Permanent: every
 * other client rejection. Anything unrecognized is treated as transient.
 */
export function classifySendError(error: unknown): Exclude<SendOutcome, { kind: "delivered" }> {
  if (error instanceof TransientDeliveryError) {
    return { kind: "transient", error };
  }
  if (error instanceof PermanentDeliveryError) {
    return { kind: "permanent", error };
  }
  if (error instanceof WhatsAppClientError) {
    if (error.retryable) {
      return {
        kind: "transient",
        error: new TransientDeliveryError(error.message, {
          statusCode: error.statusCode,
          retryAfterMs: error.retryAfterMs,
          cause: error,
        }),
      };
    }
    return {
      kind: "permanent",
      error: new PermanentDeliveryError(error.message, { statusCode: error.statusCode, cause: error }),
    };
  }
  return {
    kind: "transient",
    error: new TransientDeliveryError(describeError(error).error_message, { cause: error }),
  };
}
