import type { DeliveryPipeline } from "../../packages/messaging/src/outbound/delivery-pipeline.ts";
import { jsonResponse, textResponse, type FetchHandler } from "../_shared/http.ts";

export function createHealthHandler(options: { pipeline: Pick<DeliveryPipeline, "stats"> }): FetchHandler {
  return async (req) => {
    if (req.method !== "GET") {
      return textResponse("Method Not Allowed", 405);
    }
    const stats = options.pipeline.stats();
    return jsonResponse({ status: "ok", ...stats });
  };
}
