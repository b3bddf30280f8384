import { timingSafeEqual } from "node:crypto";
import { ConfigError } from "../../packages/core/src/errors.ts";

export type FetchHandler = (req: Request) => Promise<Response>;

export function jsonResponse(payload: Record<string, unknown>, status = 200): Response {
  return new Response(JSON.stringify(payload), {
    status,
    headers: { "content-type": "application/json; charset=utf-8" },
  });
}

export function textResponse(body: string, status: number): Response {
  return new Response(body, {
    status,
    headers: { "content-type": "text/plain; charset=utf-8" },
  });
}

export function jsonErrorResponse(
  error: unknown,
  requestId: string,
  phase: string,
): Response {
  const misconfigured = error instanceof ConfigError;
  return jsonResponse(
    {
      code: 500,
      message: misconfigured ? "Server misconfiguration" : "Internal error",
      request_id: requestId,
      phase,
    },
    500,
  );
}

export function clientErrorResponse(
  status: 400 | 401 | 403 | 404 | 405,
  message: string,
  requestId: string,
): Response {
  return jsonResponse({ code: status, message, request_id: requestId }, status);
}

/** Bearer check with a constant-time comparison of the token bytes. */
export function hasBearerToken(req: Request, expectedToken: string): boolean {
  const header = req.headers.get("authorization") ?? "";
  const match = /^Bearer\s+(.+)$/i.exec(header.trim());
  if (!match?.[1] || !expectedToken) {
    return false;
  }
  return constantTimeEquals(match[1].trim(), expectedToken);
}

export function constantTimeEquals(a: string, b: string): boolean {
  const left = Buffer.from(a, "utf8");
  const right = Buffer.from(b, "utf8");
  if (left.length !== right.length) {
    return false;
  }
  return timingSafeEqual(left, right);
}
