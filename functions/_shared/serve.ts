import {
  createServer,
  type IncomingHttpHeaders,
  type IncomingMessage,
  type Server,
  type ServerResponse,
} from "node:http";
import { describeError } from "../../packages/core/src/errors.ts";
import { logEvent } from "../../packages/core/src/observability/logger.ts";
import type { FetchHandler } from "./http.ts";

export const MAX_BODY_BYTES = 1_048_576;

export class PayloadTooLargeError extends Error {
  constructor(readonly limitBytes: number) {
    super(`Request body exceeds ${limitBytes} bytes.`);
    this.name = "PayloadTooLargeError";
  }
}

/** Runs a fetch-style handler on a plain `node:http` server. */
export function serve(
  handler: FetchHandler,
  options: { port: number; hostname?: string; maxBodyBytes?: number },
): Server {
  const server = createServer((req, res) => {
    void handleNodeRequest(handler, req, res, options.maxBodyBytes);
  });
  server.listen(options.port, options.hostname);
  return server;
}

export async function handleNodeRequest(
  handler: FetchHandler,
  req: IncomingMessage,
  res: ServerResponse,
  maxBodyBytes = MAX_BODY_BYTES,
): Promise<void> {
  try {
    const request = await toFetchRequest(req, maxBodyBytes);
    const response = await handler(request);
    await writeFetchResponse(res, response);
  } catch (error) {
    if (error instanceof PayloadTooLargeError) {
      logEvent({
        event: "system.request_rejected",
        level: "warn",
        payload: { reason: "payload_too_large", limit_bytes: error.limitBytes, path: req.url ?? null },
      });
      res.writeHead(413, { "content-type": "text/plain; charset=utf-8", connection: "close" });
      res.end("Payload Too Large");
      return;
    }
    logEvent({
      event: "system.unhandled_error",
      level: "error",
      payload: { phase: "http_adapter", ...describeError(error) },
    });
    if (!res.headersSent) {
      res.writeHead(500, { "content-type": "application/json; charset=utf-8" });
    }
    res.end(JSON.stringify({ code: 500, message: "Internal error", phase: "http_adapter" }));
  }
}

export async function toFetchRequest(
  req: IncomingMessage,
  maxBodyBytes = MAX_BODY_BYTES,
): Promise<Request> {
  const method = (req.method ?? "GET").toUpperCase();
  const host = firstHeader(req.headers.host) ?? "localhost";
  const url = new URL(req.url ?? "/", `http://${host}`);
  const headers = toHeaders(req.headers);

  if (method === "GET" || method === "HEAD") {
    return new Request(url, { method, headers });
  }
  const body = await readLimitedBody(req, maxBodyBytes, firstHeader(req.headers["content-length"]));
  return new Request(url, { method, headers, body });
}

async function writeFetchResponse(res: ServerResponse, response: Response): Promise<void> {
  const headers: Record<string, string> = {};
  response.headers.forEach((value, key) => {
    headers[key] = value;
  });
  res.writeHead(response.status, headers);
  res.end(await response.text());
}

/** Buffers a request body, failing as soon as it is known to exceed `limitBytes`. */
export async function readLimitedBody(
  chunks: AsyncIterable<unknown>,
  limitBytes: number,
  declaredLength: string | null = null,
): Promise<string> {
  if (declaredLength !== null && Number(declaredLength) > limitBytes) {
    throw new PayloadTooLargeError(limitBytes);
  }
  const buffers: Buffer[] = [];
  let total = 0;
  for await (const chunk of chunks) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk), "utf8");
    total += buffer.length;
    if (total > limitBytes) {
      throw new PayloadTooLargeError(limitBytes);
    }
    buffers.push(buffer);
  }
  return Buffer.concat(buffers).toString("utf8");
}

function toHeaders(raw: IncomingHttpHeaders): Headers {
  const headers = new Headers();
  for (const [key, value] of Object.entries(raw)) {
    if (Array.isArray(value)) {
      for (const item of value) {
        headers.append(key, item);
      }
    } else if (typeof value === "string") {
      headers.set(key, value);
    }
  }
  return headers;
}

function firstHeader(value: string | string[] | undefined): string | null {
  if (Array.isArray(value)) {
    return value[0] ?? null;
  }
  return value ?? null;
}
