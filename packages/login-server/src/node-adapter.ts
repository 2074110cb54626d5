import type { IncomingHttpHeaders } from "node:http";

import { describeAuthErrorKind, describeError, type AuthErrorKind } from "@latchkey/contracts";
import { createLatchkeyLogger, type LatchkeyLogger } from "@latchkey/telemetry";

import { errorEnvelope } from "./envelope.js";

export interface NodeRequestLike extends AsyncIterable<Uint8Array | string> {
  readonly method?: string;
  readonly url?: string;
  readonly headers: IncomingHttpHeaders;
}

export interface NodeResponseLike {
  statusCode: number;
  setHeader(name: string, value: string): unknown;
  end(body?: string): unknown;
}

export type FetchHandler = (request: Request) => Promise<Response>;

export interface NodeAdapterOptions {
  readonly logger?: LatchkeyLogger;
  /** Larger request bodies are answered with the validation envelope unread. */
  readonly maxBodyBytes?: number;
}

export const DEFAULT_MAX_BODY_BYTES = 16 * 1024;

const BODYLESS_METHODS = new Set(["GET", "HEAD"]);

export class RequestBodyTooLargeError extends Error {
  constructor(readonly limitBytes: number) {
    super(`Request body exceeds ${limitBytes} bytes`);
    this.name = "RequestBodyTooLargeError";
  }
}

export const toFetchRequest = async (
  req: NodeRequestLike,
  maxBodyBytes: number = DEFAULT_MAX_BODY_BYTES,
): Promise<Request> => {
  const method = (req.method ?? "GET").toUpperCase();
  const headers = new Headers();
  for (const [name, value] of Object.entries(req.headers)) {
    if (Array.isArray(value)) {
      for (const item of value) {
        headers.append(name, item);
      }
    } else if (typeof value === "string") {
      headers.set(name, value);
    }
  }

  const url = new URL(req.url ?? "/", `http://${headers.get("host") ?? "localhost"}`);
  if (BODYLESS_METHODS.has(method)) {
    return new Request(url, { method, headers });
  }

  const chunks: Buffer[] = [];
  let received = 0;
  for await (const chunk of req) {
    const buffer = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : Buffer.from(chunk);
    received += buffer.length;
    if (received > maxBodyBytes) {
      throw new RequestBodyTooLargeError(maxBodyBytes);
    }
    chunks.push(buffer);
  }
  return new Request(url, { method, headers, body: Buffer.concat(chunks).toString("utf8") });
};

/**
 * Bridges one Node request to a fetch handler. Never rejects: an oversized body
 * gets the validation envelope, any other failure the internal-error envelope.
 */
export const handleNodeRequest = async (
  handler: FetchHandler,
  req: NodeRequestLike,
  res: NodeResponseLike,
  logger: LatchkeyLogger,
  maxBodyBytes: number = DEFAULT_MAX_BODY_BYTES,
): Promise<void> => {
  let request: Request;
  try {
    request = await toFetchRequest(req, maxBodyBytes);
  } catch (error) {
    if (error instanceof RequestBodyTooLargeError) {
      logger.info("server.request_body_too_large", { limitBytes: error.limitBytes });
      writeEnvelope(res, "validation");
    } else {
      logger.error("server.adapter_failed", { error: describeError(error) });
      writeEnvelope(res, "internal");
    }
    return;
  }

  let status: number;
  let headers: Headers;
  let body: string;
  try {
    const response = await handler(request);
    status = response.status;
    headers = response.headers;
    body = await response.text();
  } catch (error) {
    logger.error("server.adapter_failed", { error: describeError(error) });
    writeEnvelope(res, "internal");
    return;
  }

  res.statusCode = status;
  headers.forEach((value, name) => {
    res.setHeader(name, value);
  });
  res.end(body);
};

const writeEnvelope = (res: NodeResponseLike, kind: AuthErrorKind): void => {
  res.statusCode = describeAuthErrorKind(kind).status;
  res.setHeader("content-type", "application/json");
  res.end(JSON.stringify(errorEnvelope(kind)));
};

export const createNodeRequestListener = (
  handler: FetchHandler,
  options: NodeAdapterOptions = {},
): ((req: NodeRequestLike, res: NodeResponseLike) => void) => {
  const logger = options.logger ?? createLatchkeyLogger({ name: "login-server" });
  const maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
  return (req, res) => {
    void handleNodeRequest(handler, req, res, logger, maxBodyBytes);
  };
};
