import { Readable } from "node:stream";

import { describe, expect, it, vi } from "vitest";

import { createLatchkeyLogger } from "@latchkey/telemetry";

import {
  DEFAULT_MAX_BODY_BYTES,
  RequestBodyTooLargeError,
  handleNodeRequest,
  jsonResponse,
  toFetchRequest,
  type NodeRequestLike,
  type NodeResponseLike,
} from "../src/index.js";

const quietLogger = createLatchkeyLogger({ sink: () => {} });

class RecordingResponse implements NodeResponseLike {
  statusCode = 0;
  readonly headers = new Map<string, string>();
  body: string | undefined;

  setHeader(name: string, value: string): void {
    this.headers.set(name, value);
  }

  end(body?: string): void {
    this.body = body;
  }
}

const nodeRequest = (options: {
  method: string;
  url: string;
  headers: Record<string, string>;
  chunks?: string[];
}): NodeRequestLike =>
  Object.assign(Readable.from(options.chunks ?? []), {
    method: options.method,
    url: options.url,
    headers: options.headers,
  });

describe("handleNodeRequest", () => {
  it("converts the Node request and writes the fetch response back", async () => {
    const res = new RecordingResponse();
    const req = nodeRequest({
      method: "post",
      url: "/login?source=form",
      headers: { host: "auth.internal.test", "content-type": "application/json" },
      chunks: ['{"username":', '"alice"}'],
    });

    await handleNodeRequest(
      async (request) =>
        jsonResponse({ method: request.method, url: request.url, body: await request.text() }, 201),
      req,
      res,
      quietLogger,
    );

    expect(res.statusCode).toBe(201);
    expect(res.headers.get("content-type")).toBe("application/json");
    expect(JSON.parse(res.body ?? "")).toEqual({
      method: "POST",
      url: "http://auth.internal.test/login?source=form",
      body: '{"username":"alice"}',
    });
  });

  it("refuses bodies over the size limit without calling the handler", async () => {
    const res = new RecordingResponse();
    const handler = vi.fn(async () => jsonResponse({}, 200));

    await handleNodeRequest(
      handler,
      nodeRequest({
        method: "POST",
        url: "/login",
        headers: { host: "auth.internal.test" },
        chunks: ['{"username":"alice",', '"password":"correct-horse"}'],
      }),
      res,
      quietLogger,
      16,
    );

    expect(handler).not.toHaveBeenCalled();
    expect(res.statusCode).toBe(400);
    expect(JSON.parse(res.body ?? "")).toEqual({ ErrorCode: "400000", ErrorMessage: "Invalid request", Payload: {} });
  });

  it("rejects oversized bodies while converting", async () => {
    const req = nodeRequest({ method: "POST", url: "/login", headers: {}, chunks: ["x".repeat(DEFAULT_MAX_BODY_BYTES + 1)] });

    await expect(toFetchRequest(req)).rejects.toBeInstanceOf(RequestBodyTooLargeError);
  });

  it("answers with the internal envelope when the handler throws", async () => {
    const res = new RecordingResponse();

    await handleNodeRequest(
      async () => {
        throw new Error("handler exploded");
      },
      nodeRequest({ method: "GET", url: "/healthz", headers: {} }),
      res,
      quietLogger,
    );

    expect(res.statusCode).toBe(500);
    expect(JSON.parse(res.body ?? "")).toEqual({
      ErrorCode: "500000",
      ErrorMessage: "Internal server error",
      Payload: {},
    });
  });
});
