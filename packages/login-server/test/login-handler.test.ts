import { describe, expect, it, vi } from "vitest";

import { createInternalError, createUnauthorizedError, err, ok } from "@latchkey/contracts";
import { createLatchkeyLogger } from "@latchkey/telemetry";

import { createLoginFetchHandler, parseLoginRequest, type LoginServiceLike } from "../src/index.js";

const quietLogger = createLatchkeyLogger({ sink: () => {} });

const post = (body: string): Request =>
  new Request("http://localhost/login", {
    method: "POST",
    headers: { "content-type": "application/json" },
    body,
  });

const createService = (login: LoginServiceLike["login"]) => ({ login: vi.fn(login) });

describe("createLoginFetchHandler", () => {
  it("wraps a session in the success envelope", async () => {
    const service = createService(async () =>
      ok({ sessionId: "AbCdEfGh12345678", username: "alice", sessionHash: "f".repeat(64) }),
    );
    const handler = createLoginFetchHandler(service, { logger: quietLogger });

    const response = await handler(post(JSON.stringify({ username: "alice", password: "pw" })));

    expect(response.status).toBe(200);
    expect(response.headers.get("content-type")).toBe("application/json");
    expect(await response.json()).toEqual({
      ErrorCode: "000000",
      ErrorMessage: "Success",
      Payload: { session_id: "AbCdEfGh12345678", username: "alice", session_hash: "f".repeat(64) },
    });
  });

  it("passes the parsed credentials and a deadline signal to the service", async () => {
    const service = createService(async () => err(createUnauthorizedError("unknown_user")));
    const handler = createLoginFetchHandler(service, { logger: quietLogger, requestTimeoutMs: 250 });

    await handler(post(JSON.stringify({ username: "alice", password: "pw", extra: true })));

    expect(service.login).toHaveBeenCalledTimes(1);
    const call = service.login.mock.calls[0];
    expect(call?.[0]).toEqual({ username: "alice", password: "pw" });
    expect(call?.[1]?.signal).toBeInstanceOf(AbortSignal);
  });

  it("answers rejected credentials with 401000 and an empty payload", async () => {
    const handler = createLoginFetchHandler(
      createService(async () => err(createUnauthorizedError("password_mismatch"))),
      { logger: quietLogger },
    );

    const response = await handler(post(JSON.stringify({ username: "alice", password: "wrong" })));

    expect(response.status).toBe(401);
    expect(await response.json()).toEqual({
      ErrorCode: "401000",
      ErrorMessage: "Invalid username or password",
      Payload: {},
    });
  });

  it("hides internal error detail from the client", async () => {
    const handler = createLoginFetchHandler(
      createService(async () =>
        err(createInternalError("auth.session_upsert_failed", "Could not store the session", new Error("disk full"))),
      ),
      { logger: quietLogger },
    );

    const response = await handler(post(JSON.stringify({ username: "alice", password: "pw" })));

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({
      ErrorCode: "500000",
      ErrorMessage: "Internal server error",
      Payload: {},
    });
  });

  it("rejects malformed bodies without calling the service", async () => {
    const service = createService(async () => err(createUnauthorizedError("unknown_user")));
    const handler = createLoginFetchHandler(service, { logger: quietLogger });

    const response = await handler(post("{not json"));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ ErrorCode: "400000", ErrorMessage: "Invalid request", Payload: {} });
    expect(service.login).not.toHaveBeenCalled();
  });

  it("counts reading the body against the request deadline", async () => {
    const service = createService(async () => err(createUnauthorizedError("unknown_user")));
    const handler = createLoginFetchHandler(service, { logger: quietLogger, requestTimeoutMs: 20 });
    const stalled = new Request("http://localhost/login", {
      method: "POST",
      body: new ReadableStream<Uint8Array>({ start() {} }),
      duplex: "half",
    });

    const response = await handler(stalled);

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ ErrorCode: "400000", ErrorMessage: "Invalid request", Payload: {} });
    expect(service.login).not.toHaveBeenCalled();
  });

  it("returns the internal envelope when the service throws", async () => {
    const handler = createLoginFetchHandler(
      createService(async () => {
        throw new Error("unexpected");
      }),
      { logger: quietLogger },
    );

    const response = await handler(post(JSON.stringify({ username: "alice", password: "pw" })));

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({
      ErrorCode: "500000",
      ErrorMessage: "Internal server error",
      Payload: {},
    });
  });

  it("only accepts POST", async () => {
    const service = createService(async () => err(createUnauthorizedError("unknown_user")));
    const handler = createLoginFetchHandler(service, { logger: quietLogger });

    const response = await handler(new Request("http://localhost/login"));

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ ErrorCode: "404000", ErrorMessage: "Resource not found", Payload: {} });
  });
});

describe("parseLoginRequest", () => {
  it("lists every missing field", () => {
    const result = parseLoginRequest(JSON.stringify({ username: "", password: "" }));

    expect(result.ok).toBe(false);
    if (result.ok) {
      return;
    }
    expect(result.error.kind).toBe("validation");
    expect(result.error.details).toEqual({ issues: "username is required; password is required" });
  });

  it("reports non-string fields", () => {
    const result = parseLoginRequest(JSON.stringify({ username: 42, password: "pw" }));

    expect(result.ok).toBe(false);
    if (result.ok) {
      return;
    }
    expect(result.error.details).toEqual({ issues: "username must be a string" });
  });

  it("rejects bodies that are not JSON objects", () => {
    const invalidJson = parseLoginRequest("username=alice");
    const notObject = parseLoginRequest("5");

    expect(invalidJson.ok || notObject.ok).toBe(false);
    if (invalidJson.ok || notObject.ok) {
      return;
    }
    expect(invalidJson.error.details).toEqual({ issues: "body is not valid JSON" });
    expect(notObject.error.details).toEqual({ issues: "Expected object, received number" });
  });

  it("drops unknown fields", () => {
    expect(parseLoginRequest(JSON.stringify({ username: "bob", password: "pw", remember: true }))).toEqual({
      ok: true,
      value: { username: "bob", password: "pw" },
    });
  });
});
