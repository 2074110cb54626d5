import { createHash, createHmac } from "node:crypto";

import { afterEach, describe, expect, it, vi } from "vitest";

import { createTestPostgresDataSource, type TestPostgresDataSource } from "@latchkey/data-postgres/testing";
import { createLatchkeyLogger } from "@latchkey/telemetry";

import { createLoginRuntime, loadLoginServerConfig, type LoginServerConfig, type RedisConnectorLike } from "../src/index.js";

const ALICE_SECRET = createHash("sha256").update("wonderlandsalt-1").digest("hex");

let dataSource: TestPostgresDataSource | undefined;

afterEach(async () => {
  await dataSource?.dispose();
  dataSource = undefined;
});

const baseConfig = (): LoginServerConfig => {
  const config = loadLoginServerConfig({});
  if (!config.ok) {
    throw new Error(config.error.message);
  }
  return config.value;
};

const createConnector = (healthy: boolean) => ({
  getHandle: vi.fn(async () => undefined),
  checkHealth: vi.fn(async () => healthy),
  close: vi.fn(async () => {}),
}) satisfies RedisConnectorLike;

const setup = async (options: { config?: LoginServerConfig; random?: string[]; healthy?: boolean } = {}) => {
  dataSource = await createTestPostgresDataSource({
    credentials: [{ userId: 1, username: "alice", salt: "salt-1", saltedSecret: ALICE_SECRET }],
  });
  const queue = [...(options.random ?? [])];
  const connector = createConnector(options.healthy ?? true);
  const runtime = createLoginRuntime({
    config: options.config ?? baseConfig(),
    dataSource,
    connector,
    logger: createLatchkeyLogger({ sink: () => {} }),
    service:
      queue.length > 0
        ? {
            randomString: () => {
              const next = queue.shift();
              if (next === undefined) {
                throw new Error("random queue exhausted");
              }
              return next;
            },
          }
        : undefined,
  });
  return { runtime, connector, source: dataSource };
};

const postLogin = (body: unknown): Request =>
  new Request("http://latchkey.test/login", {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body),
  });

describe("login runtime on pg-mem", () => {
  it("logs alice in and stores the issued session", async () => {
    const { runtime, source } = await setup({ random: ["NonceNonceNonce1", "SessionSession01"] });

    const response = await runtime.handler(postLogin({ username: "alice", password: "wonderland" }));

    expect(response.status).toBe(200);
    const sessionHash = createHmac("sha256", ALICE_SECRET).update("NonceNonceNonce1").digest("hex");
    expect(await response.json()).toEqual({
      ErrorCode: "000000",
      ErrorMessage: "Success",
      Payload: { session_id: "SessionSession01", username: "alice", session_hash: sessionHash },
    });

    const stored = await source.sessionStore.getSessionByUser(1);
    expect(stored?.sessionId).toBe("SessionSession01");
    expect(stored?.sessionHash).toBe(sessionHash);

    const { rows } = await source.executor.query("SELECT * FROM auth_challenges");
    expect(rows).toHaveLength(0);
  });

  it("keeps one session row across repeated logins", async () => {
    const { runtime, source } = await setup();

    const first = await runtime.handler(postLogin({ username: "alice", password: "wonderland" }));
    const second = await runtime.handler(postLogin({ username: "alice", password: "wonderland" }));
    const firstBody: unknown = await first.json();
    const secondBody: unknown = await second.json();

    expect(firstBody).not.toEqual(secondBody);
    const { rows } = await source.executor.query<{ session_id: string }>("SELECT session_id FROM auth_sessions");
    expect(rows).toHaveLength(1);
    expect(secondBody).toMatchObject({ Payload: { session_id: rows[0]?.session_id } });
  });

  it("answers a wrong password and an unknown user identically", async () => {
    const { runtime } = await setup();

    const wrong = await runtime.handler(postLogin({ username: "alice", password: "looking-glass" }));
    const unknown = await runtime.handler(postLogin({ username: "hatter", password: "wonderland" }));

    const expected = { ErrorCode: "401000", ErrorMessage: "Invalid username or password", Payload: {} };
    expect(wrong.status).toBe(401);
    expect(unknown.status).toBe(401);
    expect(await wrong.json()).toEqual(expected);
    expect(await unknown.json()).toEqual(expected);
  });

  it("publishes through the connector only when the session cache is enabled", async () => {
    const enabled = await setup();
    await enabled.runtime.handler(postLogin({ username: "alice", password: "wonderland" }));
    expect(enabled.connector.getHandle).toHaveBeenCalledTimes(1);
    expect(enabled.runtime.sessionCache).toBeDefined();
    await enabled.source.dispose();

    const config = baseConfig();
    const disabled = await setup({ config: { ...config, sessionCache: { ...config.sessionCache, enabled: false } } });
    await disabled.runtime.handler(postLogin({ username: "alice", password: "wonderland" }));
    expect(disabled.connector.getHandle).not.toHaveBeenCalled();
    expect(disabled.runtime.sessionCache).toBeUndefined();
  });

  it("reports redis health on /healthz and closes the connector", async () => {
    const { runtime, connector } = await setup({ healthy: false });

    const response = await runtime.handler(new Request("http://latchkey.test/healthz"));
    await runtime.close();

    expect(response.status).toBe(503);
    expect(await response.json()).toEqual({ ok: false, stores: [{ name: "redis", healthy: false }] });
    expect(connector.close).toHaveBeenCalledTimes(1);
  });
});
