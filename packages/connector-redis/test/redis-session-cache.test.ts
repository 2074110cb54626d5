import { describe, expect, it, vi } from "vitest";

import { SessionStatus, type CachedSession } from "@latchkey/contracts";

import { RedisSessionCache, type RedisHandle } from "../src/index.js";

const createHandle = () => {
  const data = new Map<string, string>();
  const set = vi.fn(async (key: string, value: string, _ttlSeconds?: number) => {
    data.set(key, value);
  });
  const handle: RedisHandle = {
    connect: async () => {},
    ping: async () => "PONG",
    get: async (key) => data.get(key) ?? null,
    set,
    disconnect: async () => {},
    onError: () => {},
  };
  return { handle, data, set };
};

const session: CachedSession = {
  userId: 12,
  username: "alice",
  sessionId: "AbCdEfGhIjKlMnOp",
  sessionHash: "0".repeat(64),
  issuedAt: "2024-05-01T10:00:00.000Z",
  status: SessionStatus.Active,
};

describe("RedisSessionCache", () => {
  it("stores the session under the prefixed user key with a TTL", async () => {
    const { handle, set } = createHandle();
    const cache = new RedisSessionCache({ getHandle: async () => handle }, { keyPrefix: "sessions:", ttlSeconds: 60 });

    await expect(cache.publishSession(session)).resolves.toBe(true);
    expect(set).toHaveBeenCalledWith("sessions:12", JSON.stringify(session), 60);
    await expect(cache.readSession(12)).resolves.toEqual(session);
  });

  it("reports unavailability when the connector has no handle", async () => {
    const cache = new RedisSessionCache({ getHandle: async () => undefined });

    await expect(cache.publishSession(session)).resolves.toBe(false);
    await expect(cache.readSession(12)).resolves.toBeUndefined();
  });

  it("ignores malformed cache entries", async () => {
    const { handle, data } = createHandle();
    data.set("latchkey:session:12", "{not json");
    data.set("latchkey:session:13", JSON.stringify({ userId: 13 }));
    const cache = new RedisSessionCache({ getHandle: async () => handle });

    await expect(cache.readSession(12)).resolves.toBeUndefined();
    await expect(cache.readSession(13)).resolves.toBeUndefined();
  });
});
