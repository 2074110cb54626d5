import { SessionStatus, type CachedSession, type SessionCachePort } from "@latchkey/contracts";
import { z } from "zod";

import type { SharedRedisConnector } from "./shared-redis-connector.js";

export interface RedisSessionCacheOptions {
  readonly keyPrefix?: string;
  readonly ttlSeconds?: number;
}

const DEFAULT_KEY_PREFIX = "latchkey:session";
const DEFAULT_TTL_SECONDS = 3_600;

const cachedSessionSchema = z.object({
  userId: z.number().int(),
  username: z.string(),
  sessionId: z.string(),
  sessionHash: z.string(),
  issuedAt: z.string(),
  status: z.nativeEnum(SessionStatus),
});

/**
 * Session acceleration layer: mirrors the latest session per user in Redis.
 */
export class RedisSessionCache implements SessionCachePort {
  private readonly keyPrefix: string;
  private readonly ttlSeconds: number;

  constructor(
    private readonly connector: Pick<SharedRedisConnector, "getHandle">,
    options: RedisSessionCacheOptions = {},
  ) {
    this.keyPrefix = normalizePrefix(options.keyPrefix ?? DEFAULT_KEY_PREFIX);
    this.ttlSeconds = Math.max(1, options.ttlSeconds ?? DEFAULT_TTL_SECONDS);
  }

  async publishSession(session: CachedSession): Promise<boolean> {
    const handle = await this.connector.getHandle();
    if (!handle) {
      return false;
    }

    const payload: CachedSession = {
      userId: session.userId,
      username: session.username,
      sessionId: session.sessionId,
      sessionHash: session.sessionHash,
      issuedAt: session.issuedAt,
      status: session.status,
    };
    await handle.set(this.key(session.userId), JSON.stringify(payload), this.ttlSeconds);
    return true;
  }

  async readSession(userId: number): Promise<CachedSession | undefined> {
    const handle = await this.connector.getHandle();
    if (!handle) {
      return undefined;
    }

    const stored = await handle.get(this.key(userId));
    if (!stored) {
      return undefined;
    }

    const parsed = cachedSessionSchema.safeParse(safeJsonParse(stored));
    return parsed.success ? parsed.data : undefined;
  }

  private key(userId: number): string {
    return this.keyPrefix ? `${this.keyPrefix}:${userId}` : String(userId);
  }
}

const normalizePrefix = (prefix: string): string => prefix.replace(/:+$/, "");

const safeJsonParse = (payload: string): unknown => {
  try {
    return JSON.parse(payload);
  } catch {
    return undefined;
  }
};

export const createRedisSessionCache = (
  connector: Pick<SharedRedisConnector, "getHandle">,
  options?: RedisSessionCacheOptions,
): RedisSessionCache => new RedisSessionCache(connector, options);
