import { createClient } from "@redis/client";

import { toRedisUrl, type RedisConnectionSettings } from "./redis-settings.js";

/**
 * The slice of a Redis client the connector and session cache rely on.
 */
export interface RedisHandle {
  connect(): Promise<void>;
  ping(): Promise<string>;
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds?: number): Promise<void>;
  disconnect(): Promise<void>;
  onError(listener: (error: unknown) => void): void;
}

export type RedisHandleFactory = (settings: RedisConnectionSettings) => RedisHandle;

export interface NodeRedisHandleOptions {
  readonly connectTimeoutMs?: number;
}

const DEFAULT_CONNECT_TIMEOUT_MS = 2_000;

export const createNodeRedisHandleFactory =
  (options: NodeRedisHandleOptions = {}): RedisHandleFactory =>
  (settings) => {
    // Reconnection is driven by the connector, never by the client itself.
    const client = createClient({
      url: toRedisUrl(settings.address),
      password: settings.password,
      database: settings.database,
      socket: {
        connectTimeout: options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS,
        reconnectStrategy: false,
      },
    });

    return {
      async connect() {
        await client.connect();
      },
      ping: () => client.ping(),
      get: (key) => client.get(key),
      async set(key, value, ttlSeconds) {
        if (ttlSeconds !== undefined) {
          await client.set(key, value, { EX: ttlSeconds });
        } else {
          await client.set(key, value);
        }
      },
      async disconnect() {
        if (client.isOpen) {
          await client.disconnect();
        }
      },
      onError(listener) {
        client.on("error", listener);
      },
    } satisfies RedisHandle;
  };
