import { describeError } from "@latchkey/contracts";
import { createLatchkeyLogger, type LatchkeyLogger } from "@latchkey/telemetry";

import { Mutex } from "./mutex.js";
import { createNodeRedisHandleFactory, type RedisHandle, type RedisHandleFactory } from "./redis-handle.js";
import { readRedisSettings, type RedisEnvironment } from "./redis-settings.js";

const DEFAULT_PROBE_TIMEOUT_MS = 2_000;

export interface SharedRedisConnectorOptions {
  /** Read on every construction attempt, so rotated settings apply on reconnect. */
  readonly env?: () => RedisEnvironment;
  readonly createHandle?: RedisHandleFactory;
  readonly logger?: LatchkeyLogger;
  readonly probeTimeoutMs?: number;
}

/**
 * Owns the single Redis client of the process.
 *
 * Retrieval and construction share one mutex. A handle is created on first
 * demand, pinged on every later retrieval, and dropped when a ping fails so
 * that the next retrieval rebuilds it. Callers treat `undefined` as "cache
 * layer unavailable".
 */
export class SharedRedisConnector {
  private handle: RedisHandle | undefined;
  private readonly mutex = new Mutex();
  private readonly env: () => RedisEnvironment;
  private readonly createHandle: RedisHandleFactory;
  private readonly logger: LatchkeyLogger;
  private readonly probeTimeoutMs: number;

  constructor(options: SharedRedisConnectorOptions = {}) {
    this.env = options.env ?? (() => process.env);
    this.createHandle = options.createHandle ?? createNodeRedisHandleFactory();
    this.logger = (options.logger ?? createLatchkeyLogger({ name: "connector-redis" })).child({
      component: "redis",
    });
    this.probeTimeoutMs = Math.max(1, options.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS);
  }

  getHandle(): Promise<RedisHandle | undefined> {
    return this.mutex.runExclusive(async () => {
      const current = this.handle;
      if (!current) {
        this.handle = await this.establish();
        return this.handle;
      }

      if (await this.probe(current)) {
        return current;
      }

      this.logger.error("redis.connection_lost");
      this.handle = undefined;
      await this.release(current);
      return undefined;
    });
  }

  async checkHealth(): Promise<boolean> {
    return (await this.getHandle()) !== undefined;
  }

  isConnected(): boolean {
    return this.handle !== undefined;
  }

  close(): Promise<void> {
    return this.mutex.runExclusive(async () => {
      const current = this.handle;
      this.handle = undefined;
      if (current) {
        await this.release(current);
        this.logger.info("redis.closed");
      }
    });
  }

  private async establish(): Promise<RedisHandle | undefined> {
    const settings = readRedisSettings(this.env());
    if (!settings.ok) {
      this.logger.error("redis.settings_invalid", { error: settings.error });
      return undefined;
    }

    let candidate: RedisHandle;
    try {
      candidate = this.createHandle(settings.value);
    } catch (error) {
      this.logger.error("redis.client_create_failed", { error: describeError(error) });
      return undefined;
    }

    candidate.onError((error) => {
      this.logger.warn("redis.client_error", { error: describeError(error) });
    });

    try {
      await withTimeout(candidate.connect(), this.probeTimeoutMs, "connect");
      await withTimeout(candidate.ping(), this.probeTimeoutMs, "ping");
    } catch (error) {
      this.logger.error("redis.connect_failed", {
        address: settings.value.address,
        database: settings.value.database,
        error: describeError(error),
      });
      await this.release(candidate);
      return undefined;
    }

    this.logger.info("redis.connected", {
      address: settings.value.address,
      database: settings.value.database,
    });
    return candidate;
  }

  private async probe(handle: RedisHandle): Promise<boolean> {
    try {
      await withTimeout(handle.ping(), this.probeTimeoutMs, "ping");
      return true;
    } catch (error) {
      this.logger.warn("redis.ping_failed", { error: describeError(error) });
      return false;
    }
  }

  private async release(handle: RedisHandle): Promise<void> {
    try {
      await handle.disconnect();
    } catch (error) {
      this.logger.debug("redis.release_failed", { error: describeError(error) });
    }
  }
}

const withTimeout = <T>(operation: Promise<T>, timeoutMs: number, label: string): Promise<T> =>
  new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new Error(`Redis ${label} timed out after ${timeoutMs}ms`));
    }, timeoutMs);
    operation.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      },
    );
  });

export const createSharedRedisConnector = (
  options?: SharedRedisConnectorOptions,
): SharedRedisConnector => new SharedRedisConnector(options);
