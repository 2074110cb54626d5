import {
  createRedisSessionCache,
  createSharedRedisConnector,
  type SharedRedisConnector,
} from "@latchkey/connector-redis";
import type { SessionCachePort } from "@latchkey/contracts";
import {
  createPostgresDataSourceFromPool,
  createPostgresTelemetry,
  type PgQueryable,
  type PostgresDataSource,
} from "@latchkey/data-postgres";
import { AuthSessionService, type AuthSessionServiceConfig } from "@latchkey/session-service";
import { createLatchkeyLogger, type LatchkeyLogger } from "@latchkey/telemetry";

import type { LoginServerConfig } from "./config.js";
import { createLoginServer } from "./server.js";

export type RedisConnectorLike = Pick<SharedRedisConnector, "getHandle" | "checkHealth" | "close">;

export interface LoginRuntime {
  readonly dataSource: PostgresDataSource;
  readonly connector: RedisConnectorLike;
  readonly sessionCache?: SessionCachePort;
  readonly service: AuthSessionService;
  readonly handler: (request: Request) => Promise<Response>;
  close(): Promise<void>;
}

export interface CreateLoginRuntimeOptions {
  readonly config: LoginServerConfig;
  readonly dataSource?: PostgresDataSource;
  readonly pool?: PgQueryable;
  readonly connector?: RedisConnectorLike;
  readonly logger?: LatchkeyLogger;
  readonly service?: Omit<AuthSessionServiceConfig, "sessionCache" | "logger">;
}

/**
 * Wires the stores, the shared Redis connector, the session service and the
 * HTTP handler. The caller owns the Postgres pool and ends it after `close()`.
 */
export const createLoginRuntime = (options: CreateLoginRuntimeOptions): LoginRuntime => {
  const { config } = options;
  const logger = options.logger ?? createLatchkeyLogger({ name: "latchkey", level: config.logLevel });
  const dataSource = resolveDataSource(options, logger);
  const connector =
    options.connector ?? createSharedRedisConnector({ logger: logger.child({ component: "connector-redis" }) });
  const sessionCache = config.sessionCache.enabled
    ? createRedisSessionCache(connector, { ttlSeconds: config.sessionCache.ttlSeconds })
    : undefined;

  const service = new AuthSessionService(
    {
      credentials: dataSource.credentialStore,
      challenges: dataSource.challengeStore,
      sessions: dataSource.sessionStore,
    },
    {
      ...options.service,
      sessionCache,
      logger: logger.child({ component: "session-service" }),
    },
  );

  const handler = createLoginServer({
    service,
    loginPath: config.loginPath,
    requestTimeoutMs: config.requestTimeoutMs,
    healthChecks: [{ name: "redis", check: () => connector.checkHealth() }],
    logger: logger.child({ component: "login-server" }),
  });

  return {
    dataSource,
    connector,
    sessionCache,
    service,
    handler,
    close: () => connector.close(),
  };
};

const resolveDataSource = (options: CreateLoginRuntimeOptions, logger: LatchkeyLogger): PostgresDataSource => {
  if (options.dataSource) {
    return options.dataSource;
  }

  if (options.pool) {
    return createPostgresDataSourceFromPool(options.pool, {
      telemetry: createPostgresTelemetry({ logger: logger.child({ component: "data-postgres" }) }),
    });
  }

  throw new Error("createLoginRuntime requires a data source or pool");
};
