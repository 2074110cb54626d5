import type { ChallengeStorePort, SessionStorePort } from "@latchkey/contracts";

import { createPgQueryExecutor, type PgQueryable } from "./executors/pg-query-executor.js";
import type { QueryExecutor } from "./executors/query-executor.js";
import { createPostgresChallengeStore } from "./repositories/challenge-repository.js";
import {
  createPostgresCredentialStore,
  type PostgresCredentialStore,
} from "./repositories/credential-repository.js";
import { createPostgresSessionStore } from "./repositories/session-repository.js";
import { resolvePostgresTableNames, type PostgresTableNames } from "./tables.js";
import type { PostgresTelemetryContext } from "./telemetry.js";

export interface PostgresDataSource {
  readonly executor: QueryExecutor;
  readonly tables: PostgresTableNames;
  readonly credentialStore: PostgresCredentialStore;
  readonly challengeStore: ChallengeStorePort;
  readonly sessionStore: SessionStorePort;
}

export interface CreatePostgresDataSourceOptions {
  readonly pool?: PgQueryable;
  readonly executor?: QueryExecutor;
  readonly tables?: Partial<PostgresTableNames>;
  readonly telemetry?: PostgresTelemetryContext;
}

export const createPostgresDataSource = (
  options: CreatePostgresDataSourceOptions,
): PostgresDataSource => {
  const tables = resolvePostgresTableNames(options.tables);
  let executor = options.executor;

  if (!executor && options.pool) {
    executor = createPgQueryExecutor(options.pool, { telemetry: options.telemetry });
  }

  if (!executor) {
    throw new Error("createPostgresDataSource requires a pool or query executor");
  }

  return {
    executor,
    tables,
    credentialStore: createPostgresCredentialStore(executor, { tables }),
    challengeStore: createPostgresChallengeStore(executor, { tables }),
    sessionStore: createPostgresSessionStore(executor, { tables }),
  };
};

export const createPostgresDataSourceFromPool = (
  pool: PgQueryable,
  options: Omit<CreatePostgresDataSourceOptions, "pool" | "executor"> = {},
): PostgresDataSource => createPostgresDataSource({ ...options, pool });
