export type { QueryExecutor, QueryResult } from "./executors/query-executor.js";
export { createPgQueryExecutor } from "./executors/pg-query-executor.js";
export type { PgQueryable, CreatePgQueryExecutorOptions } from "./executors/pg-query-executor.js";

export {
  createPostgresDataSource,
  createPostgresDataSourceFromPool,
} from "./postgres-data-source.js";
export type { PostgresDataSource, CreatePostgresDataSourceOptions } from "./postgres-data-source.js";

export { PostgresCredentialStore, createPostgresCredentialStore } from "./repositories/credential-repository.js";
export { PostgresChallengeStore, createPostgresChallengeStore } from "./repositories/challenge-repository.js";
export { PostgresSessionStore, createPostgresSessionStore } from "./repositories/session-repository.js";

export { defaultPostgresTableNames, resolvePostgresTableNames } from "./tables.js";
export type { PostgresTableNames } from "./tables.js";

export { postgresMigrations, runPostgresMigrations } from "./migrations/index.js";
export type { PostgresMigration } from "./migrations/index.js";

export { seedPostgresDataSource } from "./seeding/seed.js";
export type { PostgresSeedData } from "./seeding/seed.js";

export { createPostgresTelemetry } from "./telemetry.js";
export type {
  PostgresTelemetryContext,
  PostgresTelemetryMetrics,
  PostgresTelemetryOptions,
} from "./telemetry.js";
