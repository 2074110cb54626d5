import { readFile } from "node:fs/promises";

import type { QueryExecutor } from "../executors/query-executor.js";
import { resolvePostgresTableNames, type PostgresTableNames } from "../tables.js";

export interface PostgresMigration {
  readonly id: string;
  readonly filename: string;
  readonly description: string;
}

export const postgresMigrations: ReadonlyArray<PostgresMigration> = [
  {
    id: "0001_initial",
    filename: "0001_initial.sql",
    description: "Credentials, single-use challenges and one-row-per-user sessions",
  },
];

/** Reads a migration and substitutes its `{{credentials}}`-style table placeholders. */
export const readMigrationSql = async (
  migration: PostgresMigration,
  tables: Partial<PostgresTableNames> = {},
): Promise<string> => {
  const names = resolvePostgresTableNames(tables);
  const template = await readFile(new URL(`./${migration.filename}`, import.meta.url), "utf8");
  return template
    .replaceAll("{{credentials}}", names.credentials)
    .replaceAll("{{challenges}}", names.challenges)
    .replaceAll("{{sessions}}", names.sessions);
};

/**
 * Applies every migration in order. Statements use `IF NOT EXISTS`; rerunning is a no-op.
 */
export const runPostgresMigrations = async (
  executor: QueryExecutor,
  tables: Partial<PostgresTableNames> = {},
): Promise<ReadonlyArray<string>> => {
  const applied: string[] = [];
  for (const migration of postgresMigrations) {
    await executor.query(await readMigrationSql(migration, tables));
    applied.push(migration.id);
  }
  return applied;
};
