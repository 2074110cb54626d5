export interface PostgresTableNames {
  readonly credentials: string;
  readonly challenges: string;
  readonly sessions: string;
}

export const defaultPostgresTableNames: PostgresTableNames = {
  credentials: "auth_credentials",
  challenges: "auth_challenges",
  sessions: "auth_sessions",
};

const TABLE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/;

/**
 * Table names are spliced into SQL text by the repositories and migrations, so
 * only plain or schema-qualified identifiers are accepted.
 */
export const resolvePostgresTableNames = (
  overrides?: Partial<PostgresTableNames>,
): PostgresTableNames => {
  const tables: PostgresTableNames = { ...defaultPostgresTableNames, ...(overrides ?? {}) };
  for (const name of Object.values(tables)) {
    if (!TABLE_NAME_PATTERN.test(name)) {
      throw new Error(`Invalid Postgres table name "${name}"`);
    }
  }
  return tables;
};

/** Postgres timestamps come back as Date from pg and as strings from some fakes. */
export const toIsoTimestamp = (value: Date | string): string =>
  value instanceof Date ? value.toISOString() : new Date(value).toISOString();
