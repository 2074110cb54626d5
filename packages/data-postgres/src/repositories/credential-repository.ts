import type { CredentialRecord, CredentialStorePort } from "@latchkey/contracts";

import type { QueryExecutor } from "../executors/query-executor.js";
import type { PostgresTableNames } from "../tables.js";

type CredentialTables = Pick<PostgresTableNames, "credentials">;

interface PostgresCredentialStoreOptions {
  readonly tables?: CredentialTables;
}

interface CredentialRow {
  readonly user_id: number;
  readonly username: string;
  readonly salt: string;
  readonly salted_secret: string;
}

const toRecord = (row: CredentialRow): CredentialRecord => ({
  userId: Number(row.user_id),
  username: row.username,
  salt: row.salt,
  saltedSecret: row.salted_secret,
});

export class PostgresCredentialStore implements CredentialStorePort {
  private readonly tables: CredentialTables;

  constructor(
    private readonly executor: QueryExecutor,
    options: PostgresCredentialStoreOptions = {},
  ) {
    this.tables = {
      credentials: options.tables?.credentials ?? "auth_credentials",
    };
  }

  async findByUsername(username: string): Promise<CredentialRecord | undefined> {
    const { rows } = await this.executor.query<CredentialRow>(
      `SELECT user_id, username, salt, salted_secret FROM ${this.tables.credentials} WHERE username = $1 LIMIT 1`,
      [username],
    );

    const row = rows[0];
    return row ? toRecord(row) : undefined;
  }

  /** Registration lives outside the login flow; used by seeding and tests. */
  async insertCredential(record: CredentialRecord): Promise<void> {
    await this.executor.query(
      `INSERT INTO ${this.tables.credentials} (user_id, username, salt, salted_secret) VALUES ($1, $2, $3, $4)`,
      [record.userId, record.username, record.salt, record.saltedSecret],
    );
  }
}

export const createPostgresCredentialStore = (
  executor: QueryExecutor,
  options?: PostgresCredentialStoreOptions,
): PostgresCredentialStore => new PostgresCredentialStore(executor, options);
