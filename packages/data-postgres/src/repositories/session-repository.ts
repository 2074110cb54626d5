import { SessionStatus, type SessionRecord, type SessionStorePort } from "@latchkey/contracts";

import type { QueryExecutor } from "../executors/query-executor.js";
import { toIsoTimestamp, type PostgresTableNames } from "../tables.js";

type SessionTables = Pick<PostgresTableNames, "sessions">;

interface PostgresSessionStoreOptions {
  readonly tables?: SessionTables;
}

interface SessionRow {
  readonly user_id: number;
  readonly session_id: string;
  readonly session_hash: string;
  readonly issued_at: Date | string;
  readonly status: number;
}

const toStatus = (value: number): SessionStatus => {
  if (Number(value) === SessionStatus.Active) {
    return SessionStatus.Active;
  }
  throw new Error(`Unknown session status ${value}`);
};

const toRecord = (row: SessionRow): SessionRecord => ({
  userId: Number(row.user_id),
  sessionId: row.session_id,
  sessionHash: row.session_hash,
  issuedAt: toIsoTimestamp(row.issued_at),
  status: toStatus(row.status),
});

export class PostgresSessionStore implements SessionStorePort {
  private readonly tables: SessionTables;

  constructor(
    private readonly executor: QueryExecutor,
    options: PostgresSessionStoreOptions = {},
  ) {
    this.tables = {
      sessions: options.tables?.sessions ?? "auth_sessions",
    };
  }

  async upsertSession(session: SessionRecord): Promise<SessionRecord> {
    const { rows } = await this.executor.query<SessionRow>(
      `INSERT INTO ${this.tables.sessions} (
        user_id,
        session_id,
        session_hash,
        issued_at,
        status
      ) VALUES (
        $1,$2,$3,$4,$5
      )
      ON CONFLICT (user_id) DO UPDATE SET
        session_id = EXCLUDED.session_id,
        session_hash = EXCLUDED.session_hash,
        issued_at = EXCLUDED.issued_at,
        status = EXCLUDED.status
      RETURNING *`,
      [session.userId, session.sessionId, session.sessionHash, session.issuedAt, session.status],
    );

    const row = rows[0];
    if (!row) {
      throw new Error(`Session upsert for user ${session.userId} returned no row`);
    }
    return toRecord(row);
  }

  async getSessionByUser(userId: number): Promise<SessionRecord | undefined> {
    const { rows } = await this.executor.query<SessionRow>(
      `SELECT * FROM ${this.tables.sessions} WHERE user_id = $1 LIMIT 1`,
      [userId],
    );

    const row = rows[0];
    return row ? toRecord(row) : undefined;
  }
}

export const createPostgresSessionStore = (
  executor: QueryExecutor,
  options?: PostgresSessionStoreOptions,
): SessionStorePort => new PostgresSessionStore(executor, options);
