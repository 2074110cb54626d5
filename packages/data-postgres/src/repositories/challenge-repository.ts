import type { ChallengeRecord, ChallengeStorePort } from "@latchkey/contracts";

import type { QueryExecutor } from "../executors/query-executor.js";
import type { PostgresTableNames } from "../tables.js";

type ChallengeTables = Pick<PostgresTableNames, "challenges">;

interface PostgresChallengeStoreOptions {
  readonly tables?: ChallengeTables;
}

export class PostgresChallengeStore implements ChallengeStorePort {
  private readonly tables: ChallengeTables;

  constructor(
    private readonly executor: QueryExecutor,
    options: PostgresChallengeStoreOptions = {},
  ) {
    this.tables = {
      challenges: options.tables?.challenges ?? "auth_challenges",
    };
  }

  async insertChallenge(challenge: ChallengeRecord): Promise<void> {
    await this.executor.query(
      `INSERT INTO ${this.tables.challenges} (user_id, nonce, issued_at) VALUES ($1, $2, $3)`,
      [challenge.userId, challenge.nonce, challenge.issuedAt],
    );
  }

  async deleteChallenge(userId: number, nonce: string): Promise<void> {
    await this.executor.query(
      `DELETE FROM ${this.tables.challenges} WHERE user_id = $1 AND nonce = $2`,
      [userId, nonce],
    );
  }

  async deleteIssuedBefore(cutoff: string): Promise<number> {
    const { rowCount } = await this.executor.query(
      `DELETE FROM ${this.tables.challenges} WHERE issued_at < $1`,
      [cutoff],
    );
    return rowCount;
  }
}

export const createPostgresChallengeStore = (
  executor: QueryExecutor,
  options?: PostgresChallengeStoreOptions,
): ChallengeStorePort => new PostgresChallengeStore(executor, options);
