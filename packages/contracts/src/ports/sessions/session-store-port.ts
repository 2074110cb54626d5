import type { SessionRecord } from "../../types/records.js";

export interface SessionStorePort {
  /**
   * Inserts the session or overwrites the existing row for `session.userId`
   * in a single atomic statement.
   */
  upsertSession(session: SessionRecord): Promise<SessionRecord>;
  getSessionByUser(userId: number): Promise<SessionRecord | undefined>;
}
