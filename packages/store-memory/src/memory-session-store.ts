import type { SessionRecord, SessionStorePort } from "@latchkey/contracts";

export class MemorySessionStore implements SessionStorePort {
  private readonly sessions = new Map<number, SessionRecord>();

  // Map#set is the single write, so concurrent upserts never interleave fields.
  async upsertSession(session: SessionRecord): Promise<SessionRecord> {
    const stored = { ...session };
    this.sessions.set(session.userId, stored);
    return { ...stored };
  }

  async getSessionByUser(userId: number): Promise<SessionRecord | undefined> {
    const session = this.sessions.get(userId);
    return session ? { ...session } : undefined;
  }

  list(): ReadonlyArray<SessionRecord> {
    return Array.from(this.sessions.values(), (session) => ({ ...session }));
  }
}

export const createMemorySessionStore = (): MemorySessionStore => new MemorySessionStore();
