import type { CachedSession } from "../../types/records.js";

export interface SessionCachePort {
  /** Resolves `false` when the cache layer is unavailable. */
  publishSession(session: CachedSession): Promise<boolean>;
  readSession(userId: number): Promise<CachedSession | undefined>;
}
