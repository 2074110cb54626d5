import type { ChallengeRecord } from "../../types/records.js";

export interface ChallengeStorePort {
  /** Rejects when (userId, nonce) already exists. */
  insertChallenge(challenge: ChallengeRecord): Promise<void>;
  deleteChallenge(userId: number, nonce: string): Promise<void>;
  /** Removes challenges issued strictly before `cutoff` and returns how many were removed. */
  deleteIssuedBefore(cutoff: string): Promise<number>;
}
