import type { ChallengeRecord, ChallengeStorePort } from "@latchkey/contracts";

const challengeKey = (userId: number, nonce: string): string => `${userId}:${nonce}`;

export class MemoryChallengeStore implements ChallengeStorePort {
  private readonly challenges = new Map<string, ChallengeRecord>();

  async insertChallenge(challenge: ChallengeRecord): Promise<void> {
    const key = challengeKey(challenge.userId, challenge.nonce);
    if (this.challenges.has(key)) {
      throw new Error(`Challenge ${key} already exists`);
    }
    this.challenges.set(key, { ...challenge });
  }

  async deleteChallenge(userId: number, nonce: string): Promise<void> {
    this.challenges.delete(challengeKey(userId, nonce));
  }

  async deleteIssuedBefore(cutoff: string): Promise<number> {
    const cutoffTime = Date.parse(cutoff);
    let removed = 0;
    for (const [key, challenge] of this.challenges) {
      if (Date.parse(challenge.issuedAt) < cutoffTime) {
        this.challenges.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  list(): ReadonlyArray<ChallengeRecord> {
    return Array.from(this.challenges.values(), (challenge) => ({ ...challenge }));
  }
}

export const createMemoryChallengeStore = (): MemoryChallengeStore => new MemoryChallengeStore();
