export interface CredentialRecord {
  readonly userId: number;
  readonly username: string;
  readonly salt: string;
  /** One-way function of (password, salt) fixed at registration. */
  readonly saltedSecret: string;
}

export interface ChallengeRecord {
  readonly userId: number;
  readonly nonce: string;
  readonly issuedAt: string;
}

export enum SessionStatus {
  Active = 1,
}

export interface SessionRecord {
  readonly userId: number;
  readonly sessionId: string;
  readonly sessionHash: string;
  readonly issuedAt: string;
  readonly status: SessionStatus;
}

export interface CachedSession extends SessionRecord {
  readonly username: string;
}
