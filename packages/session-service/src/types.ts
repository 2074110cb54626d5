import type {
  ChallengeStorePort,
  CredentialStorePort,
  SessionCachePort,
  SessionStorePort,
} from "@latchkey/contracts";
import type {
  LatchkeyCounter,
  LatchkeyInstrumentationOptions,
  LatchkeyLogger,
  LatchkeyTracer,
} from "@latchkey/telemetry";

import type { PasswordHasher } from "./passwords.js";
import type { RandomStringSource } from "./random.js";

export interface LoginInput {
  readonly username: string;
  readonly password: string;
}

export interface LoginOptions {
  /** Deadline or cancellation imposed by the caller. */
  readonly signal?: AbortSignal;
}

export interface LoginSession {
  readonly sessionId: string;
  readonly username: string;
  readonly sessionHash: string;
}

export interface AuthSessionServiceDependencies {
  readonly credentials: CredentialStorePort;
  readonly challenges: ChallengeStorePort;
  readonly sessions: SessionStorePort;
}

export interface AuthSessionServiceConfig {
  readonly sessionCache?: SessionCachePort;
  readonly hashPassword?: PasswordHasher;
  readonly randomString?: RandomStringSource;
  readonly nonceLength?: number;
  readonly sessionIdLength?: number;
  readonly now?: () => Date;
  readonly logger?: LatchkeyLogger;
  readonly tracer?: LatchkeyTracer;
  readonly instrumentation?: LatchkeyInstrumentationOptions;
  readonly loginCounter?: LatchkeyCounter;
}
