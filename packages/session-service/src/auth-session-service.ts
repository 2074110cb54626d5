import {
  SessionStatus,
  createAuthError,
  createInternalError,
  createUnauthorizedError,
  createValidationError,
  describeError,
  err,
  ok,
  type AuthError,
  type CachedSession,
  type ChallengeStorePort,
  type CredentialRecord,
  type CredentialStorePort,
  type Result,
  type SessionCachePort,
  type SessionRecord,
  type SessionStorePort,
} from "@latchkey/contracts";
import {
  createLatchkeyCounter,
  createLatchkeyLogger,
  getLatchkeyTracer,
  runWithSpan,
  type LatchkeyCounter,
  type LatchkeyLogger,
  type LatchkeyTracer,
} from "@latchkey/telemetry";

import { OperationCancelledError, runUnlessAborted } from "./cancellation.js";
import { defaultPasswordHasher, saltedSecretsMatch, type PasswordHasher } from "./passwords.js";
import { NONCE_LENGTH, SESSION_ID_LENGTH, createRandomString, type RandomStringSource } from "./random.js";
import { deriveSessionHash } from "./session-hash.js";
import type {
  AuthSessionServiceConfig,
  AuthSessionServiceDependencies,
  LoginInput,
  LoginOptions,
  LoginSession,
} from "./types.js";

type LoginResult = Result<LoginSession, AuthError>;

// Stand-ins hashed when no credential is available, so that path costs one hash too.
const ABSENT_USER_SALT = "latchkey:absent-user";
const ABSENT_USER_SECRET = "0".repeat(64);

export class AuthSessionService {
  private readonly credentials: CredentialStorePort;
  private readonly challenges: ChallengeStorePort;
  private readonly sessions: SessionStorePort;
  private readonly sessionCache?: SessionCachePort;
  private readonly hashPassword: PasswordHasher;
  private readonly randomString: RandomStringSource;
  private readonly nonceLength: number;
  private readonly sessionIdLength: number;
  private readonly now: () => Date;
  private readonly logger: LatchkeyLogger;
  private readonly tracer: LatchkeyTracer;
  private readonly loginCounter: LatchkeyCounter;

  constructor(dependencies: AuthSessionServiceDependencies, config: AuthSessionServiceConfig = {}) {
    this.credentials = dependencies.credentials;
    this.challenges = dependencies.challenges;
    this.sessions = dependencies.sessions;
    this.sessionCache = config.sessionCache;
    this.hashPassword = config.hashPassword ?? defaultPasswordHasher;
    this.randomString = config.randomString ?? createRandomString;
    this.nonceLength = config.nonceLength ?? NONCE_LENGTH;
    this.sessionIdLength = config.sessionIdLength ?? SESSION_ID_LENGTH;
    this.now = config.now ?? (() => new Date());
    this.logger = config.logger ?? createLatchkeyLogger({ name: "session-service" });
    const instrumentation = config.instrumentation ?? { name: "session-service" };
    this.tracer = config.tracer ?? getLatchkeyTracer(instrumentation);
    this.loginCounter =
      config.loginCounter ??
      createLatchkeyCounter("latchkey_logins_total", {
        description: "Count of login attempts by outcome.",
        instrumentation,
      });
  }

  /**
   * Verifies the password and replaces the user's session with a fresh one.
   *
   * Unknown users, wrong passwords and credential store failures all resolve
   * to the same `unauthorized` error.
   */
  async login(input: LoginInput, options: LoginOptions = {}): Promise<LoginResult> {
    return runWithSpan(this.tracer, "auth.login", async (span) => {
      const result = await this.performLogin(input, options.signal);
      const outcome = result.ok ? "success" : result.error.kind;
      span.setAttribute("auth.outcome", outcome);
      this.loginCounter.add(1, { outcome });
      return result;
    });
  }

  private async performLogin(input: LoginInput, signal?: AbortSignal): Promise<LoginResult> {
    const username = typeof input.username === "string" ? input.username : "";
    const password = typeof input.password === "string" ? input.password : "";
    const missing = [username ? undefined : "username", password ? undefined : "password"].filter(
      (field): field is string => field !== undefined,
    );
    if (missing.length > 0) {
      return err(createValidationError(missing.map((field) => `${field} is required`).join("; ")));
    }

    let credential: CredentialRecord | undefined;
    try {
      credential = await runUnlessAborted(signal, "credential lookup", () =>
        this.credentials.findByUsername(username),
      );
    } catch (error) {
      if (error instanceof OperationCancelledError) {
        return err(this.cancelled(error));
      }
      this.logger.error("login.credential_lookup_failed", { username, error: describeError(error) });
      await this.hashWithoutCredential(password);
      return err(createUnauthorizedError("credential_lookup_failed"));
    }

    if (!credential) {
      await this.hashWithoutCredential(password);
      this.logger.info("login.rejected", { username, reason: "unknown_user" });
      return err(createUnauthorizedError("unknown_user"));
    }

    let candidateSecret: string;
    try {
      candidateSecret = await this.hashPassword(password, credential.salt);
    } catch (error) {
      this.logger.error("login.password_hash_failed", { userId: credential.userId, error: describeError(error) });
      return err(createInternalError("auth.password_hash_failed", "Could not hash the presented password", error));
    }

    if (!saltedSecretsMatch(candidateSecret, credential.saltedSecret)) {
      this.logger.info("login.rejected", { userId: credential.userId, reason: "password_mismatch" });
      return err(createUnauthorizedError("password_mismatch"));
    }

    const nonce = this.generate("nonce", this.nonceLength);
    if (!nonce.ok) {
      return nonce;
    }

    const userId = credential.userId;
    const issuedAt = this.now().toISOString();
    try {
      await runUnlessAborted(signal, "challenge insert", () =>
        this.challenges.insertChallenge({ userId, nonce: nonce.value, issuedAt }),
      );
    } catch (error) {
      if (error instanceof OperationCancelledError) {
        return err(this.cancelled(error));
      }
      this.logger.error("login.challenge_insert_failed", { userId, error: describeError(error) });
      return err(
        createInternalError("auth.challenge_insert_failed", "Could not persist the login challenge", error, true),
      );
    }

    const sessionHash = deriveSessionHash(credential.saltedSecret, nonce.value);
    const sessionId = this.generate("session id", this.sessionIdLength);
    if (!sessionId.ok) {
      return sessionId;
    }

    const session: SessionRecord = {
      userId,
      sessionId: sessionId.value,
      sessionHash,
      issuedAt,
      status: SessionStatus.Active,
    };

    try {
      await runUnlessAborted(signal, "session upsert", () => this.sessions.upsertSession(session));
    } catch (error) {
      if (error instanceof OperationCancelledError) {
        return err(this.cancelled(error));
      }
      this.logger.error("login.session_upsert_failed", { userId, error: describeError(error) });
      return err(createInternalError("auth.session_upsert_failed", "Could not store the session", error));
    }

    await this.consumeChallenge(userId, nonce.value, signal);
    await this.publishSession({ ...session, username: credential.username }, signal);

    this.logger.info("login.succeeded", { userId });
    return ok({ sessionId: session.sessionId, username: credential.username, sessionHash });
  }

  /** Spends the same hashing work as a real password check; the outcome is discarded. */
  private async hashWithoutCredential(password: string): Promise<void> {
    try {
      saltedSecretsMatch(await this.hashPassword(password, ABSENT_USER_SALT), ABSENT_USER_SECRET);
    } catch (error) {
      this.logger.debug("login.absent_user_hash_failed", { error: describeError(error) });
    }
  }

  private generate(purpose: string, length: number): Result<string, AuthError> {
    try {
      return ok(this.randomString(length));
    } catch (error) {
      this.logger.error("login.randomness_unavailable", { purpose, error: describeError(error) });
      return err(createInternalError("auth.randomness_unavailable", `Could not generate a ${purpose}`, error));
    }
  }

  /** Best effort: a leftover challenge is inert, so failures only warn. */
  private async consumeChallenge(userId: number, nonce: string, signal?: AbortSignal): Promise<void> {
    try {
      await runUnlessAborted(signal, "challenge delete", () => this.challenges.deleteChallenge(userId, nonce));
    } catch (error) {
      this.logger.warn("login.challenge_cleanup_failed", {
        userId,
        cancelled: error instanceof OperationCancelledError,
        error: describeError(error),
      });
    }
  }

  private async publishSession(session: CachedSession, signal?: AbortSignal): Promise<void> {
    if (!this.sessionCache || signal?.aborted) {
      return;
    }

    try {
      const published = await this.sessionCache.publishSession(session);
      if (!published) {
        this.logger.debug("login.session_cache_unavailable", { userId: session.userId });
      }
    } catch (error) {
      this.logger.warn("login.session_cache_publish_failed", {
        userId: session.userId,
        error: describeError(error),
      });
    }
  }

  private cancelled(error: OperationCancelledError): AuthError {
    this.logger.warn("login.cancelled", { step: error.step, reason: describeError(error.reason) });
    return createAuthError("internal", "auth.cancelled", error.message, {
      details: { step: error.step },
      retryable: true,
    });
  }
}

export const createAuthSessionService = (
  dependencies: AuthSessionServiceDependencies,
  config?: AuthSessionServiceConfig,
): AuthSessionService => new AuthSessionService(dependencies, config);
