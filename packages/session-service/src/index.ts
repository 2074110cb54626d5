export { AuthSessionService, createAuthSessionService } from "./auth-session-service.js";
export type {
  AuthSessionServiceConfig,
  AuthSessionServiceDependencies,
  LoginInput,
  LoginOptions,
  LoginSession,
} from "./types.js";

export { defaultPasswordHasher, saltedSecretsMatch } from "./passwords.js";
export type { PasswordHasher } from "./passwords.js";
export {
  NONCE_LENGTH,
  RANDOM_STRING_ALPHABET,
  SESSION_ID_LENGTH,
  createRandomString,
} from "./random.js";
export type { RandomStringSource } from "./random.js";
export { deriveSessionHash } from "./session-hash.js";
export { OperationCancelledError, runUnlessAborted } from "./cancellation.js";
