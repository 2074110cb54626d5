export * from "./types/domain-error.js";
export * from "./types/result.js";
export * from "./types/auth-error.js";
export * from "./types/records.js";

export * from "./ports/credentials/credential-store-port.js";
export * from "./ports/challenges/challenge-store-port.js";
export * from "./ports/sessions/session-store-port.js";
export * from "./ports/cache/session-cache-port.js";
