export { MemoryCredentialStore, createMemoryCredentialStore } from "./memory-credential-store.js";
export type { MemoryCredentialStoreOptions } from "./memory-credential-store.js";
export { MemoryChallengeStore, createMemoryChallengeStore } from "./memory-challenge-store.js";
export { MemorySessionStore, createMemorySessionStore } from "./memory-session-store.js";
