import { createHash, timingSafeEqual } from "node:crypto";

/**
 * One-way function shared with registration: (password, salt) → stored secret.
 */
export type PasswordHasher = (password: string, salt: string) => Promise<string> | string;

/**
 * Single SHA-256 digest of `password + salt`, hex encoded, matching the secrets
 * the registration flow stores. This is a fast digest, not a KDF: deployments
 * that store scrypt or argon2 output supply their own `hashPassword`.
 */
export const defaultPasswordHasher: PasswordHasher = (password, salt) =>
  createHash("sha256").update(`${password}${salt}`).digest("hex");

export const saltedSecretsMatch = (candidate: string, stored: string): boolean => {
  const candidateBuffer = Buffer.from(candidate, "utf8");
  const storedBuffer = Buffer.from(stored, "utf8");
  if (candidateBuffer.length !== storedBuffer.length) {
    return false;
  }
  return timingSafeEqual(candidateBuffer, storedBuffer);
};
