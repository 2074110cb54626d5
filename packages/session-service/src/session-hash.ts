import { createHmac } from "node:crypto";

/** HMAC-SHA-256 of the nonce keyed by the stored salted secret, hex encoded. */
export const deriveSessionHash = (saltedSecret: string, nonce: string): string =>
  createHmac("sha256", saltedSecret).update(nonce).digest("hex");
