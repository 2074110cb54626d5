import { randomInt } from "node:crypto";

export const RANDOM_STRING_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789";

export const NONCE_LENGTH = 16;
export const SESSION_ID_LENGTH = 16;

export type RandomStringSource = (length: number) => string;

/**
 * Draws each character independently from the CSPRNG; `randomInt` is unbiased
 * over the alphabet. Throws when the system cannot supply randomness.
 */
export const createRandomString: RandomStringSource = (length) => {
  if (!Number.isInteger(length) || length <= 0) {
    throw new RangeError(`Random string length must be a positive integer, received ${length}`);
  }

  let value = "";
  for (let index = 0; index < length; index += 1) {
    value += RANDOM_STRING_ALPHABET.charAt(randomInt(RANDOM_STRING_ALPHABET.length));
  }
  return value;
};
