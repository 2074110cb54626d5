import type { LatchkeyError } from "./domain-error.js";

export type Result<TValue, TError extends LatchkeyError = LatchkeyError> =
  | { readonly ok: true; readonly value: TValue }
  | { readonly ok: false; readonly error: TError };

export const ok = <TValue>(value: TValue): { readonly ok: true; readonly value: TValue } => ({
  ok: true as const,
  value,
});

export const err = <TError extends LatchkeyError>(
  error: TError,
): { readonly ok: false; readonly error: TError } => ({
  ok: false as const,
  error,
});
