import type { InfraError } from "./domain-error.js";

export type AuthErrorKind = "validation" | "unauthorized" | "not_found" | "internal";

export interface AuthErrorKindDescriptor {
  /** Six-digit code returned to clients as `ErrorCode`. */
  readonly code: string;
  readonly status: number;
  /** Client-facing text. Never carries diagnostic detail. */
  readonly message: string;
}

export const SUCCESS_CODE = "000000";
export const SUCCESS_MESSAGE = "Success";

export const AUTH_ERROR_KINDS: Readonly<Record<AuthErrorKind, AuthErrorKindDescriptor>> = {
  validation: { code: "400000", status: 400, message: "Invalid request" },
  unauthorized: { code: "401000", status: 401, message: "Invalid username or password" },
  not_found: { code: "404000", status: 404, message: "Resource not found" },
  internal: { code: "500000", status: 500, message: "Internal server error" },
};

/**
 * Error surfaced by the login flow. `code` and `message` are internal and only
 * reach logs; the boundary answers with the descriptor for `kind`.
 */
export interface AuthError extends InfraError {
  readonly kind: AuthErrorKind;
}

export const createAuthError = (
  kind: AuthErrorKind,
  code: string,
  message: string,
  options: { readonly details?: Record<string, unknown>; readonly retryable?: boolean } = {},
): AuthError => ({
  kind,
  code,
  message,
  ...(options.details ? { details: options.details } : {}),
  ...(options.retryable !== undefined ? { retryable: options.retryable } : {}),
});

export const createValidationError = (issues: string): AuthError =>
  createAuthError("validation", "auth.validation_failed", "The login payload failed validation.", {
    details: { issues },
  });

export const createUnauthorizedError = (reason: string): AuthError =>
  createAuthError("unauthorized", "auth.unauthorized", "Credentials were rejected.", {
    details: { reason },
  });

export const createInternalError = (
  code: string,
  message: string,
  error?: unknown,
  retryable = false,
): AuthError =>
  createAuthError("internal", code, message, {
    details: error === undefined ? undefined : { cause: describeError(error) },
    retryable,
  });

export const describeAuthErrorKind = (kind: AuthErrorKind): AuthErrorKindDescriptor =>
  AUTH_ERROR_KINDS[kind];

/**
 * Flattens an unknown thrown value into loggable fields.
 */
export const describeError = (error: unknown): Record<string, unknown> => {
  if (!error || typeof error !== "object") {
    return { message: String(error) };
  }

  const normalized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(error)) {
    if (value !== undefined) {
      normalized[key] = value;
    }
  }

  if (error instanceof Error) {
    normalized.name = error.name;
    normalized.message = error.message;
  }

  if (Object.keys(normalized).length === 0) {
    normalized.message = String(error);
  }

  return normalized;
};
