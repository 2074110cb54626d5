import {
  SUCCESS_CODE,
  SUCCESS_MESSAGE,
  describeAuthErrorKind,
  type AuthErrorKind,
} from "@latchkey/contracts";
import type { LoginSession } from "@latchkey/session-service";

export interface LoginPayload {
  readonly session_id: string;
  readonly username: string;
  readonly session_hash: string;
}

export type EmptyPayload = Record<string, never>;

/** Wire shape of every response on the login and fallback routes. */
export interface ResponseEnvelope<TPayload> {
  readonly ErrorCode: string;
  readonly ErrorMessage: string;
  readonly Payload: TPayload;
}

export const successEnvelope = (session: LoginSession): ResponseEnvelope<LoginPayload> => ({
  ErrorCode: SUCCESS_CODE,
  ErrorMessage: SUCCESS_MESSAGE,
  Payload: {
    session_id: session.sessionId,
    username: session.username,
    session_hash: session.sessionHash,
  },
});

export const errorEnvelope = (kind: AuthErrorKind): ResponseEnvelope<EmptyPayload> => {
  const descriptor = describeAuthErrorKind(kind);
  return { ErrorCode: descriptor.code, ErrorMessage: descriptor.message, Payload: {} };
};

export const jsonResponse = (body: unknown, status: number): Response =>
  new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });

export const errorResponse = (kind: AuthErrorKind): Response =>
  jsonResponse(errorEnvelope(kind), describeAuthErrorKind(kind).status);
