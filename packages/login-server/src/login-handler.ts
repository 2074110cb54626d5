import { describeError } from "@latchkey/contracts";
import { OperationCancelledError, runUnlessAborted, type AuthSessionService } from "@latchkey/session-service";
import { createLatchkeyLogger, type LatchkeyLogger } from "@latchkey/telemetry";

import { errorResponse, jsonResponse, successEnvelope } from "./envelope.js";
import { parseLoginRequest } from "./login-request.js";

export type LoginServiceLike = Pick<AuthSessionService, "login">;

export interface LoginFetchHandlerOptions {
  /** Deadline for one login, from reading the body through every store call. */
  readonly requestTimeoutMs?: number;
  readonly logger?: LatchkeyLogger;
}

const DEFAULT_REQUEST_TIMEOUT_MS = 5_000;

export const createLoginFetchHandler = (
  service: LoginServiceLike,
  options: LoginFetchHandlerOptions = {},
): ((request: Request) => Promise<Response>) => {
  const requestTimeoutMs = Math.max(1, options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS);
  const logger = options.logger ?? createLatchkeyLogger({ name: "login-server" });

  return async (request: Request): Promise<Response> => {
    if (request.method.toUpperCase() !== "POST") {
      return errorResponse("not_found");
    }

    const signal = AbortSignal.timeout(requestTimeoutMs);
    try {
      let body: string;
      try {
        body = await runUnlessAborted(signal, "request body", () => request.text());
      } catch (error) {
        if (!(error instanceof OperationCancelledError)) {
          throw error;
        }
        logger.info("login.request_body_timeout", { timeoutMs: requestTimeoutMs });
        return errorResponse("validation");
      }

      const input = parseLoginRequest(body);
      if (!input.ok) {
        logger.info("login.request_invalid", { issues: input.error.details?.issues });
        return errorResponse("validation");
      }

      const result = await service.login(input.value, { signal });
      if (!result.ok) {
        const { kind, code, retryable } = result.error;
        logger.info("login.request_rejected", { kind, code, retryable });
        return errorResponse(kind);
      }

      return jsonResponse(successEnvelope(result.value), 200);
    } catch (error) {
      logger.error("login.request_failed", { error: describeError(error) });
      return errorResponse("internal");
    }
  };
};
