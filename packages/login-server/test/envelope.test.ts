import { describe, expect, it } from "vitest";

import { AUTH_ERROR_KINDS, type AuthErrorKind } from "@latchkey/contracts";

import { errorEnvelope, errorResponse } from "../src/index.js";

const KINDS: AuthErrorKind[] = ["validation", "unauthorized", "not_found", "internal"];

describe("error envelopes", () => {
  it("take code, message and status from the error kind table", async () => {
    for (const kind of KINDS) {
      const descriptor = AUTH_ERROR_KINDS[kind];
      const response = errorResponse(kind);

      expect(errorEnvelope(kind)).toEqual({
        ErrorCode: descriptor.code,
        ErrorMessage: descriptor.message,
        Payload: {},
      });
      expect(response.status).toBe(descriptor.status);
      expect(await response.json()).toEqual(errorEnvelope(kind));
    }
  });

  it("answers unauthorized with 401000", () => {
    expect(errorEnvelope("unauthorized")).toEqual({
      ErrorCode: "401000",
      ErrorMessage: "Invalid username or password",
      Payload: {},
    });
  });
});
