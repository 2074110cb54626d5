import { createValidationError, err, type AuthError, type Result } from "@latchkey/contracts";
import type { LoginInput } from "@latchkey/session-service";
import { z } from "zod";

import { safeParse } from "./validation.js";

const requiredString = (field: string) =>
  z
    .string({ required_error: `${field} is required`, invalid_type_error: `${field} must be a string` })
    .min(1, `${field} is required`);

const loginRequestSchema = z.object({
  username: requiredString("username"),
  password: requiredString("password"),
});

export type LoginRequestBody = z.infer<typeof loginRequestSchema>;

export const parseLoginRequest = (body: string): Result<LoginInput, AuthError> => {
  let decoded: unknown;
  try {
    decoded = JSON.parse(body);
  } catch {
    return err(createValidationError("body is not valid JSON"));
  }

  return safeParse(loginRequestSchema, decoded, createValidationError);
};
