import { err, ok, type LatchkeyError, type Result } from "@latchkey/contracts";
import type { ZodSchema } from "zod";

/**
 * Parses an input using the provided Zod schema and converts validation failures into Result errors.
 */
export const safeParse = <TOutput, TError extends LatchkeyError>(
  schema: ZodSchema<TOutput>,
  input: unknown,
  errorFactory: (issues: string) => TError,
): Result<TOutput, TError> => {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const flat = parsed.error.flatten();
    const messages = [
      ...flat.formErrors,
      ...Object.values(flat.fieldErrors)
        .flat()
        .filter((value): value is string => Boolean(value)),
    ];
    const detail = messages.length > 0 ? messages.join("; ") : parsed.error.message;
    return err(errorFactory(detail));
  }
  return ok(parsed.data);
};
