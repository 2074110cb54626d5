import { err, ok, type DomainError, type Result } from "@latchkey/contracts";
import { z } from "zod";

export interface RedisConnectionSettings {
  /** `host:port` or a full `redis://` URL. */
  readonly address: string;
  readonly password?: string;
  readonly database: number;
}

export type RedisEnvironment = Record<string, string | undefined>;

const redisEnvironmentSchema = z.object({
  RDHOST: z.string({ required_error: "RDHOST is required" }).trim().min(1, "RDHOST is required"),
  RDPASS: z.string().optional(),
  RDDB: z
    .string({ required_error: "RDDB is required" })
    .trim()
    .regex(/^\d+$/, "RDDB must be a non-negative integer")
    .transform(Number),
});

export const readRedisSettings = (
  env: RedisEnvironment,
): Result<RedisConnectionSettings, DomainError> => {
  const parsed = redisEnvironmentSchema.safeParse(env);
  if (!parsed.success) {
    return err({
      code: "redis.invalid_settings",
      message: "Redis connection settings are missing or malformed.",
      details: { issues: parsed.error.issues.map((issue) => issue.message).join("; ") },
    });
  }

  const { RDHOST, RDPASS, RDDB } = parsed.data;
  return ok({
    address: RDHOST,
    ...(RDPASS ? { password: RDPASS } : {}),
    database: RDDB,
  });
};

export const toRedisUrl = (address: string): string =>
  address.includes("://") ? address : `redis://${address}`;
