import { err, ok, type DomainError, type Result } from "@latchkey/contracts";
import { LOG_LEVELS, type LatchkeyLogLevel } from "@latchkey/telemetry";
import { z } from "zod";

export interface LoginServerConfig {
  readonly databaseUrl?: string;
  readonly port: number;
  readonly loginPath: string;
  readonly requestTimeoutMs: number;
  readonly logLevel: LatchkeyLogLevel;
  readonly sessionCache: {
    readonly enabled: boolean;
    readonly ttlSeconds: number;
  };
}

export type LoginServerEnvironment = Readonly<Record<string, string | undefined>>;

const configSchema = z.object({
  DATABASE_URL: z.string().optional(),
  PORT: z.coerce.number().int().min(0).max(65_535).default(8080),
  LOGIN_PATH: z.string().startsWith("/", "LOGIN_PATH must start with /").default("/login"),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  SESSION_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(3_600),
  SESSION_CACHE_ENABLED: z
    .enum(["true", "false", "1", "0"])
    .default("true")
    .transform((value) => value === "true" || value === "1"),
});

const withoutBlankValues = (env: LoginServerEnvironment): Record<string, string> => {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      cleaned[key] = value.trim();
    }
  }
  return cleaned;
};

export const loadLoginServerConfig = (
  env: LoginServerEnvironment = process.env,
): Result<LoginServerConfig, DomainError> => {
  const parsed = configSchema.safeParse(withoutBlankValues(env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    return err({
      code: "config.invalid",
      message: `Invalid login server configuration: ${issues.join("; ")}`,
      details: { issues },
    });
  }

  const values = parsed.data;
  return ok({
    databaseUrl: values.DATABASE_URL,
    port: values.PORT,
    loginPath: values.LOGIN_PATH,
    requestTimeoutMs: values.REQUEST_TIMEOUT_MS,
    logLevel: values.LOG_LEVEL,
    sessionCache: {
      enabled: values.SESSION_CACHE_ENABLED,
      ttlSeconds: values.SESSION_CACHE_TTL_SECONDS,
    },
  });
};
