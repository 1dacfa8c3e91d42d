import { z } from "zod";

const EnvSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),
  PORT: z.coerce.number().int().positive().default(3001),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  /** Absent → in-memory store (local development only). */
  DATABASE_URL: z.string().min(1).optional(),
  REDIS_URL: z.string().min(1),
  JWT_SECRET: z.string().min(16),
  ALLOWED_ORIGINS: z.string().default(""),
  /** Standard 5-field cron for the scheduled sync dispatch. */
  SYNC_CRON: z.string().default("*/15 * * * *"),
  SYNC_PAGE_SIZE: z.coerce.number().int().min(1).max(500).default(100),
  WEBHOOK_DEDUP_TTL_SECONDS: z.coerce
    .number()
    .int()
    .positive()
    .default(24 * 60 * 60),
  DEFAULT_CALL_TIMEOUT_MS: z.coerce.number().int().positive().default(45_000),
});

export type Env = z.infer<typeof EnvSchema>;

let _env: Env | null = null;

/**
 * Parses and caches process.env.
 * Throws on the first call when a required variable is missing so
 * misconfigured deployments fail at startup, not on first request.
 */
export function getEnv(): Env {
  if (!_env) {
    const parsed = EnvSchema.safeParse(process.env);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      throw new Error(`Invalid environment configuration. ${issues}`);
    }
    _env = parsed.data;
  }
  return _env;
}

/** ONLY for tests. */
export function _resetEnv(): void {
  _env = null;
}
