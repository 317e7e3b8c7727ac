// =============================================================================
// @triage/shared — Environment variable config with validation
// =============================================================================
// Loads configuration from environment variables with sensible defaults.
// Required variables throw on missing. Optional variables fall back to
// documented defaults. Empty strings are treated as unset so that a blank
// `GEMINI_API_KEY=` line in an env file does not count as a credential.
// =============================================================================

import { z } from "zod";

// ---------------------------------------------------------------------------
// Field helpers
// ---------------------------------------------------------------------------

const blankAsUndefined = (val: unknown): unknown =>
  typeof val === "string" && val.trim() === "" ? undefined : val;

const optionalSecret = z.preprocess(blankAsUndefined, z.string().optional());

const booleanFlag = z.preprocess(
  blankAsUndefined,
  z
    .enum(["true", "false", "1", "0"])
    .default("true")
    .transform((v) => v === "true" || v === "1"),
);

/**
 * JSON string that parses to a map of API key -> client ID.
 * Example: '{"test-key": "dashboard"}'
 */
const apiKeysSchema = z.string().transform((val, ctx) => {
  try {
    const parsed: unknown = JSON.parse(val);
    if (
      typeof parsed !== "object" ||
      parsed === null ||
      Array.isArray(parsed)
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message:
          "API_KEYS must be a JSON object mapping key strings to client ID strings",
      });
      return z.NEVER;
    }
    const record: Record<string, string> = {};
    for (const [key, value] of Object.entries(parsed)) {
      if (typeof value !== "string") {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `API_KEYS value for "${key}" must be a string, got ${typeof value}`,
        });
        return z.NEVER;
      }
      record[key] = value;
    }
    return record;
  } catch {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "API_KEYS must be valid JSON",
    });
    return z.NEVER;
  }
});

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const triageFields = {
  // Credentials (at least one classifier key is required, see refinement)
  GEMINI_API_KEY: optionalSecret,
  ANTHROPIC_API_KEY: optionalSecret,
  NOTIFY_WEBHOOK_URL: z
    .string({ required_error: "NOTIFY_WEBHOOK_URL is required" })
    .url("NOTIFY_WEBHOOK_URL must be a URL"),

  // Models
  GEMINI_MODEL: z.string().min(1).default("gemini-2.0-flash-lite"),
  ANTHROPIC_MODEL: z.string().min(1).default("claude-3-5-haiku-latest"),

  // Storage
  QUEUE_FILE: z.string().min(1).default("data/pending_queue.json"),
  CHECKPOINT_FILE: z.string().min(1).default("data/processed_posts.json"),
  WATCHLIST_FILE: z.preprocess(blankAsUndefined, z.string().optional()),
  MAX_PROCESSED_IDS: z.coerce.number().int().min(1).default(5000),

  // Run shape
  ITEMS_PER_RUN: z.coerce.number().int().min(1).default(40),
  CHUNK_SIZE: z.coerce.number().int().min(1).default(20),
  CHUNK_DELAY_MS: z.coerce.number().int().min(0).default(15_000),
  QUOTA_RETRY_LIMIT: z.coerce.number().int().min(1).default(2),
  QUOTA_BACKOFF_MS: z.coerce.number().int().min(0).default(10_000),
  MAX_AGE_DAYS: z.coerce.number().min(0).default(7),

  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal"])
    .default("info"),
};

const serverFields = {
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  API_KEYS: apiKeysSchema,
  CRON_ENABLED: booleanFlag,
  CRON_SCHEDULE: z.string().min(1).default("*/30 * * * *"),
};

function requireClassifierKey(
  cfg: { GEMINI_API_KEY?: string; ANTHROPIC_API_KEY?: string },
  ctx: z.RefinementCtx,
): void {
  if (!cfg.GEMINI_API_KEY && !cfg.ANTHROPIC_API_KEY) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["GEMINI_API_KEY"],
      message: "GEMINI_API_KEY or ANTHROPIC_API_KEY is required",
    });
  }
}

const configSchema = z.object(triageFields).superRefine(requireClassifierKey);

const serverConfigSchema = z
  .object({ ...triageFields, ...serverFields })
  .superRefine(requireClassifierKey);

// ---------------------------------------------------------------------------
// Exported types
// ---------------------------------------------------------------------------

export type Config = z.infer<typeof configSchema>;
export type ServerConfig = z.infer<typeof serverConfigSchema>;

// ---------------------------------------------------------------------------
// Loaders
// ---------------------------------------------------------------------------

/**
 * Load and validate the triage configuration from environment variables.
 *
 * Throws a ZodError with detailed messages if any required variable is
 * missing or any value fails validation.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): Config {
  return configSchema.parse(env);
}

/** Same as {@link loadConfig}, plus the HTTP and cron settings of the run harness. */
export function loadServerConfig(
  env: Record<string, string | undefined> = process.env,
): ServerConfig {
  return serverConfigSchema.parse(env);
}

/** One line per issue, `FIELD: message`, for start-up error output. */
export function formatConfigError(err: unknown): string {
  if (err instanceof z.ZodError) {
    return err.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("\n");
  }
  return err instanceof Error ? err.message : String(err);
}
