import { z } from "zod";

export class ConfigError extends Error {
  public readonly issues: string[];
  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() !== "" ? v : undefined));

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().positive().default(5000),
  DATABASE_URL: optionalString,
  SCHEDULER_ENABLED: booleanFlag.default("true"),
  SCHEDULER_TIMEZONE: z
    .string()
    .default("Europe/Paris")
    .refine(isValidTimeZone, { message: "unknown IANA time zone" }),
  SCHEDULER_POLL_INTERVAL_MS: z.coerce.number().int().min(1000).default(60_000),
  SCHEDULER_MAX_CATCH_UP_HOURS: z.coerce.number().int().min(0).default(72),
  RESEND_API_KEY: optionalString,
  RESEND_FROM_EMAIL: z.string().email().default("agents@example.com"),
  RESEND_FROM_NAME: z.string().default("Agents"),
  SLACK_WEBHOOK_URL: optionalString,
  DRAFTING_PROVIDER: z.enum(["anthropic", "stub"]).optional(),
  ANTHROPIC_API_KEY: optionalString,
  DRAFTING_MODEL: optionalString,
});

export type AppConfig = {
  env: "development" | "production" | "test";
  port: number;
  databaseUrl?: string;
  scheduler: {
    enabled: boolean;
    timezone: string;
    pollIntervalMs: number;
    maxCatchUpHours: number;
  };
  email: {
    resendApiKey?: string;
    fromEmail: string;
    fromName: string;
  };
  slackWebhookUrl?: string;
  drafting: {
    provider: "anthropic" | "stub";
    anthropicApiKey?: string;
    model?: string;
  };
};

function isValidTimeZone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}

/**
 * Parse process environment into a typed config. Throws ConfigError listing
 * every invalid key.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }
  const e = parsed.data;

  if (e.DRAFTING_PROVIDER === "anthropic" && !e.ANTHROPIC_API_KEY) {
    throw new ConfigError(["ANTHROPIC_API_KEY: required when DRAFTING_PROVIDER=anthropic"]);
  }

  return {
    env: e.NODE_ENV,
    port: e.PORT,
    databaseUrl: e.DATABASE_URL,
    scheduler: {
      enabled: e.SCHEDULER_ENABLED,
      timezone: e.SCHEDULER_TIMEZONE,
      pollIntervalMs: e.SCHEDULER_POLL_INTERVAL_MS,
      maxCatchUpHours: e.SCHEDULER_MAX_CATCH_UP_HOURS,
    },
    email: {
      resendApiKey: e.RESEND_API_KEY,
      fromEmail: e.RESEND_FROM_EMAIL,
      fromName: e.RESEND_FROM_NAME,
    },
    slackWebhookUrl: e.SLACK_WEBHOOK_URL,
    drafting: {
      provider: e.DRAFTING_PROVIDER ?? (e.ANTHROPIC_API_KEY ? "anthropic" : "stub"),
      anthropicApiKey: e.ANTHROPIC_API_KEY,
      model: e.DRAFTING_MODEL,
    },
  };
}
