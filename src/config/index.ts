import { z } from "zod";

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(4000),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional(),
  DB_URL: optionalString,
  JWT_SECRET: optionalString,
  CORS_ALLOW_ORIGINS: z.string().default("http://localhost:3000"),

  METRICS_CACHE_TTL_MS: z.coerce.number().int().positive().default(5 * 60 * 1000),
  METRICS_CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(64),
  METRICS_GEO_PRECISION: z.coerce.number().int().min(0).max(6).default(2),
  METRICS_TOP_ZONES: z.coerce.number().int().positive().default(3),

  DISPATCH_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
  DISPATCH_BASE_DELAY_MS: z.coerce.number().int().min(0).default(500),
  DISPATCH_MAX_DELAY_MS: z.coerce.number().int().min(0).default(8000),
  DISPATCH_QUEUE_CAPACITY: z.coerce.number().int().positive().default(1000),
  DISPATCH_CONCURRENCY: z.coerce.number().int().positive().default(4),
  DELIVERY_RETRY_CRON: z.string().default("*/5 * * * *"),
  DELIVERY_RETRY_MAX_ROUNDS: z.coerce.number().int().positive().default(3),

  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.string().default("gpt-4o-mini"),
  AI_TIMEOUT_MS: z.coerce.number().int().positive().default(8000),
  AI_MAX_NARRATIVE_CHARS: z.coerce.number().int().positive().default(1200),

  FIREBASE_SERVICE_ACCOUNT_JSON: optionalString,
  SMTP_URL: optionalString,
  EMAIL_FROM: optionalString,
  TWILIO_ACCOUNT_SID: optionalString,
  TWILIO_AUTH_TOKEN: optionalString,
  TWILIO_FROM_NUMBER: optionalString,
  SENTRY_DSN: optionalString,
});

export type Env = z.infer<typeof EnvSchema>;

export interface AppConfig {
  env: Env["NODE_ENV"];
  port: number;
  logLevel: NonNullable<Env["LOG_LEVEL"]>;
  dbUrl?: string;
  jwtSecret: string;
  corsOrigins: string[];
  sentryDsn?: string;
  metrics: {
    cacheTtlMs: number;
    cacheMaxEntries: number;
    geoPrecision: number;
    topZones: number;
  };
  dispatch: {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    queueCapacity: number;
    concurrency: number;
    retrySchedule: string;
    maxRetryRounds: number;
  };
  ai: {
    apiKey?: string;
    model: string;
    timeoutMs: number;
    maxNarrativeChars: number;
  };
  channels: {
    firebaseServiceAccountJson?: string;
    smtpUrl?: string;
    emailFrom?: string;
    twilio?: { accountSid: string; authToken: string; fromNumber: string };
  };
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const fields = Object.keys(parsed.error.flatten().fieldErrors).join(", ");
    throw new ConfigError(`Invalid environment: ${fields}`);
  }
  const env = parsed.data;

  if (env.NODE_ENV === "production" && !env.JWT_SECRET) {
    throw new ConfigError("JWT_SECRET is required in production");
  }

  const twilio =
    env.TWILIO_ACCOUNT_SID && env.TWILIO_AUTH_TOKEN && env.TWILIO_FROM_NUMBER
      ? { accountSid: env.TWILIO_ACCOUNT_SID, authToken: env.TWILIO_AUTH_TOKEN, fromNumber: env.TWILIO_FROM_NUMBER }
      : undefined;

  return {
    env: env.NODE_ENV,
    port: env.PORT,
    logLevel: env.LOG_LEVEL ?? (env.NODE_ENV === "test" ? "silent" : "info"),
    dbUrl: env.DB_URL,
    jwtSecret: env.JWT_SECRET ?? "dev-secret",
    corsOrigins: env.CORS_ALLOW_ORIGINS.split(",")
      .map((s) => s.trim())
      .filter(Boolean),
    sentryDsn: env.SENTRY_DSN,
    metrics: {
      cacheTtlMs: env.METRICS_CACHE_TTL_MS,
      cacheMaxEntries: env.METRICS_CACHE_MAX_ENTRIES,
      geoPrecision: env.METRICS_GEO_PRECISION,
      topZones: env.METRICS_TOP_ZONES,
    },
    dispatch: {
      maxAttempts: env.DISPATCH_MAX_ATTEMPTS,
      baseDelayMs: env.DISPATCH_BASE_DELAY_MS,
      maxDelayMs: env.DISPATCH_MAX_DELAY_MS,
      queueCapacity: env.DISPATCH_QUEUE_CAPACITY,
      concurrency: env.DISPATCH_CONCURRENCY,
      retrySchedule: env.DELIVERY_RETRY_CRON,
      maxRetryRounds: env.DELIVERY_RETRY_MAX_ROUNDS,
    },
    ai: {
      apiKey: env.OPENAI_API_KEY,
      model: env.OPENAI_MODEL,
      timeoutMs: env.AI_TIMEOUT_MS,
      maxNarrativeChars: env.AI_MAX_NARRATIVE_CHARS,
    },
    channels: {
      firebaseServiceAccountJson: env.FIREBASE_SERVICE_ACCOUNT_JSON,
      smtpUrl: env.SMTP_URL,
      emailFrom: env.EMAIL_FROM,
      twilio,
    },
  };
}
