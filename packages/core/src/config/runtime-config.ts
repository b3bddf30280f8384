import {
  readOptionalEnv,
  readPositiveIntegerEnv,
  requireEnv,
  type EnvReader,
} from "./env.ts";

const MINUTE_MS = 60_000;
const DAY_MS = 86_400_000;

export type RuntimeConfig = {
  port: number;
  redisUrl: string | null;
  session: {
    ttlSeconds: number;
    resumePromptMs: number;
    sensitiveConfirmMs: number;
    maxStackDepth: number;
  };
  whatsapp: {
    accessToken: string;
    phoneNumberId: string;
    graphApiVersion: string;
    verifyToken: string;
    appSecret: string | null;
  };
  outbound: {
    concurrency: number;
    maxAttempts: number;
    backoffBaseMs: number;
    backoffMaxMs: number;
    perRecipientPerMinute: number;
    perRecipientPerDay: number;
    globalPerSecond: number;
    queueCapacity: number;
    deadLetterRetentionMs: number;
  };
  supabase: { url: string; serviceRoleKey: string } | null;
  operatorApiToken: string;
  domainServicesBaseUrl: string | null;
  domainServicesApiToken: string | null;
  sentry: {
    dsn: string | null;
    environment: string | null;
    release: string | null;
  };
};

/** Reads and validates every setting up front; a bad value fails startup, not a request. */
export function loadRuntimeConfig(getEnv: EnvReader): RuntimeConfig {
  const supabaseUrl = readOptionalEnv(getEnv, "SUPABASE_URL");
  const supabaseKey = readOptionalEnv(getEnv, "SUPABASE_SERVICE_ROLE_KEY");

  return {
    port: readPositiveIntegerEnv(getEnv, "PORT", 8080),
    redisUrl: readOptionalEnv(getEnv, "REDIS_URL"),
    session: {
      ttlSeconds: readPositiveIntegerEnv(getEnv, "SESSION_TTL_SECONDS", 86_400),
      resumePromptMs: readPositiveIntegerEnv(getEnv, "SESSION_RESUME_PROMPT_MINUTES", 30) * MINUTE_MS,
      sensitiveConfirmMs: readPositiveIntegerEnv(getEnv, "SESSION_SENSITIVE_CONFIRM_MINUTES", 10) * MINUTE_MS,
      maxStackDepth: readPositiveIntegerEnv(getEnv, "SESSION_STACK_MAX_DEPTH", 10),
    },
    whatsapp: {
      accessToken: requireEnv(getEnv, "WHATSAPP_ACCESS_TOKEN"),
      phoneNumberId: requireEnv(getEnv, "WHATSAPP_PHONE_NUMBER_ID"),
      graphApiVersion: readOptionalEnv(getEnv, "WHATSAPP_GRAPH_API_VERSION") ?? "v20.0",
      verifyToken: requireEnv(getEnv, "WHATSAPP_VERIFY_TOKEN"),
      appSecret: readOptionalEnv(getEnv, "WHATSAPP_APP_SECRET"),
    },
    outbound: {
      concurrency: readPositiveIntegerEnv(getEnv, "OUTBOUND_WORKER_CONCURRENCY", 2),
      maxAttempts: readPositiveIntegerEnv(getEnv, "OUTBOUND_MAX_ATTEMPTS", 3),
      backoffBaseMs: readPositiveIntegerEnv(getEnv, "OUTBOUND_BACKOFF_BASE_MS", 1_000),
      backoffMaxMs: readPositiveIntegerEnv(getEnv, "OUTBOUND_BACKOFF_MAX_MS", 60_000),
      perRecipientPerMinute: readPositiveIntegerEnv(getEnv, "OUTBOUND_PER_RECIPIENT_PER_MINUTE", 30),
      perRecipientPerDay: readPositiveIntegerEnv(getEnv, "OUTBOUND_PER_RECIPIENT_PER_DAY", 1_000),
      globalPerSecond: readPositiveIntegerEnv(getEnv, "OUTBOUND_GLOBAL_PER_SECOND", 4),
      queueCapacity: readPositiveIntegerEnv(getEnv, "OUTBOUND_QUEUE_CAPACITY", 10_000),
      deadLetterRetentionMs: readPositiveIntegerEnv(getEnv, "DEAD_LETTER_RETENTION_DAYS", 30) * DAY_MS,
    },
    supabase: supabaseUrl && supabaseKey ? { url: supabaseUrl, serviceRoleKey: supabaseKey } : null,
    operatorApiToken: requireEnv(getEnv, "OPERATOR_API_TOKEN"),
    domainServicesBaseUrl: readOptionalEnv(getEnv, "DOMAIN_SERVICES_BASE_URL"),
    domainServicesApiToken: readOptionalEnv(getEnv, "DOMAIN_SERVICES_API_TOKEN"),
    sentry: {
      dsn: readOptionalEnv(getEnv, "SENTRY_DSN"),
      environment: readOptionalEnv(getEnv, "SENTRY_ENVIRONMENT") ?? readOptionalEnv(getEnv, "APP_ENV"),
      release: readOptionalEnv(getEnv, "SENTRY_RELEASE"),
    },
  };
}
