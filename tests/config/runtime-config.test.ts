import { describe, expect, it } from "vitest";
import { createNodeEnvReader } from "../../packages/core/src/config/env.ts";
import { loadRuntimeConfig } from "../../packages/core/src/config/runtime-config.ts";
import { ConfigError } from "../../packages/core/src/errors.ts";

const REQUIRED_ENV = {
  WHATSAPP_ACCESS_TOKEN: "test-token",
  WHATSAPP_PHONE_NUMBER_ID: "1234567890",
  WHATSAPP_VERIFY_TOKEN: "test-verify-token",
  OPERATOR_API_TOKEN: "test-operator-token",
};

function configFrom(env: Record<string, string | undefined>) {
  return loadRuntimeConfig(createNodeEnvReader(env));
}

describe("loadRuntimeConfig", () => {
  it("applies defaults for everything optional", () => {
    expect(configFrom(REQUIRED_ENV)).toEqual({
      port: 8080,
      redisUrl: null,
      session: {
        ttlSeconds: 86_400,
        resumePromptMs: 1_800_000,
        sensitiveConfirmMs: 600_000,
        maxStackDepth: 10,
      },
      whatsapp: {
        accessToken: "test-token",
        phoneNumberId: "1234567890",
        graphApiVersion: "v20.0",
        verifyToken: "test-verify-token",
        appSecret: null,
      },
      outbound: {
        concurrency: 2,
        maxAttempts: 3,
        backoffBaseMs: 1_000,
        backoffMaxMs: 60_000,
        perRecipientPerMinute: 30,
        perRecipientPerDay: 1_000,
        globalPerSecond: 4,
        queueCapacity: 10_000,
        deadLetterRetentionMs: 2_592_000_000,
      },
      supabase: null,
      operatorApiToken: "test-operator-token",
      domainServicesBaseUrl: null,
      domainServicesApiToken: null,
      sentry: { dsn: null, environment: null, release: null },
    });
  });

  it("converts minute and day settings to milliseconds", () => {
    const config = configFrom({
      ...REQUIRED_ENV,
      SESSION_RESUME_PROMPT_MINUTES: "5",
      SESSION_SENSITIVE_CONFIRM_MINUTES: "2",
      DEAD_LETTER_RETENTION_DAYS: "7",
    });

    expect(config.session.resumePromptMs).toBe(300_000);
    expect(config.session.sensitiveConfirmMs).toBe(120_000);
    expect(config.outbound.deadLetterRetentionMs).toBe(604_800_000);
  });

  it("enables Supabase only when both settings are present", () => {
    expect(configFrom({ ...REQUIRED_ENV, SUPABASE_URL: "https://project.supabase.test" }).supabase).toBeNull();
    expect(
      configFrom({
        ...REQUIRED_ENV,
        SUPABASE_URL: "https://project.supabase.test",
        SUPABASE_SERVICE_ROLE_KEY: "test-secret",
      }).supabase,
    ).toEqual({ url: "https://project.supabase.test", serviceRoleKey: "test-secret" });
  });

  it("falls back to APP_ENV for the Sentry environment", () => {
    expect(configFrom({ ...REQUIRED_ENV, APP_ENV: "staging" }).sentry.environment).toBe("staging");
    expect(configFrom({ ...REQUIRED_ENV, APP_ENV: "staging", SENTRY_ENVIRONMENT: "production" }).sentry.environment)
      .toBe("production");
  });

  it("fails on a missing required setting", () => {
    const { WHATSAPP_VERIFY_TOKEN: _omitted, ...env } = REQUIRED_ENV;

    expect(() => configFrom(env)).toThrow(new ConfigError("Missing required env var: WHATSAPP_VERIFY_TOKEN"));
  });

  it("rejects limits that are not positive integers", () => {
    expect(() => configFrom({ ...REQUIRED_ENV, OUTBOUND_GLOBAL_PER_SECOND: "0" })).toThrow(
      "OUTBOUND_GLOBAL_PER_SECOND must be a positive integer (received '0').",
    );
    expect(() => configFrom({ ...REQUIRED_ENV, OUTBOUND_QUEUE_CAPACITY: "1e4" })).toThrow(
      "OUTBOUND_QUEUE_CAPACITY must be a positive integer (received '1e4').",
    );
  });
});

describe("createNodeEnvReader", () => {
  it("trims values and treats blanks as unset", () => {
    const getEnv = createNodeEnvReader({ A: "  value ", B: "   " });

    expect(getEnv("A")).toBe("value");
    expect(getEnv("B")).toBeUndefined();
    expect(getEnv("C")).toBeUndefined();
  });
});
