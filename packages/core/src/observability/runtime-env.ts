export type RuntimeEnvironment = "local" | "staging" | "production";

export function detectRuntimeEnv(
  env: Record<string, string | undefined> = process.env,
): RuntimeEnvironment {
  for (const name of ["APP_ENV", "SENTRY_ENVIRONMENT", "NODE_ENV"]) {
    const value = env[name]?.trim().toLowerCase();
    if (!value) {
      continue;
    }
    return normalizeRuntimeEnv(value);
  }
  return "local";
}

export function normalizeRuntimeEnv(value: string | null | undefined): RuntimeEnvironment {
  const normalized = (value ?? "").trim().toLowerCase();
  if (normalized === "staging") {
    return "staging";
  }
  if (normalized === "production" || normalized === "prod") {
    return "production";
  }
  return "local";
}
