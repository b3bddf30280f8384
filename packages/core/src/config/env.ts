import { ConfigError } from "../errors.ts";

export type EnvReader = (name: string) => string | undefined;

export function createNodeEnvReader(
  env: Record<string, string | undefined> = process.env,
): EnvReader {
  return (name) => normalizeOptionalString(env[name]) ?? undefined;
}

export function requireEnv(getEnv: EnvReader, name: string): string {
  const value = normalizeOptionalString(getEnv(name));
  if (!value) {
    throw new ConfigError(`Missing required env var: ${name}`);
  }
  return value;
}

export function readOptionalEnv(getEnv: EnvReader, name: string): string | null {
  return normalizeOptionalString(getEnv(name));
}

export function readPositiveIntegerEnv(
  getEnv: EnvReader,
  name: string,
  fallback: number,
): number {
  const raw = readOptionalEnv(getEnv, name);
  if (raw === null) {
    return fallback;
  }
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(`${name} must be a positive integer (received '${raw}').`);
  }
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`${name} must be a positive integer (received '${raw}').`);
  }
  return parsed;
}

export function normalizeOptionalString(value: string | null | undefined): string | null {
  if (typeof value !== "string") {
    return null;
  }
  const normalized = value.trim();
  return normalized.length > 0 ? normalized : null;
}
