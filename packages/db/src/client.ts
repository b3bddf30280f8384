import { createClient, type SupabaseClient, type SupabaseClientOptions } from "@supabase/supabase-js";
import type { EnvReader } from "../../core/src/config/env.ts";
import { DB_ERROR_CODES, DbError, assertRequiredEnv } from "./errors.ts";

export type DbClient = SupabaseClient;

export type DbCreateClientImpl = (
  supabaseUrl: string,
  supabaseKey: string,
  options: SupabaseClientOptions<"public">,
) => DbClient;

export type CreateDbClientParams = {
  getEnv: EnvReader;
  createClientImpl?: DbCreateClientImpl;
  clientOptions?: SupabaseClientOptions<"public">;
};

/** Service-role client for server-side writes. Sessions are never persisted through it. */
export function createServiceRoleDbClient(params: CreateDbClientParams): DbClient {
  const supabaseUrl = assertRequiredEnv("SUPABASE_URL", params.getEnv("SUPABASE_URL"));
  const serviceRoleKey = assertRequiredEnv(
    "SUPABASE_SERVICE_ROLE_KEY",
    params.getEnv("SUPABASE_SERVICE_ROLE_KEY"),
  );

  if (!/^https?:\/\//i.test(supabaseUrl)) {
    throw new DbError(DB_ERROR_CODES.INVALID_ENV, "SUPABASE_URL must be an http(s) URL.", {
      status: 500,
      context: { name: "SUPABASE_URL" },
    });
  }

  const createClientImpl: DbCreateClientImpl = params.createClientImpl ??
    ((url, key, options) => createClient(url, key, options));

  try {
    return createClientImpl(supabaseUrl, serviceRoleKey, {
      ...params.clientOptions,
      auth: {
        persistSession: false,
        autoRefreshToken: false,
        detectSessionInUrl: false,
        ...params.clientOptions?.auth,
      },
    });
  } catch (error) {
    throw DbError.fromUnknown({
      code: DB_ERROR_CODES.CLIENT_INIT_FAILED,
      message: "Unable to create Supabase client.",
      error,
      context: { supabase_url: supabaseUrl },
    });
  }
}
