import { createNodeEnvReader } from "../packages/core/src/config/env.ts";
import { loadRuntimeConfig, type RuntimeConfig } from "../packages/core/src/config/runtime-config.ts";
import { ConfigError, describeError } from "../packages/core/src/errors.ts";
import { logEvent } from "../packages/core/src/observability/logger.ts";
import { initNodeSentry, resolveSentryRuntimeConfig } from "../packages/core/src/observability/sentry-node.ts";
import { serve } from "./_shared/serve.ts";
import { buildRuntime } from "./runtime.ts";

async function main(): Promise<void> {
  const getEnv = createNodeEnvReader(process.env);

  let config: RuntimeConfig;
  try {
    config = loadRuntimeConfig(getEnv);
  } catch (error) {
    if (error instanceof ConfigError) {
      logEvent({
        level: "fatal",
        event: "system.config_error",
        payload: { error_message: error.message },
      });
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  initNodeSentry(resolveSentryRuntimeConfig(config.sentry));

  const runtime = buildRuntime({ config, getEnv });
  runtime.pipeline.start();
  const server = serve(runtime.handler, { port: config.port });

  const shutdown = (): void => {
    server.close();
    runtime.close().catch((error: unknown) => {
      logEvent({
        level: "error",
        event: "system.unhandled_error",
        payload: { phase: "shutdown", ...describeError(error) },
      });
      process.exitCode = 1;
    });
  };
  process.once("SIGTERM", shutdown);
  process.once("SIGINT", shutdown);
}

main().catch((error: unknown) => {
  logEvent({
    level: "fatal",
    event: "system.unhandled_error",
    payload: { phase: "startup", ...describeError(error) },
  });
  process.exitCode = 1;
});
