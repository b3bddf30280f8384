import { Redis } from "ioredis";
import type { EnvReader } from "../packages/core/src/config/env.ts";
import type { RuntimeConfig } from "../packages/core/src/config/runtime-config.ts";
import { ConversationEngine } from "../packages/core/src/conversation/conversation-engine.ts";
import { createDefaultHandlerChain } from "../packages/core/src/conversation/handlers/registry.ts";
import { createHttpDomainServices } from "../packages/core/src/facades/http-domain-services.ts";
import type { DomainServices } from "../packages/core/src/facades/types.ts";
import { createUnconfiguredDomainServices } from "../packages/core/src/facades/unconfigured-domain-services.ts";
import {
  createSessionStoreClient,
  RedisSessionRepository,
} from "../packages/core/src/session/redis-session-repository.ts";
import {
  InMemorySessionRepository,
  type SessionRepository,
} from "../packages/core/src/session/session-repository.ts";
import {
  createDeadLetterTableClient,
  createServiceRoleDbClient,
  SupabaseDeadLetterStore,
} from "../packages/db/src/index.ts";
import { createWhatsAppClient } from "../packages/messaging/src/client.ts";
import { createWhatsAppGateway, type MessagingGateway } from "../packages/messaging/src/gateway.ts";
import {
  InMemoryDeadLetterStore,
  type DeadLetterStore,
} from "../packages/messaging/src/outbound/dead-letter-store.ts";
import { DeliveryPipeline, type Clock } from "../packages/messaging/src/outbound/delivery-pipeline.ts";
import { RateLimitCoordinator } from "../packages/messaging/src/outbound/rate-limit-coordinator.ts";
import type { FetchHandler } from "./_shared/http.ts";
import { createAppHandler } from "./app.ts";
import { createHealthHandler } from "./health/index.ts";
import { createOutboundOperatorHandler } from "./outbound-operator/index.ts";
import { createWhatsAppWebhookHandler } from "./whatsapp-webhook/index.ts";

export type RuntimeOverrides = {
  repository?: SessionRepository;
  gateway?: MessagingGateway;
  deadLetters?: DeadLetterStore;
  services?: DomainServices;
  clock?: Clock;
};

export type Runtime = {
  handler: FetchHandler;
  engine: ConversationEngine;
  pipeline: DeliveryPipeline;
  close(): Promise<void>;
};

/** Wires every component from config. Nothing starts until the caller calls `pipeline.start()`. */
export function buildRuntime(input: {
  config: RuntimeConfig;
  getEnv: EnvReader;
  overrides?: RuntimeOverrides;
}): Runtime {
  const { config, getEnv, overrides = {} } = input;
  let redis: Redis | null = null;

  let repository = overrides.repository;
  if (!repository) {
    if (config.redisUrl) {
      redis = new Redis(config.redisUrl, { maxRetriesPerRequest: 2 });
      repository = new RedisSessionRepository(createSessionStoreClient(redis), {
        ttlSeconds: config.session.ttlSeconds,
        maxStackDepth: config.session.maxStackDepth,
      });
    } else {
      repository = new InMemorySessionRepository({ ttlMs: config.session.ttlSeconds * 1000 });
    }
  }

  const gateway = overrides.gateway ?? createWhatsAppGateway(
    createWhatsAppClient({
      accessToken: config.whatsapp.accessToken,
      phoneNumberId: config.whatsapp.phoneNumberId,
      graphApiVersion: config.whatsapp.graphApiVersion,
    }),
  );

  const deadLetters = overrides.deadLetters ?? (config.supabase
    ? new SupabaseDeadLetterStore(createDeadLetterTableClient(createServiceRoleDbClient({ getEnv })))
    : new InMemoryDeadLetterStore());

  const pipeline = new DeliveryPipeline({
    gateway,
    deadLetters,
    clock: overrides.clock,
    rateLimiter: new RateLimitCoordinator({
      perRecipientPerMinute: config.outbound.perRecipientPerMinute,
      perRecipientPerDay: config.outbound.perRecipientPerDay,
      globalPerSecond: config.outbound.globalPerSecond,
    }),
    concurrency: config.outbound.concurrency,
    queueCapacity: config.outbound.queueCapacity,
    retry: {
      maxAttempts: config.outbound.maxAttempts,
      baseDelayMs: config.outbound.backoffBaseMs,
      maxDelayMs: config.outbound.backoffMaxMs,
    },
    deadLetterRetentionMs: config.outbound.deadLetterRetentionMs,
  });

  const services = overrides.services ?? (config.domainServicesBaseUrl
    ? createHttpDomainServices({
      baseUrl: config.domainServicesBaseUrl,
      apiToken: config.domainServicesApiToken,
    })
    : createUnconfiguredDomainServices());

  const engine = new ConversationEngine({
    repository,
    outbound: pipeline,
    services,
    handlers: createDefaultHandlerChain({
      resumePromptMs: config.session.resumePromptMs,
      sensitiveConfirmMs: config.session.sensitiveConfirmMs,
    }),
    maxStackDepth: config.session.maxStackDepth,
  });

  const handler = createAppHandler({
    webhook: createWhatsAppWebhookHandler({
      engine,
      verifyToken: config.whatsapp.verifyToken,
      appSecret: config.whatsapp.appSecret,
    }),
    operator: createOutboundOperatorHandler({ pipeline, apiToken: config.operatorApiToken }),
    health: createHealthHandler({ pipeline }),
  });

  return {
    handler,
    engine,
    pipeline,
    close: async () => {
      await pipeline.stop();
      if (redis) {
        await redis.quit();
      }
    },
  };
}
