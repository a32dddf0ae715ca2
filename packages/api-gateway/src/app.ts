import Fastify from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import rateLimit from "@fastify/rate-limit";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";
import type { Redis } from "ioredis";
import { OrchestratorError, RedisCache, createConduit, createLogger } from "@conduit/llm-orchestrator";
import type { Clock, Conduit, ProviderAdapter } from "@conduit/llm-orchestrator";
import { PromptEngine } from "@conduit/templates";
import type { TemplateRegistry } from "@conduit/templates";

import type { Config } from "./config/index.js";
import { cacheClient } from "./db/redis.js";
import { INTERNAL_MESSAGE, envelope, mapOrchestratorError } from "./errors.js";
import { adminRoutes } from "./routes/admin.routes.js";
import { executeRoutes } from "./routes/execute.routes.js";
import { healthRoutes } from "./routes/health.routes.js";

export interface AppDeps {
  config: Config;
  registry: TemplateRegistry;
  providers: ProviderAdapter[];
  /** Connected client; the response cache and ingress throttling stay in memory without one */
  redis?: Redis | null;
  clock?: Clock;
}

export function buildConduit(deps: AppDeps): Conduit {
  const { config, registry, providers } = deps;
  const defaultProvider = config.defaultProvider || providers[0]?.id;

  return createConduit({
    templates: new PromptEngine(registry),
    providers,
    ...(defaultProvider !== undefined ? { defaultProvider } : {}),
    cache: deps.redis
      ? { backend: new RedisCache(cacheClient(deps.redis)) }
      : { maxEntries: config.cacheMaxEntries, sweepIntervalMs: config.cacheSweepIntervalMs },
    rateLimits: {
      defaults: { capacity: config.rateLimitCapacity, refillPerSecond: config.rateLimitRefillPerSec },
      admissionTimeoutMs: config.rateLimitAdmissionTimeoutMs,
    },
    budgets: {
      defaults: {
        ...(config.budgetLimit !== undefined ? { budgetLimit: config.budgetLimit } : {}),
        ...(config.budgetPeriodMs !== undefined ? { periodMs: config.budgetPeriodMs } : {}),
      },
    },
    retry: config.retry,
    logger: createLogger({ level: config.logLevel }),
    ...(deps.clock ? { clock: deps.clock } : {}),
  });
}

export async function buildApp(deps: AppDeps) {
  const { config, registry, providers } = deps;
  const redis = deps.redis ?? null;
  const conduit = buildConduit(deps);

  const fastify = Fastify({
    logger: { level: config.logLevel },
    requestIdHeader: "x-request-id",
    requestIdLogLabel: "requestId",
    trustProxy: true,
    bodyLimit: 1024 * 1024,
    connectionTimeout: config.requestTimeoutMs + 5_000,  // provider calls plus retries can be slow
    keepAliveTimeout: 5_000,
  });

  fastify.addHook("onClose", async () => {
    await conduit.coordinator.close();
  });

  // ─── Plugins ────────────────────────────────────────────────────────────────

  await fastify.register(helmet, {
    contentSecurityPolicy: config.env === "production",
  });

  await fastify.register(cors, {
    origin: (_origin, cb) => cb(null, true),
    methods: ["GET", "POST", "DELETE", "OPTIONS"],
    allowedHeaders: ["Content-Type", "X-Request-ID", "Origin", "Accept"],
    credentials: true,
  });

  // Ingress throttling: Redis if connected, otherwise in-memory
  fastify.log.info(redis ? "Rate limiting: Redis" : "Rate limiting: in-memory (REDIS_URL not set or unreachable)");

  await fastify.register(rateLimit, {
    global: true,
    max: config.rateLimitMax,
    timeWindow: config.rateLimitWindowMs,
    ...(redis ? { redis } : {}),
    keyGenerator: (request) => `ip:${request.ip}`,
    // Thrown by the plugin; the error handler below renders the envelope
    errorResponseBuilder: (_request, context) => ({
      statusCode: 429,
      code: "RATE_LIMITED",
      message: `Too many requests. Retry after ${Math.ceil(context.ttl / 1000)}s.`,
    }),
  });

  // ─── OpenAPI ─────────────────────────────────────────────────────────────────

  await fastify.register(swagger, {
    openapi: {
      info: {
        title: "Conduit API",
        description: "LLM request orchestration: caching, single-flight, rate limits, budgets and retries",
        version: "0.1.0",
      },
    },
  });

  await fastify.register(swaggerUi, { routePrefix: "/docs", uiConfig: { deepLinking: true } });

  // ─── Error handlers ──────────────────────────────────────────────────────────
  // Must precede route registration

  fastify.setErrorHandler((error, request, reply) => {
    if (error instanceof OrchestratorError) {
      const mapped = mapOrchestratorError(error, request.id);
      const level = mapped.statusCode >= 500 ? "error" : "warn";
      fastify.log[level]({ err: error, kind: error.kind, requestId: request.id }, "Request failed");
      if (mapped.retryAfter !== undefined) void reply.header("retry-after", String(mapped.retryAfter));
      void reply.code(mapped.statusCode).send(mapped.body);
      return;
    }

    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      fastify.log.error({ err: error, requestId: request.id }, "Unhandled error");
    }
    void reply.code(statusCode).send(envelope(
      error.code ?? "INTERNAL_ERROR",
      statusCode >= 500 ? INTERNAL_MESSAGE : error.message,
      request.id
    ));
  });

  fastify.setNotFoundHandler((request, reply) => {
    void reply.code(404).send(envelope("NOT_FOUND", `${request.method} ${request.url} not found.`, request.id));
  });

  // ─── Routes ─────────────────────────────────────────────────────────────────

  await fastify.register(healthRoutes, {
    providerIds: providers.map((p) => p.id),
    defaultProvider: config.defaultProvider || providers[0]?.id,
    redis,
  });
  await fastify.register(executeRoutes, {
    coordinator: conduit.coordinator,
    defaultTimeoutMs: config.requestTimeoutMs,
  });
  await fastify.register(adminRoutes, { conduit, registry });

  return fastify;
}
