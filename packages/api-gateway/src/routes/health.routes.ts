import type { FastifyInstance } from "fastify";
import type { Redis } from "ioredis";

export interface HealthRouteOptions {
  providerIds: string[];
  defaultProvider: string | undefined;
  redis: Redis | null;
}

export async function healthRoutes(fastify: FastifyInstance, opts: HealthRouteOptions): Promise<void> {

  /** GET /health: liveness (always 200 if the process is running) */
  fastify.get("/health", async (_request, reply) => {
    return reply.send({
      status: "ok",
      uptime: Math.floor(process.uptime()),
      ts: new Date().toISOString(),
    });
  });

  /** GET /health/ready: readiness (a provider is configured, Redis is up when used) */
  fastify.get("/health/ready", async (_request, reply) => {
    if (opts.providerIds.length === 0) {
      return reply.code(503).send({ status: "error", reason: "No provider API key configured" });
    }
    if (opts.redis && opts.redis.status !== "ready") {
      return reply.code(503).send({ status: "error", reason: `Redis is ${opts.redis.status}` });
    }
    return reply.send({
      status: "ok",
      providers: opts.providerIds,
      defaultProvider: opts.defaultProvider ?? null,
      cache: opts.redis ? "redis" : "memory",
    });
  });
}
