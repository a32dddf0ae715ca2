/**
 * Read-only views over orchestration state, plus cache invalidation.
 *
 * GET    /v1/templates       → registered templates
 * GET    /v1/ledgers/:scope  → spend ledger for one scope
 * GET    /v1/stats           → coordinator counters
 * DELETE /v1/cache           → { removed } for a fingerprint prefix
 */
import type { FastifyInstance } from "fastify";
import { z } from "zod";
import type { Conduit } from "@conduit/llm-orchestrator";
import type { TemplateRegistry } from "@conduit/templates";
import { envelope, firstIssue } from "../errors.js";

export interface AdminRouteOptions {
  conduit: Conduit;
  registry: TemplateRegistry;
}

const ScopeParamsSchema = z.object({ scope: z.string().min(1) });

// Fingerprint prefix, e.g. "openai:product_search@1.0.0:"
const InvalidateBodySchema = z.object({ prefix: z.string().min(1) });

export async function adminRoutes(fastify: FastifyInstance, opts: AdminRouteOptions): Promise<void> {
  const { conduit, registry } = opts;

  fastify.get("/v1/templates", async (req, reply) => {
    return reply.send({ data: registry.list(), requestId: req.id });
  });

  fastify.get("/v1/ledgers/:scope", async (req, reply) => {
    const parsed = ScopeParamsSchema.safeParse(req.params);
    if (!parsed.success) return reply.code(400).send(envelope("BAD_REQUEST", firstIssue(parsed.error), req.id));
    return reply.send({ data: conduit.costTracker.getLedger(parsed.data.scope), requestId: req.id });
  });

  fastify.get("/v1/stats", async (req, reply) => {
    return reply.send({ data: conduit.coordinator.stats(), requestId: req.id });
  });

  fastify.delete("/v1/cache", async (req, reply) => {
    const parsed = InvalidateBodySchema.safeParse(req.body);
    if (!parsed.success) return reply.code(400).send(envelope("BAD_REQUEST", firstIssue(parsed.error), req.id));
    const removed = await conduit.coordinator.invalidatePrefix(parsed.data.prefix);
    req.log.info({ prefix: parsed.data.prefix, removed }, "cache invalidated");
    return reply.send({ data: { removed }, requestId: req.id });
  });
}
