/**
 * POST /v1/execute: run one action through the request coordinator.
 *
 * Body: { template, version?, input, provider?, scope, options? }
 * 200 → { data: ValidatedResponse, requestId }
 * Failures surface as OrchestratorErrors and are mapped by the app's error
 * handler (status per error kind).
 */
import type { FastifyInstance, FastifyRequest } from "fastify";
import { z } from "zod";
import type { RequestCoordinator } from "@conduit/llm-orchestrator";
import { envelope, firstIssue } from "../errors.js";

export interface ExecuteRouteOptions {
  coordinator: RequestCoordinator;
  /** Deadline applied when the body gives none */
  defaultTimeoutMs: number;
}

const ExecuteBodySchema = z.object({
  template: z.string().min(1),
  version: z.string().min(1).optional(),
  input: z.unknown(),
  provider: z.string().min(1).optional(),
  scope: z.string().min(1),
  options: z.object({
    timeoutMs: z.number().int().positive().optional(),
    bypassCache: z.boolean().optional(),
    forceRefresh: z.boolean().optional(),
  }).strict().optional(),
});

function ok(data: unknown, requestId: string) {
  return { data, requestId };
}

/** Aborts when the client goes away before the response is written */
function disconnectSignal(request: FastifyRequest): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const socket = request.raw.socket;
  const onClose = (): void => {
    if (!controller.signal.aborted) controller.abort();
  };
  socket.once("close", onClose);
  return { signal: controller.signal, dispose: () => socket.off("close", onClose) };
}

export async function executeRoutes(fastify: FastifyInstance, opts: ExecuteRouteOptions): Promise<void> {
  const { coordinator, defaultTimeoutMs } = opts;

  fastify.post("/v1/execute", async (req, reply) => {
    const parsed = ExecuteBodySchema.safeParse(req.body);
    if (!parsed.success) return reply.code(400).send(envelope("BAD_REQUEST", firstIssue(parsed.error), req.id));
    const { template, version, input, provider, scope, options } = parsed.data;

    const client = disconnectSignal(req);
    try {
      const outcome = await coordinator.execute(
        {
          template,
          input,
          ...(version !== undefined ? { version } : {}),
          ...(provider !== undefined ? { provider } : {}),
        },
        scope,
        {
          timeoutMs: options?.timeoutMs ?? defaultTimeoutMs,
          signal: client.signal,
          ...(options?.bypassCache !== undefined ? { bypassCache: options.bypassCache } : {}),
          ...(options?.forceRefresh !== undefined ? { forceRefresh: options.forceRefresh } : {}),
        }
      );
      if (!outcome.ok) throw outcome.error;
      return reply.send(ok(outcome.response, req.id));
    } finally {
      client.dispose();
    }
  });
}
