/**
 * Routes through fastify.inject with stub providers: no sockets, no network.
 */
import { describe, it, afterEach } from "node:test";
import assert from "node:assert/strict";
import { z } from "zod";
import { ProviderError } from "@conduit/llm-orchestrator";
import type {
  LedgerSnapshot, ModelParameters, ProviderAdapter, ProviderPayload, ProviderResult, ValidatedResponse,
} from "@conduit/llm-orchestrator";
import { TemplateRegistry, defineTemplate } from "@conduit/templates";
import type { TemplateInfo } from "@conduit/templates";
import { buildApp } from "../app.js";
import { loadConfig } from "../config/index.js";

interface Envelope<T> {
  data: T;
  requestId: string;
  errors?: Array<{ code: string; message: string }>;
}

class StubProvider implements ProviderAdapter {
  calls = 0;

  constructor(readonly id: string, private readonly respond: () => ProviderResult) {}

  async send(_payload: ProviderPayload, _params: ModelParameters): Promise<ProviderResult> {
    this.calls++;
    return this.respond();
  }
}

const answer = defineTemplate({
  name: "answer",
  version: "1.0.0",
  input: z.object({ question: z.string() }),
  output: z.object({ answer: z.string() }),
  prompt: (input) => `Answer briefly: ${input.question}`,
  maxRetries: 0,
  estimatedCost: 1,
});

const BODY = { template: "answer", input: { question: "meaning of life" }, scope: "team-a" };

type App = Awaited<ReturnType<typeof buildApp>>;
const apps: App[] = [];

async function setup(provider: ProviderAdapter | null, env: Record<string, string> = {}): Promise<App> {
  const config = loadConfig({
    NODE_ENV: "test",
    LOG_LEVEL: "silent",
    RETRY_BASE_DELAY_MS: "1",
    RETRY_MAX_DELAY_MS: "2",
    RETRY_JITTER_RATIO: "0",
    ...env,
  });
  const app = await buildApp({
    config,
    registry: new TemplateRegistry([answer]),
    providers: provider ? [provider] : [],
  });
  apps.push(app);
  return app;
}

function ok42(): ProviderResult {
  return { raw: '{"answer":"42"}', cost: 0.25 };
}

afterEach(async () => {
  for (const app of apps.splice(0)) await app.close();
});

describe("POST /v1/execute", () => {
  it("returns the validated response and serves repeats from cache", async () => {
    const provider = new StubProvider("stub", ok42);
    const app = await setup(provider);

    const first = await app.inject({ method: "POST", url: "/v1/execute", payload: BODY });
    assert.equal(first.statusCode, 200);
    const body = first.json<Envelope<ValidatedResponse>>();
    assert.deepEqual(body.data.data, { answer: "42" });
    assert.equal(body.data.providerId, "stub");
    assert.equal(body.data.fromCache, false);
    assert.equal(body.data.cost, 0.25);
    assert.equal(typeof body.requestId, "string");

    const second = await app.inject({ method: "POST", url: "/v1/execute", payload: BODY });
    const cached = second.json<Envelope<ValidatedResponse>>();
    assert.equal(cached.data.fromCache, true);
    assert.equal(cached.data.fingerprint, body.data.fingerprint);
    assert.equal(provider.calls, 1);
  });

  it("echoes the caller's request id", async () => {
    const app = await setup(new StubProvider("stub", ok42));
    const res = await app.inject({
      method: "POST", url: "/v1/execute", payload: BODY, headers: { "x-request-id": "req-1" },
    });
    assert.equal(res.json<Envelope<ValidatedResponse>>().requestId, "req-1");
  });

  it("rejects a malformed body", async () => {
    const app = await setup(new StubProvider("stub", ok42));
    const res = await app.inject({
      method: "POST", url: "/v1/execute", payload: { template: "answer", input: {} },
    });
    assert.equal(res.statusCode, 400);
    assert.deepEqual(res.json<Envelope<null>>().errors, [{ code: "BAD_REQUEST", message: "scope: Required" }]);
  });

  it("maps an unknown template to 400", async () => {
    const app = await setup(new StubProvider("stub", ok42));
    const res = await app.inject({ method: "POST", url: "/v1/execute", payload: { ...BODY, template: "nope" } });
    assert.equal(res.statusCode, 400);
    assert.deepEqual(res.json<Envelope<null>>().errors, [{ code: "TEMPLATE", message: "Template not found: nope" }]);
  });

  it("refuses a scope whose budget cannot cover the estimate", async () => {
    const provider = new StubProvider("stub", ok42);
    const app = await setup(provider, { BUDGET_LIMIT: "0.5" });
    const res = await app.inject({ method: "POST", url: "/v1/execute", payload: BODY });

    assert.equal(res.statusCode, 402);
    assert.deepEqual(res.json<Envelope<null>>().errors, [{
      code: "BUDGET_EXCEEDED",
      message: 'Budget exceeded for scope "team-a": spent 0 + estimated 1 > limit 0.5',
    }]);
    assert.equal(provider.calls, 0);
  });

  it("masks fatal provider errors as 502", async () => {
    const app = await setup(new StubProvider("stub", () => {
      throw new ProviderError("fatal", "stub API error 401: Invalid API key", { status: 401 });
    }));
    const res = await app.inject({ method: "POST", url: "/v1/execute", payload: BODY });

    assert.equal(res.statusCode, 502);
    assert.deepEqual(res.json<Envelope<null>>().errors, [{
      code: "PROVIDER_FATAL",
      message: "The provider rejected the request.",
    }]);
  });

  it("passes a provider's retry hint through as Retry-After", async () => {
    const app = await setup(new StubProvider("stub", () => {
      throw new ProviderError("rate_limited", "stub API error 429: slow down", { status: 429, retryAfterMs: 1_500 });
    }));
    const res = await app.inject({ method: "POST", url: "/v1/execute", payload: BODY });

    assert.equal(res.statusCode, 429);
    assert.equal(res.headers["retry-after"], "2");
    assert.equal(res.json<Envelope<null>>().errors?.[0]?.code, "PROVIDER_RATE_LIMITED");
  });

  it("reports responses that never validate as 502", async () => {
    const app = await setup(new StubProvider("stub", () => ({ raw: "no json here", cost: 0.1 })));
    const res = await app.inject({ method: "POST", url: "/v1/execute", payload: BODY });

    assert.equal(res.statusCode, 502);
    assert.equal(res.json<Envelope<null>>().errors?.[0]?.code, "REPAIR_FAILED");
  });
});

describe("admin routes", () => {
  it("lists registered templates", async () => {
    const app = await setup(new StubProvider("stub", ok42));
    const res = await app.inject({ method: "GET", url: "/v1/templates" });
    const ids = res.json<Envelope<TemplateInfo[]>>().data.map((t) => t.id);
    assert.deepEqual(ids, ["answer@1.0.0"]);
  });

  it("shows the ledger a dispatch committed to", async () => {
    const app = await setup(new StubProvider("stub", ok42));
    await app.inject({ method: "POST", url: "/v1/execute", payload: BODY });

    const res = await app.inject({ method: "GET", url: "/v1/ledgers/team-a" });
    const ledger = res.json<Envelope<LedgerSnapshot>>().data;
    assert.equal(ledger.scopeId, "team-a");
    assert.equal(ledger.spent, 0.25);
    assert.equal(ledger.commits, 1);
    assert.equal(ledger.budgetLimit, null);
    assert.equal(ledger.overBudget, false);
  });

  it("invalidates cached responses by prefix", async () => {
    const provider = new StubProvider("stub", ok42);
    const app = await setup(provider);
    await app.inject({ method: "POST", url: "/v1/execute", payload: BODY });

    const res = await app.inject({ method: "DELETE", url: "/v1/cache", payload: { prefix: "stub:" } });
    assert.deepEqual(res.json<Envelope<{ removed: number }>>().data, { removed: 1 });

    await app.inject({ method: "POST", url: "/v1/execute", payload: BODY });
    assert.equal(provider.calls, 2);
  });

  it("rejects invalidation without a prefix", async () => {
    const app = await setup(new StubProvider("stub", ok42));
    const res = await app.inject({ method: "DELETE", url: "/v1/cache", payload: {} });
    assert.equal(res.statusCode, 400);
    assert.deepEqual(res.json<Envelope<null>>().errors, [{ code: "BAD_REQUEST", message: "prefix: Required" }]);
  });
});

describe("health and fallbacks", () => {
  it("is ready once a provider is configured", async () => {
    const app = await setup(new StubProvider("stub", ok42));
    const res = await app.inject({ method: "GET", url: "/health/ready" });
    assert.equal(res.statusCode, 200);
    assert.deepEqual(res.json<unknown>(), { status: "ok", providers: ["stub"], defaultProvider: "stub", cache: "memory" });
  });

  it("is not ready without providers", async () => {
    const app = await setup(null);
    const res = await app.inject({ method: "GET", url: "/health/ready" });
    assert.equal(res.statusCode, 503);
  });

  it("answers unknown routes with the error envelope", async () => {
    const app = await setup(null);
    const res = await app.inject({ method: "GET", url: "/nope" });
    assert.equal(res.statusCode, 404);
    assert.deepEqual(res.json<Envelope<null>>().errors, [{ code: "NOT_FOUND", message: "GET /nope not found." }]);
  });
});
