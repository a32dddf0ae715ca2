import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { DEFAULT_RETRY_POLICY } from "@conduit/llm-orchestrator";
import { loadConfig } from "../config/index.js";
import { providersFromConfig } from "../providers.js";

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    const config = loadConfig({});
    assert.equal(config.env, "development");
    assert.equal(config.port, 3001);
    assert.equal(config.host, "0.0.0.0");
    assert.equal(config.logLevel, "info");
    assert.equal(config.redisUrl, "");
    assert.equal(config.rateLimitCapacity, 60);
    assert.equal(config.budgetLimit, undefined);
    assert.equal(config.budgetPeriodMs, undefined);
    assert.deepEqual(config.retry, DEFAULT_RETRY_POLICY);
    assert.equal(config.defaultProvider, "");
  });

  it("coerces numeric variables", () => {
    const config = loadConfig({
      PORT: "8080",
      BUDGET_LIMIT: "12.5",
      BUDGET_PERIOD_MS: "86400000",
      RATE_LIMIT_REFILL_PER_SEC: "0.5",
      RETRY_MAX_ATTEMPTS: "5",
    });
    assert.equal(config.port, 8080);
    assert.equal(config.budgetLimit, 12.5);
    assert.equal(config.budgetPeriodMs, 86_400_000);
    assert.equal(config.rateLimitRefillPerSec, 0.5);
    assert.equal(config.retry.maxAttempts, 5);
  });

  it("treats an empty budget as unlimited", () => {
    assert.equal(loadConfig({ BUDGET_LIMIT: "" }).budgetLimit, undefined);
  });

  it("fails fast on malformed values", () => {
    assert.throws(() => loadConfig({ CACHE_MAX_ENTRIES: "many" }), /Invalid environment variable CACHE_MAX_ENTRIES="many"/);
    assert.throws(() => loadConfig({ RETRY_JITTER_RATIO: "2" }), /RETRY_JITTER_RATIO/);
    assert.throws(() => loadConfig({ NODE_ENV: "prod" }), /NODE_ENV/);
  });
});

describe("providersFromConfig", () => {
  it("builds one adapter per configured key", () => {
    const config = loadConfig({ OPENAI_API_KEY: "test-secret", GROQ_API_KEY: "test-secret" });
    assert.deepEqual(providersFromConfig(config).map((p) => p.id), ["openai", "groq"]);
  });

  it("builds none without keys", () => {
    assert.deepEqual(providersFromConfig(loadConfig({})), []);
  });
});
