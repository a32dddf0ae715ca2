import "dotenv/config";
import type { Redis } from "ioredis";
import { createLogger } from "@conduit/llm-orchestrator";
import { TemplateRegistry, productSearch } from "@conduit/templates";
import { loadConfig } from "./config/index.js";
import { closeRedis, connectRedis } from "./db/redis.js";
import { buildApp } from "./app.js";
import { providersFromConfig } from "./providers.js";

async function start() {
  // 1. Load config, fails fast on malformed values
  const config = loadConfig();
  const log = createLogger({ name: "conduit-gateway", level: config.logLevel });

  // 2. Providers and templates
  const providers = providersFromConfig(config);
  if (providers.length === 0) {
    log.warn("No provider API key set (OPENAI_API_KEY, PERPLEXITY_API_KEY, GROQ_API_KEY); /v1/execute will fail");
  }
  const registry = new TemplateRegistry([productSearch]);

  // 3. Optional Redis
  let redis: Redis | null = null;
  if (config.redisUrl) {
    try {
      redis = await connectRedis(config.redisUrl, log);
    } catch (err) {
      log.warn({ err }, "Redis unavailable, using in-memory cache and rate limiting");
    }
  }

  // 4. Start server
  const app = await buildApp({ config, registry, providers, redis });

  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(`Conduit API running on ${config.host}:${config.port} [${config.env}]`);
  } catch (err) {
    app.log.error(err, "Failed to start server");
    process.exit(1);
  }

  // 5. Graceful shutdown
  const shutdown = async (signal: string) => {
    app.log.info(`Received ${signal}, shutting down...`);
    await app.close();
    await closeRedis(redis);
    app.log.info("Shutdown complete.");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("unhandledRejection", (reason) => {
    app.log.error({ reason }, "Unhandled promise rejection");
    void shutdown("unhandledRejection");
  });
}

void start();
