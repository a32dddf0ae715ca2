/**
 * Wires a coordinator and its state objects from plain configuration.
 * Each call builds fresh state; nothing here is process-global.
 */
import { CacheStore, MemoryCache } from "./cache.js";
import type { CacheBackend } from "./cache.js";
import { systemClock } from "./clock.js";
import type { Clock } from "./clock.js";
import { RequestCoordinator } from "./coordinator.js";
import type { CoordinatorOptions } from "./coordinator.js";
import { CostTracker } from "./cost-tracker.js";
import type { BudgetConfig } from "./cost-tracker.js";
import { createLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { RateLimiter } from "./rate-limiter.js";
import type { BucketConfig } from "./rate-limiter.js";
import { RetryOrchestrator } from "./retry.js";
import type { RetryPolicy } from "./retry.js";
import type { ProviderAdapter, TemplateEngine } from "./types.js";

export interface ConduitConfig {
  templates: TemplateEngine;
  providers: ProviderAdapter[];
  defaultProvider?: string;
  cache?: {
    /** Remote backend; an in-process MemoryCache otherwise */
    backend?: CacheBackend;
    maxEntries?: number;
    sweepIntervalMs?: number;
    keyPrefix?: string;
  };
  rateLimits?: {
    providers?: Record<string, BucketConfig>;
    defaults?: BucketConfig;
    admissionTimeoutMs?: number;
  };
  budgets?: {
    scopes?: Record<string, BudgetConfig>;
    defaults?: BudgetConfig;
  };
  retry?: Partial<RetryPolicy>;
  clock?: Clock;
  logger?: Logger;
  onTransition?: CoordinatorOptions["onTransition"];
}

export interface Conduit {
  coordinator: RequestCoordinator;
  cache: CacheStore;
  rateLimiter: RateLimiter;
  costTracker: CostTracker;
  retry: RetryOrchestrator;
}

export function createConduit(config: ConduitConfig): Conduit {
  const clock = config.clock ?? systemClock;
  const logger = config.logger ?? createLogger();

  const backend = config.cache?.backend ?? new MemoryCache({
    clock,
    ...(config.cache?.maxEntries !== undefined ? { maxEntries: config.cache.maxEntries } : {}),
    ...(config.cache?.sweepIntervalMs !== undefined ? { sweepIntervalMs: config.cache.sweepIntervalMs } : {}),
  });
  const cache = new CacheStore(backend, {
    clock,
    ...(config.cache?.keyPrefix !== undefined ? { keyPrefix: config.cache.keyPrefix } : {}),
  });
  const rateLimiter = new RateLimiter({
    clock,
    ...(config.rateLimits?.providers ? { providers: config.rateLimits.providers } : {}),
    ...(config.rateLimits?.defaults ? { defaults: config.rateLimits.defaults } : {}),
  });
  const costTracker = new CostTracker({
    clock,
    ...(config.budgets?.scopes ? { scopes: config.budgets.scopes } : {}),
    ...(config.budgets?.defaults ? { defaults: config.budgets.defaults } : {}),
  });
  const retry = new RetryOrchestrator({
    clock,
    logger,
    ...(config.retry ? { policy: config.retry } : {}),
  });

  const coordinator = new RequestCoordinator({
    templates: config.templates,
    providers: config.providers,
    cache,
    rateLimiter,
    costTracker,
    retry,
    clock,
    logger,
    ...(config.defaultProvider !== undefined ? { defaultProvider: config.defaultProvider } : {}),
    ...(config.rateLimits?.admissionTimeoutMs !== undefined
      ? { admissionTimeoutMs: config.rateLimits.admissionTimeoutMs }
      : {}),
    ...(config.onTransition ? { onTransition: config.onTransition } : {}),
  });

  return { coordinator, cache, rateLimiter, costTracker, retry };
}
