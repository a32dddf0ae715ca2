/**
 * @conduit/llm-orchestrator: Public API surface
 */
export { RequestCoordinator } from "./coordinator.js";
export type { CoordinatorOptions, CoordinatorStats } from "./coordinator.js";
export { createConduit } from "./factory.js";
export type { Conduit, ConduitConfig } from "./factory.js";
export { fingerprint, fingerprintPrefix, canonicalize, canonicalJson } from "./fingerprint.js";
export type { FingerprintId, CanonicalValue } from "./fingerprint.js";
export { CacheStore, MemoryCache, RedisCache } from "./cache.js";
export type { CacheBackend, CacheEntry, CacheStoreOptions, MemoryCacheOptions, RedisClientLike } from "./cache.js";
export { RateLimiter, DEFAULT_BUCKET } from "./rate-limiter.js";
export type { AcquireOptions, BucketConfig, BucketSnapshot, RateLimiterOptions } from "./rate-limiter.js";
export { CostTracker } from "./cost-tracker.js";
export type { BudgetConfig, CostTrackerOptions, LedgerSnapshot } from "./cost-tracker.js";
export { RetryOrchestrator, classifyFailure, DEFAULT_RETRY_POLICY } from "./retry.js";
export type { FailureClass, RetryPolicy, RetryState, RetryOrchestratorOptions, RunOptions } from "./retry.js";
export { systemClock, sleep, raceAbort } from "./clock.js";
export type { Clock, Cancel } from "./clock.js";
export { createLogger } from "./logger.js";
export type { Logger, LoggerOptions } from "./logger.js";
export {
  OrchestratorError, TemplateError, InvalidRequestError, FingerprintError, ProviderError,
  BudgetExceededError, RateLimitTimeoutError, RepairFailedError, TimeoutError, CancelledError,
  MalformedResponseError, toOrchestratorError, abortReason,
} from "./errors.js";
export type { ErrorKind, ProviderFailureKind } from "./errors.js";
export type {
  Action, ChatMessage, CoordinatorState, ExecuteOptions, ExecuteOutcome, ModelParameters,
  ProviderAdapter, ProviderPayload, ProviderResult, RenderedRequest, RequestPolicy,
  ResponseSchema, SchemaResult, TemplateEngine, TokenUsage, ValidatedResponse,
} from "./types.js";
