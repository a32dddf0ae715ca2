/**
 * @conduit/llm-orchestrator: Type definitions
 *
 * Collaborator contracts (template engine, provider adapter) and the
 * request/response envelope exposed by the coordinator.
 */
import type { OrchestratorError } from "./errors.js";

// ─── Provider payload ────────────────────────────────────────────────────────

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

/** Provider-ready request body produced by the template engine */
export interface ProviderPayload {
  messages: ChatMessage[];
}

export interface ModelParameters {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  /** Vendor-specific knobs passed through untouched */
  extra?: Record<string, unknown>;
}

// ─── Provider adapter ────────────────────────────────────────────────────────

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface ProviderResult {
  /** Raw text returned by the model */
  raw: string;
  /** Actual cost of this call, as computed by the adapter */
  cost: number;
  usage?: TokenUsage;
}

/**
 * One vendor behind one capability. Failures are thrown as ProviderError
 * (transient, rate_limited or fatal); anything else counts as transient.
 */
export interface ProviderAdapter {
  readonly id: string;
  send(payload: ProviderPayload, params: ModelParameters): Promise<ProviderResult>;
}

// ─── Template engine ─────────────────────────────────────────────────────────

export type SchemaResult<T> =
  | { ok: true; data: T; repaired: boolean }
  | { ok: false; issues: string[] };

/** Validates a raw provider response; may reparse it (fence stripping, JSON extraction) */
export interface ResponseSchema<T = unknown> {
  validate(raw: string): SchemaResult<T>;
}

export interface RequestPolicy {
  /** Cache freshness for responses of this request */
  ttlSeconds: number;
  /** Retries after the first attempt */
  maxRetries: number;
}

export interface RenderedRequest<T = unknown> {
  /** Provider chosen by the action or template; the coordinator default otherwise */
  providerId?: string;
  /** Fingerprint namespace, e.g. "product_search@1.0.0" */
  namespace?: string;
  payload: ProviderPayload;
  params: ModelParameters;
  schema: ResponseSchema<T>;
  policy: RequestPolicy;
  /** Advisory cost used for the budget pre-check */
  estimatedCost: number;
  /** Build a re-ask payload after a response failed validation */
  repair?(payload: ProviderPayload, issues: string[], attempt: number): ProviderPayload;
}

export interface Action<I = unknown> {
  template: string;
  version?: string;
  input: I;
  provider?: string;
}

/** Pure: renders an action or throws TemplateError */
export interface TemplateEngine {
  render(action: Action): RenderedRequest;
}

// ─── Coordinator envelope ────────────────────────────────────────────────────

export interface ExecuteOptions {
  /** Overall deadline for this caller, in milliseconds */
  timeoutMs?: number;
  /** Skip cache lookup and do not store the result */
  bypassCache?: boolean;
  /** Skip cache lookup but store the fresh result */
  forceRefresh?: boolean;
  /** Caller-side cancellation */
  signal?: AbortSignal;
}

export interface ValidatedResponse<T = unknown> {
  data: T;
  raw: string;
  fingerprint: string;
  providerId: string;
  fromCache: boolean;
  /** Provider attempts made by the dispatch (0 on a cache hit) */
  attempts: number;
  /** Cost committed by the dispatch (0 on a cache hit) */
  cost: number;
  /** Whether the raw response needed reparsing to validate */
  repaired: boolean;
  /** Wall-clock time for this caller */
  durationMs: number;
  /** When the cached entry was created, on a hit */
  cachedAt?: number;
}

export type ExecuteOutcome<T = unknown> =
  | { ok: true; response: ValidatedResponse<T> }
  | { ok: false; error: OrchestratorError };

export type CoordinatorState =
  | "idle"
  | "lookup"
  | "admitting"
  | "dispatching"
  | "backoff"
  | "storing"
  | "done"
  | "failed";
