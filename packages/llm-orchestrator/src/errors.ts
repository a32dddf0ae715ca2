/**
 * Error taxonomy for the orchestration layer.
 *
 * Every failure that reaches a caller of `execute` is an OrchestratorError
 * tagged with a `kind`. Callers switch on `kind`; the gateway maps kinds to
 * HTTP statuses.
 */

export type ErrorKind =
  | "template"
  | "invalid_request"
  | "provider_transient"
  | "provider_rate_limited"
  | "provider_fatal"
  | "budget_exceeded"
  | "rate_limit_timeout"
  | "repair_failed"
  | "timeout"
  | "cancelled";

export class OrchestratorError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "OrchestratorError";
    this.kind = kind;
  }

  /** Whether the same request may succeed if sent again later */
  get retryable(): boolean {
    return this.kind === "provider_transient" || this.kind === "provider_rate_limited";
  }

  toJSON(): { kind: ErrorKind; message: string } {
    return { kind: this.kind, message: this.message };
  }
}

// ─── Caller input ────────────────────────────────────────────────────────────

export class TemplateError extends OrchestratorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("template", message, options);
    this.name = "TemplateError";
  }
}

export class InvalidRequestError extends OrchestratorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("invalid_request", message, options);
    this.name = "InvalidRequestError";
  }
}

export class FingerprintError extends InvalidRequestError {
  constructor(message: string) {
    super(message);
    this.name = "FingerprintError";
  }
}

// ─── Provider failures ───────────────────────────────────────────────────────

export type ProviderFailureKind = "transient" | "rate_limited" | "fatal";

const PROVIDER_ERROR_KINDS: Record<ProviderFailureKind, ErrorKind> = {
  transient: "provider_transient",
  rate_limited: "provider_rate_limited",
  fatal: "provider_fatal",
};

export class ProviderError extends OrchestratorError {
  readonly failure: ProviderFailureKind;
  /** HTTP status (or equivalent) reported by the provider, if any */
  readonly status: number | undefined;
  /** Provider-supplied retry hint */
  readonly retryAfterMs: number | undefined;

  constructor(
    failure: ProviderFailureKind,
    message: string,
    options: { status?: number; retryAfterMs?: number; cause?: unknown } = {}
  ) {
    super(PROVIDER_ERROR_KINDS[failure], message, { cause: options.cause });
    this.name = "ProviderError";
    this.failure = failure;
    this.status = options.status;
    this.retryAfterMs = options.retryAfterMs;
  }
}

// ─── Local policy ────────────────────────────────────────────────────────────

export class BudgetExceededError extends OrchestratorError {
  readonly scopeId: string;
  readonly spent: number;
  readonly budgetLimit: number;

  constructor(scopeId: string, spent: number, budgetLimit: number, estimatedCost: number) {
    super(
      "budget_exceeded",
      `Budget exceeded for scope "${scopeId}": spent ${spent} + estimated ${estimatedCost} > limit ${budgetLimit}`
    );
    this.name = "BudgetExceededError";
    this.scopeId = scopeId;
    this.spent = spent;
    this.budgetLimit = budgetLimit;
  }
}

export class RateLimitTimeoutError extends OrchestratorError {
  readonly providerId: string;

  constructor(providerId: string, message: string) {
    super("rate_limit_timeout", `Rate limit admission for "${providerId}" failed: ${message}`);
    this.name = "RateLimitTimeoutError";
    this.providerId = providerId;
  }
}

export class RepairFailedError extends OrchestratorError {
  /** Last raw provider response, kept for diagnostics */
  readonly rawResponse: string;
  readonly issues: string[];
  readonly attempts: number;

  constructor(rawResponse: string, issues: string[], attempts: number) {
    super(
      "repair_failed",
      `Response failed schema validation after ${attempts} attempt(s): ${issues.join("; ")}`
    );
    this.name = "RepairFailedError";
    this.rawResponse = rawResponse;
    this.issues = issues;
    this.attempts = attempts;
  }
}

export class TimeoutError extends OrchestratorError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super("timeout", `Request did not complete within ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class CancelledError extends OrchestratorError {
  constructor(message = "Request was cancelled") {
    super("cancelled", message);
    this.name = "CancelledError";
  }
}

// ─── Internal: malformed response ────────────────────────────────────────────

/**
 * Raised by a dispatch attempt whose response failed schema validation.
 * Never surfaced: the retry orchestrator turns it into a re-ask or a
 * RepairFailedError.
 */
export class MalformedResponseError extends Error {
  readonly rawResponse: string;
  readonly issues: string[];

  constructor(rawResponse: string, issues: string[]) {
    super(`Malformed response: ${issues.join("; ")}`);
    this.name = "MalformedResponseError";
    this.rawResponse = rawResponse;
    this.issues = issues;
  }
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

/** Unknown throwables (fetch failures, socket resets) count as transient. */
export function toOrchestratorError(err: unknown): OrchestratorError {
  if (err instanceof OrchestratorError) return err;
  if (err instanceof MalformedResponseError) {
    return new RepairFailedError(err.rawResponse, err.issues, 1);
  }
  const message = err instanceof Error ? err.message : String(err);
  return new ProviderError("transient", message, { cause: err });
}

/** The error an aborted signal should surface as. */
export function abortReason(signal: AbortSignal): OrchestratorError {
  const reason: unknown = signal.reason;
  return reason instanceof OrchestratorError ? reason : new CancelledError();
}
