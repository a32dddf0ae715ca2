import { OrchestratorError, ProviderError } from "@conduit/llm-orchestrator";
import type { ErrorKind } from "@conduit/llm-orchestrator";
import type { ZodError } from "zod";

export interface ErrorEnvelope {
  data: null;
  requestId: string;
  errors: Array<{ code: string; message: string }>;
}

export const STATUS_BY_KIND: Record<ErrorKind, number> = {
  template: 400,
  invalid_request: 400,
  budget_exceeded: 402,
  rate_limit_timeout: 429,
  provider_rate_limited: 429,
  cancelled: 499,
  provider_fatal: 502,
  repair_failed: 502,
  provider_transient: 503,
  timeout: 504,
};

// Shown instead of upstream detail on 5xx responses
const PUBLIC_MESSAGES: Partial<Record<ErrorKind, string>> = {
  provider_fatal: "The provider rejected the request.",
  repair_failed: "The provider response did not match the template's output schema.",
  provider_transient: "The provider is temporarily unavailable.",
  timeout: "The request timed out.",
};

export const INTERNAL_MESSAGE = "An internal server error occurred.";

export function envelope(code: string, message: string, requestId: string): ErrorEnvelope {
  return { data: null, requestId, errors: [{ code, message }] };
}

/** First zod issue as `path: message` */
export function firstIssue(error: ZodError): string {
  const issue = error.issues[0];
  if (!issue) return "Invalid body";
  return `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`;
}

export interface MappedError {
  statusCode: number;
  body: ErrorEnvelope;
  /** Seconds, for the Retry-After header */
  retryAfter?: number;
}

export function mapOrchestratorError(error: OrchestratorError, requestId: string): MappedError {
  const statusCode = STATUS_BY_KIND[error.kind];
  const message = statusCode >= 500 ? PUBLIC_MESSAGES[error.kind] ?? INTERNAL_MESSAGE : error.message;
  const mapped: MappedError = { statusCode, body: envelope(error.kind.toUpperCase(), message, requestId) };
  if (error instanceof ProviderError && error.retryAfterMs !== undefined) {
    mapped.retryAfter = Math.ceil(error.retryAfterMs / 1000);
  }
  return mapped;
}
