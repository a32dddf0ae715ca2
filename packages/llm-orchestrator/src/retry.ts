/**
 * Classified retry engine.
 *
 * For each dispatch:
 *   1. Run the attempt
 *   2. Classify the failure: transient, rate_limited, malformed or fatal
 *   3. fatal → surface immediately
 *   4. malformed → re-ask at once (bounded by maxRepairAttempts), then RepairFailed
 *   5. transient / rate_limited → back off (provider hint first) and try again
 *   6. After maxAttempts → surface the last classified error
 *
 * State lives in an explicit RetryState for the duration of one dispatch.
 */
import { systemClock, sleep } from "./clock.js";
import type { Clock } from "./clock.js";
import {
  MalformedResponseError, OrchestratorError, ProviderError, RepairFailedError, toOrchestratorError,
} from "./errors.js";
import type { Logger } from "./logger.js";
import { createLogger } from "./logger.js";

export type FailureClass = "transient" | "rate_limited" | "malformed" | "fatal";

export interface RetryPolicy {
  /** Total attempts including the first */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Jitter spread as a fraction of the delay (0.2 → ±20%) */
  jitterRatio: number;
  /** Re-asks allowed after schema validation failures */
  maxRepairAttempts: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 10_000,
  jitterRatio: 0.2,
  maxRepairAttempts: 2,
};

export interface RetryState {
  /** 1-based number of the attempt in progress (or last made) */
  attempt: number;
  repairAttempts: number;
  lastErrorKind: FailureClass | null;
  nextBackoffMs: number;
  /** Validation issues of the last malformed response, for the re-ask */
  lastIssues: string[];
}

export interface RunOptions {
  /** Overrides the policy's maxAttempts for this run */
  maxAttempts?: number;
  signal?: AbortSignal;
  onRetry?: (state: Readonly<RetryState>, error: unknown) => void;
}

export interface RetryOrchestratorOptions {
  policy?: Partial<RetryPolicy>;
  clock?: Clock;
  /** Uniform [0, 1) source for jitter */
  random?: () => number;
  logger?: Logger;
}

export function classifyFailure(err: unknown): FailureClass {
  if (err instanceof MalformedResponseError) return "malformed";
  if (err instanceof ProviderError) return err.failure;
  if (err instanceof OrchestratorError) return "fatal";
  return "transient";
}

export class RetryOrchestrator {
  readonly policy: RetryPolicy;
  private readonly clock: Clock;
  private readonly random: () => number;
  private readonly logger: Logger;

  constructor(options: RetryOrchestratorOptions = {}) {
    this.policy = { ...DEFAULT_RETRY_POLICY, ...options.policy };
    if (!Number.isInteger(this.policy.maxAttempts) || this.policy.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${this.policy.maxAttempts}`);
    }
    this.clock = options.clock ?? systemClock;
    this.random = options.random ?? Math.random;
    this.logger = options.logger ?? createLogger();
  }

  /**
   * Delay before retry number `retryIndex` (0 for the first retry):
   * baseDelayMs * 2^retryIndex, capped at maxDelayMs, ± jitterRatio of itself.
   */
  computeBackoff(retryIndex: number): number {
    const { baseDelayMs, maxDelayMs, jitterRatio } = this.policy;
    const delay = Math.min(baseDelayMs * 2 ** retryIndex, maxDelayMs);
    const jitter = (this.random() * 2 - 1) * jitterRatio * delay;
    return Math.max(0, Math.round(delay + jitter));
  }

  async run<T>(attemptFn: (state: Readonly<RetryState>) => Promise<T>, options: RunOptions = {}): Promise<T> {
    const maxAttempts = Math.max(1, options.maxAttempts ?? this.policy.maxAttempts);
    const state: RetryState = {
      attempt: 0,
      repairAttempts: 0,
      lastErrorKind: null,
      nextBackoffMs: 0,
      lastIssues: [],
    };

    for (;;) {
      state.attempt++;
      try {
        return await attemptFn(state);
      } catch (err) {
        const failure = classifyFailure(err);
        state.lastErrorKind = failure;

        if (failure === "fatal") throw toOrchestratorError(err);

        if (err instanceof MalformedResponseError) {
          state.repairAttempts++;
          state.lastIssues = err.issues;
          if (state.repairAttempts > this.policy.maxRepairAttempts || state.attempt >= maxAttempts) {
            throw new RepairFailedError(err.rawResponse, err.issues, state.attempt);
          }
          state.nextBackoffMs = 0;
          this.logger.warn({ attempt: state.attempt, issues: err.issues }, "Malformed response, re-asking");
          options.onRetry?.(state, err);
          continue;
        }

        if (state.attempt >= maxAttempts) throw toOrchestratorError(err);

        const hint = err instanceof ProviderError ? err.retryAfterMs : undefined;
        state.nextBackoffMs = failure === "rate_limited" && hint !== undefined
          ? hint
          : this.computeBackoff(state.attempt - 1);

        this.logger.warn(
          { attempt: state.attempt, kind: failure, delayMs: state.nextBackoffMs, err: toOrchestratorError(err).message },
          "Retrying after provider failure"
        );
        options.onRetry?.(state, err);
        await sleep(this.clock, state.nextBackoffMs, options.signal);
      }
    }
  }
}
