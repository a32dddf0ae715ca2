/**
 * Request coordinator: the single entry point.
 *
 * execute():
 *  1. Renders the action (template engine)
 *  2. Fingerprints the rendered request
 *  3. Checks the cache (unless bypassCache / forceRefresh)
 *  4. Joins or starts the single in-flight dispatch for the fingerprint
 *  5. Dispatch: rate-limit admission → budget pre-check → provider call,
 *     wrapped in the retry orchestrator
 *  6. Commits cost once, stores the response, publishes to every waiter
 *
 * A caller's deadline or signal only detaches that caller. The shared
 * dispatch stops waiting (admission, backoff) once no caller is left, but a
 * provider call already sent runs to completion and is still cached and
 * committed. A caller arriving while such a flight is winding down waits
 * for its outcome and only dispatches again if the flight was cancelled.
 */
import { CacheStore, MemoryCache } from "./cache.js";
import type { CacheEntry } from "./cache.js";
import { systemClock, raceAbort } from "./clock.js";
import type { Cancel, Clock } from "./clock.js";
import { CostTracker } from "./cost-tracker.js";
import {
  CancelledError, InvalidRequestError, MalformedResponseError, OrchestratorError, ProviderError,
  TemplateError, TimeoutError, abortReason, toOrchestratorError,
} from "./errors.js";
import { fingerprint } from "./fingerprint.js";
import type { FingerprintId } from "./fingerprint.js";
import { createLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { RateLimiter } from "./rate-limiter.js";
import { RetryOrchestrator } from "./retry.js";
import type {
  Action, CoordinatorState, ExecuteOptions, ExecuteOutcome, ProviderAdapter, ProviderPayload,
  RenderedRequest, TemplateEngine, ValidatedResponse,
} from "./types.js";

export interface CoordinatorOptions {
  templates: TemplateEngine;
  providers: ProviderAdapter[];
  /** Used when neither the action nor the template names a provider */
  defaultProvider?: string;
  cache?: CacheStore;
  rateLimiter?: RateLimiter;
  costTracker?: CostTracker;
  retry?: RetryOrchestrator;
  /** Cap on a single rate-limit admission wait */
  admissionTimeoutMs?: number;
  clock?: Clock;
  logger?: Logger;
  /** Observe state-machine transitions per fingerprint */
  onTransition?: (fingerprint: FingerprintId, state: CoordinatorState) => void;
}

export interface CoordinatorStats {
  inFlight: number;
  providerCalls: number;
  cacheHits: number;
  cacheMisses: number;
  dispatches: number;
}

/** What the cache holds for a fingerprint */
interface CachedResponse {
  data: unknown;
  raw: string;
}

interface DispatchResult {
  data: unknown;
  raw: string;
  repaired: boolean;
  attempts: number;
  cost: number;
}

type Settled<T> = { ok: true; value: T } | { ok: false; error: OrchestratorError };

interface InFlightRequest {
  fingerprint: FingerprintId;
  promise: Promise<Settled<DispatchResult>>;
  waiterCount: number;
  controller: AbortController;
  settled: boolean;
}

export class RequestCoordinator {
  private readonly templates: TemplateEngine;
  private readonly providers = new Map<string, ProviderAdapter>();
  private readonly defaultProvider: string | undefined;
  private readonly cache: CacheStore;
  private readonly rateLimiter: RateLimiter;
  private readonly costTracker: CostTracker;
  private readonly retry: RetryOrchestrator;
  private readonly admissionTimeoutMs: number | undefined;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly onTransition: CoordinatorOptions["onTransition"];

  private readonly inFlight = new Map<FingerprintId, InFlightRequest>();
  private readonly counters = { providerCalls: 0, cacheHits: 0, cacheMisses: 0, dispatches: 0 };

  constructor(options: CoordinatorOptions) {
    this.templates = options.templates;
    for (const provider of options.providers) {
      if (this.providers.has(provider.id)) throw new Error(`Duplicate provider id "${provider.id}"`);
      this.providers.set(provider.id, provider);
    }
    this.defaultProvider = options.defaultProvider;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger();
    this.cache = options.cache ?? new CacheStore(new MemoryCache({ clock: this.clock }), { clock: this.clock });
    this.rateLimiter = options.rateLimiter ?? new RateLimiter({ clock: this.clock });
    this.costTracker = options.costTracker ?? new CostTracker({ clock: this.clock });
    this.retry = options.retry ?? new RetryOrchestrator({ clock: this.clock, logger: this.logger });
    this.admissionTimeoutMs = options.admissionTimeoutMs;
    this.onTransition = options.onTransition;
  }

  async execute(action: Action, scopeId: string, options: ExecuteOptions = {}): Promise<ExecuteOutcome> {
    const start = this.clock.now();
    const caller = this.callerSignal(options);

    try {
      const rendered = this.render(action);
      const providerId = rendered.providerId ?? action.provider ?? this.defaultProvider;
      if (providerId === undefined) {
        throw new InvalidRequestError(`No provider for template "${action.template}" and no default configured`);
      }
      const provider = this.providers.get(providerId);
      if (!provider) throw new InvalidRequestError(`Unknown provider "${providerId}"`);

      const fp = fingerprint(providerId, rendered.payload, rendered.params, rendered.namespace);
      const log = this.logger.child({ fingerprint: fp, provider: providerId, scope: scopeId });
      this.transition(fp, "idle");

      if (!options.bypassCache && !options.forceRefresh) {
        this.transition(fp, "lookup");
        const hit = await raceAbort(this.lookup(fp, log), caller.signal);
        if (hit) {
          this.counters.cacheHits++;
          this.transition(fp, "done");
          log.debug("Cache hit");
          return {
            ok: true,
            response: {
              data: hit.response.data,
              raw: hit.response.raw,
              fingerprint: fp,
              providerId,
              fromCache: true,
              attempts: 0,
              cost: 0,
              repaired: false,
              durationMs: this.clock.now() - start,
              cachedAt: hit.createdAt,
            },
          };
        }
        this.counters.cacheMisses++;
      }

      const flight = this.join(fp, (signal) =>
        this.dispatch(fp, provider, rendered, scopeId, { store: !options.bypassCache, signal, log })
      );
      const settled = await this.wait(flight, caller.signal);
      if (!settled.ok) return { ok: false, error: settled.error };

      const response: ValidatedResponse = {
        data: settled.value.data,
        raw: settled.value.raw,
        fingerprint: fp,
        providerId,
        fromCache: false,
        attempts: settled.value.attempts,
        cost: settled.value.cost,
        repaired: settled.value.repaired,
        durationMs: this.clock.now() - start,
      };
      return { ok: true, response };
    } catch (err) {
      return { ok: false, error: toOrchestratorError(err) };
    } finally {
      caller.dispose();
    }
  }

  async invalidate(fp: FingerprintId): Promise<void> {
    await this.cache.invalidate(fp);
  }

  async invalidatePrefix(selector: string): Promise<number> {
    return this.cache.invalidatePrefix(selector);
  }

  stats(): CoordinatorStats {
    return { inFlight: this.inFlight.size, ...this.counters };
  }

  /** Abort pending dispatch waits and release owned resources */
  async close(): Promise<void> {
    for (const flight of this.inFlight.values()) {
      flight.controller.abort(new CancelledError("Coordinator closed"));
    }
    this.rateLimiter.close();
    await this.cache.close();
  }

  // ─── Single-flight ──────────────────────────────────────────────────────────

  private join(fp: FingerprintId, start: (signal: AbortSignal) => Promise<Settled<DispatchResult>>): InFlightRequest {
    const existing = this.inFlight.get(fp);
    if (existing && !existing.controller.signal.aborted) return existing;

    const controller = new AbortController();
    const begin = (): Promise<Settled<DispatchResult>> => {
      this.counters.dispatches++;
      return start(controller.signal);
    };
    // An abandoned flight can no longer wait for admission or backoff, but a
    // provider call it already sent is still out. Queue behind it so the
    // fingerprint never has two calls in flight.
    const run = existing
      ? existing.promise.then((previous): Settled<DispatchResult> | Promise<Settled<DispatchResult>> => {
          if (previous.ok || previous.error.kind !== "cancelled") return previous;
          if (controller.signal.aborted) return { ok: false, error: abortReason(controller.signal) };
          return begin();
        })
      : Promise.resolve().then(begin);

    const flight: InFlightRequest = {
      fingerprint: fp,
      waiterCount: 0,
      controller,
      settled: false,
      promise: run
        .catch((err: unknown): Settled<DispatchResult> => ({ ok: false, error: toOrchestratorError(err) }))
        .then((settled) => {
          flight.settled = true;
          if (this.inFlight.get(fp) === flight) this.inFlight.delete(fp);
          return settled;
        }),
    };
    this.inFlight.set(fp, flight);
    return flight;
  }

  private async wait(flight: InFlightRequest, signal: AbortSignal): Promise<Settled<DispatchResult>> {
    flight.waiterCount++;
    try {
      return await raceAbort(flight.promise, signal);
    } catch (err) {
      return { ok: false, error: toOrchestratorError(err) };
    } finally {
      flight.waiterCount--;
      if (flight.waiterCount === 0 && !flight.settled) {
        flight.controller.abort(new CancelledError("All callers left"));
      }
    }
  }

  // ─── Dispatch ───────────────────────────────────────────────────────────────

  private async dispatch(
    fp: FingerprintId,
    provider: ProviderAdapter,
    rendered: RenderedRequest,
    scopeId: string,
    { store, signal, log }: { store: boolean; signal: AbortSignal; log: Logger }
  ): Promise<Settled<DispatchResult>> {
    let accrued = 0;
    let reachedProvider = false;

    try {
      const result = await this.retry.run(async (state) => {
        this.transition(fp, "admitting");
        await this.rateLimiter.acquire(provider.id, 1, { timeoutMs: this.admissionTimeoutMs, signal });
        this.costTracker.preCheck(scopeId, rendered.estimatedCost);

        // Issues from the last malformed reply survive a transient failure in between
        const payload = this.payloadFor(rendered, state.repairAttempts > 0 ? state.lastIssues : [], state.repairAttempts);
        if (signal.aborted) throw abortReason(signal);
        this.transition(fp, "dispatching");
        this.counters.providerCalls++;
        const res = await provider.send(payload, rendered.params);
        reachedProvider = true;
        if (!Number.isFinite(res.cost) || res.cost < 0) {
          throw new ProviderError("fatal", `Provider "${provider.id}" reported an invalid cost: ${res.cost}`);
        }
        accrued += res.cost;

        const validated = rendered.schema.validate(res.raw);
        if (!validated.ok) throw new MalformedResponseError(res.raw, validated.issues);
        return { data: validated.data, raw: res.raw, repaired: validated.repaired, attempts: state.attempt };
      }, {
        maxAttempts: Math.min(this.retry.policy.maxAttempts, rendered.policy.maxRetries + 1),
        signal,
        onRetry: () => this.transition(fp, "backoff"),
      });

      this.costTracker.commit(scopeId, accrued);
      if (store) {
        this.transition(fp, "storing");
        await this.store(fp, { data: result.data, raw: result.raw }, rendered.policy.ttlSeconds, log);
      }
      this.transition(fp, "done");
      log.info({ attempts: result.attempts, cost: accrued }, "Dispatch succeeded");
      return { ok: true, value: { ...result, cost: accrued } };
    } catch (err) {
      const error = toOrchestratorError(err);
      if (reachedProvider) this.costTracker.commit(scopeId, accrued);
      this.transition(fp, "failed");
      log.warn({ kind: error.kind, cost: accrued, err: error.message }, "Dispatch failed");
      return { ok: false, error };
    }
  }

  private payloadFor(rendered: RenderedRequest, issues: string[], repairAttempt: number): ProviderPayload {
    if (issues.length === 0 || !rendered.repair) return rendered.payload;
    return rendered.repair(rendered.payload, issues, repairAttempt);
  }

  // ─── Collaborators ──────────────────────────────────────────────────────────

  private render(action: Action): RenderedRequest {
    try {
      return this.templates.render(action);
    } catch (err) {
      if (err instanceof OrchestratorError) throw err;
      throw new TemplateError(
        `Failed to render "${action.template}": ${err instanceof Error ? err.message : String(err)}`,
        { cause: err }
      );
    }
  }

  private async lookup(fp: FingerprintId, log: Logger): Promise<{ response: CachedResponse; createdAt: number } | null> {
    let entry: CacheEntry | null;
    try {
      entry = await this.cache.get(fp);
    } catch (err) {
      log.warn({ err }, "Cache read failed; treating as miss");
      return null;
    }
    if (!entry) return null;

    const response = asCachedResponse(entry.response);
    if (!response) {
      log.warn("Cached entry has an unexpected shape; treating as miss");
      return null;
    }
    return { response, createdAt: entry.createdAt };
  }

  private async store(fp: FingerprintId, response: CachedResponse, ttlSeconds: number, log: Logger): Promise<void> {
    try {
      await this.cache.put(fp, response, ttlSeconds);
    } catch (err) {
      log.warn({ err }, "Cache write failed; response delivered uncached");
    }
  }

  // ─── Plumbing ───────────────────────────────────────────────────────────────

  private callerSignal(options: ExecuteOptions): { signal: AbortSignal; dispose: () => void } {
    const controller = new AbortController();
    let cancelTimer: Cancel | null = null;
    const onAbort = () => controller.abort(new CancelledError());

    if (options.signal?.aborted) {
      onAbort();
    } else {
      options.signal?.addEventListener("abort", onAbort, { once: true });
    }
    const timeoutMs = options.timeoutMs;
    if (timeoutMs !== undefined) {
      cancelTimer = this.clock.schedule(() => controller.abort(new TimeoutError(timeoutMs)), timeoutMs);
    }

    return {
      signal: controller.signal,
      dispose: () => {
        cancelTimer?.();
        options.signal?.removeEventListener("abort", onAbort);
      },
    };
  }

  private transition(fp: FingerprintId, state: CoordinatorState): void {
    this.onTransition?.(fp, state);
  }
}

function asCachedResponse(value: unknown): CachedResponse | null {
  if (typeof value !== "object" || value === null) return null;
  if (!("raw" in value) || typeof value.raw !== "string" || !("data" in value)) return null;
  return { data: value.data, raw: value.raw };
}
