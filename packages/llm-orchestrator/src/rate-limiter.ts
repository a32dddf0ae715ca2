/**
 * Per-provider token bucket.
 *
 * Buckets refill lazily from elapsed clock time on every access; nothing
 * ticks while a provider is idle. Callers that cannot be admitted queue in
 * FIFO order and a single timer per bucket wakes the queue when the head
 * waiter's cost has accrued.
 */
import { systemClock } from "./clock.js";
import type { Cancel, Clock } from "./clock.js";
import { CancelledError, RateLimitTimeoutError, abortReason } from "./errors.js";
import type { OrchestratorError } from "./errors.js";

export interface BucketConfig {
  /** Maximum tokens held */
  capacity: number;
  /** Continuous refill rate */
  refillPerSecond: number;
}

export interface BucketSnapshot extends BucketConfig {
  providerId: string;
  tokens: number;
  lastRefill: number;
  waiting: number;
}

export interface AcquireOptions {
  /** Give up after this long; wait indefinitely when omitted */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface RateLimiterOptions {
  providers?: Record<string, BucketConfig>;
  /** Config for providers not listed in `providers` */
  defaults?: BucketConfig;
  clock?: Clock;
}

export const DEFAULT_BUCKET: BucketConfig = { capacity: 60, refillPerSecond: 1 };

// Float drift from ms-granular timers must not leave a waiter one epsilon short
const EPSILON = 1e-9;

interface Waiter {
  cost: number;
  resolve: () => void;
  reject: (err: OrchestratorError) => void;
  cleanup: () => void;
}

interface Bucket {
  providerId: string;
  config: BucketConfig;
  tokens: number;
  lastRefill: number;
  queue: Waiter[];
  cancelWake: Cancel | null;
}

export class RateLimiter {
  private readonly buckets = new Map<string, Bucket>();
  private readonly configs = new Map<string, BucketConfig>();
  private readonly defaults: BucketConfig;
  private readonly clock: Clock;

  constructor(options: RateLimiterOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.defaults = checkConfig(options.defaults ?? DEFAULT_BUCKET);
    for (const [providerId, config] of Object.entries(options.providers ?? {})) {
      this.configs.set(providerId, checkConfig(config));
    }
  }

  /** Admit immediately or fail with RateLimitTimeoutError / the signal's reason */
  async acquire(providerId: string, cost = 1, options: AcquireOptions = {}): Promise<void> {
    checkCost(cost);
    const bucket = this.bucket(providerId);
    const { timeoutMs, signal } = options;

    if (cost > bucket.config.capacity) {
      throw new RateLimitTimeoutError(providerId, `cost ${cost} exceeds bucket capacity ${bucket.config.capacity}`);
    }
    if (signal?.aborted) throw abortReason(signal);

    this.refill(bucket);
    if (bucket.queue.length === 0 && bucket.tokens + EPSILON >= cost) {
      bucket.tokens = Math.max(0, bucket.tokens - cost);
      return;
    }
    if (timeoutMs !== undefined && timeoutMs <= 0) {
      throw new RateLimitTimeoutError(providerId, "no tokens available");
    }

    return new Promise<void>((resolve, reject) => {
      let cancelTimeout: Cancel | null = null;
      const onAbort = () => {
        if (signal) this.drop(bucket, waiter, abortReason(signal));
      };

      const waiter: Waiter = {
        cost,
        resolve,
        reject,
        cleanup: () => {
          cancelTimeout?.();
          signal?.removeEventListener("abort", onAbort);
        },
      };

      bucket.queue.push(waiter);
      if (timeoutMs !== undefined) {
        cancelTimeout = this.clock.schedule(
          () => this.drop(bucket, waiter, new RateLimitTimeoutError(providerId, `waited ${timeoutMs}ms`)),
          timeoutMs
        );
      }
      signal?.addEventListener("abort", onAbort, { once: true });
      this.scheduleWake(bucket);
    });
  }

  /** Non-blocking variant: debit and return true, or return false */
  tryAcquire(providerId: string, cost = 1): boolean {
    checkCost(cost);
    const bucket = this.bucket(providerId);
    this.refill(bucket);
    if (bucket.queue.length > 0 || bucket.tokens + EPSILON < cost) return false;
    bucket.tokens = Math.max(0, bucket.tokens - cost);
    return true;
  }

  snapshot(providerId: string): BucketSnapshot {
    const bucket = this.bucket(providerId);
    this.refill(bucket);
    return {
      providerId,
      capacity: bucket.config.capacity,
      refillPerSecond: bucket.config.refillPerSecond,
      tokens: bucket.tokens,
      lastRefill: bucket.lastRefill,
      waiting: bucket.queue.length,
    };
  }

  /** Reject every queued waiter and stop all timers */
  close(): void {
    for (const bucket of this.buckets.values()) {
      bucket.cancelWake?.();
      bucket.cancelWake = null;
      for (const waiter of bucket.queue.splice(0)) {
        waiter.cleanup();
        waiter.reject(new CancelledError("Rate limiter closed"));
      }
    }
  }

  // ─── Internals ──────────────────────────────────────────────────────────────

  private bucket(providerId: string): Bucket {
    let bucket = this.buckets.get(providerId);
    if (!bucket) {
      const config = this.configs.get(providerId) ?? this.defaults;
      bucket = {
        providerId,
        config,
        tokens: config.capacity,
        lastRefill: this.clock.now(),
        queue: [],
        cancelWake: null,
      };
      this.buckets.set(providerId, bucket);
    }
    return bucket;
  }

  private refill(bucket: Bucket): void {
    const now = this.clock.now();
    const elapsedMs = now - bucket.lastRefill;
    if (elapsedMs <= 0) return;
    bucket.tokens = Math.min(
      bucket.config.capacity,
      bucket.tokens + (elapsedMs / 1000) * bucket.config.refillPerSecond
    );
    bucket.lastRefill = now;
  }

  /** Admit queued waiters in order while tokens last */
  private drain(bucket: Bucket): void {
    this.refill(bucket);
    let head = bucket.queue[0];
    while (head && bucket.tokens + EPSILON >= head.cost) {
      bucket.queue.shift();
      bucket.tokens = Math.max(0, bucket.tokens - head.cost);
      head.cleanup();
      head.resolve();
      head = bucket.queue[0];
    }
    this.scheduleWake(bucket);
  }

  private drop(bucket: Bucket, waiter: Waiter, err: OrchestratorError): void {
    const index = bucket.queue.indexOf(waiter);
    if (index === -1) return;
    bucket.queue.splice(index, 1);
    waiter.cleanup();
    waiter.reject(err);
    if (index === 0) this.drain(bucket);
  }

  private scheduleWake(bucket: Bucket): void {
    bucket.cancelWake?.();
    bucket.cancelWake = null;

    const head = bucket.queue[0];
    if (!head) return;

    const deficit = Math.max(0, head.cost - bucket.tokens);
    const delayMs = Math.max(1, Math.ceil((deficit / bucket.config.refillPerSecond) * 1000));
    bucket.cancelWake = this.clock.schedule(() => {
      bucket.cancelWake = null;
      this.drain(bucket);
    }, delayMs);
  }
}

function checkConfig(config: BucketConfig): BucketConfig {
  if (!(config.capacity > 0) || !(config.refillPerSecond > 0)) {
    throw new RangeError(
      `Invalid bucket config: capacity=${config.capacity}, refillPerSecond=${config.refillPerSecond}`
    );
  }
  return { ...config };
}

function checkCost(cost: number): void {
  if (!Number.isFinite(cost) || cost <= 0) {
    throw new RangeError(`Token cost must be a positive number, got ${cost}`);
  }
}
