/**
 * Shared test doubles: a manual clock, scripted providers, a stub template
 * engine and an in-process Redis stand-in. Zero network calls.
 */
import type { Cancel, Clock } from "../clock.js";
import type { RedisClientLike } from "../cache.js";
import { createLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import type {
  Action, ModelParameters, ProviderAdapter, ProviderPayload, ProviderResult, RenderedRequest,
  SchemaResult, TemplateEngine,
} from "../types.js";

// ─── Time ────────────────────────────────────────────────────────────────────

interface Timer {
  at: number;
  seq: number;
  fn: () => void;
}

/** Time only moves when the test calls advance(); due timers fire in order. */
export class ManualClock implements Clock {
  private current: number;
  private timers: Timer[] = [];
  private seq = 0;

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  schedule(fn: () => void, delayMs: number): Cancel {
    const timer: Timer = { at: this.current + Math.max(0, delayMs), seq: this.seq++, fn };
    this.timers.push(timer);
    return () => {
      this.timers = this.timers.filter((t) => t !== timer);
    };
  }

  advance(ms: number): void {
    const target = this.current + ms;
    for (;;) {
      const due = this.timers
        .filter((t) => t.at <= target)
        .sort((a, b) => a.at - b.at || a.seq - b.seq)[0];
      if (!due) break;
      this.timers = this.timers.filter((t) => t !== due);
      this.current = due.at;
      due.fn();
    }
    this.current = target;
  }

  get pendingTimers(): number {
    return this.timers.length;
  }
}

/** Let every queued promise continuation run */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (err: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (err: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Track whether a promise has settled without awaiting it */
export function track<T>(promise: Promise<T>): { settled: () => boolean; promise: Promise<T> } {
  let done = false;
  void promise.then(
    () => { done = true; },
    () => { done = true; }
  );
  return { settled: () => done, promise };
}

export const silentLogger: Logger = createLogger({ level: "silent" });

// ─── Providers ───────────────────────────────────────────────────────────────

export type Step = (payload: ProviderPayload) => ProviderResult | Promise<ProviderResult>;

/** Replays `steps` in order; the last step repeats once the script runs out */
export class ScriptedProvider implements ProviderAdapter {
  readonly calls: ProviderPayload[] = [];
  readonly params: ModelParameters[] = [];

  constructor(readonly id: string, private readonly steps: Step[]) {}

  async send(payload: ProviderPayload, params: ModelParameters): Promise<ProviderResult> {
    this.calls.push(payload);
    this.params.push(params);
    const step = this.steps[Math.min(this.calls.length, this.steps.length) - 1];
    if (!step) throw new Error("ScriptedProvider has no steps");
    return step(payload);
  }
}

export function reply(raw: string, cost = 1): Step {
  return () => ({ raw, cost });
}

export function fail(err: unknown): Step {
  return () => {
    throw err;
  };
}

// ─── Template engine ─────────────────────────────────────────────────────────

export interface StubTemplateOptions {
  ttlSeconds?: number;
  maxRetries?: number;
  estimatedCost?: number;
  providerId?: string;
}

/** Expects `{"answer": "<string>"}` back from the provider */
export function answerSchema(raw: string): SchemaResult<{ answer: string }> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { ok: false, issues: ["response is not JSON"] };
  }
  if (typeof parsed !== "object" || parsed === null || !("answer" in parsed) || typeof parsed.answer !== "string") {
    return { ok: false, issues: ["answer: expected string"] };
  }
  return { ok: true, data: { answer: parsed.answer }, repaired: false };
}

/**
 * Renders every action as one user message holding the JSON input, under
 * the namespace "{template}@1". Template "missing" fails to render.
 */
export class StubTemplates implements TemplateEngine {
  constructor(private readonly options: StubTemplateOptions = {}) {}

  render(action: Action): RenderedRequest {
    if (action.template === "missing") throw new Error(`Unknown template "${action.template}"`);
    return {
      ...(this.options.providerId !== undefined ? { providerId: this.options.providerId } : {}),
      namespace: `${action.template}@1`,
      payload: stubPayload(action.input),
      params: { model: "stub-model", temperature: 0 },
      schema: { validate: answerSchema },
      policy: { ttlSeconds: this.options.ttlSeconds ?? 60, maxRetries: this.options.maxRetries ?? 2 },
      estimatedCost: this.options.estimatedCost ?? 1,
      repair: (payload, issues) => ({
        messages: [...payload.messages, { role: "user", content: `fix: ${issues.join(", ")}` }],
      }),
    };
  }
}

export function stubPayload(input: unknown): ProviderPayload {
  return { messages: [{ role: "user", content: JSON.stringify(input) }] };
}

// ─── Redis stand-in ──────────────────────────────────────────────────────────

/** Map-backed client covering the RedisClientLike slice; `keys` handles "prefix*" patterns */
export class FakeRedis implements RedisClientLike {
  readonly store = new Map<string, { value: string; expiresAt: number }>();
  readonly patterns: string[] = [];
  readonly ttls: number[] = [];

  constructor(private readonly clock: Clock) {}

  async get(key: string): Promise<string | null> {
    const entry = this.store.get(key);
    if (!entry) return null;
    if (this.clock.now() >= entry.expiresAt) {
      this.store.delete(key);
      return null;
    }
    return entry.value;
  }

  async psetex(key: string, milliseconds: number, value: string): Promise<"OK"> {
    this.ttls.push(milliseconds);
    this.store.set(key, { value, expiresAt: this.clock.now() + milliseconds });
    return "OK";
  }

  async del(key: string): Promise<number> {
    return this.store.delete(key) ? 1 : 0;
  }

  async keys(pattern: string): Promise<string[]> {
    this.patterns.push(pattern);
    const prefix = pattern.slice(0, -1).replace(/\\(.)/g, "$1");
    return [...this.store.keys()].filter((k) => k.startsWith(prefix));
  }
}
