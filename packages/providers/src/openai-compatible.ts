/**
 * OpenAI-compatible chat completions adapter, fetch-based, no SDK dependency.
 *
 * Works against any `/chat/completions` endpoint (OpenAI, Perplexity, Groq).
 * One send() is one HTTP request: retries belong to the coordinator, so this
 * adapter only classifies failures:
 *   400/401/403/404/422      → fatal
 *   429                      → rate_limited (+ retry-after hint)
 *   408/409/5xx, network     → transient
 *   other non-2xx            → fatal
 */
import { z } from "zod";
import { ProviderError, createLogger } from "@conduit/llm-orchestrator";
import type {
  Logger, ModelParameters, ProviderAdapter, ProviderPayload, ProviderResult, TokenUsage,
} from "@conduit/llm-orchestrator";
import { parseRetryAfter } from "./retry-after.js";

export type FetchFn = typeof globalThis.fetch;

// ─── Config ──────────────────────────────────────────────────────────────────

export interface Pricing {
  /** USD per million prompt tokens */
  inputPerMillion: number;
  /** USD per million completion tokens */
  outputPerMillion: number;
}

export interface ProviderConfig {
  id: string;
  apiKey: string;
  baseUrl: string;
  model: string;
  pricing: Pricing;
  /** Ask for `response_format: json_object` */
  jsonMode: boolean;
  maxTokens: number;
  temperature: number;
  requestTimeoutMs: number;
}

export interface ProviderOptions {
  fetch?: FetchFn;
  logger?: Logger;
  /** Clock for retry-after dates */
  now?: () => number;
}

// ─── Wire types ──────────────────────────────────────────────────────────────

interface ChatRequest {
  model: string;
  messages: ProviderPayload["messages"];
  max_tokens: number;
  temperature: number;
  response_format?: { type: "json_object" };
  [extra: string]: unknown;
}

const ChatResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({ content: z.string().nullable().optional(), role: z.string().optional() }),
      finish_reason: z.string().nullable().optional(),
    })
  ),
  usage: z.object({
    prompt_tokens: z.number().nonnegative(),
    completion_tokens: z.number().nonnegative(),
    total_tokens: z.number().nonnegative().optional(),
  }).optional(),
});

const ErrorBodySchema = z.object({ error: z.object({ message: z.string() }) });

const FATAL_STATUSES = new Set([400, 401, 403, 404, 422]);
const TRANSIENT_STATUSES = new Set([408, 409]);

// ─── Adapter ─────────────────────────────────────────────────────────────────

export class OpenAICompatibleProvider implements ProviderAdapter {
  readonly id: string;
  private readonly config: ProviderConfig;
  private readonly fetchFn: FetchFn;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly usageTotals = { calls: 0, inputTokens: 0, outputTokens: 0, cost: 0 };

  constructor(config: ProviderConfig, options: ProviderOptions = {}) {
    if (!config.apiKey) throw new Error(`Provider "${config.id}" has no API key`);
    this.id = config.id;
    this.config = { ...config, baseUrl: config.baseUrl.replace(/\/+$/, "") };
    this.fetchFn = options.fetch ?? globalThis.fetch;
    this.logger = (options.logger ?? createLogger()).child({ provider: config.id });
    this.now = options.now ?? Date.now;
  }

  async send(payload: ProviderPayload, params: ModelParameters): Promise<ProviderResult> {
    const cfg = this.config;
    const body: ChatRequest = {
      ...params.extra,
      model: params.model ?? cfg.model,
      messages: payload.messages,
      max_tokens: params.maxTokens ?? cfg.maxTokens,
      temperature: params.temperature ?? cfg.temperature,
      ...(cfg.jsonMode ? { response_format: { type: "json_object" } } : {}),
    };

    let response: Response;
    try {
      response = await this.fetchFn(`${cfg.baseUrl}/chat/completions`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "Authorization": `Bearer ${cfg.apiKey}`,
        },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(cfg.requestTimeoutMs),
      });
    } catch (err) {
      const timedOut = err instanceof Error && err.name === "TimeoutError";
      throw new ProviderError(
        "transient",
        timedOut
          ? `${this.id} request timed out after ${cfg.requestTimeoutMs}ms`
          : `${this.id} network error: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err }
      );
    }

    if (!response.ok) throw await this.toError(response);

    let json: unknown;
    try {
      json = await response.json();
    } catch (err) {
      throw new ProviderError("transient", `${this.id} returned a non-JSON body`, { status: response.status, cause: err });
    }

    const parsed = ChatResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new ProviderError("transient", `${this.id} returned an unexpected response shape`, { status: response.status });
    }
    const content = parsed.data.choices[0]?.message.content;
    if (content === undefined || content === null) {
      throw new ProviderError("transient", `${this.id} returned no choices`, { status: response.status });
    }

    const usage: TokenUsage = {
      inputTokens: parsed.data.usage?.prompt_tokens ?? 0,
      outputTokens: parsed.data.usage?.completion_tokens ?? 0,
      totalTokens: parsed.data.usage?.total_tokens
        ?? (parsed.data.usage ? parsed.data.usage.prompt_tokens + parsed.data.usage.completion_tokens : 0),
    };
    const cost = priceOf(usage, cfg.pricing);

    this.usageTotals.calls++;
    this.usageTotals.inputTokens += usage.inputTokens;
    this.usageTotals.outputTokens += usage.outputTokens;
    this.usageTotals.cost += cost;
    this.logger.debug({ model: body.model, ...usage, cost }, "Provider call completed");

    return { raw: content, cost, usage };
  }

  /** Running totals since construction */
  usageSummary(): { calls: number; inputTokens: number; outputTokens: number; cost: number } {
    return { ...this.usageTotals };
  }

  private async toError(response: Response): Promise<ProviderError> {
    const text = await response.text().catch(() => response.statusText);
    const message = `${this.id} API error ${response.status}: ${errorMessage(text)}`;
    const status = response.status;

    if (status === 429) {
      const retryAfterMs = parseRetryAfter(response.headers, this.now());
      return new ProviderError("rate_limited", message, {
        status,
        ...(retryAfterMs !== undefined ? { retryAfterMs } : {}),
      });
    }
    if (FATAL_STATUSES.has(status)) return new ProviderError("fatal", message, { status });
    if (TRANSIENT_STATUSES.has(status) || status >= 500) return new ProviderError("transient", message, { status });
    return new ProviderError("fatal", message, { status });
  }
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

export function priceOf(usage: TokenUsage, pricing: Pricing): number {
  return (usage.inputTokens * pricing.inputPerMillion + usage.outputTokens * pricing.outputPerMillion) / 1_000_000;
}

/** The `error.message` of an OpenAI-style error body, else the text itself */
function errorMessage(text: string): string {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return text.slice(0, 500);
  }
  const parsed = ErrorBodySchema.safeParse(json);
  return parsed.success ? parsed.data.error.message : text.slice(0, 500);
}
