/**
 * Template definitions.
 *
 * A template pairs an input schema and a prompt builder with the output
 * schema its response must satisfy. The name and version form the cache
 * namespace ("product_search@1.0.0"), so bumping the version of a changed
 * prompt retires its cached responses.
 */
import { TemplateError } from "@conduit/llm-orchestrator";
import type { ChatMessage, ModelParameters, RequestPolicy, ResponseSchema } from "@conduit/llm-orchestrator";
import { formatIssues, responseSchema } from "./json.js";
import type { Schema } from "./json.js";

export const DEFAULT_TTL_SECONDS = 3600;
export const DEFAULT_MAX_RETRIES = 2;
export const DEFAULT_ESTIMATED_COST = 1;

export const JSON_INSTRUCTION =
  "CRITICAL: Respond with ONLY valid JSON. No markdown code fences, no preamble, no explanation outside the JSON object. Your entire response must be parseable by JSON.parse().";

export interface TemplateDefinition<I, O> {
  name: string;
  version?: string;
  description?: string;
  tags?: string[];
  input: Schema<I>;
  output: Schema<O>;
  /** System message; the JSON instruction is appended to it */
  system?: string;
  prompt: (input: I) => string;
  params?: ModelParameters;
  /** Provider to use unless the action names one */
  provider?: string;
  ttlSeconds?: number;
  maxRetries?: number;
  /** Advisory cost for the budget pre-check */
  estimatedCost?: number;
}

export interface TemplateInfo {
  id: string;
  name: string;
  version: string;
  description: string | null;
  tags: string[];
  provider: string | null;
  ttlSeconds: number;
  maxRetries: number;
  estimatedCost: number;
}

/** What the registry and engine need, independent of the input/output types */
export interface RenderableTemplate {
  readonly id: string;
  readonly name: string;
  readonly version: string;
  readonly provider: string | undefined;
  readonly params: ModelParameters;
  readonly policy: RequestPolicy;
  readonly estimatedCost: number;
  readonly schema: ResponseSchema<unknown>;
  messages(input: unknown): ChatMessage[];
  info(): TemplateInfo;
}

const SEGMENT = /^[A-Za-z0-9_.-]+$/;

export class Template<I, O> implements RenderableTemplate {
  readonly id: string;
  readonly name: string;
  readonly version: string;
  readonly description: string | undefined;
  readonly tags: string[];
  readonly input: Schema<I>;
  readonly output: Schema<O>;
  readonly provider: string | undefined;
  readonly params: ModelParameters;
  readonly policy: RequestPolicy;
  readonly estimatedCost: number;
  readonly schema: ResponseSchema<O>;
  private readonly system: string | undefined;
  private readonly prompt: (input: I) => string;

  constructor(def: TemplateDefinition<I, O>) {
    const version = def.version ?? "1.0.0";
    if (!SEGMENT.test(def.name)) throw new TemplateError(`Invalid template name "${def.name}"`);
    if (!SEGMENT.test(version)) throw new TemplateError(`Invalid version "${version}" for template "${def.name}"`);

    this.id = `${def.name}@${version}`;
    this.name = def.name;
    this.version = version;
    this.description = def.description;
    this.tags = def.tags ?? [];
    this.input = def.input;
    this.output = def.output;
    this.system = def.system;
    this.prompt = def.prompt;
    this.provider = def.provider;
    this.params = def.params ?? {};
    this.policy = {
      ttlSeconds: def.ttlSeconds ?? DEFAULT_TTL_SECONDS,
      maxRetries: def.maxRetries ?? DEFAULT_MAX_RETRIES,
    };
    this.estimatedCost = def.estimatedCost ?? DEFAULT_ESTIMATED_COST;
    this.schema = responseSchema(def.output);

    if (!(this.policy.ttlSeconds > 0)) throw new TemplateError(`${this.id}: ttlSeconds must be positive`);
    if (!Number.isInteger(this.policy.maxRetries) || this.policy.maxRetries < 0) {
      throw new TemplateError(`${this.id}: maxRetries must be a non-negative integer`);
    }
    if (!Number.isFinite(this.estimatedCost) || this.estimatedCost < 0) {
      throw new TemplateError(`${this.id}: estimatedCost must be a non-negative number`);
    }
  }

  /** Validate the input and build the chat messages; throws TemplateError */
  messages(input: unknown): ChatMessage[] {
    const parsed = this.input.safeParse(input);
    if (!parsed.success) {
      throw new TemplateError(`Invalid input for "${this.id}": ${formatIssues(parsed.error).join("; ")}`);
    }

    let userMessage: string;
    try {
      userMessage = this.prompt(parsed.data).trim();
    } catch (err) {
      throw new TemplateError(
        `Prompt for "${this.id}" failed: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err }
      );
    }

    const system = this.system ? `${this.system.trim()}\n\n${JSON_INSTRUCTION}` : JSON_INSTRUCTION;
    return [
      { role: "system", content: system },
      { role: "user", content: userMessage },
    ];
  }

  info(): TemplateInfo {
    return {
      id: this.id,
      name: this.name,
      version: this.version,
      description: this.description ?? null,
      tags: [...this.tags],
      provider: this.provider ?? null,
      ttlSeconds: this.policy.ttlSeconds,
      maxRetries: this.policy.maxRetries,
      estimatedCost: this.estimatedCost,
    };
  }
}

export function defineTemplate<I, O>(def: TemplateDefinition<I, O>): Template<I, O> {
  return new Template(def);
}
