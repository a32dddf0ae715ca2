/**
 * Typed entry point: process(template, input) → outcome with `data` typed by
 * the template's output schema.
 */
import { RepairFailedError } from "@conduit/llm-orchestrator";
import type { Action, ExecuteOptions, ExecuteOutcome } from "@conduit/llm-orchestrator";
import type { TemplateRegistry } from "./registry.js";
import type { Template } from "./template.js";

/** The coordinator, or anything that executes actions like it */
export interface ActionExecutor {
  execute(action: Action, scopeId: string, options?: ExecuteOptions): Promise<ExecuteOutcome>;
}

export interface ProcessOptions extends ExecuteOptions {
  /** Overrides the template's provider */
  provider?: string;
}

export class TemplateClient {
  constructor(
    private readonly executor: ActionExecutor,
    readonly registry: TemplateRegistry
  ) {}

  /**
   * Registers the template on first use. The typed data is re-derived from
   * the raw response through the template's own schema.
   */
  async process<I, O>(
    template: Template<I, O>,
    input: I,
    scopeId: string,
    options: ProcessOptions = {}
  ): Promise<ExecuteOutcome<O>> {
    if (!this.registry.has(template.name, template.version)) this.registry.register(template);

    const { provider, ...executeOptions } = options;
    const outcome = await this.executor.execute(
      {
        template: template.name,
        version: template.version,
        input,
        ...(provider !== undefined ? { provider } : {}),
      },
      scopeId,
      executeOptions
    );
    if (!outcome.ok) return outcome;

    const validated = template.schema.validate(outcome.response.raw);
    if (!validated.ok) {
      return { ok: false, error: new RepairFailedError(outcome.response.raw, validated.issues, outcome.response.attempts) };
    }
    return { ok: true, response: { ...outcome.response, data: validated.data } };
  }

  /** Untyped variant for templates known only by name */
  async processByName(
    name: string,
    input: unknown,
    scopeId: string,
    options: ProcessOptions & { version?: string } = {}
  ): Promise<ExecuteOutcome> {
    const { provider, version, ...executeOptions } = options;
    return this.executor.execute(
      {
        template: name,
        input,
        ...(version !== undefined ? { version } : {}),
        ...(provider !== undefined ? { provider } : {}),
      },
      scopeId,
      executeOptions
    );
  }
}
