/**
 * Renders actions into provider-ready requests for the coordinator.
 *
 * Rendering is pure: the same action always yields the same payload, so the
 * coordinator's fingerprint is stable across call sites.
 */
import type { Action, ProviderPayload, RenderedRequest, TemplateEngine } from "@conduit/llm-orchestrator";
import { TemplateRegistry } from "./registry.js";

export class PromptEngine implements TemplateEngine {
  constructor(readonly registry: TemplateRegistry) {}

  render(action: Action): RenderedRequest {
    const template = this.registry.get(action.template, action.version);
    const messages = template.messages(action.input);
    const providerId = action.provider ?? template.provider;

    return {
      ...(providerId !== undefined ? { providerId } : {}),
      namespace: template.id,
      payload: { messages },
      params: template.params,
      schema: template.schema,
      policy: template.policy,
      estimatedCost: template.estimatedCost,
      repair: (payload: ProviderPayload, issues: string[], attempt: number): ProviderPayload => ({
        messages: [...payload.messages, { role: "user", content: buildRepairMessage(issues, attempt) }],
      }),
    };
  }
}

/**
 * Correction appended to the conversation after a response failed
 * validation. Tells the model exactly what went wrong so it can fix it.
 */
export function buildRepairMessage(issues: string[], attempt: number): string {
  return `
[REPAIR ATTEMPT ${attempt}]
Your previous response failed validation with the following errors:

${issues.map((e, i) => `${i + 1}. ${e}`).join("\n")}

Please fix ALL of the above issues in your response. Pay careful attention to:
- Respond with a single JSON object and nothing else
- All required fields must be present with the requested types
`.trim();
}
