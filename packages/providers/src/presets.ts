/**
 * Known OpenAI-compatible vendors. Prices are USD per million tokens for the
 * default model; override them when using another model.
 */
import { OpenAICompatibleProvider } from "./openai-compatible.js";
import type { ProviderConfig, ProviderOptions } from "./openai-compatible.js";

export type PresetName = "openai" | "perplexity" | "groq";

type Preset = Omit<ProviderConfig, "id" | "apiKey">;

const SHARED = { maxTokens: 4096, temperature: 0.7, requestTimeoutMs: 60_000 };

export const PRESETS: Record<PresetName, Preset> = {
  openai: {
    ...SHARED,
    baseUrl: "https://api.openai.com/v1",
    model: "gpt-4o-mini",
    pricing: { inputPerMillion: 0.15, outputPerMillion: 0.6 },
    jsonMode: true,
  },
  perplexity: {
    ...SHARED,
    baseUrl: "https://api.perplexity.ai",
    model: "sonar",
    pricing: { inputPerMillion: 1, outputPerMillion: 1 },
    jsonMode: false,
  },
  groq: {
    ...SHARED,
    baseUrl: "https://api.groq.com/openai/v1",
    model: "llama-3.1-8b-instant",
    pricing: { inputPerMillion: 0.05, outputPerMillion: 0.08 },
    jsonMode: true,
  },
};

export function isPresetName(name: string): name is PresetName {
  return Object.prototype.hasOwnProperty.call(PRESETS, name);
}

export function createProvider(
  name: PresetName,
  apiKey: string,
  overrides: Partial<Omit<ProviderConfig, "apiKey">> = {},
  options: ProviderOptions = {}
): OpenAICompatibleProvider {
  return new OpenAICompatibleProvider({ ...PRESETS[name], id: name, ...overrides, apiKey }, options);
}
